export const toRad = (deg: number): number => (deg * Math.PI) / 180;

export const FEET_PER_METER = 3.280839895;
export const FEET_PER_MILE = 5280;
export const METERS_PER_MILE = 1609.344;

export interface GeoPoint {
  lat: number;
  lon: number;
}

export const metersToFeet = (meters: number): number => meters * FEET_PER_METER;
export const feetToMiles = (feet: number): number => feet / FEET_PER_MILE;
export const metersToMiles = (meters: number): number => meters / METERS_PER_MILE;

export function isFinitePoint(point: GeoPoint): boolean {
  return Number.isFinite(point.lat) && Number.isFinite(point.lon);
}

export function samePosition(a: GeoPoint, b: GeoPoint): boolean {
  return a.lat === b.lat && a.lon === b.lon;
}

/**
 * Haversine formula - calculates the great-circle distance between two points on a sphere.
 * Uses Earth's mean radius of 6371km.
 *
 * Formula: a = sin²(Δφ/2) + cos(φ1)·cos(φ2)·sin²(Δλ/2)
 *          c = 2·atan2(√a, √(1−a))
 *          d = R·c
 *
 * @returns Distance in meters
 */
export function haversine(p1: GeoPoint, p2: GeoPoint): number {
  const R = 6371000;

  const dLat = toRad(p2.lat - p1.lat);
  const dLon = toRad(p2.lon - p1.lon);

  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(p1.lat)) * Math.cos(toRad(p2.lat)) * Math.sin(dLon / 2) ** 2;

  return R * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

export function haversineFeet(p1: GeoPoint, p2: GeoPoint): number {
  return metersToFeet(haversine(p1, p2));
}

const WGS84_A = 6378137;
const WGS84_F = 1 / 298.257223563;
const WGS84_B = WGS84_A * (1 - WGS84_F);
const VINCENTY_MAX_ITERATIONS = 200;
const VINCENTY_TOLERANCE = 1e-12;

/**
 * Vincenty inverse formula - ellipsoidal distance on the WGS-84 ellipsoid.
 *
 * Iterates on the longitude difference λ on the auxiliary sphere until it settles,
 * then applies the series expansion for the geodesic length. Nearly antipodal
 * points may not converge; those fall back to the haversine distance.
 *
 * @returns Distance in meters
 */
export function geodesic(p1: GeoPoint, p2: GeoPoint): number {
  if (samePosition(p1, p2)) {
    return 0;
  }

  const L = toRad(p2.lon - p1.lon);
  const U1 = Math.atan((1 - WGS84_F) * Math.tan(toRad(p1.lat)));
  const U2 = Math.atan((1 - WGS84_F) * Math.tan(toRad(p2.lat)));
  const sinU1 = Math.sin(U1);
  const cosU1 = Math.cos(U1);
  const sinU2 = Math.sin(U2);
  const cosU2 = Math.cos(U2);

  let lambda = L;
  for (let iteration = 0; iteration < VINCENTY_MAX_ITERATIONS; iteration++) {
    const sinLambda = Math.sin(lambda);
    const cosLambda = Math.cos(lambda);
    const sinSigma = Math.sqrt(
      (cosU2 * sinLambda) ** 2 + (cosU1 * sinU2 - sinU1 * cosU2 * cosLambda) ** 2,
    );
    if (sinSigma === 0) {
      return 0;
    }
    const cosSigma = sinU1 * sinU2 + cosU1 * cosU2 * cosLambda;
    const sigma = Math.atan2(sinSigma, cosSigma);
    const sinAlpha = (cosU1 * cosU2 * sinLambda) / sinSigma;
    const cosSqAlpha = 1 - sinAlpha ** 2;
    // equatorial lines have cosSqAlpha = 0
    const cos2SigmaM = cosSqAlpha === 0 ? 0 : cosSigma - (2 * sinU1 * sinU2) / cosSqAlpha;
    const C = (WGS84_F / 16) * cosSqAlpha * (4 + WGS84_F * (4 - 3 * cosSqAlpha));
    const previous = lambda;
    lambda =
      L +
      (1 - C) *
        WGS84_F *
        sinAlpha *
        (sigma + C * sinSigma * (cos2SigmaM + C * cosSigma * (-1 + 2 * cos2SigmaM ** 2)));

    if (Math.abs(lambda - previous) < VINCENTY_TOLERANCE) {
      const uSq = (cosSqAlpha * (WGS84_A ** 2 - WGS84_B ** 2)) / WGS84_B ** 2;
      const A = 1 + (uSq / 16384) * (4096 + uSq * (-768 + uSq * (320 - 175 * uSq)));
      const B = (uSq / 1024) * (256 + uSq * (-128 + uSq * (74 - 47 * uSq)));
      const deltaSigma =
        B *
        sinSigma *
        (cos2SigmaM +
          (B / 4) *
            (cosSigma * (-1 + 2 * cos2SigmaM ** 2) -
              (B / 6) * cos2SigmaM * (-3 + 4 * sinSigma ** 2) * (-3 + 4 * cos2SigmaM ** 2)));
      return WGS84_B * A * (sigma - deltaSigma);
    }
  }

  return haversine(p1, p2);
}

export function geodesicFeet(p1: GeoPoint, p2: GeoPoint): number {
  return metersToFeet(geodesic(p1, p2));
}

export function geodesicMiles(p1: GeoPoint, p2: GeoPoint): number {
  return metersToMiles(geodesic(p1, p2));
}

/**
 * Linear interpolation in latitude/longitude. Adequate for the sub-kilometer
 * spans it is used on; not a great-circle interpolation.
 */
export function interpolate(from: GeoPoint, to: GeoPoint, fraction: number): GeoPoint {
  return {
    lat: from.lat + (to.lat - from.lat) * fraction,
    lon: from.lon + (to.lon - from.lon) * fraction,
  };
}

export function googleMapsUrl(point: GeoPoint): string {
  return `https://www.google.com/maps/search/?api=1&query=${point.lat},${point.lon}`;
}
