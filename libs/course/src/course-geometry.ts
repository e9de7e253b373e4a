import polyline from '@mapbox/polyline';
import { GeoPoint, metersToFeet, toRad } from '@milemark/geo';
import { Route } from './route';

/** Points closer than this to the drawn line are left out of the course polyline */
const POLYLINE_TOLERANCE_FT = 25;
const FEET_PER_DEGREE_LAT = metersToFeet(111_320);
const DEFAULT_PROFILE_SAMPLES = 500;

export interface ElevationSample {
  /** Miles */
  distance: number;
  /** Feet */
  elevation: number;
}

/** Feet from point to the segment from → to, on a flat projection anchored at from */
function offsetFromSegmentFt(point: GeoPoint, from: GeoPoint, to: GeoPoint): number {
  const feetPerDegreeLon = FEET_PER_DEGREE_LAT * Math.cos(toRad(from.lat));
  const px = (point.lon - from.lon) * feetPerDegreeLon;
  const py = (point.lat - from.lat) * FEET_PER_DEGREE_LAT;
  const sx = (to.lon - from.lon) * feetPerDegreeLon;
  const sy = (to.lat - from.lat) * FEET_PER_DEGREE_LAT;

  const lengthSq = sx * sx + sy * sy;
  const along = lengthSq === 0 ? 0 : Math.min(1, Math.max(0, (px * sx + py * sy) / lengthSq));
  return Math.hypot(px - along * sx, py - along * sy);
}

/**
 * Indices of the route points worth drawing: every dropped point lies within
 * toleranceFt of the line through the kept ones. Indices stay valid against the
 * route's distance and elevation arrays. Always keeps the start and the finish.
 */
export function simplifyRouteIndices(points: readonly GeoPoint[], toleranceFt: number): number[] {
  const lastIndex = points.length - 1;
  if (lastIndex < 2) {
    return points.map((_, i) => i);
  }

  const kept = new Set<number>([0, lastIndex]);
  const pending: [number, number][] = [[0, lastIndex]];
  for (let span = pending.pop(); span; span = pending.pop()) {
    const [from, to] = span;
    let widest = -1;
    let widestFt = toleranceFt;
    for (let i = from + 1; i < to; i++) {
      const offsetFt = offsetFromSegmentFt(points[i], points[from], points[to]);
      if (offsetFt > widestFt) {
        widest = i;
        widestFt = offsetFt;
      }
    }
    if (widest !== -1) {
      kept.add(widest);
      pending.push([from, widest], [widest, to]);
    }
  }
  return [...kept].sort((a, b) => a - b);
}

/** Google encoded polyline of the route, thinned for drawing */
export function encodeRoutePolyline(route: Route, toleranceFt = POLYLINE_TOLERANCE_FT): string {
  const coordinates = simplifyRouteIndices(route.points, toleranceFt).map(
    (i): [number, number] => [route.points[i].lat, route.points[i].lon],
  );
  return polyline.encode(coordinates);
}

/** Evenly strided distance/elevation pairs for an elevation chart; always ends at the finish */
export function elevationSamples(
  route: Route,
  maxSamples = DEFAULT_PROFILE_SAMPLES,
): ElevationSample[] {
  const stride = Math.max(1, Math.ceil(route.points.length / maxSamples));
  const samples: ElevationSample[] = [];
  for (let i = 0; i < route.points.length; i += stride) {
    samples.push({ distance: route.distances[i], elevation: route.elevations[i] });
  }
  const lastIndex = route.points.length - 1;
  if (lastIndex % stride !== 0) {
    samples.push({ distance: route.distances[lastIndex], elevation: route.elevations[lastIndex] });
  }
  return samples;
}
