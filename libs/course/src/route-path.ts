import { GeoPoint, geodesicFeet, geodesicMiles, interpolate, isFinitePoint } from '@milemark/geo';
import { InvalidRouteError } from './course.errors';

export const DEFAULT_MIN_SPACING_FT = 5;
export const DEFAULT_MAX_SPACING_FT = 75;

export interface RoutePath {
  points: GeoPoint[];
  /** Cumulative geodesic distance in miles, starting at 0 */
  distances: number[];
}

export function buildRoutePath(
  rawPoints: GeoPoint[],
  minSpacingFt = DEFAULT_MIN_SPACING_FT,
  maxSpacingFt = DEFAULT_MAX_SPACING_FT,
): RoutePath {
  if (rawPoints.length < 2) {
    throw new InvalidRouteError(`Route needs at least 2 points, got ${rawPoints.length}`);
  }
  if (!rawPoints.every(isFinitePoint)) {
    throw new InvalidRouteError('Route contains non-finite coordinates');
  }
  if (!(minSpacingFt >= 0) || !(maxSpacingFt > 0) || minSpacingFt > maxSpacingFt) {
    throw new InvalidRouteError(
      `Invalid point spacing: min ${minSpacingFt} ft, max ${maxSpacingFt} ft`,
    );
  }

  const points = resample(rawPoints, minSpacingFt, maxSpacingFt);
  return { points, distances: cumulativeDistances(points) };
}

/**
 * Walks the raw polyline keeping an anchor (the last emitted point). Each candidate
 * closer than minSpacingFt to the anchor is dropped; one further than maxSpacingFt is
 * reached through evenly spaced interpolated points, the last of which is the candidate.
 * The walk looks one vertex ahead of its cursor, so rawPoints[1] is never a candidate
 * on its own. The final raw point is always kept.
 */
function resample(rawPoints: GeoPoint[], minSpacingFt: number, maxSpacingFt: number): GeoPoint[] {
  const lastIndex = rawPoints.length - 1;
  const result: GeoPoint[] = [copy(rawPoints[0])];
  let acceptedIndex = 0;

  for (let i = 1; i < lastIndex; i++) {
    const candidate = rawPoints[i + 1];
    const anchor = result[result.length - 1];
    const distance = geodesicFeet(anchor, candidate);

    if (distance < minSpacingFt) {
      continue;
    }
    appendToward(result, anchor, candidate, distance, maxSpacingFt);
    acceptedIndex = i + 1;
  }

  if (acceptedIndex !== lastIndex) {
    const anchor = result[result.length - 1];
    const finish = rawPoints[lastIndex];
    appendToward(result, anchor, finish, geodesicFeet(anchor, finish), maxSpacingFt);
  }

  return result;
}

function appendToward(
  result: GeoPoint[],
  anchor: GeoPoint,
  target: GeoPoint,
  distance: number,
  maxSpacingFt: number,
): void {
  if (distance <= maxSpacingFt) {
    result.push(copy(target));
    return;
  }
  const steps = Math.ceil(distance / maxSpacingFt);
  for (let step = 1; step < steps; step++) {
    result.push(interpolate(anchor, target, step / steps));
  }
  result.push(copy(target));
}

function cumulativeDistances(points: GeoPoint[]): number[] {
  const distances = [0];
  for (let i = 1; i < points.length; i++) {
    distances.push(distances[i - 1] + geodesicMiles(points[i - 1], points[i]));
  }
  return distances;
}

const copy = (point: GeoPoint): GeoPoint => ({ lat: point.lat, lon: point.lon });
