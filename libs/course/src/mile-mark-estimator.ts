import { Logger } from '@nestjs/common';
import { EngineLogger } from '@milemark/common';
import { GeoPoint } from '@milemark/geo';
import { Route } from './route';

export const SEARCH_RADIUS_FT = 100;
/** Pace assumed when none has been observed yet, min/mile */
export const FALLBACK_PACE = 10;

export interface MileMarkEstimate {
  mileMark: number;
  /** The route point the fix was attributed to */
  point: GeoPoint;
  elevation: number;
}

/** Log of the normal density, without the terms shared by every candidate */
const logDensity = (x: number, mean: number, sd: number): number =>
  -((x - mean) ** 2) / (2 * sd ** 2);

/**
 * Position in the candidate list of the mile mark most consistent with the runner's
 * progress so far. The expected distance is elapsedMinutes at the given pace, with a
 * standard deviation of a third of the pace. The first candidate wins ties, and a
 * zero or unknown pace also returns the first candidate.
 */
export function mostProbableCandidate(
  mileMarks: readonly number[],
  elapsedMinutes: number,
  averagePace: number,
): number {
  const pace = Number.isFinite(averagePace) && averagePace > 0 ? averagePace : 0;
  const expected = elapsedMinutes * (1 / (pace || FALLBACK_PACE));
  const sd = pace / 3;
  if (sd === 0) {
    return 0;
  }

  let bestPosition = 0;
  let bestDensity = -Infinity;
  mileMarks.forEach((mileMark, position) => {
    const density = logDensity(mileMark, expected, sd);
    if (density > bestDensity) {
      bestDensity = density;
      bestPosition = position;
    }
  });
  return bestPosition;
}

export function mostProbableMileMark(
  mileMarks: readonly number[],
  elapsedMinutes: number,
  averagePace: number,
): number {
  return mileMarks[mostProbableCandidate(mileMarks, elapsedMinutes, averagePace)];
}

/**
 * Attributes a reported position to a mile mark along the route. The fix is snapped to
 * its nearest route point; when every route point within SEARCH_RADIUS_FT of that snap
 * lies in one unbroken run, the snapped point is the answer. Otherwise the course passes
 * nearby more than once, and the candidate most consistent with elapsed time and pace
 * is chosen.
 */
export function estimateMileMark(
  route: Route,
  position: GeoPoint,
  elapsedMinutes: number,
  averagePace: number,
  logger: EngineLogger = new Logger('MileMarkEstimator'),
): MileMarkEstimate {
  const snapped = route.index.nearest(position);
  const nearby = route.index.withinRadius(route.points[snapped], SEARCH_RADIUS_FT);

  if (nearby.indices.length === 0) {
    logger.warn(`No route points within ${SEARCH_RADIUS_FT} ft of the snapped position`);
    return { mileMark: 0, point: { lat: 0, lon: 0 }, elevation: 0 };
  }

  let index = snapped;
  if (!nearby.contiguous) {
    const candidates = nearby.indices.map((i) => route.distances[i]);
    index = nearby.indices[mostProbableCandidate(candidates, elapsedMinutes, averagePace)];
    logger.debug(
      `Ambiguous position near mile ${route.distances[snapped].toFixed(2)}: ` +
        `${candidates.length} candidates, chose mile ${route.distances[index].toFixed(2)}`,
    );
  }

  return {
    mileMark: route.distances[index],
    point: route.points[index],
    elevation: route.elevations[index],
  };
}
