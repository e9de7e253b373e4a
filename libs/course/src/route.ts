import { Logger } from '@nestjs/common';
import { EngineLogger } from '@milemark/common';
import { GeoPoint } from '@milemark/geo';
import { ElevationProvider } from '@milemark/mapping';
import { InvalidRouteError } from './course.errors';
import { cumulativeAltitudeChanges, fetchElevationProfile } from './elevation-profile';
import { buildRoutePath, DEFAULT_MAX_SPACING_FT, DEFAULT_MIN_SPACING_FT } from './route-path';
import { SpatialIndex } from './spatial-index';

export interface RouteOptions {
  minSpacingFt?: number;
  maxSpacingFt?: number;
  logger?: EngineLogger;
}

/**
 * Resampled course path with cumulative distance (miles) and elevation (feet)
 * for every point. Immutable once built.
 */
export class Route {
  readonly points: readonly GeoPoint[];
  readonly distances: readonly number[];
  readonly elevations: readonly number[];
  readonly gains: readonly number[];
  readonly losses: readonly number[];
  readonly index: SpatialIndex;

  constructor(
    readonly name: string,
    points: GeoPoint[],
    distances: number[],
    elevations: number[] = [],
  ) {
    if (points.length < 2 || distances.length !== points.length) {
      throw new InvalidRouteError(
        `Route "${name}" has ${points.length} points and ${distances.length} distances`,
      );
    }
    if (elevations.length !== 0 && elevations.length !== points.length) {
      throw new InvalidRouteError(
        `Route "${name}" has ${points.length} points but ${elevations.length} elevations`,
      );
    }

    const profile = elevations.length === 0 ? points.map(() => 0) : elevations;
    const { gains, losses } = cumulativeAltitudeChanges(profile);

    this.points = Object.freeze(points);
    this.distances = Object.freeze(distances);
    this.elevations = Object.freeze(profile);
    this.gains = Object.freeze(gains);
    this.losses = Object.freeze(losses);
    this.index = new SpatialIndex(this.points);
  }

  static async build(
    name: string,
    rawPoints: GeoPoint[],
    elevationProvider: ElevationProvider | null,
    options: RouteOptions = {},
  ): Promise<Route> {
    const logger = options.logger ?? new Logger(Route.name);
    const { points, distances } = buildRoutePath(
      rawPoints,
      options.minSpacingFt ?? DEFAULT_MIN_SPACING_FT,
      options.maxSpacingFt ?? DEFAULT_MAX_SPACING_FT,
    );
    const elevations = await fetchElevationProfile(elevationProvider, points, logger);
    const route = new Route(name, points, distances, elevations);

    logger.log(
      `Built route "${name}": ${rawPoints.length} raw points resampled to ${points.length}, ` +
        `${route.length.toFixed(2)} mi, +${Math.round(route.gain)}/-${Math.round(route.loss)} ft`,
    );
    return route;
  }

  /** Total length in miles */
  get length(): number {
    return this.distances[this.distances.length - 1];
  }

  get gain(): number {
    return this.gains[this.gains.length - 1];
  }

  get loss(): number {
    return this.losses[this.losses.length - 1];
  }

  get start(): GeoPoint {
    return this.points[0];
  }

  get finish(): GeoPoint {
    return this.points[this.points.length - 1];
  }

  /** Index of the point whose cumulative distance is closest to the mile mark; first wins on ties */
  indexNearestMileMark(mileMark: number): number {
    let bestIndex = 0;
    let bestDelta = Infinity;
    this.distances.forEach((distance, index) => {
      const delta = Math.abs(distance - mileMark);
      if (delta < bestDelta) {
        bestDelta = delta;
        bestIndex = index;
      }
    });
    return bestIndex;
  }
}
