import { GeoPoint } from '@milemark/geo';

export interface ElevationProvider {
  /** One elevation in feet per input point, in input order */
  fetchElevations(points: GeoPoint[]): Promise<number[]>;
}

export const ELEVATION_PROVIDER = Symbol('ELEVATION_PROVIDER');
