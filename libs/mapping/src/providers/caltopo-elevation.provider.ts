import { FETCH_TIMEOUT_MS, isRecord } from '@milemark/common';
import { GeoPoint, metersToFeet } from '@milemark/geo';
import { ElevationProvider } from '../elevation-provider.interface';
import { CALTOPO_URL } from './caltopo.client';

/**
 * CalTopo's public DEM point-statistics endpoint. The whole path goes up as one
 * LineString; each result row is [lon, lat, elevation in meters].
 */
export class CaltopoElevationProvider implements ElevationProvider {
  constructor(private readonly baseUrl = CALTOPO_URL) {}

  async fetchElevations(points: GeoPoint[]): Promise<number[]> {
    if (points.length === 0) {
      return [];
    }

    const geometry = {
      geometry: {
        type: 'LineString',
        coordinates: points.map((p) => [p.lon, p.lat]),
      },
    };
    const response = await fetch(`${this.baseUrl}/dem/pointstats`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8' },
      body: new URLSearchParams({ json: JSON.stringify(geometry) }).toString(),
      signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
    });

    if (!response.ok) {
      throw new Error(`CalTopo DEM error: ${response.status} ${response.statusText}`);
    }

    const data: unknown = await response.json();
    const rows = isRecord(data) && Array.isArray(data.result) ? data.result : null;
    if (!rows) {
      throw new Error('CalTopo DEM response has no result');
    }

    return rows.map((row, i) => {
      const meters = Array.isArray(row) ? row[2] : undefined;
      if (typeof meters !== 'number') {
        throw new Error(`CalTopo DEM row ${i} has no elevation`);
      }
      return metersToFeet(meters);
    });
  }
}
