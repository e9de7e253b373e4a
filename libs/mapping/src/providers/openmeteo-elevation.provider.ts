import { FETCH_TIMEOUT_MS, isNumberArray, isRecord } from '@milemark/common';
import { GeoPoint, metersToFeet } from '@milemark/geo';
import { ElevationProvider } from '../elevation-provider.interface';

const OPEN_METEO_ELEVATION_API = 'https://api.open-meteo.com/v1/elevation';
/** The API accepts at most 100 coordinates per request */
export const OPEN_METEO_BATCH_SIZE = 100;

export class OpenMeteoElevationProvider implements ElevationProvider {
  constructor(private readonly apiUrl = OPEN_METEO_ELEVATION_API) {}

  async fetchElevations(points: GeoPoint[]): Promise<number[]> {
    const elevations: number[] = [];

    /**
     * Batches run one after another; the free tier rate-limits bursts.
     */
    for (let start = 0; start < points.length; start += OPEN_METEO_BATCH_SIZE) {
      const batch = points.slice(start, start + OPEN_METEO_BATCH_SIZE);
      const meters = await this.fetchBatch(batch);
      elevations.push(...meters.map(metersToFeet));
    }

    return elevations;
  }

  private async fetchBatch(batch: GeoPoint[]): Promise<number[]> {
    const url = new URL(this.apiUrl);
    url.searchParams.set('latitude', batch.map((p) => p.lat).join(','));
    url.searchParams.set('longitude', batch.map((p) => p.lon).join(','));

    const response = await fetch(url.toString(), { signal: AbortSignal.timeout(FETCH_TIMEOUT_MS) });
    if (!response.ok) {
      throw new Error(`Open-Meteo API error: ${response.status} ${response.statusText}`);
    }

    const data: unknown = await response.json();
    if (!isRecord(data) || !isNumberArray(data.elevation) || data.elevation.length !== batch.length) {
      throw new Error(`Open-Meteo returned no elevations for ${batch.length} points`);
    }
    return data.elevation;
  }
}
