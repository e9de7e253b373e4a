import { Logger } from '@nestjs/common';
import { EngineLogger } from '@milemark/common';
import { GeoPoint } from '@milemark/geo';
import { ElevationProvider } from '@milemark/mapping';

export interface AltitudeChanges {
  gains: number[];
  losses: number[];
}

/**
 * Running totals of ascent and descent along the profile. Both arrays match the
 * input length and start at 0; each step adds its positive delta to gains and its
 * negated negative delta to losses, so both are non-decreasing.
 */
export function cumulativeAltitudeChanges(altitudes: number[]): AltitudeChanges {
  if (altitudes.length === 0) {
    return { gains: [], losses: [] };
  }

  const gains = [0];
  const losses = [0];
  for (let i = 1; i < altitudes.length; i++) {
    const delta = altitudes[i] - altitudes[i - 1];
    gains.push(gains[i - 1] + Math.max(delta, 0));
    losses.push(losses[i - 1] + Math.max(-delta, 0));
  }
  return { gains, losses };
}

/**
 * Elevation lookup for a resampled path, in feet. Any provider failure degrades to
 * an empty profile rather than failing course construction.
 */
export async function fetchElevationProfile(
  provider: ElevationProvider | null,
  points: GeoPoint[],
  logger: EngineLogger = new Logger('ElevationProfile'),
): Promise<number[]> {
  if (!provider) {
    return [];
  }

  let elevations: number[];
  try {
    elevations = await provider.fetchElevations(points);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Elevation lookup failed, continuing without elevation: ${message}`);
    return [];
  }

  if (elevations.length !== points.length || !elevations.every(Number.isFinite)) {
    logger.warn(
      `Elevation lookup returned ${elevations.length} values for ${points.length} points, continuing without elevation`,
    );
    return [];
  }
  return elevations;
}
