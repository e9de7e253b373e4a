import { Logger } from '@nestjs/common';
import { isRecord } from '@milemark/common';
import { GeoPoint } from '@milemark/geo';
import {
  MapFeatureProvider,
  MapFeatures,
  MapMarker,
  MapRoute,
} from '../map-feature-provider.interface';
import { CALTOPO_URL, CaltopoClient } from './caltopo.client';

export class MapFeaturesError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MapFeaturesError';
  }
}

/** [lon, lat, ...] → GeoPoint, or null when the pair is not numeric */
function toGeoPoint(coordinate: unknown): GeoPoint | null {
  if (!Array.isArray(coordinate) || coordinate.length < 2) {
    return null;
  }
  const [lon, lat] = coordinate;
  if (typeof lat !== 'number' || typeof lon !== 'number') {
    return null;
  }
  return { lat, lon };
}

function lineCoordinates(geometry: Record<string, unknown>): unknown[] {
  const coordinates = Array.isArray(geometry.coordinates) ? geometry.coordinates : [];
  switch (geometry.type) {
    case 'LineString':
      return coordinates;
    case 'MultiLineString':
      return coordinates.flatMap((line) => (Array.isArray(line) ? line : []));
    default:
      return [];
  }
}

export class CaltopoMapProvider implements MapFeatureProvider {
  private readonly logger = new Logger(CaltopoMapProvider.name);

  constructor(
    private readonly client: CaltopoClient,
    private readonly mapId: string,
  ) {}

  async fetchFeatures(): Promise<MapFeatures> {
    const data = await this.client.get(`/api/v1/map/${this.mapId}/since/0`);
    const features =
      isRecord(data) && isRecord(data.result) && isRecord(data.result.state)
        ? data.result.state.features
        : undefined;
    if (!Array.isArray(features)) {
      throw new MapFeaturesError(`No features found for map ${this.mapId}`);
    }

    const routes: MapRoute[] = [];
    const markers: MapMarker[] = [];
    for (const feature of features) {
      if (!isRecord(feature) || !isRecord(feature.properties) || !isRecord(feature.geometry)) {
        continue;
      }
      const properties = feature.properties;
      const title = typeof properties.title === 'string' ? properties.title : '';

      switch (properties.class) {
        case 'Shape': {
          const coordinates = lineCoordinates(feature.geometry)
            .map(toGeoPoint)
            .filter((point): point is GeoPoint => point !== null);
          if (coordinates.length > 0) {
            routes.push({ title, coordinates });
          }
          break;
        }
        case 'Marker': {
          const position = toGeoPoint(feature.geometry.coordinates);
          if (position) {
            markers.push({
              id: typeof feature.id === 'string' ? feature.id : null,
              title,
              ...position,
              properties,
            });
          }
          break;
        }
        default:
          this.logger.debug(`Skipping ${String(properties.class)} feature "${title}"`);
      }
    }

    this.logger.log(
      `Loaded map ${this.mapId}: ${routes.length} shapes, ${markers.length} markers`,
    );
    return { routes, markers, url: `${CALTOPO_URL}/m/${this.mapId}` };
  }
}
