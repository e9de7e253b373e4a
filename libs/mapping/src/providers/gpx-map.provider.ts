import { readFile } from 'node:fs/promises';
import { Logger } from '@nestjs/common';
import { DOMParser } from '@xmldom/xmldom';
import * as toGeoJSON from '@tmcw/togeojson';
import {
  MapFeatureProvider,
  MapFeatures,
  MapMarker,
  MapRoute,
} from '../map-feature-provider.interface';

export class GpxParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GpxParseError';
  }
}

/**
 * Tracks and routes become map routes named by their <name>; waypoints become
 * markers named by theirs. Waypoints have no provider-side id.
 */
export function parseGpxFeatures(gpxContent: string): MapFeatures {
  if (!gpxContent.trim()) {
    throw new GpxParseError('GPX content is empty');
  }

  const doc = parseXml(gpxContent);
  if (doc.getElementsByTagName('parsererror').length > 0) {
    throw new GpxParseError('Failed to parse GPX: invalid XML structure');
  }

  let geoJson: ReturnType<typeof toGeoJSON.gpx>;
  try {
    geoJson = toGeoJSON.gpx(doc);
  } catch {
    throw new GpxParseError('Failed to parse GPX: invalid GPX format');
  }

  const routes: MapRoute[] = [];
  const markers: MapMarker[] = [];
  for (const feature of geoJson.features) {
    const name = typeof feature.properties?.name === 'string' ? feature.properties.name : '';
    const geometry = feature.geometry;
    if (!geometry) {
      continue;
    }

    switch (geometry.type) {
      case 'LineString':
        routes.push({
          title: name,
          coordinates: geometry.coordinates.map(([lon, lat]) => ({ lat, lon })),
        });
        break;
      case 'MultiLineString':
        routes.push({
          title: name,
          coordinates: geometry.coordinates.flat().map(([lon, lat]) => ({ lat, lon })),
        });
        break;
      case 'Point': {
        const [lon, lat] = geometry.coordinates;
        markers.push({ id: null, title: name, lat, lon, properties: {} });
        break;
      }
    }
  }

  if (routes.length === 0) {
    throw new GpxParseError('GPX file contains no tracks or routes');
  }
  return { routes, markers, url: null };
}

function parseXml(content: string): ReturnType<DOMParser['parseFromString']> {
  try {
    return new DOMParser().parseFromString(content, 'text/xml');
  } catch {
    throw new GpxParseError('Failed to parse GPX: invalid XML');
  }
}

export class GpxMapProvider implements MapFeatureProvider {
  private readonly logger = new Logger(GpxMapProvider.name);

  constructor(private readonly filePath: string) {}

  async fetchFeatures(): Promise<MapFeatures> {
    const content = await readFile(this.filePath, 'utf8');
    const features = parseGpxFeatures(content);
    this.logger.log(
      `Loaded ${this.filePath}: ${features.routes.length} routes, ${features.markers.length} waypoints`,
    );
    return features;
  }
}
