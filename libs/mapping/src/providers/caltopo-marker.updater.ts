import { isRecord } from '@milemark/common';
import { MapMarker } from '../map-feature-provider.interface';
import { MarkerUpdater } from '../marker-updater.interface';
import { CaltopoClient } from './caltopo.client';

export class CaltopoMarkerUpdater implements MarkerUpdater {
  constructor(
    private readonly client: CaltopoClient,
    private readonly mapId: string,
  ) {}

  async saveMarker(marker: MapMarker): Promise<MapMarker> {
    const endpoint = marker.id
      ? `/api/v1/map/${this.mapId}/Marker/${marker.id}`
      : `/api/v1/map/${this.mapId}/Marker`;
    const data = await this.client.post(endpoint, {
      type: 'Feature',
      id: marker.id,
      geometry: { type: 'Point', coordinates: [marker.lon, marker.lat] },
      properties: { ...marker.properties, title: marker.title, class: 'Marker' },
    });

    const id = isRecord(data) && isRecord(data.result) ? data.result.id : undefined;
    return { ...marker, id: typeof id === 'string' ? id : marker.id };
  }
}
