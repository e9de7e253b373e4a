import { MapMarker } from './map-feature-provider.interface';

export interface MarkerUpdater {
  /**
   * Writes the marker's position and styling to the map, creating it when it has no id.
   * Resolves to the marker as stored, with its id.
   */
  saveMarker(marker: MapMarker): Promise<MapMarker>;
}

export const MARKER_UPDATER = Symbol('MARKER_UPDATER');
