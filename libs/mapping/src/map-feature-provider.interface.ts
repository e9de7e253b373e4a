import { GeoPoint } from '@milemark/geo';

export interface MapRoute {
  title: string;
  coordinates: GeoPoint[];
}

export interface MapMarker {
  /** Provider-side identifier; null for markers that exist only locally (GPX waypoints) */
  id: string | null;
  title: string;
  lat: number;
  lon: number;
  /** Provider-specific styling carried through marker updates */
  properties: Record<string, unknown>;
}

export interface MapFeatures {
  routes: MapRoute[];
  markers: MapMarker[];
  /** Link to the map for humans, when the provider has one */
  url: string | null;
}

export interface MapFeatureProvider {
  fetchFeatures(): Promise<MapFeatures>;
}

export const MAP_FEATURE_PROVIDER = Symbol('MAP_FEATURE_PROVIDER');
