export * from './elevation-provider.interface';
export * from './map-feature-provider.interface';
export * from './mapping.config';
export * from './mapping.module';
export * from './marker-updater.interface';
export * from './providers/caltopo.client';
export * from './providers/caltopo-elevation.provider';
export * from './providers/caltopo-map.provider';
export * from './providers/caltopo-marker.updater';
export * from './providers/gpx-map.provider';
export * from './providers/openmeteo-elevation.provider';
