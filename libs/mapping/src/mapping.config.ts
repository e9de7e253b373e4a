import { ConfigType, registerAs } from '@nestjs/config';

export const MAP_PROVIDER_TYPES = ['caltopo', 'gpx'] as const;
export const ELEVATION_PROVIDER_TYPES = ['caltopo', 'openmeteo', 'none'] as const;

export type MapProviderType = (typeof MAP_PROVIDER_TYPES)[number];
export type ElevationProviderType = (typeof ELEVATION_PROVIDER_TYPES)[number];

function oneOf<T extends string>(choices: readonly T[], value: string | undefined, fallback: T): T {
  return choices.find((choice) => choice === value) ?? fallback;
}

export const mappingConfig = registerAs('mapping', () => ({
  provider: oneOf(MAP_PROVIDER_TYPES, process.env.MAP_PROVIDER, 'caltopo'),
  elevationProvider: oneOf(ELEVATION_PROVIDER_TYPES, process.env.ELEVATION_PROVIDER, 'caltopo'),
  markerUpdates: process.env.MARKER_UPDATES !== 'false',
  caltopo: {
    mapId: process.env.CALTOPO_MAP_ID || '',
    credentialId: process.env.CALTOPO_CREDENTIAL_ID || '',
    key: process.env.CALTOPO_KEY || '',
  },
  gpxFile: process.env.GPX_FILE || 'config/course.gpx',
}));

export type MappingConfig = ConfigType<typeof mappingConfig>;
