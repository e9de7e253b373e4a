import { DynamicModule, Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ELEVATION_PROVIDER, ElevationProvider } from './elevation-provider.interface';
import { MAP_FEATURE_PROVIDER, MapFeatureProvider } from './map-feature-provider.interface';
import { MARKER_UPDATER, MarkerUpdater } from './marker-updater.interface';
import { MappingConfig } from './mapping.config';
import { CaltopoClient } from './providers/caltopo.client';
import { CaltopoElevationProvider } from './providers/caltopo-elevation.provider';
import { CaltopoMapProvider } from './providers/caltopo-map.provider';
import { CaltopoMarkerUpdater } from './providers/caltopo-marker.updater';
import { GpxMapProvider } from './providers/gpx-map.provider';
import { OpenMeteoElevationProvider } from './providers/openmeteo-elevation.provider';

const CALTOPO_CLIENT = Symbol('CALTOPO_CLIENT');

const getMapping = (configService: ConfigService): MappingConfig =>
  configService.getOrThrow<MappingConfig>('mapping');

@Module({})
export class MappingModule {
  static forRoot(): DynamicModule {
    return {
      module: MappingModule,
      providers: [
        {
          provide: CALTOPO_CLIENT,
          useFactory: (configService: ConfigService) => {
            const { credentialId, key } = getMapping(configService).caltopo;
            return new CaltopoClient({ credentialId, key });
          },
          inject: [ConfigService],
        },
        {
          provide: MAP_FEATURE_PROVIDER,
          useFactory: (configService: ConfigService, client: CaltopoClient): MapFeatureProvider => {
            const mapping = getMapping(configService);

            switch (mapping.provider) {
              case 'gpx':
                return new GpxMapProvider(mapping.gpxFile);
              case 'caltopo':
              default:
                return new CaltopoMapProvider(client, mapping.caltopo.mapId);
            }
          },
          inject: [ConfigService, CALTOPO_CLIENT],
        },
        {
          provide: ELEVATION_PROVIDER,
          useFactory: (configService: ConfigService): ElevationProvider | null => {
            switch (getMapping(configService).elevationProvider) {
              case 'none':
                return null;
              case 'openmeteo':
                return new OpenMeteoElevationProvider();
              case 'caltopo':
              default:
                return new CaltopoElevationProvider();
            }
          },
          inject: [ConfigService],
        },
        {
          provide: MARKER_UPDATER,
          useFactory: (configService: ConfigService, client: CaltopoClient): MarkerUpdater | null => {
            const mapping = getMapping(configService);
            if (!mapping.markerUpdates) {
              return null;
            }
            if (mapping.provider !== 'caltopo') {
              new Logger(MappingModule.name).warn(
                `Marker updates need a CalTopo map; disabled for provider "${mapping.provider}"`,
              );
              return null;
            }
            return new CaltopoMarkerUpdater(client, mapping.caltopo.mapId);
          },
          inject: [ConfigService, CALTOPO_CLIENT],
        },
      ],
      exports: [MAP_FEATURE_PROVIDER, ELEVATION_PROVIDER, MARKER_UPDATER],
    };
  }
}
