import { Module } from '@nestjs/common';
import { raceConfig, RaceConfig } from '@milemark/config';
import {
  ELEVATION_PROVIDER,
  ElevationProvider,
  MAP_FEATURE_PROVIDER,
  MapFeatureProvider,
  MappingModule,
} from '@milemark/mapping';
import { LOADED_COURSE, loadCourse } from './course.loader';

const mapping = MappingModule.forRoot();

@Module({
  imports: [mapping],
  providers: [
    {
      provide: LOADED_COURSE,
      useFactory: (
        config: RaceConfig,
        mapProvider: MapFeatureProvider,
        elevationProvider: ElevationProvider | null,
      ) => loadCourse(config, mapProvider, elevationProvider),
      inject: [raceConfig.KEY, MAP_FEATURE_PROVIDER, ELEVATION_PROVIDER],
    },
  ],
  exports: [LOADED_COURSE, mapping],
})
export class CourseModule {}
