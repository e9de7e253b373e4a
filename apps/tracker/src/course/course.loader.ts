import { Logger } from '@nestjs/common';
import { RaceConfig } from '@milemark/config';
import { Course, Route, RouteNotFoundError } from '@milemark/course';
import { ElevationProvider, MapFeatureProvider, MapMarker } from '@milemark/mapping';

export const LOADED_COURSE = Symbol('LOADED_COURSE');

export interface LoadedCourse {
  course: Course;
  /** Every marker on the map, including the ones that are not aid stations */
  markers: MapMarker[];
  mapUrl: string | null;
}

export async function loadCourse(
  config: RaceConfig,
  mapProvider: MapFeatureProvider,
  elevationProvider: ElevationProvider | null,
): Promise<LoadedCourse> {
  const logger = new Logger('CourseLoader');
  const features = await mapProvider.fetchFeatures();

  const mapRoute = features.routes.find((route) => route.title === config.routeName);
  if (!mapRoute) {
    throw new RouteNotFoundError(
      config.routeName,
      features.routes.map((route) => route.title),
    );
  }

  const route = await Route.build(config.routeName, mapRoute.coordinates, elevationProvider, {
    minSpacingFt: config.minSpacingFt,
    maxSpacingFt: config.maxSpacingFt,
  });
  const course = Course.build(route, config.aidStations, features.markers);
  logger.log(
    `Course for ${config.raceName}: ${course.aidStations.length} aid stations, ${course.legs.length} legs`,
  );

  return { course, markers: features.markers, mapUrl: features.url };
}
