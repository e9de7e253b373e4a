import {
  formatDateTime,
  formatDistance,
  formatDuration,
  formatPace,
} from '@milemark/common';
import {
  AidStation,
  Course,
  elevationSamples,
  encodeRoutePolyline,
  ElevationSample,
  Leg,
  LegTimes,
} from '@milemark/course';
import { FEET_PER_MILE } from '@milemark/geo';
import { Race } from '@milemark/tracker';

export interface AidStationView {
  name: string;
  displayName: string;
  mileMark: number;
  altitude: number;
  comments: string;
  gmapsUrl: string;
  isPassed: boolean;
  arrivalTime: string | null;
  departureTime: string | null;
  estimatedArrivalTime: string | null;
  estimatedDepartureTime: string | null;
}

export interface LegView {
  name: string;
  mileMark: number;
  endMileMark: number;
  distance: number;
  gain: number;
  loss: number;
  isPassed: boolean;
  estimatedDuration: string;
  arrivalTime: string | null;
  departureTime: string | null;
  estimatedArrivalTime: string | null;
  estimatedDepartureTime: string | null;
}

export interface RaceStatusView {
  race: string;
  runner: string;
  startTime: string;
  started: boolean;
  finished: boolean;
  mileMark: number;
  distanceToFinish: string;
  elevation: number;
  pings: number;
  lowBattery: boolean;
  trackInterval: number;
  lastFix: string | null;
  courseDeviation: string;
  elapsed: string;
  stoppage: string;
  moving: string;
  currentPace: string;
  averageOverallPace: string;
  averageMovingPace: string;
  estimatedFinish: string | null;
  estimatedFinishTime: string;
  aidStations: AidStationView[];
  legs: LegView[];
}

export interface CourseView {
  name: string;
  length: number;
  gain: number;
  loss: number;
  mapUrl: string | null;
  polyline: string;
  profile: ElevationSample[];
  aidStations: { name: string; mileMark: number; lat: number; lon: number; altitude: number }[];
}

/** Status rendered for people following along; wall-clock times are in the race's time zone */
export function presentRaceStatus(race: Race, runnerName: string, timeZone: string): RaceStatusView {
  const { runner, course } = race;
  const when = (date: Date | null): string | null => (date ? formatDateTime(date, timeZone) : null);
  const finishDate = runner.estimatedFinishDate();
  const remainingFt = Math.max(course.route.length - runner.mileMark, 0) * FEET_PER_MILE;

  return {
    race: race.name,
    runner: runnerName,
    startTime: formatDateTime(race.startTime, timeZone),
    started: runner.started,
    finished: runner.finished,
    mileMark: round(runner.mileMark, 2),
    distanceToFinish: formatDistance(remainingFt),
    elevation: Math.round(runner.elevation),
    pings: runner.pings,
    lowBattery: runner.lowBattery,
    trackInterval: runner.trackInterval,
    lastFix: when(runner.lastFix?.timestamp ?? null),
    courseDeviation: formatDistance(runner.courseDeviationFt(), true),
    elapsed: formatDuration(runner.elapsedMs()),
    stoppage: formatDuration(runner.stoppageMs()),
    moving: formatDuration(runner.movingMs()),
    currentPace: formatPace(runner.currentPace),
    averageOverallPace: formatPace(runner.averageOverallPace()),
    averageMovingPace: formatPace(runner.averageMovingPace()),
    estimatedFinish: when(finishDate),
    estimatedFinishTime: formatDuration(runner.estimatedFinishMs()),
    aidStations: course.aidStations.map((aid) => presentAidStation(aid, when)),
    legs: course.legs.map((leg) => presentLeg(leg, course.legTimes(leg), when)),
  };
}

export function presentCourse(course: Course, mapUrl: string | null): CourseView {
  const { route } = course;
  return {
    name: route.name,
    length: round(route.length, 2),
    gain: Math.round(route.gain),
    loss: Math.round(route.loss),
    mapUrl,
    polyline: encodeRoutePolyline(route),
    profile: elevationSamples(route),
    aidStations: course.aidStations.map((aid) => {
      const point = route.points[route.indexNearestMileMark(aid.mileMark)];
      return {
        name: aid.name,
        mileMark: aid.mileMark,
        lat: point.lat,
        lon: point.lon,
        altitude: Math.round(aid.altitude),
      };
    }),
  };
}

function presentAidStation(
  aid: AidStation,
  when: (date: Date | null) => string | null,
): AidStationView {
  return {
    name: aid.name,
    displayName: aid.displayName,
    mileMark: aid.mileMark,
    altitude: Math.round(aid.altitude),
    comments: aid.comments,
    gmapsUrl: aid.gmapsUrl,
    isPassed: aid.isPassed,
    arrivalTime: when(aid.arrivalTime),
    departureTime: when(aid.departureTime),
    estimatedArrivalTime: when(aid.estimatedArrivalTime),
    estimatedDepartureTime: when(aid.estimatedDepartureTime),
  };
}

/** A leg is entered when its first aid station is left and exited on reaching the next */
function presentLeg(
  leg: Leg,
  times: LegTimes,
  when: (date: Date | null) => string | null,
): LegView {
  return {
    name: leg.name,
    mileMark: leg.mileMark,
    endMileMark: leg.endMileMark,
    distance: round(leg.distance, 1),
    gain: Math.round(leg.gain),
    loss: Math.round(leg.loss),
    isPassed: leg.isPassed,
    estimatedDuration: formatDuration(leg.estimatedDurationMs),
    arrivalTime: when(times.arrivalTime),
    departureTime: when(times.departureTime),
    estimatedArrivalTime: when(times.estimatedArrivalTime),
    estimatedDepartureTime: when(times.estimatedDepartureTime),
  };
}

const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};
