import { Logger } from '@nestjs/common';
import { addMinutes, EngineLogger, MS_PER_MINUTE } from '@milemark/common';
import { googleMapsUrl } from '@milemark/geo';
import { MapMarker } from '@milemark/mapping';
import { AidStationNotFoundError, InvalidRouteError } from './course.errors';
import {
  AidStation,
  CourseElement,
  Leg,
  runnerHasArrived,
  runnerHasDeparted,
  stoppageMs,
} from './course-element';
import { Route } from './route';

export interface AidStationConfig {
  name: string;
  mileMark: number;
  comments?: string;
}

/** What the course needs to know about the runner to advance its elements */
export interface RunnerProgress {
  readonly mileMark: number;
  readonly started: boolean;
  readonly finished: boolean;
  readonly startTime: Date;
  /** Timestamp of the last accepted fix, or the race start before the first one */
  readonly referenceTime: Date;
  averageMovingPace(): number;
  averageStoppageMs(): number;
}

export interface LegTimes {
  arrivalTime: Date | null;
  departureTime: Date | null;
  estimatedArrivalTime: Date | null;
  estimatedDepartureTime: Date | null;
}

/**
 * Start, configured aid stations and Finish, alternating with the legs between them.
 * Elements live in one array and refer to their neighbours by index; the array is
 * never reordered after construction, only updated in place by refresh().
 */
export class Course {
  private readonly logger: EngineLogger;

  private constructor(
    readonly route: Route,
    readonly elements: readonly CourseElement[],
    logger?: EngineLogger,
  ) {
    this.logger = logger ?? new Logger(Course.name);
  }

  static build(
    route: Route,
    aidStations: AidStationConfig[],
    markers: MapMarker[],
    logger?: EngineLogger,
  ): Course {
    const finishMileMark = Math.round(route.length * 10) / 10;
    const markersByTitle = new Map(markers.map((marker) => [marker.title, marker]));

    const configured = aidStations.map((config) => {
      if (!Number.isFinite(config.mileMark) || config.mileMark < 0 || config.mileMark > finishMileMark) {
        throw new InvalidRouteError(
          `Aid station "${config.name}" at mile ${config.mileMark} is outside the course (0-${finishMileMark})`,
        );
      }
      const marker = markersByTitle.get(config.name);
      if (!marker) {
        throw new AidStationNotFoundError(config.name);
      }
      return createAidStation(config.name, config.mileMark, googleMapsUrl(marker), config.comments);
    });

    const stations = [
      createAidStation('Start', 0, googleMapsUrl(route.start)),
      ...configured.sort((a, b) => a.mileMark - b.mileMark),
      createAidStation('Finish', finishMileMark, googleMapsUrl(route.finish)),
    ];
    stations[0].altitude = route.elevations[0];

    const elements: CourseElement[] = [stations[0]];
    let previousGain = 0;
    let previousLoss = 0;
    for (let i = 1; i < stations.length; i++) {
      const from = stations[i - 1];
      const to = stations[i];
      const routeIndex = route.indexNearestMileMark(to.mileMark);
      to.altitude = route.elevations[routeIndex];

      const legIndex = elements.length;
      elements.push({
        kind: 'leg',
        name: `${from.name} ➤ ${to.name}`,
        mileMark: from.mileMark,
        endMileMark: to.mileMark,
        isPassed: false,
        distance: to.mileMark - from.mileMark,
        gain: route.gains[routeIndex] - previousGain,
        loss: route.losses[routeIndex] - previousLoss,
        estimatedDurationMs: 0,
        previousAid: legIndex - 1,
        nextAid: legIndex + 1,
      });
      from.nextLeg = legIndex;
      to.previousLeg = legIndex;
      elements.push(to);

      previousGain = route.gains[routeIndex];
      previousLoss = route.losses[routeIndex];
    }

    return new Course(route, elements, logger);
  }

  get aidStations(): AidStation[] {
    return this.elements.filter((element): element is AidStation => element.kind === 'aid');
  }

  get legs(): Leg[] {
    return this.elements.filter((element): element is Leg => element.kind === 'leg');
  }

  get finish(): AidStation {
    return this.aidAt(this.elements.length - 1);
  }

  legTimes(leg: Leg): LegTimes {
    const from = this.aidAt(leg.previousAid);
    const to = this.aidAt(leg.nextAid);
    return {
      arrivalTime: from.departureTime,
      departureTime: to.arrivalTime,
      estimatedArrivalTime: from.estimatedDepartureTime,
      estimatedDepartureTime: to.estimatedArrivalTime,
    };
  }

  /** Sum of observed stops at aid stations */
  totalStoppageMs(): number {
    return this.aidStations.reduce((total, aid) => total + stoppageMs(aid), 0);
  }

  passedAidStationCount(): number {
    return this.aidStations.filter((aid) => aid.isPassed).length;
  }

  /**
   * Advances every element to the runner's current progress: passed flags, observed
   * arrival and departure times, leg durations, and ETA/ETD for aid stations ahead.
   * Each stop still ahead of a station adds one average stoppage to its ETA.
   */
  refresh(runner: RunnerProgress): void {
    let precedingStops = 0;

    this.elements.forEach((element, index) => {
      this.refreshElement(element, index, runner);
      if (element.kind !== 'aid') {
        return;
      }

      this.detectArrival(element, index, runner);
      this.detectDeparture(element, runner);

      if (!runnerHasArrived(element, runner.mileMark)) {
        const movingMinutes = (element.mileMark - runner.mileMark) * runner.averageMovingPace();
        element.estimatedArrivalTime = new Date(
          addMinutes(runner.referenceTime, movingMinutes).getTime() +
            precedingStops * runner.averageStoppageMs(),
        );
      }
      if (!runnerHasDeparted(element, runner.mileMark) && element.estimatedArrivalTime) {
        element.estimatedDepartureTime = new Date(
          element.estimatedArrivalTime.getTime() + runner.averageStoppageMs(),
        );
      }

      if (index !== 0 && !element.isPassed) {
        precedingStops++;
      }
    });
  }

  private refreshElement(element: CourseElement, index: number, runner: RunnerProgress): void {
    if (runner.finished) {
      element.isPassed = true;
      return;
    }
    if (index === 0 && element.kind === 'aid') {
      element.isPassed = runner.started;
      element.estimatedArrivalTime = runner.startTime;
      element.arrivalTime = runner.startTime;
      element.departureTime = runner.startTime;
      return;
    }

    const departed = runnerHasDeparted(element, runner.mileMark);
    if (departed) {
      element.isPassed = true;
    }
    if (element.kind === 'leg') {
      element.estimatedDurationMs = departed
        ? this.observedTransitMs(element)
        : element.distance * runner.averageMovingPace() * MS_PER_MINUTE;
    }
  }

  private detectArrival(aid: AidStation, index: number, runner: RunnerProgress): void {
    if (aid.arrivalTime) {
      return;
    }

    const arrived = runnerHasArrived(aid, runner.mileMark);
    const departed = runnerHasDeparted(aid, runner.mileMark);
    const finishing = runner.finished && index === this.elements.length - 1;
    if (finishing) {
      aid.arrivalTime = runner.referenceTime;
    } else if (isTransiting(aid, runner) || (arrived && departed)) {
      aid.arrivalTime = aid.estimatedArrivalTime ?? this.departureBackfill(aid, runner);
    } else {
      return;
    }
    this.logger.log(`Runner entered ${aid.displayName} at ${aid.arrivalTime.toISOString()}`);
  }

  private detectDeparture(aid: AidStation, runner: RunnerProgress): void {
    if (aid.departureTime) {
      return;
    }
    if (!isTransiting(aid, runner) && runnerHasDeparted(aid, runner.mileMark)) {
      aid.departureTime = this.departureBackfill(aid, runner);
      this.logger.log(`Runner departed ${aid.displayName} at ${aid.departureTime.toISOString()}`);
    }
  }

  /** When the runner would have left the station, moving at average pace to where they are now */
  private departureBackfill(aid: AidStation, runner: RunnerProgress): Date {
    return addMinutes(
      runner.referenceTime,
      -(runner.mileMark - aid.mileMark) * runner.averageMovingPace(),
    );
  }

  private observedTransitMs(leg: Leg): number {
    const { arrivalTime, departureTime } = this.legTimes(leg);
    if (!arrivalTime || !departureTime) {
      return 0;
    }
    return departureTime.getTime() - arrivalTime.getTime();
  }

  private aidAt(index: number): AidStation {
    const element = this.elements[index];
    if (element?.kind !== 'aid') {
      throw new RangeError(`Course element ${index} is not an aid station`);
    }
    return element;
  }
}

function isTransiting(element: CourseElement, runner: RunnerProgress): boolean {
  if (runner.finished || !runner.started) {
    return false;
  }
  return runnerHasArrived(element, runner.mileMark) && !runnerHasDeparted(element, runner.mileMark);
}

function createAidStation(
  name: string,
  mileMark: number,
  gmapsUrl: string,
  comments = '',
): AidStation {
  return {
    kind: 'aid',
    name,
    displayName: `${name} (mile ${mileMark})`,
    mileMark,
    endMileMark: mileMark,
    isPassed: false,
    altitude: 0,
    comments,
    gmapsUrl,
    arrivalTime: null,
    departureTime: null,
    estimatedArrivalTime: null,
    estimatedDepartureTime: null,
    previousLeg: null,
    nextLeg: null,
  };
}
