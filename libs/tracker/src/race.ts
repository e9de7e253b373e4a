import { Logger } from '@nestjs/common';
import { EngineLogger, kphToMinPerMile, minutesBetween } from '@milemark/common';
import { Course, estimateMileMark, MileMarkEstimate } from '@milemark/course';
import {
  Fix,
  hasPosition,
  hasValidTimestamp,
  InreachPayload,
  parseInreachPayload,
} from './fix';
import {
  MarkerUpdateDispatcher,
  PersistedRaceState,
  RaceStateStore,
} from './race-state';
import { Runner } from './runner';

/** Fastest believable pace, min/mile */
export const DEFAULT_MIN_PLAUSIBLE_PACE = 4;
/** Backward jumps larger than this many miles are logged */
export const BACKWARD_WARNING_MILES = 0.1;
/** Forward jumps up to this many miles are GPS jitter and skip the pace check */
export const PACE_CHECK_MIN_MILES = 0.1;

export type CheckInOutcome =
  | 'accepted'
  | 'stale'
  | 'before-start'
  | 'finished'
  | 'no-position'
  | 'invalid-time'
  | 'implausible-pace';

export interface RaceOptions {
  name: string;
  startTime: Date;
  course: Course;
  minPlausiblePace?: number;
  store?: RaceStateStore | null;
  markers?: MarkerUpdateDispatcher | null;
  logger?: EngineLogger;
}

/**
 * Check-in protocol for one runner on one course. State changes happen synchronously
 * inside checkIn(); persistence and marker updates are chained behind them in
 * acceptance order and never hold up the next fix.
 */
export class Race {
  readonly name: string;
  readonly startTime: Date;
  readonly course: Course;
  readonly runner: Runner;
  private readonly minPlausiblePace: number;
  private readonly store: RaceStateStore | null;
  private readonly markers: MarkerUpdateDispatcher | null;
  private readonly logger: EngineLogger;
  private lastPayload: InreachPayload | null = null;
  private sideEffects: Promise<void> = Promise.resolve();

  constructor(options: RaceOptions) {
    this.name = options.name;
    this.startTime = options.startTime;
    this.course = options.course;
    this.minPlausiblePace = options.minPlausiblePace ?? DEFAULT_MIN_PLAUSIBLE_PACE;
    this.store = options.store ?? null;
    this.markers = options.markers ?? null;
    this.logger = options.logger ?? new Logger(Race.name);
    this.runner = new Runner(this.course, this.startTime);
    this.course.refresh(this.runner);
  }

  ingestFix(payload: InreachPayload): CheckInOutcome {
    const fix = parseInreachPayload(payload);
    if (hasValidTimestamp(fix) && !hasPosition(fix)) {
      this.runner.pings += 1;
      this.logger.log(`Fix at ${fix.timestamp.toISOString()} has no GPS position, skipping`);
      this.persist();
      return 'no-position';
    }
    return this.checkIn(fix, payload);
  }

  checkIn(fix: Fix, payload: InreachPayload | null = null): CheckInOutcome {
    const runner = this.runner;
    runner.pings += 1;

    const rejection = this.screen(fix);
    if (rejection) {
      this.persist();
      return rejection;
    }

    /** Pace comes from the state before this fix; elapsed time from the fix itself */
    const pace = runner.averageOverallPace();
    const elapsedMinutes = runner.started ? minutesBetween(this.startTime, fix.timestamp) : 0;
    const estimate = estimateMileMark(
      this.course.route,
      { lat: fix.latitude, lon: fix.longitude },
      elapsedMinutes,
      pace,
      this.logger,
    );

    if (!this.isPlausible(estimate.mileMark, fix.timestamp)) {
      this.logger.warn(
        `Fix at ${fix.timestamp.toISOString()} puts runner at mile ${estimate.mileMark.toFixed(2)}, ` +
          `too fast from mile ${runner.mileMark.toFixed(2)}; keeping previous mile mark`,
      );
      this.persist();
      return 'implausible-pace';
    }
    if (estimate.mileMark - runner.mileMark < -BACKWARD_WARNING_MILES) {
      this.logger.warn(
        `Runner moved backward from mile ${runner.mileMark.toFixed(2)} to ${estimate.mileMark.toFixed(2)}`,
      );
    }

    this.record(fix, estimate);
    this.lastPayload = payload;
    this.logger.log(runner.toString());

    if (runner.started) {
      this.course.refresh(runner);
    } else {
      this.logger.log(`Race not in progress; started: ${runner.started} finished: ${runner.finished}`);
    }
    this.persist();
    if (runner.started) {
      this.dispatchMarkerUpdate(fix, estimate);
    }
    return 'accepted';
  }

  snapshot(): PersistedRaceState {
    return {
      raceName: this.name,
      mileMark: this.runner.mileMark,
      elevation: this.runner.elevation,
      pings: this.runner.pings,
      lowBattery: this.runner.lowBattery,
      trackInterval: this.runner.trackInterval,
      lastPayload: this.lastPayload,
      aidStations: this.course.aidStations.map((aid) => ({
        name: aid.name,
        arrivalTime: aid.arrivalTime?.toISOString() ?? null,
        departureTime: aid.departureTime?.toISOString() ?? null,
      })),
    };
  }

  /**
   * Reinstates persisted progress, then re-derives every course element from it.
   * The last fix is not estimated again.
   */
  restore(state: PersistedRaceState): void {
    const runner = this.runner;
    runner.mileMark = state.mileMark;
    runner.elevation = state.elevation;
    runner.pings = state.pings;
    runner.lowBattery = state.lowBattery;
    runner.trackInterval = state.trackInterval;
    runner.lastFix = state.lastPayload ? parseInreachPayload(state.lastPayload) : null;
    runner.estimatedPosition =
      this.course.route.points[this.course.route.indexNearestMileMark(state.mileMark)];
    this.lastPayload = state.lastPayload;

    for (const saved of state.aidStations) {
      const aid = this.course.aidStations.find((station) => station.name === saved.name);
      if (!aid) {
        this.logger.warn(`Saved aid station "${saved.name}" is not on the course, ignoring`);
        continue;
      }
      aid.arrivalTime = saved.arrivalTime ? new Date(saved.arrivalTime) : null;
      aid.departureTime = saved.departureTime ? new Date(saved.departureTime) : null;
      aid.estimatedArrivalTime = aid.arrivalTime ?? aid.estimatedArrivalTime;
      aid.estimatedDepartureTime = aid.departureTime ?? aid.estimatedDepartureTime;
    }

    this.course.refresh(runner);
    this.logger.log(`Restored ${this.name}: ${runner.toString()}, ${runner.pings} pings`);
  }

  async restoreFromStore(): Promise<boolean> {
    const state = this.store ? await this.store.restore(this.name) : null;
    if (!state) {
      return false;
    }
    this.restore(state);
    return true;
  }

  /** Resolves once every side effect queued so far has settled */
  flush(): Promise<void> {
    return this.sideEffects;
  }

  private screen(fix: Fix): CheckInOutcome | null {
    if (!hasValidTimestamp(fix)) {
      this.logger.warn('Fix has a timestamp outside the supported date range; skipping');
      return 'invalid-time';
    }
    const last = this.runner.lastFix;
    if (last && fix.timestamp < last.timestamp) {
      this.logger.log(
        `Fix at ${fix.timestamp.toISOString()} is older than last fix at ${last.timestamp.toISOString()}`,
      );
      return 'stale';
    }
    if (fix.timestamp < this.startTime) {
      this.logger.log(
        `Fix at ${fix.timestamp.toISOString()} is before race start at ${this.startTime.toISOString()}`,
      );
      return 'before-start';
    }
    if (this.runner.finished) {
      this.logger.log('Runner already finished; ignoring fix');
      return 'finished';
    }
    return null;
  }

  private isPlausible(mileMark: number, timestamp: Date): boolean {
    const delta = mileMark - this.runner.mileMark;
    if (delta <= PACE_CHECK_MIN_MILES) {
      return true;
    }
    const minutes = minutesBetween(this.runner.referenceTime, timestamp);
    return minutes > 0 && minutes / delta >= this.minPlausiblePace;
  }

  private record(fix: Fix, estimate: MileMarkEstimate): void {
    const runner = this.runner;
    runner.lastFix = fix;
    runner.mileMark = estimate.mileMark;
    runner.elevation = estimate.elevation;
    runner.estimatedPosition = estimate.point;
    runner.currentPace = kphToMinPerMile(fix.speed);
    runner.lowBattery = fix.lowBattery;
    if (fix.intervalChange) {
      runner.trackInterval = fix.intervalChange;
    }
  }

  private persist(): void {
    const store = this.store;
    if (!store) {
      return;
    }
    const state = this.snapshot();
    this.enqueue('State save', () => store.save(state));
  }

  private dispatchMarkerUpdate(fix: Fix, estimate: MileMarkEstimate): void {
    const markers = this.markers;
    if (!markers) {
      return;
    }
    const update = {
      raceName: this.name,
      runner: { lat: fix.latitude, lon: fix.longitude },
      estimate: estimate.point,
      heading: Math.round(fix.heading),
      timestamp: fix.timestamp,
    };
    this.enqueue('Marker update', () => markers.dispatch(update));
  }

  private enqueue(label: string, effect: () => Promise<void>): void {
    this.sideEffects = this.sideEffects.then(effect).catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`${label} failed: ${message}`);
    });
  }
}
