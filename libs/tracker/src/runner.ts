import { formatDuration, formatPace, MS_PER_MINUTE } from '@milemark/common';
import { ARRIVAL_TOLERANCE_MILES, Course, FALLBACK_PACE, RunnerProgress } from '@milemark/course';
import { GeoPoint, haversineFeet } from '@milemark/geo';
import { Fix } from './fix';

export const DEFAULT_TRACK_INTERVAL_S = 300;

/**
 * The single tracked runner: progress along the course and the statistics derived
 * from it. Paces are minutes per mile; durations are milliseconds.
 */
export class Runner implements RunnerProgress {
  mileMark = 0;
  /** Feet, taken from the route profile at the estimated position */
  elevation: number;
  pings = 0;
  lowBattery = false;
  trackInterval = DEFAULT_TRACK_INTERVAL_S;
  currentPace = FALLBACK_PACE;
  lastFix: Fix | null = null;
  estimatedPosition: GeoPoint | null = null;

  constructor(
    private readonly course: Course,
    readonly startTime: Date,
  ) {
    this.elevation = course.route.elevations[0];
  }

  get started(): boolean {
    return this.mileMark > ARRIVAL_TOLERANCE_MILES;
  }

  get finished(): boolean {
    return this.started && Math.abs(this.course.route.length - this.mileMark) < ARRIVAL_TOLERANCE_MILES;
  }

  get inProgress(): boolean {
    return this.started && !this.finished;
  }

  get referenceTime(): Date {
    return this.lastFix?.timestamp ?? this.startTime;
  }

  elapsedMs(): number {
    if (!this.started || !this.lastFix) {
      return 0;
    }
    return this.lastFix.timestamp.getTime() - this.startTime.getTime();
  }

  stoppageMs(): number {
    return this.course.totalStoppageMs();
  }

  averageStoppageMs(): number {
    const stops = this.course.passedAidStationCount();
    return stops === 0 ? 0 : this.stoppageMs() / stops;
  }

  movingMs(): number {
    return this.elapsedMs() - this.stoppageMs();
  }

  averageOverallPace(): number {
    if (!this.started) {
      return FALLBACK_PACE;
    }
    return this.elapsedMs() / MS_PER_MINUTE / this.mileMark;
  }

  averageMovingPace(): number {
    if (!this.started) {
      return FALLBACK_PACE;
    }
    return this.movingMs() / MS_PER_MINUTE / this.mileMark;
  }

  /** Feet between the reported position and the route point it was attributed to */
  courseDeviationFt(): number {
    if (!this.lastFix || !this.estimatedPosition) {
      return 0;
    }
    return haversineFeet(
      { lat: this.lastFix.latitude, lon: this.lastFix.longitude },
      this.estimatedPosition,
    );
  }

  estimatedFinishDate(): Date | null {
    if (!this.started) {
      return null;
    }
    const finish = this.course.finish;
    return finish.arrivalTime ?? finish.estimatedArrivalTime;
  }

  estimatedFinishMs(): number {
    const finishDate = this.estimatedFinishDate();
    return finishDate ? finishDate.getTime() - this.startTime.getTime() : 0;
  }

  toString(): string {
    const overall = formatPace(this.averageOverallPace());
    const moving = formatPace(this.averageMovingPace());
    return `runner ${this.mileMark.toFixed(2)} mi @ ${overall}/${moving} (${formatDuration(this.elapsedMs())})`;
  }
}
