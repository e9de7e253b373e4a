/** Distance in miles within which the runner counts as at a course element */
export const ARRIVAL_TOLERANCE_MILES = 0.11;

interface CourseElementBase {
  name: string;
  mileMark: number;
  endMileMark: number;
  isPassed: boolean;
}

export interface AidStation extends CourseElementBase {
  kind: 'aid';
  displayName: string;
  /** Feet */
  altitude: number;
  comments: string;
  gmapsUrl: string;
  arrivalTime: Date | null;
  departureTime: Date | null;
  estimatedArrivalTime: Date | null;
  estimatedDepartureTime: Date | null;
  previousLeg: number | null;
  nextLeg: number | null;
}

/**
 * A leg's arrival and departure are those of its neighbouring aid stations, so they
 * are read through the owning Course rather than stored here.
 */
export interface Leg extends CourseElementBase {
  kind: 'leg';
  /** Miles */
  distance: number;
  /** Feet */
  gain: number;
  /** Feet */
  loss: number;
  estimatedDurationMs: number;
  previousAid: number;
  nextAid: number;
}

export type CourseElement = AidStation | Leg;

/** Orders by mile mark; an aid station sorts before a leg starting at the same mile mark */
export function compareCourseElements(a: CourseElement, b: CourseElement): number {
  if (a.mileMark !== b.mileMark) {
    return a.mileMark - b.mileMark;
  }
  return kindRank(a) - kindRank(b);
}

const kindRank = (element: CourseElement): number => (element.kind === 'aid' ? 0 : 1);

export function runnerHasArrived(element: CourseElement, runnerMileMark: number): boolean {
  switch (element.kind) {
    case 'aid':
      return runnerMileMark - element.mileMark >= -ARRIVAL_TOLERANCE_MILES;
    case 'leg':
      return runnerMileMark - element.mileMark > ARRIVAL_TOLERANCE_MILES;
  }
}

export function runnerHasDeparted(element: CourseElement, runnerMileMark: number): boolean {
  switch (element.kind) {
    case 'aid':
      return runnerMileMark - element.endMileMark > ARRIVAL_TOLERANCE_MILES;
    case 'leg':
      return element.endMileMark - runnerMileMark <= ARRIVAL_TOLERANCE_MILES;
  }
}

/** Observed time spent at an aid station, 0 until both ends are known */
export function stoppageMs(aid: AidStation): number {
  if (!aid.arrivalTime || !aid.departureTime) {
    return 0;
  }
  return aid.departureTime.getTime() - aid.arrivalTime.getTime();
}
