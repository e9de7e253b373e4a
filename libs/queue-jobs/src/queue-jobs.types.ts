export const QUEUE_MARKER_UPDATE = 'marker_update';

export interface MarkerUpdateJobData {
  raceName: string;
  /** Raw reported position */
  runner: { lat: number; lon: number };
  /** Route point the engine attributed the fix to */
  estimate: { lat: number; lon: number };
  heading: number;
  fixTimestamp: string;
}
