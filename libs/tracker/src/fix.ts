import { metersToFeet } from '@milemark/geo';

/**
 * Garmin inReach IPC outbound payload, as posted by the Explore service.
 * Only the fields the tracker reads are typed.
 */
export interface InreachPayload {
  Version?: string;
  Events?: InreachEvent[];
}

export interface InreachEvent {
  imei?: string;
  messageCode?: number;
  freeText?: string;
  timeStamp?: number;
  point?: {
    latitude?: number;
    longitude?: number;
    /** Meters */
    altitude?: number;
    gpsFix?: number;
    /** Degrees */
    course?: number;
    /** km/h */
    speed?: number;
  };
  status?: {
    autonomous?: number;
    lowBattery?: number;
    intervalChange?: number;
    resetDetected?: number;
  };
}

export type GpsFixQuality = 'No Fix' | '2D Fix' | '3D Fix' | '3D Fix+' | 'unknown';

const GPS_FIX_QUALITY: Record<number, GpsFixQuality> = {
  0: 'No Fix',
  1: '2D Fix',
  2: '3D Fix',
  3: '3D Fix+',
};

/** Largest epoch-seconds value that is still a plausible date (9999-12-31) */
const MAX_EPOCH_SECONDS = 253_402_300_799;
/** Largest raw timeStamp that parses to a valid date, read as milliseconds */
export const MAX_RAW_TIMESTAMP = MAX_EPOCH_SECONDS * 1000 + 999;

export interface Fix {
  latitude: number;
  longitude: number;
  /** Feet */
  altitude: number;
  /** Degrees */
  heading: number;
  /** km/h */
  speed: number;
  gpsFix: GpsFixQuality;
  timestamp: Date;
  lowBattery: boolean;
  /** New reporting interval in seconds, 0 when unchanged */
  intervalChange: number;
  imei: string | null;
  messageCode: number | null;
}

/** Epoch timestamps arrive in seconds or milliseconds; milliseconds are truncated to whole seconds */
export function parseTimestamp(raw: number): Date {
  const seconds = raw > MAX_EPOCH_SECONDS ? Math.floor(raw / 1000) : raw;
  return new Date(seconds * 1000);
}

export function parseInreachPayload(payload: InreachPayload): Fix {
  const event = payload.Events?.[0] ?? {};
  const point = event.point ?? {};
  const status = event.status ?? {};

  return {
    latitude: point.latitude ?? 0,
    longitude: point.longitude ?? 0,
    altitude: metersToFeet(point.altitude ?? 0),
    heading: point.course ?? 0,
    speed: point.speed ?? 0,
    gpsFix: point.gpsFix !== undefined ? (GPS_FIX_QUALITY[point.gpsFix] ?? 'unknown') : 'unknown',
    timestamp: parseTimestamp(event.timeStamp ?? 0),
    lowBattery: status.lowBattery === 1,
    intervalChange: status.intervalChange ?? 0,
    imei: event.imei ?? null,
    messageCode: event.messageCode ?? null,
  };
}

export function hasValidTimestamp(fix: Fix): boolean {
  return !Number.isNaN(fix.timestamp.getTime());
}

/** False for reports sent without a satellite fix, which carry a 0,0 position */
export function hasPosition(fix: Fix): boolean {
  return fix.gpsFix !== 'No Fix' && !(fix.latitude === 0 && fix.longitude === 0);
}
