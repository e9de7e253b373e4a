import { GeoPoint } from '@milemark/geo';
import { InreachPayload } from './fix';

export interface PersistedAidStationTimes {
  name: string;
  /** ISO-8601, null until observed */
  arrivalTime: string | null;
  departureTime: string | null;
}

/** Everything needed to resume tracking after a restart */
export interface PersistedRaceState {
  raceName: string;
  mileMark: number;
  elevation: number;
  pings: number;
  lowBattery: boolean;
  trackInterval: number;
  /** The payload of the last accepted fix */
  lastPayload: InreachPayload | null;
  aidStations: PersistedAidStationTimes[];
}

export interface RaceStateStore {
  save(state: PersistedRaceState): Promise<void>;
  restore(raceName: string): Promise<PersistedRaceState | null>;
}

export interface MarkerUpdate {
  raceName: string;
  /** Reported position */
  runner: GeoPoint;
  /** Route point the fix was attributed to */
  estimate: GeoPoint;
  /** Degrees, rounded */
  heading: number;
  timestamp: Date;
}

export interface MarkerUpdateDispatcher {
  dispatch(update: MarkerUpdate): Promise<void>;
}
