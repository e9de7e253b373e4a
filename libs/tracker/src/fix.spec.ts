import {
  hasPosition,
  hasValidTimestamp,
  InreachPayload,
  MAX_RAW_TIMESTAMP,
  parseInreachPayload,
  parseTimestamp,
} from './fix';

const payload = (): InreachPayload => ({
  Version: '3.0',
  Events: [
    {
      imei: '300000000000001',
      messageCode: 0,
      freeText: '',
      timeStamp: 1721571300000,
      point: {
        latitude: 38.04270386695862,
        longitude: -107.66809701919556,
        altitude: 2887.2566,
        gpsFix: 2,
        course: 225.0,
        speed: 3.003,
      },
      status: { autonomous: 0, lowBattery: 0, intervalChange: 0, resetDetected: 0 },
    },
  ],
});

const noPositionPayload = (): InreachPayload => ({
  Version: '3.0',
  Events: [
    {
      imei: '300000000000001',
      messageCode: 1,
      timeStamp: 1721551474166,
      point: { latitude: 0, longitude: 0, altitude: -422, gpsFix: 0, course: 0, speed: 0 },
      status: { lowBattery: 2, intervalChange: 0 },
    },
  ],
});

describe('parseTimestamp', () => {
  it('reads epoch seconds', () => {
    expect(parseTimestamp(1721571300).toISOString()).toBe('2024-07-21T14:15:00.000Z');
  });

  it('reads epoch milliseconds, truncated to the second', () => {
    expect(parseTimestamp(1721551474166).toISOString()).toBe('2024-07-21T08:44:34.000Z');
  });

  it('reads the largest accepted value as the last second of year 9999', () => {
    expect(parseTimestamp(MAX_RAW_TIMESTAMP).toISOString()).toBe('9999-12-31T23:59:59.000Z');
  });

  it('gives an invalid date past the supported range', () => {
    expect(Number.isNaN(parseTimestamp(9e15).getTime())).toBe(true);
  });
});

describe('hasValidTimestamp', () => {
  it('tells parsed dates from invalid ones', () => {
    const fix = parseInreachPayload(payload());
    expect(hasValidTimestamp(fix)).toBe(true);
    expect(hasValidTimestamp({ ...fix, timestamp: parseTimestamp(9e15) })).toBe(false);
  });
});

describe('parseInreachPayload', () => {
  it('reads position, motion and status', () => {
    expect(parseInreachPayload(payload())).toEqual({
      latitude: 38.04270386695862,
      longitude: -107.66809701919556,
      altitude: 9472.626640382057,
      heading: 225,
      speed: 3.003,
      gpsFix: '3D Fix',
      timestamp: new Date('2024-07-21T14:15:00.000Z'),
      lowBattery: false,
      intervalChange: 0,
      imei: '300000000000001',
      messageCode: 0,
    });
  });

  it('reads the low battery flag and interval change', () => {
    const raw = payload();
    raw.Events = [{ ...raw.Events?.[0], status: { lowBattery: 1, intervalChange: 600 } }];
    const fix = parseInreachPayload(raw);
    expect(fix.lowBattery).toBe(true);
    expect(fix.intervalChange).toBe(600);
  });

  it('defaults every field of an empty payload', () => {
    expect(parseInreachPayload({})).toEqual({
      latitude: 0,
      longitude: 0,
      altitude: 0,
      heading: 0,
      speed: 0,
      gpsFix: 'unknown',
      timestamp: new Date(0),
      lowBattery: false,
      intervalChange: 0,
      imei: null,
      messageCode: null,
    });
  });

  it('labels unrecognised fix codes', () => {
    const raw = payload();
    raw.Events = [{ point: { latitude: 1, longitude: 1, gpsFix: 9 } }];
    expect(parseInreachPayload(raw).gpsFix).toBe('unknown');
  });
});

describe('hasPosition', () => {
  it('accepts a fix with coordinates', () => {
    expect(hasPosition(parseInreachPayload(payload()))).toBe(true);
  });

  it('rejects a report sent without a satellite fix', () => {
    const fix = parseInreachPayload(noPositionPayload());
    expect(fix.gpsFix).toBe('No Fix');
    expect(fix.lowBattery).toBe(false);
    expect(hasPosition(fix)).toBe(false);
  });

  it('rejects a 0,0 position even with a fix', () => {
    const raw = payload();
    raw.Events = [{ point: { latitude: 0, longitude: 0, gpsFix: 2 } }];
    expect(hasPosition(parseInreachPayload(raw))).toBe(false);
  });
});
