import { Logger } from '@nestjs/common';
import { parseRaceConfig } from '@milemark/config';
import { Course, Route } from '@milemark/course';
import { MapMarker, MarkerUpdater } from '@milemark/mapping';
import { MarkerUpdateJobData } from '@milemark/queue-jobs';
import { LoadedCourse } from '../course/course.loader';
import { ESTIMATE_MARKER_STYLE, MarkerUpdateProcessor } from './marker-update.processor';

const config = parseRaceConfig({
  raceName: 'Test 100',
  startTime: '2026-07-18T06:00:00-06:00',
  timezone: 'America/Denver',
  routeName: 'Test Course',
  runnerName: 'Ada',
  aidStations: [],
});

const runnerMarker: MapMarker = {
  id: 'mk-runner',
  title: 'Ada',
  lat: 39,
  lon: -77,
  properties: { 'marker-color': '00FF00', 'marker-rotation': 0 },
};

function loadedCourse(markers: MapMarker[]): LoadedCourse {
  const route = new Route(
    'Test Course',
    [
      { lat: 39, lon: -77 },
      { lat: 39.01, lon: -77 },
    ],
    [0, 0.69],
  );
  return { course: Course.build(route, [], []), markers, mapUrl: null };
}

const job: MarkerUpdateJobData = {
  raceName: 'Test 100',
  runner: { lat: 39.005, lon: -77.0001 },
  estimate: { lat: 39.005, lon: -77 },
  heading: 45,
  fixTimestamp: '2026-07-18T13:00:00.000Z',
};

class FakeUpdater implements MarkerUpdater {
  readonly saved: MapMarker[] = [];

  async saveMarker(marker: MapMarker): Promise<MapMarker> {
    this.saved.push(marker);
    return { ...marker, id: marker.id ?? `new-${this.saved.length}` };
  }
}

describe('MarkerUpdateProcessor', () => {
  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'debug').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('moves the existing runner marker and creates the estimate marker', async () => {
    const updater = new FakeUpdater();
    const processor = new MarkerUpdateProcessor(updater, loadedCourse([runnerMarker]), config);

    await processor.applyUpdate(job);

    expect(updater.saved).toEqual([
      {
        id: 'mk-runner',
        title: 'Ada',
        lat: 39.005,
        lon: -77.0001,
        properties: { 'marker-color': '00FF00', 'marker-rotation': 45 },
      },
      {
        id: null,
        title: 'Ada (estimated)',
        lat: 39.005,
        lon: -77,
        properties: { ...ESTIMATE_MARKER_STYLE, 'marker-rotation': 45 },
      },
    ]);
  });

  it('reuses a created marker on the next update', async () => {
    const updater = new FakeUpdater();
    const processor = new MarkerUpdateProcessor(updater, loadedCourse([runnerMarker]), config);

    await processor.applyUpdate(job);
    await processor.applyUpdate({ ...job, heading: 90 });

    expect(updater.saved[3]).toEqual({
      id: 'new-2',
      title: 'Ada (estimated)',
      lat: 39.005,
      lon: -77,
      properties: { ...ESTIMATE_MARKER_STYLE, 'marker-rotation': 90 },
    });
  });

  it('drops the job when marker updates are disabled', async () => {
    const warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    const processor = new MarkerUpdateProcessor(null, loadedCourse([]), config);

    await expect(processor.applyUpdate(job)).resolves.toBeUndefined();
    expect(warnSpy).toHaveBeenCalledWith('Marker updates are disabled; dropping job');
  });
});
