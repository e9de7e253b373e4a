import { Course, Route } from '@milemark/course';
import replay from './__fixtures__/out-and-back-replay.json';
import { Race } from './race';

const silentLogger = () => ({ log: jest.fn(), warn: jest.fn(), debug: jest.fn() });

/**
 * A runner at a steady 10 min/mile out along a parallel and back 40 ft north of it.
 * Every report on the way back is within the search radius of the outbound path.
 */
async function createRace(): Promise<Race> {
  const logger = silentLogger();
  const raw = replay.route.map(([lat, lon]) => ({ lat, lon }));
  const route = await Route.build('Out and Back', raw, null, { logger });
  const turn = raw[3];
  const course = Course.build(
    route,
    [{ name: 'Turnaround', mileMark: 1.6 }],
    [{ id: null, title: 'Turnaround', lat: turn.lat, lon: turn.lon, properties: {} }],
    logger,
  );
  return new Race({ name: 'Out and Back 5K', startTime: new Date(replay.startTime), course, logger });
}

describe('out-and-back replay', () => {
  it('builds the expected route', async () => {
    const race = await createRace();
    expect(race.course.route.points).toHaveLength(replay.pointCount);
    expect(race.course.route.length).toBeCloseTo(replay.routeLength, 6);
  });

  it('follows the runner out and back', async () => {
    const race = await createRace();

    for (const { payload, outcome, mileMark } of replay.fixes) {
      expect(race.ingestFix(payload)).toBe(outcome);
      expect(race.runner.mileMark).toBeCloseTo(mileMark, 6);
    }

    expect(race.runner.finished).toBe(true);
    expect(race.runner.pings).toBe(replay.fixes.length);
  });

  it('passes the turnaround once, on the way out', async () => {
    const race = await createRace();
    for (const { payload } of replay.fixes) {
      race.ingestFix(payload);
    }

    const turnaround = race.course.aidStations[1];
    expect(turnaround.name).toBe('Turnaround');
    expect(turnaround.isPassed).toBe(true);
    expect(turnaround.arrivalTime).not.toBeNull();
    expect(turnaround.departureTime).not.toBeNull();
    expect(race.course.finish.arrivalTime).toEqual(new Date('2026-07-18T12:34:00Z'));
    await race.flush();
  });

  it('passes every course element up to the final mile mark', async () => {
    const race = await createRace();
    for (const { payload } of replay.fixes) {
      race.ingestFix(payload);
    }

    const behind = race.course.elements.filter((element) => element.mileMark <= race.runner.mileMark);
    expect(behind.map((element) => [element.name, element.isPassed])).toEqual([
      ['Start', true],
      ['Start ➤ Turnaround', true],
      ['Turnaround', true],
      ['Turnaround ➤ Finish', true],
      ['Finish', true],
    ]);
  });

  it('passes the outbound leg once the runner is well beyond the turnaround', async () => {
    const race = await createRace();
    for (const { payload } of replay.fixes) {
      race.ingestFix(payload);
      const [start, outbound, turnaround] = race.course.elements;
      if (race.runner.mileMark - turnaround.mileMark > 0.11) {
        expect([start.isPassed, outbound.isPassed, turnaround.isPassed]).toEqual([true, true, true]);
      }
    }
    expect(race.runner.finished).toBe(true);
  });
});
