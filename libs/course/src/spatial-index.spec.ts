import { GeoPoint } from '@milemark/geo';
import { detectConsecutiveSequences, KdTree, SpatialIndex } from './spatial-index';

/** Out along a parallel and back about 11 ft north of it */
const outAndBack = (): GeoPoint[] => [
  ...Array.from({ length: 20 }, (_, i) => ({ lat: 39.0, lon: -77 + 0.0001 * i })),
  ...Array.from({ length: 20 }, (_, j) => ({ lat: 39.00003, lon: -77 + 0.0001 * (19 - j) })),
];

/**
 * East along a parallel, a loop north and back west, then south through the first
 * pass. Point 20 and point 100 are the same crossing. Steps are 0.0001 degrees.
 */
const selfCrossing = (): GeoPoint[] => {
  const grid: [number, number][] = [
    ...Array.from({ length: 41 }, (_, i): [number, number] => [0, i - 20]),
    ...Array.from({ length: 20 }, (_, i): [number, number] => [i + 1, 20]),
    ...Array.from({ length: 20 }, (_, i): [number, number] => [20, 19 - i]),
    ...Array.from({ length: 40 }, (_, i): [number, number] => [19 - i, 0]),
  ];
  return grid.map(([y, x]) => ({ lat: 39 + 0.0001 * y, lon: -77 + 0.0001 * x }));
};

const straightLine = (): GeoPoint[] =>
  Array.from({ length: 30 }, (_, i) => ({ lat: 39.0, lon: -77 + 0.0001 * i }));

/** Deterministic points scattered over a small area */
function scatter(count: number, seed: number): GeoPoint[] {
  let state = seed;
  const next = () => {
    state = (state * 16807) % 2147483647;
    return state / 2147483647;
  };
  return Array.from({ length: count }, () => ({ lat: 38 + next() * 0.05, lon: -107 + next() * 0.05 }));
}

function bruteForceNearest(points: GeoPoint[], target: GeoPoint): number {
  let best = 0;
  let bestDistance = Infinity;
  points.forEach((point, index) => {
    const distance = (point.lat - target.lat) ** 2 + (point.lon - target.lon) ** 2;
    if (distance < bestDistance) {
      bestDistance = distance;
      best = index;
    }
  });
  return best;
}

describe('KdTree', () => {
  it('agrees with a linear scan', () => {
    const points = scatter(500, 42);
    const tree = new KdTree(points);
    for (const target of scatter(200, 7)) {
      expect(tree.nearest(target)).toEqual([bruteForceNearest(points, target)]);
    }
  });

  it('returns k neighbours closest first', () => {
    const tree = new KdTree(straightLine());
    expect(tree.nearest({ lat: 39.0, lon: -77 + 0.0001 * 10.2 }, 3)).toEqual([10, 11, 9]);
  });

  it('resolves duplicate points to the lower index', () => {
    const point = { lat: 39.1, lon: -77.1 };
    const tree = new KdTree([{ lat: 39.2, lon: -77.2 }, point, { ...point }, { lat: 39.0, lon: -77.0 }]);
    expect(tree.nearest(point)).toEqual([1]);
    expect(tree.nearest(point, 2)).toEqual([1, 2]);
  });

  it('caps k at the number of points', () => {
    const tree = new KdTree(straightLine().slice(0, 3));
    expect(tree.size).toBe(3);
    expect(tree.nearest({ lat: 39, lon: -77 }, 10)).toEqual([0, 1, 2]);
  });
});

describe('detectConsecutiveSequences', () => {
  it('groups a shuffled run into one sequence', () => {
    expect(detectConsecutiveSequences([1, 3, 2, 5, 4, 6])).toEqual([[1, 2, 3, 4, 5, 6]]);
  });

  it('splits at gaps', () => {
    expect(detectConsecutiveSequences([1, 2, 5, 4, 9])).toEqual([[1, 2], [4, 5], [9]]);
  });

  it('returns no sequences for no values', () => {
    expect(detectConsecutiveSequences([])).toEqual([]);
  });

  it('does not reorder its input', () => {
    const values = [3, 1, 2];
    detectConsecutiveSequences(values);
    expect(values).toEqual([3, 1, 2]);
  });
});

describe('SpatialIndex', () => {
  it('snaps to the nearest route point', () => {
    const index = new SpatialIndex(straightLine());
    expect(index.nearest({ lat: 39.00001, lon: -77 + 0.0001 * 17.4 })).toBe(17);
  });

  it('reports a single pass as contiguous', () => {
    const points = straightLine();
    const result = new SpatialIndex(points).withinRadius(points[10], 100);
    expect([...result.indices].sort((a, b) => a - b)).toEqual([7, 8, 9, 10, 11, 12, 13]);
    expect(result.indices[0]).toBe(10);
    expect(result.contiguous).toBe(true);
  });

  it('reports overlapping passes as not contiguous', () => {
    const points = outAndBack();
    const result = new SpatialIndex(points).withinRadius(points[5], 100);
    expect(result.indices.slice(0, 2)).toEqual([5, 34]);
    expect(detectConsecutiveSequences(result.indices)).toEqual([
      [2, 3, 4, 5, 6, 7, 8],
      [31, 32, 33, 34, 35, 36, 37],
    ]);
    expect(result.contiguous).toBe(false);
  });

  it('finds both passes around the middle of the out-and-back', () => {
    const points = outAndBack();
    const result = new SpatialIndex(points).withinRadius(points[10], 100);
    expect([...result.indices].sort((a, b) => a - b)).toEqual([
      7, 8, 9, 10, 11, 12, 13, 26, 27, 28, 29, 30, 31, 32,
    ]);
    expect(result.contiguous).toBe(false);
  });

  it('finds both passes at the crossing of a self-crossing route', () => {
    const points = selfCrossing();
    const index = new SpatialIndex(points);

    const { indices, contiguous } = index.withinRadius(points[20], 100);

    expect(contiguous).toBe(false);
    expect(indices.slice(0, 2)).toEqual([20, 100]);
    expect(detectConsecutiveSequences(indices)).toEqual([
      [17, 18, 19, 20, 21, 22, 23],
      [98, 99, 100, 101, 102],
    ]);
  });

  it('reports a single pass away from the crossing', () => {
    const points = selfCrossing();
    const index = new SpatialIndex(points);

    const westArm = index.withinRadius(points[5], 100);
    expect(westArm.contiguous).toBe(true);
    expect([...westArm.indices].sort((a, b) => a - b)).toEqual([2, 3, 4, 5, 6, 7, 8]);

    const topOfLoop = index.withinRadius(points[70], 100);
    expect(topOfLoop.contiguous).toBe(true);
    expect([...topOfLoop.indices].sort((a, b) => a - b)).toEqual([67, 68, 69, 70, 71, 72, 73]);
  });

  it('snaps the crossing to the earlier pass', () => {
    const points = selfCrossing();
    expect(new SpatialIndex(points).nearest({ lat: 39, lon: -77 })).toBe(20);
  });

  it('returns the memoized result for a repeated query', () => {
    const points = outAndBack();
    const index = new SpatialIndex(points);
    const first = index.withinRadius(points[5], 100);
    expect(index.withinRadius({ ...points[5] }, 100)).toBe(first);
    expect(index.withinRadius(points[5], 50)).not.toBe(first);
    expect(Object.isFrozen(first.indices)).toBe(true);
  });
});
