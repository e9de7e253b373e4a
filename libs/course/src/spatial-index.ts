import { GeoPoint, haversineFeet } from '@milemark/geo';

interface KdNode {
  index: number;
  axis: 0 | 1;
  left: KdNode | null;
  right: KdNode | null;
}

interface Neighbor {
  index: number;
  distanceSq: number;
}

const coordinate = (point: GeoPoint, axis: 0 | 1): number => (axis === 0 ? point.lat : point.lon);

/**
 * 2-d tree over raw (lat, lon) degrees. Distances are Euclidean in degree space,
 * which is what nearest-point snapping along a single trail needs.
 */
export class KdTree {
  private readonly root: KdNode | null;

  constructor(private readonly points: readonly GeoPoint[]) {
    this.root = this.build(
      points.map((_, index) => index),
      0,
    );
  }

  get size(): number {
    return this.points.length;
  }

  /** Indices of the k nearest points, closest first; equal distances resolve to the lower index */
  nearest(target: GeoPoint, k = 1): number[] {
    const best: Neighbor[] = [];
    this.search(this.root, target, Math.max(1, Math.min(k, this.points.length)), best);
    return best.map((neighbor) => neighbor.index);
  }

  private build(indices: number[], depth: number): KdNode | null {
    if (indices.length === 0) {
      return null;
    }
    const axis: 0 | 1 = depth % 2 === 0 ? 0 : 1;
    const sorted = [...indices].sort(
      (a, b) => coordinate(this.points[a], axis) - coordinate(this.points[b], axis) || a - b,
    );
    const median = Math.floor(sorted.length / 2);
    return {
      index: sorted[median],
      axis,
      left: this.build(sorted.slice(0, median), depth + 1),
      right: this.build(sorted.slice(median + 1), depth + 1),
    };
  }

  private search(node: KdNode | null, target: GeoPoint, k: number, best: Neighbor[]): void {
    if (!node) {
      return;
    }

    const point = this.points[node.index];
    const distanceSq = (point.lat - target.lat) ** 2 + (point.lon - target.lon) ** 2;
    this.offer(best, { index: node.index, distanceSq }, k);

    const diff = coordinate(target, node.axis) - coordinate(point, node.axis);
    const [near, far] = diff < 0 ? [node.left, node.right] : [node.right, node.left];
    this.search(near, target, k, best);

    if (best.length < k || diff ** 2 <= best[best.length - 1].distanceSq) {
      this.search(far, target, k, best);
    }
  }

  private offer(best: Neighbor[], candidate: Neighbor, k: number): void {
    let position = best.length;
    while (
      position > 0 &&
      (best[position - 1].distanceSq > candidate.distanceSq ||
        (best[position - 1].distanceSq === candidate.distanceSq &&
          best[position - 1].index > candidate.index))
    ) {
      position--;
    }
    if (position >= k) {
      return;
    }
    best.splice(position, 0, candidate);
    if (best.length > k) {
      best.pop();
    }
  }
}

/**
 * Splits integers into maximal runs of consecutive values, after sorting.
 * [1, 2, 5, 4, 9] gives [[1, 2], [4, 5], [9]].
 */
export function detectConsecutiveSequences(values: readonly number[]): number[][] {
  const sorted = [...values].sort((a, b) => a - b);
  const runs: number[][] = [];
  for (const value of sorted) {
    const current = runs[runs.length - 1];
    if (current && value === current[current.length - 1] + 1) {
      current.push(value);
    } else {
      runs.push([value]);
    }
  }
  return runs;
}

export interface RadiusQueryResult {
  /** Point indices within the radius, ordered by distance then index */
  readonly indices: readonly number[];
  /** True when the indices form a single unbroken run along the path */
  readonly contiguous: boolean;
}

export class SpatialIndex {
  private readonly tree: KdTree;
  private readonly radiusCache = new Map<string, RadiusQueryResult>();

  constructor(private readonly points: readonly GeoPoint[]) {
    this.tree = new KdTree(points);
  }

  nearest(target: GeoPoint): number {
    return this.tree.nearest(target, 1)[0];
  }

  withinRadius(center: GeoPoint, radiusFt: number): RadiusQueryResult {
    const key = `${center.lat},${center.lon},${radiusFt}`;
    const cached = this.radiusCache.get(key);
    if (cached) {
      return cached;
    }

    const hits: { index: number; distance: number }[] = [];
    this.points.forEach((point, index) => {
      const distance = haversineFeet(center, point);
      if (distance <= radiusFt) {
        hits.push({ index, distance });
      }
    });
    hits.sort((a, b) => a.distance - b.distance || a.index - b.index);

    const indices = hits.map((hit) => hit.index);
    const result: RadiusQueryResult = Object.freeze({
      indices: Object.freeze(indices),
      contiguous: detectConsecutiveSequences(indices).length === 1,
    });
    this.radiusCache.set(key, result);
    return result;
  }
}
