/**
 * Density-based clustering over planar (lat, lon) pairs.
 *
 * A point's neighbourhood is every point within `eps` (Euclidean, inclusive),
 * itself included. Core points have at least `minSamples` neighbours. Points
 * are scanned in input order, so identical input always yields identical
 * labels. Border points keep the first cluster that reaches them.
 */

export const NOISE = -1;

export type Coordinate = readonly [number, number];

function distance(a: Coordinate, b: Coordinate): number {
  return Math.hypot(a[0] - b[0], a[1] - b[1]);
}

function regionQuery(points: readonly Coordinate[], index: number, eps: number): number[] {
  const neighbours: number[] = [];
  for (let i = 0; i < points.length; i++) {
    if (distance(points[index], points[i]) <= eps) neighbours.push(i);
  }
  return neighbours;
}

export function dbscan(points: readonly Coordinate[], eps: number, minSamples: number): number[] {
  const labels: Array<number | undefined> = new Array(points.length).fill(undefined);
  let nextLabel = 0;

  for (let i = 0; i < points.length; i++) {
    if (labels[i] !== undefined) continue;

    const neighbours = regionQuery(points, i, eps);
    if (neighbours.length < minSamples) {
      labels[i] = NOISE;
      continue;
    }

    const label = nextLabel++;
    labels[i] = label;

    const queue = [...neighbours];
    for (let cursor = 0; cursor < queue.length; cursor++) {
      const j = queue[cursor];
      if (labels[j] === NOISE) {
        labels[j] = label;
        continue;
      }
      if (labels[j] !== undefined) continue;

      labels[j] = label;
      const expansion = regionQuery(points, j, eps);
      if (expansion.length >= minSamples) {
        queue.push(...expansion);
      }
    }
  }

  return labels.map(label => label ?? NOISE);
}
