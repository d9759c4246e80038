import { describe, it, expect, vi } from 'vitest';
import { dbscan, NOISE } from '../application/mining/dbscan';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
}));

vi.mock('../config/service-urls', () => ({
  SERVICE_NAME: 'life-stream-service',
  getLogger: vi.fn(() => mockLogger),
}));

describe('dbscan', () => {
  it('should label clusters in order of discovery and mark isolated points as noise', () => {
    const labels = dbscan(
      [
        [0, 0],
        [10, 10],
        [0, 0.5],
        [10, 10.5],
        [0.5, 0],
        [10.5, 10],
        [50, 50],
      ],
      1,
      3
    );
    expect(labels).toEqual([0, 1, 0, 1, 0, 1, NOISE]);
  });

  it('should hand an earlier noise point to the cluster that later reaches it', () => {
    const labels = dbscan(
      [
        [0, 0],
        [1, 0],
        [2, 0],
      ],
      1,
      3
    );
    expect(labels).toEqual([0, 0, 0]);
  });

  it('should return identical labels for repeated runs over the same input', () => {
    const points: Array<[number, number]> = Array.from({ length: 40 }, (_, i) => [(i % 4) * 0.0004, (i % 7) * 0.0003]);
    const first = dbscan(points, 0.001, 3);
    for (let run = 0; run < 5; run++) {
      expect(dbscan(points, 0.001, 3)).toEqual(first);
    }
  });

  it('should treat every point as noise when minSamples cannot be met', () => {
    expect(dbscan([[0, 0]], 1, 2)).toEqual([NOISE]);
  });
});
