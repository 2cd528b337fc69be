import {
  computeBoundingBox,
  countDiagonalNeighbors,
  countOrthogonalNeighbors,
  extendBoundingBox,
  isConnected,
  isPureDiagonal,
  manhattanDistance,
  toKeySet,
} from '../../../src/shared/engine/geometry';
import { pos } from '../../utils/fixtures';

describe('geometry', () => {
  describe('neighbour counts', () => {
    const members = toKeySet([pos(0, 0), pos(0, 1), pos(1, 0), pos(1, 1), pos(2, 2)]);

    it('counts orthogonal neighbours inside the set', () => {
      expect(countOrthogonalNeighbors(pos(0, 0), members)).toBe(2);
      expect(countOrthogonalNeighbors(pos(2, 2), members)).toBe(0);
    });

    it('counts diagonal neighbours inside the set', () => {
      expect(countDiagonalNeighbors(pos(1, 1), members)).toBe(2);
      expect(countDiagonalNeighbors(pos(2, 2), members)).toBe(1);
    });
  });

  describe('isPureDiagonal', () => {
    it('is true when no member touches another orthogonally', () => {
      const cluster = [pos(0, 0), pos(1, 1), pos(2, 0)];
      expect(isPureDiagonal(cluster, toKeySet(cluster))).toBe(true);
    });

    it('is false once any pair touches orthogonally', () => {
      const cluster = [pos(0, 0), pos(1, 1), pos(1, 2)];
      expect(isPureDiagonal(cluster, toKeySet(cluster))).toBe(false);
    });
  });

  describe('bounding box', () => {
    it('covers every position', () => {
      expect(computeBoundingBox([pos(2, -1), pos(-3, 4), pos(0, 0)])).toEqual({
        minRow: -3,
        maxRow: 2,
        minCol: -1,
        maxCol: 4,
      });
    });

    it('is undefined without positions', () => {
      expect(computeBoundingBox([])).toBeUndefined();
    });

    it('grows to include a new position without mutating the original', () => {
      const box = { minRow: 0, maxRow: 1, minCol: 0, maxCol: 1 };
      expect(extendBoundingBox(box, pos(-1, 3))).toEqual({
        minRow: -1,
        maxRow: 1,
        minCol: 0,
        maxCol: 3,
      });
      expect(box).toEqual({ minRow: 0, maxRow: 1, minCol: 0, maxCol: 1 });
    });
  });

  describe('isConnected', () => {
    it('accepts diagonal links', () => {
      expect(isConnected([pos(0, 0), pos(1, 1), pos(2, 2)])).toBe(true);
    });

    it('rejects a gap', () => {
      expect(isConnected([pos(0, 0), pos(0, 1), pos(0, 3)])).toBe(false);
    });

    it('treats empty and single sets as connected', () => {
      expect(isConnected([])).toBe(true);
      expect(isConnected([pos(5, 5)])).toBe(true);
    });
  });

  it('measures Manhattan distance', () => {
    expect(manhattanDistance(pos(0, 0), pos(2, -3))).toBe(5);
  });
});
