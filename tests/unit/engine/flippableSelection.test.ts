import {
  findGeometricCenter,
  getFlippablePositions,
  isLinearChain,
} from '../../../src/shared/engine/flippableSelection';
import { countOrthogonalNeighbors, toKeySet } from '../../../src/shared/engine/geometry';
import { pos } from '../../utils/fixtures';

describe('getFlippablePositions', () => {
  it('returns nothing for fewer than three positions', () => {
    expect(getFlippablePositions([pos(0, 0), pos(0, 1)])).toEqual([]);
  });

  describe('odd sizes', () => {
    it('picks the corner of an L', () => {
      expect(getFlippablePositions([pos(0, 0), pos(0, 1), pos(1, 0)])).toEqual([pos(0, 0)]);
    });

    it('picks the middle of a three-tile line', () => {
      expect(getFlippablePositions([pos(0, 0), pos(1, 0), pos(2, 0)])).toEqual([pos(1, 0)]);
    });

    it('picks the middle of a three-tile diagonal', () => {
      expect(getFlippablePositions([pos(0, 0), pos(1, 1), pos(2, 2)])).toEqual([pos(1, 1)]);
    });

    it('breaks a tie in favour of the first position given', () => {
      expect(getFlippablePositions([pos(1, 2), pos(1, 1), pos(0, 0)])).toEqual([pos(1, 2)]);
      expect(getFlippablePositions([pos(1, 1), pos(1, 2), pos(0, 0)])).toEqual([pos(1, 1)]);
    });

    it('picks the hub of a plus', () => {
      const plus = [pos(0, 1), pos(1, 0), pos(1, 1), pos(1, 2), pos(2, 1)];
      expect(getFlippablePositions(plus)).toEqual([pos(1, 1)]);
    });

    it('picks the junction of a five-tile T', () => {
      const t = [pos(0, 0), pos(0, 1), pos(0, 2), pos(1, 1), pos(2, 1)];
      expect(getFlippablePositions(t)).toEqual([pos(0, 1)]);
    });
  });

  describe('five-tile chains', () => {
    it('picks the centre of a straight line', () => {
      const line = [pos(0, 0), pos(0, 1), pos(0, 2), pos(0, 3), pos(0, 4)];
      expect(getFlippablePositions(line)).toEqual([pos(0, 2)]);
    });

    it('picks the centre of a diagonal', () => {
      const diagonal = [pos(0, 0), pos(1, 1), pos(2, 2), pos(3, 3), pos(4, 4)];
      expect(getFlippablePositions(diagonal)).toEqual([pos(2, 2)]);
    });

    it('picks the middle of the base of a U', () => {
      const u = [pos(0, 0), pos(0, 1), pos(0, 2), pos(1, 0), pos(1, 2)];
      expect(getFlippablePositions(u)).toEqual([pos(0, 1)]);
    });

    it('picks the geometric centre of a long L', () => {
      const l = [pos(0, 0), pos(1, 0), pos(2, 0), pos(3, 0), pos(3, 1)];
      expect(getFlippablePositions(l)).toEqual([pos(2, 0)]);
    });
  });

  describe('even sizes', () => {
    it('picks the two inner tiles of a four-tile diagonal', () => {
      const diagonal = [pos(0, 0), pos(1, 1), pos(2, 2), pos(3, 3)];
      expect(getFlippablePositions(diagonal)).toEqual([pos(1, 1), pos(2, 2)]);
    });

    it('picks the two inner tiles of a four-tile line', () => {
      const line = [pos(0, 0), pos(0, 1), pos(0, 2), pos(0, 3)];
      expect(getFlippablePositions(line)).toEqual([pos(0, 1), pos(0, 2)]);
    });

    it('picks only the junction of a four-tile T', () => {
      const t = [pos(0, 0), pos(0, 1), pos(0, 2), pos(1, 1)];
      expect(getFlippablePositions(t)).toEqual([pos(0, 1)]);
    });

    it('picks every tile of a square', () => {
      const square = [pos(0, 0), pos(0, 1), pos(1, 0), pos(1, 1)];
      expect(getFlippablePositions(square)).toEqual(square);
    });

    it('picks the inner pair of a Z', () => {
      const z = [pos(0, 0), pos(0, 1), pos(1, 1), pos(1, 2)];
      expect(getFlippablePositions(z)).toEqual([pos(0, 1), pos(1, 1)]);
    });
  });
});

describe('isLinearChain', () => {
  it('accepts a bent chain with two endpoints', () => {
    const chain = [pos(0, 0), pos(1, 0), pos(1, 1), pos(2, 1), pos(2, 2)];
    expect(isLinearChain(chain, toKeySet(chain), countOrthogonalNeighbors)).toBe(true);
  });

  it('rejects a branch', () => {
    const t = [pos(0, 0), pos(0, 1), pos(0, 2), pos(1, 1), pos(2, 1)];
    expect(isLinearChain(t, toKeySet(t), countOrthogonalNeighbors)).toBe(false);
  });
});

describe('findGeometricCenter', () => {
  it('keeps the first of equally central positions', () => {
    expect(findGeometricCenter([pos(0, 0), pos(0, 1)])).toEqual(pos(0, 0));
  });
});
