import { Tile, ROYAL_PAIRS, isRoyal } from '../../../src/shared/engine/Tile';
import { CodecError, EngineErrorCode } from '../../../src/shared/engine/errors';
import { TILE_COLORS, TILE_SYMBOLS } from '../../../src/shared/types/game';

describe('Tile', () => {
  describe('crown', () => {
    it('marks exactly the six royal pairs', () => {
      let royalCount = 0;
      for (let color = 1; color <= 6; color++) {
        for (let symbol = 1; symbol <= 6; symbol++) {
          if (Tile.of(color, symbol).crown) royalCount++;
        }
      }
      expect(royalCount).toBe(6);
      expect(ROYAL_PAIRS).toHaveLength(6);
    });

    it('recognises each royal pair', () => {
      expect(isRoyal(TILE_COLORS.BLUE, TILE_SYMBOLS.PILLOW)).toBe(true);
      expect(isRoyal(TILE_COLORS.YELLOW, TILE_SYMBOLS.POOP)).toBe(true);
      expect(isRoyal(TILE_COLORS.GREEN, TILE_SYMBOLS.PUG)).toBe(true);
      expect(isRoyal(TILE_COLORS.PURPLE, TILE_SYMBOLS.BONE)).toBe(true);
      expect(isRoyal(TILE_COLORS.ORANGE, TILE_SYMBOLS.BOWL)).toBe(true);
      expect(isRoyal(TILE_COLORS.PINK, TILE_SYMBOLS.CAN)).toBe(true);
    });

    it('is false for a non-royal pair', () => {
      expect(Tile.of(1, 2).crown).toBe(false);
    });
  });

  describe('of', () => {
    it('builds an unflipped tile', () => {
      const tile = Tile.of(3, 4);
      expect(tile.color).toBe(3);
      expect(tile.symbol).toBe(4);
      expect(tile.flipped).toBe(false);
    });

    it.each([
      [0, 1],
      [7, 1],
      [1, 0],
      [1, 7],
      [2.5, 1],
    ])('rejects color %p / symbol %p', (color, symbol) => {
      expect(() => Tile.of(color, symbol)).toThrow(CodecError);
      try {
        Tile.of(color, symbol);
      } catch (error) {
        expect(error).toBeInstanceOf(CodecError);
        expect((error as CodecError).code).toBe(EngineErrorCode.CODEC_INVALID_TILE_CODE);
      }
    });
  });

  describe('flip', () => {
    it('restores the original state after two flips', () => {
      const tile = Tile.of(6, 5);
      tile.flip();
      expect(tile.flipped).toBe(true);
      tile.flip();
      expect(tile.flipped).toBe(false);
    });

    it('leaves color, symbol and crown unchanged', () => {
      const tile = Tile.of(6, 5);
      tile.flip();
      expect(tile.color).toBe(6);
      expect(tile.symbol).toBe(5);
      expect(tile.crown).toBe(true);
    });
  });

  describe('copy', () => {
    it('produces an independent instance with the same state', () => {
      const original = Tile.of(2, 3);
      original.flip();
      const copy = original.copy();

      expect(copy).not.toBe(original);
      expect(copy.toJSON()).toEqual(original.toJSON());

      copy.flip();
      expect(original.flipped).toBe(true);
      expect(copy.flipped).toBe(false);
    });
  });

  describe('identity', () => {
    it('ignores the flipped state', () => {
      const a = Tile.of(4, 2);
      const b = Tile.of(4, 2);
      b.flip();
      expect(a.sameIdentity(b)).toBe(true);
      expect(a.sameIdentity(Tile.of(4, 3))).toBe(false);
    });

    it('exposes the grouping attribute', () => {
      const tile = Tile.of(5, 6);
      expect(tile.attributeValue('color')).toBe(5);
      expect(tile.attributeValue('symbol')).toBe(6);
    });
  });

  it('serialises to plain tile info', () => {
    expect(Tile.of(3, 3).toJSON()).toEqual({ color: 3, symbol: 3, crown: true, flipped: false });
    expect(Tile.of(3, 3).toString()).toBe('Tile{3-3, royal}');
  });
});
