import {
  TileAttribute,
  TileColor,
  TileInfo,
  TileSymbol,
  TILE_COLORS,
  TILE_SYMBOLS,
  isTileColor,
  isTileSymbol,
} from '../types/game';
import { CodecError, EngineErrorCode } from './errors';

/**
 * The six royal color/symbol pairs. A royal (crowned) tile adds a bonus
 * point to any combination it is part of.
 */
export const ROYAL_PAIRS: ReadonlyArray<readonly [TileColor, TileSymbol]> = [
  [TILE_COLORS.BLUE, TILE_SYMBOLS.PILLOW],
  [TILE_COLORS.YELLOW, TILE_SYMBOLS.POOP],
  [TILE_COLORS.GREEN, TILE_SYMBOLS.PUG],
  [TILE_COLORS.PURPLE, TILE_SYMBOLS.BONE],
  [TILE_COLORS.ORANGE, TILE_SYMBOLS.BOWL],
  [TILE_COLORS.PINK, TILE_SYMBOLS.CAN],
];

export function isRoyal(color: TileColor, symbol: TileSymbol): boolean {
  return ROYAL_PAIRS.some(([royalColor, royalSymbol]) => royalColor === color && royalSymbol === symbol);
}

/**
 * A game tile. Color, symbol and crown are fixed at construction; only the
 * flipped bit changes, and only through {@link Tile.flip}.
 */
export class Tile {
  readonly color: TileColor;
  readonly symbol: TileSymbol;
  readonly crown: boolean;
  private flippedState: boolean;

  constructor(color: TileColor, symbol: TileSymbol, flipped: boolean = false) {
    this.color = color;
    this.symbol = symbol;
    this.crown = isRoyal(color, symbol);
    this.flippedState = flipped;
  }

  /**
   * Build an unflipped tile from raw codes.
   * @throws CodecError when either code lies outside 1..6
   */
  static of(color: number, symbol: number): Tile {
    if (!isTileColor(color) || !isTileSymbol(symbol)) {
      throw new CodecError(
        EngineErrorCode.CODEC_INVALID_TILE_CODE,
        `Invalid tile code: color ${color}, symbol ${symbol}`,
        { color, symbol },
        'Tile'
      );
    }
    return new Tile(color, symbol);
  }

  get flipped(): boolean {
    return this.flippedState;
  }

  flip(): void {
    this.flippedState = !this.flippedState;
  }

  copy(): Tile {
    return new Tile(this.color, this.symbol, this.flippedState);
  }

  attributeValue(attribute: TileAttribute): number {
    return attribute === 'color' ? this.color : this.symbol;
  }

  /** Same color and symbol; crown and flipped state are ignored. */
  sameIdentity(other: Tile): boolean {
    return this.color === other.color && this.symbol === other.symbol;
  }

  toJSON(): TileInfo {
    return {
      color: this.color,
      symbol: this.symbol,
      crown: this.crown,
      flipped: this.flippedState,
    };
  }

  toString(): string {
    return `Tile{${this.color}-${this.symbol}${this.crown ? ', royal' : ''}${this.flippedState ? ', flipped' : ''}}`;
  }
}
