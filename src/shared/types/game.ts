/**
 * Core value types shared by the board, the combination finder and scoring.
 *
 * Positions live on an unbounded integer grid (rows and columns may be
 * negative). Maps and sets key them by their string form, see
 * {@link positionToKey}.
 */

export interface Position {
  readonly row: number;
  readonly col: number;
}

/** Color codes as they appear in the persisted cell format. */
export const TILE_COLORS = {
  BLUE: 1,
  GREEN: 2,
  ORANGE: 3,
  PINK: 4,
  PURPLE: 5,
  YELLOW: 6,
} as const;

/** Symbol codes as they appear in the persisted cell format. */
export const TILE_SYMBOLS = {
  PILLOW: 1,
  BONE: 2,
  BOWL: 3,
  CAN: 4,
  POOP: 5,
  PUG: 6,
} as const;

export type TileColor = (typeof TILE_COLORS)[keyof typeof TILE_COLORS];
export type TileSymbol = (typeof TILE_SYMBOLS)[keyof typeof TILE_SYMBOLS];

/** Attribute a combination search groups tiles by. */
export type TileAttribute = 'color' | 'symbol';

export const TILE_ATTRIBUTES: readonly TileAttribute[] = ['color', 'symbol'];

/**
 * Plain, serialisable view of a tile (used by snapshots and logging).
 */
export interface TileInfo {
  color: TileColor;
  symbol: TileSymbol;
  crown: boolean;
  flipped: boolean;
}

/**
 * A scorable cluster: 3-5 positions plus the subset of them whose tiles may
 * be flipped when the cluster is settled.
 */
export interface Combination {
  readonly positions: readonly Position[];
  readonly flippablePositions: readonly Position[];
}

export interface BoundingBox {
  minRow: number;
  maxRow: number;
  minCol: number;
  maxCol: number;
}

// Board footprint and persisted format constants
export const GRID_ROWS = 5;
export const GRID_COLS = 5;
export const EMPTY_CELL_CODE = 990;
export const NO_NEXT_TILE_CODE = 99;

/** Tiles a player may place after the start tile before the board is full. */
export const MAX_TILES_PLACED = 24;

export const MIN_COMBINATION_SIZE = 3;
export const MAX_COMBINATION_SIZE = 5;

/** Base points by combination size. */
export const COMBINATION_BASE_POINTS: Readonly<Record<number, number>> = {
  3: 2,
  4: 4,
  5: 7,
};

export const CROWN_BONUS = 1;

export const isTileColor = (value: number): value is TileColor =>
  Number.isInteger(value) && value >= TILE_COLORS.BLUE && value <= TILE_COLORS.YELLOW;

export const isTileSymbol = (value: number): value is TileSymbol =>
  Number.isInteger(value) && value >= TILE_SYMBOLS.PILLOW && value <= TILE_SYMBOLS.PUG;

export const pos = (row: number, col: number): Position => ({ row, col });

export const positionToKey = (position: Position): string => `${position.row},${position.col}`;

export const keyToPosition = (key: string): Position => {
  const [row, col] = key.split(',');
  return { row: Number(row), col: Number(col) };
};

export const positionsEqual = (a: Position, b: Position): boolean =>
  a.row === b.row && a.col === b.col;

/** Row-major ordering: by row, then by column. */
export const comparePositions = (a: Position, b: Position): number =>
  a.row - b.row || a.col - b.col;

export const formatPosition = (position: Position): string => `(${position.row}, ${position.col})`;
