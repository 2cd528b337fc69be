/**
 * Persisted cell format for boards.
 *
 * A board is stored as a dense 5x5 grid of integers relative to the top-left
 * corner of its occupied bounding box:
 * - empty cell:    990
 * - occupied cell: color * 100 + symbol * 10 + flippedBit
 *
 * The upcoming tile of a match is stored separately as color * 10 + symbol,
 * with 99 meaning "no tile left".
 */

import { z } from 'zod';
import { EMPTY_CELL_CODE, GRID_COLS, GRID_ROWS, NO_NEXT_TILE_CODE } from '../types/game';
import { CodecError, EngineErrorCode } from './errors';
import { Tile } from './Tile';

const CellCodeSchema = z.number().int();

export const SaveGridSchema = z
  .array(z.array(CellCodeSchema).length(GRID_COLS))
  .length(GRID_ROWS);

export type SaveGrid = number[][];

/**
 * Validate an untyped value as a 5x5 integer grid.
 * @throws CodecError listing every offending cell path
 */
export function parseSaveGrid(data: unknown): SaveGrid {
  const result = SaveGridSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new CodecError(
      EngineErrorCode.CODEC_INVALID_SAVE_GRID,
      `Save grid must be a ${GRID_ROWS}x${GRID_COLS} array of integers`,
      { issues }
    );
  }
  return result.data;
}

export function createEmptyGrid(): SaveGrid {
  return Array.from({ length: GRID_ROWS }, () => Array<number>(GRID_COLS).fill(EMPTY_CELL_CODE));
}

export function encodeTile(tile: Tile): number {
  return tile.color * 100 + tile.symbol * 10 + (tile.flipped ? 1 : 0);
}

/**
 * Decode a single occupied cell.
 * @throws CodecError when the derived color or symbol is outside 1..6, or
 * the flipped digit is neither 0 nor 1
 */
export function decodeTileCode(code: number): Tile {
  const color = Math.floor(code / 100);
  const symbol = Math.floor((code % 100) / 10);
  const flippedDigit = code % 10;

  if (flippedDigit > 1) {
    throw new CodecError(
      EngineErrorCode.CODEC_INVALID_TILE_CODE,
      `Invalid cell code ${code}`,
      { code, color, symbol, flipped: flippedDigit }
    );
  }

  let tile: Tile;
  try {
    tile = Tile.of(color, symbol);
  } catch (error) {
    throw new CodecError(
      EngineErrorCode.CODEC_INVALID_TILE_CODE,
      `Invalid cell code ${code}`,
      { code, color, symbol, cause: error instanceof Error ? error.message : String(error) }
    );
  }

  if (flippedDigit === 1) {
    tile.flip();
  }
  return tile;
}

/** Upcoming-tile code: color * 10 + symbol, or 99 when there is none. */
export function encodeNextTileCode(tile: Tile | undefined): number {
  return tile ? tile.color * 10 + tile.symbol : NO_NEXT_TILE_CODE;
}

export function decodeNextTileCode(code: number): Tile | undefined {
  if (code === NO_NEXT_TILE_CODE) {
    return undefined;
  }
  return Tile.of(Math.floor(code / 10), code % 10);
}
