import { MAX_TILES_PLACED, Position, formatPosition } from '../types/game';
import { Board } from './Board';
import { BoardConstraintViolation, EngineErrorCode } from './errors';
import { Tile } from './Tile';

/** Where a player's start tile goes on a fresh board. */
export const START_POSITION: Position = { row: 0, col: 0 };

/** State carried over when a player is rebuilt around a loaded board. */
export interface PlayerRestoreOptions {
  startTile?: Tile;
  score?: number;
}

/**
 * Per-player engine state: owned board, score and placement count.
 *
 * Over a board that already holds tiles, every tile but one counts as
 * placed; the remaining one is the start tile.
 */
export class PlayerState {
  readonly name: string;
  readonly board: Board;
  private currentScore: number;
  private placed: number;
  private start: Tile | undefined;

  constructor(name: string, board: Board = new Board(), restore: PlayerRestoreOptions = {}) {
    this.name = name;
    this.board = board;
    this.currentScore = restore.score ?? 0;
    this.placed = Math.max(board.getTileCount() - 1, 0);
    this.start = restore.startTile?.copy();
  }

  get score(): number {
    return this.currentScore;
  }

  /** Tiles placed after the start tile. */
  get tilesPlaced(): number {
    return this.placed;
  }

  get startTile(): Tile | undefined {
    return this.start;
  }

  addScore(delta: number): void {
    this.currentScore += delta;
  }

  /**
   * Place the start tile at `origin` on an empty board. Does not count
   * towards {@link PlayerState.tilesPlaced}.
   */
  placeStartTile(tile: Tile, origin: Position = START_POSITION): void {
    this.board.placeTile(origin, tile);
    this.start = tile.copy();
  }

  /**
   * Place a tile at one of the board's currently valid positions.
   * @throws BoardConstraintViolation (BOARD_INVALID_POSITION) otherwise
   */
  placeTile(position: Position, tile: Tile): void {
    if (!this.board.isValidPosition(position)) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_POSITION,
        `${formatPosition(position)} is not a valid placement for ${this.name}`,
        { position, player: this.name }
      );
    }
    this.board.placeTile(position, tile);
    this.placed++;
  }

  /** True when the drawn tile has the same color and symbol as the start tile. */
  matchesStartTile(tile: Tile): boolean {
    return this.start !== undefined && this.start.sameIdentity(tile);
  }

  hasFullBoard(): boolean {
    return this.placed >= MAX_TILES_PLACED;
  }
}
