import {
  BoundingBox,
  EMPTY_CELL_CODE,
  GRID_COLS,
  GRID_ROWS,
  Position,
  TileInfo,
  comparePositions,
  formatPosition,
  positionToKey,
} from '../types/game';
import { componentLogger } from '../utils/logger';
import { SaveGrid, createEmptyGrid, decodeTileCode, encodeTile, parseSaveGrid } from './boardCodec';
import { BoardConstraintViolation, EngineErrorCode } from './errors';
import {
  ORTHOGONAL_DIRECTIONS,
  boxHeight,
  boxWidth,
  computeBoundingBox,
  extendBoundingBox,
  step,
} from './geometry';
import { Tile } from './Tile';

const log = componentLogger('Board');

export interface BoardEntry {
  position: Position;
  tile: Tile;
}

/**
 * One player's sparse tile grid.
 *
 * Tiles live in a flat arena (`slots`) and positions map to arena indices,
 * so the flipped bit of a placed tile is only ever changed through
 * {@link Board.flipTile}. Tiles go in and come out as copies; the arena
 * never hands out its own instances.
 *
 * The 5x5 footprint is not checked by {@link Board.placeTile}; callers keep
 * it by only placing into positions returned from
 * {@link Board.computeValidPositions} (the first tile of an empty board
 * excepted).
 */
export class Board {
  private readonly slots: Tile[] = [];
  private readonly slotPositions: Position[] = [];
  private readonly slotIndex = new Map<string, number>();

  static fromSaveFormat(data: unknown): Board {
    const board = new Board();
    board.loadFromSaveFormat(data);
    return board;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  isOccupied(position: Position): boolean {
    return this.slotIndex.has(positionToKey(position));
  }

  isEmpty(position: Position): boolean {
    return !this.isOccupied(position);
  }

  /** A copy of the tile at `position`; flipping it does not touch the board. */
  getTile(position: Position): Tile | undefined {
    return this.slotAt(position)?.copy();
  }

  getTileCount(): number {
    return this.slots.length;
  }

  countFlippedTiles(): number {
    return this.slots.filter((tile) => tile.flipped).length;
  }

  /** Occupied positions in placement order. */
  positions(): Position[] {
    return [...this.slotPositions];
  }

  /** Occupied positions with copies of their tiles, in placement order. */
  entries(): BoardEntry[] {
    return this.slotPositions.map((position, index) => ({
      position: { row: position.row, col: position.col },
      tile: this.slots[index].copy(),
    }));
  }

  /** Occupied positions ordered by row, then column. */
  positionsRowMajor(): Position[] {
    return this.positions().sort(comparePositions);
  }

  // ===========================================================================
  // Mutations
  // ===========================================================================

  /**
   * @throws BoardConstraintViolation (BOARD_POSITION_OCCUPIED)
   */
  placeTile(position: Position, tile: Tile): void {
    const key = positionToKey(position);
    if (this.slotIndex.has(key)) {
      log.warn('Rejected placement onto occupied position', { position });
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_POSITION_OCCUPIED,
        `Position ${formatPosition(position)} is already occupied`,
        { position }
      );
    }

    this.slotIndex.set(key, this.slots.length);
    this.slots.push(tile.copy());
    this.slotPositions.push({ row: position.row, col: position.col });
  }

  /**
   * @throws BoardConstraintViolation (BOARD_POSITION_EMPTY)
   */
  flipTile(position: Position): void {
    const tile = this.slotAt(position);
    if (!tile) {
      log.warn('Rejected flip of empty position', { position });
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_POSITION_EMPTY,
        `No tile at ${formatPosition(position)}`,
        { position }
      );
    }
    tile.flip();
  }

  // ===========================================================================
  // Placement geometry
  // ===========================================================================

  /**
   * Empty positions orthogonally adjacent to a tile whose occupation keeps
   * the bounding box within 5x5. Discovery order: occupied positions in
   * placement order, neighbours up, down, left, right.
   */
  computeValidPositions(): Position[] {
    const box = this.getBoundingBox();
    if (!box) return [];

    const seen = new Set<string>();
    const result: Position[] = [];

    for (const occupied of this.slotPositions) {
      for (const direction of ORTHOGONAL_DIRECTIONS) {
        const candidate = step(occupied, direction);
        const key = positionToKey(candidate);
        if (seen.has(key) || this.slotIndex.has(key)) continue;
        seen.add(key);

        const grown = extendBoundingBox(box, candidate);
        if (boxHeight(grown) <= GRID_ROWS && boxWidth(grown) <= GRID_COLS) {
          result.push(candidate);
        }
      }
    }

    return result;
  }

  isValidPosition(position: Position): boolean {
    const key = positionToKey(position);
    return this.computeValidPositions().some((candidate) => positionToKey(candidate) === key);
  }

  // ===========================================================================
  // Bounding box & snapshots
  // ===========================================================================

  getBoundingBox(): BoundingBox | undefined {
    return computeBoundingBox(this.slotPositions);
  }

  /** Top-left corner of the occupied bounding box; undefined when empty. */
  getSnapshotOrigin(): Position | undefined {
    const box = this.getBoundingBox();
    return box ? { row: box.minRow, col: box.minCol } : undefined;
  }

  /**
   * Dense 5x5 view relative to {@link Board.getSnapshotOrigin}. Tiles outside
   * the 5x5 window (a board that broke the footprint) are left out.
   */
  snapshotTiles(): (TileInfo | null)[][] {
    const grid: (TileInfo | null)[][] = Array.from({ length: GRID_ROWS }, () =>
      Array<TileInfo | null>(GRID_COLS).fill(null)
    );
    this.forEachInWindow((r, c, tile) => {
      grid[r][c] = tile.toJSON();
    });
    return grid;
  }

  // ===========================================================================
  // Persisted format
  // ===========================================================================

  toSaveFormat(): SaveGrid {
    const grid = createEmptyGrid();
    this.forEachInWindow((r, c, tile) => {
      grid[r][c] = encodeTile(tile);
    });
    return grid;
  }

  /**
   * Replace the board's contents with a decoded 5x5 grid. Tiles land at
   * their grid coordinates, so the decoded origin is (0, 0). Nothing is
   * changed when any cell fails to decode.
   *
   * @throws CodecError for a malformed grid or an out-of-range cell code
   */
  loadFromSaveFormat(data: unknown): void {
    const grid = parseSaveGrid(data);
    const decoded: BoardEntry[] = [];

    for (let r = 0; r < GRID_ROWS; r++) {
      for (let c = 0; c < GRID_COLS; c++) {
        const code = grid[r][c];
        if (code === EMPTY_CELL_CODE) continue;
        decoded.push({ position: { row: r, col: c }, tile: decodeTileCode(code) });
      }
    }

    this.slots.length = 0;
    this.slotPositions.length = 0;
    this.slotIndex.clear();
    for (const { position, tile } of decoded) {
      this.slotIndex.set(positionToKey(position), this.slots.length);
      this.slots.push(tile);
      this.slotPositions.push(position);
    }

    log.debug('Loaded board from save grid', { tiles: decoded.length });
  }

  private slotAt(position: Position): Tile | undefined {
    const index = this.slotIndex.get(positionToKey(position));
    return index === undefined ? undefined : this.slots[index];
  }

  private forEachInWindow(visit: (row: number, col: number, tile: Tile) => void): void {
    const origin = this.getSnapshotOrigin();
    if (!origin) return;

    this.slotPositions.forEach((position, index) => {
      const r = position.row - origin.row;
      const c = position.col - origin.col;
      if (r < GRID_ROWS && c < GRID_COLS) {
        visit(r, c, this.slots[index]);
      }
    });
  }
}
