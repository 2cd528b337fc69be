// =============================================================================
// ROYAL TILES RULES ENGINE - PUBLIC API
// =============================================================================
// Orchestrators (turn sequencing, save/load, rendering) should only import
// from this file.
//
// Pipeline per player action:
//   placeTile -> findByColor / findBySymbol -> scoreCombination
//   -> settleCombination
// Everything is synchronous; every call fully succeeds or throws an
// EngineError without changing state.
// =============================================================================

// =============================================================================
// CORE TYPES (from src/shared/types/game.ts)
// =============================================================================

export type {
  Position,
  TileColor,
  TileSymbol,
  TileAttribute,
  TileInfo,
  Combination,
  BoundingBox,
} from '../types/game';

export {
  TILE_COLORS,
  TILE_SYMBOLS,
  TILE_ATTRIBUTES,
  GRID_ROWS,
  GRID_COLS,
  EMPTY_CELL_CODE,
  NO_NEXT_TILE_CODE,
  MAX_TILES_PLACED,
  COMBINATION_BASE_POINTS,
  CROWN_BONUS,
  pos,
  positionToKey,
  keyToPosition,
  positionsEqual,
  comparePositions,
  formatPosition,
} from '../types/game';

// =============================================================================
// TILES & BOARD
// =============================================================================

export { Tile, ROYAL_PAIRS, isRoyal } from './Tile';
export { Board } from './Board';
export type { BoardEntry } from './Board';
export { PlayerState, START_POSITION } from './PlayerState';
export type { PlayerRestoreOptions } from './PlayerState';

// =============================================================================
// PERSISTED FORMAT
// =============================================================================

export {
  SaveGridSchema,
  parseSaveGrid,
  createEmptyGrid,
  encodeTile,
  decodeTileCode,
  encodeNextTileCode,
  decodeNextTileCode,
} from './boardCodec';
export type { SaveGrid } from './boardCodec';

// =============================================================================
// COMBINATIONS
// =============================================================================

export {
  findCombinationsByColor,
  findCombinationsBySymbol,
  findCombinationsByAttribute,
  findByColor,
  findBySymbol,
  findAllCombinations,
  findConnectedGroup,
  enumerateConnectedSubsets,
  isValidCombination,
} from './combinationDetection';
export { getFlippablePositions, findGeometricCenter } from './flippableSelection';
export { createCombination, combinationKey, isFlippable } from './combination';

// =============================================================================
// SCORING & VICTORY
// =============================================================================

export { scoreCombination, settleCombination } from './scoring';
export { determineWinners, allBoardsFull } from './victoryLogic';
export type { VictoryResult } from './victoryLogic';

// =============================================================================
// ERRORS
// =============================================================================

export {
  EngineError,
  EngineErrorCode,
  BoardConstraintViolation,
  CodecError,
  RulesViolation,
  isEngineError,
  isBoardConstraintViolation,
  isCodecError,
  isRulesViolation,
  wrapEngineError,
} from './errors';
export type { EngineErrorJSON } from './errors';
