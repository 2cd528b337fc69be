/**
 * Engine Domain Errors - Structured error types for the rule engine
 *
 * Every engine operation either fully succeeds or throws one of these
 * errors before touching any state. All failures are local, synchronous
 * validation failures; there is no retry or fatal category.
 *
 * Error Categories:
 * - **BoardConstraintViolation**: placement/flip against the wrong cell state
 * - **CodecError**: persisted cell codes or grids that cannot be decoded
 * - **RulesViolation**: scoring or settlement requests the rules forbid
 *
 * Usage:
 * ```typescript
 * import { BoardConstraintViolation, EngineErrorCode } from './errors';
 *
 * throw new BoardConstraintViolation(
 *   EngineErrorCode.BOARD_POSITION_OCCUPIED,
 *   'Position (0, 1) is already occupied',
 *   { position: { row: 0, col: 1 } }
 * );
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - BOARD_*: Board cell state and footprint issues
 * - CODEC_*: Persisted format decoding issues
 * - RULES_*: Scoring rule violations
 * - INTERNAL_*: Bugs
 */
export enum EngineErrorCode {
  /** Placement onto a filled cell */
  BOARD_POSITION_OCCUPIED = 'BOARD_POSITION_OCCUPIED',
  /** Flip attempted on an empty cell */
  BOARD_POSITION_EMPTY = 'BOARD_POSITION_EMPTY',
  /** Placement outside the currently valid positions */
  BOARD_INVALID_POSITION = 'BOARD_INVALID_POSITION',

  /** Color or symbol outside 1..6 */
  CODEC_INVALID_TILE_CODE = 'CODEC_INVALID_TILE_CODE',
  /** Persisted grid is not a 5x5 array of integers */
  CODEC_INVALID_SAVE_GRID = 'CODEC_INVALID_SAVE_GRID',

  /** Scoring requested for a cluster whose size is not 3, 4 or 5 */
  RULES_INVALID_COMBINATION_SIZE = 'RULES_INVALID_COMBINATION_SIZE',
  /** Flip selection count outside 1-2, or a position that is not flippable */
  RULES_INVALID_FLIP_SELECTION = 'RULES_INVALID_FLIP_SELECTION',

  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error codes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  BOARD_: 'Board cell state or footprint violation',
  CODEC_: 'Persisted board format could not be decoded',
  RULES_: 'Scoring rule violation',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g. 'Board', 'Scoring') */
  readonly domain: string;

  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging/debugging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of an EngineError.
 */
export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Error for placement and flip requests that do not match the cell state.
 *
 * Examples:
 * - Placing onto an occupied position (PositionOccupied)
 * - Flipping an empty position (PositionEmpty)
 */
export class BoardConstraintViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'BoardConstraintViolation';
    Object.setPrototypeOf(this, BoardConstraintViolation.prototype);
  }
}

/**
 * Error for persisted data that cannot be decoded into tiles.
 */
export class CodecError extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Codec'
  ) {
    super(code, message, context, domain);
    this.name = 'CodecError';
    Object.setPrototypeOf(this, CodecError.prototype);
  }
}

/**
 * Error for scoring and settlement requests that violate the game rules.
 *
 * Examples:
 * - Scoring a cluster of 2 or 6 tiles (InvalidCombinationSize)
 * - Settling with zero, three, or non-flippable selections (InvalidFlipSelection)
 */
export class RulesViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Rules'
  ) {
    super(code, message, context, domain);
    this.name = 'RulesViolation';
    Object.setPrototypeOf(this, RulesViolation.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isBoardConstraintViolation(error: unknown): error is BoardConstraintViolation {
  return error instanceof BoardConstraintViolation;
}

export function isCodecError(error: unknown): error is CodecError {
  return error instanceof CodecError;
}

export function isRulesViolation(error: unknown): error is RulesViolation {
  return error instanceof RulesViolation;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Wrap an unknown error in an EngineError.
 *
 * Useful for catching and normalizing errors at domain boundaries.
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    {
      ...context,
      originalStack: stack,
    },
    domain
  );
}
