import {
  COMBINATION_BASE_POINTS,
  CROWN_BONUS,
  Combination,
  Position,
  formatPosition,
  positionToKey,
} from '../types/game';
import { componentLogger } from '../utils/logger';
import { Board } from './Board';
import { isFlippable } from './combination';
import { EngineErrorCode, RulesViolation } from './errors';
import { PlayerState } from './PlayerState';

const log = componentLogger('Scoring');

const MAX_FLIP_SELECTIONS = 2;

/**
 * Points for a cluster: 2 / 4 / 7 for three / four / five tiles, plus one
 * when any of its tiles carries a crown.
 *
 * @throws RulesViolation (RULES_INVALID_COMBINATION_SIZE) for other sizes
 */
export function scoreCombination(positions: readonly Position[], board: Board): number {
  const base = COMBINATION_BASE_POINTS[positions.length];
  if (base === undefined) {
    throw new RulesViolation(
      EngineErrorCode.RULES_INVALID_COMBINATION_SIZE,
      `Invalid combination size: ${positions.length}`,
      { size: positions.length },
      'Scoring'
    );
  }

  const crowned = positions.some((p) => board.getTile(p)?.crown === true);
  return base + (crowned ? CROWN_BONUS : 0);
}

/**
 * Award `combo` to `player` and flip the selected tiles.
 *
 * All checks run before anything changes: 1-2 selections, no repeats, each
 * one among the combination's flippable positions and occupied on the
 * player's board, and no member of the combination already flipped.
 *
 * @returns the points awarded
 * @throws RulesViolation (RULES_INVALID_FLIP_SELECTION, RULES_INVALID_COMBINATION_SIZE)
 */
export function settleCombination(
  combo: Combination,
  player: PlayerState,
  flipSelections: readonly Position[]
): number {
  assertValidFlipSelection(combo, player.board, flipSelections);

  const points = scoreCombination(combo.positions, player.board);
  for (const selection of flipSelections) {
    player.board.flipTile(selection);
  }
  player.addScore(points);

  log.info('Combination settled', {
    player: player.name,
    size: combo.positions.length,
    points,
    flipped: flipSelections.map(formatPosition),
    score: player.score,
  });

  return points;
}

function assertValidFlipSelection(
  combo: Combination,
  board: Board,
  flipSelections: readonly Position[]
): void {
  const reject = (reason: string): never => {
    log.warn('Rejected flip selection', { reason, selections: flipSelections.map(formatPosition) });
    throw new RulesViolation(
      EngineErrorCode.RULES_INVALID_FLIP_SELECTION,
      `Invalid flip selection: ${reason}`,
      {
        selections: [...flipSelections],
        flippable: [...combo.flippablePositions],
      },
      'Scoring'
    );
  };

  if (flipSelections.length === 0 || flipSelections.length > MAX_FLIP_SELECTIONS) {
    reject(`expected 1-${MAX_FLIP_SELECTIONS} positions, got ${flipSelections.length}`);
  }

  if (new Set(flipSelections.map(positionToKey)).size !== flipSelections.length) {
    reject('the same position was selected twice');
  }

  for (const selection of flipSelections) {
    if (!isFlippable(combo, selection)) {
      reject(`${formatPosition(selection)} is not flippable in this combination`);
    }
    if (board.isEmpty(selection)) {
      reject(`${formatPosition(selection)} holds no tile`);
    }
  }

  const spent = combo.positions.find((p) => board.getTile(p)?.flipped === true);
  if (spent) {
    reject(`${formatPosition(spent)} is already flipped`);
  }
}
