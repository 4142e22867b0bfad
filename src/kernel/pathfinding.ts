import { CARDINAL_DIRECTIONS, inBounds, isObstacle, manhattanDistance, samePosition, translate } from './grid-model.js';
import { isLiveEnemy } from './entity-model.js';
import type { EnemyState, GridModel, GridPosition } from './types.js';

export interface PathfindingInput {
  readonly current: GridPosition;
  readonly player: GridPosition;
  readonly goal: GridPosition;
  /** Same-turn occupancy: must reflect enemies that already moved this turn. */
  readonly isOpen: (position: GridPosition) => boolean;
}

interface ScoredCandidate {
  readonly position: GridPosition;
  readonly score: number;
}

/**
 * Picks the enemy's next cell, scanning up, down, left, right.
 *
 * A step that shortens the Manhattan distance to the player always wins; the
 * shortest such step is kept, first in scan order on ties. Only when no step gets
 * closer are equal-distance steps considered, and then only those that move
 * further from the goal (largest goal distance wins, first on ties). Otherwise the
 * enemy stays where it is.
 *
 * On a square grid a single cardinal step changes the player distance by exactly
 * one, so the equal-distance branch never fires there.
 */
export function selectNextPosition(input: PathfindingInput): GridPosition {
  const { current, player, goal } = input;
  const currentPlayerDistance = manhattanDistance(current, player);
  const currentGoalDistance = manhattanDistance(current, goal);

  let closer: ScoredCandidate | null = null;
  let sidestep: ScoredCandidate | null = null;

  for (const direction of CARDINAL_DIRECTIONS) {
    const candidate = translate(current, direction);
    if (!input.isOpen(candidate)) {
      continue;
    }

    const playerDistance = manhattanDistance(candidate, player);
    if (playerDistance < currentPlayerDistance) {
      if (closer === null || playerDistance < closer.score) {
        closer = { position: candidate, score: playerDistance };
      }
      continue;
    }

    if (playerDistance === currentPlayerDistance) {
      const goalDistance = manhattanDistance(candidate, goal);
      if (goalDistance > currentGoalDistance && (sidestep === null || goalDistance > sidestep.score)) {
        sidestep = { position: candidate, score: goalDistance };
      }
    }
  }

  return closer?.position ?? sidestep?.position ?? current;
}

/**
 * A cell is open to `mover` when it is on the board, not an obstacle, and not held
 * by a live enemy of another color. Same-color occupants are merge targets.
 */
export function isCellOpenFor(
  grid: GridModel,
  enemies: readonly EnemyState[],
  mover: EnemyState,
  position: GridPosition,
): boolean {
  if (!inBounds(grid, position) || isObstacle(grid, position)) {
    return false;
  }

  return !enemies.some(
    (other) =>
      other.id !== mover.id
      && isLiveEnemy(other)
      && other.color !== mover.color
      && samePosition(other.position, position),
  );
}
