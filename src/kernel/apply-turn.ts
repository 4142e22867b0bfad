import { resolveCollisions } from './collision.js';
import { createTurnCollector, emitTrace, turnOutput, type TurnCollector } from './turn-collector.js';
import {
  activateEnemy,
  countDownTrap,
  isLiveEnemy,
  moveEnemy,
  purifyEnemy,
  trapEnemy,
} from './entity-model.js';
import {
  inBounds,
  isChebyshevAdjacent,
  isGoal,
  isMud,
  isUnitDirection,
  samePosition,
  translate,
} from './grid-model.js';
import { isCellOpenFor, selectNextPosition } from './pathfinding.js';
import { assertMatchPlaying, kernelRuntimeError } from './runtime-error.js';
import { evaluateMatchStatus } from './terminal.js';
import type {
  Direction,
  EnemyState,
  ExecutionOptions,
  GridPosition,
  LevelRuntime,
  MatchState,
  MoveRejectionReason,
  TurnApplication,
} from './types.js';

export function assertUnitDirection(direction: Direction): void {
  if (!isUnitDirection(direction)) {
    throw kernelRuntimeError('INVALID_DIRECTION', 'Direction must be one of the 8 unit vectors', {
      dx: direction.dx,
      dy: direction.dy,
    });
  }
}

export function validatePlayerMove(
  runtime: LevelRuntime,
  state: MatchState,
  target: GridPosition,
): MoveRejectionReason | null {
  if (!inBounds(runtime.grid, target)) {
    return 'outOfBounds';
  }
  // Only active enemies block; dormant and trapped ones can be stepped onto.
  if (state.enemies.some((enemy) => enemy.lifecycle === 'active' && samePosition(enemy.position, target))) {
    return 'blockedByEnemy';
  }
  return null;
}

// ── Phases ────────────────────────────────────────────────
// Each phase walks `enemies` in creation order and replaces entries in place, so
// later enemies see what earlier ones did this turn.

function runTrapCountdown(enemies: EnemyState[], collector: TurnCollector): ReadonlySet<EnemyState['id']> {
  const released = new Set<EnemyState['id']>();
  enemies.forEach((enemy, index) => {
    if (enemy.lifecycle !== 'trapped') {
      return;
    }
    const next = countDownTrap(enemy);
    enemies[index] = next;
    if (next.lifecycle === 'active') {
      released.add(next.id);
      emitTrace(collector, { kind: 'trapRelease', enemyId: next.id, at: next.position });
    } else {
      emitTrace(collector, { kind: 'trapCountdown', enemyId: next.id, remaining: next.trappedTurnsRemaining });
    }
  });
  return released;
}

function runDormantActivation(
  enemies: EnemyState[],
  player: GridPosition,
  collector: TurnCollector,
): ReadonlySet<EnemyState['id']> {
  const woken = new Set<EnemyState['id']>();
  enemies.forEach((enemy, index) => {
    if (enemy.lifecycle !== 'dormant' || !isChebyshevAdjacent(player, enemy.position)) {
      return;
    }
    enemies[index] = activateEnemy(enemy);
    woken.add(enemy.id);
    emitTrace(collector, { kind: 'activate', enemyId: enemy.id, at: enemy.position });
  });
  return woken;
}

function runEnemyMovement(
  runtime: LevelRuntime,
  enemies: EnemyState[],
  player: GridPosition,
  heldThisTurn: ReadonlySet<EnemyState['id']>,
  collector: TurnCollector,
): void {
  const { grid } = runtime;
  for (let index = 0; index < enemies.length; index += 1) {
    const enemy = enemies[index];
    if (enemy === undefined || enemy.lifecycle !== 'active' || heldThisTurn.has(enemy.id)) {
      continue;
    }

    const next = selectNextPosition({
      current: enemy.position,
      player,
      goal: grid.goal,
      isOpen: (candidate) => isCellOpenFor(grid, enemies, enemy, candidate),
    });
    if (samePosition(next, enemy.position)) {
      continue;
    }

    let moved = moveEnemy(enemy, next);
    emitTrace(collector, { kind: 'enemyMove', enemyId: enemy.id, from: enemy.position, to: next });
    if (isMud(grid, next)) {
      moved = trapEnemy(moved, runtime.trapDuration);
      emitTrace(collector, { kind: 'trap', enemyId: enemy.id, at: next, turns: runtime.trapDuration });
    }
    enemies[index] = moved;
  }
}

function runGoalPurification(runtime: LevelRuntime, enemies: EnemyState[], collector: TurnCollector): void {
  enemies.forEach((enemy, index) => {
    if (!isLiveEnemy(enemy) || !isGoal(runtime.grid, enemy.position)) {
      return;
    }
    enemies[index] = purifyEnemy(enemy);
    emitTrace(collector, { kind: 'purify', enemyId: enemy.id, at: enemy.position, cause: 'goal' });
  });
}

/**
 * Resolves one player move against `state`. A rejected move leaves `state`
 * untouched; an accepted one runs the full phase sequence and returns the next
 * state. Throws when the match is already over or the direction is not a unit step.
 */
export function applyTurn(
  runtime: LevelRuntime,
  state: MatchState,
  direction: Direction,
  options?: ExecutionOptions,
): TurnApplication {
  assertMatchPlaying(state);
  assertUnitDirection(direction);

  const target = translate(state.player, direction);
  const rejection = validatePlayerMove(runtime, state, target);
  if (rejection !== null) {
    return { type: 'rejected', reason: rejection, target };
  }

  const collector = createTurnCollector(options);
  const enemies = [...state.enemies];
  emitTrace(collector, { kind: 'playerMove', from: state.player, to: target });

  const released = runTrapCountdown(enemies, collector);
  const woken = runDormantActivation(enemies, target, collector);
  runEnemyMovement(runtime, enemies, target, new Set([...released, ...woken]), collector);
  const resolved = [...resolveCollisions(enemies, collector)];
  runGoalPurification(runtime, resolved, collector);

  const turnCount = state.turnCount + 1;
  const status = evaluateMatchStatus(target, resolved);
  if (status !== 'playing') {
    emitTrace(collector, { kind: 'matchEnd', status, turnCount });
  }

  return {
    type: 'accepted',
    state: {
      player: target,
      enemies: resolved,
      status,
      turnCount,
    },
    ...turnOutput(collector),
  };
}
