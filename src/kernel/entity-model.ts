import { asEnemyId } from './branded.js';
import { enemyTransitionError } from './runtime-error.js';
import type {
  EnemySnapshot,
  EnemySpawn,
  EnemyState,
  GridPosition,
  LevelRuntime,
  LiveEnemyState,
  MatchState,
  Snapshot,
} from './types.js';

export const DEFAULT_TRAP_DURATION = 1;

const copyPosition = (position: GridPosition): GridPosition => ({ x: position.x, y: position.y });

export const createEnemies = (spawns: readonly EnemySpawn[]): readonly EnemyState[] =>
  spawns.map((spawn, ordinal): EnemyState => ({
    id: asEnemyId(`enemy-${ordinal}`),
    ordinal,
    color: spawn.color,
    position: copyPosition(spawn.position),
    lifecycle: spawn.dormant ? 'dormant' : 'active',
    trappedTurnsRemaining: 0,
  }));

export const createInitialMatchState = (runtime: LevelRuntime): MatchState => ({
  player: copyPosition(runtime.config.playerStart),
  enemies: createEnemies(runtime.config.enemies),
  status: 'playing',
  turnCount: 0,
});

export const isLiveEnemy = (enemy: EnemyState): enemy is LiveEnemyState => enemy.lifecycle !== 'purified';

export const liveEnemies = (enemies: readonly EnemyState[]): readonly LiveEnemyState[] => enemies.filter(isLiveEnemy);

export function activateEnemy(enemy: EnemyState): EnemyState {
  if (enemy.lifecycle !== 'dormant') {
    throw enemyTransitionError(enemy, 'active');
  }
  return { ...enemy, lifecycle: 'active' };
}

export const moveEnemy = (enemy: EnemyState, to: GridPosition): EnemyState => ({
  ...enemy,
  position: copyPosition(to),
});

export function trapEnemy(enemy: EnemyState, turns: number): EnemyState {
  if (enemy.lifecycle !== 'active') {
    throw enemyTransitionError(enemy, 'trapped');
  }
  return { ...enemy, lifecycle: 'trapped', trappedTurnsRemaining: turns };
}

/**
 * Start-of-turn trap bookkeeping. The counter drops by one; the enemy turns active
 * in the same step it reaches zero, so no trapped enemy ever holds a zero counter.
 * The caller keeps a freshly released enemy in place for the rest of the turn.
 */
export function countDownTrap(enemy: EnemyState): EnemyState {
  if (enemy.lifecycle !== 'trapped') {
    throw enemyTransitionError(enemy, 'active');
  }
  const remaining = Math.max(enemy.trappedTurnsRemaining - 1, 0);
  if (remaining > 0) {
    return { ...enemy, trappedTurnsRemaining: remaining };
  }
  return { ...enemy, lifecycle: 'active', trappedTurnsRemaining: 0 };
}

export function purifyEnemy(enemy: EnemyState): EnemyState {
  if (!isLiveEnemy(enemy)) {
    throw enemyTransitionError(enemy, 'purified');
  }
  return { ...enemy, lifecycle: 'purified', trappedTurnsRemaining: 0 };
}

export const toEnemySnapshot = (enemy: LiveEnemyState): EnemySnapshot => ({
  id: enemy.id,
  color: enemy.color,
  position: copyPosition(enemy.position),
  lifecycle: enemy.lifecycle,
  trappedTurnsRemaining: enemy.trappedTurnsRemaining,
});

export const toSnapshot = (state: MatchState): Snapshot => ({
  turnCount: state.turnCount,
  player: copyPosition(state.player),
  enemies: liveEnemies(state.enemies).map(toEnemySnapshot),
  status: state.status,
});
