import { isLiveEnemy } from './entity-model.js';
import { samePosition } from './grid-model.js';
import type { EnemyState, GridPosition, MatchStatus } from './types.js';

export const isCaptured = (player: GridPosition, enemies: readonly EnemyState[]): boolean =>
  enemies.some((enemy) => enemy.lifecycle === 'active' && samePosition(enemy.position, player));

export const isVictory = (enemies: readonly EnemyState[]): boolean => !enemies.some(isLiveEnemy);

export const evaluateMatchStatus = (player: GridPosition, enemies: readonly EnemyState[]): MatchStatus => {
  if (isCaptured(player, enemies)) {
    return 'lost';
  }
  if (isVictory(enemies)) {
    return 'won';
  }
  return 'playing';
};
