import { emitTrace, emitWarning, type TurnCollector } from './turn-collector.js';
import { isLiveEnemy, purifyEnemy } from './entity-model.js';
import { positionKey } from './grid-model.js';
import type { EnemyState, LiveEnemyState } from './types.js';

const groupByPosition = (enemies: readonly EnemyState[]): readonly (readonly LiveEnemyState[])[] => {
  const groups = new Map<string, LiveEnemyState[]>();
  for (const enemy of enemies) {
    if (!isLiveEnemy(enemy)) {
      continue;
    }
    const key = positionKey(enemy.position);
    const group = groups.get(key);
    if (group === undefined) {
      groups.set(key, [enemy]);
    } else {
      group.push(enemy);
    }
  }
  return [...groups.values()];
};

/**
 * Same-color enemies sharing a cell collapse into the lowest-ordinal member; the
 * rest are purified. Mixed-color groups are left as they are and reported.
 * `enemies` must be in creation order.
 */
export function resolveCollisions(
  enemies: readonly EnemyState[],
  collector?: TurnCollector,
): readonly EnemyState[] {
  const purified = new Set<EnemyState['id']>();

  for (const group of groupByPosition(enemies)) {
    const [survivor, ...rest] = group;
    if (survivor === undefined || rest.length === 0) {
      continue;
    }

    if (!rest.every((member) => member.color === survivor.color)) {
      emitWarning(collector, {
        code: 'MIXED_COLOR_COLLISION',
        message: `Enemies of different colors share cell ${positionKey(survivor.position)}; no merge applied.`,
        context: {
          position: survivor.position,
          enemyIds: group.map((member) => member.id),
          colors: group.map((member) => member.color),
        },
        hint: 'Movement treats other-color enemies as blocking; check how these enemies were placed.',
      });
      continue;
    }

    emitTrace(collector, {
      kind: 'merge',
      survivorId: survivor.id,
      absorbedIds: rest.map((member) => member.id),
      at: survivor.position,
    });
    for (const member of rest) {
      purified.add(member.id);
      emitTrace(collector, { kind: 'purify', enemyId: member.id, at: member.position, cause: 'merge' });
    }
  }

  if (purified.size === 0) {
    return enemies;
  }
  return enemies.map((enemy) => (purified.has(enemy.id) ? purifyEnemy(enemy) : enemy));
}
