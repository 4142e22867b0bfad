import type { EnemySnapshot, Snapshot } from '../kernel/index.js';

export interface SnapshotDelta {
  readonly path: string;
  readonly before: unknown;
  readonly after: unknown;
}

const sortedUnionKeys = (
  left: ReadonlyMap<string, EnemySnapshot>,
  right: ReadonlyMap<string, EnemySnapshot>,
): readonly string[] => {
  const keySet = new Set<string>([...left.keys(), ...right.keys()]);
  return Array.from(keySet).sort((a, b) => a.localeCompare(b));
};

const indexEnemies = (snapshot: Snapshot): ReadonlyMap<string, EnemySnapshot> =>
  new Map(snapshot.enemies.map((enemy) => [enemy.id, enemy]));

const formatPosition = (position: { readonly x: number; readonly y: number }): string => `${position.x},${position.y}`;

const ENEMY_FIELDS = ['lifecycle', 'position', 'trappedTurnsRemaining'] as const;

const enemyFieldValue = (enemy: EnemySnapshot, field: (typeof ENEMY_FIELDS)[number]): unknown =>
  field === 'position' ? formatPosition(enemy.position) : enemy[field];

/**
 * Field-level differences between two snapshots, sorted by path. Positions are
 * compared as `x,y` strings; an enemy that appears or disappears is reported as a
 * whole under `enemies.<id>` with `null` on the missing side.
 */
export const computeSnapshotDeltas = (before: Snapshot, after: Snapshot): readonly SnapshotDelta[] => {
  const deltas: SnapshotDelta[] = [];

  const beforePlayer = formatPosition(before.player);
  const afterPlayer = formatPosition(after.player);
  if (beforePlayer !== afterPlayer) {
    deltas.push({ path: 'player', before: beforePlayer, after: afterPlayer });
  }

  const beforeEnemies = indexEnemies(before);
  const afterEnemies = indexEnemies(after);
  for (const id of sortedUnionKeys(beforeEnemies, afterEnemies)) {
    const previous = beforeEnemies.get(id);
    const next = afterEnemies.get(id);
    if (previous === undefined || next === undefined) {
      deltas.push({ path: `enemies.${id}`, before: previous ?? null, after: next ?? null });
      continue;
    }
    for (const field of ENEMY_FIELDS) {
      const beforeValue = enemyFieldValue(previous, field);
      const afterValue = enemyFieldValue(next, field);
      if (!Object.is(beforeValue, afterValue)) {
        deltas.push({ path: `enemies.${id}.${field}`, before: beforeValue, after: afterValue });
      }
    }
  }

  if (!Object.is(before.status, after.status)) {
    deltas.push({ path: 'status', before: before.status, after: after.status });
  }

  if (!Object.is(before.turnCount, after.turnCount)) {
    deltas.push({ path: 'turnCount', before: before.turnCount, after: after.turnCount });
  }

  return deltas.sort((left, right) => left.path.localeCompare(right.path));
};
