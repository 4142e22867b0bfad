import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  assertDeterministicReplay,
  DIRECTIONS,
  inBounds,
  isObstacle,
  loadLevelCatalog,
  manhattanDistance,
  type Direction,
  type LevelDef,
} from '../../src/kernel/index.js';
import { runReplay } from '../../src/sim/index.js';
import { LEVELS_DIR, loadEngine, makeLevel, pos, spawn } from '../helpers/level-fixtures.js';

const WANDER: readonly Direction[] = [
  DIRECTIONS.up,
  DIRECTIONS.right,
  DIRECTIONS.upRight,
  DIRECTIONS.down,
  DIRECTIONS.left,
  DIRECTIONS.up,
  DIRECTIONS.upLeft,
  DIRECTIONS.right,
  DIRECTIONS.downRight,
  DIRECTIONS.up,
  DIRECTIONS.right,
  DIRECTIONS.up,
];

const shippedLevels = (): readonly LevelDef[] => loadLevelCatalog(LEVELS_DIR).levels;

describe('engine properties', () => {
  it('replays every shipped level identically', () => {
    for (const level of shippedLevels()) {
      assert.doesNotThrow(() => assertDeterministicReplay(level.config, WANDER), level.metadata.id);
    }
  });

  it('keeps the player on the board and enemies off obstacles', () => {
    for (const level of shippedLevels()) {
      const engine = loadEngine(level.config);
      const trace = runReplay(level.config, WANDER);
      for (const step of trace.steps) {
        assert.ok(inBounds(engine.grid, step.snapshot.player), `${level.metadata.id}: player left the board`);
        for (const enemy of step.snapshot.enemies) {
          assert.ok(inBounds(engine.grid, enemy.position), `${level.metadata.id}: ${enemy.id} left the board`);
          assert.equal(isObstacle(engine.grid, enemy.position), false, `${level.metadata.id}: ${enemy.id} on an obstacle`);
        }
      }
    }
  });

  it('only moves enemies one cardinal step closer to the player', () => {
    for (const level of shippedLevels()) {
      const trace = runReplay(level.config, WANDER, { trace: true });
      for (const step of trace.steps) {
        if (step.outcome.type !== 'accepted') {
          continue;
        }
        const player = step.snapshot.player;
        for (const entry of step.outcome.trace ?? []) {
          if (entry.kind !== 'enemyMove') {
            continue;
          }
          assert.equal(manhattanDistance(entry.from, entry.to), 1);
          assert.ok(manhattanDistance(entry.to, player) < manhattanDistance(entry.from, player));
        }
      }
    }
  });

  it('removes N-1 enemies when N same-color enemies meet', () => {
    const engine = loadEngine(makeLevel({ enemies: [spawn(3, 3), spawn(3, 3), spawn(3, 3)] }));
    assert.equal(engine.snapshot().enemies.length, 3);

    const outcome = engine.attemptMove(DIRECTIONS.up);

    assert.equal(outcome.type, 'accepted');
    assert.deepEqual(
      outcome.type === 'accepted' ? outcome.snapshot.enemies.map((enemy) => [enemy.id, enemy.position]) : null,
      [['enemy-0', pos(3, 2)]],
    );
  });

  it('resets to the same snapshot every time', () => {
    for (const level of shippedLevels()) {
      const engine = loadEngine(level.config);
      const initial = engine.snapshot();
      for (const direction of WANDER.slice(0, 3)) {
        if (engine.snapshot().status === 'playing') {
          engine.attemptMove(direction);
        }
      }

      assert.deepEqual(engine.reset(), initial);
      assert.deepEqual(engine.reset(), initial);
    }
  });
});
