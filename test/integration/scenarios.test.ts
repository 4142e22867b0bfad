import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { DIRECTIONS, isKernelErrorCode, type EnemySpawn, type MoveOutcome, type Snapshot } from '../../src/kernel/index.js';
import { loadEngine, makeLevel, pos, spawn } from '../helpers/level-fixtures.js';

const track = (snapshot: Snapshot): readonly (readonly unknown[])[] =>
  snapshot.enemies.map((enemy) => [enemy.lifecycle, enemy.position, enemy.trappedTurnsRemaining]);

const acceptedSnapshot = (outcome: MoveOutcome): Snapshot => {
  assert.equal(outcome.type, 'accepted');
  if (outcome.type !== 'accepted') {
    throw new Error('expected an accepted move');
  }
  return outcome.snapshot;
};

describe('turn scenarios on a 5x5 board with the goal at (4,4)', () => {
  it('rejects a step onto an active enemy and keeps the state', () => {
    const engine = loadEngine(makeLevel({ enemies: [spawn(1, 0)] }));

    const outcome = engine.attemptMove(DIRECTIONS.right);

    assert.deepEqual(outcome, { type: 'rejected', reason: 'blockedByEnemy', target: pos(1, 0) });
    assert.equal(engine.snapshot().turnCount, 0);
    assert.deepEqual(engine.snapshot().player, pos(0, 0));
  });

  it('merges a same-color enemy into one that could not move', () => {
    const engine = loadEngine(
      makeLevel({
        playerStart: pos(1, 0),
        obstacles: [pos(2, 1), pos(1, 2), pos(3, 1)],
        enemies: [spawn(2, 2), spawn(3, 2)],
      }),
      { trace: true },
    );

    const outcome = engine.attemptMove(DIRECTIONS.right);
    const snapshot = acceptedSnapshot(outcome);

    assert.deepEqual(snapshot.enemies, [
      { id: 'enemy-0', color: 'red', position: pos(2, 2), lifecycle: 'active', trappedTurnsRemaining: 0 },
    ]);
    assert.equal(snapshot.status, 'playing');
    assert.deepEqual(outcome.type === 'accepted' ? outcome.trace?.slice(1) : null, [
      { kind: 'enemyMove', enemyId: 'enemy-1', from: pos(3, 2), to: pos(2, 2) },
      { kind: 'merge', survivorId: 'enemy-0', absorbedIds: ['enemy-1'], at: pos(2, 2) },
      { kind: 'purify', enemyId: 'enemy-1', at: pos(2, 2), cause: 'merge' },
    ]);
  });

  it('purifies an enemy that steps onto the goal', () => {
    const engine = loadEngine(
      makeLevel({ playerStart: pos(2, 4), enemies: [spawn(4, 3), spawn(0, 0, 'green', true)] }),
    );

    const snapshot = acceptedSnapshot(engine.attemptMove(DIRECTIONS.right));

    assert.deepEqual(snapshot, {
      turnCount: 1,
      player: pos(3, 4),
      enemies: [
        { id: 'enemy-1', color: 'green', position: pos(0, 0), lifecycle: 'dormant', trappedTurnsRemaining: 0 },
      ],
      status: 'playing',
    });
  });

  it('wins when the last live enemy is purified and refuses further moves', () => {
    const engine = loadEngine(makeLevel({ playerStart: pos(2, 4), enemies: [spawn(4, 3)] }));

    const snapshot = acceptedSnapshot(engine.attemptMove(DIRECTIONS.right));

    assert.equal(snapshot.status, 'won');
    assert.deepEqual(snapshot.enemies, []);
    assert.throws(
      () => engine.attemptMove(DIRECTIONS.left),
      (error: unknown) => isKernelErrorCode(error, 'MATCH_NOT_PLAYING'),
    );
  });

  it('wakes a dormant enemy on adjacency while dormant, not on the inverted non-dormant check, and holds it that turn', () => {
    const engine = loadEngine(makeLevel({ enemies: [spawn(2, 1, 'red', true)] }));

    const woken = acceptedSnapshot(engine.attemptMove(DIRECTIONS.right));
    assert.deepEqual(
      woken.enemies.map((enemy) => [enemy.lifecycle, enemy.position]),
      [['active', pos(2, 1)]],
    );

    const chasing = acceptedSnapshot(engine.attemptMove(DIRECTIONS.left));
    assert.deepEqual(
      chasing.enemies.map((enemy) => [enemy.lifecycle, enemy.position]),
      [['active', pos(2, 0)]],
    );
  });

  it('leaves a dormant enemy asleep while the player is not adjacent', () => {
    const engine = loadEngine(makeLevel({ enemies: [spawn(3, 3, 'purple', true)] }));

    const snapshot = acceptedSnapshot(engine.attemptMove(DIRECTIONS.upRight));

    assert.deepEqual(
      snapshot.enemies.map((enemy) => [enemy.lifecycle, enemy.position]),
      [['dormant', pos(3, 3)]],
    );
  });

  it('holds an enemy in mud for exactly one turn with the default duration', () => {
    const engine = loadEngine(makeLevel({ mud: [pos(1, 1)], enemies: [spawn(2, 1)] }));

    const trapped = acceptedSnapshot(engine.attemptMove(DIRECTIONS.up));
    const released = acceptedSnapshot(engine.attemptMove(DIRECTIONS.up));
    const chasing = acceptedSnapshot(engine.attemptMove(DIRECTIONS.up));

    assert.deepEqual(track(trapped), [['trapped', pos(1, 1), 1]]);
    assert.deepEqual(track(released), [['active', pos(1, 1), 0]]);
    assert.deepEqual(track(chasing), [['active', pos(1, 2), 0]]);
    assert.equal(chasing.status, 'playing');
  });

  it('holds an enemy for as many turns as the trap duration', () => {
    const engine = loadEngine(makeLevel({ trapDuration: 2, mud: [pos(1, 1)], enemies: [spawn(2, 1)] }));

    const snapshots = [DIRECTIONS.up, DIRECTIONS.up, DIRECTIONS.up, DIRECTIONS.right].map((direction) =>
      acceptedSnapshot(engine.attemptMove(direction)),
    );

    assert.deepEqual(snapshots.map(track), [
      [['trapped', pos(1, 1), 2]],
      [['trapped', pos(1, 1), 1]],
      [['active', pos(1, 1), 0]],
      [['active', pos(1, 2), 0]],
    ]);
  });

  it('blocks the player from an enemy released from mud this turn', () => {
    const engine = loadEngine(makeLevel({ mud: [pos(1, 1)], enemies: [spawn(2, 1)] }));
    acceptedSnapshot(engine.attemptMove(DIRECTIONS.up));
    const released = acceptedSnapshot(engine.attemptMove(DIRECTIONS.down));
    assert.deepEqual(track(released), [['active', pos(1, 1), 0]]);

    const outcome = engine.attemptMove(DIRECTIONS.upRight);

    assert.deepEqual(outcome, { type: 'rejected', reason: 'blockedByEnemy', target: pos(1, 1) });
    assert.equal(engine.snapshot().status, 'playing');
  });

  it('does not capture when an enemy lands on the player inside mud', () => {
    const engine = loadEngine(makeLevel({ mud: [pos(1, 0)], enemies: [spawn(2, 0)] }));

    const snapshot = acceptedSnapshot(engine.attemptMove(DIRECTIONS.right));

    assert.deepEqual(snapshot.player, pos(1, 0));
    assert.deepEqual(track(snapshot), [['trapped', pos(1, 0), 1]]);
    assert.equal(snapshot.status, 'playing');
  });
});

describe('sequential enemy movement', () => {
  const contested = (first: EnemySpawn, second: EnemySpawn): Snapshot => {
    const engine = loadEngine(
      makeLevel({ playerStart: pos(0, 3), obstacles: [pos(2, 2)], enemies: [first, second] }),
    );
    return acceptedSnapshot(engine.attemptMove(DIRECTIONS.down));
  };

  it('gives a contested cell to the enemy processed first and re-routes the other', () => {
    const snapshot = contested(spawn(2, 1, 'red'), spawn(1, 0, 'green'));

    assert.deepEqual(
      snapshot.enemies.map((enemy) => [enemy.id, enemy.position]),
      [
        ['enemy-0', pos(1, 1)],
        ['enemy-1', pos(0, 0)],
      ],
    );
  });

  it('changes the outcome when the creation order is swapped', () => {
    const snapshot = contested(spawn(1, 0, 'green'), spawn(2, 1, 'red'));

    assert.deepEqual(
      snapshot.enemies.map((enemy) => [enemy.id, enemy.position]),
      [
        ['enemy-0', pos(1, 1)],
        ['enemy-1', pos(2, 1)],
      ],
    );
  });
});
