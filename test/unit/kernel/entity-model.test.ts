import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  activateEnemy,
  countDownTrap,
  createEnemies,
  createInitialMatchState,
  createLevelRuntime,
  isKernelErrorCode,
  moveEnemy,
  purifyEnemy,
  toSnapshot,
  trapEnemy,
} from '../../../src/kernel/index.js';
import { makeLevel, pos, spawn } from '../../helpers/level-fixtures.js';

describe('entity model', () => {
  it('creates enemies in spawn order with stable ids', () => {
    const enemies = createEnemies([spawn(1, 1, 'red'), spawn(2, 2, 'green', true)]);

    assert.deepEqual(
      enemies.map((enemy) => [enemy.id, enemy.ordinal, enemy.color, enemy.lifecycle]),
      [
        ['enemy-0', 0, 'red', 'active'],
        ['enemy-1', 1, 'green', 'dormant'],
      ],
    );
  });

  it('builds the initial match state from a copy of the configuration', () => {
    const config = makeLevel({ playerStart: pos(1, 0), enemies: [spawn(3, 3)] });
    const state = createInitialMatchState(createLevelRuntime(config));

    assert.deepEqual(state.player, pos(1, 0));
    assert.notEqual(state.player, config.playerStart);
    assert.equal(state.status, 'playing');
    assert.equal(state.turnCount, 0);
    assert.equal(state.enemies.length, 1);
  });

  it('walks an enemy through dormant, active, trapped, and purified', () => {
    const [dormant] = createEnemies([spawn(1, 1, 'purple', true)]);
    assert.ok(dormant !== undefined);

    const active = activateEnemy(dormant);
    assert.equal(active.lifecycle, 'active');

    const trapped = trapEnemy(moveEnemy(active, pos(1, 2)), 2);
    assert.deepEqual([trapped.lifecycle, trapped.trappedTurnsRemaining, trapped.position], ['trapped', 2, pos(1, 2)]);

    const first = countDownTrap(trapped);
    const released = countDownTrap(first);
    assert.deepEqual(
      [first, released].map((enemy) => [enemy.lifecycle, enemy.trappedTurnsRemaining]),
      [
        ['trapped', 1],
        ['active', 0],
      ],
    );
    assert.throws(() => countDownTrap(released), (error: unknown) => isKernelErrorCode(error, 'ENEMY_TRANSITION_INVALID'));

    assert.equal(purifyEnemy(released).lifecycle, 'purified');
  });

  it('rejects transitions the state machine does not allow', () => {
    const [active] = createEnemies([spawn(1, 1)]);
    assert.ok(active !== undefined);

    assert.throws(
      () => activateEnemy(active),
      (error: unknown) =>
        isKernelErrorCode(error, 'ENEMY_TRANSITION_INVALID')
        && error.context?.from === 'active'
        && error.context.to === 'active',
    );
    assert.throws(() => countDownTrap(active), (error: unknown) => isKernelErrorCode(error, 'ENEMY_TRANSITION_INVALID'));

    const purified = purifyEnemy(active);
    assert.throws(() => purifyEnemy(purified), (error: unknown) => isKernelErrorCode(error, 'ENEMY_TRANSITION_INVALID'));
    assert.throws(() => trapEnemy(purified, 1), (error: unknown) => isKernelErrorCode(error, 'ENEMY_TRANSITION_INVALID'));
  });

  it('leaves purified enemies out of snapshots', () => {
    const config = makeLevel({ enemies: [spawn(1, 1), spawn(3, 3, 'green')] });
    const state = createInitialMatchState(createLevelRuntime(config));
    const [first, second] = state.enemies;
    assert.ok(first !== undefined && second !== undefined);

    const snapshot = toSnapshot({ ...state, enemies: [purifyEnemy(first), second] });

    assert.deepEqual(snapshot, {
      turnCount: 0,
      player: pos(0, 0),
      enemies: [
        { id: 'enemy-1', color: 'green', position: pos(3, 3), lifecycle: 'active', trappedTurnsRemaining: 0 },
      ],
      status: 'playing',
    });
  });
});
