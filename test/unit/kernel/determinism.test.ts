import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { assertDeterministicReplay, DIRECTIONS, replaySnapshots } from '../../../src/kernel/index.js';
import { makeLevel, pos, spawn } from '../../helpers/level-fixtures.js';

describe('deterministic replay', () => {
  it('records one snapshot per attempted move and repeats it on rejection', () => {
    const snapshots = replaySnapshots(makeLevel({ enemies: [spawn(4, 0, 'red', true)] }), [
      DIRECTIONS.left,
      DIRECTIONS.up,
    ]);

    assert.equal(snapshots.length, 3);
    assert.deepEqual(snapshots[1], snapshots[0]);
    assert.deepEqual(snapshots[2]?.player, pos(0, 1));
    assert.equal(snapshots[2]?.turnCount, 1);
  });

  it('stops once the match is over', () => {
    const snapshots = replaySnapshots(makeLevel(), [DIRECTIONS.up, DIRECTIONS.up, DIRECTIONS.up]);

    assert.deepEqual(
      snapshots.map((snapshot) => snapshot.status),
      ['playing', 'won'],
    );
  });

  it('passes for identical replays and fails when the comparison disagrees', () => {
    const config = makeLevel({ obstacles: [pos(2, 2)], mud: [pos(1, 3)], enemies: [spawn(3, 3), spawn(0, 4, 'green')] });
    const moves = [DIRECTIONS.right, DIRECTIONS.up, DIRECTIONS.upRight, DIRECTIONS.left];

    assert.doesNotThrow(() => assertDeterministicReplay(config, moves));
    assert.throws(
      () => assertDeterministicReplay(config, moves, () => false),
      /^Error: Determinism assertion failed for a replay of 4 move\(s\)$/,
    );
  });
});
