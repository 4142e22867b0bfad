import { isDeepStrictEqual } from 'node:util';
import { TurnEngine } from './turn-engine.js';
import type { Direction, LevelConfig, Snapshot } from './types.js';

/**
 * Plays `directions` on a fresh engine and returns the snapshot after setup
 * followed by one snapshot per attempted move. Rejected moves repeat the previous
 * snapshot. Stops early once the match is over.
 */
export const replaySnapshots = (config: LevelConfig, directions: readonly Direction[]): readonly Snapshot[] => {
  const engine = new TurnEngine();
  const setup = engine.setupLevel(config);
  if (!setup.ok) {
    throw setup.error;
  }

  const snapshots: Snapshot[] = [setup.snapshot];
  for (const direction of directions) {
    if (engine.snapshot().status !== 'playing') {
      break;
    }
    const outcome = engine.attemptMove(direction);
    snapshots.push(outcome.type === 'accepted' ? outcome.snapshot : engine.snapshot());
  }
  return snapshots;
};

export const assertDeterministicReplay = (
  config: LevelConfig,
  directions: readonly Direction[],
  compare: (a: readonly Snapshot[], b: readonly Snapshot[]) => boolean = (a, b) => isDeepStrictEqual(a, b),
): void => {
  const first = replaySnapshots(config, directions);
  const second = replaySnapshots(config, directions);

  if (!compare(first, second)) {
    throw new Error(`Determinism assertion failed for a replay of ${directions.length} move(s)`);
  }
};
