import { TurnEngine } from '../kernel/index.js';
import type { Direction, LevelConfig, MoveOutcome, Snapshot } from '../kernel/index.js';
import { computeSnapshotDeltas, type SnapshotDelta } from './delta.js';
import type { TurnLogger } from './turn-logger.js';

export type ReplayStopReason = 'terminal' | 'exhausted' | 'maxTurns';

export interface ReplayStep {
  readonly direction: Direction;
  readonly outcome: MoveOutcome;
  readonly snapshot: Snapshot;
  readonly deltas: readonly SnapshotDelta[];
}

export interface ReplayTrace {
  readonly initial: Snapshot;
  readonly steps: readonly ReplayStep[];
  readonly final: Snapshot;
  readonly stopReason: ReplayStopReason;
}

export interface ReplayOptions {
  readonly maxTurns?: number;
  readonly trace?: boolean;
  readonly logger?: TurnLogger;
  readonly label?: string;
}

const validateMaxTurns = (maxTurns: number): void => {
  if (!Number.isSafeInteger(maxTurns)) {
    throw new RangeError(`maxTurns must be a safe integer, received ${String(maxTurns)}`);
  }
  if (maxTurns < 0) {
    throw new RangeError(`maxTurns must be a non-negative safe integer, received ${String(maxTurns)}`);
  }
};

/**
 * Drives a fresh engine through `directions`. Rejected moves count as steps.
 * Throws the setup `LevelConfigError` when `config` is invalid.
 */
export const runReplay = (
  config: LevelConfig,
  directions: readonly Direction[],
  options: ReplayOptions = {},
): ReplayTrace => {
  const maxTurns = options.maxTurns ?? directions.length;
  validateMaxTurns(maxTurns);

  const engine = new TurnEngine({ trace: options.trace === true });
  const setup = engine.setupLevel(config);
  if (!setup.ok) {
    throw setup.error;
  }

  const { logger } = options;
  logger?.logLevelStart(options.label ?? 'replay', setup.snapshot);

  const steps: ReplayStep[] = [];
  let current = setup.snapshot;
  let stopReason: ReplayStopReason = 'exhausted';

  for (const direction of directions) {
    if (current.status !== 'playing') {
      stopReason = 'terminal';
      break;
    }
    if (steps.length >= maxTurns) {
      stopReason = 'maxTurns';
      break;
    }

    const outcome = engine.attemptMove(direction);
    const snapshot = outcome.type === 'accepted' ? outcome.snapshot : current;
    const deltas = computeSnapshotDeltas(current, snapshot);
    steps.push({ direction, outcome, snapshot, deltas });
    logger?.logTurn({ step: steps.length, direction, outcome, deltas });
    if (outcome.type === 'accepted') {
      logger?.logWarnings(outcome.warnings);
    }
    current = snapshot;
  }

  if (stopReason === 'exhausted' && current.status !== 'playing') {
    stopReason = 'terminal';
  }
  if (stopReason === 'terminal') {
    logger?.logMatchEnd(current);
  }

  return {
    initial: setup.snapshot,
    steps,
    final: current,
    stopReason,
  };
};
