import { applyTurn } from './apply-turn.js';
import type { Diagnostic } from './diagnostics.js';
import { hasErrorDiagnostics } from './diagnostics.js';
import { createInitialMatchState, DEFAULT_TRAP_DURATION, toSnapshot } from './entity-model.js';
import { createGridModel } from './grid-model.js';
import { KernelRuntimeError, type KernelRuntimeErrorContext } from './runtime-error.js';
import type { Direction, GridModel, GridPosition, LevelConfig, LevelRuntime, MatchState, MoveOutcome, Snapshot } from './types.js';
import { LevelConfigError, validateLevelConfig } from './validate-level.js';

export interface TurnEngineOptions {
  readonly trace?: boolean;
}

export type SetupLevelResult =
  | { readonly ok: true; readonly snapshot: Snapshot; readonly diagnostics: readonly Diagnostic[] }
  | { readonly ok: false; readonly error: LevelConfigError };

interface LoadedLevel {
  readonly runtime: LevelRuntime;
  readonly state: MatchState;
}

const copyPositions = (positions: readonly GridPosition[]): readonly GridPosition[] =>
  positions.map((position) => ({ x: position.x, y: position.y }));

/** Detached copy; the engine never keeps a reference the caller can still mutate. */
export const copyLevelConfig = (config: LevelConfig): LevelConfig => ({
  width: config.width,
  height: config.height,
  playerStart: { x: config.playerStart.x, y: config.playerStart.y },
  goal: { x: config.goal.x, y: config.goal.y },
  obstacles: copyPositions(config.obstacles),
  mud: copyPositions(config.mud),
  enemies: config.enemies.map((spawn) => ({
    position: { x: spawn.position.x, y: spawn.position.y },
    color: spawn.color,
    dormant: spawn.dormant,
  })),
  ...(config.trapDuration === undefined ? {} : { trapDuration: config.trapDuration }),
});

export const createLevelRuntime = (config: LevelConfig): LevelRuntime => ({
  config,
  grid: createGridModel(config),
  trapDuration: config.trapDuration ?? DEFAULT_TRAP_DURATION,
});

/**
 * Owns one level and its match state. Every mutation builds the next state in
 * full and swaps it in with a single assignment.
 */
export class TurnEngine {
  private readonly options: TurnEngineOptions;
  private loaded: LoadedLevel | null = null;

  constructor(options: TurnEngineOptions = {}) {
    this.options = options;
  }

  get isLoaded(): boolean {
    return this.loaded !== null;
  }

  get grid(): GridModel {
    return this.require('grid').runtime.grid;
  }

  get level(): LevelConfig {
    return copyLevelConfig(this.require('level').runtime.config);
  }

  /** Validates and stores a copy of `config`; later edits to the argument have no effect. */
  setupLevel(input: LevelConfig): SetupLevelResult {
    const config = copyLevelConfig(input);
    const diagnostics = validateLevelConfig(config);
    if (hasErrorDiagnostics(diagnostics)) {
      return { ok: false, error: new LevelConfigError(diagnostics) };
    }

    const runtime = createLevelRuntime(config);
    const state = createInitialMatchState(runtime);
    this.loaded = { runtime, state };
    return { ok: true, snapshot: toSnapshot(state), diagnostics };
  }

  attemptMove(direction: Direction): MoveOutcome {
    const loaded = this.require('attemptMove');
    const application = applyTurn(loaded.runtime, loaded.state, direction, { trace: this.options.trace === true });
    if (application.type === 'rejected') {
      return application;
    }

    this.loaded = { runtime: loaded.runtime, state: application.state };
    return {
      type: 'accepted',
      snapshot: toSnapshot(application.state),
      warnings: application.warnings,
      ...(application.trace === undefined ? {} : { trace: application.trace }),
    };
  }

  snapshot(): Snapshot {
    return toSnapshot(this.require('snapshot').state);
  }

  reset(): Snapshot {
    const { runtime } = this.require('reset');
    const state = createInitialMatchState(runtime);
    this.loaded = { runtime, state };
    return toSnapshot(state);
  }

  private require(operation: KernelRuntimeErrorContext<'LEVEL_NOT_LOADED'>['operation']): LoadedLevel {
    if (this.loaded === null) {
      throw new KernelRuntimeError('LEVEL_NOT_LOADED', `Cannot ${operation} before a level is loaded`, { operation });
    }
    return this.loaded;
  }
}
