import { KernelRuntimeError } from '../kernel/index.js';
import type { LevelDef, SetupLevelResult, TurnEngine } from '../kernel/index.js';

export interface LevelLoaded {
  readonly type: 'loaded';
  readonly index: number;
  readonly level: LevelDef;
  readonly setup: SetupLevelResult;
}

export interface LevelsCompleted {
  readonly type: 'completed';
}

export interface LevelUnchanged {
  readonly type: 'unchanged';
}

/**
 * Walks an ordered list of levels on one engine. The engine is supplied by the
 * host; the session never creates its own.
 */
export class LevelSession {
  readonly engine: TurnEngine;
  private readonly levels: readonly LevelDef[];
  private index: number | null = null;

  constructor(levels: readonly LevelDef[], engine: TurnEngine) {
    this.levels = levels;
    this.engine = engine;
  }

  get totalLevels(): number {
    return this.levels.length;
  }

  get currentIndex(): number | null {
    return this.index;
  }

  get currentLevel(): LevelDef | null {
    return this.index === null ? null : this.levels[this.index] ?? null;
  }

  get isLastLevel(): boolean {
    return this.index !== null && this.index === this.levels.length - 1;
  }

  /** The session index only moves when the engine accepts the level. */
  loadLevel(index: number): LevelLoaded {
    const level = Number.isSafeInteger(index) ? this.levels[index] : undefined;
    if (level === undefined) {
      throw new KernelRuntimeError('LEVEL_INDEX_OUT_OF_RANGE', `No level at index ${String(index)}`, {
        index,
        totalLevels: this.levels.length,
      });
    }

    const setup = this.engine.setupLevel(level.config);
    if (setup.ok) {
      this.index = index;
    }
    return { type: 'loaded', index, level, setup };
  }

  nextLevel(): LevelLoaded | LevelsCompleted {
    const next = this.index === null ? 0 : this.index + 1;
    if (next >= this.levels.length) {
      return { type: 'completed' };
    }
    return this.loadLevel(next);
  }

  previousLevel(): LevelLoaded | LevelUnchanged {
    if (this.index === null || this.index === 0) {
      return { type: 'unchanged' };
    }
    return this.loadLevel(this.index - 1);
  }

  reloadCurrentLevel(): LevelLoaded {
    if (this.index === null) {
      throw new KernelRuntimeError('LEVEL_NOT_LOADED', 'Cannot reloadCurrentLevel before a level is loaded', {
        operation: 'reloadCurrentLevel',
      });
    }
    return this.loadLevel(this.index);
  }
}
