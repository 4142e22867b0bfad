import type { ExecutionOptions, RuntimeWarning, TurnTraceEntry } from './types.js';

/** Per-turn sink for warnings and, when tracing is on, the ordered trace. */
export interface TurnCollector {
  readonly warnings: RuntimeWarning[];
  readonly trace: TurnTraceEntry[] | null;
}

export interface TurnOutput {
  readonly warnings: readonly RuntimeWarning[];
  readonly trace?: readonly TurnTraceEntry[];
}

export function createTurnCollector(options?: ExecutionOptions): TurnCollector {
  return {
    warnings: [],
    trace: options?.trace === true ? [] : null,
  };
}

export function emitWarning(collector: TurnCollector | undefined, warning: RuntimeWarning): void {
  if (collector === undefined) return;
  collector.warnings.push(warning);
}

export function emitTrace(collector: TurnCollector | undefined, entry: TurnTraceEntry): void {
  if (collector === undefined || collector.trace === null) return;
  collector.trace.push(entry);
}

// Untraced turns carry no `trace` key at all.
export const turnOutput = (collector: TurnCollector): TurnOutput => ({
  warnings: [...collector.warnings],
  ...(collector.trace === null ? {} : { trace: [...collector.trace] }),
});
