import type {
  Direction,
  MoveOutcome,
  RuntimeWarning,
  Snapshot,
  TurnTraceEntry,
} from '../kernel/index.js';
import type { SnapshotDelta } from './delta.js';

// ---------------------------------------------------------------------------
// Console abstraction (for testing)
// ---------------------------------------------------------------------------

export interface LoggerConsole {
  group(...args: unknown[]): void;
  groupEnd(): void;
  log(...args: unknown[]): void;
  table(data: unknown): void;
}

// ---------------------------------------------------------------------------
// Logger interface
// ---------------------------------------------------------------------------

export interface TurnLogEntry {
  readonly step: number;
  readonly direction: Direction;
  readonly outcome: MoveOutcome;
  readonly deltas: readonly SnapshotDelta[];
}

export interface TurnLogger {
  readonly enabled: boolean;
  setEnabled(enabled: boolean): void;
  logLevelStart(label: string, snapshot: Snapshot): void;
  logTurn(entry: TurnLogEntry): void;
  logWarnings(warnings: readonly RuntimeWarning[]): void;
  logMatchEnd(snapshot: Snapshot): void;
}

// ---------------------------------------------------------------------------
// Summary helpers (exported for direct testing)
// ---------------------------------------------------------------------------

export interface TraceEntrySummary {
  readonly kind: TurnTraceEntry['kind'];
  readonly enemyId?: string;
  readonly from?: string;
  readonly to?: string;
  readonly detail?: string;
}

const formatPosition = (position: { readonly x: number; readonly y: number }): string => `${position.x},${position.y}`;

export const formatDirection = (direction: Direction): string => `(${direction.dx},${direction.dy})`;

export function summarizeTraceEntries(entries: readonly TurnTraceEntry[]): readonly TraceEntrySummary[] {
  return entries.map((entry): TraceEntrySummary => {
    switch (entry.kind) {
      case 'playerMove':
        return { kind: entry.kind, from: formatPosition(entry.from), to: formatPosition(entry.to) };
      case 'enemyMove':
        return { kind: entry.kind, enemyId: entry.enemyId, from: formatPosition(entry.from), to: formatPosition(entry.to) };
      case 'trapCountdown':
        return { kind: entry.kind, enemyId: entry.enemyId, detail: `remaining=${entry.remaining}` };
      case 'trap':
        return { kind: entry.kind, enemyId: entry.enemyId, to: formatPosition(entry.at), detail: `turns=${entry.turns}` };
      case 'trapRelease':
      case 'activate':
        return { kind: entry.kind, enemyId: entry.enemyId, to: formatPosition(entry.at) };
      case 'merge':
        return {
          kind: entry.kind,
          enemyId: entry.survivorId,
          to: formatPosition(entry.at),
          detail: `absorbed=${entry.absorbedIds.join(',')}`,
        };
      case 'purify':
        return { kind: entry.kind, enemyId: entry.enemyId, to: formatPosition(entry.at), detail: `cause=${entry.cause}` };
      case 'matchEnd':
        return { kind: entry.kind, detail: `status=${entry.status} turn=${entry.turnCount}` };
    }
  });
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface CreateTurnLoggerOptions {
  readonly console?: LoggerConsole;
  readonly enabled?: boolean;
}

export function createTurnLogger(options?: CreateTurnLoggerOptions): TurnLogger {
  const cons: LoggerConsole = options?.console ?? globalThis.console;
  let enabled = options?.enabled ?? false;

  return {
    get enabled(): boolean {
      return enabled;
    },

    setEnabled(value: boolean): void {
      enabled = value;
    },

    logLevelStart(label: string, snapshot: Snapshot): void {
      if (!enabled) return;
      cons.log(`[Level] ${label}: player ${formatPosition(snapshot.player)}, ${snapshot.enemies.length} enemies`);
    },

    logTurn(entry: TurnLogEntry): void {
      if (!enabled) return;
      const { outcome } = entry;
      if (outcome.type === 'rejected') {
        cons.log(`[Turn ${entry.step}] ${formatDirection(entry.direction)} rejected: ${outcome.reason} at ${formatPosition(outcome.target)}`);
        return;
      }
      cons.group(`[Turn ${entry.step}] ${formatDirection(entry.direction)} accepted (turn ${outcome.snapshot.turnCount}, ${outcome.snapshot.status})`);
      if (outcome.trace !== undefined) {
        cons.table(summarizeTraceEntries(outcome.trace));
      }
      if (entry.deltas.length > 0) {
        cons.table(entry.deltas);
      }
      cons.groupEnd();
    },

    logWarnings(warnings: readonly RuntimeWarning[]): void {
      if (!enabled) return;
      for (const warning of warnings) {
        cons.log(`[Warn] ${warning.code}: ${warning.message}`);
      }
    },

    logMatchEnd(snapshot: Snapshot): void {
      if (!enabled) return;
      cons.log(`[Match] ${snapshot.status} after ${snapshot.turnCount} turns`);
    },
  };
}
