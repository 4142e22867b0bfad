import type { EnemyId, LevelId } from './branded.js';
import type { EnemyColor } from './enemy-colors.js';

// ── Grid ──────────────────────────────────────────────────

export interface GridPosition {
  readonly x: number;
  readonly y: number;
}

export type DirectionComponent = -1 | 0 | 1;

export interface Direction {
  readonly dx: DirectionComponent;
  readonly dy: DirectionComponent;
}

export type DirectionName =
  | 'up'
  | 'down'
  | 'left'
  | 'right'
  | 'upLeft'
  | 'upRight'
  | 'downLeft'
  | 'downRight';

export interface GridModel {
  readonly width: number;
  readonly height: number;
  readonly goal: GridPosition;
  readonly obstacles: ReadonlySet<string>;
  readonly mud: ReadonlySet<string>;
}

// ── Level configuration ───────────────────────────────────

export interface EnemySpawn {
  readonly position: GridPosition;
  readonly color: EnemyColor;
  readonly dormant: boolean;
}

export interface LevelConfig {
  readonly width: number;
  readonly height: number;
  readonly playerStart: GridPosition;
  readonly goal: GridPosition;
  readonly obstacles: readonly GridPosition[];
  readonly mud: readonly GridPosition[];
  readonly enemies: readonly EnemySpawn[];
  readonly trapDuration?: number;
}

export interface LevelMetadata {
  readonly id: LevelId;
  readonly name: string;
  readonly number: number;
  readonly minMoves?: number;
}

export interface LevelDef {
  readonly metadata: LevelMetadata;
  readonly config: LevelConfig;
}

export interface LevelRuntime {
  readonly config: LevelConfig;
  readonly grid: GridModel;
  readonly trapDuration: number;
}

// ── Entities and match state ──────────────────────────────

export type EnemyLifecycle = 'dormant' | 'active' | 'trapped' | 'purified';

export type LiveEnemyLifecycle = Exclude<EnemyLifecycle, 'purified'>;

export interface EnemyState {
  readonly id: EnemyId;
  readonly ordinal: number;
  readonly color: EnemyColor;
  readonly position: GridPosition;
  readonly lifecycle: EnemyLifecycle;
  readonly trappedTurnsRemaining: number;
}

export interface LiveEnemyState extends EnemyState {
  readonly lifecycle: LiveEnemyLifecycle;
}

export type MatchStatus = 'playing' | 'won' | 'lost';

export interface MatchState {
  readonly player: GridPosition;
  readonly enemies: readonly EnemyState[];
  readonly status: MatchStatus;
  readonly turnCount: number;
}

export interface EnemySnapshot {
  readonly id: EnemyId;
  readonly color: EnemyColor;
  readonly position: GridPosition;
  readonly lifecycle: LiveEnemyLifecycle;
  readonly trappedTurnsRemaining: number;
}

export interface Snapshot {
  readonly turnCount: number;
  readonly player: GridPosition;
  readonly enemies: readonly EnemySnapshot[];
  readonly status: MatchStatus;
}

// ── Runtime warnings ──────────────────────────────────────

export type RuntimeWarningCode = 'MIXED_COLOR_COLLISION';

export interface RuntimeWarning {
  readonly code: RuntimeWarningCode;
  readonly message: string;
  readonly context: Readonly<Record<string, unknown>>;
  readonly hint?: string;
}

// ── Turn execution trace ──────────────────────────────────

export interface TurnTracePlayerMove {
  readonly kind: 'playerMove';
  readonly from: GridPosition;
  readonly to: GridPosition;
}

export interface TurnTraceTrapCountdown {
  readonly kind: 'trapCountdown';
  readonly enemyId: EnemyId;
  readonly remaining: number;
}

export interface TurnTraceTrapRelease {
  readonly kind: 'trapRelease';
  readonly enemyId: EnemyId;
  readonly at: GridPosition;
}

export interface TurnTraceActivate {
  readonly kind: 'activate';
  readonly enemyId: EnemyId;
  readonly at: GridPosition;
}

export interface TurnTraceEnemyMove {
  readonly kind: 'enemyMove';
  readonly enemyId: EnemyId;
  readonly from: GridPosition;
  readonly to: GridPosition;
}

export interface TurnTraceTrap {
  readonly kind: 'trap';
  readonly enemyId: EnemyId;
  readonly at: GridPosition;
  readonly turns: number;
}

export interface TurnTraceMerge {
  readonly kind: 'merge';
  readonly survivorId: EnemyId;
  readonly absorbedIds: readonly EnemyId[];
  readonly at: GridPosition;
}

export type PurifyCause = 'goal' | 'merge';

export interface TurnTracePurify {
  readonly kind: 'purify';
  readonly enemyId: EnemyId;
  readonly at: GridPosition;
  readonly cause: PurifyCause;
}

export interface TurnTraceMatchEnd {
  readonly kind: 'matchEnd';
  readonly status: Exclude<MatchStatus, 'playing'>;
  readonly turnCount: number;
}

export type TurnTraceEntry =
  | TurnTracePlayerMove
  | TurnTraceTrapCountdown
  | TurnTraceTrapRelease
  | TurnTraceActivate
  | TurnTraceEnemyMove
  | TurnTraceTrap
  | TurnTraceMerge
  | TurnTracePurify
  | TurnTraceMatchEnd;

export interface ExecutionOptions {
  readonly trace?: boolean;
}

// ── Move outcomes ─────────────────────────────────────────

export type MoveRejectionReason = 'outOfBounds' | 'blockedByEnemy';

export interface RejectedMove {
  readonly type: 'rejected';
  readonly reason: MoveRejectionReason;
  readonly target: GridPosition;
}

export interface AcceptedTurn {
  readonly type: 'accepted';
  readonly state: MatchState;
  readonly warnings: readonly RuntimeWarning[];
  readonly trace?: readonly TurnTraceEntry[];
}

export type TurnApplication = RejectedMove | AcceptedTurn;

export interface AcceptedMove {
  readonly type: 'accepted';
  readonly snapshot: Snapshot;
  readonly warnings: readonly RuntimeWarning[];
  readonly trace?: readonly TurnTraceEntry[];
}

export type MoveOutcome = RejectedMove | AcceptedMove;
