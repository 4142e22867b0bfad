import type { EnemyLifecycle, EnemyState, MatchState, MatchStatus } from './types.js';

export type KernelRuntimeErrorCode =
  | 'LEVEL_NOT_LOADED'
  | 'LEVEL_INDEX_OUT_OF_RANGE'
  | 'MATCH_NOT_PLAYING'
  | 'INVALID_DIRECTION'
  | 'ENEMY_TRANSITION_INVALID';

export interface KernelRuntimeErrorContextByCode {
  readonly LEVEL_NOT_LOADED: Readonly<{
    readonly operation: 'attemptMove' | 'snapshot' | 'reset' | 'grid' | 'level' | 'reloadCurrentLevel';
  }>;
  readonly LEVEL_INDEX_OUT_OF_RANGE: Readonly<{
    readonly index: number;
    readonly totalLevels: number;
  }>;
  readonly MATCH_NOT_PLAYING: Readonly<{
    readonly status: Exclude<MatchStatus, 'playing'>;
    readonly turnCount: number;
  }>;
  readonly INVALID_DIRECTION: Readonly<{
    readonly dx: number;
    readonly dy: number;
  }>;
  readonly ENEMY_TRANSITION_INVALID: Readonly<{
    readonly enemyId: EnemyState['id'];
    readonly from: EnemyLifecycle;
    readonly to: EnemyLifecycle;
  }>;
}

export type KernelRuntimeErrorContext<C extends KernelRuntimeErrorCode = KernelRuntimeErrorCode> =
  KernelRuntimeErrorContextByCode[C];

function formatMessage<C extends KernelRuntimeErrorCode>(message: string, context?: KernelRuntimeErrorContext<C>): string {
  if (context === undefined) {
    return message;
  }
  return `${message} context=${JSON.stringify(context)}`;
}

export class KernelRuntimeError<C extends KernelRuntimeErrorCode = KernelRuntimeErrorCode> extends Error {
  readonly code: C;
  readonly context?: KernelRuntimeErrorContext<C>;

  constructor(code: C, message: string, context?: KernelRuntimeErrorContext<C>, cause?: unknown) {
    super(formatMessage(message, context), cause === undefined ? undefined : { cause });
    this.name = 'KernelRuntimeError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
  }
}

export const kernelRuntimeError = <C extends KernelRuntimeErrorCode>(
  code: C,
  message: string,
  context?: KernelRuntimeErrorContext<C>,
  cause?: unknown,
): KernelRuntimeError<C> => new KernelRuntimeError(code, message, context, cause);

export function assertMatchPlaying(state: MatchState): void {
  if (state.status === 'playing') {
    return;
  }
  throw new KernelRuntimeError(
    'MATCH_NOT_PLAYING',
    `Cannot attempt a move after the match has ended (status=${state.status})`,
    { status: state.status, turnCount: state.turnCount },
  );
}

export const enemyTransitionError = (
  enemy: EnemyState,
  to: EnemyLifecycle,
): KernelRuntimeError<'ENEMY_TRANSITION_INVALID'> =>
  new KernelRuntimeError(
    'ENEMY_TRANSITION_INVALID',
    `Enemy ${String(enemy.id)} cannot go from ${enemy.lifecycle} to ${to}`,
    { enemyId: enemy.id, from: enemy.lifecycle, to },
  );

export function isKernelRuntimeError(error: unknown): error is KernelRuntimeError {
  return error instanceof KernelRuntimeError;
}

export function isKernelErrorCode<C extends KernelRuntimeErrorCode>(
  error: unknown,
  code: C,
): error is KernelRuntimeError<C> {
  return isKernelRuntimeError(error) && error.code === code;
}
