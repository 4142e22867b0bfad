import type { Diagnostic } from './diagnostics.js';
import { ENEMY_COLORS, isEnemyColor } from './enemy-colors.js';
import { positionKey } from './grid-model.js';
import type { GridPosition, LevelConfig } from './types.js';

export interface ValidateLevelConfigOptions {
  readonly pathPrefix?: string;
  readonly assetPath?: string;
  readonly entityId?: string;
}

export class LevelConfigError extends Error {
  readonly diagnostics: readonly Diagnostic[];

  constructor(diagnostics: readonly Diagnostic[]) {
    const errors = diagnostics.filter((diagnostic) => diagnostic.severity === 'error');
    super(
      `Level configuration rejected with ${errors.length} error(s): ${errors
        .map((diagnostic) => `${diagnostic.path}: ${diagnostic.message}`)
        .join('; ')}`,
    );
    this.name = 'LevelConfigError';
    this.diagnostics = diagnostics;
  }
}

const isPositiveInteger = (value: number): boolean => Number.isSafeInteger(value) && value > 0;

const formatPosition = (position: GridPosition): string => `(${position.x}, ${position.y})`;

export function validateLevelConfig(config: LevelConfig, options: ValidateLevelConfigOptions = {}): readonly Diagnostic[] {
  const prefix = options.pathPrefix ?? 'level';
  const context = {
    ...(options.assetPath === undefined ? {} : { assetPath: options.assetPath }),
    ...(options.entityId === undefined ? {} : { entityId: options.entityId }),
  };
  const diagnostics: Diagnostic[] = [];

  const dimensionsValid = (['width', 'height'] as const).every((dimension) => {
    if (isPositiveInteger(config[dimension])) {
      return true;
    }
    diagnostics.push({
      code: 'LEVEL_DIMENSION_INVALID',
      path: `${prefix}.${dimension}`,
      severity: 'error',
      message: `Grid ${dimension} must be a positive integer, received ${String(config[dimension])}.`,
      ...context,
    });
    return false;
  });
  if (!dimensionsValid) {
    return diagnostics;
  }

  const checkPosition = (position: GridPosition, path: string): boolean => {
    if (!Number.isInteger(position.x) || !Number.isInteger(position.y)) {
      diagnostics.push({
        code: 'LEVEL_POSITION_INVALID',
        path,
        severity: 'error',
        message: `Position ${formatPosition(position)} must have integer coordinates.`,
        ...context,
      });
      return false;
    }
    if (position.x < 0 || position.x >= config.width || position.y < 0 || position.y >= config.height) {
      diagnostics.push({
        code: 'LEVEL_POSITION_OUT_OF_BOUNDS',
        path,
        severity: 'error',
        message: `Position ${formatPosition(position)} is outside the ${config.width}x${config.height} grid.`,
        suggestion: `Use coordinates with 0 <= x < ${config.width} and 0 <= y < ${config.height}.`,
        ...context,
      });
      return false;
    }
    return true;
  };

  const collectCells = (positions: readonly GridPosition[], field: 'obstacles' | 'mud'): ReadonlySet<string> => {
    const cells = new Set<string>();
    positions.forEach((position, index) => {
      const path = `${prefix}.${field}[${index}]`;
      if (!checkPosition(position, path)) {
        return;
      }
      const key = positionKey(position);
      if (cells.has(key)) {
        diagnostics.push({
          code: 'LEVEL_DUPLICATE_CELL',
          path,
          severity: 'warning',
          message: `${field} lists ${formatPosition(position)} more than once.`,
          suggestion: `Keep a single ${formatPosition(position)} entry in ${field}.`,
          ...context,
        });
      }
      cells.add(key);
    });
    return cells;
  };

  const playerStartValid = checkPosition(config.playerStart, `${prefix}.playerStart`);
  const goalValid = checkPosition(config.goal, `${prefix}.goal`);
  const obstacles = collectCells(config.obstacles, 'obstacles');
  collectCells(config.mud, 'mud');

  if (goalValid && obstacles.has(positionKey(config.goal))) {
    diagnostics.push({
      code: 'LEVEL_GOAL_ON_OBSTACLE',
      path: `${prefix}.goal`,
      severity: 'error',
      message: `Goal ${formatPosition(config.goal)} sits on an obstacle and can never be reached.`,
      ...context,
    });
  }

  config.mud.forEach((position, index) => {
    if (obstacles.has(positionKey(position))) {
      diagnostics.push({
        code: 'LEVEL_MUD_ON_OBSTACLE',
        path: `${prefix}.mud[${index}]`,
        severity: 'warning',
        message: `Mud at ${formatPosition(position)} is covered by an obstacle and has no effect.`,
        ...context,
      });
    }
  });

  if (config.trapDuration !== undefined && !isPositiveInteger(config.trapDuration)) {
    diagnostics.push({
      code: 'LEVEL_TRAP_DURATION_INVALID',
      path: `${prefix}.trapDuration`,
      severity: 'error',
      message: `trapDuration must be a positive integer, received ${String(config.trapDuration)}.`,
      ...context,
    });
  }

  if (config.enemies.length === 0) {
    diagnostics.push({
      code: 'LEVEL_NO_ENEMIES',
      path: `${prefix}.enemies`,
      severity: 'warning',
      message: 'Level has no enemies; the first accepted move wins.',
      ...context,
    });
  }

  const spawnColorsByCell = new Map<string, string>();
  config.enemies.forEach((spawn, index) => {
    const path = `${prefix}.enemies[${index}]`;
    if (!isEnemyColor(spawn.color)) {
      diagnostics.push({
        code: 'LEVEL_ENEMY_COLOR_UNKNOWN',
        path: `${path}.color`,
        severity: 'error',
        message: `Unknown enemy color "${String(spawn.color)}".`,
        alternatives: [...ENEMY_COLORS],
        ...context,
      });
    }
    if (!checkPosition(spawn.position, `${path}.position`)) {
      return;
    }

    const key = positionKey(spawn.position);
    if (obstacles.has(key)) {
      diagnostics.push({
        code: 'LEVEL_ENEMY_ON_OBSTACLE',
        path: `${path}.position`,
        severity: 'error',
        message: `Enemy spawn ${formatPosition(spawn.position)} sits on an obstacle.`,
        ...context,
      });
    }
    if (playerStartValid && key === positionKey(config.playerStart)) {
      diagnostics.push({
        code: 'LEVEL_PLAYER_START_OCCUPIED',
        path: `${path}.position`,
        severity: 'error',
        message: `Enemy spawn ${formatPosition(spawn.position)} overlaps the player start.`,
        ...context,
      });
    }
    if (goalValid && key === positionKey(config.goal)) {
      diagnostics.push({
        code: 'LEVEL_ENEMY_ON_GOAL',
        path: `${path}.position`,
        severity: 'warning',
        message: `Enemy spawn ${formatPosition(spawn.position)} is on the goal and is purified after the first move.`,
        ...context,
      });
    }

    const existingColor = spawnColorsByCell.get(key);
    if (existingColor === undefined) {
      spawnColorsByCell.set(key, spawn.color);
    } else if (existingColor !== spawn.color) {
      diagnostics.push({
        code: 'LEVEL_MIXED_COLOR_SPAWN',
        path: `${path}.position`,
        severity: 'error',
        message: `Enemies of colors "${existingColor}" and "${spawn.color}" cannot spawn on the same cell ${formatPosition(spawn.position)}.`,
        ...context,
      });
    } else {
      diagnostics.push({
        code: 'LEVEL_STACKED_SPAWN',
        path: `${path}.position`,
        severity: 'warning',
        message: `Several "${spawn.color}" enemies spawn on ${formatPosition(spawn.position)}; they merge after the first move.`,
        ...context,
      });
    }
  });

  return diagnostics;
}
