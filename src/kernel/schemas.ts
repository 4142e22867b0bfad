import { z } from 'zod';
import { asLevelId } from './branded.js';
import { ENEMY_COLORS } from './enemy-colors.js';

export const IntegerSchema = z.number().int();
export const StringSchema = z.string();

export const GridPositionSchema = z
  .object({
    x: IntegerSchema,
    y: IntegerSchema,
  })
  .strict();

export const EnemyColorSchema = z.enum(ENEMY_COLORS);

export const EnemySpawnSchema = z
  .object({
    position: GridPositionSchema,
    color: EnemyColorSchema,
    dormant: z.boolean().default(false),
  })
  .strict();

export const LevelConfigSchema = z
  .object({
    width: IntegerSchema.positive(),
    height: IntegerSchema.positive(),
    playerStart: GridPositionSchema,
    goal: GridPositionSchema,
    obstacles: z.array(GridPositionSchema).default([]),
    mud: z.array(GridPositionSchema).default([]),
    enemies: z.array(EnemySpawnSchema),
    trapDuration: IntegerSchema.positive().optional(),
  })
  .strict();

export const LevelMetadataSchema = z
  .object({
    id: StringSchema.trim().min(1).transform(asLevelId),
    name: StringSchema.min(1),
    number: IntegerSchema.nonnegative(),
    minMoves: IntegerSchema.positive().optional(),
  })
  .strict();

export const LevelDocumentSchema = z
  .object({
    metadata: LevelMetadataSchema,
    level: LevelConfigSchema,
  })
  .strict();

export type LevelDocument = z.output<typeof LevelDocumentSchema>;
