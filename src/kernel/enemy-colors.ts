// New colors only need an entry here; schemas, validation and rendering read this list.
export const ENEMY_COLORS = ['red', 'purple', 'green'] as const;

export type EnemyColor = (typeof ENEMY_COLORS)[number];

export const isEnemyColor = (value: unknown): value is EnemyColor =>
  ENEMY_COLORS.some((color) => color === value);
