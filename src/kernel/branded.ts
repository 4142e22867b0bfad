type Brand<TBase, TBrand extends string> = TBase & { readonly __brand: TBrand };

export type EnemyId = Brand<string, 'EnemyId'>;
export type LevelId = Brand<string, 'LevelId'>;

export const asEnemyId = (value: string): EnemyId => value as EnemyId;
export const asLevelId = (value: string): LevelId => value as LevelId;
