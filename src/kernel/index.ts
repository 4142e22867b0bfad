export * from './apply-turn.js';
export * from './branded.js';
export * from './collision.js';
export * from './determinism.js';
export * from './diagnostics.js';
export * from './enemy-colors.js';
export * from './entity-model.js';
export * from './grid-model.js';
export * from './level-assets.js';
export * from './level-catalog.js';
export * from './pathfinding.js';
export * from './runtime-error.js';
export * from './schemas.js';
export * from './terminal.js';
export * from './turn-collector.js';
export * from './turn-engine.js';
export * from './types.js';
export * from './validate-level.js';
