export * from './board-text.js';
export * from './delta.js';
export * from './replay.js';
export * from './turn-logger.js';
