export * from './kernel/index.js';
export * from './session/level-session.js';
export * from './sim/index.js';
