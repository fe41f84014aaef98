export * from './engine.js';
export * from './pool.js';
export * from './untracked.js';
export * from './features/diff.js';
export * from './files/checks.js';
export * from './registry/checks.js';
