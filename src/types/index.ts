export * from './target.js';
export * from './action.js';
export * from './pipeline.js';
export * from './errors.js';
