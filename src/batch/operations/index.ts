export * from './collision.js';
export * from './plan.js';
export * from './preview.js';
export * from './apply.js';
export * from './undo.js';
