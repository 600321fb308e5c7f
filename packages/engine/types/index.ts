export * from './entities.js';
export * from './plan.js';
export * from './scope.js';
export * from './insight.js';
export * from './events.js';
export * from './errors.js';
