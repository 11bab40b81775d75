export * from './device.js';
export * from './timer.js';
export * from './condition.js';
export * from './rule.js';
export * from './scene.js';
