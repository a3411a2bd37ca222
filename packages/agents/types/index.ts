export * from './pillars.js';
export * from './orchestration.js';
export * from './decision.js';
export * from './events.js';
