export * from './types.js';
export * from './rule-based-strategy.js';
export * from './reasoning-engine-strategy.js';
export * from './remediation-adapter.js';
