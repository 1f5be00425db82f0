export * from './types.js';
export * from './local-sandbox.js';
export * from './speech-synthesizer.js';
export * from './alert-scripts.js';
export * from './local-monitored-service.js';
