/**
 * Safety Module
 */

export { SafetyGate, buildFixText } from './safety-gate.js';
export type { SafetyStats } from './safety-gate.js';
export { RemoteSafetyClient } from './remote-safety-client.js';
export type { RemoteSafetyConfig } from './remote-safety-client.js';
export { SafetyValidator } from './safety-validator.js';
export type { SafetyValidatorStats } from './safety-validator.js';
export { CRITICAL_CHECKS, ADVISORY_CHECKS } from './safety-rules.js';
export type { SafetyCheckName } from './safety-rules.js';
