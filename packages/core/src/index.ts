/**
 * @remedyops/core
 * Incident lifecycle and remediation pipeline for RemedyOps
 */

// State machine
export * from './state-machine/index.js';

// Orchestrator
export * from './orchestrator/index.js';

// Detection
export * from './detection/index.js';
export * from './classification/index.js';

// ============================================
// Remediation Pipeline
// ============================================

// Diagnosis and fix generation, with rule-based fallback
export * from './remediation/index.js';

// Safety gate and remote validator
export * from './safety/index.js';

// Confidence scoring
export * from './scoring/index.js';

// Apply and verify
export * from './verification/index.js';

// ============================================
// Coordination
// ============================================

// Per-incident locking
export * from './lock/index.js';

// Observer fan-out and presence
export * from './broadcast/index.js';

// Sandbox, speech and the monitored service
export * from './collaborators/index.js';
