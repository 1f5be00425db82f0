/**
 * Incident Orchestrator
 * Detect, diagnose, propose, gate and deploy for one monitored service
 */

export { IncidentOrchestrator } from './incident-orchestrator.js';
export type {
  OrchestratorDependencies,
  OrchestratorConfig,
  OrchestratorStats,
  ActionResult,
} from './incident-orchestrator.js';
export { buildClearanceReport } from './clearance-report.js';
export type { ClearanceReport } from './clearance-report.js';
