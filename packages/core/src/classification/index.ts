export { classifyFault, deriveFaultTypeFromRootCause } from './fault-classifier.js';
export {
  assessImpactSeverity,
  assessApprovalSeverity,
  buildTitle,
  buildDescription,
  buildImpactAnalysis,
  buildErrorEvidence,
} from './fault-profiles.js';
