export { scoreConfidence, scoreConfidenceDetailed, learningAdjustment } from './confidence-scorer.js';
export type { ConfidenceInput, ConfidenceBreakdown } from './confidence-scorer.js';
