/**
 * Repository exports
 */

export { IncidentRepository, incidentRepository } from './incident-repository.js';
export type {
  CreateIncidentInput,
  UpdateIncidentInput,
  IncidentFilters,
  IncidentCounts,
} from './incident-repository.js';

export { ApprovalRepository, approvalRepository } from './approval-repository.js';
export type { CreateApprovalInput } from './approval-repository.js';

export { CommentRepository, commentRepository } from './comment-repository.js';
export type { CreateCommentInput } from './comment-repository.js';

export { LearningRecordRepository, learningRecordRepository } from './learning-record-repository.js';
export type { CreateLearningRecordInput, LearningSummary } from './learning-record-repository.js';

export { ActivityLogRepository, activityLogRepository } from './activity-log-repository.js';
export type { CreateActivityInput, ActivityFilters } from './activity-log-repository.js';

export { UserRepository, userRepository, DEFAULT_USERS } from './user-repository.js';
export type { CreateUserInput } from './user-repository.js';
