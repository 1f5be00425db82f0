/**
 * Database Schema
 * Using Drizzle ORM with SQLite
 */

import { sqliteTable, text, integer, real } from 'drizzle-orm/sqlite-core';
import { relations } from 'drizzle-orm';
import {
  INCIDENT_STATUS_VALUES,
  IMPACT_SEVERITIES,
  APPROVAL_SEVERITIES,
  RISK_LEVELS,
  APPROVAL_ACTIONS,
  HUMAN_DECISIONS,
  USER_ROLES,
} from '@remedyops/shared';

/**
 * Incidents table
 */
export const incidents = sqliteTable('incidents', {
  id: text('id').primaryKey(),
  title: text('title').notNull(),
  description: text('description').notNull(),
  serviceName: text('service_name').notNull(),
  // Fault-type key; nullable so older rows can be re-derived from root cause
  faultType: text('fault_type'),
  impactSeverity: text('impact_severity', { enum: IMPACT_SEVERITIES }).notNull(),
  approvalSeverity: text('approval_severity', { enum: APPROVAL_SEVERITIES }).notNull(),
  status: text('status', { enum: INCIDENT_STATUS_VALUES }).notNull(),
  impactAnalysis: text('impact_analysis').notNull(),
  errorEvidence: text('error_evidence').notNull(),
  rootCause: text('root_cause'),
  diagnosis: text('diagnosis'), // JSON stringified Diagnosis
  diagnosisCategory: text('diagnosis_category'),
  proposedFix: text('proposed_fix'),
  fixDiff: text('fix_diff'),
  fixCode: text('fix_code'),
  testCode: text('test_code'),
  riskLevel: text('risk_level', { enum: RISK_LEVELS }),
  confidenceScore: real('confidence_score').notNull().default(0),
  safetyResult: text('safety_result'), // JSON stringified SafetyResult
  safetyPassed: integer('safety_passed', { mode: 'boolean' }),
  autoResolved: integer('auto_resolved', { mode: 'boolean' }).notNull().default(false),
  reportedBy: text('reported_by').notNull(),
  assignedTo: text('assigned_to').notNull(),
  clearedBy: text('cleared_by'),
  clearedAt: integer('cleared_at', { mode: 'timestamp_ms' }),
  detectedAt: integer('detected_at', { mode: 'timestamp_ms' }).notNull(),
  resolvedAt: integer('resolved_at', { mode: 'timestamp_ms' }),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Approvals table - one row per accepted human action
 */
export const approvals = sqliteTable('approvals', {
  id: text('id').primaryKey(),
  incidentId: text('incident_id')
    .notNull()
    .references(() => incidents.id),
  userName: text('user_name').notNull(),
  userRole: text('user_role', { enum: USER_ROLES }),
  action: text('action', { enum: APPROVAL_ACTIONS }).notNull(),
  comment: text('comment').notNull().default(''),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Comments table
 */
export const comments = sqliteTable('comments', {
  id: text('id').primaryKey(),
  incidentId: text('incident_id')
    .notNull()
    .references(() => incidents.id),
  userName: text('user_name').notNull(),
  content: text('content').notNull(),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Learning records table - human decisions per diagnosis category
 */
export const learningRecords = sqliteTable('learning_records', {
  id: text('id').primaryKey(),
  incidentType: text('incident_type').notNull(),
  errorPattern: text('error_pattern').notNull(),
  proposedFixPattern: text('proposed_fix_pattern').notNull(),
  humanDecision: text('human_decision', { enum: HUMAN_DECISIONS }).notNull(),
  confidenceAdjustment: real('confidence_adjustment').notNull(),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Activity log table - append-only audit trail
 */
export const activityLog = sqliteTable('activity_log', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  incidentId: text('incident_id'),
  actor: text('actor').notNull(),
  action: text('action').notNull(),
  detail: text('detail').notNull().default(''),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Users table
 */
export const users = sqliteTable('users', {
  id: text('id').primaryKey(),
  name: text('name').notNull().unique(),
  role: text('role', { enum: USER_ROLES }).notNull(),
  finalAuthority: integer('final_authority', { mode: 'boolean' }).notNull().default(false),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
});

// ===========================================
// Relations
// ===========================================

export const incidentsRelations = relations(incidents, ({ many }) => ({
  approvals: many(approvals),
  comments: many(comments),
}));

export const approvalsRelations = relations(approvals, ({ one }) => ({
  incident: one(incidents, {
    fields: [approvals.incidentId],
    references: [incidents.id],
  }),
}));

export const commentsRelations = relations(comments, ({ one }) => ({
  incident: one(incidents, {
    fields: [comments.incidentId],
    references: [incidents.id],
  }),
}));

// Type exports
export type IncidentRow = typeof incidents.$inferSelect;
export type NewIncidentRow = typeof incidents.$inferInsert;
export type ApprovalRow = typeof approvals.$inferSelect;
export type CommentRow = typeof comments.$inferSelect;
export type LearningRecordRow = typeof learningRecords.$inferSelect;
export type ActivityLogRow = typeof activityLog.$inferSelect;
export type UserRow = typeof users.$inferSelect;
