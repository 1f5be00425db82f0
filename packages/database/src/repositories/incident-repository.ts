/**
 * Incident Repository
 */

import { eq, desc, and, notInArray, ne, count, avg, sql } from 'drizzle-orm';
import { randomUUID } from 'node:crypto';
import {
  isFaultType,
  TERMINAL_STATUSES,
  DatabaseError,
  type Incident,
  type IncidentStatus,
  type FaultType,
  type ImpactSeverity,
  type ApprovalSeverity,
  type Diagnosis,
  type SafetyResult,
  type RiskLevel,
} from '@remedyops/shared';
import { getDatabase } from '../connection.js';
import { incidents, type IncidentRow } from '../schema.js';

/**
 * Safely parse JSON string, returning null on failure
 */
function safeJsonParse<T>(value: string | null | undefined): T | null {
  if (!value) return null;
  try {
    return JSON.parse(value) as T;
  } catch {
    return null;
  }
}

export interface CreateIncidentInput {
  title: string;
  description: string;
  serviceName: string;
  faultType: FaultType;
  impactSeverity: ImpactSeverity;
  approvalSeverity: ApprovalSeverity;
  impactAnalysis: string;
  errorEvidence: string;
  reportedBy?: string;
  assignedTo?: string;
}

/**
 * Status is deliberately absent: only the lifecycle may change it, via setStatus
 */
export interface UpdateIncidentInput {
  rootCause?: string | null;
  diagnosis?: Diagnosis | null;
  diagnosisCategory?: string | null;
  proposedFix?: string | null;
  fixDiff?: string | null;
  fixCode?: string | null;
  testCode?: string | null;
  riskLevel?: RiskLevel | null;
  confidenceScore?: number;
  safetyResult?: SafetyResult | null;
  safetyPassed?: boolean | null;
  autoResolved?: boolean;
  assignedTo?: string;
  clearedBy?: string | null;
  clearedAt?: Date | null;
}

export interface IncidentFilters {
  status?: IncidentStatus;
  faultType?: FaultType;
}

export interface IncidentCounts {
  total: number;
  resolved: number;
  autoResolved: number;
  confidenceAvg: number;
}

export class IncidentRepository {
  /**
   * Create a new incident in the detected state
   */
  async create(input: CreateIncidentInput): Promise<Incident> {
    const db = getDatabase();
    const now = new Date();
    const id = randomUUID();

    const incident: typeof incidents.$inferInsert = {
      id,
      title: input.title,
      description: input.description,
      serviceName: input.serviceName,
      faultType: input.faultType,
      impactSeverity: input.impactSeverity,
      approvalSeverity: input.approvalSeverity,
      status: 'detected',
      impactAnalysis: input.impactAnalysis,
      errorEvidence: input.errorEvidence,
      confidenceScore: 0,
      autoResolved: false,
      reportedBy: input.reportedBy ?? 'agent',
      assignedTo: input.assignedTo ?? 'agent',
      detectedAt: now,
      updatedAt: now,
    };

    await db.insert(incidents).values(incident);

    const created = await this.getById(id);
    if (!created) {
      throw new DatabaseError(`Incident ${id} missing after insert`, { incidentId: id });
    }
    return created;
  }

  /**
   * Get incident by ID
   */
  async getById(id: string): Promise<Incident | null> {
    const db = getDatabase();
    const result = await db.select().from(incidents).where(eq(incidents.id, id)).limit(1);

    const row = result[0];
    return row ? this.mapToIncident(row) : null;
  }

  /**
   * Update incident content fields
   */
  async update(id: string, input: UpdateIncidentInput): Promise<Incident | null> {
    const db = getDatabase();

    // Separate fields that need JSON serialization
    const { diagnosis, safetyResult, ...restInput } = input;

    await db
      .update(incidents)
      .set({
        ...restInput,
        ...(diagnosis !== undefined && {
          diagnosis: diagnosis ? JSON.stringify(diagnosis) : null,
        }),
        ...(safetyResult !== undefined && {
          safetyResult: safetyResult ? JSON.stringify(safetyResult) : null,
        }),
        updatedAt: new Date(),
      })
      .where(eq(incidents.id, id));

    return this.getById(id);
  }

  /**
   * Persist a status change. resolvedAt follows the status in the same write.
   */
  async setStatus(id: string, status: IncidentStatus, extra: UpdateIncidentInput = {}): Promise<Incident | null> {
    const db = getDatabase();
    const now = new Date();

    const { diagnosis, safetyResult, ...restExtra } = extra;

    await db
      .update(incidents)
      .set({
        ...restExtra,
        ...(diagnosis !== undefined && {
          diagnosis: diagnosis ? JSON.stringify(diagnosis) : null,
        }),
        ...(safetyResult !== undefined && {
          safetyResult: safetyResult ? JSON.stringify(safetyResult) : null,
        }),
        status,
        resolvedAt: status === 'resolved' ? now : null,
        updatedAt: now,
      })
      .where(eq(incidents.id, id));

    return this.getById(id);
  }

  /**
   * List incidents with filters, newest first
   */
  async list(filters: IncidentFilters = {}, limit = 50, offset = 0): Promise<Incident[]> {
    const db = getDatabase();

    const conditions = [];

    if (filters.status) {
      conditions.push(eq(incidents.status, filters.status));
    }
    if (filters.faultType) {
      conditions.push(eq(incidents.faultType, filters.faultType));
    }

    const results = await db
      .select()
      .from(incidents)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(desc(incidents.detectedAt), desc(sql`rowid`))
      .limit(limit)
      .offset(offset);

    return results.map((r) => this.mapToIncident(r));
  }

  /**
   * Every incident not yet resolved or rejected, oldest first
   */
  async listOpen(): Promise<Incident[]> {
    const db = getDatabase();
    const results = await db
      .select()
      .from(incidents)
      .where(notInArray(incidents.status, [...TERMINAL_STATUSES]))
      .orderBy(incidents.detectedAt, sql`rowid`);

    return results.map((r) => this.mapToIncident(r));
  }

  /**
   * Aggregate counters for the agent stats view
   */
  async getCounts(): Promise<IncidentCounts> {
    const db = getDatabase();

    const [totals] = await db.select({ value: count() }).from(incidents);
    const [resolved] = await db
      .select({ value: count() })
      .from(incidents)
      .where(eq(incidents.status, 'resolved'));
    const [auto] = await db
      .select({ value: count() })
      .from(incidents)
      .where(eq(incidents.autoResolved, true));
    const [confidence] = await db
      .select({ value: avg(incidents.confidenceScore) })
      .from(incidents)
      .where(ne(incidents.confidenceScore, 0));

    const average = confidence?.value ? Number(confidence.value) : 0;

    return {
      total: totals?.value ?? 0,
      resolved: resolved?.value ?? 0,
      autoResolved: auto?.value ?? 0,
      confidenceAvg: Math.round(average * 1000) / 1000,
    };
  }

  /**
   * Delete incident
   */
  async delete(id: string): Promise<void> {
    const db = getDatabase();
    await db.delete(incidents).where(eq(incidents.id, id));
  }

  /**
   * Map database row to Incident type
   */
  private mapToIncident(row: IncidentRow): Incident {
    return {
      id: row.id,
      title: row.title,
      description: row.description,
      serviceName: row.serviceName,
      faultType: isFaultType(row.faultType) ? row.faultType : null,
      impactSeverity: row.impactSeverity,
      approvalSeverity: row.approvalSeverity,
      status: row.status,
      impactAnalysis: row.impactAnalysis,
      errorEvidence: row.errorEvidence,
      rootCause: row.rootCause,
      diagnosis: safeJsonParse<Diagnosis>(row.diagnosis),
      diagnosisCategory: row.diagnosisCategory,
      proposedFix: row.proposedFix,
      fixDiff: row.fixDiff,
      fixCode: row.fixCode,
      testCode: row.testCode,
      riskLevel: row.riskLevel,
      confidenceScore: row.confidenceScore,
      safetyResult: safeJsonParse<SafetyResult>(row.safetyResult),
      safetyPassed: row.safetyPassed,
      autoResolved: row.autoResolved,
      reportedBy: row.reportedBy,
      assignedTo: row.assignedTo,
      clearedBy: row.clearedBy,
      clearedAt: row.clearedAt,
      detectedAt: row.detectedAt,
      resolvedAt: row.resolvedAt,
      updatedAt: row.updatedAt,
    };
  }
}

// Singleton instance
export const incidentRepository = new IncidentRepository();
