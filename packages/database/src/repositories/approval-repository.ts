/**
 * Approval Repository
 * Append-only log of accepted human decisions
 */

import { eq, desc, sql } from 'drizzle-orm';
import { randomUUID } from 'node:crypto';
import { DatabaseError, type ApprovalAction, type ApprovalRecord, type UserRole } from '@remedyops/shared';
import { getDatabase } from '../connection.js';
import { approvals, type ApprovalRow } from '../schema.js';

export interface CreateApprovalInput {
  incidentId: string;
  userName: string;
  userRole: UserRole | null;
  action: ApprovalAction;
  comment?: string;
}

export class ApprovalRepository {
  /**
   * Record an approval action
   */
  async create(input: CreateApprovalInput): Promise<ApprovalRecord> {
    const db = getDatabase();

    const record: typeof approvals.$inferInsert = {
      id: randomUUID(),
      incidentId: input.incidentId,
      userName: input.userName,
      userRole: input.userRole,
      action: input.action,
      comment: input.comment ?? '',
      createdAt: new Date(),
    };

    const [inserted] = await db.insert(approvals).values(record).returning();
    if (!inserted) {
      throw new DatabaseError(`Failed to record approval for incident ${input.incidentId}`);
    }
    return this.mapToRecord(inserted);
  }

  /**
   * Approvals for an incident, newest first
   */
  async getByIncident(incidentId: string): Promise<ApprovalRecord[]> {
    const db = getDatabase();
    const results = await db
      .select()
      .from(approvals)
      .where(eq(approvals.incidentId, incidentId))
      .orderBy(desc(approvals.createdAt), desc(sql`rowid`));

    return results.map((r) => this.mapToRecord(r));
  }

  private mapToRecord(row: ApprovalRow): ApprovalRecord {
    return {
      id: row.id,
      incidentId: row.incidentId,
      userName: row.userName,
      userRole: row.userRole,
      action: row.action,
      comment: row.comment,
      createdAt: row.createdAt,
    };
  }
}

export const approvalRepository = new ApprovalRepository();
