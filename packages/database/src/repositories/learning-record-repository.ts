/**
 * Learning Record Repository
 * Human decisions keyed by diagnosis category, consulted by the confidence scorer
 */

import { eq, desc, count, sql } from 'drizzle-orm';
import { randomUUID } from 'node:crypto';
import { DatabaseError, type HumanDecision, type LearningRecord } from '@remedyops/shared';
import { getDatabase } from '../connection.js';
import { learningRecords, type LearningRecordRow } from '../schema.js';

const CONFIDENCE_STEP = 0.05;

export interface CreateLearningRecordInput {
  incidentType: string;
  errorPattern: string;
  proposedFixPattern: string;
  humanDecision: HumanDecision;
}

export interface LearningSummary {
  approved: number;
  rejected: number;
  modified: number;
}

export class LearningRecordRepository {
  /**
   * Append a learning record. The adjustment is derived from the decision.
   */
  async create(input: CreateLearningRecordInput): Promise<LearningRecord> {
    const db = getDatabase();

    const [inserted] = await db
      .insert(learningRecords)
      .values({
        id: randomUUID(),
        incidentType: input.incidentType,
        errorPattern: input.errorPattern.slice(0, 500),
        proposedFixPattern: input.proposedFixPattern,
        humanDecision: input.humanDecision,
        confidenceAdjustment: input.humanDecision === 'approved' ? CONFIDENCE_STEP : -CONFIDENCE_STEP,
        createdAt: new Date(),
      })
      .returning();

    if (!inserted) {
      throw new DatabaseError(`Failed to record learning for ${input.incidentType}`);
    }
    return this.mapToRecord(inserted);
  }

  /**
   * All records for one diagnosis category
   */
  async getByIncidentType(incidentType: string): Promise<LearningRecord[]> {
    const db = getDatabase();
    const results = await db
      .select()
      .from(learningRecords)
      .where(eq(learningRecords.incidentType, incidentType));

    return results.map((r) => this.mapToRecord(r));
  }

  /**
   * Newest records first
   */
  async list(limit = 50): Promise<LearningRecord[]> {
    const db = getDatabase();
    const results = await db
      .select()
      .from(learningRecords)
      .orderBy(desc(learningRecords.createdAt), desc(sql`rowid`))
      .limit(limit);

    return results.map((r) => this.mapToRecord(r));
  }

  async count(): Promise<number> {
    const db = getDatabase();
    const [row] = await db.select({ value: count() }).from(learningRecords);
    return row?.value ?? 0;
  }

  /**
   * Decision counts across every record
   */
  async getSummary(): Promise<LearningSummary> {
    const db = getDatabase();
    const rows = await db
      .select({ decision: learningRecords.humanDecision, value: count() })
      .from(learningRecords)
      .groupBy(learningRecords.humanDecision);

    const summary: LearningSummary = { approved: 0, rejected: 0, modified: 0 };
    for (const row of rows) {
      summary[row.decision] = row.value;
    }
    return summary;
  }

  private mapToRecord(row: LearningRecordRow): LearningRecord {
    return {
      id: row.id,
      incidentType: row.incidentType,
      errorPattern: row.errorPattern,
      proposedFixPattern: row.proposedFixPattern,
      humanDecision: row.humanDecision,
      confidenceAdjustment: row.confidenceAdjustment,
      createdAt: row.createdAt,
    };
  }
}

export const learningRecordRepository = new LearningRecordRepository();
