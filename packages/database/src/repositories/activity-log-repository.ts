/**
 * Activity Log Repository
 */

import { eq, desc } from 'drizzle-orm';
import { DatabaseError, type ActivityLogEntry } from '@remedyops/shared';
import { getDatabase } from '../connection.js';
import { activityLog, type ActivityLogRow } from '../schema.js';

export interface CreateActivityInput {
  incidentId?: string | null;
  actor: string;
  action: string;
  detail?: string;
}

export interface ActivityFilters {
  incidentId?: string;
}

export class ActivityLogRepository {
  async create(input: CreateActivityInput): Promise<ActivityLogEntry> {
    const db = getDatabase();

    const [inserted] = await db
      .insert(activityLog)
      .values({
        incidentId: input.incidentId ?? null,
        actor: input.actor,
        action: input.action,
        detail: input.detail ?? '',
        createdAt: new Date(),
      })
      .returning();

    if (!inserted) {
      throw new DatabaseError(`Failed to log activity ${input.action}`);
    }
    return this.mapToEntry(inserted);
  }

  /**
   * Newest entries first
   */
  async list(filters: ActivityFilters = {}, limit = 100): Promise<ActivityLogEntry[]> {
    const db = getDatabase();
    const results = await db
      .select()
      .from(activityLog)
      .where(filters.incidentId ? eq(activityLog.incidentId, filters.incidentId) : undefined)
      .orderBy(desc(activityLog.id))
      .limit(limit);

    return results.map((r) => this.mapToEntry(r));
  }

  private mapToEntry(row: ActivityLogRow): ActivityLogEntry {
    return {
      id: row.id,
      incidentId: row.incidentId,
      actor: row.actor,
      action: row.action,
      detail: row.detail,
      createdAt: row.createdAt,
    };
  }
}

export const activityLogRepository = new ActivityLogRepository();
