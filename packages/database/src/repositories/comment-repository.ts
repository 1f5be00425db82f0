/**
 * Comment Repository
 */

import { eq, asc, sql } from 'drizzle-orm';
import { randomUUID } from 'node:crypto';
import { DatabaseError, type Comment } from '@remedyops/shared';
import { getDatabase } from '../connection.js';
import { comments, type CommentRow } from '../schema.js';

export interface CreateCommentInput {
  incidentId: string;
  userName: string;
  content: string;
}

export class CommentRepository {
  async create(input: CreateCommentInput): Promise<Comment> {
    const db = getDatabase();

    const [inserted] = await db
      .insert(comments)
      .values({
        id: randomUUID(),
        incidentId: input.incidentId,
        userName: input.userName,
        content: input.content,
        createdAt: new Date(),
      })
      .returning();

    if (!inserted) {
      throw new DatabaseError(`Failed to add comment to incident ${input.incidentId}`);
    }
    return this.mapToComment(inserted);
  }

  /**
   * Comments for an incident in the order they were written
   */
  async getByIncident(incidentId: string): Promise<Comment[]> {
    const db = getDatabase();
    const results = await db
      .select()
      .from(comments)
      .where(eq(comments.incidentId, incidentId))
      .orderBy(asc(comments.createdAt), asc(sql`rowid`));

    return results.map((r) => this.mapToComment(r));
  }

  private mapToComment(row: CommentRow): Comment {
    return {
      id: row.id,
      incidentId: row.incidentId,
      userName: row.userName,
      content: row.content,
      createdAt: row.createdAt,
    };
  }
}

export const commentRepository = new CommentRepository();
