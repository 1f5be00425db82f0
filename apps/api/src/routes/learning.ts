/**
 * Learning stats routes
 */
import type { FastifyInstance } from 'fastify';
import { learningRecordRepository } from '@remedyops/database';

const RECENT_RECORDS = 50;

export async function learningRoutes(app: FastifyInstance): Promise<void> {
  app.get('/learning', async () => {
    const [total, records, summary] = await Promise.all([
      learningRecordRepository.count(),
      learningRecordRepository.list(RECENT_RECORDS),
      learningRecordRepository.getSummary(),
    ]);
    return { data: { total, records, summary } };
  });
}
