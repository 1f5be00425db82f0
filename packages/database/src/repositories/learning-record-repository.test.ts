/**
 * Learning Record Repository Tests
 */
import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { LearningRecordRepository } from './learning-record-repository.js';
import { initializeDatabase, getDatabase, closeDatabase } from '../connection.js';
import { learningRecords } from '../schema.js';

describe('LearningRecordRepository', () => {
  let repository: LearningRecordRepository;

  beforeAll(() => {
    initializeDatabase({ path: ':memory:' });
  });

  afterAll(() => {
    closeDatabase();
  });

  beforeEach(async () => {
    repository = new LearningRecordRepository();
    await getDatabase().delete(learningRecords);
  });

  it('should derive a positive adjustment for approvals', async () => {
    const record = await repository.create({
      incidentType: 'config',
      errorPattern: 'bad json',
      proposedFixPattern: 'restore config',
      humanDecision: 'approved',
    });

    expect(record.confidenceAdjustment).toBe(0.05);
  });

  it('should derive a negative adjustment for rejections and modifications', async () => {
    const rejected = await repository.create({
      incidentType: 'bug',
      errorPattern: 'NameError',
      proposedFixPattern: 'restore handler',
      humanDecision: 'rejected',
    });
    const modified = await repository.create({
      incidentType: 'bug',
      errorPattern: 'NameError',
      proposedFixPattern: 'restart',
      humanDecision: 'modified',
    });

    expect(rejected.confidenceAdjustment).toBe(-0.05);
    expect(modified.confidenceAdjustment).toBe(-0.05);
  });

  it('should cut the error pattern to 500 characters', async () => {
    const record = await repository.create({
      incidentType: 'bug',
      errorPattern: 'x'.repeat(800),
      proposedFixPattern: 'fix',
      humanDecision: 'approved',
    });

    expect(record.errorPattern).toHaveLength(500);
  });

  it('should query by incident type and summarise decisions', async () => {
    await repository.create({ incidentType: 'config', errorPattern: 'a', proposedFixPattern: 'f', humanDecision: 'approved' });
    await repository.create({ incidentType: 'config', errorPattern: 'b', proposedFixPattern: 'f', humanDecision: 'rejected' });
    await repository.create({ incidentType: 'crash', errorPattern: 'c', proposedFixPattern: 'f', humanDecision: 'approved' });

    expect(await repository.getByIncidentType('config')).toHaveLength(2);
    expect(await repository.count()).toBe(3);
    expect(await repository.getSummary()).toEqual({ approved: 2, rejected: 1, modified: 0 });
  });

  it('should list newest first', async () => {
    await repository.create({ incidentType: 'first', errorPattern: 'a', proposedFixPattern: 'f', humanDecision: 'approved' });
    await repository.create({ incidentType: 'second', errorPattern: 'b', proposedFixPattern: 'f', humanDecision: 'approved' });

    const records = await repository.list(1);

    expect(records.map((r) => r.incidentType)).toEqual(['second']);
  });
});
