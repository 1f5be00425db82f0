/**
 * Incidents API Routes Tests
 * Routes over a real orchestrator, an in-memory database and a fake service
 */
import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import {
  initializeDatabase,
  closeDatabase,
  getDatabase,
  activityLog,
  approvals,
  comments,
  incidents,
  learningRecords,
  userRepository,
} from '@remedyops/database';
import {
  EventBroadcaster,
  IncidentOrchestrator,
  RemediationAdapter,
  SafetyGate,
  SafetyValidator,
  ApplyAndVerifyExecutor,
  VoiceAlertService,
  type SupervisedService,
} from '@remedyops/core';
import type { HealthSignal } from '@remedyops/shared';
import { buildApp } from '../app.js';

// ===========================================
// Fakes
// ===========================================

const HEALTHY: HealthSignal = { healthy: true, status: 'healthy', statusCode: 200 };
const BAD_CONFIG: HealthSignal = {
  healthy: false,
  statusCode: 500,
  error: 'Config parse error: invalid JSON',
  errorType: 'ConfigParseError',
};

const createFakeService = () => {
  const healthCheck = vi.fn<() => Promise<HealthSignal>>().mockResolvedValue(HEALTHY);
  const service: SupervisedService = {
    name: 'target-app',
    healthUrl: 'http://127.0.0.1:8001/health',
    healthCheck,
    getLogs: vi.fn<SupervisedService['getLogs']>().mockResolvedValue('INFO ready'),
    getFile: vi.fn<SupervisedService['getFile']>().mockResolvedValue(''),
    applyRecovery: vi
      .fn<SupervisedService['applyRecovery']>()
      .mockResolvedValue({ fixed: true, action: 'config_restored', file: 'config.json' }),
    restart: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
    isRunning: () => true,
    getLastRecovery: () => null,
    start: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
    stop: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
    injectFault: vi.fn<SupervisedService['injectFault']>().mockRejectedValue(new Error('not used')),
    clearFault: vi.fn<SupervisedService['clearFault']>().mockResolvedValue({ fixed: false, error: 'No active fault' }),
    getActiveFault: () => null,
  };
  return { service, healthCheck };
};

// ===========================================
// Test Setup
// ===========================================

describe('Incidents API Routes', () => {
  let app: FastifyInstance;
  let orchestrator: IncidentOrchestrator;
  let fake: ReturnType<typeof createFakeService>;

  const openConfigIncident = async (): Promise<string> => {
    fake.healthCheck.mockResolvedValueOnce(BAD_CONFIG);
    await orchestrator.tick();
    await orchestrator.whenIdle();
    const response = await app.inject({ method: 'GET', url: '/api/v1/incidents' });
    const id: unknown = response.json().data[0]?.id;
    if (typeof id !== 'string') {
      throw new Error('incident was not opened');
    }
    return id;
  };

  beforeAll(async () => {
    initializeDatabase({ path: ':memory:' });
    await userRepository.seedDefaultUsers();
  });

  afterAll(() => {
    closeDatabase();
  });

  beforeEach(async () => {
    const db = getDatabase();
    await db.delete(approvals);
    await db.delete(comments);
    await db.delete(activityLog);
    await db.delete(learningRecords);
    await db.delete(incidents);

    fake = createFakeService();
    const broadcaster = new EventBroadcaster();
    orchestrator = new IncidentOrchestrator(
      {
        service: fake.service,
        remediation: new RemediationAdapter(null),
        safety: new SafetyValidator(new SafetyGate(), null),
        broadcaster,
        executor: new ApplyAndVerifyExecutor({ service: fake.service, delay: () => Promise.resolve() }),
      },
      { monitorIntervalMs: 60_000 }
    );

    app = await buildApp(
      { orchestrator, broadcaster, service: fake.service, voice: new VoiceAlertService(null) },
      '*'
    );
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  // ===========================================
  // Reads
  // ===========================================

  describe('GET /api/v1/incidents', () => {
    it('lists detected incidents', async () => {
      await openConfigIncident();

      const response = await app.inject({ method: 'GET', url: '/api/v1/incidents?status=awaiting_approval' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.data).toHaveLength(1);
      expect(body.data[0].faultType).toBe('bad_config');
      expect(body.data[0].approvalSeverity).toBe('blocker');
    });

    it('rejects an unknown status filter', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/incidents?status=closed' });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('Invalid request');
    });
  });

  describe('GET /api/v1/incidents/:id', () => {
    it('returns the incident', async () => {
      const id = await openConfigIncident();

      const response = await app.inject({ method: 'GET', url: `/api/v1/incidents/${id}` });

      expect(response.statusCode).toBe(200);
      expect(response.json().data.status).toBe('awaiting_approval');
    });

    it('returns 404 for an unknown incident', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/incidents/missing' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ error: 'Incident not found' });
    });
  });

  // ===========================================
  // Human actions
  // ===========================================

  describe('POST /api/v1/incidents/:id/actions', () => {
    it('answers 403 with the required role when the actor is too junior', async () => {
      const id = await openConfigIncident();

      const response = await app.inject({
        method: 'POST',
        url: `/api/v1/incidents/${id}/actions`,
        payload: { userName: 'alice', action: 'approve' },
      });

      expect(response.statusCode).toBe(403);
      expect(response.json()).toMatchObject({ requiredRole: 'engineering_manager', actorRole: 'junior_dev' });
    });

    it('deploys an approved fix and records the approval', async () => {
      const id = await openConfigIncident();

      const response = await app.inject({
        method: 'POST',
        url: `/api/v1/incidents/${id}/actions`,
        payload: { userName: 'dave', action: 'approve', comment: 'Ship it' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ data: { status: 'resolved' } });

      const history = await app.inject({ method: 'GET', url: `/api/v1/incidents/${id}/approvals` });
      expect(history.json().data).toHaveLength(1);
      expect(history.json().data[0]).toMatchObject({ userName: 'dave', action: 'approve', comment: 'Ship it' });
    });

    it('answers 400 for an unknown action', async () => {
      const id = await openConfigIncident();

      const response = await app.inject({
        method: 'POST',
        url: `/api/v1/incidents/${id}/actions`,
        payload: { userName: 'dave', action: 'escalate' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('Unknown action: escalate');
    });

    it('answers 409 for an action on a rejected incident', async () => {
      const id = await openConfigIncident();
      await app.inject({
        method: 'POST',
        url: `/api/v1/incidents/${id}/actions`,
        payload: { userName: 'carol', action: 'reject' },
      });

      const response = await app.inject({
        method: 'POST',
        url: `/api/v1/incidents/${id}/actions`,
        payload: { userName: 'dave', action: 'approve' },
      });

      expect(response.statusCode).toBe(409);
    });

    it('answers 404 for an unknown incident', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/incidents/missing/actions',
        payload: { userName: 'dave', action: 'approve' },
      });

      expect(response.statusCode).toBe(404);
    });

    it('answers 400 when the actor is missing', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/incidents/missing/actions',
        payload: { action: 'approve' },
      });

      expect(response.statusCode).toBe(400);
    });
  });

  // ===========================================
  // Comments
  // ===========================================

  describe('comments', () => {
    it('adds and lists comments in order', async () => {
      const id = await openConfigIncident();

      const first = await app.inject({
        method: 'POST',
        url: `/api/v1/incidents/${id}/comments`,
        payload: { userName: 'bob', content: 'Looking at the backup' },
      });
      await app.inject({
        method: 'POST',
        url: `/api/v1/incidents/${id}/comments`,
        payload: { userName: 'carol', content: 'Backup is fine' },
      });

      expect(first.statusCode).toBe(201);
      const list = await app.inject({ method: 'GET', url: `/api/v1/incidents/${id}/comments` });
      expect(list.json().data.map((c: { userName: string }) => c.userName)).toEqual(['bob', 'carol']);
    });

    it('answers 400 for an empty comment', async () => {
      const id = await openConfigIncident();

      const response = await app.inject({
        method: 'POST',
        url: `/api/v1/incidents/${id}/comments`,
        payload: { userName: 'bob', content: '  ' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('Comment content is required');
    });
  });

  describe('GET /api/v1/activity', () => {
    it('returns the newest entry first', async () => {
      const id = await openConfigIncident();

      const response = await app.inject({ method: 'GET', url: `/api/v1/activity?incidentId=${id}&limit=1` });

      expect(response.statusCode).toBe(200);
      expect(response.json().data).toHaveLength(1);
      expect(response.json().data[0]).toMatchObject({
        action: 'fix_proposed',
        detail: 'Confidence: 57%. Awaiting team approval',
      });
    });
  });
});
