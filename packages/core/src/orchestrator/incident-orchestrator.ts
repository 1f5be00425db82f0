/**
 * Incident Orchestrator
 * Drives one monitored service through detect, diagnose, propose, gate and
 * deploy. Detection runs on the monitor loop; each incident's pipeline and
 * every human action on it run under that incident's mutex.
 */

import {
  createChildLogger,
  errorMessage,
  logHumanAction,
  isApprovalAction,
  BROADCAST_EVENTS,
  RetryExhaustedError,
  ValidationError,
  type ApprovalAction,
  type BroadcastEventType,
  type Comment,
  type EvidenceBundle,
  type FaultType,
  type HumanDecision,
  type Incident,
  type IncidentStatus,
  type UserRole,
} from '@remedyops/shared';
import {
  activityLogRepository,
  approvalRepository,
  commentRepository,
  incidentRepository,
  learningRecordRepository,
  userRepository,
} from '@remedyops/database';
import {
  assessApprovalSeverity,
  assessImpactSeverity,
  buildDescription,
  buildErrorEvidence,
  buildImpactAnalysis,
  buildTitle,
} from '../classification/index.js';
import { DedupGuard } from '../detection/dedup-guard.js';
import { MonitorLoop, type DetectedFault } from '../detection/monitor-loop.js';
import { KeyedMutex } from '../lock/keyed-mutex.js';
import type { EventBroadcaster } from '../broadcast/event-broadcaster.js';
import type { RemediationAdapter } from '../remediation/remediation-adapter.js';
import type { RemediationStats } from '../remediation/types.js';
import { buildFixText, type SafetyValidator, type SafetyValidatorStats } from '../safety/index.js';
import { scoreConfidence } from '../scoring/confidence-scorer.js';
import { IncidentLifecycle } from '../state-machine/incident-lifecycle.js';
import { authorizeAction } from '../state-machine/approval-policy.js';
import { transitionValidator, type TransitionCondition } from '../state-machine/transitions.js';
import { ApplyAndVerifyExecutor, type ApplyAndVerifyConfig } from '../verification/apply-and-verify.js';
import { runSandboxTest } from '../collaborators/local-sandbox.js';
import type { ExecutionSandbox, MonitoredService } from '../collaborators/types.js';
import type { VoiceAlertService } from '../collaborators/alert-scripts.js';
import { buildClearanceReport } from './clearance-report.js';

// ===========================================
// Types
// ===========================================

export interface OrchestratorDependencies {
  service: MonitoredService;
  remediation: RemediationAdapter;
  safety: SafetyValidator;
  broadcaster: EventBroadcaster;
  sandbox?: ExecutionSandbox | null;
  voice?: VoiceAlertService | null;
  lifecycle?: IncidentLifecycle;
  guard?: DedupGuard;
  mutex?: KeyedMutex;
  /** Defaults to an executor over `service` built from `config.verify` */
  executor?: ApplyAndVerifyExecutor;
}

export interface OrchestratorConfig {
  monitorIntervalMs: number;
  autoFixThreshold: number;
  escalationThreshold: number;
  verify: Partial<ApplyAndVerifyConfig>;
}

const DEFAULT_CONFIG: OrchestratorConfig = {
  monitorIntervalMs: 5000,
  autoFixThreshold: 0.85,
  escalationThreshold: 0.5,
  verify: {},
};

export interface OrchestratorStats {
  running: boolean;
  incidentsTotal: number;
  incidentsResolved: number;
  autoResolved: number;
  learningRecords: number;
  confidenceAvg: number;
  openFaults: Partial<Record<FaultType, string | null>>;
  safetyStats: SafetyValidatorStats;
  remediationStats: RemediationStats;
}

export interface ActionResult {
  status: IncidentStatus;
}

const ACTION_TARGETS: Record<ApprovalAction, { to: IncidentStatus; condition: TransitionCondition }> = {
  approve: { to: 'deploying', condition: 'approved' },
  override: { to: 'deploying', condition: 'overridden' },
  reject: { to: 'rejected', condition: 'rejected' },
  request_changes: { to: 'fix_proposed', condition: 'changes_requested' },
};

const ACTION_ACTIVITY: Record<ApprovalAction, string> = {
  approve: 'approved',
  reject: 'rejected',
  override: 'overridden',
  request_changes: 'changes_requested',
};

const AGENT = 'agent';
const ENGINE_LOG_CHARS = 2000;

const percent = (value: number): string => `${Math.round(value * 100)}%`;

// ===========================================
// Orchestrator
// ===========================================

export class IncidentOrchestrator {
  private config: OrchestratorConfig;
  private service: MonitoredService;
  private remediation: RemediationAdapter;
  private safety: SafetyValidator;
  private broadcaster: EventBroadcaster;
  private sandbox: ExecutionSandbox | null;
  private voice: VoiceAlertService | null;
  private lifecycle: IncidentLifecycle;
  private guard: DedupGuard;
  private mutex: KeyedMutex;
  private executor: ApplyAndVerifyExecutor;
  private monitor: MonitorLoop;
  private inFlight = new Set<Promise<void>>();
  private logger = createChildLogger({ component: 'IncidentOrchestrator' });

  constructor(deps: OrchestratorDependencies, config: Partial<OrchestratorConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.service = deps.service;
    this.remediation = deps.remediation;
    this.safety = deps.safety;
    this.broadcaster = deps.broadcaster;
    this.sandbox = deps.sandbox ?? null;
    this.voice = deps.voice ?? null;
    this.lifecycle = deps.lifecycle ?? new IncidentLifecycle();
    this.guard = deps.guard ?? new DedupGuard();
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.executor = deps.executor ?? new ApplyAndVerifyExecutor({ service: this.service }, this.config.verify);

    this.monitor = new MonitorLoop(this.service, this.guard, { intervalMs: this.config.monitorIntervalMs });
    this.monitor.on('health:checked', (health) => {
      this.broadcast(BROADCAST_EVENTS.HEALTH_UPDATE, health);
    });
    this.monitor.on('fault:detected', (fault) => {
      this.track(this.handleFault(fault));
    });
    this.monitor.on('cycle:error', (error) => {
      this.track(this.logActivity(null, AGENT, 'error', `Monitor cycle failed: ${error.message}`));
    });
  }

  get running(): boolean {
    return this.monitor.isRunning();
  }

  // ===========================================
  // Agent control
  // ===========================================

  async start(): Promise<void> {
    if (this.running) {
      this.logger.warn('Orchestrator already running');
      return;
    }

    this.guard.rebuild(await incidentRepository.listOpen());
    await this.logActivity(null, AGENT, 'started', `Monitoring ${this.service.name} at ${this.service.healthUrl}`);
    this.broadcast(BROADCAST_EVENTS.AGENT_STATUS, { running: true });
    this.logger.info({ service: this.service.name, openFaults: this.guard.size }, 'Orchestrator started');
    await this.monitor.start();
  }

  /**
   * Stops detection. Pipelines already running finish under their locks.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.monitor.stop();
    await this.logActivity(null, AGENT, 'stopped', 'Monitoring stopped');
    this.broadcast(BROADCAST_EVENTS.AGENT_STATUS, { running: false });
    this.logger.info('Orchestrator stopped');
  }

  /**
   * Run a single monitor tick now
   */
  async tick(): Promise<void> {
    await this.monitor.runCycle();
  }

  /**
   * Settles once every detached pipeline has finished
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  // ===========================================
  // Detection pipeline
  // ===========================================

  /**
   * Create the incident for a reserved fault and run it to a decision point
   */
  async handleFault(fault: DetectedFault): Promise<Incident | null> {
    const { health, faultType } = fault;
    let incident: Incident;
    let logs = '';

    try {
      const impact = assessImpactSeverity(faultType);
      logs = await this.service.getLogs();

      incident = await incidentRepository.create({
        title: buildTitle(health, impact),
        description: buildDescription(health, faultType),
        serviceName: this.service.name,
        faultType,
        impactSeverity: impact,
        approvalSeverity: assessApprovalSeverity(faultType, impact),
        impactAnalysis: buildImpactAnalysis(health, faultType, impact),
        errorEvidence: buildErrorEvidence(health, logs, health.traceback ?? ''),
      });
      this.guard.assign(faultType, incident.id);
    } catch (error) {
      this.guard.release(faultType);
      this.logger.error({ faultType, error: errorMessage(error) }, 'Failed to open incident');
      await this.logActivity(null, AGENT, 'error', `Failed to open ${faultType} incident: ${errorMessage(error)}`);
      return null;
    }

    await this.logActivity(
      incident.id,
      AGENT,
      'incident_detected',
      `${faultType} fault on ${incident.serviceName}: ${health.error ?? 'unhealthy'}`
    );
    this.broadcast(BROADCAST_EVENTS.INCIDENT_NEW, incident);

    const incidentId = incident.id;
    try {
      return await this.mutex.runExclusive(incidentId, () => this.runPipeline(incidentId, fault, logs));
    } catch (error) {
      this.logger.error({ incidentId, error: errorMessage(error) }, 'Incident pipeline failed');
      await this.logActivity(incidentId, AGENT, 'error', `Pipeline failed: ${errorMessage(error)}`);
      return this.recoverFailedPipeline(incidentId, fault);
    }
  }

  /**
   * Leave an incident whose pipeline threw where a human can act on it: the
   * rule-based fix held for approval. If that fails too, the fault is released.
   */
  private async recoverFailedPipeline(incidentId: string, fault: DetectedFault): Promise<Incident | null> {
    const { faultType, health } = fault;

    try {
      return await this.mutex.runExclusive(incidentId, async () => {
        let incident = await this.lifecycle.require(incidentId);
        if (incident.status === 'detected') {
          incident = await this.lifecycle.transition(incidentId, 'diagnosing', 'diagnosis_started');
        }
        if (incident.status !== 'diagnosing') {
          return incident;
        }

        const evidence: EvidenceBundle = {
          health,
          logs: '',
          traceback: health.traceback ?? '',
          handlerCode: '',
          configContent: '',
        };
        const { diagnosis, fix } = await this.remediation.fallbackProposal(faultType, evidence, incidentId);

        await this.lifecycle.transition(incidentId, 'fix_proposed', 'fix_generated', {
          rootCause: diagnosis.rootCause,
          diagnosis,
          diagnosisCategory: diagnosis.category,
          proposedFix: fix.description,
          fixDiff: fix.diff,
          fixCode: fix.fixCode,
          testCode: fix.testCode,
          riskLevel: fix.riskLevel,
          confidenceScore: 0,
          safetyResult: null,
          safetyPassed: null,
        });
        const awaiting = await this.lifecycle.transition(incidentId, 'awaiting_approval', 'human_review_required');
        await this.logActivity(incidentId, AGENT, 'fix_proposed', 'Pipeline failed. Rule-based fix held for review');
        this.broadcast(BROADCAST_EVENTS.INCIDENT_UPDATE, awaiting);
        return awaiting;
      });
    } catch (error) {
      this.guard.release(faultType, incidentId);
      this.logger.error({ incidentId, faultType, error: errorMessage(error) }, 'Incident recovery failed, fault released');
      return null;
    }
  }

  private async runPipeline(incidentId: string, fault: DetectedFault, logs: string): Promise<Incident> {
    const { faultType, health } = fault;

    const diagnosing = await this.lifecycle.transition(incidentId, 'diagnosing', 'diagnosis_started');
    this.broadcast(BROADCAST_EVENTS.INCIDENT_UPDATE, diagnosing);

    const evidence: EvidenceBundle = {
      health,
      logs: logs.slice(-ENGINE_LOG_CHARS),
      traceback: health.traceback ?? '',
      handlerCode: await this.service.getFile('handler.py'),
      configContent: await this.service.getFile('config.json'),
    };

    const diagnosis = await this.remediation.diagnose(faultType, evidence, incidentId);
    await incidentRepository.update(incidentId, {
      rootCause: diagnosis.rootCause,
      diagnosis,
      diagnosisCategory: diagnosis.category,
    });
    await this.logActivity(incidentId, AGENT, 'diagnosed', `Root cause: ${diagnosis.rootCause}`);

    const fix = await this.remediation.generateFix(faultType, diagnosis, evidence, incidentId);

    const sandbox = await runSandboxTest(this.sandbox, fix.fixCode, fix.testCode);
    await this.logActivity(
      incidentId,
      AGENT,
      'sandbox_test',
      sandbox.skipped
        ? 'Sandbox unavailable, test skipped'
        : `Fix applied: ${sandbox.fixApplied ? 'yes' : 'no'}, test passed: ${sandbox.testPassed ? 'yes' : 'no'}`
    );

    const severity = diagnosing.impactSeverity;
    const safety = await this.safety.check(
      { faultType, rootCause: diagnosis.rootCause, severity },
      buildFixText(fix.fixCode, fix.diff)
    );
    await this.logActivity(
      incidentId,
      AGENT,
      'safety_check',
      `${safety.passed ? 'Passed' : 'Failed'} with score ${percent(safety.score)} (${safety.providerMode})` +
        (safety.warnings.length > 0 ? `: ${safety.warnings.join('; ')}` : '')
    );

    const history = await learningRecordRepository.getByIncidentType(diagnosis.category);
    const confidence = scoreConfidence({ diagnosis, sandbox, safety, severity, history });

    const proposed = await this.lifecycle.transition(incidentId, 'fix_proposed', 'fix_generated', {
      proposedFix: fix.description,
      fixDiff: fix.diff,
      fixCode: fix.fixCode,
      testCode: fix.testCode,
      riskLevel: fix.riskLevel,
      confidenceScore: confidence,
      safetyResult: safety,
      safetyPassed: safety.passed,
    });

    if (confidence >= this.config.autoFixThreshold && safety.passed && sandbox.testPassed) {
      await this.logActivity(incidentId, AGENT, 'auto_deploying', `Confidence: ${percent(confidence)}. Deploying without review`);
      return this.deploy(proposed, 'auto_deploy');
    }

    const awaiting = await this.lifecycle.transition(incidentId, 'awaiting_approval', 'human_review_required');
    const detail =
      confidence < this.config.escalationThreshold
        ? `Confidence: ${percent(confidence)}. Low confidence, needs expert review`
        : `Confidence: ${percent(confidence)}. Awaiting team approval`;
    await this.logActivity(incidentId, AGENT, 'fix_proposed', detail);
    this.broadcast(BROADCAST_EVENTS.INCIDENT_UPDATE, awaiting);

    if (severity === 'high' || severity === 'critical') {
      await this.sendVoiceAlert(awaiting);
    }

    return awaiting;
  }

  private async sendVoiceAlert(incident: Incident): Promise<void> {
    if (!this.voice) {
      return;
    }
    try {
      const alert = await this.voice.alert({
        title: incident.title,
        severity: incident.impactSeverity,
        rootCause: incident.rootCause,
        proposedFix: incident.proposedFix,
      });
      this.broadcast(BROADCAST_EVENTS.VOICE_ALERT, { incidentId: incident.id, ...alert });
    } catch (error) {
      this.logger.warn({ incidentId: incident.id, error: errorMessage(error) }, 'Voice alert skipped');
    }
  }

  // ===========================================
  // Deploy
  // ===========================================

  /**
   * Move to deploying, apply and verify. Always leaves the incident resolved or back in fix_proposed.
   */
  private async deploy(incident: Incident, condition: TransitionCondition): Promise<Incident> {
    const incidentId = incident.id;
    const faultType = DedupGuard.resolveFaultType(incident);

    const deploying = await this.lifecycle.transition(incidentId, 'deploying', condition);
    await this.logActivity(incidentId, AGENT, 'deploying', `Applying ${faultType} recovery`);
    this.broadcast(BROADCAST_EVENTS.INCIDENT_UPDATE, deploying);

    try {
      const outcome = await this.executor.execute(
        faultType,
        (action, detail) => this.logActivity(incidentId, AGENT, action, detail),
        incidentId
      );

      const resolved = await this.lifecycle.transition(incidentId, 'resolved', 'verified_healthy', {
        autoResolved: deploying.confidenceScore >= this.config.autoFixThreshold,
      });
      this.guard.release(faultType, incidentId);
      await this.logActivity(
        incidentId,
        AGENT,
        'resolved',
        `Service healthy after ${outcome.attempts} verification attempt${outcome.attempts === 1 ? '' : 's'}`
      );
      this.broadcast(BROADCAST_EVENTS.INCIDENT_UPDATE, resolved);
      return resolved;
    } catch (error) {
      const detail = error instanceof RetryExhaustedError ? error.message : `Exception: ${errorMessage(error)}`;
      this.logger.warn({ incidentId, detail }, 'Deploy failed, returning to fix_proposed');

      const reverted = await this.lifecycle.transition(incidentId, 'fix_proposed', 'verification_failed');
      await this.logActivity(incidentId, AGENT, 'deploy_failed', detail);
      this.broadcast(BROADCAST_EVENTS.INCIDENT_UPDATE, reverted);
      return reverted;
    }
  }

  // ===========================================
  // Human actions
  // ===========================================

  async submitAction(incidentId: string, actor: string, action: string, comment = ''): Promise<ActionResult> {
    if (!isApprovalAction(action)) {
      throw new ValidationError(`Unknown action: ${action}`, { incidentId, action });
    }

    return this.mutex.runExclusive(incidentId, async () => {
      const incident = await this.lifecycle.require(incidentId);
      this.lifecycle.assertOpen(incident);

      const user = await userRepository.getByName(actor);
      const role = user?.role ?? null;
      authorizeAction(action, role, incident.approvalSeverity, incidentId);

      const target = ACTION_TARGETS[action];
      transitionValidator.validateTransition(incident.status, target.to, target.condition);

      if (action === 'override' && !comment.trim()) {
        throw new ValidationError('Override requires a comment describing the fix to deploy', { incidentId });
      }

      await approvalRepository.create({ incidentId, userName: actor, userRole: role, action, comment });
      logHumanAction(incidentId, actor, action, role);
      await this.logActivity(
        incidentId,
        actor,
        ACTION_ACTIVITY[action],
        comment ? `${actor} (${role ?? 'unregistered'}): ${comment}` : `${actor} (${role ?? 'unregistered'})`
      );

      let result: Incident;
      if (action === 'approve') {
        result = await this.deploy(incident, target.condition);
        await this.recordLearning(incident, 'approved');
      } else if (action === 'override') {
        result = await this.applyOverride(incident, comment);
      } else if (action === 'reject') {
        result = await this.lifecycle.transition(incidentId, 'rejected', target.condition);
        this.guard.release(DedupGuard.resolveFaultType(incident), incidentId);
        this.broadcast(BROADCAST_EVENTS.INCIDENT_UPDATE, result);
        await this.recordLearning(incident, 'rejected');
      } else {
        result = await this.requestChanges(incident, comment);
      }

      if ((action === 'approve' || action === 'override') && result.status === 'resolved') {
        await this.sendClearanceReport(result, actor, role, action);
      }

      return { status: result.status };
    });
  }

  private async applyOverride(incident: Incident, comment: string): Promise<Incident> {
    const incidentId = incident.id;
    const faultType = DedupGuard.resolveFaultType(incident);

    const safety = this.safety.checkLocal(
      { faultType, rootCause: incident.rootCause ?? '', severity: incident.impactSeverity },
      buildFixText(comment, incident.fixDiff)
    );
    const updated = await incidentRepository.update(incidentId, {
      proposedFix: comment,
      fixCode: comment,
      safetyResult: safety,
      safetyPassed: safety.passed,
    });
    await this.logActivity(
      incidentId,
      AGENT,
      'safety_check',
      `Override ${safety.passed ? 'passed' : 'failed'} local safety check with score ${percent(safety.score)}; not blocking`
    );

    const result = await this.deploy(updated ?? incident, 'overridden');
    await this.recordLearning(updated ?? incident, 'modified');
    return result;
  }

  private async requestChanges(incident: Incident, comment: string): Promise<Incident> {
    const incidentId = incident.id;
    const reopened = await this.lifecycle.transition(incidentId, 'fix_proposed', 'changes_requested');

    if (!comment.trim()) {
      this.broadcast(BROADCAST_EVENTS.INCIDENT_UPDATE, reopened);
      return reopened;
    }

    const refined = await this.remediation.refineFix({
      incidentId,
      faultType: incident.faultType,
      diagnosis: incident.diagnosis,
      proposedFix: incident.proposedFix ?? '',
      fixDiff: incident.fixDiff ?? '',
      fixCode: incident.fixCode ?? '',
      testCode: incident.testCode ?? '',
      riskLevel: incident.riskLevel ?? 'medium',
      feedback: comment,
    });
    const updated = await incidentRepository.update(incidentId, {
      proposedFix: refined.description,
      fixDiff: refined.diff,
      fixCode: refined.fixCode,
      testCode: refined.testCode,
      riskLevel: refined.riskLevel,
    });
    await this.logActivity(incidentId, AGENT, 'fix_refined', refined.description.slice(0, 300));

    const result = updated ?? reopened;
    this.broadcast(BROADCAST_EVENTS.INCIDENT_UPDATE, result);
    return result;
  }

  private async recordLearning(incident: Incident, decision: HumanDecision): Promise<void> {
    const category = incident.diagnosisCategory ?? 'unknown';
    await learningRecordRepository.create({
      incidentType: category,
      errorPattern: incident.errorEvidence.slice(0, 500),
      proposedFixPattern: (incident.proposedFix ?? '').slice(0, 500),
      humanDecision: decision,
    });
    await this.logActivity(incident.id, AGENT, 'learning_recorded', `${decision} recorded for category ${category}`);
  }

  private async sendClearanceReport(
    incident: Incident,
    actor: string,
    role: UserRole | null,
    action: ApprovalAction
  ): Promise<void> {
    const clearedAt = new Date();
    const updated = await incidentRepository.update(incident.id, { clearedBy: actor, clearedAt });
    const report = buildClearanceReport(updated ?? incident, actor, role, action);

    const authorities = await userRepository.getFinalAuthorities();
    const delivered = authorities
      .filter((user) => this.broadcaster.sendTo(user.name, BROADCAST_EVENTS.CLEARANCE_REPORT, report))
      .map((user) => user.name);

    await this.logActivity(
      incident.id,
      AGENT,
      'clearance_report_sent',
      delivered.length > 0 ? `Delivered to ${delivered.join(', ')}` : 'No final-authority user online'
    );
  }

  // ===========================================
  // Comments
  // ===========================================

  async addComment(incidentId: string, userName: string, content: string): Promise<Comment> {
    if (!content.trim()) {
      throw new ValidationError('Comment content is required', { incidentId });
    }
    await this.lifecycle.require(incidentId);

    const comment = await commentRepository.create({ incidentId, userName, content });
    this.broadcast(BROADCAST_EVENTS.NEW_COMMENT, comment);
    return comment;
  }

  async listComments(incidentId: string): Promise<Comment[]> {
    await this.lifecycle.require(incidentId);
    return commentRepository.getByIncident(incidentId);
  }

  // ===========================================
  // Stats
  // ===========================================

  async getStats(): Promise<OrchestratorStats> {
    const counts = await incidentRepository.getCounts();
    return {
      running: this.running,
      incidentsTotal: counts.total,
      incidentsResolved: counts.resolved,
      autoResolved: counts.autoResolved,
      learningRecords: await learningRecordRepository.count(),
      confidenceAvg: counts.confidenceAvg,
      openFaults: this.guard.snapshot(),
      safetyStats: this.safety.getStats(),
      remediationStats: this.remediation.getStats(),
    };
  }

  // ===========================================
  // Helpers
  // ===========================================

  private async logActivity(incidentId: string | null, actor: string, action: string, detail: string): Promise<void> {
    const entry = await activityLogRepository.create({ incidentId, actor, action, detail });
    this.broadcast(BROADCAST_EVENTS.ACTIVITY, entry);
  }

  private broadcast<T>(type: BroadcastEventType, data: T): void {
    this.broadcaster.broadcast(type, data);
  }

  private track(task: Promise<unknown>): void {
    const tracked: Promise<void> = task.then(
      () => undefined,
      (error: unknown) => {
        this.logger.error({ error: errorMessage(error) }, 'Detached task failed');
      }
    );
    this.inFlight.add(tracked);
    void tracked.finally(() => this.inFlight.delete(tracked));
  }
}
