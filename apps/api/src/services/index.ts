/**
 * API Services Module
 * Builds the collaborators and the incident orchestrator from configuration
 */

import { GeminiClient } from '@remedyops/gemini';
import {
  ElevenLabsSynthesizer,
  EventBroadcaster,
  IncidentOrchestrator,
  LocalMonitoredService,
  type SupervisedService,
  LocalSandbox,
  ReasoningEngineStrategy,
  RemediationAdapter,
  RemoteSafetyClient,
  RuleBasedStrategy,
  SafetyGate,
  SafetyValidator,
  VoiceAlertService,
} from '@remedyops/core';
import { createChildLogger, getConfig, type Config } from '@remedyops/shared';

const logger = createChildLogger({ component: 'Services' });

export interface AppServices {
  orchestrator: IncidentOrchestrator;
  broadcaster: EventBroadcaster;
  service: SupervisedService;
  voice: VoiceAlertService;
}

// Extend Fastify instance with services
declare module 'fastify' {
  interface FastifyInstance {
    services: AppServices;
  }
}

/**
 * Wire every service. Optional collaborators are left out when their key is unset.
 */
export function initializeServices(config: Config = getConfig()): AppServices {
  const service = new LocalMonitoredService({
    name: config.service.name,
    healthUrl: config.service.healthUrl,
    workdir: config.service.workdir,
    startCommand: config.service.startCommand,
    healthTimeoutMs: config.service.healthTimeoutMs,
  });

  const engine = config.reasoning.apiKey
    ? new ReasoningEngineStrategy(
        new GeminiClient({
          apiKey: config.reasoning.apiKey,
          model: config.reasoning.model,
          requestTimeoutMs: config.reasoning.timeoutMs,
          maxRetries: config.reasoning.maxRetries,
        })
      )
    : null;

  const remote = config.safety.apiKey
    ? new RemoteSafetyClient({
        apiKey: config.safety.apiKey,
        apiUrl: config.safety.apiUrl,
        deploymentId: config.safety.deploymentId,
        timeoutMs: config.safety.timeoutMs,
      })
    : null;

  const synthesizer = config.speech.apiKey
    ? new ElevenLabsSynthesizer({
        apiKey: config.speech.apiKey,
        voiceId: config.speech.voiceId,
        timeoutMs: config.speech.timeoutMs,
      })
    : null;

  const broadcaster = new EventBroadcaster();
  const voice = new VoiceAlertService(synthesizer);

  const orchestrator = new IncidentOrchestrator(
    {
      service,
      remediation: new RemediationAdapter(engine, new RuleBasedStrategy({ healthUrl: config.service.healthUrl })),
      safety: new SafetyValidator(new SafetyGate(), remote),
      broadcaster,
      sandbox: new LocalSandbox({
        workdir: config.service.workdir,
        shell: config.sandbox.shell,
        timeoutMs: config.sandbox.timeoutMs,
        outputLimit: config.sandbox.outputLimit,
      }),
      voice,
    },
    {
      monitorIntervalMs: config.monitor.intervalMs,
      autoFixThreshold: config.thresholds.autoFix,
      escalationThreshold: config.thresholds.escalation,
      verify: config.verify,
    }
  );

  logger.info(
    {
      service: service.name,
      reasoningEngine: engine !== null,
      remoteSafety: remote !== null,
      speech: synthesizer !== null,
    },
    'Services initialized'
  );

  return { orchestrator, broadcaster, service, voice };
}

/**
 * Stop detection, wait for running pipelines and stop a supervised service
 */
export async function shutdownServices(services: AppServices): Promise<void> {
  await services.orchestrator.stop();
  await services.orchestrator.whenIdle();
  await services.service.stop();
  logger.info('Services shut down');
}
