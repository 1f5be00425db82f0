/**
 * Collaborator interfaces
 * The orchestrator talks to the outside world only through these.
 */

import type {
  FaultInjection,
  FaultType,
  HealthSignal,
  InjectableFault,
  RecoveryResult,
  SandboxOutcome,
} from '@remedyops/shared';
import type { HealthSource } from '../detection/monitor-loop.js';

export interface ExecutionSandbox {
  testFix(fixCode: string, testCode: string): Promise<SandboxOutcome>;
}

export interface SpeechSynthesizer {
  /** Base64 audio, or null when synthesis is unavailable or fails */
  synthesize(text: string): Promise<string | null>;
}

export interface MonitoredService extends HealthSource {
  readonly name: string;
  readonly healthUrl: string;
  healthCheck(): Promise<HealthSignal>;
  getLogs(limit?: number): Promise<string>;
  getFile(fileName: string): Promise<string>;
  applyRecovery(faultType: FaultType): Promise<RecoveryResult>;
  restart(): Promise<void>;
  isRunning(): boolean;
  getLastRecovery(): RecoveryResult | null;
}

/**
 * A monitored service whose process this agent may own
 */
export interface SupervisedService extends MonitoredService {
  start(): Promise<void>;
  stop(): Promise<void>;
  /** Break the service on purpose, for demos and drills */
  injectFault(fault: InjectableFault): Promise<FaultInjection>;
  /** Recover from the last injected fault */
  clearFault(): Promise<RecoveryResult>;
  getActiveFault(): InjectableFault | null;
}
