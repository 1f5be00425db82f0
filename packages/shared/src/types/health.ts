/**
 * Health signal reported by the monitored service
 */

export interface HealthSignal {
  healthy: boolean;
  status?: string;
  statusCode?: number;
  error?: string;
  errorType?: string;
  traceback?: string;
  detail?: string;
  responseTimeMs?: number;
  data?: Record<string, unknown>;
}

/**
 * Evidence bundle handed to diagnosis strategies
 */
export interface EvidenceBundle {
  health: HealthSignal;
  logs: string;
  traceback: string;
  handlerCode: string;
  configContent: string;
}

export interface RecoveryResult {
  fixed: boolean;
  action?: string;
  file?: string;
  error?: string;
}
