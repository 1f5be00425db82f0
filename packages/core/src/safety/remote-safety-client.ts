/**
 * Remote Safety Client
 * HTTP guardrail service: POST {apiUrl}/session/check with the incident
 * context and the fix as a two-message session.
 */

import { z } from 'zod';
import {
  createChildLogger,
  errorMessage,
  TransientCollaboratorError,
  type SafetyContext,
  type SafetyResult,
} from '@remedyops/shared';

export interface RemoteSafetyConfig {
  apiKey: string;
  apiUrl: string;
  deploymentId: string;
  timeoutMs?: number;
}

const policySchema = z.object({
  name: z.string().optional(),
  flagged: z.boolean().optional(),
});

const checkResponseSchema = z.object({
  flagged: z.boolean().default(false),
  policies: z.record(policySchema).default({}),
  internal_session_id: z.string().optional(),
});

const logger = createChildLogger({ component: 'RemoteSafetyClient' });

export class RemoteSafetyClient {
  private config: Required<RemoteSafetyConfig>;

  constructor(config: RemoteSafetyConfig) {
    this.config = { timeoutMs: 15000, ...config };
  }

  isConfigured(): boolean {
    return this.config.apiKey.length > 0;
  }

  /**
   * Throws TransientCollaboratorError on any transport, status or payload failure
   */
  async check(context: SafetyContext, fixText: string): Promise<SafetyResult> {
    let body: unknown;
    try {
      const response = await fetch(`${this.config.apiUrl}/session/check`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          deployment_id: this.config.deploymentId,
          messages: [
            {
              role: 'user',
              content:
                `[Safety Check] Fault: ${context.faultType} | Severity: ${context.severity}\n` +
                `Root cause: ${context.rootCause}\n` +
                'Proposed fix needs safety validation before deployment.',
            },
            { role: 'assistant', content: fixText },
          ],
        }),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });

      const text = await response.text();
      if (!response.ok || !text.trim()) {
        throw new Error(`HTTP ${response.status}: ${text.slice(0, 200) || 'empty'}`);
      }
      body = JSON.parse(text);
    } catch (error) {
      throw new TransientCollaboratorError('remote-safety', errorMessage(error));
    }

    const parsed = checkResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransientCollaboratorError('remote-safety', 'Unexpected response shape');
    }

    const { flagged, policies, internal_session_id: sessionId } = parsed.data;
    const passed = !flagged;
    const entries = Object.entries(policies);

    const checks: Record<string, boolean> = {};
    const warnings: string[] = [];
    for (const [id, policy] of entries) {
      const name = policy.name ?? id;
      checks[name] = !policy.flagged;
      if (policy.flagged) {
        warnings.push(`Flagged by: ${name}`);
      }
    }

    const lines = [
      'Safety analysis (remote)',
      `Fault type: ${context.faultType} | Severity: ${context.severity}`,
      `Verdict: ${passed ? 'SAFE, no policies flagged' : 'UNSAFE, flagged by policy'}`,
    ];
    if (entries.length > 0) {
      lines.push('', 'Policies:');
      for (const [name, ok] of Object.entries(checks)) {
        lines.push(`  [${ok ? 'pass' : 'fail'}] ${name}`);
      }
    }
    const reasoning = lines.join('\n');

    logger.info({ faultType: context.faultType, passed, policies: entries.length }, 'Remote safety check completed');

    return {
      passed,
      score: passed ? 1.0 : 0.1,
      checks,
      warnings,
      reasoning,
      providerMode: 'api',
      ...(sessionId ? { sessionId } : {}),
    };
  }
}
