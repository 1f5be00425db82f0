/**
 * Local Monitored Service
 * HTTP health check plus a workspace directory holding the service files,
 * their `.bak` copies and `app.log`. When a start command is configured the
 * service runs as a supervised child process.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { copyFile, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import {
  createChildLogger,
  errorMessage,
  ValidationError,
  type FaultInjection,
  type FaultType,
  type HealthSignal,
  type InjectableFault,
  type RecoveryResult,
} from '@remedyops/shared';
import type { SupervisedService } from './types.js';

export interface LocalServiceConfig {
  name: string;
  healthUrl: string;
  workdir: string;
  /** Empty means the service is managed elsewhere and only health-checked */
  startCommand: string;
  healthTimeoutMs: number;
  /** Health polls while waiting for a (re)started process */
  startupPolls: number;
  startupPollIntervalMs: number;
}

const DEFAULT_CONFIG: LocalServiceConfig = {
  name: 'target-app',
  healthUrl: 'http://127.0.0.1:8001/health',
  workdir: './target_app',
  startCommand: '',
  healthTimeoutMs: 5000,
  startupPolls: 20,
  startupPollIntervalMs: 300,
};

const RECOVERY_FILES: Partial<Record<FaultType, { file: string; action: string }>> = {
  bad_config: { file: 'config.json', action: 'config_restored' },
  bug: { file: 'handler.py', action: 'handler_restored' },
  slow: { file: 'handler.py', action: 'handler_restored' },
};

const CORRUPT_CONFIG = '{"version": "2.3.1", "database_url": INVALID_NOT_QUOTED, "cache_ttl": 300}';

interface TextEdit {
  find: string;
  replace: string;
}

const HANDLER_FAULTS: Record<'bug' | 'slow', { edits: TextEdit[]; detail: string }> = {
  bug: {
    edits: [
      {
        find: '    assert config.get("database_url"), "Database URL not configured"',
        replace:
          '    status = verify_database_connection(config["database_url"])\n' +
          '    assert status.is_connected, "Database health check failed"',
      },
      {
        find: '    avg_order_value = total_revenue / len(ORDERS) if ORDERS else 0',
        replace: '    avg_order_value = total_revenue / (len(ORDERS) - len(ORDERS))',
      },
    ],
    detail: 'handler.py corrupted: NameError in validate() and ZeroDivisionError in analytics',
  },
  slow: {
    edits: [
      {
        find: 'def validate():\n',
        replace: 'def validate():\n    import time\n    time.sleep(10)\n',
      },
    ],
    detail: 'handler.py injected with time.sleep(10) in validate()',
  },
};

const errorBodySchema = z
  .object({
    error: z.string().optional(),
    type: z.string().optional(),
    traceback: z.string().optional(),
    detail: z.string().optional(),
  })
  .passthrough();

function causeCode(error: unknown): string | undefined {
  if (!(error instanceof Error) || typeof error.cause !== 'object' || error.cause === null) {
    return undefined;
  }
  const code = 'code' in error.cause ? error.cause.code : undefined;
  return typeof code === 'string' ? code : undefined;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class LocalMonitoredService implements SupervisedService {
  private config: LocalServiceConfig;
  private process: ChildProcess | null = null;
  private starting = false;
  private lastRecovery: RecoveryResult | null = null;
  private activeFault: InjectableFault | null = null;
  private logger = createChildLogger({ component: 'LocalMonitoredService' });

  constructor(config: Partial<LocalServiceConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get name(): string {
    return this.config.name;
  }

  get healthUrl(): string {
    return this.config.healthUrl;
  }

  get supervised(): boolean {
    return this.config.startCommand.length > 0;
  }

  isRunning(): boolean {
    if (!this.supervised) {
      return true;
    }
    return this.process !== null && this.process.exitCode === null && this.process.signalCode === null;
  }

  getLastRecovery(): RecoveryResult | null {
    return this.lastRecovery;
  }

  getActiveFault(): InjectableFault | null {
    return this.activeFault;
  }

  // ===========================================
  // Health
  // ===========================================

  async healthCheck(): Promise<HealthSignal> {
    if (this.starting) {
      return { healthy: true, status: 'starting' };
    }
    if (!this.isRunning()) {
      return { healthy: false, error: 'Process not running (crashed or killed)', errorType: 'ProcessDown' };
    }

    const started = Date.now();
    try {
      const response = await fetch(this.config.healthUrl, {
        signal: AbortSignal.timeout(this.config.healthTimeoutMs),
      });
      const responseTimeMs = Date.now() - started;
      const body: unknown = await response.json().catch(() => ({}));

      if (response.status === 200) {
        const data = z.record(z.unknown()).safeParse(body);
        return { healthy: true, responseTimeMs, data: data.success ? data.data : {} };
      }

      const parsed = errorBodySchema.safeParse(body);
      const details: z.infer<typeof errorBodySchema> = parsed.success ? parsed.data : {};
      return {
        healthy: false,
        statusCode: response.status,
        error: details.error ?? '',
        errorType: details.type ?? '',
        traceback: details.traceback ?? '',
        detail: details.detail ?? '',
        responseTimeMs,
      };
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        const seconds = Math.round(this.config.healthTimeoutMs / 1000);
        return {
          healthy: false,
          error: `Health check timed out (>${seconds}s)`,
          errorType: 'Timeout',
          responseTimeMs: this.config.healthTimeoutMs,
        };
      }
      if (causeCode(error) === 'ECONNREFUSED') {
        return {
          healthy: false,
          error: `Connection refused at ${this.config.healthUrl}`,
          errorType: 'ConnectionRefused',
        };
      }
      return {
        healthy: false,
        error: errorMessage(error),
        errorType: error instanceof Error ? error.name : 'Error',
      };
    }
  }

  // ===========================================
  // Files
  // ===========================================

  /**
   * File content, or an empty string when it does not exist
   */
  async getFile(fileName: string): Promise<string> {
    try {
      return await readFile(join(this.config.workdir, fileName), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return '';
      }
      throw error;
    }
  }

  async getLogs(limit = 30): Promise<string> {
    const content = await this.getFile('app.log');
    if (!content) {
      return '';
    }
    const lines = content.split('\n');
    if (lines.at(-1) === '') {
      lines.pop();
    }
    return lines.slice(-limit).join('\n');
  }

  // ===========================================
  // Recovery
  // ===========================================

  async applyRecovery(faultType: FaultType): Promise<RecoveryResult> {
    let result: RecoveryResult;

    if (faultType === 'crash') {
      if (this.supervised) {
        await this.restart();
        result = { fixed: true, action: 'process_restarted' };
      } else {
        result = { fixed: false, action: 'restart_unavailable', error: 'Service is externally managed' };
      }
    } else {
      const target = RECOVERY_FILES[faultType];
      if (!target) {
        result = { fixed: false, error: `Unknown fault: ${faultType}` };
      } else {
        const source = join(this.config.workdir, `${target.file}.bak`);
        try {
          await copyFile(source, join(this.config.workdir, target.file));
          result = { fixed: true, action: target.action, file: target.file };
        } catch (error) {
          if (!isNotFound(error)) {
            throw error;
          }
          result = { fixed: false, action: target.action, file: target.file, error: `No backup for ${target.file}` };
        }
      }
    }

    this.lastRecovery = result;
    if (result.fixed) {
      this.activeFault = null;
    }
    this.logger.info({ faultType, ...result }, 'Recovery action applied');
    return result;
  }

  // ===========================================
  // Fault injection
  // ===========================================

  async injectFault(fault: InjectableFault): Promise<FaultInjection> {
    let injection: FaultInjection;

    if (fault === 'crash') {
      await this.kill();
      injection = { fault, detail: 'Process killed (simulating OOM kill)', fileModified: null };
    } else if (fault === 'bad_config') {
      await writeFile(join(this.config.workdir, 'config.json'), CORRUPT_CONFIG);
      injection = { fault, detail: 'config.json corrupted with invalid JSON', fileModified: 'config.json' };
    } else {
      const { edits, detail } = HANDLER_FAULTS[fault];
      let handler = await this.getFile('handler.py');
      for (const edit of edits) {
        if (!handler.includes(edit.find)) {
          throw new ValidationError(`handler.py has no injection point for ${fault}`, { fault });
        }
        handler = handler.replace(edit.find, () => edit.replace);
      }
      await writeFile(join(this.config.workdir, 'handler.py'), handler);
      injection = { fault, detail, fileModified: 'handler.py' };
    }

    this.activeFault = fault;
    this.logger.warn({ ...injection }, 'Fault injected');
    return injection;
  }

  async clearFault(): Promise<RecoveryResult> {
    if (!this.activeFault) {
      return { fixed: false, error: 'No active fault' };
    }
    return this.applyRecovery(this.activeFault);
  }

  // ===========================================
  // Process supervision
  // ===========================================

  async start(): Promise<void> {
    if (!this.supervised || this.isRunning()) {
      return;
    }

    this.starting = true;
    try {
      this.process = spawn(this.config.startCommand, {
        cwd: this.config.workdir,
        shell: true,
        stdio: 'ignore',
      });
      this.process.on('error', (error) => {
        this.logger.error({ error: error.message }, 'Service process error');
      });
      this.logger.info({ pid: this.process.pid, command: this.config.startCommand }, 'Service process started');

      for (let poll = 0; poll < this.config.startupPolls; poll++) {
        await this.delay(this.config.startupPollIntervalMs);
        if (await this.respondsHealthy()) {
          return;
        }
      }
      this.logger.warn({ polls: this.config.startupPolls }, 'Service did not report healthy after start');
    } finally {
      this.starting = false;
    }
  }

  async stop(): Promise<void> {
    const proc = this.process;
    if (!proc) {
      return;
    }
    this.process = null;
    if (proc.exitCode !== null || proc.signalCode !== null) {
      return;
    }

    const exited = new Promise<void>((resolve) => proc.once('exit', () => resolve()));
    proc.kill('SIGTERM');
    const timer = setTimeout(() => proc.kill('SIGKILL'), 5000);
    await exited;
    clearTimeout(timer);
  }

  /**
   * SIGKILL the supervised process without restarting it
   */
  private async kill(): Promise<void> {
    const proc = this.process;
    if (!proc || !this.isRunning()) {
      throw new ValidationError('Crash injection needs a running supervised process');
    }
    const exited = new Promise<void>((resolve) => proc.once('exit', () => resolve()));
    proc.kill('SIGKILL');
    await exited;
  }

  async restart(): Promise<void> {
    if (!this.supervised) {
      this.logger.info({ service: this.config.name }, 'Service is externally managed, restart skipped');
      return;
    }
    await this.stop();
    await this.delay(500);
    await this.start();
  }

  private async respondsHealthy(): Promise<boolean> {
    try {
      const response = await fetch(this.config.healthUrl, { signal: AbortSignal.timeout(2000) });
      return response.status === 200;
    } catch {
      return false;
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
