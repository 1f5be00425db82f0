/**
 * Local Sandbox
 * Runs fix and test snippets in a child shell inside a scratch copy of the
 * service workdir, so a trial never touches the live files.
 */

import { spawn } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import { cp, mkdir, realpath, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createChildLogger, errorMessage, type SandboxOutcome } from '@remedyops/shared';
import type { ExecutionSandbox } from './types.js';

export interface LocalSandboxConfig {
  workdir: string;
  shell: string;
  timeoutMs: number;
  outputLimit: number;
  /** Parent directory for scratch copies */
  scratchRoot: string;
}

interface RunResult {
  exitCode: number;
  output: string;
  timedOut: boolean;
}

const DEFAULT_CONFIG: LocalSandboxConfig = {
  workdir: process.cwd(),
  shell: '/bin/sh',
  timeoutMs: 15000,
  outputLimit: 5000,
  scratchRoot: tmpdir(),
};

/**
 * The result used whenever the sandbox cannot give an answer
 */
export const SKIPPED_SANDBOX_OUTCOME: SandboxOutcome = {
  fixApplied: false,
  testPassed: false,
  skipped: true,
};

export class LocalSandbox implements ExecutionSandbox {
  private config: LocalSandboxConfig;
  private logger = createChildLogger({ component: 'LocalSandbox' });

  constructor(config: Partial<LocalSandboxConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async testFix(fixCode: string, testCode: string): Promise<SandboxOutcome> {
    const scratch = await this.createScratchCopy();
    try {
      return await this.trial(fixCode, testCode, scratch);
    } finally {
      await this.cleanup(scratch);
    }
  }

  private async trial(fixCode: string, testCode: string, cwd: string): Promise<SandboxOutcome> {
    let fixOutput = '';

    if (fixCode.trim()) {
      const fix = await this.run(fixCode, cwd);
      fixOutput = fix.output;
      if (fix.exitCode !== 0) {
        this.logger.info({ exitCode: fix.exitCode, timedOut: fix.timedOut }, 'Fix snippet failed');
        return { fixApplied: false, testPassed: false, fixOutput, ...(fix.timedOut && { timedOut: true }) };
      }
    }

    if (!testCode.trim()) {
      return { fixApplied: true, testPassed: true, fixOutput };
    }

    const test = await this.run(testCode, cwd);
    this.logger.info({ exitCode: test.exitCode, timedOut: test.timedOut }, 'Sandbox test finished');

    return {
      fixApplied: true,
      testPassed: test.exitCode === 0,
      fixOutput,
      testOutput: test.output,
      ...(test.timedOut && { timedOut: true }),
    };
  }

  private async createScratchCopy(): Promise<string> {
    const rawDir = join(this.config.scratchRoot, `remedyops-sandbox-${randomUUID()}`);
    await mkdir(rawDir, { recursive: true });
    const scratch = await realpath(rawDir);
    try {
      await cp(this.config.workdir, scratch, { recursive: true });
    } catch (error) {
      await this.cleanup(scratch);
      throw error;
    }
    return scratch;
  }

  private async cleanup(scratch: string): Promise<void> {
    try {
      await rm(scratch, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn({ scratch, error: errorMessage(error) }, 'Failed to remove sandbox scratch directory');
    }
  }

  /**
   * The shell leads its own process group. The timer kills the whole group,
   * so a snippet that forks or sleeps cannot outlive timeoutMs.
   */
  private run(script: string, cwd: string): Promise<RunResult> {
    return new Promise((resolve) => {
      const proc = spawn(this.config.shell, ['-c', script], {
        cwd,
        detached: true,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let output = '';
      let settled = false;

      const finish = (result: RunResult): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      const timer = setTimeout(() => {
        this.killGroup(proc.pid);
        finish({ exitCode: 124, output, timedOut: true });
      }, this.config.timeoutMs);

      const append = (data: Buffer): void => {
        if (output.length < this.config.outputLimit) {
          output = (output + data.toString()).slice(0, this.config.outputLimit);
        }
      };

      proc.stdout.on('data', append);
      proc.stderr.on('data', append);

      // Background children of a finished shell still hold the pipes open
      proc.on('exit', () => {
        this.killGroup(proc.pid);
      });

      proc.on('close', (exitCode) => {
        finish({ exitCode: exitCode ?? 1, output, timedOut: false });
      });

      proc.on('error', (error) => {
        finish({ exitCode: 1, output: errorMessage(error), timedOut: false });
      });
    });
  }

  private killGroup(pid: number | undefined): void {
    if (pid === undefined) {
      return;
    }
    try {
      process.kill(-pid, 'SIGKILL');
    } catch (error) {
      // ESRCH: the group has already exited
      this.logger.debug({ pid, error: errorMessage(error) }, 'Process group already gone');
    }
  }
}

/**
 * Run a sandbox test, mapping an absent or failing sandbox to the skipped outcome
 */
export async function runSandboxTest(
  sandbox: ExecutionSandbox | null,
  fixCode: string,
  testCode: string
): Promise<SandboxOutcome> {
  if (!sandbox) {
    return { ...SKIPPED_SANDBOX_OUTCOME };
  }
  try {
    return await sandbox.testFix(fixCode, testCode);
  } catch (error) {
    createChildLogger({ component: 'LocalSandbox' }).warn({ error: errorMessage(error) }, 'Sandbox unavailable');
    return { ...SKIPPED_SANDBOX_OUTCOME };
  }
}
