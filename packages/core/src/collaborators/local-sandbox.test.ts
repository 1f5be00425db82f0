/**
 * Local Sandbox Tests
 * Snippets run in a real shell against a scratch copy of a temporary workdir
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { LocalSandbox, runSandboxTest } from './local-sandbox.js';
import type { ExecutionSandbox } from './types.js';

describe('LocalSandbox', () => {
  let workdir: string;
  let scratchRoot: string;

  const createSandbox = (overrides: ConstructorParameters<typeof LocalSandbox>[0] = {}) =>
    new LocalSandbox({ workdir, scratchRoot, ...overrides });

  beforeEach(async () => {
    workdir = await mkdtemp(join(tmpdir(), 'sandbox-workdir-'));
    scratchRoot = await mkdtemp(join(tmpdir(), 'sandbox-scratch-'));
    await writeFile(join(workdir, 'config.json'), '{"port": 8001}');
  });

  afterEach(async () => {
    await rm(workdir, { recursive: true, force: true });
    await rm(scratchRoot, { recursive: true, force: true });
  });

  it('should stop when the fix snippet fails', async () => {
    const result = await createSandbox().testFix('echo bad; exit 3', 'echo never');

    expect(result).toEqual({ fixApplied: false, testPassed: false, fixOutput: 'bad\n' });
  });

  it('should pass without running anything when there is no test code', async () => {
    const result = await createSandbox().testFix('# restart', '');

    expect(result).toEqual({ fixApplied: true, testPassed: true, fixOutput: '' });
  });

  it('should report the test exit status', async () => {
    const sandbox = createSandbox();

    const passed = await sandbox.testFix('true', 'echo ok');
    const failed = await sandbox.testFix('true', 'echo nope >&2; exit 1');

    expect(passed).toEqual({ fixApplied: true, testPassed: true, fixOutput: '', testOutput: 'ok\n' });
    expect(failed.testPassed).toBe(false);
    expect(failed.testOutput).toBe('nope\n');
  });

  it('should truncate output to the configured limit', async () => {
    const result = await createSandbox({ outputLimit: 10 }).testFix('', 'printf 0123456789abcdef');

    expect(result.testOutput).toBe('0123456789');
  });

  it('should treat a timeout as a failed test', async () => {
    const result = await createSandbox({ timeoutMs: 100 }).testFix('', 'exec sleep 2');

    expect(result.fixApplied).toBe(true);
    expect(result.testPassed).toBe(false);
    expect(result.timedOut).toBe(true);
  });

  it('should kill a fix snippet with a child process at the timeout', async () => {
    const started = Date.now();

    const result = await createSandbox({ timeoutMs: 300 }).testFix('sleep 4; echo late', 'echo never');

    expect(Date.now() - started).toBeLessThan(2000);
    expect(result).toEqual({ fixApplied: false, testPassed: false, fixOutput: '', timedOut: true });
  });

  it('should not wait for background children of a finished snippet', async () => {
    const started = Date.now();

    const result = await createSandbox({ timeoutMs: 5000 }).testFix('', '(sleep 4) & echo done');

    expect(Date.now() - started).toBeLessThan(2000);
    expect(result.testPassed).toBe(true);
    expect(result.testOutput).toBe('done\n');
  });

  it('should run against a copy and leave the live workdir untouched', async () => {
    const result = await createSandbox().testFix('echo broken > config.json', 'cat config.json');

    expect(result.testOutput).toBe('broken\n');
    expect(await readFile(join(workdir, 'config.json'), 'utf-8')).toBe('{"port": 8001}');
  });

  it('should remove the scratch copy afterwards', async () => {
    await createSandbox().testFix('true', 'true');

    expect(await readdir(scratchRoot)).toEqual([]);
  });

  it('should reject when the workdir cannot be copied', async () => {
    const sandbox = createSandbox({ workdir: join(workdir, 'missing') });

    await expect(sandbox.testFix('true', 'true')).rejects.toThrow();
  });
});

describe('runSandboxTest', () => {
  it('should return the skipped outcome without a sandbox', async () => {
    expect(await runSandboxTest(null, 'true', 'true')).toEqual({
      fixApplied: false,
      testPassed: false,
      skipped: true,
    });
  });

  it('should return the skipped outcome when the sandbox throws', async () => {
    const broken: ExecutionSandbox = {
      testFix: () => Promise.reject(new Error('sandbox offline')),
    };

    expect(await runSandboxTest(broken, 'true', 'true')).toEqual({
      fixApplied: false,
      testPassed: false,
      skipped: true,
    });
  });
});
