/**
 * Local Monitored Service Tests
 * Health checks go through MSW; files live in a temporary workdir
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { http, HttpResponse } from 'msw';
import { server } from '../../../../tests/mocks/server.js';
import { TEST_HEALTH_URL } from '../../../../tests/mocks/handlers.js';
import { LocalMonitoredService } from './local-monitored-service.js';

describe('LocalMonitoredService', () => {
  let workdir: string;
  let service: LocalMonitoredService;

  beforeEach(async () => {
    workdir = await mkdtemp(join(tmpdir(), 'remedyops-service-'));
    service = new LocalMonitoredService({ healthUrl: TEST_HEALTH_URL, workdir });
  });

  afterEach(async () => {
    await rm(workdir, { recursive: true, force: true });
  });

  describe('healthCheck', () => {
    it('should report a healthy service with its payload', async () => {
      const health = await service.healthCheck();

      expect(health.healthy).toBe(true);
      expect(health.data).toEqual({ status: 'healthy', uptime: 12 });
    });

    it('should carry the error fields of an unhealthy response', async () => {
      server.use(
        http.get(TEST_HEALTH_URL, () =>
          HttpResponse.json(
            { status: 'unhealthy', error: "name 'verify' is not defined", type: 'NameError', traceback: 'tb' },
            { status: 500 }
          )
        )
      );

      const health = await service.healthCheck();

      expect(health).toMatchObject({
        healthy: false,
        statusCode: 500,
        error: "name 'verify' is not defined",
        errorType: 'NameError',
        traceback: 'tb',
        detail: '',
      });
    });

    it('should report a failed request as unhealthy', async () => {
      server.use(http.get(TEST_HEALTH_URL, () => HttpResponse.error()));

      const health = await service.healthCheck();

      expect(health.healthy).toBe(false);
      expect(health.errorType).toBe('TypeError');
    });
  });

  describe('files and logs', () => {
    it('should return an empty string for a missing file', async () => {
      expect(await service.getFile('handler.py')).toBe('');
    });

    it('should return the last log lines', async () => {
      await writeFile(join(workdir, 'app.log'), 'one\ntwo\nthree\n');

      expect(await service.getLogs(2)).toBe('two\nthree');
    });
  });

  describe('applyRecovery', () => {
    it('should restore config.json from its backup', async () => {
      await writeFile(join(workdir, 'config.json'), '{broken');
      await writeFile(join(workdir, 'config.json.bak'), '{"cache_ttl": 300}');

      const result = await service.applyRecovery('bad_config');

      expect(result).toEqual({ fixed: true, action: 'config_restored', file: 'config.json' });
      expect(await readFile(join(workdir, 'config.json'), 'utf-8')).toBe('{"cache_ttl": 300}');
      expect(service.getLastRecovery()).toEqual(result);
    });

    it('should report a missing handler backup', async () => {
      const result = await service.applyRecovery('slow');

      expect(result).toEqual({
        fixed: false,
        action: 'handler_restored',
        file: 'handler.py',
        error: 'No backup for handler.py',
      });
    });

    it('should not claim a restart for an externally managed service', async () => {
      expect(service.isRunning()).toBe(true);
      expect(await service.applyRecovery('crash')).toEqual({
        fixed: false,
        action: 'restart_unavailable',
        error: 'Service is externally managed',
      });
    });

    it('should not recover an unknown fault', async () => {
      expect(await service.applyRecovery('unknown')).toEqual({ fixed: false, error: 'Unknown fault: unknown' });
    });
  });

  describe('fault injection', () => {
    const HANDLER = [
      'def validate():',
      '    config = _load_config()',
      '    assert config.get("database_url"), "Database URL not configured"',
      '    return config',
      '',
      'def analytics():',
      '    avg_order_value = total_revenue / len(ORDERS) if ORDERS else 0',
      '',
    ].join('\n');

    it('should corrupt config.json and restore it on clear', async () => {
      await writeFile(join(workdir, 'config.json.bak'), '{"cache_ttl": 300}');

      const injection = await service.injectFault('bad_config');

      expect(injection).toEqual({
        fault: 'bad_config',
        detail: 'config.json corrupted with invalid JSON',
        fileModified: 'config.json',
      });
      expect(await readFile(join(workdir, 'config.json'), 'utf-8')).toBe(
        '{"version": "2.3.1", "database_url": INVALID_NOT_QUOTED, "cache_ttl": 300}'
      );
      expect(service.getActiveFault()).toBe('bad_config');

      expect(await service.clearFault()).toEqual({ fixed: true, action: 'config_restored', file: 'config.json' });
      expect(await readFile(join(workdir, 'config.json'), 'utf-8')).toBe('{"cache_ttl": 300}');
      expect(service.getActiveFault()).toBeNull();
    });

    it('should break both handler.py injection points for a bug', async () => {
      await writeFile(join(workdir, 'handler.py'), HANDLER);

      await service.injectFault('bug');

      const handler = await readFile(join(workdir, 'handler.py'), 'utf-8');
      expect(handler.split('\n')).toEqual([
        'def validate():',
        '    config = _load_config()',
        '    status = verify_database_connection(config["database_url"])',
        '    assert status.is_connected, "Database health check failed"',
        '    return config',
        '',
        'def analytics():',
        '    avg_order_value = total_revenue / (len(ORDERS) - len(ORDERS))',
        '',
      ]);
    });

    it('should put a blocking sleep at the top of validate()', async () => {
      await writeFile(join(workdir, 'handler.py'), HANDLER);

      const injection = await service.injectFault('slow');

      const handler = await readFile(join(workdir, 'handler.py'), 'utf-8');
      expect(handler.split('\n').slice(0, 4)).toEqual([
        'def validate():',
        '    import time',
        '    time.sleep(10)',
        '    config = _load_config()',
      ]);
      expect(injection.fileModified).toBe('handler.py');
    });

    it('should refuse a handler without the injection point', async () => {
      await writeFile(join(workdir, 'handler.py'), 'def other():\n    pass\n');

      await expect(service.injectFault('bug')).rejects.toThrow('handler.py has no injection point for bug');
      expect(await readFile(join(workdir, 'handler.py'), 'utf-8')).toBe('def other():\n    pass\n');
      expect(service.getActiveFault()).toBeNull();
    });

    it('should refuse to crash a service it does not supervise', async () => {
      await expect(service.injectFault('crash')).rejects.toThrow('Crash injection needs a running supervised process');
    });

    it('should report nothing to clear without an injected fault', async () => {
      expect(await service.clearFault()).toEqual({ fixed: false, error: 'No active fault' });
    });
  });
});
