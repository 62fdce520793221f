import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, createRunId, getLogContext, withLogContext } from '../../../src/utils/observability/index.js';

const envSnapshot = { ...process.env };

afterEach(() => {
  process.env = { ...envSnapshot };
  vi.restoreAllMocks();
});

function captureStdout(): string[] {
  const lines: string[] = [];
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    lines.push(String(chunk));
    return true;
  });
  return lines;
}

describe('observability logger', () => {
  it('writes redacted JSON logs to local file in development', async () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'inbox-obs-log-'));
    const logFile = path.join(tempDir, 'app.ndjson');

    process.env.NODE_ENV = 'development';
    process.env.APP_LOG_FILE = logFile;
    process.env.LOG_LEVEL = 'debug';

    const logger = createLogger({ domain: 'unit-test' });
    captureStdout();

    await withLogContext({ runId: 'run_test_123' }, async () => {
      logger.info('test_event', {
        sender: 'Alice <alice@example.com>',
        token: 'test-secret',
        body: 'this should not be stored in clear text',
      });
    });

    await vi.waitFor(() => {
      expect(fs.existsSync(logFile)).toBe(true);
      const content = fs.readFileSync(logFile, 'utf-8');
      expect(content.trim().length).toBeGreaterThan(0);
    }, { timeout: 1000 });

    const lines = fs.readFileSync(logFile, 'utf-8').trim().split('\n');
    const payload = JSON.parse(lines[0]) as Record<string, unknown>;

    expect(payload.event).toBe('test_event');
    expect(payload.level).toBe('info');
    expect(payload.domain).toBe('unit-test');
    expect(payload.runId).toBe('run_test_123');
    expect(payload.sender).toBe('Alice <a***@example.com>');
    expect(payload.token).toBe('[REDACTED]');
    expect(payload.body).toBe('[REDACTED_TEXT len=39]');
  });

  it('does not write local file sink in production by default', () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'inbox-obs-log-'));
    const logFile = path.join(tempDir, 'app.ndjson');

    process.env.NODE_ENV = 'production';
    process.env.APP_LOG_FILE = logFile;
    process.env.LOG_LEVEL = 'info';
    captureStdout();

    const logger = createLogger({ domain: 'unit-test' });
    logger.info('prod_event', { ok: true });

    expect(fs.existsSync(logFile)).toBe(false);
  });

  it('drops records below the configured level', () => {
    process.env.LOG_LEVEL = 'warn';
    const lines = captureStdout();

    const logger = createLogger({ domain: 'unit-test' });
    logger.debug('debug_event');
    logger.info('info_event');

    expect(lines).toEqual([]);
  });

  it('merges child context into every record', () => {
    process.env.LOG_LEVEL = 'debug';
    const lines = captureStdout();

    createLogger({ domain: 'parent' }).child({ operation: 'refresh' }).info('child_event', { count: 2 });

    expect(lines).toHaveLength(1);
    const record = JSON.parse(lines[0]) as Record<string, unknown>;
    expect(record).toMatchObject({ level: 'info', event: 'child_event', domain: 'parent', operation: 'refresh', count: 2 });
  });
});

describe('log context', () => {
  it('nests contexts and restores the parent afterwards', () => {
    withLogContext({ runId: 'outer' }, () => {
      withLogContext({ requestId: 'inner' }, () => {
        expect(getLogContext()).toEqual({ runId: 'outer', requestId: 'inner' });
      });
      expect(getLogContext()).toEqual({ runId: 'outer' });
    });
    expect(getLogContext()).toEqual({});
  });

  it('creates prefixed run ids', () => {
    expect(createRunId('fetch')).toMatch(/^fetch_[0-9a-f]{12}$/);
  });
});
