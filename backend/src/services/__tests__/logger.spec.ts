/**
 * Structured Logger Tests
 */

import { mkdtempSync, readFileSync, rmSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { applyLoggingSettings, logger, createServiceLogger, ServiceLogger, type LoggerConfig } from '../logger';
import { DeviceBusyError } from '../communication/errors';

describe('Structured Logger', () => {
  let original: LoggerConfig;
  let dir: string;

  const logLines = (): Array<Record<string, unknown>> => {
    const file = join(dir, 'test.log');
    if (!existsSync(file)) return [];
    return readFileSync(file, 'utf8')
      .split('\n')
      .filter(Boolean)
      .map(line => JSON.parse(line));
  };

  beforeAll(() => {
    original = logger.getConfig();
  });

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'logger-'));
    logger.updateConfig({ logDir: dir, logFile: 'test.log', level: 'info', format: 'json', console: false, serviceLevels: {} });
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  afterAll(() => {
    logger.updateConfig(original);
  });

  it('creates service loggers', () => {
    expect(createServiceLogger('detector')).toBeInstanceOf(ServiceLogger);
  });

  it('tags every entry of a traced logger', () => {
    const log = createServiceLogger('engine').withTrace('session_1');

    log.info('attempt_start', 'first');
    log.info('attempt_start', 'second', 'session_2');

    expect(logLines().map(entry => entry.trace_id)).toEqual(['session_1', 'session_2']);
  });

  it('redacts credential-like metadata', () => {
    createServiceLogger('config').info('loaded', 'Configuration loaded', undefined, {
      auditSecret: 'test-secret',
      logLevel: 'info'
    });

    expect(logLines()[0].metadata).toEqual({ auditSecret: '[redacted]', logLevel: 'info' });
  });

  it('writes one JSON line per entry', () => {
    createServiceLogger('engine').info('session_start', 'Session started', 'session_1', { candidates: 2 });

    const [entry] = logLines();
    expect(entry).toMatchObject({
      service: 'engine',
      event: 'session_start',
      severity: 'info',
      trace_id: 'session_1',
      message: 'Session started',
      metadata: { candidates: 2 }
    });
    expect(typeof entry.timestamp).toBe('string');
  });

  it('omits an absent trace id', () => {
    createServiceLogger('engine').info('idle', 'Nothing to do');

    expect('trace_id' in logLines()[0]).toBe(false);
  });

  it('filters below the configured level', () => {
    const log = createServiceLogger('detector');
    log.debug('scan_detail', 'hidden');
    log.warn('scan_timeout', 'shown');

    expect(logLines().map(entry => entry.event)).toEqual(['scan_timeout']);
  });

  it('honours per-service levels', () => {
    logger.updateConfig({ serviceLevels: { detector: 'error' } });

    createServiceLogger('detector').warn('scan_timeout', 'hidden');
    createServiceLogger('engine').warn('session_aborted', 'shown');

    expect(logLines().map(entry => entry.service)).toEqual(['engine']);
  });

  it('records error name, message and code', () => {
    createServiceLogger('communication').error('lease_failed', 'Lease failed', new DeviceBusyError('R58N12ABCDE', 100));

    expect(logLines()[0].error).toMatchObject({
      name: 'DeviceBusyError',
      message: 'Device R58N12ABCDE is busy; lease not acquired within 100ms',
      code: 'DEVICE_BUSY'
    });
  });

  it('writes text lines when asked', () => {
    logger.updateConfig({ format: 'text' });

    createServiceLogger('audit').warn('audit_delivery_failed', 'disk full', 'session_1');

    const line = readFileSync(join(dir, 'test.log'), 'utf8').trim();
    expect(line).toMatch(/^\[\S+\] \[WARN\] audit audit_delivery_failed disk full \[trace:session_1\]$/);
  });

  it('applies the logging section of the environment config', () => {
    applyLoggingSettings({ level: 'warn', format: 'text', directory: dir, file: 'applied.log' });

    const log = createServiceLogger('cli');
    log.info('config_loaded', 'hidden');
    log.warn('config_warning', 'shown');

    expect(logger.getConfig()).toMatchObject({ level: 'warn', format: 'text', logDir: dir, logFile: 'applied.log' });
    const lines = readFileSync(join(dir, 'applied.log'), 'utf8').trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\S+\] \[WARN\] cli config_warning shown$/);
  });

  it('times operations', () => {
    logger.updateConfig({ level: 'debug' });
    jest.spyOn(console, 'log').mockImplementation(() => undefined);

    const duration = createServiceLogger('detector').startTimer('scan').end({ devices: 1 });

    expect(duration).toBeGreaterThanOrEqual(0);
    expect(logLines()[0]).toMatchObject({
      service: 'performance-monitor',
      event: 'operation_duration',
      operation: 'detector:scan',
      metadata: { devices: 1 }
    });
  });
});
