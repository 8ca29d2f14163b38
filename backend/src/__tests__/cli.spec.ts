/**
 * Command line tests against a stubbed orchestrator
 */

import { mkdtempSync, rmSync, writeFileSync, readFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { runInNewContext } from 'vm';
import chalk from 'chalk';
import { EXIT_CODES, createProgram, exitCodeFor, exitCodeForSession, type CliOrchestrator } from '../cli';
import { AmbiguousDeviceError, DeviceNotFoundError, NoDeviceError } from '../services/orchestrator';
import { AuthorizationDeniedError } from '../services/bypass/errors';
import { JsonlAuditSink } from '../services/audit/auditSink';
import { snapshotOf } from './support/fakeDevice';
import type { BypassSession, SessionStatus } from '../types/session';

jest.mock('usb', () => ({ getDeviceList: jest.fn(() => []), WebUSBDevice: { createInstance: jest.fn() } }));

const SECRET = 'test-secret-0123456789';

const sessionWith = (finalStatus: SessionStatus, summary: string): BypassSession => ({
  sessionId: 'session_test',
  deviceSerial: 'R58N12ABCDE',
  startedAt: '2024-01-01T00:00:00.000Z',
  endedAt: '2024-01-01T00:00:01.000Z',
  dryRun: finalStatus === 'DryRun',
  profileSource: 'catalog',
  modelName: 'Galaxy A52',
  plan: [{ methodName: 'adb-setup-state-read', weight: 0.6, riskTier: 0, requiredMode: 'DebugBridge', cacheHint: false }],
  attempts: [],
  finalStatus,
  summary
});

const fakeOrchestrator = () => {
  const orchestrator: jest.Mocked<CliOrchestrator> = {
    detect: jest.fn().mockResolvedValue([snapshotOf()]),
    info: jest.fn(),
    bypass: jest.fn(),
    methods: jest.fn().mockReturnValue([]),
    shutdown: jest.fn().mockResolvedValue(undefined)
  };
  return orchestrator;
};

describe('cli', () => {
  let out: string[];
  let err: string[];
  let orchestrator: jest.Mocked<CliOrchestrator>;
  let auditLogPath: string;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    out = [];
    err = [];
    orchestrator = fakeOrchestrator();
    auditLogPath = join(tmpdir(), 'missing-audit.jsonl');
  });

  const run = async (...args: string[]): Promise<number> => {
    const { program, exitCode } = createProgram({
      orchestrator: () => orchestrator,
      auditSecret: () => SECRET,
      auditLogPath: () => auditLogPath,
      io: { out: line => out.push(line), err: line => err.push(line) }
    });
    program.exitOverride();
    await program.parseAsync(args, { from: 'user' });
    return exitCode();
  };

  describe('detect', () => {
    it('lists devices in a table', async () => {
      await expect(run('detect')).resolves.toBe(EXIT_CODES.OK);

      expect(out[0]).toContain('R58N12ABCDE');
      expect(out[0]).toContain('04e8:6860');
      expect(out[0]).toContain('12 (API 31)');
      expect(orchestrator.shutdown).toHaveBeenCalledTimes(1);
    });

    it('prints JSON when asked', async () => {
      await run('detect', '--json');

      expect(JSON.parse(out[0])).toEqual([snapshotOf()]);
    });

    it('exits 3 when nothing is attached', async () => {
      orchestrator.detect.mockResolvedValue([]);

      await expect(run('detect')).resolves.toBe(EXIT_CODES.NO_DEVICE);
      expect(out).toEqual(['No supported devices attached.']);
    });

    it('prints a foreign-realm error once', async () => {
      orchestrator.detect.mockRejectedValue(runInNewContext('new Error("ENOENT: no such file")'));

      await expect(run('detect')).resolves.toBe(EXIT_CODES.FAILURE);
      expect(err).toEqual(['Error: ENOENT: no such file']);
    });
  });

  describe('info', () => {
    it('shows the resolved profile', async () => {
      orchestrator.info.mockResolvedValue({
        snapshot: snapshotOf(),
        resolved: {
          source: 'catalog',
          profile: {
            manufacturer: 'Samsung',
            modelName: 'Galaxy A52',
            supportedMethodNames: new Set(['adb-setup-state-read']),
            declaredSuccessRate: new Map([['adb-setup-state-read', 60]]),
            difficulty: 'hard',
            apiRange: { min: 30, max: 34 }
          }
        },
        plan: []
      });

      await expect(run('info', 'R58N12ABCDE')).resolves.toBe(EXIT_CODES.OK);

      expect(orchestrator.info).toHaveBeenCalledWith('R58N12ABCDE');
      expect(out[1]).toBe('Profile: Galaxy A52 (catalog, hard)');
      expect(out[2]).toBe('No applicable methods.');
    });

    it('exits 3 for a serial that is not attached', async () => {
      orchestrator.info.mockRejectedValue(new DeviceNotFoundError('MISSING'));

      await expect(run('info', 'MISSING')).resolves.toBe(EXIT_CODES.NO_DEVICE);
      expect(err).toEqual(['Device MISSING is not attached']);
    });
  });

  describe('bypass', () => {
    it('passes serial, method and dry run through', async () => {
      orchestrator.bypass.mockResolvedValue(sessionWith('DryRun', 'DryRun: 1 candidate(s), first adb-setup-state-read'));

      await expect(run('bypass', '-s', 'R58N12ABCDE', '-m', 'adb-setup-state-read', '--dry-run')).resolves.toBe(
        EXIT_CODES.OK
      );

      expect(orchestrator.bypass).toHaveBeenCalledWith({
        serial: 'R58N12ABCDE',
        method: 'adb-setup-state-read',
        dryRun: true
      });
      expect(out[out.length - 1]).toBe('DryRun DryRun: 1 candidate(s), first adb-setup-state-read');
    });

    it('exits 1 when every method failed', async () => {
      orchestrator.bypass.mockResolvedValue(
        sessionWith('ExhaustedAllMethods', 'ExhaustedAllMethods: no applicable methods for this device')
      );

      await expect(run('bypass')).resolves.toBe(EXIT_CODES.FAILURE);
      expect(orchestrator.bypass).toHaveBeenCalledWith({ serial: undefined, method: undefined, dryRun: false });
    });

    it('exits 2 when authorization is denied', async () => {
      orchestrator.bypass.mockRejectedValue(new AuthorizationDeniedError('R58N12ABCDE'));

      await expect(run('bypass', '--serial', 'R58N12ABCDE')).resolves.toBe(EXIT_CODES.AUTHORIZATION_DENIED);
      expect(err).toEqual(['Denied: Bypass not authorized for device R58N12ABCDE']);
      expect(orchestrator.shutdown).toHaveBeenCalledTimes(1);
    });

    it('exits 3 when no device is attached', async () => {
      orchestrator.bypass.mockRejectedValue(new NoDeviceError());

      await expect(run('bypass')).resolves.toBe(EXIT_CODES.NO_DEVICE);
    });

    it('asks for a serial when several devices are attached', async () => {
      orchestrator.bypass.mockRejectedValue(new AmbiguousDeviceError(['A', 'B']));

      await expect(run('bypass')).resolves.toBe(EXIT_CODES.FAILURE);
      expect(err).toEqual(['Several devices attached (A, B); pass --serial']);
    });

    it('prints the session as JSON', async () => {
      const session = sessionWith('Success', 'Success: adb-setup-state-read cleared the lock after 1 attempt(s)');
      orchestrator.bypass.mockResolvedValue(session);

      await run('bypass', '--json');

      expect(JSON.parse(out[0])).toEqual(session);
    });
  });

  describe('methods', () => {
    it('lists descriptors as JSON', async () => {
      orchestrator.methods.mockReturnValue([
        {
          name: 'adb-setup-state-read',
          kind: 'debug-bridge',
          requiredMode: 'DebugBridge',
          riskTier: 0,
          baseWeight: 1,
          steps: [{ id: 'read-sdk', command: 'getprop ro.build.version.sdk' }]
        }
      ]);

      await run('methods', '--json');

      expect(JSON.parse(out[0])[0].name).toBe('adb-setup-state-read');
    });
  });

  describe('audit-verify', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'cli-audit-'));
      auditLogPath = join(dir, 'audit.jsonl');
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('confirms an intact chain', async () => {
      await new JsonlAuditSink(auditLogPath, SECRET).append({
        timestamp: '2024-01-01T00:00:00.000Z',
        sessionId: 'session_test',
        deviceSerial: 'R58N12ABCDE',
        methodName: 'adb-setup-state-read',
        fromState: 'Pending',
        toState: 'Preparing'
      });

      await expect(run('audit-verify')).resolves.toBe(EXIT_CODES.OK);
      expect(out).toEqual(['Audit chain intact (1 records)']);
    });

    it('reports the first broken line', async () => {
      await new JsonlAuditSink(auditLogPath, SECRET).append({
        timestamp: '2024-01-01T00:00:00.000Z',
        sessionId: 'session_test',
        deviceSerial: 'R58N12ABCDE',
        methodName: 'adb-setup-state-read',
        fromState: 'Pending',
        toState: 'Preparing'
      });
      writeFileSync(auditLogPath, readFileSync(auditLogPath, 'utf8').replace('Preparing', 'Executing'));

      await expect(run('audit-verify', auditLogPath)).resolves.toBe(EXIT_CODES.FAILURE);
      expect(out).toEqual(['Audit chain broken at line 1']);
    });

    it('fails on a missing file', async () => {
      await expect(run('audit-verify', join(dir, 'absent.jsonl'))).resolves.toBe(EXIT_CODES.FAILURE);
      expect(err[0]).toMatch(/^Error: ENOENT/);
    });
  });
});

describe('exit codes', () => {
  it('maps errors', () => {
    expect(exitCodeFor(new AuthorizationDeniedError('A'))).toBe(2);
    expect(exitCodeFor(new NoDeviceError())).toBe(3);
    expect(exitCodeFor(new Error('other'))).toBe(1);
  });

  it('maps session outcomes', () => {
    expect(exitCodeForSession(sessionWith('Success', ''))).toBe(0);
    expect(exitCodeForSession(sessionWith('DryRun', ''))).toBe(0);
    expect(exitCodeForSession(sessionWith('Aborted', ''))).toBe(1);
  });
});
