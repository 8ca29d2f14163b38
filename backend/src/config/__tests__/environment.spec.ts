/**
 * Environment Configuration Tests
 */

import { existsSync } from 'fs';
import { join } from 'path';
import { ConfigValidationError, configWarnings, getConfigSummary, loadEnvironmentConfig } from '../environment';

const SECRET = 'test-secret-0123456789';

describe('Environment Configuration', () => {
  describe('loadEnvironmentConfig', () => {
    it('applies defaults for an empty environment', () => {
      const config = loadEnvironmentConfig({});

      expect(config.environment).toBe('development');
      expect(config.detector).toEqual({
        scanTimeoutMs: 5000,
        probeAcquireTimeoutMs: 250,
        probeCommandTimeoutMs: 3000,
        enrich: true
      });
      expect(config.communication.adbPath).toBe('adb');
      expect(config.communication.commandTimeoutMs).toBe(30000);
      expect(config.engine).toEqual({
        modeSwitchPenalty: 0.75,
        cacheSuccessBonus: 0.05,
        genericSuccessRate: 50,
        probeTimeoutMs: 5000
      });
      expect(config.cache).toEqual({ ttlMs: 86400000, maxEntries: 1000 });
    });

    it('points the default catalogs at the shipped data files', () => {
      const config = loadEnvironmentConfig({});

      expect(config.storage.methodsPath).toBe(join(config.projectRoot, 'data', 'bypass-methods.json'));
      expect(existsSync(config.storage.methodsPath)).toBe(true);
      expect(existsSync(config.storage.profilesPath)).toBe(true);
    });

    it('reads overrides', () => {
      const config = loadEnvironmentConfig({
        DETECTOR_ENRICH: 'off',
        MODE_SWITCH_PENALTY: '0.5',
        FASTBOOT: '/opt/platform-tools/fastboot',
        AUDIT_HMAC_SECRET: SECRET
      });

      expect(config.detector.enrich).toBe(false);
      expect(config.engine.modeSwitchPenalty).toBe(0.5);
      expect(config.communication.fastbootPath).toBe('/opt/platform-tools/fastboot');
      expect(config.security).toEqual({ auditHmacSecret: SECRET, usingDefaultAuditSecret: false });
    });

    it('normalizes the logging section', () => {
      const config = loadEnvironmentConfig({ LOG_LEVEL: ' WARN ', LOG_FORMAT: 'Text', LOG_DIR: '/tmp/frp-logs', LOG_FILE: 'run.log' });

      expect(config.logging).toEqual({ level: 'warn', format: 'text', directory: '/tmp/frp-logs', file: 'run.log' });
    });

    it.each([
      ['COMMAND_TIMEOUT_MS', 'soon'],
      ['DETECTOR_ENRICH', 'maybe'],
      ['MODE_SWITCH_PENALTY', '1'],
      ['CACHE_SUCCESS_BONUS', '-0.1'],
      ['GENERIC_SUCCESS_RATE', '101'],
      ['REENUMERATION_POLL_MS', '10'],
      ['LOG_LEVEL', 'verbose'],
      ['ADB', 'adb --verbose']
    ])('rejects %s=%s', (variable, value) => {
      let caught: unknown;
      try {
        loadEnvironmentConfig({ [variable]: value });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigValidationError);
      expect(caught instanceof ConfigValidationError && caught.variable).toBe(variable);
    });

    it('requires an audit secret in production', () => {
      expect(() => loadEnvironmentConfig({ NODE_ENV: 'production' })).toThrow('AUDIT_HMAC_SECRET is required in production');
    });

    it('rejects a short audit secret', () => {
      expect(() => loadEnvironmentConfig({ AUDIT_HMAC_SECRET: 'short' })).toThrow('AUDIT_HMAC_SECRET is too short');
    });
  });

  describe('configWarnings', () => {
    it('flags the development audit secret', () => {
      expect(configWarnings(loadEnvironmentConfig({}))).toEqual([
        'AUDIT_HMAC_SECRET not set; audit log is signed with the development default'
      ]);
    });

    it('flags slow busy-device probing and a poll interval that leaves one check', () => {
      const config = loadEnvironmentConfig({
        AUDIT_HMAC_SECRET: SECRET,
        DETECTOR_SCAN_TIMEOUT_MS: '1000',
        DETECTOR_PROBE_ACQUIRE_TIMEOUT_MS: '2000',
        REENUMERATION_TIMEOUT_MS: '1000',
        REENUMERATION_POLL_MS: '1000'
      });

      expect(configWarnings(config)).toEqual([
        'DETECTOR_PROBE_ACQUIRE_TIMEOUT_MS exceeds DETECTOR_SCAN_TIMEOUT_MS; busy devices will slow scans',
        'REENUMERATION_POLL_MS is not below REENUMERATION_TIMEOUT_MS; only one re-enumeration check will run'
      ]);
    });
  });

  describe('getConfigSummary', () => {
    it('never includes the audit secret', () => {
      const summary = getConfigSummary(loadEnvironmentConfig({ AUDIT_HMAC_SECRET: SECRET }));

      expect(summary.auditSecret).toBe('configured');
      expect(JSON.stringify(summary).includes(SECRET)).toBe(false);
    });
  });
});
