/**
 * Environment Configuration Validation
 *
 * Reads every tunable of the orchestrator from environment variables,
 * applies defaults and validates ranges. Invalid values raise
 * ConfigValidationError naming the variable and a suggested fix.
 */

import * as path from 'path';
import type { LogFormat, LogLevel, LoggingSettings } from '../services/logger';

// =============================================================================
// TYPE DEFINITIONS
// =============================================================================

export interface DetectorSettings {
  /** Upper bound for one USB enumeration */
  scanTimeoutMs: number;
  /** Lease wait before enrichment skips a busy device */
  probeAcquireTimeoutMs: number;
  probeCommandTimeoutMs: number;
  /** Read Android version, API level and lock state during scans */
  enrich: boolean;
}

export interface CommunicationSettings {
  adbPath: string;
  fastbootPath: string;
  commandTimeoutMs: number;
  acquireTimeoutMs: number;
  switchTimeoutMs: number;
  reenumerationTimeoutMs: number;
  reenumerationPollMs: number;
}

export interface EngineSettings {
  /** Weight multiplier for candidates needing a mode switch, below 1 */
  modeSwitchPenalty: number;
  /** Weight added for a cached prior Success */
  cacheSuccessBonus: number;
  /** Declared rate (0-100) given to methods of the generic profile */
  genericSuccessRate: number;
  probeTimeoutMs: number;
}

export interface CacheSettings {
  ttlMs: number;
  maxEntries: number;
}

export interface StorageSettings {
  profilesPath: string;
  methodsPath: string;
  authorizationsPath: string;
  auditLogPath: string;
}

export interface SecuritySettings {
  /** Key for the audit log HMAC chain */
  auditHmacSecret: string;
  /** True when the secret came from the built-in development default */
  usingDefaultAuditSecret: boolean;
}

export type { LoggingSettings };

export interface EnvironmentConfig {
  detector: DetectorSettings;
  communication: CommunicationSettings;
  engine: EngineSettings;
  cache: CacheSettings;
  storage: StorageSettings;
  security: SecuritySettings;
  logging: LoggingSettings;
  /** Current environment (development|production|test) */
  environment: string;
  projectRoot: string;
}

type Env = Record<string, string | undefined>;

const DEVELOPMENT_AUDIT_SECRET = 'development-audit-secret';

// =============================================================================
// VALIDATION UTILITIES
// =============================================================================

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly variable?: string,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Validate timeout value (milliseconds)
 */
function validateTimeout(value: string, variableName: string, min = 100, max = 3600000): number {
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout < min || timeout > max) {
    throw new ConfigValidationError(
      `Invalid timeout for ${variableName}: ${value}ms`,
      variableName,
      `Please provide a timeout between ${min}ms and ${max}ms`
    );
  }
  return timeout;
}

function validateInteger(value: string, variableName: string, min: number, max: number): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new ConfigValidationError(
      `Invalid value for ${variableName}: ${value}`,
      variableName,
      `Please provide a whole number between ${min} and ${max}`
    );
  }
  return parsed;
}

/**
 * Validate boolean value
 */
function validateBoolean(value: string | undefined, variableName: string, defaultValue = false): boolean {
  if (value === undefined) return defaultValue;
  const normalized = value.toLowerCase().trim();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;

  throw new ConfigValidationError(
    `Invalid boolean value for ${variableName}: ${value}`,
    variableName,
    'Please use true, false, 1, 0, yes, no, on, or off'
  );
}

/**
 * Validate a fraction within [min, max]
 */
function validateFraction(value: string, variableName: string, min = 0, max = 1): number {
  const fraction = Number(value);
  if (value.trim() === '' || isNaN(fraction) || fraction < min || fraction > max) {
    throw new ConfigValidationError(
      `Invalid fraction for ${variableName}: ${value}`,
      variableName,
      `Please provide a number between ${min} and ${max}`
    );
  }
  return fraction;
}

function validatePath(value: string, variableName: string): string {
  if (!value || value.trim() === '') {
    throw new ConfigValidationError(`Empty path for ${variableName}`, variableName, 'Please provide a valid file system path');
  }
  return path.resolve(value);
}

function validateExecutable(value: string, variableName: string): string {
  const trimmed = value.trim();
  if (trimmed === '' || (/\s/.test(trimmed) && !path.isAbsolute(trimmed))) {
    throw new ConfigValidationError(
      `Invalid executable for ${variableName}: ${value}`,
      variableName,
      'Please provide a command name on PATH or an absolute path'
    );
  }
  return trimmed;
}

function validateChoice<T extends string>(value: string, variableName: string, choices: readonly T[]): T {
  const normalized = value.toLowerCase().trim();
  const choice = choices.find(candidate => candidate === normalized);
  if (choice === undefined) {
    throw new ConfigValidationError(
      `Invalid value for ${variableName}: ${value}`,
      variableName,
      `Please use one of: ${choices.join(', ')}`
    );
  }
  return choice;
}

// =============================================================================
// CONFIGURATION LOADERS
// =============================================================================

function loadDetectorSettings(env: Env): DetectorSettings {
  return {
    scanTimeoutMs: validateTimeout(env.DETECTOR_SCAN_TIMEOUT_MS || '5000', 'DETECTOR_SCAN_TIMEOUT_MS'),
    probeAcquireTimeoutMs: validateTimeout(
      env.DETECTOR_PROBE_ACQUIRE_TIMEOUT_MS || '250',
      'DETECTOR_PROBE_ACQUIRE_TIMEOUT_MS',
      10
    ),
    probeCommandTimeoutMs: validateTimeout(
      env.DETECTOR_PROBE_COMMAND_TIMEOUT_MS || '3000',
      'DETECTOR_PROBE_COMMAND_TIMEOUT_MS'
    ),
    enrich: validateBoolean(env.DETECTOR_ENRICH, 'DETECTOR_ENRICH', true)
  };
}

function loadCommunicationSettings(env: Env): CommunicationSettings {
  return {
    adbPath: validateExecutable(env.ADB || 'adb', 'ADB'),
    fastbootPath: validateExecutable(env.FASTBOOT || 'fastboot', 'FASTBOOT'),
    commandTimeoutMs: validateTimeout(env.COMMAND_TIMEOUT_MS || '30000', 'COMMAND_TIMEOUT_MS'),
    acquireTimeoutMs: validateTimeout(env.DEVICE_ACQUIRE_TIMEOUT_MS || '60000', 'DEVICE_ACQUIRE_TIMEOUT_MS'),
    switchTimeoutMs: validateTimeout(env.MODE_SWITCH_TIMEOUT_MS || '15000', 'MODE_SWITCH_TIMEOUT_MS'),
    reenumerationTimeoutMs: validateTimeout(env.REENUMERATION_TIMEOUT_MS || '90000', 'REENUMERATION_TIMEOUT_MS'),
    reenumerationPollMs: validateTimeout(env.REENUMERATION_POLL_MS || '1000', 'REENUMERATION_POLL_MS', 50, 60000)
  };
}

function loadEngineSettings(env: Env): EngineSettings {
  const modeSwitchPenalty = validateFraction(env.MODE_SWITCH_PENALTY || '0.75', 'MODE_SWITCH_PENALTY');
  if (modeSwitchPenalty >= 1) {
    throw new ConfigValidationError(
      `MODE_SWITCH_PENALTY must be below 1: ${modeSwitchPenalty}`,
      'MODE_SWITCH_PENALTY',
      'A switch must cost something; try 0.75'
    );
  }

  return {
    modeSwitchPenalty,
    cacheSuccessBonus: validateFraction(env.CACHE_SUCCESS_BONUS || '0.05', 'CACHE_SUCCESS_BONUS'),
    genericSuccessRate: validateInteger(env.GENERIC_SUCCESS_RATE || '50', 'GENERIC_SUCCESS_RATE', 0, 100),
    probeTimeoutMs: validateTimeout(env.PROBE_TIMEOUT_MS || '5000', 'PROBE_TIMEOUT_MS')
  };
}

function loadCacheSettings(env: Env): CacheSettings {
  return {
    ttlMs: validateTimeout(env.RESULT_CACHE_TTL_MS || '86400000', 'RESULT_CACHE_TTL_MS', 1000, 30 * 86400000),
    maxEntries: validateInteger(env.RESULT_CACHE_MAX_ENTRIES || '1000', 'RESULT_CACHE_MAX_ENTRIES', 1, 1_000_000)
  };
}

function loadStorageSettings(env: Env, projectRoot: string): StorageSettings {
  return {
    profilesPath: validatePath(env.PROFILES_PATH || path.join(projectRoot, 'data', 'device-profiles.json'), 'PROFILES_PATH'),
    methodsPath: validatePath(env.METHODS_PATH || path.join(projectRoot, 'data', 'bypass-methods.json'), 'METHODS_PATH'),
    authorizationsPath: validatePath(
      env.AUTHORIZATIONS_PATH || path.join(projectRoot, 'var', 'authorizations.json'),
      'AUTHORIZATIONS_PATH'
    ),
    auditLogPath: validatePath(env.AUDIT_LOG_PATH || path.join(projectRoot, 'var', 'audit', 'audit.jsonl'), 'AUDIT_LOG_PATH')
  };
}

function loadSecuritySettings(env: Env, environment: string): SecuritySettings {
  const secret = env.AUDIT_HMAC_SECRET;
  if (secret === undefined || secret === '') {
    if (environment === 'production') {
      throw new ConfigValidationError(
        'AUDIT_HMAC_SECRET is required in production',
        'AUDIT_HMAC_SECRET',
        'Set a long random value and keep it with the audit logs'
      );
    }
    return { auditHmacSecret: DEVELOPMENT_AUDIT_SECRET, usingDefaultAuditSecret: true };
  }

  if (secret.length < 16) {
    throw new ConfigValidationError(
      'AUDIT_HMAC_SECRET is too short',
      'AUDIT_HMAC_SECRET',
      'Please use at least 16 characters'
    );
  }
  return { auditHmacSecret: secret, usingDefaultAuditSecret: false };
}

function loadLoggingSettings(env: Env): LoggingSettings {
  return {
    level: validateChoice<LogLevel>(env.LOG_LEVEL || 'info', 'LOG_LEVEL', ['debug', 'info', 'warn', 'error']),
    format: validateChoice<LogFormat>(env.LOG_FORMAT || 'json', 'LOG_FORMAT', ['json', 'text']),
    directory: validatePath(env.LOG_DIR || path.join(process.cwd(), 'var', 'log'), 'LOG_DIR'),
    file: env.LOG_FILE || 'frp-orchestrator.log'
  };
}

// =============================================================================
// MAIN CONFIGURATION LOADER
// =============================================================================

/**
 * Load and validate the complete configuration. Throws ConfigValidationError
 * on the first invalid variable.
 */
export function loadEnvironmentConfig(env: Env = process.env): EnvironmentConfig {
  const projectRoot = path.resolve(__dirname, '..', '..', '..');
  const environment = env.NODE_ENV || 'development';

  return {
    detector: loadDetectorSettings(env),
    communication: loadCommunicationSettings(env),
    engine: loadEngineSettings(env),
    cache: loadCacheSettings(env),
    storage: loadStorageSettings(env, projectRoot),
    security: loadSecuritySettings(env, environment),
    logging: loadLoggingSettings(env),
    environment,
    projectRoot
  };
}

/**
 * Non-fatal findings about a loaded configuration
 */
export function configWarnings(config: EnvironmentConfig): string[] {
  const warnings: string[] = [];

  if (config.security.usingDefaultAuditSecret) {
    warnings.push('AUDIT_HMAC_SECRET not set; audit log is signed with the development default');
  }
  if (config.environment === 'production' && config.logging.level === 'debug') {
    warnings.push('Debug logging enabled in production environment');
  }
  if (config.detector.probeAcquireTimeoutMs > config.detector.scanTimeoutMs) {
    warnings.push('DETECTOR_PROBE_ACQUIRE_TIMEOUT_MS exceeds DETECTOR_SCAN_TIMEOUT_MS; busy devices will slow scans');
  }
  if (config.communication.reenumerationPollMs >= config.communication.reenumerationTimeoutMs) {
    warnings.push('REENUMERATION_POLL_MS is not below REENUMERATION_TIMEOUT_MS; only one re-enumeration check will run');
  }

  return warnings;
}

/**
 * Get configuration summary for logging; secrets are left out
 */
export function getConfigSummary(config: EnvironmentConfig): Record<string, unknown> {
  return {
    environment: config.environment,
    projectRoot: config.projectRoot,
    detector: config.detector,
    communication: {
      adbPath: config.communication.adbPath,
      fastbootPath: config.communication.fastbootPath,
      commandTimeoutMs: config.communication.commandTimeoutMs
    },
    engine: config.engine,
    storage: config.storage,
    auditSecret: config.security.usingDefaultAuditSecret ? 'development default' : 'configured',
    logging: { level: config.logging.level, format: config.logging.format }
  };
}
