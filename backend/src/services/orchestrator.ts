/**
 * Orchestrator
 *
 * Wires detector, communication manager, profile resolver and strategy
 * engine together and exposes the operations the command line offers:
 * detect, info, bypass and methods.
 */

import { createServiceLogger } from './logger';
import { configureBinaries } from './androidCli';
import { DeviceDetector } from './detection/deviceDetector';
import { CommunicationManager, createChannelFactory } from './communication';
import { MethodRegistry } from './bypass/methodRegistry';
import { BypassStrategyEngine, type RunSessionOptions } from './bypass/strategyEngine';
import { EngineError } from './bypass/errors';
import { JsonProfileCatalog } from './profiles/profileCatalog';
import { ProfileResolver } from './profiles/profileResolver';
import { FileAuthorizationRegistry, type Authorizer } from './authorization/authorizer';
import { JsonlAuditSink, type AuditSink } from './audit/auditSink';
import { MemoryResultCache } from './cache/resultCache';
import { NodeUsbBus } from './usb/nodeUsb';
import { SessionStore } from '../state/sessionStore';
import type { EnvironmentConfig } from '../config';
import type { UsbBus, UsbTransportFactory } from './usb/usbBus';
import type { DeviceSnapshot } from '../types/device';
import type { BypassMethodDescriptor, PlannedCandidate } from '../types/bypass';
import type { ResolvedProfile } from '../types/profile';
import type { BypassSession, SessionStatistics } from '../types/session';

const log = createServiceLogger('orchestrator');

// ============================================================================
// Errors
// ============================================================================

export class NoDeviceError extends EngineError {
  constructor() {
    super('No supported device is attached', 'NO_DEVICE');
    this.name = 'NoDeviceError';
  }
}

export class DeviceNotFoundError extends EngineError {
  constructor(serial: string) {
    super(`Device ${serial} is not attached`, 'DEVICE_NOT_FOUND', { serial });
    this.name = 'DeviceNotFoundError';
  }
}

export class AmbiguousDeviceError extends EngineError {
  constructor(serials: string[]) {
    super(`Several devices attached (${serials.join(', ')}); pass --serial`, 'AMBIGUOUS_DEVICE', { serials });
    this.name = 'AmbiguousDeviceError';
  }
}

// ============================================================================
// Facade
// ============================================================================

export interface DeviceInfo {
  snapshot: DeviceSnapshot;
  resolved: ResolvedProfile;
  plan: PlannedCandidate[];
  lastSession?: BypassSession;
}

export interface BypassRequest extends RunSessionOptions {
  serial?: string;
}

export interface OrchestratorParts {
  detector: DeviceDetector;
  manager: CommunicationManager;
  engine: BypassStrategyEngine;
  registry: MethodRegistry;
  sessions: SessionStore;
}

export class Orchestrator {
  constructor(private readonly parts: OrchestratorParts) {}

  get engine(): BypassStrategyEngine {
    return this.parts.engine;
  }

  async detect(): Promise<DeviceSnapshot[]> {
    return this.parts.detector.scan();
  }

  async info(serial: string): Promise<DeviceInfo> {
    const snapshot = await this.find(serial);
    const { profile, source, plan } = this.parts.engine.plan(snapshot);
    return {
      snapshot,
      resolved: { profile, source },
      plan,
      lastSession: this.parts.sessions.latestFor(serial)
    };
  }

  /**
   * Without a serial the single attached device is used.
   */
  async bypass(request: BypassRequest = {}): Promise<BypassSession> {
    const snapshot = request.serial ? await this.find(request.serial) : await this.only();
    log.info('bypass_requested', `Bypass requested for ${snapshot.serial}`, undefined, {
      method: request.method,
      dryRun: request.dryRun ?? false
    });
    return this.parts.engine.runSession(snapshot, {
      method: request.method,
      dryRun: request.dryRun,
      signal: request.signal
    });
  }

  methods(): readonly BypassMethodDescriptor[] {
    return this.parts.registry.all();
  }

  statistics(): SessionStatistics {
    return this.parts.sessions.statistics();
  }

  async shutdown(): Promise<void> {
    await this.parts.manager.closeAll();
  }

  private async find(serial: string): Promise<DeviceSnapshot> {
    const snapshot = (await this.detect()).find(candidate => candidate.serial === serial);
    if (!snapshot) {
      throw new DeviceNotFoundError(serial);
    }
    return snapshot;
  }

  private async only(): Promise<DeviceSnapshot> {
    const snapshots = await this.detect();
    if (snapshots.length === 0) {
      throw new NoDeviceError();
    }
    if (snapshots.length > 1) {
      throw new AmbiguousDeviceError(snapshots.map(snapshot => snapshot.serial));
    }
    return snapshots[0];
  }
}

export interface OrchestratorOverrides {
  usb?: UsbBus & UsbTransportFactory;
  authorizer?: Authorizer;
  auditSink?: AuditSink;
}

/**
 * Build the production object graph from configuration.
 */
export function createOrchestrator(config: EnvironmentConfig, overrides: OrchestratorOverrides = {}): Orchestrator {
  configureBinaries({ adb: config.communication.adbPath, fastboot: config.communication.fastbootPath });

  const usb = overrides.usb ?? new NodeUsbBus();
  const registry = MethodRegistry.fromFile(config.storage.methodsPath);
  const catalog = JsonProfileCatalog.fromFile(config.storage.profilesPath);
  const sessions = new SessionStore();

  let detector: DeviceDetector | undefined;
  const manager = new CommunicationManager(
    createChannelFactory(usb),
    { locate: serial => (detector ? detector.locate(serial) : Promise.resolve(undefined)) },
    {
      acquireTimeoutMs: config.communication.acquireTimeoutMs,
      commandTimeoutMs: config.communication.commandTimeoutMs,
      switchTimeoutMs: config.communication.switchTimeoutMs,
      reenumerationTimeoutMs: config.communication.reenumerationTimeoutMs,
      reenumerationPollMs: config.communication.reenumerationPollMs
    }
  );
  detector = new DeviceDetector(usb, manager, config.detector);

  const engine = new BypassStrategyEngine(
    {
      manager,
      resolver: new ProfileResolver(catalog, registry, config.engine.genericSuccessRate),
      registry,
      authorizer: overrides.authorizer ?? new FileAuthorizationRegistry(config.storage.authorizationsPath),
      auditSink: overrides.auditSink ?? new JsonlAuditSink(config.storage.auditLogPath, config.security.auditHmacSecret),
      cache: new MemoryResultCache({ ttlMs: config.cache.ttlMs, maxEntries: config.cache.maxEntries }),
      sessionStore: sessions
    },
    {
      modeSwitchPenalty: config.engine.modeSwitchPenalty,
      cacheSuccessBonus: config.engine.cacheSuccessBonus,
      commandTimeoutMs: config.communication.commandTimeoutMs,
      probeTimeoutMs: config.engine.probeTimeoutMs,
      acquireTimeoutMs: config.communication.acquireTimeoutMs
    }
  );

  log.debug('orchestrator_ready', `Loaded ${registry.size} method(s) and ${catalog.size} profile(s)`);
  return new Orchestrator({ detector, manager, engine, registry, sessions });
}
