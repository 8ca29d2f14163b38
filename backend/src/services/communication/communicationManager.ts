/**
 * Communication Manager
 *
 * Owns channel lifecycle per device serial. Callers obtain a lease that
 * gives them exclusive use of the device; the lease picks the transport
 * matching the device's current mode and re-selects it after a successful
 * mode switch.
 */

import { createServiceLogger } from '../logger';
import { DeviceLock } from './deviceLock';
import {
  ChannelUnavailableError,
  DeviceDisconnectedError,
  UnexpectedDeviceStateError,
  withTimeout
} from './errors';
import type { Channel, ChannelKind, CommandResult } from '../../types/communication';
import type { DeviceMode, DeviceSnapshot, LockState } from '../../types/device';

const log = createServiceLogger('communication');

/** Extra time granted to a channel past the command timeout before the lease gives up on it */
const CHANNEL_GRACE_MS = 1000;

export type ChannelFactory = (kind: ChannelKind, serial: string) => Channel;

export interface DeviceLocator {
  locate(serial: string): Promise<DeviceSnapshot | undefined>;
}

export interface CommunicationConfig {
  acquireTimeoutMs: number;
  commandTimeoutMs: number;
  switchTimeoutMs: number;
  reenumerationTimeoutMs: number;
  reenumerationPollMs: number;
}

const DEFAULT_CONFIG: CommunicationConfig = {
  acquireTimeoutMs: 60_000,
  commandTimeoutMs: 30_000,
  switchTimeoutMs: 15_000,
  reenumerationTimeoutMs: 90_000,
  reenumerationPollMs: 1_000
};

const CHANNEL_FOR_MODE: Record<DeviceMode, ChannelKind | undefined> = {
  Normal: undefined,
  DebugBridge: 'debug-bridge',
  Recovery: 'debug-bridge',
  BootLoader: 'boot-loader',
  ManufacturerDownload: 'raw-usb',
  EmergencyDownload: 'raw-usb'
};

export function channelKindForMode(mode: DeviceMode): ChannelKind | undefined {
  return CHANNEL_FOR_MODE[mode];
}

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

// ============================================================================
// Lease
// ============================================================================

export class ChannelLease {
  private channel?: Channel;
  private released = false;

  constructor(
    readonly serial: string,
    private currentMode: DeviceMode,
    private readonly manager: CommunicationManager,
    private readonly releaseLock: () => void
  ) {}

  get mode(): DeviceMode {
    return this.currentMode;
  }

  get kind(): ChannelKind | undefined {
    return channelKindForMode(this.currentMode);
  }

  get isReleased(): boolean {
    return this.released;
  }

  async execute(command: string, timeoutMs = this.manager.config.commandTimeoutMs): Promise<CommandResult> {
    const channel = this.resolveChannel();
    return withTimeout(channel.execute(command, timeoutMs), timeoutMs + CHANNEL_GRACE_MS, `'${command}'`, {
      serial: this.serial
    });
  }

  async queryLockState(timeoutMs = this.manager.config.commandTimeoutMs): Promise<LockState> {
    const channel = this.resolveChannel();
    return withTimeout(channel.queryLockState(timeoutMs), timeoutMs + CHANNEL_GRACE_MS, 'lock state query', {
      serial: this.serial
    });
  }

  async probe(timeoutMs = this.manager.config.commandTimeoutMs): Promise<boolean> {
    const channel = this.resolveChannel();
    return withTimeout(channel.probe(timeoutMs), timeoutMs + CHANNEL_GRACE_MS, 'connectivity probe', {
      serial: this.serial
    });
  }

  /**
   * Reboot the device into `target` and wait for it to come back there.
   * Resolves false when the current transport cannot request that mode.
   */
  async switchMode(target: DeviceMode): Promise<boolean> {
    if (target === this.currentMode) {
      return true;
    }

    const channel = this.resolveChannel();
    const timeoutMs = this.manager.config.switchTimeoutMs;
    const accepted = await withTimeout(channel.switchMode(target, timeoutMs), timeoutMs + CHANNEL_GRACE_MS, `switch to ${target}`, {
      serial: this.serial
    });
    if (!accepted) {
      log.info('switch_rejected', `${channel.kind} could not switch ${this.serial} to ${target}`, undefined, {
        serial: this.serial,
        from: this.currentMode
      });
      return false;
    }

    await this.dropChannel();
    const from = this.currentMode;
    this.currentMode = await this.manager.awaitMode(this.serial, target);
    log.info('mode_switched', `${this.serial} switched ${from} -> ${this.currentMode}`, undefined, { serial: this.serial });
    return true;
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    try {
      await this.dropChannel();
    } finally {
      this.releaseLock();
      this.manager.onReleased(this.serial);
    }
  }

  private resolveChannel(): Channel {
    if (this.released) {
      throw new ChannelUnavailableError(`Lease for ${this.serial} has been released`, { serial: this.serial });
    }
    if (!this.channel) {
      const kind = channelKindForMode(this.currentMode);
      if (!kind) {
        throw new ChannelUnavailableError(`No transport serves ${this.serial} in ${this.currentMode} mode`, {
          serial: this.serial,
          mode: this.currentMode
        });
      }
      this.channel = this.manager.createChannel(kind, this.serial);
    }
    return this.channel;
  }

  private async dropChannel(): Promise<void> {
    const channel = this.channel;
    this.channel = undefined;
    if (channel) {
      await channel.close();
    }
  }
}

// ============================================================================
// Manager
// ============================================================================

export class CommunicationManager {
  readonly config: CommunicationConfig;
  private readonly lock = new DeviceLock();
  private readonly devices = new Map<string, DeviceSnapshot>();
  private readonly leases = new Set<ChannelLease>();

  constructor(
    private readonly channelFactory: ChannelFactory,
    private readonly locator?: DeviceLocator,
    config: Partial<CommunicationConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Record the latest snapshots. Devices missing from the list are forgotten
   * unless a lease currently holds them.
   */
  track(snapshots: readonly DeviceSnapshot[]): void {
    const seen = new Set(snapshots.map(snapshot => snapshot.serial));
    for (const serial of this.devices.keys()) {
      if (!seen.has(serial) && !this.lock.isHeld(serial)) {
        this.devices.delete(serial);
      }
    }
    for (const snapshot of snapshots) {
      this.devices.set(snapshot.serial, snapshot);
    }
  }

  /** Record one snapshot without forgetting the others */
  remember(snapshot: DeviceSnapshot): void {
    this.devices.set(snapshot.serial, snapshot);
  }

  currentMode(serial: string): DeviceMode | undefined {
    return this.devices.get(serial)?.mode;
  }

  isBusy(serial: string): boolean {
    return this.lock.isHeld(serial);
  }

  get activeLeaseCount(): number {
    return this.leases.size;
  }

  async acquire(serial: string, timeoutMs = this.config.acquireTimeoutMs): Promise<ChannelLease> {
    if (!this.devices.has(serial)) {
      throw new ChannelUnavailableError(`Device ${serial} is not attached`, { serial });
    }

    const release = await this.lock.acquire(serial, timeoutMs);
    const device = this.devices.get(serial);
    if (!device) {
      release();
      throw new DeviceDisconnectedError(`Device ${serial} left the bus while waiting for its lease`, { serial });
    }

    const lease = new ChannelLease(serial, device.mode, this, release);
    this.leases.add(lease);
    log.debug('lease_acquired', `Lease acquired for ${serial}`, undefined, { serial, mode: device.mode });
    return lease;
  }

  /**
   * Scoped acquisition: the lease is released on every exit path.
   */
  async withChannel<T>(serial: string, work: (lease: ChannelLease) => Promise<T>, timeoutMs?: number): Promise<T> {
    const lease = await this.acquire(serial, timeoutMs);
    try {
      return await work(lease);
    } finally {
      await lease.release();
    }
  }

  async closeAll(): Promise<void> {
    await Promise.all([...this.leases].map(lease => lease.release()));
  }

  /** @internal */
  createChannel(kind: ChannelKind, serial: string): Channel {
    log.debug('channel_open', `Opening ${kind} channel`, undefined, { serial });
    return this.channelFactory(kind, serial);
  }

  /** @internal */
  onReleased(serial: string): void {
    for (const lease of this.leases) {
      if (lease.serial === serial && lease.isReleased) {
        this.leases.delete(lease);
      }
    }
  }

  /**
   * @internal
   * Poll the locator until the device re-enumerates in `target`.
   */
  async awaitMode(serial: string, target: DeviceMode): Promise<DeviceMode> {
    const current = this.devices.get(serial);
    if (!this.locator) {
      if (current) {
        this.devices.set(serial, Object.freeze({ ...current, mode: target }));
      }
      return target;
    }

    const deadline = Date.now() + this.config.reenumerationTimeoutMs;
    let lastSeen: DeviceSnapshot | undefined;

    while (Date.now() < deadline) {
      lastSeen = await this.locator.locate(serial);
      if (lastSeen?.mode === target) {
        this.devices.set(serial, lastSeen);
        return target;
      }
      await delay(this.config.reenumerationPollMs);
    }

    if (!lastSeen) {
      throw new DeviceDisconnectedError(`Device ${serial} did not re-enumerate after switching to ${target}`, {
        serial,
        target
      });
    }
    this.devices.set(serial, lastSeen);
    throw new UnexpectedDeviceStateError(`Device ${serial} came back in ${lastSeen.mode} instead of ${target}`, {
      serial,
      target,
      actual: lastSeen.mode
    });
  }
}
