/**
 * Device Detector
 *
 * Enumerates the USB bus and turns every recognizable Android device into
 * an immutable snapshot. Each `scan()` call re-enumerates from scratch and
 * returns within the configured timeout even when the bus is empty.
 *
 * Detection never writes to a device. Optional enrichment reads system
 * properties through the Communication Manager, so it waits its turn
 * behind any running session and gives up quickly if the device is busy.
 */

import { createServiceLogger } from '../logger';
import { classifyDevice } from './signatures';
import { CommunicationError, CommunicationTimeoutError, DeviceBusyError, withTimeout } from '../communication/errors';
import type { CommunicationManager, DeviceLocator } from '../communication/communicationManager';
import type { UsbBus } from '../usb/usbBus';
import type { DeviceMode, DeviceSnapshot, UsbDeviceDescriptor } from '../../types/device';

const log = createServiceLogger('detector');

export interface DetectorConfig {
  scanTimeoutMs: number;

  /** How long enrichment waits for a device lease before skipping the device */
  probeAcquireTimeoutMs: number;
  probeCommandTimeoutMs: number;
  enrich: boolean;
}

const DEFAULT_CONFIG: DetectorConfig = {
  scanTimeoutMs: 5_000,
  probeAcquireTimeoutMs: 250,
  probeCommandTimeoutMs: 3_000,
  enrich: true
};

const ENRICHABLE_MODES: ReadonlySet<DeviceMode> = new Set<DeviceMode>(['DebugBridge', 'Recovery']);

export class DeviceDetector implements DeviceLocator {
  private readonly config: DetectorConfig;

  constructor(
    private readonly bus: UsbBus,
    private readonly manager?: CommunicationManager,
    config: Partial<DetectorConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async scan(): Promise<DeviceSnapshot[]> {
    const timer = log.startTimer('scan');
    const snapshots = await this.classifyBus();
    this.manager?.track(snapshots);

    const results =
      this.config.enrich && this.manager
        ? await Promise.all(snapshots.map(snapshot => this.enrich(snapshot)))
        : snapshots;

    this.manager?.track(results);
    timer.end({ devices: results.length });
    log.info('scan_complete', `Detected ${results.length} device(s)`, undefined, {
      serials: results.map(snapshot => snapshot.serial)
    });
    return results;
  }

  /**
   * Single enumeration filtered to one serial; descriptor-only, so it is
   * safe to call while that device is leased.
   */
  async locate(serial: string): Promise<DeviceSnapshot | undefined> {
    const snapshots = await this.classifyBus();
    return snapshots.find(snapshot => snapshot.serial === serial);
  }

  private async classifyBus(): Promise<DeviceSnapshot[]> {
    let descriptors: UsbDeviceDescriptor[];
    try {
      descriptors = await withTimeout(this.bus.list(), this.config.scanTimeoutMs, 'USB enumeration');
    } catch (error) {
      if (error instanceof CommunicationTimeoutError) {
        log.warn('scan_timeout', error.message, undefined, { timeoutMs: this.config.scanTimeoutMs });
        return [];
      }
      throw error;
    }

    const detectedAt = new Date().toISOString();
    const bySerial = new Map<string, DeviceSnapshot>();

    for (const descriptor of descriptors) {
      const classification = classifyDevice(descriptor);
      if (!classification) {
        log.debug('device_ignored', 'Unrecognized USB device', undefined, {
          vendorId: descriptor.vendorId,
          productId: descriptor.productId
        });
        continue;
      }

      const serial = descriptor.serialNumber ?? descriptor.location;
      if (bySerial.has(serial)) continue;

      const snapshot: DeviceSnapshot = {
        serial,
        vendorId: descriptor.vendorId,
        productId: descriptor.productId,
        manufacturer: classification.manufacturer,
        mode: classification.mode,
        lockState: 'Unknown',
        detectedAt
      };
      bySerial.set(serial, Object.freeze(snapshot));
    }

    return [...bySerial.values()];
  }

  private async enrich(snapshot: DeviceSnapshot): Promise<DeviceSnapshot> {
    if (!this.manager || !ENRICHABLE_MODES.has(snapshot.mode)) {
      return snapshot;
    }

    const timeoutMs = this.config.probeCommandTimeoutMs;
    try {
      return await this.manager.withChannel(
        snapshot.serial,
        async lease => {
          const readProp = async (name: string): Promise<string | undefined> => {
            const result = await lease.execute(`getprop ${name}`, timeoutMs);
            return result.success && result.stdout ? result.stdout : undefined;
          };

          const androidVersion = await readProp('ro.build.version.release');
          const sdk = await readProp('ro.build.version.sdk');
          const model = await readProp('ro.product.model');
          const lockState = await lease.queryLockState(timeoutMs);
          const apiLevel = sdk !== undefined && /^\d+$/.test(sdk) ? parseInt(sdk, 10) : undefined;

          return Object.freeze({ ...snapshot, androidVersion, apiLevel, model, lockState });
        },
        this.config.probeAcquireTimeoutMs
      );
    } catch (error) {
      if (error instanceof DeviceBusyError) {
        log.debug('enrich_skipped', `${snapshot.serial} is leased; reporting descriptors only`, undefined, {
          serial: snapshot.serial
        });
        return snapshot;
      }
      if (error instanceof CommunicationError) {
        log.warn('enrich_failed', error.message, undefined, { serial: snapshot.serial, code: error.code });
        return snapshot;
      }
      throw error;
    }
  }
}
