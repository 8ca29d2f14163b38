/**
 * Debug-bridge channel
 *
 * Drives a device in DebugBridge or Recovery mode through the adb binary.
 */

import { adb, adbShell, type RunResult } from '../../androidCli';
import { createServiceLogger } from '../../logger';
import { CommunicationTimeoutError, DeviceDisconnectedError, looksDisconnected } from '../errors';
import type { Channel, CommandResult } from '../../../types/communication';
import type { DeviceMode, LockState } from '../../../types/device';

const log = createServiceLogger('debug-bridge');

const REBOOT_TARGETS: Partial<Record<DeviceMode, string>> = {
  BootLoader: 'bootloader',
  Recovery: 'recovery',
  ManufacturerDownload: 'download',
  EmergencyDownload: 'edl'
};

export class DebugBridgeChannel implements Channel {
  readonly kind = 'debug-bridge' as const;

  constructor(readonly serial: string) {}

  async execute(command: string, timeoutMs: number): Promise<CommandResult> {
    const result = this.check(await adbShell(this.serial, command, { timeoutMs }), command, timeoutMs);
    return {
      success: result.code === 0,
      stdout: result.stdout.trim(),
      stderr: result.stderr.trim(),
      durationMs: result.durationMs
    };
  }

  async switchMode(target: DeviceMode, timeoutMs: number): Promise<boolean> {
    const rebootTarget = REBOOT_TARGETS[target];
    if (!rebootTarget) {
      log.debug('switch_unsupported', `adb cannot reboot into ${target}`, undefined, { serial: this.serial });
      return false;
    }

    const result = this.check(await adb(this.serial, ['reboot', rebootTarget], { timeoutMs }), `reboot ${rebootTarget}`, timeoutMs);
    return result.code === 0;
  }

  /**
   * Setup wizard completion is the signal that the reset protection
   * screen has been passed.
   */
  async queryLockState(timeoutMs: number): Promise<LockState> {
    const result = await this.execute('settings get secure user_setup_complete', timeoutMs);
    if (!result.success) {
      return 'Unknown';
    }
    if (result.stdout === '1') return 'Unlocked';
    if (result.stdout === '0') return 'Locked';
    return 'Unknown';
  }

  async probe(timeoutMs: number): Promise<boolean> {
    const result = this.check(await adb(this.serial, ['get-state'], { timeoutMs }), 'get-state', timeoutMs);
    const state = result.stdout.trim();
    return result.code === 0 && (state === 'device' || state === 'recovery');
  }

  async close(): Promise<void> {
    // adb keeps no per-channel state; the server connection is shared
  }

  private check(result: RunResult, command: string, timeoutMs: number): RunResult {
    if (result.timedOut) {
      throw new CommunicationTimeoutError(`adb '${command}' timed out after ${timeoutMs}ms`, timeoutMs, {
        serial: this.serial
      });
    }
    if (result.code !== 0 && looksDisconnected(result.stderr)) {
      throw new DeviceDisconnectedError(`Device ${this.serial} disconnected during '${command}'`, {
        serial: this.serial,
        stderr: result.stderr.trim()
      });
    }
    return result;
  }
}
