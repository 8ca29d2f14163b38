/**
 * Boot-loader channel
 *
 * Drives a device in BootLoader mode through the fastboot binary. fastboot
 * reports most of its output on stderr, so both streams are merged into
 * `stdout` for command results.
 */

import { fastboot, splitArgs, type RunResult } from '../../androidCli';
import { CommunicationTimeoutError, DeviceDisconnectedError, looksDisconnected } from '../errors';
import type { Channel, CommandResult } from '../../../types/communication';
import type { DeviceMode, LockState } from '../../../types/device';

const SWITCH_ARGS: Partial<Record<DeviceMode, string[]>> = {
  Normal: ['reboot'],
  DebugBridge: ['reboot'],
  Recovery: ['reboot', 'recovery'],
  EmergencyDownload: ['oem', 'edl']
};

export class BootLoaderChannel implements Channel {
  readonly kind = 'boot-loader' as const;

  constructor(readonly serial: string) {}

  async execute(command: string, timeoutMs: number): Promise<CommandResult> {
    const result = this.check(await fastboot(this.serial, splitArgs(command), { timeoutMs }), command, timeoutMs);
    const output = [result.stdout.trim(), result.stderr.trim()].filter(Boolean).join('\n');
    const failed = /^FAILED/m.test(output);

    return {
      success: result.code === 0 && !failed,
      stdout: output,
      stderr: failed ? output : '',
      durationMs: result.durationMs
    };
  }

  async switchMode(target: DeviceMode, timeoutMs: number): Promise<boolean> {
    const args = SWITCH_ARGS[target];
    if (!args) {
      return false;
    }
    const result = await this.execute(args.join(' '), timeoutMs);
    return result.success;
  }

  /**
   * The boot loader exposes no reset-protection variable; lock state can
   * only be confirmed once the device is back in the OS.
   */
  async queryLockState(_timeoutMs: number): Promise<LockState> {
    return 'Unknown';
  }

  async probe(timeoutMs: number): Promise<boolean> {
    const result = await this.execute('getvar product', timeoutMs);
    return result.success && /product:/i.test(result.stdout);
  }

  async close(): Promise<void> {
    // fastboot opens the device per invocation
  }

  private check(result: RunResult, command: string, timeoutMs: number): RunResult {
    if (result.timedOut) {
      throw new CommunicationTimeoutError(`fastboot '${command}' timed out after ${timeoutMs}ms`, timeoutMs, {
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
