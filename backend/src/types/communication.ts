import type { DeviceMode, LockState } from './device';

export type ChannelKind = 'debug-bridge' | 'boot-loader' | 'raw-usb';

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  durationMs: number;
}

/**
 * Capability set shared by every transport. Implementations throw the
 * communication errors from `services/communication/errors` and never
 * return partial results on timeout.
 */
export interface Channel {
  readonly kind: ChannelKind;
  readonly serial: string;

  execute(command: string, timeoutMs: number): Promise<CommandResult>;

  /** Ask the device to reboot into `target`. Resolves false when the transport cannot reach that mode. */
  switchMode(target: DeviceMode, timeoutMs: number): Promise<boolean>;

  queryLockState(timeoutMs: number): Promise<LockState>;

  /** Cheap read-only round trip used as the connectivity check. */
  probe(timeoutMs: number): Promise<boolean>;

  close(): Promise<void>;
}
