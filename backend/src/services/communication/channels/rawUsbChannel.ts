/**
 * Raw-USB channel
 *
 * Speaks to devices in manufacturer download or emergency download mode
 * over their bulk endpoints. Commands are sent as UTF-8 text, or as raw
 * bytes when written as `hex:<bytes>`; replies to hex commands are reported
 * in hex as well.
 */

import { createServiceLogger } from '../../logger';
import { CommunicationError, DeviceDisconnectedError, errorMessage, looksDisconnected } from '../errors';
import type { UsbTransport, UsbTransportFactory } from '../../usb/usbBus';
import type { Channel, CommandResult } from '../../../types/communication';
import type { DeviceMode, LockState } from '../../../types/device';

const log = createServiceLogger('raw-usb');

const MAX_REPLY_BYTES = 512;
const HEX_PREFIX = 'hex:';

export class RawUsbChannel implements Channel {
  readonly kind = 'raw-usb' as const;
  private transport?: UsbTransport;

  constructor(
    readonly serial: string,
    private readonly transports: UsbTransportFactory
  ) {}

  async execute(command: string, timeoutMs: number): Promise<CommandResult> {
    const startedAt = Date.now();
    const binary = command.startsWith(HEX_PREFIX);
    const payload = binary ? Buffer.from(command.slice(HEX_PREFIX.length), 'hex') : Buffer.from(command, 'utf8');

    try {
      const transport = await this.open();
      await transport.write(payload, timeoutMs);
      const reply = await transport.read(MAX_REPLY_BYTES, timeoutMs);

      return {
        success: true,
        stdout: binary ? reply.toString('hex') : reply.toString('utf8').replace(/\0+$/, ''),
        stderr: '',
        durationMs: Date.now() - startedAt
      };
    } catch (error) {
      throw this.translate(error, command);
    }
  }

  /**
   * Download-mode protocols have no portable reboot-into-mode request.
   */
  async switchMode(target: DeviceMode, _timeoutMs: number): Promise<boolean> {
    log.debug('switch_unsupported', `raw USB cannot switch into ${target}`, undefined, { serial: this.serial });
    return false;
  }

  async queryLockState(_timeoutMs: number): Promise<LockState> {
    return 'Unknown';
  }

  async probe(_timeoutMs: number): Promise<boolean> {
    try {
      await this.open();
      return true;
    } catch (error) {
      const translated = this.translate(error, 'open');
      if (translated instanceof DeviceDisconnectedError) {
        throw translated;
      }
      log.warn('probe_failed', translated.message, undefined, { serial: this.serial });
      return false;
    }
  }

  async close(): Promise<void> {
    const transport = this.transport;
    this.transport = undefined;
    if (transport) {
      await transport.close();
    }
  }

  private async open(): Promise<UsbTransport> {
    if (!this.transport) {
      this.transport = await this.transports.open(this.serial);
    }
    return this.transport;
  }

  private translate(error: unknown, command: string): CommunicationError {
    if (error instanceof CommunicationError) {
      return error;
    }
    const message = errorMessage(error);
    if (looksDisconnected(message)) {
      return new DeviceDisconnectedError(`Device ${this.serial} disconnected during '${command}'`, {
        serial: this.serial,
        cause: message
      });
    }
    return new CommunicationError(`USB transfer failed for '${command}': ${message}`, 'USB_TRANSFER_FAILED', {
      serial: this.serial
    });
  }
}
