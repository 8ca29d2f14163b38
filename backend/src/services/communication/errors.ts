import { types } from 'util';

// ============================================================================
// Error Types
// ============================================================================

export class CommunicationError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'CommunicationError';
  }
}

/**
 * Command exceeded its timeout. Recoverable: the engine retries once.
 */
export class CommunicationTimeoutError extends CommunicationError {
  constructor(message: string, timeoutMs: number, details: Record<string, unknown> = {}) {
    super(message, 'COMMUNICATION_TIMEOUT', { timeoutMs, ...details });
    this.name = 'CommunicationTimeoutError';
  }
}

/**
 * No transport serves the device's current mode.
 */
export class ChannelUnavailableError extends CommunicationError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'CHANNEL_UNAVAILABLE', details);
    this.name = 'ChannelUnavailableError';
  }
}

/**
 * Device vanished from the bus mid-operation. Always fatal to a session.
 */
export class DeviceDisconnectedError extends CommunicationError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'DEVICE_DISCONNECTED', details);
    this.name = 'DeviceDisconnectedError';
  }
}

/**
 * Another holder kept the per-serial lease past the acquisition timeout.
 */
export class DeviceBusyError extends CommunicationError {
  constructor(serial: string, timeoutMs: number) {
    super(`Device ${serial} is busy; lease not acquired within ${timeoutMs}ms`, 'DEVICE_BUSY', { serial, timeoutMs });
    this.name = 'DeviceBusyError';
  }
}

/**
 * Device re-appeared in a mode other than the one requested.
 */
export class UnexpectedDeviceStateError extends CommunicationError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'UNEXPECTED_DEVICE_STATE', details);
    this.name = 'UnexpectedDeviceStateError';
  }
}

const DISCONNECT_PATTERNS = [
  /device '.*' not found/i,
  /no devices\/emulators found/i,
  /device offline/i,
  /device not found/i,
  /no such device/i,
  /LIBUSB_ERROR_NO_DEVICE/,
  /LIBUSB_ERROR_IO/
];

export function looksDisconnected(output: string): boolean {
  return DISCONNECT_PATTERNS.some(pattern => pattern.test(output));
}

/**
 * Errors raised by Node internals (fs, child_process) can come from another
 * realm under test runners, where `instanceof Error` is false.
 */
export function isError(value: unknown): value is Error {
  return value instanceof Error || types.isNativeError(value);
}

export function errorMessage(error: unknown): string {
  return isError(error) ? error.message : String(error);
}

/**
 * Race a device operation against a timer. The losing operation is not
 * cancelled here; callers that can kill the underlying work do so themselves.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  describe: string,
  details: Record<string, unknown> = {}
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new CommunicationTimeoutError(`${describe} timed out after ${timeoutMs}ms`, timeoutMs, details));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
