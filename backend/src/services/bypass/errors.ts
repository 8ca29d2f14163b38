import {
  ChannelUnavailableError,
  CommunicationError,
  CommunicationTimeoutError,
  DeviceDisconnectedError,
  UnexpectedDeviceStateError,
  errorMessage,
  isError
} from '../communication/errors';
import type { AttemptStatus, ErrorCategory } from '../../types/bypass';

export class EngineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'EngineError';
  }
}

/**
 * The authorization collaborator refused the device. Raised before a
 * session exists and before any command reaches the device.
 */
export class AuthorizationDeniedError extends EngineError {
  constructor(serial: string, reason?: string) {
    super(`Bypass not authorized for device ${serial}${reason ? `: ${reason}` : ''}`, 'AUTHORIZATION_DENIED', { serial });
    this.name = 'AuthorizationDeniedError';
  }
}

export class UnknownMethodError extends EngineError {
  constructor(name: string) {
    super(`No bypass method named '${name}' is registered`, 'UNKNOWN_METHOD', { name });
    this.name = 'UnknownMethodError';
  }
}

export class InvalidTransitionError extends EngineError {
  constructor(methodName: string, from: AttemptStatus, to: AttemptStatus) {
    super(`Illegal attempt transition ${from} -> ${to} for ${methodName}`, 'INVALID_TRANSITION', { methodName, from, to });
    this.name = 'InvalidTransitionError';
  }
}

/**
 * A descriptor, profile or authorization file failed to load or validate.
 */
export class CatalogError extends Error {
  constructor(
    message: string,
    public readonly source: string
  ) {
    super(message);
    this.name = 'CatalogError';
  }
}

/**
 * Map any thrown value onto the category the session retry policy uses
 */
export function categorizeError(error: unknown): ErrorCategory {
  if (error instanceof CommunicationTimeoutError) return 'timeout';
  if (error instanceof DeviceDisconnectedError || error instanceof UnexpectedDeviceStateError) return 'fatal';
  if (error instanceof ChannelUnavailableError || error instanceof CommunicationError) return 'channel';
  if (error instanceof AuthorizationDeniedError) return 'authorization';
  return 'unexpected';
}

export function errorCode(error: unknown): string {
  if (error instanceof CommunicationError || error instanceof EngineError) return error.code;
  return 'UNEXPECTED_ERROR';
}

export function errorName(error: unknown): string {
  return isError(error) ? error.name : 'Error';
}

export { errorMessage };
