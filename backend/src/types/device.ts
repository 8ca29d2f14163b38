/**
 * Device Data Model Types
 *
 * Closed unions for manufacturer, operating mode and lock state, plus the
 * immutable snapshot produced by each detection cycle.
 */

// ============================================================================
// Enum Definitions
// ============================================================================

export const MANUFACTURERS = ['Samsung', 'LG', 'Xiaomi', 'Google', 'Unknown'] as const;

export const DEVICE_MODES = [
  'Normal',
  'DebugBridge',
  'BootLoader',
  'Recovery',
  'ManufacturerDownload',
  'EmergencyDownload'
] as const;

export type Manufacturer = (typeof MANUFACTURERS)[number];

export type DeviceMode = (typeof DEVICE_MODES)[number];

export type LockState = 'Locked' | 'Unlocked' | 'Unknown';

// ============================================================================
// USB Descriptors
// ============================================================================

/**
 * Class/subclass/protocol triple of one USB interface descriptor
 */
export interface InterfaceSignature {
  interfaceClass: number;
  interfaceSubclass: number;
  interfaceProtocol: number;
}

/**
 * Raw view of one enumerated USB device, before classification
 */
export interface UsbDeviceDescriptor {
  vendorId: number;
  productId: number;

  /** iSerialNumber string, when the device exposes one */
  serialNumber?: string;

  /** Bus-position id used as the serial when the device reports none */
  location: string;
  interfaces: InterfaceSignature[];
}

// ============================================================================
// Snapshot
// ============================================================================

export interface DeviceSnapshot {
  /** Opaque unique id (USB serial string or a bus location fallback) */
  readonly serial: string;
  readonly vendorId: number;
  readonly productId: number;
  readonly manufacturer: Manufacturer;
  readonly mode: DeviceMode;
  readonly model?: string;
  readonly androidVersion?: string;
  readonly apiLevel?: number;
  readonly lockState: LockState;

  /** ISO timestamp of the scan that produced this snapshot */
  readonly detectedAt: string;
}

export function hex4(value: number): string {
  return value.toString(16).padStart(4, '0');
}
