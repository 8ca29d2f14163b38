/**
 * USB signature tables and the pure classification functions built on them.
 *
 * Mode probing runs in a fixed order: debug-bridge interface, boot-loader
 * interface, raw-USB download signatures, then the vendor's normal-mode
 * signatures. The first match wins.
 */

import type { DeviceMode, InterfaceSignature, Manufacturer, UsbDeviceDescriptor } from '../../types/device';

export const VENDOR_TABLE: Readonly<Record<number, Manufacturer>> = {
  0x04e8: 'Samsung',
  0x1004: 'LG',
  0x2717: 'Xiaomi',
  0x18d1: 'Google'
};

const ADB_INTERFACE: InterfaceSignature = { interfaceClass: 0xff, interfaceSubclass: 0x42, interfaceProtocol: 0x01 };
const FASTBOOT_INTERFACE: InterfaceSignature = { interfaceClass: 0xff, interfaceSubclass: 0x42, interfaceProtocol: 0x03 };

const CLASS_STILL_IMAGE = 0x06;
const CLASS_CDC_DATA = 0x0a;

/** Product ids whose adb interface belongs to the recovery image */
const RECOVERY_PRODUCTS: Readonly<Record<number, readonly number[]>> = {
  0x04e8: [0x685c],
  0x1004: [0x6344],
  0x18d1: [0xd001]
};

/** Vendor download protocols (Odin, LG LAF) enumerate as CDC serial devices */
const DOWNLOAD_PRODUCTS: Readonly<Record<number, readonly number[]>> = {
  0x04e8: [0x685d],
  0x1004: [0x633e]
};

/** Qualcomm HS-USB QDLoader, shared by every vendor's emergency download mode */
const EMERGENCY_DOWNLOAD = { vendorId: 0x05c6, productIds: [0x9008] } as const;

const NORMAL_PRODUCTS: Readonly<Record<number, readonly number[]>> = {
  0x04e8: [0x6860],
  0x1004: [0x6000, 0x633a],
  0x2717: [0xff40, 0xff48],
  0x18d1: [0x4ee1, 0x4ee2]
};

const sameSignature = (a: InterfaceSignature, b: InterfaceSignature): boolean =>
  a.interfaceClass === b.interfaceClass &&
  a.interfaceSubclass === b.interfaceSubclass &&
  a.interfaceProtocol === b.interfaceProtocol;

const hasInterface = (device: UsbDeviceDescriptor, signature: InterfaceSignature): boolean =>
  device.interfaces.some(candidate => sameSignature(candidate, signature));

const listed = (table: Readonly<Record<number, readonly number[]>>, device: UsbDeviceDescriptor): boolean =>
  table[device.vendorId]?.includes(device.productId) ?? false;

export function classifyManufacturer(vendorId: number): Manufacturer {
  return VENDOR_TABLE[vendorId] ?? 'Unknown';
}

/**
 * Mode of a device from its descriptors alone, or undefined when nothing
 * matches. Unknown vendors only match the signatures every Android device
 * shares.
 */
export function classifyMode(device: UsbDeviceDescriptor): DeviceMode | undefined {
  const knownVendor = classifyManufacturer(device.vendorId) !== 'Unknown';

  if (hasInterface(device, ADB_INTERFACE)) {
    return listed(RECOVERY_PRODUCTS, device) ? 'Recovery' : 'DebugBridge';
  }

  if (hasInterface(device, FASTBOOT_INTERFACE)) {
    return 'BootLoader';
  }

  if (
    listed(DOWNLOAD_PRODUCTS, device) &&
    device.interfaces.some(signature => signature.interfaceClass === CLASS_CDC_DATA)
  ) {
    return 'ManufacturerDownload';
  }

  if (
    device.vendorId === EMERGENCY_DOWNLOAD.vendorId &&
    EMERGENCY_DOWNLOAD.productIds.some(productId => productId === device.productId)
  ) {
    return 'EmergencyDownload';
  }

  if (
    knownVendor &&
    (listed(NORMAL_PRODUCTS, device) ||
      device.interfaces.some(signature => signature.interfaceClass === CLASS_STILL_IMAGE))
  ) {
    return 'Normal';
  }

  return undefined;
}

export interface Classification {
  manufacturer: Manufacturer;
  mode: DeviceMode;
}

export function classifyDevice(device: UsbDeviceDescriptor): Classification | undefined {
  const mode = classifyMode(device);
  if (!mode) {
    return undefined;
  }
  return { manufacturer: classifyManufacturer(device.vendorId), mode };
}
