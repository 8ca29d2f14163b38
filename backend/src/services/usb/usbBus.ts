import type { UsbDeviceDescriptor } from '../../types/device';

/**
 * Read-only view of the USB bus used by the detector
 */
export interface UsbBus {
  list(): Promise<UsbDeviceDescriptor[]>;
}

/**
 * Bulk in/out pipe to one device, used by the raw-USB channel
 */
export interface UsbTransport {
  write(data: Buffer, timeoutMs: number): Promise<void>;
  read(maxLength: number, timeoutMs: number): Promise<Buffer>;
  close(): Promise<void>;
}

export interface UsbTransportFactory {
  open(serial: string): Promise<UsbTransport>;
}
