/**
 * libusb-backed bus access through the `usb` package's WebUSB interface.
 *
 * The detector and raw-USB channel only see the UsbBus and
 * UsbTransportFactory interfaces.
 */

import { getDeviceList, WebUSBDevice } from 'usb';
import { createServiceLogger } from '../logger';
import { ChannelUnavailableError, errorMessage, withTimeout } from '../communication/errors';
import { hex4, type InterfaceSignature, type UsbDeviceDescriptor } from '../../types/device';
import type { UsbBus, UsbTransport, UsbTransportFactory } from './usbBus';

const log = createServiceLogger('usb');

interface BulkPipe {
  interfaceNumber: number;
  inEndpoint: number;
  outEndpoint: number;
}

const interfaceSignatures = (device: USBDevice): InterfaceSignature[] => {
  const configuration = device.configuration ?? device.configurations[0];
  if (!configuration) return [];

  return configuration.interfaces.map(usbInterface => {
    const alternate = usbInterface.alternate;
    return {
      interfaceClass: alternate.interfaceClass,
      interfaceSubclass: alternate.interfaceSubclass,
      interfaceProtocol: alternate.interfaceProtocol
    };
  });
};

const findBulkPipe = (device: USBDevice): BulkPipe | undefined => {
  const configuration = device.configuration ?? device.configurations[0];
  if (!configuration) return undefined;

  for (const usbInterface of configuration.interfaces) {
    const endpoints = usbInterface.alternate.endpoints.filter(endpoint => endpoint.type === 'bulk');
    const inEndpoint = endpoints.find(endpoint => endpoint.direction === 'in');
    const outEndpoint = endpoints.find(endpoint => endpoint.direction === 'out');
    if (inEndpoint && outEndpoint) {
      return {
        interfaceNumber: usbInterface.interfaceNumber,
        inEndpoint: inEndpoint.endpointNumber,
        outEndpoint: outEndpoint.endpointNumber
      };
    }
  }
  return undefined;
};

class WebUsbTransport implements UsbTransport {
  constructor(
    private readonly device: USBDevice,
    private readonly pipe: BulkPipe
  ) {}

  async write(data: Buffer, timeoutMs: number): Promise<void> {
    const result = await withTimeout(this.device.transferOut(this.pipe.outEndpoint, new Uint8Array(data)), timeoutMs, 'USB bulk write');
    if (result.status !== 'ok') {
      throw new Error(`USB bulk write ended with status ${result.status}`);
    }
  }

  async read(maxLength: number, timeoutMs: number): Promise<Buffer> {
    const result = await withTimeout(this.device.transferIn(this.pipe.inEndpoint, maxLength), timeoutMs, 'USB bulk read');
    if (result.status !== 'ok') {
      throw new Error(`USB bulk read ended with status ${result.status}`);
    }
    const data = result.data;
    return data ? Buffer.from(data.buffer, data.byteOffset, data.byteLength) : Buffer.alloc(0);
  }

  async close(): Promise<void> {
    await this.device.releaseInterface(this.pipe.interfaceNumber);
    await this.device.close();
  }
}

type LibusbDevice = ReturnType<typeof getDeviceList>[number];

interface Enumerated {
  descriptor: UsbDeviceDescriptor;
  device?: USBDevice;
}

/**
 * Bus number plus hub port path. Unlike enumeration order it survives other
 * devices arriving, and unlike the USB id it survives a mode switch.
 */
const topologyKey = (device: LibusbDevice): string =>
  `usb-${device.busNumber}-${device.portNumbers?.length ? device.portNumbers.join('.') : device.deviceAddress}`;

export class NodeUsbBus implements UsbBus, UsbTransportFactory {
  async list(): Promise<UsbDeviceDescriptor[]> {
    const enumerated = await this.enumerate();
    return enumerated.map(entry => entry.descriptor);
  }

  async open(serial: string): Promise<UsbTransport> {
    const enumerated = await this.enumerate();
    const device = enumerated.find(
      entry => entry.descriptor.serialNumber === serial || entry.descriptor.location === serial
    )?.device;
    if (!device) {
      throw new Error(`LIBUSB_ERROR_NO_DEVICE: ${serial} is not on the bus`);
    }

    const pipe = findBulkPipe(device);
    if (!pipe) {
      throw new ChannelUnavailableError(`Device ${serial} exposes no bulk in/out pair`, { serial });
    }

    await device.open();
    if (!device.configuration) {
      await device.selectConfiguration(1);
    }
    await device.claimInterface(pipe.interfaceNumber);
    log.debug('transport_open', `Claimed interface ${pipe.interfaceNumber}`, undefined, { serial, ...pipe });

    return new WebUsbTransport(device, pipe);
  }

  private async enumerate(): Promise<Enumerated[]> {
    return Promise.all(
      getDeviceList().map(async (raw): Promise<Enumerated> => {
        const location = topologyKey(raw);
        const base = {
          vendorId: raw.deviceDescriptor.idVendor,
          productId: raw.deviceDescriptor.idProduct,
          location
        };
        try {
          const device = await WebUSBDevice.createInstance(raw);
          return {
            descriptor: { ...base, serialNumber: device.serialNumber || undefined, interfaces: interfaceSignatures(device) },
            device
          };
        } catch (error) {
          log.debug('device_unreadable', `Cannot read descriptors of ${hex4(base.vendorId)}:${hex4(base.productId)}`, undefined, {
            location,
            error: errorMessage(error)
          });
          return { descriptor: { ...base, interfaces: [] } };
        }
      })
    );
  }
}
