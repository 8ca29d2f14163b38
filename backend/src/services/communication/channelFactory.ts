import { BootLoaderChannel } from './channels/bootLoaderChannel';
import { DebugBridgeChannel } from './channels/debugBridgeChannel';
import { RawUsbChannel } from './channels/rawUsbChannel';
import type { ChannelFactory } from './communicationManager';
import type { UsbTransportFactory } from '../usb/usbBus';

export function createChannelFactory(usbTransports: UsbTransportFactory): ChannelFactory {
  return (kind, serial) => {
    switch (kind) {
      case 'debug-bridge':
        return new DebugBridgeChannel(serial);
      case 'boot-loader':
        return new BootLoaderChannel(serial);
      case 'raw-usb':
        return new RawUsbChannel(serial, usbTransports);
    }
  };
}
