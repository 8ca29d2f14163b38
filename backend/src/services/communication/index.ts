export {
  CommunicationManager,
  ChannelLease,
  channelKindForMode,
  type ChannelFactory,
  type CommunicationConfig,
  type DeviceLocator
} from './communicationManager';
export { createChannelFactory } from './channelFactory';
export { DeviceLock } from './deviceLock';
export { DebugBridgeChannel } from './channels/debugBridgeChannel';
export { BootLoaderChannel } from './channels/bootLoaderChannel';
export { RawUsbChannel } from './channels/rawUsbChannel';
export {
  CommunicationError,
  CommunicationTimeoutError,
  ChannelUnavailableError,
  DeviceDisconnectedError,
  DeviceBusyError,
  UnexpectedDeviceStateError,
  withTimeout
} from './errors';
