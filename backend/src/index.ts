export * from './types/device';
export * from './types/profile';
export * from './types/communication';
export * from './types/bypass';
export * from './types/session';

export { DeviceDetector, type DetectorConfig } from './services/detection/deviceDetector';
export { classifyDevice, classifyManufacturer, classifyMode } from './services/detection/signatures';
export * from './services/communication';
export { NodeUsbBus } from './services/usb/nodeUsb';
export type { UsbBus, UsbTransport, UsbTransportFactory } from './services/usb/usbBus';

export { MethodRegistry } from './services/bypass/methodRegistry';
export { rankCandidates, reachableInOneSwitch, MODE_REACHABILITY, type RankingOptions } from './services/bypass/ranking';
export { AttemptRecorder, canTransition } from './services/bypass/attemptRecorder';
export { runAttempt, type AttemptChannel, type ExecutorConfig } from './services/bypass/methodExecutor';
export {
  BypassStrategyEngine,
  DEFAULT_ENGINE_CONFIG,
  summarize,
  type EngineConfig,
  type EngineDependencies,
  type RunSessionOptions,
  type SessionPlan,
  type TransitionEvent
} from './services/bypass/strategyEngine';
export {
  EngineError,
  AuthorizationDeniedError,
  UnknownMethodError,
  InvalidTransitionError,
  CatalogError,
  categorizeError
} from './services/bypass/errors';

export { JsonProfileCatalog, type ProfileCatalog } from './services/profiles/profileCatalog';
export { ProfileResolver, buildGenericProfile } from './services/profiles/profileResolver';
export { FileAuthorizationRegistry, StaticAuthorizer, type Authorizer } from './services/authorization/authorizer';
export { JsonlAuditSink, AuditTrail, verifyAuditLog, type AuditSink } from './services/audit/auditSink';
export { MemoryResultCache, type ResultCache } from './services/cache/resultCache';
export { SessionStore } from './state/sessionStore';
export {
  Orchestrator,
  createOrchestrator,
  NoDeviceError,
  DeviceNotFoundError,
  AmbiguousDeviceError
} from './services/orchestrator';
export * from './config';
export { createServiceLogger, logger } from './services/logger';
