export {
  loadEnvironmentConfig,
  configWarnings,
  getConfigSummary,
  ConfigValidationError,
  type EnvironmentConfig,
  type DetectorSettings,
  type CommunicationSettings,
  type EngineSettings,
  type CacheSettings,
  type StorageSettings,
  type SecuritySettings,
  type LoggingSettings
} from './environment';
