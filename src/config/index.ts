export {
  loadConfig,
  findConfigFile,
  readProjectFile,
  getConfigSummary,
  ConfigValidationError,
  CONFIG_FILE_NAME,
  DEFAULT_FILTER_LISTS,
  type UiscopeConfig,
  type DeviceConfig,
  type TimeoutConfig,
  type WatchConfig,
  type LogCollectionConfig,
  type ProjectFile
} from './environment';
