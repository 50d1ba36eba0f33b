export {
  expandPath,
  expandEnv,
  getConfigPath,
  configExists,
  parseConfig,
  mergeWithDefaults,
  validateConfig,
  loadConfig,
  saveConfig,
  createDefaultConfig,
  toGatewaySettings,
  openSessionStore,
  applyLogLevel,
} from './config-manager.js';

export {
  DEFAULT_CONFIG,
  LANEWAY_PATHS,
  CONFIG_LOG_LEVELS,
  type AgentBindingConfig,
  type AgentConfig,
  type ConfigLogLevel,
  type DeliveryConfig,
  type IngestConfig,
  type JobEntryConfig,
  type LanewayConfig,
  type LoggingConfig,
  type PartialLanewayConfig,
  type QueueConfig,
  type SessionConfig,
} from './types.js';
