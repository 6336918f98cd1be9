/**
 * Configuration module exports
 */
export { getConfigDir, resolveConfigDir } from './config-paths.js';

export {
  type ChatRelayRuntimeConfig,
  type CompletionEndpointConfig,
  type RuntimeConfigFile,
  ConfigValidationError,
  DEFAULT_RUNTIME_CONFIG,
  RUNTIME_CONFIG_SCHEMA,
  applyEnvironmentOverrides,
  getRuntimeConfigPath,
  loadRuntimeConfig,
  mergeRuntimeConfig,
  validateRuntimeConfig,
} from './runtime-config.js';

export { isDebugLoggingEnabled, isGenericDebugEnabled } from './debug-flags.js';
