/**
 * Configuration module exports
 */

export {
  DEFAULT_CONFIG_FILE,
  EMPTY_CONFIG,
  parseXmlConfig,
  parseYamlConfig,
  loadIntegrityConfig,
  isEmailingMachine,
  type IntegrityConfig,
  type NotificationConfig,
} from './integrity-config.js';

export {
  ENV_INSTALLER_DIR,
  ENV_PROJECT_ROOT,
  ENV_BUILD_TYPE,
  DEFAULT_BUILD_TYPE,
  DIST_FILES_DIR,
  REPORT_FILE_NAME,
  deriveProjectRoot,
  resolveEnvironment,
  type EnvironmentOptions,
  type RunEnvironment,
} from './environment.js';
