export * from './types';
export * from './core';
export type { Logger } from './core/logger';
export { ConsoleLogger, defaultLogger, silentLogger } from './core/logger';
export { loadConfig, getDefaultConfig, validateConfig, requireValidConfig } from './config';
export {
  BUNDLED_SCHEMA_DIR,
  RECORD_SCHEMA_FILE,
  CONTACT_INFORMATION_SCHEMA_FILE,
  FCC_INFORMATION_SCHEMA_FILE,
} from './config/schema-paths';
export { createApp, createApiRouter, startServer } from './api';
