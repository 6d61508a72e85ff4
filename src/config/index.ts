import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { ValidatorConfig, ServerConfig } from '../types';
import { Logger, defaultLogger } from '../core/logger';
import { ConfigError } from '../core/errors';
import { REFERENCED_SCHEMA_FILES, BUNDLED_SCHEMA_DIR } from './schema-paths';

/**
 * Default configuration
 */
const DEFAULT_CONFIG: ValidatorConfig = {
  schemaDir: BUNDLED_SCHEMA_DIR,
  allErrors: true,
  checkPublicKey: false,
  server: {
    port: 3000,
  },
};

/**
 * Configuration file paths to search (in order)
 */
const CONFIG_PATHS = [
  '.sas-records/config.yml',
  '.sas-records/config.yaml',
  'sas-records.yml',
  'sas-records.yaml',
];

interface ConfigOverride {
  schemaDir?: string;
  allErrors?: boolean;
  checkPublicKey?: boolean;
  server?: Partial<ServerConfig>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pick the known keys out of parsed YAML, ignoring anything of the wrong type
 */
function toOverride(parsed: unknown): ConfigOverride {
  if (!isRecord(parsed)) return {};

  const override: ConfigOverride = {};
  if (typeof parsed.schemaDir === 'string') override.schemaDir = parsed.schemaDir;
  if (typeof parsed.allErrors === 'boolean') override.allErrors = parsed.allErrors;
  if (typeof parsed.checkPublicKey === 'boolean') override.checkPublicKey = parsed.checkPublicKey;
  const server = parsed.server;
  if (isRecord(server) && typeof server.port === 'number') {
    override.server = { port: server.port };
  }
  return override;
}

/**
 * Load configuration from file or use defaults.
 * A relative `schemaDir` is resolved against the directory of the config file.
 */
export function loadConfig(basePath?: string, logger: Logger = defaultLogger): ValidatorConfig {
  const searchPaths = CONFIG_PATHS.map((p) => path.resolve(basePath || process.cwd(), p));

  for (const configPath of searchPaths) {
    if (fs.existsSync(configPath)) {
      try {
        const content = fs.readFileSync(configPath, 'utf-8');
        const override = toOverride(yaml.parse(content));
        if (override.schemaDir !== undefined) {
          override.schemaDir = path.resolve(path.dirname(configPath), override.schemaDir);
        }
        return mergeConfig(DEFAULT_CONFIG, override);
      } catch (error) {
        logger.warn(`Failed to parse config at ${configPath}: ${error}`);
      }
    }
  }

  return getDefaultConfig();
}

/**
 * Merge configuration with defaults
 */
export function mergeConfig(defaults: ValidatorConfig, override: ConfigOverride): ValidatorConfig {
  return {
    schemaDir: override.schemaDir !== undefined ? override.schemaDir : defaults.schemaDir,
    allErrors: override.allErrors !== undefined ? override.allErrors : defaults.allErrors,
    checkPublicKey:
      override.checkPublicKey !== undefined ? override.checkPublicKey : defaults.checkPublicKey,
    server: { ...defaults.server, ...override.server },
  };
}

/**
 * Get the default configuration (deep copy)
 */
export function getDefaultConfig(): ValidatorConfig {
  return {
    ...DEFAULT_CONFIG,
    server: { ...DEFAULT_CONFIG.server },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: ValidatorConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.server.port) || config.server.port < 0 || config.server.port > 65535) {
    errors.push(`Invalid server port: ${config.server.port}. Must be between 0 and 65535.`);
  }

  if (!fs.existsSync(config.schemaDir)) {
    errors.push(`Schema directory does not exist: ${config.schemaDir}`);
  } else {
    for (const file of REFERENCED_SCHEMA_FILES) {
      if (!fs.existsSync(path.join(config.schemaDir, file))) {
        errors.push(`Schema directory ${config.schemaDir} is missing ${file}`);
      }
    }
  }

  return errors;
}

/**
 * Throw a ConfigError listing every problem of an unusable configuration
 */
export function requireValidConfig(config: ValidatorConfig): ValidatorConfig {
  const problems = validateConfig(config);
  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return config;
}
