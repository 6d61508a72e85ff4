import * as fs from 'fs';
import * as path from 'path';
import { loadConfig, getDefaultConfig, mergeConfig, validateConfig, requireValidConfig } from './index';
import { BUNDLED_SCHEMA_DIR } from './schema-paths';
import { ConfigError } from '../core/errors';
import { Logger } from '../core/logger';

// Mock fs module
jest.mock('fs');

const mockLogger = (): jest.Mocked<Logger> => ({
  log: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
});

describe('config', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('getDefaultConfig', () => {
    it('should return default configuration', () => {
      const config = getDefaultConfig();

      expect(config).toEqual({
        schemaDir: BUNDLED_SCHEMA_DIR,
        allErrors: true,
        checkPublicKey: false,
        server: { port: 3000 },
      });
    });

    it('should hand out independent copies', () => {
      const first = getDefaultConfig();
      first.server.port = 1;

      expect(getDefaultConfig().server.port).toBe(3000);
    });
  });

  describe('loadConfig', () => {
    it('should return default config when no file exists', () => {
      (fs.existsSync as jest.Mock).mockReturnValue(false);

      const config = loadConfig('/some/path');

      expect(config).toEqual(getDefaultConfig());
    });

    it('should load and merge config from file', () => {
      (fs.existsSync as jest.Mock).mockImplementation((p: string) => p.endsWith('sas-records.yml'));
      (fs.readFileSync as jest.Mock).mockReturnValue(`
allErrors: false
schemaDir: ./custom-schemas
server:
  port: 8080
`);

      const config = loadConfig('/some/path');

      expect(config.allErrors).toBe(false);
      expect(config.checkPublicKey).toBe(false);
      expect(config.schemaDir).toBe(path.resolve('/some/path', 'custom-schemas'));
      expect(config.server.port).toBe(8080);
    });

    it('should prefer the .sas-records directory', () => {
      (fs.existsSync as jest.Mock).mockReturnValue(true);
      (fs.readFileSync as jest.Mock).mockReturnValue('checkPublicKey: true\n');

      const config = loadConfig('/some/path');

      expect(fs.readFileSync).toHaveBeenCalledWith(
        path.resolve('/some/path', '.sas-records/config.yml'),
        'utf-8'
      );
      expect(config.checkPublicKey).toBe(true);
      expect(config.schemaDir).toBe(BUNDLED_SCHEMA_DIR);
    });

    it('should ignore values of the wrong type', () => {
      (fs.existsSync as jest.Mock).mockImplementation((p: string) => p.endsWith('sas-records.yaml'));
      (fs.readFileSync as jest.Mock).mockReturnValue('allErrors: "no"\nserver: 8080\n');

      const config = loadConfig('/some/path');

      expect(config.allErrors).toBe(true);
      expect(config.server.port).toBe(3000);
    });

    it('should fallback to default on parse error', () => {
      (fs.existsSync as jest.Mock).mockReturnValue(true);
      (fs.readFileSync as jest.Mock).mockReturnValue('invalid: yaml: content: [');
      const logger = mockLogger();

      const config = loadConfig('/some/path', logger);

      expect(config).toEqual(getDefaultConfig());
      expect(logger.warn).toHaveBeenCalledTimes(4);
    });
  });

  describe('mergeConfig', () => {
    it('should keep defaults for keys not overridden', () => {
      const merged = mergeConfig(getDefaultConfig(), { checkPublicKey: true });

      expect(merged.checkPublicKey).toBe(true);
      expect(merged.allErrors).toBe(true);
      expect(merged.server).toEqual({ port: 3000 });
    });
  });

  describe('validateConfig', () => {
    it('should validate correct config', () => {
      (fs.existsSync as jest.Mock).mockReturnValue(true);

      expect(validateConfig(getDefaultConfig())).toEqual([]);
    });

    it('should detect an invalid port', () => {
      (fs.existsSync as jest.Mock).mockReturnValue(true);
      const config = getDefaultConfig();
      config.server.port = 70000;

      expect(validateConfig(config)).toEqual([
        'Invalid server port: 70000. Must be between 0 and 65535.',
      ]);
    });

    it('should detect a missing schema directory', () => {
      (fs.existsSync as jest.Mock).mockReturnValue(false);
      const config = getDefaultConfig();
      config.schemaDir = '/nowhere';

      expect(validateConfig(config)).toEqual(['Schema directory does not exist: /nowhere']);
    });

    it('should detect missing referenced schemas', () => {
      (fs.existsSync as jest.Mock).mockImplementation((p: string) => p === '/partial');
      const config = getDefaultConfig();
      config.schemaDir = '/partial';

      expect(validateConfig(config)).toEqual([
        'Schema directory /partial is missing ContactInformation.schema.json',
        'Schema directory /partial is missing FccInformation.schema.json',
      ]);
    });
  });

  describe('requireValidConfig', () => {
    it('should throw a ConfigError listing the problems', () => {
      (fs.existsSync as jest.Mock).mockReturnValue(false);
      const config = getDefaultConfig();
      config.schemaDir = '/nowhere';

      expect(() => requireValidConfig(config)).toThrow(ConfigError);
      expect(() => requireValidConfig(config)).toThrow(
        'Invalid configuration: Schema directory does not exist: /nowhere'
      );
    });
  });
});
