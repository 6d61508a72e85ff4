#!/usr/bin/env node

import { Command } from 'commander';
import { createRecordValidator, SasRecordValidator, errorMessage } from '../core';
import { loadConfig, requireValidConfig } from '../config';
import { startServer } from '../api';
import { defaultLogger, silentLogger } from '../core/logger';
import { RECORD_SCHEMA_FILE } from '../config/schema-paths';
import { ValidatorConfig } from '../types';
import { validateFiles, allPassed, formatResult, summarize, readSchema, listSchemas } from './commands';

const program = new Command();

function getConfig(): ValidatorConfig {
  const options = program.opts<{ config?: string }>();
  return requireValidConfig(loadConfig(options.config, defaultLogger));
}

function getValidator(config: ValidatorConfig, allErrors: boolean, quiet: boolean): Promise<SasRecordValidator> {
  return createRecordValidator(config.schemaDir, {
    allErrors,
    logger: quiet ? silentLogger : defaultLogger,
  });
}

program
  .name('sas-records')
  .description('Validate SAS Implementation Records against their JSON Schema')
  .version('1.0.0')
  .option('-c, --config <dir>', 'Directory to search for sas-records.yml');

/**
 * Validate command
 */
program
  .command('validate')
  .description('Validate one or more record files')
  .argument('<files...>', 'JSON files holding a record or an array of records')
  .option('-k, --check-key', 'Also parse the public key of each record')
  .option('--first-error', 'Stop at the first violation of each record')
  .option('--json', 'Print reports as JSON')
  .action(async (files: string[], options: { checkKey?: boolean; firstError?: boolean; json?: boolean }) => {
    const config = getConfig();
    const validator = await getValidator(
      config,
      options.firstError ? false : config.allErrors,
      Boolean(options.json)
    );

    const results = await validateFiles(validator, files, {
      checkPublicKey: options.checkKey ?? config.checkPublicKey,
    });

    if (options.json) {
      console.log(JSON.stringify(results, null, 2));
    } else {
      console.log('');
      results.forEach((result) => formatResult(result).forEach((line) => console.log(line)));
      console.log(`\n${summarize(results)}\n`);
    }

    if (!allPassed(results)) {
      process.exitCode = 1;
    }
  });

/**
 * Schema command
 */
program
  .command('schema')
  .description('Print a schema document')
  .argument('[name]', `Schema file name (${listSchemas().join(', ')})`, RECORD_SCHEMA_FILE)
  .action((name: string) => {
    const config = getConfig();
    console.log(JSON.stringify(readSchema(name, config), null, 2));
  });

/**
 * Server command
 */
program
  .command('serve')
  .description('Start the validation HTTP server')
  .option('-p, --port <port>', 'Port to listen on')
  .action(async (options: { port?: string }) => {
    const config = getConfig();
    if (options.port !== undefined) {
      config.server.port = parseInt(options.port, 10);
    }
    requireValidConfig(config);

    const validator = await getValidator(config, config.allErrors, false);
    await startServer(validator, { config, logger: defaultLogger });
  });

program.parseAsync().catch((error: unknown) => {
  defaultLogger.error(errorMessage(error));
  process.exitCode = 1;
});
