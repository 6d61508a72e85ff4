import express, { Request, Response, Router, NextFunction, RequestHandler } from 'express';
import * as path from 'path';
import { SasRecordValidator, inspectRecord, FileSchemaResolver, SchemaLoadError } from '../core';
import { Logger, defaultLogger } from '../core/logger';
import { getDefaultConfig } from '../config';
import { BUNDLED_SCHEMA_DIR, RECORD_SCHEMA_FILE, SCHEMA_FILES } from '../config/schema-paths';
import { ValidatorConfig } from '../types';

export interface ApiOptions {
  config?: ValidatorConfig;
  logger?: Logger;
}

function wantsKeyCheck(req: Request, config: ValidatorConfig): boolean {
  const flag = req.query.checkKey;
  if (flag === 'true' || flag === '1') return true;
  if (flag === 'false' || flag === '0') return false;
  return config.checkPublicKey;
}

/**
 * Refuse bodies that were not sent as JSON, since nothing else is parsed
 */
const requireJson: RequestHandler = (req: Request, res: Response, next: NextFunction): void => {
  if (!req.is('application/json')) {
    res.status(415).json({
      error: 'Unsupported media type',
      message: 'Request body must be application/json',
    });
    return;
  }
  next();
};

/**
 * Create the record validation router
 */
export function createApiRouter(validator: SasRecordValidator, options: ApiOptions = {}): Router {
  const router = Router();
  const config = options.config ?? getDefaultConfig();
  const bundled = new FileSchemaResolver(BUNDLED_SCHEMA_DIR);
  const referenced = new FileSchemaResolver(config.schemaDir);

  // Non-object bodies reach the validator and come back as TypeMismatch
  router.use(express.json({ limit: '1mb', strict: false }));

  /**
   * POST /records/validate
   * Validate one candidate record. Answers 200 with the report either way.
   */
  const validateHandler: RequestHandler = (req: Request, res: Response): void => {
    const report = inspectRecord(validator, req.body, {
      source: 'api',
      checkPublicKey: wantsKeyCheck(req, config),
    });
    res.json(report);
  };
  router.post('/records/validate', requireJson, validateHandler);

  /**
   * POST /records/validate-batch
   * Validate an array of candidate records
   */
  const batchHandler: RequestHandler = (req: Request, res: Response): void => {
    if (!Array.isArray(req.body)) {
      res.status(400).json({
        error: 'Invalid request',
        message: 'Request body must be a JSON array of records',
      });
      return;
    }

    const checkPublicKey = wantsKeyCheck(req, config);
    const candidates: unknown[] = req.body;
    const reports = candidates.map((candidate, index) =>
      inspectRecord(validator, candidate, { source: `api[${index}]`, checkPublicKey })
    );
    res.json({
      reports,
      count: reports.length,
      validCount: reports.filter((r) => r.valid).length,
    });
  };
  router.post('/records/validate-batch', requireJson, batchHandler);

  /**
   * GET /schemas
   * List the schema documents in use
   */
  const schemaListHandler: RequestHandler = (_req: Request, res: Response): void => {
    res.json({ schemas: SCHEMA_FILES });
  };
  router.get('/schemas', schemaListHandler);

  /**
   * GET /schemas/:name
   * Serve one schema document
   */
  const schemaHandler: RequestHandler = (req: Request, res: Response): void => {
    const name = path.basename(req.params.name);
    if (!SCHEMA_FILES.includes(name)) {
      res.status(404).json({ error: 'Not found', message: `Unknown schema: ${name}` });
      return;
    }

    try {
      const resolver = name === RECORD_SCHEMA_FILE ? bundled : referenced;
      res.json(resolver.readSync(name));
    } catch (error) {
      if (error instanceof SchemaLoadError) {
        res.status(404).json({ error: 'Not found', message: error.message });
        return;
      }
      throw error;
    }
  };
  router.get('/schemas/:name', schemaHandler);

  return router;
}

function statusOf(err: Error): number | undefined {
  if ('status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

/**
 * Create a full Express application around a validator
 */
export function createApp(validator: SasRecordValidator, options: ApiOptions = {}): express.Application {
  const app = express();
  const logger = options.logger ?? defaultLogger;

  app.use('/', createApiRouter(validator, options));

  // Health check endpoint
  const healthHandler: RequestHandler = (_req: Request, res: Response): void => {
    res.json({ status: 'ok', service: 'sas-records' });
  };
  app.get('/health', healthHandler);

  // Root endpoint with info
  const rootHandler: RequestHandler = (_req: Request, res: Response): void => {
    res.json({
      name: 'sas-records',
      version: '1.0.0',
      description: 'SAS Implementation Record validator',
      endpoints: {
        validate: 'POST /records/validate',
        validateBatch: 'POST /records/validate-batch',
        schemas: 'GET /schemas',
        schema: 'GET /schemas/:name',
      },
    });
  };
  app.get('/', rootHandler);

  // Error handling middleware
  const errorHandler = (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    const status = statusOf(err);
    if (status !== undefined && status >= 400 && status < 500) {
      res.status(status).json({ error: 'Invalid request', message: err.message });
      return;
    }

    logger.error(`Error: ${err.message}`);
    // In production, don't expose internal error details
    const isDevelopment = process.env.NODE_ENV !== 'production';
    res.status(500).json({
      error: 'Internal server error',
      message: isDevelopment ? err.message : 'An unexpected error occurred',
    });
  };
  app.use(errorHandler);

  return app;
}

/**
 * Start the validation server
 */
export function startServer(
  validator: SasRecordValidator,
  options: ApiOptions = {}
): Promise<ReturnType<express.Application['listen']>> {
  const config = options.config ?? getDefaultConfig();
  const logger = options.logger ?? defaultLogger;

  return new Promise((resolve) => {
    const app = createApp(validator, { ...options, config });
    const server = app.listen(config.server.port, () => {
      logger.log(`Server running at http://localhost:${config.server.port}`);
      resolve(server);
    });
  });
}
