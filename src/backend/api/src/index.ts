/**
 * API Layer Entry Point
 *
 * Express application for the compliance workflow: company-side supplier,
 * requirement and questionnaire management, the supplier portal, CheckFix
 * linking and the audit trail, with OpenAPI documentation.
 *
 * @tested tests/e2e/compliance-workflow.e2e.test.ts
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yamljs';
import path from 'node:path';
import { readFile } from 'node:fs/promises';
import { getLogger, loadConfig, type AppConfig } from '@supplier-compliance/shared';
import { VERSION } from '@supplier-compliance/engine';

import { createApiContext, type ApiContext } from './context.js';
import { authMiddleware } from './middleware/auth.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { addRequestContext } from './middleware/request-context.js';
import { createHealthRouter, createDependencyChecker, HealthStatus } from './routes/health.js';
import { createSuppliersRouter } from './routes/suppliers.js';
import { createRequirementsRouter } from './routes/requirements.js';
import { createQuestionnairesRouter } from './routes/questionnaires.js';
import { createTemplatesRouter } from './routes/templates.js';
import { createSupplierPortalRouter } from './routes/supplier-portal.js';
import { createCheckFixRouter } from './routes/checkfix.js';
import { createOrganizationRouter } from './routes/organization.js';
import { createAuditRouter } from './routes/audit.js';

// Resolved from the working directory so the compiled build finds the source document
export const OPENAPI_PATH = path.join(process.cwd(), 'src/backend/api/src/openapi.yaml');
export const SYSTEM_TEMPLATES_PATH = path.join(process.cwd(), 'src/backend/api/src/system-templates.json');

/**
 * Creates and configures the Express application
 */
export function createApp(config: AppConfig = loadConfig(), context?: ApiContext): Express {
  const ctx = context ?? createApiContext(config);
  const logger = ctx.deps.logger;
  const app = express();

  app.use(addRequestContext(logger));
  app.use(express.json());

  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PUT, PATCH, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, X-Correlation-ID');
    res.setHeader('Access-Control-Expose-Headers', 'X-Correlation-ID, X-Request-ID');
    next();
  });

  app.options('*', (_req: Request, res: Response) => {
    res.sendStatus(204);
  });

  app.use(
    createHealthRouter({
      version: VERSION,
      dependencyCheckers: [
        createDependencyChecker('repositories', async () => true, { critical: true }),
        createDependencyChecker('verificationProvider', async () =>
          config.checkfix.apiKey || config.nodeEnv !== 'production'
            ? true
            : { status: HealthStatus.DEGRADED, message: 'Stub verification client in use' }
        ),
      ],
    })
  );

  if (config.enableSwagger) {
    try {
      const swaggerDocument: Record<string, unknown> = YAML.load(OPENAPI_PATH);
      app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerDocument));
      app.get('/api-docs.json', (_req: Request, res: Response) => {
        res.json(swaggerDocument);
      });
    } catch (error) {
      logger.warn('Failed to load OpenAPI document, /api-docs disabled', {
        path: OPENAPI_PATH,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  const apiRouter = express.Router();
  apiRouter.use(authMiddleware(config.auth));

  // Company
  apiRouter.use('/suppliers', createSuppliersRouter(ctx));
  apiRouter.use('/requirements', createRequirementsRouter(ctx));
  apiRouter.use('/questionnaires', createQuestionnairesRouter(ctx));
  apiRouter.use('/templates', createTemplatesRouter(ctx));
  apiRouter.use('/audit', createAuditRouter(ctx));

  // Supplier
  apiRouter.use('/supplier', createSupplierPortalRouter(ctx));
  apiRouter.use('/checkfix', createCheckFixRouter(ctx));

  // Either side
  apiRouter.use('/organization', createOrganizationRouter(ctx));

  app.use('/api/v1', apiRouter);

  app.use(notFoundHandler);
  app.use(errorHandler(logger));

  return app;
}

/**
 * Loads the system template definitions file into the template store
 */
export async function seedSystemTemplates(ctx: ApiContext, filePath: string = SYSTEM_TEMPLATES_PATH): Promise<number> {
  const definitions: unknown = JSON.parse(await readFile(filePath, 'utf8'));
  return ctx.templates.seedSystemTemplates(definitions);
}

/**
 * Starts the API server
 */
export async function startServer(config: AppConfig = loadConfig()): Promise<void> {
  const ctx = createApiContext(config);
  await seedSystemTemplates(ctx);
  const app = createApp(config, ctx);
  const logger = ctx.deps.logger;

  app.listen(config.port, () => {
    logger.info('Supplier compliance API listening', {
      port: config.port,
      nodeEnv: config.nodeEnv,
      swagger: config.enableSwagger ? '/api-docs' : 'disabled',
    });
  });
}

export { createApiContext, type ApiContext } from './context.js';
export * from './middleware/index.js';

// Start server if run directly
if (process.argv[1] && process.argv[1].endsWith('api/src/index.js')) {
  startServer().catch((error: unknown) => {
    getLogger().error('API server failed to start', error instanceof Error ? error : new Error(String(error)));
    process.exitCode = 1;
  });
}
