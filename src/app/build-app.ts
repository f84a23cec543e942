/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { createLogger, type Logger } from '../infra/logger/index.js';
import { registerCors, registerSecurityHeaders } from '../infra/plugins/index.js';
import { makeHealthRoutes } from '../modules/health/index.js';
import { makeListingsRepo, makeListingsRoutes } from '../modules/listings/index.js';
import { makeManagementRepo, makeManagementRoutes } from '../modules/management/index.js';
import { makeReportsRepo, makeReportsRoutes } from '../modules/reports/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { FoodStore } from '../infra/database/store.js';
import type { HealthChecker } from '../modules/health/index.js';
import type { ListingsRepository } from '../modules/listings/index.js';
import type { ManagementRepository } from '../modules/management/index.js';
import type { ReportsRepository } from '../modules/reports/index.js';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  /** Open food store; owned by the caller, which closes it after the app */
  store: FoodStore;
  config: AppConfig;
  /** Logger handed to the repositories (a silent-by-config logger when omitted) */
  logger?: Logger;
  /** Extra readiness checks on top of the store check */
  healthCheckers?: HealthChecker[];
  listingsRepo?: ListingsRepository;
  reportsRepo?: ReportsRepository;
  managementRepo?: ManagementRepository;
  /** Source of "today" for listing defaults */
  clock?: () => Date;
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps?: Partial<AppDeps>; // Allow partial for tests/defaults, but runtime needs them
  version?: string | undefined;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps = {}, version } = options;

  if (deps.store === undefined || deps.config === undefined) {
    throw new Error('Missing required dependencies: store, config');
  }

  const store = deps.store;
  const config = deps.config;

  const app = fastifyLib({
    ...fastifyOptions,
  });

  await registerCors(app, config);
  await registerSecurityHeaders(app, config);

  // Global error handler; must precede route registration
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    // Handle validation errors
    if (error.validation != null) {
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: error.message,
      });
    }

    // Handle known HTTP errors
    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    // Handle unexpected errors
    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  const repoLogger = deps.logger ?? createLogger({ level: config.logger.level, pretty: false });

  // ─────────────────────────────────────────────────────────────────────────────
  // Health
  // ─────────────────────────────────────────────────────────────────────────────
  await app.register(
    makeHealthRoutes({
      store,
      version,
      ...(deps.healthCheckers !== undefined && { extraCheckers: deps.healthCheckers }),
    })
  );

  // ─────────────────────────────────────────────────────────────────────────────
  // Listings & Dashboard
  // ─────────────────────────────────────────────────────────────────────────────
  const listingsRepo = deps.listingsRepo ?? makeListingsRepo({ store, logger: repoLogger });
  await app.register(makeListingsRoutes({ listingsRepo }));

  // ─────────────────────────────────────────────────────────────────────────────
  // Reports
  // ─────────────────────────────────────────────────────────────────────────────
  const reportsRepo = deps.reportsRepo ?? makeReportsRepo({ store, logger: repoLogger });
  await app.register(makeReportsRoutes({ reportsRepo }));

  // ─────────────────────────────────────────────────────────────────────────────
  // Management (CRUD)
  // ─────────────────────────────────────────────────────────────────────────────
  const managementRepo =
    deps.managementRepo ?? makeManagementRepo({ store, logger: repoLogger });
  await app.register(
    makeManagementRoutes({
      managementRepo,
      ...(deps.clock !== undefined && { clock: deps.clock }),
    })
  );

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
