/**
 * Security Headers Plugin
 *
 * Configures HTTP security headers using @fastify/helmet for the JSON API.
 */

import helmet from '@fastify/helmet';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

/**
 * CSP for an API that serves no documents: nothing may be loaded or framed.
 */
const API_CSP_DIRECTIVES = {
  defaultSrc: ["'none'"],
  frameAncestors: ["'none'"],
  formAction: ["'none'"],
};

/**
 * HSTS configuration, production only.
 */
const HSTS_CONFIG = {
  maxAge: 31536000, // 1 year in seconds
  includeSubDomains: true,
  preload: false,
};

// ─────────────────────────────────────────────────────────────────────────────
// Plugin
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Registers HTTP security headers plugin.
 * Skipped in the test environment.
 */
export async function registerSecurityHeaders(
  fastify: FastifyInstance,
  config: AppConfig
): Promise<void> {
  const { isProduction, isTest } = config.server;

  if (isTest) {
    fastify.log.debug('Security headers disabled in test environment');
    return;
  }

  await fastify.register(helmet, {
    contentSecurityPolicy: {
      directives: API_CSP_DIRECTIVES,
    },
    dnsPrefetchControl: { allow: false },
    frameguard: { action: 'deny' },
    hsts: isProduction ? HSTS_CONFIG : false,
    permittedCrossDomainPolicies: { permittedPolicies: 'none' },
    referrerPolicy: { policy: 'no-referrer' },
    xssFilter: false,
    hidePoweredBy: true,
    crossOriginEmbedderPolicy: false,
    crossOriginOpenerPolicy: false,
    // The dashboard front end is served from another origin
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });

  fastify.log.info(
    { environment: isProduction ? 'production' : 'development' },
    'Security headers plugin registered'
  );
}
