/**
 * CORS plugin for Fastify
 * Configures Cross-Origin Resource Sharing with environment-based allowed origins
 */

import cors from '@fastify/cors';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

/**
 * Parses the comma-separated ALLOWED_ORIGINS value.
 */
export function parseAllowedOrigins(raw: string | undefined): Set<string> {
  if (raw === undefined || raw === '') {
    return new Set();
  }
  return new Set(
    raw
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s !== '')
  );
}

export function isLocalhostOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }

    // Match hostnames exactly (avoid `startsWith('http://localhost')` pitfalls)
    return (
      url.hostname === 'localhost' || url.hostname === '127.0.0.1' || url.hostname === '[::1]'
    );
  } catch {
    return false;
  }
}

/**
 * Decides whether a browser origin may call the API.
 * Development also admits localhost; every environment admits the whitelist.
 */
export function isOriginAllowed(
  origin: string,
  allowedOrigins: ReadonlySet<string>,
  isDevelopment: boolean
): boolean {
  if (allowedOrigins.has(origin)) {
    return true;
  }
  return isDevelopment && isLocalhostOrigin(origin);
}

/**
 * Register CORS plugin with Fastify
 */
export async function registerCors(fastify: FastifyInstance, config: AppConfig): Promise<void> {
  const allowedOrigins = parseAllowedOrigins(config.cors.allowedOrigins);

  await fastify.register(cors, {
    origin: (origin, cb) => {
      // Allow server-to-server or same-origin requests
      if (origin === undefined || origin === '') {
        cb(null, true);
        return;
      }

      if (isOriginAllowed(origin, allowedOrigins, config.server.isDevelopment)) {
        cb(null, true);
        return;
      }

      cb(Object.assign(new Error('CORS origin not allowed'), { statusCode: 403 }), false);
    },
    methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['content-type', 'x-requested-with', 'accept'],
    exposedHeaders: ['content-length'],
  });
}
