/**
 * CORS plugin for Fastify
 *
 * The similarity API is read-only, so only GET, HEAD and OPTIONS are allowed.
 * Origins come from ALLOWED_ORIGINS (comma-separated) and CLIENT_BASE_URL.
 */

import cors from '@fastify/cors';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

/**
 * Get the set of allowed origins from configuration
 */
export function getAllowedOrigins(config: Pick<AppConfig, 'cors'>): Set<string> {
  const set = new Set<string>();

  const { allowedOrigins, clientBaseUrl } = config.cors;

  if (allowedOrigins !== undefined && allowedOrigins !== '') {
    allowedOrigins
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s !== '')
      .forEach((origin) => set.add(origin));
  }

  if (clientBaseUrl !== undefined && clientBaseUrl.trim() !== '') {
    set.add(clientBaseUrl.trim());
  }

  return set;
}

export function isLocalhostOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }

    // Exact hostname match; `startsWith('http://localhost')` would also accept localhost.evil.com
    return (
      url.hostname === 'localhost' || url.hostname === '127.0.0.1' || url.hostname === '[::1]'
    );
  } catch {
    return false;
  }
}

export async function registerCors(fastify: FastifyInstance, config: AppConfig): Promise<void> {
  const allowedOrigins = getAllowedOrigins(config);

  await fastify.register(cors, {
    origin: (origin, cb) => {
      // Server-to-server or same-origin
      if (origin === undefined || origin === '') {
        cb(null, true);
        return;
      }

      if (allowedOrigins.has(origin)) {
        cb(null, true);
        return;
      }

      // Development additionally admits any localhost port
      if (config.server.isDevelopment && isLocalhostOrigin(origin)) {
        cb(null, true);
        return;
      }

      // Answer without CORS headers; the browser blocks the response
      cb(null, false);
    },
    methods: ['GET', 'HEAD', 'OPTIONS'],
    allowedHeaders: ['content-type', 'accept', 'x-requested-with'],
    exposedHeaders: ['content-length'],
  });
}
