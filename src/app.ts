// Fastify application factory
import Fastify, { type FastifyInstance } from 'fastify';
import fastifyCors from '@fastify/cors';
import fastifyCookie from '@fastify/cookie';
import fastifyCompress from '@fastify/compress';
import fastifyFormbody from '@fastify/formbody';
import fastifyRateLimit from '@fastify/rate-limit';

import { ENV } from './config/environment.js';
import { databaseManager } from './infrastructure/database.js';
import type { Repositories } from './infrastructure/repositories/index.js';
import type { Mailer } from './infrastructure/EmailTool.js';
import { createServices, type ServiceOptions } from './services/index.js';
import { AppError, HttpStatus } from './types/common.js';

export interface AppOptions {
  repositories: Repositories;
  mailer: Mailer;
  serviceOptions?: Partial<ServiceOptions>;
  logger?: boolean;
}

export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? ENV.NODE_ENV === 'development',
    trustProxy: true,
    bodyLimit: 1048576,
    requestTimeout: 15000,
    connectionTimeout: 5000,
    keepAliveTimeout: 5000,
    maxRequestsPerSocket: 1000,
    ignoreTrailingSlash: true
  });

  // Accept an empty JSON body as {}
  fastify.addContentTypeParser('application/json', { parseAs: 'string' }, (request, body: string, done) => {
    if (body.trim() === '') return done(null, {});
    try {
      done(null, JSON.parse(body));
    } catch (err) {
      const reason = err instanceof Error ? err.message : 'invalid JSON';
      done(new AppError(HttpStatus.BAD_REQUEST, `JSON parse error - ${reason}`), undefined);
    }
  });

  fastify.decorate('services', createServices(options.repositories, options.mailer, options.serviceOptions));

  // Register plugins
  await fastify.register(fastifyCors, {
    origin: true,
    credentials: true,
    methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS']
  });

  await fastify.register(fastifyCookie, ENV.COOKIE_SECRET ? { secret: ENV.COOKIE_SECRET } : {});

  await fastify.register(fastifyCompress);

  await fastify.register(fastifyFormbody);

  await fastify.register(fastifyRateLimit, {
    max: ENV.RATE_LIMIT_MAX,           // requests per window
    timeWindow: '1 minute',
    allowList: ['127.0.0.1'],          // Allow localhost
    errorResponseBuilder: (request, context) => ({
      statusCode: 429,
      error: 'Too Many Requests',
      message: `Rate limit exceeded, retry in ${context.after}`,
      retryAfter: context.after
    })
  });

  const errorHandler = (await import('./plugins/errorHandler.js')).default;
  await fastify.register(errorHandler);

  const authPlugin = (await import('./plugins/auth.js')).default;
  await fastify.register(authPlugin);

  const registerApiRoutes = (await import('./api/routes/index.js')).default;
  await fastify.register(registerApiRoutes, { prefix: '/api/v1' });

  const registerWebRoutes = (await import('./web/routes/index.js')).default;
  await fastify.register(registerWebRoutes);

  // Health check endpoint
  fastify.get('/health', async () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    database: databaseManager.getConnectionStatus() ? 'connected' : 'disconnected',
    environment: ENV.NODE_ENV
  }));

  return fastify;
}
