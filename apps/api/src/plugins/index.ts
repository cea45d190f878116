import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';
import type { Config } from '@mergington/config';
import type { FastifyInstance } from 'fastify';

import type { ActivityDirectory } from '../modules/activities/directory';

import { activityDirectoryPlugin } from './activity-directory';
import { errorHandler, notFoundHandler } from './error-handler';
import { metricsPlugin } from './metrics';

export interface RegisterPluginsOptions {
  config: Config;
  directory?: ActivityDirectory;
}

export async function registerPlugins(app: FastifyInstance, options: RegisterPluginsOptions): Promise<void> {
  const { config, directory } = options;

  // Security headers
  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'", "'unsafe-inline'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        imgSrc: ["'self'", 'data:', 'https:'],
      },
    },
  });

  // CORS
  await app.register(cors, {
    origin: config.api.corsOrigins,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
    exposedHeaders: ['X-RateLimit-Limit', 'X-RateLimit-Remaining', 'X-RateLimit-Reset', 'Retry-After'],
  });

  // Rate limiting
  if (config.rateLimit.enabled) {
    await app.register(rateLimit, {
      max: config.rateLimit.max,
      timeWindow: config.rateLimit.windowMs,
      // request.ip honours X-Forwarded-For only when trustProxy is on
      keyGenerator: (request) => request.ip,
      errorResponseBuilder: (_request, context) => ({
        statusCode: 429,
        code: 'RATE_LIMIT_EXCEEDED',
        message: `Too many requests, retry in ${Math.ceil(context.ttl / 1000)} seconds`,
      }),
    });
  }

  // Activity directory (owned by this server instance)
  await app.register(activityDirectoryPlugin, { directory });

  // Prometheus metrics (reads the directory for enrollment gauges)
  await app.register(metricsPlugin, {
    enabled: config.metrics.enabled,
    collectDefaultMetrics: config.metrics.collectDefault,
    appLabel: config.appName,
  });

  // Swagger documentation
  if (config.docs.enabled) {
    await app.register(swagger, {
      openapi: {
        info: {
          title: 'Mergington High School Activities API',
          description: 'Browse extracurricular activities and manage signups',
          version: config.appVersion,
        },
        servers: [
          {
            url: `http://localhost:${config.api.port}`,
            description: 'Development server',
          },
        ],
      },
    });

    await app.register(swaggerUI, {
      routePrefix: '/docs',
      uiConfig: {
        docExpansion: 'list',
        deepLinking: true,
      },
    });
  }

  // Global error handlers
  app.setErrorHandler(errorHandler);
  app.setNotFoundHandler(notFoundHandler);

  // Request logging
  app.addHook('onRequest', async (request) => {
    request.log.info({
      msg: 'request_start',
      method: request.method,
      url: request.url,
      requestId: request.id,
    });
  });

  // Response logging
  app.addHook('onResponse', async (request, reply) => {
    request.log.info({
      msg: 'request_complete',
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      responseTime: reply.elapsedTime,
    });
  });
}
