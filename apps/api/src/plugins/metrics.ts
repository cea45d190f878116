/**
 * Prometheus Metrics Plugin
 *
 * Exposes application metrics in Prometheus format at /metrics.
 * Collects HTTP request metrics, signup outcomes and per-activity enrollment.
 *
 * Each server instance owns its own registry, so several instances (one per
 * test, for example) never collide on metric names.
 */

import { AppError, logger } from '@mergington/utils';
import type { FastifyInstance, FastifyPluginCallback, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import client from 'prom-client';

import type { ActivityDirectory } from '../modules/activities/directory';

// =============================================================================
// Configuration
// =============================================================================

export interface MetricsPluginOptions {
  /** Enable/disable metrics collection */
  enabled?: boolean;
  /** Prefix for all metric names */
  prefix?: string;
  /** Enable default Node.js metrics */
  collectDefaultMetrics?: boolean;
  /** Value of the `app` label on every metric */
  appLabel?: string;
}

export interface ActivityMetrics {
  register: client.Registry;
  /** Shared registry of default Node.js metrics, when they are collected */
  processRegister: client.Registry | null;
  httpRequestsTotal: client.Counter<'method' | 'route' | 'status_code'>;
  httpRequestDuration: client.Histogram<'method' | 'route' | 'status_code'>;
  httpErrorsTotal: client.Counter<'method' | 'route' | 'status_code' | 'error_code'>;
  signupsTotal: client.Counter<'activity'>;
  unregistrationsTotal: client.Counter<'activity'>;
  rejectionsTotal: client.Counter<'operation' | 'reason'>;
  participants: client.Gauge<'activity'>;
  capacity: client.Gauge<'activity'>;
}

// =============================================================================
// Metrics Registry
// =============================================================================

export function createActivityMetrics(
  directory: ActivityDirectory,
  prefix = '',
  appLabel = 'mergington-activities'
): ActivityMetrics {
  const register = new client.Registry();
  register.setDefaultLabels({ app: appLabel });

  const httpRequestsTotal = new client.Counter({
    name: `${prefix}http_requests_total`,
    help: 'Total number of HTTP requests',
    labelNames: ['method', 'route', 'status_code'] as const,
    registers: [register],
  });

  const httpRequestDuration = new client.Histogram({
    name: `${prefix}http_request_duration_seconds`,
    help: 'HTTP request duration in seconds',
    labelNames: ['method', 'route', 'status_code'] as const,
    buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
    registers: [register],
  });

  const httpErrorsTotal = new client.Counter({
    name: `${prefix}http_errors_total`,
    help: 'Total number of HTTP errors',
    labelNames: ['method', 'route', 'status_code', 'error_code'] as const,
    registers: [register],
  });

  const signupsTotal = new client.Counter({
    name: `${prefix}activity_signups_total`,
    help: 'Successful activity signups',
    labelNames: ['activity'] as const,
    registers: [register],
  });

  const unregistrationsTotal = new client.Counter({
    name: `${prefix}activity_unregistrations_total`,
    help: 'Participants removed from activities',
    labelNames: ['activity'] as const,
    registers: [register],
  });

  const rejectionsTotal = new client.Counter({
    name: `${prefix}activity_rejections_total`,
    help: 'Signup and unregister requests rejected by the directory',
    labelNames: ['operation', 'reason'] as const,
    registers: [register],
  });

  // Gauges read the directory at scrape time
  const participants = new client.Gauge({
    name: `${prefix}activity_participants`,
    help: 'Current number of participants per activity',
    labelNames: ['activity'] as const,
    registers: [register],
    collect() {
      for (const count of directory.participantCounts()) {
        this.set({ activity: count.activity }, count.participants);
      }
    },
  });

  const capacity = new client.Gauge({
    name: `${prefix}activity_capacity`,
    help: 'Maximum number of participants per activity',
    labelNames: ['activity'] as const,
    registers: [register],
    collect() {
      for (const count of directory.participantCounts()) {
        this.set({ activity: count.activity }, count.capacity);
      }
    },
  });

  return {
    register,
    processRegister: null,
    httpRequestsTotal,
    httpRequestDuration,
    httpErrorsTotal,
    signupsTotal,
    unregistrationsTotal,
    rejectionsTotal,
    participants,
    capacity,
  };
}

// Default Node.js metrics start GC observers that live as long as the process,
// so they are collected once into a registry every server instance shares.
let processRegistry: client.Registry | null = null;

export function getProcessMetricsRegistry(prefix = '', appLabel = 'mergington-activities'): client.Registry {
  if (!processRegistry) {
    processRegistry = new client.Registry();
    processRegistry.setDefaultLabels({ app: appLabel });
    client.collectDefaultMetrics({
      register: processRegistry,
      prefix,
      gcDurationBuckets: [0.001, 0.01, 0.1, 1, 2, 5],
    });
  }
  return processRegistry;
}

function routeLabel(request: FastifyRequest): string {
  return request.routeOptions.url ?? 'unmatched';
}

// =============================================================================
// Plugin
// =============================================================================

const metricsPluginCallback: FastifyPluginCallback<MetricsPluginOptions> = (fastify, opts, done) => {
  const {
    enabled = true,
    prefix = '',
    collectDefaultMetrics = true,
    appLabel = 'mergington-activities',
  } = opts;

  if (!enabled) {
    fastify.decorate('metrics', null);
    logger.info('Metrics collection disabled');
    done();
    return;
  }

  const metrics = createActivityMetrics(fastify.activities, prefix, appLabel);
  if (collectDefaultMetrics) {
    metrics.processRegister = getProcessMetricsRegistry(prefix, appLabel);
  }

  // Record request metrics on response
  fastify.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
    const route = routeLabel(request);
    const statusCode = String(reply.statusCode);
    const method = request.method;

    metrics.httpRequestsTotal.labels(method, route, statusCode).inc();
    metrics.httpRequestDuration.labels(method, route, statusCode).observe(reply.elapsedTime / 1000);

    if (reply.statusCode >= 400) {
      const errorCode = reply.statusCode >= 500 ? 'server_error' : 'client_error';
      metrics.httpErrorsTotal.labels(method, route, statusCode, errorCode).inc();
    }
  });

  fastify.decorate('metrics', metrics);

  // The shared process registry outlives this instance and is left alone
  fastify.addHook('onClose', async () => {
    metrics.register.clear();
  });

  logger.info('Prometheus metrics collection enabled');
  done();
};

export const metricsPlugin = fp(metricsPluginCallback, {
  name: 'metrics',
  dependencies: ['activity-directory'],
});

// =============================================================================
// Metrics Routes
// =============================================================================

export interface MetricsRoutesOptions {
  /** When set, scrapers must send it in the X-Metrics-Token header */
  token?: string;
}

export async function metricsRoutes(app: FastifyInstance, opts: MetricsRoutesOptions): Promise<void> {
  app.get(
    '/metrics',
    {
      schema: {
        description: 'Prometheus metrics endpoint',
        tags: ['Metrics'],
        produces: ['text/plain'],
      },
      preHandler: async (request) => {
        if (!opts.token) return;

        const headerToken = request.headers['x-metrics-token'];
        if (headerToken !== opts.token) {
          throw new AppError('Valid X-Metrics-Token header required', 'AUTH_REQUIRED', 401);
        }
      },
    },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const metrics = app.metrics;
      if (!metrics) {
        throw new AppError('Metrics collection is disabled', 'RESOURCE_NOT_FOUND', 404);
      }

      const sections = [await metrics.register.metrics()];
      if (metrics.processRegister) {
        sections.push(await metrics.processRegister.metrics());
      }
      const body = sections.join('\n');
      reply.header('Content-Type', metrics.register.contentType);
      return reply.send(body);
    }
  );
}

// =============================================================================
// Type Augmentation
// =============================================================================

declare module 'fastify' {
  interface FastifyInstance {
    metrics: ActivityMetrics | null;
  }
}
