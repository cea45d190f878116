/**
 * Health Check Routes
 *
 * Kubernetes-compatible health endpoints.
 * - /health - Basic liveness (is server running)
 * - /health/live - Liveness probe (is process alive)
 * - /health/ready - Readiness probe (directory loaded, memory within limits)
 */

import { getHeapStatistics } from 'v8';

import type { Config } from '@mergington/config';
import { logger } from '@mergington/utils';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

import type { ActivityDirectory } from '../activities/directory';

// =============================================================================
// Types
// =============================================================================

type CheckStatus = 'up' | 'down' | 'degraded';

export interface DependencyCheck {
  status: CheckStatus;
  message?: string;
  lastChecked: string;
}

interface ReadinessStatus {
  status: 'healthy' | 'unhealthy' | 'degraded';
  timestamp: string;
  version: string;
  environment: string;
  uptime: number;
  uptimeFormatted: string;
  activities: number;
  checks: {
    directory: DependencyCheck;
    memory: DependencyCheck;
  };
}

// =============================================================================
// Helper Functions
// =============================================================================

export function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  parts.push(`${secs}s`);

  return parts.join(' ');
}

// =============================================================================
// Check Functions
// =============================================================================

export function checkDirectory(directory: ActivityDirectory): DependencyCheck {
  if (directory.size === 0) {
    return {
      status: 'down',
      message: 'Activity directory is empty',
      lastChecked: new Date().toISOString(),
    };
  }

  return {
    status: 'up',
    message: `${directory.size} activities loaded`,
    lastChecked: new Date().toISOString(),
  };
}

export function checkMemory(heapUsed: number, heapLimit: number): DependencyCheck {
  const heapUsedPercent = (heapUsed / heapLimit) * 100;

  // Degraded if heap usage > 80% of the limit, down if > 95%
  let status: CheckStatus = 'up';
  let message: string | undefined;

  if (heapUsedPercent > 95) {
    status = 'down';
    message = `Critical memory usage: ${heapUsedPercent.toFixed(1)}%`;
  } else if (heapUsedPercent > 80) {
    status = 'degraded';
    message = `High memory usage: ${heapUsedPercent.toFixed(1)}%`;
  }

  return {
    status,
    ...(message && { message }),
    lastChecked: new Date().toISOString(),
  };
}

export function determineOverallStatus(
  checks: Record<string, DependencyCheck>
): 'healthy' | 'unhealthy' | 'degraded' {
  const statuses = Object.values(checks).map((c) => c.status);

  if (statuses.includes('down')) return 'unhealthy';
  if (statuses.includes('degraded')) return 'degraded';

  return 'healthy';
}

// =============================================================================
// Schemas
// =============================================================================

const dependencyCheckSchema = {
  type: 'object',
  properties: {
    status: { type: 'string' },
    message: { type: 'string' },
    lastChecked: { type: 'string' },
  },
} as const;

const readinessSchema = {
  type: 'object',
  properties: {
    status: { type: 'string' },
    timestamp: { type: 'string' },
    version: { type: 'string' },
    environment: { type: 'string' },
    uptime: { type: 'number' },
    uptimeFormatted: { type: 'string' },
    activities: { type: 'integer' },
    checks: {
      type: 'object',
      properties: {
        directory: dependencyCheckSchema,
        memory: dependencyCheckSchema,
      },
    },
  },
} as const;

// =============================================================================
// Routes
// =============================================================================

export interface HealthRoutesOptions {
  /** Config the server was built with; readiness reports its version and environment */
  config: Config;
}

export async function healthRoutes(app: FastifyInstance, opts: HealthRoutesOptions): Promise<void> {
  const { config } = opts;

  // ===========================================================================
  // GET /health - Basic liveness check
  // ===========================================================================
  app.get(
    '/health',
    {
      schema: {
        description: 'Basic health check - returns 200 if server is running',
        tags: ['Health'],
        response: {
          200: {
            type: 'object',
            properties: {
              status: { type: 'string' },
              timestamp: { type: 'string' },
            },
          },
        },
      },
    },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.send({
        status: 'ok',
        timestamp: new Date().toISOString(),
      });
    }
  );

  // ===========================================================================
  // GET /health/live - Liveness probe (Kubernetes)
  // ===========================================================================
  app.get(
    '/health/live',
    {
      schema: {
        description: 'Liveness probe - returns 200 if process is alive',
        tags: ['Health'],
        response: {
          200: {
            type: 'object',
            properties: {
              status: { type: 'string' },
              timestamp: { type: 'string' },
              uptime: { type: 'number' },
            },
          },
        },
      },
    },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.send({
        status: 'alive',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
      });
    }
  );

  // ===========================================================================
  // GET /health/ready - Readiness probe (Kubernetes)
  // ===========================================================================
  app.get(
    '/health/ready',
    {
      schema: {
        description: 'Readiness probe - checks the activity directory and memory',
        tags: ['Health'],
        response: {
          200: readinessSchema,
          503: readinessSchema,
        },
      },
    },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const heap = getHeapStatistics();

      const checks = {
        directory: checkDirectory(app.activities),
        memory: checkMemory(heap.used_heap_size, heap.heap_size_limit),
      };
      const overallStatus = determineOverallStatus(checks);
      const uptime = process.uptime();

      const status: ReadinessStatus = {
        status: overallStatus,
        timestamp: new Date().toISOString(),
        version: config.appVersion,
        environment: config.nodeEnv,
        uptime,
        uptimeFormatted: formatUptime(uptime),
        activities: app.activities.size,
        checks,
      };

      // Return 503 if unhealthy (Kubernetes will not route traffic)
      const statusCode = overallStatus === 'unhealthy' ? 503 : 200;

      if (overallStatus !== 'healthy') {
        logger.warn({ status: overallStatus, checks }, 'Health check degraded or unhealthy');
      }

      return reply.status(statusCode).send(status);
    }
  );
}
