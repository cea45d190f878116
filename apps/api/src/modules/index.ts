import type { Config } from '@mergington/config';
import type { FastifyInstance } from 'fastify';

import { metricsRoutes } from '../plugins/metrics';

import { activityRoutes } from './activities/routes';
import { frontendRoutes } from './frontend/routes';
import { healthRoutes } from './health/routes';

export async function registerModules(app: FastifyInstance, config: Config): Promise<void> {
  // Root redirect to the static front end
  await app.register(frontendRoutes, { indexPath: config.api.staticIndexPath });

  // Health check
  await app.register(healthRoutes, { config });

  // Metrics (Prometheus format)
  if (config.metrics.enabled) {
    await app.register(metricsRoutes, { token: config.metrics.token });
  }

  // Activities
  await app.register(activityRoutes, { prefix: '/activities' });
}
