/**
 * Activity Directory Plugin
 *
 * Decorates FastifyInstance with the activity directory the route handlers
 * operate on. A directory passed in options is used as-is, otherwise a fresh
 * one is built from the seed catalog.
 */

import { logger } from '@mergington/utils';
import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

import { ActivityDirectory } from '../modules/activities/directory';

export interface ActivityDirectoryPluginOptions {
  directory?: ActivityDirectory;
}

const activityDirectoryPluginCallback: FastifyPluginCallback<ActivityDirectoryPluginOptions> = (
  fastify,
  opts,
  done
) => {
  const directory = opts.directory ?? ActivityDirectory.fromSeed();

  fastify.decorate('activities', directory);

  logger.info({ activities: directory.size }, 'Activity directory ready');
  done();
};

export const activityDirectoryPlugin = fp(activityDirectoryPluginCallback, {
  name: 'activity-directory',
});

// Type augmentation
declare module 'fastify' {
  interface FastifyInstance {
    activities: ActivityDirectory;
  }
}
