/**
 * HTTP Server Configuration
 * Fastify server with security, logging, metrics and error handling
 */

import { randomUUID } from 'crypto';

import { getConfig, type Config } from '@mergington/config';
import { REDACT_PATHS } from '@mergington/utils';
import Fastify, { type FastifyInstance } from 'fastify';

import type { ActivityDirectory } from './modules/activities/directory';
import { registerModules } from './modules';
import { registerPlugins } from './plugins';

export interface CreateServerOptions {
  /** Defaults to the environment config */
  config?: Config;
  /** Defaults to a directory built from the seed catalog */
  directory?: ActivityDirectory;
  /** Set to false to disable Fastify's request logger */
  logger?: boolean;
}

export async function createServer(options: CreateServerOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? getConfig();

  const app = Fastify({
    logger:
      options.logger === false
        ? false
        : {
            level: config.logLevel,
            redact: REDACT_PATHS,
            transport:
              config.nodeEnv === 'development'
                ? {
                    target: 'pino-pretty',
                    options: {
                      colorize: true,
                      translateTime: 'SYS:standard',
                      ignore: 'pid,hostname',
                    },
                  }
                : undefined,
          },
    trustProxy: config.api.trustProxy,
    maxParamLength: config.api.maxParamLength,
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
    genReqId: () => randomUUID(),
  });

  await registerPlugins(app, { config, directory: options.directory });
  await registerModules(app, config);

  return app;
}
