/**
 * Activities API
 *
 * - GET    /activities                                   list every activity
 * - POST   /activities/:activityName/signup?email=...     register a participant
 * - DELETE /activities/:activityName/participants/:email  remove a participant
 *
 * Emails are matched exactly as received: no trimming, no case folding.
 */

import {
  ParticipantParamsSchema,
  SignupQuerySchema,
  ActivityParamsSchema,
  type ActivityMessageResponse,
} from '@mergington/types';
import { isAppError } from '@mergington/utils';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

// =============================================================================
// Schemas (OpenAPI)
// =============================================================================

const activityJsonSchema = {
  type: 'object',
  properties: {
    description: { type: 'string' },
    schedule: { type: 'string' },
    max_participants: { type: 'integer' },
    participants: { type: 'array', items: { type: 'string' } },
  },
} as const;

const messageJsonSchema = {
  type: 'object',
  properties: {
    message: { type: 'string' },
  },
} as const;

// =============================================================================
// Helpers
// =============================================================================

function recordRejection(app: FastifyInstance, operation: 'signup' | 'unregister', error: unknown): void {
  if (isAppError(error)) {
    app.metrics?.rejectionsTotal.labels(operation, error.code).inc();
  }
}

// =============================================================================
// Routes
// =============================================================================

export async function activityRoutes(app: FastifyInstance): Promise<void> {
  // List activities
  app.get(
    '/',
    {
      schema: {
        description: 'List every activity with its schedule, capacity and participants',
        tags: ['Activities'],
        response: {
          200: {
            type: 'object',
            additionalProperties: activityJsonSchema,
          },
        },
      },
    },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.send(app.activities.list());
    }
  );

  // Sign up for an activity
  app.post(
    '/:activityName/signup',
    {
      schema: {
        description: 'Register a participant email for an activity',
        tags: ['Activities'],
        response: {
          200: messageJsonSchema,
        },
      },
    },
    async (
      request: FastifyRequest<{
        Params: { activityName: string };
        Querystring: { email?: string };
      }>,
      reply
    ) => {
      const { activityName } = ActivityParamsSchema.parse(request.params);
      const { email } = SignupQuerySchema.parse(request.query);

      let participantCount: number;
      try {
        participantCount = app.activities.signup(activityName, email).participants.length;
      } catch (error) {
        recordRejection(app, 'signup', error);
        throw error;
      }

      app.metrics?.signupsTotal.labels(activityName).inc();
      request.log.info({ activity: activityName, participants: participantCount }, 'participant_signed_up');

      const response: ActivityMessageResponse = { message: `Signed up ${email} for ${activityName}` };
      return reply.send(response);
    }
  );

  // Remove a participant from an activity
  app.delete(
    '/:activityName/participants/:email',
    {
      schema: {
        description: 'Unregister a participant email from an activity',
        tags: ['Activities'],
        response: {
          200: messageJsonSchema,
        },
      },
    },
    async (
      request: FastifyRequest<{
        Params: { activityName: string; email: string };
      }>,
      reply
    ) => {
      const { activityName, email } = ParticipantParamsSchema.parse(request.params);

      let participantCount: number;
      try {
        participantCount = app.activities.unregister(activityName, email).participants.length;
      } catch (error) {
        recordRejection(app, 'unregister', error);
        throw error;
      }

      app.metrics?.unregistrationsTotal.labels(activityName).inc();
      request.log.info({ activity: activityName, participants: participantCount }, 'participant_unregistered');

      const response: ActivityMessageResponse = { message: `Unregistered ${email} from ${activityName}` };
      return reply.send(response);
    }
  );
}
