import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

export interface FrontendRoutesOptions {
  /** Path of the front-end entry page the root URL points at */
  indexPath: string;
}

export async function frontendRoutes(app: FastifyInstance, opts: FrontendRoutesOptions): Promise<void> {
  // GET / - send browsers to the signup page
  app.get(
    '/',
    {
      schema: {
        description: 'Redirect to the activities front end',
        tags: ['Frontend'],
      },
    },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.code(307).redirect(opts.indexPath);
    }
  );
}
