import { FastifyInstance } from 'fastify';
import { Static, Type } from '@sinclair/typebox';
import { errorResponses, sendContentError } from './errors';
import { RouteOptions } from './options';

const ClearedSchema = Type.Object({
  cleared: Type.Integer(),
});

const UserParamsSchema = Type.Object({
  userId: Type.String({ minLength: 1 }),
});
type UserParams = Static<typeof UserParamsSchema>;

export default async function adminEndpoints(fastify: FastifyInstance, opts: RouteOptions) {
  const { content } = opts.ctx;

  fastify.post(
    '/reload',
    {
      schema: {
        description: 'Re-read the document source. Cached chapters and articles keep their TTL.',
        tags: ['Admin'],
        response: {
          200: Type.Object({ status: Type.String(), chapters: Type.Integer(), loaded_at: Type.Union([Type.String(), Type.Null()]) }),
          ...errorResponses,
        },
      },
    },
    async (request, reply) => {
      const document = await content.reload();
      if (!document.ok) return sendContentError(reply, document.error);
      request.log.info('Document reloaded on request');
      const { documentLoadedAt } = await content.health();
      return reply.status(200).send({
        status: 'reloaded',
        chapters: document.value.chapters.length,
        loaded_at: documentLoadedAt,
      });
    },
  );

  fastify.delete(
    '/cache/search',
    { schema: { description: 'Drop every cached search result.', tags: ['Admin'], response: { 200: ClearedSchema } } },
    async (_request, reply) => reply.status(200).send({ cleared: await content.invalidateSearch() }),
  );

  fastify.delete<{ Params: UserParams }>(
    '/cache/users/:userId',
    {
      schema: {
        description: 'Drop everything cached for one user.',
        tags: ['Admin'],
        params: UserParamsSchema,
        response: { 200: ClearedSchema },
      },
    },
    async (request, reply) => reply.status(200).send({ cleared: await content.invalidateUser(request.params.userId) }),
  );

  fastify.delete(
    '/cache',
    { schema: { description: 'Drop every cache entry in the namespace.', tags: ['Admin'], response: { 200: ClearedSchema } } },
    async (_request, reply) => reply.status(200).send({ cleared: await content.invalidateAll() }),
  );

  fastify.get(
    '/cache/health',
    {
      schema: {
        description: 'Cache round-trip probe.',
        tags: ['Admin'],
        response: {
          200: Type.Object({
            status: Type.String(),
            cache: Type.Boolean(),
            document_loaded_at: Type.Union([Type.String(), Type.Null()]),
          }),
        },
      },
    },
    async (_request, reply) => {
      const health = await content.health();
      return reply.status(200).send({
        status: health.cache ? 'ok' : 'degraded',
        cache: health.cache,
        document_loaded_at: health.documentLoadedAt,
      });
    },
  );
}
