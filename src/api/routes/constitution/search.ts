import { FastifyInstance } from 'fastify';
import { Static, Type } from '@sinclair/typebox';
import { SearchResponseSchema } from '../../../types';
import { DEFAULT_SEARCH_LIMIT } from '../../../services/searchEngine';
import { tasksFor } from '../../requestTasks';
import { errorResponses, sendContentError } from './errors';
import { RouteOptions } from './options';
import { viewerOf } from './viewer';

const SearchQuerySchema = Type.Object({
  query: Type.String({ description: 'Text to look for. Matching is case-insensitive.' }),
  chapter: Type.Optional(Type.String({ description: 'Restrict to one chapter number.' })),
  article: Type.Optional(Type.String({ description: 'Restrict to one article number.' })),
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 100, default: DEFAULT_SEARCH_LIMIT })),
  offset: Type.Optional(Type.Integer({ minimum: 0, default: 0 })),
  highlight: Type.Optional(Type.Boolean({ default: true, description: 'Wrap matches in **.' })),
  no_cache: Type.Optional(Type.Boolean({ default: false, description: 'Skip the result cache.' })),
});

type SearchQueryType = Static<typeof SearchQuerySchema>;

export default async function searchEndpoint(fastify: FastifyInstance, opts: RouteOptions) {
  const { search } = opts.ctx;

  fastify.get<{ Querystring: SearchQueryType }>(
    '/search',
    {
      schema: {
        description: 'Substring search over the preamble, titles, clauses and sub-clauses.',
        tags: ['Search'],
        summary: 'Search the constitution text.',
        querystring: SearchQuerySchema,
        response: { 200: SearchResponseSchema, ...errorResponses },
      },
    },
    async (request, reply) => {
      const { query, chapter, article, limit, offset, highlight, no_cache } = request.query;
      request.log.info({ query, chapter, article, limit, offset }, 'Received search request');

      const result = await search.search({
        query,
        filters: { chapter, article },
        limit,
        offset,
        highlight,
        bypassCache: no_cache,
        viewer: viewerOf(request),
      }, tasksFor(request));

      if (!result.ok) return sendContentError(reply, result.error);
      return reply.status(200).send(result.value);
    },
  );
}
