import { FastifyInstance } from 'fastify';
import { Static, Type } from '@sinclair/typebox';
import { PopularListSchema, SearchTermListSchema, ViewHistoryEntrySchema, ViewTrendsSchema } from '../../../types';
import { thresholdForWordCount } from '../../../services/completionEstimator';
import { toHistoryEntry } from '../../../services/viewTracker';
import { tasksFor } from '../../requestTasks';
import { errorResponses } from './errors';
import { RouteOptions } from './options';

const TimeframeSchema = Type.Union([
  Type.Literal('daily'),
  Type.Literal('weekly'),
  Type.Literal('monthly'),
], { default: 'weekly' });

const PopularQuerySchema = Type.Object({
  timeframe: Type.Optional(TimeframeSchema),
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 50, default: 10 })),
  content_type: Type.Optional(Type.String({ description: 'chapter, article, overview or search' })),
});
type PopularQuery = Static<typeof PopularQuerySchema>;

const ViewParamsSchema = Type.Object({
  contentType: Type.String(),
  reference: Type.String(),
});
type ViewParams = Static<typeof ViewParamsSchema>;

const ViewCountSchema = Type.Object({
  content_type: Type.String(),
  reference: Type.String(),
  view_count: Type.Integer(),
});

const TrendsQuerySchema = Type.Object({
  days: Type.Optional(Type.Integer({ minimum: 1, maximum: 90, default: 7 })),
  content_type: Type.Optional(Type.String()),
  reference: Type.Optional(Type.String({ description: 'Restrict to one item; combine with content_type.' })),
});
type TrendsQuery = Static<typeof TrendsQuerySchema>;

const SearchTermsQuerySchema = Type.Object({
  timeframe: Type.Optional(TimeframeSchema),
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 50, default: 10 })),
});
type SearchTermsQuery = Static<typeof SearchTermsQuerySchema>;

const HistoryParamsSchema = Type.Object({
  userId: Type.String({ minLength: 1 }),
});
type HistoryParams = Static<typeof HistoryParamsSchema>;

const HistoryQuerySchema = Type.Object({
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 100, default: 20 })),
});
type HistoryQuery = Static<typeof HistoryQuerySchema>;

const ThresholdQuerySchema = Type.Object({
  item_type: Type.Union([Type.Literal('chapter'), Type.Literal('article')]),
  reference: Type.String({ description: 'Chapter number ("2") or chapter.article ("2.9").' }),
  minutes_read: Type.Optional(Type.Number({ minimum: 0, description: 'When given, the reply says whether this counts as read.' })),
});
type ThresholdQuery = Static<typeof ThresholdQuerySchema>;

const ThresholdSchema = Type.Object({
  item_type: Type.String(),
  reference: Type.String(),
  word_count: Type.Union([Type.Integer(), Type.Null()]),
  threshold_minutes: Type.Number(),
  is_complete: Type.Optional(Type.Boolean()),
});

export default async function analyticsEndpoints(fastify: FastifyInstance, opts: RouteOptions) {
  const { views, completion } = opts.ctx;

  fastify.get<{ Querystring: PopularQuery }>(
    '/popular',
    {
      schema: {
        description: 'Most viewed content in a time window. Editorial picks are returned while there is no data.',
        tags: ['Analytics'],
        querystring: PopularQuerySchema,
        response: { 200: PopularListSchema, ...errorResponses },
      },
    },
    async (request, reply) => {
      const { timeframe = 'weekly', limit = 10, content_type } = request.query;
      const items = await views.popular({ timeframe, limit, contentType: content_type }, tasksFor(request));
      return reply.status(200).send(items);
    },
  );

  fastify.get<{ Querystring: TrendsQuery }>(
    '/trends',
    {
      schema: {
        description: 'Views per day over the last N days, oldest first.',
        tags: ['Analytics'],
        querystring: TrendsQuerySchema,
        response: { 200: ViewTrendsSchema, ...errorResponses },
      },
    },
    async (request, reply) => {
      const { days = 7, content_type, reference } = request.query;
      const trends = await views.viewTrends({ days, contentType: content_type, contentReference: reference });
      return reply.status(200).send(trends);
    },
  );

  fastify.get<{ Querystring: SearchTermsQuery }>(
    '/search-terms',
    {
      schema: {
        description: 'Most searched queries in a time window.',
        tags: ['Analytics'],
        querystring: SearchTermsQuerySchema,
        response: { 200: SearchTermListSchema, ...errorResponses },
      },
    },
    async (request, reply) => {
      const { timeframe = 'weekly', limit = 10 } = request.query;
      return reply.status(200).send(await views.popularSearchTerms({ timeframe, limit }));
    },
  );

  fastify.get<{ Params: HistoryParams; Querystring: HistoryQuery }>(
    '/users/:userId/history',
    {
      schema: {
        description: 'What one reader has viewed, most recent first.',
        tags: ['Analytics'],
        params: HistoryParamsSchema,
        querystring: HistoryQuerySchema,
        response: { 200: Type.Array(ViewHistoryEntrySchema), ...errorResponses },
      },
    },
    async (request, reply) => {
      const { limit = 20 } = request.query;
      const rows = await views.userHistory(request.params.userId, limit);
      return reply.status(200).send(rows.map(toHistoryEntry));
    },
  );

  fastify.get<{ Params: ViewParams }>(
    '/views/:contentType/:reference',
    {
      schema: {
        description: 'Total recorded views of one item.',
        tags: ['Analytics'],
        params: ViewParamsSchema,
        response: { 200: ViewCountSchema },
      },
    },
    async (request, reply) => {
      const { contentType, reference } = request.params;
      const viewCount = await views.viewCount(contentType, reference);
      return reply.status(200).send({ content_type: contentType, reference, view_count: viewCount });
    },
  );

  fastify.get<{ Querystring: ThresholdQuery }>(
    '/reading-threshold',
    {
      schema: {
        description: 'Minutes a reader must spend on a chapter or article before it counts as read.',
        tags: ['Analytics'],
        querystring: ThresholdQuerySchema,
        response: { 200: ThresholdSchema, ...errorResponses },
      },
    },
    async (request, reply) => {
      const { item_type, reference, minutes_read } = request.query;
      const words = await completion.wordCount(item_type, reference);
      const body = {
        item_type,
        reference,
        word_count: words ?? null,
        threshold_minutes: thresholdForWordCount(words ?? 0),
      };
      if (minutes_read === undefined) return reply.status(200).send(body);
      return reply.status(200).send({
        ...body,
        is_complete: await completion.isComplete(item_type, reference, minutes_read),
      });
    },
  );
}
