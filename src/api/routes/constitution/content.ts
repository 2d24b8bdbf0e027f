import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { Static, Type } from '@sinclair/typebox';
import { ChapterListSchema, DocumentOverviewSchema, RelatedArticleSchema } from '../../../types';
import { articleReference } from '../../../services/references';
import { tasksFor } from '../../requestTasks';
import { errorResponses, sendContentError } from './errors';
import { viewerOf } from './viewer';
import { RouteOptions } from './options';

const ChapterListQuerySchema = Type.Object({
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 100, default: 20, description: 'Chapters per page.' })),
  offset: Type.Optional(Type.Integer({ minimum: 0, default: 0, description: 'Chapters to skip.' })),
});
type ChapterListQuery = Static<typeof ChapterListQuerySchema>;

const ChapterParamsSchema = Type.Object({
  chapterNumber: Type.Integer({ minimum: 1 }),
});
type ChapterParams = Static<typeof ChapterParamsSchema>;

const ArticleParamsSchema = Type.Object({
  chapterNumber: Type.Integer({ minimum: 1 }),
  articleNumber: Type.Integer({ minimum: 1 }),
});
type ArticleParams = Static<typeof ArticleParamsSchema>;

export default async function contentEndpoints(fastify: FastifyInstance, opts: RouteOptions) {
  const { content, views } = opts.ctx;

  fastify.get(
    '/',
    {
      schema: {
        description: 'Title, preamble preview and a summary of every chapter.',
        tags: ['Content'],
        response: { 200: DocumentOverviewSchema, ...errorResponses },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const tasks = tasksFor(request);
      const overview = await content.getOverview(tasks);
      if (!overview.ok) return sendContentError(reply, overview.error);
      await views.trackLater({ contentType: 'overview', contentReference: 'overview', ...viewerOf(request) }, tasks);
      return reply.status(200).send(overview.value);
    },
  );

  // The full tree is recursive, so it is served without a response schema.
  fastify.get(
    '/document',
    { schema: { description: 'The whole document.', tags: ['Content'] } },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const document = await content.getDocument(tasksFor(request));
      if (!document.ok) return sendContentError(reply, document.error);
      return reply.status(200).send(document.value);
    },
  );

  fastify.get<{ Querystring: ChapterListQuery }>(
    '/chapters',
    {
      schema: {
        description: 'One page of chapter summaries.',
        tags: ['Content'],
        querystring: ChapterListQuerySchema,
        response: { 200: ChapterListSchema, ...errorResponses },
      },
    },
    async (request, reply) => {
      const { limit = 20, offset = 0 } = request.query;
      const page = await content.listChapters({ limit, offset }, tasksFor(request));
      if (!page.ok) return sendContentError(reply, page.error);
      return reply.status(200).send(page.value);
    },
  );

  fastify.get<{ Params: ChapterParams }>(
    '/chapters/:chapterNumber',
    {
      schema: {
        description: 'A chapter with all of its articles and parts.',
        tags: ['Content'],
        params: ChapterParamsSchema,
      },
    },
    async (request, reply) => {
      const { chapterNumber } = request.params;
      const tasks = tasksFor(request);
      const chapter = await content.getChapter(chapterNumber, tasks);
      if (!chapter.ok) return sendContentError(reply, chapter.error);
      await views.trackLater({ contentType: 'chapter', contentReference: String(chapterNumber), ...viewerOf(request) }, tasks);
      return reply.status(200).send(chapter.value);
    },
  );

  fastify.get<{ Params: ArticleParams }>(
    '/chapters/:chapterNumber/articles/:articleNumber',
    {
      schema: {
        description: 'A single article, with the chapter and part it belongs to.',
        tags: ['Content'],
        params: ArticleParamsSchema,
      },
    },
    async (request, reply) => {
      const { chapterNumber, articleNumber } = request.params;
      const tasks = tasksFor(request);
      const article = await content.getArticle(chapterNumber, articleNumber, tasks);
      if (!article.ok) return sendContentError(reply, article.error);
      await views.trackLater({
        contentType: 'article',
        contentReference: articleReference(chapterNumber, articleNumber),
        ...viewerOf(request),
      }, tasks);
      return reply.status(200).send(article.value);
    },
  );

  fastify.get<{ Params: ArticleParams }>(
    '/chapters/:chapterNumber/articles/:articleNumber/related',
    {
      schema: {
        description: 'Other articles from the same chapter.',
        tags: ['Content'],
        params: ArticleParamsSchema,
        response: { 200: Type.Array(RelatedArticleSchema), ...errorResponses },
      },
    },
    async (request, reply) => {
      const { chapterNumber, articleNumber } = request.params;
      const related = await content.getRelatedArticles(chapterNumber, articleNumber, tasksFor(request));
      if (!related.ok) return sendContentError(reply, related.error);
      return reply.status(200).send(related.value);
    },
  );
}
