import { Static, TSchema, Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { CacheManager } from '../cache/cacheManager';
import { CacheKeys, CachePatterns } from '../cache/cacheKeys';
import { CacheTtlConfig } from '../config/config';
import { Logger } from '../utils/logger';
import {
    ArticleDetail,
    ArticleDetailSchema,
    Chapter,
    ChapterList,
    ChapterListSchema,
    ChapterSchema,
    ConstitutionDocument,
    ConstitutionDocumentSchema,
    DocumentOverview,
    DocumentOverviewSchema,
    PopularItem,
    PopularListSchema,
    RelatedArticle,
    RelatedArticleSchema,
    SearchResponse,
    SearchResponseSchema,
    Timeframe,
} from '../types';
import { Result, invalidQuery, notFound, ok } from '../types/errors';
import { TaskScheduler } from './backgroundTasks';
import { DocumentStore } from './documentStore';
import { articlesOf, findArticle, findChapter } from './documentTree';
import { paginate } from './pagination';

const PREAMBLE_PREVIEW_LENGTH = 200;
const RELATED_ARTICLE_LIMIT = 5;

const RelatedArticleListSchema = Type.Array(RelatedArticleSchema);

export interface ContentCacheOptions {
    ttl: CacheTtlConfig;
    logger: Logger;
}

export interface ContentCacheHealth {
    cache: boolean;
    documentLoadedAt: string | null;
}

function summarizeChapter(chapter: Chapter) {
    return {
        chapter_number: chapter.chapter_number,
        chapter_title: chapter.chapter_title,
        article_count: articlesOf(chapter).length,
    };
}

/**
 * Resource-addressed cache in front of the {@link DocumentStore}.
 *
 * Each read checks its key first and falls back to the document on a miss.
 * When a {@link TaskScheduler} is passed the write-back is deferred until
 * after the response; otherwise it happens before the read returns. Cached
 * values that no longer match their schema are treated as misses.
 */
export class ContentCache {
    private readonly ttl: CacheTtlConfig;
    private readonly logger: Logger;

    constructor(
        private readonly cache: CacheManager,
        private readonly store: DocumentStore,
        options: ContentCacheOptions,
    ) {
        this.ttl = options.ttl;
        this.logger = options.logger;
    }

    private async populate(key: string, value: unknown, ttlSeconds: number, tasks?: TaskScheduler): Promise<void> {
        if (tasks) {
            tasks.defer(`cache:${key}`, () => this.cache.set(key, value, ttlSeconds));
            return;
        }
        await this.cache.set(key, value, ttlSeconds);
    }

    private async lookup<S extends TSchema>(key: string, schema: S): Promise<Static<S> | undefined> {
        const hit = await this.cache.get(key);
        if (hit === undefined) {
            this.logger.debug({ key }, 'Cache miss');
            return undefined;
        }
        if (!Value.Check(schema, hit)) {
            this.logger.warn({ key }, 'Cached entry does not match its schema; ignoring it');
            return undefined;
        }
        this.logger.debug({ key }, 'Cache hit');
        return hit;
    }

    private async cached<S extends TSchema>(
        key: string,
        schema: S,
        ttlSeconds: number,
        tasks: TaskScheduler | undefined,
        compute: () => Promise<Result<Static<S>>>,
    ): Promise<Result<Static<S>>> {
        const hit = await this.lookup(key, schema);
        if (hit !== undefined) return ok(hit);

        const computed = await compute();
        if (computed.ok) {
            await this.populate(key, computed.value, ttlSeconds, tasks);
        }
        return computed;
    }

    async getDocument(tasks?: TaskScheduler): Promise<Result<ConstitutionDocument>> {
        return this.cached(CacheKeys.document(), ConstitutionDocumentSchema, this.ttl.overview, tasks,
            () => this.store.load());
    }

    async getOverview(tasks?: TaskScheduler): Promise<Result<DocumentOverview>> {
        return this.cached(CacheKeys.overview(), DocumentOverviewSchema, this.ttl.overview, tasks, async () => {
            const document = await this.getDocument(tasks);
            if (!document.ok) return document;
            const { title, preamble, chapters } = document.value;
            return ok({
                title,
                preamble_preview: preamble.length > PREAMBLE_PREVIEW_LENGTH
                    ? `${preamble.slice(0, PREAMBLE_PREVIEW_LENGTH)}...`
                    : preamble,
                total_chapters: chapters.length,
                chapter_summary: chapters.map(summarizeChapter),
                last_updated: this.store.lastLoadedAt?.toISOString() ?? null,
            });
        });
    }

    async listChapters(page: { limit: number; offset: number }, tasks?: TaskScheduler): Promise<Result<ChapterList>> {
        const { limit, offset } = page;
        if (!Number.isInteger(limit) || limit < 1) return invalidQuery('limit must be a positive integer');
        if (!Number.isInteger(offset) || offset < 0) return invalidQuery('offset must be a non-negative integer');

        return this.cached(CacheKeys.chapterList(limit, offset), ChapterListSchema, this.ttl.chapterList, tasks, async () => {
            const document = await this.getDocument(tasks);
            if (!document.ok) return document;
            const { items, pagination } = paginate(document.value.chapters, limit, offset);
            return ok({ chapters: items.map(summarizeChapter), pagination });
        });
    }

    async getChapter(chapterNumber: number, tasks?: TaskScheduler): Promise<Result<Chapter>> {
        return this.cached(CacheKeys.chapter(chapterNumber), ChapterSchema, this.ttl.content, tasks, async () => {
            const document = await this.getDocument(tasks);
            if (!document.ok) return document;
            const chapter = findChapter(document.value, chapterNumber);
            return chapter ? ok(chapter) : notFound(`Chapter ${chapterNumber} not found`);
        });
    }

    async getArticle(chapterNumber: number, articleNumber: number, tasks?: TaskScheduler): Promise<Result<ArticleDetail>> {
        const key = CacheKeys.article(chapterNumber, articleNumber);
        return this.cached(key, ArticleDetailSchema, this.ttl.content, tasks, async () => {
            const chapter = await this.getChapter(chapterNumber, tasks);
            if (!chapter.ok) return chapter;
            const location = findArticle(chapter.value, articleNumber);
            if (!location) {
                return notFound(`Article ${articleNumber} not found in chapter ${chapterNumber}`);
            }
            const detail: ArticleDetail = {
                ...location.article,
                chapter_number: chapter.value.chapter_number,
                chapter_title: chapter.value.chapter_title,
            };
            if (location.part) {
                detail.part_number = location.part.part_number;
                detail.part_title = location.part.part_title;
            }
            return ok(detail);
        });
    }

    /** Other articles of the same chapter, in document order. */
    async getRelatedArticles(
        chapterNumber: number,
        articleNumber: number,
        tasks?: TaskScheduler,
    ): Promise<Result<RelatedArticle[]>> {
        const key = CacheKeys.related(chapterNumber, articleNumber);
        return this.cached(key, RelatedArticleListSchema, this.ttl.related, tasks, async () => {
            const chapter = await this.getChapter(chapterNumber, tasks);
            if (!chapter.ok) return chapter;
            if (!findArticle(chapter.value, articleNumber)) {
                return notFound(`Article ${articleNumber} not found in chapter ${chapterNumber}`);
            }
            const related = articlesOf(chapter.value)
                .filter(({ article }) => article.article_number !== articleNumber)
                .slice(0, RELATED_ARTICLE_LIMIT)
                .map(({ article }): RelatedArticle => ({
                    chapter_number: chapter.value.chapter_number,
                    chapter_title: chapter.value.chapter_title,
                    article_number: article.article_number,
                    article_title: article.article_title,
                    relevance: 'same_chapter',
                }));
            return ok(related);
        });
    }

    async getSearch(queryHash: string): Promise<SearchResponse | undefined> {
        return this.lookup(CacheKeys.search(queryHash), SearchResponseSchema);
    }

    async setSearch(queryHash: string, response: SearchResponse, tasks?: TaskScheduler): Promise<void> {
        await this.populate(CacheKeys.search(queryHash), response, this.ttl.search, tasks);
    }

    async getPopular(timeframe: Timeframe, contentType: string | undefined, limit: number): Promise<PopularItem[] | undefined> {
        return this.lookup(CacheKeys.popular(timeframe, contentType, limit), PopularListSchema);
    }

    async setPopular(
        timeframe: Timeframe,
        contentType: string | undefined,
        limit: number,
        items: PopularItem[],
        tasks?: TaskScheduler,
    ): Promise<void> {
        await this.populate(CacheKeys.popular(timeframe, contentType, limit), items, this.ttl.popular, tasks);
    }

    /**
     * Drops the cached document and re-reads the source. Chapter, article and
     * derived keys are left to expire on their own TTL; use
     * {@link invalidateAll} when they must go too.
     */
    async reload(): Promise<Result<ConstitutionDocument>> {
        await this.cache.delete(CacheKeys.document());
        const document = await this.store.load({ force: true });
        if (!document.ok) return document;
        await this.cache.set(CacheKeys.document(), document.value, this.ttl.overview);
        this.logger.info('Document reloaded and cache refreshed');
        return document;
    }

    async invalidateSearch(): Promise<number> {
        return this.cache.clearPattern(CachePatterns.search);
    }

    async invalidateUser(userId: string): Promise<number> {
        return this.cache.clearPattern(CachePatterns.user(userId));
    }

    async invalidateAll(): Promise<number> {
        return this.cache.clearPattern(CachePatterns.all);
    }

    async health(): Promise<ContentCacheHealth> {
        return {
            cache: await this.cache.healthCheck(),
            documentLoadedAt: this.store.lastLoadedAt?.toISOString() ?? null,
        };
    }
}
