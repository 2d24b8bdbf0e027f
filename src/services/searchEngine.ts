import { createHash } from 'crypto';
import { Logger } from '../utils/logger';
import { ConstitutionDocument, SearchFilters, SearchResponse, SearchResult } from '../types';
import { Result, invalidQuery, ok } from '../types/errors';
import { TaskScheduler } from './backgroundTasks';
import { ContentCache } from './contentCache';
import { ArticleLocation, walkDocument } from './documentTree';
import { extractContext, highlight, matchesQuery } from './highlighter';
import { emptyPagination, paginate } from './pagination';
import { ViewTracker } from './viewTracker';

export const DEFAULT_SEARCH_LIMIT = 10;
const TRACKED_QUERY_LENGTH = 50;

/** Filter values as they arrive from a caller; strings come from query strings. */
export interface RawSearchFilters {
    chapter?: number | string;
    article?: number | string;
}

export interface Viewer {
    userId?: string;
    deviceType?: string;
    ipAddress?: string;
}

export interface SearchRequest {
    query: string;
    filters?: RawSearchFilters;
    limit?: number;
    offset?: number;
    highlight?: boolean;
    /** Neither reads nor writes the result cache. */
    bypassCache?: boolean;
    viewer?: Viewer;
}

function parseFilterValue(name: string, raw: number | string | undefined): Result<number | undefined> {
    if (raw === undefined || (typeof raw === 'string' && raw.trim() === '')) return ok(undefined);
    const value = typeof raw === 'number' ? raw : Number(raw.trim());
    if (!Number.isInteger(value) || value <= 0) {
        return invalidQuery(`${name} filter must be a positive integer, got "${raw}"`);
    }
    return ok(value);
}

export function parseFilters(raw: RawSearchFilters | undefined): Result<SearchFilters | null> {
    const chapter = parseFilterValue('chapter', raw?.chapter);
    if (!chapter.ok) return chapter;
    const article = parseFilterValue('article', raw?.article);
    if (!article.ok) return article;

    if (chapter.value === undefined && article.value === undefined) return ok(null);
    const filters: SearchFilters = {};
    if (chapter.value !== undefined) filters.chapter = chapter.value;
    if (article.value !== undefined) filters.article = article.value;
    return ok(filters);
}

export function normalizeQuery(query: string): string {
    return query.trim().toLowerCase();
}

export function searchCacheKey(
    normalizedQuery: string,
    filters: SearchFilters | null,
    limit: number,
    offset: number,
    withHighlight: boolean,
): string {
    const signature = [
        normalizedQuery,
        filters ? JSON.stringify(filters) : 'none',
        limit,
        offset,
        withHighlight,
    ].join(':');
    return createHash('md5').update(signature).digest('hex');
}

function articleLocator({ chapter, part, article }: ArticleLocation) {
    return {
        chapter_number: chapter.chapter_number,
        chapter_title: chapter.chapter_title,
        ...(part ? { part_number: part.part_number, part_title: part.part_title } : {}),
        article_number: article.article_number,
        article_title: article.article_title,
    };
}

/**
 * Collects every unit containing `normalizedQuery`, once per unit, in
 * document order.
 */
export function collectMatches(
    document: ConstitutionDocument,
    normalizedQuery: string,
    filters: SearchFilters | null,
    withHighlight: boolean,
): SearchResult[] {
    const results: SearchResult[] = [];
    const matches = (text: string) => matchesQuery(text, normalizedQuery);
    const render = (text: string) => (withHighlight ? highlight(text, normalizedQuery) : text);

    walkDocument(document, {
        preamble: text => {
            if (!matches(text)) return;
            results.push({ type: 'preamble', content: text, match_context: render(extractContext(text, normalizedQuery)) });
        },
        chapter: chapter => {
            if (!matches(chapter.chapter_title)) return;
            results.push({
                type: 'chapter',
                chapter_number: chapter.chapter_number,
                chapter_title: chapter.chapter_title,
                content: chapter.chapter_title,
                match_context: render(chapter.chapter_title),
            });
        },
        article: location => {
            const title = location.article.article_title;
            if (!matches(title)) return;
            results.push({
                type: 'article_title',
                ...articleLocator(location),
                content: title,
                match_context: render(title),
            });
        },
        clause: (location, clause) => {
            if (!matches(clause.content)) return;
            results.push({
                type: 'clause',
                ...articleLocator(location),
                clause_number: clause.clause_number,
                content: clause.content,
                match_context: render(clause.content),
            });
        },
        subClause: (location, clause, subClause, path) => {
            if (!matches(subClause.content)) return;
            results.push({
                type: 'sub_clause',
                ...articleLocator(location),
                clause_number: clause.clause_number,
                sub_clause_id: subClause.sub_clause_id,
                sub_clause_path: path,
                content: subClause.content,
                match_context: render(subClause.content),
            });
        },
    }, filters ?? {});

    return results;
}

/**
 * Case-insensitive substring search over the whole document. Results come
 * back in document order, not ranked.
 */
export class SearchEngine {
    constructor(
        private readonly content: ContentCache,
        private readonly tracker: ViewTracker,
        private readonly logger: Logger,
    ) {}

    async search(request: SearchRequest, tasks?: TaskScheduler): Promise<Result<SearchResponse>> {
        const {
            query,
            limit = DEFAULT_SEARCH_LIMIT,
            offset = 0,
            highlight: withHighlight = true,
            bypassCache = false,
        } = request;

        const normalizedQuery = normalizeQuery(query);
        if (normalizedQuery === '') {
            return ok({
                query,
                normalized_query: '',
                filters: null,
                results: [],
                pagination: emptyPagination(limit, offset),
            });
        }

        const filters = parseFilters(request.filters);
        if (!filters.ok) return filters;
        if (!Number.isInteger(limit) || limit < 1) return invalidQuery('limit must be a positive integer');
        if (!Number.isInteger(offset) || offset < 0) return invalidQuery('offset must be a non-negative integer');

        await this.tracker.trackLater({
            contentType: 'search',
            contentReference: query.slice(0, TRACKED_QUERY_LENGTH),
            ...request.viewer,
        }, tasks);

        const cacheKey = searchCacheKey(normalizedQuery, filters.value, limit, offset, withHighlight);
        if (!bypassCache) {
            const cached = await this.content.getSearch(cacheKey);
            if (cached) {
                this.logger.debug({ query: normalizedQuery }, 'Search served from cache');
                return ok(cached);
            }
        }

        const document = await this.content.getDocument(tasks);
        if (!document.ok) return document;

        const all = collectMatches(document.value, normalizedQuery, filters.value, withHighlight);
        const { items, pagination } = paginate(all, limit, offset);
        const response: SearchResponse = {
            query,
            normalized_query: normalizedQuery,
            filters: filters.value,
            results: items,
            pagination,
        };
        this.logger.debug({ query: normalizedQuery, total: pagination.total }, 'Search executed');

        if (!bypassCache) {
            await this.content.setSearch(cacheKey, response, tasks);
        }
        return ok(response);
    }
}
