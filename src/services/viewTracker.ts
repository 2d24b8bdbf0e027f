import { CacheManager } from '../cache/cacheManager';
import { CacheKeys } from '../cache/cacheKeys';
import { Logger } from '../utils/logger';
import {
    ContentType,
    DailyViewTotal,
    PopularAggregate,
    PopularItem,
    SearchTerm,
    Timeframe,
    ViewCounter,
    ViewHistoryEntry,
    ViewTrends,
} from '../types';
import { TaskScheduler } from './backgroundTasks';
import { ContentCache } from './contentCache';
import { ViewRepository } from './viewRepository';
import { parseArticleReference, parseChapterReference } from './references';
import { dayKey, recentDays, windowStart } from './timeWindows';

export const ANONYMOUS_USER = 'anonymous';

/** Daily popularity buckets outlive the day they count by one more day. */
export const POPULARITY_BUCKET_TTL_SECONDS = 2 * 24 * 60 * 60;

export interface ViewEvent {
    contentType: ContentType;
    contentReference: string;
    userId?: string;
    deviceType?: string;
    ipAddress?: string;
}

export interface PopularQuery {
    timeframe: Timeframe;
    limit: number;
    contentType?: string;
}

export interface TrendsQuery {
    days: number;
    contentType?: string;
    contentReference?: string;
}

export interface SearchTermsRequest {
    timeframe: Timeframe;
    limit: number;
}

/** Shown while there are no analytics rows for the window. */
const EDITORIAL_PICKS: PopularItem[] = [
    { type: 'article', reference: '4.19', title: 'Rights and Fundamental Freedoms', chapter_number: 4, article_number: 19, access_count: 1245, last_viewed_at: null },
    { type: 'article', reference: '6.73', title: 'Leadership and Integrity', chapter_number: 6, article_number: 73, access_count: 987, last_viewed_at: null },
    { type: 'article', reference: '11.174', title: 'Devolved Government', chapter_number: 11, article_number: 174, access_count: 876, last_viewed_at: null },
    { type: 'article', reference: '10.159', title: 'Judicial Authority', chapter_number: 10, article_number: 159, access_count: 754, last_viewed_at: null },
    { type: 'article', reference: '12.201', title: 'Principles of Public Finance', chapter_number: 12, article_number: 201, access_count: 632, last_viewed_at: null },
];

export function editorialPicks(limit: number): PopularItem[] {
    return EDITORIAL_PICKS.slice(0, limit).map(item => ({ ...item }));
}

export function toHistoryEntry(row: ViewCounter): ViewHistoryEntry {
    return {
        content_type: row.contentType,
        reference: row.contentReference,
        view_count: row.viewCount,
        first_viewed_at: row.firstViewedAt,
        last_viewed_at: row.lastViewedAt,
        device_type: row.deviceType,
    };
}

/**
 * Records views in two places: fast counters in the cache and a durable
 * per-reader row. Tracking is best-effort and never fails the caller.
 */
export class ViewTracker {
    constructor(
        private readonly cache: CacheManager,
        private readonly repository: ViewRepository,
        private readonly content: ContentCache,
        private readonly logger: Logger,
        private readonly now: () => Date = () => new Date(),
    ) {}

    async track(event: ViewEvent): Promise<void> {
        const { contentType, contentReference } = event;
        try {
            const seenAt = this.now();
            await this.cache.increment(CacheKeys.views(contentType, contentReference));
            await this.cache.increment(
                CacheKeys.popularityBucket(dayKey(seenAt), contentType, contentReference),
                1,
                POPULARITY_BUCKET_TTL_SECONDS,
            );
            await this.repository.recordView(
                { contentType, contentReference, userKey: event.userId ?? ANONYMOUS_USER },
                seenAt,
                { deviceType: event.deviceType ?? null, ipAddress: event.ipAddress ?? null },
            );
        } catch (error) {
            this.logger.warn({ err: error, contentType, contentReference }, 'Failed to record view');
        }
    }

    /** Defers tracking when a scheduler is given, otherwise tracks before returning. */
    async trackLater(event: ViewEvent, tasks?: TaskScheduler): Promise<void> {
        if (tasks) {
            tasks.defer(`views:${event.contentType}`, () => this.track(event));
            return;
        }
        await this.track(event);
    }

    async viewCount(contentType: string, contentReference: string): Promise<number> {
        const raw = await this.cache.get(CacheKeys.views(contentType, contentReference));
        return typeof raw === 'number' && Number.isInteger(raw) ? raw : 0;
    }

    async popular(query: PopularQuery, tasks?: TaskScheduler): Promise<PopularItem[]> {
        const { timeframe, limit, contentType } = query;
        const cached = await this.content.getPopular(timeframe, contentType, limit);
        if (cached) return cached;

        let rows: PopularAggregate[] = [];
        try {
            rows = await this.repository.aggregate({ since: windowStart(timeframe, this.now()), limit, contentType });
        } catch (error) {
            this.logger.warn({ err: error, timeframe }, 'Popular content query failed; serving editorial picks');
        }

        const items: PopularItem[] = [];
        for (const row of rows) {
            const item = await this.describe(row, tasks);
            if (item) items.push(item);
        }

        const result = items.length > 0 ? items : editorialPicks(limit);
        await this.content.setPopular(timeframe, contentType, limit, result, tasks);
        return result;
    }

    async userHistory(userId: string, limit: number): Promise<ViewCounter[]> {
        try {
            return await this.repository.userHistory(userId, limit);
        } catch (error) {
            this.logger.warn({ err: error, userId }, 'View history query failed');
            return [];
        }
    }

    /** Views per day for the last `days` local days, today included; days without views count 0. */
    async viewTrends(query: TrendsQuery): Promise<ViewTrends> {
        const { days, contentType, contentReference } = query;
        const calendar = recentDays(days, this.now());

        let totals: DailyViewTotal[] = [];
        try {
            totals = await this.repository.dailyViews({ fromDay: calendar[0], contentType, contentReference });
        } catch (error) {
            this.logger.warn({ err: error, days }, 'View trend query failed; reporting no views');
        }

        const byDay = new Map(totals.map(total => [total.day, total.views]));
        const series = calendar.map(date => ({ date, views: byDay.get(date) ?? 0 }));
        return {
            days,
            content_type: contentType ?? null,
            reference: contentReference ?? null,
            total_views: series.reduce((sum, point) => sum + point.views, 0),
            series,
        };
    }

    async popularSearchTerms(request: SearchTermsRequest): Promise<SearchTerm[]> {
        const { timeframe, limit } = request;
        try {
            const terms = await this.repository.searchTerms({ since: windowStart(timeframe, this.now()), limit });
            return terms.map(term => ({
                term: term.term,
                search_count: term.totalSearches,
                unique_searchers: term.uniqueSearchers,
                last_searched_at: term.lastSearchedAt,
            }));
        } catch (error) {
            this.logger.warn({ err: error, timeframe }, 'Search term query failed');
            return [];
        }
    }

    private async describe(row: PopularAggregate, tasks?: TaskScheduler): Promise<PopularItem | undefined> {
        const base = {
            type: row.contentType,
            reference: row.contentReference,
            access_count: row.totalViews,
            unique_viewers: row.uniqueViewers,
            last_viewed_at: row.lastViewedAt,
        };

        switch (row.contentType) {
            case 'chapter': {
                const chapterNumber = parseChapterReference(row.contentReference);
                if (chapterNumber === undefined) return undefined;
                const chapter = await this.content.getChapter(chapterNumber, tasks);
                if (!chapter.ok) return undefined;
                return { ...base, title: chapter.value.chapter_title, chapter_number: chapterNumber };
            }
            case 'article': {
                const reference = parseArticleReference(row.contentReference);
                if (!reference) return undefined;
                const article = await this.content.getArticle(reference.chapter, reference.article, tasks);
                if (!article.ok) return undefined;
                return {
                    ...base,
                    title: article.value.article_title,
                    chapter_number: reference.chapter,
                    article_number: reference.article,
                };
            }
            case 'overview': {
                const overview = await this.content.getOverview(tasks);
                return overview.ok ? { ...base, title: overview.value.title } : undefined;
            }
            case 'search':
                return { ...base, title: `Search: ${row.contentReference}` };
            default:
                return undefined;
        }
    }
}
