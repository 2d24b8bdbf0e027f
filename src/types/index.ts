import { Static, Type } from '@sinclair/typebox';

// --- Normalized document model -------------------------------------------

export const SubClauseSchema = Type.Recursive(This => Type.Object({
    sub_clause_id: Type.String(),
    content: Type.String(),
    sub_clauses: Type.Optional(Type.Array(This)),
}), { $id: 'SubClause' });

export const ClauseSchema = Type.Object({
    clause_number: Type.String(),
    content: Type.String(),
    sub_clauses: Type.Array(SubClauseSchema),
});

export const ArticleSchema = Type.Object({
    article_number: Type.Integer({ minimum: 1 }),
    article_title: Type.String(),
    clauses: Type.Array(ClauseSchema),
});

export const PartSchema = Type.Object({
    part_number: Type.Integer({ minimum: 1 }),
    part_title: Type.String(),
    articles: Type.Array(ArticleSchema),
});

export const ChapterSchema = Type.Object({
    chapter_number: Type.Integer({ minimum: 1 }),
    chapter_title: Type.String(),
    articles: Type.Array(ArticleSchema),
    parts: Type.Array(PartSchema),
});

export const ConstitutionDocumentSchema = Type.Object({
    title: Type.String(),
    preamble: Type.String(),
    chapters: Type.Array(ChapterSchema),
});

export type SubClause = Static<typeof SubClauseSchema>;
export type Clause = Static<typeof ClauseSchema>;
export type Article = Static<typeof ArticleSchema>;
export type Part = Static<typeof PartSchema>;
export type Chapter = Static<typeof ChapterSchema>;
export type ConstitutionDocument = Static<typeof ConstitutionDocumentSchema>;

// --- Derived views ------------------------------------------------------------

export const DocumentOverviewSchema = Type.Object({
    title: Type.String(),
    preamble_preview: Type.String(),
    total_chapters: Type.Integer(),
    chapter_summary: Type.Array(Type.Object({
        chapter_number: Type.Integer(),
        chapter_title: Type.String(),
        article_count: Type.Integer(),
    })),
    last_updated: Type.Union([Type.String(), Type.Null()]),
});
export type DocumentOverview = Static<typeof DocumentOverviewSchema>;

export const PaginationSchema = Type.Object({
    total: Type.Integer(),
    limit: Type.Integer(),
    offset: Type.Integer(),
    has_next: Type.Boolean(),
    has_previous: Type.Boolean(),
    next_offset: Type.Union([Type.Integer(), Type.Null()]),
    previous_offset: Type.Union([Type.Integer(), Type.Null()]),
});
export type Pagination = Static<typeof PaginationSchema>;

export const ChapterListSchema = Type.Object({
    chapters: Type.Array(Type.Object({
        chapter_number: Type.Integer(),
        chapter_title: Type.String(),
        article_count: Type.Integer(),
    })),
    pagination: PaginationSchema,
});
export type ChapterList = Static<typeof ChapterListSchema>;

export const RelatedArticleSchema = Type.Object({
    chapter_number: Type.Integer(),
    chapter_title: Type.String(),
    article_number: Type.Integer(),
    article_title: Type.String(),
    relevance: Type.Literal('same_chapter'),
});
export type RelatedArticle = Static<typeof RelatedArticleSchema>;

/** An article with the chapter (and part) it sits in. */
export const ArticleDetailSchema = Type.Composite([
    ArticleSchema,
    Type.Object({
        chapter_number: Type.Integer(),
        chapter_title: Type.String(),
        part_number: Type.Optional(Type.Integer()),
        part_title: Type.Optional(Type.String()),
    }),
]);
export type ArticleDetail = Static<typeof ArticleDetailSchema>;

// --- Search ------------------------------------------------------------------

export const SearchResultTypeSchema = Type.Union([
    Type.Literal('preamble'),
    Type.Literal('chapter'),
    Type.Literal('article_title'),
    Type.Literal('clause'),
    Type.Literal('sub_clause'),
]);
export type SearchResultType = Static<typeof SearchResultTypeSchema>;

export const SearchResultSchema = Type.Object({
    type: SearchResultTypeSchema,
    chapter_number: Type.Optional(Type.Integer()),
    chapter_title: Type.Optional(Type.String()),
    part_number: Type.Optional(Type.Integer()),
    part_title: Type.Optional(Type.String()),
    article_number: Type.Optional(Type.Integer()),
    article_title: Type.Optional(Type.String()),
    clause_number: Type.Optional(Type.String()),
    sub_clause_id: Type.Optional(Type.String()),
    sub_clause_path: Type.Optional(Type.Array(Type.String())),
    content: Type.String(),
    match_context: Type.String(),
});
export type SearchResult = Static<typeof SearchResultSchema>;

export const SearchFiltersSchema = Type.Object({
    chapter: Type.Optional(Type.Integer()),
    article: Type.Optional(Type.Integer()),
});
export type SearchFilters = Static<typeof SearchFiltersSchema>;

export const SearchResponseSchema = Type.Object({
    query: Type.String(),
    normalized_query: Type.String(),
    filters: Type.Union([SearchFiltersSchema, Type.Null()]),
    results: Type.Array(SearchResultSchema),
    pagination: PaginationSchema,
});
export type SearchResponse = Static<typeof SearchResponseSchema>;

// --- Analytics ---------------------------------------------------------------

export type ContentType = 'overview' | 'chapter' | 'article' | 'search';
export type Timeframe = 'daily' | 'weekly' | 'monthly';

export const PopularItemSchema = Type.Object({
    type: Type.String(),
    reference: Type.String(),
    title: Type.String(),
    chapter_number: Type.Optional(Type.Integer()),
    article_number: Type.Optional(Type.Integer()),
    access_count: Type.Integer(),
    /** distinct readers behind `access_count`; absent on editorial picks */
    unique_viewers: Type.Optional(Type.Integer()),
    last_viewed_at: Type.Union([Type.String(), Type.Null()]),
});
export type PopularItem = Static<typeof PopularItemSchema>;

export const PopularListSchema = Type.Array(PopularItemSchema);

export const ViewTrendsSchema = Type.Object({
    days: Type.Integer(),
    content_type: Type.Union([Type.String(), Type.Null()]),
    reference: Type.Union([Type.String(), Type.Null()]),
    total_views: Type.Integer(),
    series: Type.Array(Type.Object({
        date: Type.String(),
        views: Type.Integer(),
    })),
});
export type ViewTrends = Static<typeof ViewTrendsSchema>;

export const SearchTermSchema = Type.Object({
    term: Type.String(),
    search_count: Type.Integer(),
    unique_searchers: Type.Integer(),
    last_searched_at: Type.String(),
});
export type SearchTerm = Static<typeof SearchTermSchema>;

export const SearchTermListSchema = Type.Array(SearchTermSchema);

export const ViewHistoryEntrySchema = Type.Object({
    content_type: Type.String(),
    reference: Type.String(),
    view_count: Type.Integer(),
    first_viewed_at: Type.String(),
    last_viewed_at: Type.String(),
    device_type: Type.Union([Type.String(), Type.Null()]),
});
export type ViewHistoryEntry = Static<typeof ViewHistoryEntrySchema>;

export interface ViewCounterKey {
    contentType: string;
    contentReference: string;
    /** user id, or `anonymous` for signed-out readers */
    userKey: string;
}

export interface ViewCounter extends ViewCounterKey {
    viewCount: number;
    firstViewedAt: string;
    lastViewedAt: string;
    deviceType: string | null;
    ipAddress: string | null;
}

export interface PopularAggregate {
    contentType: string;
    contentReference: string;
    totalViews: number;
    uniqueViewers: number;
    lastViewedAt: string;
}

export interface DailyViewTotal {
    /** local calendar day, `YYYY-MM-DD` */
    day: string;
    views: number;
}

export interface SearchTermAggregate {
    /** trimmed, lower-cased query */
    term: string;
    totalSearches: number;
    uniqueSearchers: number;
    lastSearchedAt: string;
}

export type ReadableItemType = 'chapter' | 'article';
