// Resource paths under the CacheManager namespace.

export const CacheKeys = {
    document: () => 'document',
    overview: () => 'overview:metadata',
    chapterList: (limit: number, offset: number) => `chapters:list:${limit}:${offset}`,
    chapter: (chapterNumber: number) => `chapter:${chapterNumber}`,
    article: (chapterNumber: number, articleNumber: number) => `article:${chapterNumber}:${articleNumber}`,
    related: (chapterNumber: number, articleNumber: number) => `related:${chapterNumber}.${articleNumber}`,
    search: (queryHash: string) => `search:${queryHash}`,
    popular: (timeframe: string, contentType: string | undefined, limit: number) =>
        `popular:${timeframe}:${contentType ?? 'all'}:${limit}`,
    views: (contentType: string, reference: string) => `views:${contentType}:${reference}`,
    popularityBucket: (day: string, contentType: string, reference: string) =>
        `popularity:${day}:${contentType}:${reference}`,
};

/** Escapes glob metacharacters so `text` only matches itself. */
export function escapeGlob(text: string): string {
    return text.replace(/[*?[\]\\]/g, '\\$&');
}

export const CachePatterns = {
    all: '*',
    search: 'search:*',
    popular: 'popular:*',
    user: (userId: string) => `user:${escapeGlob(userId)}:*`,
};
