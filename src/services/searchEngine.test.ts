import { describe, it, expect, vi } from 'vitest';
import { BackgroundTasks } from './backgroundTasks';
import { collectMatches, parseFilters, searchCacheKey } from './searchEngine';
import { silentLogger } from '../test/fixtures';
import { buildTestContext } from '../test/testContext';
import { ConstitutionDocument, SearchResponse } from '../types';
import { Result } from '../types/errors';

function unwrap(result: Result<SearchResponse>): SearchResponse {
    if (!result.ok) throw new Error(`${result.error.kind}: ${result.error.message}`);
    return result.value;
}

describe('SearchEngine', () => {
    it('finds "national flag" in exactly one sub-clause of chapter 2, article 9', async () => {
        const { ctx } = buildTestContext();
        const response = unwrap(await ctx.search.search({ query: 'national flag' }));

        expect(response.results).toEqual([{
            type: 'sub_clause',
            chapter_number: 2,
            chapter_title: 'The Republic',
            article_number: 9,
            article_title: 'National symbols and national days',
            clause_number: '1',
            sub_clause_id: 'a',
            sub_clause_path: ['a'],
            content: 'the national flag;',
            match_context: 'the **national flag**;',
        }]);
        expect(response.normalized_query).toBe('national flag');
        expect(response.pagination.total).toBe(1);
    });

    it('returns an empty result for a blank query whatever the filters', async () => {
        const { ctx } = buildTestContext();
        const response = unwrap(await ctx.search.search({ query: '   ', filters: { chapter: 'not-a-number' } }));
        expect(response).toEqual({
            query: '   ',
            normalized_query: '',
            filters: null,
            results: [],
            pagination: {
                total: 0,
                limit: 10,
                offset: 0,
                has_next: false,
                has_previous: false,
                next_offset: null,
                previous_offset: null,
            },
        });
    });

    it('walks preamble, chapter titles, article titles, clauses and sub-clauses in document order', async () => {
        const { ctx } = buildTestContext();
        const response = unwrap(await ctx.search.search({ query: 'Republic', limit: 50 }));
        expect(response.results.map(result => [result.type, result.chapter_number, result.article_number ?? null])).toEqual([
            ['clause', 1, 2],
            ['chapter', 2, null],
            ['article_title', 2, 4],
            ['clause', 2, 4],
            ['clause', 2, 9],
        ]);
    });

    it('matches the preamble with a bounded, highlighted context window', async () => {
        const { ctx } = buildTestContext();
        const response = unwrap(await ctx.search.search({ query: 'ALMIGHTY god' }));
        expect(response.results).toEqual([{
            type: 'preamble',
            content: 'We, the people, acknowledging the supremacy of the Almighty God of all creation, adopt this Constitution for ourselves and for future generations.',
            match_context: '...e, the people, acknowledging the supremacy of the **Almighty God** of all creation, adopt this Constitution for ours...',
        }]);
    });

    it('highlights every unit it reports as a match', () => {
        const document: ConstitutionDocument = {
            title: 'Units',
            preamble: '',
            chapters: [{
                chapter_number: 1,
                chapter_title: 'Temperature in \u212Aelvin',
                articles: [],
                parts: [],
            }],
        };
        const results = collectMatches(document, 'kelvin', null, true);
        expect(results.map(result => result.match_context)).toEqual(['Temperature in **\u212Aelvin**']);
    });

    it('yields one result per unit however often the query occurs in it', async () => {
        const { ctx } = buildTestContext();
        const response = unwrap(await ctx.search.search({ query: 'national', filters: { chapter: 2, article: 9 } }));
        expect(response.results.map(result => result.type)).toEqual([
            'article_title',
            'clause',
            'sub_clause',
            'sub_clause',
            'clause',
        ]);
        expect(response.results[0].match_context).toBe('**National** symbols and **national** days');
    });

    it('leaves matched text untouched when highlighting is off', async () => {
        const { ctx } = buildTestContext();
        const response = unwrap(await ctx.search.search({ query: 'national flag', highlight: false }));
        expect(response.results[0].match_context).toBe('the national flag;');
    });

    describe('filters', () => {
        it('limits results to a chapter and drops the preamble', async () => {
            const { ctx } = buildTestContext();
            const response = unwrap(await ctx.search.search({ query: 'republic', filters: { chapter: '2' } }));
            expect(response.filters).toEqual({ chapter: 2 });
            expect(response.results.map(result => result.type)).toEqual(['chapter', 'article_title', 'clause', 'clause']);
        });

        it('drops chapter titles under an article filter and labels part articles', async () => {
            const { ctx } = buildTestContext();
            const response = unwrap(await ctx.search.search({ query: 'rights', filters: { article: 20 } }));
            expect(response.results).toHaveLength(2);
            expect(response.results[0]).toEqual({
                type: 'article_title',
                chapter_number: 3,
                chapter_title: 'The Bill of Rights',
                part_number: 1,
                part_title: 'General Provisions',
                article_number: 20,
                article_title: 'Application of Bill of Rights',
                content: 'Application of Bill of Rights',
                match_context: 'Application of Bill of **Rights**',
            });
            expect(response.results[1].type).toBe('clause');
        });

        it('returns zero results for a chapter that does not exist', async () => {
            const { ctx } = buildTestContext();
            const response = unwrap(await ctx.search.search({ query: 'republic', filters: { chapter: 99 } }));
            expect(response.results).toEqual([]);
            expect(response.pagination.total).toBe(0);
        });

        it('rejects non-integer and non-positive filter values', async () => {
            const { ctx } = buildTestContext();
            expect(await ctx.search.search({ query: 'republic', filters: { chapter: 'two' } })).toEqual({
                ok: false,
                error: { kind: 'InvalidQuery', message: 'chapter filter must be a positive integer, got "two"' },
            });
            const zero = await ctx.search.search({ query: 'republic', filters: { article: 0 } });
            expect(zero.ok === false && zero.error.kind).toBe('InvalidQuery');
            const fractional = await ctx.search.search({ query: 'republic', filters: { chapter: '1.5' } });
            expect(fractional.ok === false && fractional.error.kind).toBe('InvalidQuery');
        });

        it('rejects an invalid page window', async () => {
            const { ctx } = buildTestContext();
            const noLimit = await ctx.search.search({ query: 'republic', limit: 0 });
            expect(noLimit.ok === false && noLimit.error.message).toBe('limit must be a positive integer');
            const negative = await ctx.search.search({ query: 'republic', offset: -1 });
            expect(negative.ok === false && negative.error.message).toBe('offset must be a non-negative integer');
        });
    });

    describe('pagination', () => {
        it('describes the window it returns', async () => {
            const { ctx } = buildTestContext();
            const response = unwrap(await ctx.search.search({ query: 'republic', limit: 2, offset: 2 }));
            expect(response.results).toHaveLength(2);
            expect(response.pagination).toEqual({
                total: 5,
                limit: 2,
                offset: 2,
                has_next: true,
                has_previous: true,
                next_offset: 4,
                previous_offset: 0,
            });
        });

        it('windows stepped by the limit concatenate to the full result list', async () => {
            const { ctx } = buildTestContext();
            const full = unwrap(await ctx.search.search({ query: 'the', limit: 100 })).results;
            expect(full.length).toBeGreaterThan(5);

            for (const limit of [1, 3, 4]) {
                const collected: SearchResponse['results'] = [];
                for (let offset = 0; offset < full.length; offset += limit) {
                    collected.push(...unwrap(await ctx.search.search({ query: 'the', limit, offset })).results);
                }
                expect(collected).toEqual(full);
            }
        });
    });

    describe('caching', () => {
        it('serves a repeated search from cache without walking the document again', async () => {
            const { ctx } = buildTestContext();
            const first = unwrap(await ctx.search.search({ query: 'republic' }));
            const getDocument = vi.spyOn(ctx.content, 'getDocument');

            const second = unwrap(await ctx.search.search({ query: 'republic' }));
            expect(second).toEqual(first);
            expect(getDocument).not.toHaveBeenCalled();
        });

        it('gives the same answer with and without the cache', async () => {
            const { ctx } = buildTestContext();
            const cached = unwrap(await ctx.search.search({ query: 'national' }));
            const bypassed = unwrap(await ctx.search.search({ query: 'national', bypassCache: true }));
            expect(bypassed).toEqual(cached);
        });

        it('neither reads nor writes the cache when bypassing', async () => {
            const { ctx, backend } = buildTestContext();
            await ctx.search.search({ query: 'republic', bypassCache: true });
            expect(await backend.keys('constitution:search:*')).toEqual([]);
        });

        it('defers the cache write when given a task queue', async () => {
            const { ctx, backend } = buildTestContext();
            const tasks = new BackgroundTasks(silentLogger);
            await ctx.search.search({ query: 'republic' }, tasks);
            expect(await backend.keys('constitution:search:*')).toEqual([]);

            await tasks.run();
            expect(await backend.keys('constitution:search:*')).toHaveLength(1);
        });
    });

    it('records a search view with the query truncated to 50 characters, on hits and misses', async () => {
        const { ctx, repository } = buildTestContext();
        const query = `republic ${'x'.repeat(60)}`;
        await ctx.search.search({ query, viewer: { userId: 'reader-1' } });
        await ctx.search.search({ query, viewer: { userId: 'reader-1' } });

        const row = await repository.findByKey({
            contentType: 'search',
            contentReference: query.slice(0, 50),
            userKey: 'reader-1',
        });
        expect(row?.viewCount).toBe(2);
        expect(row?.contentReference).toHaveLength(50);
    });
});

describe('parseFilters', () => {
    it('returns null when no filter is set', () => {
        expect(parseFilters(undefined)).toEqual({ ok: true, value: null });
        expect(parseFilters({ chapter: '', article: undefined })).toEqual({ ok: true, value: null });
    });

    it('parses numeric strings', () => {
        expect(parseFilters({ chapter: ' 4 ', article: '19' })).toEqual({ ok: true, value: { chapter: 4, article: 19 } });
    });
});

describe('searchCacheKey', () => {
    it('is stable for the same signature and differs when any part changes', () => {
        const base = searchCacheKey('republic', null, 10, 0, true);
        expect(searchCacheKey('republic', null, 10, 0, true)).toBe(base);
        expect(base).toMatch(/^[0-9a-f]{32}$/);
        expect(searchCacheKey('republic', { chapter: 2 }, 10, 0, true)).not.toBe(base);
        expect(searchCacheKey('republic', null, 10, 10, true)).not.toBe(base);
        expect(searchCacheKey('republic', null, 10, 0, false)).not.toBe(base);
    });
});
