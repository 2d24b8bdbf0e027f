import { describe, it, expect, vi } from 'vitest';
import { BackgroundTasks } from './backgroundTasks';
import { FailingDocumentSource, StaticDocumentSource, sampleDocument, silentLogger } from '../test/fixtures';
import { buildTestContext } from '../test/testContext';

describe('ContentCache', () => {
    it('returns the requested chapter and serves the second read from cache', async () => {
        const { ctx, backend } = buildTestContext();
        const load = vi.spyOn(ctx.store, 'load');

        const first = await ctx.content.getChapter(2);
        const second = await ctx.content.getChapter(2);

        expect(first.ok && first.value.chapter_number).toBe(2);
        expect(second).toEqual(first);
        expect(load).toHaveBeenCalledTimes(1);
        expect(await backend.exists('constitution:chapter:2')).toBe(true);
    });

    it('reports NotFound for a chapter the document does not have', async () => {
        const { ctx, backend } = buildTestContext();
        const result = await ctx.content.getChapter(999);
        expect(result).toEqual({ ok: false, error: { kind: 'NotFound', message: 'Chapter 999 not found' } });
        expect(await backend.exists('constitution:chapter:999')).toBe(false);
    });

    it('finds articles inside parts and labels them with their chapter and part', async () => {
        const { ctx } = buildTestContext();
        const result = await ctx.content.getArticle(3, 20);
        if (!result.ok) throw new Error(result.error.message);
        expect(result.value).toMatchObject({
            article_number: 20,
            article_title: 'Application of Bill of Rights',
            chapter_number: 3,
            chapter_title: 'The Bill of Rights',
            part_number: 1,
            part_title: 'General Provisions',
        });
    });

    it('reports NotFound for an article missing from an existing chapter', async () => {
        const { ctx } = buildTestContext();
        const result = await ctx.content.getArticle(2, 5);
        expect(result).toEqual({ ok: false, error: { kind: 'NotFound', message: 'Article 5 not found in chapter 2' } });
    });

    it('surfaces an unreadable source as SourceUnavailable and caches nothing', async () => {
        const { ctx, backend } = buildTestContext({ source: new FailingDocumentSource() });
        const result = await ctx.content.getChapter(1);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe('SourceUnavailable');
        expect(backend.size).toBe(0);
    });

    it('defers population to the task queue when one is given', async () => {
        const { ctx, backend } = buildTestContext();
        const tasks = new BackgroundTasks(silentLogger);

        const result = await ctx.content.getChapter(1, tasks);

        expect(result.ok).toBe(true);
        expect(backend.size).toBe(0);
        expect(tasks.size).toBe(2);

        await tasks.run();
        expect(await backend.exists('constitution:document')).toBe(true);
        expect(await backend.exists('constitution:chapter:1')).toBe(true);
    });

    it('builds the overview with a truncated preamble and part-aware article counts', async () => {
        const source = new StaticDocumentSource(JSON.stringify({ ...sampleDocument, preamble: 'x'.repeat(250) }));
        const { ctx } = buildTestContext({ source, now: () => new Date('2024-06-01T08:00:00Z') });

        const overview = await ctx.content.getOverview();
        if (!overview.ok) throw new Error(overview.error.message);
        expect(overview.value.preamble_preview).toBe(`${'x'.repeat(200)}...`);
        expect(overview.value.total_chapters).toBe(3);
        expect(overview.value.chapter_summary).toEqual([
            { chapter_number: 1, chapter_title: 'Sovereignty of the People and Supremacy of this Constitution', article_count: 2 },
            { chapter_number: 2, chapter_title: 'The Republic', article_count: 2 },
            { chapter_number: 3, chapter_title: 'The Bill of Rights', article_count: 2 },
        ]);
        expect(overview.value.last_updated).toBe('2024-06-01T08:00:00.000Z');
    });

    it('pages the chapter list and rejects invalid windows', async () => {
        const { ctx } = buildTestContext();
        const page = await ctx.content.listChapters({ limit: 2, offset: 2 });
        if (!page.ok) throw new Error(page.error.message);
        expect(page.value.chapters.map(chapter => chapter.chapter_number)).toEqual([3]);
        expect(page.value.pagination).toEqual({
            total: 3,
            limit: 2,
            offset: 2,
            has_next: false,
            has_previous: true,
            next_offset: null,
            previous_offset: 0,
        });

        const invalid = await ctx.content.listChapters({ limit: 0, offset: 0 });
        expect(invalid.ok === false && invalid.error.kind).toBe('InvalidQuery');
    });

    it('lists other articles of the same chapter as related', async () => {
        const { ctx } = buildTestContext();
        const related = await ctx.content.getRelatedArticles(2, 9);
        expect(related).toEqual({
            ok: true,
            value: [{
                chapter_number: 2,
                chapter_title: 'The Republic',
                article_number: 4,
                article_title: 'Declaration of the Republic',
                relevance: 'same_chapter',
            }],
        });
    });

    it('treats a cached entry that no longer matches its schema as a miss', async () => {
        const { ctx, backend } = buildTestContext();
        await backend.set('constitution:chapter:2', '{"chapter_number":"two"}', 60);
        const result = await ctx.content.getChapter(2);
        expect(result.ok && result.value.chapter_title).toBe('The Republic');
    });

    describe('reload', () => {
        it('re-reads the source and refreshes the document key', async () => {
            const source = new StaticDocumentSource();
            const { ctx } = buildTestContext({ source });
            await ctx.content.getDocument();
            source.replace(JSON.stringify({ ...sampleDocument, title: 'Amended Constitution' }));

            const reloaded = await ctx.content.reload();
            expect(reloaded.ok && reloaded.value.title).toBe('Amended Constitution');
            const cached = await ctx.content.getDocument();
            expect(cached.ok && cached.value.title).toBe('Amended Constitution');
        });

        it('is idempotent', async () => {
            const { ctx } = buildTestContext();
            const once = await ctx.content.reload();
            const twice = await ctx.content.reload();
            expect(twice).toEqual(once);
        });

        it('leaves cached chapters in place until they expire', async () => {
            const source = new StaticDocumentSource();
            const { ctx } = buildTestContext({ source });
            await ctx.content.getChapter(2);
            source.replace(JSON.stringify({
                ...sampleDocument,
                chapters: sampleDocument.chapters.map(chapter =>
                    chapter.chapter_number === 2 ? { ...chapter, chapter_title: 'The Amended Republic' } : chapter),
            }));

            await ctx.content.reload();
            const stale = await ctx.content.getChapter(2);
            expect(stale.ok && stale.value.chapter_title).toBe('The Republic');

            await ctx.content.invalidateAll();
            const fresh = await ctx.content.getChapter(2);
            expect(fresh.ok && fresh.value.chapter_title).toBe('The Amended Republic');
        });
    });

    it('invalidates search results and per-user entries by pattern', async () => {
        const { ctx, backend } = buildTestContext();
        await backend.set('constitution:search:abc', '{}', 60);
        await backend.set('constitution:search:def', '{}', 60);
        await backend.set('constitution:user:42:bookmarks', '[]', 60);
        await backend.set('constitution:user:7:bookmarks', '[]', 60);

        expect(await ctx.content.invalidateSearch()).toBe(2);
        expect(await ctx.content.invalidateUser('42')).toBe(1);
        expect(await backend.keys('constitution:*')).toEqual(['constitution:user:7:bookmarks']);
    });

    it('treats glob characters in a user id literally', async () => {
        const { ctx, backend } = buildTestContext();
        await backend.set('constitution:user:42:bookmarks', '[]', 60);
        await backend.set('constitution:user:alice:bookmarks', '[]', 60);

        expect(await ctx.content.invalidateUser('*')).toBe(0);
        expect(await ctx.content.invalidateUser('[a-z]*')).toBe(0);
        expect(await backend.keys('constitution:user:*')).toHaveLength(2);
    });

    it('reports cache health and the last load time', async () => {
        const { ctx } = buildTestContext({ now: () => new Date('2024-06-01T08:00:00Z') });
        expect(await ctx.content.health()).toEqual({ cache: true, documentLoadedAt: null });
        await ctx.content.getDocument();
        expect(await ctx.content.health()).toEqual({ cache: true, documentLoadedAt: '2024-06-01T08:00:00.000Z' });
    });
});
