import { readFile } from 'fs/promises';
import { Static, Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { Logger } from '../utils/logger';
import { Article, Chapter, Clause, ConstitutionDocument, Part, SubClause } from '../types';
import { Result, describeError, ok, sourceUnavailable } from '../types/errors';

/** Where the document comes from. Read-only at runtime. */
export interface DocumentSource {
    read(): Promise<string>;
    describe(): string;
}

export class FileDocumentSource implements DocumentSource {
    constructor(private readonly filePath: string) {}

    async read(): Promise<string> {
        return readFile(this.filePath, 'utf-8');
    }

    describe(): string {
        return this.filePath;
    }
}

// Source data is looser than the normalized model: older extractions name the
// sub-clause identifier `sub_clause_letter`, use numeric clause labels and omit
// empty collections.

const RawSubClauseSchema = Type.Recursive(This => Type.Object({
    sub_clause_id: Type.Optional(Type.String()),
    sub_clause_letter: Type.Optional(Type.String()),
    content: Type.Optional(Type.String()),
    sub_clauses: Type.Optional(Type.Array(This)),
}));

const RawClauseSchema = Type.Object({
    clause_number: Type.Union([Type.String(), Type.Number()]),
    content: Type.Optional(Type.String()),
    sub_clauses: Type.Optional(Type.Array(RawSubClauseSchema)),
});

const RawArticleSchema = Type.Object({
    article_number: Type.Integer({ minimum: 1 }),
    article_title: Type.String(),
    clauses: Type.Optional(Type.Array(RawClauseSchema)),
});

const RawPartSchema = Type.Object({
    part_number: Type.Integer({ minimum: 1 }),
    part_title: Type.String(),
    articles: Type.Optional(Type.Array(RawArticleSchema)),
});

const RawChapterSchema = Type.Object({
    chapter_number: Type.Integer({ minimum: 1 }),
    chapter_title: Type.String(),
    articles: Type.Optional(Type.Array(RawArticleSchema)),
    parts: Type.Optional(Type.Array(RawPartSchema)),
});

const RawDocumentSchema = Type.Object({
    title: Type.Optional(Type.String()),
    preamble: Type.Optional(Type.String()),
    chapters: Type.Array(RawChapterSchema),
});

type RawSubClause = Static<typeof RawSubClauseSchema>;
type RawClause = Static<typeof RawClauseSchema>;
type RawArticle = Static<typeof RawArticleSchema>;
type RawPart = Static<typeof RawPartSchema>;
type RawChapter = Static<typeof RawChapterSchema>;
type RawDocument = Static<typeof RawDocumentSchema>;

const DEFAULT_TITLE = 'The Constitution of Kenya, 2010';

function normalizeSubClause(raw: RawSubClause): SubClause {
    const subClause: SubClause = {
        sub_clause_id: raw.sub_clause_id ?? raw.sub_clause_letter ?? '',
        content: raw.content ?? '',
    };
    if (raw.sub_clauses) {
        subClause.sub_clauses = raw.sub_clauses.map(normalizeSubClause);
    }
    return subClause;
}

function normalizeClause(raw: RawClause): Clause {
    return {
        clause_number: String(raw.clause_number),
        content: raw.content ?? '',
        sub_clauses: (raw.sub_clauses ?? []).map(normalizeSubClause),
    };
}

function normalizeArticle(raw: RawArticle): Article {
    return {
        article_number: raw.article_number,
        article_title: raw.article_title,
        clauses: (raw.clauses ?? []).map(normalizeClause),
    };
}

function normalizePart(raw: RawPart): Part {
    return {
        part_number: raw.part_number,
        part_title: raw.part_title,
        articles: (raw.articles ?? []).map(normalizeArticle),
    };
}

function normalizeChapter(raw: RawChapter): Chapter {
    return {
        chapter_number: raw.chapter_number,
        chapter_title: raw.chapter_title,
        articles: (raw.articles ?? []).map(normalizeArticle),
        parts: (raw.parts ?? []).map(normalizePart),
    };
}

export function normalizeDocument(raw: RawDocument): ConstitutionDocument {
    return {
        title: raw.title ?? DEFAULT_TITLE,
        preamble: raw.preamble ?? '',
        chapters: raw.chapters.map(normalizeChapter),
    };
}

/**
 * Parses and validates raw document text. The `sub_clause_letter` alias is
 * resolved here and nowhere else.
 */
export function parseDocument(text: string): Result<ConstitutionDocument> {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        return sourceUnavailable(`Document is not valid JSON: ${describeError(error)}`, error);
    }
    if (!Value.Check(RawDocumentSchema, raw)) {
        const first = Value.Errors(RawDocumentSchema, raw).First();
        const where = first ? `${first.path || '/'}: ${first.message}` : 'unknown location';
        return sourceUnavailable(`Document does not match the expected structure (${where})`);
    }
    return ok(normalizeDocument(raw));
}

/**
 * Authoritative copy of the document. Keeps the last successful load in
 * memory; `force` re-reads the source.
 */
export class DocumentStore {
    private document: ConstitutionDocument | undefined;
    private loadedAt: Date | null = null;

    constructor(
        private readonly source: DocumentSource,
        private readonly logger: Logger,
        private readonly now: () => Date = () => new Date(),
    ) {}

    get lastLoadedAt(): Date | null {
        return this.loadedAt;
    }

    async load(options: { force?: boolean } = {}): Promise<Result<ConstitutionDocument>> {
        if (this.document && !options.force) {
            return ok(this.document);
        }

        let text: string;
        try {
            text = await this.source.read();
        } catch (error) {
            this.logger.error({ err: error, source: this.source.describe() }, 'Failed to read the document source');
            return sourceUnavailable(`Document source ${this.source.describe()} could not be read: ${describeError(error)}`, error);
        }

        const parsed = parseDocument(text);
        if (!parsed.ok) {
            this.logger.error({ source: this.source.describe(), reason: parsed.error.message }, 'Rejected document source');
            return parsed;
        }

        this.document = parsed.value;
        this.loadedAt = this.now();
        this.logger.info(
            { source: this.source.describe(), chapters: parsed.value.chapters.length },
            'Document loaded',
        );
        return parsed;
    }
}
