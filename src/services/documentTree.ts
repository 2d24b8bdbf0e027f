import { Article, Chapter, Clause, ConstitutionDocument, Part, SubClause } from '../types';

export interface ArticleLocation {
    chapter: Chapter;
    part?: Part;
    article: Article;
}

/**
 * Callbacks for a document walk. Every callback is optional; nodes are visited
 * in document order: preamble, then per chapter its title, its direct
 * articles and then the articles of each part. Each article is followed by
 * its clauses, and each clause by its sub-clauses depth first.
 */
export interface DocumentVisitor {
    preamble?(text: string): void;
    chapter?(chapter: Chapter): void;
    article?(location: ArticleLocation): void;
    clause?(location: ArticleLocation, clause: Clause): void;
    /** `path` lists the sub-clause ids from the clause down to this node. */
    subClause?(location: ArticleLocation, clause: Clause, subClause: SubClause, path: string[]): void;
}

/**
 * Restricts a walk. Any filter skips the preamble; an article filter also
 * skips chapter titles and matches that article number in every chapter the
 * walk reaches.
 */
export interface WalkScope {
    chapter?: number;
    article?: number;
}

export function articlesOf(chapter: Chapter): ArticleLocation[] {
    const locations: ArticleLocation[] = chapter.articles.map(article => ({ chapter, article }));
    for (const part of chapter.parts) {
        for (const article of part.articles) {
            locations.push({ chapter, part, article });
        }
    }
    return locations;
}

function walkSubClauses(
    location: ArticleLocation,
    clause: Clause,
    subClauses: SubClause[],
    parentPath: string[],
    visitor: DocumentVisitor,
): void {
    for (const subClause of subClauses) {
        const path = [...parentPath, subClause.sub_clause_id];
        visitor.subClause?.(location, clause, subClause, path);
        if (subClause.sub_clauses) {
            walkSubClauses(location, clause, subClause.sub_clauses, path, visitor);
        }
    }
}

export function walkArticle(location: ArticleLocation, visitor: DocumentVisitor): void {
    visitor.article?.(location);
    for (const clause of location.article.clauses) {
        visitor.clause?.(location, clause);
        walkSubClauses(location, clause, clause.sub_clauses, [], visitor);
    }
}

export function walkChapter(chapter: Chapter, visitor: DocumentVisitor, articleNumber?: number): void {
    if (articleNumber === undefined) {
        visitor.chapter?.(chapter);
    }
    for (const location of articlesOf(chapter)) {
        if (articleNumber !== undefined && location.article.article_number !== articleNumber) continue;
        walkArticle(location, visitor);
    }
}

export function walkDocument(document: ConstitutionDocument, visitor: DocumentVisitor, scope: WalkScope = {}): void {
    if (scope.chapter === undefined && scope.article === undefined) {
        visitor.preamble?.(document.preamble);
    }
    for (const chapter of document.chapters) {
        if (scope.chapter !== undefined && chapter.chapter_number !== scope.chapter) continue;
        walkChapter(chapter, visitor, scope.article);
    }
}

export function findChapter(document: ConstitutionDocument, chapterNumber: number): Chapter | undefined {
    return document.chapters.find(chapter => chapter.chapter_number === chapterNumber);
}

export function findArticle(chapter: Chapter, articleNumber: number): ArticleLocation | undefined {
    return articlesOf(chapter).find(location => location.article.article_number === articleNumber);
}

export function countWords(text: string): number {
    const trimmed = text.trim();
    return trimmed === '' ? 0 : trimmed.split(/\s+/).length;
}

/** Words in the article title, its clauses and every nested sub-clause. */
export function articleWordCount(location: ArticleLocation): number {
    let words = 0;
    walkArticle(location, {
        article: ({ article: visited }) => { words += countWords(visited.article_title); },
        clause: (_location, clause) => { words += countWords(clause.content); },
        subClause: (_location, _clause, subClause) => { words += countWords(subClause.content); },
    });
    return words;
}

/** Words in the chapter title plus every article it holds, part articles included. Part titles are not counted. */
export function chapterWordCount(chapter: Chapter): number {
    return articlesOf(chapter).reduce(
        (total, location) => total + articleWordCount(location),
        countWords(chapter.chapter_title),
    );
}
