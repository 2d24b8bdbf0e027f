// Content references as they appear in view rows and reading-progress calls:
// a chapter is `"2"`, an article `"2.9"`.

function parsePositiveInt(text: string): number | undefined {
    if (!/^\d+$/.test(text)) return undefined;
    const value = parseInt(text, 10);
    return value > 0 ? value : undefined;
}

/** `"2.9"` → chapter 2, article 9. */
export function parseArticleReference(reference: string): { chapter: number; article: number } | undefined {
    const [chapterText, articleText, ...rest] = reference.split('.');
    if (articleText === undefined || rest.length > 0) return undefined;
    const chapter = parsePositiveInt(chapterText);
    const article = parsePositiveInt(articleText);
    return chapter !== undefined && article !== undefined ? { chapter, article } : undefined;
}

export function parseChapterReference(reference: string): number | undefined {
    return parsePositiveInt(reference);
}

export function articleReference(chapterNumber: number, articleNumber: number): string {
    return `${chapterNumber}.${articleNumber}`;
}
