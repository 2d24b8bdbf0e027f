import { Logger } from '../utils/logger';
import { ReadableItemType } from '../types';
import { ContentCache } from './contentCache';
import { articleWordCount, chapterWordCount, findArticle } from './documentTree';
import { parseArticleReference, parseChapterReference } from './references';

export const WORDS_PER_MINUTE = 200;
export const COMPLETION_RATIO = 0.3;
export const MINIMUM_THRESHOLD_MINUTES = 2;

export function thresholdForWordCount(words: number): number {
    if (!(words > 0)) return MINIMUM_THRESHOLD_MINUTES;
    return Math.max(MINIMUM_THRESHOLD_MINUTES, (words / WORDS_PER_MINUTE) * COMPLETION_RATIO);
}

/**
 * Decides how long a reader must spend on a chapter or article before it
 * counts as read. Anything that cannot be resolved gets the minimum.
 */
export class ReadingCompletionEstimator {
    constructor(
        private readonly content: ContentCache,
        private readonly logger: Logger,
    ) {}

    async wordCount(itemType: ReadableItemType, reference: string): Promise<number | undefined> {
        if (itemType === 'chapter') {
            const chapterNumber = parseChapterReference(reference);
            if (chapterNumber === undefined) return undefined;
            const chapter = await this.content.getChapter(chapterNumber);
            return chapter.ok ? chapterWordCount(chapter.value) : undefined;
        }

        const parsed = parseArticleReference(reference);
        if (!parsed) return undefined;
        const chapter = await this.content.getChapter(parsed.chapter);
        if (!chapter.ok) return undefined;
        const location = findArticle(chapter.value, parsed.article);
        return location ? articleWordCount(location) : undefined;
    }

    async thresholdMinutes(itemType: ReadableItemType, reference: string): Promise<number> {
        const words = await this.wordCount(itemType, reference);
        if (words === undefined) {
            this.logger.debug({ itemType, reference }, 'Unresolvable reading item; using minimum threshold');
            return MINIMUM_THRESHOLD_MINUTES;
        }
        return thresholdForWordCount(words);
    }

    async isComplete(itemType: ReadableItemType, reference: string, minutesRead: number): Promise<boolean> {
        return minutesRead >= await this.thresholdMinutes(itemType, reference);
    }
}
