import pino from 'pino';
import { DocumentSource } from '../services/documentStore';

export const silentLogger = pino({ level: 'silent' });

/**
 * Raw source data as an extraction would produce it: one sub-clause still
 * uses the `sub_clause_letter` alias, one clause number is numeric and
 * chapter 3 groups an article into a part.
 */
export const sampleDocument = {
    title: 'Sample Constitution',
    preamble: 'We, the people, acknowledging the supremacy of the Almighty God of all creation, adopt this Constitution for ourselves and for future generations.',
    chapters: [
        {
            chapter_number: 1,
            chapter_title: 'Sovereignty of the People and Supremacy of this Constitution',
            articles: [
                {
                    article_number: 1,
                    article_title: 'Sovereignty of the people',
                    clauses: [
                        { clause_number: '1', content: 'All sovereign power belongs to the people.', sub_clauses: [] },
                        { clause_number: '2', content: 'The people may exercise their sovereign power either directly or through their elected representatives.', sub_clauses: [] },
                    ],
                },
                {
                    article_number: 2,
                    article_title: 'Supremacy of this Constitution',
                    clauses: [
                        { clause_number: '1', content: 'This Constitution is the supreme law of the Republic.', sub_clauses: [] },
                    ],
                },
            ],
        },
        {
            chapter_number: 2,
            chapter_title: 'The Republic',
            articles: [
                {
                    article_number: 4,
                    article_title: 'Declaration of the Republic',
                    clauses: [
                        { clause_number: '1', content: 'Kenya is a sovereign Republic.', sub_clauses: [] },
                    ],
                },
                {
                    article_number: 9,
                    article_title: 'National symbols and national days',
                    clauses: [
                        {
                            clause_number: 1,
                            content: 'The national symbols of the Republic are—',
                            sub_clauses: [
                                { sub_clause_letter: 'a', content: 'the national flag;' },
                                { sub_clause_id: 'b', content: 'the national anthem;' },
                                { sub_clause_id: 'c', content: 'the coat of arms; and' },
                                { sub_clause_id: 'd', content: 'the public seal.' },
                            ],
                        },
                        {
                            clause_number: '2',
                            content: 'The national days are—',
                            sub_clauses: [
                                {
                                    sub_clause_id: 'a',
                                    content: 'Madaraka Day, to be observed on 1st June;',
                                    sub_clauses: [
                                        { sub_clause_id: 'i', content: 'celebrated in every county' },
                                    ],
                                },
                            ],
                        },
                    ],
                },
            ],
        },
        {
            chapter_number: 3,
            chapter_title: 'The Bill of Rights',
            articles: [
                {
                    article_number: 19,
                    article_title: 'Rights and fundamental freedoms',
                    clauses: [
                        { clause_number: '1', content: 'The Bill of Rights is an integral part of the democratic state.', sub_clauses: [] },
                    ],
                },
            ],
            parts: [
                {
                    part_number: 1,
                    part_title: 'General Provisions',
                    articles: [
                        {
                            article_number: 20,
                            article_title: 'Application of Bill of Rights',
                            clauses: [
                                { clause_number: '1', content: 'The Bill of Rights applies to all law and binds all State organs and all persons.', sub_clauses: [] },
                            ],
                        },
                    ],
                },
            ],
        },
    ],
};

export const sampleDocumentText = JSON.stringify(sampleDocument);

/** Document source backed by a string; counts reads. */
export class StaticDocumentSource implements DocumentSource {
    reads = 0;

    constructor(private text: string = sampleDocumentText) {}

    async read(): Promise<string> {
        this.reads++;
        return this.text;
    }

    describe(): string {
        return 'memory://sample';
    }

    replace(text: string): void {
        this.text = text;
    }
}

export class FailingDocumentSource implements DocumentSource {
    async read(): Promise<string> {
        throw new Error('ENOENT: no such file or directory');
    }

    describe(): string {
        return 'memory://missing';
    }
}
