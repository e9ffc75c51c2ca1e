import type { GeneralNote } from './GeneralNote';

const WORD_REGEX = /[\p{L}\p{N}_]+/gu;

const getQueryWords = (query: string): string[] => {
    const words = new Set<string>();
    for (const match of query.matchAll(WORD_REGEX)) {
        words.add(match[0].toLowerCase());
    }
    return [...words];
};

/**
 * Every query word must be a substring of the note text or of its joined tags.
 * A query without words matches every note.
 */
const noteKeywordMatch = (query: string, note: GeneralNote): boolean => {
    const text = note.text.toLowerCase();
    const tags = note.tags.join(' ').toLowerCase();
    return getQueryWords(query).every((word) => text.includes(word) || tags.includes(word));
};

export {
    getQueryWords,
    noteKeywordMatch,
};
