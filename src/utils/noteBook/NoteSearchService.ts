import type { GeneralNote } from './GeneralNote';
import type { NoteBook, NoteMatch } from './NoteBook';

/**
 * Returns 1-based positions of the notes relevant to the query.
 */
export type SemanticNoteSearcher = (
    notes: readonly GeneralNote[],
    query: string,
) => Promise<number[]>;

export type NoteSearchResult =
    | { method: 'empty' }
    | { method: 'keyword'; matches: NoteMatch[] }
    | { method: 'semantic'; matches: NoteMatch[] }
    | { method: 'disabled' };

export class NoteSearchService {
    private readonly semanticSearcher: SemanticNoteSearcher | null;

    constructor(semanticSearcher: SemanticNoteSearcher | null) {
        this.semanticSearcher = semanticSearcher;
    }

    async search(noteBook: NoteBook, query: string): Promise<NoteSearchResult> {
        if (noteBook.size === 0) {
            return { method: 'empty' };
        }

        const keywordMatches = noteBook.searchByKeyword(query);
        if (keywordMatches.length >= 1) {
            return { method: 'keyword', matches: keywordMatches };
        }

        if (!this.semanticSearcher) {
            return { method: 'disabled' };
        }

        const notes = noteBook.list();
        const positions = await this.semanticSearcher(notes, query);
        const matches: NoteMatch[] = [];
        for (const position of positions) {
            const note = notes[position - 1];
            if (note) {
                matches.push({ position, note });
            }
        }
        return { method: 'semantic', matches };
    }
}
