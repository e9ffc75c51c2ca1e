import { describe, expect, it, vi } from 'vitest';

import { NoteBook } from '../../src/utils/noteBook/NoteBook';
import { NoteSearchService } from '../../src/utils/noteBook/NoteSearchService';
import type { SemanticNoteSearcher } from '../../src/utils/noteBook/NoteSearchService';

const makeNoteBook = (): NoteBook => {
    const noteBook = new NoteBook();
    noteBook.addNote('Buy a blue car', ['shopping']);
    noteBook.addNote('Dentist on Friday', ['health']);
    return noteBook;
};

describe('NoteSearchService', () => {
    it('reports an empty book', async () => {
        const service = new NoteSearchService(null);
        expect(await service.search(new NoteBook(), 'car')).toEqual({ method: 'empty' });
    });

    it('prefers keyword matches and skips the semantic searcher', async () => {
        const searcher = vi.fn<SemanticNoteSearcher>(async () => [2]);
        const service = new NoteSearchService(searcher);

        const result = await service.search(makeNoteBook(), 'blue car');
        expect(result.method).toBe('keyword');
        if (result.method === 'keyword') {
            expect(result.matches.map((match) => match.position)).toEqual([1]);
        }
        expect(searcher).not.toHaveBeenCalled();
    });

    it('is disabled without a semantic searcher', async () => {
        const service = new NoteSearchService(null);
        expect(await service.search(makeNoteBook(), 'doctor')).toEqual({ method: 'disabled' });
    });

    it('keeps only positions inside the book from the semantic searcher', async () => {
        const searcher = vi.fn<SemanticNoteSearcher>(async () => [2, 9, 0]);
        const service = new NoteSearchService(searcher);

        const result = await service.search(makeNoteBook(), 'doctor');
        expect(result.method).toBe('semantic');
        if (result.method === 'semantic') {
            expect(result.matches.map((match) => match.position)).toEqual([2]);
            expect(result.matches[0].note.text).toBe('Dentist on Friday');
        }
        expect(searcher).toHaveBeenCalledTimes(1);
        expect(searcher.mock.calls[0][1]).toBe('doctor');
    });
});
