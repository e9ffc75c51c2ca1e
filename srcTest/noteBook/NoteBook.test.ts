import { describe, expect, it } from 'vitest';
import { DateTime } from 'luxon';

import { NoteBook, parseTags } from '../../src/utils/noteBook/NoteBook';
import { GeneralNote } from '../../src/utils/noteBook/GeneralNote';
import { getQueryWords, noteKeywordMatch } from '../../src/utils/noteBook/noteKeywordMatch';
import { NotFoundError, ValidationError } from '../../src/utils/addressBook/addressBookErrors';

describe('parseTags', () => {
    it('splits on spaces and commas', () => {
        expect(parseTags('work, home  car')).toEqual(['work', 'home', 'car']);
        expect(parseTags(['a,b', 'c'])).toEqual(['a', 'b', 'c']);
        expect(parseTags('')).toEqual([]);
    });
});

describe('GeneralNote', () => {
    it('renders date, tags and text', () => {
        const createdAt = DateTime.utc(2026, 1, 5);
        expect(new GeneralNote(' Fix car ', ['work', 'car'], createdAt).toString()).toBe('2026-01-05   [work, car]   Fix car');
        expect(new GeneralNote('Plain', [], createdAt).toString()).toBe('2026-01-05   [—]   Plain');
    });
});

describe('noteKeywordMatch', () => {
    const note = new GeneralNote('Buy a blue car', ['shopping']);

    it('collects distinct lowercase words', () => {
        expect(getQueryWords('Blue car, blue!')).toEqual(['blue', 'car']);
        expect(getQueryWords('синя машина')).toEqual(['синя', 'машина']);
    });

    it('needs every word in the text or the tags', () => {
        expect(noteKeywordMatch('blue car', note)).toBe(true);
        expect(noteKeywordMatch('BLUE', note)).toBe(true);
        expect(noteKeywordMatch('car shop', note)).toBe(true);
        expect(noteKeywordMatch('red car', note)).toBe(false);
    });

    it('takes words from the tags as well as the text', () => {
        expect(noteKeywordMatch('blue car', new GeneralNote('my blue sedan', ['car']))).toBe(true);
        expect(noteKeywordMatch('blue car', new GeneralNote('red car'))).toBe(false);
    });

    it('matches everything when the query has no words', () => {
        expect(noteKeywordMatch('!!!', note)).toBe(true);
    });
});

describe('NoteBook', () => {
    it('rejects empty notes', () => {
        const noteBook = new NoteBook();
        expect(() => noteBook.addNote('   ')).toThrow(ValidationError);
        expect(() => noteBook.addNote('')).toThrow('Empty note.');
        expect(noteBook.size).toBe(0);
    });

    it('adds tags by 1-based position', () => {
        const noteBook = new NoteBook();
        noteBook.addNote('first', ['a']);
        noteBook.addNote('second');

        expect(noteBook.addTags(2, ['b', 'c']).tags).toEqual(['b', 'c']);
        expect(noteBook.list()[0].tags).toEqual(['a']);
        expect(() => noteBook.addTags(3, ['x'])).toThrow(NotFoundError);
        expect(() => noteBook.addTags(0, ['x'])).toThrow('Note not found.');
    });

    it('searches by exact tag and by keyword with positions', () => {
        const noteBook = new NoteBook();
        noteBook.addNote('Call the garage', ['work']);
        noteBook.addNote('Buy a blue car', ['shopping', 'car']);
        noteBook.addNote('Blue paint for the fence', ['home']);

        expect(noteBook.searchByTag('work').map((match) => match.position)).toEqual([1]);
        expect(noteBook.searchByTag('wor')).toEqual([]);
        expect(noteBook.searchByKeyword('blue').map((match) => match.position)).toEqual([2, 3]);
        expect(noteBook.searchByKeyword('blue car').map((match) => match.position)).toEqual([2]);
    });
});
