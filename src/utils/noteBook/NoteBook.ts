import { DateTime } from 'luxon';

import { GeneralNote } from './GeneralNote';
import { noteKeywordMatch } from './noteKeywordMatch';
import { NotFoundError, ValidationError } from '../addressBook/addressBookErrors';

export interface NoteMatch {
    position: number; // 1-based
    note: GeneralNote;
}

const parseTags = (raw: string | string[]): string[] => {
    const pieces = Array.isArray(raw) ? raw : [raw];
    return pieces
        .flatMap((piece) => piece.split(/[ ,]+/))
        .filter((tag) => tag.length >= 1);
};

export class NoteBook {
    private readonly notes: GeneralNote[] = [];

    get size(): number {
        return this.notes.length;
    }

    list(): GeneralNote[] {
        return [...this.notes];
    }

    addNote(text: string, tags: string[] = [], createdAt?: DateTime): GeneralNote {
        if (text.trim().length === 0) {
            throw new ValidationError('Empty note.');
        }
        const note = new GeneralNote(text, tags, createdAt);
        this.notes.push(note);
        return note;
    }

    addTags(position: number, tags: string[]): GeneralNote {
        if (!Number.isInteger(position) || position < 1 || position > this.notes.length) {
            throw new NotFoundError('Note not found.');
        }
        const note = this.notes[position - 1];
        note.addTags(tags);
        return note;
    }

    searchByTag(tag: string): NoteMatch[] {
        return this.toMatches((note) => note.tags.includes(tag));
    }

    searchByKeyword(query: string): NoteMatch[] {
        return this.toMatches((note) => noteKeywordMatch(query, note));
    }

    private toMatches(predicate: (note: GeneralNote) => boolean): NoteMatch[] {
        const result: NoteMatch[] = [];
        this.notes.forEach((note, index) => {
            if (predicate(note)) {
                result.push({ position: index + 1, note });
            }
        });
        return result;
    }
}

export {
    parseTags,
};
