import { DateTime } from 'luxon';

import { AddressBook } from '../addressBook/AddressBook';
import { ContactRecord } from '../addressBook/ContactRecord';
import { formatBirthday } from '../addressBook/fieldValidators';
import { getTodayByUtcOffset } from '../common/getTodayByUtcOffset';
import { NoteBook } from '../noteBook/NoteBook';
import type { IAddressBookRecord } from '../../types/typesSchema/typesAddressBook/SchemaAddressBook.types';
import type { INoteBookNote } from '../../types/typesSchema/typesAddressBook/SchemaNoteBook.types';

// a birthday saved by a user at UTC+14 is still "today or earlier" here
const LATEST_UTC_OFFSET_MINUTES = 14 * 60;

const isRecord = (value: unknown): value is Record<string, unknown> => {
    return typeof value === 'object' && value !== null;
};

const readString = (value: unknown, field: string): string => {
    if (value === undefined || value === null) {
        return '';
    }
    if (typeof value !== 'string') {
        throw new Error(`${field} must be a string`);
    }
    return value;
};

const readStringArray = (value: unknown, field: string): string[] => {
    if (value === undefined || value === null) {
        return [];
    }
    if (!Array.isArray(value)) {
        throw new Error(`${field} must be an array`);
    }
    return value.map((item) => readString(item, field));
};

const readArray = (value: unknown, field: string): unknown[] => {
    if (value === undefined || value === null) {
        return [];
    }
    if (!Array.isArray(value)) {
        throw new Error(`${field} must be an array`);
    }
    return value;
};

// address book

const addressBookToDocument = (addressBook: AddressBook): IAddressBookRecord[] => {
    return addressBook.records().map((record) => ({
        name: record.name,
        surname: record.surname,
        email: record.email,
        address: record.address,
        phones: [...record.phones],
        birthday: record.birthday ? formatBirthday(record.birthday) : '',
        notes: [...record.notes],
    }));
};

/**
 * Rebuilds the book through the same validators as user input.
 * Throws on the first malformed record.
 */
const addressBookFromDocument = (records: unknown): AddressBook => {
    const addressBook = new AddressBook();
    for (const item of readArray(records, 'records')) {
        if (!isRecord(item)) {
            throw new Error('record must be an object');
        }
        const record = new ContactRecord({
            name: readString(item.name, 'name'),
            surname: readString(item.surname, 'surname'),
            email: readString(item.email, 'email'),
            address: readString(item.address, 'address'),
        });
        for (const phone of readStringArray(item.phones, 'phones')) {
            record.addPhone(phone);
        }
        const birthday = readString(item.birthday, 'birthday');
        if (birthday) {
            record.setBirthday(birthday, getTodayByUtcOffset(LATEST_UTC_OFFSET_MINUTES));
        }
        for (const note of readStringArray(item.notes, 'notes')) {
            record.addNote(note);
        }
        addressBook.addRecord(record);
    }
    return addressBook;
};

// note book

const noteBookToDocument = (noteBook: NoteBook): INoteBookNote[] => {
    return noteBook.list().map((note) => ({
        text: note.text,
        tags: [...note.tags],
        createdAt: note.createdAt.toISODate() ?? '',
    }));
};

const noteBookFromDocument = (notes: unknown): NoteBook => {
    const noteBook = new NoteBook();
    for (const item of readArray(notes, 'notes')) {
        if (!isRecord(item)) {
            throw new Error('note must be an object');
        }
        const createdAt = DateTime.fromISO(readString(item.createdAt, 'createdAt'), { zone: 'utc' });
        if (!createdAt.isValid) {
            throw new Error('createdAt must be an ISO date');
        }
        noteBook.addNote(
            readString(item.text, 'text'),
            readStringArray(item.tags, 'tags'),
            createdAt,
        );
    }
    return noteBook;
};

export {
    addressBookToDocument,
    addressBookFromDocument,
    noteBookToDocument,
    noteBookFromDocument,
};
