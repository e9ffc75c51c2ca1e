import { AddressBook } from '../addressBook/AddressBook';
import { NoteBook } from '../noteBook/NoteBook';
import { ModelAddressBook } from '../../schema/schemaAddressBook/SchemaAddressBook.schema';
import { ModelNoteBook } from '../../schema/schemaAddressBook/SchemaNoteBook.schema';
import {
    addressBookFromDocument,
    addressBookToDocument,
    noteBookFromDocument,
    noteBookToDocument,
} from './addressBookSerializer';

/**
 * A missing or unreadable document loads as an empty book.
 */
const loadAddressBook = async ({
    username,
}: {
    username: string;
}): Promise<AddressBook> => {
    const doc = await ModelAddressBook.findOne({ username }).lean();
    if (!doc) {
        return new AddressBook();
    }
    try {
        return addressBookFromDocument(doc.records);
    } catch (error) {
        console.error(`Address book of ${username} is corrupt, starting empty:`, error);
        return new AddressBook();
    }
};

const saveAddressBook = async ({
    username,
    addressBook,
}: {
    username: string;
    addressBook: AddressBook;
}): Promise<void> => {
    await ModelAddressBook.findOneAndUpdate(
        { username },
        {
            username,
            records: addressBookToDocument(addressBook),
            updatedAtUtc: new Date(),
        },
        { upsert: true }
    );
};

const loadNoteBook = async ({
    username,
}: {
    username: string;
}): Promise<NoteBook> => {
    const doc = await ModelNoteBook.findOne({ username }).lean();
    if (!doc) {
        return new NoteBook();
    }
    try {
        return noteBookFromDocument(doc.notes);
    } catch (error) {
        console.error(`Note book of ${username} is corrupt, starting empty:`, error);
        return new NoteBook();
    }
};

const saveNoteBook = async ({
    username,
    noteBook,
}: {
    username: string;
    noteBook: NoteBook;
}): Promise<void> => {
    await ModelNoteBook.findOneAndUpdate(
        { username },
        {
            username,
            notes: noteBookToDocument(noteBook),
            updatedAtUtc: new Date(),
        },
        { upsert: true }
    );
};

export {
    loadAddressBook,
    saveAddressBook,
    loadNoteBook,
    saveNoteBook,
};
