import mongoose, { Schema } from 'mongoose';

import type {
    IAddressBook,
    IAddressBookRecord,
} from '../../types/typesSchema/typesAddressBook/SchemaAddressBook.types';

const addressBookRecordSchema = new Schema<IAddressBookRecord>({
    name: { type: String, default: '' },
    surname: { type: String, default: '' },
    email: { type: String, default: '' },
    address: { type: String, default: '' },
    phones: { type: [String], default: [] },
    birthday: { type: String, default: '' },
    notes: { type: [String], default: [] },
}, {
    _id: false,
});

// Address Book Schema
const addressBookSchema = new Schema<IAddressBook>({
    // identification
    username: { type: String, required: true, unique: true, default: '', index: true },

    // fields
    records: { type: [addressBookRecordSchema], default: [] },

    // auto
    updatedAtUtc: { type: Date, default: null },
});

// Address Book Model
const ModelAddressBook = mongoose.model<IAddressBook>(
    'addressBook',
    addressBookSchema,
    'addressBook'
);

export {
    ModelAddressBook
};
