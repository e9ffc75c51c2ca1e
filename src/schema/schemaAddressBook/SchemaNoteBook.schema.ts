import mongoose, { Schema } from 'mongoose';

import type {
    INoteBook,
    INoteBookNote,
} from '../../types/typesSchema/typesAddressBook/SchemaNoteBook.types';

const noteBookNoteSchema = new Schema<INoteBookNote>({
    text: { type: String, default: '' },
    tags: { type: [String], default: [] },
    createdAt: { type: String, default: '' },
}, {
    _id: false,
});

// Note Book Schema
const noteBookSchema = new Schema<INoteBook>({
    // identification
    username: { type: String, required: true, unique: true, default: '', index: true },

    // fields
    notes: { type: [noteBookNoteSchema], default: [] },

    // auto
    updatedAtUtc: { type: Date, default: null },
});

// Note Book Model
const ModelNoteBook = mongoose.model<INoteBook>(
    'noteBook',
    noteBookSchema,
    'noteBook'
);

export {
    ModelNoteBook
};
