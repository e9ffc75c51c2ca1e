import type { Document } from 'mongoose';

export interface INoteBookNote {
    text: string;
    tags: string[];
    createdAt: string; // yyyy-MM-dd
}

// Note Book, one document per user
export interface INoteBook extends Document {
    // identification
    username: string;

    // fields
    notes: INoteBookNote[];

    // auto
    updatedAtUtc: Date;
};
