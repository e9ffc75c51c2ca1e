import type { Document } from 'mongoose';

// one contact, as stored
export interface IAddressBookRecord {
    name: string;
    surname: string;
    email: string;
    address: string;
    phones: string[];
    birthday: string; // dd.MM.yyyy or empty
    notes: string[];
}

// Address Book, one document per user
export interface IAddressBook extends Document {
    // identification
    username: string;

    // fields
    records: IAddressBookRecord[];

    // auto
    updatedAtUtc: Date;
};
