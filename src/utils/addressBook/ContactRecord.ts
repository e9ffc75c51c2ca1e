import { DateTime } from 'luxon';

import {
    validateName,
    validatePhone,
    validateEmail,
    validateBirthday,
} from './fieldValidators';
import { DuplicateStateError, NotFoundError, ValidationError } from './addressBookErrors';

export interface ContactRecordInit {
    name: string;
    surname?: string;
    email?: string;
    address?: string;
}

/**
 * One contact. Every mutator validates before it assigns, so a thrown
 * ValidationError leaves the record as it was.
 */
export class ContactRecord {
    readonly name: string;
    private _surname: string;
    private _email: string;
    private _address: string;
    private _phones: string[] = [];
    private _birthday: DateTime | null = null;
    private _notes: string[] = [];

    constructor(init: ContactRecordInit) {
        this.name = validateName(init.name);
        this._surname = (init.surname ?? '').trim();
        this._email = validateEmail(init.email ?? '');
        this._address = (init.address ?? '').trim();
    }

    get surname(): string {
        return this._surname;
    }

    get email(): string {
        return this._email;
    }

    get address(): string {
        return this._address;
    }

    get phones(): readonly string[] {
        return this._phones;
    }

    get birthday(): DateTime | null {
        return this._birthday;
    }

    get notes(): readonly string[] {
        return this._notes;
    }

    get fullName(): string {
        return `${this.name} ${this._surname}`.trim();
    }

    // phone
    addPhone(phone: string): void {
        this._phones.push(validatePhone(phone));
    }

    removePhone(phone: string): void {
        this._phones = this._phones.filter((item) => item !== phone);
    }

    editPhone(index: number, phone: string): void {
        if (!Number.isInteger(index) || index < 0 || index >= this._phones.length) {
            throw new NotFoundError('Phone not found.');
        }
        this._phones[index] = validatePhone(phone);
    }

    replacePhones(phone: string): void {
        this._phones = [validatePhone(phone)];
    }

    // birthday
    setBirthday(value: string, today?: DateTime): void {
        if (this._birthday) {
            throw new DuplicateStateError('Birthday already set.');
        }
        this._birthday = validateBirthday(value, today);
    }

    // contact notes
    addNote(note: string): void {
        const text = note.trim();
        if (text.length === 0) {
            throw new ValidationError('Note cannot be empty.');
        }
        this._notes.push(text);
    }

    // misc
    updateSurname(surname: string): void {
        this._surname = surname.trim();
    }

    updateEmail(email: string): void {
        this._email = validateEmail(email);
    }

    updateAddress(address: string): void {
        this._address = address.trim();
    }
}
