import { ContactRecord } from './ContactRecord';
import { AmbiguousSelectionError, NotFoundError } from './addressBookErrors';
import { makeRecordKey, resolveRecordKeyWithPrompt } from './keyResolver';
import type { DisambiguationPrompt } from './keyResolver';
import { validateEmail, validateName, validatePhone } from './fieldValidators';

export interface AddOrUpdateContactParams {
    name: string;
    surname?: string;
    phone?: string;
    email?: string;
    address?: string;
}

export interface AddOrUpdateContactResult {
    created: boolean;
    key: string;
    record: ContactRecord;
}

export interface ResolvedContact {
    key: string;
    record: ContactRecord;
}

export class AddressBook {
    private readonly data = new Map<string, ContactRecord>();

    get size(): number {
        return this.data.size;
    }

    keys(): string[] {
        return [...this.data.keys()];
    }

    records(): ContactRecord[] {
        return [...this.data.values()];
    }

    entries(): Array<[string, ContactRecord]> {
        return [...this.data.entries()];
    }

    /**
     * Stores the record under its key, replacing any record already there.
     */
    addRecord(record: ContactRecord): string {
        const key = makeRecordKey(record.name, record.surname);
        this.data.set(key, record);
        return key;
    }

    addOrUpdate(params: AddOrUpdateContactParams): AddOrUpdateContactResult {
        const name = validateName(params.name);
        const surname = (params.surname ?? '').trim();
        const phone = params.phone ? validatePhone(params.phone) : '';
        const email = params.email ? validateEmail(params.email) : '';
        const address = (params.address ?? '').trim();

        const key = makeRecordKey(name, surname);
        const existing = this.data.get(key);
        if (existing) {
            if (phone) existing.addPhone(phone);
            if (surname) existing.updateSurname(surname);
            if (email) existing.updateEmail(email);
            if (address) existing.updateAddress(address);
            return { created: false, key, record: existing };
        }

        const record = new ContactRecord({ name, surname, email, address });
        if (phone) record.addPhone(phone);
        this.data.set(key, record);
        return { created: true, key, record };
    }

    findKey(nameText: string, prompt?: DisambiguationPrompt): string {
        const selection = resolveRecordKeyWithPrompt(nameText, this.data.keys(), prompt);
        if (selection.status === 'found') {
            return selection.key;
        }
        if (selection.status === 'invalidSelection') {
            throw new AmbiguousSelectionError(selection.candidates);
        }
        throw new NotFoundError();
    }

    resolve(nameText: string, prompt?: DisambiguationPrompt): ResolvedContact {
        const key = this.findKey(nameText, prompt);
        const record = this.data.get(key);
        if (!record) {
            throw new NotFoundError();
        }
        return { key, record };
    }

    find(nameText: string, prompt?: DisambiguationPrompt): ContactRecord {
        return this.resolve(nameText, prompt).record;
    }

    delete(nameText: string, prompt?: DisambiguationPrompt): string {
        const key = this.findKey(nameText, prompt);
        this.data.delete(key);
        return key;
    }

    // exact, case-insensitive match on name or surname alone
    findByNameOrSurname(text: string): Array<[string, ContactRecord]> {
        const needle = text.trim().toLowerCase();
        if (needle.length === 0) {
            throw new NotFoundError();
        }
        const matches = this.entries().filter(([, record]) => {
            return needle === record.name.toLowerCase() || needle === record.surname.toLowerCase();
        });
        if (matches.length === 0) {
            throw new NotFoundError();
        }
        return matches;
    }
}
