import { describe, expect, it } from 'vitest';

import { AddressBook } from '../../src/utils/addressBook/AddressBook';
import {
    AmbiguousSelectionError,
    NotFoundError,
    ValidationError,
} from '../../src/utils/addressBook/addressBookErrors';

describe('AddressBook', () => {
    it('creates a contact, then appends phones on the same key', () => {
        const addressBook = new AddressBook();

        const first = addressBook.addOrUpdate({ name: 'Ann', phone: '0501234567' });
        expect(first.created).toBe(true);
        expect(first.key).toBe('ann');

        const second = addressBook.addOrUpdate({ name: 'ann', phone: '0509999999' });
        expect(second.created).toBe(false);
        expect(second.key).toBe('ann');
        expect(addressBook.size).toBe(1);
        expect(addressBook.find('ann').phones).toEqual(['0501234567', '0509999999']);
    });

    it('replaces email and address only when given', () => {
        const addressBook = new AddressBook();
        addressBook.addOrUpdate({ name: 'John', surname: 'Smith', email: 'john@example.com', address: 'Main St 1' });
        const result = addressBook.addOrUpdate({ name: 'John', surname: 'Smith', email: 'js@example.com' });

        expect(result.record.email).toBe('js@example.com');
        expect(result.record.address).toBe('Main St 1');
    });

    it('leaves the book unchanged when a field is invalid', () => {
        const addressBook = new AddressBook();
        expect(() => addressBook.addOrUpdate({ name: 'Ann', phone: '123' })).toThrow(ValidationError);
        expect(() => addressBook.addOrUpdate({ name: 'Ann', email: 'nope' })).toThrow(ValidationError);
        expect(addressBook.size).toBe(0);

        addressBook.addOrUpdate({ name: 'Ann', phone: '0501234567' });
        expect(() => addressBook.addOrUpdate({ name: 'Ann', phone: '0509999999', email: 'nope' })).toThrow(ValidationError);
        expect(addressBook.find('ann').phones).toEqual(['0501234567']);
    });

    it('resolves ambiguous names through the prompt', () => {
        const addressBook = new AddressBook();
        addressBook.addOrUpdate({ name: 'John', surname: 'Smith' });
        addressBook.addOrUpdate({ name: 'John', surname: 'Doe' });

        let thrown: unknown = null;
        try {
            addressBook.findKey('john');
        } catch (error) {
            thrown = error;
        }
        expect(thrown).toBeInstanceOf(AmbiguousSelectionError);
        if (thrown instanceof AmbiguousSelectionError) {
            expect(thrown.candidates).toEqual(['john smith', 'john doe']);
            expect(thrown.httpStatus).toBe(409);
        }

        expect(addressBook.findKey('john', () => 1)).toBe('john smith');
        expect(addressBook.resolve('john', () => 2).record.surname).toBe('Doe');
        expect(() => addressBook.findKey('john', () => 5)).toThrow(AmbiguousSelectionError);
    });

    it('keeps the exact key when one contact name extends another', () => {
        const addressBook = new AddressBook();
        addressBook.addOrUpdate({ name: 'John', surname: 'Smith' });
        addressBook.addOrUpdate({ name: 'John', surname: 'Smithson' });

        const { key, record } = addressBook.resolve('john smith', () => 2);
        expect(key).toBe('john smithson');
        expect(record.surname).toBe('Smithson');
    });

    it('deletes by resolved key', () => {
        const addressBook = new AddressBook();
        addressBook.addOrUpdate({ name: 'Ann', surname: 'Lee' });
        expect(addressBook.delete('lee')).toBe('ann lee');
        expect(addressBook.size).toBe(0);
        expect(() => addressBook.find('ann')).toThrow(NotFoundError);
        expect(() => addressBook.delete('ann')).toThrow('Contact not found.');
    });

    it('matches name or surname exactly for birthday lookup', () => {
        const addressBook = new AddressBook();
        addressBook.addOrUpdate({ name: 'John', surname: 'Smith' });
        addressBook.addOrUpdate({ name: 'Ann', surname: 'Smith' });
        addressBook.addOrUpdate({ name: 'Bob' });

        expect(addressBook.findByNameOrSurname('SMITH').map(([key]) => key)).toEqual(['john smith', 'ann smith']);
        expect(addressBook.findByNameOrSurname(' bob ').map(([key]) => key)).toEqual(['bob']);
        expect(() => addressBook.findByNameOrSurname('smi')).toThrow(NotFoundError);
    });

    it('does not match blank input against empty surnames', () => {
        const addressBook = new AddressBook();
        addressBook.addOrUpdate({ name: 'Ann' });

        expect(() => addressBook.findByNameOrSurname('')).toThrow(NotFoundError);
        expect(() => addressBook.findByNameOrSurname('   ')).toThrow('Contact not found.');
    });
});
