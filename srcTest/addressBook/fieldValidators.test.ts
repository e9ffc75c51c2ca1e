import { describe, expect, it } from 'vitest';
import { DateTime } from 'luxon';

import {
    formatBirthday,
    validateBirthday,
    validateEmail,
    validateName,
    validatePhone,
} from '../../src/utils/addressBook/fieldValidators';
import { ValidationError } from '../../src/utils/addressBook/addressBookErrors';

describe('fieldValidators', () => {
    it('trims names and rejects blank ones', () => {
        expect(validateName('  Ann ')).toBe('Ann');
        expect(() => validateName('   ')).toThrow(ValidationError);
        expect(() => validateName('')).toThrow('Name cannot be empty.');
    });

    it('accepts exactly ten digits for a phone', () => {
        expect(validatePhone('0501234567')).toBe('0501234567');
        expect(() => validatePhone('050123456')).toThrow('Phone must contain exactly 10 digits.');
        expect(() => validatePhone('05012345678')).toThrow(ValidationError);
        expect(() => validatePhone('050-123-45')).toThrow(ValidationError);
        expect(() => validatePhone(' 0501234567')).toThrow(ValidationError);
    });

    it('treats an empty e-mail as unset and checks the rest', () => {
        expect(validateEmail('')).toBe('');
        expect(validateEmail(' ann@example.com ')).toBe('ann@example.com');
        expect(() => validateEmail('ann.example.com')).toThrow('Invalid e-mail format.');
        expect(() => validateEmail('ann@example')).toThrow(ValidationError);
    });

    it('parses DD.MM.YYYY birthdays as UTC calendar dates', () => {
        const today = DateTime.utc(2024, 6, 1);
        const birthday = validateBirthday('15.03.1990', today);
        expect(birthday.year).toBe(1990);
        expect(birthday.month).toBe(3);
        expect(birthday.day).toBe(15);
        expect(formatBirthday(birthday)).toBe('15.03.1990');
    });

    it('rejects malformed and impossible dates', () => {
        const today = DateTime.utc(2024, 6, 1);
        expect(() => validateBirthday('1990-03-15', today)).toThrow('Date must be DD.MM.YYYY');
        expect(() => validateBirthday('31.02.1990', today)).toThrow('Date must be DD.MM.YYYY');
        expect(() => validateBirthday('29.02.2023', today)).toThrow('Date must be DD.MM.YYYY');
    });

    it('allows today but not tomorrow', () => {
        const today = DateTime.utc(2024, 6, 1);
        expect(formatBirthday(validateBirthday('01.06.2024', today))).toBe('01.06.2024');
        expect(() => validateBirthday('02.06.2024', today)).toThrow('Birthday cannot be in the future.');
    });
});
