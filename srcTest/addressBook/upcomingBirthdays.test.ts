import { describe, expect, it } from 'vitest';
import { DateTime } from 'luxon';

import { ContactRecord } from '../../src/utils/addressBook/ContactRecord';
import {
    getNextBirthday,
    projectBirthdayOntoYear,
    upcomingBirthdays,
} from '../../src/utils/addressBook/upcomingBirthdays';

const makeEntry = (name: string, birthday: string, today: DateTime): [string, ContactRecord] => {
    const record = new ContactRecord({ name });
    record.setBirthday(birthday, today);
    return [name.toLowerCase(), record];
};

describe('upcomingBirthdays', () => {
    it('projects Feb 29 onto Feb 28 in non-leap years', () => {
        const birthday = DateTime.utc(2000, 2, 29);
        expect(projectBirthdayOntoYear(birthday, 2027).toISODate()).toBe('2027-02-28');
        expect(projectBirthdayOntoYear(birthday, 2028).toISODate()).toBe('2028-02-29');
    });

    it('moves a birthday already passed this year to the next one', () => {
        const today = DateTime.utc(2026, 12, 30);
        expect(getNextBirthday(DateTime.utc(1990, 1, 2), today).toISODate()).toBe('2027-01-02');
        expect(getNextBirthday(DateTime.utc(1990, 12, 30), today).toISODate()).toBe('2026-12-30');
    });

    it('lists birthdays from today through daysAhead inclusive, soonest first', () => {
        const today = DateTime.utc(2027, 2, 25);
        const entries = [
            makeEntry('Later', '05.03.1985', today),
            makeEntry('Leap', '29.02.2000', today),
            makeEntry('Today', '25.02.1990', today),
            makeEntry('Past', '20.02.1980', today),
        ];

        const result = upcomingBirthdays(entries, 3, today);
        expect(result.map((item) => item.key)).toEqual(['today', 'leap']);
        expect(result.map((item) => item.date.toISODate())).toEqual(['2027-02-25', '2027-02-28']);
        expect(result.map((item) => item.age)).toEqual([37, 27]);

        expect(upcomingBirthdays(entries, 7, today).map((item) => item.key)).toEqual(['today', 'leap']);
        expect(upcomingBirthdays(entries, 8, today).map((item) => item.key)).toEqual(['today', 'leap', 'later']);
        expect(upcomingBirthdays(entries, 0, today).map((item) => item.key)).toEqual(['today']);
    });

    it('crosses the year boundary', () => {
        const today = DateTime.utc(2026, 12, 30);
        const entries = [makeEntry('Ann', '02.01.1990', today)];

        const result = upcomingBirthdays(entries, 3, today);
        expect(result).toHaveLength(1);
        expect(result[0].date.toISODate()).toBe('2027-01-02');
        expect(result[0].age).toBe(37);
        expect(upcomingBirthdays(entries, 2, today)).toEqual([]);
    });

    it('rolls a passed Feb 29 birthday into the next year', () => {
        const birthday = DateTime.utc(2000, 2, 29);
        expect(getNextBirthday(birthday, DateTime.utc(2026, 3, 1)).toISODate()).toBe('2027-02-28');
        expect(getNextBirthday(birthday, DateTime.utc(2027, 3, 1)).toISODate()).toBe('2028-02-29');
        expect(getNextBirthday(birthday, DateTime.utc(2028, 3, 1)).toISODate()).toBe('2029-02-28');
    });

    it('lists a passed Feb 29 birthday on the next leap-adjusted date', () => {
        const afterCommonYear = DateTime.utc(2026, 3, 1);
        const common = upcomingBirthdays([makeEntry('Leap', '29.02.2000', afterCommonYear)], 365, afterCommonYear);
        expect(common).toHaveLength(1);
        expect(common[0].date.toISODate()).toBe('2027-02-28');
        expect(common[0].age).toBe(27);

        const beforeLeapYear = DateTime.utc(2027, 3, 1);
        const entries = [makeEntry('Leap', '29.02.2000', beforeLeapYear)];
        const leap = upcomingBirthdays(entries, 365, beforeLeapYear);
        expect(leap).toHaveLength(1);
        expect(leap[0].date.toISODate()).toBe('2028-02-29');
        expect(leap[0].age).toBe(28);
        expect(upcomingBirthdays(entries, 364, beforeLeapYear)).toEqual([]);

        const afterLeapYear = DateTime.utc(2028, 3, 1);
        const next = upcomingBirthdays([makeEntry('Leap', '29.02.2000', afterLeapYear)], 364, afterLeapYear);
        expect(next[0].date.toISODate()).toBe('2029-02-28');
        expect(next[0].age).toBe(29);
    });

    it('skips contacts without a birthday', () => {
        const today = DateTime.utc(2027, 2, 25);
        const entries: Array<[string, ContactRecord]> = [['bob', new ContactRecord({ name: 'Bob' })]];
        expect(upcomingBirthdays(entries, 365, today)).toEqual([]);
    });

    it('rejects negative or fractional day counts', () => {
        const today = DateTime.utc(2027, 2, 25);
        expect(() => upcomingBirthdays([], -1, today)).toThrow('Enter non-negative integer.');
        expect(() => upcomingBirthdays([], 1.5, today)).toThrow('Enter non-negative integer.');
    });
});
