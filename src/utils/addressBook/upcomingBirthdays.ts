import { DateTime } from 'luxon';

import type { ContactRecord } from './ContactRecord';
import { ValidationError } from './addressBookErrors';
import { getTodayByUtcOffset } from '../common/getTodayByUtcOffset';

export interface UpcomingBirthday {
    key: string;
    record: ContactRecord;
    date: DateTime;
    age: number;
}

// Feb 29 falls back to Feb 28 in non-leap years
const projectBirthdayOntoYear = (birthday: DateTime, year: number): DateTime => {
    const projected = DateTime.utc(year, birthday.month, birthday.day);
    if (projected.isValid) {
        return projected;
    }
    return DateTime.utc(year, 2, 28);
};

const getNextBirthday = (birthday: DateTime, today: DateTime): DateTime => {
    const thisYear = projectBirthdayOntoYear(birthday, today.year);
    if (thisYear.toMillis() < today.toMillis()) {
        return projectBirthdayOntoYear(birthday, today.year + 1);
    }
    return thisYear;
};

const upcomingBirthdays = (
    entries: Iterable<[string, ContactRecord]>,
    daysAhead: number,
    today: DateTime = getTodayByUtcOffset(),
): UpcomingBirthday[] => {
    if (!Number.isInteger(daysAhead) || daysAhead < 0) {
        throw new ValidationError('Enter non-negative integer.');
    }

    const result: UpcomingBirthday[] = [];
    for (const [key, record] of entries) {
        const birthday = record.birthday;
        if (!birthday) {
            continue;
        }
        const date = getNextBirthday(birthday, today);
        const delta = Math.round(date.diff(today, 'days').days);
        if (delta >= 0 && delta <= daysAhead) {
            result.push({
                key,
                record,
                date,
                age: date.year - birthday.year,
            });
        }
    }

    // Array.prototype.sort is stable, equal dates keep store order
    return result.sort((a, b) => a.date.toMillis() - b.date.toMillis());
};

export {
    projectBirthdayOntoYear,
    getNextBirthday,
    upcomingBirthdays,
};
