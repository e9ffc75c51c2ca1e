import { DateTime } from 'luxon';

/**
 * Calendar date of "today" for a user, as a UTC midnight DateTime.
 * The offset is in minutes, as stored on the user (timeZoneUtcOffset).
 */
const getTodayByUtcOffset = (timeZoneUtcOffset = 0): DateTime => {
    const userNow = DateTime.utc().plus({ minutes: timeZoneUtcOffset });
    return DateTime.utc(userNow.year, userNow.month, userNow.day);
};

export {
    getTodayByUtcOffset,
};
