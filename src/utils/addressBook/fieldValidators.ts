import { DateTime } from 'luxon';

import { ValidationError } from './addressBookErrors';
import { getTodayByUtcOffset } from '../common/getTodayByUtcOffset';

const EMAIL_REGEX = /^[^@]+@[^@]+\.[^@]+$/;
const PHONE_REGEX = /^[0-9]{10}$/;

export const BIRTHDAY_FORMAT = 'dd.MM.yyyy';

const validateName = (value: string): string => {
    const name = value.trim();
    if (name.length === 0) {
        throw new ValidationError('Name cannot be empty.');
    }
    return name;
};

const validatePhone = (value: string): string => {
    if (!PHONE_REGEX.test(value)) {
        throw new ValidationError('Phone must contain exactly 10 digits.');
    }
    return value;
};

// empty string means "unset"
const validateEmail = (value: string): string => {
    const email = value.trim();
    if (email.length >= 1 && !EMAIL_REGEX.test(email)) {
        throw new ValidationError('Invalid e-mail format.');
    }
    return email;
};

const validateBirthday = (
    value: string,
    today: DateTime = getTodayByUtcOffset(),
): DateTime => {
    const birthday = DateTime.fromFormat(value.trim(), BIRTHDAY_FORMAT, { zone: 'utc' });
    if (!birthday.isValid) {
        throw new ValidationError('Date must be DD.MM.YYYY');
    }
    if (birthday.toMillis() > today.toMillis()) {
        throw new ValidationError('Birthday cannot be in the future.');
    }
    return birthday;
};

const formatBirthday = (birthday: DateTime): string => {
    return birthday.toFormat(BIRTHDAY_FORMAT);
};

export {
    validateName,
    validatePhone,
    validateEmail,
    validateBirthday,
    formatBirthday,
};
