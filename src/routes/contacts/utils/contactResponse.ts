import type { Response } from 'express';

import type { ContactRecord } from '../../../utils/addressBook/ContactRecord';
import { formatBirthday } from '../../../utils/addressBook/fieldValidators';
import { isAddressBookError, AmbiguousSelectionError } from '../../../utils/addressBook/addressBookErrors';

export interface ContactResponse {
    key: string;
    name: string;
    surname: string;
    fullName: string;
    phones: string[];
    email: string;
    address: string;
    birthday: string | null;
    notes: string[];
}

export interface CandidateResponse {
    index: number;
    key: string;
    title: string;
}

// "john smith" -> "John Smith"
const titleCaseKey = (key: string): string => {
    return key
        .split(' ')
        .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
        .join(' ');
};

const contactToResponse = (key: string, record: ContactRecord): ContactResponse => {
    return {
        key,
        name: record.name,
        surname: record.surname,
        fullName: record.fullName,
        phones: [...record.phones],
        email: record.email,
        address: record.address,
        birthday: record.birthday ? formatBirthday(record.birthday) : null,
        notes: [...record.notes],
    };
};

const candidatesToResponse = (candidates: readonly string[]): CandidateResponse[] => {
    return candidates.map((key, index) => ({
        index: index + 1,
        key,
        title: titleCaseKey(key),
    }));
};

/**
 * Renders address book failures with their status; anything else is a 500.
 */
const sendAddressBookError = (res: Response, error: unknown) => {
    if (error instanceof AmbiguousSelectionError) {
        return res.status(error.httpStatus).json({
            message: error.message,
            candidates: candidatesToResponse(error.candidates),
        });
    }
    if (isAddressBookError(error)) {
        return res.status(error.httpStatus).json({ message: error.message });
    }
    console.error(error);
    return res.status(500).json({ message: 'Server error' });
};

export {
    contactToResponse,
    sendAddressBookError,
};
