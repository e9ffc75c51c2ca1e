import type { ContactRecord } from './ContactRecord';

/**
 * The query is one literal substring, not a list of words:
 * case-insensitive against name, surname and contact notes, exact against phones.
 */
const contactMatchesQuery = (record: ContactRecord, query: string): boolean => {
    const queryLower = query.toLowerCase();
    return (
        record.name.toLowerCase().includes(queryLower) ||
        record.surname.toLowerCase().includes(queryLower) ||
        record.phones.some((phone) => phone.includes(query)) ||
        record.notes.some((note) => note.toLowerCase().includes(queryLower))
    );
};

const searchContacts = (
    entries: Iterable<[string, ContactRecord]>,
    query: string,
): Array<[string, ContactRecord]> => {
    const result: Array<[string, ContactRecord]> = [];
    for (const entry of entries) {
        if (contactMatchesQuery(entry[1], query)) {
            result.push(entry);
        }
    }
    return result;
};

export {
    contactMatchesQuery,
    searchContacts,
};
