export type AddressBookErrorKind =
    'validation' |
    'notFound' |
    'ambiguousSelection' |
    'duplicateState';

/**
 * Base class for every recoverable address book / note book failure.
 * Routes render these as a message with `httpStatus`; the book is left unchanged.
 */
export class AddressBookError extends Error {
    readonly kind: AddressBookErrorKind;
    readonly httpStatus: number;

    constructor(kind: AddressBookErrorKind, message: string, httpStatus: number) {
        super(message);
        this.name = new.target.name;
        this.kind = kind;
        this.httpStatus = httpStatus;
    }
}

export class ValidationError extends AddressBookError {
    constructor(message: string) {
        super('validation', message, 400);
    }
}

export class NotFoundError extends AddressBookError {
    constructor(message = 'Contact not found.') {
        super('notFound', message, 404);
    }
}

export class AmbiguousSelectionError extends AddressBookError {
    readonly candidates: string[];

    constructor(candidates: string[], message = 'Multiple contacts match, select one by number.') {
        super('ambiguousSelection', message, 409);
        this.candidates = candidates;
    }
}

export class DuplicateStateError extends AddressBookError {
    constructor(message: string) {
        super('duplicateState', message, 409);
    }
}

export const isAddressBookError = (error: unknown): error is AddressBookError => {
    return error instanceof AddressBookError;
};
