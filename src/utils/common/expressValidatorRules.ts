import { body } from 'express-validator';

const bodyRequiredString = (field: string) => {
    return body(field).custom((value) => {
        if (typeof value !== 'string') {
            throw new Error(`${field} must be a string`);
        }
        return true;
    });
};

const bodyOptionalString = (field: string) => {
    return body(field).optional({ values: 'null' }).custom((value) => {
        if (typeof value !== 'string') {
            throw new Error(`${field} must be a string`);
        }
        return true;
    });
};

// a number or a digit string, as typed by the user
const bodyOptionalSelection = (field: string) => {
    return body(field).optional({ values: 'null' }).custom((value) => {
        if (typeof value !== 'number' && typeof value !== 'string') {
            throw new Error(`${field} must be a number`);
        }
        return true;
    });
};

export {
    bodyRequiredString,
    bodyOptionalString,
    bodyOptionalSelection,
};
