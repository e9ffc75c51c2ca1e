import { Router, Request, Response } from 'express';
import { body } from 'express-validator';

import middlewareUserAuth from '../../middleware/middlewareUserAuth';
import middlewareExpressValidator from '../../middleware/middlewareExpressValidator';
import {
    bodyOptionalSelection,
    bodyOptionalString,
    bodyRequiredString,
} from '../../utils/common/expressValidatorRules';
import { loadAddressBook, saveAddressBook } from '../../utils/persistence/bookPersistence';
import { selectionPrompt } from '../../utils/addressBook/keyResolver';
import { searchContacts } from '../../utils/addressBook/searchContacts';
import { ValidationError } from '../../utils/addressBook/addressBookErrors';
import { parsePosition } from '../../utils/common/parsePosition';
import { contactToResponse, sendAddressBookError } from './utils/contactResponse';

// Router
const router = Router();

// Add or update contact API
router.post(
    '/contactAddOrUpdate',
    middlewareUserAuth,
    [
        bodyRequiredString('name'),
        bodyOptionalString('surname'),
        bodyOptionalString('phone'),
        bodyOptionalString('email'),
        bodyOptionalString('address'),
    ],
    middlewareExpressValidator,
    async (req: Request, res: Response) => {
        try {
            const username = res.locals.auth_username;
            const addressBook = await loadAddressBook({ username });

            const result = addressBook.addOrUpdate({
                name: req.body.name,
                surname: req.body.surname,
                phone: req.body.phone,
                email: req.body.email,
                address: req.body.address,
            });

            await saveAddressBook({ username, addressBook });

            return res.status(result.created ? 201 : 200).json({
                message: result.created ? 'Contact added.' : 'Contact updated.',
                created: result.created,
                doc: contactToResponse(result.key, result.record),
            });
        } catch (error) {
            return sendAddressBookError(res, error);
        }
    }
);

// Get one contact API
router.post(
    '/contactGet',
    middlewareUserAuth,
    [
        bodyRequiredString('name'),
        bodyOptionalSelection('selection'),
    ],
    middlewareExpressValidator,
    async (req: Request, res: Response) => {
        try {
            const addressBook = await loadAddressBook({ username: res.locals.auth_username });
            const { key, record } = addressBook.resolve(req.body.name, selectionPrompt(req.body.selection));

            return res.json({
                message: 'Contact retrieved successfully',
                doc: contactToResponse(key, record),
            });
        } catch (error) {
            return sendAddressBookError(res, error);
        }
    }
);

// List all contacts API
router.post('/contactList', middlewareUserAuth, async (req: Request, res: Response) => {
    try {
        const addressBook = await loadAddressBook({ username: res.locals.auth_username });
        const docs = addressBook.entries().map(([key, record]) => contactToResponse(key, record));

        return res.json({
            message: docs.length >= 1 ? 'Contacts retrieved successfully' : 'No contacts.',
            count: docs.length,
            docs,
        });
    } catch (error) {
        return sendAddressBookError(res, error);
    }
});

// Delete contact API
router.post(
    '/contactDelete',
    middlewareUserAuth,
    [
        bodyRequiredString('name'),
        bodyOptionalSelection('selection'),
    ],
    middlewareExpressValidator,
    async (req: Request, res: Response) => {
        try {
            const username = res.locals.auth_username;
            const addressBook = await loadAddressBook({ username });
            const key = addressBook.delete(req.body.name, selectionPrompt(req.body.selection));
            await saveAddressBook({ username, addressBook });

            return res.json({
                message: 'Contact deleted.',
                key,
            });
        } catch (error) {
            return sendAddressBookError(res, error);
        }
    }
);

// Get phones API
router.post(
    '/contactPhoneGet',
    middlewareUserAuth,
    [
        bodyRequiredString('name'),
        bodyOptionalSelection('selection'),
    ],
    middlewareExpressValidator,
    async (req: Request, res: Response) => {
        try {
            const addressBook = await loadAddressBook({ username: res.locals.auth_username });
            const record = addressBook.find(req.body.name, selectionPrompt(req.body.selection));
            const phones = [...record.phones];

            return res.json({
                message: phones.length >= 1 ? phones.join(', ') : 'No phones.',
                phones,
            });
        } catch (error) {
            return sendAddressBookError(res, error);
        }
    }
);

// Remove phone API
router.post(
    '/contactPhoneRemove',
    middlewareUserAuth,
    [
        bodyRequiredString('name'),
        bodyRequiredString('phone'),
        bodyOptionalSelection('selection'),
    ],
    middlewareExpressValidator,
    async (req: Request, res: Response) => {
        try {
            const username = res.locals.auth_username;
            const addressBook = await loadAddressBook({ username });
            const { key, record } = addressBook.resolve(req.body.name, selectionPrompt(req.body.selection));

            record.removePhone(req.body.phone);
            await saveAddressBook({ username, addressBook });

            return res.json({
                message: 'Phone removed.',
                doc: contactToResponse(key, record),
            });
        } catch (error) {
            return sendAddressBookError(res, error);
        }
    }
);

// Replace all phones with one API
router.post(
    '/contactPhoneChange',
    middlewareUserAuth,
    [
        bodyRequiredString('name'),
        bodyRequiredString('phone'),
        bodyOptionalSelection('selection'),
    ],
    middlewareExpressValidator,
    async (req: Request, res: Response) => {
        try {
            const username = res.locals.auth_username;
            const addressBook = await loadAddressBook({ username });
            const { key, record } = addressBook.resolve(req.body.name, selectionPrompt(req.body.selection));

            record.replacePhones(req.body.phone);
            await saveAddressBook({ username, addressBook });

            return res.json({
                message: 'Phone updated.',
                doc: contactToResponse(key, record),
            });
        } catch (error) {
            return sendAddressBookError(res, error);
        }
    }
);

// Edit one phone by its 1-based position API
router.post(
    '/contactPhoneEdit',
    middlewareUserAuth,
    [
        bodyRequiredString('name'),
        body('position').exists().withMessage('position is required'),
        bodyRequiredString('phone'),
        bodyOptionalSelection('selection'),
    ],
    middlewareExpressValidator,
    async (req: Request, res: Response) => {
        try {
            const username = res.locals.auth_username;
            const addressBook = await loadAddressBook({ username });
            const { key, record } = addressBook.resolve(req.body.name, selectionPrompt(req.body.selection));

            const position = parsePosition(req.body.position);
            record.editPhone(position - 1, req.body.phone);
            await saveAddressBook({ username, addressBook });

            return res.json({
                message: 'Phone updated.',
                doc: contactToResponse(key, record),
            });
        } catch (error) {
            return sendAddressBookError(res, error);
        }
    }
);

// Change email API
router.post(
    '/contactEmailChange',
    middlewareUserAuth,
    [
        bodyRequiredString('name'),
        bodyRequiredString('email'),
        bodyOptionalSelection('selection'),
    ],
    middlewareExpressValidator,
    async (req: Request, res: Response) => {
        try {
            const username = res.locals.auth_username;
            const addressBook = await loadAddressBook({ username });
            const { key, record } = addressBook.resolve(req.body.name, selectionPrompt(req.body.selection));

            record.updateEmail(req.body.email);
            await saveAddressBook({ username, addressBook });

            return res.json({
                message: 'Email updated.',
                doc: contactToResponse(key, record),
            });
        } catch (error) {
            return sendAddressBookError(res, error);
        }
    }
);

// Change address API
router.post(
    '/contactAddressChange',
    middlewareUserAuth,
    [
        bodyRequiredString('name'),
        bodyRequiredString('address'),
        bodyOptionalSelection('selection'),
    ],
    middlewareExpressValidator,
    async (req: Request, res: Response) => {
        try {
            const username = res.locals.auth_username;
            const addressBook = await loadAddressBook({ username });
            const { key, record } = addressBook.resolve(req.body.name, selectionPrompt(req.body.selection));

            record.updateAddress(req.body.address);
            await saveAddressBook({ username, addressBook });

            return res.json({
                message: 'Address updated.',
                doc: contactToResponse(key, record),
            });
        } catch (error) {
            return sendAddressBookError(res, error);
        }
    }
);

// Add contact note API
router.post(
    '/contactNoteAdd',
    middlewareUserAuth,
    [
        bodyRequiredString('name'),
        bodyRequiredString('note'),
        bodyOptionalSelection('selection'),
    ],
    middlewareExpressValidator,
    async (req: Request, res: Response) => {
        try {
            const username = res.locals.auth_username;
            const addressBook = await loadAddressBook({ username });
            const { key, record } = addressBook.resolve(req.body.name, selectionPrompt(req.body.selection));

            record.addNote(req.body.note);
            await saveAddressBook({ username, addressBook });

            return res.json({
                message: 'Note added.',
                doc: contactToResponse(key, record),
            });
        } catch (error) {
            return sendAddressBookError(res, error);
        }
    }
);

// Search contacts API
router.post(
    '/contactSearch',
    middlewareUserAuth,
    [
        bodyRequiredString('query'),
    ],
    middlewareExpressValidator,
    async (req: Request, res: Response) => {
        try {
            if (String(req.body.query).trim().length === 0) {
                throw new ValidationError('Enter a search query.');
            }
            const addressBook = await loadAddressBook({ username: res.locals.auth_username });
            const docs = searchContacts(addressBook.entries(), req.body.query)
                .map(([key, record]) => contactToResponse(key, record));

            return res.json({
                message: docs.length >= 1 ? 'Contacts retrieved successfully' : 'No contacts.',
                count: docs.length,
                docs,
            });
        } catch (error) {
            return sendAddressBookError(res, error);
        }
    }
);

export default router;
