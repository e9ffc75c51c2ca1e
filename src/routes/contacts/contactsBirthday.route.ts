import { Router, Request, Response } from 'express';
import { body } from 'express-validator';

import middlewareUserAuth from '../../middleware/middlewareUserAuth';
import middlewareExpressValidator from '../../middleware/middlewareExpressValidator';
import {
    bodyOptionalSelection,
    bodyRequiredString,
} from '../../utils/common/expressValidatorRules';
import { loadAddressBook, saveAddressBook } from '../../utils/persistence/bookPersistence';
import { selectionPrompt } from '../../utils/addressBook/keyResolver';
import { formatBirthday } from '../../utils/addressBook/fieldValidators';
import { upcomingBirthdays } from '../../utils/addressBook/upcomingBirthdays';
import { ValidationError } from '../../utils/addressBook/addressBookErrors';
import { getTodayByUtcOffset } from '../../utils/common/getTodayByUtcOffset';
import { contactToResponse, sendAddressBookError } from './utils/contactResponse';

// Router
const router = Router();

// "7" and 7 are both accepted, anything else is not a day count
const parseDaysAhead = (value: unknown): number => {
    if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
        return value;
    }
    if (typeof value === 'string' && /^[0-9]+$/.test(value.trim())) {
        return parseInt(value.trim(), 10);
    }
    throw new ValidationError('Enter non-negative integer.');
};

// Add birthday API
router.post(
    '/birthdayAdd',
    middlewareUserAuth,
    [
        bodyRequiredString('name'),
        bodyRequiredString('birthday'),
        bodyOptionalSelection('selection'),
    ],
    middlewareExpressValidator,
    async (req: Request, res: Response) => {
        try {
            const username = res.locals.auth_username;
            const addressBook = await loadAddressBook({ username });
            const { key, record } = addressBook.resolve(req.body.name, selectionPrompt(req.body.selection));

            record.setBirthday(req.body.birthday, getTodayByUtcOffset(res.locals.timeZoneUtcOffset));
            await saveAddressBook({ username, addressBook });

            return res.json({
                message: 'Birthday added.',
                doc: contactToResponse(key, record),
            });
        } catch (error) {
            return sendAddressBookError(res, error);
        }
    }
);

// Show birthday by exact name or surname API
router.post(
    '/birthdayShow',
    middlewareUserAuth,
    [
        bodyRequiredString('nameOrSurname'),
    ],
    middlewareExpressValidator,
    async (req: Request, res: Response) => {
        try {
            const addressBook = await loadAddressBook({ username: res.locals.auth_username });
            const matches = addressBook.findByNameOrSurname(req.body.nameOrSurname);

            const docs = matches.map(([key, record]) => ({
                key,
                fullName: record.fullName,
                birthday: record.birthday ? formatBirthday(record.birthday) : null,
            }));

            return res.json({
                message: 'Birthdays retrieved successfully',
                count: docs.length,
                docs,
            });
        } catch (error) {
            return sendAddressBookError(res, error);
        }
    }
);

// Upcoming birthdays API
router.post(
    '/birthdaysUpcoming',
    middlewareUserAuth,
    [
        body('days').exists().withMessage('days is required'),
    ],
    middlewareExpressValidator,
    async (req: Request, res: Response) => {
        try {
            const daysAhead = parseDaysAhead(req.body.days);
            const addressBook = await loadAddressBook({ username: res.locals.auth_username });
            const today = getTodayByUtcOffset(res.locals.timeZoneUtcOffset);

            const docs = upcomingBirthdays(addressBook.entries(), daysAhead, today)
                .map((item) => ({
                    date: formatBirthday(item.date),
                    age: item.age,
                    contact: contactToResponse(item.key, item.record),
                }));

            return res.json({
                message: docs.length >= 1 ? 'Upcoming birthdays retrieved successfully' : 'No birthdays in this period.',
                count: docs.length,
                docs,
            });
        } catch (error) {
            return sendAddressBookError(res, error);
        }
    }
);

export default router;
