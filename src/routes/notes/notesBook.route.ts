import { Router, Request, Response } from 'express';
import { body } from 'express-validator';

import middlewareUserAuth from '../../middleware/middlewareUserAuth';
import middlewareExpressValidator from '../../middleware/middlewareExpressValidator';
import { bodyRequiredString } from '../../utils/common/expressValidatorRules';
import { loadNoteBook, saveNoteBook } from '../../utils/persistence/bookPersistence';
import { parseTags } from '../../utils/noteBook/NoteBook';
import type { NoteMatch } from '../../utils/noteBook/NoteBook';
import type { GeneralNote } from '../../utils/noteBook/GeneralNote';
import { NoteSearchService } from '../../utils/noteBook/NoteSearchService';
import { createLlmChatCapability } from '../../utils/llm/llmChatCapability';
import { createSemanticNoteSearcher } from '../../utils/llm/semanticNoteSearch';
import { getTodayByUtcOffset } from '../../utils/common/getTodayByUtcOffset';
import { parsePosition } from '../../utils/common/parsePosition';
import { ValidationError } from '../../utils/addressBook/addressBookErrors';
import { sendAddressBookError } from '../contacts/utils/contactResponse';

// Router
const router = Router();

const bodyOptionalTags = (field: string) => {
    return body(field).optional({ values: 'null' }).custom((value) => {
        if (typeof value === 'string') {
            return true;
        }
        if (Array.isArray(value) && value.every((item) => typeof item === 'string')) {
            return true;
        }
        throw new Error(`${field} must be a string or an array of strings`);
    });
};

const readTags = (value: unknown): string[] => {
    if (typeof value === 'string') {
        return parseTags(value);
    }
    if (Array.isArray(value)) {
        return parseTags(value.filter((item): item is string => typeof item === 'string'));
    }
    return [];
};

const noteToResponse = (position: number, note: GeneralNote) => {
    return {
        position,
        text: note.text,
        tags: [...note.tags],
        createdAt: note.createdAt.toISODate(),
        display: `${position}. ${note.toString()}`,
    };
};

const matchesToResponse = (matches: NoteMatch[]) => {
    return matches.map((match) => noteToResponse(match.position, match.note));
};

// Add note API
router.post(
    '/noteAdd',
    middlewareUserAuth,
    [
        bodyRequiredString('text'),
        bodyOptionalTags('tags'),
    ],
    middlewareExpressValidator,
    async (req: Request, res: Response) => {
        try {
            const username = res.locals.auth_username;
            const noteBook = await loadNoteBook({ username });

            const note = noteBook.addNote(
                req.body.text,
                readTags(req.body.tags),
                getTodayByUtcOffset(res.locals.timeZoneUtcOffset),
            );
            await saveNoteBook({ username, noteBook });

            return res.status(201).json({
                message: 'Note saved.',
                doc: noteToResponse(noteBook.size, note),
            });
        } catch (error) {
            return sendAddressBookError(res, error);
        }
    }
);

// List notes API
router.post('/noteList', middlewareUserAuth, async (req: Request, res: Response) => {
    try {
        const noteBook = await loadNoteBook({ username: res.locals.auth_username });
        const docs = noteBook.list().map((note, index) => noteToResponse(index + 1, note));

        return res.json({
            message: docs.length >= 1 ? 'Notes retrieved successfully' : 'No notes.',
            count: docs.length,
            docs,
        });
    } catch (error) {
        return sendAddressBookError(res, error);
    }
});

// Add tags to a note by its 1-based position API
router.post(
    '/noteTagAdd',
    middlewareUserAuth,
    [
        body('position').exists().withMessage('position is required'),
        bodyOptionalTags('tags'),
    ],
    middlewareExpressValidator,
    async (req: Request, res: Response) => {
        try {
            const username = res.locals.auth_username;
            const noteBook = await loadNoteBook({ username });

            const position = parsePosition(req.body.position);

            const note = noteBook.addTags(position, readTags(req.body.tags));
            await saveNoteBook({ username, noteBook });

            return res.json({
                message: 'Tags added.',
                doc: noteToResponse(position, note),
            });
        } catch (error) {
            return sendAddressBookError(res, error);
        }
    }
);

// Search notes by exact tag API
router.post(
    '/noteSearchTag',
    middlewareUserAuth,
    [
        bodyRequiredString('tag'),
    ],
    middlewareExpressValidator,
    async (req: Request, res: Response) => {
        try {
            const noteBook = await loadNoteBook({ username: res.locals.auth_username });
            const docs = matchesToResponse(noteBook.searchByTag(req.body.tag));

            return res.json({
                message: docs.length >= 1 ? 'Notes retrieved successfully' : `No notes with tag '${req.body.tag}'.`,
                count: docs.length,
                docs,
            });
        } catch (error) {
            return sendAddressBookError(res, error);
        }
    }
);

// Search notes by keyword, then by meaning API
router.post(
    '/noteSearch',
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
            const noteBook = await loadNoteBook({ username: res.locals.auth_username });

            const llm = createLlmChatCapability(res.locals.apiKey);
            const noteSearchService = new NoteSearchService(createSemanticNoteSearcher(llm));
            const result = await noteSearchService.search(noteBook, req.body.query);

            if (result.method === 'empty') {
                return res.json({ message: 'No notes to search.', method: result.method, count: 0, docs: [] });
            }
            if (result.method === 'disabled') {
                return res.json({ message: 'AI search disabled (no API key).', method: result.method, count: 0, docs: [] });
            }

            const docs = matchesToResponse(result.matches);
            let message = 'Keyword match';
            if (result.method === 'semantic') {
                message = docs.length >= 1 ? 'Semantic match' : 'No semantic matches.';
            }
            return res.json({
                message,
                method: result.method,
                count: docs.length,
                docs,
            });
        } catch (error) {
            return sendAddressBookError(res, error);
        }
    }
);

export default router;
