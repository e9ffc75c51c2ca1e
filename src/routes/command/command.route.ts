import { Router, Request, Response } from 'express';
import { body } from 'express-validator';

import middlewareUserAuth from '../../middleware/middlewareUserAuth';
import middlewareExpressValidator from '../../middleware/middlewareExpressValidator';
import { bodyRequiredString } from '../../utils/common/expressValidatorRules';
import { getCommandsBySection, isCommandSection } from '../../utils/commandCatalog/commandCatalog';
import { createLlmChatCapability } from '../../utils/llm/llmChatCapability';
import { suggestCommandCorrection } from '../../utils/llm/suggestCommandCorrection';

// Router
const router = Router();

const bodySection = () => {
    return body('section').custom((value) => {
        if (!isCommandSection(value)) {
            throw new Error('section must be contacts or notes');
        }
        return true;
    });
};

// Help API
router.post(
    '/commandHelp',
    middlewareUserAuth,
    [
        bodySection(),
    ],
    middlewareExpressValidator,
    async (req: Request, res: Response) => {
        const commands = getCommandsBySection(req.body.section);
        return res.json({
            message: 'Commands retrieved successfully',
            count: commands.length,
            docs: commands,
        });
    }
);

// Suggest the command a mistyped input meant API
router.post(
    '/commandSuggest',
    middlewareUserAuth,
    [
        bodySection(),
        bodyRequiredString('input'),
    ],
    middlewareExpressValidator,
    async (req: Request, res: Response) => {
        try {
            const commands = getCommandsBySection(req.body.section);
            const commandNames = commands.map((item) => item.command);
            const input = String(req.body.input).trim();

            const firstWord = input.split(/\s+/)[0] ?? '';
            if (commandNames.includes(firstWord)) {
                return res.json({
                    message: 'Command recognized',
                    method: 'exact',
                    suggestion: commands.find((item) => item.command === firstWord) ?? null,
                });
            }

            const llm = createLlmChatCapability(res.locals.apiKey);
            if (!llm) {
                return res.json({
                    message: 'Unknown command.',
                    method: 'disabled',
                    suggestion: null,
                });
            }

            const suggestion = await suggestCommandCorrection({
                input,
                commands: commandNames,
                llm,
            });
            return res.json({
                message: suggestion ? `Did you mean '${suggestion}'?` : 'Unknown command.',
                method: 'llm',
                suggestion: commands.find((item) => item.command === suggestion) ?? null,
            });
        } catch (error) {
            console.error(error);
            return res.status(500).json({ message: 'Server error' });
        }
    }
);

export default router;
