import { Router, Request, Response } from 'express';

import middlewareUserAuth from '../../middleware/middlewareUserAuth';
import middlewareExpressValidator from '../../middleware/middlewareExpressValidator';
import { ModelUserApiKey } from '../../schema/schemaUser/SchemaUserApiKey.schema';
import { bodyRequiredString } from '../../utils/common/expressValidatorRules';
import { fetchLlmUnified } from '../../utils/llm/fetchLlmUnified';
import envKeys from '../../config/envKeys';
import type { LlmProvider } from '../../utils/llm/fetchLlmUnified';

// Router
const router = Router();

// a key is valid when the provider answers a one-line prompt with it
const isApiKeyValid = async ({
    apiKey,
    provider,
}: {
    apiKey: string;
    provider: LlmProvider;
}): Promise<boolean> => {
    if (apiKey === '') {
        return false;
    }
    const result = await fetchLlmUnified({
        provider,
        apiKey,
        apiEndpoint: '',
        model: provider === 'openrouter' ? envKeys.LLM_MODEL_OPENROUTER : envKeys.LLM_MODEL_GROQ,
        messages: [
            {
                role: 'user',
                content: 'About artificial intelligence.',
            }
        ],
        maxTokens: 100,
    });
    return result.success;
};

// Get api key status API
router.post('/apiKeyGet', middlewareUserAuth, async (req: Request, res: Response) => {
    const apiKey = res.locals.apiKey;
    return res.json({
        message: 'Api keys retrieved successfully',
        doc: {
            apiKeyGroqValid: apiKey.apiKeyGroqValid,
            apiKeyOpenrouterValid: apiKey.apiKeyOpenrouterValid,
        },
    });
});

// Update api key API
router.post(
    '/apiKeyUpdate',
    middlewareUserAuth,
    [
        bodyRequiredString('provider'),
        bodyRequiredString('apiKey'),
    ],
    middlewareExpressValidator,
    async (req: Request, res: Response) => {
        try {
            const provider: unknown = req.body.provider;
            if (provider !== 'groq' && provider !== 'openrouter') {
                return res.status(400).json({ message: 'Invalid provider' });
            }

            const apiKey = String(req.body.apiKey);
            const apiKeyValid = await isApiKeyValid({ apiKey, provider });
            if (!apiKeyValid) {
                return res.status(400).json({ message: 'Invalid API Key' });
            }

            const update = provider === 'groq'
                ? { apiKeyGroq: apiKey, apiKeyGroqValid: true }
                : { apiKeyOpenrouter: apiKey, apiKeyOpenrouterValid: true };

            await ModelUserApiKey.findOneAndUpdate(
                {
                    username: res.locals.auth_username
                },
                update,
                {
                    upsert: true,
                    new: true
                }
            );

            return res.json({
                success: 'Updated',
                error: '',
            });
        } catch (error) {
            console.error(error);
            return res.status(500).json({ message: 'Server error' });
        }
    }
);

export default router;
