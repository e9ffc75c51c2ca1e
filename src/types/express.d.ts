// src/types/express.d.ts
import type { tsUserApiKey } from '../utils/llm/llmCommonFunc';
import type { ActionDatetime } from '../middleware/middlewareActionDatetime';

declare global {
    namespace Express {
        interface Locals {
            auth_username: string;
            timeZoneUtcOffset: number;
            apiKey: tsUserApiKey;
            actionDatetime: ActionDatetime;
        }
    }
}

export {};
