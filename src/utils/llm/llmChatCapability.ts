import envKeys from '../../config/envKeys';
import { fetchLlmText } from './fetchLlmUnified';
import type { LlmProvider, Message } from './fetchLlmUnified';
import type { tsUserApiKey } from './llmCommonFunc';

export interface LlmChatParams {
    messages: Message[];
    temperature?: number;
    maxTokens?: number;
    topP?: number;
}

/**
 * Optional chat capability handed to the command-correction and semantic
 * search call sites. `null` wherever a user has no usable key.
 */
export interface LlmChatCapability {
    provider: LlmProvider;
    model: string;
    chat: (params: LlmChatParams) => Promise<string>;
}

const createLlmChatCapability = (apiKey: tsUserApiKey): LlmChatCapability | null => {
    let provider: LlmProvider;
    let providerApiKey: string;
    let model: string;

    if (apiKey.apiKeyOpenrouterValid && apiKey.apiKeyOpenrouter) {
        provider = 'openrouter';
        providerApiKey = apiKey.apiKeyOpenrouter;
        model = envKeys.LLM_MODEL_OPENROUTER;
    } else if (apiKey.apiKeyGroqValid && apiKey.apiKeyGroq) {
        provider = 'groq';
        providerApiKey = apiKey.apiKeyGroq;
        model = envKeys.LLM_MODEL_GROQ;
    } else {
        return null;
    }

    return {
        provider,
        model,
        chat: (params) => fetchLlmText({
            provider,
            apiKey: providerApiKey,
            apiEndpoint: '',
            model,
            messages: params.messages,
            temperature: params.temperature,
            maxTokens: params.maxTokens,
            topP: params.topP,
        }),
    };
};

export {
    createLlmChatCapability,
};
