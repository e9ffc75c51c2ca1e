import envKeys from '../../config/envKeys';

export interface tsUserApiKey {
    // api key groq
    apiKeyGroqValid: boolean;
    apiKeyGroq: string;

    // api key openrouter
    apiKeyOpenrouterValid: boolean;
    apiKeyOpenrouter: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
    return typeof value === 'object' && value !== null;
};

export const getApiKeyByObject = (apiKeyObject: unknown): tsUserApiKey => {
    const apiKey: tsUserApiKey = {
        // api key groq
        apiKeyGroqValid: false,
        apiKeyGroq: '',

        // api key openrouter
        apiKeyOpenrouterValid: false,
        apiKeyOpenrouter: '',
    };

    if (isRecord(apiKeyObject)) {
        // api key groq
        if (apiKeyObject.apiKeyGroqValid === true) {
            apiKey.apiKeyGroqValid = true;
        }
        if (typeof apiKeyObject.apiKeyGroq === 'string') {
            apiKey.apiKeyGroq = apiKeyObject.apiKeyGroq;
        }

        // api key openrouter
        if (apiKeyObject.apiKeyOpenrouterValid === true) {
            apiKey.apiKeyOpenrouterValid = true;
        }
        if (typeof apiKeyObject.apiKeyOpenrouter === 'string') {
            apiKey.apiKeyOpenrouter = apiKeyObject.apiKeyOpenrouter;
        }
    }

    // server default keys
    if (envKeys.DEFAULT_ENV_ENABLED === 'yes') {
        if (!apiKey.apiKeyOpenrouterValid && envKeys.DEFAULT_ENV_OPEN_ROUTER_KEY) {
            apiKey.apiKeyOpenrouterValid = true;
            apiKey.apiKeyOpenrouter = envKeys.DEFAULT_ENV_OPEN_ROUTER_KEY;
        }
        if (!apiKey.apiKeyGroqValid && envKeys.DEFAULT_ENV_GROQ_API_KEY) {
            apiKey.apiKeyGroqValid = true;
            apiKey.apiKeyGroq = envKeys.DEFAULT_ENV_GROQ_API_KEY;
        }
    }

    return apiKey;
};
