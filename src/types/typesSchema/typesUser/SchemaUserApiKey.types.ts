import type { Document } from 'mongoose';

interface IUserApiKey extends Document {
    username: string;

    // apikey - groq
    apiKeyGroqValid: boolean;
    apiKeyGroq: string;

    // apikey - openrouter
    apiKeyOpenrouterValid: boolean;
    apiKeyOpenrouter: string;
}

export default IUserApiKey;
