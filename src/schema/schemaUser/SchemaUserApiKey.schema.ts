import mongoose, { Schema } from 'mongoose';
import type IUserApiKey from '../../types/typesSchema/typesUser/SchemaUserApiKey.types';

// User api key schema
const userApiKeySchema = new Schema<IUserApiKey>({
    username: { type: String, required: true, unique: true, lowercase: true },

    // apikey - groq
    apiKeyGroqValid: { type: Boolean, default: false },
    apiKeyGroq: { type: String, default: '' },

    // apikey - openrouter
    apiKeyOpenrouterValid: { type: Boolean, default: false },
    apiKeyOpenrouter: { type: String, default: '' },
});

// User api key model
const ModelUserApiKey = mongoose.model<IUserApiKey>(
    'userApiKey',
    userApiKeySchema,
    'userApiKey'
);

export {
    ModelUserApiKey
};
