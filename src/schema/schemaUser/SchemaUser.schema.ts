import mongoose, { Schema } from 'mongoose';
import type IUser from '../../types/typesSchema/typesUser/SchemaUser.types';

// User Schema
const userSchema = new Schema<IUser>({
    username: { type: String, required: true, unique: true, lowercase: true },
    password: {
        type: String,
        required: true,
        select: false,
    },

    // personal info
    name: {
        type: String,
        default: ''
    },
    email: {
        type: String,
        default: ''
    },

    // Time Zone
    timeZoneRegion: {
        type: String,
        default: 'UTC',
    },
    timeZoneUtcOffset: {
        type: Number,
        default: 0,
        // in minutes
    },
});

// User Model
const ModelUser = mongoose.model<IUser>('user', userSchema, 'user');

export {
    ModelUser
};
