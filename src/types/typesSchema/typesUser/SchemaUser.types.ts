import type { Document } from 'mongoose';

// User Interface
interface IUser extends Document {
    username: string;
    password: string;

    // personal info
    name: string;
    email: string;

    // timezone
    timeZoneRegion: string;
    timeZoneUtcOffset: number;
}

export default IUser;
