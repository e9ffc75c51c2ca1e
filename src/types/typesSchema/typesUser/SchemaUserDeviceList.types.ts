import type { Document } from 'mongoose';

// UserDeviceList Interface
interface IUserDeviceList extends Document {
    username: string;
    randomDeviceId: string;
    isExpired: boolean;

    // auto
    userAgent: string;
    createdAt: Date;
    createdAtIpAddress: string;
    updatedAt: Date;
    updatedAtIpAddress: string;
}

export default IUserDeviceList;
