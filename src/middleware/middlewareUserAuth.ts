import type { Request, Response, NextFunction } from 'express';

import {
    ModelUser
} from '../schema/schemaUser/SchemaUser.schema';
import {
    ModelUserDeviceList
} from '../schema/schemaUser/SchemaUserDeviceList.schema';
import { ModelUserApiKey } from '../schema/schemaUser/SchemaUserApiKey.schema';
import { getApiKeyByObject } from '../utils/llm/llmCommonFunc';

const middlewareUserAuth = async (req: Request, res: Response, next: NextFunction) => {
    try {
        const randomDeviceId = req.headers['authorization']?.split(' ')[1];
        if (!randomDeviceId) {
            return res.status(401).json({ message: 'No token provided' });
        }

        // the bearer token is the device id handed out at login
        const userDeviceList = await ModelUserDeviceList.findOne({ randomDeviceId });
        if (!userDeviceList) {
            return res.status(400).json({ message: 'Invalid device id' });
        }

        // logged out
        if (userDeviceList.isExpired) {
            return res.status(400).json({ message: 'Device list is expired' });
        }

        // a token replayed from another client ends that session
        if (userDeviceList.userAgent !== (req.headers['user-agent'] || '')) {
            await ModelUserDeviceList.updateOne({ randomDeviceId }, { isExpired: true });
            return res.status(400).json({ message: 'User agent is not match' });
        }

        const user = await ModelUser.findOne({ username: userDeviceList.username });
        if (!user) {
            return res.status(400).json({ message: 'User not found' });
        }

        // user context for the handlers
        res.locals.auth_username = user.username;
        if (typeof user.timeZoneUtcOffset === 'number') {
            res.locals.timeZoneUtcOffset = user.timeZoneUtcOffset;
        } else {
            res.locals.timeZoneUtcOffset = 0;
        }

        const resultApiKey = await ModelUserApiKey.findOne({
            username: user.username
        }).lean();
        res.locals.apiKey = getApiKeyByObject(resultApiKey);

        next();
    } catch (error) {
        console.error(error);
        return res.status(500).json({ message: 'Server error' });
    }
};

export default middlewareUserAuth;
