import { Router, Request, Response } from 'express';
import bcrypt from 'bcrypt';
import crypto from 'crypto';

import {
    ModelUser
} from '../../schema/schemaUser/SchemaUser.schema';
import {
    ModelUserDeviceList
} from '../../schema/schemaUser/SchemaUserDeviceList.schema';
import { ModelUserApiKey } from '../../schema/schemaUser/SchemaUserApiKey.schema';
import middlewareExpressValidator from '../../middleware/middlewareExpressValidator';
import { middlewareActionDatetime } from '../../middleware/middlewareActionDatetime';
import { bodyRequiredString } from '../../utils/common/expressValidatorRules';

// Router
const router = Router();

// Login API
router.post(
    '/login',
    [
        bodyRequiredString('username'),
        bodyRequiredString('password'),
    ],
    middlewareExpressValidator,
    middlewareActionDatetime,
    async (req: Request, res: Response) => {
        const { username, password } = req.body;

        try {
            const actionDatetimeObj = res.locals.actionDatetime;

            // Find user by username
            const user = await ModelUser.findOne({ username: username.toLowerCase() }).select('+password');
            if (!user) {
                return res.status(400).json({ message: 'Invalid username or password' });
            }

            // Check password
            const isMatch = await bcrypt.compare(password, user.password);
            if (!isMatch) {
                return res.status(400).json({ message: 'Invalid username or password' });
            }

            // Generate random device id
            const randomDeviceId = crypto.randomBytes(64).toString('hex');

            // Save user device list
            await ModelUserDeviceList.create({
                username: user.username,
                randomDeviceId,
                isExpired: false,

                userAgent: actionDatetimeObj.createdAtUserAgent,
                createdAt: actionDatetimeObj.createdAtUtc,
                createdAtIpAddress: actionDatetimeObj.createdAtIpAddress,
                updatedAt: actionDatetimeObj.updatedAtUtc,
                updatedAtIpAddress: actionDatetimeObj.updatedAtIpAddress,
            });

            // cookie
            res.cookie(
                'randomDeviceId',
                randomDeviceId,
                {
                    httpOnly: true,
                    secure: true,
                    sameSite: 'none',
                    path: '/',
                    maxAge: 1000 * 60 * 60 * 24 * 30, // 30 days
                }
            );

            return res.json({
                message: `Hello, ${user.username}, glad to see you again!`,
                randomDeviceId,
            });
        } catch (error) {
            console.error(error);
            return res.status(500).json({ message: 'Server error' });
        }
    }
);

// Register API
router.post(
    '/register',
    [
        bodyRequiredString('username'),
        bodyRequiredString('password'),
    ],
    middlewareExpressValidator,
    async (req: Request, res: Response) => {
        const username = String(req.body.username).trim().toLowerCase();
        const password = String(req.body.password);

        try {
            if (username.length === 0 || password.length === 0) {
                return res.status(400).json({ message: 'Username and password are required' });
            }

            // Check if the user already exists
            const existingUser = await ModelUser.findOne({ username });
            if (existingUser) {
                return res.status(400).json({ message: `User ${username} already registered.` });
            }

            // Hash the password
            const hashedPassword = await bcrypt.hash(password, 10);

            // Save the user to the database
            const newUser = await ModelUser.create({
                username,
                password: hashedPassword,
            });
            await ModelUserApiKey.create({
                username,
            });

            return res.status(201).json({
                message: 'User registered successfully',
                data: {
                    user: {
                        username: newUser.username,
                    },
                }
            });
        } catch (error) {
            console.error(error);
            return res.status(500).json({ message: 'Server error' });
        }
    }
);

// Logout API
router.post('/logout', async (req: Request, res: Response) => {
    const randomDeviceId = req.cookies?.randomDeviceId;

    try {
        if (typeof randomDeviceId === 'string') {
            await ModelUserDeviceList.findOneAndUpdate(
                { randomDeviceId },
                { isExpired: true },
                { new: true }
            );
        }

        // Clear cookie
        res.clearCookie('randomDeviceId');

        return res.json({ message: 'Logged out successfully' });
    } catch (error) {
        console.error(error);
        return res.status(500).json({ message: 'Server error' });
    }
});

export default router;
