import express, { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';
import cors from 'cors';
import cookieParser from 'cookie-parser';

import routesAll from './routes/routesAll';
import envKeys from './config/envKeys';

const app = express();
app.use(express.json({
    limit: '1mb',
}));
app.use(cookieParser());

app.use(cors({
    origin: [
        'http://localhost:3000',
        'localhost:3000',
        envKeys.FRONTEND_CLIENT_URL,
        `https://${envKeys.FRONTEND_CLIENT_URL}`,
        envKeys.API_URL,
        `https://${envKeys.API_URL}`,
    ],
    methods: 'GET,POST,PUT,DELETE',
    allowedHeaders: ['Content-Type', 'Set-Cookie'],
    credentials: true,
}));

// set Bearer token from cookie
app.use((req: Request, res: Response, next: NextFunction) => {
    // randomDeviceId
    if (typeof req?.cookies?.randomDeviceId === 'string') {
        req.headers.authorization = `Bearer ${req.cookies.randomDeviceId}`;
    }
    next();
});

// Use morgan to log requests
if (envKeys.CUSTOM_NODE_ENV !== 'prod') {
    app.use(morgan('dev'));
} else {
    app.use(morgan('combined'));
}

app.use('/api', routesAll);

export default app;
