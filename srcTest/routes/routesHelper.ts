import type { Server } from 'http';
import axios from 'axios';
import type { AxiosResponse } from 'axios';
import type { Express } from 'express';

export interface TestServer {
    post: (path: string, body?: object, headers?: Record<string, string>) => Promise<AxiosResponse>;
    close: () => Promise<void>;
}

// binds the app to a free local port for the duration of a test file
export const startTestServer = async (app: Express): Promise<TestServer> => {
    const server = await new Promise<Server>((resolve) => {
        const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    const port = address !== null && typeof address === 'object' ? address.port : 0;
    const baseUrl = `http://127.0.0.1:${port}/api`;

    return {
        post: async (path, body = {}, headers = {}) => {
            return axios.post(`${baseUrl}${path}`, body, {
                headers,
                validateStatus: () => true,
            });
        },
        close: () => new Promise<void>((resolve, reject) => {
            server.close((error) => (error ? reject(error) : resolve()));
        }),
    };
};
