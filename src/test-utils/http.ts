// src/test-utils/http.ts

import { Express } from 'express';
import http from 'http';

export interface TestServer {
    baseUrl: string;
    close(): Promise<void>;
}

export interface JsonResponse {
    status: number;
    body: unknown;
}

/**
 * Listen on an ephemeral loopback port inside the test process
 */
export async function startTestServer(app: Express): Promise<TestServer> {
    const server = http.createServer(app);
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));

    const address = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error('test server has no TCP address');
    }

    return {
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () =>
            new Promise<void>((resolve, reject) => {
                server.closeAllConnections();
                server.close(err => (err ? reject(err) : resolve()));
            })
    };
}

export async function getJson(server: TestServer, path: string): Promise<JsonResponse> {
    const res = await fetch(`${server.baseUrl}${path}`);
    return { status: res.status, body: await res.json() };
}

export async function postJson(server: TestServer, path: string, body: unknown = {}): Promise<JsonResponse> {
    const res = await fetch(`${server.baseUrl}${path}`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(body)
    });
    return { status: res.status, body: await res.json() };
}

/**
 * Read a string property from a JSON body, failing the test when absent
 */
export function readString(body: unknown, key: string): string {
    if (typeof body === 'object' && body !== null && key in body) {
        const value: unknown = Reflect.get(body, key);
        if (typeof value === 'string') {
            return value;
        }
    }
    throw new Error(`response has no string "${key}"`);
}
