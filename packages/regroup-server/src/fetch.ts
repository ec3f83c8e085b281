// regroup-server/src/fetch.ts
// Subscription download. Retries and caching are left to the caller.

import axios from 'axios';
import type { AxiosResponse } from 'axios';
import type { ServerConfig } from './config.js';

export type SubscriptionFetcher = (url: string) => Promise<string>;

export class FetchError extends Error {
    readonly status?: number;

    constructor(message: string, status?: number, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'FetchError';
        this.status = status;
    }
}

export function createSubscriptionFetcher(
    config: Pick<ServerConfig, 'fetchTimeoutMs' | 'userAgent'>,
): SubscriptionFetcher {
    const client = axios.create({
        timeout: config.fetchTimeoutMs,
        responseType: 'text',
        // Body stays raw text.
        transformResponse: [(data: unknown) => data],
        headers: { 'User-Agent': config.userAgent },
        validateStatus: () => true,
    });

    return async (url: string): Promise<string> => {
        let response: AxiosResponse<unknown>;
        try {
            response = await client.get<unknown>(url);
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            throw new FetchError(`Fetch failed: ${reason}`, undefined, { cause: err });
        }
        if (response.status < 200 || response.status >= 300) {
            throw new FetchError(`Upstream responded with ${response.status}`, response.status);
        }
        if (typeof response.data !== 'string') {
            throw new FetchError('Upstream response is not text', response.status);
        }
        return response.data;
    };
}
