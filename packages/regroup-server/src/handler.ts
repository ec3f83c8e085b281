// regroup-server/src/handler.ts
// GET /convert?url=<subscription>[&mode=auto][&includeEmptyBuckets=1]...
//
// Maps outcomes to HTTP: bad input 400, upstream failure 502, conversion
// failure 500, converted document 200.

import { convertSubscription, isConvertError, parseConvertArgs } from 'libregroup';
import type { ConvertOptions } from 'libregroup';
import type winston from 'winston';
import { FetchError } from './fetch.js';
import type { SubscriptionFetcher } from './fetch.js';

export interface HandlerResponse {
    status: number;
    headers: Record<string, string>;
    body: string;
}

export interface HandlerDeps {
    fetchSubscription: SubscriptionFetcher;
    logger: winston.Logger;
}

export const YAML_HEADERS: Readonly<Record<string, string>> = {
    'Content-Type': 'text/yaml; charset=utf-8',
    'Content-Disposition': 'attachment; filename=clash.yaml',
};

function textResponse(status: number, body: string): HandlerResponse {
    return { status, headers: { 'Content-Type': 'text/plain; charset=utf-8' }, body };
}

/** First string of a query value (`?a=1&a=2` → `'1'`). */
export function firstValue(value: unknown): string | undefined {
    if (typeof value === 'string') return value;
    if (Array.isArray(value)) {
        const first: unknown = value[0];
        return typeof first === 'string' ? first : undefined;
    }
    return undefined;
}

export async function handleConvert(
    query: Record<string, unknown>,
    deps: HandlerDeps,
): Promise<HandlerResponse> {
    const { fetchSubscription, logger } = deps;

    const target = firstValue(query.url);
    if (!target) {
        return textResponse(400, "Missing 'url' parameter");
    }
    let url: URL;
    try {
        url = new URL(target);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        return textResponse(400, `Invalid URL: ${reason}`);
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        return textResponse(400, `Unsupported URL scheme: ${url.protocol}`);
    }

    const args: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(query)) {
        args[key] = firstValue(value);
    }
    let options: ConvertOptions;
    try {
        options = parseConvertArgs(args);
    } catch (err) {
        if (isConvertError(err)) return textResponse(400, err.message);
        throw err;
    }

    let content: string;
    try {
        content = await fetchSubscription(url.href);
    } catch (err) {
        if (err instanceof FetchError) {
            logger.warn(`${url.host}: ${err.message}`);
            return textResponse(502, err.message);
        }
        throw err;
    }

    try {
        const body = convertSubscription(content, options);
        logger.info(`Converted subscription from ${url.host} (${options.mode})`);
        return { status: 200, headers: { ...YAML_HEADERS }, body };
    } catch (err) {
        if (isConvertError(err)) {
            logger.error(`${url.host}: ${err.code} ${err.message}`);
            return textResponse(500, `Conversion failed: ${err.message}`);
        }
        throw err;
    }
}
