// regroup-server/src/config.ts
// Server settings from the environment.

import { parseEnum, parseNumber, parseString } from 'libregroup';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ServerConfig {
    /** `PORT`, default 8787. */
    port: number;
    /** `HOST`, default `0.0.0.0`. */
    host: string;
    /** `LOG_LEVEL`, default `info`. */
    logLevel: LogLevel;
    /** `FETCH_TIMEOUT_MS`, default 15000. */
    fetchTimeoutMs: number;
    /** `USER_AGENT` sent with subscription requests, default `clash.meta`. */
    userAgent: string;
}

export function loadServerConfig(env: Record<string, string | undefined>): ServerConfig {
    return {
        port: parseNumber(env.PORT, 8787),
        host: parseString('0.0.0.0')(env.HOST),
        logLevel: parseEnum(LOG_LEVELS, 'info')(env.LOG_LEVEL),
        fetchTimeoutMs: parseNumber(env.FETCH_TIMEOUT_MS, 15000),
        userAgent: parseString('clash.meta')(env.USER_AGENT),
    };
}
