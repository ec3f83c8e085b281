// libregroup/src/logger.ts
// Shared winston logger. The engine only logs at debug and warn; hosts
// raise or lower the level through `logger.level`.

import winston from 'winston';

export interface LoggerOptions {
    level?: string;
    label?: string;
}

export function createLogger({ level = 'info', label = 'libregroup' }: LoggerOptions = {}): winston.Logger {
    return winston.createLogger({
        level,
        format: winston.format.combine(
            winston.format.label({ label }),
            winston.format.timestamp(),
            winston.format.printf(({ level, message, label, timestamp }) =>
                `${String(timestamp)} [${String(label)}] ${level}: ${String(message)}`,
            ),
        ),
        transports: [new winston.transports.Console()],
    });
}

export const logger = createLogger({ level: 'warn' });
