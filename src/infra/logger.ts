// Component loggers. Everything goes to stderr: stdout is reserved for burn records.

import winston from 'winston';

const { combine, timestamp, json, printf, colorize, errors } = winston.format;

const level = (): string => {
    if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
    return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
};

const devFormat = combine(
    colorize({ all: true }),
    timestamp({ format: 'HH:mm:ss' }),
    errors({ stack: true }),
    printf(({ level, message, timestamp, component, ...meta }) => {
        const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
        const componentStr = component ? `[${String(component)}] ` : '';
        return `${String(timestamp)} ${level}: ${componentStr}${String(message)}${metaStr}`;
    })
);

const prodFormat = combine(timestamp(), errors({ stack: true }), json());

const ALL_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

export function createLogger(component: string): winston.Logger {
    return winston.createLogger({
        level: level(),
        defaultMeta: { component },
        format: process.env.NODE_ENV === 'production' ? prodFormat : devFormat,
        transports: [
            new winston.transports.Console({
                stderrLevels: ALL_LEVELS,
            }),
        ],
        silent: process.env.NODE_ENV === 'test',
        exitOnError: false,
    });
}

export type Logger = winston.Logger;
