import type { LogConfig } from '../types/config.types.js';
import { getCorrelationId, generateCorrelationId } from '../errors/index.js';
import pino from 'pino';

export { generateCorrelationId };

export interface LogMeta {
    correlationId?: string;
    jobId?: string;
    chunkId?: string;
    [key: string]: unknown;
}

export interface Logger {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
}

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Creates a Pino-backed logger
 * Correlation ID is injected into every entry; `structured: false` switches to pino-pretty
 */
export function createLogger(config: LogConfig): Logger {
    const pinoLogger = pino({
        level: config.level,
        base: { service: 'pdf-ocr-pipeline' },
        ...(config.structured === false && {
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname,service',
                },
            },
        }),
    });

    const enrichMeta = (meta?: LogMeta): LogMeta => ({
        correlationId: meta?.correlationId ?? getCorrelationId(),
        ...meta,
    });

    const log = (level: LogLevel, message: string, meta?: LogMeta): void => {
        const enrichedMeta = enrichMeta(meta);

        if (config.customLogger) {
            config.customLogger(level, message, enrichedMeta);
            return;
        }

        pinoLogger[level](enrichedMeta, message);
    };

    return {
        debug: (message: string, meta?: LogMeta) => log('debug', message, meta),
        info: (message: string, meta?: LogMeta) => log('info', message, meta),
        warn: (message: string, meta?: LogMeta) => log('warn', message, meta),
        error: (message: string, meta?: LogMeta) => log('error', message, meta),
    };
}

