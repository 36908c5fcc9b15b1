import { AnalyzerError } from './errors';

export interface AnalyzerLogger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}

const PREFIX = '[query-analyzer]';

/**
 * Default logger writing to the console. Debug output is only printed
 * when QUERY_ANALYZER_DEBUG=1.
 */
export const consoleLogger: AnalyzerLogger = {
    debug: (message, ...details) => {
        if (process.env.QUERY_ANALYZER_DEBUG === '1') {
            console.debug(PREFIX, message, ...details);
        }
    },
    info: (message, ...details) => console.info(PREFIX, message, ...details),
    warn: (message, ...details) => console.warn(PREFIX, message, ...details),
    error: (message, ...details) => console.error(PREFIX, message, ...details),
};

export type ErrorCallback = (error: AnalyzerError) => void | Promise<void>;

export type ErrorLevel = 'warn' | 'error';

/**
 * Logs an analyzer error and hands it to the user's onError callback.
 * Never throws and never returns a pending promise to the caller.
 */
export function reportAnalyzerError(
    error: AnalyzerError,
    logger: AnalyzerLogger,
    onError?: ErrorCallback,
    level: ErrorLevel = 'error'
): void {
    logger[level](error.getFormattedMessage());
    if (!onError) {
        return;
    }

    try {
        Promise.resolve(onError(error)).catch((callbackError: unknown) => {
            logger.warn('onError callback rejected', callbackError);
        });
    } catch (callbackError) {
        logger.warn('onError callback threw', callbackError);
    }
}
