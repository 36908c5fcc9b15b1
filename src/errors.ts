/**
 * Custom error classes for the slow query analyzer
 */

/**
 * Normalizes anything thrown into an Error instance
 */
export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}

/**
 * Base error class for all analyzer errors
 */
export class AnalyzerError extends Error {
    public readonly code: string;
    public readonly query: string;
    public readonly originalError?: Error;
    public readonly timestamp: Date;

    constructor(
        message: string,
        code: string,
        query: string,
        originalError?: Error
    ) {
        super(message);
        this.name = 'AnalyzerError';
        this.code = code;
        this.query = query;
        this.originalError = originalError;
        this.timestamp = new Date();

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    /**
     * Get a formatted error message
     */
    getFormattedMessage(): string {
        const cause = this.originalError ? `\n\tCause: ${this.originalError.message}` : '';
        return `[${this.code}] ${this.message}\n\tQuery: ${this.query}${cause}\n\tTime: ${this.timestamp.toISOString()}`;
    }

    /**
     * Convert error to JSON
     */
    toJSON() {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            query: this.query,
            timestamp: this.timestamp.toISOString(),
            originalError: this.originalError?.message,
            stack: this.stack
        };
    }
}

/**
 * Error raised when a command could not be tracked on the fast path
 */
export class TrackingError extends AnalyzerError {
    constructor(query: string, originalError?: Error) {
        super(
            'Failed to track query execution',
            'TRACKING_FAILED',
            query,
            originalError
        );
        this.name = 'TrackingError';
    }
}

export type PlanCaptureStage = 'resolve' | 'connect' | 'enable' | 'execute' | 'disable' | 'close';

/**
 * Error raised when one step of execution plan capture fails
 */
export class PlanCaptureError extends AnalyzerError {
    public readonly stage: PlanCaptureStage;

    constructor(query: string, stage: PlanCaptureStage, originalError?: Error) {
        super(
            `Failed to capture execution plan (${stage})`,
            'PLAN_CAPTURE_FAILED',
            query,
            originalError
        );
        this.name = 'PlanCaptureError';
        this.stage = stage;
    }
}

/**
 * Error raised when the plan statement does not answer within the plan timeout
 */
export class PlanCaptureTimeoutError extends AnalyzerError {
    public readonly timeoutMs: number;

    constructor(query: string, timeoutMs: number) {
        super(
            `Execution plan capture timed out after ${timeoutMs}ms`,
            'PLAN_CAPTURE_TIMEOUT',
            query
        );
        this.name = 'PlanCaptureTimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

/**
 * Error raised when a reporting sink rejects during fan-out
 */
export class ReportingError extends AnalyzerError {
    public readonly sink: string;

    constructor(query: string, sink: string, originalError?: Error) {
        super(
            `Reporting sink ${sink} failed`,
            'REPORTING_FAILED',
            query,
            originalError
        );
        this.name = 'ReportingError';
        this.sink = sink;
    }
}

/**
 * Error raised when the reporting endpoint answers with a non-success status
 */
export class ReportDeliveryError extends AnalyzerError {
    public readonly status: number;
    public readonly responseBody: string;

    constructor(query: string, status: number, responseBody: string) {
        super(
            `Report endpoint answered with status ${status}`,
            'REPORT_DELIVERY_FAILED',
            query
        );
        this.name = 'ReportDeliveryError';
        this.status = status;
        this.responseBody = responseBody;
    }
}

/**
 * Error raised when a queued item cannot be processed by the background worker
 */
export class QueueProcessingError extends AnalyzerError {
    constructor(query: string, originalError?: Error) {
        super(
            'Failed to process queued query analysis',
            'QUEUE_PROCESSING_FAILED',
            query,
            originalError
        );
        this.name = 'QueueProcessingError';
    }
}

/**
 * Error thrown when CSV logging fails
 */
export class CsvError extends AnalyzerError {
    constructor(query: string, originalError?: Error) {
        super(
            'Failed to log query analysis to CSV',
            'CSV_WRITE_FAILED',
            query,
            originalError
        );
        this.name = 'CsvError';
    }
}
