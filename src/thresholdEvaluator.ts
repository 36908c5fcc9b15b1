import { CompletedOperation, SlowQueryReport } from './types';

export interface ReportIdentity {
    environment: string;
    applicationName?: string;
    version?: string;
}

/**
 * A query is slow once it reaches the threshold
 */
export function isSlow(operation: Pick<CompletedOperation, 'elapsedMs'>, thresholdMs: number): boolean {
    return operation.elapsedMs >= thresholdMs;
}

/**
 * Builds the frozen report for a completed operation. Every field is copied,
 * none is shared with the tracker.
 */
export function toReport(operation: CompletedOperation, identity: ReportIdentity): SlowQueryReport {
    const report: SlowQueryReport = {
        queryId: operation.operationId,
        rawQuery: operation.commandText,
        parameters: Object.freeze({ ...operation.parameters }),
        executionTimeMs: operation.elapsedMs,
        stackTrace: operation.stackTrace ? Object.freeze([...operation.stackTrace]) : undefined,
        timestamp: operation.startTime,
        contextType: operation.contextTag,
        environment: identity.environment,
        applicationName: identity.applicationName,
        version: identity.version,
    };
    return Object.freeze(report);
}

export class ThresholdEvaluator {
    constructor(
        readonly thresholdMs: number,
        private readonly identity: ReportIdentity
    ) {}

    /**
     * Returns the report of a slow operation, undefined otherwise
     */
    evaluate(operation: CompletedOperation): SlowQueryReport | undefined {
        if (!isSlow(operation, this.thresholdMs)) {
            return undefined;
        }
        return toReport(operation, this.identity);
    }
}
