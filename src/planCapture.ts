import { AnalyzerError, PlanCaptureError, PlanCaptureStage, PlanCaptureTimeoutError, toError } from './errors';
import { DatabaseProviderSetting, ExecutionPlan, createExecutionPlan } from './executionPlan';
import { substituteParameters } from './literals';
import { AnalyzerLogger, ErrorCallback, ErrorLevel, consoleLogger, reportAnalyzerError } from './logger';
import { PlanDialect, getPlanDialect } from './planDialects';
import {
    AnalysisItem,
    OwnedPlanConnection,
    PlanConnection,
    PlanConnectionFactory,
    PlanOptions,
    PlanRow,
    SlowQueryReport,
} from './types';

export interface ExecutionPlanCaptureOptions {
    connectionString?: string;
    connectionStringResolver?: (report: SlowQueryReport) => string | undefined;
    connectionFactory?: PlanConnectionFactory;
    databaseProvider?: DatabaseProviderSetting;
    planOptions?: PlanOptions;
    planTimeoutSeconds?: number;
    logger?: AnalyzerLogger;
    onError?: ErrorCallback;
}

type ConnectionStrategy =
    | { kind: 'configured' | 'data-context' | 'resolver'; connectionString: string }
    | { kind: 'existing'; connection: PlanConnection };

/**
 * Captures the estimated execution plan of a slow query. Every failure is
 * logged and turns into a null plan.
 */
export class ExecutionPlanCapture {
    private readonly logger: AnalyzerLogger;
    private readonly timeoutMs: number;

    constructor(private readonly options: ExecutionPlanCaptureOptions = {}) {
        this.logger = options.logger ?? consoleLogger;
        this.timeoutMs = (options.planTimeoutSeconds ?? 30) * 1000;
    }

    async capture(item: AnalysisItem, signal?: AbortSignal): Promise<ExecutionPlan | null> {
        const { report } = item;
        if (signal?.aborted) {
            this.logger.debug(`Plan capture skipped for query ${report.queryId}: cancelled`);
            return null;
        }

        const strategy = this.selectStrategy(item);
        if (!strategy) {
            this.logger.warn(`Cannot capture execution plan: no connection available for query ${report.queryId}`);
            return null;
        }

        this.logger.debug(`Capturing execution plan for query ${report.queryId} using ${strategy.kind} connection`);
        if (strategy.kind === 'existing') {
            return this.captureOn(strategy.connection, report, signal);
        }
        return this.captureOnNewConnection(strategy.connectionString, report, signal);
    }

    /**
     * Priority: configured connection string, the command's own open
     * connection, the data context's connection string, the resolver
     */
    private selectStrategy(item: AnalysisItem): ConnectionStrategy | undefined {
        if (this.options.connectionString) {
            return { kind: 'configured', connectionString: this.options.connectionString };
        }

        if (item.connection && this.safely(() => item.connection?.isOpen() ?? false, 'connection state')) {
            return { kind: 'existing', connection: item.connection };
        }

        const accessor = item.dataContext?.connectionString;
        if (accessor) {
            const fromContext = this.safely(() => accessor.getConnectionString(), 'data context connection string');
            if (fromContext) {
                return { kind: 'data-context', connectionString: fromContext };
            }
        }

        const resolver = this.options.connectionStringResolver;
        if (resolver) {
            const resolved = this.safely(() => resolver(item.report), 'connection string resolver');
            if (resolved) {
                return { kind: 'resolver', connectionString: resolved };
            }
        }

        return undefined;
    }

    private async captureOnNewConnection(
        connectionString: string,
        report: SlowQueryReport,
        signal?: AbortSignal
    ): Promise<ExecutionPlan | null> {
        const factory = this.options.connectionFactory;
        if (!factory) {
            this.fail(report, 'connect', new Error('No connection factory configured'));
            return null;
        }

        let connection: OwnedPlanConnection;
        try {
            connection = await factory.open(connectionString);
        } catch (e: unknown) {
            this.fail(report, 'connect', e);
            return null;
        }

        try {
            return await this.captureOn(connection, report, signal);
        } finally {
            try {
                await connection.close();
            } catch (e: unknown) {
                this.fail(report, 'close', e, 'warn');
            }
        }
    }

    private async captureOn(
        connection: PlanConnection,
        report: SlowQueryReport,
        signal?: AbortSignal
    ): Promise<ExecutionPlan | null> {
        const setting = this.options.databaseProvider ?? 'auto';
        const provider = setting === 'auto' ? connection.provider : setting;
        const dialect = getPlanDialect(provider, this.options.planOptions);
        if (!dialect) {
            this.logger.warn(`Execution plan capture is not supported for provider ${provider}`);
            return null;
        }

        try {
            return await connection.withSession(async session => {
                if (dialect.timeoutStatement) {
                    try {
                        await session.execute(dialect.timeoutStatement(this.timeoutMs));
                    } catch (e: unknown) {
                        this.fail(report, 'enable', e);
                        return null;
                    }
                }

                if (dialect.enableStatement) {
                    try {
                        await session.execute(dialect.enableStatement);
                    } catch (e: unknown) {
                        this.fail(report, 'enable', e);
                        return null;
                    }
                }

                let execution: Promise<PlanRow[]> | undefined;
                try {
                    execution = session.execute(this.buildStatement(dialect, report));
                    const rows = await this.withTimeout(execution, report, signal);
                    return createExecutionPlan(dialect.provider, dialect.format, dialect.extractPlan(rows));
                } catch (e: unknown) {
                    this.fail(report, 'execute', e);
                    return null;
                } finally {
                    // the session is single-threaded; the plan statement has to settle first
                    if (execution) {
                        await execution.then(
                            () => undefined,
                            () => undefined
                        );
                    }
                    if (dialect.disableStatement && connection.isOpen()) {
                        try {
                            await session.execute(dialect.disableStatement);
                        } catch (e: unknown) {
                            this.fail(report, 'disable', e, 'warn');
                        }
                    }
                }
            });
        } catch (e: unknown) {
            this.fail(report, 'connect', e);
            return null;
        }
    }

    private buildStatement(dialect: PlanDialect, report: SlowQueryReport): string {
        return dialect.planStatement(substituteParameters(report.rawQuery, report.parameters));
    }

    private async withTimeout<T>(work: Promise<T>, report: SlowQueryReport, signal?: AbortSignal): Promise<T> {
        if (signal?.aborted) {
            throw new Error('Plan capture cancelled');
        }
        let timer: NodeJS.Timeout | undefined;
        let onAbort: (() => void) | undefined;

        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(new PlanCaptureTimeoutError(report.rawQuery, this.timeoutMs)), this.timeoutMs);
        });
        const cancelled = new Promise<never>((_, reject) => {
            onAbort = () => reject(new Error('Plan capture cancelled'));
            signal?.addEventListener('abort', onAbort, { once: true });
        });

        try {
            return await Promise.race([work, timeout, cancelled]);
        } finally {
            clearTimeout(timer);
            if (onAbort) {
                signal?.removeEventListener('abort', onAbort);
            }
        }
    }

    private safely<T>(read: () => T, what: string): T | undefined {
        try {
            return read();
        } catch (e: unknown) {
            this.logger.warn(`Error reading ${what}`, toError(e).message);
            return undefined;
        }
    }

    private fail(report: SlowQueryReport, stage: PlanCaptureStage, e: unknown, level: ErrorLevel = 'error'): void {
        const error = e instanceof AnalyzerError ? e : new PlanCaptureError(report.rawQuery, stage, toError(e));
        reportAnalyzerError(error, this.logger, this.options.onError, level);
    }
}
