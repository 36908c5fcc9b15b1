import { ReportDeliveryError, ReportingError, toError } from './errors';
import { AnalyzerLogger, ErrorCallback, consoleLogger, reportAnalyzerError } from './logger';
import { ReportOutcome, ReportingSink } from './reportingSink';
import { SlowQueryReport } from './types';
import { toWireReport } from './wireReport';

export const DEFAULT_USER_AGENT = 'sequelize-slow-query-analyzer/1.0.0';

export interface HttpReportingSinkOptions {
    apiEndpoint?: string;
    apiKey?: string;
    projectId?: string;
    apiTimeoutMs?: number;
    maxQueryLength?: number;
    environment: string;
    enableInDevelopment?: boolean;
    enableInProduction?: boolean;
    userAgent?: string;
    fetch?: typeof fetch;
    logger?: AnalyzerLogger;
    onError?: ErrorCallback;
}

/**
 * Posts slow query reports to an HTTP endpoint. Each report is sent once;
 * a failed delivery is logged and never retried.
 */
export class HttpReportingSink implements ReportingSink {
    readonly name = 'http';
    private readonly logger: AnalyzerLogger;

    constructor(private readonly options: HttpReportingSinkOptions) {
        this.logger = options.logger ?? consoleLogger;
    }

    /**
     * 'development' follows enableInDevelopment, every other environment
     * follows enableInProduction
     */
    shouldReport(): boolean {
        return this.options.environment.toLowerCase() === 'development'
            ? this.options.enableInDevelopment ?? true
            : this.options.enableInProduction ?? false;
    }

    async report(report: SlowQueryReport, signal?: AbortSignal): Promise<ReportOutcome> {
        if (!this.shouldReport()) {
            this.logger.debug(`HTTP reporting disabled for environment ${this.options.environment}`);
            return 'skipped';
        }

        const endpoint = this.options.apiEndpoint;
        if (!endpoint) {
            this.logger.warn('API endpoint not configured for slow query reporting');
            return 'skipped';
        }

        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.options.apiTimeoutMs ?? 5000);
        const onAbort = () => controller.abort();
        signal?.addEventListener('abort', onAbort, { once: true });

        try {
            const fetchImpl = this.options.fetch ?? fetch;
            const response = await fetchImpl(endpoint, {
                method: 'POST',
                headers: this.buildHeaders(),
                body: JSON.stringify(toWireReport(report, this.options.maxQueryLength ?? 10000)),
                signal: controller.signal,
            });

            if (!response.ok) {
                const body = await response.text().catch(() => '');
                reportAnalyzerError(
                    new ReportDeliveryError(report.rawQuery, response.status, body),
                    this.logger,
                    this.options.onError
                );
                return 'failed';
            }

            this.logger.info(`Slow query reported successfully: ${report.queryId} (${report.executionTimeMs.toFixed(1)}ms)`);
            return 'delivered';
        } catch (e: unknown) {
            if (signal?.aborted) {
                this.logger.warn(`Query reporting cancelled: ${report.queryId}`);
                return 'failed';
            }
            reportAnalyzerError(new ReportingError(report.rawQuery, this.name, toError(e)), this.logger, this.options.onError);
            return 'failed';
        } finally {
            clearTimeout(timer);
            signal?.removeEventListener('abort', onAbort);
        }
    }

    private buildHeaders(): Record<string, string> {
        const headers: Record<string, string> = {
            'Content-Type': 'application/json',
            'User-Agent': this.options.userAgent ?? DEFAULT_USER_AGENT,
        };
        if (this.options.apiKey) {
            headers.Authorization = `Bearer ${this.options.apiKey}`;
        }
        if (this.options.projectId) {
            headers['X-PROJECT-ID'] = this.options.projectId;
        }
        return headers;
    }
}
