import { ReportingError, toError } from './errors';
import { AnalyzerLogger, ErrorCallback, consoleLogger, reportAnalyzerError } from './logger';
import { SlowQueryReport } from './types';

export type ReportOutcome = 'delivered' | 'skipped' | 'failed';

/**
 * A destination for slow query reports
 */
export interface ReportingSink {
  readonly name: string;
  report(report: SlowQueryReport, signal?: AbortSignal): Promise<ReportOutcome>;
}

export interface CompositeReportingSinkOptions {
  logger?: AnalyzerLogger;
  onError?: ErrorCallback;
}

/**
 * Sends every report to all registered sinks at once. A failing sink is
 * logged and does not affect the others.
 */
export class CompositeReportingSink implements ReportingSink {
  readonly name = 'composite';
  private readonly sinks: readonly ReportingSink[];
  private readonly logger: AnalyzerLogger;
  private readonly onError?: ErrorCallback;

  constructor(sinks: readonly ReportingSink[], options: CompositeReportingSinkOptions = {}) {
    this.sinks = [...sinks];
    this.logger = options.logger ?? consoleLogger;
    this.onError = options.onError;
  }

  async report(report: SlowQueryReport, signal?: AbortSignal): Promise<ReportOutcome> {
    const outcomes = await Promise.all(
      this.sinks.map(async (sink): Promise<ReportOutcome> => {
        try {
          return await sink.report(report, signal);
        } catch (e: unknown) {
          reportAnalyzerError(
            new ReportingError(report.rawQuery, sink.name, toError(e)),
            this.logger,
            this.onError
          );
          return 'failed';
        }
      })
    );

    if (outcomes.includes('failed')) return 'failed';
    if (outcomes.includes('delivered')) return 'delivered';
    return 'skipped';
  }
}

/**
 * Keeps reports in memory, for tests and local development
 */
export class InMemoryReportingSink implements ReportingSink {
  readonly name = 'in-memory';
  private reports: SlowQueryReport[] = [];

  async report(report: SlowQueryReport): Promise<ReportOutcome> {
    this.reports.push(report);
    return 'delivered';
  }

  getReports(): readonly SlowQueryReport[] {
    return [...this.reports];
  }

  clear(): void {
    this.reports = [];
  }
}
