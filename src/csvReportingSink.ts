import { format } from 'date-fns';
import path from 'path';
import { appendCsv, CsvRow } from './csvUtil';
import { CsvError, toError } from './errors';
import { AnalyzerLogger, ErrorCallback, consoleLogger, reportAnalyzerError } from './logger';
import { ReportOutcome, ReportingSink } from './reportingSink';
import { SlowQueryReport } from './types';
import { toWireValue } from './wireReport';

export interface CsvReportingSinkOptions {
  directory?: string;
  now?: () => Date;
  logger?: AnalyzerLogger;
  onError?: ErrorCallback;
}

export function toCsvRow(report: SlowQueryReport): CsvRow {
  const parameters: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(report.parameters)) {
    parameters[name] = toWireValue(value);
  }

  return {
    queryId: report.queryId,
    timestamp: new Date(report.timestamp).toISOString(),
    executionTimeMs: report.executionTimeMs.toFixed(2),
    contextType: report.contextType,
    environment: report.environment,
    query: report.rawQuery,
    params: Object.keys(parameters).length > 0 ? JSON.stringify(parameters) : undefined,
    stackTrace: report.stackTrace?.join('\n'),
    planProvider: report.executionPlan?.databaseProvider,
    planFormat: report.executionPlan?.planFormat,
    queryPlan: report.executionPlan?.content,
  };
}

/**
 * Appends reports to a daily CSV file, analyzer/report-yyyy-MM-dd.csv by default
 */
export class CsvReportingSink implements ReportingSink {
  readonly name = 'csv';
  private readonly directory: string;
  private readonly now: () => Date;
  private readonly logger: AnalyzerLogger;
  private writes: Promise<ReportOutcome> = Promise.resolve('skipped');

  constructor(private readonly options: CsvReportingSinkOptions = {}) {
    this.directory = options.directory ?? 'analyzer';
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? consoleLogger;
  }

  filePathFor(date: Date): string {
    return path.join(this.directory, `report-${format(date, 'yyyy-MM-dd')}.csv`);
  }

  report(report: SlowQueryReport): Promise<ReportOutcome> {
    // one write at a time so a new file gets exactly one header line
    const next = this.writes.then(() => this.write(report));
    this.writes = next;
    return next;
  }

  private async write(report: SlowQueryReport): Promise<ReportOutcome> {
    try {
      await appendCsv(this.filePathFor(this.now()), toCsvRow(report));
      return 'delivered';
    } catch (e: unknown) {
      reportAnalyzerError(new CsvError(report.rawQuery, toError(e)), this.logger, this.options.onError);
      return 'failed';
    }
  }
}
