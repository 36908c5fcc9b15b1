import { AnalysisQueue } from './analysisQueue';
import { TrackingError, toError } from './errors';
import { AnalyzerLogger, ErrorCallback, consoleLogger, reportAnalyzerError } from './logger';
import { OperationTracker } from './operationTracker';
import { ThresholdEvaluator } from './thresholdEvaluator';
import { AnalysisItem, CommandCompletedEvent, CommandStartingEvent } from './types';

export interface QueryPerformanceInterceptorOptions {
  enabled?: boolean;
  captureStackTrace?: boolean;
  logger?: AnalyzerLogger;
  onError?: ErrorCallback;
}

const LOGGED_QUERY_LENGTH = 200;

/**
 * Receives the start and end events of database commands. Both handlers
 * are synchronous and never throw into the caller.
 */
export class QueryPerformanceInterceptor {
  enabled: boolean;
  private readonly captureStackTrace: boolean;
  private readonly logger: AnalyzerLogger;
  private readonly onError?: ErrorCallback;

  constructor(
    private readonly tracker: OperationTracker,
    private readonly evaluator: ThresholdEvaluator,
    private readonly queue: AnalysisQueue<AnalysisItem>,
    options: QueryPerformanceInterceptorOptions = {}
  ) {
    this.enabled = options.enabled ?? true;
    this.captureStackTrace = options.captureStackTrace ?? true;
    this.logger = options.logger ?? consoleLogger;
    this.onError = options.onError;
  }

  onCommandStarting(event: CommandStartingEvent): string | undefined {
    if (!this.enabled) {
      return undefined;
    }
    return this.tracker.start({
      key: { connectionId: event.connectionId, commandId: event.commandId },
      commandText: event.commandText,
      parameters: event.parameters,
      contextTag: event.contextTag,
      connection: event.connection,
      dataContext: event.dataContext,
      captureStack: this.captureStackTrace,
    });
  }

  onCommandCompleted(event: CommandCompletedEvent): void {
    if (!this.enabled) {
      return;
    }

    let commandText = '';
    try {
      const completed = this.tracker.complete(event);
      if (!completed) {
        return;
      }
      commandText = completed.commandText;

      const report = this.evaluator.evaluate(completed);
      if (!report) {
        return;
      }

      this.logger.warn(
        `Slow query detected: ${report.executionTimeMs.toFixed(2)}ms (Threshold: ${this.evaluator.thresholdMs}ms) - Query: ${shorten(report.rawQuery)}`
      );
      this.queue.enqueue({ report, connection: completed.connection, dataContext: completed.dataContext });
    } catch (e: unknown) {
      reportAnalyzerError(new TrackingError(commandText, toError(e)), this.logger, this.onError);
    }
  }
}

function shorten(query: string): string {
  return query.length > LOGGED_QUERY_LENGTH ? `${query.slice(0, LOGGED_QUERY_LENGTH)}...` : query;
}
