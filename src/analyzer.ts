import { AnalysisQueue } from './analysisQueue';
import { QueryAnalysisWorker, createAnalysisPipeline } from './analysisWorker';
import { CsvReportingSink } from './csvReportingSink';
import { HttpReportingSink } from './httpReportingSink';
import { QueryPerformanceInterceptor } from './interceptor';
import { OperationTracker } from './operationTracker';
import { optionsFromEnv, resolveOptions } from './options';
import { ExecutionPlanCapture } from './planCapture';
import { CompositeReportingSink, InMemoryReportingSink, ReportingSink } from './reportingSink';
import {
    InstrumentableSequelize,
    SequelizeConnectionFactory,
    SequelizeInstrumentation,
    instrumentSequelize,
} from './sequelizeAdapter';
import { ThresholdEvaluator } from './thresholdEvaluator';
import { AnalysisItem, AnalyzerOptions, ResolvedOptions } from './types';

export interface QueryAnalyzer {
    readonly options: ResolvedOptions;
    readonly interceptor: QueryPerformanceInterceptor;
    readonly queue: AnalysisQueue<AnalysisItem>;
    readonly worker: QueryAnalysisWorker;
    readonly sink: ReportingSink;
    readonly instrumentation: SequelizeInstrumentation;
    /**
     * Stops tracking, drains the queue and unwraps the Sequelize instance.
     * Aborting the signal cuts the drain short.
     */
    stop(signal?: AbortSignal): Promise<void>;
}

/**
 * Enable query analyzer for a Sequelize instance
 * @param sequelize Sequelize instance to analyze
 * @param options Configuration options, on top of the QUERY_ANALYZER_* environment variables
 */
export function enableAnalyzer(sequelize: InstrumentableSequelize, options: AnalyzerOptions = {}): QueryAnalyzer {
    const resolved = resolveOptions({ ...optionsFromEnv(), ...definedOnly(options) });
    const { logger, onError } = resolved;

    const tracker = new OperationTracker({
        maxStackTraceLines: resolved.maxStackTraceLines,
        logger,
        onError,
    });
    const evaluator = new ThresholdEvaluator(resolved.thresholdMs, {
        environment: resolved.environment,
        applicationName: resolved.applicationName,
        version: resolved.version,
    });
    const queue = new AnalysisQueue<AnalysisItem>({
        maxSize: resolved.maxQueueSize,
        overflow: resolved.queueOverflow,
        logger,
    });
    const interceptor = new QueryPerformanceInterceptor(tracker, evaluator, queue, {
        enabled: resolved.enabled,
        captureStackTrace: resolved.captureStackTrace,
        logger,
        onError,
    });

    const sink = createReportingSink(resolved);
    const planCapture = resolved.captureExecutionPlan
        ? new ExecutionPlanCapture({
              connectionString: resolved.connectionString,
              connectionStringResolver: resolved.connectionStringResolver,
              connectionFactory: new SequelizeConnectionFactory({ requestTimeoutMs: resolved.planTimeoutSeconds * 1000 }),
              databaseProvider: resolved.databaseProvider,
              planOptions: resolved.planOptions,
              planTimeoutSeconds: resolved.planTimeoutSeconds,
              logger,
              onError,
          })
        : undefined;
    const worker = new QueryAnalysisWorker(queue, createAnalysisPipeline(sink, planCapture), {
        batchSize: resolved.batchSize,
        pollIntervalMs: resolved.pollIntervalMs,
        errorBackoffMs: resolved.errorBackoffMs,
        logger,
        onError,
    });

    const instrumentation = instrumentSequelize(sequelize, interceptor, { logger });
    if (resolved.enabled) {
        worker.start();
        logger.info(`Query analyzer enabled (threshold: ${resolved.thresholdMs}ms, environment: ${resolved.environment})`);
    }

    return {
        options: resolved,
        interceptor,
        queue,
        worker,
        sink,
        instrumentation,
        stop: async (signal?: AbortSignal) => {
            interceptor.enabled = false;
            try {
                await worker.stop(signal);
            } finally {
                instrumentation.restore();
            }
        },
    };
}

/**
 * HTTP when an endpoint is set, CSV when a directory is set, then the
 * user's sinks. Reports stay in memory when nothing is configured.
 */
export function createReportingSink(options: ResolvedOptions): CompositeReportingSink {
    const { logger, onError } = options;
    const sinks: ReportingSink[] = [];

    if (options.apiEndpoint) {
        sinks.push(
            new HttpReportingSink({
                apiEndpoint: options.apiEndpoint,
                apiKey: options.apiKey,
                projectId: options.projectId,
                apiTimeoutMs: options.apiTimeoutMs,
                maxQueryLength: options.maxQueryLength,
                environment: options.environment,
                enableInDevelopment: options.enableInDevelopment,
                enableInProduction: options.enableInProduction,
                logger,
                onError,
            })
        );
    }
    if (options.csvDirectory) {
        sinks.push(new CsvReportingSink({ directory: options.csvDirectory, logger, onError }));
    }
    sinks.push(...options.sinks);

    if (sinks.length === 0) {
        logger.debug('No reporting sink configured, keeping reports in memory');
        sinks.push(new InMemoryReportingSink());
    }
    return new CompositeReportingSink(sinks, { logger, onError });
}

// explicit undefined in the options must not hide an environment value
function definedOnly(options: AnalyzerOptions): AnalyzerOptions {
    return Object.fromEntries(Object.entries(options).filter(([, value]) => value !== undefined));
}
