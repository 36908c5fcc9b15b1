import { consoleLogger } from './logger';
import { AnalyzerOptions, ResolvedOptions } from './types';

export const DEFAULT_THRESHOLD_MS = 1000;
export const DEFAULT_BATCH_SIZE = 10;
export const DEFAULT_POLL_INTERVAL_MS = 100;

type Env = Record<string, string | undefined>;

/**
 * Fills in defaults for every option that was left out
 */
export function resolveOptions(options: AnalyzerOptions = {}, env: Env = process.env): ResolvedOptions {
    return {
        enabled: options.enabled ?? true,
        environment: resolveEnvironment(options, env),
        enableInDevelopment: options.enableInDevelopment ?? true,
        enableInProduction: options.enableInProduction ?? false,
        thresholdMs: options.thresholdMs ?? DEFAULT_THRESHOLD_MS,
        captureStackTrace: options.captureStackTrace ?? true,
        maxStackTraceLines: options.maxStackTraceLines ?? 20,
        maxQueryLength: options.maxQueryLength ?? 10000,
        captureExecutionPlan: options.captureExecutionPlan ?? false,
        planTimeoutSeconds: options.planTimeoutSeconds ?? 30,
        connectionString: options.connectionString,
        connectionStringResolver: options.connectionStringResolver,
        databaseProvider: options.databaseProvider ?? 'auto',
        planOptions: { ...options.planOptions },
        apiEndpoint: options.apiEndpoint,
        apiKey: options.apiKey,
        projectId: options.projectId,
        apiTimeoutMs: options.apiTimeoutMs ?? 5000,
        applicationName: options.applicationName ?? env.APPLICATION_NAME ?? env.npm_package_name,
        version: options.version ?? env.npm_package_version,
        csvDirectory: options.csvDirectory,
        sinks: [...(options.sinks ?? [])],
        batchSize: options.batchSize ?? DEFAULT_BATCH_SIZE,
        pollIntervalMs: options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
        errorBackoffMs: options.errorBackoffMs ?? 1000,
        maxQueueSize: options.maxQueueSize,
        queueOverflow: options.queueOverflow ?? 'drop-oldest',
        onError: options.onError,
        logger: options.logger ?? consoleLogger,
    };
}

export function resolveEnvironment(options: Pick<AnalyzerOptions, 'environment'>, env: Env = process.env): string {
    return options.environment ?? env.NODE_ENV ?? 'production';
}

/**
 * Reads the analyzer switches from environment variables. Variables that
 * are missing or do not parse are left out of the result.
 */
export function optionsFromEnv(env: Env = process.env): AnalyzerOptions {
    const options: AnalyzerOptions = {};

    const enabled = parseBoolean(env.QUERY_ANALYZER_ENABLED);
    if (enabled !== undefined) options.enabled = enabled;

    const threshold = parseNumber(env.QUERY_ANALYZER_THRESHOLD_MS);
    if (threshold !== undefined) options.thresholdMs = threshold;

    const captureStack = parseBoolean(env.QUERY_ANALYZER_CAPTURE_STACK);
    if (captureStack !== undefined) options.captureStackTrace = captureStack;

    const capturePlan = parseBoolean(env.QUERY_ANALYZER_CAPTURE_PLAN);
    if (capturePlan !== undefined) options.captureExecutionPlan = capturePlan;

    if (env.QUERY_ANALYZER_CONNECTION_STRING) options.connectionString = env.QUERY_ANALYZER_CONNECTION_STRING;
    if (env.QUERY_ANALYZER_API_ENDPOINT) options.apiEndpoint = env.QUERY_ANALYZER_API_ENDPOINT;
    if (env.QUERY_ANALYZER_API_KEY) options.apiKey = env.QUERY_ANALYZER_API_KEY;
    if (env.QUERY_ANALYZER_PROJECT_ID) options.projectId = env.QUERY_ANALYZER_PROJECT_ID;
    if (env.QUERY_ANALYZER_CSV_DIR) options.csvDirectory = env.QUERY_ANALYZER_CSV_DIR;

    return options;
}

function parseBoolean(value: string | undefined): boolean | undefined {
    if (value === undefined) return undefined;
    switch (value.trim().toLowerCase()) {
        case '1':
        case 'true':
        case 'yes':
            return true;
        case '0':
        case 'false':
        case 'no':
            return false;
        default:
            return undefined;
    }
}

function parseNumber(value: string | undefined): number | undefined {
    if (value === undefined || value.trim() === '') return undefined;
    const parsed = Number(value);
    return Number.isFinite(parsed) && parsed >= 0 ? parsed : undefined;
}
