import type { AnalyzerError } from './errors';
import type { AnalyzerLogger } from './logger';
import type { DatabaseProvider, DatabaseProviderSetting, ExecutionPlan } from './executionPlan';
import type { ReportingSink } from './reportingSink';

export type ParameterSnapshot = Readonly<Record<string, unknown>>;

export type OverflowPolicy = 'drop-oldest' | 'drop-newest';

export interface AnalyzerOptions {
  // Enable/Disable Controls
  enabled?: boolean;                     // Master switch (default: true)
  environment?: string;                  // Environment tag; falls back to NODE_ENV, then 'production'
  enableInDevelopment?: boolean;         // HTTP reporting in 'development' (default: true)
  enableInProduction?: boolean;          // HTTP reporting in any other environment (default: false)

  // Detection
  thresholdMs?: number;                  // Slow query threshold in ms, inclusive (default: 1000)
  captureStackTrace?: boolean;           // Capture the application call site (default: true)
  maxStackTraceLines?: number;           // (default: 20)
  maxQueryLength?: number;               // Query text sent over HTTP is cut here (default: 10000)

  // Execution plan capture
  captureExecutionPlan?: boolean;        // (default: false)
  planTimeoutSeconds?: number;           // Timeout of the plan statement (default: 30)
  connectionString?: string;             // Dedicated connection for plan capture, tried first
  connectionStringResolver?: (report: SlowQueryReport) => string | undefined;  // Last resort
  databaseProvider?: DatabaseProviderSetting;  // (default: 'auto')
  planOptions?: PlanOptions;

  // HTTP reporting
  apiEndpoint?: string;
  apiKey?: string;                       // Sent as a bearer token
  projectId?: string;                    // Sent as X-PROJECT-ID
  apiTimeoutMs?: number;                 // (default: 5000)
  applicationName?: string;
  version?: string;

  // Other reporting
  csvDirectory?: string;                 // Write a daily CSV report in this directory
  sinks?: ReportingSink[];               // Additional sinks

  // Background worker
  batchSize?: number;                    // Items per drain pass (default: 10)
  pollIntervalMs?: number;               // Idle wait between passes (default: 100)
  errorBackoffMs?: number;               // Wait after an unexpected loop fault (default: 1000)
  maxQueueSize?: number;                 // Unbounded when omitted
  queueOverflow?: OverflowPolicy;        // (default: 'drop-oldest')

  // Error Handling Callbacks
  onError?: (error: AnalyzerError) => void | Promise<void>;
  logger?: AnalyzerLogger;
}

// PostgreSQL EXPLAIN flags; ANALYZE is never sent since it executes the statement
export interface PlanOptions {
  verbose?: boolean;
  costs?: boolean;
  settings?: boolean;
  summary?: boolean;
}

export interface ResolvedOptions {
  enabled: boolean;
  environment: string;
  enableInDevelopment: boolean;
  enableInProduction: boolean;
  thresholdMs: number;
  captureStackTrace: boolean;
  maxStackTraceLines: number;
  maxQueryLength: number;
  captureExecutionPlan: boolean;
  planTimeoutSeconds: number;
  connectionString?: string;
  connectionStringResolver?: (report: SlowQueryReport) => string | undefined;
  databaseProvider: DatabaseProviderSetting;
  planOptions: PlanOptions;
  apiEndpoint?: string;
  apiKey?: string;
  projectId?: string;
  apiTimeoutMs: number;
  applicationName?: string;
  version?: string;
  csvDirectory?: string;
  sinks: ReportingSink[];
  batchSize: number;
  pollIntervalMs: number;
  errorBackoffMs: number;
  maxQueueSize?: number;
  queueOverflow: OverflowPolicy;
  onError?: (error: AnalyzerError) => void | Promise<void>;
  logger: AnalyzerLogger;
}

export interface CorrelationKey {
  readonly connectionId: string;
  readonly commandId: string;
}

export type PlanRow = Record<string, unknown>;

/**
 * Statements issued inside one session run on the same physical connection
 */
export interface PlanSession {
  execute(sql: string): Promise<PlanRow[]>;
}

export interface PlanConnection {
  readonly provider: DatabaseProvider;
  isOpen(): boolean;
  withSession<T>(work: (session: PlanSession) => Promise<T>): Promise<T>;
}

/**
 * A connection opened for plan capture; the capture closes it
 */
export interface OwnedPlanConnection extends PlanConnection {
  close(): Promise<void>;
}

export interface PlanConnectionFactory {
  open(connectionString: string): Promise<OwnedPlanConnection>;
}

export interface ConnectionStringAccessor {
  getConnectionString(): string | undefined;
}

/**
 * The logical owner of a command. Only owners that can hand out their
 * connection string carry the accessor.
 */
export interface DataContextHandle {
  readonly name: string;
  readonly connectionString?: ConnectionStringAccessor;
}

export interface Clock {
  now(): number;        // wall clock, epoch ms
  monotonic(): number;  // elapsed-time source, ms
}

export interface TrackedOperation {
  readonly operationId: string;
  readonly key: CorrelationKey;
  readonly commandText: string;
  readonly parameters: ParameterSnapshot;
  readonly contextTag: string;
  readonly startTime: number;
  readonly startMark: number;
  readonly stackTrace?: readonly string[];
  readonly connection?: PlanConnection;
  readonly dataContext?: DataContextHandle;
}

export interface CompletedOperation extends TrackedOperation {
  readonly endTime: number;
  readonly elapsedMs: number;
}

export interface SlowQueryReport {
  readonly queryId: string;
  readonly rawQuery: string;
  readonly parameters: ParameterSnapshot;
  readonly executionTimeMs: number;
  readonly stackTrace?: readonly string[];
  readonly timestamp: number;
  readonly contextType: string;
  readonly environment: string;
  readonly applicationName?: string;
  readonly version?: string;
  readonly executionPlan?: ExecutionPlan;
}

/**
 * What the fast path hands to the background worker
 */
export interface AnalysisItem {
  readonly report: SlowQueryReport;
  readonly connection?: PlanConnection;
  readonly dataContext?: DataContextHandle;
}

export interface CommandStartingEvent extends CorrelationKey {
  commandText: string;
  parameters?: Record<string, unknown>;
  contextTag: string;
  connection?: PlanConnection;
  dataContext?: DataContextHandle;
}

export type CommandCompletedEvent = CorrelationKey;

export interface QueryPlanRow {
  'QUERY PLAN': unknown;
}
