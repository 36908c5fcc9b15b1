export { enableAnalyzer, createReportingSink, QueryAnalyzer } from './analyzer';
export { AnalysisQueue, AnalysisQueueOptions } from './analysisQueue';
export { QueryAnalysisWorker, AnalysisWorkerOptions, AnalysisPipeline, createAnalysisPipeline } from './analysisWorker';
export { CsvReportingSink, CsvReportingSinkOptions, toCsvRow } from './csvReportingSink';
export {
    AnalyzerError,
    CsvError,
    PlanCaptureError,
    PlanCaptureStage,
    PlanCaptureTimeoutError,
    QueueProcessingError,
    ReportDeliveryError,
    ReportingError,
    TrackingError,
} from './errors';
export {
    DatabaseProvider,
    DatabaseProviderSetting,
    ExecutionPlan,
    PlanFormat,
    PlanFormatDescriptor,
    describePlanFormat,
    providerFromDialect,
} from './executionPlan';
export { HttpReportingSink, HttpReportingSinkOptions } from './httpReportingSink';
export { QueryPerformanceInterceptor, QueryPerformanceInterceptorOptions } from './interceptor';
export { substituteParameters, toSqlLiteral } from './literals';
export { AnalyzerLogger, ErrorCallback, consoleLogger } from './logger';
export { OperationTracker, OperationTrackerOptions, StartOperation, systemClock } from './operationTracker';
export { optionsFromEnv, resolveOptions } from './options';
export { ExecutionPlanCapture, ExecutionPlanCaptureOptions } from './planCapture';
export { PlanDialect, getPlanDialect } from './planDialects';
export {
    CompositeReportingSink,
    InMemoryReportingSink,
    ReportOutcome,
    ReportingSink,
} from './reportingSink';
export {
    InstrumentableSequelize,
    SequelizeConnectionFactory,
    SequelizeConnectionFactoryOptions,
    SequelizeInstrumentation,
    SequelizePlanConnection,
    instrumentSequelize,
} from './sequelizeAdapter';
export { StackCaptureProvider, StackTraceFilter, V8StackCaptureProvider, findProjectRoot } from './stackTrace';
export { ThresholdEvaluator, ReportIdentity, isSlow, toReport } from './thresholdEvaluator';
export { WireReport, toWireReport } from './wireReport';
export * from './types';
