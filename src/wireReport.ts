import { PlanFormatDescriptor, describePlanFormat } from './executionPlan';
import { bytesToHex } from './literals';
import { SlowQueryReport } from './types';

export const TRUNCATION_MARKER = '\n-- [TRUNCATED]';

export interface WireExecutionPlan {
  databaseProvider: string;
  planFormat: PlanFormatDescriptor;
  content: string;
}

/**
 * Report as sent to HTTP endpoints. Field names are part of the contract.
 */
export interface WireReport {
  queryId: string;
  rawQuery: string;
  parameters: Record<string, unknown>;
  executionTimeMs: number;
  stackTrace: string[] | null;
  timestamp: string;
  contextType: string;
  environment: string;
  applicationName: string | null;
  version: string | null;
  executionPlan: WireExecutionPlan | null;
}

export function truncateQuery(query: string, maxLength: number): string {
  return query.length > maxLength ? query.slice(0, maxLength) + TRUNCATION_MARKER : query;
}

export function toWireValue(value: unknown): unknown {
  if (value === undefined || value === null) return null;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  if (value instanceof Uint8Array) return bytesToHex(value);
  if (typeof value === 'bigint') return value.toString();
  return value;
}

export function toWireReport(report: SlowQueryReport, maxQueryLength?: number): WireReport {
  const parameters: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(report.parameters)) {
    parameters[name] = toWireValue(value);
  }

  const plan = report.executionPlan;

  return {
    queryId: report.queryId,
    rawQuery: maxQueryLength === undefined ? report.rawQuery : truncateQuery(report.rawQuery, maxQueryLength),
    parameters,
    executionTimeMs: report.executionTimeMs,
    stackTrace: report.stackTrace ? [...report.stackTrace] : null,
    timestamp: new Date(report.timestamp).toISOString(),
    contextType: report.contextType,
    environment: report.environment,
    applicationName: report.applicationName ?? null,
    version: report.version ?? null,
    executionPlan: plan
      ? {
          databaseProvider: plan.databaseProvider,
          planFormat: describePlanFormat(plan.planFormat),
          content: plan.content,
        }
      : null,
  };
}
