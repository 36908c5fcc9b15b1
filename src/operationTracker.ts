import { v4 as uuidv4 } from 'uuid';
import { TrackingError, toError } from './errors';
import { AnalyzerLogger, ErrorCallback, consoleLogger, reportAnalyzerError } from './logger';
import { StackTraceFilter } from './stackTrace';
import {
  Clock,
  CompletedOperation,
  CorrelationKey,
  DataContextHandle,
  ParameterSnapshot,
  PlanConnection,
  TrackedOperation,
} from './types';

export const systemClock: Clock = {
  now: () => Date.now(),
  monotonic: () => performance.now(),
};

export interface StartOperation {
  key: CorrelationKey;
  commandText: string;
  parameters?: Record<string, unknown>;
  contextTag: string;
  connection?: PlanConnection;
  dataContext?: DataContextHandle;
  captureStack: boolean;
}

export interface OperationTrackerOptions {
  clock?: Clock;
  stackTraceFilter?: StackTraceFilter;
  maxStackTraceLines?: number;
  logger?: AnalyzerLogger;
  onError?: ErrorCallback;
}

/**
 * Holds the commands that are currently executing, keyed by
 * (connection id, command id). Entries are inserted on start and
 * removed on completion; nothing else touches the map.
 */
export class OperationTracker {
  private readonly active = new Map<string, TrackedOperation>();
  private readonly clock: Clock;
  private readonly maxStackTraceLines: number;
  private readonly logger: AnalyzerLogger;
  private readonly onError?: ErrorCallback;
  private stackTraceFilter?: StackTraceFilter;

  constructor(options: OperationTrackerOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.stackTraceFilter = options.stackTraceFilter;
    this.maxStackTraceLines = options.maxStackTraceLines ?? 20;
    this.logger = options.logger ?? consoleLogger;
    this.onError = options.onError;
  }

  get size(): number {
    return this.active.size;
  }

  /**
   * Begins tracking a command. Returns the new operation id, or undefined
   * when the operation could not be recorded. Never throws.
   */
  start(operation: StartOperation): string | undefined {
    try {
      const stackTrace = operation.captureStack ? this.captureStack() : undefined;
      const parameters = snapshotParameters(operation.parameters);
      // read the clock last so tracking overhead stays out of the elapsed time
      const tracked: TrackedOperation = {
        operationId: uuidv4(),
        key: { connectionId: operation.key.connectionId, commandId: operation.key.commandId },
        commandText: operation.commandText,
        parameters,
        contextTag: operation.contextTag,
        stackTrace,
        startTime: this.clock.now(),
        startMark: this.clock.monotonic(),
        connection: operation.connection,
        dataContext: operation.dataContext,
      };

      const mapKey = toMapKey(operation.key);
      if (this.active.has(mapKey)) {
        this.logger.warn(
          `Replacing stale tracked query for connection ${operation.key.connectionId}, command ${operation.key.commandId}`
        );
      }
      this.active.set(mapKey, tracked);

      this.logger.debug(`Query tracking started: ${tracked.operationId}`);
      return tracked.operationId;
    } catch (e: unknown) {
      reportAnalyzerError(new TrackingError(operation.commandText, toError(e)), this.logger, this.onError);
      return undefined;
    }
  }

  /**
   * Stops tracking the command with the given key. A key without an
   * active operation yields undefined.
   */
  complete(key: CorrelationKey): CompletedOperation | undefined {
    const mapKey = toMapKey(key);
    const tracked = this.active.get(mapKey);
    if (!tracked) {
      this.logger.debug(`No tracked query for connection ${key.connectionId}, command ${key.commandId}`);
      return undefined;
    }
    this.active.delete(mapKey);

    const elapsedMs = Math.max(0, this.clock.monotonic() - tracked.startMark);
    return { ...tracked, endTime: this.clock.now(), elapsedMs };
  }

  private captureStack(): readonly string[] | undefined {
    try {
      if (!this.stackTraceFilter) {
        this.stackTraceFilter = new StackTraceFilter();
      }
      const lines = this.stackTraceFilter.capture(this.maxStackTraceLines);
      return lines.length > 0 ? Object.freeze(lines) : undefined;
    } catch (e: unknown) {
      this.logger.warn('Error capturing stack trace', toError(e).message);
      return undefined;
    }
  }
}

function toMapKey(key: CorrelationKey): string {
  return JSON.stringify([key.connectionId, key.commandId]);
}

/**
 * Copies the parameter values so later changes made by the caller do not
 * reach the tracked operation
 */
export function snapshotParameters(parameters?: Record<string, unknown>): ParameterSnapshot {
  const snapshot: Record<string, unknown> = {};
  if (parameters) {
    for (const [name, value] of Object.entries(parameters)) {
      snapshot[name] = copyValue(value);
    }
  }
  return Object.freeze(snapshot);
}

function copyValue(value: unknown): unknown {
  if (value === undefined) return null;
  if (value instanceof Date) return new Date(value.getTime());
  if (Buffer.isBuffer(value)) return Buffer.from(value);
  if (value instanceof Uint8Array) return new Uint8Array(value);
  if (Array.isArray(value)) return value.map(element => (element === undefined ? undefined : copyValue(element)));
  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {};
    for (const [name, nested] of Object.entries(value)) {
      copy[name] = nested === undefined ? undefined : copyValue(nested);
    }
    return copy;
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}
