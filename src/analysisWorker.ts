import { setTimeout as delay } from 'timers/promises';
import { AnalysisQueue } from './analysisQueue';
import { QueueProcessingError, toError } from './errors';
import { AnalyzerLogger, ErrorCallback, consoleLogger, reportAnalyzerError } from './logger';
import { DEFAULT_BATCH_SIZE, DEFAULT_POLL_INTERVAL_MS } from './options';
import { ExecutionPlanCapture } from './planCapture';
import { ReportingSink } from './reportingSink';
import { AnalysisItem } from './types';

export type AnalysisPipeline = (item: AnalysisItem, signal: AbortSignal) => Promise<void>;

/**
 * Plan capture (when configured) followed by reporting
 */
export function createAnalysisPipeline(sink: ReportingSink, planCapture?: ExecutionPlanCapture): AnalysisPipeline {
    return async (item, signal) => {
        let report = item.report;
        if (planCapture && !report.executionPlan) {
            const plan = await planCapture.capture(item, signal);
            if (plan) {
                report = Object.freeze({ ...report, executionPlan: plan });
            }
        }
        await sink.report(report, signal);
    };
}

export interface AnalysisWorkerOptions {
    batchSize?: number;
    pollIntervalMs?: number;
    errorBackoffMs?: number;
    logger?: AnalyzerLogger;
    onError?: ErrorCallback;
}

/**
 * Single consumer of the analysis queue. Drains up to batchSize items per
 * pass, then waits pollIntervalMs. stop() drains whatever is left.
 */
export class QueryAnalysisWorker {
    private readonly batchSize: number;
    private readonly pollIntervalMs: number;
    private readonly errorBackoffMs: number;
    private readonly logger: AnalyzerLogger;
    private readonly onError?: ErrorCallback;
    private loopController?: AbortController;
    // aborted only when the shutdown deadline passes; in-flight work sees it
    private processingController = new AbortController();
    private loop?: Promise<void>;
    private processed = 0;

    constructor(
        private readonly queue: AnalysisQueue<AnalysisItem>,
        private readonly pipeline: AnalysisPipeline,
        options: AnalysisWorkerOptions = {}
    ) {
        this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
        this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
        this.errorBackoffMs = options.errorBackoffMs ?? 1000;
        this.logger = options.logger ?? consoleLogger;
        this.onError = options.onError;
    }

    get isRunning(): boolean {
        return this.loop !== undefined;
    }

    get processedCount(): number {
        return this.processed;
    }

    start(): void {
        if (this.loop) {
            return;
        }
        this.loopController = new AbortController();
        this.processingController = new AbortController();
        this.loop = this.run(this.loopController.signal);
        this.logger.debug('Query analysis worker started');
    }

    /**
     * Stops the loop and processes every queued item. When the given signal
     * aborts, the remaining items are left in the queue.
     */
    async stop(signal?: AbortSignal): Promise<void> {
        const processing = this.processingController;
        const onDeadline = () => processing.abort();
        signal?.addEventListener('abort', onDeadline, { once: true });

        try {
            this.loopController?.abort();
            if (this.loop) {
                await this.loop;
            }

            let drained = 0;
            while (!signal?.aborted) {
                const item = this.queue.tryDequeue();
                if (!item) break;
                await this.processItem(item, processing.signal);
                drained++;
            }

            if (this.queue.size > 0) {
                this.logger.warn(`Query analysis worker stopped with ${this.queue.size} items left in the queue`);
            } else {
                this.logger.debug(`Query analysis worker stopped, ${drained} items processed during shutdown`);
            }
        } finally {
            signal?.removeEventListener('abort', onDeadline);
            this.loop = undefined;
            this.loopController = undefined;
        }
    }

    /**
     * Processes up to max queued items in FIFO order
     */
    async drainBatch(max: number = this.batchSize, signal?: AbortSignal): Promise<number> {
        let count = 0;
        while (count < max && !signal?.aborted) {
            const item = this.queue.tryDequeue();
            if (!item) break;
            await this.processItem(item, this.processingController.signal);
            count++;
        }
        return count;
    }

    private async run(signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            try {
                await this.drainBatch(this.batchSize, signal);
                await this.wait(this.pollIntervalMs, signal);
            } catch (e: unknown) {
                if (signal.aborted) break;
                this.logger.error('Error in query analysis loop', toError(e).message);
                try {
                    await this.wait(this.errorBackoffMs, signal);
                } catch (waitError: unknown) {
                    this.logger.error('Error while backing off', toError(waitError).message);
                }
            }
        }
    }

    private async wait(ms: number, signal: AbortSignal): Promise<void> {
        if (signal.aborted) return;
        try {
            await delay(ms, undefined, { signal, ref: false });
        } catch (e: unknown) {
            if (!signal.aborted) {
                throw e;
            }
        }
    }

    private async processItem(item: AnalysisItem, signal: AbortSignal): Promise<void> {
        try {
            await this.pipeline(item, signal);
            this.processed++;
        } catch (e: unknown) {
            reportAnalyzerError(
                new QueueProcessingError(item.report.rawQuery, toError(e)),
                this.logger,
                this.onError
            );
        }
    }
}
