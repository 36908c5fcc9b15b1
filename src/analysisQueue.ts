import { AnalyzerLogger, consoleLogger } from './logger';
import { OverflowPolicy } from './types';

export interface AnalysisQueueOptions {
    maxSize?: number;
    overflow?: OverflowPolicy;
    logger?: AnalyzerLogger;
}

/**
 * FIFO hand-off between the query path and the background worker.
 * Unbounded unless maxSize is given; enqueue never blocks and never throws.
 */
export class AnalysisQueue<T> {
    private items: (T | undefined)[] = [];
    private head = 0;
    private dropped = 0;
    private readonly maxSize?: number;
    private readonly overflow: OverflowPolicy;
    private readonly logger: AnalyzerLogger;

    constructor(options: AnalysisQueueOptions = {}) {
        this.maxSize = options.maxSize !== undefined && options.maxSize > 0 ? options.maxSize : undefined;
        this.overflow = options.overflow ?? 'drop-oldest';
        this.logger = options.logger ?? consoleLogger;
    }

    get size(): number {
        return this.items.length - this.head;
    }

    get droppedCount(): number {
        return this.dropped;
    }

    /**
     * Returns false when the item was dropped by the overflow policy
     */
    enqueue(item: T): boolean {
        if (this.maxSize !== undefined && this.size >= this.maxSize) {
            this.dropped++;
            if (this.overflow === 'drop-newest') {
                this.logger.warn(`Analysis queue full (${this.maxSize}), dropping newest item`);
                return false;
            }
            this.logger.warn(`Analysis queue full (${this.maxSize}), dropping oldest item`);
            this.tryDequeue();
        }
        this.items.push(item);
        return true;
    }

    tryDequeue(): T | undefined {
        if (this.head >= this.items.length) {
            return undefined;
        }
        const item = this.items[this.head];
        this.items[this.head] = undefined;
        this.head++;

        if (this.head === this.items.length) {
            this.items = [];
            this.head = 0;
        } else if (this.head >= 1024 && this.head * 2 >= this.items.length) {
            this.items = this.items.slice(this.head);
            this.head = 0;
        }
        return item;
    }
}
