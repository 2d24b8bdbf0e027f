import { Logger } from '../utils/logger';

/**
 * Accepts work that must not delay the caller. Deferred tasks run after the
 * response has been sent; a failing task is logged and never retried.
 */
export interface TaskScheduler {
    defer(label: string, task: () => Promise<unknown>): void;
}

interface DeferredTask {
    label: string;
    task: () => Promise<unknown>;
}

/**
 * Request-scoped queue. The HTTP layer creates one per request and drains it
 * from the `onResponse` hook.
 */
export class BackgroundTasks implements TaskScheduler {
    private queue: DeferredTask[] = [];

    constructor(private readonly logger: Logger) {}

    defer(label: string, task: () => Promise<unknown>): void {
        this.queue.push({ label, task });
    }

    get size(): number {
        return this.queue.length;
    }

    /** Runs every queued task in submission order. Tasks queued while running are picked up too. */
    async run(): Promise<void> {
        while (this.queue.length > 0) {
            const pending = this.queue;
            this.queue = [];
            for (const { label, task } of pending) {
                try {
                    await task();
                    this.logger.debug({ task: label }, 'Background task finished');
                } catch (error) {
                    this.logger.warn({ err: error, task: label }, 'Background task failed');
                }
            }
        }
    }
}
