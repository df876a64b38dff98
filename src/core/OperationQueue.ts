/**
 * @fileoverview Operation Queue - Serializes history operations
 * @module core/OperationQueue
 *
 * Every history mutation (poll tick, capture, restore, clear) runs through one
 * queue, so mutation + persistence + notification form a single critical
 * section and callers never observe a half-updated history.
 */

/**
 * Operation function type
 */
type Operation<T> = () => Promise<T> | T;

/**
 * Operation Queue
 * Runs enqueued operations one at a time, in order
 */
export class OperationQueue {
    private queue: Array<() => Promise<void>> = [];
    private processing = false;

    /**
     * Enqueue an operation
     * @param operation - Operation to execute
     * @returns Promise that settles with the operation's outcome
     */
    enqueue<T>(operation: Operation<T>): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            this.queue.push(async () => {
                try {
                    resolve(await operation());
                } catch (error) {
                    reject(error instanceof Error ? error : new Error(String(error)));
                }
            });

            if (!this.processing) {
                void this._processQueue();
            }
        });
    }

    /**
     * Process the queue
     * @private
     */
    private async _processQueue(): Promise<void> {
        if (this.processing) return;

        this.processing = true;

        while (this.queue.length > 0) {
            const run = this.queue.shift();
            if (!run) break;
            // run() never rejects: outcomes go to the enqueue() promise
            await run();
        }

        this.processing = false;
    }

    /**
     * Get queue length
     * @returns Number of operations waiting to run
     */
    getLength(): number {
        return this.queue.length;
    }

    /**
     * Check if queue is processing
     */
    isProcessing(): boolean {
        return this.processing;
    }
}
