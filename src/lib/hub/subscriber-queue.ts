import type { ChangeRecord, Delivery, IClosingNotice, IGapMarker } from '../models/change.js';

export type NextResult =
    | { status: 'item'; item: Delivery }
    | { status: 'idle' }
    | { status: 'ended' };

type Waiter = (result: NextResult) => void;

/**
 * Bounded single-consumer queue. When full, the oldest record is evicted and
 * folded into the one gap marker that sits ahead of the remaining records, so
 * memory stays at `capacity` records plus one marker.
 */
export class SubscriberQueue {
    readonly #capacity: number;
    readonly #records: ChangeRecord[] = [];
    #gap: IGapMarker | undefined;
    #closing: IClosingNotice | undefined = undefined;
    #waiter: Waiter | undefined = undefined;
    #droppedCount = 0;
    #isDisposed = false;
    #isEnded = false;

    constructor(capacity: number, initialGap?: IGapMarker) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
        }

        this.#capacity = capacity;
        this.#gap = initialGap;
    }

    get size() {
        return this.#records.length;
    }

    get droppedCount() {
        return this.#droppedCount;
    }

    get isDisposed() {
        return this.#isDisposed;
    }

    #take(): Delivery | undefined {
        if (this.#gap) {
            const gap = this.#gap;
            this.#gap = undefined;
            return gap;
        }

        const record = this.#records.shift();
        if (record) {
            return { type: 'change', record };
        }

        if (this.#closing) {
            const closing = this.#closing;
            this.#closing = undefined;
            this.#isEnded = true;
            return closing;
        }

        return undefined;
    }

    #wake() {
        if (!this.#waiter) {
            return;
        }

        const item = this.#take();
        if (item) {
            this.#waiter({ status: 'item', item });
        }
    }

    /**
     * Returns false when the queue was full and its oldest record was dropped.
     */
    push(record: ChangeRecord): boolean {
        if (this.#isDisposed || this.#closing || this.#isEnded) {
            return true;
        }

        let didFit = true;
        if (this.#records.length >= this.#capacity) {
            const evicted = this.#records.shift();
            if (evicted) {
                this.#gap = this.#gap
                    ? { ...this.#gap, to: evicted.sequence }
                    : { type: 'gap', from: evicted.sequence, to: evicted.sequence };
                this.#droppedCount += 1;
                didFit = false;
            }
        }

        this.#records.push(record);
        this.#wake();
        return didFit;
    }

    // Delivered after everything already queued; the queue ends once it has been taken.
    close(notice: IClosingNotice) {
        if (this.#isDisposed || this.#closing || this.#isEnded) {
            return;
        }

        this.#closing = notice;
        this.#wake();
    }

    dispose() {
        if (this.#isDisposed) {
            return;
        }

        this.#isDisposed = true;
        this.#records.length = 0;
        this.#gap = undefined;
        this.#closing = undefined;
        this.#waiter?.({ status: 'ended' });
    }

    /**
     * Waits for the next delivery. With `idleMs`, resolves `idle` if nothing arrives in time.
     */
    next(idleMs?: number): Promise<NextResult> {
        if (this.#isDisposed || this.#isEnded) {
            return Promise.resolve({ status: 'ended' });
        }

        const item = this.#take();
        if (item) {
            return Promise.resolve({ status: 'item', item });
        }

        if (this.#waiter) {
            return Promise.reject(new Error('SubscriberQueue supports a single pending reader'));
        }

        return new Promise<NextResult>((resolve) => {
            const timeoutHandle = idleMs === undefined
                ? undefined
                : setTimeout(() => {
                    this.#waiter = undefined;
                    resolve({ status: 'idle' });
                }, idleMs);

            this.#waiter = (result) => {
                clearTimeout(timeoutHandle);
                this.#waiter = undefined;
                resolve(result);
            };
        });
    }
}
