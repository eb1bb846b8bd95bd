import type { NextResult, SubscriberQueue } from './subscriber-queue.js';

interface ISubscriberOptions {
    id: string;
    queue: SubscriberQueue;
    connectedSince: Date;
    lastDeliveredSequence: number;
}

/**
 * Consumer-side handle of a hub registration. The consumer that registered owns it;
 * the hub only keeps the queue, keyed by `id`.
 */
export class Subscriber {
    readonly id: string;
    readonly connectedSince: Date;
    readonly #queue: SubscriberQueue;
    #lastDeliveredSequence: number;

    constructor({ id, queue, connectedSince, lastDeliveredSequence }: ISubscriberOptions) {
        this.id = id;
        this.connectedSince = connectedSince;
        this.#queue = queue;
        this.#lastDeliveredSequence = lastDeliveredSequence;
    }

    get lastDeliveredSequence() {
        return this.#lastDeliveredSequence;
    }

    get droppedCount() {
        return this.#queue.droppedCount;
    }

    async next(idleMs?: number): Promise<NextResult> {
        const result = await this.#queue.next(idleMs);

        if (result.status === 'item') {
            const { item } = result;
            if (item.type === 'change') {
                this.#lastDeliveredSequence = item.record.sequence;
            } else if (item.type === 'gap') {
                this.#lastDeliveredSequence = item.to;
            }
        }

        return result;
    }
}
