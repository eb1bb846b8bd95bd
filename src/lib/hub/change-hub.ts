import type { ChangeRecord, ClosingReason, FileChange, IClosingNotice, IGapMarker } from '../models/change.js';
import { logDebug, logInfo } from '../util/logger.js';
import { Subscriber } from './subscriber.js';
import { SubscriberQueue } from './subscriber-queue.js';

export const DEFAULT_QUEUE_CAPACITY = 256;

export interface IChangeHubOptions {
    queueCapacity?: number;
    clock?: () => Date;
}

export interface IRegisterOptions {
    // Last sequence the client saw on a previous connection.
    lastEventId?: number;
}

/**
 * Owns the subscriber registrations and the sequence counter. `register`,
 * `unregister`, `publish` and `close` are the only ways to change either, and
 * each runs to completion on the event loop, so no two publishes can share a
 * sequence and no publish can interleave with a registration change.
 */
export class ChangeHub {
    readonly #queueCapacity: number;
    readonly #clock: () => Date;
    readonly #queues = new Map<string /*subscriberId*/, SubscriberQueue>();
    #emptyWaiters: Array<() => void> = [];
    #sequence = 0;
    #nextSubscriberId = 1;
    #closing: IClosingNotice | undefined = undefined;

    constructor({ queueCapacity = DEFAULT_QUEUE_CAPACITY, clock = () => new Date() }: IChangeHubOptions = {}) {
        this.#queueCapacity = queueCapacity;
        this.#clock = clock;
    }

    // Last sequence handed out; 0 before the first publish.
    get sequence() {
        return this.#sequence;
    }

    get subscriberCount() {
        return this.#queues.size;
    }

    get isClosed() {
        return this.#closing !== undefined;
    }

    // History is not kept, so a resuming client is told what it missed instead.
    #getResumeGap(lastEventId: number | undefined): IGapMarker | undefined {
        const current = this.#sequence;
        if (lastEventId === undefined || current === 0 || lastEventId === current) {
            return undefined;
        }

        // Ids above the counter come from an earlier run of the process.
        const from = lastEventId < current ? lastEventId + 1 : 1;
        return { type: 'gap', from, to: current };
    }

    register({ lastEventId }: IRegisterOptions = {}): Subscriber {
        const id = `sub-${this.#nextSubscriberId++}`;
        const gap = this.#getResumeGap(lastEventId);
        const queue = new SubscriberQueue(this.#queueCapacity, gap);

        if (this.#closing) {
            queue.close(this.#closing);
        } else {
            this.#queues.set(id, queue);
        }

        logDebug(`[Hub] Registered ${id} at sequence ${this.#sequence}${gap ? ` (resuming, missed ${gap.from}-${gap.to})` : ''}`);

        return new Subscriber({
            id,
            queue,
            connectedSince:        this.#clock(),
            lastDeliveredSequence: gap ? gap.from - 1 : this.#sequence
        });
    }

    unregister(id: string) {
        const queue = this.#queues.get(id);
        if (!queue) {
            return;
        }

        queue.dispose();
        this.#queues.delete(id);
        logDebug(`[Hub] Unregistered ${id}`);

        if (this.#queues.size === 0) {
            const waiters = this.#emptyWaiters;
            this.#emptyWaiters = [];
            for (const resolve of waiters) {
                resolve();
            }
        }
    }

    publish(change: FileChange): ChangeRecord | undefined {
        if (this.#closing) {
            return undefined;
        }

        const record: ChangeRecord = Object.freeze({
            ...change,
            sequence:  ++this.#sequence,
            timestamp: this.#clock().toISOString()
        });

        for (const [id, queue] of this.#queues) {
            if (!queue.push(record)) {
                logDebug(`[Hub] ${id} is full; dropped its oldest record before ${record.sequence}`);
            }
        }

        return record;
    }

    /**
     * Ends every subscription with a closing notice queued behind its pending records.
     */
    close(reason: ClosingReason) {
        if (this.#closing) {
            return;
        }

        const closing: IClosingNotice = { type: 'closing', reason, sequence: this.#sequence };
        this.#closing = closing;
        logInfo(`[Hub] Closing (${reason}) with ${this.#queues.size} subscriber(s) at sequence ${this.#sequence}`);

        for (const queue of this.#queues.values()) {
            queue.close(closing);
        }
    }

    whenEmpty(): Promise<void> {
        if (this.#queues.size === 0) {
            return Promise.resolve();
        }

        return new Promise((resolve) => {
            this.#emptyWaiters.push(resolve);
        });
    }
}
