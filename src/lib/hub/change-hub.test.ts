import { describe, expect, it, vi } from 'vitest';
import type { Delivery } from '../models/change.js';
import { ChangeCoalescer } from '../watcher/coalescer.js';
import { ChangeHub } from './change-hub.js';
import type { Subscriber } from './subscriber.js';

const NOW = new Date('2024-05-01T12:00:00.000Z');
const TIMESTAMP = NOW.toISOString();

const createHub = (queueCapacity = 16) => new ChangeHub({ queueCapacity, clock: () => NOW });

const takeAvailable = async (subscriber: Subscriber): Promise<Delivery[]> => {
    const items: Delivery[] = [];
    for (;;) {
        const result = await subscriber.next(0);
        if (result.status !== 'item') {
            return items;
        }
        items.push(result.item);
    }
};

const sequencesOf = (items: Delivery[]) => items.map(item => item.type === 'change' ? item.record.sequence : item.type);

describe('ChangeHub', () => {
    it('assigns increasing sequences starting at one', () => {
        const hub = createHub();

        const first = hub.publish({ kind: 'created', path: 'a.txt' });
        const second = hub.publish({ kind: 'renamed', path: 'b.txt', previousPath: 'a.txt' });

        expect(first).toEqual({ kind: 'created', path: 'a.txt', sequence: 1, timestamp: TIMESTAMP });
        expect(second).toEqual({ kind: 'renamed', path: 'b.txt', previousPath: 'a.txt', sequence: 2, timestamp: TIMESTAMP });
        expect(Object.isFrozen(first)).toBe(true);
        expect(hub.sequence).toBe(2);
    });

    it('delivers every record to every subscriber in order', async () => {
        const hub = createHub();
        const first = hub.register();
        const second = hub.register();

        for (let i = 0; i < 10; i++) {
            hub.publish({ kind: 'modified', path: `file-${i}.txt` });
        }

        const expected = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];
        expect(sequencesOf(await takeAvailable(first))).toEqual(expected);
        expect(sequencesOf(await takeAvailable(second))).toEqual(expected);
        expect(first.lastDeliveredSequence).toBe(10);
    });

    it('gives subscribers distinct ids', () => {
        const hub = createHub();

        expect(hub.register().id).toBe('sub-1');
        expect(hub.register().id).toBe('sub-2');
        expect(hub.subscriberCount).toBe(2);
    });

    it('only delivers records published after registration', async () => {
        const hub = createHub();
        hub.publish({ kind: 'created', path: 'a.txt' });

        const subscriber = hub.register();
        hub.publish({ kind: 'modified', path: 'a.txt' });

        expect(sequencesOf(await takeAvailable(subscriber))).toEqual([2]);
    });

    it('reports a single gap when a subscriber falls behind', async () => {
        const hub = createHub(4);
        const slow = hub.register();
        const fast = hub.register();

        for (let i = 0; i < 3; i++) {
            hub.publish({ kind: 'modified', path: 'a.txt' });
        }
        expect(sequencesOf(await takeAvailable(fast))).toEqual([1, 2, 3]);

        for (let i = 0; i < 4; i++) {
            hub.publish({ kind: 'modified', path: 'a.txt' });
        }

        expect(await takeAvailable(slow)).toEqual([
            { type: 'gap', from: 1, to: 3 },
            { type: 'change', record: { kind: 'modified', path: 'a.txt', sequence: 4, timestamp: TIMESTAMP } },
            { type: 'change', record: { kind: 'modified', path: 'a.txt', sequence: 5, timestamp: TIMESTAMP } },
            { type: 'change', record: { kind: 'modified', path: 'a.txt', sequence: 6, timestamp: TIMESTAMP } },
            { type: 'change', record: { kind: 'modified', path: 'a.txt', sequence: 7, timestamp: TIMESTAMP } }
        ]);
        expect(slow.droppedCount).toBe(3);
        expect(sequencesOf(await takeAvailable(fast))).toEqual([4, 5, 6, 7]);
    });

    it('stops delivering to an unregistered subscriber', async () => {
        const hub = createHub();
        const leaving = hub.register();
        const staying = hub.register();

        hub.publish({ kind: 'created', path: 'a.txt' });
        hub.unregister(leaving.id);
        hub.publish({ kind: 'deleted', path: 'a.txt' });

        expect(hub.subscriberCount).toBe(1);
        await expect(leaving.next()).resolves.toEqual({ status: 'ended' });
        expect(sequencesOf(await takeAvailable(staying))).toEqual([1, 2]);
    });

    it('ignores repeated and unknown unregistrations', () => {
        const hub = createHub();
        const subscriber = hub.register();

        hub.unregister(subscriber.id);
        hub.unregister(subscriber.id);
        hub.unregister('sub-404');

        expect(hub.subscriberCount).toBe(0);
    });

    it('publishes with no subscribers', () => {
        const hub = createHub();

        expect(hub.publish({ kind: 'created', path: 'a.txt' })?.sequence).toBe(1);
    });

    describe('resuming', () => {
        const createHubAt = (sequence: number) => {
            const hub = createHub();
            for (let i = 0; i < sequence; i++) {
                hub.publish({ kind: 'modified', path: 'a.txt' });
            }
            return hub;
        };

        it('reports what was missed since the last seen id', async () => {
            const hub = createHubAt(5);
            const subscriber = hub.register({ lastEventId: 2 });

            expect(subscriber.lastDeliveredSequence).toBe(2);

            hub.publish({ kind: 'modified', path: 'a.txt' });

            const items = await takeAvailable(subscriber);
            expect(items[0]).toEqual({ type: 'gap', from: 3, to: 5 });
            expect(sequencesOf(items.slice(1))).toEqual([6]);
            expect(subscriber.lastDeliveredSequence).toBe(6);
        });

        it('reports nothing when the client is up to date', async () => {
            const hub = createHubAt(5);
            const subscriber = hub.register({ lastEventId: 5 });

            expect(await takeAvailable(subscriber)).toEqual([]);
        });

        it('reports everything when the id is ahead of the counter', async () => {
            const hub = createHubAt(5);
            const subscriber = hub.register({ lastEventId: 40 });

            expect(await takeAvailable(subscriber)).toEqual([{ type: 'gap', from: 1, to: 5 }]);
        });

        it('reports nothing when nothing has been published', async () => {
            const hub = createHubAt(0);
            const subscriber = hub.register({ lastEventId: 40 });

            expect(await takeAvailable(subscriber)).toEqual([]);
        });
    });

    describe('close', () => {
        it('queues a closing notice behind pending records', async () => {
            const hub = createHub();
            const subscriber = hub.register();
            hub.publish({ kind: 'created', path: 'a.txt' });

            hub.close('shutdown');

            expect(hub.isClosed).toBe(true);
            expect(await subscriber.next()).toEqual({
                status: 'item',
                item:   { type: 'change', record: { kind: 'created', path: 'a.txt', sequence: 1, timestamp: TIMESTAMP } }
            });
            expect(await subscriber.next()).toEqual({
                status: 'item',
                item:   { type: 'closing', reason: 'shutdown', sequence: 1 }
            });
            expect(await subscriber.next()).toEqual({ status: 'ended' });
        });

        it('stops sequencing after close', () => {
            const hub = createHub();
            hub.publish({ kind: 'created', path: 'a.txt' });
            hub.close('watch-lost');

            expect(hub.publish({ kind: 'modified', path: 'a.txt' })).toBeUndefined();
            expect(hub.sequence).toBe(1);
        });

        it('sends late registrations straight to the closing notice', async () => {
            const hub = createHub();
            hub.close('shutdown');

            const subscriber = hub.register();

            expect(hub.subscriberCount).toBe(0);
            expect(await subscriber.next()).toEqual({
                status: 'item',
                item:   { type: 'closing', reason: 'shutdown', sequence: 0 }
            });
        });

        it('resolves whenEmpty once the last subscriber leaves', async () => {
            const hub = createHub();
            const first = hub.register();
            const second = hub.register();
            let isEmpty = false;

            const waiting = hub.whenEmpty().then(() => {
                isEmpty = true;
            });

            hub.unregister(first.id);
            await Promise.resolve();
            expect(isEmpty).toBe(false);

            hub.unregister(second.id);
            await waiting;
            expect(isEmpty).toBe(true);
        });
    });

    it('sequences a create, a burst of edits and a delete as three records', async () => {
        vi.useFakeTimers();
        try {
            const hub = createHub();
            const subscriber = hub.register();
            const coalescer = new ChangeCoalescer(200, change => hub.publish(change));

            coalescer.push({ kind: 'created', path: 'a.txt' });
            vi.advanceTimersByTime(250);
            coalescer.push({ kind: 'modified', path: 'a.txt' });
            vi.advanceTimersByTime(50);
            coalescer.push({ kind: 'modified', path: 'a.txt' });
            vi.advanceTimersByTime(250);
            coalescer.push({ kind: 'deleted', path: 'a.txt' });
            vi.advanceTimersByTime(250);

            const kinds: string[] = [];
            for (let i = 0; i < 3; i++) {
                const result = await subscriber.next();
                if (result.status === 'item' && result.item.type === 'change') {
                    kinds.push(`${result.item.record.sequence}:${result.item.record.kind}`);
                }
            }

            expect(kinds).toEqual(['1:created', '2:modified', '3:deleted']);
        } finally {
            vi.useRealTimers();
        }
    });
});
