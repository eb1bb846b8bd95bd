import { z } from 'zod';
import type { Delivery } from '../models/change.js';

// Structurally the SSEMessage accepted by hono's `writeSSE`.
export interface ISseFrame {
    data: string;
    event?: string;
    id?: string;
    retry?: number;
}

const lastEventIdSchema = z.string()
    .regex(/^\d+$/)
    .pipe(z.coerce.number().int().nonnegative().safe());

/**
 * `Last-Event-ID` as a sequence number; anything that is not one is treated as absent.
 */
export const parseLastEventId = (value: string | undefined): number | undefined => {
    if (value === undefined || value.trim() === '') {
        return undefined;
    }

    const result = lastEventIdSchema.safeParse(value.trim());
    return result.success ? result.data : undefined;
};

export const encodeDelivery = (delivery: Delivery): ISseFrame => {
    switch (delivery.type) {
        case 'change': {
            const { record } = delivery;
            const payload = record.kind === 'renamed'
                ? {
                    sequence:     record.sequence,
                    kind:         record.kind,
                    path:         record.path,
                    previousPath: record.previousPath,
                    timestamp:    record.timestamp
                }
                : {
                    sequence:  record.sequence,
                    kind:      record.kind,
                    path:      record.path,
                    timestamp: record.timestamp
                };

            return {
                id:    String(record.sequence),
                event: record.kind,
                data:  JSON.stringify(payload)
            };
        }
        case 'gap':
            return {
                id:    String(delivery.to),
                event: 'gap',
                data:  JSON.stringify({ from: delivery.from, to: delivery.to })
            };
        case 'closing':
            return {
                event: 'closing',
                data:  JSON.stringify({ reason: delivery.reason, sequence: delivery.sequence })
            };
    }
};

export const encodeHeartbeat = (timestamp: Date): ISseFrame => ({
    event: 'heartbeat',
    data:  JSON.stringify({ timestamp: timestamp.toISOString() })
});

/**
 * Raw text written before anything else. Carries no data field, so clients do not
 * dispatch an event for it, but it gets bytes onto the wire for liveness probes.
 */
export const encodeOpenAcknowledgment = (subscriberId: string, retryMs: number): string => {
    return `retry: ${retryMs}\n: connected ${subscriberId}\n\n`;
};
