import type { ChangeHub } from '../hub/change-hub.js';
import type { Subscriber } from '../hub/subscriber.js';
import { ConnectionError, describeError } from '../errors.js';
import { logDebug, logInfo } from '../util/logger.js';
import {
    encodeDelivery,
    encodeHeartbeat,
    encodeOpenAcknowledgment,
    type ISseFrame
} from './sse-codec.js';

export const DEFAULT_HEARTBEAT_MS = 15_000;
export const DEFAULT_RETRY_MS = 2_000;

/**
 * The part of hono's SSEStreamingApi a session writes through.
 */
export interface ISessionStream {
    readonly aborted: boolean;
    readonly closed: boolean;
    write(input: string): Promise<unknown>;
    writeSSE(message: ISseFrame): Promise<void>;
    onAbort(listener: () => void | Promise<void>): void;
}

export interface IStreamSessionOptions {
    hub: ChangeHub;
    stream: ISessionStream;
    lastEventId?: number;
    heartbeatMs?: number;
    retryMs?: number;
    clock?: () => Date;
}

/**
 * One connected event-stream client: its hub registration plus the loop that
 * drains the registration onto the stream.
 */
export class StreamSession {
    readonly #hub: ChangeHub;
    readonly #stream: ISessionStream;
    readonly #subscriber: Subscriber;
    readonly #heartbeatMs: number;
    readonly #retryMs: number;
    readonly #clock: () => Date;
    #isEnded = false;

    constructor({
        hub,
        stream,
        lastEventId,
        heartbeatMs = DEFAULT_HEARTBEAT_MS,
        retryMs = DEFAULT_RETRY_MS,
        clock = () => new Date()
    }: IStreamSessionOptions) {
        this.#hub = hub;
        this.#stream = stream;
        this.#heartbeatMs = heartbeatMs;
        this.#retryMs = retryMs;
        this.#clock = clock;
        this.#subscriber = hub.register({ lastEventId });

        stream.onAbort(() => {
            this.#end('client disconnected');
        });
    }

    get id() {
        return this.#subscriber.id;
    }

    get isEnded() {
        return this.#isEnded;
    }

    async #write(frame: ISseFrame | string) {
        try {
            if (typeof frame === 'string') {
                await this.#stream.write(frame);
            } else {
                await this.#stream.writeSSE(frame);
            }
        } catch (err) {
            throw new ConnectionError(this.id, 'write failed', { cause: err });
        }

        if (this.#stream.aborted || this.#stream.closed) {
            throw new ConnectionError(this.id, 'stream is no longer writable');
        }
    }

    #end(reason: string) {
        if (this.#isEnded) {
            return;
        }

        this.#isEnded = true;
        this.#hub.unregister(this.id);

        const connectedForMs = this.#clock().getTime() - this.#subscriber.connectedSince.getTime();
        logInfo(`[Session] ${this.id} ended after ${connectedForMs}ms at sequence ${this.#subscriber.lastDeliveredSequence}: ${reason}`);
    }

    /**
     * Resolves once the session is over: the client left, a write failed, or the hub closed.
     */
    async run(): Promise<void> {
        logInfo(`[Session] ${this.id} connected`);
        let endReason = 'queue ended';

        try {
            await this.#write(encodeOpenAcknowledgment(this.id, this.#retryMs));

            while (!this.#isEnded) {
                const result = await this.#subscriber.next(this.#heartbeatMs);

                if (result.status === 'ended') {
                    break;
                }

                if (result.status === 'idle') {
                    await this.#write(encodeHeartbeat(this.#clock()));
                    continue;
                }

                await this.#write(encodeDelivery(result.item));

                if (result.item.type === 'closing') {
                    endReason = `server closing (${result.item.reason})`;
                    break;
                }
            }
        } catch (err) {
            if (!(err instanceof ConnectionError)) {
                throw err;
            }

            logDebug(`[Session] ${describeError(err)}`);
            endReason = 'connection error';
        } finally {
            this.#end(endReason);
        }
    }
}
