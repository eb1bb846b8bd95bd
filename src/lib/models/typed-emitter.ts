type EventMap = {
    [key: string]: (...args: never[]) => void;
};

/**
 * Type-only view over a node:events EventEmitter with a fixed event map.
 */
export default interface TypedEventEmitter<Events extends EventMap> {
    on<E extends keyof Events>(event: E, listener: Events[E]): this;
    once<E extends keyof Events>(event: E, listener: Events[E]): this;
    off<E extends keyof Events>(event: E, listener: Events[E]): this;
    emit<E extends keyof Events>(event: E, ...args: Parameters<Events[E]>): boolean;
    removeAllListeners<E extends keyof Events>(event?: E): this;
    listenerCount<E extends keyof Events>(event: E): number;
}
