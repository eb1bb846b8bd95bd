export interface IServerConfig {
    host: string;
    port: number;
    debug: boolean;
    watchDirectory: string;
    ignore: string[];
    debounceMs: number;
    queueCapacity: number;
    heartbeatMs: number;
    retryMs: number;
    watchRetries: number;
    watchRetryBaseMs: number;
    shutdownGraceMs: number;
    mcp: boolean;
}
