import type { LoggingLevel } from '@modelcontextprotocol/sdk/types.js';

export type LogLevel = Extract<LoggingLevel, 'debug' | 'info' | 'warning' | 'error'>;

export type LogForwarder = (level: LogLevel, message: string) => void;

const forwarders = new Set<LogForwarder>();
let isDebugEnabled = false;

export const setDebugLogging = (enabled: boolean) => {
    isDebugEnabled = enabled;
};

/**
 * Mirrors every log line to the forwarder until the returned function is called.
 */
export const addLogForwarder = (forwarder: LogForwarder): (() => void) => {
    forwarders.add(forwarder);
    return () => {
        forwarders.delete(forwarder);
    };
};

const log = (message: string, level: LogLevel, write: (line: string) => void) => {
    if (level === 'debug' && !isDebugEnabled) {
        return;
    }

    write(`${new Date().toISOString()} [${level}] ${message}`);

    for (const forward of forwarders) {
        forward(level, message);
    }
};

export const logInfo = (message: string) => {
    log(message, 'info', console.log);
};

export const logError = (message: string) => {
    log(message, 'error', console.error);
};

export const logDebug = (message: string) => {
    log(message, 'debug', console.debug);
};

export const logWarn = (message: string) => {
    log(message, 'warning', console.warn);
};
