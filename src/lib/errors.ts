export const describeError = (error: unknown): string => {
    if (error instanceof Error) {
        return error.message;
    }

    return String(error);
};

export class ConfigError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'ConfigError';
    }
}

/**
 * The watch root is missing, is not a directory, or cannot be read.
 */
export class WatchInitError extends Error {
    readonly path: string;

    constructor(path: string, reason: string, options?: ErrorOptions) {
        super(`Cannot watch ${path}: ${reason}`, options);
        this.name = 'WatchInitError';
        this.path = path;
    }
}

/**
 * The watch broke and could not be re-established within the retry budget.
 */
export class WatchLostError extends Error {
    readonly path: string;
    readonly attempts: number;

    constructor(path: string, attempts: number, options?: ErrorOptions) {
        super(`Lost watch on ${path} after ${attempts} recovery attempt(s)`, options);
        this.name = 'WatchLostError';
        this.path = path;
        this.attempts = attempts;
    }
}

export class ConnectionError extends Error {
    readonly subscriberId: string;

    constructor(subscriberId: string, message: string, options?: ErrorOptions) {
        super(`Subscriber ${subscriberId}: ${message}`, options);
        this.name = 'ConnectionError';
        this.subscriberId = subscriberId;
    }
}
