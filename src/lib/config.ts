import path from 'node:path';
import { z } from 'zod';
import type { IServerConfig } from './models/config.js';
import { ConfigError } from './errors.js';

const milliseconds = z.number().int().nonnegative();

const serverConfigSchema = z.object({
    host:             z.string().min(1),
    port:             z.number().int().min(0).max(65_535),
    debug:            z.boolean(),
    watchDirectory:   z.string().min(1, 'Watch directory must be non-empty'),
    ignore:           z.array(z.string().min(1)),
    debounceMs:       milliseconds,
    queueCapacity:    z.number().int().positive(),
    heartbeatMs:      milliseconds.positive(),
    retryMs:          milliseconds,
    watchRetries:     z.number().int().nonnegative(),
    watchRetryBaseMs: milliseconds.positive(),
    shutdownGraceMs:  milliseconds,
    mcp:              z.boolean()
});

export const createConfig = (input: z.input<typeof serverConfigSchema>): IServerConfig => {
    const result = serverConfigSchema.safeParse(input);
    if (!result.success) {
        const details = result.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration: ${details}`, { cause: result.error });
    }

    return {
        ...result.data,
        watchDirectory: path.resolve(result.data.watchDirectory)
    };
};
