import type { FileChange } from './models/change.js';
import type { WatchLostError } from './errors.js';

export type WatcherEvents = {
    change: (change: FileChange) => void;
    ready: (fileCount: number) => void;
    recovered: (attempt: number) => void;
    lost: (error: WatchLostError) => void;
}
