import EventEmitter from 'node:events';
import type { Stats } from 'node:fs';
import chokidar, { type FSWatcher } from 'chokidar';
import type TypedEventEmitter from '../models/typed-emitter.js';
import type { WatcherEvents } from '../events.js';
import { describeError, WatchLostError } from '../errors.js';
import { assertWatchableDirectory, toRelativePath } from '../util/filesystem.js';
import { delay } from '../util/delay.js';
import { logDebug, logInfo, logWarn } from '../util/logger.js';
import { ChangeCoalescer, isSameFile, type IFileIdentity, type IRawChange } from './coalescer.js';

export const MAX_BACKOFF_MS = 30_000;

export const getBackoffDelay = (attempt: number, baseMs: number): number => {
    return Math.min(baseMs * 2 ** (attempt - 1), MAX_BACKOFF_MS);
};

export interface IDirectoryWatcherOptions {
    // Absolute path of the directory to watch.
    root: string;
    debounceMs: number;
    // Path segments whose subtrees are skipped, e.g. `.git`.
    ignore?: string[];
    retries?: number;
    retryBaseMs?: number;
}

type FileEntry = IFileIdentity | undefined;

const toFileEntry = (stats: Stats | undefined): FileEntry => {
    if (!stats) {
        return undefined;
    }

    return {
        dev:     stats.dev,
        inode:   stats.ino,
        size:    stats.size,
        mtimeMs: stats.mtimeMs
    };
};

export class DirectoryWatcher {
    readonly events = new EventEmitter() as TypedEventEmitter<WatcherEvents>;
    readonly #root: string;
    readonly #ignore: Set<string>;
    readonly #retries: number;
    readonly #retryBaseMs: number;
    readonly #coalescer: ChangeCoalescer;
    readonly #files = new Map<string /*relativePath*/, FileEntry>();
    readonly #closeController = new AbortController();
    #watcher: FSWatcher | undefined = undefined;
    #isRecovering = false;
    #isClosed = false;

    constructor({ root, debounceMs, ignore = [], retries = 5, retryBaseMs = 500 }: IDirectoryWatcherOptions) {
        this.#root = root;
        this.#ignore = new Set(ignore);
        this.#retries = retries;
        this.#retryBaseMs = retryBaseMs;
        this.#coalescer = new ChangeCoalescer(debounceMs, (change) => {
            logDebug(`[Watcher] ${change.kind} ${change.path}`);
            this.events.emit('change', change);
        });
    }

    get root() {
        return this.#root;
    }

    get isWatching() {
        return this.#watcher !== undefined && !this.#isRecovering;
    }

    /**
     * Relative paths of every file currently known under the root.
     */
    files(): string[] {
        return Array.from(this.#files.keys()).sort();
    }

    #isIgnored = (absolutePath: string): boolean => {
        if (this.#ignore.size === 0) {
            return false;
        }

        return toRelativePath(this.#root, absolutePath)
            .split('/')
            .some(segment => this.#ignore.has(segment));
    };

    #push(raw: IRawChange) {
        this.#coalescer.push(raw);
    }

    // Changes that happened while the watch was down. Pushed without identities:
    // across downtime a matching inode says nothing about a rename.
    #reconcile(scanned: Map<string, FileEntry>) {
        for (const [relativePath, previous] of this.#files) {
            if (!scanned.has(relativePath)) {
                this.#push({ kind: 'deleted', path: relativePath });
            } else if (!isSameFile(previous, scanned.get(relativePath))) {
                this.#push({ kind: 'modified', path: relativePath });
            }
        }

        for (const relativePath of scanned.keys()) {
            if (!this.#files.has(relativePath)) {
                this.#push({ kind: 'created', path: relativePath });
            }
        }
    }

    async #open(reconcile: boolean): Promise<void> {
        const scanned = new Map<string, FileEntry>();
        let isReady = false;

        const watcher = chokidar.watch(this.#root, {
            ignored:       this.#isIgnored,
            ignoreInitial: false,
            alwaysStat:    true,
            persistent:    true
        });
        this.#watcher = watcher;

        const ready = new Promise<void>((resolve, reject) => {
            watcher.on('add', (filePath, stats) => {
                const relativePath = toRelativePath(this.#root, filePath);
                if (!isReady) {
                    scanned.set(relativePath, toFileEntry(stats));
                    return;
                }

                const entry = toFileEntry(stats);
                this.#files.set(relativePath, entry);
                this.#push({ kind: 'created', path: relativePath, identity: entry });
            });

            watcher.on('change', (filePath, stats) => {
                const relativePath = toRelativePath(this.#root, filePath);
                if (!isReady) {
                    scanned.set(relativePath, toFileEntry(stats));
                    return;
                }

                const entry = toFileEntry(stats);
                this.#files.set(relativePath, entry);
                this.#push({ kind: 'modified', path: relativePath, identity: entry });
            });

            watcher.on('unlink', (filePath) => {
                const relativePath = toRelativePath(this.#root, filePath);
                if (!isReady) {
                    scanned.delete(relativePath);
                    return;
                }

                const previous = this.#files.get(relativePath);
                this.#files.delete(relativePath);
                this.#push({ kind: 'deleted', path: relativePath, identity: previous });
                this.#verifyRoot();
            });

            watcher.on('unlinkDir', (directoryPath) => {
                if (directoryPath === this.#root) {
                    this.#handleFailure(new Error('watch root was removed'));
                } else {
                    this.#verifyRoot();
                }
            });

            watcher.on('error', (error) => {
                if (!isReady) {
                    reject(error);
                    return;
                }

                this.#handleFailure(error);
            });

            watcher.on('ready', () => {
                isReady = true;

                if (reconcile) {
                    this.#reconcile(scanned);
                }

                this.#files.clear();
                for (const [relativePath, entry] of scanned) {
                    this.#files.set(relativePath, entry);
                }

                resolve();
            });
        });

        try {
            await ready;
        } catch (err) {
            await this.#closeWatcher();
            throw err;
        }
    }

    async #closeWatcher() {
        const watcher = this.#watcher;
        this.#watcher = undefined;
        await watcher?.close();
    }

    async start() {
        await assertWatchableDirectory(this.#root);
        await this.#open(false);

        logInfo(`[Watcher] Watching ${this.#root} (${this.#files.size} file(s))`);
        this.events.emit('ready', this.#files.size);
    }

    #lose(attempts: number, cause: unknown) {
        this.#isClosed = true;
        this.#coalescer.flush();
        this.events.emit('lost', new WatchLostError(this.#root, attempts, { cause }));
    }

    async #recover(cause: unknown) {
        try {
            await this.#retryOpen(cause);
        } finally {
            this.#isRecovering = false;
        }
    }

    async #retryOpen(cause: unknown) {
        logWarn(`[Watcher] Watch on ${this.#root} failed: ${describeError(cause)}. Re-establishing...`);

        await this.#closeWatcher();
        this.#coalescer.flush();

        let lastError = cause;
        for (let attempt = 1; attempt <= this.#retries; attempt++) {
            const didWait = await delay(getBackoffDelay(attempt, this.#retryBaseMs), this.#closeController.signal);
            if (!didWait || this.#isClosed) {
                return;
            }

            try {
                await assertWatchableDirectory(this.#root);
                await this.#open(true);
                logInfo(`[Watcher] Re-established watch on ${this.#root} after ${attempt} attempt(s)`);
                this.events.emit('recovered', attempt);
                return;
            } catch (err) {
                lastError = err;
                logWarn(`[Watcher] Recovery attempt ${attempt}/${this.#retries} failed: ${describeError(err)}`);
            }
        }

        this.#lose(this.#retries, lastError);
    }

    // Removing the root does not always surface as an event for the root itself,
    // only for what was inside it.
    #verifyRoot() {
        if (this.#isRecovering || this.#isClosed) {
            return;
        }

        assertWatchableDirectory(this.#root)
            .catch(err => this.#handleFailure(err));
    }

    #handleFailure(cause: unknown) {
        if (this.#isRecovering || this.#isClosed) {
            return;
        }

        this.#isRecovering = true;
        this.#recover(cause)
            .catch(err => this.#lose(0, err));
    }

    async close() {
        if (this.#isClosed && this.#watcher === undefined) {
            return;
        }

        this.#isClosed = true;
        this.#closeController.abort();
        await this.#closeWatcher();
        this.#coalescer.flush();
        this.#coalescer.dispose();
    }
}
