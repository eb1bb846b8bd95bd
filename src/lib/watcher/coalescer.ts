import { Debouncer } from '../debouncer.js';
import type { FileChange } from '../models/change.js';

/**
 * What a rename leaves unchanged. An inode alone is not enough: filesystems hand a
 * freed inode to the next file created.
 */
export interface IFileIdentity {
    dev: number;
    inode: number;
    size: number;
    mtimeMs: number;
}

export const isSameFile = (a: IFileIdentity | undefined, b: IFileIdentity | undefined): boolean => {
    return a !== undefined
        && b !== undefined
        && a.dev === b.dev
        && a.inode === b.inode
        && a.size === b.size
        && a.mtimeMs === b.mtimeMs;
};

export interface IRawChange {
    kind: 'created' | 'modified' | 'deleted';
    // Relative to the watch root, `/`-separated.
    path: string;
    // Without one, the change is never paired into a rename.
    identity?: IFileIdentity;
}

interface IPendingChange {
    change: FileChange;
    identity?: IFileIdentity;
    debouncer: Debouncer;
}

/**
 * Collapses bursts of raw events into one change per path. Each new event for a
 * path restarts that path's window; when the window elapses the latest kind is
 * emitted. A delete and a create of the same file inside one window are merged
 * into a rename.
 */
export class ChangeCoalescer {
    readonly #windowMs: number;
    readonly #emit: (change: FileChange) => void;
    readonly #pending = new Map<string, IPendingChange>();

    constructor(windowMs: number, emit: (change: FileChange) => void) {
        this.#windowMs = windowMs;
        this.#emit = emit;
    }

    get pendingCount() {
        return this.#pending.size;
    }

    #findPending(kind: FileChange['kind'], identity: IFileIdentity, exceptPath: string): IPendingChange | undefined {
        for (const [path, pending] of this.#pending) {
            if (path !== exceptPath && pending.change.kind === kind && isSameFile(pending.identity, identity)) {
                return pending;
            }
        }

        return undefined;
    }

    #drop(path: string) {
        const pending = this.#pending.get(path);
        pending?.debouncer.cancel();
        this.#pending.delete(path);
    }

    #schedule(change: FileChange, identity: IFileIdentity | undefined) {
        const existing = this.#pending.get(change.path);
        const entry: IPendingChange = {
            change,
            identity,
            debouncer: existing?.debouncer ?? new Debouncer(this.#windowMs)
        };

        this.#pending.set(change.path, entry);
        entry.debouncer.trigger(() => {
            if (this.#pending.get(change.path) === entry) {
                this.#pending.delete(change.path);
            }

            this.#emit(entry.change);
        });
    }

    #pushDeleted(raw: IRawChange) {
        const existing = this.#pending.get(raw.path);

        // A file renamed into this path and then removed: the original path is what went away.
        if (existing?.change.kind === 'renamed') {
            this.#drop(raw.path);
            this.#schedule({ kind: 'deleted', path: existing.change.previousPath }, raw.identity ?? existing.identity);
            return;
        }

        if (raw.identity) {
            const movedTo = this.#findPending('created', raw.identity, raw.path);
            if (movedTo) {
                this.#drop(raw.path);
                this.#schedule({ kind: 'renamed', path: movedTo.change.path, previousPath: raw.path }, raw.identity);
                return;
            }
        }

        this.#schedule({ kind: 'deleted', path: raw.path }, raw.identity);
    }

    #pushCreated(raw: IRawChange) {
        if (raw.identity) {
            const movedFrom = this.#findPending('deleted', raw.identity, raw.path);
            if (movedFrom) {
                this.#drop(movedFrom.change.path);
                this.#schedule({ kind: 'renamed', path: raw.path, previousPath: movedFrom.change.path }, raw.identity);
                return;
            }
        }

        this.#schedule({ kind: 'created', path: raw.path }, raw.identity);
    }

    #pushModified(raw: IRawChange) {
        const existing = this.#pending.get(raw.path);

        // Keep the rename; the new content is implied by it.
        if (existing?.change.kind === 'renamed') {
            this.#schedule(existing.change, raw.identity ?? existing.identity);
            return;
        }

        this.#schedule({ kind: 'modified', path: raw.path }, raw.identity);
    }

    push(raw: IRawChange) {
        switch (raw.kind) {
            case 'created':
                this.#pushCreated(raw);
                break;
            case 'modified':
                this.#pushModified(raw);
                break;
            case 'deleted':
                this.#pushDeleted(raw);
                break;
        }
    }

    // Emits everything still waiting for its window, in arrival order.
    flush() {
        for (const pending of Array.from(this.#pending.values())) {
            pending.debouncer.flush();
        }
    }

    dispose() {
        for (const pending of this.#pending.values()) {
            pending.debouncer.cancel();
        }

        this.#pending.clear();
    }
}
