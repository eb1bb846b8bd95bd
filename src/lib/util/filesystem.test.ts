import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { WatchInitError } from '../errors.js';
import { assertWatchableDirectory, isInsideRoot, toRelativePath } from './filesystem.js';

const root = path.resolve('/srv/watched');

describe('isInsideRoot', () => {
	it('accepts files under the root', () => {
		expect(isInsideRoot(root, path.join(root, 'a.txt'))).toBe(true);
		expect(isInsideRoot(root, path.join(root, 'nested', 'b.txt'))).toBe(true);
	});

	it('accepts names that start with two dots', () => {
		expect(isInsideRoot(root, path.join(root, '..notes.txt'))).toBe(true);
		expect(isInsideRoot(root, path.join(root, '..cache', 'c.txt'))).toBe(true);
	});

	it('rejects the root itself and anything outside it', () => {
		expect(isInsideRoot(root, root)).toBe(false);
		expect(isInsideRoot(root, path.dirname(root))).toBe(false);
		expect(isInsideRoot(root, path.join(root, '..', 'elsewhere.txt'))).toBe(false);
		expect(isInsideRoot(root, path.join(root, '..', 'watched-sibling', 'a.txt'))).toBe(false);
	});
});

describe('toRelativePath', () => {
	it('joins segments with forward slashes', () => {
		expect(toRelativePath(root, path.join(root, 'nested', 'b.txt'))).toBe('nested/b.txt');
	});
});

describe('assertWatchableDirectory', () => {
	let workspace: string;

	beforeEach(async () => {
		workspace = await fs.mkdtemp(path.join(os.tmpdir(), 'watchcast-fs-'));
	});

	afterEach(async () => {
		await fs.rm(workspace, { recursive: true, force: true });
	});

	it('accepts a readable directory', async () => {
		await expect(assertWatchableDirectory(workspace)).resolves.toBeUndefined();
	});

	it('rejects a missing path', async () => {
		const missing = path.join(workspace, 'missing');

		await expect(assertWatchableDirectory(missing)).rejects.toThrow(WatchInitError);
	});
});
