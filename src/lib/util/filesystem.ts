import fs from 'node:fs/promises';
import { constants as fsConstants } from 'node:fs';
import path from 'node:path';
import { describeError, WatchInitError } from '../errors.js';

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException => {
	return error instanceof Error && 'code' in error;
};

/**
 * `absolutePath` relative to `root`, always `/`-separated.
 */
export const toRelativePath = (root: string, absolutePath: string): string => {
	return path.relative(root, absolutePath).split(path.sep).join('/');
};

export const isInsideRoot = (root: string, absolutePath: string): boolean => {
	const relative = path.relative(root, absolutePath);
	return relative.length > 0
		&& relative !== '..'
		&& !relative.startsWith(`..${path.sep}`)
		&& !path.isAbsolute(relative);
};

export const assertWatchableDirectory = async (root: string): Promise<void> => {
	let stats;
	try {
		stats = await fs.stat(root);
	} catch (err) {
		const reason = isErrnoException(err) && err.code === 'ENOENT'
			? 'path does not exist'
			: describeError(err);
		throw new WatchInitError(root, reason, { cause: err });
	}

	if (!stats.isDirectory()) {
		throw new WatchInitError(root, 'not a directory');
	}

	try {
		await fs.access(root, fsConstants.R_OK | fsConstants.X_OK);
	} catch (err) {
		throw new WatchInitError(root, 'permission denied', { cause: err });
	}
};
