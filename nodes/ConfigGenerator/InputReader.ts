import fs from 'fs-extra';
import { InputLockedError, InputNotFoundError } from './errors';

const LOCKED_CODES = new Set(['EBUSY', 'EPERM', 'EACCES']);

function errnoCode(error: unknown): string | undefined {
	if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
		return error.code;
	}
	return undefined;
}

/**
 * Run a file read, turning a missing path into InputNotFound and a file held
 * by another process into InputLocked.
 */
export async function readInputFile<T>(filePath: string, read: (p: string) => Promise<T>): Promise<T> {
	try {
		return await read(filePath);
	} catch (error) {
		const code = errnoCode(error);
		if (code === 'ENOENT' || code === 'EISDIR' || code === 'ENOTDIR') throw new InputNotFoundError(filePath);
		if (code !== undefined && LOCKED_CODES.has(code)) throw new InputLockedError(filePath);
		throw error;
	}
}

export async function readConfigText(filePath: string): Promise<string> {
	return readInputFile(filePath, (p) => fs.readFile(p, 'utf8'));
}
