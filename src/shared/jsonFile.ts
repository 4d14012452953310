import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';
import type { ZodType, ZodTypeDef } from 'zod';

function isMissing(e: unknown): boolean {
	return typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT';
}

/**
 * Read and validate a JSON state file. A missing file, invalid JSON or a
 * schema mismatch all yield `fallback`.
 */
export async function readJsonFile<T>(path: string, schema: ZodType<T, ZodTypeDef, unknown>, fallback: T): Promise<T> {
	let raw: string;
	try {
		raw = await fs.readFile(path, 'utf8');
	} catch (e) {
		if (isMissing(e)) return fallback;
		throw e;
	}
	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch {
		return fallback;
	}
	const parsed = schema.safeParse(json);
	return parsed.success ? parsed.data : fallback;
}

/** Writes through a temp file and a rename. */
export async function writeJsonFile(path: string, value: unknown): Promise<void> {
	await fs.mkdir(dirname(path), { recursive: true });
	const tmp = `${path}.${process.pid}.tmp`;
	await fs.writeFile(tmp, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
	await fs.rename(tmp, path);
}

export async function fileExists(path: string): Promise<boolean> {
	try {
		await fs.stat(path);
		return true;
	} catch (e) {
		if (isMissing(e)) return false;
		throw e;
	}
}
