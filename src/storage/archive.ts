import { createReadStream, createWriteStream, promises as fs } from 'node:fs';
import { join } from 'node:path';
import { pipeline } from 'node:stream/promises';
import { createGzip } from 'node:zlib';
import { z } from 'zod';
import { fileExists, readJsonFile, writeJsonFile } from '../shared/jsonFile';
import { silentLogger, type Logger } from '../shared/logger';

export interface ArchiveOptions {
	dataDir: string;
	profile: string;
	now?: () => Date;
	logger?: Logger;
}

const stateSchema = z.object({ lastArchiveDate: z.string().nullable() });

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

function localDay(d: Date): string {
	return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

function stamp(d: Date): string {
	return (
		`${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}-` +
		`${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`
	);
}

export function archiveStatePath(dataDir: string): string {
	return join(dataDir, 'archive_state.json');
}

/**
 * Gzip the profile's store file into its `backups` directory, at most once
 * per local calendar day. Resolves to the archive path, or null when the day
 * is already covered or there is no store file yet.
 */
export async function runDailyArchive(opts: ArchiveOptions): Promise<string | null> {
	const logger = (opts.logger ?? silentLogger()).child({ component: 'archive' });
	const now = (opts.now ?? (() => new Date()))();
	const today = localDay(now);
	const statePath = archiveStatePath(opts.dataDir);

	const state = await readJsonFile(statePath, stateSchema, { lastArchiveDate: null });
	if (state.lastArchiveDate === today) {
		logger.debug({ today }, 'archive already taken today');
		return null;
	}

	const source = join(opts.dataDir, opts.profile, 'data', 'ledger.db');
	if (!(await fileExists(source))) {
		logger.info({ source }, 'no store file to archive');
		return null;
	}

	const backups = join(opts.dataDir, opts.profile, 'backups');
	await fs.mkdir(backups, { recursive: true });
	const target = join(backups, `backup_${stamp(now)}.db.gz`);
	await pipeline(createReadStream(source), createGzip(), createWriteStream(target));

	await writeJsonFile(statePath, { lastArchiveDate: today });
	logger.info({ target }, 'store archived');
	return target;
}
