import { timingSafeEqual } from 'node:crypto';
import { join } from 'node:path';
import { z } from 'zod';
import { ValidationError } from '../shared/errors';
import { fileExists, readJsonFile, writeJsonFile } from '../shared/jsonFile';
import { silentLogger, type Logger } from '../shared/logger';

export const DEFAULT_ADMIN_PASSWORD = 'admin';

const adminFileSchema = z.object({ password: z.string() });
const usersFileSchema = z.record(z.string(), z.string());

export interface CredentialStore {
	verifyUser(username: string, password: string): Promise<boolean>;
	isAdminPassword(password: string): Promise<boolean>;
	registerUser(username: string, password: string): Promise<void>;
}

function sameSecret(a: string, b: string): boolean {
	const left = Buffer.from(a, 'utf8');
	const right = Buffer.from(b, 'utf8');
	if (left.length !== right.length) return false;
	return timingSafeEqual(left, right);
}

/**
 * Local credentials kept as `admin.json` and `users.json` under `dir`.
 * The administrator file is written with the default password the first
 * time anything reads it.
 */
export function createCredentialStore(dir: string, opts: { logger?: Logger } = {}): CredentialStore {
	const logger = (opts.logger ?? silentLogger()).child({ component: 'credentials' });
	const adminFile = join(dir, 'admin.json');
	const usersFile = join(dir, 'users.json');
	let bootstrap: Promise<string> | null = null;

	async function readAdmin(): Promise<string> {
		if (!(await fileExists(adminFile))) {
			await writeJsonFile(adminFile, { password: DEFAULT_ADMIN_PASSWORD });
			logger.warn({ file: adminFile }, 'administrator password initialised to the default');
			return DEFAULT_ADMIN_PASSWORD;
		}
		const admin = await readJsonFile(adminFile, adminFileSchema, { password: DEFAULT_ADMIN_PASSWORD });
		return admin.password;
	}

	function adminPassword(): Promise<string> {
		if (!bootstrap) {
			bootstrap = readAdmin().catch((e: unknown) => {
				bootstrap = null;
				throw e;
			});
		}
		return bootstrap;
	}

	const readUsers = () => readJsonFile(usersFile, usersFileSchema, {});

	return {
		async verifyUser(username, password) {
			const stored = (await readUsers())[username.trim()];
			return stored !== undefined && sameSecret(stored, password);
		},

		async isAdminPassword(password) {
			return sameSecret(await adminPassword(), password);
		},

		async registerUser(username, password) {
			const name = username.trim();
			if (!name || !password) throw new ValidationError('Username and password are required');
			const users = await readUsers();
			if (name in users) throw new ValidationError(`User "${name}" already exists`, { username: name });
			await writeJsonFile(usersFile, { ...users, [name]: password });
			logger.info({ username: name }, 'user registered');
		}
	};
}
