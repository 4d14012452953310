/**
 * Configuration from environment variables, validated with zod. A `.env`
 * file can be merged underneath the process environment.
 */
import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseDotenv } from 'dotenv';
import { z } from 'zod';
import { ValidationError } from './shared/errors';

const SUPABASE_URL = /^https:\/\/[a-zA-Z0-9-]+\.supabase\.co\/?$/;

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

export const ConfigSchema = z
	.object({
		SUPABASE_URL: z.preprocess(
			blankToUndefined,
			z.string().trim().regex(SUPABASE_URL, 'expected https://<project>.supabase.co').optional()
		),
		SUPABASE_ANON_KEY: z.preprocess(blankToUndefined, z.string().trim().optional()),
		SUPABASE_KEY: z.preprocess(blankToUndefined, z.string().trim().optional()),
		SUPABASE_SCHEMA: z.string().trim().min(1).default('public'),
		LEDGER_DATA_DIR: z.string().trim().min(1).default('ledger-data'),
		LEDGER_PROFILE: z
			.string()
			.trim()
			.regex(/^[\w.-]+$/, 'letters, digits, "_", "." or "-" only')
			.refine((name) => name !== '.' && name !== '..', 'must name a directory')
			.default('default'),
		LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
		NODE_ENV: z.enum(['development', 'production', 'test']).default('development')
	})
	.transform((env) => {
		const key = env.SUPABASE_ANON_KEY ?? env.SUPABASE_KEY;
		return {
			supabase: env.SUPABASE_URL && key ? { url: env.SUPABASE_URL, key, schema: env.SUPABASE_SCHEMA } : null,
			dataDir: resolve(env.LEDGER_DATA_DIR),
			profile: env.LEDGER_PROFILE,
			logLevel: env.LOG_LEVEL,
			nodeEnv: env.NODE_ENV
		};
	});

export type AppConfig = z.output<typeof ConfigSchema>;
export type SupabaseSettings = NonNullable<AppConfig['supabase']>;

function readDotenv(path: string): Record<string, string> {
	if (!existsSync(path)) return {};
	return parseDotenv(readFileSync(path));
}

/**
 * Validate configuration. Variables already in `env` win over the ones
 * read from `dotenvPath`.
 *
 * @throws {ValidationError} listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env, opts: { dotenvPath?: string } = {}): AppConfig {
	const merged = opts.dotenvPath ? { ...readDotenv(opts.dotenvPath), ...env } : env;
	const parsed = ConfigSchema.safeParse(merged);
	if (!parsed.success) {
		const fields = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
		throw new ValidationError(`Invalid configuration: ${fields.join('; ')}`, parsed.error.issues);
	}
	return parsed.data;
}

/** Remote settings, required once something talks to the backend. */
export function requireSupabase(config: AppConfig): SupabaseSettings {
	if (!config.supabase) {
		throw new ValidationError('Supabase credentials missing: set SUPABASE_URL and SUPABASE_ANON_KEY (or SUPABASE_KEY)');
	}
	return config.supabase;
}

export function profileDir(config: Pick<AppConfig, 'dataDir' | 'profile'>): string {
	return join(config.dataDir, config.profile);
}

export function storePath(config: Pick<AppConfig, 'dataDir' | 'profile'>): string {
	return join(profileDir(config), 'data', 'ledger.db');
}
