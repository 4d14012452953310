import { loadConfig, storePath, type AppConfig } from './config';
import { createAppContext, type AppContext } from './context';
import { entryToRemoteRow, fromRemoteRow } from './remote/mapper';
import { fetchRemoteLedgerRows, upsertRemoteEntries } from './remote/operations';
import type { RemoteBackend } from './remote/types';
import { isLookupFailure, nameFromLookup } from './lookup/identityLookup';
import { ordinalRange, type OrdinalRange } from './shared/dates';
import { ValidationError } from './shared/errors';
import type { Logger } from './shared/logger';
import { normalizeTaxId } from './shared/taxId';
import { runDailyArchive } from './storage/archive';
import { LedgerStore } from './storage/ledgerStore';

export type ArgMap = Record<string, string | boolean>;

export function parseArgs(args: readonly string[]): { positional: string[]; flags: ArgMap } {
	const flags: ArgMap = {};
	const positional: string[] = [];
	for (let i = 0; i < args.length; i++) {
		const token = args[i] ?? '';
		if (token.startsWith('--')) {
			const key = token.slice(2);
			const next = args[i + 1];
			if (next !== undefined && !next.startsWith('--')) {
				flags[key] = next;
				i++;
			} else {
				flags[key] = true;
			}
		} else {
			positional.push(token);
		}
	}
	return { positional, flags };
}

export const USAGE = [
	'rural-ledger',
	'',
	'Commands:',
	'  migrate                          open the profile store and bring it to the current schema',
	'  archive                          take today\'s compressed copy of the store, if not taken yet',
	'  lookup <cpf|cnpj>                look a tax id up and record the counterparty locally',
	'  pull [--from <date>] [--to <date>]  copy remote ledger rows into the local store',
	'  push [--from <date>] [--to <date>]  send local ledger rows to the remote ledger',
	'',
	'Options:',
	'  --env <file>                     read variables from this .env file (default .env)'
].join('\n');

export interface CommandDeps {
	env?: Record<string, string | undefined>;
	logger: Logger;
	/** Receives the command's human-readable output, one line per call. */
	out: (line: string) => void;
	connect?: () => Promise<RemoteBackend>;
	fetch?: typeof fetch;
}

function flag(flags: ArgMap, key: string): string | undefined {
	const value = flags[key];
	return typeof value === 'string' ? value : undefined;
}

const ALL_DATES: OrdinalRange = { from: 0, to: 99991231 };

function rangeFrom(flags: ArgMap): OrdinalRange | undefined {
	const from = flag(flags, 'from');
	const to = flag(flags, 'to');
	if (from === undefined && to === undefined) return undefined;
	return ordinalRange(from ?? '1900-01-01', to ?? '9999-12-31');
}

async function withContext<T>(config: AppConfig, deps: CommandDeps, fn: (ctx: AppContext) => Promise<T>): Promise<T> {
	const ctx = createAppContext({ config, logger: deps.logger, connect: deps.connect, fetch: deps.fetch });
	try {
		return await fn(ctx);
	} finally {
		await ctx.close();
	}
}

/**
 * Run one CLI command. Resolves to the process exit code; errors other
 * than usage mistakes propagate.
 */
export async function runCommand(argv: readonly string[], deps: CommandDeps): Promise<number> {
	const [cmd, ...rest] = argv;
	if (!cmd || cmd === 'help' || cmd === '--help') {
		deps.out(USAGE);
		return 0;
	}
	const { positional, flags } = parseArgs(rest);
	const config = loadConfig(deps.env ?? process.env, { dotenvPath: flag(flags, 'env') ?? '.env' });

	switch (cmd) {
		case 'migrate': {
			const store = LedgerStore.open(storePath(config), { logger: deps.logger });
			try {
				deps.out(`Applied migrations: ${store.appliedMigrations().join(', ')}`);
			} finally {
				store.close();
			}
			return 0;
		}
		case 'archive': {
			const target = await runDailyArchive({ dataDir: config.dataDir, profile: config.profile, logger: deps.logger });
			deps.out(target ? `Archived to ${target}` : 'Nothing to archive');
			return 0;
		}
		case 'lookup': {
			const raw = positional[0];
			if (!raw) throw new ValidationError('lookup needs a CPF or CNPJ');
			const { digits, kind } = normalizeTaxId(raw);
			return withContext(config, deps, async (ctx) => {
				const response = await ctx.lookup.lookup(kind, digits);
				if (isLookupFailure(response)) {
					deps.out(`Lookup failed for ${digits}`);
					return 2;
				}
				const name = nameFromLookup(response);
				if (!name) {
					deps.out(`${kind.toUpperCase()} ${digits}: no name in the response`);
					return 2;
				}
				const known = ctx.store.findCounterpartyByTaxId(digits);
				const id = ctx.store.upsertCounterparty(digits, name, known?.kind ?? (kind === 'cnpj' ? 1 : 2));
				deps.out(`${kind.toUpperCase()} ${digits}: ${name} [counterparty ${id}]`);
				return 0;
			});
		}
		case 'pull': {
			const range = rangeFrom(flags);
			return withContext(config, deps, async (ctx) => {
				const rows = await ctx.bridge.submit(fetchRemoteLedgerRows(range));
				const entries = rows.map(fromRemoteRow);
				ctx.store.withBulkTransaction((store) => {
					for (const entry of entries) store.upsertEntry(entry);
				});
				deps.out(`Pulled ${entries.length} entries`);
				return 0;
			});
		}
		case 'push': {
			const range = rangeFrom(flags) ?? ALL_DATES;
			return withContext(config, deps, async (ctx) => {
				const rows = ctx.store.listEntries(range).map(entryToRemoteRow);
				const sent = await ctx.bridge.submit(upsertRemoteEntries(rows));
				deps.out(`Pushed ${sent} entries`);
				return 0;
			});
		}
		default:
			deps.out(`Unknown command: ${cmd}\n\n${USAGE}`);
			return 1;
	}
}
