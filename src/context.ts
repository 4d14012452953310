import { join } from 'node:path';
import { createCredentialStore, type CredentialStore } from './auth/credentials';
import { profileDir, requireSupabase, storePath, type AppConfig } from './config';
import { createIdentityLookup, type IdentityLookup } from './lookup/identityLookup';
import { createSyncBridge, type SyncBridge } from './remote/bridge';
import { createRealtimeChannel, type RealtimeChannel } from './remote/realtime';
import { createSupabaseBackend } from './remote/supabaseBackend';
import type { RemoteBackend } from './remote/types';
import { errorMessage } from './shared/errors';
import type { Logger } from './shared/logger';
import { LedgerStore } from './storage/ledgerStore';

export interface AppContext {
	config: AppConfig;
	logger: Logger;
	store: LedgerStore;
	bridge: SyncBridge;
	realtime: RealtimeChannel;
	lookup: IdentityLookup;
	credentials: CredentialStore;
	close(opts?: { timeoutMs?: number }): Promise<void>;
}

export interface AppContextOptions {
	config: AppConfig;
	logger: Logger;
	/**
	 * Defaults to a supabase-js client built from `config.supabase`, whose
	 * credentials are then required up front.
	 */
	connect?: () => Promise<RemoteBackend>;
	fetch?: typeof fetch;
}

function supabaseConnector(config: AppConfig, logger: Logger): () => Promise<RemoteBackend> {
	const settings = requireSupabase(config);
	return async () => createSupabaseBackend(settings, { logger });
}

/**
 * Everything a session needs, passed around explicitly. Nothing here talks
 * to the backend until the first bridge operation.
 *
 * @throws {ValidationError} when no `connect` is given and the Supabase
 * credentials are missing
 */
export function createAppContext(opts: AppContextOptions): AppContext {
	const { config, logger } = opts;
	const connect = opts.connect ?? supabaseConnector(config, logger);
	const store = LedgerStore.open(storePath(config), { logger });
	const bridge = createSyncBridge({ connect, logger });
	const realtime = createRealtimeChannel({ bridge, schema: config.supabase?.schema, logger });
	const dir = profileDir(config);
	const lookup = createIdentityLookup({ cacheFile: join(dir, 'lookup_cache.json'), fetch: opts.fetch, logger });
	const credentials = createCredentialStore(join(dir, 'auth'), { logger });

	let closing: Promise<void> | null = null;

	return {
		config,
		logger,
		store,
		bridge,
		realtime,
		lookup,
		credentials,
		close(closeOpts = {}) {
			if (!closing) {
				closing = (async () => {
					await bridge.shutdown(closeOpts);
					try {
						store.close();
					} catch (e) {
						logger.warn({ err: errorMessage(e) }, 'store close failed');
					}
				})();
			}
			return closing;
		}
	};
}
