export * from './types';
export * from './shared/errors';
export * from './shared/dates';
export * from './shared/taxId';
export { createLogger, silentLogger, type Logger } from './shared/logger';
export { loadConfig, requireSupabase, profileDir, storePath, type AppConfig, type SupabaseSettings } from './config';

export { LedgerStore, openStore, type OpenStoreOptions } from './storage/ledgerStore';
export { schemaSteps, applySchemaSteps, appliedMigrations, openDatabase, type SchemaStep } from './storage/migrations';
export { needsRebuild, rebuildLedgerTable, type RebuildReport, type RebuildState } from './storage/rebuild';
export { runDailyArchive, archiveStatePath, type ArchiveOptions } from './storage/archive';

export { createSyncBridge, type RemoteOperation, type SyncBridge } from './remote/bridge';
export {
	createRealtimeChannel,
	applyRemoteChange,
	resolveChangeKind,
	type AppliedChange,
	type ChangeHandler,
	type ChangeKind,
	type RealtimeChannel,
	type RealtimeStats
} from './remote/realtime';
export * from './remote/operations';
export { toLocalTuple, toRemoteRow, entryToWriteTuple, entryToRemoteRow, fromRemoteRow } from './remote/mapper';
export { createSupabaseBackend } from './remote/supabaseBackend';
export * from './remote/types';

export {
	createIdentityLookup,
	isLookupFailure,
	nameFromLookup,
	LOOKUP_FAILED,
	type IdentityLookup,
	type IdentityLookupOptions,
	type LookupResponse
} from './lookup/identityLookup';
export { createCredentialStore, DEFAULT_ADMIN_PASSWORD, type CredentialStore } from './auth/credentials';
export { createAppContext, type AppContext, type AppContextOptions } from './context';
