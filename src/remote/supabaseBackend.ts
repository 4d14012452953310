import { createClient } from '@supabase/supabase-js';
import type { SupabaseSettings } from '../config';
import { RemoteOperationError } from '../shared/errors';
import { silentLogger, type Logger } from '../shared/logger';
import {
	LEDGER_REMOTE_TABLE,
	type NameTable,
	type RemoteBackend,
	type RemoteChange
} from './types';

interface PostgrestFailure {
	message: string;
	code?: string;
	details?: string | null;
	hint?: string | null;
}

function check(operation: string, error: PostgrestFailure | null): void {
	if (error) {
		throw new RemoteOperationError(operation, error.message, {
			details: { code: error.code, details: error.details, hint: error.hint }
		});
	}
}

const NAME_COLUMN: Record<NameTable, string> = {
	imovel_rural: 'nome_imovel',
	participante: 'nome'
};

/**
 * `RemoteBackend` over supabase-js. Sessions are kept in memory only; the
 * process owns a single client for its whole lifetime.
 */
export function createSupabaseBackend(settings: SupabaseSettings, opts: { logger?: Logger } = {}): RemoteBackend {
	const logger = (opts.logger ?? silentLogger()).child({ component: 'supabase' });
	const client = createClient(settings.url, settings.key, {
		auth: { persistSession: false, autoRefreshToken: false }
	});
	const db = () => client.schema(settings.schema);

	return {
		async selectLedger(query) {
			let q = db().from(LEDGER_REMOTE_TABLE).select('*');
			if (query.range) q = q.gte('data_ord', query.range.from).lte('data_ord', query.range.to);
			if (query.propertyIds && query.propertyIds.length > 0) q = q.in('cod_imovel', [...query.propertyIds]);
			const { data, error } = await q;
			check('selectLedger', error);
			return data ?? [];
		},

		async upsertLedger(rows) {
			const { error } = await db()
				.from(LEDGER_REMOTE_TABLE)
				.upsert([...rows], { onConflict: 'id' });
			check('upsertLedger', error);
		},

		async deleteLedger(id) {
			const { error } = await db().from(LEDGER_REMOTE_TABLE).delete().eq('id', id);
			check('deleteLedger', error);
		},

		async selectNames(table, ids) {
			const column = NAME_COLUMN[table];
			const { data, error } = await db().from(table).select(`id,${column}`).in('id', [...ids]);
			check('selectNames', error);
			return data ?? [];
		},

		async rpc(fn, args) {
			const { data, error } = await db().rpc(fn, args);
			check(fn, error);
			return data;
		},

		async signIn(email, password) {
			const { data, error } = await client.auth.signInWithPassword({ email, password });
			if (error) throw new RemoteOperationError('adminSignIn', error.message, { cause: error });
			if (!data.user) throw new RemoteOperationError('adminSignIn', 'sign-in returned no user');
			logger.info({ userId: data.user.id }, 'admin signed in');
			return { userId: data.user.id, email: data.user.email ?? null };
		},

		async signOut() {
			const { error } = await client.auth.signOut();
			if (error) throw new RemoteOperationError('adminSignOut', error.message, { cause: error });
		},

		async subscribe(spec, onEvent) {
			const channel = client.channel(spec.table);
			channel.on('postgres_changes', { event: '*', schema: spec.schema, table: spec.table }, (payload) => {
				const change: RemoteChange = { ...payload };
				onEvent(change);
			});
			channel.subscribe((status, err) => {
				if (err) logger.warn({ channel: channel.topic, status, err: err.message }, 'channel error');
				else logger.debug({ channel: channel.topic, status }, 'channel status');
			});
			return {
				channel: channel.topic,
				unsubscribe: async () => {
					await client.removeChannel(channel);
				}
			};
		},

		async unsubscribeAll() {
			await client.removeAllChannels();
		}
	};
}
