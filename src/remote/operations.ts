import { z, type ZodType, type ZodTypeDef } from 'zod';
import type { OrdinalRange } from '../shared/dates';
import { RemoteOperationError, ValidationError } from '../shared/errors';
import type { RemoteOperation } from './bridge';
import { compareRemoteRows, toLocalTuple, toRemoteRow } from './mapper';
import {
	COUNTERPARTY_REMOTE_TABLE,
	PROPERTY_REMOTE_TABLE,
	counterpartyNameRowSchema,
	propertyNameRowSchema,
	remoteLedgerRowSchema,
	type AdminSession,
	type LedgerTuple,
	type LedgerWriteTuple,
	type RemoteBackend,
	type RemoteLedgerRow,
	type RemoteLedgerWrite
} from './types';

export interface AppUser {
	id: string;
	username: string;
}

function parseRemote<T>(operation: string, schema: ZodType<T, ZodTypeDef, unknown>, value: unknown): T {
	const parsed = schema.safeParse(value);
	if (!parsed.success) {
		throw new RemoteOperationError(operation, `Malformed response for ${operation}`, { details: parsed.error.issues });
	}
	return parsed.data;
}

function distinctIds(ids: ReadonlyArray<number | null>): number[] {
	const out = new Set<number>();
	for (const id of ids) if (id !== null) out.add(id);
	return [...out].sort((a, b) => a - b);
}

/** One lookup per reference table for all ids in the result set. */
async function propertyNames(backend: RemoteBackend, rows: readonly RemoteLedgerRow[]): Promise<Map<number, string>> {
	const ids = distinctIds(rows.map((r) => r.cod_imovel));
	if (ids.length === 0) return new Map();
	const found = parseRemote('fetchRemoteEntries', z.array(propertyNameRowSchema), await backend.selectNames(PROPERTY_REMOTE_TABLE, ids));
	return new Map(found.map((r) => [r.id, r.nome_imovel ?? '']));
}

async function counterpartyNames(backend: RemoteBackend, rows: readonly RemoteLedgerRow[]): Promise<Map<number, string>> {
	const ids = distinctIds(rows.map((r) => r.id_participante));
	if (ids.length === 0) return new Map();
	const found = parseRemote('fetchRemoteEntries', z.array(counterpartyNameRowSchema), await backend.selectNames(COUNTERPARTY_REMOTE_TABLE, ids));
	return new Map(found.map((r) => [r.id, r.nome ?? '']));
}

/** Validated remote ledger rows, newest first. */
export function fetchRemoteLedgerRows(range?: OrdinalRange, opts: { propertyIds?: readonly number[] } = {}): RemoteOperation<RemoteLedgerRow[]> {
	return {
		name: 'fetchRemoteLedgerRows',
		run: async (backend) => {
			const raw = await backend.selectLedger({ range, propertyIds: opts.propertyIds });
			return parseRemote('fetchRemoteLedgerRows', z.array(remoteLedgerRowSchema), raw).sort(compareRemoteRows);
		}
	};
}

/** Display tuples for the remote ledger, newest first, with property and counterparty names resolved. */
export function fetchRemoteEntries(range?: OrdinalRange, opts: { propertyIds?: readonly number[] } = {}): RemoteOperation<LedgerTuple[]> {
	return {
		name: 'fetchRemoteEntries',
		run: async (backend) => {
			const raw = await backend.selectLedger({ range, propertyIds: opts.propertyIds });
			const rows = parseRemote('fetchRemoteEntries', z.array(remoteLedgerRowSchema), raw).sort(compareRemoteRows);
			const properties = await propertyNames(backend, rows);
			const counterparties = await counterpartyNames(backend, rows);
			return rows.map((r) => toLocalTuple(r, properties, counterparties));
		}
	};
}

export function upsertRemoteEntry(tuple: LedgerWriteTuple): RemoteOperation<void> {
	const row = toRemoteRow(tuple);
	return {
		name: 'upsertRemoteEntry',
		run: (backend) => backend.upsertLedger([row])
	};
}

/** Upsert keyed on `id`; resolves to the number of rows sent. */
export function upsertRemoteEntries(rows: readonly RemoteLedgerWrite[]): RemoteOperation<number> {
	return {
		name: 'upsertRemoteEntries',
		run: async (backend) => {
			if (rows.length === 0) return 0;
			await backend.upsertLedger(rows);
			return rows.length;
		}
	};
}

export function deleteRemoteEntry(id: number): RemoteOperation<void> {
	return {
		name: 'deleteRemoteEntry',
		run: (backend) => backend.deleteLedger(id)
	};
}

function credentials(username: string, password: string): { p_username: string; p_password: string } {
	const user = username.trim();
	if (!user || !password) throw new ValidationError('Username and password are required');
	return { p_username: user, p_password: password };
}

const appUserSchema = z.object({
	id: z.union([z.string(), z.number().transform(String)]),
	username: z.string()
});
const loginResultSchema = z.union([z.null(), z.array(appUserSchema), appUserSchema]);

/** `login_user` RPC: the matching user, or null. */
export function loginUser(username: string, password: string): RemoteOperation<AppUser | null> {
	const args = credentials(username, password);
	return {
		name: 'loginUser',
		run: async (backend) => {
			const result = parseRemote('loginUser', loginResultSchema, (await backend.rpc('login_user', args)) ?? null);
			if (Array.isArray(result)) return result[0] ?? null;
			return result;
		}
	};
}

/** `create_app_user` RPC; resolves to the new user's id. Fails when the username is taken. */
export function createAppUser(username: string, password: string): RemoteOperation<string> {
	const args = credentials(username, password);
	return {
		name: 'createAppUser',
		run: async (backend) => parseRemote('createAppUser', z.string().min(1), await backend.rpc('create_app_user', args))
	};
}

export function verifyAppUser(username: string, password: string): RemoteOperation<boolean> {
	const args = credentials(username, password);
	return {
		name: 'verifyAppUser',
		run: async (backend) => {
			const result = await backend.rpc('verify_app_user', args);
			return Array.isArray(result) ? result.length > 0 : Boolean(result);
		}
	};
}

export function adminSignIn(email: string, password: string): RemoteOperation<AdminSession> {
	if (!email.trim() || !password) throw new ValidationError('Email and password are required');
	return {
		name: 'adminSignIn',
		run: (backend) => backend.signIn(email.trim(), password)
	};
}

export function adminSignOut(): RemoteOperation<void> {
	return {
		name: 'adminSignOut',
		run: (backend) => backend.signOut()
	};
}
