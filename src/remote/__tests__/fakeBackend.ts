import type {
	NameTable,
	RemoteBackend,
	RemoteChange,
	RemoteLedgerWrite,
	RemoteSubscription,
	RpcName
} from '../types';

type Method = keyof RemoteBackend;

export interface FakeBackend extends RemoteBackend {
	ledger: Map<number, Record<string, unknown>>;
	names: Record<NameTable, Map<number, string>>;
	users: Map<string, { id: string; password: string }>;
	calls: Array<{ method: Method; args: unknown[] }>;
	/** Throws `error` from the next call to `method`. */
	failNext(method: Method, error: Error): void;
	/** Deliver a change to every listener on `table`. */
	emit(table: string, change: RemoteChange): void;
	listenerCount(table: string): number;
	signedIn: string | null;
}

/** In-memory stand-in for the supabase-js backend. */
export function createFakeBackend(): FakeBackend {
	const failures = new Map<Method, Error>();
	const listeners = new Map<string, Set<(change: RemoteChange) => void>>();
	let nextUserId = 1;

	const fake: FakeBackend = {
		ledger: new Map(),
		names: { imovel_rural: new Map(), participante: new Map() },
		users: new Map(),
		calls: [],
		signedIn: null,

		failNext(method, error) {
			failures.set(method, error);
		},

		emit(table, change) {
			for (const listener of listeners.get(table) ?? []) listener(change);
		},

		listenerCount(table) {
			return listeners.get(table)?.size ?? 0;
		},

		async selectLedger(query) {
			record('selectLedger', [query]);
			return [...fake.ledger.values()].filter((row) => {
				const ord = row.data_ord;
				if (query.range && (typeof ord !== 'number' || ord < query.range.from || ord > query.range.to)) return false;
				if (query.propertyIds && query.propertyIds.length > 0 && !query.propertyIds.includes(Number(row.cod_imovel))) return false;
				return true;
			});
		},

		async upsertLedger(rows) {
			record('upsertLedger', [rows]);
			for (const row of rows) fake.ledger.set(row.id, { ...row });
		},

		async deleteLedger(id) {
			record('deleteLedger', [id]);
			fake.ledger.delete(id);
		},

		async selectNames(table, ids) {
			record('selectNames', [table, ids]);
			const column = table === 'imovel_rural' ? 'nome_imovel' : 'nome';
			const names = fake.names[table];
			return ids.filter((id) => names.has(id)).map((id) => ({ id, [column]: names.get(id) }));
		},

		async rpc(fn: RpcName, args) {
			record('rpc', [fn, args]);
			const username = String(args.p_username);
			const password = String(args.p_password);
			const user = fake.users.get(username);
			switch (fn) {
				case 'login_user':
					return user && user.password === password ? [{ id: user.id, username }] : [];
				case 'create_app_user': {
					if (user) throw new Error(`duplicate key value: ${username}`);
					const id = `user-${nextUserId++}`;
					fake.users.set(username, { id, password });
					return id;
				}
				case 'verify_app_user':
					return user !== undefined && user.password === password;
			}
		},

		async signIn(email, password) {
			record('signIn', [email, password]);
			fake.signedIn = email;
			return { userId: 'admin-1', email };
		},

		async signOut() {
			record('signOut', []);
			fake.signedIn = null;
		},

		async subscribe(spec, onEvent) {
			record('subscribe', [spec]);
			let set = listeners.get(spec.table);
			if (!set) {
				set = new Set();
				listeners.set(spec.table, set);
			}
			set.add(onEvent);
			const subscription: RemoteSubscription = {
				channel: `realtime:${spec.table}`,
				unsubscribe: async () => {
					listeners.get(spec.table)?.delete(onEvent);
				}
			};
			return subscription;
		},

		async unsubscribeAll() {
			record('unsubscribeAll', []);
			listeners.clear();
		}
	};

	function record(method: Method, args: unknown[]): void {
		fake.calls.push({ method, args });
		const failure = failures.get(method);
		if (failure) {
			failures.delete(method);
			throw failure;
		}
	}

	return fake;
}

/** A remote ledger row with every column present. */
export function remoteRow(overrides: Partial<RemoteLedgerWrite> & { id: number }): RemoteLedgerWrite {
	return {
		data: '2024-03-05',
		data_ord: 20240305,
		cod_imovel: 1,
		cod_conta: 1,
		num_doc: null,
		tipo_doc: 1,
		historico: 'Corn sale',
		id_participante: null,
		tipo_lanc: 1,
		valor_entrada: 0,
		valor_saida: 0,
		saldo_final: 0,
		natureza_saldo: 'P',
		usuario: 'ana',
		categoria: null,
		area_afetada: null,
		quantidade: null,
		unidade_medida: null,
		...overrides
	};
}
