import { z } from 'zod';

export const LEDGER_REMOTE_TABLE = 'lancamento';
export const PROPERTY_REMOTE_TABLE = 'imovel_rural';
export const COUNTERPARTY_REMOTE_TABLE = 'participante';

export type NameTable = typeof PROPERTY_REMOTE_TABLE | typeof COUNTERPARTY_REMOTE_TABLE;
export type RpcName = 'login_user' | 'create_app_user' | 'verify_app_user';

// PostgREST sends numeric columns as numbers, but older rows were written as text.
const num = z
	.union([z.number(), z.string().trim().regex(/^-?\d+(\.\d+)?$/).transform(Number)])
	.nullish()
	.transform((v) => v ?? null);
const text = z
	.union([z.string(), z.number().transform(String)])
	.nullish()
	.transform((v) => v ?? null);

/** One row of the remote ledger table, with its wire column names. */
export const remoteLedgerRowSchema = z.object({
	id: z.number().int(),
	data: text,
	cod_imovel: num,
	cod_conta: num,
	num_doc: text,
	tipo_doc: num,
	historico: text,
	id_participante: num,
	tipo_lanc: num,
	valor_entrada: num,
	valor_saida: num,
	saldo_final: num,
	natureza_saldo: text,
	usuario: text,
	categoria: text,
	data_ord: num,
	area_afetada: text,
	quantidade: num,
	unidade_medida: text
});
export type RemoteLedgerRow = z.output<typeof remoteLedgerRowSchema>;

type OptionalWriteColumn = 'area_afetada' | 'quantidade' | 'unidade_medida';
/** Row sent on upsert; columns left out keep their remote value. */
export type RemoteLedgerWrite = Omit<RemoteLedgerRow, OptionalWriteColumn> & Partial<Pick<RemoteLedgerRow, OptionalWriteColumn>>;

export const propertyNameRowSchema = z.object({ id: z.number().int(), nome_imovel: text });
export const counterpartyNameRowSchema = z.object({ id: z.number().int(), nome: text });

/** Display row: `[id, date, property, document, counterparty, description, kind, credit, debit, balance, author]`. */
export type LedgerTuple = readonly [
	id: number,
	date: string,
	propertyName: string,
	documentNumber: string,
	counterpartyName: string,
	description: string,
	kindLabel: string,
	credit: number,
	debit: number,
	signedBalance: number,
	author: string
];

/** Id-based row used for remote writes. */
export type LedgerWriteTuple = readonly [
	id: number,
	date: string,
	propertyId: number,
	accountId: number,
	documentNumber: string | null,
	documentType: number,
	description: string,
	counterpartyId: number | null,
	kind: number,
	credit: number,
	debit: number,
	closingBalance: number,
	balanceSign: string,
	author: string,
	category: string | null
];

/** Change-feed notification as delivered by the backend. */
export interface RemoteChange {
	eventType?: string;
	type?: string;
	new?: unknown;
	old?: unknown;
	[key: string]: unknown;
}

export interface ChangeFeedSpec {
	schema: string;
	table: string;
}

export interface RemoteSubscription {
	/** Channel topic, e.g. `realtime:lancamento`. */
	readonly channel: string;
	unsubscribe(): Promise<void>;
}

export interface LedgerQuery {
	/** Inclusive ordinal date bounds; omitted means every row. */
	range?: { from: number; to: number };
	propertyIds?: readonly number[];
}

export interface AdminSession {
	userId: string;
	email: string | null;
}

/**
 * The remote surface the bridge drives. Implemented over supabase-js in
 * production and by an in-memory fake in tests. Rows come back unvalidated.
 */
export interface RemoteBackend {
	selectLedger(query: LedgerQuery): Promise<unknown[]>;
	upsertLedger(rows: readonly RemoteLedgerWrite[]): Promise<void>;
	deleteLedger(id: number): Promise<void>;
	selectNames(table: NameTable, ids: readonly number[]): Promise<unknown[]>;
	rpc(fn: RpcName, args: Record<string, unknown>): Promise<unknown>;
	signIn(email: string, password: string): Promise<AdminSession>;
	signOut(): Promise<void>;
	subscribe(spec: ChangeFeedSpec, onEvent: (change: RemoteChange) => void): Promise<RemoteSubscription>;
	unsubscribeAll(): Promise<void>;
}
