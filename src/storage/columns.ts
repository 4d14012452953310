/** Field name → SQL column. Keys double as named parameters (`@key`). */
export type ColumnMap = Readonly<Record<string, string>>;

export const ENTRY_COLUMNS = {
	date: 'date',
	dateOrd: 'date_ord',
	propertyId: 'property_id',
	accountId: 'account_id',
	documentNumber: 'document_number',
	documentType: 'document_type',
	description: 'description',
	counterpartyId: 'counterparty_id',
	kind: 'kind',
	credit: 'credit',
	debit: 'debit',
	closingBalance: 'closing_balance',
	balanceSign: 'balance_sign',
	author: 'author',
	category: 'category',
	affectedArea: 'affected_area',
	quantity: 'quantity',
	unit: 'unit'
} as const satisfies ColumnMap;

export const PROPERTY_COLUMNS = {
	code: 'code',
	name: 'name',
	country: 'country',
	currency: 'currency',
	itrRegistration: 'itr_registration',
	caepf: 'caepf',
	stateRegistration: 'state_registration',
	address: 'address',
	number: 'number',
	complement: 'complement',
	district: 'district',
	state: 'state',
	cityCode: 'city_code',
	zipCode: 'zip_code',
	explorationType: 'exploration_type',
	sharePercent: 'share_percent',
	totalArea: 'total_area',
	usedArea: 'used_area'
} as const satisfies ColumnMap;

export const ACCOUNT_COLUMNS = {
	code: 'code',
	country: 'country',
	bankCode: 'bank_code',
	bankName: 'bank_name',
	branch: 'branch',
	accountNumber: 'account_number',
	openingBalance: 'opening_balance',
	openedAt: 'opened_at'
} as const satisfies ColumnMap;

export const PROFILE_PARAMS_COLUMNS = {
	version: 'version',
	periodStartIndicator: 'period_start_indicator',
	specialSituation: 'special_situation',
	ident: 'ident',
	name: 'name',
	street: 'street',
	number: 'number',
	complement: 'complement',
	district: 'district',
	state: 'state',
	cityCode: 'city_code',
	zipCode: 'zip_code',
	phone: 'phone',
	email: 'email'
} as const satisfies ColumnMap;

export function selectList(columns: ColumnMap, extra: readonly string[] = []): string {
	const mapped = Object.entries(columns).map(([key, col]) => (key === col ? col : `${col} AS ${key}`));
	return [...extra, ...mapped].join(', ');
}

export function insertSql(table: string, columns: ColumnMap, withId = false): string {
	const keys = Object.keys(columns);
	const cols = Object.values(columns);
	if (withId) {
		keys.unshift('id');
		cols.unshift('id');
	}
	return `INSERT INTO ${table} (${cols.join(', ')}) VALUES (${keys.map((k) => `@${k}`).join(', ')})`;
}

export function updateSql(table: string, columns: ColumnMap): string {
	const sets = Object.entries(columns).map(([key, col]) => `${col} = @${key}`);
	return `UPDATE ${table} SET ${sets.join(', ')} WHERE id = @id`;
}

/** `SET col = excluded.col` list for an upsert keyed on `id`. */
export function upsertSql(table: string, columns: ColumnMap): string {
	const sets = Object.values(columns).map((col) => `${col} = excluded.${col}`);
	return `${insertSql(table, columns, true)} ON CONFLICT(id) DO UPDATE SET ${sets.join(', ')}`;
}
