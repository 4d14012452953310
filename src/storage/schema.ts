import type Database from 'better-sqlite3';

export const LEDGER_TABLE = 'ledger_entry';
export const MIGRATIONS_TABLE = '_schema_migrations';

/** Tables whose identifiers come from SQLite's AUTOINCREMENT sequence. */
export const SEQUENCED_TABLES = ['property', 'account', 'counterparty', LEDGER_TABLE] as const;

export function ledgerTableDdl(name: string = LEDGER_TABLE): string {
	return `CREATE TABLE IF NOT EXISTS ${name} (
		id INTEGER PRIMARY KEY AUTOINCREMENT,
		date TEXT NOT NULL,
		property_id INTEGER NOT NULL REFERENCES property(id),
		account_id INTEGER NOT NULL REFERENCES account(id),
		document_number TEXT,
		document_type INTEGER NOT NULL DEFAULT 1,
		description TEXT NOT NULL,
		counterparty_id INTEGER REFERENCES counterparty(id),
		kind INTEGER NOT NULL CHECK (kind IN (1, 2, 3)),
		credit REAL NOT NULL DEFAULT 0,
		debit REAL NOT NULL DEFAULT 0,
		closing_balance REAL NOT NULL DEFAULT 0,
		balance_sign TEXT NOT NULL DEFAULT 'P' CHECK (balance_sign IN ('P', 'N')),
		author TEXT NOT NULL DEFAULT '',
		category TEXT,
		date_ord INTEGER,
		affected_area TEXT,
		quantity REAL,
		unit TEXT
	)`;
}

export const TABLE_DDL: readonly string[] = [
	`CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
		id TEXT PRIMARY KEY,
		applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now'))
	)`,
	`CREATE TABLE IF NOT EXISTS property (
		id INTEGER PRIMARY KEY AUTOINCREMENT,
		code TEXT NOT NULL UNIQUE,
		name TEXT NOT NULL,
		country TEXT NOT NULL DEFAULT 'BR',
		currency TEXT NOT NULL DEFAULT 'BRL',
		itr_registration TEXT,
		caepf TEXT,
		state_registration TEXT,
		address TEXT,
		number TEXT,
		complement TEXT,
		district TEXT,
		state TEXT,
		city_code TEXT,
		zip_code TEXT,
		exploration_type INTEGER NOT NULL DEFAULT 1,
		share_percent REAL NOT NULL DEFAULT 100,
		total_area REAL NOT NULL DEFAULT 0,
		used_area REAL NOT NULL DEFAULT 0,
		created_at TEXT NOT NULL DEFAULT (date('now'))
	)`,
	`CREATE TABLE IF NOT EXISTS account (
		id INTEGER PRIMARY KEY AUTOINCREMENT,
		code TEXT NOT NULL UNIQUE,
		country TEXT NOT NULL DEFAULT 'BR',
		bank_code TEXT,
		bank_name TEXT NOT NULL,
		branch TEXT NOT NULL,
		account_number TEXT NOT NULL,
		opening_balance REAL NOT NULL DEFAULT 0,
		opened_at TEXT
	)`,
	`CREATE TABLE IF NOT EXISTS counterparty (
		id INTEGER PRIMARY KEY AUTOINCREMENT,
		tax_id TEXT NOT NULL UNIQUE,
		name TEXT NOT NULL,
		kind INTEGER NOT NULL DEFAULT 1 CHECK (kind BETWEEN 1 AND 4),
		created_at TEXT NOT NULL DEFAULT (date('now'))
	)`,
	`CREATE TABLE IF NOT EXISTS profile_params (
		profile TEXT PRIMARY KEY,
		version TEXT,
		period_start_indicator INTEGER,
		special_situation INTEGER,
		ident TEXT,
		name TEXT,
		street TEXT,
		number TEXT,
		complement TEXT,
		district TEXT,
		state TEXT,
		city_code TEXT,
		zip_code TEXT,
		phone TEXT,
		email TEXT,
		updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now'))
	)`,
	ledgerTableDdl()
];

/** Columns introduced after the first schema; each is added in place when missing. */
export const ADDED_COLUMNS: ReadonlyArray<{ table: string; column: string; definition: string }> = [
	{ table: LEDGER_TABLE, column: 'category', definition: 'TEXT DEFAULT NULL' },
	{ table: LEDGER_TABLE, column: 'date_ord', definition: 'INTEGER DEFAULT NULL' },
	{ table: LEDGER_TABLE, column: 'affected_area', definition: 'TEXT DEFAULT NULL' },
	{ table: LEDGER_TABLE, column: 'quantity', definition: 'REAL DEFAULT NULL' },
	{ table: LEDGER_TABLE, column: 'unit', definition: 'TEXT DEFAULT NULL' },
	{ table: 'property', column: 'total_area', definition: 'REAL NOT NULL DEFAULT 0' },
	{ table: 'property', column: 'used_area', definition: 'REAL NOT NULL DEFAULT 0' }
];

export const INDEX_DDL: readonly string[] = [
	`CREATE INDEX IF NOT EXISTS idx_ledger_entry_date_ord ON ${LEDGER_TABLE} (date_ord DESC, id DESC)`,
	`CREATE INDEX IF NOT EXISTS idx_ledger_entry_account ON ${LEDGER_TABLE} (account_id, id)`,
	`CREATE INDEX IF NOT EXISTS idx_ledger_entry_property ON ${LEDGER_TABLE} (property_id, date_ord)`,
	`CREATE INDEX IF NOT EXISTS idx_ledger_entry_counterparty ON ${LEDGER_TABLE} (counterparty_id)`,
	`CREATE INDEX IF NOT EXISTS idx_ledger_entry_category ON ${LEDGER_TABLE} (category, date_ord)`
];

export const VIEW_DDL: readonly string[] = [
	// Signed balance of the highest-id entry per account; opening balance when the account has none.
	`CREATE VIEW IF NOT EXISTS account_balance AS
		SELECT a.id AS account_id,
			a.code AS account_code,
			COALESCE((
				SELECT CASE WHEN l.balance_sign = 'P' THEN l.closing_balance ELSE -l.closing_balance END
				FROM ${LEDGER_TABLE} l
				WHERE l.account_id = a.id
				ORDER BY l.id DESC
				LIMIT 1
			), a.opening_balance) AS balance
		FROM account a`,
	`CREATE VIEW IF NOT EXISTS category_summary AS
		SELECT COALESCE(category, '') AS category,
			date_ord / 10000 AS year,
			(date_ord / 100) % 100 AS month,
			SUM(credit) AS total_credit,
			SUM(debit) AS total_debit
		FROM ${LEDGER_TABLE}
		WHERE date_ord IS NOT NULL
		GROUP BY COALESCE(category, ''), date_ord / 10000, (date_ord / 100) % 100`
];

export function createIndexesAndViews(db: Database.Database): void {
	for (const ddl of INDEX_DDL) db.exec(ddl);
	for (const ddl of VIEW_DDL) db.exec(ddl);
}

export function tableSql(db: Database.Database, name: string): string | undefined {
	const row = db.prepare<[string], { sql: string | null }>(`SELECT sql FROM sqlite_master WHERE type = 'table' AND name = ?`).get(name);
	return row?.sql ?? undefined;
}

export function tableColumns(db: Database.Database, name: string): string[] {
	return db.prepare<[], { name: string }>(`PRAGMA table_info(${name})`).all().map((c) => c.name);
}
