import Database from 'better-sqlite3';
import { NotFoundError, ValidationError } from '../shared/errors';
import { formatIso, parseCalendarDate, ordinalOf, type OrdinalRange } from '../shared/dates';
import { silentLogger, type Logger } from '../shared/logger';
import { normalizeTaxId, onlyDigits } from '../shared/taxId';
import { validate } from '../shared/validate';
import {
	accountInputSchema,
	counterpartyKindSchema,
	ledgerEntryInputSchema,
	profileParamsSchema,
	propertyInputSchema,
	type Account,
	type AccountBalance,
	type AccountInput,
	type CategorySummary,
	type Counterparty,
	type EntryFilters,
	type LedgerEntry,
	type LedgerEntryData,
	type LedgerEntryInput,
	type LedgerEntryPatch,
	type MonthlyTotals,
	type PeriodTotals,
	type ProfileParams,
	type ProfileParamsInput,
	type Property,
	type PropertyInput
} from '../types';
import {
	ACCOUNT_COLUMNS,
	ENTRY_COLUMNS,
	PROFILE_PARAMS_COLUMNS,
	PROPERTY_COLUMNS,
	insertSql,
	selectList,
	updateSql,
	upsertSql
} from './columns';
import { appliedMigrations, openDatabase } from './migrations';
import { LEDGER_TABLE } from './schema';

export interface OpenStoreOptions {
	logger?: Logger;
}

type EntryParams = Record<keyof typeof ENTRY_COLUMNS, string | number | null>;

const ENTRY_SELECT = `SELECT ${selectList(ENTRY_COLUMNS, ['id'])} FROM ${LEDGER_TABLE}`;
const PROPERTY_SELECT = `SELECT ${selectList(PROPERTY_COLUMNS, ['id', 'created_at AS createdAt'])} FROM property`;
const ACCOUNT_SELECT = `SELECT ${selectList(ACCOUNT_COLUMNS, ['id'])} FROM account`;
const COUNTERPARTY_SELECT = `SELECT id, tax_id AS taxId, name, kind, created_at AS createdAt FROM counterparty`;
const PROFILE_PARAMS_SELECT = `SELECT ${selectList(PROFILE_PARAMS_COLUMNS, ['profile', 'updated_at AS updatedAt'])} FROM profile_params`;

function definedOnly(patch: object): Record<string, unknown> {
	return Object.fromEntries(Object.entries(patch).filter(([, v]) => v !== undefined));
}

function toEntryParams(data: LedgerEntryData): EntryParams {
	const date = parseCalendarDate(data.date);
	if (!date) throw new ValidationError(`Invalid date: ${data.date}`);
	return {
		date: formatIso(date),
		dateOrd: ordinalOf(date),
		propertyId: data.propertyId,
		accountId: data.accountId,
		documentNumber: onlyDigits(data.documentNumber) || null,
		documentType: data.documentType,
		description: data.description,
		counterpartyId: data.counterpartyId ?? null,
		kind: data.kind,
		credit: data.credit,
		debit: data.debit,
		closingBalance: data.closingBalance,
		balanceSign: data.balanceSign,
		author: data.author,
		category: data.category,
		affectedArea: data.affectedArea,
		quantity: data.quantity ?? null,
		unit: data.unit
	};
}

function entryToInput(entry: LedgerEntry): LedgerEntryInput {
	const { id: _id, dateOrd: _dateOrd, ...input } = entry;
	return input;
}

/**
 * The local ledger: entries, their reference entities and the derived
 * balance views, over one better-sqlite3 handle. All calls are synchronous
 * and every write is committed before it returns.
 */
export class LedgerStore {
	readonly path: string;
	private readonly db: Database.Database;
	private readonly logger: Logger;

	private readonly stmt: {
		insertEntry: Database.Statement;
		updateEntry: Database.Statement;
		upsertEntry: Database.Statement;
		deleteEntry: Database.Statement<[number]>;
		getEntry: Database.Statement<[number], LedgerEntry>;
	};

	constructor(db: Database.Database, logger: Logger = silentLogger()) {
		this.db = db;
		this.path = db.name;
		this.logger = logger;
		this.stmt = {
			insertEntry: db.prepare(insertSql(LEDGER_TABLE, ENTRY_COLUMNS)),
			updateEntry: db.prepare(updateSql(LEDGER_TABLE, ENTRY_COLUMNS)),
			upsertEntry: db.prepare(upsertSql(LEDGER_TABLE, ENTRY_COLUMNS)),
			deleteEntry: db.prepare<[number]>(`DELETE FROM ${LEDGER_TABLE} WHERE id = ?`),
			getEntry: db.prepare<[number], LedgerEntry>(`${ENTRY_SELECT} WHERE id = ?`)
		};
	}

	static open(path: string, opts: OpenStoreOptions = {}): LedgerStore {
		const logger = (opts.logger ?? silentLogger()).child({ component: 'store' });
		return new LedgerStore(openDatabase(path, logger), logger);
	}

	appliedMigrations(): string[] {
		return appliedMigrations(this.db);
	}

	close(): void {
		if (this.db.open) this.db.close();
	}

	/**
	 * Run `fn` in one write-exclusive transaction. Any throw rolls back every
	 * write made inside it and is re-thrown. `fn` must not be async.
	 */
	withBulkTransaction<T>(fn: (store: LedgerStore) => T): T {
		return this.db.transaction(() => fn(this)).immediate();
	}

	private write<T>(fn: () => T): T {
		try {
			return fn();
		} catch (e) {
			if (e instanceof Database.SqliteError && e.code.startsWith('SQLITE_CONSTRAINT')) {
				throw new ValidationError(e.message, { code: e.code, message: e.message });
			}
			throw e;
		}
	}

	// entries

	createEntry(input: LedgerEntryInput): LedgerEntry {
		const params = toEntryParams(validate(ledgerEntryInputSchema, input, 'ledger entry'));
		const info = this.write(() => this.stmt.insertEntry.run(params));
		return this.requireEntry(Number(info.lastInsertRowid));
	}

	updateEntry(id: number, patch: LedgerEntryPatch): LedgerEntry {
		const current = this.requireEntry(id);
		const merged = { ...entryToInput(current), ...definedOnly(patch) };
		const params = toEntryParams(validate(ledgerEntryInputSchema, merged, 'ledger entry'));
		this.write(() => this.stmt.updateEntry.run({ ...params, id }));
		return this.requireEntry(id);
	}

	deleteEntry(id: number): boolean {
		return this.write(() => this.stmt.deleteEntry.run(id)).changes > 0;
	}

	getEntry(id: number): LedgerEntry | undefined {
		return this.stmt.getEntry.get(id);
	}

	private requireEntry(id: number): LedgerEntry {
		const entry = this.getEntry(id);
		if (!entry) throw new NotFoundError('ledger entry', id);
		return entry;
	}

	/** Insert or overwrite the entry with `entry.id`; no field is merged. */
	upsertEntry(entry: LedgerEntry): LedgerEntry {
		if (!Number.isInteger(entry.id) || entry.id <= 0) throw new ValidationError(`Invalid entry id: ${entry.id}`);
		const params = toEntryParams(validate(ledgerEntryInputSchema, entryToInput(entry), 'ledger entry'));
		this.write(() => this.stmt.upsertEntry.run({ ...params, id: entry.id }));
		return this.requireEntry(entry.id);
	}

	/** Entries whose ordinal date lies in `range`, newest first. */
	listEntries(range: OrdinalRange, filters: EntryFilters = {}): LedgerEntry[] {
		const where = ['date_ord BETWEEN @from AND @to'];
		const params: Record<string, string | number> = { from: range.from, to: range.to };
		if (filters.propertyId !== undefined) {
			where.push('property_id = @propertyId');
			params.propertyId = filters.propertyId;
		}
		if (filters.accountId !== undefined) {
			where.push('account_id = @accountId');
			params.accountId = filters.accountId;
		}
		if (filters.counterpartyId !== undefined) {
			where.push('counterparty_id = @counterpartyId');
			params.counterpartyId = filters.counterpartyId;
		}
		if (filters.kind !== undefined) {
			where.push('kind = @kind');
			params.kind = filters.kind;
		}
		if (filters.category !== undefined) {
			where.push('category = @category');
			params.category = filters.category;
		}
		if (filters.text) {
			where.push(`description LIKE @text ESCAPE '\\'`);
			params.text = `%${filters.text.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
		}
		const sql = `${ENTRY_SELECT} WHERE ${where.join(' AND ')} ORDER BY date_ord DESC, id DESC`;
		return this.db.prepare<[Record<string, string | number>], LedgerEntry>(sql).all(params);
	}

	// properties

	createProperty(input: PropertyInput): Property {
		const data = validate(propertyInputSchema, input, 'property');
		const info = this.write(() => this.db.prepare(insertSql('property', PROPERTY_COLUMNS)).run(data));
		return this.requireProperty(Number(info.lastInsertRowid));
	}

	updateProperty(id: number, patch: Partial<PropertyInput>): Property {
		const { id: _id, createdAt: _createdAt, ...current } = this.requireProperty(id);
		const data = validate(propertyInputSchema, { ...current, ...definedOnly(patch) }, 'property');
		this.write(() => this.db.prepare(updateSql('property', PROPERTY_COLUMNS)).run({ ...data, id }));
		return this.requireProperty(id);
	}

	deleteProperty(id: number): boolean {
		return this.write(() => this.db.prepare('DELETE FROM property WHERE id = ?').run(id)).changes > 0;
	}

	getProperty(id: number): Property | undefined {
		return this.db.prepare<[number], Property>(`${PROPERTY_SELECT} WHERE id = ?`).get(id);
	}

	listProperties(): Property[] {
		return this.db.prepare<[], Property>(`${PROPERTY_SELECT} ORDER BY code`).all();
	}

	private requireProperty(id: number): Property {
		const p = this.getProperty(id);
		if (!p) throw new NotFoundError('property', id);
		return p;
	}

	// accounts

	createAccount(input: AccountInput): Account {
		const data = validate(accountInputSchema, input, 'account');
		const info = this.write(() => this.db.prepare(insertSql('account', ACCOUNT_COLUMNS)).run(data));
		return this.requireAccount(Number(info.lastInsertRowid));
	}

	updateAccount(id: number, patch: Partial<AccountInput>): Account {
		const { id: _id, ...current } = this.requireAccount(id);
		const data = validate(accountInputSchema, { ...current, ...definedOnly(patch) }, 'account');
		this.write(() => this.db.prepare(updateSql('account', ACCOUNT_COLUMNS)).run({ ...data, id }));
		return this.requireAccount(id);
	}

	deleteAccount(id: number): boolean {
		return this.write(() => this.db.prepare('DELETE FROM account WHERE id = ?').run(id)).changes > 0;
	}

	getAccount(id: number): Account | undefined {
		return this.db.prepare<[number], Account>(`${ACCOUNT_SELECT} WHERE id = ?`).get(id);
	}

	listAccounts(): Account[] {
		return this.db.prepare<[], Account>(`${ACCOUNT_SELECT} ORDER BY code`).all();
	}

	private requireAccount(id: number): Account {
		const a = this.getAccount(id);
		if (!a) throw new NotFoundError('account', id);
		return a;
	}

	// counterparties

	/** Returns the id of the counterparty holding `taxId`, inserting it or refreshing its name and kind. */
	upsertCounterparty(taxId: string, name: string, kind = 1): number {
		const { digits } = normalizeTaxId(taxId);
		const cleanName = name.trim();
		if (!cleanName) throw new ValidationError('Counterparty name is required');
		const code = validate(counterpartyKindSchema, kind, 'counterparty kind');
		const existing = this.findCounterpartyByTaxId(digits);
		if (existing) {
			this.write(() => this.db.prepare('UPDATE counterparty SET name = ?, kind = ? WHERE id = ?').run(cleanName, code, existing.id));
			return existing.id;
		}
		const info = this.write(() => this.db.prepare('INSERT INTO counterparty (tax_id, name, kind) VALUES (?, ?, ?)').run(digits, cleanName, code));
		this.logger.debug({ taxId: digits }, 'counterparty added');
		return Number(info.lastInsertRowid);
	}

	getCounterparty(id: number): Counterparty | undefined {
		return this.db.prepare<[number], Counterparty>(`${COUNTERPARTY_SELECT} WHERE id = ?`).get(id);
	}

	findCounterpartyByTaxId(taxId: string): Counterparty | undefined {
		return this.db.prepare<[string], Counterparty>(`${COUNTERPARTY_SELECT} WHERE tax_id = ?`).get(onlyDigits(taxId));
	}

	listCounterparties(): Counterparty[] {
		return this.db.prepare<[], Counterparty>(`${COUNTERPARTY_SELECT} ORDER BY name, id`).all();
	}

	deleteCounterparty(id: number): boolean {
		return this.write(() => this.db.prepare('DELETE FROM counterparty WHERE id = ?').run(id)).changes > 0;
	}

	// profile parameters

	upsertProfileParams(profile: string, params: ProfileParamsInput): ProfileParams {
		const key = profile.trim();
		if (!key) throw new ValidationError('Profile name is required');
		const data = validate(profileParamsSchema, params, 'profile parameters');
		const sets = Object.values(PROFILE_PARAMS_COLUMNS).map((col) => `${col} = excluded.${col}`);
		const cols = ['profile', ...Object.values(PROFILE_PARAMS_COLUMNS)];
		const values = ['@profile', ...Object.keys(PROFILE_PARAMS_COLUMNS).map((k) => `@${k}`)];
		const sql = `INSERT INTO profile_params (${cols.join(', ')}) VALUES (${values.join(', ')})
			ON CONFLICT(profile) DO UPDATE SET ${sets.join(', ')}, updated_at = strftime('%Y-%m-%dT%H:%M:%fZ','now')`;
		this.write(() => this.db.prepare(sql).run({ ...data, periodStartIndicator: data.periodStartIndicator ?? null, specialSituation: data.specialSituation ?? null, profile: key }));
		const saved = this.getProfileParams(key);
		if (!saved) throw new NotFoundError('profile parameters', key);
		return saved;
	}

	getProfileParams(profile: string): ProfileParams | undefined {
		return this.db.prepare<[string], ProfileParams>(`${PROFILE_PARAMS_SELECT} WHERE profile = ?`).get(profile.trim());
	}

	// derived reads

	accountBalances(): AccountBalance[] {
		return this.db
			.prepare<[], AccountBalance>('SELECT account_id AS accountId, account_code AS accountCode, balance FROM account_balance ORDER BY account_id')
			.all();
	}

	accountBalance(accountId: number): number {
		const row = this.db.prepare<[number], { balance: number }>('SELECT balance FROM account_balance WHERE account_id = ?').get(accountId);
		if (!row) throw new NotFoundError('account', accountId);
		return row.balance;
	}

	totalBalance(): number {
		return this.db.prepare<[], { total: number }>('SELECT COALESCE(SUM(balance), 0) AS total FROM account_balance').get()?.total ?? 0;
	}

	categorySummary(range?: OrdinalRange): CategorySummary[] {
		const base = 'SELECT category, year, month, total_credit AS totalCredit, total_debit AS totalDebit FROM category_summary';
		const order = 'ORDER BY year, month, category';
		if (!range) return this.db.prepare<[], CategorySummary>(`${base} ${order}`).all();
		return this.db
			.prepare<[number, number], CategorySummary>(`${base} WHERE year * 100 + month BETWEEN ? AND ? ${order}`)
			.all(Math.floor(range.from / 100), Math.floor(range.to / 100));
	}

	totalsBetween(range: OrdinalRange): PeriodTotals {
		const row = this.db
			.prepare<[number, number], PeriodTotals>(
				`SELECT COALESCE(SUM(credit), 0) AS credit, COALESCE(SUM(debit), 0) AS debit FROM ${LEDGER_TABLE} WHERE date_ord BETWEEN ? AND ?`
			)
			.get(range.from, range.to);
		return row ?? { credit: 0, debit: 0 };
	}

	monthlyTotals(range: OrdinalRange): MonthlyTotals[] {
		return this.db
			.prepare<[number, number], MonthlyTotals>(
				`SELECT date_ord / 100 AS period, SUM(credit) AS credit, SUM(debit) AS debit
				FROM ${LEDGER_TABLE} WHERE date_ord BETWEEN ? AND ?
				GROUP BY date_ord / 100 ORDER BY period`
			)
			.all(range.from, range.to);
	}

	dateBounds(): { min: number | null; max: number | null } {
		const row = this.db
			.prepare<[], { min: number | null; max: number | null }>(`SELECT MIN(date_ord) AS min, MAX(date_ord) AS max FROM ${LEDGER_TABLE}`)
			.get();
		return row ?? { min: null, max: null };
	}
}

export function openStore(path: string, opts: OpenStoreOptions = {}): LedgerStore {
	return LedgerStore.open(path, opts);
}
