import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MigrationError } from '../../shared/errors';
import { silentLogger } from '../../shared/logger';
import { openStore } from '../ledgerStore';
import { openDatabase, schemaSteps } from '../migrations';
import { rebuildLedgerTable } from '../rebuild';

const STEP_IDS = [
	'001_bootstrap',
	'002_additive_columns',
	'003_ledger_autoincrement',
	'004_sequence_reconciliation',
	'005_date_ord_backfill',
	'006_indexes_and_views'
];

function schemaSnapshot(path: string): Array<{ type: string; name: string; sql: string | null }> {
	const db = new Database(path, { readonly: true });
	try {
		return db.prepare<[], { type: string; name: string; sql: string | null }>(`SELECT type, name, sql FROM sqlite_master ORDER BY type, name`).all();
	} finally {
		db.close();
	}
}

// Ledger table as written before AUTOINCREMENT and the later columns existed.
function writeLegacyStore(path: string, opts: { optionalDescription?: boolean } = {}): void {
	mkdirSync(dirname(path), { recursive: true });
	const db = new Database(path);
	db.exec(`CREATE TABLE ledger_entry (
		id INTEGER PRIMARY KEY,
		date TEXT NOT NULL,
		property_id INTEGER NOT NULL,
		account_id INTEGER NOT NULL,
		document_number TEXT,
		document_type INTEGER NOT NULL DEFAULT 1,
		description TEXT${opts.optionalDescription ? '' : ' NOT NULL'},
		counterparty_id INTEGER,
		kind INTEGER NOT NULL,
		credit REAL NOT NULL DEFAULT 0,
		debit REAL NOT NULL DEFAULT 0,
		closing_balance REAL NOT NULL DEFAULT 0,
		balance_sign TEXT NOT NULL DEFAULT 'P',
		author TEXT NOT NULL DEFAULT ''
	)`);
	db.exec(`CREATE VIEW legacy_totals AS SELECT SUM(credit) AS credit FROM ledger_entry`);
	const insert = db.prepare(
		`INSERT INTO ledger_entry (id, date, property_id, account_id, description, kind, credit, closing_balance) VALUES (?, ?, 1, 1, ?, 1, ?, ?)`
	);
	insert.run(3, '05/03/2024', 'seed sale', 100, 100);
	insert.run(7, '2024-3-6', 'second sale', 50, 150);
	insert.run(12, 'sometime', 'undated', 10, 160);
	db.close();
}

describe('schema migration', () => {
	let dir: string;
	let path: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'ledger-migrate-'));
		path = join(dir, 'data', 'ledger.db');
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it('records every step on a fresh store', () => {
		const store = openStore(path);
		expect(store.appliedMigrations()).toEqual(STEP_IDS);
		store.close();
		expect(schemaSnapshot(path).find((o) => o.name === 'ledger_entry')?.sql).toMatch(/AUTOINCREMENT/);
	});

	it('changes nothing when re-run on a current store', () => {
		const store = openStore(path);
		const property = store.createProperty({ code: 'P1', name: 'Home farm' });
		const account = store.createAccount({ code: 'A1', bankName: 'Bank', branch: '0001', accountNumber: '123' });
		store.createEntry({ date: '2024-01-10', propertyId: property.id, accountId: account.id, description: 'seed', kind: 1, credit: 10 });
		const rowsBefore = store.listEntries({ from: 20240101, to: 20241231 });
		store.close();
		const before = schemaSnapshot(path);

		const again = openStore(path);
		expect(again.appliedMigrations()).toEqual(STEP_IDS);
		expect(again.listEntries({ from: 20240101, to: 20241231 })).toEqual(rowsBefore);
		again.close();
		expect(schemaSnapshot(path)).toEqual(before);
	});

	it('rebuilds a legacy ledger table keeping identifiers', () => {
		writeLegacyStore(path);
		const store = openStore(path);

		expect(store.getEntry(3)?.description).toBe('seed sale');
		expect(store.getEntry(7)?.description).toBe('second sale');
		expect(store.getEntry(12)?.description).toBe('undated');
		expect(schemaSnapshot(path).find((o) => o.name === 'ledger_entry')?.sql).toMatch(/AUTOINCREMENT/);
		expect(schemaSnapshot(path).some((o) => o.name === 'legacy_totals')).toBe(true);
		store.close();
	});

	it('reads out-of-range legacy kinds and signs the way entries are read', () => {
		writeLegacyStore(path);
		const legacy = new Database(path);
		legacy
			.prepare(`INSERT INTO ledger_entry (id, date, property_id, account_id, description, kind, balance_sign) VALUES (?, '2024-03-07', 1, 1, ?, ?, ?)`)
			.run(20, 'odd kind', 9, 'p');
		legacy
			.prepare(`INSERT INTO ledger_entry (id, date, property_id, account_id, description, kind, balance_sign) VALUES (?, '2024-03-08', 1, 1, ?, ?, ?)`)
			.run(21, 'odd sign', 2, 'x');
		legacy.close();

		const store = openStore(path);
		expect(store.getEntry(20)).toMatchObject({ kind: 3, balanceSign: 'P' });
		expect(store.getEntry(21)).toMatchObject({ kind: 2, balanceSign: 'N' });
		store.close();
	});

	it('leaves a legacy table untouched when its rows cannot be copied', () => {
		writeLegacyStore(path, { optionalDescription: true });
		const legacy = new Database(path);
		legacy.prepare(`INSERT INTO ledger_entry (id, date, property_id, account_id, description, kind) VALUES (30, '2024-03-09', 1, 1, NULL, 1)`).run();
		legacy.close();
		const before = schemaSnapshot(path);

		let caught: unknown;
		try {
			openStore(path);
		} catch (e) {
			caught = e;
		}

		expect(caught).toBeInstanceOf(MigrationError);
		expect(caught instanceof MigrationError ? caught.step : undefined).toBe('003_ledger_autoincrement');
		expect(schemaSnapshot(path)).toEqual(before);
		const db = new Database(path, { readonly: true });
		try {
			expect(db.prepare<[], { id: number; description: string | null }>(`SELECT id, description FROM ledger_entry ORDER BY id`).all()).toEqual([
				{ id: 3, description: 'seed sale' },
				{ id: 7, description: 'second sale' },
				{ id: 12, description: 'undated' },
				{ id: 30, description: null }
			]);
			expect(db.prepare<[], { credit: number }>(`SELECT credit FROM legacy_totals`).get()).toEqual({ credit: 160 });
		} finally {
			db.close();
		}
	});

	it('backfills date_ord from either legacy encoding', () => {
		writeLegacyStore(path);
		const store = openStore(path);
		expect(store.getEntry(3)?.dateOrd).toBe(20240305);
		expect(store.getEntry(7)?.dateOrd).toBe(20240306);
		expect(store.getEntry(12)?.dateOrd).toBeNull();
		store.close();
	});

	it('continues identifiers after the highest legacy id', () => {
		writeLegacyStore(path);
		const store = openStore(path);
		const property = store.createProperty({ code: 'P1', name: 'Home farm' });
		const account = store.createAccount({ code: 'A1', bankName: 'Bank', branch: '0001', accountNumber: '123' });
		const entry = store.createEntry({ date: '01/04/2024', propertyId: property.id, accountId: account.id, description: 'after', kind: 2, debit: 5 });
		expect(entry.id).toBe(13);
		store.close();
	});

	it('raises a sequence counter that fell below MAX(id)', () => {
		const store = openStore(path);
		const property = store.createProperty({ code: 'P1', name: 'Home farm' });
		const account = store.createAccount({ code: 'A1', bankName: 'Bank', branch: '0001', accountNumber: '123' });
		for (let i = 0; i < 3; i++) {
			store.createEntry({ date: '2024-02-01', propertyId: property.id, accountId: account.id, description: `e${i}`, kind: 1 });
		}
		store.close();

		const raw = new Database(path);
		raw.prepare(`UPDATE sqlite_sequence SET seq = 0 WHERE name = 'ledger_entry'`).run();
		raw.close();

		const reopened = openStore(path);
		const next = reopened.createEntry({ date: '2024-02-02', propertyId: property.id, accountId: account.id, description: 'next', kind: 1 });
		expect(next.id).toBe(4);
		reopened.close();
	});

	it('walks every rebuild state once and skips a current table', () => {
		writeLegacyStore(path);
		const db = new Database(path);
		db.pragma('foreign_keys = OFF');
		const steps = schemaSteps();
		db.transaction(() => {
			for (const step of steps.slice(0, 2)) step.up(db, silentLogger());
		})();

		const report = rebuildLedgerTable(db, silentLogger());
		expect(report.visited).toEqual(['detect', 'quiesce-dependents', 'stage-new', 'copy', 'swap', 'recreate-dependents', 'commit']);
		expect(report.copiedRows).toBe(3);
		expect(report.dependents.map((d) => d.name)).toEqual(['legacy_totals']);

		const second = rebuildLedgerTable(db, silentLogger());
		expect(second.rebuilt).toBe(false);
		expect(second.visited).toEqual(['detect']);
		db.close();
	});

	it('rolls back every step when one fails', () => {
		const failing = [
			...schemaSteps().slice(0, 2),
			{
				id: '999_broken',
				up: () => {
					throw new Error('boom');
				}
			}
		];
		let caught: unknown;
		try {
			openDatabase(path, silentLogger(), failing);
		} catch (e) {
			caught = e;
		}
		expect(caught).toBeInstanceOf(MigrationError);
		expect(caught instanceof MigrationError ? caught.step : undefined).toBe('999_broken');
		expect(schemaSnapshot(path)).toEqual([]);
	});

	it('fails with MigrationError on a file that is not a database', () => {
		const junk = join(dir, 'junk.db');
		writeFileSync(junk, 'plain text, not sqlite\n'.repeat(200));
		expect(() => openStore(junk)).toThrow(MigrationError);
	});
});
