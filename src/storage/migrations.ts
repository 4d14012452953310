import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { MigrationError, errorMessage } from '../shared/errors';
import type { Logger } from '../shared/logger';
import { toOrdinalDate } from '../shared/dates';
import { rebuildLedgerTable } from './rebuild';
import {
	ADDED_COLUMNS,
	LEDGER_TABLE,
	MIGRATIONS_TABLE,
	SEQUENCED_TABLES,
	TABLE_DDL,
	createIndexesAndViews
} from './schema';

export interface SchemaStep {
	id: string;
	up: (db: Database.Database, logger: Logger) => void;
}

function isMissingColumn(e: unknown): boolean {
	return /no such column/i.test(errorMessage(e));
}

/**
 * The ordered steps that bring any store file to the current schema. Every
 * step is idempotent and runs on every open.
 */
export function schemaSteps(): SchemaStep[] {
	const m: SchemaStep[] = [];

	m.push({
		id: '001_bootstrap',
		up: (db) => {
			for (const ddl of TABLE_DDL) db.exec(ddl);
		}
	});

	m.push({
		id: '002_additive_columns',
		up: (db, logger) => {
			for (const { table, column, definition } of ADDED_COLUMNS) {
				try {
					db.prepare(`SELECT ${column} FROM ${table} LIMIT 1`).get();
				} catch (e) {
					if (!isMissingColumn(e)) throw e;
					db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
					logger.info({ table, column }, 'column added');
				}
			}
		}
	});

	m.push({
		id: '003_ledger_autoincrement',
		up: (db, logger) => {
			rebuildLedgerTable(db, logger);
		}
	});

	m.push({
		id: '004_sequence_reconciliation',
		up: (db) => {
			const seq = db.prepare<[string], { seq: number }>(`SELECT seq FROM sqlite_sequence WHERE name = ?`);
			const insert = db.prepare(`INSERT INTO sqlite_sequence (name, seq) VALUES (?, ?)`);
			const raise = db.prepare(`UPDATE sqlite_sequence SET seq = ? WHERE name = ? AND seq < ?`);
			for (const table of SEQUENCED_TABLES) {
				const max = db.prepare<[], { maxId: number }>(`SELECT COALESCE(MAX(id), 0) AS maxId FROM ${table}`).get()?.maxId ?? 0;
				const row = seq.get(table);
				if (!row) {
					if (max > 0) insert.run(table, max);
				} else if (row.seq < max) {
					raise.run(max, table, max);
				}
			}
		}
	});

	m.push({
		id: '005_date_ord_backfill',
		up: (db, logger) => {
			const rows = db.prepare<[], { id: number; date: string | null }>(`SELECT id, date FROM ${LEDGER_TABLE} WHERE date_ord IS NULL`).all();
			const update = db.prepare(`UPDATE ${LEDGER_TABLE} SET date_ord = ? WHERE id = ?`);
			let filled = 0;
			for (const r of rows) {
				const ord = toOrdinalDate(r.date);
				if (ord === null) continue;
				update.run(ord, r.id);
				filled++;
			}
			if (filled > 0 || rows.length > filled) logger.info({ filled, unparseable: rows.length - filled }, 'date_ord backfill');
		}
	});

	m.push({
		id: '006_indexes_and_views',
		up: (db) => createIndexesAndViews(db)
	});

	return m;
}

/**
 * Run every step inside one transaction and record the step ids. A failing
 * step rolls back the whole run and surfaces as `MigrationError` with its id.
 */
export function applySchemaSteps(db: Database.Database, steps: readonly SchemaStep[], logger: Logger): string[] {
	const run = db.transaction(() => {
		for (const step of steps) {
			try {
				step.up(db, logger);
			} catch (e) {
				if (e instanceof MigrationError) throw e;
				throw new MigrationError(step.id, errorMessage(e), { cause: e });
			}
			db.prepare(`INSERT OR IGNORE INTO ${MIGRATIONS_TABLE} (id) VALUES (?)`).run(step.id);
		}
	});
	run.immediate();
	return appliedMigrations(db);
}

export function appliedMigrations(db: Database.Database): string[] {
	return db
		.prepare<[], { id: string }>(`SELECT id FROM ${MIGRATIONS_TABLE} ORDER BY id ASC`)
		.all()
		.map((r) => r.id);
}

/**
 * Open (creating when absent) the store file at `path` and migrate it.
 * Foreign keys are enforced only once the migration has committed. On any
 * failure the handle is closed and `MigrationError` is thrown.
 */
export function openDatabase(path: string, logger: Logger, steps: readonly SchemaStep[] = schemaSteps()): Database.Database {
	let db: Database.Database;
	try {
		if (path !== ':memory:') mkdirSync(dirname(path), { recursive: true });
		db = new Database(path);
	} catch (e) {
		throw new MigrationError('open', errorMessage(e), { cause: e });
	}
	try {
		db.pragma('foreign_keys = OFF');
		db.pragma('synchronous = FULL');
		const applied = applySchemaSteps(db, steps, logger);
		db.pragma('foreign_keys = ON');
		logger.debug({ path, applied }, 'store opened');
		return db;
	} catch (e) {
		db.close();
		if (e instanceof MigrationError) throw e;
		throw new MigrationError('open', errorMessage(e), { cause: e });
	}
}
