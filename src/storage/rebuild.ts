import type Database from 'better-sqlite3';
import type { Logger } from '../shared/logger';
import { LEDGER_TABLE, createIndexesAndViews, ledgerTableDdl, tableColumns, tableSql } from './schema';

export type RebuildState =
	| 'detect'
	| 'quiesce-dependents'
	| 'stage-new'
	| 'copy'
	| 'swap'
	| 'recreate-dependents'
	| 'commit'
	| 'done';

export interface RebuildReport {
	rebuilt: boolean;
	visited: RebuildState[];
	copiedRows: number;
	/** Views and triggers over the ledger table, dropped before the rename. */
	dependents: Array<{ name: string; sql: string }>;
}

const STAGED = `${LEDGER_TABLE}_legacy`;

// Legacy values read the way entryKindOf and balanceSignOf read them, so the
// CHECK constraints of the new table accept every row.
const COPY_AS: Record<string, string> = {
	kind: 'CASE WHEN kind IN (1, 2) THEN kind ELSE 3 END',
	balance_sign: "CASE WHEN UPPER(COALESCE(balance_sign, 'P')) = 'P' THEN 'P' ELSE 'N' END"
};

export function needsRebuild(db: Database.Database): boolean {
	const sql = tableSql(db, LEDGER_TABLE);
	return sql !== undefined && !/AUTOINCREMENT/i.test(sql);
}

/**
 * Move the ledger table to the current definition when it was created
 * without AUTOINCREMENT. Identifiers are copied as-is.
 *
 * Runs inside the caller's transaction; `commit` only marks the end of the
 * walk, the enclosing transaction does the actual commit.
 */
export function rebuildLedgerTable(db: Database.Database, logger: Logger): RebuildReport {
	const report: RebuildReport = { rebuilt: false, visited: [], copiedRows: 0, dependents: [] };
	let state: RebuildState = 'detect';

	while (state !== 'done') {
		report.visited.push(state);
		logger.debug({ state }, 'ledger rebuild');
		switch (state) {
			case 'detect':
				state = needsRebuild(db) ? 'quiesce-dependents' : 'done';
				break;
			case 'quiesce-dependents': {
				const views = db.prepare<[], { name: string; sql: string | null }>(`SELECT name, sql FROM sqlite_master WHERE type IN ('view', 'trigger')`).all();
				for (const v of views) {
					if (!v.sql || !v.sql.toLowerCase().includes(LEDGER_TABLE)) continue;
					db.exec(`DROP ${/^\s*create\s+trigger/i.test(v.sql) ? 'TRIGGER' : 'VIEW'} IF EXISTS ${v.name}`);
					report.dependents.push({ name: v.name, sql: v.sql });
				}
				state = 'stage-new';
				break;
			}
			case 'stage-new':
				db.exec(`ALTER TABLE ${LEDGER_TABLE} RENAME TO ${STAGED}`);
				db.exec(ledgerTableDdl(LEDGER_TABLE));
				state = 'copy';
				break;
			case 'copy': {
				const target = new Set(tableColumns(db, LEDGER_TABLE));
				const common = tableColumns(db, STAGED).filter((c) => target.has(c));
				const cols = common.join(', ');
				const values = common.map((c) => COPY_AS[c] ?? c).join(', ');
				const info = db.prepare(`INSERT INTO ${LEDGER_TABLE} (${cols}) SELECT ${values} FROM ${STAGED} ORDER BY id`).run();
				const source = db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${STAGED}`).get();
				if (info.changes !== (source?.n ?? 0)) {
					throw new Error(`copied ${info.changes} of ${source?.n ?? 0} ledger rows`);
				}
				report.copiedRows = info.changes;
				state = 'swap';
				break;
			}
			case 'swap':
				db.exec(`DROP TABLE ${STAGED}`);
				state = 'recreate-dependents';
				break;
			case 'recreate-dependents': {
				createIndexesAndViews(db);
				const exists = db.prepare<[string], { name: string }>(`SELECT name FROM sqlite_master WHERE name = ?`);
				for (const d of report.dependents) {
					if (!exists.get(d.name)) db.exec(d.sql);
				}
				state = 'commit';
				break;
			}
			case 'commit':
				report.rebuilt = true;
				logger.info({ rows: report.copiedRows }, 'ledger table rebuilt with AUTOINCREMENT');
				state = 'done';
				break;
		}
	}
	return report;
}
