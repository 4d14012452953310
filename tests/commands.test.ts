import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { USAGE, parseArgs, runCommand, type CommandDeps } from '../src/commands';
import { createFakeBackend, remoteRow, type FakeBackend } from '../src/remote/__tests__/fakeBackend';
import { ValidationError } from '../src/shared/errors';
import { silentLogger } from '../src/shared/logger';
import { LedgerStore } from '../src/storage/ledgerStore';

describe('parseArgs', () => {
	it('splits flags from positional arguments', () => {
		expect(parseArgs(['11222333000181', '--from', '2024-01-01', '--verbose', '--to', '2024-12-31'])).toEqual({
			positional: ['11222333000181'],
			flags: { from: '2024-01-01', verbose: true, to: '2024-12-31' }
		});
	});
});

describe('runCommand', () => {
	let dir: string;
	let lines: string[];
	let backend: FakeBackend;
	let deps: CommandDeps;

	const storeFile = () => join(dir, 'farm', 'data', 'ledger.db');
	const run = (...argv: string[]) => runCommand([...argv, '--env', join(dir, 'missing.env')], deps);

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'ledger-cli-'));
		lines = [];
		backend = createFakeBackend();
		deps = {
			env: { LEDGER_DATA_DIR: dir, LEDGER_PROFILE: 'farm' },
			logger: silentLogger(),
			out: (line) => void lines.push(line),
			connect: async () => backend
		};
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	function seedReferences(): void {
		const store = LedgerStore.open(storeFile());
		store.createProperty({ code: 'P1', name: 'Home farm' });
		store.createAccount({ code: 'A1', bankName: 'Bank', branch: '0001', accountNumber: '123' });
		store.close();
	}

	it('prints usage', async () => {
		expect(await runCommand([], deps)).toBe(0);
		expect(lines).toEqual([USAGE]);
	});

	it('fails on an unknown command', async () => {
		expect(await run('explode')).toBe(1);
		expect(lines[0]).toBe(`Unknown command: explode\n\n${USAGE}`);
	});

	it('migrates the profile store', async () => {
		expect(await run('migrate')).toBe(0);
		expect(lines).toEqual([
			'Applied migrations: 001_bootstrap, 002_additive_columns, 003_ledger_autoincrement, 004_sequence_reconciliation, 005_date_ord_backfill, 006_indexes_and_views'
		]);
	});

	it('archives once per day', async () => {
		await run('migrate');
		await run('archive');
		await run('archive');

		expect(lines[1]?.startsWith(`Archived to ${join(dir, 'farm', 'backups', 'backup_')}`)).toBe(true);
		expect(lines[2]).toBe('Nothing to archive');
	});

	it('records a looked-up counterparty', async () => {
		deps.fetch = async () => new Response(JSON.stringify({ status: 'OK', nome: 'Boa Vista Ltda' }), { status: 200 });

		expect(await run('lookup', '11.222.333/0001-81')).toBe(0);

		expect(lines).toEqual(['CNPJ 11222333000181: Boa Vista Ltda [counterparty 1]']);
		const store = LedgerStore.open(storeFile());
		expect(store.findCounterpartyByTaxId('11222333000181')).toMatchObject({ name: 'Boa Vista Ltda', kind: 1 });
		store.close();
	});

	it('rejects a lookup with bad check digits', async () => {
		await expect(run('lookup', '11.222.333/0001-80')).rejects.toBeInstanceOf(ValidationError);
	});

	it('pulls remote rows into the local store', async () => {
		seedReferences();
		backend.ledger.set(5, remoteRow({ id: 5, data: '01/02/2024', data_ord: 20240201 }));
		backend.ledger.set(9, remoteRow({ id: 9, data: '2024-06-01', data_ord: 20240601, tipo_lanc: 2, valor_saida: 12 }));

		expect(await run('pull', '--from', '2024-01-01', '--to', '2024-03-31')).toBe(0);

		expect(lines).toEqual(['Pulled 1 entries']);
		const store = LedgerStore.open(storeFile());
		expect(store.getEntry(5)).toMatchObject({ date: '2024-02-01', description: 'Corn sale' });
		expect(store.getEntry(9)).toBeUndefined();
		store.close();
	});

	it('pushes local rows to the remote ledger', async () => {
		seedReferences();
		const store = LedgerStore.open(storeFile());
		const entry = store.createEntry({ date: '2024-03-05', propertyId: 1, accountId: 1, description: 'Hay', kind: 1, credit: 7 });
		store.close();

		expect(await run('push')).toBe(0);

		expect(lines).toEqual(['Pushed 1 entries']);
		expect(backend.ledger.get(entry.id)).toMatchObject({ id: entry.id, data: '2024-03-05', data_ord: 20240305, historico: 'Hay', valor_entrada: 7 });
	});
});
