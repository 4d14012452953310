import { parseCalendarDate, formatIso, ordinalOf, toDisplayDate, toOrdinalDate } from '../shared/dates';
import { ValidationError } from '../shared/errors';
import { onlyDigits } from '../shared/taxId';
import { ENTRY_KIND_LABELS, balanceSignOf, entryKindOf, signedBalance, type LedgerEntry } from '../types';
import type { LedgerTuple, LedgerWriteTuple, RemoteLedgerRow, RemoteLedgerWrite } from './types';

function nameOf(names: ReadonlyMap<number, string>, id: number | null): string {
	return id === null ? '' : (names.get(id) ?? '');
}

export function toLocalTuple(
	row: RemoteLedgerRow,
	propertyNames: ReadonlyMap<number, string>,
	counterpartyNames: ReadonlyMap<number, string>
): LedgerTuple {
	return [
		row.id,
		toDisplayDate(row.data),
		nameOf(propertyNames, row.cod_imovel),
		row.num_doc ?? '',
		nameOf(counterpartyNames, row.id_participante),
		row.historico ?? '',
		ENTRY_KIND_LABELS[entryKindOf(row.tipo_lanc)],
		row.valor_entrada ?? 0,
		row.valor_saida ?? 0,
		signedBalance(row.saldo_final ?? 0, row.natureza_saldo),
		row.usuario ?? ''
	];
}

export function toRemoteRow(tuple: LedgerWriteTuple): RemoteLedgerWrite {
	const [id, date, propertyId, accountId, documentNumber, documentType, description, counterpartyId, kind, credit, debit, closingBalance, balanceSign, author, category] =
		tuple;
	const parsed = parseCalendarDate(date);
	if (!parsed) throw new ValidationError(`Invalid date: ${date}`, { id });
	return {
		id,
		data: formatIso(parsed),
		data_ord: ordinalOf(parsed),
		cod_imovel: propertyId,
		cod_conta: accountId,
		num_doc: onlyDigits(documentNumber) || null,
		tipo_doc: documentType,
		historico: description,
		id_participante: counterpartyId,
		tipo_lanc: kind,
		valor_entrada: credit,
		valor_saida: debit,
		saldo_final: closingBalance,
		natureza_saldo: balanceSignOf(balanceSign),
		usuario: author,
		categoria: category
	};
}

export function entryToWriteTuple(entry: LedgerEntry): LedgerWriteTuple {
	return [
		entry.id,
		entry.date,
		entry.propertyId,
		entry.accountId,
		entry.documentNumber,
		entry.documentType,
		entry.description,
		entry.counterpartyId,
		entry.kind,
		entry.credit,
		entry.debit,
		entry.closingBalance,
		entry.balanceSign,
		entry.author,
		entry.category
	];
}

/** Full remote row for an entry, including the columns the write tuple leaves out. */
export function entryToRemoteRow(entry: LedgerEntry): RemoteLedgerWrite {
	return {
		...toRemoteRow(entryToWriteTuple(entry)),
		area_afetada: entry.affectedArea,
		quantidade: entry.quantity,
		unidade_medida: entry.unit
	};
}

export function fromRemoteRow(row: RemoteLedgerRow): LedgerEntry {
	if (row.cod_imovel === null || row.cod_conta === null) {
		throw new ValidationError(`Remote entry ${row.id} has no property or account`, { id: row.id });
	}
	const date = row.data ?? '';
	return {
		id: row.id,
		date,
		dateOrd: row.data_ord ?? toOrdinalDate(date),
		propertyId: row.cod_imovel,
		accountId: row.cod_conta,
		documentNumber: onlyDigits(row.num_doc) || null,
		documentType: row.tipo_doc ?? 1,
		description: row.historico ?? '',
		counterpartyId: row.id_participante,
		kind: entryKindOf(row.tipo_lanc),
		credit: row.valor_entrada ?? 0,
		debit: row.valor_saida ?? 0,
		closingBalance: row.saldo_final ?? 0,
		balanceSign: balanceSignOf(row.natureza_saldo),
		author: row.usuario ?? '',
		category: row.categoria,
		affectedArea: row.area_afetada,
		quantity: row.quantidade,
		unit: row.unidade_medida
	};
}

/** Newest first by ordinal date, then id; rows without a date key go last. */
export function compareRemoteRows(a: RemoteLedgerRow, b: RemoteLedgerRow): number {
	if (a.data_ord !== b.data_ord) {
		if (a.data_ord === null) return 1;
		if (b.data_ord === null) return -1;
		return b.data_ord - a.data_ord;
	}
	return b.id - a.id;
}
