import { ValidationError } from './errors';

export type TaxIdKind = 'cpf' | 'cnpj';

export function onlyDigits(value: string | null | undefined): string {
	return (value ?? '').replace(/\D+/g, '');
}

function checkDigit(base: string, weights: readonly number[]): string {
	let sum = 0;
	for (let i = 0; i < weights.length; i++) sum += Number(base[i]) * (weights[i] ?? 0);
	const rest = sum % 11;
	return rest < 2 ? '0' : String(11 - rest);
}

function repeated(digits: string): boolean {
	return /^(\d)\1*$/.test(digits);
}

const CPF_W1 = [10, 9, 8, 7, 6, 5, 4, 3, 2];
const CPF_W2 = [11, 10, 9, 8, 7, 6, 5, 4, 3, 2];
const CNPJ_W1 = [5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2];
const CNPJ_W2 = [6, 5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2];

export function isValidCpf(value: string): boolean {
	const n = onlyDigits(value);
	if (n.length !== 11 || repeated(n)) return false;
	const d1 = checkDigit(n.slice(0, 9), CPF_W1);
	const d2 = checkDigit(n.slice(0, 9) + d1, CPF_W2);
	return n.endsWith(d1 + d2);
}

export function isValidCnpj(value: string): boolean {
	const n = onlyDigits(value);
	if (n.length !== 14 || repeated(n)) return false;
	const d1 = checkDigit(n.slice(0, 12), CNPJ_W1);
	const d2 = checkDigit(n.slice(0, 12) + d1, CNPJ_W2);
	return n.endsWith(d1 + d2);
}

/** Digits of a CPF (11) or CNPJ (14) with valid check digits. */
export function normalizeTaxId(value: string): { digits: string; kind: TaxIdKind } {
	const digits = onlyDigits(value);
	if (digits.length === 11) {
		if (!isValidCpf(digits)) throw new ValidationError('invalid CPF', { taxId: digits });
		return { digits, kind: 'cpf' };
	}
	if (digits.length === 14) {
		if (!isValidCnpj(digits)) throw new ValidationError('invalid CNPJ', { taxId: digits });
		return { digits, kind: 'cnpj' };
	}
	throw new ValidationError('tax id must have 11 (CPF) or 14 (CNPJ) digits', { taxId: digits });
}
