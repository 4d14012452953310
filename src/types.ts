/**
 * Domain types for the rural-producer ledger.
 *
 * Input schemas are zod objects; the inferred `*Input` types are what the
 * store accepts, the interfaces are what it returns.
 */
import { z } from 'zod';
import { parseCalendarDate } from './shared/dates';

/** Entry kind codes as stored locally and remotely. */
export const EntryKind = { Revenue: 1, Expense: 2, Advance: 3 } as const;
export type EntryKind = (typeof EntryKind)[keyof typeof EntryKind];

export const ENTRY_KIND_LABELS: Record<EntryKind, string> = {
	1: 'Revenue',
	2: 'Expense',
	3: 'Advance'
};

/** Unknown codes read as Advance. */
export function entryKindOf(code: number | null | undefined): EntryKind {
	if (code === EntryKind.Revenue) return EntryKind.Revenue;
	if (code === EntryKind.Expense) return EntryKind.Expense;
	return EntryKind.Advance;
}

/** `P`: the closing balance counts positive, `N`: it counts negative. */
export type BalanceSign = 'P' | 'N';

export function balanceSignOf(value: string | null | undefined): BalanceSign {
	return (value ?? 'P').toUpperCase() === 'P' ? 'P' : 'N';
}

export function signedBalance(closingBalance: number, sign: string | null | undefined): number {
	return (sign ?? 'P').toUpperCase() === 'P' ? closingBalance : -closingBalance;
}

export interface LedgerEntry {
	id: number;
	date: string;
	dateOrd: number | null;
	propertyId: number;
	accountId: number;
	documentNumber: string | null;
	documentType: number;
	description: string;
	counterpartyId: number | null;
	kind: EntryKind;
	credit: number;
	debit: number;
	closingBalance: number;
	balanceSign: BalanceSign;
	author: string;
	category: string | null;
	affectedArea: string | null;
	quantity: number | null;
	unit: string | null;
}

const id = z.number().int().positive();
const amount = z.number().finite().nonnegative();
const optionalText = z.string().trim().max(500).nullish().transform((v) => (v ? v : null));

export const entryKindSchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);
export const balanceSignSchema = z.enum(['P', 'N']);

export const calendarDateSchema = z
	.string()
	.trim()
	.refine((v) => parseCalendarDate(v) !== null, { message: 'expected DD/MM/YYYY or YYYY-MM-DD' });

// Credit and debit are both kept as given: an entry may carry both, or neither.
export const ledgerEntryInputSchema = z.object({
	date: calendarDateSchema,
	propertyId: id,
	accountId: id,
	documentNumber: z.string().nullish(),
	documentType: z.number().int().min(1).max(6).default(1),
	description: z.string().trim().min(1).max(1000),
	counterpartyId: id.nullish(),
	kind: entryKindSchema,
	credit: amount.default(0),
	debit: amount.default(0),
	closingBalance: amount.default(0),
	balanceSign: balanceSignSchema.default('P'),
	author: z.string().default(''),
	category: optionalText,
	affectedArea: optionalText,
	quantity: z.number().finite().nullish(),
	unit: optionalText
});
export type LedgerEntryInput = z.input<typeof ledgerEntryInputSchema>;
export type LedgerEntryData = z.output<typeof ledgerEntryInputSchema>;
export type LedgerEntryPatch = Partial<LedgerEntryInput>;

/** Filters for `listEntries`; every field narrows the result. */
export interface EntryFilters {
	propertyId?: number;
	accountId?: number;
	counterpartyId?: number;
	kind?: EntryKind;
	category?: string;
	/** Case-insensitive substring of the description. */
	text?: string;
}

export const propertyInputSchema = z.object({
	code: z.string().trim().min(1),
	name: z.string().trim().min(1),
	country: z.string().trim().default('BR'),
	currency: z.string().trim().default('BRL'),
	itrRegistration: optionalText,
	caepf: optionalText,
	stateRegistration: optionalText,
	address: optionalText,
	number: optionalText,
	complement: optionalText,
	district: optionalText,
	state: optionalText,
	cityCode: optionalText,
	zipCode: optionalText,
	explorationType: z.number().int().min(1).max(4).default(1),
	sharePercent: z.number().finite().min(0).max(100).default(100),
	totalArea: amount.default(0),
	usedArea: amount.default(0)
});
export type PropertyInput = z.input<typeof propertyInputSchema>;
export type Property = z.output<typeof propertyInputSchema> & { id: number; createdAt: string };

export const accountInputSchema = z.object({
	code: z.string().trim().min(1),
	country: z.string().trim().default('BR'),
	bankCode: optionalText,
	bankName: z.string().trim().min(1),
	branch: z.string().trim().min(1),
	accountNumber: z.string().trim().min(1),
	openingBalance: z.number().finite().default(0),
	openedAt: optionalText
});
export type AccountInput = z.input<typeof accountInputSchema>;
export type Account = z.output<typeof accountInputSchema> & { id: number };

/** Counterparty kind codes: 1 legal entity, 2 individual, 3 financial institution, 4 other. */
export const counterpartyKindSchema = z.number().int().min(1).max(4);

export interface Counterparty {
	id: number;
	taxId: string;
	name: string;
	kind: number;
	createdAt: string;
}

export const profileParamsSchema = z.object({
	version: optionalText,
	periodStartIndicator: z.number().int().nullish(),
	specialSituation: z.number().int().nullish(),
	ident: optionalText,
	name: optionalText,
	street: optionalText,
	number: optionalText,
	complement: optionalText,
	district: optionalText,
	state: optionalText,
	cityCode: optionalText,
	zipCode: optionalText,
	phone: optionalText,
	email: optionalText
});
export type ProfileParamsInput = z.input<typeof profileParamsSchema>;
export type ProfileParams = z.output<typeof profileParamsSchema> & { profile: string; updatedAt: string };

export interface AccountBalance {
	accountId: number;
	accountCode: string;
	balance: number;
}

export interface CategorySummary {
	category: string;
	year: number;
	month: number;
	totalCredit: number;
	totalDebit: number;
}

export interface PeriodTotals {
	credit: number;
	debit: number;
}

/** `period` is `YYYYMM`. */
export interface MonthlyTotals extends PeriodTotals {
	period: number;
}
