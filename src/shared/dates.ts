import { ValidationError } from './errors';

export type CalendarDate = { year: number; month: number; day: number };

/** Inclusive range over ordinal date keys. */
export type OrdinalRange = { from: number; to: number };

const DAY_MONTH_YEAR = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/;
// ISO values may come with a time part, e.g. "2024-03-05T00:00:00".
const YEAR_MONTH_DAY = /^(\d{4})[/.-](\d{1,2})[/.-](\d{1,2})(?:[T ].*)?$/;

function daysInMonth(year: number, month: number): number {
	return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function checked(year: number, month: number, day: number): CalendarDate | null {
	if (month < 1 || month > 12) return null;
	if (day < 1 || day > daysInMonth(year, month)) return null;
	return { year, month, day };
}

/**
 * Parse either legacy text encoding: day/month/year or year/month/day.
 * Returns null when neither pattern matches or the day does not exist.
 */
export function parseCalendarDate(text: string | null | undefined): CalendarDate | null {
	if (typeof text !== 'string') return null;
	const s = text.trim();
	let m = DAY_MONTH_YEAR.exec(s);
	if (m) return checked(Number(m[3]), Number(m[2]), Number(m[1]));
	m = YEAR_MONTH_DAY.exec(s);
	if (m) return checked(Number(m[1]), Number(m[2]), Number(m[3]));
	return null;
}

export function ordinalOf(d: CalendarDate): number {
	return d.year * 10000 + d.month * 100 + d.day;
}

export function toOrdinalDate(text: string | null | undefined): number | null {
	const d = parseCalendarDate(text);
	return d ? ordinalOf(d) : null;
}

export function ordinalToDate(ord: number): CalendarDate | null {
	if (!Number.isInteger(ord)) return null;
	return checked(Math.floor(ord / 10000), Math.floor(ord / 100) % 100, ord % 100);
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

export function formatIso(d: CalendarDate): string {
	return `${pad(d.year, 4)}-${pad(d.month)}-${pad(d.day)}`;
}

export function formatDisplay(d: CalendarDate): string {
	return `${pad(d.day)}/${pad(d.month)}/${pad(d.year, 4)}`;
}

export function toIsoDate(text: string | null | undefined): string | null {
	const d = parseCalendarDate(text);
	return d ? formatIso(d) : null;
}

/** DD/MM/YYYY; text that matches neither encoding is returned unchanged. */
export function toDisplayDate(text: string | null | undefined): string {
	if (!text) return '';
	const d = parseCalendarDate(text);
	return d ? formatDisplay(d) : text;
}

export function ordinalFromDate(date: Date): number {
	return date.getFullYear() * 10000 + (date.getMonth() + 1) * 100 + date.getDate();
}

function toOrdinalBound(value: string | number, label: string): number {
	const ord = typeof value === 'number' ? (ordinalToDate(value) ? value : null) : toOrdinalDate(value);
	if (ord === null) throw new ValidationError(`invalid ${label} date: ${String(value)}`);
	return ord;
}

export function ordinalRange(from: string | number, to: string | number): OrdinalRange {
	const range = { from: toOrdinalBound(from, 'start'), to: toOrdinalBound(to, 'end') };
	if (range.from > range.to) throw new ValidationError('date range start is after its end', range);
	return range;
}

export function ordinalToIso(ord: number): string | null {
	const d = ordinalToDate(ord);
	return d ? formatIso(d) : null;
}
