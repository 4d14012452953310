import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors';
import {
	ordinalFromDate,
	ordinalRange,
	ordinalToIso,
	parseCalendarDate,
	toDisplayDate,
	toIsoDate,
	toOrdinalDate
} from '../dates';

describe('calendar dates', () => {
	it('reads both legacy encodings', () => {
		expect(parseCalendarDate('05/03/2024')).toEqual({ year: 2024, month: 3, day: 5 });
		expect(parseCalendarDate('5-3-2024')).toEqual({ year: 2024, month: 3, day: 5 });
		expect(parseCalendarDate('2024-03-05T10:00:00')).toEqual({ year: 2024, month: 3, day: 5 });
		expect(parseCalendarDate('2024/3/5')).toEqual({ year: 2024, month: 3, day: 5 });
	});

	it('rejects days that do not exist', () => {
		expect(parseCalendarDate('29/02/2023')).toBeNull();
		expect(parseCalendarDate('29/02/2024')).toEqual({ year: 2024, month: 2, day: 29 });
		expect(parseCalendarDate('2024-13-01')).toBeNull();
		expect(parseCalendarDate('soon')).toBeNull();
		expect(parseCalendarDate(null)).toBeNull();
	});

	it('orders dates by their ordinal key whatever the encoding', () => {
		const keys = ['10/01/2024', '2023-12-31', '2-1-2024'].map(toOrdinalDate);
		expect(keys).toEqual([20240110, 20231231, 20240102]);
		expect([...keys].sort()).toEqual([20231231, 20240102, 20240110]);
	});

	it('converts between encodings', () => {
		expect(toIsoDate('05/03/2024')).toBe('2024-03-05');
		expect(toDisplayDate('2024-03-05')).toBe('05/03/2024');
		expect(toDisplayDate('not a date')).toBe('not a date');
		expect(toDisplayDate(null)).toBe('');
		expect(ordinalToIso(20240305)).toBe('2024-03-05');
		expect(ordinalToIso(20240230)).toBeNull();
		expect(ordinalFromDate(new Date(2024, 2, 5, 23, 59))).toBe(20240305);
	});
});

describe('ordinalRange', () => {
	it('accepts text or ordinal bounds', () => {
		expect(ordinalRange('01/03/2024', 20240331)).toEqual({ from: 20240301, to: 20240331 });
	});

	it('rejects invalid or inverted bounds', () => {
		expect(() => ordinalRange('2024-03-31', '2024-03-01')).toThrow(ValidationError);
		expect(() => ordinalRange('2024-03-01', 20241301)).toThrow('invalid end date: 20241301');
	});
});
