import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors';
import { isValidCnpj, isValidCpf, normalizeTaxId, onlyDigits } from '../taxId';

describe('tax ids', () => {
	it('strips punctuation', () => {
		expect(onlyDigits('529.982.247-25')).toBe('52998224725');
		expect(onlyDigits(null)).toBe('');
	});

	it('checks CPF digits', () => {
		expect(isValidCpf('529.982.247-25')).toBe(true);
		expect(isValidCpf('529.982.247-24')).toBe(false);
		expect(isValidCpf('111.111.111-11')).toBe(false);
		expect(isValidCpf('5299822472')).toBe(false);
	});

	it('checks CNPJ digits', () => {
		expect(isValidCnpj('11.222.333/0001-81')).toBe(true);
		expect(isValidCnpj('11.222.333/0001-80')).toBe(false);
		expect(isValidCnpj('00000000000000')).toBe(false);
	});

	it('classifies by length', () => {
		expect(normalizeTaxId('529.982.247-25')).toEqual({ digits: '52998224725', kind: 'cpf' });
		expect(normalizeTaxId('11.222.333/0001-81')).toEqual({ digits: '11222333000181', kind: 'cnpj' });
		expect(() => normalizeTaxId('123')).toThrow(ValidationError);
		expect(() => normalizeTaxId('11.222.333/0001-82')).toThrow('invalid CNPJ');
	});
});
