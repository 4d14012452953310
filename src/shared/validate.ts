import type { ZodType, ZodTypeDef } from 'zod';
import { ValidationError } from './errors';

export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown, what: string): T {
	const parsed = schema.safeParse(value);
	if (!parsed.success) throw new ValidationError(`Invalid ${what}`, parsed.error.issues);
	return parsed.data;
}
