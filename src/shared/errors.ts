export type ErrorCode =
	| 'MIGRATION_FAILED'
	| 'VALIDATION'
	| 'NOT_FOUND'
	| 'RATE_LIMITED'
	| 'TRANSIENT_NETWORK'
	| 'REMOTE_OPERATION'
	| 'SHUTDOWN'
	| 'INTERNAL';

export class LedgerError extends Error {
	code: ErrorCode;
	details?: unknown;

	constructor(code: ErrorCode, message: string, details?: unknown, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'LedgerError';
		this.code = code;
		this.details = details;
	}
}

/**
 * The store file could not be brought to the current schema. Fatal: the
 * caller must not keep using that store.
 */
export class MigrationError extends LedgerError {
	readonly step: string;

	constructor(step: string, message: string, options?: { cause?: unknown }) {
		super('MIGRATION_FAILED', `migration step "${step}" failed: ${message}`, { step }, options);
		this.name = 'MigrationError';
		this.step = step;
	}
}

export class ValidationError extends LedgerError {
	constructor(message: string, details?: unknown) {
		super('VALIDATION', message, details);
		this.name = 'ValidationError';
	}
}

export class NotFoundError extends LedgerError {
	constructor(entity: string, id: number | string) {
		super('NOT_FOUND', `${entity} ${id} not found`, { entity, id });
		this.name = 'NotFoundError';
	}
}

export class RateLimitedError extends LedgerError {
	constructor(message = 'rate limited', details?: unknown) {
		super('RATE_LIMITED', message, details);
		this.name = 'RateLimitedError';
	}
}

export class TransientNetworkError extends LedgerError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('TRANSIENT_NETWORK', message, undefined, options);
		this.name = 'TransientNetworkError';
	}
}

/** Any remote failure, delivered only to the caller that submitted the operation. */
export class RemoteOperationError extends LedgerError {
	readonly operation: string;

	constructor(operation: string, message: string, options?: { cause?: unknown; details?: unknown }) {
		super('REMOTE_OPERATION', message, options?.details, { cause: options?.cause });
		this.name = 'RemoteOperationError';
		this.operation = operation;
	}
}

export class ShutdownError extends LedgerError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('SHUTDOWN', message, undefined, options);
		this.name = 'ShutdownError';
	}
}

export function errorMessage(e: unknown): string {
	if (e instanceof Error) return e.message;
	if (typeof e === 'object' && e !== null && 'message' in e && typeof e.message === 'string') return e.message;
	return String(e);
}

export function toLedgerError(e: unknown): LedgerError {
	if (e instanceof LedgerError) return e;
	return new LedgerError('INTERNAL', errorMessage(e) || 'Internal error', undefined, { cause: e });
}

export function toRemoteOperationError(operation: string, e: unknown): RemoteOperationError {
	if (e instanceof RemoteOperationError) return e;
	return new RemoteOperationError(operation, errorMessage(e) || 'remote operation failed', { cause: e });
}
