/**
 * Tax-id lookup against ReceitaWS.
 *
 * Calls are spaced at least `minIntervalMs` apart, whatever the previous
 * outcome. HTTP 429, other HTTP failures and network errors are retried with
 * exponential backoff: `baseDelayMs * 2^attempt`. When every attempt fails
 * the caller gets `LOOKUP_FAILED` instead of an exception.
 */
import { z } from 'zod';
import { RateLimitedError, TransientNetworkError, ValidationError, errorMessage } from '../shared/errors';
import { readJsonFile, writeJsonFile } from '../shared/jsonFile';
import { silentLogger, type Logger } from '../shared/logger';
import { onlyDigits, type TaxIdKind } from '../shared/taxId';

export type LookupResponse = Record<string, unknown>;

export const LOOKUP_FAILED: Readonly<LookupResponse> = Object.freeze({ status: 'ERROR', message: 'RATE_LIMIT_OR_NETWORK' });

export const LOOKUP_URLS: Record<TaxIdKind, string> = {
	cnpj: 'https://www.receitaws.com.br/v1/cnpj/',
	cpf: 'https://www.receitaws.com.br/v1/cpf/'
};

export interface IdentityLookupOptions {
	/** JSON file mapping `"<kind>:<digits>"` to the last successful response. */
	cacheFile: string;
	fetch?: typeof fetch;
	sleep?: (ms: number) => Promise<void>;
	now?: () => number;
	logger?: Logger;
	maxAttempts?: number;
	baseDelayMs?: number;
	minIntervalMs?: number;
	timeoutMs?: number;
}

export interface IdentityLookup {
	lookup(kind: TaxIdKind, taxId: string): Promise<LookupResponse>;
}

const cacheSchema = z.record(z.string(), z.record(z.string(), z.unknown()));
const responseSchema = z.record(z.string(), z.unknown());

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isLookupFailure(response: LookupResponse): boolean {
	return response.status === LOOKUP_FAILED.status && response.message === LOOKUP_FAILED.message;
}

export function createIdentityLookup(opts: IdentityLookupOptions): IdentityLookup {
	const fetchImpl = opts.fetch ?? fetch;
	const sleepFn = opts.sleep ?? sleep;
	const now = opts.now ?? Date.now;
	const logger = (opts.logger ?? silentLogger()).child({ component: 'lookup' });
	const maxAttempts = opts.maxAttempts ?? 4;
	const baseDelayMs = opts.baseDelayMs ?? 2000;
	const minIntervalMs = opts.minIntervalMs ?? 1000;
	const timeoutMs = opts.timeoutMs ?? 8000;

	let cache: Promise<Record<string, LookupResponse>> | null = null;
	let saving: Promise<void> = Promise.resolve();
	let lastAttemptAt: number | null = null;
	// every attempt, from any lookup, waits its turn here
	let turn: Promise<unknown> = Promise.resolve();

	function loadCache(): Promise<Record<string, LookupResponse>> {
		if (!cache) cache = readJsonFile(opts.cacheFile, cacheSchema, {});
		return cache;
	}

	async function remember(key: string, response: LookupResponse): Promise<void> {
		const entries = await loadCache();
		entries[key] = response;
		const write = saving.then(() => writeJsonFile(opts.cacheFile, entries));
		saving = write.catch((e: unknown) => logger.warn({ err: errorMessage(e) }, 'lookup cache not saved'));
		await write;
	}

	async function attempt(url: string): Promise<LookupResponse> {
		try {
			const res = await fetchImpl(url, { headers: { accept: 'application/json' }, signal: AbortSignal.timeout(timeoutMs) });
			if (res.status === 429) throw new RateLimitedError('HTTP 429', { url });
			if (!res.ok) throw new TransientNetworkError(`HTTP ${res.status}`);
			const parsed = responseSchema.safeParse(await res.json());
			if (!parsed.success) throw new TransientNetworkError('response is not a JSON object');
			return parsed.data;
		} catch (e) {
			if (e instanceof RateLimitedError || e instanceof TransientNetworkError) throw e;
			throw new TransientNetworkError(errorMessage(e), { cause: e });
		} finally {
			lastAttemptAt = now();
		}
	}

	function scheduled(url: string): Promise<LookupResponse> {
		const next = turn.then(async () => {
			if (lastAttemptAt !== null) {
				const wait = minIntervalMs - (now() - lastAttemptAt);
				if (wait > 0) await sleepFn(wait);
			}
			return attempt(url);
		});
		turn = next.then(
			() => undefined,
			() => undefined
		);
		return next;
	}

	async function lookup(kind: TaxIdKind, taxId: string): Promise<LookupResponse> {
		const digits = onlyDigits(taxId);
		if (!digits) throw new ValidationError('Tax id has no digits');
		const key = `${kind}:${digits}`;
		const cached = (await loadCache())[key];
		if (cached) return cached;

		const url = LOOKUP_URLS[kind] + digits;
		for (let i = 0; i < maxAttempts; i++) {
			let response: LookupResponse | null = null;
			try {
				response = await scheduled(url);
			} catch (e) {
				logger.debug({ key, attempt: i + 1, err: errorMessage(e) }, 'lookup attempt failed');
			}
			if (response) {
				await remember(key, response);
				return response;
			}
			if (i < maxAttempts - 1) await sleepFn(baseDelayMs * 2 ** i);
		}
		logger.warn({ key, attempts: maxAttempts }, 'lookup gave up');
		return { ...LOOKUP_FAILED };
	}

	return { lookup };
}

const NAME_KEYS = ['nome', 'razao_social', 'razaosocial', 'razaoSocial', 'fantasia', 'nome_fantasia'] as const;

/** First non-blank name field of a lookup response, or `''`. */
export function nameFromLookup(response: unknown): string {
	const parsed = responseSchema.safeParse(response);
	if (!parsed.success) return '';
	for (const key of NAME_KEYS) {
		const value = parsed.data[key];
		if (typeof value === 'string' && value.trim()) return value.trim();
	}
	return '';
}
