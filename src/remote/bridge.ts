import { monotonicFactory } from 'ulid';
import { RemoteOperationError, ShutdownError, errorMessage, toRemoteOperationError } from '../shared/errors';
import { silentLogger, type Logger } from '../shared/logger';
import type { RemoteBackend, RemoteSubscription } from './types';

/** A unit of remote work. `name` shows up in logs and errors. */
export interface RemoteOperation<T> {
	name: string;
	run: (backend: RemoteBackend) => Promise<T>;
}

export interface SyncBridge {
	/** Establishes the session on first call; later calls share it. */
	init(): Promise<RemoteBackend>;
	submit<T>(operation: RemoteOperation<T>): Promise<T>;
	trackSubscription(subscription: RemoteSubscription): void;
	/** Never throws; failures and timeouts are logged at debug level. */
	shutdown(opts?: { timeoutMs?: number }): Promise<void>;
	readonly closed: boolean;
	/** Operations waiting for the worker, not counting the running one. */
	pending(): number;
}

interface Job {
	id: string;
	name: string;
	execute: (backend: RemoteBackend) => Promise<void>;
	fail: (reason: RemoteOperationError) => void;
}

function withTimeout<T>(work: Promise<T>, ms: number): Promise<T> {
	let timer: NodeJS.Timeout | undefined;
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => reject(new ShutdownError(`timed out after ${ms}ms`)), ms);
	});
	return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

/**
 * One background worker for all remote work. Operations run one at a time
 * in submission order; each caller awaits only its own result and a failure
 * never stops the worker.
 */
export function createSyncBridge(opts: { connect: () => Promise<RemoteBackend>; logger?: Logger }): SyncBridge {
	const logger = (opts.logger ?? silentLogger()).child({ component: 'bridge' });
	const nextId = monotonicFactory();
	const queue: Job[] = [];
	const subscriptions = new Set<RemoteSubscription>();
	let session: Promise<RemoteBackend> | null = null;
	let worker: Promise<void> | null = null;
	let closed = false;

	function init(): Promise<RemoteBackend> {
		if (!session) {
			logger.debug('connecting');
			session = opts.connect().then(
				(backend) => {
					logger.info('remote session ready');
					return backend;
				},
				(e: unknown) => {
					session = null;
					throw new RemoteOperationError('connect', `connect failed: ${errorMessage(e)}`, { cause: e });
				}
			);
		}
		return session;
	}

	async function drain(): Promise<void> {
		let job = queue.shift();
		while (job) {
			const started = Date.now();
			try {
				const backend = await init();
				await job.execute(backend);
				logger.debug({ op: job.name, id: job.id, ms: Date.now() - started }, 'remote op done');
			} catch (e) {
				const err = toRemoteOperationError(job.name, e);
				logger.warn({ op: job.name, id: job.id, err: err.message }, 'remote op failed');
				job.fail(err);
			}
			job = queue.shift();
		}
	}

	function kick(): void {
		if (worker) return;
		worker = drain().finally(() => {
			worker = null;
			if (queue.length > 0 && !closed) kick();
		});
	}

	function submit<T>(operation: RemoteOperation<T>): Promise<T> {
		if (closed) return Promise.reject(new RemoteOperationError(operation.name, 'bridge is shut down'));
		return new Promise<T>((resolve, reject) => {
			queue.push({
				id: nextId(),
				name: operation.name,
				execute: async (backend) => {
					resolve(await operation.run(backend));
				},
				fail: reject
			});
			kick();
		});
	}

	async function cleanup(): Promise<void> {
		const subs = [...subscriptions];
		subscriptions.clear();
		const results = await Promise.allSettled(subs.map((s) => s.unsubscribe()));
		results.forEach((r, i) => {
			if (r.status === 'rejected') logger.debug({ channel: subs[i]?.channel, err: errorMessage(r.reason) }, 'unsubscribe failed');
		});
		// a subscribe still running opens its channel before the sweep below
		if (worker) await worker;
		if (session) {
			const backend = await session;
			await backend.unsubscribeAll();
		}
	}

	async function shutdown(shutdownOpts: { timeoutMs?: number } = {}): Promise<void> {
		if (closed) return;
		closed = true;
		for (const job of queue.splice(0)) job.fail(new RemoteOperationError(job.name, 'bridge is shut down'));
		try {
			await withTimeout(cleanup(), shutdownOpts.timeoutMs ?? 2000);
			logger.debug('bridge stopped');
		} catch (e) {
			logger.debug({ err: errorMessage(e) }, 'shutdown incomplete');
		}
	}

	return {
		init,
		submit,
		trackSubscription(subscription) {
			if (closed) {
				logger.debug({ channel: subscription.channel }, 'subscription tracked after shutdown, closing it');
				subscription.unsubscribe().catch((e: unknown) => {
					logger.debug({ channel: subscription.channel, err: errorMessage(e) }, 'unsubscribe failed');
				});
				return;
			}
			subscriptions.add(subscription);
		},
		shutdown,
		get closed() {
			return closed;
		},
		pending: () => queue.length
	};
}
