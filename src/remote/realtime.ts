import { z } from 'zod';
import { ValidationError, errorMessage } from '../shared/errors';
import { silentLogger, type Logger } from '../shared/logger';
import type { LedgerStore } from '../storage/ledgerStore';
import type { SyncBridge } from './bridge';
import { fromRemoteRow } from './mapper';
import { remoteLedgerRowSchema, type RemoteChange, type RemoteSubscription } from './types';

export type ChangeKind = 'INSERT' | 'UPDATE' | 'DELETE' | '*';
export type ChangeHandler = (kind: ChangeKind, payload: RemoteChange) => void | Promise<void>;

export interface RealtimeStats {
	delivered: number;
	failed: number;
	queued: number;
	active: number;
}

export interface RealtimeChannel {
	/** One subscription per table; later calls add a handler to it and get the same handle. */
	subscribe(table: string, onChange: ChangeHandler): Promise<RemoteSubscription>;
	stats(): RealtimeStats;
	/** Resolves once no callback is queued or running. */
	idle(): Promise<void>;
}

interface Task {
	handler: ChangeHandler;
	kind: ChangeKind;
	payload: RemoteChange;
}

export function resolveChangeKind(change: RemoteChange): ChangeKind {
	const raw = (change.eventType ?? change.type ?? '*').toUpperCase();
	return raw === 'INSERT' || raw === 'UPDATE' || raw === 'DELETE' ? raw : '*';
}

const nextTurn = () => new Promise<void>((resolve) => setImmediate(resolve));

/**
 * Change-feed subscriptions with callbacks dispatched off the event path.
 * Every event is queued and at most `maxWorkers` callbacks run at once; the
 * queue has no bound, so a slow callback grows `stats().queued`.
 */
export function createRealtimeChannel(opts: {
	bridge: SyncBridge;
	schema?: string;
	logger?: Logger;
	maxWorkers?: number;
}): RealtimeChannel {
	const logger = (opts.logger ?? silentLogger()).child({ component: 'realtime' });
	const schema = opts.schema ?? 'public';
	const maxWorkers = Math.max(1, opts.maxWorkers ?? 4);

	const subscriptions = new Map<string, Promise<RemoteSubscription>>();
	const handlers = new Map<string, Set<ChangeHandler>>();
	const tasks: Task[] = [];
	const running = new Set<Promise<void>>();
	const counters = { delivered: 0, failed: 0 };

	async function runTask(task: Task): Promise<void> {
		await nextTurn();
		try {
			await task.handler(task.kind, task.payload);
			counters.delivered++;
		} catch (e) {
			counters.failed++;
			logger.error({ kind: task.kind, err: errorMessage(e) }, 'change callback failed');
		}
	}

	function pump(): void {
		while (running.size < maxWorkers) {
			const task = tasks.shift();
			if (!task) return;
			const p: Promise<void> = runTask(task).finally(() => {
				running.delete(p);
				pump();
			});
			running.add(p);
		}
	}

	function enqueue(task: Task): void {
		tasks.push(task);
		pump();
	}

	function onEvent(table: string, change: RemoteChange): void {
		const kind = resolveChangeKind(change);
		logger.debug({ table, kind }, 'change received');
		for (const handler of handlers.get(table) ?? []) enqueue({ handler, kind, payload: change });
	}

	function subscribe(table: string, onChange: ChangeHandler): Promise<RemoteSubscription> {
		let set = handlers.get(table);
		if (!set) {
			set = new Set();
			handlers.set(table, set);
		}
		set.add(onChange);

		const existing = subscriptions.get(table);
		if (existing) return existing;

		const created = opts.bridge
			.submit({
				name: `subscribe:${table}`,
				run: (backend) => backend.subscribe({ schema, table }, (change) => onEvent(table, change))
			})
			.then(
				(sub) => {
					opts.bridge.trackSubscription(sub);
					logger.info({ channel: sub.channel }, 'subscribed');
					return sub;
				},
				(e: unknown) => {
					subscriptions.delete(table);
					throw e;
				}
			);
		subscriptions.set(table, created);
		return created;
	}

	return {
		subscribe,
		stats: () => ({ ...counters, queued: tasks.length, active: running.size }),
		async idle() {
			while (running.size > 0 || tasks.length > 0) {
				await Promise.all([...running]);
			}
		}
	};
}

const deletedRowSchema = z.object({ id: z.number().int() });

export type AppliedChange = 'upserted' | 'deleted' | 'ignored';

/** Reflect one remote ledger change into the local store. */
export function applyRemoteChange(store: LedgerStore, kind: ChangeKind, payload: RemoteChange): AppliedChange {
	if (kind === 'INSERT' || kind === 'UPDATE') {
		const parsed = remoteLedgerRowSchema.safeParse(payload.new);
		if (!parsed.success) throw new ValidationError(`Malformed ${kind} payload`, parsed.error.issues);
		store.upsertEntry(fromRemoteRow(parsed.data));
		return 'upserted';
	}
	if (kind === 'DELETE') {
		const parsed = deletedRowSchema.safeParse(payload.old);
		if (!parsed.success) throw new ValidationError('Malformed DELETE payload', parsed.error.issues);
		return store.deleteEntry(parsed.data.id) ? 'deleted' : 'ignored';
	}
	return 'ignored';
}
