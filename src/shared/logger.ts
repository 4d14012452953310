import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export type { Logger };

/**
 * JSON-structured logger shared by every component. Components take a child
 * via `logger.child({ component })`.
 */
export function createLogger(opts: { level?: LevelWithSilent; name?: string } = {}): Logger {
	return pino({ name: opts.name ?? 'rural-ledger', level: opts.level ?? 'info' });
}

export function silentLogger(): Logger {
	return pino({ level: 'silent' });
}
