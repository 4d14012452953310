#!/usr/bin/env node
import { runCommand } from './commands';
import { LedgerError } from './shared/errors';
import { createLogger } from './shared/logger';

async function main(): Promise<number> {
	const requested = process.env.LOG_LEVEL;
	const level = requested === 'silent' || requested === 'debug' ? requested : 'warn';
	const logger = createLogger({ level, name: 'rural-ledger-cli' });
	return runCommand(process.argv.slice(2), {
		logger,
		out: (line) => console.log(line)
	});
}

main().then(
	(code) => {
		process.exitCode = code;
	},
	(err: unknown) => {
		if (err instanceof LedgerError) console.error(`${err.code}: ${err.message}`);
		else console.error(err);
		process.exitCode = 1;
	}
);
