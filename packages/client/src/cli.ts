#!/usr/bin/env node
import { createConsoleLogger } from '@seatbook/core';
import { ConfigError, loadConfig } from './config.js';
import type { SeatbookConfig } from './config.js';
import { createServices, runBooking } from './run.js';

async function main(): Promise<void> {
	let config: SeatbookConfig;
	try {
		config = loadConfig();
	} catch (error) {
		if (error instanceof ConfigError) {
			console.error(error.message);
			process.exitCode = 1;
			return;
		}
		throw error;
	}

	const logger = createConsoleLogger({ level: config.logLevel });
	const services = createServices(config, logger);
	await runBooking(config, { ...services, logger });
}

main().catch((error: unknown) => {
	console.error(error instanceof Error ? error.message : error);
	process.exitCode = 1;
});
