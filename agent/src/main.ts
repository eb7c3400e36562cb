#!/usr/bin/env node
import * as readline from "node:readline";
import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { HostBridge } from "./host/bridge.js";
import { createNodeHost } from "./host/runner.js";
import { Logger, createLogger } from "./logger.js";

function writeLine(line: string): void {
	process.stdout.write(`${line}\n`);
}

async function main(): Promise<void> {
	// stdout belongs to the host protocol
	Logger.configure({ stderr: true });
	const config = await loadConfig();
	Logger.configure({ level: config.logLevel });

	const bridge = new HostBridge({ write: writeLine, logger: createLogger("HostBridge") });
	const host = createNodeHost(config, bridge);

	const rl = readline.createInterface({
		input: process.stdin,
		terminal: false,
	});

	rl.on("line", (line) => bridge.handleLine(line));

	rl.on("close", () => {
		host.stop();
		process.exit(0);
	});

	process.on("SIGTERM", () => {
		host.stop();
		process.exit(0);
	});

	await host.start();
}

main().catch((err: unknown) => {
	Logger.error("Main", "Fatal", { error: errorMessage(err) });
	process.exit(1);
});
