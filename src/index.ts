#!/usr/bin/env node
import { ArchiveApp } from "./archive-app.js";
import { type CliOptions, parseCliArgs, USAGE } from "./cli/args.js";
import * as cli from "./cli/ui.js";
import { loadConfig } from "./config.js";
import { errorMessage } from "./utils.js";

function readOptions(): CliOptions {
	try {
		return parseCliArgs(process.argv.slice(2));
	} catch (error) {
		cli.printError(errorMessage(error));
		console.log(USAGE);
		process.exit(2);
	}
}

const options = readOptions();
if (options.help) {
	console.log(USAGE);
	process.exit(0);
}

const runConfig = loadConfig({ ...process.env, ...options.env });
try {
	cli.setLogLevel(runConfig.logLevel);
} catch (error) {
	cli.printError(errorMessage(error));
	process.exit(2);
}

const app = new ArchiveApp(runConfig);

let shuttingDown = false;
const handleShutdown = async () => {
	if (shuttingDown) return;
	shuttingDown = true;
	cli.print("Shutting down gracefully...");
	await app.shutdown();
	process.exit(130);
};

// Graceful shutdown handling
process.once("SIGINT", handleShutdown);
process.once("SIGTERM", handleShutdown);

app
	.run()
	.then(async (report) => {
		await app.shutdown();
		const failed = report.rooms.some((r) => r.status === "failed") || report.devices.error !== undefined;
		process.exit(failed ? 1 : 0);
	})
	.catch(async (error) => {
		cli.printError(app.describeError(error));
		await app.shutdown();
		process.exit(1);
	});
