#!/usr/bin/env node
/**
 * zfs-update-verify - safety checks around system updates on ZFS root
 *
 * Commands:
 * - pre: checks before an update; records state for the post phase
 * - post: verification after an update, before rebooting
 * - artifact: print the recorded pre-update state
 */

import { config } from "./config/index.js";
import { UpdateVerifier } from "./UpdateVerifier.js";
import { Logger, interceptConsole, runLogPath } from "./utility/Logger.js";
import { Shell } from "./utility/Shell.js";

const USAGE = `Usage: zfs-update-verify <command>

Commands:
  pre        Run pre-update checks and save state to ${config.artifactPath}
  post       Verify the system after an update
  artifact   Show the saved pre-update state
  help       Show this message

Exit codes: 0 ready (warnings allowed), 1 fatal failure or error`;

interceptConsole();
const logger = Logger.getInstance();
logger.setLevel(config.logLevel);
Shell.setDefaultTimeout(config.commandTimeoutMs);

const command = process.argv[2] ?? "help";
const verifier = new UpdateVerifier(config);

function openRunLog(phase: "pre" | "post", title: string): string {
	const logPath = runLogPath(config.logDir, `zfs-${phase}`, new Date());
	logger.open(logPath, title);
	return logPath;
}

try {
	switch (command) {
		case "pre":
			process.exitCode = await verifier.runPreUpdate(openRunLog("pre", "ZFS pre-update check"));
			break;

		case "post":
			process.exitCode = await verifier.runPostUpdate(
				openRunLog("post", "ZFS post-update verification"),
			);
			break;

		case "artifact":
			process.exitCode = await verifier.showArtifact();
			break;

		case "help":
		case "--help":
		case "-h":
			console.log(USAGE);
			break;

		default:
			console.error(`Unknown command: ${command}`);
			console.error(USAGE);
			process.exitCode = 1;
	}
} catch (error) {
	if (error instanceof Error && error.stack) {
		logger.debug(error.stack);
	}
	console.error("Error:", error instanceof Error ? error.message : error);
	process.exitCode = 1;
} finally {
	await logger.close();
}
