/**
 * Shell Utility - run external commands through bash
 *
 * Features:
 * - Async-only API
 * - Timeout with SIGTERM; a timed-out command reports exit code -1
 * - Structured result with exit code, stdout, stderr
 * - Commands logged at debug level
 * - quote() for arguments spliced into a command line
 */

import { spawn } from "node:child_process";
import { Logger } from "./Logger.js";

export interface ShellResult {
	exitCode: number;
	stdout: string;
	stderr: string;
	timedOut: boolean;
	command: string;
}

export interface ShellOptions {
	timeout?: number; // Timeout in milliseconds (default: 30000)
	logCommand?: boolean; // Log command execution (default: true)
}

/**
 * Anything that can run a command line and report its outcome.
 * Shell.execute is the production implementation; tests pass a fake.
 */
export type CommandExecutor = (
	command: string,
	options?: ShellOptions,
) => Promise<ShellResult>;

// Arguments made only of these characters need no quoting
const SHELL_SAFE = /^[A-Za-z0-9_\/.,:@%+=-]+$/;

export class Shell {
	private static logger = Logger.getInstance();
	private static defaultTimeout = 30000;

	private constructor() {
		// Prevent instantiation - this is a static utility class
	}

	/**
	 * Set the timeout applied when a caller passes none
	 */
	static setDefaultTimeout(timeout: number): void {
		this.defaultTimeout = timeout;
	}

	/**
	 * Quote one argument for bash; plain paths and names pass through unchanged
	 */
	static quote(arg: string): string {
		if (SHELL_SAFE.test(arg)) {
			return arg;
		}
		return `'${arg.replace(/'/g, "'\\''")}'`;
	}

	/**
	 * Execute a shell command asynchronously
	 *
	 * @param command - The command to execute (passed to bash -c)
	 */
	static async execute(
		command: string,
		options: ShellOptions = {},
	): Promise<ShellResult> {
		const {
			timeout = this.defaultTimeout,
			logCommand = true,
		} = options;

		if (logCommand) {
			this.logger.debug(`Executing: ${command}`);
		}

		return new Promise((resolve) => {
			const proc = spawn("bash", ["-c", command], {
				stdio: ["ignore", "pipe", "pipe"],
			});

			let stdout = "";
			let stderr = "";
			let completed = false;
			let timeoutHandle: NodeJS.Timeout | undefined;

			if (timeout > 0) {
				timeoutHandle = setTimeout(() => {
					if (!completed) {
						completed = true;
						proc.kill("SIGTERM");
						this.logger.warn(
							`Command timed out after ${timeout}ms: ${command}`,
						);
						resolve({
							exitCode: -1,
							stdout,
							stderr: stderr || `Timed out after ${timeout}ms`,
							timedOut: true,
							command,
						});
					}
				}, timeout);
			}

			proc.stdout.on("data", (data: Buffer) => {
				stdout += data.toString();
			});

			proc.stderr.on("data", (data: Buffer) => {
				stderr += data.toString();
			});

			proc.on("close", (code) => {
				if (!completed) {
					completed = true;
					if (timeoutHandle) clearTimeout(timeoutHandle);
					resolve({
						// null means the process died from a signal
						exitCode: code ?? -1,
						stdout,
						stderr,
						timedOut: false,
						command,
					});
				}
			});

			proc.on("error", (err) => {
				if (!completed) {
					completed = true;
					if (timeoutHandle) clearTimeout(timeoutHandle);
					this.logger.error(`Command error: ${err.message}`);
					resolve({
						exitCode: -1,
						stdout,
						stderr: err.message,
						timedOut: false,
						command,
					});
				}
			});
		});
	}

	/**
	 * Check if a command exists in PATH
	 */
	static async commandExists(
		name: string,
		exec: CommandExecutor = (command, options) => Shell.execute(command, options),
	): Promise<boolean> {
		const result = await exec(`command -v ${Shell.quote(name)}`, {
			timeout: 2000,
			logCommand: false,
		});
		return result.exitCode === 0;
	}
}
