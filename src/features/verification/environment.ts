/**
 * Preconditions checked before any probing starts
 */

export class EnvironmentError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "EnvironmentError";
	}
}

export interface EnvironmentRequirements {
	requireRoot: boolean;
	isRoot: () => boolean;
	commands: readonly string[];
	commandExists: (name: string) => Promise<boolean>;
}

export function runningAsRoot(): boolean {
	return process.getuid?.() === 0;
}

/**
 * Throw an EnvironmentError naming the first unmet requirement
 */
export async function assertEnvironment(requirements: EnvironmentRequirements): Promise<void> {
	if (requirements.requireRoot && !requirements.isRoot()) {
		throw new EnvironmentError("This command must be run as root");
	}

	for (const command of requirements.commands) {
		if (!(await requirements.commandExists(command))) {
			throw new EnvironmentError(`Required command not found: ${command}`);
		}
	}
}
