/**
 * PreUpdateCheck - decide whether it is safe to start a system update
 *
 * Flow: environment -> pending updates -> snapshot -> checks -> verdict.
 * The artifact for the post-update phase is written only when no fatal
 * check failed. A failed write is reported with the results and exits 1.
 */

import { Logger } from "../../utility/Logger.js";
import { ArtifactStore, type Artifact } from "../artifact/ArtifactStore.js";
import type { CheckRunner } from "../checks/CheckRunner.js";
import type { CheckRun, CheckThresholds, PhaseVerdict } from "../checks/types.js";
import type { SystemProbe } from "../probe/SystemProbe.js";
import { exitCodeFor, printReport, renderPreReport, type ReportLine } from "../report/Reporter.js";
import { buildVerdict, classifyPendingUpdates } from "../verdict/Aggregator.js";
import { EnvironmentError, assertEnvironment, runningAsRoot } from "./environment.js";

export const PACKAGE_MANAGER_COMMANDS = ["xbps-install", "xbps-query"] as const;

export interface PreUpdateOptions {
	thresholds: CheckThresholds;
	requireRoot: boolean;
	logPath: string | null;
	isRoot?: () => boolean;
	clock?: () => Date;
}

export interface PreUpdateOutcome {
	exitCode: 0 | 1;
	lines: ReportLine[];
	/** null when the run ended before checks (no updates) */
	verdict: PhaseVerdict | null;
	run: CheckRun | null;
	artifact: Artifact | null;
	/** Why the artifact could not be written, null otherwise */
	artifactError: string | null;
}

export class PreUpdateCheck {
	private logger = Logger.getInstance();

	constructor(
		private readonly probe: SystemProbe,
		private readonly runner: CheckRunner,
		private readonly store: ArtifactStore,
		private readonly options: PreUpdateOptions,
	) {}

	/**
	 * Run the phase and print the report. Throws EnvironmentError when a
	 * precondition is unmet; nothing has been probed at that point.
	 */
	async run(): Promise<PreUpdateOutcome> {
		const outcome = await this.evaluate();
		printReport(outcome.lines);
		return outcome;
	}

	async evaluate(): Promise<PreUpdateOutcome> {
		const clock = this.options.clock ?? (() => new Date());

		await assertEnvironment({
			requireRoot: this.options.requireRoot,
			isRoot: this.options.isRoot ?? runningAsRoot,
			commands: PACKAGE_MANAGER_COMMANDS,
			commandExists: (name) => this.probe.commandExists(name),
		});

		this.logger.info("Checking for pending updates...");
		const pending = await this.probe.probePendingUpdates();
		if (!pending) {
			throw new EnvironmentError("Failed to query pending updates from the package manager");
		}

		if (pending.counts.total === 0) {
			this.logger.info("No updates available");
			return {
				exitCode: 0,
				lines: [{ tone: "success", text: "No updates available. System is up to date." }],
				verdict: null,
				run: null,
				artifact: null,
				artifactError: null,
			};
		}

		const classification = classifyPendingUpdates(pending.counts);
		this.logger.info(`${pending.counts.total} update(s) pending, impact: ${classification.impact}`);

		const snapshot = await this.probe.capture({ pending });
		const run = this.runner.run({
			snapshot,
			prior: null,
			phase: "pre",
			thresholds: this.options.thresholds,
		});
		const verdict = buildVerdict(run.results);

		let artifact: Artifact | null = null;
		let artifactError: string | null = null;
		if (verdict.fatal) {
			this.logger.error(`Fatal check failures: ${verdict.fatalFailures.join(", ")}`);
		} else {
			const record = ArtifactStore.fromSnapshot(snapshot, {
				createdAt: clock(),
				logPath: this.options.logPath,
			});
			try {
				await this.store.write(record);
				artifact = record;
			} catch (error) {
				artifactError = error instanceof Error ? error.message : String(error);
				this.logger.error(`Could not save state to ${this.store.getPath()}: ${artifactError}`);
			}
		}

		return {
			exitCode: artifactError ? 1 : exitCodeFor(verdict),
			lines: renderPreReport({
				pending,
				classification,
				run,
				verdict,
				artifactPath: this.store.getPath(),
				artifactWritten: artifact !== null,
				artifactError,
				logPath: this.options.logPath,
			}),
			verdict,
			run,
			artifact,
			artifactError,
		};
	}
}
