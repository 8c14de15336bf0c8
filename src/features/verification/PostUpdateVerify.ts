/**
 * PostUpdateVerify - confirm the system will boot after an update
 *
 * Loads the pre-update artifact when there is one (an unreadable one counts
 * as absent and is reported), re-probes the system,
 * optionally runs the storage round-trip test, and reconciles the two
 * views into an overall status.
 */

import { Logger } from "../../utility/Logger.js";
import type { Artifact, ArtifactStore } from "../artifact/ArtifactStore.js";
import type { CheckRunner } from "../checks/CheckRunner.js";
import type { CheckRun, CheckThresholds, PhaseVerdict } from "../checks/types.js";
import type { RoundTripTest } from "../probe/RoundTripTest.js";
import type { SystemProbe } from "../probe/SystemProbe.js";
import type { SystemSnapshot } from "../probe/types.js";
import { exitCodeFor, printReport, renderPostReport, type ReportLine } from "../report/Reporter.js";
import {
	buildVerdict,
	overallStatus,
	reconcile,
	type OverallStatus,
	type Reconciliation,
} from "../verdict/Aggregator.js";
import { assertEnvironment, runningAsRoot } from "./environment.js";

export interface PostUpdateOptions {
	thresholds: CheckThresholds;
	requireRoot: boolean;
	logPath: string | null;
	/** Round-trip test to run against the first pool; null disables it */
	roundTrip: RoundTripTest | null;
	isRoot?: () => boolean;
}

export interface PostUpdateOutcome {
	exitCode: 0 | 1;
	lines: ReportLine[];
	prior: Artifact | null;
	/** Read error of an artifact that exists but could not be loaded */
	priorError: string | null;
	snapshot: SystemSnapshot;
	run: CheckRun;
	verdict: PhaseVerdict;
	reconciliation: Reconciliation;
	status: OverallStatus;
}

export class PostUpdateVerify {
	private logger = Logger.getInstance();

	constructor(
		private readonly probe: SystemProbe,
		private readonly runner: CheckRunner,
		private readonly store: ArtifactStore,
		private readonly options: PostUpdateOptions,
	) {}

	async run(): Promise<PostUpdateOutcome> {
		const outcome = await this.evaluate();
		printReport(outcome.lines);
		return outcome;
	}

	async evaluate(): Promise<PostUpdateOutcome> {
		await assertEnvironment({
			requireRoot: this.options.requireRoot,
			isRoot: this.options.isRoot ?? runningAsRoot,
			commands: [],
			commandExists: (name) => this.probe.commandExists(name),
		});

		const { artifact: prior, error: priorError } = await this.store.load();
		const snapshot = await this.withRoundTrip(await this.probe.capture());

		const run = this.runner.run({
			snapshot,
			prior,
			phase: "post",
			thresholds: this.options.thresholds,
		});
		const verdict = buildVerdict(run.results);
		const reconciliation = reconcile(snapshot, prior);
		const status = overallStatus(verdict, reconciliation.recommendation);

		this.logger.info(`Post-update status: ${status}`);

		return {
			exitCode: exitCodeFor(verdict),
			lines: renderPostReport({
				prior,
				priorError,
				artifactPath: this.store.getPath(),
				snapshot,
				run,
				verdict,
				reconciliation,
				status,
				logPath: this.options.logPath,
			}),
			prior,
			priorError,
			snapshot,
			run,
			verdict,
			reconciliation,
			status,
		};
	}

	private async withRoundTrip(snapshot: SystemSnapshot): Promise<SystemSnapshot> {
		const test = this.options.roundTrip;
		const pool = snapshot.pools[0];
		if (!test || !pool || !snapshot.userlandTools.zfs) {
			return snapshot;
		}
		const roundTrip = await test.run(pool.name);
		return Object.freeze({ ...snapshot, roundTrip });
	}
}
