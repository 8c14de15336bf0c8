/**
 * UpdateVerifier - wires the verification phases from configuration
 *
 * Each method runs one phase end to end, prints its report and returns the
 * process exit code.
 */

import type { VerifyConfig } from "./config/index.js";
import { ArtifactStore } from "./features/artifact/ArtifactStore.js";
import { CheckRunner } from "./features/checks/CheckRunner.js";
import { CHECK_CATALOGUE } from "./features/checks/catalogue.js";
import type { CheckThresholds } from "./features/checks/types.js";
import { RoundTripTest } from "./features/probe/RoundTripTest.js";
import { SystemProbe } from "./features/probe/SystemProbe.js";
import { printReport, renderArtifact, renderEnvironmentError } from "./features/report/Reporter.js";
import { PostUpdateVerify } from "./features/verification/PostUpdateVerify.js";
import { PreUpdateCheck } from "./features/verification/PreUpdateCheck.js";
import { EnvironmentError } from "./features/verification/environment.js";
import { Logger } from "./utility/Logger.js";
import type { CommandExecutor } from "./utility/Shell.js";

export class UpdateVerifier {
	private logger = Logger.getInstance();
	private probe: SystemProbe;
	private runner = new CheckRunner(CHECK_CATALOGUE);
	private store: ArtifactStore;
	private thresholds: CheckThresholds;

	constructor(
		private readonly config: VerifyConfig,
		private readonly exec?: CommandExecutor,
		private readonly isRoot?: () => boolean,
	) {
		this.probe = new SystemProbe(
			{
				bootDir: config.bootDir,
				espCandidates: config.espCandidates,
				hostIdPath: config.hostIdPath,
				encryptionKeyPath: config.encryptionKeyPath,
				serviceDir: config.serviceDir,
				dracutConfigPath: config.dracutConfigPath,
				dracutModuleDirs: config.dracutModuleDirs,
				fstabPath: config.fstabPath,
				commandTimeoutMs: config.commandTimeoutMs,
				syncRepositories: config.syncRepositories,
			},
			exec,
		);
		this.store = new ArtifactStore(config.artifactPath);
		this.thresholds = {
			rootMinFreeMb: config.rootMinFreeMb,
			rootRecommendedFreeMb: config.rootRecommendedFreeMb,
			varRecommendedFreeMb: config.varRecommendedFreeMb,
			espMinFreeMb: config.espMinFreeMb,
			poolCapacityWarnPercent: config.poolCapacityWarnPercent,
			poolCapacityFailPercent: config.poolCapacityFailPercent,
		};
	}

	async runPreUpdate(logPath: string | null): Promise<number> {
		const check = new PreUpdateCheck(this.probe, this.runner, this.store, {
			thresholds: this.thresholds,
			requireRoot: this.config.requireRoot,
			logPath,
			isRoot: this.isRoot,
		});
		return this.guard(async () => (await check.run()).exitCode);
	}

	async runPostUpdate(logPath: string | null): Promise<number> {
		const verify = new PostUpdateVerify(this.probe, this.runner, this.store, {
			thresholds: this.thresholds,
			requireRoot: this.config.requireRoot,
			logPath,
			roundTrip: this.config.roundTripTest
				? new RoundTripTest(this.config.commandTimeoutMs, this.exec)
				: null,
			isRoot: this.isRoot,
		});
		return this.guard(async () => (await verify.run()).exitCode);
	}

	async showArtifact(): Promise<number> {
		const artifact = await this.store.read();
		printReport(renderArtifact(artifact, this.store.getPath()));
		return artifact ? 0 : 1;
	}

	/**
	 * Environment errors are reported once and exit 1; anything else propagates
	 */
	private async guard(phase: () => Promise<number>): Promise<number> {
		try {
			return await phase();
		} catch (error) {
			if (error instanceof EnvironmentError) {
				this.logger.error(error.message);
				printReport(renderEnvironmentError(error.message));
				return 1;
			}
			throw error;
		}
	}
}
