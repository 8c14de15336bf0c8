import type { Artifact } from "../artifact/ArtifactStore.js";
import type { SystemSnapshot } from "../probe/types.js";

export type Severity = "PASS" | "WARN" | "FAIL";

export type Phase = "pre" | "post";

export interface CheckResult {
	readonly checkName: string;
	readonly title: string;
	readonly severity: Severity;
	readonly message: string;
	readonly observedAt: Date;
	readonly fatalOnFail: boolean;
}

export interface CheckThresholds {
	rootMinFreeMb: number;
	rootRecommendedFreeMb: number;
	varRecommendedFreeMb: number;
	espMinFreeMb: number;
	poolCapacityWarnPercent: number;
	poolCapacityFailPercent: number;
}

export interface CheckContext {
	readonly snapshot: SystemSnapshot;
	/** null when no pre-update artifact was found */
	readonly prior: Artifact | null;
	readonly phase: Phase;
	readonly thresholds: CheckThresholds;
}

export interface CheckOutcome {
	severity: Severity;
	message: string;
}

export interface CheckDefinition {
	readonly name: string;
	readonly title: string;
	readonly fatalOnFail: boolean;
	readonly phases: readonly Phase[];
	/** false means the check does not apply here and is skipped, not failed */
	readonly applies: (context: CheckContext) => boolean;
	readonly evaluate: (context: CheckContext) => CheckOutcome;
}

export interface CheckRun {
	readonly results: readonly CheckResult[];
	readonly skipped: readonly string[];
}

export interface PhaseVerdict {
	readonly passCount: number;
	readonly warnCount: number;
	readonly failCount: number;
	readonly fatal: boolean;
	/** Names of the fatal-on-failure checks that failed, in run order */
	readonly fatalFailures: readonly string[];
}
