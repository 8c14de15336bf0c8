/**
 * Aggregator - fold check results and pending-update counts into decisions
 *
 * All functions here are pure.
 */

import type { Artifact } from "../artifact/ArtifactStore.js";
import type { CheckResult, PhaseVerdict } from "../checks/types.js";
import type { PendingUpdateCounts, SystemSnapshot } from "../probe/types.js";

export type UpdateImpact = "kernel-affecting" | "storage-affecting" | "trivial";

export interface UpdateClassification {
	readonly impact: UpdateImpact;
	readonly rebootRecommended: boolean;
}

export type Recommendation = "reboot-required" | "system-ready";

export interface Reconciliation {
	readonly kernelMismatch: boolean;
	readonly rebootRequired: boolean;
	readonly reasons: readonly string[];
	readonly recommendation: Recommendation;
}

export type OverallStatus = "broken" | "reboot-required" | "ready";

export function buildVerdict(results: readonly CheckResult[]): PhaseVerdict {
	let passCount = 0;
	let warnCount = 0;
	let failCount = 0;
	const fatalFailures: string[] = [];

	for (const result of results) {
		switch (result.severity) {
			case "PASS":
				passCount++;
				break;
			case "WARN":
				warnCount++;
				break;
			case "FAIL":
				failCount++;
				if (result.fatalOnFail) {
					fatalFailures.push(result.checkName);
				}
				break;
		}
	}

	return {
		passCount,
		warnCount,
		failCount,
		fatal: fatalFailures.length > 0,
		fatalFailures,
	};
}

export function classifyPendingUpdates(counts: PendingUpdateCounts): UpdateClassification {
	let impact: UpdateImpact = "trivial";
	if (counts.kernel > 0) {
		impact = "kernel-affecting";
	} else if (counts.storage > 0 || counts.bootmenu > 0 || counts.initramfsBuilder > 0) {
		impact = "storage-affecting";
	}

	return {
		impact,
		rebootRecommended: counts.kernel > 0 || counts.storage > 0,
	};
}

export function detectKernelMismatch(running: string, latestInstalled: string): boolean {
	return running !== latestInstalled;
}

/**
 * Compare the post-update system with what the pre-update phase recorded
 */
export function reconcile(snapshot: SystemSnapshot, prior: Artifact | null): Reconciliation {
	const reasons: string[] = [];
	const running = snapshot.runningKernelVersion;
	const latest = snapshot.latestInstalledKernelVersion;

	const kernelMismatch = detectKernelMismatch(running, latest);
	if (kernelMismatch) {
		reasons.push(`Running kernel ${running} differs from latest installed ${latest}`);
	}

	if (prior && prior.pendingUpdates.kernel > 0) {
		reasons.push(`${prior.pendingUpdates.kernel} kernel package(s) were updated`);
	}

	const { storageModuleVersion: module, storageUserlandVersion: userland } = snapshot;
	if (prior && prior.pendingUpdates.storage > 0 && module !== userland) {
		reasons.push(`ZFS packages were updated and the loaded module (${module}) differs from userland (${userland})`);
	}

	const rebootRequired = reasons.length > 0;
	return {
		kernelMismatch,
		rebootRequired,
		reasons,
		recommendation: rebootRequired ? "reboot-required" : "system-ready",
	};
}

export function overallStatus(verdict: PhaseVerdict, recommendation: Recommendation): OverallStatus {
	if (verdict.fatal) return "broken";
	return recommendation === "reboot-required" ? "reboot-required" : "ready";
}
