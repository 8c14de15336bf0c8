/**
 * Reporter - render phase results as lines for the operator
 *
 * Rendering is pure; printReport() is the only place colour and the console
 * come in. The console is mirrored into the run log by interceptConsole().
 */

import chalk from "chalk";
import type { Artifact } from "../artifact/ArtifactStore.js";
import type { CheckResult, CheckRun, PhaseVerdict } from "../checks/types.js";
import type { PendingUpdates, SystemSnapshot } from "../probe/types.js";
import type {
	OverallStatus,
	Reconciliation,
	UpdateClassification,
} from "../verdict/Aggregator.js";

export type ReportTone = "header" | "success" | "warning" | "error" | "info" | "plain";

export interface ReportLine {
	readonly tone: ReportTone;
	readonly text: string;
}

export interface PreReportInput {
	pending: PendingUpdates;
	classification: UpdateClassification;
	run: CheckRun;
	verdict: PhaseVerdict;
	artifactPath: string;
	/** false when a fatal failure or a write error kept the artifact from being written */
	artifactWritten: boolean;
	/** Write error of the artifact, null when it was written or not attempted */
	artifactError: string | null;
	logPath: string | null;
}

export interface PostReportInput {
	prior: Artifact | null;
	priorError: string | null;
	artifactPath: string;
	snapshot: SystemSnapshot;
	run: CheckRun;
	verdict: PhaseVerdict;
	reconciliation: Reconciliation;
	status: OverallStatus;
	logPath: string | null;
}

const RULE = "=".repeat(60);

const SEVERITY_MARK: Record<CheckResult["severity"], string> = {
	PASS: "✓",
	WARN: "⚠",
	FAIL: "✗",
};

const SEVERITY_TONE: Record<CheckResult["severity"], ReportTone> = {
	PASS: "success",
	WARN: "warning",
	FAIL: "error",
};

const line = (tone: ReportTone, text: string): ReportLine => ({ tone, text });
const blank = (): ReportLine => line("plain", "");

function header(title: string): ReportLine[] {
	return [blank(), line("header", RULE), line("header", title), line("header", RULE)];
}

export function checkLine(result: CheckResult): ReportLine {
	const fatal = result.severity === "FAIL" && result.fatalOnFail ? " [FATAL]" : "";
	return line(
		SEVERITY_TONE[result.severity],
		`${SEVERITY_MARK[result.severity]} ${result.title}: ${result.message}${fatal}`,
	);
}

function checkSection(run: CheckRun): ReportLine[] {
	const lines = header("CHECK RESULTS");
	lines.push(...run.results.map(checkLine));
	if (run.skipped.length > 0) {
		lines.push(line("info", `Not applicable: ${run.skipped.join(", ")}`));
	}
	return lines;
}

function countsSection(verdict: PhaseVerdict, run: CheckRun): ReportLine[] {
	const lines = header("SUMMARY");
	lines.push(line("plain", `Checks run: ${run.results.length}`));
	lines.push(line("success", `Passed: ${verdict.passCount}`));
	lines.push(line("warning", `Warnings: ${verdict.warnCount}`));
	lines.push(line("error", `Failed: ${verdict.failCount}`));

	if (verdict.fatal) {
		lines.push(blank());
		lines.push(line("error", `FATAL FAILURES (${verdict.fatalFailures.length}):`));
		for (const name of verdict.fatalFailures) {
			const title = run.results.find((result) => result.checkName === name)?.title ?? name;
			lines.push(line("error", `  - ${title} (${name})`));
		}
	}
	return lines;
}

const IMPACT_TEXT: Record<UpdateClassification["impact"], string> = {
	"kernel-affecting": "Kernel update: the initramfs will be rebuilt and a reboot is needed",
	"storage-affecting": "ZFS, boot menu or initramfs tooling update: the boot chain is affected",
	trivial: "No kernel or ZFS packages: low risk update",
};

export function renderPreReport(input: PreReportInput): ReportLine[] {
	const { pending, classification, run, verdict } = input;
	const counts = pending.counts;
	const lines = header("ZFS PRE-UPDATE CHECK");

	lines.push(line("info", `Pending updates: ${counts.total}`));
	lines.push(line("plain", `  Kernel packages: ${counts.kernel}`));
	lines.push(line("plain", `  ZFS packages: ${counts.storage}`));
	lines.push(line("plain", `  ZFSBootMenu packages: ${counts.bootmenu}`));
	lines.push(line("plain", `  Dracut packages: ${counts.initramfsBuilder}`));
	lines.push(line("plain", `  Other packages: ${counts.other}`));
	lines.push(line("info", `Impact: ${IMPACT_TEXT[classification.impact]}`));
	lines.push(
		classification.rebootRecommended
			? line("warning", "A reboot will be recommended after this update")
			: line("plain", "No reboot expected after this update"),
	);

	lines.push(...checkSection(run));
	lines.push(...countsSection(verdict, run));

	lines.push(...header("NEXT STEPS"));
	if (verdict.fatal) {
		lines.push(line("error", "DO NOT UPDATE: resolve the fatal failures above first"));
	} else if (input.artifactError) {
		lines.push(line("error", `Could not save state to ${input.artifactPath}: ${input.artifactError}`));
		lines.push(line("error", "DO NOT UPDATE: the post-update verification needs the saved state"));
	} else {
		if (verdict.warnCount > 0) {
			lines.push(line("warning", "Review the warnings above before updating"));
		}
		lines.push(line("success", "System is ready for the update"));
		lines.push(line("plain", "Run the update, then the post-update verification"));
	}
	if (input.artifactWritten) {
		lines.push(line("info", `State saved to: ${input.artifactPath}`));
	}
	if (input.logPath) {
		lines.push(line("info", `Log file: ${input.logPath}`));
	}
	return lines;
}

const STATUS_TEXT: Record<OverallStatus, ReportLine> = {
	broken: line("error", "SYSTEM NOT SAFE TO REBOOT: resolve the fatal failures above"),
	"reboot-required": line("warning", "Reboot required to complete the update"),
	ready: line("success", "System is ready; no reboot required"),
};

export function renderPostReport(input: PostReportInput): ReportLine[] {
	const { prior, snapshot, run, verdict, reconciliation } = input;
	const lines = header("ZFS POST-UPDATE VERIFICATION");

	if (prior) {
		lines.push(line("info", `Pre-update state: ${input.artifactPath} (recorded ${prior.createdAt})`));
		lines.push(line("plain", `  Kernel before update: ${prior.currentKernel}`));
		lines.push(line("plain", `  Updates recorded: ${prior.pendingUpdates.total}`));
	} else if (input.priorError) {
		lines.push(
			line(
				"warning",
				`Could not read pre-update state at ${input.artifactPath}: ${input.priorError}; drift checks skipped`,
			),
		);
	} else {
		lines.push(line("warning", `No pre-update state at ${input.artifactPath}; drift checks skipped`));
	}

	lines.push(line("plain", `Running kernel: ${snapshot.runningKernelVersion}`));
	lines.push(line("plain", `Latest installed kernel: ${snapshot.latestInstalledKernelVersion}`));
	if (reconciliation.kernelMismatch) {
		lines.push(line("warning", "Running kernel is not the latest installed kernel"));
	}

	lines.push(...checkSection(run));
	lines.push(...countsSection(verdict, run));

	lines.push(...header("RECOMMENDATION"));
	lines.push(STATUS_TEXT[input.status]);
	if (input.status !== "broken") {
		for (const reason of reconciliation.reasons) {
			lines.push(line("plain", `  - ${reason}`));
		}
	}
	if (input.logPath) {
		lines.push(line("info", `Log file: ${input.logPath}`));
	}
	return lines;
}

export function renderEnvironmentError(message: string): ReportLine[] {
	return [line("error", `ERROR: ${message}`)];
}

/**
 * Key/value dump of a stored artifact
 */
export function renderArtifact(artifact: Artifact | null, artifactPath: string): ReportLine[] {
	if (!artifact) {
		return [line("warning", `No pre-update state at ${artifactPath}`)];
	}
	const counts = artifact.pendingUpdates;
	return [
		...header(`PRE-UPDATE STATE (${artifactPath})`),
		line("plain", `Recorded: ${artifact.createdAt} on ${artifact.hostname}`),
		line("plain", `Boot method: ${artifact.bootMethod}`),
		line("plain", `Pools present: ${artifact.poolsExist ? "yes" : "no"}`),
		line("plain", `ESP: ${artifact.espPath} (${artifact.espMounted ? "mounted" : "not mounted"})`),
		line("plain", `Kernel: ${artifact.currentKernel} (latest installed ${artifact.latestKernel})`),
		line(
			"plain",
			`ZFS: module ${artifact.storageModuleVersion}, userland ${artifact.storageUserlandVersion}`,
		),
		line(
			"plain",
			`Updates: ${counts.total} (kernel ${counts.kernel}, zfs ${counts.storage}, zbm ${counts.bootmenu}, dracut ${counts.initramfsBuilder}, other ${counts.other})`,
		),
		line("plain", `Packages: ${artifact.packagesToUpdate.join(" ") || "none"}`),
		line("plain", `Log: ${artifact.precheckLog || "none"}`),
	];
}

const TONE_STYLE: Record<ReportTone, (text: string) => string> = {
	header: chalk.bold.cyan,
	success: chalk.green,
	warning: chalk.yellow,
	error: chalk.red,
	info: chalk.blue,
	plain: (text) => text,
};

export function printReport(lines: readonly ReportLine[], write: (text: string) => void = console.log): void {
	for (const { tone, text } of lines) {
		write(TONE_STYLE[tone](text));
	}
}

export function exitCodeFor(verdict: PhaseVerdict): 0 | 1 {
	return verdict.fatal ? 1 : 0;
}
