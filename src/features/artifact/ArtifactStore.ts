/**
 * ArtifactStore - the pre-update record handed to the post-update phase
 *
 * The file is flat KEY=value, one assignment per line, with string values
 * double-quoted so a shell can source it. Reading never throws on content:
 * a missing or malformed key falls back to its documented default.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import { Logger, formatTimestamp } from "../../utility/Logger.js";
import { UNKNOWN, type BootMethod, type PendingUpdateCounts, type SystemSnapshot } from "../probe/types.js";

export interface Artifact {
	readonly bootMethod: BootMethod;
	readonly poolsExist: boolean;
	readonly espMounted: boolean;
	readonly espPath: string;
	readonly pendingUpdates: PendingUpdateCounts;
	readonly packagesToUpdate: readonly string[];
	readonly currentKernel: string;
	readonly latestKernel: string;
	readonly storageModuleVersion: string;
	readonly storageUserlandVersion: string;
	readonly hostname: string;
	/** YYYY-MM-DD HH:MM:SS, or "unknown" */
	readonly createdAt: string;
	/** Log file of the pre-update run, empty when none was recorded */
	readonly precheckLog: string;
}

const DEFAULT_ESP_MOUNT = "/boot/efi";

const flag = z
	.enum(["true", "false"])
	.transform((value) => value === "true")
	.catch(false);
const count = z.coerce.number().int().nonnegative().catch(0);
const text = z.string().min(1).catch(UNKNOWN);

const ArtifactFileSchema = z.object({
	ZFSBOOTMENU: flag,
	POOLS_EXIST: flag,
	ESP_MOUNTED: flag,
	ESP_MOUNT: z.string().min(1).catch(DEFAULT_ESP_MOUNT),
	TOTAL_UPDATES: count,
	ZFS_COUNT: count,
	ZBM_COUNT: count,
	DRACUT_COUNT: count,
	KERNEL_COUNT: count,
	OTHER_COUNT: count,
	PACKAGES_TO_UPDATE: z
		.string()
		.catch("")
		.transform((value) => value.split(/\s+/).filter(Boolean)),
	CURRENT_KERNEL: text,
	LATEST_KERNEL: text,
	ZFS_MODULE_VERSION: text,
	ZFS_USERLAND_VERSION: text,
	HOSTNAME: text,
	CHECK_DATE: text,
	PRECHECK_LOG: z.string().catch(""),
});

const ESCAPED = /["\\$`]/g;

function quote(value: string): string {
	return `"${value.replace(ESCAPED, (char) => `\\${char}`)}"`;
}

function unquote(raw: string): string {
	const value = raw.trim();
	if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
		return value.slice(1, -1).replace(/\\(.)/g, "$1");
	}
	if (value.length >= 2 && value.startsWith("'") && value.endsWith("'")) {
		return value.slice(1, -1);
	}
	return value;
}

/**
 * Render an artifact as the sourceable KEY=value text
 */
export function serializeArtifact(artifact: Artifact): string {
	const counts = artifact.pendingUpdates;
	const assignments: Array<[string, string]> = [
		["ZFSBOOTMENU", String(artifact.bootMethod === "BOOT_MENU")],
		["POOLS_EXIST", String(artifact.poolsExist)],
		["ESP_MOUNTED", String(artifact.espMounted)],
		["ESP_MOUNT", quote(artifact.espPath)],
		["TOTAL_UPDATES", String(counts.total)],
		["ZFS_COUNT", String(counts.storage)],
		["ZBM_COUNT", String(counts.bootmenu)],
		["DRACUT_COUNT", String(counts.initramfsBuilder)],
		["KERNEL_COUNT", String(counts.kernel)],
		["OTHER_COUNT", String(counts.other)],
		["PACKAGES_TO_UPDATE", quote(artifact.packagesToUpdate.join(" "))],
		["CURRENT_KERNEL", quote(artifact.currentKernel)],
		["LATEST_KERNEL", quote(artifact.latestKernel)],
		["ZFS_MODULE_VERSION", quote(artifact.storageModuleVersion)],
		["ZFS_USERLAND_VERSION", quote(artifact.storageUserlandVersion)],
		["HOSTNAME", quote(artifact.hostname)],
		["CHECK_DATE", quote(artifact.createdAt)],
		["PRECHECK_LOG", quote(artifact.precheckLog)],
	];

	const header = [
		"# ZFS update verification state",
		`# Written by the pre-update check on ${artifact.createdAt}`,
	];
	return [...header, ...assignments.map(([key, value]) => `${key}=${value}`)].join("\n") + "\n";
}

/**
 * Parse artifact text; comments, blank lines and unknown keys are ignored
 */
export function parseArtifact(content: string): Artifact {
	const entries: Record<string, string> = {};

	for (const rawLine of content.split("\n")) {
		const line = rawLine.trim();
		if (!line || line.startsWith("#")) continue;

		const match = line.match(/^(?:export\s+)?([A-Z_][A-Z0-9_]*)=(.*)$/);
		if (!match?.[1] || match[2] === undefined) continue;
		entries[match[1]] = unquote(match[2]);
	}

	const file = ArtifactFileSchema.parse(entries);

	return {
		bootMethod: file.ZFSBOOTMENU ? "BOOT_MENU" : "TRADITIONAL",
		poolsExist: file.POOLS_EXIST,
		espMounted: file.ESP_MOUNTED,
		espPath: file.ESP_MOUNT,
		pendingUpdates: {
			storage: file.ZFS_COUNT,
			bootmenu: file.ZBM_COUNT,
			initramfsBuilder: file.DRACUT_COUNT,
			kernel: file.KERNEL_COUNT,
			other: file.OTHER_COUNT,
			total: file.TOTAL_UPDATES,
		},
		packagesToUpdate: file.PACKAGES_TO_UPDATE,
		currentKernel: file.CURRENT_KERNEL,
		latestKernel: file.LATEST_KERNEL,
		storageModuleVersion: file.ZFS_MODULE_VERSION,
		storageUserlandVersion: file.ZFS_USERLAND_VERSION,
		hostname: file.HOSTNAME,
		createdAt: file.CHECK_DATE,
		precheckLog: file.PRECHECK_LOG,
	};
}

function isNotFound(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export interface ArtifactLoad {
	artifact: Artifact | null;
	/** Why an existing artifact could not be read; null when it was read or is absent */
	error: string | null;
}

export class ArtifactStore {
	private logger = Logger.getInstance();

	constructor(private readonly filePath: string) {}

	getPath(): string {
		return this.filePath;
	}

	/**
	 * Build the record for a pre-update snapshot
	 */
	static fromSnapshot(
		snapshot: SystemSnapshot,
		meta: { createdAt: Date; logPath: string | null },
	): Artifact {
		return {
			bootMethod: snapshot.bootMethod,
			poolsExist: snapshot.pools.length > 0,
			espMounted: snapshot.espMounted,
			espPath: snapshot.espPath,
			pendingUpdates: snapshot.pendingUpdateCounts,
			packagesToUpdate: snapshot.pendingPackages,
			currentKernel: snapshot.runningKernelVersion,
			latestKernel: snapshot.latestInstalledKernelVersion,
			storageModuleVersion: snapshot.storageModuleVersion,
			storageUserlandVersion: snapshot.storageUserlandVersion,
			hostname: snapshot.hostname,
			createdAt: formatTimestamp(meta.createdAt),
			precheckLog: meta.logPath ?? "",
		};
	}

	/**
	 * Replace the stored artifact atomically; the file is readable by its owner only
	 */
	async write(artifact: Artifact): Promise<void> {
		const tmpPath = `${this.filePath}.tmp-${process.pid}`;
		await fs.mkdir(path.dirname(this.filePath), { recursive: true });

		try {
			await fs.writeFile(tmpPath, serializeArtifact(artifact), { encoding: "utf8", mode: 0o600 });
			// mode on writeFile is filtered by the umask
			await fs.chmod(tmpPath, 0o600);
			await fs.rename(tmpPath, this.filePath);
		} catch (error) {
			await fs.rm(tmpPath, { force: true });
			throw error;
		}

		this.logger.info(`State saved to ${this.filePath}`);
	}

	/**
	 * Load the stored artifact; null when none has been written
	 */
	async read(): Promise<Artifact | null> {
		let content: string;
		try {
			content = await fs.readFile(this.filePath, "utf8");
		} catch (error) {
			if (isNotFound(error)) {
				this.logger.info(`No pre-update state found at ${this.filePath}`);
				return null;
			}
			throw error;
		}

		this.logger.info(`Pre-update state loaded from ${this.filePath}`);
		return parseArtifact(content);
	}

	/**
	 * Like read(), but an unreadable file is reported instead of thrown
	 */
	async load(): Promise<ArtifactLoad> {
		try {
			return { artifact: await this.read(), error: null };
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			this.logger.warn(`Could not read pre-update state at ${this.filePath}: ${message}`);
			return { artifact: null, error: message };
		}
	}
}
