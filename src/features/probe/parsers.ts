/**
 * Parse functions for external tool output.
 *
 * Each one extracts a single well-defined token and falls back to a sentinel
 * (UNKNOWN, null, false or an empty list) instead of throwing.
 */

import {
	POOL_HEALTH_STATES,
	UNKNOWN,
	emptyPendingCounts,
	type CanMount,
	type DatasetInfo,
	type FstabEntry,
	type PendingUpdates,
	type PoolHealth,
	type PoolInfo,
	type UpdateCategory,
} from "./types.js";

function lines(output: string): string[] {
	return output
		.split("\n")
		.map((line) => line.trim())
		.filter(Boolean);
}

/**
 * True when `lsmod` lists the module in its first column
 */
export function isModuleLoaded(lsmodOutput: string, moduleName: string): boolean {
	return lines(lsmodOutput).some((line) => line.split(/\s+/)[0] === moduleName);
}

/**
 * Extract `version:` and the first `vermagic:` token from `modinfo` output
 */
export function parseModinfo(output: string): { version: string; vermagic: string } {
	let version = UNKNOWN;
	let vermagic = UNKNOWN;

	for (const line of lines(output)) {
		const [key, value] = line.split(/\s+/);
		if (!value) continue;
		if (key === "version:" && version === UNKNOWN) version = value;
		if (key === "vermagic:" && vermagic === UNKNOWN) vermagic = value;
	}

	return { version, vermagic };
}

/**
 * `zfs version` prints "zfs-2.2.2-1" then "zfs-kmod-2.2.2-1"; the userland
 * version is the first line with the prefix removed.
 */
export function parseUserlandVersion(output: string): string {
	for (const line of lines(output)) {
		const match = line.match(/^zfs-(\d\S*)/);
		if (match?.[1]) return match[1];
	}
	return UNKNOWN;
}

export function parsePoolHealth(value: string | undefined): PoolHealth {
	const normalized = value?.trim().toUpperCase();
	return POOL_HEALTH_STATES.find((state) => state === normalized) ?? "UNKNOWN";
}

/**
 * "55%" -> 55; anything outside 0-100 or non-numeric -> null
 */
export function parseCapacity(value: string | undefined): number | null {
	if (!value) return null;
	const match = value.trim().match(/^(\d+)%?$/);
	if (!match?.[1]) return null;
	const percent = Number.parseInt(match[1], 10);
	return percent >= 0 && percent <= 100 ? percent : null;
}

/**
 * Parse `zpool list -H -o name,health,capacity`
 */
export function parsePoolList(output: string): PoolInfo[] {
	const pools: PoolInfo[] = [];
	for (const line of lines(output)) {
		const [name, health, capacity] = line.split(/\s+/);
		if (!name) continue;
		pools.push({
			name,
			health: parsePoolHealth(health),
			capacityPercent: parseCapacity(capacity),
			accessible: null,
		});
	}
	return pools;
}

function parseMountpoint(value: string | undefined): string | null {
	if (!value || value === "none" || value === "legacy" || value === "-") {
		return null;
	}
	return value;
}

function parseCanMount(value: string | undefined): CanMount | null {
	return value === "on" || value === "off" || value === "noauto" ? value : null;
}

/**
 * Parse `zfs list -H -o name,mounted,mountpoint,canmount -t filesystem`
 */
export function parseDatasetList(output: string): DatasetInfo[] {
	const datasets: DatasetInfo[] = [];
	for (const line of lines(output)) {
		const [name, mounted, mountpoint, canMount] = line.split("\t");
		if (!name) continue;
		datasets.push({
			name,
			mounted: mounted === "yes",
			mountpoint: parseMountpoint(mountpoint),
			canMount: parseCanMount(canMount),
		});
	}
	return datasets;
}

/**
 * Available megabytes from `df -Pm <path>` (fourth column of the last row)
 */
export function parseDfAvailableMb(output: string): number | null {
	const rows = lines(output);
	const last = rows[rows.length - 1];
	if (!last || rows.length < 2) return null;
	const available = last.split(/\s+/)[3];
	if (!available || !/^\d+$/.test(available)) return null;
	return Number.parseInt(available, 10);
}

/**
 * "zfs-2.2.3_1" -> "zfs", "linux6.6-6.6.20_1" -> "linux6.6"
 */
export function packageNameFromPkgver(pkgver: string): string {
	const match = pkgver.match(/^(.+)-[^-]+_\d+$/);
	return match?.[1] ?? pkgver;
}

export function categorizePackage(name: string): UpdateCategory {
	if (name === "zfsbootmenu" || name.startsWith("zfsbootmenu-")) return "bootmenu";
	if (name === "zfs" || name.startsWith("zfs-")) return "storage";
	if (name === "dracut" || name.startsWith("dracut-")) return "initramfsBuilder";
	if (name === "linux" || /^linux\d/.test(name) || name.startsWith("linux-headers")) {
		return "kernel";
	}
	return "other";
}

/**
 * Parse `xbps-install -un`: one pending package per line, pkgver first
 */
export function parsePendingUpdates(output: string): PendingUpdates {
	const counts: Record<UpdateCategory | "total", number> = emptyPendingCounts();
	const packages: string[] = [];

	for (const line of lines(output)) {
		const pkgver = line.split(/\s+/)[0];
		if (!pkgver) continue;
		const name = packageNameFromPkgver(pkgver);
		packages.push(name);
		counts[categorizePackage(name)] += 1;
		counts.total += 1;
	}

	return { counts, packages };
}

const versionCollator = new Intl.Collator("en", { numeric: true });

/**
 * Highest kernel version among `vmlinuz-<version>` file names
 */
export function latestKernelFromBootEntries(fileNames: readonly string[]): string {
	const versions = fileNames
		.map((fileName) => fileName.match(/^vmlinuz-(.+)$/)?.[1])
		.filter((version): version is string => Boolean(version))
		.sort((a, b) => versionCollator.compare(a, b));
	return versions[versions.length - 1] ?? UNKNOWN;
}

/**
 * First SATA/NVMe device from `blkid -t TYPE=vfat -o device`
 */
export function firstEspDevice(blkidOutput: string): string | null {
	return lines(blkidOutput).find((line) => /^\/dev\/(sd|nvme)/.test(line)) ?? null;
}

/**
 * `hostid` prints eight hex digits
 */
export function parseHostIdCommand(output: string): string {
	const value = output.trim().toLowerCase();
	return /^[0-9a-f]{8}$/.test(value) ? value : UNKNOWN;
}

/**
 * The id file is a 4-byte little-endian integer; render it like `hostid` does
 */
export function hostIdFromBytes(bytes: Buffer): string | null {
	if (bytes.length !== 4) return null;
	return bytes.readUInt32LE(0).toString(16).padStart(8, "0");
}

/**
 * Permission bits as the three-digit octal string `stat -c %a` prints
 */
export function formatMode(mode: number): string {
	return (mode & 0o777).toString(8).padStart(3, "0");
}

/**
 * Whether an initramfs listing includes the module; null for an empty listing
 */
export function listingContainsModule(listing: string, moduleFile: string): boolean | null {
	const entries = lines(listing);
	if (entries.length === 0) return null;
	return entries.some((entry) => entry.includes(moduleFile));
}

/**
 * Number of names in a `zfs list -H -o name` listing
 */
export function countListedNames(output: string): number {
	return lines(output).length;
}

/**
 * Entries of an fstab file; comments and short lines are skipped
 */
export function parseFstab(content: string): FstabEntry[] {
	const entries: FstabEntry[] = [];
	for (const line of lines(content)) {
		if (line.startsWith("#")) continue;
		const [device, mountpoint, fsType] = line.split(/\s+/);
		if (!device || !mountpoint || !fsType) continue;
		entries.push({ device, mountpoint, fsType });
	}
	return entries;
}

function dracutListValues(settings: readonly string[], key: string): string[] {
	const pattern = new RegExp(`^${key}\\+?="([^"]*)"`);
	return settings.flatMap((setting) => setting.match(pattern)?.[1]?.split(/\s+/).filter(Boolean) ?? []);
}

/**
 * Settings a ZFS-root dracut configuration lacks, in the form they are written.
 * The key file is required only when one is given.
 */
export function missingDracutSettings(
	content: string,
	files: { hostIdPath: string; keyPath: string | null },
): string[] {
	const settings = lines(content).filter((line) => !line.startsWith("#"));
	const modules = dracutListValues(settings, "add_dracutmodules");
	const omitted = dracutListValues(settings, "omit_dracutmodules");
	const drivers = dracutListValues(settings, "force_drivers");
	const installed = dracutListValues(settings, "install_items");

	const missing: string[] = [];
	if (!settings.some((setting) => /^hostonly="?yes"?$/.test(setting))) {
		missing.push('hostonly="yes"');
	}
	if (!modules.includes("zfs")) missing.push('add_dracutmodules+=" zfs "');
	if (!omitted.includes("btrfs")) missing.push('omit_dracutmodules+=" btrfs "');
	if (!drivers.includes("zfs")) missing.push('force_drivers+=" zfs "');
	for (const file of [files.hostIdPath, files.keyPath]) {
		if (file && !installed.includes(file)) {
			missing.push(`install_items+=" ${file} "`);
		}
	}
	return missing;
}
