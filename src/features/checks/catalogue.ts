/**
 * The verification catalogue: one row per check, executed in this order.
 *
 * Fatal rows block the update (pre) or mark the system broken (post) when
 * they FAIL; every other row only informs. Facts the probe could not obtain
 * are reported as WARN, never PASS.
 */

import { UNKNOWN } from "../probe/types.js";
import type { CheckContext, CheckDefinition, CheckOutcome } from "./types.js";

const BOTH_PHASES = ["pre", "post"] as const;
const POST_ONLY = ["post"] as const;

const SECURE_KEY_MODES = ["000", "400", "600"];

const pass = (message: string): CheckOutcome => ({ severity: "PASS", message });
const warn = (message: string): CheckOutcome => ({ severity: "WARN", message });
const fail = (message: string): CheckOutcome => ({ severity: "FAIL", message });

const always = (): boolean => true;
const poolsExist = ({ snapshot }: CheckContext): boolean => snapshot.pools.length > 0;
const bootMenuSystem = ({ snapshot }: CheckContext): boolean =>
	snapshot.bootMethod === "BOOT_MENU";
const priorExists = ({ prior }: CheckContext): boolean => prior !== null;

export const CHECK_CATALOGUE: readonly CheckDefinition[] = [
	{
		name: "storage-module-loaded",
		title: "ZFS kernel module",
		fatalOnFail: true,
		phases: BOTH_PHASES,
		applies: always,
		evaluate: ({ snapshot }) =>
			snapshot.storageModuleLoaded
				? pass(`ZFS module is loaded (version ${snapshot.storageModuleVersion})`)
				: fail("ZFS module is not loaded. Load with: modprobe zfs"),
	},
	{
		name: "storage-userland-tools",
		title: "ZFS userland tools",
		fatalOnFail: true,
		phases: BOTH_PHASES,
		applies: always,
		evaluate: ({ snapshot }) => {
			const missing = Object.entries(snapshot.userlandTools)
				.filter(([, present]) => !present)
				.map(([tool]) => tool);
			return missing.length === 0
				? pass(`zfs and zpool are available (userland ${snapshot.storageUserlandVersion})`)
				: fail(`Command(s) not found: ${missing.join(", ")}`);
		},
	},
	{
		name: "pool-health",
		title: "Pool health",
		fatalOnFail: true,
		phases: BOTH_PHASES,
		applies: poolsExist,
		evaluate: ({ snapshot }) => {
			const unhealthy = snapshot.pools.filter((pool) => pool.health !== "ONLINE");
			if (unhealthy.length === 0) {
				return pass(`All ${snapshot.pools.length} pool(s) are ONLINE`);
			}
			return fail(
				`Unhealthy pool(s): ${unhealthy.map((pool) => `${pool.name} (${pool.health})`).join(", ")}`,
			);
		},
	},
	{
		name: "pool-accessibility",
		title: "Pool accessibility",
		fatalOnFail: true,
		phases: BOTH_PHASES,
		applies: poolsExist,
		evaluate: ({ snapshot }) => {
			const failed = snapshot.pools.filter((pool) => pool.accessible === false).map((p) => p.name);
			if (failed.length > 0) {
				return fail(`zpool status failed for: ${failed.join(", ")}`);
			}
			const unknown = snapshot.pools.filter((pool) => pool.accessible === null).map((p) => p.name);
			if (unknown.length > 0) {
				return warn(`Status not probed for: ${unknown.join(", ")}`);
			}
			return pass("zpool status succeeded for every pool");
		},
	},
	{
		name: "initramfs-builder",
		title: "Initramfs builder",
		fatalOnFail: true,
		phases: BOTH_PHASES,
		applies: always,
		evaluate: ({ snapshot }) =>
			snapshot.initramfs.builderPresent
				? pass("dracut is installed")
				: fail("dracut command not found"),
	},
	{
		name: "initramfs-storage-module",
		title: "Initramfs ZFS module",
		fatalOnFail: true,
		phases: BOTH_PHASES,
		applies: always,
		evaluate: ({ snapshot }) => {
			const { imagePath, imagePresent, containsStorageModule } = snapshot.initramfs;
			if (!imagePresent) {
				return fail(`Initramfs not found for running kernel: ${imagePath}`);
			}
			if (containsStorageModule === null) {
				return warn(`Could not list contents of ${imagePath}`);
			}
			return containsStorageModule
				? pass(`zfs.ko is included in ${imagePath}`)
				: fail(`zfs.ko is NOT included in ${imagePath}`);
		},
	},
	{
		name: "esp-mounted",
		title: "EFI system partition",
		fatalOnFail: true,
		phases: BOTH_PHASES,
		applies: bootMenuSystem,
		evaluate: ({ snapshot, thresholds }) => {
			if (!snapshot.espMounted) {
				return snapshot.espCandidateDevice
					? warn(
							`ESP found but not mounted: ${snapshot.espCandidateDevice} (recommended mount point: ${snapshot.espPath})`,
						)
					: fail("ESP not found - required for ZFSBootMenu");
			}
			const free = snapshot.freeSpaceMb.esp;
			if (free === null) {
				return warn(`ESP mounted at ${snapshot.espPath}; free space unknown`);
			}
			if (free < thresholds.espMinFreeMb) {
				return warn(
					`ESP at ${snapshot.espPath} has ${free}MB free (less than ${thresholds.espMinFreeMb}MB)`,
				);
			}
			return pass(`ESP mounted at ${snapshot.espPath} with ${free}MB free`);
		},
	},
	{
		name: "boot-menu-image",
		title: "ZFSBootMenu EFI image",
		fatalOnFail: false,
		phases: BOTH_PHASES,
		applies: (context) => bootMenuSystem(context) && context.snapshot.espMounted,
		evaluate: ({ snapshot }) => {
			const { present, backupPresent } = snapshot.bootMenuImage;
			if (!present) {
				return fail(
					backupPresent
						? "ZFSBootMenu EFI image missing; backup image exists. Regenerate with: generate-zbm"
						: "ZFSBootMenu EFI image and backup both missing. Regenerate with: generate-zbm",
				);
			}
			return backupPresent
				? pass("ZFSBootMenu EFI image and backup found")
				: warn("ZFSBootMenu EFI image found; no backup image");
		},
	},
	{
		name: "dataset-mounts",
		title: "Dataset mounts",
		fatalOnFail: false,
		phases: BOTH_PHASES,
		applies: poolsExist,
		evaluate: ({ snapshot }) => {
			const mountable = snapshot.datasets.filter(
				(dataset) =>
					dataset.mountpoint !== null &&
					dataset.canMount !== "off" &&
					dataset.canMount !== "noauto",
			);
			const unmounted = mountable.filter((dataset) => !dataset.mounted);
			if (unmounted.length > 0) {
				return fail(
					`Not mounted: ${unmounted.map((d) => `${d.name} (${d.mountpoint})`).join(", ")}`,
				);
			}
			return pass(`All ${mountable.length} mountable dataset(s) are mounted`);
		},
	},
	{
		name: "host-id",
		title: "Host ID",
		fatalOnFail: false,
		phases: BOTH_PHASES,
		applies: always,
		evaluate: ({ snapshot }) => {
			const { command, file, fileSize } = snapshot.hostId;
			if (fileSize === null) {
				return fail("hostid file is missing. Run: zgenhostid -f");
			}
			if (file === null) {
				return fail(`hostid file has incorrect size: ${fileSize} bytes (expected 4)`);
			}
			if (command === UNKNOWN) {
				return warn(`hostid command gave no usable output (file: ${file})`);
			}
			return command === file
				? pass(`Host ID matches: ${command}`)
				: fail(`Host ID mismatch between command (${command}) and file (${file})`);
		},
	},
	{
		name: "encryption-key-permissions",
		title: "Encryption key permissions",
		fatalOnFail: false,
		phases: BOTH_PHASES,
		applies: ({ snapshot }) => snapshot.encryptionKey !== null,
		evaluate: ({ snapshot }) => {
			const key = snapshot.encryptionKey;
			if (!key || key.mode === null) {
				return warn("Could not read encryption key permissions");
			}
			return SECURE_KEY_MODES.includes(key.mode)
				? pass(`${key.path} has secure permissions: ${key.mode}`)
				: fail(`${key.path} has permissive permissions: ${key.mode}. Recommended: chmod 400 ${key.path}`);
		},
	},
	{
		name: "disk-space",
		title: "Disk space",
		fatalOnFail: true,
		phases: BOTH_PHASES,
		applies: always,
		evaluate: ({ snapshot, thresholds }) => {
			const failures: string[] = [];
			const warnings: string[] = [];
			const { root, var: varFree } = snapshot.freeSpaceMb;

			if (root === null) {
				warnings.push("root filesystem free space unknown");
			} else if (root < thresholds.rootMinFreeMb) {
				failures.push(`root filesystem has ${root}MB free (minimum ${thresholds.rootMinFreeMb}MB)`);
			} else if (root < thresholds.rootRecommendedFreeMb) {
				warnings.push(
					`root filesystem has ${root}MB free (${thresholds.rootRecommendedFreeMb}MB recommended)`,
				);
			}

			if (varFree !== null && varFree < thresholds.varRecommendedFreeMb) {
				warnings.push(`/var has ${varFree}MB free (${thresholds.varRecommendedFreeMb}MB recommended)`);
			}

			for (const pool of snapshot.pools) {
				if (pool.capacityPercent === null) {
					warnings.push(`pool '${pool.name}' capacity unknown`);
				} else if (pool.capacityPercent >= thresholds.poolCapacityFailPercent) {
					failures.push(`pool '${pool.name}' is ${pool.capacityPercent}% full`);
				} else if (pool.capacityPercent >= thresholds.poolCapacityWarnPercent) {
					warnings.push(`pool '${pool.name}' is ${pool.capacityPercent}% full`);
				}
			}

			if (failures.length > 0) return fail([...failures, ...warnings].join("; "));
			if (warnings.length > 0) return warn(warnings.join("; "));
			return pass(`Sufficient space (root ${root}MB free)`);
		},
	},
	{
		name: "kernel-module-match",
		title: "Kernel/module match",
		fatalOnFail: false,
		phases: BOTH_PHASES,
		applies: always,
		evaluate: ({ snapshot }) => {
			const { storageModuleKernel, runningKernelVersion } = snapshot;
			if (storageModuleKernel === UNKNOWN || runningKernelVersion === UNKNOWN) {
				return warn("Could not determine which kernel the ZFS module was built for");
			}
			return storageModuleKernel === runningKernelVersion
				? pass(`ZFS module built for running kernel ${runningKernelVersion}`)
				: fail(
						`ZFS module built for ${storageModuleKernel}, running kernel is ${runningKernelVersion}`,
					);
		},
	},
	{
		name: "storage-version-match",
		title: "ZFS module/userland versions",
		fatalOnFail: false,
		phases: POST_ONLY,
		applies: always,
		evaluate: ({ snapshot }) => {
			const { storageModuleVersion: module, storageUserlandVersion: userland } = snapshot;
			if (module === UNKNOWN || userland === UNKNOWN) {
				return warn(`Version unknown - module: ${module}, userland: ${userland}`);
			}
			return module === userland
				? pass(`Module and userland versions match: ${module}`)
				: warn(`Version mismatch - module: ${module}, userland: ${userland}`);
		},
	},
	{
		name: "pools-retained",
		title: "Pools still present",
		fatalOnFail: true,
		phases: POST_ONLY,
		applies: priorExists,
		evaluate: ({ snapshot, prior }) => {
			if (prior?.poolsExist && snapshot.pools.length === 0) {
				return fail("Pools existed before the update but none are visible now");
			}
			return pass(`${snapshot.pools.length} pool(s) visible`);
		},
	},
	{
		name: "boot-method-unchanged",
		title: "Boot method",
		fatalOnFail: false,
		phases: POST_ONLY,
		applies: priorExists,
		evaluate: ({ snapshot, prior }) =>
			prior && prior.bootMethod !== snapshot.bootMethod
				? warn(`Boot method changed from ${prior.bootMethod} to ${snapshot.bootMethod}`)
				: pass(`Boot method unchanged: ${snapshot.bootMethod}`),
	},
	{
		name: "kernel-update-landed",
		title: "Kernel update installed",
		fatalOnFail: false,
		phases: POST_ONLY,
		applies: ({ prior }) => prior !== null && prior.pendingUpdates.kernel > 0,
		evaluate: ({ snapshot, prior }) => {
			if (snapshot.latestInstalledKernelVersion === UNKNOWN) {
				return warn("Could not detect installed kernel images");
			}
			return prior && snapshot.latestInstalledKernelVersion === prior.currentKernel
				? warn(
						`A kernel update was pending but the latest installed kernel is still ${prior.currentKernel}`,
					)
				: pass(`Latest installed kernel: ${snapshot.latestInstalledKernelVersion}`);
		},
	},
	{
		name: "round-trip-capability",
		title: "ZFS create/snapshot/destroy",
		fatalOnFail: true,
		phases: POST_ONLY,
		applies: (context) => poolsExist(context) && context.snapshot.roundTrip !== null,
		evaluate: ({ snapshot }) => {
			const outcome = snapshot.roundTrip;
			if (!outcome) {
				return warn("Round-trip test did not run");
			}
			return outcome.failedStep === null
				? pass(`Basic ZFS operations work on pool '${outcome.pool}'`)
				: fail(`Round-trip test on '${outcome.pool}' failed: ${outcome.detail}`);
		},
	},
	{
		name: "storage-services",
		title: "ZFS runit services",
		fatalOnFail: true,
		phases: POST_ONLY,
		applies: always,
		evaluate: ({ snapshot }) => {
			const { directory, links } = snapshot.storageServices;
			const missing = links.filter((link) => !link.enabled).map((link) => link.name);
			if (missing.length === 0) {
				return pass(`Enabled: ${links.map((link) => link.name).join(", ")}`);
			}
			return fail(
				`Not enabled: ${missing.join(", ")}; system may not boot properly. Enable with: ln -s /etc/sv/<service> ${directory}/`,
			);
		},
	},
	{
		name: "initramfs-storage-config",
		title: "dracut ZFS configuration",
		fatalOnFail: true,
		phases: POST_ONLY,
		applies: ({ snapshot }) => snapshot.initramfs.builderPresent,
		evaluate: ({ snapshot }) => {
			const { path, present, missingSettings, storageModuleDirs } = snapshot.initramfsConfig;
			if (!present) {
				return fail(`dracut ZFS configuration not found: ${path}`);
			}
			if (storageModuleDirs.length === 0) {
				return fail("ZFS dracut module not found");
			}
			if (missingSettings.length > 0) {
				return warn(`${path} is missing: ${missingSettings.join(", ")}`);
			}
			return pass(`${path} is complete; dracut module: ${storageModuleDirs.join(", ")}`);
		},
	},
	{
		name: "esp-fstab-entry",
		title: "ESP fstab entry",
		fatalOnFail: false,
		phases: POST_ONLY,
		applies: bootMenuSystem,
		evaluate: ({ snapshot }) => {
			const { path, present, espEntry } = snapshot.fstab;
			if (!present) {
				return warn(`No fstab found at ${path}`);
			}
			if (!espEntry) {
				return warn(`No ESP mount entry in ${path} for ${snapshot.espPath}`);
			}
			return espEntry.fsType === "vfat"
				? pass(`${espEntry.device} on ${espEntry.mountpoint} (vfat)`)
				: warn(`ESP entry for ${espEntry.mountpoint} has type ${espEntry.fsType} (expected vfat)`);
		},
	},
	{
		name: "rollback-snapshots",
		title: "Rollback snapshots",
		fatalOnFail: false,
		phases: POST_ONLY,
		applies: poolsExist,
		evaluate: ({ snapshot }) => {
			const count = snapshot.snapshotCount;
			if (count === null) {
				return warn("Could not list snapshots");
			}
			return count > 0
				? pass(`${count} snapshot(s) available for rollback`)
				: warn("No snapshots found; consider creating one for system recovery");
		},
	},
];
