import fs from "fs";
import os from "os";
import path from "path";
import type { Artifact } from "../src/features/artifact/ArtifactStore.js";
import type { CheckContext, CheckThresholds, Phase } from "../src/features/checks/types.js";
import type { ProbeOptions } from "../src/features/probe/SystemProbe.js";
import { emptyPendingCounts, type SystemSnapshot } from "../src/features/probe/types.js";
import type { CommandExecutor, ShellResult } from "../src/utility/Shell.js";

export const DEFAULT_THRESHOLDS: CheckThresholds = {
	rootMinFreeMb: 1024,
	rootRecommendedFreeMb: 2048,
	varRecommendedFreeMb: 2048,
	espMinFreeMb: 100,
	poolCapacityWarnPercent: 80,
	poolCapacityFailPercent: 90,
};

/**
 * A healthy ZFSBootMenu host with one ONLINE pool
 */
export function healthySnapshot(overrides: Partial<SystemSnapshot> = {}): SystemSnapshot {
	return {
		hostname: "testhost",
		runningKernelVersion: "6.6.20_1",
		latestInstalledKernelVersion: "6.6.20_1",
		storageModuleLoaded: true,
		storageModuleVersion: "2.2.3-1",
		storageModuleKernel: "6.6.20_1",
		storageUserlandVersion: "2.2.3-1",
		userlandTools: { zfs: true, zpool: true },
		pools: [{ name: "zroot", health: "ONLINE", capacityPercent: 40, accessible: true }],
		datasets: [
			{ name: "zroot", mounted: false, mountpoint: null, canMount: "off" },
			{ name: "zroot/ROOT/void", mounted: true, mountpoint: "/", canMount: "noauto" },
			{ name: "zroot/home", mounted: true, mountpoint: "/home", canMount: "on" },
		],
		bootMethod: "BOOT_MENU",
		espMounted: true,
		espPath: "/boot/efi",
		espCandidateDevice: null,
		bootMenuImage: { present: true, backupPresent: true },
		initramfs: {
			builderPresent: true,
			imagePath: "/boot/initramfs-6.6.20_1.img",
			imagePresent: true,
			containsStorageModule: true,
		},
		initramfsConfig: {
			path: "/etc/dracut.conf.d/zfs.conf",
			present: true,
			missingSettings: [],
			storageModuleDirs: ["90zfs"],
		},
		storageServices: {
			directory: "/etc/runit/runsvdir/default",
			links: [
				{ name: "zfs-import", enabled: true },
				{ name: "zfs-mount", enabled: true },
				{ name: "zfs-zed", enabled: true },
			],
		},
		fstab: {
			path: "/etc/fstab",
			present: true,
			espEntry: { device: "UUID=ABCD-1234", mountpoint: "/boot/efi", fsType: "vfat" },
		},
		snapshotCount: 12,
		hostId: { command: "00bab10c", file: "00bab10c", fileSize: 4 },
		encryptionKey: { path: "/etc/zfs/zroot.key", mode: "400" },
		freeSpaceMb: { root: 50000, var: 50000, esp: 400 },
		pendingUpdateCounts: emptyPendingCounts(),
		pendingPackages: [],
		roundTrip: null,
		capturedAt: new Date(2024, 2, 1, 12, 0, 0),
		...overrides,
	};
}

export function makeArtifact(overrides: Partial<Artifact> = {}): Artifact {
	return {
		bootMethod: "BOOT_MENU",
		poolsExist: true,
		espMounted: true,
		espPath: "/boot/efi",
		pendingUpdates: emptyPendingCounts(),
		packagesToUpdate: [],
		currentKernel: "6.6.20_1",
		latestKernel: "6.6.20_1",
		storageModuleVersion: "2.2.3-1",
		storageUserlandVersion: "2.2.3-1",
		hostname: "testhost",
		createdAt: "2024-03-01 12:00:00",
		precheckLog: "",
		...overrides,
	};
}

export function makeContext(
	snapshot: SystemSnapshot,
	phase: Phase = "pre",
	prior: Artifact | null = null,
): CheckContext {
	return { snapshot, prior, phase, thresholds: DEFAULT_THRESHOLDS };
}

export type FakeResponse = string | Partial<Omit<ShellResult, "command">>;

/**
 * In-process stand-in for Shell.execute. A string response is stdout with
 * exit 0; commands with no response exit 127 like an unknown program.
 */
export function fakeExecutor(responses: Record<string, FakeResponse>): {
	exec: CommandExecutor;
	calls: string[];
} {
	const calls: string[] = [];
	const exec: CommandExecutor = async (command) => {
		calls.push(command);
		const response = responses[command];
		if (response === undefined) {
			return { exitCode: 127, stdout: "", stderr: `${command}: not found`, timedOut: false, command };
		}
		if (typeof response === "string") {
			return { exitCode: 0, stdout: response, stderr: "", timedOut: false, command };
		}
		return { exitCode: 0, stdout: "", stderr: "", timedOut: false, ...response, command };
	};
	return { exec, calls };
}

export const FAKE_KERNEL = "6.6.20_1";

const DF_HEADER = "Filesystem 1048576-blocks Used Available Capacity Mounted on";

export interface FakeSystem {
	dir: string;
	bootDir: string;
	espDir: string;
	hostIdPath: string;
	keyPath: string;
	artifactPath: string;
	/** Probe options pointing into the temp directory */
	probeOptions: ProbeOptions;
	/** The same locations as configuration variables */
	env: Record<string, string>;
	/** Command responses of a healthy traditional-boot host with no pools */
	responses: Record<string, FakeResponse>;
	cleanup: () => void;
}

/**
 * Temp directory laid out like the boot-relevant parts of a host
 */
export function createFakeSystem(): FakeSystem {
	const dir = fs.mkdtempSync(path.join(os.tmpdir(), "fake-system-"));
	const bootDir = path.join(dir, "boot");
	const espDir = path.join(dir, "efi");
	const hostIdPath = path.join(dir, "hostid");
	const keyPath = path.join(dir, "zroot.key");
	const serviceDir = path.join(dir, "runsvdir");
	const dracutConfigPath = path.join(dir, "dracut.conf.d", "zfs.conf");
	const dracutModuleDir = path.join(dir, "modules.d");
	const fstabPath = path.join(dir, "fstab");
	const image = path.join(bootDir, `initramfs-${FAKE_KERNEL}.img`);

	fs.mkdirSync(bootDir);
	fs.mkdirSync(espDir);
	fs.writeFileSync(path.join(bootDir, `vmlinuz-${FAKE_KERNEL}`), "");
	fs.writeFileSync(image, "");
	fs.writeFileSync(hostIdPath, Buffer.from([0x0c, 0xb1, 0xba, 0x00]));

	fs.mkdirSync(serviceDir);
	for (const service of ["zfs-import", "zfs-mount", "zfs-zed"]) {
		fs.symlinkSync(`/etc/sv/${service}`, path.join(serviceDir, service));
	}
	fs.mkdirSync(path.dirname(dracutConfigPath));
	fs.writeFileSync(
		dracutConfigPath,
		[
			'hostonly="yes"',
			'add_dracutmodules+=" zfs "',
			'omit_dracutmodules+=" btrfs resume "',
			`install_items+=" ${hostIdPath} "`,
			'force_drivers+=" zfs "',
			"",
		].join("\n"),
	);
	fs.mkdirSync(path.join(dracutModuleDir, "90zfs"), { recursive: true });
	fs.writeFileSync(fstabPath, `UUID=ABCD-1234 ${espDir} vfat defaults 0 2\n`);

	const artifactPath = path.join(dir, "etc", "zfs-update.conf");

	return {
		dir,
		bootDir,
		espDir,
		hostIdPath,
		keyPath,
		artifactPath,
		probeOptions: {
			bootDir,
			espCandidates: [espDir],
			hostIdPath,
			encryptionKeyPath: keyPath,
			serviceDir,
			dracutConfigPath,
			dracutModuleDirs: [dracutModuleDir],
			fstabPath,
			commandTimeoutMs: 1000,
			syncRepositories: false,
		},
		env: {
			ARTIFACT_PATH: artifactPath,
			BOOT_DIR: bootDir,
			ESP_CANDIDATES: espDir,
			HOSTID_PATH: hostIdPath,
			ENCRYPTION_KEY_PATH: keyPath,
			SERVICE_DIR: serviceDir,
			DRACUT_CONFIG_PATH: dracutConfigPath,
			DRACUT_MODULE_DIRS: dracutModuleDir,
			FSTAB_PATH: fstabPath,
		},
		responses: {
			hostname: "testhost\n",
			"uname -r": `${FAKE_KERNEL}\n`,
			lsmod: "Module  Size  Used by\nzfs  6258688  0\n",
			"modinfo zfs": `version:        2.2.3-1\nvermagic:       ${FAKE_KERNEL} SMP preempt mod_unload\n`,
			"command -v zfs": "/usr/bin/zfs\n",
			"command -v zpool": "/usr/bin/zpool\n",
			"zfs version": "zfs-2.2.3-1\nzfs-kmod-2.2.3-1\n",
			"zpool list -H -o name,health,capacity": "",
			"command -v dracut": "/usr/bin/dracut\n",
			"command -v lsinitrd": "/usr/bin/lsinitrd\n",
			[`lsinitrd ${image}`]: `usr/lib/modules/${FAKE_KERNEL}/extra/zfs/zfs.ko.xz\n`,
			hostid: "00bab10c\n",
			"df -Pm /": `${DF_HEADER}\nzroot/ROOT/void 95000 12000 83000 13% /\n`,
			"df -Pm /var": `${DF_HEADER}\nzroot/ROOT/void 95000 12000 83000 13% /\n`,
			"command -v xbps-install": "/usr/bin/xbps-install\n",
			"command -v xbps-query": "/usr/bin/xbps-query\n",
			"xbps-install -un": "",
		},
		cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
	};
}
