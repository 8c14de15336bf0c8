/**
 * SystemProbe - gather a SystemSnapshot from external tools and well-known files
 *
 * Every fact is independent: a missing tool, an empty result or output in an
 * unexpected shape yields a sentinel for that fact only. The probe makes no
 * judgement about what it finds; the check catalogue does.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { Logger } from "../../utility/Logger.js";
import { Shell, type CommandExecutor, type ShellResult } from "../../utility/Shell.js";
import {
	countListedNames,
	firstEspDevice,
	formatMode,
	hostIdFromBytes,
	isModuleLoaded,
	latestKernelFromBootEntries,
	listingContainsModule,
	missingDracutSettings,
	parseDatasetList,
	parseDfAvailableMb,
	parseFstab,
	parseHostIdCommand,
	parseModinfo,
	parsePendingUpdates,
	parsePoolList,
	parseUserlandVersion,
} from "./parsers.js";
import {
	UNKNOWN,
	emptyPendingCounts,
	type BootMethod,
	type PendingUpdates,
	type PoolInfo,
	type SystemSnapshot,
} from "./types.js";

export interface ProbeOptions {
	bootDir: string;
	espCandidates: readonly string[];
	hostIdPath: string;
	encryptionKeyPath: string;
	/** runit directory holding the links of enabled services */
	serviceDir: string;
	dracutConfigPath: string;
	dracutModuleDirs: readonly string[];
	fstabPath: string;
	commandTimeoutMs: number;
	syncRepositories: boolean;
}

export interface CaptureOptions {
	/** Result of an earlier probePendingUpdates(); none pending when omitted */
	pending?: PendingUpdates;
}

const STORAGE_MODULE = "zfs";
const STORAGE_SERVICES = ["zfs-import", "zfs-mount", "zfs-zed"];
const BOOT_MENU_IMAGE = path.join("EFI", "ZBM", "vmlinuz.efi");
const BOOT_MENU_BACKUP_IMAGE = path.join("EFI", "ZBM", "vmlinuz-backup.efi");

export class SystemProbe {
	private logger = Logger.getInstance();
	private readonly exec: CommandExecutor;

	constructor(
		private readonly options: ProbeOptions,
		exec?: CommandExecutor,
	) {
		this.exec = exec ?? ((command, shellOptions) => Shell.execute(command, shellOptions));
	}

	private run(command: string): Promise<ShellResult> {
		return this.exec(command, { timeout: this.options.commandTimeoutMs });
	}

	private async stdoutOf(command: string): Promise<string> {
		const result = await this.run(command);
		if (result.exitCode !== 0) {
			this.logger.debug(`${command} exited with ${result.exitCode}: ${result.stderr.trim()}`);
			return "";
		}
		return result.stdout;
	}

	commandExists(name: string): Promise<boolean> {
		return Shell.commandExists(name, this.exec);
	}

	/**
	 * Query the package manager for pending updates.
	 * Returns null when the repository sync or the query itself fails.
	 */
	async probePendingUpdates(): Promise<PendingUpdates | null> {
		if (this.options.syncRepositories) {
			this.logger.info("Syncing package repositories...");
			const sync = await this.run("xbps-install -S");
			if (sync.exitCode !== 0) {
				this.logger.error(`Repository sync failed: ${sync.stderr.trim()}`);
				return null;
			}
		}

		const query = await this.run("xbps-install -un");
		// A non-zero exit with an empty listing counts as nothing to update
		if (query.exitCode !== 0 && query.stdout.trim() !== "") {
			this.logger.error(`Update query failed: ${query.stderr.trim()}`);
			return null;
		}

		return parsePendingUpdates(query.stdout);
	}

	/**
	 * Capture every fact the check catalogue needs, one command at a time
	 */
	async capture(captureOptions: CaptureOptions = {}): Promise<SystemSnapshot> {
		const pending = captureOptions.pending ?? { counts: emptyPendingCounts(), packages: [] };

		const hostname = (await this.stdoutOf("hostname")).trim() || UNKNOWN;
		const runningKernelVersion = (await this.stdoutOf("uname -r")).trim() || UNKNOWN;
		const latestInstalledKernelVersion = latestKernelFromBootEntries(
			this.listDirectory(this.options.bootDir),
		);

		const storageModuleLoaded = isModuleLoaded(await this.stdoutOf("lsmod"), STORAGE_MODULE);
		const modinfo = parseModinfo(await this.stdoutOf(`modinfo ${STORAGE_MODULE}`));

		const userlandTools = {
			zfs: await this.commandExists("zfs"),
			zpool: await this.commandExists("zpool"),
		};
		const storageUserlandVersion = userlandTools.zfs
			? parseUserlandVersion(await this.stdoutOf("zfs version"))
			: UNKNOWN;

		const pools = userlandTools.zpool ? await this.probePools() : [];
		const datasets =
			pools.length > 0 && userlandTools.zfs
				? parseDatasetList(
						await this.stdoutOf(
							"zfs list -H -o name,mounted,mountpoint,canmount -t filesystem",
						),
					)
				: [];

		const bootMethod: BootMethod = (await this.commandExists("generate-zbm"))
			? "BOOT_MENU"
			: "TRADITIONAL";
		const esp = await this.probeEsp();

		const initramfs = await this.probeInitramfs(runningKernelVersion);
		const hostId = {
			command: parseHostIdCommand(await this.stdoutOf("hostid")),
			...this.readHostIdFile(),
		};
		const encryptionKey = this.readKeyMode();
		const snapshotCount =
			pools.length > 0 && userlandTools.zfs ? await this.countSnapshots() : null;

		const snapshot: SystemSnapshot = {
			hostname,
			runningKernelVersion,
			latestInstalledKernelVersion,
			storageModuleLoaded,
			storageModuleVersion: modinfo.version,
			storageModuleKernel: modinfo.vermagic,
			storageUserlandVersion,
			userlandTools,
			pools,
			datasets,
			bootMethod,
			espMounted: esp.mounted,
			espPath: esp.path,
			espCandidateDevice: esp.candidateDevice,
			bootMenuImage: {
				present: esp.mounted && fs.existsSync(path.join(esp.path, BOOT_MENU_IMAGE)),
				backupPresent:
					esp.mounted && fs.existsSync(path.join(esp.path, BOOT_MENU_BACKUP_IMAGE)),
			},
			initramfs,
			initramfsConfig: this.readInitramfsConfig(encryptionKey?.path ?? null),
			storageServices: {
				directory: this.options.serviceDir,
				links: STORAGE_SERVICES.map((name) => ({
					name,
					enabled: this.isSymlink(path.join(this.options.serviceDir, name)),
				})),
			},
			fstab: this.readFstab(esp.path),
			snapshotCount,
			hostId,
			encryptionKey,
			freeSpaceMb: {
				root: parseDfAvailableMb(await this.stdoutOf("df -Pm /")),
				var: parseDfAvailableMb(await this.stdoutOf("df -Pm /var")),
				esp: esp.mounted
					? parseDfAvailableMb(await this.stdoutOf(`df -Pm ${Shell.quote(esp.path)}`))
					: null,
			},
			pendingUpdateCounts: pending.counts,
			pendingPackages: pending.packages,
			roundTrip: null,
			capturedAt: new Date(),
		};

		this.logger.debug(
			`Snapshot captured: kernel ${runningKernelVersion}, ${pools.length} pool(s), boot ${bootMethod}`,
		);
		return Object.freeze(snapshot);
	}

	/**
	 * List pools, then confirm each one answers `zpool status`
	 */
	async probePools(): Promise<PoolInfo[]> {
		const listed = parsePoolList(
			await this.stdoutOf("zpool list -H -o name,health,capacity"),
		);

		const pools: PoolInfo[] = [];
		for (const pool of listed) {
			const status = await this.run(`zpool status ${Shell.quote(pool.name)}`);
			pools.push({ ...pool, accessible: status.exitCode === 0 });
		}
		return pools;
	}

	private async probeEsp(): Promise<{
		mounted: boolean;
		path: string;
		candidateDevice: string | null;
	}> {
		for (const candidate of this.options.espCandidates) {
			const fsType = await this.stdoutOf(`findmnt -n -o FSTYPE ${Shell.quote(candidate)}`);
			if (fsType.trim() === "vfat") {
				return { mounted: true, path: candidate, candidateDevice: null };
			}
		}

		return {
			mounted: false,
			path: this.options.espCandidates[0] ?? "/boot/efi",
			candidateDevice: firstEspDevice(await this.stdoutOf("blkid -t TYPE=vfat -o device")),
		};
	}

	private async probeInitramfs(kernel: string): Promise<SystemSnapshot["initramfs"]> {
		const imagePath = path.join(this.options.bootDir, `initramfs-${kernel}.img`);
		const builderPresent = await this.commandExists("dracut");
		const imagePresent = kernel !== UNKNOWN && fs.existsSync(imagePath);

		let containsStorageModule: boolean | null = null;
		if (imagePresent && (await this.commandExists("lsinitrd"))) {
			containsStorageModule = listingContainsModule(
				await this.stdoutOf(`lsinitrd ${Shell.quote(imagePath)}`),
				`${STORAGE_MODULE}.ko`,
			);
		}

		return { builderPresent, imagePath, imagePresent, containsStorageModule };
	}

	private async countSnapshots(): Promise<number | null> {
		const result = await this.run("zfs list -H -t snapshot -o name");
		if (result.exitCode !== 0) {
			this.logger.debug(`Snapshot listing exited with ${result.exitCode}: ${result.stderr.trim()}`);
			return null;
		}
		return countListedNames(result.stdout);
	}

	private readInitramfsConfig(keyPath: string | null): SystemSnapshot["initramfsConfig"] {
		const configPath = this.options.dracutConfigPath;
		const storageModuleDirs = this.options.dracutModuleDirs.flatMap((directory) =>
			this.listSubdirectories(directory).filter((name) => name.includes(STORAGE_MODULE)),
		);

		let content: string;
		try {
			content = fs.readFileSync(configPath, "utf8");
		} catch (error) {
			this.logger.debug(`Could not read ${configPath}: ${error}`);
			return { path: configPath, present: false, missingSettings: [], storageModuleDirs };
		}

		return {
			path: configPath,
			present: true,
			missingSettings: missingDracutSettings(content, {
				hostIdPath: this.options.hostIdPath,
				keyPath,
			}),
			storageModuleDirs,
		};
	}

	private readFstab(espPath: string): SystemSnapshot["fstab"] {
		const fstabPath = this.options.fstabPath;
		try {
			const entries = parseFstab(fs.readFileSync(fstabPath, "utf8"));
			return {
				path: fstabPath,
				present: true,
				espEntry: entries.find((entry) => entry.mountpoint === espPath) ?? null,
			};
		} catch (error) {
			this.logger.debug(`Could not read ${fstabPath}: ${error}`);
			return { path: fstabPath, present: false, espEntry: null };
		}
	}

	private isSymlink(linkPath: string): boolean {
		try {
			return fs.lstatSync(linkPath).isSymbolicLink();
		} catch (error) {
			this.logger.debug(`No service link at ${linkPath}: ${error}`);
			return false;
		}
	}

	private listSubdirectories(directory: string): string[] {
		try {
			return fs
				.readdirSync(directory, { withFileTypes: true })
				.filter((entry) => entry.isDirectory())
				.map((entry) => entry.name);
		} catch (error) {
			this.logger.debug(`Could not list ${directory}: ${error}`);
			return [];
		}
	}

	private listDirectory(directory: string): string[] {
		try {
			return fs.readdirSync(directory);
		} catch (error) {
			this.logger.debug(`Could not list ${directory}: ${error}`);
			return [];
		}
	}

	private readHostIdFile(): { file: string | null; fileSize: number | null } {
		try {
			const bytes = fs.readFileSync(this.options.hostIdPath);
			return { file: hostIdFromBytes(bytes), fileSize: bytes.length };
		} catch (error) {
			this.logger.debug(`Could not read ${this.options.hostIdPath}: ${error}`);
			return { file: null, fileSize: null };
		}
	}

	private readKeyMode(): SystemSnapshot["encryptionKey"] {
		const keyPath = this.options.encryptionKeyPath;
		if (!fs.existsSync(keyPath)) {
			return null;
		}
		try {
			return { path: keyPath, mode: formatMode(fs.statSync(keyPath).mode) };
		} catch (error) {
			this.logger.debug(`Could not stat ${keyPath}: ${error}`);
			return { path: keyPath, mode: null };
		}
	}
}
