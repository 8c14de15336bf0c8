/**
 * Observed system facts. Produced by SystemProbe, consumed read-only by the
 * check catalogue, the aggregator and the artifact store.
 */

/** Sentinel for a fact the probe could not extract */
export const UNKNOWN = "unknown";

export const POOL_HEALTH_STATES = [
	"ONLINE",
	"DEGRADED",
	"FAULTED",
	"UNAVAIL",
	"UNKNOWN",
] as const;

export type PoolHealth = (typeof POOL_HEALTH_STATES)[number];

export interface PoolInfo {
	readonly name: string;
	readonly health: PoolHealth;
	/** 0-100, null when zpool did not report a usable value */
	readonly capacityPercent: number | null;
	/** Whether `zpool status <pool>` succeeded; null when not probed */
	readonly accessible: boolean | null;
}

export type CanMount = "on" | "off" | "noauto";

export interface DatasetInfo {
	readonly name: string;
	readonly mounted: boolean;
	/** null for none, legacy and "-" */
	readonly mountpoint: string | null;
	readonly canMount: CanMount | null;
}

export type BootMethod = "TRADITIONAL" | "BOOT_MENU";

export interface ServiceLink {
	readonly name: string;
	/** Whether the service directory holds a link for it */
	readonly enabled: boolean;
}

export interface FstabEntry {
	readonly device: string;
	readonly mountpoint: string;
	readonly fsType: string;
}

export const UPDATE_CATEGORIES = [
	"storage",
	"bootmenu",
	"initramfsBuilder",
	"kernel",
	"other",
] as const;

export type UpdateCategory = (typeof UPDATE_CATEGORIES)[number];

export type PendingUpdateCounts = Readonly<Record<UpdateCategory, number>> & {
	readonly total: number;
};

export interface PendingUpdates {
	readonly counts: PendingUpdateCounts;
	readonly packages: readonly string[];
}

export type RoundTripStep = "create" | "snapshot" | "destroy-snapshot" | "destroy-dataset";

export interface RoundTripOutcome {
	readonly pool: string;
	readonly dataset: string;
	readonly completed: readonly RoundTripStep[];
	/** First step that failed, null when all four succeeded */
	readonly failedStep: RoundTripStep | null;
	readonly detail: string;
}

export interface SystemSnapshot {
	readonly hostname: string;
	readonly runningKernelVersion: string;
	readonly latestInstalledKernelVersion: string;

	readonly storageModuleLoaded: boolean;
	readonly storageModuleVersion: string;
	/** Kernel release the loaded module was built for (modinfo vermagic) */
	readonly storageModuleKernel: string;
	readonly storageUserlandVersion: string;
	readonly userlandTools: { readonly zfs: boolean; readonly zpool: boolean };

	readonly pools: readonly PoolInfo[];
	readonly datasets: readonly DatasetInfo[];

	readonly bootMethod: BootMethod;
	readonly espMounted: boolean;
	readonly espPath: string;
	readonly espCandidateDevice: string | null;
	readonly bootMenuImage: { readonly present: boolean; readonly backupPresent: boolean };

	readonly initramfs: {
		readonly builderPresent: boolean;
		readonly imagePath: string;
		readonly imagePresent: boolean;
		/** null when the image could not be listed */
		readonly containsStorageModule: boolean | null;
	};

	/** ZFS settings of the dracut configuration */
	readonly initramfsConfig: {
		readonly path: string;
		readonly present: boolean;
		readonly missingSettings: readonly string[];
		/** dracut module directories whose name mentions zfs */
		readonly storageModuleDirs: readonly string[];
	};

	/** runit links of the ZFS services */
	readonly storageServices: {
		readonly directory: string;
		readonly links: readonly ServiceLink[];
	};

	readonly fstab: {
		readonly path: string;
		readonly present: boolean;
		/** Entry whose mount point is espPath */
		readonly espEntry: FstabEntry | null;
	};

	/** Number of ZFS snapshots, null when they could not be listed */
	readonly snapshotCount: number | null;

	readonly hostId: {
		readonly command: string;
		/** 8 hex digits read from the id file, null when the file is missing or malformed */
		readonly file: string | null;
		readonly fileSize: number | null;
	};

	/** null when no key file exists */
	readonly encryptionKey: { readonly path: string; readonly mode: string | null } | null;

	readonly freeSpaceMb: {
		readonly root: number | null;
		readonly var: number | null;
		readonly esp: number | null;
	};

	readonly pendingUpdateCounts: PendingUpdateCounts;
	readonly pendingPackages: readonly string[];

	readonly roundTrip: RoundTripOutcome | null;
	readonly capturedAt: Date;
}

export function emptyPendingCounts(): PendingUpdateCounts {
	return { storage: 0, bootmenu: 0, initramfsBuilder: 0, kernel: 0, other: 0, total: 0 };
}
