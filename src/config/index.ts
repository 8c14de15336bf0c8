/**
 * zfs-update-verify Configuration
 *
 * Paths, thresholds and switches for the pre/post update verification phases
 */

import { z } from "zod";
import * as dotenv from "dotenv";

dotenv.config();

const VerifyConfigSchema = z
	.object({
		// Logging
		logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
		logDir: z.string().min(1).default("/var/log"),

		// Handoff artifact written by the pre-update phase
		artifactPath: z.string().min(1).default("/etc/zfs-update.conf"),

		// Upper bound for every external command
		commandTimeoutMs: z.number().int().positive().default(30000),

		// Probe locations
		bootDir: z.string().min(1).default("/boot"),
		espCandidates: z.array(z.string().min(1)).min(1),
		hostIdPath: z.string().min(1).default("/etc/hostid"),
		encryptionKeyPath: z.string().min(1).default("/etc/zfs/zroot.key"),
		serviceDir: z.string().min(1).default("/etc/runit/runsvdir/default"),
		dracutConfigPath: z.string().min(1).default("/etc/dracut.conf.d/zfs.conf"),
		dracutModuleDirs: z.array(z.string().min(1)).min(1),
		fstabPath: z.string().min(1).default("/etc/fstab"),

		// Disk space thresholds
		rootMinFreeMb: z.number().int().nonnegative().default(1024),
		rootRecommendedFreeMb: z.number().int().nonnegative().default(2048),
		varRecommendedFreeMb: z.number().int().nonnegative().default(2048),
		espMinFreeMb: z.number().int().nonnegative().default(100),
		poolCapacityWarnPercent: z.number().int().min(0).max(100).default(80),
		poolCapacityFailPercent: z.number().int().min(0).max(100).default(90),

		// Behaviour switches
		syncRepositories: z.boolean().default(true),
		roundTripTest: z.boolean().default(true),
		requireRoot: z.boolean().default(true),
	})
	.refine((c) => c.rootMinFreeMb <= c.rootRecommendedFreeMb, {
		message: "ROOT_MIN_FREE_MB must not exceed ROOT_RECOMMENDED_FREE_MB",
		path: ["rootMinFreeMb"],
	})
	.refine((c) => c.poolCapacityWarnPercent <= c.poolCapacityFailPercent, {
		message: "POOL_CAPACITY_WARN_PERCENT must not exceed POOL_CAPACITY_FAIL_PERCENT",
		path: ["poolCapacityWarnPercent"],
	});

export type VerifyConfig = z.infer<typeof VerifyConfigSchema>;

function parseInteger(value: string | undefined, fallback: number): number {
	return Number.parseInt(value || String(fallback), 10);
}

function parseList(value: string | undefined, fallback: string): string[] {
	return (value || fallback)
		.split(",")
		.map((item) => item.trim())
		.filter(Boolean);
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
	if (value === undefined || value.trim() === "") return fallback;
	return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): VerifyConfig {
	const rawConfig = {
		logLevel: env.LOG_LEVEL || "info",
		logDir: env.LOG_DIR || "/var/log",
		artifactPath: env.ARTIFACT_PATH || "/etc/zfs-update.conf",
		commandTimeoutMs: parseInteger(env.COMMAND_TIMEOUT_MS, 30000),
		bootDir: env.BOOT_DIR || "/boot",
		espCandidates: parseList(env.ESP_CANDIDATES, "/boot/efi,/boot,/efi"),
		hostIdPath: env.HOSTID_PATH || "/etc/hostid",
		encryptionKeyPath: env.ENCRYPTION_KEY_PATH || "/etc/zfs/zroot.key",
		serviceDir: env.SERVICE_DIR || "/etc/runit/runsvdir/default",
		dracutConfigPath: env.DRACUT_CONFIG_PATH || "/etc/dracut.conf.d/zfs.conf",
		dracutModuleDirs: parseList(env.DRACUT_MODULE_DIRS, "/usr/lib/dracut/modules.d,/usr/share/dracut/modules.d"),
		fstabPath: env.FSTAB_PATH || "/etc/fstab",
		rootMinFreeMb: parseInteger(env.ROOT_MIN_FREE_MB, 1024),
		rootRecommendedFreeMb: parseInteger(env.ROOT_RECOMMENDED_FREE_MB, 2048),
		varRecommendedFreeMb: parseInteger(env.VAR_RECOMMENDED_FREE_MB, 2048),
		espMinFreeMb: parseInteger(env.ESP_MIN_FREE_MB, 100),
		poolCapacityWarnPercent: parseInteger(env.POOL_CAPACITY_WARN_PERCENT, 80),
		poolCapacityFailPercent: parseInteger(env.POOL_CAPACITY_FAIL_PERCENT, 90),
		syncRepositories: parseFlag(env.SYNC_REPOSITORIES, true),
		roundTripTest: parseFlag(env.ROUND_TRIP_TEST, true),
		requireRoot: parseFlag(env.REQUIRE_ROOT, true),
	};

	try {
		return VerifyConfigSchema.parse(rawConfig);
	} catch (error) {
		if (error instanceof z.ZodError) {
			console.error("Configuration validation failed:");
			for (const issue of error.issues) {
				console.error(`  - ${issue.path.join(".")}: ${issue.message}`);
			}
		}
		throw error;
	}
}

export const config = loadConfig();
