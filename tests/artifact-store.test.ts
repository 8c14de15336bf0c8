import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { ArtifactStore, parseArtifact, serializeArtifact } from "../src/features/artifact/ArtifactStore.js";
import { emptyPendingCounts } from "../src/features/probe/types.js";
import { healthySnapshot, makeArtifact } from "./fixtures.js";

describe("serializeArtifact", () => {
	it("writes booleans and counts bare and strings quoted", () => {
		const text = serializeArtifact(
			makeArtifact({
				pendingUpdates: { ...emptyPendingCounts(), kernel: 1, other: 2, total: 3 },
				packagesToUpdate: ["linux6.6", "firefox", "vim"],
			}),
		);
		const lines = text.split("\n");

		expect(lines).toContain("ZFSBOOTMENU=true");
		expect(lines).toContain("POOLS_EXIST=true");
		expect(lines).toContain('ESP_MOUNT="/boot/efi"');
		expect(lines).toContain("TOTAL_UPDATES=3");
		expect(lines).toContain("KERNEL_COUNT=1");
		expect(lines).toContain("OTHER_COUNT=2");
		expect(lines).toContain('PACKAGES_TO_UPDATE="linux6.6 firefox vim"');
		expect(lines).toContain('CHECK_DATE="2024-03-01 12:00:00"');
		expect(text.endsWith("\n")).toBe(true);
	});

	it("escapes characters a shell would expand", () => {
		const text = serializeArtifact(makeArtifact({ hostname: 'we"ird$host`x\\' }));

		expect(text.split("\n")).toContain('HOSTNAME="we\\"ird\\$host\\`x\\\\"');
	});
});

describe("parseArtifact", () => {
	it("reads back what was written", () => {
		const artifact = makeArtifact({
			bootMethod: "TRADITIONAL",
			espMounted: false,
			pendingUpdates: { ...emptyPendingCounts(), storage: 1, bootmenu: 1, total: 2 },
			packagesToUpdate: ["zfs", "zfsbootmenu"],
			hostname: 'odd "name" $HOME',
			precheckLog: "/var/log/zfs-pre-20240301-120000.log",
		});

		expect(parseArtifact(serializeArtifact(artifact))).toEqual(artifact);
	});

	it("applies defaults to missing and malformed keys", () => {
		const artifact = parseArtifact(
			[
				"# comment",
				"",
				"ZFSBOOTMENU=maybe",
				"KERNEL_COUNT=two",
				"ZFS_COUNT=-1",
				"DRACUT_COUNT=4",
				"CURRENT_KERNEL=",
				"SOMETHING_ELSE=1",
				"not an assignment",
			].join("\n"),
		);

		expect(artifact).toEqual({
			bootMethod: "TRADITIONAL",
			poolsExist: false,
			espMounted: false,
			espPath: "/boot/efi",
			pendingUpdates: { storage: 0, bootmenu: 0, initramfsBuilder: 4, kernel: 0, other: 0, total: 0 },
			packagesToUpdate: [],
			currentKernel: "unknown",
			latestKernel: "unknown",
			storageModuleVersion: "unknown",
			storageUserlandVersion: "unknown",
			hostname: "unknown",
			createdAt: "unknown",
			precheckLog: "",
		});
	});

	it("accepts single-quoted and exported assignments", () => {
		const artifact = parseArtifact("export CURRENT_KERNEL='6.6.20_1'\nESP_MOUNT=/efi\n");

		expect(artifact.currentKernel).toBe("6.6.20_1");
		expect(artifact.espPath).toBe("/efi");
	});
});

describe("ArtifactStore", () => {
	let tmpDir: string;
	let store: ArtifactStore;
	let artifactPath: string;

	beforeEach(() => {
		tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "artifact-store-test-"));
		artifactPath = path.join(tmpDir, "etc", "zfs-update.conf");
		store = new ArtifactStore(artifactPath);
	});

	afterEach(() => {
		fs.rmSync(tmpDir, { recursive: true, force: true });
	});

	it("read() returns null when nothing was written", async () => {
		expect(await store.read()).toBeNull();
	});

	it("load() reports an unreadable artifact instead of throwing", async () => {
		fs.mkdirSync(artifactPath, { recursive: true });

		await expect(store.read()).rejects.toThrow("EISDIR");
		const loaded = await store.load();

		expect(loaded.artifact).toBeNull();
		expect(loaded.error).toContain("EISDIR");
	});

	it("load() passes a missing artifact through as absent", async () => {
		expect(await store.load()).toEqual({ artifact: null, error: null });
	});

	it("write() stores an owner-only file and leaves no temp file", async () => {
		const artifact = makeArtifact();

		await store.write(artifact);

		expect(fs.statSync(artifactPath).mode & 0o777).toBe(0o600);
		expect(fs.readdirSync(path.dirname(artifactPath))).toEqual(["zfs-update.conf"]);
		expect(await store.read()).toEqual(artifact);
	});

	it("write() replaces an earlier artifact", async () => {
		await store.write(makeArtifact({ hostname: "first" }));
		await store.write(makeArtifact({ hostname: "second" }));

		expect((await store.read())?.hostname).toBe("second");
	});

	it("fromSnapshot() records the pre-update facts", () => {
		const snapshot = healthySnapshot({
			pendingUpdateCounts: { ...emptyPendingCounts(), kernel: 1, total: 1 },
			pendingPackages: ["linux6.6"],
		});

		const artifact = ArtifactStore.fromSnapshot(snapshot, {
			createdAt: new Date(2024, 2, 1, 9, 5, 7),
			logPath: "/var/log/zfs-pre-20240301-090507.log",
		});

		expect(artifact).toEqual({
			bootMethod: "BOOT_MENU",
			poolsExist: true,
			espMounted: true,
			espPath: "/boot/efi",
			pendingUpdates: { storage: 0, bootmenu: 0, initramfsBuilder: 0, kernel: 1, other: 0, total: 1 },
			packagesToUpdate: ["linux6.6"],
			currentKernel: "6.6.20_1",
			latestKernel: "6.6.20_1",
			storageModuleVersion: "2.2.3-1",
			storageUserlandVersion: "2.2.3-1",
			hostname: "testhost",
			createdAt: "2024-03-01 09:05:07",
			precheckLog: "/var/log/zfs-pre-20240301-090507.log",
		});
	});
});
