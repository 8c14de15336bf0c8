import { describe, it, expect } from "vitest";
import {
	categorizePackage,
	countListedNames,
	firstEspDevice,
	formatMode,
	hostIdFromBytes,
	isModuleLoaded,
	latestKernelFromBootEntries,
	listingContainsModule,
	missingDracutSettings,
	packageNameFromPkgver,
	parseCapacity,
	parseDatasetList,
	parseDfAvailableMb,
	parseFstab,
	parseHostIdCommand,
	parseModinfo,
	parsePendingUpdates,
	parsePoolList,
	parseUserlandVersion,
} from "../src/features/probe/parsers.js";

describe("module probes", () => {
	it("finds a module only in the first lsmod column", () => {
		const lsmod = [
			"Module                  Size  Used by",
			"zfs                  6258688  12",
			"spl                   126976  1 zfs",
		].join("\n");

		expect(isModuleLoaded(lsmod, "zfs")).toBe(true);
		expect(isModuleLoaded(lsmod, "spl")).toBe(true);
		expect(isModuleLoaded("spl  126976  1 zfs", "zfs")).toBe(false);
		expect(isModuleLoaded("", "zfs")).toBe(false);
	});

	it("extracts version and vermagic from modinfo", () => {
		const modinfo = [
			"filename:       /lib/modules/6.6.20_1/extra/zfs/zfs.ko",
			"version:        2.2.3-1",
			"vermagic:       6.6.20_1 SMP preempt mod_unload",
		].join("\n");

		expect(parseModinfo(modinfo)).toEqual({ version: "2.2.3-1", vermagic: "6.6.20_1" });
		expect(parseModinfo("")).toEqual({ version: "unknown", vermagic: "unknown" });
	});

	it("reads the userland version from the first zfs- line", () => {
		expect(parseUserlandVersion("zfs-2.2.3-1\nzfs-kmod-2.2.3-1\n")).toBe("2.2.3-1");
		expect(parseUserlandVersion("zfs-kmod-2.2.3-1\n")).toBe("unknown");
	});
});

describe("pool and dataset listings", () => {
	it("parses zpool list rows", () => {
		const pools = parsePoolList("zroot\tONLINE\t55%\ntank\tDEGRADED\t91%\n");

		expect(pools).toEqual([
			{ name: "zroot", health: "ONLINE", capacityPercent: 55, accessible: null },
			{ name: "tank", health: "DEGRADED", capacityPercent: 91, accessible: null },
		]);
	});

	it("maps unrecognised health and capacity to sentinels", () => {
		const [pool] = parsePoolList("zroot\tSUSPENDED\t-\n");

		expect(pool?.health).toBe("UNKNOWN");
		expect(pool?.capacityPercent).toBeNull();
	});

	it("rejects capacities outside 0-100", () => {
		expect(parseCapacity("0%")).toBe(0);
		expect(parseCapacity("100%")).toBe(100);
		expect(parseCapacity("101%")).toBeNull();
		expect(parseCapacity("abc")).toBeNull();
		expect(parseCapacity(undefined)).toBeNull();
	});

	it("parses dataset rows and normalises mountpoints", () => {
		const output = [
			"zroot\tno\tnone\ton",
			"zroot/ROOT/void\tyes\t/\tnoauto",
			"zroot/data\tno\tlegacy\t-",
		].join("\n");

		expect(parseDatasetList(output)).toEqual([
			{ name: "zroot", mounted: false, mountpoint: null, canMount: "on" },
			{ name: "zroot/ROOT/void", mounted: true, mountpoint: "/", canMount: "noauto" },
			{ name: "zroot/data", mounted: false, mountpoint: null, canMount: null },
		]);
	});
});

describe("parseDfAvailableMb", () => {
	it("reads the fourth column of the data row", () => {
		const df = [
			"Filesystem     1048576-blocks  Used Available Capacity Mounted on",
			"zroot/ROOT/void        95000 12000     83000      13% /",
		].join("\n");

		expect(parseDfAvailableMb(df)).toBe(83000);
	});

	it("returns null without a data row", () => {
		expect(parseDfAvailableMb("Filesystem 1048576-blocks Used Available Capacity Mounted on")).toBeNull();
		expect(parseDfAvailableMb("")).toBeNull();
	});
});

describe("pending updates", () => {
	it("strips version and revision from pkgver", () => {
		expect(packageNameFromPkgver("zfs-2.2.3_1")).toBe("zfs");
		expect(packageNameFromPkgver("linux6.6-6.6.21_1")).toBe("linux6.6");
		expect(packageNameFromPkgver("linux-headers-6.6_1")).toBe("linux-headers");
		expect(packageNameFromPkgver("noversion")).toBe("noversion");
	});

	it("categorises packages", () => {
		expect(categorizePackage("zfs")).toBe("storage");
		expect(categorizePackage("zfsbootmenu")).toBe("bootmenu");
		expect(categorizePackage("dracut")).toBe("initramfsBuilder");
		expect(categorizePackage("linux")).toBe("kernel");
		expect(categorizePackage("linux6.6")).toBe("kernel");
		expect(categorizePackage("linux-headers")).toBe("kernel");
		expect(categorizePackage("linux-firmware")).toBe("other");
		expect(categorizePackage("firefox")).toBe("other");
	});

	it("counts the update listing per category", () => {
		const listing = [
			"linux6.6-6.6.21_1 update x86_64 https://repo-default.voidlinux.org/current 1 2",
			"zfs-2.2.4_1 update x86_64 https://repo-default.voidlinux.org/current 1 2",
			"firefox-125.0_1 update x86_64 https://repo-default.voidlinux.org/current 1 2",
		].join("\n");

		const pending = parsePendingUpdates(listing);

		expect(pending.packages).toEqual(["linux6.6", "zfs", "firefox"]);
		expect(pending.counts).toEqual({
			storage: 1,
			bootmenu: 0,
			initramfsBuilder: 0,
			kernel: 1,
			other: 1,
			total: 3,
		});
	});

	it("treats an empty listing as nothing pending", () => {
		expect(parsePendingUpdates("").counts.total).toBe(0);
	});
});

describe("boot facts", () => {
	it("picks the highest kernel by numeric order", () => {
		const entries = ["vmlinuz-6.6.9_1", "vmlinuz-6.6.20_1", "initramfs-6.6.20_1.img", "config-6.6.9_1"];
		expect(latestKernelFromBootEntries(entries)).toBe("6.6.20_1");
		expect(latestKernelFromBootEntries(["grub"])).toBe("unknown");
	});

	it("returns the first SATA or NVMe vfat device", () => {
		expect(firstEspDevice("/dev/mmcblk0p1\n/dev/nvme0n1p1\n/dev/sda1\n")).toBe("/dev/nvme0n1p1");
		expect(firstEspDevice("/dev/mmcblk0p1\n")).toBeNull();
	});

	it("checks an initramfs listing for the module", () => {
		const listing = "usr/lib/modules/6.6.20_1/extra/zfs/zfs.ko.xz\nusr/bin/zpool\n";
		expect(listingContainsModule(listing, "zfs.ko")).toBe(true);
		expect(listingContainsModule("usr/bin/sh\n", "zfs.ko")).toBe(false);
		expect(listingContainsModule("", "zfs.ko")).toBeNull();
	});
});

describe("host id and permissions", () => {
	it("accepts eight hex digits from hostid", () => {
		expect(parseHostIdCommand("00BAB10C\n")).toBe("00bab10c");
		expect(parseHostIdCommand("bab10c")).toBe("unknown");
	});

	it("renders the id file as little-endian hex", () => {
		expect(hostIdFromBytes(Buffer.from([0x0c, 0xb1, 0xba, 0x00]))).toBe("00bab10c");
		expect(hostIdFromBytes(Buffer.from([1, 2, 3]))).toBeNull();
	});

	it("formats permission bits as octal", () => {
		expect(formatMode(0o100400)).toBe("400");
		expect(formatMode(0o100644)).toBe("644");
		expect(formatMode(0o100000)).toBe("000");
	});
});

describe("parseFstab", () => {
	it("skips comments and short lines", () => {
		const content = [
			"# /etc/fstab",
			"UUID=ABCD-1234  /boot/efi  vfat  defaults  0 2",
			"tmpfs /tmp",
			"",
			"tmpfs\t/tmp\ttmpfs\tdefaults,nosuid\t0 0",
		].join("\n");

		expect(parseFstab(content)).toEqual([
			{ device: "UUID=ABCD-1234", mountpoint: "/boot/efi", fsType: "vfat" },
			{ device: "tmpfs", mountpoint: "/tmp", fsType: "tmpfs" },
		]);
	});
});

describe("missingDracutSettings", () => {
	const files = { hostIdPath: "/etc/hostid", keyPath: "/etc/zfs/zroot.key" };

	it("accepts a complete configuration with shared install_items", () => {
		const content = [
			'hostonly="yes"',
			'add_dracutmodules+=" zfs "',
			'omit_dracutmodules+=" btrfs resume "',
			'install_items+=" /etc/hostid /etc/zfs/zroot.key "',
			'force_drivers+=" zfs "',
		].join("\n");

		expect(missingDracutSettings(content, files)).toEqual([]);
	});

	it("lists what is absent or commented out", () => {
		const content = ['hostonly="no"', '# force_drivers+=" zfs "', 'install_items+=" /etc/hostid "'].join("\n");

		expect(missingDracutSettings(content, files)).toEqual([
			'hostonly="yes"',
			'add_dracutmodules+=" zfs "',
			'omit_dracutmodules+=" btrfs "',
			'force_drivers+=" zfs "',
			'install_items+=" /etc/zfs/zroot.key "',
		]);
	});

	it("does not ask for a key file when there is none", () => {
		expect(missingDracutSettings('install_items+=" /etc/hostid "', { ...files, keyPath: null })).not.toContain(
			'install_items+=" /etc/zfs/zroot.key "',
		);
	});
});

describe("countListedNames", () => {
	it("counts non-empty lines", () => {
		expect(countListedNames("zroot@a\nzroot@b\n\n")).toBe(2);
		expect(countListedNames("")).toBe(0);
	});
});
