/**
 * @summary Tests for markers, binaries manifests and guest session records.
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { loadConfig } from "../config.js";
import { WorkingDirectory, MARKERS, pathExists } from "../working-directory.js";
import {
  readManifest,
  writeManifest,
  manifestPath,
  assertManifestArtifacts,
  type BinaryManifest,
} from "../manifest.js";
import { readSession, writeSession, removeSession, type GuestSession } from "../session.js";
import { ArtifactError } from "../types/errors.js";

let root: string;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "snpctl-state-"));
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe("WorkingDirectory", () => {
  it("maps phases to their configured directories", () => {
    const workdir = new WorkingDirectory(loadConfig({ WORKING_DIR: root }));
    expect(workdir.root).toBe(root);
    expect(workdir.dirFor("setup")).toBe(path.join(root, "setup"));
    expect(workdir.dirFor("launch")).toBe(path.join(root, "launch"));
    expect(workdir.dirFor("attest")).toBe(path.join(root, "attest"));
  });

  it("writes and detects markers, creating the directory on demand", async () => {
    const workdir = new WorkingDirectory(loadConfig({ WORKING_DIR: root }));
    const launch = workdir.dirFor("launch");

    expect(await workdir.hasMarker(launch, MARKERS.GUEST_KERNEL_INSTALLED)).toBe(false);
    await workdir.writeMarker(launch, MARKERS.GUEST_KERNEL_INSTALLED);
    expect(await workdir.hasMarker(launch, MARKERS.GUEST_KERNEL_INSTALLED)).toBe(true);
    expect(await pathExists(path.join(launch, "guest_kernel_already_installed"))).toBe(true);
  });

  it("lists only log files, sorted", async () => {
    const workdir = new WorkingDirectory(loadConfig({ WORKING_DIR: root }));
    await fs.writeFile(path.join(root, "b.log"), "");
    await fs.writeFile(path.join(root, "a.log"), "");
    await fs.writeFile(path.join(root, "binaries.json"), "{}");

    expect(await workdir.logFiles(root)).toEqual([
      path.join(root, "a.log"),
      path.join(root, "b.log"),
    ]);
    expect(await workdir.logFiles(path.join(root, "missing"))).toEqual([]);
  });
});

describe("binaries manifest", () => {
  const manifest: BinaryManifest = {
    qemuBin: "/opt/amdsev/usr/local/bin/qemu-system-x86_64",
    firmwareBin: "/opt/amdsev/usr/local/share/qemu/OVMF.fd",
    kernelBin: "/opt/amdsev/linux/guest/arch/x86/boot/bzImage",
    initrdBin: "/opt/amdsev/initrd.img",
  };

  it("returns undefined before one is written", async () => {
    expect(await readManifest(root)).toBeUndefined();
  });

  it("reads back what was written", async () => {
    await writeManifest(root, manifest);
    expect(await readManifest(root)).toEqual(manifest);
  });

  it("rejects a manifest without the required paths", async () => {
    await fs.writeFile(manifestPath(root), JSON.stringify({ kernelBin: "/k" }));
    await expect(readManifest(root)).rejects.toBeInstanceOf(ArtifactError);
  });

  it("rejects malformed JSON", async () => {
    await fs.writeFile(manifestPath(root), "{ not json");
    await expect(readManifest(root)).rejects.toThrow("Binaries manifest is not valid JSON");
  });

  it("names the first missing artifact", async () => {
    const firmware = path.join(root, "OVMF.fd");
    await fs.writeFile(firmware, "");
    const partial: BinaryManifest = {
      firmwareBin: firmware,
      kernelBin: path.join(root, "bzImage"),
      initrdBin: path.join(root, "initrd.img"),
    };

    await expect(assertManifestArtifacts(partial)).rejects.toMatchObject({
      artifact: "kernel",
      message: `kernel path specified does not exist: ${path.join(root, "bzImage")}`,
    });
  });
});

describe("guest session", () => {
  const session: GuestSession = {
    hostSshPort: 10022,
    sshKeyPath: "/srv/snp/launch/snp-guest-key",
    user: "amd",
    image: "/srv/snp/launch/snp-guest.img",
    pid: 4242,
    cmdlineFile: "/srv/snp/launch/qemu.cmdline",
    boot: {
      firmware: "/srv/snp/launch/OVMF.fd",
      kernel: "/srv/snp/launch/bzImage",
      initrd: "/srv/snp/launch/initrd.img",
      append: "root=LABEL=cloudimg-rootfs ro console=ttyS0",
      vcpus: 4,
      vcpuModel: "EPYC-v4",
    },
    startedAt: "2026-01-01T00:00:00.000Z",
  };

  it("round-trips and is removed on request", async () => {
    await writeSession(root, session);
    expect(await readSession(root)).toEqual(session);

    await removeSession(root);
    expect(await readSession(root)).toBeUndefined();
  });

  it("rejects an incomplete record", async () => {
    await fs.writeFile(path.join(root, "session.json"), JSON.stringify({ hostSshPort: 10022 }));
    await expect(readSession(root)).rejects.toThrow("Guest session record is incomplete");
  });
});
