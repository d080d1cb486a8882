/**
 * @summary Tests for the persisted, append-only boot parameter set.
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { BootParameterSet, paramsFileFor } from "../boot-parameters.js";

let dir: string;
let commandFile: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "snpctl-params-"));
  commandFile = path.join(dir, "qemu.cmdline");
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("paramsFileFor", () => {
  it("places the JSON twin beside the command file", () => {
    expect(paramsFileFor("/srv/launch/qemu.cmdline")).toBe("/srv/launch/qemu.params.json");
  });
});

describe("BootParameterSet", () => {
  it("truncates a stale command file on create", async () => {
    await fs.writeFile(commandFile, "stale contents from an earlier launch");

    await BootParameterSet.create(commandFile, "/opt/qemu");

    expect(await fs.readFile(commandFile, "utf-8")).toBe("#!/bin/bash\n/opt/qemu\n");
  });

  it("persists after every append", async () => {
    const set = await BootParameterSet.create(commandFile, "/opt/qemu");

    await set.append("--enable-kvm");
    expect(await fs.readFile(commandFile, "utf-8")).toBe("#!/bin/bash\n/opt/qemu \\\n--enable-kvm\n");

    await set.append("-cpu", "EPYC-v4");
    expect(await fs.readFile(commandFile, "utf-8")).toBe(
      "#!/bin/bash\n/opt/qemu \\\n--enable-kvm \\\n-cpu EPYC-v4\n"
    );
  });

  it("quotes values the shell would split or expand", async () => {
    const set = await BootParameterSet.create(commandFile, "/opt/qemu");
    await set.append("--trace", "kvm_sev*");
    await set.append("-append", "root=LABEL=cloudimg-rootfs ro console=ttyS0");

    expect(set.materialize()).toBe(
      "#!/bin/bash\n/opt/qemu \\\n--trace 'kvm_sev*' \\\n-append 'root=LABEL=cloudimg-rootfs ro console=ttyS0'\n"
    );
  });

  it("makes the command file executable", async () => {
    await BootParameterSet.create(commandFile, "/opt/qemu");
    const stat = await fs.stat(commandFile);
    expect(stat.mode & 0o111).toBe(0o111);
  });

  it("materializes identical inputs identically", async () => {
    const other = path.join(dir, "other.cmdline");
    const a = await BootParameterSet.create(commandFile, "/opt/qemu");
    const b = await BootParameterSet.create(other, "/opt/qemu");
    for (const set of [a, b]) {
      await set.append("-smp", "4");
      await set.append("-m", "2048M");
    }

    expect(a.materialize()).toBe(b.materialize());
    expect(await fs.readFile(commandFile, "utf-8")).toBe(await fs.readFile(other, "utf-8"));
  });

  it("writes a structured twin of the parameters", async () => {
    const set = await BootParameterSet.create(commandFile, "/opt/qemu");
    await set.append("-smp", "4");
    await set.append("-kernel", "/srv/launch/bzImage");

    const twin = JSON.parse(await fs.readFile(path.join(dir, "qemu.params.json"), "utf-8"));
    expect(twin).toEqual({
      bin: "/opt/qemu",
      params: [
        ["-smp", "4"],
        ["-kernel", "/srv/launch/bzImage"],
      ],
    });
    expect(set.toDocument()).toEqual(twin);
  });
});
