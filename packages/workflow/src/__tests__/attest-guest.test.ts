/**
 * Tests for the attest-guest state machine.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { beforeEach, describe, it, expect } from "vitest";
import {
  MARKERS,
  MeasurementMismatchError,
  PhaseFailedError,
  VerificationError,
  removeSession,
  writeSession,
} from "@snpctl/core";
import {
  ATTESTATION_TRANSITIONS,
  AttestationRun,
  isTerminalAttestationState,
} from "../phases/attest-guest.js";
import { CPUID, DIGEST, STARTED_AT, createHarness, type Harness } from "./harness.js";

const STATE_STEPS = [
  "await-guest-reachable",
  "install-guest-tooling",
  "request-report",
  "fetch-and-verify-cert-chain",
  "verify-report-signature",
  "compute-expected",
  "extract-actual",
  "compare",
];

let h: Harness;
let snpguestBinary: string;

beforeEach(async () => {
  h = await createHarness();
  const { config } = h;
  const launch = (name: string) => path.join(config.launchDir, name);

  await fs.mkdir(config.launchDir, { recursive: true });
  for (const name of ["OVMF.fd", "vmlinuz-snp", "initrd.img-snp"]) {
    await fs.writeFile(launch(name), name);
  }
  await writeSession(config.launchDir, {
    hostSshPort: config.guest.hostSshPort,
    sshKeyPath: config.guest.sshKeyPath,
    user: config.guest.user,
    image: config.image,
    pid: 4243,
    cmdlineFile: config.qemuCmdlineFile,
    boot: {
      firmware: launch("OVMF.fd"),
      kernel: launch("vmlinuz-snp"),
      initrd: launch("initrd.img-snp"),
      append: config.guest.kernelAppend,
      vcpus: config.guest.smp,
      vcpuModel: config.guest.cpuModel,
    },
    startedAt: STARTED_AT,
  });

  await fs.writeFile(path.join(config.workingDir, MARKERS.DEPENDENCIES_INSTALLED), "");
  snpguestBinary = path.join(config.attestDir, "snpguest", "target", "release", "snpguest");
  await fs.mkdir(path.dirname(snpguestBinary), { recursive: true });
  await fs.writeFile(snpguestBinary, "");

  h.runner.on("cpuid", { stdout: CPUID });
  h.runner.on(/^sev-snp-measure /, { stdout: `${DIGEST}\n` });
});

describe("attestation state machine", () => {
  it("should only allow the documented order", () => {
    const run = new AttestationRun();
    run.transition("AwaitGuestReachable");

    expect(() => run.transition("Compare")).toThrow(
      "Invalid attestation state transition: AwaitGuestReachable -> Compare"
    );
    expect(run.visited).toEqual(["Start", "AwaitGuestReachable"]);
  });

  it("should end only in Matched or Mismatched", () => {
    expect(ATTESTATION_TRANSITIONS.Compare).toEqual(["Matched", "Mismatched"]);
    expect(isTerminalAttestationState("Matched")).toBe(true);
    expect(isTerminalAttestationState("Mismatched")).toBe(true);
    expect(isTerminalAttestationState("Compare")).toBe(false);
  });

  it("should refuse to move past a terminal state", () => {
    const run = new AttestationRun();
    for (const state of [
      "AwaitGuestReachable",
      "InstallGuestTooling",
      "RequestReport",
      "FetchAndVerifyCertChain",
      "VerifyReportSignature",
      "ComputeExpected",
      "ExtractActual",
      "Compare",
      "Matched",
    ] as const) {
      run.transition(state);
    }

    expect(() => run.transition("Mismatched")).toThrow("Attestation already ended in Matched");
  });
});

describe("attest-guest", () => {
  it("should attest a guest whose measurement matches", async () => {
    const result = await h.engine.runPhase("attest-guest");

    expect(result.skipped).toEqual([
      "rust-toolchain",
      "measure-tool",
      "host-dependencies",
      "build-snpguest",
    ]);
    expect(result.executed).toEqual(STATE_STEPS);
    expect(h.reporter.messages("success")).toEqual([
      "[attest-guest] The expected measurement matches the snp guest report measurement!",
    ]);
    expect(h.reporter.messages("info")).toEqual(
      expect.arrayContaining([
        `[attest-guest] Expected Measurement (sev-snp-measure):  ${DIGEST.toUpperCase()}`,
        `[attest-guest] Measurement from SNP Attestation Report: ${DIGEST.toUpperCase()}`,
      ])
    );
  });

  it("should drive snpguest in the guest in order", async () => {
    await h.engine.runPhase("attest-guest");

    expect(h.guest.copies).toEqual([[snpguestBinary, ".", "to-guest"]]);
    expect(h.guest.commands).toEqual([
      "true",
      "sudo insmod /lib/modules/*/kernel/drivers/virt/coco/sev-guest/sev-guest.ko >/dev/null 2>&1 || true",
      "sudo ./snpguest report attestation-report.bin request-data.txt --random",
      "./snpguest display report attestation-report.bin",
      "./snpguest fetch ca pem genoa . --endorser vcek",
      "./snpguest fetch vcek pem genoa . attestation-report.bin",
      "./snpguest verify certs .",
      "./snpguest verify attestation . attestation-report.bin",
    ]);
  });

  it("should measure the boot inputs recorded at launch", async () => {
    await h.engine.runPhase("attest-guest");
    const measure = h.runner.calls.find((spec) => spec.command === "sev-snp-measure");

    expect(measure?.args).toEqual([
      "--mode=snp",
      "--vcpus=4",
      "--vcpu-type=EPYC-v4",
      "--output-format=hex",
      `--ovmf=${path.join(h.config.launchDir, "OVMF.fd")}`,
      `--kernel=${path.join(h.config.launchDir, "vmlinuz-snp")}`,
      `--initrd=${path.join(h.config.launchDir, "initrd.img-snp")}`,
      `--append=${h.config.guest.kernelAppend}`,
    ]);
  });

  it("should fail with exit status 7 when measurements differ", async () => {
    h.runner.on(/^sev-snp-measure /, { stdout: "cd".repeat(48) });

    const failure = await h.engine.runPhase("attest-guest").catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(PhaseFailedError);
    expect(failure).toMatchObject({ stepId: "compare", exitCode: 7 });
    const cause = failure instanceof PhaseFailedError ? failure.cause : undefined;
    expect(cause).toBeInstanceOf(MeasurementMismatchError);
    expect(cause?.message).toBe("FAIL: measurements do not match");

    expect(await h.engine.run("attest-guest")).toBe(7);
  });

  it("should treat a rejected certificate chain as a verification failure", async () => {
    h.guest.responses.set("verify certs", { exitCode: 1, stderr: "VCEK signature invalid" });

    const failure = await h.engine.runPhase("attest-guest").catch((err: unknown) => err);

    expect(failure).toMatchObject({ stepId: "fetch-and-verify-cert-chain", exitCode: 7 });
    const cause = failure instanceof PhaseFailedError ? failure.cause : undefined;
    expect(cause).toBeInstanceOf(VerificationError);
  });

  it("should give up on an unreachable guest with exit status 5", async () => {
    h.guest.reachable = false;

    const failure = await h.engine.runPhase("attest-guest").catch((err: unknown) => err);

    expect(failure).toMatchObject({ stepId: "await-guest-reachable", exitCode: 5 });
    expect(h.guest.commands).toHaveLength(30);
    const waits = h.reporter.messages("debug").filter((line) => line.includes("not reachable"));
    expect(waits).toHaveLength(30);
    expect(waits[0]).toBe("[attest-guest] Guest not reachable (attempt 1)");
  });

  it("should require a launched guest", async () => {
    await removeSession(h.config.launchDir);

    expect(await h.engine.run("attest-guest")).toBe(3);
    expect(h.reporter.messages("info")).toContain("Run 'launch-guest' before 'attest-guest'");
  });

  it("should build missing tooling before attesting", async () => {
    await fs.rm(snpguestBinary);
    h.runner.on("command -v rustc", { exitCode: 1 }, 1);

    const result = await h.engine.runPhase("attest-guest");

    expect(result.executed.slice(0, 2)).toEqual(["rust-toolchain", "build-snpguest"]);
    expect(h.runner.linesMatching("git checkout")).toEqual(["git checkout tags/v0.7.1"]);
    const build = h.runner.calls.find((spec) => spec.args.join(" ").includes("cargo build -r"));
    expect(build?.cwd).toBe(path.join(h.config.attestDir, "snpguest"));
  });
});
