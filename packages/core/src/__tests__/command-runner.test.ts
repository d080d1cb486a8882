/**
 * @summary Tests for command formatting, runOrThrow and the logging runner.
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  LoggingCommandRunner,
  formatCommand,
  quoteArg,
  runOrThrow,
  shell,
  type CommandResult,
  type CommandRunner,
  type CommandSpec,
} from "../command-runner.js";
import { RemoteCommandError } from "../types/errors.js";
import { RecordingReporter } from "../reporter.js";

class FakeRunner implements CommandRunner {
  readonly calls: CommandSpec[] = [];
  constructor(private readonly result: CommandResult | Error) {}

  async run(spec: CommandSpec): Promise<CommandResult> {
    this.calls.push(spec);
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}

describe("quoteArg", () => {
  it("leaves plain arguments alone", () => {
    expect(quoteArg("--enable-kvm")).toBe("--enable-kvm");
    expect(quoteArg("/tmp/a.img")).toBe("/tmp/a.img");
  });

  it("single-quotes arguments with spaces or shell characters", () => {
    expect(quoteArg("a b")).toBe("'a b'");
    expect(quoteArg("kvm_sev*")).toBe("'kvm_sev*'");
    expect(quoteArg("")).toBe("''");
  });

  it("escapes embedded single quotes", () => {
    expect(quoteArg("it's")).toBe("'it'\\''s'");
  });
});

describe("formatCommand", () => {
  it("joins the program and its quoted arguments", () => {
    expect(formatCommand({ command: "cpuid", args: ["-1", "-r", "-l", "0x80000001"] })).toBe(
      "cpuid -1 -r -l 0x80000001"
    );
    expect(formatCommand(shell("dmesg | grep SEV"))).toBe("bash -c 'dmesg | grep SEV'");
  });
});

describe("runOrThrow", () => {
  it("returns the result for a zero exit", async () => {
    const runner = new FakeRunner({ stdout: "ok", stderr: "", exitCode: 0 });
    await expect(runOrThrow(runner, { command: "true", args: [] })).resolves.toEqual({
      stdout: "ok",
      stderr: "",
      exitCode: 0,
    });
  });

  it("throws RemoteCommandError with both streams on failure", async () => {
    const runner = new FakeRunner({ stdout: "partial", stderr: "denied", exitCode: 2 });
    const promise = runOrThrow(runner, { command: "getfacl", args: ["/dev/sev"] });

    await expect(promise).rejects.toBeInstanceOf(RemoteCommandError);
    await expect(promise).rejects.toMatchObject({
      command: "getfacl /dev/sev",
      status: 2,
      stdout: "partial",
      stderr: "denied",
    });
  });
});

describe("LoggingCommandRunner", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "snpctl-runner-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("appends the command, its output and exit code", async () => {
    const logFile = path.join(dir, "phase", "launch-guest.log");
    const inner = new FakeRunner({ stdout: "hello", stderr: "warning\n", exitCode: 0 });
    const runner = new LoggingCommandRunner(inner, logFile);

    await runner.run({ command: "echo", args: ["hello"] });
    await runner.run({ command: "echo", args: ["hello"] });

    const log = await fs.readFile(logFile, "utf-8");
    expect(log).toBe(
      "$ echo hello\nhello\nwarning\n[exit 0]\n$ echo hello\nhello\nwarning\n[exit 0]\n"
    );
  });

  it("records runner failures and rethrows them", async () => {
    const logFile = path.join(dir, "setup-host.log");
    const runner = new LoggingCommandRunner(new FakeRunner(new Error("spawn failed")), logFile);

    await expect(runner.run({ command: "make", args: [] })).rejects.toThrow("spawn failed");
    expect(await fs.readFile(logFile, "utf-8")).toBe("$ make\n! spawn failed\n");
  });

  it("echoes commands to the reporter as debug lines", async () => {
    const reporter = new RecordingReporter();
    const runner = new LoggingCommandRunner(
      new FakeRunner({ stdout: "", stderr: "", exitCode: 0 }),
      path.join(dir, "x.log"),
      reporter
    );

    await runner.run({ command: "dmesg", args: [] });
    expect(reporter.messages("debug")).toEqual(["$ dmesg"]);
  });

  it("empties the log when reset", async () => {
    const logFile = path.join(dir, "launch", "launch-guest.log");
    const runner = new LoggingCommandRunner(
      new FakeRunner({ stdout: "old", stderr: "", exitCode: 0 }),
      logFile
    );
    await runner.run({ command: "dmesg", args: [] });

    await runner.reset();
    await runner.run({ command: "uname", args: ["-r"] });

    expect(await fs.readFile(logFile, "utf-8")).toBe("$ uname -r\nold\n[exit 0]\n");
  });
});
