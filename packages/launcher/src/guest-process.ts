/**
 * @summary Start, locate and stop guest QEMU processes.
 *
 * QEMU daemonizes and writes its pid to a pidfile. A recorded pid only
 * counts while its process table entry is still a QEMU started from the
 * working directory on the image: pids are reused after a reboot. Guests
 * are otherwise found by that same command line pattern.
 */

import fs from "node:fs/promises";
import {
  ResidualProcessError,
  RetryPoller,
  pathExists,
  runOrThrow,
  type CommandRunner,
  type Reporter,
} from "@snpctl/core";
import type { BootParameterSet } from "./boot-parameters.js";
import type { ProcessEntry, ProcessTable } from "./process-table.js";

// ---------------------------------------------------------------------------
// Matching
// ---------------------------------------------------------------------------

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Pattern for guest QEMU processes started from `workingDir` on `image`.
 */
export function guestProcessPattern(workingDir: string, image: string): RegExp {
  return new RegExp(`${escapeRegExp(workingDir)}.*qemu.*${escapeRegExp(image)}`);
}

const IGNORED_PROCESSES = [/tail.*qemu\.log/, /grep.*qemu/];

export function isGuestProcess(entry: ProcessEntry, pattern: RegExp): boolean {
  return (
    pattern.test(entry.command) &&
    !IGNORED_PROCESSES.some((ignored) => ignored.test(entry.command))
  );
}

export function describeProcess(entry: ProcessEntry): string {
  return `${entry.pid} ${entry.command}`;
}

// ---------------------------------------------------------------------------
// Control
// ---------------------------------------------------------------------------

export interface GuestProcessControlOptions {
  runner: CommandRunner;
  processes: ProcessTable;
  poller: RetryPoller;
  reporter: Reporter;
}

export interface GuestLocator {
  workingDir: string;
  image: string;
  /** Pid recorded at launch, when known */
  pid?: number | undefined;
}

export type StopResult =
  | { status: "none-running" }
  | { status: "stopped"; killed: number[] };

export class GuestProcessControl {
  private readonly runner: CommandRunner;
  private readonly processes: ProcessTable;
  private readonly poller: RetryPoller;
  private readonly reporter: Reporter;

  constructor(options: GuestProcessControlOptions) {
    this.runner = options.runner;
    this.processes = options.processes;
    this.poller = options.poller;
    this.reporter = options.reporter;
  }

  /**
   * Run the command file and return the daemonized QEMU pid, if QEMU
   * wrote one.
   */
  async launch(set: BootParameterSet, pidFile: string): Promise<number | undefined> {
    await fs.rm(pidFile, { force: true });
    await runOrThrow(this.runner, { command: set.commandFile, args: [] });
    return this.readPid(pidFile);
  }

  async readPid(pidFile: string): Promise<number | undefined> {
    if (!(await pathExists(pidFile))) {
      return undefined;
    }
    const text = (await fs.readFile(pidFile, "utf-8")).trim();
    return /^\d+$/.test(text) ? parseInt(text, 10) : undefined;
  }

  /**
   * Guest processes currently in the process table.
   */
  async find(locator: GuestLocator): Promise<ProcessEntry[]> {
    const pattern = guestProcessPattern(locator.workingDir, locator.image);
    const entries = await this.processes.list();
    return entries.filter((entry) => isGuestProcess(entry, pattern));
  }

  /**
   * The process for the recorded pid, when that pid is still the guest.
   */
  async recordedGuest(locator: GuestLocator): Promise<ProcessEntry | undefined> {
    if (locator.pid === undefined) {
      return undefined;
    }
    const matches = await this.find(locator);
    return matches.find((entry) => entry.pid === locator.pid);
  }

  async isGuestRunning(locator: GuestLocator): Promise<boolean> {
    return (await this.find(locator)).length > 0;
  }

  /**
   * Wait for a guest that was asked to shut down to exit.
   */
  async waitForExit(locator: GuestLocator, maxAttempts = 30): Promise<void> {
    await this.poller.retryUntil(
      "guest to shut down",
      async () => !(await this.isGuestRunning(locator)),
      { maxAttempts }
    );
  }

  /**
   * Kill the guest and confirm it is gone.
   *
   * @param confirmAttempts - Process table checks after killing
   */
  async stop(locator: GuestLocator, confirmAttempts = 4): Promise<StopResult> {
    const matches = await this.find(locator);
    if (locator.pid !== undefined && !matches.some((entry) => entry.pid === locator.pid)) {
      this.reporter.debug(`Recorded pid ${locator.pid} is no longer the guest, ignoring it`);
    }

    if (matches.length === 0) {
      this.reporter.info("No qemu processes currently running");
      return { status: "none-running" };
    }

    this.reporter.info("Current running qemu process:");
    for (const entry of matches) {
      this.reporter.info(describeProcess(entry));
    }

    this.reporter.step("Killing qemu process...");
    const killed = matches.map((entry) => entry.pid);
    for (const pid of killed) {
      await this.processes.kill(pid);
    }

    this.reporter.step("Verifying no qemu processes running...");
    const outcome = await this.poller.waitUntil(
      async () => !(await this.isGuestRunning(locator)),
      { maxAttempts: confirmAttempts }
    );
    if (outcome.status === "timeout") {
      const remaining = await this.find(locator);
      throw new ResidualProcessError(remaining.map(describeProcess));
    }

    this.reporter.success("No qemu processes running!");
    return { status: "stopped", killed };
  }
}
