/**
 * @summary Persisted state layout and completion markers.
 *
 * A marker is an empty file whose presence means a step finished and must
 * not run again. Directories are created on demand and never deleted.
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { SnpctlConfig } from "./config.js";

export type PhaseDirName = "setup" | "launch" | "attest";

/**
 * Named markers written by the workflow.
 */
export const MARKERS = {
  /** Kept in WORKING_DIR, shared by setup, launch and attest */
  DEPENDENCIES_INSTALLED: "dependencies_already_installed",
  /** Kept in the launch directory */
  GUEST_KERNEL_INSTALLED: "guest_kernel_already_installed",
} as const;

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

export class WorkingDirectory {
  constructor(private readonly config: SnpctlConfig) {}

  get root(): string {
    return this.config.workingDir;
  }

  dirFor(phase: PhaseDirName): string {
    switch (phase) {
      case "setup":
        return this.config.setupDir;
      case "launch":
        return this.config.launchDir;
      case "attest":
        return this.config.attestDir;
    }
  }

  async ensure(dir: string): Promise<string> {
    await fs.mkdir(dir, { recursive: true });
    return dir;
  }

  markerPath(dir: string, name: string): string {
    return path.join(dir, name);
  }

  hasMarker(dir: string, name: string): Promise<boolean> {
    return pathExists(this.markerPath(dir, name));
  }

  async writeMarker(dir: string, name: string): Promise<void> {
    await this.ensure(dir);
    await fs.writeFile(this.markerPath(dir, name), "", "utf-8");
  }

  /**
   * Log files directly inside a phase directory, sorted by name.
   */
  async logFiles(dir: string): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(dir);
    } catch {
      return [];
    }
    return entries
      .filter((entry) => entry.endsWith(".log"))
      .sort()
      .map((entry) => path.join(dir, entry));
  }
}
