/**
 * @summary Record of a launched guest (`launch/session.json`).
 *
 * Written by launch-guest once QEMU is running. Attest-guest reads it to
 * reach the guest and to recompute the expected measurement from the exact
 * inputs that were booted; stop-guests reads the pid and removes the file.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { ArtifactError } from "./types/errors.js";
import { isRecord } from "./utils/guards.js";
import { pathExists } from "./working-directory.js";

export const SESSION_FILE = "session.json";

/**
 * Inputs that determine the launch measurement.
 */
export interface BootInputs {
  firmware: string;
  kernel: string;
  initrd: string;
  append: string;
  vcpus: number;
  vcpuModel: string;
}

export interface GuestSession {
  hostSshPort: number;
  sshKeyPath: string;
  user: string;
  image: string;
  /** QEMU pid from -pidfile, when it could be read */
  pid?: number;
  cmdlineFile: string;
  boot: BootInputs;
  /** ISO-8601 */
  startedAt: string;
}

export function sessionPath(launchDir: string): string {
  return path.join(launchDir, SESSION_FILE);
}

function isBootInputs(value: unknown): value is BootInputs {
  return (
    isRecord(value) &&
    typeof value.firmware === "string" &&
    typeof value.kernel === "string" &&
    typeof value.initrd === "string" &&
    typeof value.append === "string" &&
    typeof value.vcpus === "number" &&
    typeof value.vcpuModel === "string"
  );
}

export function isGuestSession(value: unknown): value is GuestSession {
  return (
    isRecord(value) &&
    typeof value.hostSshPort === "number" &&
    typeof value.sshKeyPath === "string" &&
    typeof value.user === "string" &&
    typeof value.image === "string" &&
    (value.pid === undefined || typeof value.pid === "number") &&
    typeof value.cmdlineFile === "string" &&
    isBootInputs(value.boot) &&
    typeof value.startedAt === "string"
  );
}

export async function readSession(launchDir: string): Promise<GuestSession | undefined> {
  const file = sessionPath(launchDir);
  if (!(await pathExists(file))) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(file, "utf-8"));
  } catch {
    throw new ArtifactError("session", file, `Guest session record is not valid JSON: ${file}`);
  }
  if (!isGuestSession(parsed)) {
    throw new ArtifactError("session", file, `Guest session record is incomplete: ${file}`);
  }
  return parsed;
}

export async function writeSession(launchDir: string, session: GuestSession): Promise<void> {
  await fs.mkdir(launchDir, { recursive: true });
  await fs.writeFile(sessionPath(launchDir), `${JSON.stringify(session, null, 2)}\n`, "utf-8");
}

export async function removeSession(launchDir: string): Promise<void> {
  await fs.rm(sessionPath(launchDir), { force: true });
}
