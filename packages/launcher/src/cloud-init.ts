/**
 * @summary Cloud-init seed image and guest SSH identity.
 *
 * A fresh cloud image has no usable account. The seed disk creates the
 * configured user with passwordless sudo and authorizes the generated key.
 */

import fs from "node:fs/promises";
import path from "node:path";
import {
  pathExists,
  runOrThrow,
  type CommandRunner,
  type GuestConfig,
} from "@snpctl/core";

export interface SeedFiles {
  metadata: string;
  userData: string;
  seedImage: string;
}

export function seedFilesFor(launchDir: string, guestName: string): SeedFiles {
  return {
    metadata: path.join(launchDir, `${guestName}-metadata.yaml`),
    userData: path.join(launchDir, `${guestName}-user-data.yaml`),
    seedImage: path.join(launchDir, `${guestName}-seed.img`),
  };
}

export function renderMetadata(guestName: string): string {
  return [`instance-id: "${guestName}"`, `local-hostname: "${guestName}"`, ""].join("\n");
}

export function renderUserData(guest: GuestConfig, publicKey: string): string {
  return [
    "#cloud-config",
    "chpasswd:",
    "  expire: false",
    "ssh_pwauth: true",
    "users:",
    "  - default",
    `  - name: ${guest.user}`,
    `    plain_text_passwd: ${guest.password}`,
    "    sudo: ALL=(ALL) NOPASSWD:ALL",
    "    shell: /bin/bash",
    "    lock_passwd: false",
    "    ssh_authorized_keys:",
    `      - ${publicKey.trim()}`,
    "",
  ].join("\n");
}

/**
 * Generate an ed25519 key pair unless both halves already exist.
 *
 * @returns true when a new pair was generated
 */
export async function ensureSshKeyPair(runner: CommandRunner, keyPath: string): Promise<boolean> {
  if ((await pathExists(keyPath)) && (await pathExists(`${keyPath}.pub`))) {
    return false;
  }
  await fs.mkdir(path.dirname(keyPath), { recursive: true });
  await runOrThrow(runner, {
    command: "ssh-keygen",
    args: ["-q", "-t", "ed25519", "-N", "", "-f", keyPath],
    // Answer the overwrite prompt when only one half exists
    input: "y\n",
  });
  return true;
}

/**
 * Write the cloud-init documents and pack them into a seed image.
 */
export async function createSeedImage(
  runner: CommandRunner,
  launchDir: string,
  guest: GuestConfig
): Promise<SeedFiles> {
  const files = seedFilesFor(launchDir, guest.name);
  const publicKey = await fs.readFile(`${guest.sshKeyPath}.pub`, "utf-8");

  await fs.mkdir(launchDir, { recursive: true });
  await fs.writeFile(files.metadata, renderMetadata(guest.name), "utf-8");
  await fs.writeFile(files.userData, renderUserData(guest, publicKey), "utf-8");

  await runOrThrow(runner, {
    command: "cloud-localds",
    args: [files.seedImage, files.userData, files.metadata],
  });
  return files;
}
