/**
 * @summary Resolved artifact paths for a phase (`binaries.json`).
 *
 * Setup writes one after the AMDSEV build, launch copies the artifacts and
 * writes its own, and first-boot provisioning replaces the launch initrd.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { ArtifactError } from "./types/errors.js";
import { isOptionalString, isRecord } from "./utils/guards.js";
import { pathExists } from "./working-directory.js";

export const MANIFEST_FILE = "binaries.json";

export interface BinaryManifest {
  qemuBin?: string;
  firmwareBin: string;
  kernelBin: string;
  initrdBin: string;
}

export function manifestPath(dir: string): string {
  return path.join(dir, MANIFEST_FILE);
}

export function isBinaryManifest(value: unknown): value is BinaryManifest {
  return (
    isRecord(value) &&
    typeof value.firmwareBin === "string" &&
    typeof value.kernelBin === "string" &&
    typeof value.initrdBin === "string" &&
    isOptionalString(value.qemuBin)
  );
}

/**
 * Read the manifest in `dir`, or undefined when none was written yet.
 */
export async function readManifest(dir: string): Promise<BinaryManifest | undefined> {
  const file = manifestPath(dir);
  if (!(await pathExists(file))) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(file, "utf-8"));
  } catch {
    throw new ArtifactError("manifest", file, `Binaries manifest is not valid JSON: ${file}`);
  }
  if (!isBinaryManifest(parsed)) {
    throw new ArtifactError("manifest", file, `Binaries manifest is missing required paths: ${file}`);
  }
  return parsed;
}

export async function writeManifest(dir: string, manifest: BinaryManifest): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(manifestPath(dir), `${JSON.stringify(manifest, null, 2)}\n`, "utf-8");
}

/**
 * Throw `ArtifactError` for the first manifest entry whose file is missing.
 */
export async function assertManifestArtifacts(manifest: BinaryManifest): Promise<void> {
  const entries: Array<[string, string | undefined]> = [
    ["qemu", manifest.qemuBin],
    ["firmware", manifest.firmwareBin],
    ["kernel", manifest.kernelBin],
    ["initrd", manifest.initrdBin],
  ];
  for (const [artifact, file] of entries) {
    if (file !== undefined && !(await pathExists(file))) {
      throw new ArtifactError(artifact, file);
    }
  }
}
