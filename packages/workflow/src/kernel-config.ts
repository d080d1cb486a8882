/**
 * @summary Kernel release strings from AMDSEV kernel build configs.
 *
 * The release is the version from the config banner followed by
 * `CONFIG_LOCALVERSION`, e.g. `6.5.0-rc2` + `-snp-guest-b3f5e7a1` gives
 * `6.5.0-rc2-snp-guest-b3f5e7a1`. It names the installed kernel, its initrd
 * and its grub entries.
 */

import fs from "node:fs/promises";
import { ArtifactError } from "@snpctl/core";

export type KernelFlavor = "guest" | "host";

const BANNER: Record<KernelFlavor, RegExp> = {
  guest: /Linux\//,
  host: /^# Linux\/.*Kernel Configuration$/,
};

/**
 * Parse the kernel release, or undefined when the banner is missing.
 */
export function parseKernelRelease(configText: string, flavor: KernelFlavor): string | undefined {
  const lines = configText.split("\n");

  const banner = lines.find((line) => BANNER[flavor].test(line));
  const version = banner?.split(" ").filter((field) => field.length > 0)[2];
  if (!version) {
    return undefined;
  }

  let localVersion = "";
  for (const line of lines) {
    if (line.startsWith("#") || !line.includes("CONFIG_LOCALVERSION")) {
      continue;
    }
    const value = line.split('="')[1];
    if (value !== undefined) {
      localVersion = value.replace(/"/g, "");
      break;
    }
  }

  return `${version}${localVersion}`;
}

export async function readKernelRelease(configFile: string, flavor: KernelFlavor): Promise<string> {
  let text: string;
  try {
    text = await fs.readFile(configFile, "utf-8");
  } catch {
    throw new ArtifactError(`${flavor} kernel config`, configFile);
  }

  const release = parseKernelRelease(text, flavor);
  if (release === undefined) {
    throw new ArtifactError(
      `${flavor} kernel config`,
      configFile,
      `Unable to determine the ${flavor} kernel version from ${configFile}`
    );
  }
  return release;
}
