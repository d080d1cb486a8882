/**
 * @summary Selecting the SNP host kernel as the grub default.
 *
 * The default is written as `"<submenu title>><menu entry title>"`, both
 * taken from the generated grub.cfg.
 */

import { EnvironmentError } from "@snpctl/core";

export const GRUB_DEFAULT_FILE = "/etc/default/grub";
export const GRUB_DEFAULT_BACKUP = "/etc/default/grub_bkup";
export const GRUB_CFG_FILE = "/boot/grub/grub.cfg";

export interface GrubEntry {
  submenu: string;
  menuitem: string;
}

/**
 * True when an uncommented line of /etc/default/grub names `release`.
 */
export function grubDefaultNames(defaultGrub: string, release: string): boolean {
  return defaultGrub
    .split("\n")
    .some((line) => !line.startsWith("#") && line.includes(release));
}

/**
 * Text between the first pair of single quotes.
 */
function quotedTitle(line: string): string | undefined {
  const match = /'([^']*)/.exec(line);
  return match?.[1];
}

/**
 * Find the submenu and menu entry titles that boot `release`.
 */
export function resolveGrubEntry(grubCfg: string, release: string): GrubEntry {
  const lines = grubCfg.split("\n");

  let submenu: string | undefined;
  for (const [index, line] of lines.entries()) {
    if (!/submenu.*Advanced options/.test(line)) {
      continue;
    }
    const next = lines[index + 1] ?? "";
    if (line.includes(release) || next.includes(release)) {
      submenu = quotedTitle(line);
      break;
    }
  }

  const menuLine = lines.find(
    (line) =>
      /menuentry/.test(line) &&
      line.slice(line.indexOf("menuentry")).includes(release) &&
      !line.includes("(recovery mode)")
  );
  const menuitem = menuLine === undefined ? undefined : quotedTitle(menuLine);

  if (submenu === undefined || menuitem === undefined) {
    throw new EnvironmentError(
      `SNP host kernel ${release} not found in ${GRUB_CFG_FILE}`,
      "Make sure the AMDSEV host packages were installed and run update-grub"
    );
  }
  return { submenu, menuitem };
}

/**
 * Replace (or add) the GRUB_DEFAULT line.
 */
export function setGrubDefault(defaultGrub: string, entry: GrubEntry): string {
  const line = `GRUB_DEFAULT="${entry.submenu}>${entry.menuitem}"`;
  const pattern = /^GRUB_DEFAULT=.*$/m;
  if (pattern.test(defaultGrub)) {
    return defaultGrub.replace(/^GRUB_DEFAULT=.*$/gm, () => line);
  }
  const separator = defaultGrub === "" || defaultGrub.endsWith("\n") ? "" : "\n";
  return `${defaultGrub}${separator}${line}\n`;
}
