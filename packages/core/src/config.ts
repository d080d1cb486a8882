/**
 * @summary Configuration for snpctl, built once at process start.
 *
 * Every recognized environment variable is listed in `CONFIG_KEYS` with its
 * default. `loadConfig()` reads them, applies command-line overrides and
 * returns a frozen `SnpctlConfig` that is passed explicitly to every
 * component. Nothing else in the codebase reads `process.env`.
 *
 * Used by:
 * - The CLI entry point, which builds the config and hands it to the engine
 * - Phase steps, launcher and attestor components
 */

import os from "node:os";
import path from "node:path";
import { UsageError } from "./types/errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Report parsing flavor used to extract the actual measurement.
 *
 * - display: parse the labeled field from `snpguest display report`
 * - binary: read the fixed offset of the raw report file
 */
export type ReportFormat = "display" | "binary";

/**
 * Immutable configuration shared by every component.
 */
export interface SnpctlConfig {
  /** Root of all persisted state */
  readonly workingDir: string;
  readonly setupDir: string;
  readonly launchDir: string;
  readonly attestDir: string;

  /** Build the UPM (snp-latest) stack rather than the non-UPM one */
  readonly upm: boolean;

  readonly guest: GuestConfig;
  readonly sources: SourceConfig;

  /** Path of the materialized QEMU command file */
  readonly qemuCmdlineFile: string;

  /** Guest disk image */
  readonly image: string;

  /** True when the image was given by the user and must not be created */
  readonly userImage: boolean;

  readonly reportFormat: ReportFormat;

  /** Print verbose progress output */
  readonly debug: boolean;

  /** Per-user tool directory searched before PATH (pip --user installs) */
  readonly localBinDir: string;

  /** PATH the host tools are resolved against */
  readonly searchPath: string;
}

/**
 * Identity and sizing of the guest VM.
 */
export interface GuestConfig {
  readonly name: string;
  readonly hostSshPort: number;
  readonly sizeGb: number;
  readonly memSizeMb: number;
  readonly smp: number;
  readonly cpuModel: string;
  readonly user: string;
  readonly password: string;
  readonly sshKeyPath: string;
  readonly rootLabel: string;
  /** Kernel command line passed with -append */
  readonly kernelAppend: string;
}

/**
 * Where external sources and tools come from.
 */
export interface SourceConfig {
  readonly amdsevUrl: string;
  readonly amdsevBranch: string;
  readonly amdsevNonUpmBranch: string;
  readonly snpguestUrl: string;
  readonly snpguestBranch: string;
  readonly sevSnpMeasureVersion: string;
  readonly cloudInitImageUrl: string;
}

/**
 * Values that come from command-line flags rather than the environment.
 */
export interface ConfigOverrides {
  /** --non-upm */
  upm?: boolean;
  /** --image <path> */
  image?: string;
  /** --debug */
  debug?: boolean;
}

export type Environment = Readonly<Record<string, string | undefined>>;

// ---------------------------------------------------------------------------
// Recognized Keys
// ---------------------------------------------------------------------------

/**
 * Every environment variable snpctl reads, with a description of its
 * default. Defaults that depend on other keys are resolved in
 * `loadConfig()`.
 */
export const CONFIG_KEYS = {
  WORKING_DIR: "$HOME/snp",
  SETUP_WORKING_DIR: "$WORKING_DIR/setup",
  LAUNCH_WORKING_DIR: "$WORKING_DIR/launch",
  ATTESTATION_WORKING_DIR: "$WORKING_DIR/attest",
  HOST_SSH_PORT: "10022",
  GUEST_NAME: "snp-guest",
  GUEST_SIZE_GB: "20",
  GUEST_MEM_SIZE_MB: "2048",
  GUEST_SMP: "4",
  CPU_MODEL: "EPYC-v4",
  GUEST_USER: "amd",
  GUEST_PASS: "amd",
  GUEST_SSH_KEY_PATH: "$LAUNCH_WORKING_DIR/$GUEST_NAME-key",
  GUEST_ROOT_LABEL: "cloudimg-rootfs",
  QEMU_CMDLINE: "$LAUNCH_WORKING_DIR/qemu.cmdline",
  IMAGE: "$LAUNCH_WORKING_DIR/$GUEST_NAME.img",
  CLOUD_INIT_IMAGE_URL:
    "https://cloud-images.ubuntu.com/jammy/current/jammy-server-cloudimg-amd64.img",
  AMDSEV_URL: "https://github.com/ryansavino/AMDSEV.git",
  AMDSEV_BRANCH: "snp-latest-fixes",
  AMDSEV_NON_UPM_BRANCH: "snp-non-upm",
  SNPGUEST_URL: "https://github.com/virtee/snpguest.git",
  SNPGUEST_BRANCH: "tags/v0.7.1",
  SEV_SNP_MEASURE_VERSION: "0.0.11",
  SNP_REPORT_FORMAT: "display",
  SNPCTL_DEBUG: "false",
} as const;

export type ConfigKey = keyof typeof CONFIG_KEYS;

// ---------------------------------------------------------------------------
// Parsing Helpers
// ---------------------------------------------------------------------------

function readString(env: Environment, key: ConfigKey, fallback: string): string {
  const value = env[key];
  return value === undefined || value.trim() === "" ? fallback : value;
}

/**
 * Parse a positive integer, rejecting anything that is not one.
 */
function readPositiveInt(env: Environment, key: ConfigKey, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new UsageError(`${key} must be a positive integer, got "${raw}"`);
  }
  const parsed = parseInt(raw, 10);
  if (parsed <= 0) {
    throw new UsageError(`${key} must be a positive integer, got "${raw}"`);
  }
  return parsed;
}

function readBoolean(env: Environment, key: ConfigKey, fallback: boolean): boolean {
  const raw = env[key];
  if (!raw) {
    return fallback;
  }
  return raw.toLowerCase() === "true" || raw === "1";
}

function readReportFormat(env: Environment): ReportFormat {
  const raw = readString(env, "SNP_REPORT_FORMAT", CONFIG_KEYS.SNP_REPORT_FORMAT);
  if (raw === "display" || raw === "binary") {
    return raw;
  }
  throw new UsageError(
    `SNP_REPORT_FORMAT must be "display" or "binary", got "${raw}"`
  );
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

/**
 * Build the process-wide configuration.
 *
 * @param env - Environment to read (defaults to process.env)
 * @param overrides - Values from command-line flags
 * @param homeDir - Home directory used for the default working directory
 *
 * @example
 * ```typescript
 * const config = loadConfig(process.env, { upm: false });
 * config.setupDir; // "$HOME/snp/setup/non-upm"
 * ```
 */
export function loadConfig(
  env: Environment = process.env,
  overrides: ConfigOverrides = {},
  homeDir: string = os.homedir()
): SnpctlConfig {
  const workingDir = path.resolve(
    readString(env, "WORKING_DIR", path.join(homeDir, "snp"))
  );
  const upm = overrides.upm ?? true;

  const baseSetupDir = path.resolve(
    readString(env, "SETUP_WORKING_DIR", path.join(workingDir, "setup"))
  );
  const setupDir = upm ? baseSetupDir : path.join(baseSetupDir, "non-upm");
  const launchDir = path.resolve(
    readString(env, "LAUNCH_WORKING_DIR", path.join(workingDir, "launch"))
  );
  const attestDir = path.resolve(
    readString(env, "ATTESTATION_WORKING_DIR", path.join(workingDir, "attest"))
  );

  const hostSshPort = readPositiveInt(env, "HOST_SSH_PORT", 10022);
  if (hostSshPort > 65535) {
    throw new UsageError(`HOST_SSH_PORT must be a valid TCP port, got ${hostSshPort}`);
  }

  const name = readString(env, "GUEST_NAME", CONFIG_KEYS.GUEST_NAME);
  const rootLabel = readString(env, "GUEST_ROOT_LABEL", CONFIG_KEYS.GUEST_ROOT_LABEL);

  const guest: GuestConfig = Object.freeze({
    name,
    hostSshPort,
    sizeGb: readPositiveInt(env, "GUEST_SIZE_GB", 20),
    memSizeMb: readPositiveInt(env, "GUEST_MEM_SIZE_MB", 2048),
    smp: readPositiveInt(env, "GUEST_SMP", 4),
    cpuModel: readString(env, "CPU_MODEL", CONFIG_KEYS.CPU_MODEL),
    user: readString(env, "GUEST_USER", CONFIG_KEYS.GUEST_USER),
    password: readString(env, "GUEST_PASS", CONFIG_KEYS.GUEST_PASS),
    sshKeyPath: path.resolve(
      readString(env, "GUEST_SSH_KEY_PATH", path.join(launchDir, `${name}-key`))
    ),
    rootLabel,
    kernelAppend: `root=LABEL=${rootLabel} ro console=ttyS0`,
  });

  const sources: SourceConfig = Object.freeze({
    amdsevUrl: readString(env, "AMDSEV_URL", CONFIG_KEYS.AMDSEV_URL),
    amdsevBranch: readString(env, "AMDSEV_BRANCH", CONFIG_KEYS.AMDSEV_BRANCH),
    amdsevNonUpmBranch: readString(
      env,
      "AMDSEV_NON_UPM_BRANCH",
      CONFIG_KEYS.AMDSEV_NON_UPM_BRANCH
    ),
    snpguestUrl: readString(env, "SNPGUEST_URL", CONFIG_KEYS.SNPGUEST_URL),
    snpguestBranch: readString(env, "SNPGUEST_BRANCH", CONFIG_KEYS.SNPGUEST_BRANCH),
    sevSnpMeasureVersion: readString(
      env,
      "SEV_SNP_MEASURE_VERSION",
      CONFIG_KEYS.SEV_SNP_MEASURE_VERSION
    ),
    cloudInitImageUrl: readString(
      env,
      "CLOUD_INIT_IMAGE_URL",
      CONFIG_KEYS.CLOUD_INIT_IMAGE_URL
    ),
  });

  const userImage = overrides.image !== undefined;
  const image = path.resolve(
    overrides.image ?? readString(env, "IMAGE", path.join(launchDir, `${name}.img`))
  );

  return Object.freeze({
    workingDir,
    setupDir,
    launchDir,
    attestDir,
    upm,
    guest,
    sources,
    qemuCmdlineFile: path.resolve(
      readString(env, "QEMU_CMDLINE", path.join(launchDir, "qemu.cmdline"))
    ),
    image,
    userImage,
    reportFormat: readReportFormat(env),
    debug: overrides.debug ?? readBoolean(env, "SNPCTL_DEBUG", false),
    localBinDir: path.join(homeDir, ".local", "bin"),
    searchPath: env.PATH ?? "/usr/local/bin:/usr/bin:/bin",
  });
}

/**
 * Flatten a config into display rows for `snpctl config`.
 */
export function describeConfig(config: SnpctlConfig): Array<[string, string]> {
  return [
    ["WORKING_DIR", config.workingDir],
    ["SETUP_WORKING_DIR", config.setupDir],
    ["LAUNCH_WORKING_DIR", config.launchDir],
    ["ATTESTATION_WORKING_DIR", config.attestDir],
    ["HOST_SSH_PORT", String(config.guest.hostSshPort)],
    ["GUEST_NAME", config.guest.name],
    ["GUEST_SIZE_GB", String(config.guest.sizeGb)],
    ["GUEST_MEM_SIZE_MB", String(config.guest.memSizeMb)],
    ["GUEST_SMP", String(config.guest.smp)],
    ["CPU_MODEL", config.guest.cpuModel],
    ["GUEST_USER", config.guest.user],
    ["GUEST_SSH_KEY_PATH", config.guest.sshKeyPath],
    ["GUEST_ROOT_LABEL", config.guest.rootLabel],
    ["QEMU_CMDLINE", config.qemuCmdlineFile],
    ["IMAGE", config.image],
    ["SNP_REPORT_FORMAT", config.reportFormat],
    ["UPM", String(config.upm)],
  ];
}
