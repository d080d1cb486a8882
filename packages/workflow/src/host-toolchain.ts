/**
 * @summary Host-side provisioning performed through external tools.
 *
 * Installs build dependencies, builds and installs the AMDSEV stack,
 * points grub at the SNP host kernel, prepares KVM and /dev/sev for
 * unprivileged guests, and builds the attestation tooling. Every program
 * runs through the phase's command runner; only files inside the working
 * directory are touched with fs directly.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { MEASURE_TOOL } from "@snpctl/attestor";
import {
  ArtifactError,
  EnvironmentError,
  pathExists,
  runOrThrow,
  shell,
  writeManifest,
  type BinaryManifest,
  type CommandRunner,
  type CommandSpec,
  type Reporter,
  type SnpctlConfig,
} from "@snpctl/core";
import {
  GRUB_CFG_FILE,
  GRUB_DEFAULT_BACKUP,
  GRUB_DEFAULT_FILE,
  grubDefaultNames,
  resolveGrubEntry,
  setGrubDefault,
} from "./grub.js";
import { readKernelRelease } from "./kernel-config.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const APT_PACKAGES = [
  // build
  "build-essential",
  "git",
  // ACL for /dev/sev
  "acl",
  // qemu
  "ninja-build",
  "pkg-config",
  "libglib2.0-dev",
  "libpixman-1-dev",
  "libslirp-dev",
  // ovmf
  "python-is-python3",
  "uuid-dev",
  "iasl",
  // kernel
  "bc",
  "rsync",
  "flex",
  "bison",
  "libncurses-dev",
  "libssl-dev",
  "libelf-dev",
  "dwarves",
  "zstd",
  "debhelper",
  // guest image
  "cloud-image-utils",
  "qemu-utils",
  // sev-snp-measure
  "python3-pip",
  // CPU identification
  "cpuid",
] as const;

/** OVMF needs a newer nasm than the distribution ships */
export const NASM_SOURCE_URL =
  "https://www.nasm.us/pub/nasm/releasebuilds/2.16.01/nasm-2.16.01.tar.gz";

export const RUSTUP_URL = "https://sh.rustup.rs";

const CARGO_ENV = 'source "$HOME/.cargo/env" 2>/dev/null || true';

export const KVM_DEBUG_SWAP_PARAM = "/sys/module/kvm_amd/parameters/debug_swap";
export const SEV_DEVICE = "/dev/sev";

// ---------------------------------------------------------------------------
// Toolchain
// ---------------------------------------------------------------------------

export class HostToolchain {
  constructor(
    private readonly config: SnpctlConfig,
    private readonly runner: CommandRunner,
    private readonly reporter: Reporter
  ) {}

  private run(spec: CommandSpec) {
    return runOrThrow(this.runner, spec);
  }

  // -------------------------------------------------------------------------
  // Dependencies
  // -------------------------------------------------------------------------

  async installDependencies(): Promise<void> {
    await this.run({ command: "sudo", args: ["apt", "install", "-y", ...APT_PACKAGES] });
    await this.installNasmFromSource();
  }

  async installNasmFromSource(): Promise<void> {
    const archive = path.basename(NASM_SOURCE_URL);
    const name = archive.replace(/\.tar\.gz$/, "");
    const sourceDir = path.join(this.config.workingDir, name);

    if (await pathExists(sourceDir)) {
      this.reporter.info("nasm directory detected, skipping the build and install for nasm");
      return;
    }

    await fs.mkdir(this.config.workingDir, { recursive: true });
    await this.run({ command: "sudo", args: ["apt", "purge", "-y", "nasm"] });
    await this.run({
      command: "wget",
      args: [NASM_SOURCE_URL, "-O", archive],
      cwd: this.config.workingDir,
    });
    await this.run({ command: "tar", args: ["xzf", archive], cwd: this.config.workingDir });
    await this.run({ command: "./configure", args: [], cwd: sourceDir });
    await this.run({ command: "make", args: [], cwd: sourceDir });
    await this.run({ command: "sudo", args: ["make", "install"], cwd: sourceDir });
  }

  async hasRust(): Promise<boolean> {
    const result = await this.runner.run(shell(`${CARGO_ENV}; command -v rustc`));
    return result.exitCode === 0;
  }

  async installRust(): Promise<void> {
    await this.run(shell(`curl --proto '=https' --tlsv1.2 -sSf ${RUSTUP_URL} | sh -s -- -y`));
  }

  // -------------------------------------------------------------------------
  // AMDSEV
  // -------------------------------------------------------------------------

  get amdsevDir(): string {
    return path.join(this.config.setupDir, "AMDSEV");
  }

  get amdsevBranch(): string {
    const { sources } = this.config;
    return this.config.upm ? sources.amdsevBranch : sources.amdsevNonUpmBranch;
  }

  guestKernelRelease(): Promise<string> {
    return readKernelRelease(path.join(this.amdsevDir, "linux", "guest", ".config"), "guest");
  }

  hostKernelRelease(): Promise<string> {
    return readKernelRelease(path.join(this.amdsevDir, "linux", "host", ".config"), "host");
  }

  /**
   * Clone or update the AMDSEV branch, build and install it, and record the
   * resulting artifact paths in the setup manifest.
   */
  async buildAmdsev(): Promise<BinaryManifest> {
    const { setupDir, sources } = this.config;
    const branch = this.amdsevBranch;
    await fs.mkdir(setupDir, { recursive: true });

    if (!(await pathExists(this.amdsevDir))) {
      await this.run({
        command: "git",
        args: ["clone", "-b", branch, sources.amdsevUrl, "AMDSEV"],
        cwd: setupDir,
      });
      await this.run({
        command: "git",
        args: ["-C", "AMDSEV", "remote", "add", "current", sources.amdsevUrl],
        cwd: setupDir,
      });
    }

    const cwd = this.amdsevDir;
    await this.run({ command: "git", args: ["remote", "set-url", "current", sources.amdsevUrl], cwd });
    await this.run({ command: "git", args: ["fetch", "current", branch], cwd });
    await this.run({ command: "git", args: ["checkout", `current/${branch}`], cwd });

    // OVMF is re-initialized by the build
    await fs.rm(path.join(cwd, "ovmf"), { recursive: true, force: true });

    await this.run({ command: "./build.sh", args: ["--package"], cwd });
    await this.run({ command: "sudo", args: ["cp", "kvm.conf", "/etc/modprobe.d/"], cwd });

    const release = await this.guestKernelRelease();
    const kernel = await this.ensureGuestKernel(release);

    const releaseDir = await this.latestSnpRelease();
    await this.run({ command: "sudo", args: ["./install.sh"], cwd: releaseDir });

    // Lets QEMU run without root
    await this.run(shell('sudo usermod -a -G kvm "$USER"'));

    const manifest: BinaryManifest = {
      qemuBin: path.join(cwd, "qemu", "build", "qemu-system-x86_64"),
      firmwareBin: path.join(cwd, "ovmf", "Build", "AmdSev", "DEBUG_GCC5", "FV", "OVMF.fd"),
      kernelBin: kernel,
      initrdBin: path.join(setupDir, `initrd.img-${release}`),
    };
    await writeManifest(setupDir, manifest);
    return manifest;
  }

  /**
   * Path of `vmlinuz-<release>` in the guest kernel tree, copied from the
   * built bzImage when the build did not place it there.
   */
  private async ensureGuestKernel(release: string): Promise<string> {
    const guestDir = path.join(this.amdsevDir, "linux", "guest");
    const kernel = path.join(guestDir, `vmlinuz-${release}`);

    if (!(await pathExists(kernel))) {
      const entries = await fs.readdir(guestDir, { recursive: true });
      const bzImage = entries.find((entry) => path.basename(entry) === "bzImage");
      if (bzImage === undefined) {
        throw new ArtifactError("kernel", kernel, `Guest kernel was not built: ${kernel}`);
      }
      await fs.copyFile(path.join(guestDir, bzImage), kernel);
    }
    return fs.realpath(kernel);
  }

  /**
   * Most recently modified `snp-release-*` directory.
   */
  private async latestSnpRelease(): Promise<string> {
    const entries = await fs.readdir(this.amdsevDir, { withFileTypes: true });
    const candidates = await Promise.all(
      entries
        .filter((entry) => entry.isDirectory() && entry.name.startsWith("snp-release-"))
        .map(async (entry) => {
          const dir = path.join(this.amdsevDir, entry.name);
          const stat = await fs.stat(dir);
          return { dir, mtime: stat.mtimeMs };
        })
    );
    candidates.sort((a, b) => b.mtime - a.mtime);

    const latest = candidates[0];
    if (latest === undefined) {
      throw new ArtifactError(
        "snp-release",
        path.join(this.amdsevDir, "snp-release-*"),
        `No snp-release directory produced by the AMDSEV build in ${this.amdsevDir}`
      );
    }
    return latest.dir;
  }

  /**
   * The guest kernel Debian package built alongside the guest kernel.
   */
  async guestKernelPackage(): Promise<string> {
    const linuxDir = path.join(this.amdsevDir, "linux");
    const entries = await fs.readdir(linuxDir).catch(() => []);
    const deb = entries
      .filter((entry) => /^linux-image.*snp-guest.*\.deb$/.test(entry) && !entry.includes("dbg"))
      .sort()[0];

    if (deb === undefined) {
      throw new ArtifactError(
        "guest kernel package",
        path.join(linuxDir, "linux-image*snp-guest*.deb")
      );
    }
    return path.join(linuxDir, deb);
  }

  // -------------------------------------------------------------------------
  // Grub
  // -------------------------------------------------------------------------

  async isGrubDefaultSet(): Promise<boolean> {
    const release = await this.hostKernelRelease();
    const result = await this.run({ command: "cat", args: [GRUB_DEFAULT_FILE] });
    return grubDefaultNames(result.stdout, release);
  }

  async setGrubDefault(): Promise<void> {
    const release = await this.hostKernelRelease();
    const grubCfg = await this.run({ command: "cat", args: [GRUB_CFG_FILE] });
    const entry = resolveGrubEntry(grubCfg.stdout, release);
    const current = await this.run({ command: "cat", args: [GRUB_DEFAULT_FILE] });

    await this.run({ command: "sudo", args: ["cp", GRUB_DEFAULT_FILE, GRUB_DEFAULT_BACKUP] });
    await this.run({
      command: "sudo",
      args: ["tee", GRUB_DEFAULT_FILE],
      input: setGrubDefault(current.stdout, entry),
    });
    await this.run({ command: "sudo", args: ["update-grub"] });
    this.reporter.info(`Default grub entry set to "${entry.submenu}>${entry.menuitem}"`);
  }

  // -------------------------------------------------------------------------
  // KVM and /dev/sev
  // -------------------------------------------------------------------------

  async verifySnpHost(): Promise<void> {
    const result = await this.runner.run(shell("sudo dmesg | grep -i 'SEV-SNP enabled'"));
    if (result.exitCode !== 0) {
      const repo = this.config.sources.amdsevUrl.replace(/\.git$/, "");
      throw new EnvironmentError(
        "SEV-SNP not enabled on the host",
        `Please follow these steps to enable: ${repo}/tree/${this.config.sources.amdsevBranch}#prepare-host`
      );
    }
  }

  async isDebugSwapDisabled(): Promise<boolean> {
    const result = await this.runner.run({ command: "cat", args: [KVM_DEBUG_SWAP_PARAM] });
    return result.exitCode === 0 && result.stdout.trim() === "N";
  }

  /**
   * Reload kvm_amd with debug_swap off; sev-snp-measure does not model it.
   */
  async disableDebugSwap(): Promise<void> {
    await this.run({ command: "sudo", args: ["modprobe", "-r", "kvm_amd"] });
    await this.run({ command: "sudo", args: ["modprobe", "kvm_amd", "debug_swap=0"] });
  }

  async hasSevDeviceAcl(): Promise<boolean> {
    const result = await this.runner.run({ command: "getfacl", args: ["-p", SEV_DEVICE] });
    return (
      result.exitCode === 0 &&
      result.stdout.split("\n").some((line) => /^group:kvm:rw/.test(line.trim()))
    );
  }

  async grantSevDeviceAcl(): Promise<void> {
    await this.run({ command: "sudo", args: ["setfacl", "-m", "g:kvm:rw", SEV_DEVICE] });
  }

  // -------------------------------------------------------------------------
  // Attestation tooling
  // -------------------------------------------------------------------------

  async hasMeasureTool(): Promise<boolean> {
    const result = await this.runner.run({
      command: "which",
      args: [MEASURE_TOOL],
      env: { PATH: [this.config.localBinDir, this.config.searchPath].join(path.delimiter) },
    });
    return result.exitCode === 0;
  }

  async installMeasureTool(): Promise<void> {
    await this.run({
      command: "pip",
      args: ["install", `${MEASURE_TOOL}==${this.config.sources.sevSnpMeasureVersion}`],
    });
  }

  get snpguestDir(): string {
    return path.join(this.config.attestDir, "snpguest");
  }

  get snpguestBinary(): string {
    return path.join(this.snpguestDir, "target", "release", "snpguest");
  }

  async buildSnpguest(): Promise<void> {
    const { attestDir, sources } = this.config;
    const ref = sources.snpguestBranch;
    const isTag = ref.startsWith("tags/");
    await fs.mkdir(attestDir, { recursive: true });

    if (!(await pathExists(this.snpguestDir))) {
      await this.run({
        command: "git",
        args: ["clone", "-b", ref.replace(/^tags\//, ""), sources.snpguestUrl, "snpguest"],
        cwd: attestDir,
      });
      await this.run({
        command: "git",
        args: ["-C", "snpguest", "remote", "add", "current", sources.snpguestUrl],
        cwd: attestDir,
      });
    }

    const cwd = this.snpguestDir;
    await this.run({ command: "git", args: ["remote", "set-url", "current", sources.snpguestUrl], cwd });
    await this.run({ command: "git", args: ["fetch", "current", ref], cwd });
    await this.run({ command: "git", args: ["checkout", isTag ? ref : `current/${ref}`], cwd });
    await this.run(shell(`${CARGO_ENV}; cargo build -r`, { cwd }));
  }
}
