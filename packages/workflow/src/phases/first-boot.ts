/**
 * @summary First-boot provisioning of the guest image.
 *
 * A fresh image boots once without SNP so the SNP guest kernel package can
 * be installed and its initrd copied back for direct boot. The state is
 * `needs-first-boot` until the guest kernel marker exists, then
 * `provisioned`.
 */

import fs from "node:fs/promises";
import path from "node:path";
import {
  ArtifactError,
  ConnectivityError,
  MARKERS,
  pathExists,
  readManifest,
  writeManifest,
  type BinaryManifest,
} from "@snpctl/core";
import {
  QEMU_PIDFILE,
  baseParameters,
  createSeedImage,
  ensureSshKeyPair,
  fetchCloudImage,
  seedFilesFor,
  writeQemuCommand,
} from "@snpctl/launcher";
import type { PhaseContext } from "../types.js";
import { configTarget } from "./common.js";

export type FirstBootState = "needs-first-boot" | "provisioned";

export class FirstBootProvisioner {
  constructor(private readonly context: PhaseContext) {}

  async state(): Promise<FirstBootState> {
    const { workDir, config } = this.context;
    return (await workDir.hasMarker(config.launchDir, MARKERS.GUEST_KERNEL_INSTALLED))
      ? "provisioned"
      : "needs-first-boot";
  }

  /**
   * Move from `needs-first-boot` to `provisioned`. Does nothing once
   * provisioned.
   */
  async advance(): Promise<FirstBootState> {
    if ((await this.state()) === "provisioned") {
      return "provisioned";
    }
    await this.provision();
    return this.state();
  }

  private async provision(): Promise<void> {
    const { config, runner, reporter, toolchain, guests, workDir } = this.context;
    const { guest, image, launchDir } = config;

    if (config.userImage && !(await pathExists(image))) {
      throw new ArtifactError("image", image, `Image file specified, but doesn't exist: ${image}`);
    }

    if (!(await ensureSshKeyPair(runner, guest.sshKeyPath))) {
      reporter.info("Guest SSH key pair already generated");
    }

    // A user image is expected to have its own account; a downloaded one
    // boots with the seed until provisioning completes
    let seedImage: string | undefined;
    if (!config.userImage) {
      seedImage = await this.seedImage();
      if (!(await pathExists(image))) {
        reporter.step("Downloading the cloud image");
        await fetchCloudImage(runner, config.sources.cloudInitImageUrl, image, guest.sizeGb);
      }
    }

    const manifest = await this.launchManifest();
    const qemuBin = await qemuBinaryFor(this.context, manifest);

    const locator = { workingDir: config.workingDir, image };
    if ((await guests.find(locator)).length > 0) {
      reporter.warn("A guest from an earlier run is still using the image, stopping it");
      await guests.stop(locator);
    }

    reporter.step("Booting the guest to install the SNP guest kernel");
    const params = baseParameters({ guest, image, launchDir, seedImage });
    const set = await writeQemuCommand(config.qemuCmdlineFile, qemuBin, params);
    const pid = await guests.launch(set, path.join(launchDir, QEMU_PIDFILE));

    const remote = this.context.executorFor(configTarget(config));
    const kernelPackage = await toolchain.guestKernelPackage();
    const home = `/home/${guest.user}`;
    await this.context.poller.retryUntil("guest to accept the guest kernel package", async () => {
      await remote.copy(kernelPackage, home, "to-guest");
      return true;
    });
    await remote.execOrThrow(`sudo dpkg -i ${home}/${path.basename(kernelPackage)}`);

    const initrdName = `initrd.img-${await toolchain.guestKernelRelease()}`;
    await remote.copy(`/boot/${initrdName}`, launchDir, "from-guest");

    try {
      await remote.exec("sudo shutdown now");
    } catch (err) {
      // The connection drops while the guest powers off
      if (!(err instanceof ConnectivityError)) {
        throw err;
      }
    }

    await workDir.writeMarker(launchDir, MARKERS.GUEST_KERNEL_INSTALLED);
    await writeManifest(launchDir, { ...manifest, initrdBin: path.join(launchDir, initrdName) });

    await guests.waitForExit({ ...locator, pid });
  }

  private async seedImage(): Promise<string> {
    const { config, runner, reporter } = this.context;
    const { seedImage } = seedFilesFor(config.launchDir, config.guest.name);
    if (await pathExists(seedImage)) {
      return seedImage;
    }
    reporter.step("Creating the cloud-init seed image");
    return (await createSeedImage(runner, config.launchDir, config.guest)).seedImage;
  }

  private async launchManifest(): Promise<BinaryManifest> {
    const { launchDir } = this.context.config;
    const manifest = await readManifest(launchDir);
    if (manifest === undefined) {
      throw new ArtifactError("manifest", path.join(launchDir, "binaries.json"));
    }
    return manifest;
  }
}

/**
 * QEMU binary for a launch: the launch manifest's, else the setup build's.
 */
export async function qemuBinaryFor(
  context: PhaseContext,
  launchManifest: BinaryManifest
): Promise<string> {
  const qemuBin =
    launchManifest.qemuBin ?? (await readManifest(context.config.setupDir))?.qemuBin;
  if (qemuBin === undefined || !(await pathExists(qemuBin))) {
    throw new ArtifactError(
      "qemu",
      qemuBin ?? "(unset)",
      "QEMU binary does not exist or was not specified"
    );
  }
  return qemuBin;
}

/**
 * Copy a file into `dir`, returning the new path.
 */
export async function copyInto(file: string, dir: string): Promise<string> {
  const target = path.join(dir, path.basename(file));
  await fs.copyFile(file, target);
  return target;
}
