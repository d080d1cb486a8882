/**
 * @summary launch-guest: boot the SNP guest from the setup artifacts.
 */

import path from "node:path";
import {
  ArtifactError,
  EnvironmentError,
  MARKERS,
  assertManifestArtifacts,
  pathExists,
  readManifest,
  readSession,
  writeManifest,
  writeSession,
  type BinaryManifest,
} from "@snpctl/core";
import {
  QEMU_PIDFILE,
  QEMU_TRACE_LOG,
  baseParameters,
  snpParameters,
  writeQemuCommand,
} from "@snpctl/launcher";
import type { PhaseContext, PhaseDefinition, Step } from "../types.js";
import { hostDependenciesStep, sessionTarget } from "./common.js";
import { FirstBootProvisioner, copyInto, qemuBinaryFor } from "./first-boot.js";

/** Guest kernel log line proving SNP is active */
export const SNP_ACTIVE_PATTERN = "Memory Encryption Features active:.*SEV-SNP";

async function requireLaunchManifest(context: PhaseContext): Promise<BinaryManifest> {
  const { launchDir } = context.config;
  const manifest = await readManifest(launchDir);
  if (manifest === undefined) {
    throw new ArtifactError("manifest", path.join(launchDir, "binaries.json"));
  }
  return manifest;
}

function requireSetupStep(context: PhaseContext): Step {
  return {
    id: "require-setup",
    description: "Checking setup-host output",
    run: async () => {
      const { setupDir } = context.config;
      if (!(await pathExists(setupDir)) || (await readManifest(setupDir)) === undefined) {
        throw new EnvironmentError(
          "Setup directory does not exist, please run 'setup-host' prior to 'launch-guest'",
          `Expected a binaries manifest in ${setupDir}`
        );
      }
    },
  };
}

function copyLaunchBinariesStep(context: PhaseContext): Step {
  const { setupDir, launchDir } = context.config;
  return {
    id: "copy-launch-binaries",
    description: "Copying guest launch binaries",
    isComplete: async () => (await readManifest(launchDir)) !== undefined,
    run: async () => {
      const setup = await readManifest(setupDir);
      if (setup === undefined) {
        throw new ArtifactError("manifest", path.join(setupDir, "binaries.json"));
      }
      const sources: Array<[string, string]> = [
        ["firmware", setup.firmwareBin],
        ["kernel", setup.kernelBin],
      ];
      for (const [artifact, file] of sources) {
        if (!(await pathExists(file))) {
          throw new ArtifactError(artifact, file);
        }
      }

      await context.workDir.ensure(launchDir);
      // The initrd arrives after first-boot provisioning
      const manifest: BinaryManifest = {
        firmwareBin: await copyInto(setup.firmwareBin, launchDir),
        kernelBin: await copyInto(setup.kernelBin, launchDir),
        initrdBin: path.join(launchDir, path.basename(setup.initrdBin)),
      };
      if (setup.qemuBin !== undefined) {
        manifest.qemuBin = setup.qemuBin;
      }
      await writeManifest(launchDir, manifest);
    },
  };
}

function launchSnpGuestStep(context: PhaseContext): Step {
  const { config, guests } = context;
  return {
    id: "launch-snp-guest",
    description: "Launching the SNP guest",
    isComplete: async () => {
      const session = await readSession(config.launchDir);
      if (session === undefined || session.image !== config.image) {
        return false;
      }
      const running = await guests.recordedGuest({
        workingDir: config.workingDir,
        image: session.image,
        pid: session.pid,
      });
      return running !== undefined;
    },
    run: async () => {
      const { guest, image, launchDir } = config;
      if (!(await pathExists(image))) {
        throw new ArtifactError("image", image);
      }

      const manifest = await requireLaunchManifest(context);
      await assertManifestArtifacts(manifest);
      const qemuBin = await qemuBinaryFor(context, manifest);

      const boot = {
        firmware: manifest.firmwareBin,
        kernel: manifest.kernelBin,
        initrd: manifest.initrdBin,
        append: guest.kernelAppend,
        vcpus: guest.smp,
        vcpuModel: guest.cpuModel,
      };
      const set = await writeQemuCommand(config.qemuCmdlineFile, qemuBin, [
        ...baseParameters({ guest, image, launchDir }),
        ...snpParameters({
          upm: config.upm,
          memSizeMb: guest.memSizeMb,
          firmware: boot.firmware,
          initrd: boot.initrd,
          kernel: boot.kernel,
          append: boot.append,
        }),
      ]);

      const pid = await guests.launch(set, path.join(launchDir, QEMU_PIDFILE));
      await writeSession(launchDir, {
        hostSshPort: guest.hostSshPort,
        sshKeyPath: guest.sshKeyPath,
        user: guest.user,
        image,
        pid,
        cmdlineFile: config.qemuCmdlineFile,
        boot,
        startedAt: context.now().toISOString(),
      });
    },
  };
}

function awaitSnpActiveStep(context: PhaseContext): Step {
  const { config, reporter, poller } = context;
  return {
    id: "await-snp-active",
    description: "Waiting for SEV-SNP to become active in the guest",
    run: async () => {
      const session = await readSession(config.launchDir);
      if (session === undefined) {
        throw new ArtifactError("session", path.join(config.launchDir, "session.json"));
      }
      if (!(await pathExists(session.sshKeyPath))) {
        throw new ArtifactError(
          "SSH key",
          session.sshKeyPath,
          `SSH key not present [${session.sshKeyPath}], cannot verify guest SNP enabled`
        );
      }

      const remote = context.executorFor(sessionTarget(session));
      let line = "";
      await poller.retryUntil("SEV-SNP to become active in the guest", async () => {
        const result = await remote.exec(`sudo dmesg | grep "${SNP_ACTIVE_PATTERN}"`);
        line = result.stdout.trim();
        return result.exitCode === 0 && line.length > 0;
      });

      reporter.info(`DMESG REPORT: ${line}`);
      reporter.success("SNP is Enabled");
    },
  };
}

export const launchGuest: PhaseDefinition = {
  name: "launch-guest",
  summary: "Launch a SNP guest",

  logDir: (config) => config.launchDir,

  failureLogs: async (context) => {
    const { launchDir } = context.config;
    return [path.join(launchDir, QEMU_TRACE_LOG), path.join(launchDir, "launch-guest.log")];
  },

  steps: (context) => {
    const { config, toolchain } = context;
    const firstBoot = new FirstBootProvisioner(context);

    return [
      requireSetupStep(context),
      copyLaunchBinariesStep(context),
      {
        id: "verify-snp-host",
        description: "Verifying SEV-SNP is enabled on the host",
        run: () => toolchain.verifySnpHost(),
      },
      hostDependenciesStep(context),
      {
        id: "kvm-debug-swap",
        description: "Reloading kvm_amd with debug_swap disabled",
        isComplete: () => toolchain.isDebugSwapDisabled(),
        run: () => toolchain.disableDebugSwap(),
      },
      {
        id: "sev-device-acl",
        description: "Granting the kvm group access to /dev/sev",
        isComplete: () => toolchain.hasSevDeviceAcl(),
        run: () => toolchain.grantSevDeviceAcl(),
      },
      {
        id: "first-boot-provisioning",
        description: "Installing the SNP guest kernel in the guest image",
        marker: { dir: config.launchDir, name: MARKERS.GUEST_KERNEL_INSTALLED },
        run: async () => {
          await firstBoot.advance();
        },
      },
      launchSnpGuestStep(context),
      awaitSnpActiveStep(context),
    ];
  },

  complete: (context) => {
    const { guest } = context.config;
    const { reporter } = context;
    reporter.info(`Guest SSH port forwarded to host port: ${guest.hostSshPort}`);
    reporter.info(
      "The guest is running in the background. Use the following command to access via SSH:"
    );
    reporter.info(`ssh -p ${guest.hostSshPort} -i ${guest.sshKeyPath} ${guest.user}@localhost`);
  },
};
