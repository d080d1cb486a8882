/**
 * @summary setup-host: build the SNP components and prepare the host.
 */

import { readManifest } from "@snpctl/core";
import type { PhaseDefinition } from "../types.js";
import { hostDependenciesStep } from "./common.js";

export const setupHost: PhaseDefinition = {
  name: "setup-host",
  summary: "Build required SNP components and set up host",

  logDir: (config) => config.setupDir,

  failureLogs: (context) => context.workDir.logFiles(context.config.setupDir),

  steps: (context) => [
    hostDependenciesStep(context),
    {
      id: "build-amdsev",
      description: `Building AMDSEV (${context.toolchain.amdsevBranch})`,
      isComplete: async () => (await readManifest(context.config.setupDir)) !== undefined,
      run: async () => {
        await context.toolchain.buildAmdsev();
      },
    },
    {
      id: "grub-default",
      description: "Setting the SNP host kernel as the grub default",
      isComplete: () => context.toolchain.isGrubDefaultSet(),
      run: () => context.toolchain.setGrubDefault(),
    },
  ],

  complete: (context) => {
    context.reporter.warn("The host must be rebooted for changes to take effect");
  },
};
