#!/usr/bin/env node
/**
 * @summary Executable entry point for snpctl.
 *
 * Available commands:
 * - snpctl setup-host    - Build and install the SNP host stack
 * - snpctl launch-guest  - Provision and boot the SNP guest
 * - snpctl attest-guest  - Verify the guest's launch measurement
 * - snpctl stop-guests   - Stop the guest started from WORKING_DIR
 * - snpctl config        - Print the resolved configuration
 * - snpctl fetch-rhel-image - Download the RHEL KVM guest image
 */

import os from "node:os";
import chalk from "chalk";
import { runCli } from "./program.js";

runCli(process.argv.slice(2), { env: process.env, homeDir: os.homedir() })
  .then((status) => {
    process.exitCode = status;
  })
  .catch((error: unknown) => {
    console.error(chalk.red("Fatal error:"), error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
