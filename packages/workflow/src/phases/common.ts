/**
 * @summary Steps and lookups shared by several phases.
 */

import {
  EnvironmentError,
  MARKERS,
  readSession,
  type GuestSession,
  type SnpctlConfig,
} from "@snpctl/core";
import type { SshTarget } from "@snpctl/transport-ssh";
import type { PhaseContext, Step } from "../types.js";

/**
 * Host package installation, shared by setup, launch and attest through one
 * marker in WORKING_DIR.
 */
export function hostDependenciesStep(context: PhaseContext): Step {
  return {
    id: "host-dependencies",
    description: "Installing host dependencies",
    marker: { dir: context.config.workingDir, name: MARKERS.DEPENDENCIES_INSTALLED },
    run: () => context.toolchain.installDependencies(),
  };
}

export function sessionTarget(session: GuestSession): SshTarget {
  return { port: session.hostSshPort, keyPath: session.sshKeyPath, user: session.user };
}

export function configTarget(config: SnpctlConfig): SshTarget {
  return {
    port: config.guest.hostSshPort,
    keyPath: config.guest.sshKeyPath,
    user: config.guest.user,
  };
}

/**
 * The session written by launch-guest.
 */
export async function requireSession(config: SnpctlConfig): Promise<GuestSession> {
  const session = await readSession(config.launchDir);
  if (session === undefined) {
    throw new EnvironmentError(
      `No guest session found in ${config.launchDir}`,
      "Run 'launch-guest' before 'attest-guest'"
    );
  }
  return session;
}
