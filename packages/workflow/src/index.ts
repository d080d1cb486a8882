/**
 * @summary Main entry point for @snpctl/workflow.
 *
 * The workflow engine and the four phases it runs: setup-host,
 * launch-guest, attest-guest and stop-guests.
 *
 * @example
 * ```typescript
 * import { WorkflowEngine } from "@snpctl/workflow";
 *
 * const engine = new WorkflowEngine({ config, runner, reporter });
 * process.exitCode = await engine.run("launch-guest");
 * ```
 *
 * @packageDocumentation
 */

export { WorkflowEngine } from "./engine.js";

export type {
  PhaseName,
  Step,
  StepMarker,
  PhaseResult,
  WorkflowServices,
  PhaseContext,
  PhaseDefinition,
} from "./types.js";
export { PHASES, isPhaseName } from "./types.js";

export {
  PHASE_DEFINITIONS,
  setupHost,
  launchGuest,
  attestGuest,
  stopGuests,
  FirstBootProvisioner,
  AttestationRun,
  ATTESTATION_TRANSITIONS,
  isTerminalAttestationState,
  SNP_ACTIVE_PATTERN,
} from "./phases/index.js";
export type { FirstBootState, AttestationState } from "./phases/index.js";

export {
  HostToolchain,
  APT_PACKAGES,
  NASM_SOURCE_URL,
  RUSTUP_URL,
  KVM_DEBUG_SWAP_PARAM,
  SEV_DEVICE,
} from "./host-toolchain.js";

export type { GrubEntry } from "./grub.js";
export {
  GRUB_DEFAULT_FILE,
  GRUB_DEFAULT_BACKUP,
  GRUB_CFG_FILE,
  grubDefaultNames,
  resolveGrubEntry,
  setGrubDefault,
} from "./grub.js";

export type { KernelFlavor } from "./kernel-config.js";
export { parseKernelRelease, readKernelRelease } from "./kernel-config.js";
