/**
 * @summary Types shared by the workflow engine and its phases.
 */

import type { CpuIdentifier, MeasurementVerifier } from "@snpctl/attestor";
import type {
  CommandRunner,
  Reporter,
  RetryPoller,
  SnpctlConfig,
  WorkingDirectory,
} from "@snpctl/core";
import type { GuestProcessControl, ProcessTable } from "@snpctl/launcher";
import type { RemoteExecutor, SshTarget } from "@snpctl/transport-ssh";
import type { HostToolchain } from "./host-toolchain.js";

// ---------------------------------------------------------------------------
// Phases
// ---------------------------------------------------------------------------

export const PHASES = ["setup-host", "launch-guest", "attest-guest", "stop-guests"] as const;

export type PhaseName = (typeof PHASES)[number];

export function isPhaseName(value: string): value is PhaseName {
  return PHASES.some((phase) => phase === value);
}

// ---------------------------------------------------------------------------
// Steps
// ---------------------------------------------------------------------------

/**
 * Marker file that records a completed step.
 */
export interface StepMarker {
  dir: string;
  name: string;
}

/**
 * One unit of work in a phase.
 *
 * A step with a marker or an `isComplete` check is skipped once either
 * reports completion. A step with neither runs every time.
 */
export interface Step {
  /** Stable identifier, reported in `PhaseFailedError` */
  id: string;
  /** Progress line shown when the step starts */
  description: string;
  marker?: StepMarker;
  isComplete?: () => Promise<boolean>;
  run: () => Promise<void>;
}

export interface PhaseResult {
  phase: PhaseName;
  executed: string[];
  skipped: string[];
}

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------

/**
 * Collaborators the engine is built from. Everything except config, runner
 * and reporter has a production default.
 */
export interface WorkflowServices {
  config: SnpctlConfig;
  runner: CommandRunner;
  reporter: Reporter;
  poller?: RetryPoller;
  processes?: ProcessTable;
  /** Build the executor that reaches a guest */
  executorFor?: (target: SshTarget, runner: CommandRunner) => RemoteExecutor;
  clock?: () => Date;
}

/**
 * What a phase's steps work with. The runner logs to the phase log and the
 * reporter prefixes every line with the phase name.
 */
export interface PhaseContext {
  phase: PhaseName;
  config: SnpctlConfig;
  runner: CommandRunner;
  reporter: Reporter;
  poller: RetryPoller;
  workDir: WorkingDirectory;
  guests: GuestProcessControl;
  toolchain: HostToolchain;
  cpuIdentifier: CpuIdentifier;
  verifier: MeasurementVerifier;
  executorFor: (target: SshTarget) => RemoteExecutor;
  now: () => Date;
}

export interface PhaseDefinition {
  name: PhaseName;
  /** One-line help text */
  summary: string;
  /** Directory receiving `<phase>.log` */
  logDir(config: SnpctlConfig): string;
  /** Logs printed when the phase fails */
  failureLogs(context: PhaseContext): Promise<string[]>;
  steps(context: PhaseContext): Step[];
  /** Closing messages after every step succeeded */
  complete?(context: PhaseContext): void;
}
