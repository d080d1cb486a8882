/**
 * @summary Main entry point for @snpctl/core.
 *
 * Shared building blocks for the snpctl workflow: the error taxonomy and
 * exit codes, the immutable configuration, the reporter and command runner
 * seams, the retry poller, and the persisted state (markers, manifests,
 * guest session).
 *
 * Usage:
 * ```typescript
 * import { loadConfig, RetryPoller, SpawnCommandRunner } from "@snpctl/core";
 * ```
 */

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export type { ExitStatus } from "./types/errors.js";

export {
  EXIT_CODES,
  SnpctlError,
  UsageError,
  EnvironmentError,
  ArtifactError,
  ConnectivityError,
  RetryTimeoutError,
  ServiceRequestError,
  RemoteCommandError,
  MeasurementToolError,
  VerificationError,
  MeasurementMismatchError,
  UnsupportedCpuError,
  ResidualProcessError,
  PhaseFailedError,
  isSnpctlError,
  exitCodeFor,
  toError,
} from "./types/errors.js";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export type {
  ReportFormat,
  SnpctlConfig,
  GuestConfig,
  SourceConfig,
  ConfigOverrides,
  Environment,
  ConfigKey,
} from "./config.js";

export { CONFIG_KEYS, loadConfig, describeConfig } from "./config.js";

// ---------------------------------------------------------------------------
// Reporting
// ---------------------------------------------------------------------------

export type { Reporter, ReportLevel, ReportEntry } from "./reporter.js";

export { RecordingReporter, prefixedReporter } from "./reporter.js";

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

export type { CommandSpec, CommandResult, CommandRunner } from "./command-runner.js";

export {
  SpawnCommandRunner,
  LoggingCommandRunner,
  shell,
  quoteArg,
  formatCommand,
  runOrThrow,
} from "./command-runner.js";

// ---------------------------------------------------------------------------
// Polling
// ---------------------------------------------------------------------------

export type { PollOptions, PollOutcome, Predicate, Sleep } from "./retry-poller.js";

export { RetryPoller, DEFAULT_POLL_OPTIONS } from "./retry-poller.js";

// ---------------------------------------------------------------------------
// Persisted State
// ---------------------------------------------------------------------------

export type { PhaseDirName } from "./working-directory.js";

export { WorkingDirectory, MARKERS, pathExists } from "./working-directory.js";

export type { BinaryManifest } from "./manifest.js";

export {
  MANIFEST_FILE,
  manifestPath,
  isBinaryManifest,
  readManifest,
  writeManifest,
  assertManifestArtifacts,
} from "./manifest.js";

export type { BootInputs, GuestSession } from "./session.js";

export {
  SESSION_FILE,
  sessionPath,
  isGuestSession,
  readSession,
  writeSession,
  removeSession,
} from "./session.js";

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

export { isRecord } from "./utils/guards.js";

// ---------------------------------------------------------------------------
// Test Support
// ---------------------------------------------------------------------------

export type { CommandResponse } from "./testing.js";

export { ScriptedCommandRunner, commandLine } from "./testing.js";
