/**
 * @summary Typed errors for host provisioning, guest launch and attestation.
 *
 * Every failure the workflow can hit is one of the classes below. Each
 * carries a machine-readable code and the context needed to explain it,
 * and maps to a process exit code through `exitCodeFor()`.
 *
 * Used by:
 * - Phase steps to signal specific failure modes
 * - The workflow engine to decide what to print and which status to return
 * - The CLI to turn a failure into an exit code
 */

// ---------------------------------------------------------------------------
// Base Error
// ---------------------------------------------------------------------------

/**
 * Base class for all snpctl errors.
 *
 * Provides common functionality including error code and optional cause.
 */
export abstract class SnpctlError extends Error {
  /** Machine-readable error code for programmatic handling */
  abstract readonly code: string;

  /** Process exit status reported when this error ends a phase */
  abstract readonly exitCode: ExitStatus;

  /** Original error that caused this error, if any */
  override readonly cause?: Error | undefined;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;

    // Maintains proper stack trace for where our error was thrown (V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      cause: this.cause?.message,
    };
  }
}

// ---------------------------------------------------------------------------
// Exit Codes
// ---------------------------------------------------------------------------

export const EXIT_CODES = {
  OK: 0,
  UNEXPECTED: 1,
  USAGE: 2,
  ENVIRONMENT: 3,
  ARTIFACT: 4,
  CONNECTIVITY: 5,
  REMOTE_COMMAND: 6,
  VERIFICATION: 7,
  RESIDUAL_PROCESS: 8,
} as const;

export type ExitStatus = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ---------------------------------------------------------------------------
// Usage Error
// ---------------------------------------------------------------------------

/**
 * Bad phase name, bad flag, or a configuration value that cannot be parsed.
 */
export class UsageError extends SnpctlError {
  readonly code = "USAGE" as const;
  readonly exitCode = EXIT_CODES.USAGE;
}

// ---------------------------------------------------------------------------
// Environment Error
// ---------------------------------------------------------------------------

/**
 * A host capability is missing (SNP disabled in firmware, a tool not on
 * PATH, a phase run out of order).
 */
export class EnvironmentError extends SnpctlError {
  readonly code = "ENVIRONMENT" as const;
  readonly exitCode = EXIT_CODES.ENVIRONMENT;

  /** What the operator should do about it */
  readonly remediation: string | undefined;

  constructor(message: string, remediation?: string, cause?: Error) {
    super(message, cause);
    this.remediation = remediation;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      remediation: this.remediation,
    };
  }
}

// ---------------------------------------------------------------------------
// Artifact Error
// ---------------------------------------------------------------------------

/**
 * A firmware, kernel, initrd, image or certificate file is missing or
 * unusable.
 */
export class ArtifactError extends SnpctlError {
  readonly code = "ARTIFACT" as const;
  readonly exitCode = EXIT_CODES.ARTIFACT;

  /** Which artifact (e.g. "firmware", "initrd") */
  readonly artifact: string;

  /** The path that was expected to hold it */
  readonly path: string;

  constructor(artifact: string, path: string, message?: string) {
    super(message ?? `${artifact} path specified does not exist: ${path}`);
    this.artifact = artifact;
    this.path = path;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      artifact: this.artifact,
      path: this.path,
    };
  }
}

// ---------------------------------------------------------------------------
// Connectivity Errors
// ---------------------------------------------------------------------------

/**
 * The remote shell transport could not reach the guest.
 */
export class ConnectivityError extends SnpctlError {
  readonly code = "CONNECTIVITY" as const;
  readonly exitCode = EXIT_CODES.CONNECTIVITY;

  /** host:port that was dialed */
  readonly endpoint: string;

  constructor(endpoint: string, detail?: string, cause?: Error) {
    super(
      `Unable to reach guest at ${endpoint}${detail ? `: ${detail}` : ""}`,
      cause
    );
    this.endpoint = endpoint;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      endpoint: this.endpoint,
    };
  }
}

/**
 * A bounded wait ran out of attempts.
 *
 * Distinct from whatever the polled operation itself threw; that error,
 * if any, is kept as `cause`.
 */
export class RetryTimeoutError extends SnpctlError {
  readonly code = "RETRY_TIMEOUT" as const;
  readonly exitCode = EXIT_CODES.CONNECTIVITY;

  /** What was being waited for */
  readonly operation: string;

  /** Number of attempts made */
  readonly attempts: number;

  constructor(operation: string, attempts: number, cause?: Error) {
    super(`Timed out waiting for ${operation} after ${attempts} attempts`, cause);
    this.operation = operation;
    this.attempts = attempts;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      operation: this.operation,
      attempts: this.attempts,
    };
  }
}

/**
 * An HTTP request to a download or token service failed.
 */
export class ServiceRequestError extends SnpctlError {
  readonly code = "SERVICE_REQUEST" as const;
  readonly exitCode = EXIT_CODES.CONNECTIVITY;

  readonly url: string;

  /** HTTP status, or 0 when no response arrived */
  readonly statusCode: number;

  constructor(url: string, statusCode: number, detail: string, cause?: Error) {
    super(`Request to ${url} failed: ${detail}`, cause);
    this.url = url;
    this.statusCode = statusCode;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      url: this.url,
      statusCode: this.statusCode,
    };
  }
}

// ---------------------------------------------------------------------------
// Command Errors
// ---------------------------------------------------------------------------

/**
 * A command exited non-zero. Both captured streams are kept verbatim.
 */
export class RemoteCommandError extends SnpctlError {
  readonly code = "REMOTE_COMMAND" as const;
  readonly exitCode = EXIT_CODES.REMOTE_COMMAND;

  /** The command line that failed */
  readonly command: string;

  /** Exit status reported by the command */
  readonly status: number;

  readonly stdout: string;
  readonly stderr: string;

  constructor(command: string, status: number, stdout: string, stderr: string) {
    super(`Command failed with exit code ${status}: ${command}`);
    this.command = command;
    this.status = status;
    this.stdout = stdout;
    this.stderr = stderr;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      command: this.command,
      status: this.status,
      stdout: this.stdout,
      stderr: this.stderr,
    };
  }
}

/**
 * The measurement tool ran but produced no digest.
 */
export class MeasurementToolError extends SnpctlError {
  readonly code = "MEASUREMENT_TOOL" as const;
  readonly exitCode = EXIT_CODES.ARTIFACT;
}

// ---------------------------------------------------------------------------
// Verification Errors
// ---------------------------------------------------------------------------

/**
 * Certificate chain or report signature verification failed.
 */
export class VerificationError extends SnpctlError {
  readonly code = "VERIFICATION_FAILED" as const;
  readonly exitCode = EXIT_CODES.VERIFICATION;

  /** Which check failed (e.g. "certificate-chain", "report-signature") */
  readonly check: string;

  constructor(check: string, message: string, cause?: Error) {
    super(message, cause);
    this.check = check;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      check: this.check,
    };
  }
}

/**
 * The expected launch measurement differs from the one in the report.
 */
export class MeasurementMismatchError extends SnpctlError {
  readonly code = "MEASUREMENT_MISMATCH" as const;
  readonly exitCode = EXIT_CODES.VERIFICATION;

  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string) {
    super("FAIL: measurements do not match");
    this.expected = expected;
    this.actual = actual;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      expected: this.expected,
      actual: this.actual,
    };
  }
}

/**
 * The host CPU is not one the certificate fetch paths know about.
 */
export class UnsupportedCpuError extends SnpctlError {
  readonly code = "UNSUPPORTED_CPU" as const;
  readonly exitCode = EXIT_CODES.ENVIRONMENT;

  readonly family: number;
  readonly model: number;
  readonly socketType: number | undefined;

  constructor(family: number, model: number, socketType?: number) {
    const socket = socketType === undefined ? "" : `, socket ${socketType}`;
    super(`Unsupported CPU: family ${family}, model ${model}${socket}`);
    this.family = family;
    this.model = model;
    this.socketType = socketType;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      family: this.family,
      model: this.model,
      socketType: this.socketType,
    };
  }
}

// ---------------------------------------------------------------------------
// Process Errors
// ---------------------------------------------------------------------------

/**
 * Guest processes were still running after stop-guests tried to kill them.
 */
export class ResidualProcessError extends SnpctlError {
  readonly code = "RESIDUAL_PROCESS" as const;
  readonly exitCode = EXIT_CODES.RESIDUAL_PROCESS;

  /** Process table lines that still match */
  readonly processes: readonly string[];

  constructor(processes: readonly string[]) {
    super(`FAIL: qemu processes still exist:\n${processes.join("\n")}`);
    this.processes = processes;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      processes: this.processes,
    };
  }
}

// ---------------------------------------------------------------------------
// Phase Failure
// ---------------------------------------------------------------------------

/**
 * A step aborted its phase. The exit code is the cause's.
 */
export class PhaseFailedError extends SnpctlError {
  readonly code = "PHASE_FAILED" as const;

  readonly exitCode: ExitStatus;
  readonly phase: string;
  readonly stepId: string;
  override readonly cause: Error;

  constructor(phase: string, stepId: string, cause: Error) {
    super(`${phase} failed at step "${stepId}": ${cause.message}`, cause);
    this.phase = phase;
    this.stepId = stepId;
    this.cause = cause;
    this.exitCode = exitCodeFor(cause);
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      phase: this.phase,
      stepId: this.stepId,
    };
  }
}

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

/**
 * Type guard to check if an error is an SnpctlError.
 */
export function isSnpctlError(error: unknown): error is SnpctlError {
  return error instanceof SnpctlError;
}

/**
 * Exit status for any thrown value.
 */
export function exitCodeFor(error: unknown): ExitStatus {
  if (isSnpctlError(error)) {
    return error.exitCode;
  }
  return EXIT_CODES.UNEXPECTED;
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
