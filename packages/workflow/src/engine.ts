/**
 * @summary Runs a phase as a total order of resumable steps.
 *
 * Steps that already completed (marker present or `isComplete` true)
 * are skipped. The first failing step aborts the phase with
 * `PhaseFailedError`; the next invocation resumes at the first incomplete
 * step. `run()` turns the outcome into a process exit status and prints
 * the phase's logs on failure.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { CpuIdentifier, MeasurementVerifier } from "@snpctl/attestor";
import {
  EXIT_CODES,
  EnvironmentError,
  LoggingCommandRunner,
  PhaseFailedError,
  RetryPoller,
  UsageError,
  WorkingDirectory,
  exitCodeFor,
  isSnpctlError,
  prefixedReporter,
  toError,
  type CommandRunner,
  type ExitStatus,
  type Reporter,
  type SnpctlConfig,
} from "@snpctl/core";
import { GuestProcessControl, PsProcessTable, type ProcessTable } from "@snpctl/launcher";
import { SshRemoteExecutor, type RemoteExecutor, type SshTarget } from "@snpctl/transport-ssh";
import { HostToolchain } from "./host-toolchain.js";
import { PHASE_DEFINITIONS } from "./phases/index.js";
import {
  PHASES,
  isPhaseName,
  type PhaseContext,
  type PhaseDefinition,
  type PhaseResult,
  type Step,
  type WorkflowServices,
} from "./types.js";

export class WorkflowEngine {
  private readonly config: SnpctlConfig;
  private readonly runner: CommandRunner;
  private readonly reporter: Reporter;
  private readonly poller: RetryPoller;
  private readonly processes: ProcessTable | undefined;
  private readonly executorFor: (target: SshTarget, runner: CommandRunner) => RemoteExecutor;
  private readonly clock: () => Date;
  private readonly workDir: WorkingDirectory;

  constructor(services: WorkflowServices) {
    this.config = services.config;
    this.runner = services.runner;
    this.reporter = services.reporter;
    this.poller = services.poller ?? new RetryPoller();
    this.processes = services.processes;
    this.executorFor =
      services.executorFor ?? ((target, runner) => new SshRemoteExecutor(target, runner));
    this.clock = services.clock ?? (() => new Date());
    this.workDir = new WorkingDirectory(this.config);
  }

  /**
   * Run a phase and return its exit status. Never throws.
   */
  async run(phase: string): Promise<ExitStatus> {
    try {
      await this.runPhase(phase);
      return EXIT_CODES.OK;
    } catch (err) {
      await this.reportFailure(err);
      return exitCodeFor(err);
    }
  }

  /**
   * Run a phase, throwing `UsageError` for an unknown phase and
   * `PhaseFailedError` for a failed step.
   */
  async runPhase(phase: string): Promise<PhaseResult> {
    const definition = this.definitionFor(phase);
    const context = this.contextFor(definition);
    const result: PhaseResult = { phase: definition.name, executed: [], skipped: [] };

    await this.workDir.ensure(this.config.workingDir);
    await context.log.reset();

    for (const step of definition.steps(context)) {
      if (await this.isComplete(step)) {
        context.reporter.skip(`${step.description}: previously completed`);
        result.skipped.push(step.id);
        continue;
      }

      context.reporter.step(step.description);
      try {
        await step.run();
        if (step.marker) {
          await this.workDir.writeMarker(step.marker.dir, step.marker.name);
        }
      } catch (err) {
        throw new PhaseFailedError(definition.name, step.id, toError(err));
      }
      result.executed.push(step.id);
    }

    definition.complete?.(context);
    return result;
  }

  private definitionFor(phase: string): PhaseDefinition {
    if (!isPhaseName(phase)) {
      throw new UsageError(
        `Unsupported command: [${phase}]. Expected one of: ${PHASES.join(", ")}`
      );
    }
    return PHASE_DEFINITIONS[phase];
  }

  private async isComplete(step: Step): Promise<boolean> {
    if (step.marker && (await this.workDir.hasMarker(step.marker.dir, step.marker.name))) {
      return true;
    }
    return step.isComplete ? step.isComplete() : false;
  }

  private contextFor(definition: PhaseDefinition): PhaseContext & { log: LoggingCommandRunner } {
    const reporter = prefixedReporter(this.reporter, definition.name);
    const logFile = path.join(definition.logDir(this.config), `${definition.name}.log`);
    const runner = new LoggingCommandRunner(this.runner, logFile, reporter);

    return {
      log: runner,
      phase: definition.name,
      config: this.config,
      runner,
      reporter,
      poller: this.poller,
      workDir: this.workDir,
      guests: new GuestProcessControl({
        runner,
        processes: this.processes ?? new PsProcessTable(runner),
        poller: this.poller,
        reporter,
      }),
      toolchain: new HostToolchain(this.config, runner, reporter),
      cpuIdentifier: new CpuIdentifier(runner),
      verifier: new MeasurementVerifier({ config: this.config, runner }),
      executorFor: (target) => this.executorFor(target, runner),
      now: this.clock,
    };
  }

  // ---------------------------------------------------------------------------
  // Failure Reporting
  // ---------------------------------------------------------------------------

  private async reportFailure(err: unknown): Promise<void> {
    const error = toError(err);
    this.reporter.error(error.message);

    const cause = error instanceof PhaseFailedError ? error.cause : error;
    if (cause instanceof EnvironmentError && cause.remediation) {
      this.reporter.info(cause.remediation);
    }
    if (!isSnpctlError(cause)) {
      this.reporter.debug(error.stack ?? error.message);
    }

    if (error instanceof PhaseFailedError && isPhaseName(error.phase)) {
      const definition = PHASE_DEFINITIONS[error.phase];
      const logs = await definition.failureLogs(this.contextFor(definition));
      for (const file of logs) {
        await this.printLog(file);
      }
    }
  }

  private async printLog(file: string): Promise<void> {
    let text: string;
    try {
      text = await fs.readFile(file, "utf-8");
    } catch {
      return;
    }
    this.reporter.info(`==> ${file} <==`);
    if (text.length > 0) {
      this.reporter.info(text.trimEnd());
    }
  }
}
