/**
 * @summary Host command execution seam.
 *
 * Every external program the workflow touches (apt, git, make, qemu, ssh,
 * cpuid, dmesg, ...) runs through a `CommandRunner`. The default
 * implementation spawns the process and captures both streams;
 * `LoggingCommandRunner` additionally appends each invocation to the
 * phase log.
 */

import { spawn } from "node:child_process";
import fs from "node:fs/promises";
import path from "node:path";
import type { Reporter } from "./reporter.js";
import { EnvironmentError, RemoteCommandError, toError } from "./types/errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CommandSpec {
  /** Program to execute */
  command: string;
  args: readonly string[];
  cwd?: string;
  /** Extra environment, merged over the current process environment */
  env?: Readonly<Record<string, string>>;
  /** Written to stdin, which is then closed */
  input?: string;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandRunner {
  run(spec: CommandSpec): Promise<CommandResult>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Build a spec that runs a script through bash.
 */
export function shell(script: string, options: Omit<CommandSpec, "command" | "args"> = {}): CommandSpec {
  return { command: "bash", args: ["-c", script], ...options };
}

/**
 * Quote a single argument for display and for bash scripts.
 */
export function quoteArg(arg: string): string {
  if (arg !== "" && /^[A-Za-z0-9_@%+=:,./-]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render a spec as a single command line.
 */
export function formatCommand(spec: CommandSpec): string {
  return [spec.command, ...spec.args].map(quoteArg).join(" ");
}

/**
 * Run a command and throw `RemoteCommandError` on a non-zero exit.
 */
export async function runOrThrow(
  runner: CommandRunner,
  spec: CommandSpec
): Promise<CommandResult> {
  const result = await runner.run(spec);
  if (result.exitCode !== 0) {
    throw new RemoteCommandError(
      formatCommand(spec),
      result.exitCode,
      result.stdout,
      result.stderr
    );
  }
  return result;
}

// ---------------------------------------------------------------------------
// Spawn Runner
// ---------------------------------------------------------------------------

/**
 * Runs commands as child processes and captures their output.
 */
export class SpawnCommandRunner implements CommandRunner {
  run(spec: CommandSpec): Promise<CommandResult> {
    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(spec.command, [...spec.args], {
        cwd: spec.cwd,
        env: spec.env ? { ...process.env, ...spec.env } : process.env,
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

      child.on("error", (err: NodeJS.ErrnoException) => {
        if (err.code === "ENOENT") {
          reject(
            new EnvironmentError(
              `Command not found: ${spec.command}`,
              `Install ${spec.command} and make sure it is on PATH`,
              err
            )
          );
          return;
        }
        reject(toError(err));
      });

      child.on("close", (code, signal) => {
        resolve({
          stdout: Buffer.concat(stdout).toString("utf-8"),
          stderr: Buffer.concat(stderr).toString("utf-8"),
          // Killed by a signal: report the shell convention 128 + n
          exitCode: code ?? (signal ? 128 + signalNumber(signal) : 1),
        });
      });

      child.stdin.on("error", (err: NodeJS.ErrnoException) => {
        // The child exited without reading its input; its exit status reports the outcome
        if (err.code !== "EPIPE") {
          reject(toError(err));
        }
      });

      if (spec.input !== undefined) {
        child.stdin.write(spec.input);
      }
      child.stdin.end();
    });
  }
}

function signalNumber(signal: NodeJS.Signals): number {
  switch (signal) {
    case "SIGHUP":
      return 1;
    case "SIGINT":
      return 2;
    case "SIGKILL":
      return 9;
    case "SIGTERM":
      return 15;
    default:
      return 0;
  }
}

// ---------------------------------------------------------------------------
// Logging Runner
// ---------------------------------------------------------------------------

/**
 * Decorates a runner so that every invocation is appended to a log file.
 */
export class LoggingCommandRunner implements CommandRunner {
  constructor(
    private readonly inner: CommandRunner,
    readonly logFile: string,
    private readonly reporter?: Reporter
  ) {}

  /**
   * Empty the log so it holds only the run about to start.
   */
  async reset(): Promise<void> {
    await fs.mkdir(path.dirname(this.logFile), { recursive: true });
    await fs.writeFile(this.logFile, "", "utf-8");
  }

  async run(spec: CommandSpec): Promise<CommandResult> {
    const line = formatCommand(spec);
    this.reporter?.debug(`$ ${line}`);

    await fs.mkdir(path.dirname(this.logFile), { recursive: true });
    await fs.appendFile(this.logFile, `$ ${line}\n`, "utf-8");

    let result: CommandResult;
    try {
      result = await this.inner.run(spec);
    } catch (err) {
      await fs.appendFile(this.logFile, `! ${toError(err).message}\n`, "utf-8");
      throw err;
    }

    const body = [result.stdout, result.stderr]
      .filter((text) => text.length > 0)
      .map((text) => (text.endsWith("\n") ? text : `${text}\n`))
      .join("");
    await fs.appendFile(this.logFile, `${body}[exit ${result.exitCode}]\n`, "utf-8");
    return result;
  }
}
