/**
 * @summary In-process stand-ins for host commands, used by the test suites.
 */

import type { CommandResult, CommandRunner, CommandSpec } from "./command-runner.js";

export type CommandResponse =
  | Partial<CommandResult>
  | ((spec: CommandSpec) => Partial<CommandResult> | Promise<Partial<CommandResult>>);

interface Rule {
  match: (line: string, spec: CommandSpec) => boolean;
  response: CommandResponse;
  /** Remaining uses; undefined means unlimited */
  times: number | undefined;
}

/**
 * Plain space-joined command line, used for matching.
 */
export function commandLine(spec: CommandSpec): string {
  return [spec.command, ...spec.args].join(" ");
}

/**
 * CommandRunner that answers from scripted rules and records every call.
 *
 * Rules are checked newest first. A command no rule matches succeeds with
 * empty output.
 */
export class ScriptedCommandRunner implements CommandRunner {
  readonly calls: CommandSpec[] = [];
  private readonly rules: Rule[] = [];

  /**
   * Answer commands whose line contains `pattern` (or matches it).
   */
  on(pattern: string | RegExp, response: CommandResponse, times?: number): this {
    const match =
      typeof pattern === "string"
        ? (line: string) => line.includes(pattern)
        : (line: string) => pattern.test(line);
    this.rules.unshift({ match, response, times });
    return this;
  }

  /**
   * Answer commands selected by an arbitrary predicate.
   */
  when(
    predicate: (spec: CommandSpec) => boolean,
    response: CommandResponse,
    times?: number
  ): this {
    this.rules.unshift({ match: (_line, spec) => predicate(spec), response, times });
    return this;
  }

  async run(spec: CommandSpec): Promise<CommandResult> {
    this.calls.push(spec);
    const line = commandLine(spec);

    const rule = this.rules.find((candidate) => candidate.times !== 0 && candidate.match(line, spec));
    if (!rule) {
      return { stdout: "", stderr: "", exitCode: 0 };
    }
    if (rule.times !== undefined) {
      rule.times--;
    }

    const partial =
      typeof rule.response === "function" ? await rule.response(spec) : rule.response;
    return {
      stdout: partial.stdout ?? "",
      stderr: partial.stderr ?? "",
      exitCode: partial.exitCode ?? 0,
    };
  }

  /**
   * Command lines run so far, in order.
   */
  lines(): string[] {
    return this.calls.map(commandLine);
  }

  /**
   * Command lines containing `fragment`.
   */
  linesMatching(fragment: string): string[] {
    return this.lines().filter((line) => line.includes(fragment));
  }
}
