/**
 * @summary Host process table access.
 *
 * Guest control only needs to list processes and kill one.
 * The default implementation shells out to `ps` and `kill` through the
 * command runner.
 */

import type { CommandRunner } from "@snpctl/core";

export interface ProcessEntry {
  pid: number;
  /** Full argument line */
  command: string;
}

export interface ProcessTable {
  list(): Promise<ProcessEntry[]>;
  /** Send SIGKILL. A pid that is already gone is not an error. */
  kill(pid: number): Promise<void>;
}

/**
 * Parse `ps -eo pid=,args=` output.
 */
export function parsePsOutput(output: string): ProcessEntry[] {
  const entries: ProcessEntry[] = [];
  for (const line of output.split("\n")) {
    const match = /^\s*(\d+)\s+(.*)$/.exec(line);
    if (match?.[1] && match[2] !== undefined) {
      entries.push({ pid: parseInt(match[1], 10), command: match[2] });
    }
  }
  return entries;
}

export class PsProcessTable implements ProcessTable {
  constructor(private readonly runner: CommandRunner) {}

  async list(): Promise<ProcessEntry[]> {
    const result = await this.runner.run({ command: "ps", args: ["-eo", "pid=,args="] });
    return parsePsOutput(result.stdout);
  }

  async kill(pid: number): Promise<void> {
    await this.runner.run({ command: "kill", args: ["-9", String(pid)] });
  }
}
