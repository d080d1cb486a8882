/**
 * @summary Append-only QEMU parameter list persisted as an executable script.
 *
 * Every append rewrites the command file, so the file on disk always shows
 * exactly what has been assembled so far. The file doubles as the audit
 * record of how the guest was started; a JSON twin keeps the same
 * parameters in structured form for tooling that inspects a launch.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { quoteArg } from "@snpctl/core";

/**
 * One option with its values, e.g. `["-smp", "4"]`.
 */
export type BootParameter = readonly string[];

export interface BootParameterDocument {
  bin: string;
  params: string[][];
}

const SCRIPT_HEADER = "#!/bin/bash\n";

/**
 * Path of the JSON twin for a command file (`qemu.cmdline` -> `qemu.params.json`).
 */
export function paramsFileFor(commandFile: string): string {
  const base = path.basename(commandFile, path.extname(commandFile));
  return path.join(path.dirname(commandFile), `${base}.params.json`);
}

export class BootParameterSet {
  private readonly entries: BootParameter[] = [];

  private constructor(
    readonly commandFile: string,
    readonly bin: string
  ) {}

  /**
   * Start a new set, truncating any command file left from an earlier run.
   */
  static async create(commandFile: string, bin: string): Promise<BootParameterSet> {
    const set = new BootParameterSet(commandFile, bin);
    await fs.mkdir(path.dirname(commandFile), { recursive: true });
    await set.persist();
    return set;
  }

  /**
   * Add one option and persist immediately.
   */
  async append(...param: string[]): Promise<void> {
    this.entries.push([...param]);
    await this.persist();
  }

  /**
   * Render the executable command file contents.
   */
  materialize(): string {
    const lines = [quoteArg(this.bin), ...this.entries.map(renderParam)];
    return `${SCRIPT_HEADER}${lines.join(" \\\n")}\n`;
  }

  toDocument(): BootParameterDocument {
    return { bin: this.bin, params: this.entries.map((entry) => [...entry]) };
  }

  private async persist(): Promise<void> {
    await fs.writeFile(this.commandFile, this.materialize(), { encoding: "utf-8", mode: 0o755 });
    await fs.chmod(this.commandFile, 0o755);
    await fs.writeFile(
      paramsFileFor(this.commandFile),
      `${JSON.stringify(this.toDocument(), null, 2)}\n`,
      "utf-8"
    );
  }
}

function renderParam(param: BootParameter): string {
  return param.map(quoteArg).join(" ");
}
