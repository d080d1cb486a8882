/**
 * @summary Expected launch measurement computed with sev-snp-measure.
 *
 * The digest depends only on the firmware, kernel, initrd, kernel command
 * line and the vCPU count and model, so it can be computed on the host
 * before or after the guest boots.
 */

import path from "node:path";
import {
  ArtifactError,
  MeasurementToolError,
  pathExists,
  runOrThrow,
  type BootInputs,
  type CommandRunner,
  type SnpctlConfig,
} from "@snpctl/core";
import { Measurement } from "./measurement.js";

export const MEASURE_TOOL = "sev-snp-measure";

/**
 * Arguments for one measurement run.
 */
export function measureArgs(inputs: BootInputs): string[] {
  return [
    "--mode=snp",
    `--vcpus=${inputs.vcpus}`,
    `--vcpu-type=${inputs.vcpuModel}`,
    "--output-format=hex",
    `--ovmf=${inputs.firmware}`,
    `--kernel=${inputs.kernel}`,
    `--initrd=${inputs.initrd}`,
    `--append=${inputs.append}`,
  ];
}

export class ExpectedMeasurementCalculator {
  constructor(
    private readonly config: SnpctlConfig,
    private readonly runner: CommandRunner
  ) {}

  /**
   * PATH with the per-user pip directory in front.
   */
  toolPath(): string {
    return [this.config.localBinDir, this.config.searchPath].join(path.delimiter);
  }

  async compute(inputs: BootInputs): Promise<Measurement> {
    const artifacts: Array<[string, string]> = [
      ["firmware", inputs.firmware],
      ["kernel", inputs.kernel],
      ["initrd", inputs.initrd],
    ];
    for (const [artifact, file] of artifacts) {
      if (!(await pathExists(file))) {
        throw new ArtifactError(artifact, file);
      }
    }

    const result = await runOrThrow(this.runner, {
      command: MEASURE_TOOL,
      args: measureArgs(inputs),
      env: { PATH: this.toolPath() },
    });

    const output = result.stdout.trim();
    if (output.length === 0) {
      throw new MeasurementToolError(`${MEASURE_TOOL} produced no measurement`);
    }
    const measurement = Measurement.tryParse(output);
    if (!measurement) {
      throw new MeasurementToolError(`${MEASURE_TOOL} printed an unexpected value: ${output}`);
    }
    return measurement;
  }
}
