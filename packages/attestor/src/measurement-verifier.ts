/**
 * @summary Expected-vs-actual launch measurement verification.
 *
 * The expected digest is computed on the host from the boot inputs; the
 * actual digest comes from a report the guest requests from the AMD secure
 * processor, after its certificate chain and signature have been checked.
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { BootInputs, CommandRunner, SnpctlConfig } from "@snpctl/core";
import { ExpectedMeasurementCalculator } from "./expected-measurement.js";
import { compareMeasurements, type ComparisonResult, type Measurement } from "./measurement.js";
import { extractDisplayMeasurement, parseBinaryReport } from "./report-parser.js";
import { REPORT_FILE, type SnpguestClient } from "./snpguest.js";

export interface MeasurementVerifierOptions {
  config: SnpctlConfig;
  /** Runs sev-snp-measure on the host */
  runner: CommandRunner;
}

export class MeasurementVerifier {
  private readonly config: SnpctlConfig;
  private readonly calculator: ExpectedMeasurementCalculator;

  constructor(options: MeasurementVerifierOptions) {
    this.config = options.config;
    this.calculator = new ExpectedMeasurementCalculator(options.config, options.runner);
  }

  expectedMeasurement(inputs: BootInputs): Promise<Measurement> {
    return this.calculator.compute(inputs);
  }

  /**
   * Read the measurement in the configured report flavor from a report the
   * guest has already requested and verified.
   */
  async extractActual(client: SnpguestClient, display: string): Promise<Measurement> {
    if (this.config.reportFormat === "display") {
      return extractDisplayMeasurement(display);
    }

    await fs.mkdir(this.config.attestDir, { recursive: true });
    await client.downloadReport(this.config.attestDir);
    const report = await fs.readFile(path.join(this.config.attestDir, REPORT_FILE));
    return parseBinaryReport(report).measurement;
  }

  verify(expected: Measurement, actual: Measurement): ComparisonResult {
    return compareMeasurements(expected, actual);
  }
}
