/**
 * @summary Measurement extraction from attestation reports.
 *
 * Two flavors:
 * - display: the text `snpguest display report` prints, where the digest
 *   follows the `Measurement:` label and runs until the next label
 * - binary: the raw report, where the digest is 48 bytes at offset 0x90
 *
 * Only the version, length and measurement fields are interpreted.
 */

import { VerificationError } from "@snpctl/core";
import { Measurement } from "./measurement.js";

/** Offset of the launch measurement in the binary report */
export const MEASUREMENT_OFFSET = 0x90;

export const MEASUREMENT_LENGTH = 48;

/** Size of a complete report including its signature */
export const REPORT_MIN_LENGTH = 0x4a0;

/** Report layouts whose measurement sits at MEASUREMENT_OFFSET */
export const SUPPORTED_REPORT_VERSIONS: readonly number[] = [2, 3, 5];

const LABEL_LINE = /^[A-Za-z][A-Za-z0-9 ()/_-]*:/;

/**
 * Extract the digest that follows `Measurement:` in display output.
 */
export function extractDisplayMeasurement(text: string): Measurement {
  const lines = text.split(/\r?\n/);
  const start = lines.findIndex((line) => line.trimStart().startsWith("Measurement:"));
  if (start < 0) {
    throw new VerificationError(
      "report-measurement",
      "Attestation report display has no Measurement field"
    );
  }

  const first = lines[start] ?? "";
  const collected = [first.slice(first.indexOf("Measurement:") + "Measurement:".length)];
  for (const line of lines.slice(start + 1)) {
    if (LABEL_LINE.test(line.trim())) {
      break;
    }
    collected.push(line);
  }

  const measurement = Measurement.tryParse(collected.join(""));
  if (!measurement) {
    throw new VerificationError(
      "report-measurement",
      "Attestation report Measurement field is not a hex digest"
    );
  }
  return measurement;
}

export interface BinaryReportFields {
  version: number;
  measurement: Measurement;
}

/**
 * Read the version and measurement from a raw report.
 */
export function parseBinaryReport(report: Uint8Array): BinaryReportFields {
  if (report.length < REPORT_MIN_LENGTH) {
    throw new VerificationError(
      "report-format",
      `Attestation report is ${report.length} bytes, expected at least ${REPORT_MIN_LENGTH}`
    );
  }

  const view = new DataView(report.buffer, report.byteOffset, report.byteLength);
  const version = view.getUint32(0, true);
  if (!SUPPORTED_REPORT_VERSIONS.includes(version)) {
    throw new VerificationError(
      "report-format",
      `Unsupported attestation report version ${version}`
    );
  }

  return {
    version,
    measurement: Measurement.fromBytes(
      report.subarray(MEASUREMENT_OFFSET, MEASUREMENT_OFFSET + MEASUREMENT_LENGTH)
    ),
  };
}
