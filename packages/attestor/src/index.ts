/**
 * @summary Main entry point for @snpctl/attestor.
 *
 * Host CPU identification, expected launch measurement computation and
 * verification of the attestation report a guest obtains from the AMD
 * secure processor.
 *
 * @example
 * ```typescript
 * import { MeasurementVerifier, SnpguestClient } from "@snpctl/attestor";
 *
 * const verifier = new MeasurementVerifier({ config, runner });
 * const expected = await verifier.expectedMeasurement(session.boot);
 * const actual = await verifier.extractActual(new SnpguestClient(guest), display);
 * verifier.verify(expected, actual); // "matched" | "mismatched"
 * ```
 *
 * @packageDocumentation
 */

// === CPU ===
export type { CpuCodename, CpuIdentity, CpuidRegisters } from "./cpu-identifier.js";
export {
  CPU_MODEL_TABLE,
  CPUID_COMMAND,
  CpuIdentifier,
  parseCpuidOutput,
  decodeFamily,
  decodeModel,
  decodeSocketType,
  codenameFor,
  decodeCpuIdentity,
} from "./cpu-identifier.js";

// === Measurements ===
export type { ComparisonResult } from "./measurement.js";
export { Measurement, compareMeasurements } from "./measurement.js";

export { MEASURE_TOOL, measureArgs, ExpectedMeasurementCalculator } from "./expected-measurement.js";

// === Reports ===
export type { BinaryReportFields } from "./report-parser.js";
export {
  MEASUREMENT_OFFSET,
  MEASUREMENT_LENGTH,
  REPORT_MIN_LENGTH,
  SUPPORTED_REPORT_VERSIONS,
  extractDisplayMeasurement,
  parseBinaryReport,
} from "./report-parser.js";

export { REPORT_FILE, REQUEST_FILE, SEV_GUEST_MODULE, SnpguestClient } from "./snpguest.js";

// === Verification ===
export type { MeasurementVerifierOptions } from "./measurement-verifier.js";
export { MeasurementVerifier } from "./measurement-verifier.js";
