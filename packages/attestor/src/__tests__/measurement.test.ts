/**
 * Tests for measurement normalization, comparison and report parsing.
 */

import { describe, it, expect } from "vitest";
import { VerificationError } from "@snpctl/core";
import { Measurement, compareMeasurements } from "../measurement.js";
import {
  MEASUREMENT_OFFSET,
  extractDisplayMeasurement,
  parseBinaryReport,
} from "../report-parser.js";

const HEX = "3c5a".repeat(24);

function parse(raw: string): Measurement {
  const measurement = Measurement.tryParse(raw);
  if (!measurement) {
    throw new Error(`not a measurement: ${raw}`);
  }
  return measurement;
}

describe("Measurement", () => {
  it("should normalize case and separators", () => {
    expect(parse("3c 5a\n0F\t").hex).toBe("3C5A0F");
  });

  it("should treat differently formatted digests as equal", () => {
    const spaced = HEX.toUpperCase().match(/../g)?.join(" ") ?? "";
    expect(parse(HEX).equals(parse(spaced))).toBe(true);
    expect(compareMeasurements(parse(HEX), parse(spaced))).toBe("matched");
  });

  it("should report different digests as mismatched", () => {
    expect(compareMeasurements(parse("aa"), parse("ab"))).toBe("mismatched");
  });

  it("should reject empty or non-hex input", () => {
    expect(Measurement.tryParse("")).toBeUndefined();
    expect(Measurement.tryParse("  \n")).toBeUndefined();
    expect(Measurement.tryParse("xyz1")).toBeUndefined();
    expect(Measurement.tryParse("abc")).toBeUndefined();
  });
});

describe("extractDisplayMeasurement", () => {
  const display = [
    "Attestation Report (1184 bytes):",
    "Version:                      2",
    "Guest SVN:                    0",
    "Measurement:",
    "3C 5A 3C 5A 3C 5A 3C 5A 3C 5A 3C 5A 3C 5A 3C 5A",
    "3C 5A 3C 5A 3C 5A 3C 5A 3C 5A 3C 5A 3C 5A 3C 5A",
    "3C 5A 3C 5A 3C 5A 3C 5A 3C 5A 3C 5A 3C 5A 3C 5A",
    "",
    "Host Data:",
    "00 00 00 00 00 00 00 00 00 00 00 00 00 00 00 00",
  ].join("\n");

  it("should read the digest up to the next labeled field", () => {
    expect(extractDisplayMeasurement(display).hex).toBe(HEX.toUpperCase());
  });

  it("should accept a digest on the label line", () => {
    expect(extractDisplayMeasurement("Measurement: ab cd\nHost Data: 00\n").hex).toBe("ABCD");
  });

  it("should fail when the field is absent", () => {
    expect(() => extractDisplayMeasurement("Version: 2\n")).toThrow(VerificationError);
  });
});

describe("parseBinaryReport", () => {
  function report(version: number, length = 0x4a0): Uint8Array {
    const bytes = new Uint8Array(length);
    new DataView(bytes.buffer).setUint32(0, version, true);
    for (let i = 0; i < 48; i++) {
      bytes[MEASUREMENT_OFFSET + i] = i;
    }
    return bytes;
  }

  const expected = Array.from({ length: 48 }, (_, i) => i.toString(16).padStart(2, "0"))
    .join("")
    .toUpperCase();

  it("should read 48 bytes at offset 0x90 as upper-case hex", () => {
    const fields = parseBinaryReport(report(2));
    expect(fields.version).toBe(2);
    expect(fields.measurement.hex).toBe(expected);
  });

  it("should accept versions 3 and 5", () => {
    expect(parseBinaryReport(report(3)).version).toBe(3);
    expect(parseBinaryReport(report(5)).version).toBe(5);
  });

  it("should reject unknown versions", () => {
    expect(() => parseBinaryReport(report(1))).toThrow("Unsupported attestation report version 1");
  });

  it("should reject a truncated report", () => {
    expect(() => parseBinaryReport(report(2, 0x100))).toThrow(
      "Attestation report is 256 bytes, expected at least 1184"
    );
  });
});
