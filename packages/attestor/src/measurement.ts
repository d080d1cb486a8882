/**
 * @summary Launch measurement value type.
 *
 * A measurement is a hex digest. Tools print it with different case, with
 * spaces between bytes and sometimes split across lines, so equality is
 * defined on the normalized form.
 */

export class Measurement {
  private constructor(
    /** Upper-case hex without separators */
    readonly hex: string
  ) {}

  /**
   * Parse a digest, ignoring whitespace and other non-printable characters.
   * Returns undefined for empty or non-hex input.
   */
  static tryParse(raw: string): Measurement | undefined {
    const compact = raw.replace(/[^\x21-\x7e]/g, "");
    if (compact.length === 0 || compact.length % 2 !== 0 || !/^[0-9a-f]+$/i.test(compact)) {
      return undefined;
    }
    return new Measurement(compact.toUpperCase());
  }

  static fromBytes(bytes: Uint8Array): Measurement {
    return new Measurement(Buffer.from(bytes).toString("hex").toUpperCase());
  }

  equals(other: Measurement): boolean {
    return this.hex === other.hex;
  }

  toString(): string {
    return this.hex;
  }
}

export type ComparisonResult = "matched" | "mismatched";

export function compareMeasurements(expected: Measurement, actual: Measurement): ComparisonResult {
  return expected.equals(actual) ? "matched" : "mismatched";
}
