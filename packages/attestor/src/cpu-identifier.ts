/**
 * @summary Host CPU identification from CPUID leaf 0x80000001.
 *
 * The codename selects which AMD certificate chain and VCEK endpoint
 * snpguest fetches from. It is computed on every attestation run and never
 * persisted.
 */

import {
  EnvironmentError,
  UnsupportedCpuError,
  runOrThrow,
  type CommandRunner,
} from "@snpctl/core";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type CpuCodename =
  | "naples"
  | "rome"
  | "milan"
  | "genoa"
  | "bergamo"
  | "siena"
  | "turin";

export interface CpuIdentity {
  family: number;
  model: number;
  socketType: number;
  codename: CpuCodename;
}

export interface CpuidRegisters {
  eax: number;
  ebx: number;
}

interface ModelRange {
  family: number;
  minModel: number;
  maxModel: number;
  /** Required socket type; any socket when absent */
  socketType?: number;
  codename: CpuCodename;
}

/**
 * Known SEV-capable parts. Ranges are inclusive.
 */
export const CPU_MODEL_TABLE: readonly ModelRange[] = [
  { family: 0x17, minModel: 0x00, maxModel: 0x0f, codename: "naples" },
  { family: 0x17, minModel: 0x30, maxModel: 0x3f, codename: "rome" },
  { family: 0x19, minModel: 0x00, maxModel: 0x0f, codename: "milan" },
  { family: 0x19, minModel: 0x10, maxModel: 0x1f, codename: "genoa" },
  { family: 0x19, minModel: 0xa0, maxModel: 0xaf, socketType: 0x4, codename: "bergamo" },
  { family: 0x19, minModel: 0xa0, maxModel: 0xaf, socketType: 0x8, codename: "siena" },
  { family: 0x1a, minModel: 0x00, maxModel: 0x11, codename: "turin" },
];

export const CPUID_COMMAND = ["-1", "-r", "-l", "0x80000001"] as const;

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

/**
 * Pull EAX and EBX out of raw `cpuid -r` output.
 */
export function parseCpuidOutput(output: string): CpuidRegisters | undefined {
  const eax = /eax=(0x[0-9a-f]+)/i.exec(output);
  const ebx = /ebx=(0x[0-9a-f]+)/i.exec(output);
  if (!eax?.[1] || !ebx?.[1]) {
    return undefined;
  }
  return { eax: parseInt(eax[1], 16), ebx: parseInt(ebx[1], 16) };
}

export function decodeFamily(eax: number): number {
  const baseFamily = (eax >>> 8) & 0xf;
  const extendedFamily = (eax >>> 20) & 0xff;
  return baseFamily === 0xf ? baseFamily + extendedFamily : baseFamily;
}

export function decodeModel(eax: number): number {
  const baseModel = (eax >>> 4) & 0xf;
  const extendedModel = (eax >>> 16) & 0xf;
  return (extendedModel << 4) | baseModel;
}

export function decodeSocketType(ebx: number): number {
  return (ebx >>> 28) & 0xf;
}

/**
 * Look up the codename for a family/model/socket triple.
 */
export function codenameFor(
  family: number,
  model: number,
  socketType: number
): CpuCodename {
  const match = CPU_MODEL_TABLE.find(
    (range) =>
      range.family === family &&
      model >= range.minModel &&
      model <= range.maxModel &&
      (range.socketType === undefined || range.socketType === socketType)
  );
  if (!match) {
    throw new UnsupportedCpuError(family, model, socketType);
  }
  return match.codename;
}

export function decodeCpuIdentity(registers: CpuidRegisters): CpuIdentity {
  const family = decodeFamily(registers.eax);
  const model = decodeModel(registers.eax);
  const socketType = decodeSocketType(registers.ebx);
  return { family, model, socketType, codename: codenameFor(family, model, socketType) };
}

// ---------------------------------------------------------------------------
// Identifier
// ---------------------------------------------------------------------------

export class CpuIdentifier {
  constructor(private readonly runner: CommandRunner) {}

  async identify(): Promise<CpuIdentity> {
    const result = await runOrThrow(this.runner, {
      command: "cpuid",
      args: CPUID_COMMAND,
    });
    const registers = parseCpuidOutput(result.stdout);
    if (!registers) {
      throw new EnvironmentError(
        `Unexpected cpuid output: ${result.stdout.trim()}`,
        "Install the cpuid package (apt install cpuid)"
      );
    }
    return decodeCpuIdentity(registers);
  }
}
