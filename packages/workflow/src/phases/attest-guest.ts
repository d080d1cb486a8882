/**
 * @summary attest-guest: request, verify and compare the guest's launch measurement.
 *
 * After the host tooling steps, attestation walks a fixed state machine:
 *
 * ```
 * AwaitGuestReachable -> InstallGuestTooling -> RequestReport ->
 * FetchAndVerifyCertChain -> VerifyReportSignature -> ComputeExpected ->
 * ExtractActual -> Compare -> Matched | Mismatched
 * ```
 *
 * Each state is one engine step. Only the reachability wait retries; any
 * other failure ends the phase.
 */

import { SnpguestClient, type Measurement } from "@snpctl/attestor";
import { MeasurementMismatchError, pathExists, type GuestSession } from "@snpctl/core";
import type { PhaseContext, PhaseDefinition, Step } from "../types.js";
import { hostDependenciesStep, requireSession, sessionTarget } from "./common.js";

// ---------------------------------------------------------------------------
// State Machine
// ---------------------------------------------------------------------------

export type AttestationState =
  | "Start"
  | "AwaitGuestReachable"
  | "InstallGuestTooling"
  | "RequestReport"
  | "FetchAndVerifyCertChain"
  | "VerifyReportSignature"
  | "ComputeExpected"
  | "ExtractActual"
  | "Compare"
  | "Matched"
  | "Mismatched";

export const ATTESTATION_TRANSITIONS: Readonly<Record<AttestationState, readonly AttestationState[]>> = {
  Start: ["AwaitGuestReachable"],
  AwaitGuestReachable: ["InstallGuestTooling"],
  InstallGuestTooling: ["RequestReport"],
  RequestReport: ["FetchAndVerifyCertChain"],
  FetchAndVerifyCertChain: ["VerifyReportSignature"],
  VerifyReportSignature: ["ComputeExpected"],
  ComputeExpected: ["ExtractActual"],
  ExtractActual: ["Compare"],
  Compare: ["Matched", "Mismatched"],
  Matched: [],
  Mismatched: [],
};

export function isTerminalAttestationState(state: AttestationState): boolean {
  return ATTESTATION_TRANSITIONS[state].length === 0;
}

/**
 * Values carried between attestation states.
 */
export class AttestationRun {
  private current: AttestationState = "Start";
  private readonly history: AttestationState[] = ["Start"];

  session?: GuestSession;
  client?: SnpguestClient;
  display?: string;
  expected?: Measurement;
  actual?: Measurement;

  get state(): AttestationState {
    return this.current;
  }

  get visited(): readonly AttestationState[] {
    return this.history;
  }

  transition(target: AttestationState): void {
    if (isTerminalAttestationState(this.current)) {
      throw new Error(`Attestation already ended in ${this.current}`);
    }
    if (!ATTESTATION_TRANSITIONS[this.current].includes(target)) {
      throw new Error(`Invalid attestation state transition: ${this.current} -> ${target}`);
    }
    this.current = target;
    this.history.push(target);
  }
}

/**
 * A value an earlier attestation state must have produced.
 */
function required<T>(value: T | undefined, name: string): T {
  if (value === undefined) {
    throw new Error(`Attestation is missing ${name} from an earlier state`);
  }
  return value;
}

// ---------------------------------------------------------------------------
// States as Steps
// ---------------------------------------------------------------------------

function attestationSteps(context: PhaseContext, run: AttestationRun): Step[] {
  const { config, reporter, poller, toolchain, cpuIdentifier, verifier } = context;

  const state = (
    id: string,
    target: AttestationState,
    description: string,
    body: () => Promise<void>
  ): Step => ({
    id,
    description,
    run: async () => {
      run.transition(target);
      await body();
    },
  });

  return [
    state("await-guest-reachable", "AwaitGuestReachable", "Waiting for the guest", async () => {
      const session = await requireSession(config);
      const guest = context.executorFor(sessionTarget(session));
      await poller.retryUntil(`guest at ${guest.endpoint}`, () => guest.isReachable(), {
        onAttemptFailed: (attempt) => reporter.debug(`Guest not reachable (attempt ${attempt})`),
      });
      run.session = session;
      run.client = new SnpguestClient(guest);
    }),

    state(
      "install-guest-tooling",
      "InstallGuestTooling",
      "Installing snpguest in the guest",
      async () => {
        const client = required(run.client, "client");
        await client.install(toolchain.snpguestBinary);
        await client.loadGuestDriver();
      }
    ),

    state("request-report", "RequestReport", "Requesting an attestation report", async () => {
      const client = required(run.client, "client");
      await client.requestReport();
      run.display = await client.displayReport();
      reporter.debug(run.display);
    }),

    state(
      "fetch-and-verify-cert-chain",
      "FetchAndVerifyCertChain",
      "Fetching and verifying the certificate chain",
      async () => {
        const client = required(run.client, "client");
        const cpu = await cpuIdentifier.identify();
        reporter.info(`Host CPU: ${cpu.codename} (family ${cpu.family}, model ${cpu.model})`);
        await client.fetchCertificateChain(cpu.codename);
        await client.fetchVcek(cpu.codename);
        await client.verifyCertificateChain();
      }
    ),

    state(
      "verify-report-signature",
      "VerifyReportSignature",
      "Verifying the report signature",
      async () => {
        await required(run.client, "client").verifyReportSignature();
      }
    ),

    state("compute-expected", "ComputeExpected", "Computing the expected measurement", async () => {
      run.expected = await verifier.expectedMeasurement(required(run.session, "session").boot);
      reporter.info(`Expected Measurement (sev-snp-measure):  ${run.expected.toString()}`);
    }),

    state("extract-actual", "ExtractActual", "Reading the report measurement", async () => {
      const client = required(run.client, "client");
      run.actual = await verifier.extractActual(client, required(run.display, "display"));
      reporter.info(`Measurement from SNP Attestation Report: ${run.actual.toString()}`);
    }),

    state("compare", "Compare", "Comparing measurements", async () => {
      const expected = required(run.expected, "expected");
      const actual = required(run.actual, "actual");
      if (verifier.verify(expected, actual) === "matched") {
        run.transition("Matched");
        reporter.success("The expected measurement matches the snp guest report measurement!");
        return;
      }
      run.transition("Mismatched");
      throw new MeasurementMismatchError(expected.toString(), actual.toString());
    }),
  ];
}

// ---------------------------------------------------------------------------
// Phase
// ---------------------------------------------------------------------------

export const attestGuest: PhaseDefinition = {
  name: "attest-guest",
  summary: "Use virtee/snpguest and sev-snp-measure to attest a SNP guest",

  logDir: (config) => config.attestDir,

  failureLogs: (context) => context.workDir.logFiles(context.config.attestDir),

  steps: (context) => {
    const { toolchain } = context;
    return [
      {
        id: "rust-toolchain",
        description: "Installing the Rust toolchain",
        isComplete: () => toolchain.hasRust(),
        run: () => toolchain.installRust(),
      },
      {
        id: "measure-tool",
        description: "Installing sev-snp-measure",
        isComplete: () => toolchain.hasMeasureTool(),
        run: () => toolchain.installMeasureTool(),
      },
      hostDependenciesStep(context),
      {
        id: "build-snpguest",
        description: "Building snpguest",
        isComplete: () => pathExists(toolchain.snpguestBinary),
        run: () => toolchain.buildSnpguest(),
      },
      ...attestationSteps(context, new AttestationRun()),
    ];
  },
};
