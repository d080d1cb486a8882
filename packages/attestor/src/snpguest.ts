/**
 * @summary Guest-side snpguest invocations.
 *
 * Everything runs in the guest user's home directory, where the snpguest
 * binary was copied. Certificate and report verification failures are
 * reported as `VerificationError`; transport problems keep their own
 * error types.
 */

import {
  RemoteCommandError,
  VerificationError,
  type CommandResult,
} from "@snpctl/core";
import type { RemoteExecutor } from "@snpctl/transport-ssh";
import type { CpuCodename } from "./cpu-identifier.js";

export const REPORT_FILE = "attestation-report.bin";
export const REQUEST_FILE = "request-data.txt";

export const SEV_GUEST_MODULE =
  "/lib/modules/*/kernel/drivers/virt/coco/sev-guest/sev-guest.ko";

export class SnpguestClient {
  constructor(private readonly guest: RemoteExecutor) {}

  /**
   * Copy the host-built snpguest binary into the guest home directory.
   */
  async install(binary: string): Promise<void> {
    await this.guest.copy(binary, ".", "to-guest");
  }

  /**
   * Load the sev-guest driver. Already loaded or built in is fine.
   */
  async loadGuestDriver(): Promise<void> {
    await this.guest.exec(`sudo insmod ${SEV_GUEST_MODULE} >/dev/null 2>&1 || true`);
  }

  /**
   * Ask the secure processor for a report bound to random request data.
   */
  async requestReport(): Promise<void> {
    await this.guest.execOrThrow(`sudo ./snpguest report ${REPORT_FILE} ${REQUEST_FILE} --random`);
  }

  async displayReport(): Promise<string> {
    const result = await this.guest.execOrThrow(`./snpguest display report ${REPORT_FILE}`);
    return result.stdout;
  }

  async fetchCertificateChain(codename: CpuCodename): Promise<void> {
    await this.guest.execOrThrow(`./snpguest fetch ca pem ${codename} . --endorser vcek`);
  }

  async fetchVcek(codename: CpuCodename): Promise<void> {
    await this.guest.execOrThrow(`./snpguest fetch vcek pem ${codename} . ${REPORT_FILE}`);
  }

  async verifyCertificateChain(): Promise<string> {
    const result = await this.verify("certificate-chain", "./snpguest verify certs .");
    return result.stdout;
  }

  async verifyReportSignature(): Promise<string> {
    const result = await this.verify(
      "report-signature",
      `./snpguest verify attestation . ${REPORT_FILE}`
    );
    return result.stdout;
  }

  /**
   * Copy the raw report to the host.
   */
  async downloadReport(destDir: string): Promise<void> {
    await this.guest.copy(REPORT_FILE, destDir, "from-guest");
  }

  private async verify(check: string, command: string): Promise<CommandResult> {
    try {
      return await this.guest.execOrThrow(command);
    } catch (err) {
      if (err instanceof RemoteCommandError) {
        const detail = (err.stderr || err.stdout).trim();
        throw new VerificationError(
          check,
          `${check} verification failed${detail ? `: ${detail}` : ""}`,
          err
        );
      }
      throw err;
    }
  }
}
