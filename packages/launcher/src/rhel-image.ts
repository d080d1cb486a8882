/**
 * @summary RHEL KVM guest image download through the Red Hat API.
 *
 * An offline token from the Red Hat customer portal is exchanged for a
 * short-lived access token. The image listing for a RHEL release is cached
 * beside the image as `rhel-downloads-<version>.json`; the entry whose name
 * contains "Guest Image" is resolved to a signed URL and downloaded.
 *
 * @example
 * ```typescript
 * const client = new RhelImageClient({ offlineToken, runner });
 * await client.fetchGuestImage({ version: "9.4", image: "/srv/rhel/rhel.qcow2" });
 * ```
 */

import fs from "node:fs/promises";
import path from "node:path";
import {
  ArtifactError,
  EnvironmentError,
  ServiceRequestError,
  isRecord,
  pathExists,
  runOrThrow,
  toError,
  type CommandRunner,
} from "@snpctl/core";
import { downloadImage } from "./guest-image.js";

// =============================================================================
// CONSTANTS
// =============================================================================

export const RHEL_TOKEN_URL =
  "https://sso.redhat.com/auth/realms/redhat-external/protocol/openid-connect/token";

export const RHEL_IMAGES_URL = "https://api.access.redhat.com/management/v1/images/rhel";

/** Listing entries whose name matches this are KVM guest images */
export const RHEL_GUEST_IMAGE_PATTERN = /Guest Image/;

/**
 * Default request timeout in milliseconds.
 */
const DEFAULT_TIMEOUT = 30000;

// =============================================================================
// TYPES
// =============================================================================

export interface RhelImageClientConfig {
  /** Offline token generated at https://access.redhat.com/management/api */
  offlineToken: string;
  runner: CommandRunner;
  /** Defaults to the output of `uname -m` */
  arch?: string;
  timeout?: number;
  fetchFn?: typeof fetch;
}

export interface RhelImageEntry {
  imageName: string;
  filename?: string;
  downloadHref: string;
}

export interface RhelImageRequest {
  /** RHEL release, e.g. "9.4" */
  version: string;
  /** Destination of the qcow2 file */
  image: string;
}

export type RhelImageResult =
  | { status: "present"; image: string }
  | { status: "downloaded"; image: string; entry: RhelImageEntry };

function isRhelImageEntry(value: unknown): value is RhelImageEntry {
  return (
    isRecord(value) &&
    typeof value["imageName"] === "string" &&
    typeof value["downloadHref"] === "string" &&
    (value["filename"] === undefined || typeof value["filename"] === "string")
  );
}

function listingEntries(document: unknown): RhelImageEntry[] | undefined {
  if (!isRecord(document) || !Array.isArray(document["body"])) {
    return undefined;
  }
  return document["body"].filter(isRhelImageEntry);
}

/**
 * `VERSION_ID` from an os-release file, without quotes.
 */
export function parseOsReleaseVersion(osRelease: string): string | undefined {
  const match = /^VERSION_ID=["']?([^"'\n]*)["']?\s*$/m.exec(osRelease);
  return match?.[1] || undefined;
}

export function rhelListingFileFor(image: string, version: string): string {
  return path.join(path.dirname(image), `rhel-downloads-${version}.json`);
}

// =============================================================================
// CLIENT
// =============================================================================

export class RhelImageClient {
  private readonly offlineToken: string;
  private readonly runner: CommandRunner;
  private readonly timeout: number;
  private readonly fetchFn: typeof fetch;
  private arch: string | undefined;
  private accessToken: string | undefined;

  constructor(config: RhelImageClientConfig) {
    if (!config.offlineToken) {
      throw new EnvironmentError(
        "REDHAT_OFFLINE_TOKEN is not set",
        "Generate an offline token at https://access.redhat.com/management/api and export it as REDHAT_OFFLINE_TOKEN"
      );
    }
    this.offlineToken = config.offlineToken;
    this.runner = config.runner;
    this.arch = config.arch;
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  /**
   * Download the guest image for `version` unless `image` already exists.
   */
  async fetchGuestImage(request: RhelImageRequest): Promise<RhelImageResult> {
    const { version, image } = request;
    if (await pathExists(image)) {
      return { status: "present", image };
    }

    const entry = await this.guestImageEntry(version, rhelListingFileFor(image, version));
    const url = await this.resolveDownload(entry);
    await downloadImage(this.runner, url, image);
    return { status: "downloaded", image, entry };
  }

  /**
   * The listing entry for the KVM guest image. A readable cached listing is
   * used as is.
   */
  async guestImageEntry(version: string, listingFile: string): Promise<RhelImageEntry> {
    const arch = await this.architecture();
    const entries =
      (await this.readListing(listingFile)) ?? (await this.saveListing(version, arch, listingFile));
    const entry = entries.find((candidate) => RHEL_GUEST_IMAGE_PATTERN.test(candidate.imageName));
    if (entry === undefined) {
      throw new ArtifactError(
        "RHEL guest image",
        listingFile,
        `No KVM guest image is listed for RHEL ${version} (${arch})`
      );
    }
    return entry;
  }

  private async architecture(): Promise<string> {
    if (this.arch === undefined) {
      const result = await runOrThrow(this.runner, { command: "uname", args: ["-m"] });
      this.arch = result.stdout.trim();
    }
    return this.arch;
  }

  private async readListing(listingFile: string): Promise<RhelImageEntry[] | undefined> {
    if (!(await pathExists(listingFile))) {
      return undefined;
    }
    try {
      const document: unknown = JSON.parse(await fs.readFile(listingFile, "utf-8"));
      return listingEntries(document);
    } catch (err) {
      if (err instanceof SyntaxError) {
        return undefined;
      }
      throw err;
    }
  }

  private async saveListing(
    version: string,
    arch: string,
    listingFile: string
  ): Promise<RhelImageEntry[]> {
    const url = `${RHEL_IMAGES_URL}/${encodeURIComponent(version)}/${encodeURIComponent(arch)}`;
    const document = await this.request(url, { headers: await this.authorization() });
    const entries = listingEntries(document);
    if (entries === undefined) {
      throw new ServiceRequestError(url, 200, "response has no image listing");
    }
    await fs.mkdir(path.dirname(listingFile), { recursive: true });
    await fs.writeFile(listingFile, `${JSON.stringify(document, null, 2)}\n`, "utf-8");
    return entries;
  }

  private async resolveDownload(entry: RhelImageEntry): Promise<string> {
    const document = await this.request(entry.downloadHref, { headers: await this.authorization() });
    const body = isRecord(document) ? document["body"] : undefined;
    const href = isRecord(body) ? body["href"] : undefined;
    if (typeof href !== "string" || href.length === 0) {
      throw new ServiceRequestError(entry.downloadHref, 200, "response has no download URL");
    }
    return href;
  }

  private async authorization(): Promise<Record<string, string>> {
    if (this.accessToken === undefined) {
      const document = await this.request(RHEL_TOKEN_URL, {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams({
          grant_type: "refresh_token",
          client_id: "rhsm-api",
          refresh_token: this.offlineToken,
        }).toString(),
      });
      const token = isRecord(document) ? document["access_token"] : undefined;
      if (typeof token !== "string" || token.length === 0) {
        throw new ServiceRequestError(RHEL_TOKEN_URL, 200, "response has no access token");
      }
      this.accessToken = token;
    }
    return { Authorization: `Bearer ${this.accessToken}` };
  }

  private async request(url: string, init: RequestInit): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    let response: Response;
    try {
      response = await this.fetchFn(url, { ...init, signal: controller.signal });
    } catch (err) {
      const cause = toError(err);
      throw new ServiceRequestError(url, 0, cause.message, cause);
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      throw new ServiceRequestError(url, response.status, `HTTP ${response.status}`);
    }
    try {
      const document: unknown = await response.json();
      return document;
    } catch (err) {
      throw new ServiceRequestError(url, response.status, "response is not JSON", toError(err));
    }
  }
}
