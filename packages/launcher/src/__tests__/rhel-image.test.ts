/**
 * @summary Tests for the RHEL guest image client.
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  ArtifactError,
  EnvironmentError,
  RemoteCommandError,
  ScriptedCommandRunner,
  ServiceRequestError,
  type CommandSpec,
} from "@snpctl/core";
import {
  RHEL_IMAGES_URL,
  RHEL_TOKEN_URL,
  RhelImageClient,
  parseOsReleaseVersion,
  rhelListingFileFor,
} from "../rhel-image.js";

const OFFLINE_TOKEN = "test-offline-token";
const ACCESS_TOKEN = "test-access-token";
const LISTING_URL = `${RHEL_IMAGES_URL}/9.4/x86_64`;
const GUEST_HREF = "https://api.access.redhat.com/management/v1/images/guest-checksum/download";
const SIGNED_URL = "https://downloads.example.test/rhel-9.4-x86_64-kvm.qcow2";

const LISTING = {
  body: [
    {
      imageName: "Red Hat Enterprise Linux 9.4 Boot ISO",
      filename: "rhel-9.4-x86_64-boot.iso",
      downloadHref: "https://api.access.redhat.com/management/v1/images/boot-checksum/download",
    },
    {
      imageName: "Red Hat Enterprise Linux 9.4 KVM Guest Image",
      filename: "rhel-9.4-x86_64-kvm.qcow2",
      downloadHref: GUEST_HREF,
    },
  ],
};

interface RecordedRequest {
  url: string;
  method: string;
  authorization: string | null;
  body: string | undefined;
}

type Route = () => Response;

function json(value: unknown, status = 200): Response {
  return new Response(JSON.stringify(value), { status });
}

function fakeApi(overrides: Record<string, Route> = {}) {
  const routes: Record<string, Route> = {
    [RHEL_TOKEN_URL]: () => json({ access_token: ACCESS_TOKEN }),
    [LISTING_URL]: () => json(LISTING),
    [GUEST_HREF]: () => json({ body: { href: SIGNED_URL } }),
    ...overrides,
  };
  const requests: RecordedRequest[] = [];

  const fetchFn = async (input: string | URL | Request, init?: RequestInit) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    requests.push({
      url,
      method: init?.method ?? "GET",
      authorization: new Headers(init?.headers).get("authorization"),
      body: typeof init?.body === "string" ? init.body : undefined,
    });
    const route = routes[url];
    return route === undefined ? new Response("not found", { status: 404 }) : route();
  };

  return { fetchFn, requests };
}

async function saveDownload(spec: CommandSpec) {
  const target = spec.args[2];
  if (target !== undefined) {
    await fs.writeFile(target, "rhel-qcow2");
  }
  return {};
}

let dir: string;
let image: string;
let runner: ScriptedCommandRunner;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "snpctl-rhel-"));
  image = path.join(dir, "snp-guest", "snp-guest.qcow2");
  runner = new ScriptedCommandRunner().on("uname -m", { stdout: "x86_64\n" }).on("wget", saveDownload);
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("RhelImageClient.fetchGuestImage", () => {
  it("exchanges the offline token and downloads the KVM guest image", async () => {
    const api = fakeApi();
    const client = new RhelImageClient({ offlineToken: OFFLINE_TOKEN, runner, fetchFn: api.fetchFn });

    const result = await client.fetchGuestImage({ version: "9.4", image });

    expect(result).toEqual({ status: "downloaded", image, entry: LISTING.body[1] });
    expect(api.requests.map((request) => request.url)).toEqual([
      RHEL_TOKEN_URL,
      LISTING_URL,
      GUEST_HREF,
    ]);
    expect(api.requests[0]).toEqual({
      url: RHEL_TOKEN_URL,
      method: "POST",
      authorization: null,
      body: "grant_type=refresh_token&client_id=rhsm-api&refresh_token=test-offline-token",
    });
    expect(api.requests[1]?.authorization).toBe("Bearer test-access-token");
    expect(api.requests[2]?.authorization).toBe("Bearer test-access-token");
    expect(runner.linesMatching("wget")).toEqual([`wget ${SIGNED_URL} -O ${image}.part`]);
    expect(await fs.readFile(image, "utf-8")).toBe("rhel-qcow2");
  });

  it("saves the image listing beside the image", async () => {
    const api = fakeApi();
    const client = new RhelImageClient({ offlineToken: OFFLINE_TOKEN, runner, fetchFn: api.fetchFn });

    await client.fetchGuestImage({ version: "9.4", image });

    const listingFile = path.join(dir, "snp-guest", "rhel-downloads-9.4.json");
    expect(rhelListingFileFor(image, "9.4")).toBe(listingFile);
    expect(JSON.parse(await fs.readFile(listingFile, "utf-8"))).toEqual(LISTING);
  });

  it("uses a saved listing instead of asking for it again", async () => {
    await fs.mkdir(path.dirname(image), { recursive: true });
    await fs.writeFile(rhelListingFileFor(image, "9.4"), JSON.stringify(LISTING));
    const api = fakeApi();
    const client = new RhelImageClient({ offlineToken: OFFLINE_TOKEN, runner, fetchFn: api.fetchFn });

    await client.fetchGuestImage({ version: "9.4", image });

    expect(api.requests.map((request) => request.url)).toEqual([RHEL_TOKEN_URL, GUEST_HREF]);
  });

  it("asks for the listing again when the saved one is unreadable", async () => {
    await fs.mkdir(path.dirname(image), { recursive: true });
    await fs.writeFile(rhelListingFileFor(image, "9.4"), "{ truncated");
    const api = fakeApi();
    const client = new RhelImageClient({ offlineToken: OFFLINE_TOKEN, runner, fetchFn: api.fetchFn });

    await client.fetchGuestImage({ version: "9.4", image });

    expect(api.requests.map((request) => request.url)).toEqual([
      RHEL_TOKEN_URL,
      LISTING_URL,
      GUEST_HREF,
    ]);
  });

  it("leaves an existing image alone", async () => {
    await fs.mkdir(path.dirname(image), { recursive: true });
    await fs.writeFile(image, "existing");
    const api = fakeApi();
    const client = new RhelImageClient({ offlineToken: OFFLINE_TOKEN, runner, fetchFn: api.fetchFn });

    expect(await client.fetchGuestImage({ version: "9.4", image })).toEqual({
      status: "present",
      image,
    });
    expect(api.requests).toEqual([]);
    expect(runner.calls).toEqual([]);
  });

  it("uses the given architecture without asking the host", async () => {
    const api = fakeApi({ [`${RHEL_IMAGES_URL}/9.4/aarch64`]: () => json(LISTING) });
    const client = new RhelImageClient({
      offlineToken: OFFLINE_TOKEN,
      runner,
      arch: "aarch64",
      fetchFn: api.fetchFn,
    });

    await client.fetchGuestImage({ version: "9.4", image });

    expect(api.requests[1]?.url).toBe(`${RHEL_IMAGES_URL}/9.4/aarch64`);
    expect(runner.linesMatching("uname")).toEqual([]);
  });

  it("fails when the release lists no guest image", async () => {
    const api = fakeApi({ [LISTING_URL]: () => json({ body: [LISTING.body[0]] }) });
    const client = new RhelImageClient({ offlineToken: OFFLINE_TOKEN, runner, fetchFn: api.fetchFn });

    const promise = client.fetchGuestImage({ version: "9.4", image });

    await expect(promise).rejects.toBeInstanceOf(ArtifactError);
    await expect(promise).rejects.toThrow("No KVM guest image is listed for RHEL 9.4 (x86_64)");
    expect(runner.linesMatching("wget")).toEqual([]);
  });

  it("reports a rejected offline token with its HTTP status", async () => {
    const api = fakeApi({ [RHEL_TOKEN_URL]: () => json({ error: "invalid_grant" }, 401) });
    const client = new RhelImageClient({ offlineToken: OFFLINE_TOKEN, runner, fetchFn: api.fetchFn });

    const error = await client.fetchGuestImage({ version: "9.4", image }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ServiceRequestError);
    expect(error).toMatchObject({
      statusCode: 401,
      url: RHEL_TOKEN_URL,
      message: `Request to ${RHEL_TOKEN_URL} failed: HTTP 401`,
    });
  });

  it("reports a download link without a URL", async () => {
    const api = fakeApi({ [GUEST_HREF]: () => json({ body: {} }) });
    const client = new RhelImageClient({ offlineToken: OFFLINE_TOKEN, runner, fetchFn: api.fetchFn });

    await expect(client.fetchGuestImage({ version: "9.4", image })).rejects.toThrow(
      `Request to ${GUEST_HREF} failed: response has no download URL`
    );
  });

  it("reports a network failure with status 0", async () => {
    const fetchFn = async (): Promise<Response> => {
      throw new TypeError("fetch failed");
    };
    const client = new RhelImageClient({ offlineToken: OFFLINE_TOKEN, runner, fetchFn });

    await expect(client.fetchGuestImage({ version: "9.4", image })).rejects.toMatchObject({
      statusCode: 0,
      message: `Request to ${RHEL_TOKEN_URL} failed: fetch failed`,
    });
  });

  it("leaves no image behind when the download is interrupted", async () => {
    runner.on("wget", async (spec) => {
      await saveDownload(spec);
      return { exitCode: 4 };
    });
    const api = fakeApi();
    const client = new RhelImageClient({ offlineToken: OFFLINE_TOKEN, runner, fetchFn: api.fetchFn });

    await expect(client.fetchGuestImage({ version: "9.4", image })).rejects.toBeInstanceOf(
      RemoteCommandError
    );
    await expect(fs.access(image)).rejects.toThrow();
  });

  it("requires an offline token", () => {
    expect(() => new RhelImageClient({ offlineToken: "", runner })).toThrow(EnvironmentError);
  });
});

describe("parseOsReleaseVersion", () => {
  it("reads a quoted VERSION_ID", () => {
    expect(
      parseOsReleaseVersion('NAME="Red Hat Enterprise Linux"\nVERSION_ID="9.4"\nID="rhel"\n')
    ).toBe("9.4");
  });

  it("reads an unquoted VERSION_ID", () => {
    expect(parseOsReleaseVersion("ID=rhel\nVERSION_ID=8.10\n")).toBe("8.10");
  });

  it("returns undefined without a VERSION_ID", () => {
    expect(parseOsReleaseVersion("ID=rhel\n")).toBeUndefined();
  });
});
