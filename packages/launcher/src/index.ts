/**
 * @summary Main entry point for @snpctl/launcher.
 *
 * Builds the QEMU command for SEV-SNP guests, prepares the guest disk and
 * cloud-init seed, and starts, finds and stops guest processes.
 */

// === Boot Parameters ===
export type { BootParameter, BootParameterDocument } from "./boot-parameters.js";
export { BootParameterSet, paramsFileFor } from "./boot-parameters.js";

export type { BaseLaunchOptions, SnpLaunchOptions } from "./qemu-command.js";
export {
  QEMU_LOG,
  QEMU_TRACE_LOG,
  QEMU_PIDFILE,
  baseParameters,
  snpParameters,
  writeQemuCommand,
} from "./qemu-command.js";

// === Guest Provisioning ===
export type { SeedFiles } from "./cloud-init.js";
export {
  seedFilesFor,
  renderMetadata,
  renderUserData,
  ensureSshKeyPair,
  createSeedImage,
} from "./cloud-init.js";

export { downloadImage, fetchCloudImage, partialImageFor, resizeImage } from "./guest-image.js";

export type {
  RhelImageClientConfig,
  RhelImageEntry,
  RhelImageRequest,
  RhelImageResult,
} from "./rhel-image.js";
export {
  RhelImageClient,
  RHEL_TOKEN_URL,
  RHEL_IMAGES_URL,
  RHEL_GUEST_IMAGE_PATTERN,
  parseOsReleaseVersion,
  rhelListingFileFor,
} from "./rhel-image.js";

// === Processes ===
export type { ProcessEntry, ProcessTable } from "./process-table.js";
export { PsProcessTable, parsePsOutput } from "./process-table.js";

export type { GuestProcessControlOptions, GuestLocator, StopResult } from "./guest-process.js";
export {
  GuestProcessControl,
  guestProcessPattern,
  isGuestProcess,
  describeProcess,
} from "./guest-process.js";
