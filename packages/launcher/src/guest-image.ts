/**
 * @summary Guest disk image preparation.
 *
 * The image is assembled at `<image>.part` and renamed into place only after
 * the download and resize both succeed, so an image at the final path is
 * always complete.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { runOrThrow, type CommandRunner } from "@snpctl/core";

export function partialImageFor(image: string): string {
  return `${image}.part`;
}

/**
 * Download `url` into `image`. `prepare` runs on the partial file before it
 * is moved into place; a partial file from an interrupted run is discarded
 * first.
 */
export async function downloadImage(
  runner: CommandRunner,
  url: string,
  image: string,
  prepare?: (partial: string) => Promise<void>
): Promise<void> {
  const partial = partialImageFor(image);
  await fs.mkdir(path.dirname(image), { recursive: true });
  await fs.rm(partial, { force: true });

  await runOrThrow(runner, { command: "wget", args: [url, "-O", partial] });
  if (prepare !== undefined) {
    await prepare(partial);
  }
  await fs.rename(partial, image);
}

/** Download a cloud image and grow it to `sizeGb`. */
export async function fetchCloudImage(
  runner: CommandRunner,
  url: string,
  image: string,
  sizeGb: number
): Promise<void> {
  await downloadImage(runner, url, image, (partial) => resizeImage(runner, partial, sizeGb));
}

/**
 * Grow the image's virtual disk to `sizeGb`. The guest grows its root
 * filesystem on first boot.
 */
export async function resizeImage(
  runner: CommandRunner,
  image: string,
  sizeGb: number
): Promise<void> {
  await runOrThrow(runner, { command: "qemu-img", args: ["resize", image, `${sizeGb}G`] });
}
