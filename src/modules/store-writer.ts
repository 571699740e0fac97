/**
 * Store Writer Module
 * Downloads one image, keeps the original and writes a rotated copy
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "node:path";
import sharp from "sharp";
import {
  fetchResource,
  repairExtension,
  urlToFilename,
  describeError,
  DecodeError,
  DownloadError,
  IOError,
} from "../utils";
import type {
  DownloadedImage,
  FetchedResource,
  HarvestContext,
  ImageCandidate,
  ImageTarget,
  ProcessedImage,
} from "../types";

/**
 * Build the not-yet-processed target for a candidate
 */
export function createImageTarget(candidate: ImageCandidate): ImageTarget {
  const { directory, filename } = urlToFilename(candidate.imageUrl);
  return {
    status: "not-processed",
    url: candidate.imageUrl,
    pageUrl: candidate.pageUrl,
    directory,
    filename,
  };
}

async function writeImage(
  root: string,
  directory: string,
  filename: string,
  data: Buffer,
): Promise<string> {
  const dir = join(root, directory);
  await mkdir(dir, { recursive: true });
  const path = join(dir, filename);
  await writeFile(path, data);
  return path;
}

/**
 * Fetch the image and store its raw bytes under the originals root
 */
export async function download(
  target: ImageTarget,
  ctx: HarvestContext,
): Promise<DownloadedImage> {
  const { request, storage } = ctx.config;

  let resource: FetchedResource;
  try {
    resource = await fetchResource(target.url, {
      timeout: request.timeout,
      userAgent: request.userAgent,
    });
  } catch (error) {
    throw new DownloadError(`Download failed: ${describeError(error)}`, {
      url: target.url,
      cause: error,
      reached: target.status,
    });
  }

  const filename = repairExtension(target.filename, resource.contentType);

  let originalPath: string;
  try {
    originalPath = await writeImage(
      storage.originals,
      target.directory,
      filename,
      resource.body,
    );
  } catch (error) {
    throw new IOError(`Could not write original: ${describeError(error)}`, {
      url: target.url,
      cause: error,
      reached: target.status,
    });
  }

  return {
    ...target,
    status: "downloaded",
    filename,
    originalPath,
    contentType: resource.contentType,
  };
}

/**
 * Rotate the stored original by 180° and write it under the output root
 */
export async function rotate(
  image: DownloadedImage,
  ctx: HarvestContext,
): Promise<ProcessedImage> {
  let rotated: Buffer;
  try {
    rotated = await sharp(image.originalPath).rotate(180).toBuffer();
  } catch (error) {
    throw new DecodeError(`Could not decode image: ${describeError(error)}`, {
      url: image.url,
      cause: error,
      reached: image.status,
    });
  }

  let outputPath: string;
  try {
    outputPath = await writeImage(
      ctx.config.storage.output,
      image.directory,
      image.filename,
      rotated,
    );
  } catch (error) {
    throw new IOError(`Could not write output: ${describeError(error)}`, {
      url: image.url,
      cause: error,
      reached: image.status,
    });
  }

  return { ...image, status: "processed", outputPath };
}

/**
 * Download an image, then rotate it
 */
export async function downloadAndRotate(
  target: ImageTarget,
  ctx: HarvestContext,
): Promise<ProcessedImage> {
  const downloaded = await download(target, ctx);
  ctx.logger.debug(`Downloaded ${target.url} -> ${downloaded.originalPath}`);
  return rotate(downloaded, ctx);
}
