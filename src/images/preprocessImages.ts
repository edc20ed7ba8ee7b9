import sharp from "sharp";

import { logger } from "../config/logger";

export type SupportedFormat = "png" | "jpeg" | "webp" | "gif";

export type ImageMediaType = "image/png" | "image/jpeg" | "image/webp" | "image/gif";

const MEDIA_TYPES: Record<SupportedFormat, ImageMediaType> = {
  png: "image/png",
  jpeg: "image/jpeg",
  webp: "image/webp",
  gif: "image/gif",
};

export const DEFAULT_MAX_IMAGE_BYTES = 20 * 1024 * 1024;
export const DEFAULT_MAX_DIMENSION = 1568;
export const DEFAULT_MAX_IMAGES = 5;

export type ImageUpload = {
  name: string;
  bytes: Buffer;
};

/** An image ready to embed in a vision request. */
export type PreparedImage = {
  name: string;
  base64: string;
  mediaType: ImageMediaType;
  sizeBytes: number;
};

export type ImageValidation =
  | { ok: true; format: SupportedFormat; width: number; height: number }
  | { ok: false; error: { code: "IMAGE_TOO_LARGE" | "IMAGE_UNSUPPORTED_FORMAT" | "IMAGE_INVALID"; message: string } };

function isSupportedFormat(format: string | undefined): format is SupportedFormat {
  return format !== undefined && format in MEDIA_TYPES;
}

function megabytes(bytes: number): number {
  return bytes / (1024 * 1024);
}

export async function validateImage(bytes: Buffer, opts: { maxBytes?: number } = {}): Promise<ImageValidation> {
  const maxBytes = opts.maxBytes ?? DEFAULT_MAX_IMAGE_BYTES;
  if (bytes.length > maxBytes) {
    return {
      ok: false,
      error: {
        code: "IMAGE_TOO_LARGE",
        message: `Image too large: ${megabytes(bytes.length).toFixed(1)}MB (max: ${megabytes(maxBytes)}MB)`,
      },
    };
  }

  try {
    const meta = await sharp(bytes).metadata();
    if (!isSupportedFormat(meta.format)) {
      return {
        ok: false,
        error: { code: "IMAGE_UNSUPPORTED_FORMAT", message: `Unsupported format: ${meta.format ?? "unknown"}` },
      };
    }
    return { ok: true, format: meta.format, width: meta.width ?? 0, height: meta.height ?? 0 };
  } catch (err) {
    return {
      ok: false,
      error: { code: "IMAGE_INVALID", message: `Invalid image: ${err instanceof Error ? err.message : String(err)}` },
    };
  }
}

/** Target size that fits inside `maxDimension` on both sides, or null when the image already fits. */
export function fitWithin(width: number, height: number, maxDimension: number): { width: number; height: number } | null {
  if (width <= maxDimension && height <= maxDimension) return null;
  if (width > height) {
    return { width: maxDimension, height: Math.max(1, Math.floor(height * (maxDimension / width))) };
  }
  return { width: Math.max(1, Math.floor(width * (maxDimension / height))), height: maxDimension };
}

/**
 * Downscales with lanczos3 so neither side exceeds `maxDimension`, keeping the
 * source format. Returns the input buffer when no resize is needed or it fails.
 */
export async function resizeImageIfNeeded(bytes: Buffer, maxDimension = DEFAULT_MAX_DIMENSION): Promise<Buffer> {
  try {
    const meta = await sharp(bytes).metadata();
    const target = fitWithin(meta.width ?? 0, meta.height ?? 0, maxDimension);
    if (!target) return bytes;

    const format = isSupportedFormat(meta.format) ? meta.format : "png";
    return await sharp(bytes)
      .resize({ width: target.width, height: target.height, fit: "fill", kernel: sharp.kernel.lanczos3 })
      .toFormat(format)
      .toBuffer();
  } catch (err) {
    logger.error("images", `Error resizing image: ${err instanceof Error ? err.message : String(err)}`);
    return bytes;
  }
}

export function mediaTypeFor(format: string | undefined): ImageMediaType {
  return isSupportedFormat(format) ? MEDIA_TYPES[format] : "image/png";
}

export type PrepareImagesOptions = {
  resize?: boolean;
  maxImages?: number;
  maxBytes?: number;
  maxDimension?: number;
};

/** Validates, resizes and encodes uploads. Invalid ones are skipped with a warning. */
export async function prepareImagesForApi(uploads: ImageUpload[], opts: PrepareImagesOptions = {}): Promise<PreparedImage[]> {
  const resize = opts.resize ?? true;
  const maxImages = opts.maxImages ?? DEFAULT_MAX_IMAGES;
  const prepared: PreparedImage[] = [];

  for (const [idx, upload] of uploads.slice(0, maxImages).entries()) {
    const validation = await validateImage(upload.bytes, { maxBytes: opts.maxBytes });
    if (!validation.ok) {
      logger.warn("images", `Skipping invalid image ${upload.name}: ${validation.error.message}`);
      continue;
    }

    const bytes = resize ? await resizeImageIfNeeded(upload.bytes, opts.maxDimension) : upload.bytes;
    prepared.push({
      name: upload.name,
      base64: bytes.toString("base64"),
      mediaType: mediaTypeFor(validation.format),
      sizeBytes: bytes.length,
    });
    logger.info("images", `Processed image ${idx + 1}: ${upload.name}`);
  }

  return prepared;
}

/** Rough vision token cost: ~1600 tokens per 1024x1024 image, scaled by area. */
export function estimateVisionTokens(numImages: number, avgDimension = 1024): number {
  const tokensPerImage = Math.floor(1600 * Math.pow(avgDimension / 1024, 2));
  return numImages * tokensPerImage;
}

export function describeImage(image: PreparedImage): string {
  return `${image.name} (${(image.sizeBytes / 1024).toFixed(1)} KB, ${image.mediaType})`;
}
