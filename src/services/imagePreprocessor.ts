// src/services/imagePreprocessor.ts
import sharp from "sharp";

export interface ImageOptions {
  maxDimension: number;
  quality: number;
}

export const DEFAULT_IMAGE_OPTIONS: ImageOptions = { maxDimension: 800, quality: 75 };

export class ImagePreprocessingError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "ImagePreprocessingError";
  }
}

/**
 * Upright, fit inside maxDimension × maxDimension (aspect kept, never enlarged),
 * re-encoded as JPEG.
 */
export async function prepareImage(
  bytes: Buffer,
  options: ImageOptions = DEFAULT_IMAGE_OPTIONS
): Promise<Buffer> {
  try {
    return await sharp(bytes)
      .rotate()
      .resize({
        width: options.maxDimension,
        height: options.maxDimension,
        fit: "inside",
        withoutEnlargement: true,
      })
      .jpeg({ quality: options.quality })
      .toBuffer();
  } catch (err) {
    console.error("[ImagePreprocessor] failed to prepare image:", err);
    throw new ImagePreprocessingError("Image could not be decoded or re-encoded", err);
  }
}
