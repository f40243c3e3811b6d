import sharp from 'sharp';

import type { ImageBuffer, OcrFailure } from './types';
import { ocrFailure } from './types';
import { DEFAULT_OCR_CONFIG } from './config';

export type PreprocessOptions = {
  // Contrast normalisation + mild sharpening. Off by default: it can destroy faint text.
  enhance?: boolean;
};

export type ImagePreprocessor = (raw: Buffer, maxDimension?: number, opts?: PreprocessOptions) => Promise<ImageBuffer | OcrFailure>;

/** Target size that fits `maxDimension` on the long edge, or null when no resize is needed. */
export function computeTargetSize(width: number, height: number, maxDimension: number): { width: number; height: number } | null {
  const maxSide = Math.max(width, height);
  if (maxSide <= maxDimension) return null;
  const ratio = maxDimension / maxSide;
  return {
    width: Math.max(1, Math.round(width * ratio)),
    height: Math.max(1, Math.round(height * ratio)),
  };
}

export async function preprocessImage(
  raw: Buffer,
  maxDimension: number = DEFAULT_OCR_CONFIG.maxDimension,
  opts?: PreprocessOptions
): Promise<ImageBuffer | OcrFailure> {
  if (!raw || !Buffer.isBuffer(raw) || raw.length === 0) {
    return ocrFailure('INVALID_IMAGE', 'Image buffer is empty.', false);
  }
  if (!Number.isInteger(maxDimension) || maxDimension <= 0) {
    throw new RangeError(`maxDimension must be a positive integer (got ${maxDimension}).`);
  }

  try {
    const meta = await sharp(raw, { failOn: 'none' }).metadata();
    if (!meta.width || !meta.height) {
      return ocrFailure('INVALID_IMAGE', 'Could not determine image dimensions.', false);
    }

    // EXIF orientations 5..8 are transposed; .rotate() below applies them.
    const transposed = (meta.orientation ?? 1) >= 5;
    const originalWidth = transposed ? meta.height : meta.width;
    const originalHeight = transposed ? meta.width : meta.height;

    let img = sharp(raw, { failOn: 'none' })
      .rotate()
      .flatten({ background: '#ffffff' })
      .removeAlpha()
      .toColourspace('srgb');

    const target = computeTargetSize(originalWidth, originalHeight, maxDimension);
    if (target) {
      img = img.resize({
        width: target.width,
        height: target.height,
        fit: 'fill',
        kernel: sharp.kernel.lanczos3,
      });
    }

    if (opts?.enhance) {
      img = img.normalise().sharpen({ sigma: 0.8, m1: 0.6 });
    }

    const { data, info } = await img
      .png({ compressionLevel: 9, adaptiveFiltering: true, palette: false })
      .toBuffer({ resolveWithObject: true });

    return {
      bytes: data,
      format: 'png',
      width: info.width,
      height: info.height,
      originalWidth,
      originalHeight,
      resized: target !== null,
    };
  } catch (e) {
    return ocrFailure('INVALID_IMAGE', 'Failed to decode image.', false, e);
  }
}
