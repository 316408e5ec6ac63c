/**
 * Image decoding, resampling and PNG output backed by sharp.
 * The rest of the pipeline only sees the ImageBackend interface.
 */

import type sharpFactory from 'sharp';
import type { PixelBuffer } from './types';
import { computeTargetDimensions, createPixelBuffer } from './imageProcessor';
import { ConfigurationError, MissingDependencyError } from './errors';

type SharpFactory = typeof sharpFactory;

/**
 * The imaging capability the pipeline needs
 */
export interface ImageBackend {
  /** Decodes an image file to 3-channel sRGB, alpha dropped */
  decode(filePath: string): Promise<PixelBuffer>;
  /** Resamples to exact pixel dimensions with a smoothing filter */
  resample(buffer: PixelBuffer, width: number, height: number): Promise<PixelBuffer>;
  writePng(buffer: PixelBuffer, filePath: string): Promise<void>;
}

let sharpModule: SharpFactory | null = null;

async function getSharp(): Promise<SharpFactory> {
  if (!sharpModule) {
    try {
      const loaded = await import('sharp');
      sharpModule = loaded.default;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MissingDependencyError(
        `sharp is required for image decoding. Install it with \`npm install sharp\` (${reason})`
      );
    }
  }
  return sharpModule;
}

function rawInput(buffer: PixelBuffer) {
  return { raw: { width: buffer.width, height: buffer.height, channels: 3 as const } };
}

/**
 * Creates the sharp-backed backend. Fails fast when sharp cannot be loaded.
 */
export async function createSharpBackend(): Promise<ImageBackend> {
  const sharp = await getSharp();

  return {
    async decode(filePath) {
      const { data, info } = await sharp(filePath)
        .removeAlpha()
        .toColourspace('srgb')
        .raw()
        .toBuffer({ resolveWithObject: true });

      if (info.channels !== 3) {
        throw new ConfigurationError(`Unsupported image ${filePath}: decoded to ${info.channels} channels`);
      }
      return createPixelBuffer(info.width, info.height, data);
    },

    async resample(buffer, width, height) {
      const data = await sharp(buffer.data, rawInput(buffer))
        .resize(width, height, { kernel: sharp.kernel.lanczos3, fit: 'fill' })
        .raw()
        .toBuffer();
      return createPixelBuffer(width, height, data);
    },

    async writePng(buffer, filePath) {
      await sharp(buffer.data, rawInput(buffer)).png().toFile(filePath);
    },
  };
}

/**
 * Decodes an image and resizes it so one pixel maps to one dot column
 */
export async function prepareImage(
  backend: ImageBackend,
  filePath: string,
  widthMm: number,
  spacingMm: number
): Promise<PixelBuffer> {
  const source = await backend.decode(filePath);
  const { width, height } = computeTargetDimensions(source.width, source.height, widthMm, spacingMm);
  return backend.resample(source, width, height);
}
