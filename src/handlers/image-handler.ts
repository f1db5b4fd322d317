import { imageSize } from 'image-size';
import { UnexpectedError, ValidationError, handleUnknownError } from '../errors/index';
import { toHandlerError } from '../errors/provider-errors';
import type { DamageImageInput, Handler } from './types';

export const NO_IMAGE_MESSAGE = 'No image uploaded. Please provide a damage assessment image.';

export interface ImageDimensions {
  width: number;
  height: number;
}

function measure(image: Buffer) {
  try {
    return imageSize(image);
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Reading image');
    throw new UnexpectedError(err.message, e);
  }
}

export function readImageDimensions(image: Buffer): ImageDimensions {
  const size = measure(image);
  if (size.width === undefined || size.height === undefined) {
    throw new UnexpectedError('Could not read image dimensions');
  }
  return { width: size.width, height: size.height };
}

/**
 * Reports the uploaded image's pixel dimensions. No pixel analysis is done.
 */
export function createImageHandler(): Handler<DamageImageInput> {
  return async ({ image }) => {
    if (!image || image.length === 0) {
      return { ok: false, error: new ValidationError(NO_IMAGE_MESSAGE) };
    }

    let dimensions: ImageDimensions;
    try {
      dimensions = readImageDimensions(image);
    } catch (e: unknown) {
      return { ok: false, error: toHandlerError(e, 'Image processing') };
    }

    const text = [
      '🖼️ Damage Assessment Image Analysis',
      'Image Uploaded Successfully',
      `📐 Dimensions: ${dimensions.width} x ${dimensions.height} pixels`,
      '📊 Processing Status: Preliminary assessment in progress',
      '🔍 Recommendation: Detailed expert evaluation required',
      '',
      '⚠️ Note: This is an automated initial assessment.',
      'Full analysis requires professional on-site inspection.',
    ].join('\n');
    return { ok: true, text };
  };
}
