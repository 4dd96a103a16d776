import { InvalidImageError } from '../../common/errors/analysis-errors';
import {
  failure,
  StageResult,
  success,
} from '../../common/errors/stage-result';
import type { InlineImage } from './model-client';

export const SUPPORTED_IMAGE_TYPES = [
  'image/jpeg',
  'image/png',
  'image/webp',
  'image/heic',
  'image/heif',
] as const;

type SupportedImageType = (typeof SUPPORTED_IMAGE_TYPES)[number];

const isSupported = (mimeType: string): mimeType is SupportedImageType =>
  (SUPPORTED_IMAGE_TYPES as readonly string[]).includes(mimeType);

// HEIC/HEIF containers have no fixed leading bytes worth checking here.
const PNG_SIGNATURE = Buffer.from([
  0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a,
]);

type SignatureCheck = (data: Buffer) => boolean;

const SIGNATURES: Partial<Record<SupportedImageType, SignatureCheck>> = {
  'image/jpeg': (data) =>
    data.length >= 3 &&
    data[0] === 0xff &&
    data[1] === 0xd8 &&
    data[2] === 0xff,
  'image/png': (data) => data.subarray(0, 8).equals(PNG_SIGNATURE),
  'image/webp': (data) =>
    data.length >= 12 &&
    data.toString('ascii', 0, 4) === 'RIFF' &&
    data.toString('ascii', 8, 12) === 'WEBP',
};

/**
 * Rejects uploads the model should never see. Runs before any model call.
 */
export const validateImageInput = (
  image: InlineImage,
  maxBytes: number,
): StageResult<InlineImage> => {
  if (image.data.length === 0) {
    return failure(new InvalidImageError('Image file is empty'));
  }

  const mimeType = image.mimeType.trim().toLowerCase();
  if (!isSupported(mimeType)) {
    return failure(
      new InvalidImageError(
        `Unsupported image type "${image.mimeType || 'unknown'}"; ` +
          `expected one of ${SUPPORTED_IMAGE_TYPES.join(', ')}`,
      ),
    );
  }

  if (image.data.length > maxBytes) {
    return failure(
      new InvalidImageError(
        `Image is ${image.data.length} bytes; the limit is ${maxBytes}`,
      ),
    );
  }

  const matches = SIGNATURES[mimeType];
  if (matches && !matches(image.data)) {
    return failure(
      new InvalidImageError(
        `Image content does not match declared type ${mimeType}`,
      ),
    );
  }

  return success({ data: image.data, mimeType });
};
