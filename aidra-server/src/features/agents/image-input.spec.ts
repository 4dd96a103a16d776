import { InvalidImageError } from '../../common/errors/analysis-errors';
import { JPEG_BYTES, PNG_BYTES } from '../../../test/support/fixtures';
import { validateImageInput } from './image-input';

const MAX = 1024;
const EXPECTED_TYPES =
  'expected one of image/jpeg, image/png, image/webp, image/heic, image/heif';

describe('validateImageInput', () => {
  it('accepts a PNG and normalises the declared type', () => {
    const result = validateImageInput(
      { data: PNG_BYTES, mimeType: 'IMAGE/PNG' },
      MAX,
    );

    expect(result).toEqual({
      ok: true,
      value: { data: PNG_BYTES, mimeType: 'image/png' },
    });
  });

  it('accepts a JPEG', () => {
    const result = validateImageInput(
      { data: JPEG_BYTES, mimeType: 'image/jpeg' },
      MAX,
    );
    expect(result.ok).toBe(true);
  });

  it('accepts HEIC without a signature check', () => {
    const result = validateImageInput(
      { data: Buffer.from('ftypheic'), mimeType: 'image/heic' },
      MAX,
    );
    expect(result.ok).toBe(true);
  });

  it.each([
    ['an empty payload', Buffer.alloc(0), 'image/png', 'Image file is empty'],
    [
      'an unsupported type',
      Buffer.from('GIF89a'),
      'image/gif',
      `Unsupported image type "image/gif"; ${EXPECTED_TYPES}`,
    ],
    [
      'a missing type',
      PNG_BYTES,
      '',
      `Unsupported image type "unknown"; ${EXPECTED_TYPES}`,
    ],
    [
      'content that does not match the type',
      PNG_BYTES,
      'image/jpeg',
      'Image content does not match declared type image/jpeg',
    ],
  ])('rejects %s', (_case, data, mimeType, message) => {
    const result = validateImageInput({ data, mimeType }, MAX);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(InvalidImageError);
    expect(result.error.message).toBe(message);
  });

  it('rejects an image over the size limit', () => {
    const result = validateImageInput(
      { data: PNG_BYTES, mimeType: 'image/png' },
      10,
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe(
      `Image is ${PNG_BYTES.length} bytes; the limit is 10`,
    );
  });
});
