import sharp from 'sharp';
import { errorMessage, TransformError } from '@/core/errors';
import type { TransformedMedia } from '@/types/post';
import { wrapText } from '@/utils/text';

const REENCODABLE_FORMATS: ReadonlyArray<keyof sharp.FormatEnum> = ['jpeg', 'png', 'webp', 'gif', 'avif', 'tiff'];

const DEFAULT_PLACEHOLDER_SIZE = { width: 500, height: 300 };

export interface ImageBound {
  maxWidth?: number;
  maxHeight?: number;
}

export interface Dimensions {
  width: number;
  height: number;
}

export interface MediaInput {
  filename: string;
  data: Buffer;
  contentType?: string;
}

export type NormalizeOutcome = 'resized' | 'unchanged' | 'unsupported';

export interface NormalizedMedia {
  media: TransformedMedia;
  outcome: NormalizeOutcome;
}

/**
 * Largest size with the same aspect ratio that fits within the bound; the
 * input itself when it already fits.
 */
export function fitWithin(size: Dimensions, bound: ImageBound): Dimensions {
  const maxWidth = bound.maxWidth ?? Infinity;
  const maxHeight = bound.maxHeight ?? Infinity;

  if (size.width <= maxWidth && size.height <= maxHeight) {
    return size;
  }

  const scale = Math.min(maxWidth / size.width, maxHeight / size.height);
  return {
    width: Math.max(1, Math.round(size.width * scale)),
    height: Math.max(1, Math.round(size.height * scale))
  };
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function isImageContentType(contentType: string | undefined): boolean {
  return contentType === undefined || contentType.toLowerCase().startsWith('image/');
}

/**
 * Downscales attached images to the configured bound.
 */
export class ImageNormalizer {
  constructor(private readonly bound: ImageBound) {}

  get enabled(): boolean {
    return this.bound.maxWidth !== undefined || this.bound.maxHeight !== undefined;
  }

  /**
   * The decoded format decides what the media is; the declared content type
   * only matters when the data cannot be decoded.
   *
   * @throws TransformError when data declared as an image cannot be decoded or re-encoded
   */
  async normalize(input: MediaInput): Promise<NormalizedMedia> {
    const declaredImage = isImageContentType(input.contentType);
    if (!this.enabled && declaredImage) {
      return { media: this.passThrough(input, 'image'), outcome: 'unchanged' };
    }

    let metadata: sharp.Metadata;
    try {
      metadata = await sharp(input.data).metadata();
    } catch (error) {
      if (!declaredImage) {
        return { media: this.passThrough(input, 'unsupported'), outcome: 'unsupported' };
      }
      throw new TransformError(`Unable to decode image ${input.filename}: ${errorMessage(error)}`, {
        filename: input.filename
      }, { cause: error });
    }

    const format = REENCODABLE_FORMATS.find(f => f === metadata.format);
    if (!format || !metadata.width || !metadata.height) {
      return { media: this.passThrough(input, 'unsupported'), outcome: 'unsupported' };
    }

    const decoded: MediaInput = declaredImage ? input : { ...input, contentType: `image/${format}` };
    if (!this.enabled) {
      return { media: this.passThrough(decoded, 'image'), outcome: 'unchanged' };
    }

    const original = { width: metadata.width, height: metadata.height };
    const target = fitWithin(original, this.bound);
    if (target === original) {
      return { media: this.passThrough(decoded, 'image'), outcome: 'unchanged' };
    }

    try {
      const content = await sharp(input.data)
        .resize(target.width, target.height, { fit: 'fill' })
        .toFormat(format)
        .toBuffer();
      return {
        media: { filename: input.filename, content, contentType: `image/${format}`, kind: 'image' },
        outcome: 'resized'
      };
    } catch (error) {
      throw new TransformError(`Unable to downscale image ${input.filename}: ${errorMessage(error)}`, {
        filename: input.filename,
        width: original.width,
        height: original.height
      }, { cause: error });
    }
  }

  /**
   * PNG stating why an image is missing, sent in place of a failed download.
   */
  async placeholder(text: string): Promise<Buffer> {
    const width = this.bound.maxWidth ?? DEFAULT_PLACEHOLDER_SIZE.width;
    const height = this.bound.maxHeight ?? DEFAULT_PLACEHOLDER_SIZE.height;
    const lines = wrapText(text, Math.max(10, Math.floor(width / 10)));

    const textNodes = lines
      .map((line, i) => `<text x="25" y="${35 + i * 20}">${escapeXml(line)}</text>`)
      .join('');
    const svg =
      `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">` +
      `<rect width="100%" height="100%" fill="lightgrey"/>` +
      `<g font-family="sans-serif" font-size="14" fill="black">${textNodes}</g>` +
      `</svg>`;

    return sharp(Buffer.from(svg)).png().toBuffer();
  }

  private passThrough(input: MediaInput, kind: TransformedMedia['kind']): TransformedMedia {
    return { filename: input.filename, content: input.data, contentType: input.contentType, kind };
  }
}
