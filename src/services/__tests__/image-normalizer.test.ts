import sharp from 'sharp';
import { TransformError } from '@/core/errors';
import { fitWithin, ImageNormalizer } from '../image-normalizer';

async function makeImage(width: number, height: number, format: 'png' | 'jpeg' = 'png'): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: { r: 200, g: 120, b: 40 } } })
    .toFormat(format)
    .toBuffer();
}

describe('fitWithin', () => {
  it('should scale to the tighter bound preserving the aspect ratio', () => {
    expect(fitWithin({ width: 1200, height: 800 }, { maxWidth: 600, maxHeight: 350 })).toEqual({ width: 525, height: 350 });
  });

  it('should return the input when it already fits', () => {
    const size = { width: 400, height: 300 };

    expect(fitWithin(size, { maxWidth: 600, maxHeight: 350 })).toBe(size);
  });

  it('should honour a single configured bound', () => {
    expect(fitWithin({ width: 1000, height: 500 }, { maxWidth: 100 })).toEqual({ width: 100, height: 50 });
    expect(fitWithin({ width: 1000, height: 500 }, { maxHeight: 100 })).toEqual({ width: 200, height: 100 });
  });

  it('should never produce a zero dimension', () => {
    expect(fitWithin({ width: 5000, height: 1 }, { maxWidth: 100, maxHeight: 100 })).toEqual({ width: 100, height: 1 });
  });
});

describe('ImageNormalizer', () => {
  const normalizer = new ImageNormalizer({ maxWidth: 600, maxHeight: 350 });

  it('should downscale an oversized image', async () => {
    const data = await makeImage(1200, 800, 'jpeg');

    const { media, outcome } = await normalizer.normalize({ filename: 'photo.jpg', data, contentType: 'image/jpeg' });

    expect(outcome).toBe('resized');
    expect(media.kind).toBe('image');
    expect(media.contentType).toBe('image/jpeg');
    const metadata = await sharp(media.content).metadata();
    expect(metadata.width).toBe(525);
    expect(metadata.height).toBe(350);
  });

  it('should pass a small image through untouched', async () => {
    const data = await makeImage(400, 300);

    const { media, outcome } = await normalizer.normalize({ filename: 'small.png', data, contentType: 'image/png' });

    expect(outcome).toBe('unchanged');
    expect(media.content).toBe(data);
  });

  it('should pass images through when no bound is configured', async () => {
    const data = Buffer.from('not decoded');

    const { outcome } = await new ImageNormalizer({}).normalize({ filename: 'x.png', data, contentType: 'image/png' });

    expect(outcome).toBe('unchanged');
  });

  it('should flag non-image content as unsupported', async () => {
    const data = Buffer.from('%PDF-1.4');

    const { media, outcome } = await normalizer.normalize({ filename: 'doc.pdf', data, contentType: 'application/pdf' });

    expect(outcome).toBe('unsupported');
    expect(media.kind).toBe('unsupported');
  });

  it('should recognise images served with a generic content type', async () => {
    const small = await makeImage(400, 300);
    const large = await makeImage(1200, 800, 'jpeg');

    const unchanged = await normalizer.normalize({ filename: 'small', data: small, contentType: 'application/octet-stream' });
    const resized = await normalizer.normalize({ filename: 'large', data: large, contentType: 'binary/octet-stream' });
    const unbounded = await new ImageNormalizer({}).normalize({ filename: 'small', data: small, contentType: 'application/octet-stream' });

    expect(unchanged.outcome).toBe('unchanged');
    expect(unchanged.media).toMatchObject({ kind: 'image', contentType: 'image/png' });
    expect(resized.outcome).toBe('resized');
    expect(resized.media).toMatchObject({ kind: 'image', contentType: 'image/jpeg' });
    expect(unbounded.outcome).toBe('unchanged');
    expect(unbounded.media.contentType).toBe('image/png');
  });

  it('should flag formats that cannot be re-encoded as unsupported', async () => {
    const svg = Buffer.from('<svg xmlns="http://www.w3.org/2000/svg" width="900" height="900"><rect width="900" height="900"/></svg>');

    const { outcome } = await normalizer.normalize({ filename: 'drawing.svg', data: svg, contentType: 'image/svg+xml' });

    expect(outcome).toBe('unsupported');
  });

  it('should fail on undecodable image data', async () => {
    const data = Buffer.from('definitely not an image');

    await expect(normalizer.normalize({ filename: 'broken.jpg', data, contentType: 'image/jpeg' }))
      .rejects.toBeInstanceOf(TransformError);
  });

  it('should render a placeholder of the bound size', async () => {
    const png = await normalizer.placeholder('Unable to download image "https://cdn.example/a.png": 404');

    const metadata = await sharp(png).metadata();
    expect(metadata.format).toBe('png');
    expect(metadata.width).toBe(600);
    expect(metadata.height).toBe(350);
  });
});
