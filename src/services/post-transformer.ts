import * as path from 'path';
import { errorMessage, FetchError, TransformError } from '@/core/errors';
import { ContentRewriter, htmlToText } from '@/services/content-rewriter';
import { ImageNormalizer } from '@/services/image-normalizer';
import type { DownloadedFile } from '@/services/mastodon';
import { MetricsService } from '@/services/metrics';
import type { PostContext } from '@/services/source-fetcher';
import type { Post, RawPost, TransformedMedia } from '@/types/post';
import type { Source } from '@/types/source';
import logger from '@/utils/logger';

export interface MediaDownloader {
  download(url: string, referer?: string): Promise<DownloadedFile>;
}

export interface PostTransformerOptions {
  placeholderOnDownloadError: boolean;
}

interface MediaRequest {
  url: string;
  filename: string;
}

function fileNameOf(url: string, fallback: string): string {
  try {
    return path.posix.basename(new URL(url).pathname) || fallback;
  } catch {
    return fallback;
  }
}

/**
 * Text of a post as it appears in the mail: content warning, then the status
 * HTML as text, with the substitution rules applied.
 */
export function renderText(post: RawPost, rewriter: ContentRewriter): string {
  const body = htmlToText(post.html);
  const text = post.spoilerText ? `${post.spoilerText}\n\n${body}` : body;
  return rewriter.rewrite(text);
}

/**
 * Turns a raw post into its mail-ready form: rewritten text and card URL,
 * downloaded and downscaled images. Media failures never fail the post.
 */
export class PostTransformer {
  constructor(
    private readonly rewriter: ContentRewriter,
    private readonly images: ImageNormalizer,
    private readonly downloader: MediaDownloader,
    private readonly metrics: MetricsService,
    private readonly options: PostTransformerOptions
  ) {}

  async transform(context: PostContext, source: Source): Promise<Post> {
    const raw = context.post;

    const videoUrls = raw.media.flatMap(media =>
      (media.type === 'gifv' || media.type === 'video') && media.url ? [media.url] : []);

    const media: TransformedMedia[] = [];
    for (const request of this.mediaRequests(raw)) {
      const item = await this.fetchMedia(request, raw);
      if (item) {
        media.push(item);
      }
    }

    return {
      raw,
      source,
      text: renderText(raw, this.rewriter),
      card: raw.card ? { ...raw.card, url: this.rewriter.rewrite(raw.card.url) } : undefined,
      videoUrls,
      media,
      inReplyTo: context.inReplyTo
    };
  }

  private mediaRequests(raw: RawPost): MediaRequest[] {
    const requests: MediaRequest[] = [];

    if (raw.card?.image) {
      requests.push({ url: raw.card.image, filename: `card_${fileNameOf(raw.card.image, 'image')}` });
    }

    for (const media of raw.media) {
      // Videos are linked in the body; their preview frame is attached
      const url = media.type === 'image' ? media.url : media.type === 'gifv' || media.type === 'video'
        ? media.previewUrl
        : undefined;
      if (url) {
        requests.push({ url, filename: fileNameOf(url, `media_${media.id}`) });
      }
    }

    return requests;
  }

  private async fetchMedia(request: MediaRequest, raw: RawPost): Promise<TransformedMedia | null> {
    logger.debug('Retrieve image', { url: request.url });

    let file: DownloadedFile;
    try {
      file = await this.downloader.download(request.url, raw.instance);
    } catch (error) {
      return this.downloadFailed(request, error);
    }

    try {
      const { media, outcome } = await this.images.normalize({
        filename: request.filename,
        data: file.data,
        contentType: file.contentType
      });
      this.metrics.incrementMedia(outcome);
      return media;
    } catch (error) {
      if (!(error instanceof TransformError)) {
        throw error;
      }
      logger.warn('Dropping media that could not be transformed', {
        postId: raw.id,
        filename: request.filename,
        error: error.message
      });
      this.metrics.incrementMedia('dropped');
      return null;
    }
  }

  private async downloadFailed(request: MediaRequest, error: unknown): Promise<TransformedMedia | null> {
    const message = `Unable to download image "${request.url}": ${errorMessage(error)}`;
    logger.warn(message);

    // Only HTTP answers get a placeholder; timeouts and network errors drop the item
    if (!this.options.placeholderOnDownloadError || !(error instanceof FetchError) || error.status === undefined) {
      this.metrics.incrementMedia('dropped');
      return null;
    }

    try {
      const content = await this.images.placeholder(message);
      this.metrics.incrementMedia('placeholder');
      return { filename: `${request.filename}.png`, content, contentType: 'image/png', kind: 'image' };
    } catch (placeholderError) {
      logger.warn('Unable to render placeholder image', { error: errorMessage(placeholderError) });
      this.metrics.incrementMedia('dropped');
      return null;
    }
  }
}
