import { errorMessage, FetchError } from '@/core/errors';
import { MastodonClient } from '@/services/mastodon';
import type { MediaType, PostAccount, RawMedia, RawPost } from '@/types/post';
import type { Source } from '@/types/source';
import type { MastodonAccount, MastodonMediaAttachment, MastodonStatus } from '@/types/status';
import { hostOf, lastPathSegment } from '@/utils/text';
import logger from '@/utils/logger';

/** Server software whose API is not Mastodon compatible enough to follow replies. */
export const INCOMPATIBLE_INSTANCE_SOFTWARE: readonly string[] = [
  'akkoma',
  'firefish',
  'friendica',
  'gotosocial',
  'mammuthus (experimental)',
  'mitra',
  'pixelfed',
  'peertube'
];

const MEDIA_TYPES: readonly MediaType[] = ['image', 'gifv', 'video', 'audio'];

function toAccount(account: MastodonAccount): PostAccount {
  return {
    id: account.id,
    username: account.username,
    acct: account.acct,
    displayName: account.display_name || account.username
  };
}

function toMedia(attachment: MastodonMediaAttachment): RawMedia {
  const type = MEDIA_TYPES.find(t => t === attachment.type) ?? 'unknown';
  return {
    id: attachment.id,
    type,
    url: attachment.url ?? undefined,
    previewUrl: attachment.preview_url ?? undefined,
    description: attachment.description ?? undefined,
    width: attachment.meta?.original?.width,
    height: attachment.meta?.original?.height
  };
}

/**
 * Flattens a status into a RawPost. For boosts the boosted status provides
 * content, media and card; the wrapper keeps identity and the booster.
 *
 * @param instance host the status was fetched from
 */
export function normalizeStatus(status: MastodonStatus, instance: string): RawPost {
  const boosted = status.reblog ?? undefined;
  const content = boosted ?? status;
  const url = status.url || status.uri;

  const media = content.media_attachments?.length
    ? content.media_attachments
    : status.media_attachments ?? [];

  return {
    key: status.uri.toLowerCase(),
    id: status.id,
    uri: status.uri,
    url,
    instance,
    createdAt: status.created_at,
    html: content.content ?? '',
    spoilerText: content.spoiler_text || undefined,
    isBoost: boosted !== undefined,
    isReply: Boolean(status.in_reply_to_id),
    inReplyToId: status.in_reply_to_id ?? undefined,
    account: toAccount(content.account),
    boostedBy: boosted ? toAccount(status.account) : undefined,
    boostedUrl: boosted ? boosted.url || boosted.uri : undefined,
    application: status.application
      ? { name: status.application.name, website: status.application.website ?? undefined }
      : undefined,
    card: content.card
      ? { url: content.card.url, title: content.card.title ?? undefined, image: content.card.image ?? undefined }
      : undefined,
    media: media.map(toMedia)
  };
}

/**
 * Account identifier `user@host` of a post's author, as used for state keys
 * in single-status mode.
 */
export function authorReference(post: RawPost): string {
  const acct = post.account.acct;
  if (acct.includes('@')) {
    return acct.toLowerCase();
  }
  return `${post.account.username}@${post.instance}`.toLowerCase();
}

export interface PostContext {
  post: RawPost;
  inReplyTo?: RawPost;
}

export interface SourceFetcherOptions {
  /** Re-read statuses from their originating instance */
  resolveOriginal: boolean;
}

/**
 * Turns a configured source into the ordered, filtered list of its recent
 * posts.
 */
export class SourceFetcher {
  constructor(
    private readonly client: MastodonClient,
    private readonly options: SourceFetcherOptions
  ) {}

  /**
   * Fetches the most recent `limit` posts of a source, oldest first, with the
   * source's flags applied.
   *
   * @throws FetchError on network failures, HTTP errors and malformed responses
   */
  async fetch(source: Source, limit: number): Promise<RawPost[]> {
    const statuses = source.kind === 'account'
      ? await this.client.accountStatuses(
        await this.client.lookupAccountId(source.handle, source.instance),
        source.instance,
        limit
      )
      : await this.client.tagTimeline(source.tag, source.instance, limit);

    // The API answers newest first
    const posts = statuses.map(status => normalizeStatus(status, source.instance)).reverse();

    if (source.kind === 'hashtag') {
      return posts;
    }

    return posts.filter(post => {
      if (source.flags.has('noboosts') && post.isBoost) return false;
      if (source.flags.has('noreplies') && post.isReply) return false;
      return true;
    });
  }

  async fetchStatus(id: string, instance: string): Promise<RawPost> {
    return normalizeStatus(await this.client.status(id, instance), instance);
  }

  /**
   * Best-effort enrichment before composing: the originating instance's copy
   * of the status and, for replies, the parent (also from its origin). Never
   * throws.
   */
  async resolveContext(post: RawPost): Promise<PostContext> {
    const resolved = this.options.resolveOriginal ? await this.resolveOriginal(post) : post;
    const inReplyTo = resolved.isReply ? await this.resolveParent(resolved) : undefined;
    return { post: resolved, inReplyTo };
  }

  private async resolveOriginal(post: RawPost): Promise<RawPost> {
    // Boost wrappers only exist on the booster's instance
    if (post.isBoost) {
      return post;
    }

    const originHost = hostOf(post.url);
    const originId = lastPathSegment(post.url);
    if (!originHost || !originId || originHost === post.instance && originId === post.id) {
      return post;
    }

    try {
      const original = normalizeStatus(await this.client.status(originId, originHost), originHost);
      // Keep the identity the post was selected under
      return { ...original, key: post.key };
    } catch (error) {
      logger.info('Originating status could not be retrieved, using local copy', {
        statusId: originId,
        instance: originHost,
        status: error instanceof FetchError ? error.status : undefined,
        error: errorMessage(error)
      });
      return post;
    }
  }

  private async resolveParent(post: RawPost): Promise<RawPost | undefined> {
    if (!post.inReplyToId) {
      return undefined;
    }

    const software = await this.client.instanceSoftware(post.instance);
    if (software && INCOMPATIBLE_INSTANCE_SOFTWARE.includes(software.name)) {
      logger.info('Skipping reply lookup on incompatible instance software', {
        instance: post.instance,
        software: software.name,
        version: software.version
      });
      return undefined;
    }

    let parent: RawPost;
    try {
      parent = normalizeStatus(await this.client.status(post.inReplyToId, post.instance), post.instance);
    } catch (error) {
      const level = error instanceof FetchError && error.status === 404 ? 'info' : 'warn';
      logger.log(level, 'Parent status could not be retrieved', {
        statusId: post.inReplyToId,
        instance: post.instance,
        error: errorMessage(error)
      });
      return undefined;
    }

    // The origin's id is the one the parent's own mail is threaded under
    return this.options.resolveOriginal ? this.resolveOriginal(parent) : parent;
  }
}
