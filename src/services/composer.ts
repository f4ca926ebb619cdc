import type { MailAttachment, Message, Post, PostAccount, RawPost } from '@/types/post';
import { collapseWhitespace, hostOf, TRUNCATION_MARKER, truncateText } from '@/utils/text';

const SEPARATOR = '--------------------------------';

export interface ComposerOptions {
  from: string;
  recipient: string;
  maximumSubjectLength: number;
  attachUnsupportedMedia: boolean;
  /** Right-hand side of generated Message-IDs */
  hostname: string;
}

/**
 * Subject line for a post: its text on one line, cut to `maxLength` with a
 * trailing ellipsis when longer.
 */
export function composeSubject(text: string, maxLength: number): string {
  const line = collapseWhitespace(text);
  return line ? truncateText(line, maxLength, TRUNCATION_MARKER) : TRUNCATION_MARKER;
}

function describeAccount(account: PostAccount): string {
  return `${account.displayName} (@${account.username})`;
}

/** `user@host` of the account that published `post` on its timeline */
function accountReference(post: RawPost): string {
  const account = post.boostedBy ?? post.account;
  if (account.acct.includes('@')) {
    return account.acct.toLowerCase();
  }
  return `${account.username}@${hostOf(post.url) || post.instance}`.toLowerCase();
}

/**
 * Builds the notification mail for one transformed post.
 */
export class NotificationComposer {
  constructor(private readonly options: ComposerOptions) {}

  compose(post: Post): Message {
    const raw = post.raw;
    const headers: Record<string, string> = {
      'X-Toot-URI': raw.uri,
      'X-Toot-Account': accountReference(raw)
    };

    return {
      from: { name: this.senderName(raw), address: this.options.from },
      to: this.options.recipient,
      subject: composeSubject(post.text, this.options.maximumSubjectLength),
      text: this.composeBody(post),
      date: this.postDate(raw),
      messageId: this.messageId(raw),
      inReplyTo: raw.isReply && post.inReplyTo ? this.messageId(post.inReplyTo) : undefined,
      headers,
      attachments: this.attachments(post)
    };
  }

  messageId(post: RawPost): string {
    const username = (post.boostedBy ?? post.account).username;
    const host = hostOf(post.url) || post.instance;
    return `<${username}.${host}.${post.id}@${this.options.hostname}>`;
  }

  private senderName(raw: RawPost): string {
    return raw.boostedBy
      ? `${raw.boostedBy.displayName}: ${raw.account.displayName}`
      : raw.account.displayName;
  }

  private postDate(raw: RawPost): Date {
    const date = new Date(raw.createdAt);
    return Number.isNaN(date.getTime()) ? new Date() : date;
  }

  private composeBody(post: Post): string {
    const raw = post.raw;
    const timelineAccount = raw.boostedBy ?? raw.account;
    const host = hostOf(raw.url) || raw.instance;

    const application = raw.application
      ? raw.application.website ? `${raw.application.name} (${raw.application.website})` : raw.application.name
      : '-';
    const videos = post.videoUrls.length > 0
      ? post.videoUrls.map(url => `\n  - ${url}`).join('')
      : '-';

    const lines = [post.text, ''];
    if (post.card) {
      lines.push(SEPARATOR, `Card URL:   ${post.card.url}`, `Card Title: ${post.card.title ?? '-'}`, '');
    }
    lines.push(
      SEPARATOR,
      `Videos: ${videos}`,
      `Posted by: ${describeAccount(raw.account)}`,
      `Boosted by: ${raw.boostedBy ? describeAccount(raw.boostedBy) : '-'}`,
      `Application: ${application}`,
      '',
      `In Reply To: ${raw.isReply && post.inReplyTo ? post.inReplyTo.url : '-'}`,
      `URL: ${raw.boostedUrl ?? raw.url}`,
      `Timeline: https://${host}/@${timelineAccount.username}/with_replies`,
      `Toot ID: ${raw.id}`
    );

    return lines.join('\n') + '\n';
  }

  private attachments(post: Post): MailAttachment[] {
    return post.media
      .filter(media => media.kind === 'image' || this.options.attachUnsupportedMedia)
      .map(({ filename, content, contentType }) => ({ filename, content, contentType }));
  }
}
