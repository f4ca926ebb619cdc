import type { Source } from '@/types/source';

export type MediaType = 'image' | 'gifv' | 'video' | 'audio' | 'unknown';

export interface PostAccount {
  id: string;
  username: string;
  /** `user` for local accounts, `user@host` for remote ones */
  acct: string;
  displayName: string;
}

export interface RawMedia {
  id: string;
  type: MediaType;
  url?: string;
  previewUrl?: string;
  description?: string;
  width?: number;
  height?: number;
}

export interface PostCard {
  url: string;
  title?: string;
  image?: string;
}

/**
 * One status as returned by the timeline API, flattened so that a boost
 * carries the boosted content directly.
 */
export interface RawPost {
  /** Lower-cased ActivityPub URI; used as the dedup identifier */
  key: string;
  id: string;
  uri: string;
  url: string;
  /** Host the status was fetched from */
  instance: string;
  createdAt: string;
  html: string;
  /** Content warning, shown before the text */
  spoilerText?: string;
  isBoost: boolean;
  isReply: boolean;
  inReplyToId?: string;
  /** Author of the content (the boosted author for boosts) */
  account: PostAccount;
  boostedBy?: PostAccount;
  /** URL of the boosted status, for boosts */
  boostedUrl?: string;
  application?: { name: string; website?: string };
  card?: PostCard;
  media: RawMedia[];
}

export interface TransformedMedia {
  filename: string;
  content: Buffer;
  contentType?: string;
  /** `unsupported` items were not decoded and are attached only on request */
  kind: 'image' | 'unsupported';
}

export interface Post {
  raw: RawPost;
  source: Source;
  text: string;
  card?: PostCard;
  videoUrls: string[];
  media: TransformedMedia[];
  inReplyTo?: RawPost;
}

export interface MailAttachment {
  filename: string;
  content: Buffer;
  contentType?: string;
}

export interface Message {
  from: { name: string; address: string };
  to: string;
  subject: string;
  text: string;
  date: Date;
  messageId: string;
  inReplyTo?: string;
  headers: Record<string, string>;
  attachments: MailAttachment[];
}
