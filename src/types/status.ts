import { z } from 'zod';

/**
 * Subset of the Mastodon REST entities the relay reads. Unknown fields are
 * ignored; fields that are documented as nullable but missing on some server
 * implementations are accepted as optional.
 */
const AccountSchema = z.object({
  id: z.string(),
  username: z.string(),
  acct: z.string(),
  display_name: z.string().nullish(),
  url: z.string().nullish()
});

const MediaAttachmentSchema = z.object({
  id: z.string(),
  type: z.string(),
  url: z.string().nullish(),
  preview_url: z.string().nullish(),
  description: z.string().nullish(),
  meta: z.object({
    original: z.object({
      width: z.number().optional(),
      height: z.number().optional()
    }).nullish()
  }).nullish()
});

const CardSchema = z.object({
  url: z.string(),
  title: z.string().nullish(),
  image: z.string().nullish()
});

const ApplicationSchema = z.object({
  name: z.string(),
  website: z.string().nullish()
});

const BaseStatusSchema = z.object({
  id: z.string(),
  uri: z.string(),
  url: z.string().nullish(),
  created_at: z.string(),
  content: z.string().nullish(),
  spoiler_text: z.string().nullish(),
  in_reply_to_id: z.string().nullish(),
  account: AccountSchema,
  application: ApplicationSchema.nullish(),
  card: CardSchema.nullish(),
  media_attachments: z.array(MediaAttachmentSchema).nullish()
});

export const StatusSchema = BaseStatusSchema.extend({
  reblog: BaseStatusSchema.nullish()
});

export const StatusListSchema = z.array(StatusSchema);

export const AccountLookupSchema = AccountSchema.pick({ id: true, username: true, acct: true });

export const NodeInfoLinksSchema = z.object({
  links: z.array(z.object({
    rel: z.string(),
    href: z.string()
  })).default([])
});

export const NodeInfoSchema = z.object({
  software: z.object({
    name: z.string(),
    version: z.string().nullish()
  }).optional()
});

export type MastodonAccount = z.infer<typeof AccountSchema>;
export type MastodonMediaAttachment = z.infer<typeof MediaAttachmentSchema>;
export type MastodonStatus = z.infer<typeof StatusSchema>;
