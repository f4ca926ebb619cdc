import { ConfigurationError } from '@/core/errors';

export type AccountFlag = 'noboosts' | 'noreplies';

export interface AccountSource {
  kind: 'account';
  handle: string;
  instance: string;
  flags: ReadonlySet<AccountFlag>;
}

export interface HashtagSource {
  kind: 'hashtag';
  tag: string;
  instance: string;
}

export type Source = AccountSource | HashtagSource;

export type SourceKind = Source['kind'];

function splitReference(reference: string, prefix: '@' | '#'): { name: string; instance: string } {
  const trimmed = reference.trim();
  const withoutPrefix = trimmed.startsWith(prefix) ? trimmed.slice(1) : trimmed;
  const parts = withoutPrefix.split('@');

  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new ConfigurationError(`Invalid reference "${reference}", expected <name>@<instance>`);
  }

  return { name: parts[0], instance: parts[1].toLowerCase() };
}

export function parseAccountRef(reference: string, flags: Iterable<AccountFlag> = []): AccountSource {
  const { name, instance } = splitReference(reference, '@');
  return { kind: 'account', handle: name, instance, flags: new Set(flags) };
}

export function parseHashtagRef(reference: string): HashtagSource {
  const { name, instance } = splitReference(reference, '#');
  return { kind: 'hashtag', tag: name, instance };
}

/**
 * Identity of a source in the state file.
 */
export function sourceKey(source: Source): string {
  switch (source.kind) {
    case 'account':
      return `account:${source.handle}@${source.instance}`.toLowerCase();
    case 'hashtag':
      return `hashtag:${source.tag}@${source.instance}`.toLowerCase();
  }
}

export function describeSource(source: Source): string {
  switch (source.kind) {
    case 'account':
      return `${source.handle}@${source.instance}`;
    case 'hashtag':
      return `#${source.tag}@${source.instance}`;
  }
}
