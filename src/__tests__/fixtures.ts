import * as fsp from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { HttpFetch, HttpResponse } from '@/services/mastodon';
import type { RawPost } from '@/types/post';
import type { MastodonStatus } from '@/types/status';

export const INSTANCE = 'social.example';

type Route = () => HttpResponse | Promise<HttpResponse>;

function toArrayBuffer(data: Buffer): ArrayBuffer {
  const copy = new ArrayBuffer(data.byteLength);
  new Uint8Array(copy).set(data);
  return copy;
}

export function jsonResponse(body: unknown, status = 200): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    headers: { get: name => name.toLowerCase() === 'content-type' ? 'application/json' : null },
    json: async () => body,
    arrayBuffer: async () => toArrayBuffer(Buffer.from(JSON.stringify(body)))
  };
}

export function binaryResponse(data: Buffer, contentType: string): HttpResponse {
  return {
    ok: true,
    status: 200,
    statusText: 'OK',
    headers: { get: name => name.toLowerCase() === 'content-type' ? contentType : null },
    json: async () => {
      throw new SyntaxError('Unexpected token in JSON');
    },
    arrayBuffer: async () => toArrayBuffer(data)
  };
}

/**
 * In-process stand-in for the network: exact-URL routes, 404 for anything else.
 */
export class FakeHttp {
  readonly requests: string[] = [];
  private readonly routes = new Map<string, Route>();

  json(url: string, body: unknown, status = 200): this {
    this.routes.set(url, () => jsonResponse(body, status));
    return this;
  }

  binary(url: string, data: Buffer, contentType: string): this {
    this.routes.set(url, () => binaryResponse(data, contentType));
    return this;
  }

  fail(url: string, error: Error): this {
    this.routes.set(url, () => {
      throw error;
    });
    return this;
  }

  /** Registers the two requests an account timeline fetch makes. */
  account(username: string, statuses: MastodonStatus[], instance = INSTANCE, limit = 40): this {
    this.json(`https://${instance}/api/v1/accounts/lookup?acct=${username}`, {
      id: `id-${username}`,
      username,
      acct: username
    });
    return this.json(`https://${instance}/api/v1/accounts/id-${username}/statuses?limit=${limit}`, statuses);
  }

  hashtag(tag: string, statuses: MastodonStatus[], instance = INSTANCE, limit = 40): this {
    return this.json(`https://${instance}/api/v1/timelines/tag/${tag}?limit=${limit}`, statuses);
  }

  count(url: string): number {
    return this.requests.filter(request => request === url).length;
  }

  readonly fetch: HttpFetch = async url => {
    this.requests.push(url);
    const route = this.routes.get(url);
    if (!route) {
      return jsonResponse({ error: 'Record not found' }, 404);
    }
    return route();
  };
}

/**
 * A status as the Mastodon API serves it, authored by `username` on `instance`.
 */
export function makeStatus(
  id: string,
  overrides: Partial<MastodonStatus> = {},
  username = 'alice',
  instance = INSTANCE
): MastodonStatus {
  return {
    id,
    uri: `https://${instance}/users/${username}/statuses/${id}`,
    url: `https://${instance}/@${username}/${id}`,
    created_at: '2024-05-01T10:00:00.000Z',
    content: `<p>Post ${id}</p>`,
    spoiler_text: '',
    in_reply_to_id: null,
    account: { id: `id-${username}`, username, acct: username, display_name: 'Alice Example' },
    application: null,
    card: null,
    media_attachments: [],
    reblog: null,
    ...overrides
  };
}

export function makeRawPost(id: string, overrides: Partial<RawPost> = {}): RawPost {
  return {
    key: `https://${INSTANCE}/users/alice/statuses/${id}`,
    id,
    uri: `https://${INSTANCE}/users/alice/statuses/${id}`,
    url: `https://${INSTANCE}/@alice/${id}`,
    instance: INSTANCE,
    createdAt: '2024-05-01T10:00:00.000Z',
    html: `<p>Post ${id}</p>`,
    isBoost: false,
    isReply: false,
    account: { id: 'id-alice', username: 'alice', acct: 'alice', displayName: 'Alice Example' },
    media: [],
    ...overrides
  };
}

export async function makeTempDir(): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), 'timeline-mailer-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fsp.rm(dir, { recursive: true, force: true });
}
