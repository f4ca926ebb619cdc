import { fetch, ProxyAgent } from 'undici';
import type { ZodType, ZodTypeDef } from 'zod';
import { errorMessage, FetchError } from '@/core/errors';
import {
  AccountLookupSchema,
  NodeInfoLinksSchema,
  NodeInfoSchema,
  StatusListSchema,
  StatusSchema,
  type MastodonStatus
} from '@/types/status';
import logger from '@/utils/logger';

const NODEINFO_SCHEMA_REL = 'http://nodeinfo.diaspora.software/ns/schema/2.0';

export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  headers: { get(name: string): string | null };
  json(): Promise<unknown>;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface HttpRequestInit {
  headers: Record<string, string>;
  signal: AbortSignal;
}

/** The network capability; swapped for an in-process fake in tests. */
export type HttpFetch = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export function createHttpFetch(proxy?: string): HttpFetch {
  const dispatcher = proxy ? new ProxyAgent(proxy) : undefined;
  return (url, init) => fetch(url, { ...init, dispatcher });
}

export interface MastodonClientOptions {
  timeoutMs: number;
  userAgent: string;
}

export interface DownloadedFile {
  data: Buffer;
  contentType?: string;
}

export interface InstanceSoftware {
  name: string;
  version?: string;
}

/**
 * Read-only client for the public Mastodon REST API. JSON responses are cached
 * for the lifetime of the client, i.e. for one run.
 */
export class MastodonClient {
  private readonly cache = new Map<string, unknown>();

  constructor(
    private readonly http: HttpFetch,
    private readonly options: MastodonClientOptions
  ) {}

  async lookupAccountId(handle: string, instance: string): Promise<string> {
    const account = await this.getJson(
      this.apiUrl(instance, 'api/v1/accounts/lookup', { acct: handle }),
      AccountLookupSchema
    );
    return account.id;
  }

  async accountStatuses(accountId: string, instance: string, limit: number): Promise<MastodonStatus[]> {
    return this.getJson(
      this.apiUrl(instance, `api/v1/accounts/${encodeURIComponent(accountId)}/statuses`, { limit: String(limit) }),
      StatusListSchema
    );
  }

  async tagTimeline(tag: string, instance: string, limit: number): Promise<MastodonStatus[]> {
    return this.getJson(
      this.apiUrl(instance, `api/v1/timelines/tag/${encodeURIComponent(tag)}`, { limit: String(limit) }),
      StatusListSchema
    );
  }

  async status(id: string, instance: string): Promise<MastodonStatus> {
    return this.getJson(
      this.apiUrl(instance, `api/v1/statuses/${encodeURIComponent(id)}`),
      StatusSchema
    );
  }

  /**
   * Discovers the server software through NodeInfo 2.0.
   *
   * @returns null when the instance does not publish NodeInfo
   */
  async instanceSoftware(instance: string): Promise<InstanceSoftware | null> {
    try {
      const { links } = await this.getJson(this.apiUrl(instance, '.well-known/nodeinfo'), NodeInfoLinksSchema);
      const link = links.find(l => l.rel === NODEINFO_SCHEMA_REL);
      if (!link) {
        return null;
      }

      const nodeInfo = await this.getJson(link.href, NodeInfoSchema);
      if (!nodeInfo.software) {
        return null;
      }
      return {
        name: nodeInfo.software.name.toLowerCase(),
        version: nodeInfo.software.version ?? undefined
      };
    } catch (error) {
      logger.info('Error on querying node info', { instance, error: errorMessage(error) });
      return null;
    }
  }

  /**
   * Downloads a media file. Not cached.
   *
   * @param referer instance the media belongs to; some CDNs require it
   */
  async download(url: string, referer?: string): Promise<DownloadedFile> {
    const headers: Record<string, string> = { 'User-Agent': this.options.userAgent };
    if (referer) {
      headers['Referer'] = `https://${referer}`;
    }

    const response = await this.request(url, headers);
    return {
      data: Buffer.from(await response.arrayBuffer()),
      contentType: response.headers.get('content-type')?.split(';')[0].trim() || undefined
    };
  }

  private apiUrl(instance: string, endpoint: string, query?: Record<string, string>): string {
    const url = new URL(endpoint, `https://${instance}/`);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  private async getJson<T>(url: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    const cached = this.cache.get(url);
    let data: unknown;

    if (cached !== undefined) {
      data = cached;
    } else {
      const response = await this.request(url, {
        'Accept': 'application/json',
        'User-Agent': this.options.userAgent
      });
      try {
        data = await response.json();
      } catch (error) {
        throw new FetchError(`Invalid JSON from ${url}`, response.status, { url }, { cause: error });
      }
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new FetchError(`Malformed response from ${url}`, undefined, {
        url,
        issues: parsed.error.issues.slice(0, 3).map(issue => `${issue.path.join('.')}: ${issue.message}`)
      });
    }

    this.cache.set(url, data);
    return parsed.data;
  }

  private async request(url: string, headers: Record<string, string>): Promise<HttpResponse> {
    logger.debug('HTTP GET', { url });

    let response: HttpResponse;
    try {
      response = await this.http(url, { headers, signal: AbortSignal.timeout(this.options.timeoutMs) });
    } catch (error) {
      throw new FetchError(`Request to ${url} failed: ${errorMessage(error)}`, undefined, { url }, { cause: error });
    }

    if (!response.ok) {
      throw new FetchError(`${url} returned ${response.status}: ${response.statusText}`, response.status, { url });
    }
    return response;
  }
}
