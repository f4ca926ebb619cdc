import { planCycle, type FirstRunPolicy } from '@/core/dedup';
import { ConfigurationError, errorMessage, isTimeoutError, StateStoreError } from '@/core/errors';
import { RunLock, withRunLock, type LockToken } from '@/core/run-lock';
import { StateStore } from '@/core/state-store';
import { NotificationComposer } from '@/services/composer';
import { MetricsService } from '@/services/metrics';
import { PostTransformer } from '@/services/post-transformer';
import { authorReference, SourceFetcher } from '@/services/source-fetcher';
import type { Message, RawPost } from '@/types/post';
import { describeSource, parseAccountRef, sourceKey, type Source } from '@/types/source';
import logger from '@/utils/logger';
import { delay, randomBetween } from '@/utils/time';

export interface MessageSender {
  deliver(message: Message): Promise<void>;
}

export interface RelayOptions {
  stateFilePath: string;
  limit: number;
  firstRunPolicy: FirstRunPolicy;
  flushEachPost: boolean;
  /** 0 keeps every identifier */
  retainPerSource: number;
  /** Unseen ancestors of a reply mailed ahead of it */
  parentDepth: number;
  pauseBetweenSourcesMs: { min: number; max: number };
  metricsTextfilePath?: string;
}

export interface RunReport {
  sent: number;
  failed: number;
  seeded: number;
  duplicates: number;
  failedSources: string[];
}

interface RunContext {
  state: StateStore;
  report: RunReport;
  /** Keys delivered during this run, across all sources */
  delivered: Set<string>;
}

/**
 * Parses a `<status id>@<instance>` reference.
 */
export function parseStatusRef(reference: string): { id: string; instance: string } {
  const parts = reference.trim().split('@');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new ConfigurationError(`Invalid status reference "${reference}", expected <id>@<instance>`);
  }
  return { id: parts[0], instance: parts[1].toLowerCase() };
}

/**
 * One run of the pipeline: lock, load state, then fetch, select, transform,
 * compose and deliver for every source. A post is recorded as seen only once
 * its mail has been accepted.
 */
export class TimelineRelay {
  private activeToken: LockToken | null = null;

  constructor(
    private readonly lock: RunLock,
    private readonly fetcher: SourceFetcher,
    private readonly transformer: PostTransformer,
    private readonly composer: NotificationComposer,
    private readonly sender: MessageSender,
    private readonly metrics: MetricsService,
    private readonly options: RelayOptions
  ) {}

  /**
   * Processes `sources` in order, pausing between them.
   *
   * @throws LockContentionError when another run holds the lock; nothing is read or written
   * @throws StateStoreError when the state cannot be loaded or written
   */
  async runSources(sources: readonly Source[]): Promise<RunReport> {
    return this.run(async context => {
      for (const [index, source] of sources.entries()) {
        if (index > 0) {
          await this.pause();
        }
        await this.processSource(source, context);
      }
    });
  }

  /**
   * Delivers a single status regardless of its seen state and records it under
   * its author's account.
   */
  async runSingleStatus(reference: string): Promise<RunReport> {
    const { id, instance } = parseStatusRef(reference);

    return this.run(async context => {
      const post = await this.fetcher.fetchStatus(id, instance);
      const source = parseAccountRef(authorReference(post));
      await this.notify(post, source, sourceKey(source), context);
    });
  }

  /**
   * Removes the lock file of the run in progress, if any. Meant for signal
   * handlers, which cannot wait for the asynchronous release.
   */
  releaseLockSync(): void {
    if (this.activeToken) {
      this.lock.releaseSync(this.activeToken);
      this.activeToken = null;
    }
  }

  private async run(body: (context: RunContext) => Promise<void>): Promise<RunReport> {
    return withRunLock(this.lock, async token => {
      this.activeToken = token;
      const stopTimer = this.metrics.startRunTimer();
      const report: RunReport = { sent: 0, failed: 0, seeded: 0, duplicates: 0, failedSources: [] };

      try {
        const state = await StateStore.load(this.options.stateFilePath);
        let storeFailed = false;
        try {
          await body({ state, report, delivered: new Set<string>() });
        } catch (error) {
          storeFailed = error instanceof StateStoreError;
          throw error;
        } finally {
          // A failed write is not retried; its error is the one reported
          if (!storeFailed && state.isDirty()) {
            await state.flush();
          }
        }
      } finally {
        const duration = stopTimer();
        if (this.options.metricsTextfilePath) {
          await this.metrics.writeTextfile(this.options.metricsTextfilePath);
        }
        this.activeToken = null;
        logger.info('Run finished', { ...report, durationSeconds: duration });
      }

      return report;
    });
  }

  private async processSource(source: Source, context: RunContext): Promise<void> {
    const { state, report } = context;
    const key = sourceKey(source);
    const name = describeSource(source);

    let posts: RawPost[];
    try {
      posts = await this.fetcher.fetch(source, this.options.limit);
    } catch (error) {
      logger.log(isTimeoutError(error) ? 'warn' : 'error', 'Skipping source after failed fetch', {
        source: name,
        error: errorMessage(error)
      });
      this.metrics.incrementSourceFailures(source.kind);
      report.failedSources.push(name);
      return;
    }

    this.metrics.incrementPostsFetched(source.kind, posts.length);

    const firstRun = !state.hasSource(key);
    const plan = planCycle(posts, firstRun ? undefined : state.seenSet(key), this.options.firstRunPolicy);

    if (firstRun && this.options.firstRunPolicy === 'seed') {
      state.seed(key, plan.seed);
      report.seeded += plan.seed.length;
      if (plan.seed.length > 0) {
        this.metrics.incrementNotifications('seeded', plan.seed.length);
      }
      logger.info('First run for source, recorded current posts without notifying', {
        source: name,
        seeded: plan.seed.length
      });
    }

    logger.debug('Source fetched', { source: name, fetched: posts.length, fresh: plan.deliver.length });

    for (const post of plan.deliver) {
      if (context.delivered.has(post.key)) {
        state.markSeen(key, post.key);
        report.duplicates++;
        this.metrics.incrementNotifications('duplicate');
        logger.debug('Post already delivered this run', { source: name, key: post.key });
        continue;
      }
      await this.notify(post, source, key, context);
    }

    if (this.options.retainPerSource > 0) {
      const dropped = state.prune(key, this.options.retainPerSource, posts.map(post => post.key));
      if (dropped > 0) {
        logger.debug('Pruned seen identifiers', { source: name, dropped });
      }
    }

    if (this.options.flushEachPost && state.isDirty()) {
      await state.flush();
    }
  }

  private async notify(
    post: RawPost,
    source: Source,
    key: string,
    context: RunContext,
    depth = 0
  ): Promise<void> {
    const { state, report } = context;

    try {
      const resolved = await this.fetcher.resolveContext(post);
      if (resolved.inReplyTo && depth < this.options.parentDepth) {
        await this.notifyParent(resolved.inReplyTo, context, depth + 1);
      }
      const transformed = await this.transformer.transform(resolved, source);
      const message = this.composer.compose(transformed);
      await this.sender.deliver(message);
      logger.info('Notification sent', { source: describeSource(source), key: post.key, subject: message.subject });
    } catch (error) {
      if (error instanceof StateStoreError) {
        throw error;
      }
      logger.error('Post not delivered, will retry next run', {
        source: describeSource(source),
        key: post.key,
        error: errorMessage(error)
      });
      report.failed++;
      this.metrics.incrementNotifications('failed');
      return;
    }

    state.markSeen(key, post.key);
    context.delivered.add(post.key);
    report.sent++;
    this.metrics.incrementNotifications('sent');

    if (this.options.flushEachPost) {
      await state.flush();
    }
  }

  /**
   * Mails the parent of a reply first, under its author's account, unless it
   * was seen there or delivered earlier in this run.
   */
  private async notifyParent(parent: RawPost, context: RunContext, depth: number): Promise<void> {
    if (context.delivered.has(parent.key)) {
      return;
    }

    let source: Source;
    try {
      source = parseAccountRef(authorReference(parent));
    } catch (error) {
      logger.warn('Parent author not addressable, skipping parent', { key: parent.key, error: errorMessage(error) });
      return;
    }

    const key = sourceKey(source);
    if (context.state.isSeen(key, parent.key)) {
      return;
    }

    logger.info('Delivering unseen parent ahead of its reply', { source: describeSource(source), key: parent.key });
    await this.notify(parent, source, key, context, depth);
  }

  private async pause(): Promise<void> {
    const { min, max } = this.options.pauseBetweenSourcesMs;
    if (max <= 0) {
      return;
    }
    const ms = randomBetween(min, max);
    logger.debug('Pausing before next source', { ms });
    await delay(ms);
  }
}
