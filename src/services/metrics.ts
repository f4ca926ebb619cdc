import * as fsp from 'fs/promises';
import * as path from 'path';
import client from 'prom-client';
import type { SourceKind } from '@/types/source';
import logger from '@/utils/logger';

export type NotificationStatus = 'sent' | 'failed' | 'seeded' | 'duplicate';
export type MediaOutcome = 'resized' | 'unchanged' | 'unsupported' | 'dropped' | 'placeholder';

export class MetricsService {
  private readonly registry: client.Registry;

  // Counters
  private readonly postsFetched: client.Counter<string>;
  private readonly notifications: client.Counter<string>;
  private readonly sourceFailures: client.Counter<string>;
  private readonly media: client.Counter<string>;

  // Gauges
  private readonly runDuration: client.Gauge<string>;
  private readonly lastRun: client.Gauge<string>;

  constructor() {
    this.registry = new client.Registry();

    this.postsFetched = new client.Counter({
      name: 'timeline_mailer_posts_fetched_total',
      help: 'Posts returned by timeline fetches after filtering',
      labelNames: ['kind'],
      registers: [this.registry]
    });

    this.notifications = new client.Counter({
      name: 'timeline_mailer_notifications_total',
      help: 'Posts handled by outcome',
      labelNames: ['status'],
      registers: [this.registry]
    });

    this.sourceFailures = new client.Counter({
      name: 'timeline_mailer_source_failures_total',
      help: 'Sources skipped because their fetch failed',
      labelNames: ['kind'],
      registers: [this.registry]
    });

    this.media = new client.Counter({
      name: 'timeline_mailer_media_total',
      help: 'Media items by transformation outcome',
      labelNames: ['outcome'],
      registers: [this.registry]
    });

    this.runDuration = new client.Gauge({
      name: 'timeline_mailer_run_duration_seconds',
      help: 'Duration of the last run in seconds',
      registers: [this.registry]
    });

    this.lastRun = new client.Gauge({
      name: 'timeline_mailer_last_run_timestamp_seconds',
      help: 'Unix time the last run finished',
      registers: [this.registry]
    });
  }

  incrementPostsFetched(kind: SourceKind, count: number): void {
    this.postsFetched.inc({ kind }, count);
  }

  incrementNotifications(status: NotificationStatus, count = 1): void {
    this.notifications.inc({ status }, count);
  }

  incrementSourceFailures(kind: SourceKind): void {
    this.sourceFailures.inc({ kind });
  }

  incrementMedia(outcome: MediaOutcome): void {
    this.media.inc({ outcome });
  }

  startRunTimer() {
    const startTime = Date.now();
    return () => {
      const duration = (Date.now() - startTime) / 1000;
      this.runDuration.set(duration);
      this.lastRun.set(Math.floor(Date.now() / 1000));
      return duration;
    };
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  /**
   * Writes the registry for node_exporter's textfile collector. The file is
   * replaced atomically so the collector never reads a partial file.
   */
  async writeTextfile(filePath: string): Promise<void> {
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    try {
      await fsp.mkdir(path.dirname(filePath), { recursive: true });
      await fsp.writeFile(tmpPath, await this.getMetrics(), 'utf8');
      await fsp.rename(tmpPath, filePath);
    } catch (error) {
      logger.warn('Failed to write metrics textfile', { filePath, error });
      await fsp.rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        logger.debug('Failed to remove temporary metrics file', { tmpPath, error: cleanupError });
      });
    }
  }
}
