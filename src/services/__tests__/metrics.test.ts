import * as fsp from 'fs/promises';
import * as path from 'path';
import { makeTempDir, removeTempDir } from '../../__tests__/fixtures';
import { MetricsService } from '../metrics';

describe('MetricsService', () => {
  let metrics: MetricsService;

  beforeEach(() => {
    metrics = new MetricsService();
  });

  it('should count by label', async () => {
    metrics.incrementNotifications('sent');
    metrics.incrementNotifications('sent');
    metrics.incrementNotifications('seeded', 5);
    metrics.incrementPostsFetched('hashtag', 3);
    metrics.incrementSourceFailures('account');

    const exposition = await metrics.getMetrics();

    expect(exposition).toContain('timeline_mailer_notifications_total{status="sent"} 2');
    expect(exposition).toContain('timeline_mailer_notifications_total{status="seeded"} 5');
    expect(exposition).toContain('timeline_mailer_posts_fetched_total{kind="hashtag"} 3');
    expect(exposition).toContain('timeline_mailer_source_failures_total{kind="account"} 1');
  });

  it('should keep registries of separate instances apart', async () => {
    metrics.incrementNotifications('failed');

    expect(await new MetricsService().getMetrics()).not.toContain('timeline_mailer_notifications_total{status="failed"} 1');
  });

  it('should record the run duration', async () => {
    const stop = metrics.startRunTimer();

    const duration = stop();

    expect(duration).toBeGreaterThanOrEqual(0);
    expect(await metrics.getMetrics()).toMatch(/^timeline_mailer_last_run_timestamp_seconds \d+$/m);
  });

  describe('writeTextfile', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await removeTempDir(dir);
    });

    it('should write the exposition format', async () => {
      const file = path.join(dir, 'prom', 'timeline_mailer.prom');
      metrics.incrementMedia('resized');

      await metrics.writeTextfile(file);

      expect(await fsp.readFile(file, 'utf8')).toContain('timeline_mailer_media_total{outcome="resized"} 1');
      expect(await fsp.readdir(path.dirname(file))).toEqual(['timeline_mailer.prom']);
    });

    it('should not throw when the file cannot be written', async () => {
      const blocker = path.join(dir, 'blocker');
      await fsp.writeFile(blocker, '');

      await expect(metrics.writeTextfile(path.join(blocker, 'metrics.prom'))).resolves.toBeUndefined();
    });
  });
});
