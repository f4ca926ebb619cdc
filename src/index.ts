#!/usr/bin/env node
import 'dotenv/config';
import * as os from 'os';
import { Command, Option } from 'commander';

// Core
import { ConfigurationError, LockContentionError, errorMessage } from '@/core/errors';
import { RunLock } from '@/core/run-lock';

// Services
import { NotificationComposer } from '@/services/composer';
import { ContentRewriter } from '@/services/content-rewriter';
import { ImageNormalizer } from '@/services/image-normalizer';
import { createSmtpTransport, Mailer } from '@/services/mailer';
import { createHttpFetch, MastodonClient, type HttpFetch } from '@/services/mastodon';
import { MetricsService } from '@/services/metrics';
import { PostTransformer } from '@/services/post-transformer';
import { TimelineRelay, type MessageSender } from '@/services/relay';
import { SourceFetcher } from '@/services/source-fetcher';

// Config & Utils
import { loadConfig } from '@/config';
import type { Config } from '@/types/config';
import { parseAccountRef, parseHashtagRef, type Source } from '@/types/source';
import logger, { setLogLevel } from '@/utils/logger';

export interface CliOptions {
  config?: string;
  status?: string;
  tag?: string;
  account?: string;
}

export interface RelayDependencies {
  http?: HttpFetch;
  sender?: MessageSender;
  metrics?: MetricsService;
}

export function configuredSources(config: Config): Source[] {
  return [
    ...config.accounts.map(account => parseAccountRef(account.handle, account.flags)),
    ...config.hashtags.map(tag => parseHashtagRef(tag))
  ];
}

/**
 * Wires the services of one run from the configuration. `dependencies`
 * replaces the network-facing pieces.
 */
export function createRelay(config: Config, dependencies: RelayDependencies = {}): {
  relay: TimelineRelay;
  close: () => void;
} {
  const metrics = dependencies.metrics ?? new MetricsService();
  const client = new MastodonClient(dependencies.http ?? createHttpFetch(config.http.proxy), {
    timeoutMs: config.http.timeoutSeconds * 1000,
    userAgent: config.http.userAgent
  });

  const fetcher = new SourceFetcher(client, { resolveOriginal: config.timeline.resolveOriginal });
  const transformer = new PostTransformer(
    new ContentRewriter(config.contentReplacements),
    new ImageNormalizer({ maxWidth: config.images.maxWidth, maxHeight: config.images.maxHeight }),
    client,
    metrics,
    { placeholderOnDownloadError: config.images.placeholderOnDownloadError }
  );
  const composer = new NotificationComposer({
    from: config.mail.from,
    recipient: config.mail.recipient,
    maximumSubjectLength: config.mail.maximumSubjectLength,
    attachUnsupportedMedia: config.mail.attachUnsupportedMedia,
    hostname: config.mail.hostname ?? os.hostname()
  });

  let mailer: Mailer | undefined;
  let sender = dependencies.sender;
  if (!sender) {
    const timeoutMs = config.mail.timeoutSeconds * 1000;
    mailer = new Mailer(createSmtpTransport({
      host: config.mail.host,
      port: config.mail.port,
      secure: config.mail.secure,
      timeoutMs
    }), timeoutMs);
    sender = mailer;
  }

  const relay = new TimelineRelay(
    new RunLock(config.state.lockFilePath),
    fetcher,
    transformer,
    composer,
    sender,
    metrics,
    {
      stateFilePath: config.state.filePath,
      limit: config.timeline.limit,
      firstRunPolicy: config.timeline.firstRunPolicy,
      flushEachPost: config.state.flushEachPost,
      retainPerSource: config.state.retainPerSource,
      parentDepth: config.timeline.parentDepth,
      pauseBetweenSourcesMs: config.timeline.pauseBetweenSourcesMs,
      metricsTextfilePath: config.metrics.textfilePath
    }
  );

  return { relay, close: () => mailer?.close() };
}

function setupSignalHandlers(relay: TimelineRelay): void {
  const exitCodes: Array<[NodeJS.Signals, number]> = [['SIGINT', 130], ['SIGTERM', 143]];

  for (const [signal, code] of exitCodes) {
    process.once(signal, () => {
      logger.warn(`Received ${signal}, releasing run lock and exiting`);
      relay.releaseLockSync();
      process.exit(code);
    });
  }
}

/**
 * Runs one cycle for the given options.
 *
 * @returns the process exit code
 */
export async function runCli(options: CliOptions, dependencies: RelayDependencies = {}): Promise<number> {
  let config: Config;
  try {
    config = loadConfig({ configPath: options.config });
  } catch (error) {
    logger.error(errorMessage(error));
    return 1;
  }
  setLogLevel(config.logging.level);

  let relay: TimelineRelay;
  let close: () => void;
  try {
    ({ relay, close } = createRelay(config, dependencies));
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }

  if (require.main === module) {
    setupSignalHandlers(relay);
  }

  try {
    if (options.status) {
      const report = await relay.runSingleStatus(options.status);
      return report.failed > 0 ? 1 : 0;
    }

    const sources = options.account
      ? [parseAccountRef(options.account)]
      : options.tag ? [parseHashtagRef(options.tag)] : configuredSources(config);
    if (sources.length === 0) {
      logger.warn('No accounts or hashtags configured, nothing to do');
    }
    await relay.runSources(sources);
    return 0;
  } catch (error) {
    if (error instanceof LockContentionError) {
      logger.info('Another run is in progress, exiting', { ownerPid: error.ownerPid });
      return 0;
    }
    logger.error('Run failed', { error });
    return 1;
  } finally {
    close();
  }
}

export function createProgram(): Command {
  return new Command()
    .name('timeline-mailer')
    .description('Mail new posts of Mastodon accounts and hashtags')
    .version('1.0.0')
    .option('-c, --config <path>', 'configuration file')
    .addOption(new Option('-s, --status <id@instance>', 'deliver a single status').conflicts(['tag', 'account']))
    .addOption(new Option('-t, --tag <tag@instance>', 'process a single hashtag').conflicts(['status', 'account']))
    .addOption(new Option('-u, --account <user@instance>', 'process a single account').conflicts(['status', 'tag']));
}

if (require.main === module) {
  const program = createProgram();
  program.parse();

  runCli(program.opts<CliOptions>())
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error('Unexpected failure', { error });
      process.exitCode = 1;
    });
}
