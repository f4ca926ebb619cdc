import * as fsp from 'fs/promises';
import * as path from 'path';
import { makeTempDir, removeTempDir } from '../../__tests__/fixtures';
import { ConfigurationError } from '@/core/errors';
import { deepMerge, loadConfig } from '../index';

const MINIMAL = {
  state: { filePath: 'data/state.json', lockFilePath: 'data/run.lock' },
  mail: { from: 'sender@example.com', recipient: 'reader@example.com', host: 'localhost', port: 2525 }
};

describe('loadConfig', () => {
  let dir: string;

  const writeConfig = async (name: string, content: unknown) => {
    await fsp.mkdir(path.join(dir, 'config'), { recursive: true });
    await fsp.writeFile(path.join(dir, 'config', name), JSON.stringify(content));
  };

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should apply defaults and resolve paths against the working directory', async () => {
    await writeConfig('default.json', MINIMAL);

    const config = loadConfig({ cwd: dir, env: {} });

    expect(config.timeline.limit).toBe(40);
    expect(config.timeline.firstRunPolicy).toBe('seed');
    expect(config.timeline.pauseBetweenSourcesMs).toEqual({ min: 3000, max: 10000 });
    expect(config.timeline.parentDepth).toBe(3);
    expect(config.state.flushEachPost).toBe(true);
    expect(config.state.retainPerSource).toBe(0);
    expect(config.mail.maximumSubjectLength).toBe(75);
    expect(config.mail.secure).toBe(false);
    expect(config.http.timeoutSeconds).toBe(60);
    expect(config.images.placeholderOnDownloadError).toBe(true);
    expect(config.state.filePath).toBe(path.join(dir, 'data', 'state.json'));
    expect(config.state.lockFilePath).toBe(path.join(dir, 'data', 'run.lock'));
  });

  it('should merge the environment file over the defaults', async () => {
    await writeConfig('default.json', { ...MINIMAL, timeline: { limit: 20, resolveOriginal: false } });
    await writeConfig('production.json', { timeline: { limit: 10 } });

    const config = loadConfig({ cwd: dir, env: { NODE_ENV: 'production' } });

    expect(config.timeline.limit).toBe(10);
    expect(config.timeline.resolveOriginal).toBe(false);
  });

  it('should prefer an explicit path', async () => {
    await writeConfig('default.json', { nonsense: true });
    await fsp.writeFile(path.join(dir, 'custom.json'), JSON.stringify({ ...MINIMAL, hashtags: ['cats@social.example'] }));

    const config = loadConfig({ cwd: dir, env: {}, configPath: 'custom.json' });

    expect(config.hashtags).toEqual(['cats@social.example']);
  });

  it('should substitute environment variables', async () => {
    await writeConfig('default.json', { ...MINIMAL, mail: { ...MINIMAL.mail, host: '${SMTP_HOST}' } });

    const config = loadConfig({ cwd: dir, env: { SMTP_HOST: 'mail.example.com' } });

    expect(config.mail.host).toBe('mail.example.com');
  });

  it('should reject a missing environment variable', async () => {
    await writeConfig('default.json', { ...MINIMAL, mail: { ...MINIMAL.mail, host: '${SMTP_HOST}' } });

    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow('Missing required environment variable: SMTP_HOST');
  });

  it('should list every validation issue', async () => {
    await writeConfig('default.json', {
      ...MINIMAL,
      mail: { ...MINIMAL.mail, recipient: 'not-an-address' },
      accounts: [{ handle: 'alice' }]
    });

    let caught: unknown;
    try {
      loadConfig({ cwd: dir, env: {} });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    const message = caught instanceof Error ? caught.message : '';
    expect(message).toContain('mail.recipient');
    expect(message).toContain('accounts.0.handle: expected <name>@<instance>');
  });

  it('should require retention to cover the fetch window', async () => {
    await writeConfig('default.json', { ...MINIMAL, state: { ...MINIMAL.state, retainPerSource: 10 } });

    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow('must be 0 or at least timeline.limit (40)');
  });

  it('should reject a pause range with min above max', async () => {
    await writeConfig('default.json', { ...MINIMAL, timeline: { pauseBetweenSourcesMs: { min: 5, max: 1 } } });

    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow('min must not exceed max');
  });

  it('should report a missing configuration file', () => {
    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(ConfigurationError);
  });
});

describe('deepMerge', () => {
  it('should merge nested objects and replace arrays', () => {
    expect(deepMerge({ a: { b: 1, c: 2 }, list: [1, 2] }, { a: { c: 3 }, list: [3] }))
      .toEqual({ a: { b: 1, c: 3 }, list: [3] });
  });
});
