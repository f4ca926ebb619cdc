import { makeRawPost } from '../../__tests__/fixtures';
import { parseAccountRef } from '@/types/source';
import type { Post } from '@/types/post';
import { composeSubject, NotificationComposer, type ComposerOptions } from '../composer';

const OPTIONS: ComposerOptions = {
  from: 'sender@example.com',
  recipient: 'reader@example.com',
  maximumSubjectLength: 75,
  attachUnsupportedMedia: false,
  hostname: 'mailer.test'
};

function makePost(overrides: Partial<Post> = {}): Post {
  return {
    raw: makeRawPost('101'),
    source: parseAccountRef('alice@social.example'),
    text: 'Hello world',
    videoUrls: [],
    media: [],
    ...overrides
  };
}

describe('composeSubject', () => {
  it('should truncate long text to the maximum with an ellipsis', () => {
    const subject = composeSubject('x'.repeat(200), 75);

    expect(subject).toBe('x'.repeat(74) + '…');
    expect(Array.from(subject)).toHaveLength(75);
  });

  it('should collapse whitespace onto one line', () => {
    expect(composeSubject('Hello\n\n  world ', 75)).toBe('Hello world');
  });

  it('should use an ellipsis for empty text', () => {
    expect(composeSubject('  \n ', 75)).toBe('…');
  });
});

describe('NotificationComposer', () => {
  const composer = new NotificationComposer(OPTIONS);

  it('should address and identify the message', () => {
    const message = composer.compose(makePost());

    expect(message.from).toEqual({ name: 'Alice Example', address: 'sender@example.com' });
    expect(message.to).toBe('reader@example.com');
    expect(message.subject).toBe('Hello world');
    expect(message.date.toISOString()).toBe('2024-05-01T10:00:00.000Z');
    expect(message.messageId).toBe('<alice.social.example.101@mailer.test>');
    expect(message.inReplyTo).toBeUndefined();
    expect(message.headers).toEqual({
      'X-Toot-URI': 'https://social.example/users/alice/statuses/101',
      'X-Toot-Account': 'alice@social.example'
    });
  });

  it('should lay out the body', () => {
    const message = composer.compose(makePost());

    expect(message.text).toBe([
      'Hello world',
      '',
      '--------------------------------',
      'Videos: -',
      'Posted by: Alice Example (@alice)',
      'Boosted by: -',
      'Application: -',
      '',
      'In Reply To: -',
      'URL: https://social.example/@alice/101',
      'Timeline: https://social.example/@alice/with_replies',
      'Toot ID: 101',
      ''
    ].join('\n'));
  });

  it('should describe boosts from the booster side', () => {
    const raw = makeRawPost('202', {
      url: 'https://social.example/@bob/202',
      isBoost: true,
      account: { id: '9', username: 'carol', acct: 'carol@other.example', displayName: 'Carol' },
      boostedBy: { id: '2', username: 'bob', acct: 'bob', displayName: 'Bob' },
      boostedUrl: 'https://other.example/@carol/55'
    });

    const message = composer.compose(makePost({ raw }));

    expect(message.from.name).toBe('Bob: Carol');
    expect(message.messageId).toBe('<bob.social.example.202@mailer.test>');
    expect(message.headers['X-Toot-Account']).toBe('bob@social.example');
    expect(message.text).toContain('\nPosted by: Carol (@carol)\nBoosted by: Bob (@bob)\n');
    expect(message.text).toContain('\nURL: https://other.example/@carol/55\n');
    expect(message.text).toContain('\nTimeline: https://social.example/@bob/with_replies\n');
  });

  it('should thread replies to a resolved parent', () => {
    const raw = makeRawPost('101', { isReply: true, inReplyToId: '100' });

    const message = composer.compose(makePost({ raw, inReplyTo: makeRawPost('100') }));

    expect(message.inReplyTo).toBe('<alice.social.example.100@mailer.test>');
    expect(message.text).toContain('\nIn Reply To: https://social.example/@alice/100\n');
  });

  it('should list card, videos and application', () => {
    const raw = makeRawPost('101', { application: { name: 'Tusky', website: 'https://tusky.app' } });

    const message = composer.compose(makePost({
      raw,
      card: { url: 'https://yewtu.be/watch?v=abc', title: 'A video' },
      videoUrls: ['https://cdn.example/v1.mp4', 'https://cdn.example/v2.mp4']
    }));

    expect(message.text).toBe([
      'Hello world',
      '',
      '--------------------------------',
      'Card URL:   https://yewtu.be/watch?v=abc',
      'Card Title: A video',
      '',
      '--------------------------------',
      'Videos: ',
      '  - https://cdn.example/v1.mp4',
      '  - https://cdn.example/v2.mp4',
      'Posted by: Alice Example (@alice)',
      'Boosted by: -',
      'Application: Tusky (https://tusky.app)',
      '',
      'In Reply To: -',
      'URL: https://social.example/@alice/101',
      'Timeline: https://social.example/@alice/with_replies',
      'Toot ID: 101',
      ''
    ].join('\n'));
  });

  it('should attach unsupported media only when enabled', () => {
    const media: Post['media'] = [
      { filename: 'a.png', content: Buffer.from('png'), contentType: 'image/png', kind: 'image' },
      { filename: 'b.pdf', content: Buffer.from('pdf'), contentType: 'application/pdf', kind: 'unsupported' }
    ];

    const defaults = composer.compose(makePost({ media }));
    const everything = new NotificationComposer({ ...OPTIONS, attachUnsupportedMedia: true }).compose(makePost({ media }));

    expect(defaults.attachments.map(a => a.filename)).toEqual(['a.png']);
    expect(everything.attachments.map(a => a.filename)).toEqual(['a.png', 'b.pdf']);
  });

  it('should fall back to the current time for an unparseable date', () => {
    const before = Date.now();

    const message = composer.compose(makePost({ raw: makeRawPost('101', { createdAt: 'garbage' }) }));

    expect(message.date.getTime()).toBeGreaterThanOrEqual(before);
  });
});
