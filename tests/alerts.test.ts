import { describe, expect, it, vi } from 'vitest';
import { AlertDispatcher, alertReason, formatAlertMessage, type AlertCandidate } from '../src/services/alerts.js';

function candidate(overrides: Partial<AlertCandidate> = {}): AlertCandidate {
  return {
    title: 'Fed announces emergency rate cut',
    link: 'https://news.example.test/fed',
    source: 'Test Wire',
    score_normalized: 97.5,
    alert_threshold: 90,
    themes: ['monetary_emergency'],
    ...overrides,
  };
}

describe('alertReason', () => {
  it('names why an article qualifies', () => {
    expect(alertReason(candidate())).toBe('both');
    expect(alertReason(candidate({ themes: [] }))).toBe('score');
    expect(alertReason(candidate({ score_normalized: 12 }))).toBe('theme');
    expect(alertReason(candidate({ score_normalized: 12, themes: [] }))).toBeNull();
    expect(alertReason(candidate({ score_normalized: 90, themes: [] }))).toBe('score');
  });
});

describe('formatAlertMessage', () => {
  it('renders one line per field', () => {
    expect(formatAlertMessage(candidate({ themes: ['monetary_emergency', 'banking_crisis'] }))).toBe(
      [
        '🚨 MACRO PULSE ALERT',
        'Source: Test Wire',
        'Score: 97.5/100',
        'Themes: monetary_emergency, banking_crisis',
        'Title: Fed announces emergency rate cut',
        'Link: https://news.example.test/fed',
      ].join('\n'),
    );
  });

  it('prints N/A without themes or source', () => {
    const lines = formatAlertMessage(candidate({ themes: [], source: '' })).split('\n');
    expect(lines[1]).toBe('Source: N/A');
    expect(lines[3]).toBe('Themes: N/A');
  });
});

const SMTP = {
  smtpHost: 'smtp.example.test',
  smtpUser: 'alerts@example.test',
  smtpPassword: 'test-secret',
  alertEmail: 'desk@example.test',
};

describe('AlertDispatcher', () => {
  it('lists only fully configured channels', () => {
    const post = vi.fn();
    expect(new AlertDispatcher({ channels: {}, http: { post } }).configuredChannels()).toEqual([]);
    expect(new AlertDispatcher({ channels: { telegramBotToken: 'test-token' }, http: { post } }).configuredChannels()).toEqual([]);
    expect(
      new AlertDispatcher({
        channels: { telegramBotToken: 'test-token', telegramChatId: 'test-chat', webhookUrl: 'https://hooks.example.test/alert' },
        http: { post },
      }).configuredChannels(),
    ).toEqual(['telegram', 'webhook']);
    expect(
      new AlertDispatcher({
        channels: { telegramBotToken: 'test-token', telegramChatId: 'test-chat', webhookUrl: 'https://hooks.example.test/alert', ...SMTP },
        http: { post },
      }).configuredChannels(),
    ).toEqual(['telegram', 'email', 'webhook']);
    expect(
      new AlertDispatcher({ channels: { ...SMTP, smtpPassword: undefined }, http: { post } }).configuredChannels(),
    ).toEqual([]);
  });

  it('sends email through the mail transport', async () => {
    const sendMail = vi.fn().mockResolvedValue({ messageId: 'test-id' });
    const dispatcher = new AlertDispatcher({ channels: SMTP, http: { post: vi.fn() }, mailer: { sendMail } });

    expect(await dispatcher.trigger(candidate(), 'both')).toEqual([{ channel: 'email', ok: true }]);
    expect(sendMail).toHaveBeenCalledWith({
      from: 'alerts@example.test',
      to: 'desk@example.test',
      subject: '[Macro Alert] Fed announces emergency rate cut',
      text: formatAlertMessage(candidate()),
    });
  });

  it('cuts the email subject to sixty characters of title', async () => {
    const sendMail = vi.fn().mockResolvedValue({});
    const dispatcher = new AlertDispatcher({ channels: SMTP, http: { post: vi.fn() }, mailer: { sendMail } });
    await dispatcher.trigger(candidate({ title: 'x'.repeat(80) }), 'score');
    expect(sendMail.mock.calls[0][0].subject).toBe(`[Macro Alert] ${'x'.repeat(60)}`);
  });

  it('reports a failed email without throwing', async () => {
    const sendMail = vi.fn().mockRejectedValue(new Error('535 authentication failed'));
    const post = vi.fn().mockResolvedValue({ status: 204 });
    const dispatcher = new AlertDispatcher({
      channels: { ...SMTP, webhookUrl: 'https://hooks.example.test/alert' },
      http: { post },
      mailer: { sendMail },
    });

    expect(await dispatcher.trigger(candidate(), 'theme')).toEqual([
      { channel: 'email', ok: false },
      { channel: 'webhook', ok: true },
    ]);
  });

  it('posts to Telegram and the webhook', async () => {
    const post = vi.fn().mockResolvedValue({ status: 200 });
    const dispatcher = new AlertDispatcher({
      channels: { telegramBotToken: 'test-token', telegramChatId: 'test-chat', webhookUrl: 'https://hooks.example.test/alert' },
      http: { post },
    });

    const outcomes = await dispatcher.trigger(candidate(), 'both');

    expect(outcomes).toEqual([
      { channel: 'telegram', ok: true },
      { channel: 'webhook', ok: true },
    ]);
    expect(post).toHaveBeenNthCalledWith(1, 'https://api.telegram.org/bottest-token/sendMessage', {
      chat_id: 'test-chat',
      text: formatAlertMessage(candidate()),
      disable_web_page_preview: true,
    });
    expect(post).toHaveBeenNthCalledWith(2, 'https://hooks.example.test/alert', {
      text: formatAlertMessage(candidate()),
      article: {
        title: 'Fed announces emergency rate cut',
        link: 'https://news.example.test/fed',
        score: 97.5,
        themes: ['monetary_emergency'],
        source: 'Test Wire',
      },
    });
  });

  it('keeps going when one channel fails', async () => {
    const post = vi.fn().mockImplementation(async (url: string) => {
      if (url.startsWith('https://api.telegram.org')) throw new Error('401 Unauthorized');
      return { status: 204 };
    });
    const dispatcher = new AlertDispatcher({
      channels: { telegramBotToken: 'test-token', telegramChatId: 'test-chat', webhookUrl: 'https://hooks.example.test/alert' },
      http: { post },
    });

    expect(await dispatcher.trigger(candidate(), 'score')).toEqual([
      { channel: 'telegram', ok: false },
      { channel: 'webhook', ok: true },
    ]);
  });

  it('reports a non-success status as a failure', async () => {
    const post = vi.fn().mockResolvedValue({ status: 500 });
    const dispatcher = new AlertDispatcher({ channels: { webhookUrl: 'https://hooks.example.test/alert' }, http: { post } });
    expect(await dispatcher.sendWebhook('msg', candidate())).toBe(false);
  });

  it('counts triggered articles whatever the channels do', async () => {
    const post = vi.fn().mockResolvedValue({ status: 204 });
    const dispatcher = new AlertDispatcher({ channels: { webhookUrl: 'https://hooks.example.test/alert' }, http: { post } });

    const count = await dispatcher.checkAndAlert([
      candidate(),
      candidate({ score_normalized: 10, themes: ['recession'] }),
      candidate({ score_normalized: 10, themes: [] }),
    ]);

    expect(count).toBe(2);
    expect(post).toHaveBeenCalledTimes(2);
  });

  it('counts alerts even with no channels configured', async () => {
    const post = vi.fn();
    const dispatcher = new AlertDispatcher({ channels: {}, http: { post } });
    expect(await dispatcher.checkAndAlert([candidate()])).toBe(1);
    expect(post).not.toHaveBeenCalled();
  });
});
