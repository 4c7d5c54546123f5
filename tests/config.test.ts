import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { getConfig } from '../src/config.js';

describe('getConfig', () => {
  it('applies defaults', () => {
    const cfg = getConfig({});
    expect(cfg.transport).toBe('stdio');
    expect(cfg.port).toBe(3000);
    expect(cfg.httpHost).toBe('0.0.0.0');
    expect(cfg.logLevel).toBe('info');
    expect(cfg.retentionDays).toBe(7);
    expect(cfg.topN).toBe(20);
    expect(cfg.feedItemCap).toBe(15);
    expect(cfg.httpTimeoutMs).toBe(10_000);
    expect(path.basename(cfg.dataFile)).toBe('corpus.json');
    expect(path.basename(cfg.dashboardFile)).toBe('index.html');
    expect(cfg.enrichContent).toBe(true);
    expect(cfg.alerts).toEqual({
      telegramBotToken: undefined,
      telegramChatId: undefined,
      webhookUrl: undefined,
      smtpHost: undefined,
      smtpPort: 587,
      smtpUser: undefined,
      smtpPassword: undefined,
      alertEmail: undefined,
    });
  });

  it('reads overrides from the environment', () => {
    const cfg = getConfig({
      TRANSPORT: 'http',
      PORT: '8080',
      ALLOWED_HOSTS: 'localhost, example.test ,',
      RETENTION_DAYS: '3',
      TOP_N: '5',
      DATA_FILE: '/tmp/macro-pulse/corpus.json',
      TELEGRAM_BOT_TOKEN: ' test-token ',
      TELEGRAM_CHAT_ID: 'test-chat',
      DASHBOARD_FILE: '/tmp/macro-pulse/index.html',
      ENRICH_CONTENT: 'false',
      SMTP_HOST: 'smtp.example.test',
      SMTP_PORT: '465',
      SMTP_USER: 'alerts@example.test',
      SMTP_PASSWORD: 'test-secret',
      ALERT_EMAIL: 'desk@example.test',
    });
    expect(cfg.transport).toBe('http');
    expect(cfg.port).toBe(8080);
    expect(cfg.allowedHosts).toEqual(['localhost', 'example.test']);
    expect(cfg.retentionDays).toBe(3);
    expect(cfg.topN).toBe(5);
    expect(cfg.dataFile).toBe('/tmp/macro-pulse/corpus.json');
    expect(cfg.alerts.telegramBotToken).toBe('test-token');
    expect(cfg.alerts.telegramChatId).toBe('test-chat');
    expect(cfg.dashboardFile).toBe('/tmp/macro-pulse/index.html');
    expect(cfg.enrichContent).toBe(false);
    expect(cfg.alerts).toMatchObject({
      smtpHost: 'smtp.example.test',
      smtpPort: 465,
      smtpUser: 'alerts@example.test',
      smtpPassword: 'test-secret',
      alertEmail: 'desk@example.test',
    });
  });

  it('reads content enrichment as a flag', () => {
    expect(getConfig({ ENRICH_CONTENT: '0' }).enrichContent).toBe(false);
    expect(getConfig({ ENRICH_CONTENT: 'yes' }).enrichContent).toBe(true);
    expect(getConfig({ ENRICH_CONTENT: ' ' }).enrichContent).toBe(true);
  });

  it('ignores invalid numbers', () => {
    const cfg = getConfig({ PORT: 'abc', RETENTION_DAYS: '-2', TOP_N: '0' });
    expect(cfg.port).toBe(3000);
    expect(cfg.retentionDays).toBe(7);
    expect(cfg.topN).toBe(20);
  });
});
