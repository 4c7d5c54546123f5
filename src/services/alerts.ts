import axios, { type AxiosInstance } from 'axios';
import nodemailer, { type SendMailOptions } from 'nodemailer';
import { getConfig, type AlertChannelsConfig } from '../config.js';
import { logger } from '../logger.js';
import type { AlertReason, RankedArticle } from '../types.js';

export type AlertCandidate = Pick<
  RankedArticle,
  'title' | 'link' | 'source' | 'score_normalized' | 'alert_threshold' | 'themes'
>;

export type ChannelName = 'telegram' | 'email' | 'webhook';

/** The part of a nodemailer transport the dispatcher uses. */
export interface MailSender {
  sendMail(mail: SendMailOptions): Promise<unknown>;
}

export interface ChannelOutcome {
  channel: ChannelName;
  ok: boolean;
}

/**
 * Why an article should alert, or null when it should not.
 */
export function alertReason(article: AlertCandidate): AlertReason | null {
  const aboveThreshold = article.score_normalized >= article.alert_threshold;
  const hasTheme = article.themes.length > 0;
  if (aboveThreshold && hasTheme) return 'both';
  if (aboveThreshold) return 'score';
  if (hasTheme) return 'theme';
  return null;
}

export function formatAlertMessage(article: AlertCandidate): string {
  return [
    '🚨 MACRO PULSE ALERT',
    `Source: ${article.source || 'N/A'}`,
    `Score: ${article.score_normalized.toFixed(1)}/100`,
    `Themes: ${article.themes.join(', ') || 'N/A'}`,
    `Title: ${article.title}`,
    `Link: ${article.link}`,
  ].join('\n');
}

export interface AlertDispatcherOptions {
  channels?: AlertChannelsConfig;
  http?: Pick<AxiosInstance, 'post'>;
  mailer?: MailSender;
  timeoutMs?: number;
}

/**
 * Sends alerts to every configured channel. Channels are independent: one failing
 * is logged and reported, and the others still run.
 */
export class AlertDispatcher {
  private readonly channels: AlertChannelsConfig;
  private readonly http: Pick<AxiosInstance, 'post'>;
  private mailer?: MailSender;
  private readonly timeoutMs: number;

  constructor(opts: AlertDispatcherOptions = {}) {
    const cfg = getConfig();
    this.channels = opts.channels ?? cfg.alerts;
    this.timeoutMs = opts.timeoutMs ?? cfg.httpTimeoutMs;
    this.http = opts.http ?? axios.create({ timeout: this.timeoutMs });
    this.mailer = opts.mailer;
  }

  configuredChannels(): ChannelName[] {
    const { telegramBotToken, telegramChatId, smtpHost, smtpUser, smtpPassword, alertEmail, webhookUrl } =
      this.channels;
    const names: ChannelName[] = [];
    if (telegramBotToken && telegramChatId) names.push('telegram');
    if (smtpHost && smtpUser && smtpPassword && alertEmail) names.push('email');
    if (webhookUrl) names.push('webhook');
    return names;
  }

  async sendTelegram(message: string): Promise<boolean> {
    const { telegramBotToken, telegramChatId } = this.channels;
    if (!telegramBotToken || !telegramChatId) return false;
    try {
      const res = await this.http.post(`https://api.telegram.org/bot${telegramBotToken}/sendMessage`, {
        chat_id: telegramChatId,
        text: message,
        disable_web_page_preview: true,
      });
      return res.status === 200;
    } catch (err) {
      // the request URL carries the bot token, so only the message goes to the log
      logger.error({ reason: errorMessage(err) }, 'Telegram alert failed');
      return false;
    }
  }

  async sendEmail(message: string, subject: string): Promise<boolean> {
    const { smtpHost, smtpPort = 587, smtpUser, smtpPassword, alertEmail } = this.channels;
    if (!smtpHost || !smtpUser || !smtpPassword || !alertEmail) return false;
    // created on first use
    const mailer: MailSender = (this.mailer ??= nodemailer.createTransport({
      host: smtpHost,
      port: smtpPort,
      secure: smtpPort === 465,
      auth: { user: smtpUser, pass: smtpPassword },
      connectionTimeout: this.timeoutMs,
    }));
    try {
      await mailer.sendMail({ from: smtpUser, to: alertEmail, subject, text: message });
      return true;
    } catch (err) {
      logger.error({ reason: errorMessage(err) }, 'Email alert failed');
      return false;
    }
  }

  async sendWebhook(message: string, article: AlertCandidate): Promise<boolean> {
    const { webhookUrl } = this.channels;
    if (!webhookUrl) return false;
    try {
      const res = await this.http.post(webhookUrl, {
        text: message,
        article: {
          title: article.title,
          link: article.link,
          score: article.score_normalized,
          themes: article.themes,
          source: article.source,
        },
      });
      return res.status === 200 || res.status === 204;
    } catch (err) {
      logger.error({ reason: errorMessage(err) }, 'Webhook alert failed');
      return false;
    }
  }

  async trigger(article: AlertCandidate, reason: AlertReason): Promise<ChannelOutcome[]> {
    const message = formatAlertMessage(article);
    logger.warn({ reason, title: article.title.slice(0, 80) }, 'Alert triggered');

    const outcomes: ChannelOutcome[] = [];
    for (const channel of this.configuredChannels()) {
      outcomes.push({ channel, ok: await this.send(channel, message, article) });
    }

    if (!outcomes.length) {
      logger.info('No alert channels configured; set TELEGRAM_BOT_TOKEN + TELEGRAM_CHAT_ID, SMTP_* + ALERT_EMAIL or WEBHOOK_URL');
    } else {
      logger.info({ outcomes }, 'Alert dispatched');
    }
    return outcomes;
  }

  private send(channel: ChannelName, message: string, article: AlertCandidate): Promise<boolean> {
    switch (channel) {
      case 'telegram':
        return this.sendTelegram(message);
      case 'email':
        return this.sendEmail(message, `[Macro Alert] ${article.title.slice(0, 60)}`);
      case 'webhook':
        return this.sendWebhook(message, article);
    }
  }

  /**
   * Alert on every qualifying article. Returns how many articles triggered, whatever the channels did.
   */
  async checkAndAlert(articles: readonly AlertCandidate[]): Promise<number> {
    let triggered = 0;
    for (const article of articles) {
      const reason = alertReason(article);
      if (!reason) continue;
      await this.trigger(article, reason);
      triggered++;
    }
    return triggered;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
