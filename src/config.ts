/**
 * Centralized configuration loader for Macro Pulse.
 * Reads environment variables, parses types, and exposes a typed config object.
 *
 * Environment variables:
 * - TRANSPORT=stdio|http (default: stdio)
 * - PORT (default: 3000 for http transport)
 * - HOST (default: 0.0.0.0)
 * - ALLOWED_HOSTS, ALLOWED_ORIGINS (comma separated, optional)
 * - LOG_LEVEL (default: info)
 * - DATA_FILE (default: <project>/data/corpus.json)
 * - DASHBOARD_FILE (default: <project>/index.html)
 * - RETENTION_DAYS (default: 7)
 * - TOP_N (default: 20)
 * - FEED_ITEM_CAP (default: 15)
 * - HTTP_TIMEOUT_MS (default: 10000)
 * - ENRICH_CONTENT (default: true; false/0 skips full-page fetching for short summaries)
 * - TELEGRAM_BOT_TOKEN, TELEGRAM_CHAT_ID (optional, both needed for Telegram alerts)
 * - WEBHOOK_URL (optional, generic JSON webhook for alerts)
 * - SMTP_HOST, SMTP_PORT (default: 587), SMTP_USER, SMTP_PASSWORD, ALERT_EMAIL
 *   (optional, all but the port needed for email alerts)
 */

import { config } from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

// Load environment variables from .env file
config();

const PROJECT_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

export type Transport = 'stdio' | 'http';

export interface AlertChannelsConfig {
  telegramBotToken?: string;
  telegramChatId?: string;
  webhookUrl?: string;
  smtpHost?: string;
  smtpPort?: number;
  smtpUser?: string;
  smtpPassword?: string;
  alertEmail?: string;
}

export interface AppConfig {
  transport: Transport;
  port: number;
  httpHost: string;
  allowedHosts: string[];
  allowedOrigins: string[];
  logLevel: string;
  dataFile: string;
  dashboardFile: string;
  retentionDays: number;
  topN: number;
  feedItemCap: number;
  httpTimeoutMs: number;
  enrichContent: boolean;
  alerts: AlertChannelsConfig;
}

function parseNumber(value: string | undefined): number | undefined {
  if (!value || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function positiveInt(value: string | undefined, fallback: number): number {
  const n = parseNumber(value);
  return n !== undefined && n > 0 ? Math.floor(n) : fallback;
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function flag(value: string | undefined, fallback: boolean): boolean {
  const v = value?.trim().toLowerCase();
  if (!v) return fallback;
  return !['0', 'false', 'no', 'off'].includes(v);
}

function csv(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const transport: Transport = env.TRANSPORT === 'http' ? 'http' : 'stdio';
  const dataFile = optional(env.DATA_FILE);
  const dashboardFile = optional(env.DASHBOARD_FILE);

  return {
    transport,
    port: positiveInt(env.PORT, 3000),
    httpHost: optional(env.HOST) ?? '0.0.0.0',
    allowedHosts: csv(env.ALLOWED_HOSTS),
    allowedOrigins: csv(env.ALLOWED_ORIGINS),
    logLevel: optional(env.LOG_LEVEL) ?? 'info',
    dataFile: dataFile ? path.resolve(dataFile) : path.join(PROJECT_ROOT, 'data', 'corpus.json'),
    dashboardFile: dashboardFile ? path.resolve(dashboardFile) : path.join(PROJECT_ROOT, 'index.html'),
    retentionDays: positiveInt(env.RETENTION_DAYS, 7),
    topN: positiveInt(env.TOP_N, 20),
    feedItemCap: positiveInt(env.FEED_ITEM_CAP, 15),
    httpTimeoutMs: positiveInt(env.HTTP_TIMEOUT_MS, 10_000),
    enrichContent: flag(env.ENRICH_CONTENT, true),
    alerts: {
      telegramBotToken: optional(env.TELEGRAM_BOT_TOKEN),
      telegramChatId: optional(env.TELEGRAM_CHAT_ID),
      webhookUrl: optional(env.WEBHOOK_URL),
      smtpHost: optional(env.SMTP_HOST),
      smtpPort: positiveInt(env.SMTP_PORT, 587),
      smtpUser: optional(env.SMTP_USER),
      smtpPassword: optional(env.SMTP_PASSWORD),
      alertEmail: optional(env.ALERT_EMAIL),
    },
  };
}
