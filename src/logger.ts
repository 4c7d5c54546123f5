import pino, { type DestinationStream, type Logger } from 'pino';
import { getConfig } from './config.js';

export const REDACTED_PATHS = ['alerts.telegramBotToken', 'alerts.smtpPassword'];

export function createLogger(level: string, destination: DestinationStream = pino.destination(2)): Logger {
  return pino(
    {
      level,
      base: undefined,
      redact: REDACTED_PATHS,
    },
    destination,
  );
}

// stdout belongs to the MCP stdio transport
export const logger = createLogger(getConfig().logLevel);
