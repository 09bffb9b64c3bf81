import pino from 'pino';
import { AlertTransport } from './alert-transport';

export type Logger = pino.Logger;

export const logger = (): Logger => {
  const logLevel = process.env.LOG_LEVEL || 'info';
  const alertWebhook = process.env.ALERT_WEBHOOK_URL;

  const streams: pino.StreamEntry[] = [
    {
      level: 'trace',
      stream: process.stdout,
    },
  ];

  if (alertWebhook) {
    streams.push({
      level: 'error',
      stream: new AlertTransport(alertWebhook),
    });
  }

  const pinoLogger = pino(
    {
      level: logLevel,
      formatters: {
        level: (label) => {
          return { level: label };
        },
      },
    },
    pino.multistream(streams),
  );

  return pinoLogger;
};
