import pino from 'pino';

export const logger = pino({
  name: 'reelrelay',
  level: process.env['LOG_LEVEL'] ?? 'info',
  transport:
    process.env['NODE_ENV'] !== 'production'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  redact: {
    paths: ['bot_token', 'botToken', 'token', '*.bot_token', '*.botToken'],
    censor: '***REDACTED***',
  },
});
