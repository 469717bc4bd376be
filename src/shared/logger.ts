import pino from 'pino';

const underTest = process.env['VITEST'] !== undefined;

// stdout is left to command output; logs go to stderr
export const logger = pino({
  name: 'eventboard',
  level: process.env['LOG_LEVEL'] ?? (underTest ? 'silent' : 'info'),
  transport:
    process.env['NODE_ENV'] !== 'production' && !underTest
      ? { target: 'pino-pretty', options: { colorize: true, destination: 2, ignore: 'pid,hostname,name' } }
      : undefined,
  redact: {
    paths: ['api_key', 'apiKey', 'authorization', '*.api_key', '*.apiKey', 'llm.api_key', 'headers.Authorization'],
    censor: '***REDACTED***',
  },
});
