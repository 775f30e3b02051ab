import pino from 'pino';

const isTest = process.env.NODE_ENV === 'test';

export const logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : 'info'),
  transport: isTest || !process.stdout.isTTY
    ? undefined
    : {
        target: 'pino-pretty',
        options: {
          colorize: true
        }
      }
});
