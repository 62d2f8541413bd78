import pino from 'pino';

const defaultLevel = process.env.NODE_ENV === 'production' ? 'info' : 'debug';

export const logger = pino({
  level: process.env.LOG_LEVEL || defaultLevel,
});
