import type { Params } from 'nestjs-pino';
import { getCorrelationId } from '../services/correlation-context.js';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

export const loggerConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL ?? (isProduction ? 'info' : 'debug'),

    // customProps only covers HTTP requests. Monitor ticks run outside
    // pino-http and pass correlationId in their log objects.
    customProps: (): Record<string, unknown> => ({
      correlationId: getCorrelationId(),
    }),

    transport: !isProduction && !isTest
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            singleLine: false,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,

    base: null,

    // Bot token is part of the Telegram URL
    redact: ['url', '*.url'],

    serializers: {
      req: () => undefined,
      res: () => undefined,
    },
  },
};
