import pino from 'pino';
import { config } from './config';

export const logger = pino({
  name: 'bakery-inventory-store',
  level: config.LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    error: pino.stdSerializers.err,
  },
});
