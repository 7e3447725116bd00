import pino from 'pino';
import { config } from './config';

export const logger = pino({
  name: config.log.name,
  level: config.log.level,
});
