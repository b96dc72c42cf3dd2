import pino from 'pino';
import { config } from '../config';

export const logger = pino({
  name: 'repo-revenue-analyzer',
  level: process.env.NODE_ENV === 'test' ? 'silent' : config.logLevel
});

export default logger;
