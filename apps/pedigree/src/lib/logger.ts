import pino from 'pino';
import type { Logger } from 'pino';
import { env } from '../config/env';

export type { Logger };

export const logger: Logger = pino({ name: 'pedigree', level: env.LOG_LEVEL });
