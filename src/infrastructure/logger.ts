import { pino } from 'pino';
import type { Logger } from 'pino';

export function createLogger(level: string = process.env['LOG_LEVEL'] ?? 'info'): Logger {
  return pino({ name: 'objects-batcher', level });
}
