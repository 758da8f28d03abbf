import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import type { Logger } from 'pino';
import type { Dispatcher } from './dispatcher.js';
import { objectSchema } from './object-schema.js';

/**
 * Reads newline-delimited JSON records from `input` and hands each one
 * to the dispatcher. Blank lines are skipped; malformed lines are logged
 * and skipped. Aborting `signal` stops reading early. Resolves with the
 * number of records submitted.
 */
export async function pipeRecords(
  input: Readable,
  client: Pick<Dispatcher, 'set'>,
  log: Logger,
  signal?: AbortSignal,
): Promise<number> {
  const lines = createInterface({ input, crlfDelay: Infinity, signal });
  let submitted = 0;
  let lineNo = 0;

  try {
    for await (const line of lines) {
      lineNo++;
      if (line.trim() === '') continue;

      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch (err: unknown) {
        log.warn({ err, line: lineNo }, 'Skipping line: invalid JSON');
        continue;
      }

      const parsed = objectSchema.safeParse(raw);
      if (!parsed.success) {
        log.warn({ issues: parsed.error.issues, line: lineNo }, 'Skipping line: invalid record');
        continue;
      }

      client.set(parsed.data);
      submitted++;
    }
  } catch (err: unknown) {
    // Aborting closes the interface; anything else is a real read error
    if (!signal?.aborted) throw err;
  }

  return submitted;
}
