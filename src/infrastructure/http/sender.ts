import type { Logger } from 'pino';
import type { Batch } from '../../domain/index.js';
import { VERSION } from '../config.js';
import { ExponentialBackoff } from './backoff.js';
import type { BackoffOptions } from './backoff.js';

/** The subset of a fetch Response the sender reads. */
export interface FetchResponse {
  readonly ok: boolean;
  readonly status: number;
  text(): Promise<string>;
}

export type FetchLike = (
  url: string,
  init: { method: 'POST'; headers: Record<string, string>; body: string },
) => Promise<FetchResponse>;

/** Delivers one batch; resolves false when the batch was dropped. */
export interface Sender {
  send(batch: Batch): Promise<boolean>;
}

/** A single failed POST: non-2xx status. Transport errors surface as-is. */
export class SendError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
  ) {
    super(`HTTP POST failed with status ${status}: ${body}`);
    this.name = 'SendError';
  }
}

export interface HttpSenderOptions {
  baseEndpoint: string;
  retryMaxElapsed: number;
  log: Logger;
  fetch?: FetchLike;
  backoff?: Partial<Omit<BackoffOptions, 'maxElapsedTime'>>;
}

/**
 * Serializes a batch into the `/v1/set` body. `objects` is already JSON
 * array text and is spliced in verbatim after a well-formedness check.
 */
export function encodeBatch(batch: Batch): string {
  const objects: unknown = JSON.parse(batch.objects);
  if (!Array.isArray(objects)) {
    throw new TypeError('Batch objects must be a JSON array');
  }
  return `{"collection":${JSON.stringify(batch.collection)},"writeKey":${JSON.stringify(batch.writeKey)},"objects":${batch.objects}}`;
}

/**
 * Posts batches to `<baseEndpoint>/v1/set`.
 *
 * Each failed attempt (transport error or non-2xx) is retried with
 * exponential backoff until the next wait would take the batch past
 * `retryMaxElapsed`; then the batch is logged once and dropped.
 * Never rejects.
 */
export class HttpSender implements Sender {
  private readonly url: string;
  private readonly fetch: FetchLike;

  constructor(private readonly options: HttpSenderOptions) {
    this.url = `${options.baseEndpoint.replace(/\/+$/, '')}/v1/set`;
    this.fetch = options.fetch ?? fetch;
  }

  async send(batch: Batch): Promise<boolean> {
    const { log } = this.options;

    let body: string;
    try {
      body = encodeBatch(batch);
    } catch (err: unknown) {
      log.error({ err, collection: batch.collection }, 'Batch failed to encode, dropping');
      return false;
    }

    const backoff = new ExponentialBackoff({
      ...this.options.backoff,
      maxElapsedTime: this.options.retryMaxElapsed,
    });

    for (let attempt = 1; ; attempt++) {
      try {
        await this.post(body);
        log.debug(
          { collection: batch.collection, attempt, bytes: Buffer.byteLength(body, 'utf8') },
          'Batch sent',
        );
        return true;
      } catch (err: unknown) {
        const wait = backoff.next();
        if (wait === null) {
          log.error(
            { err, collection: batch.collection, attempts: attempt, elapsed_ms: backoff.elapsed() },
            'Batch dropped after retries',
          );
          return false;
        }

        log.warn(
          { err, collection: batch.collection, attempt, retry_in_ms: Math.round(wait) },
          'Batch send failed, retrying',
        );
        await sleep(wait);
      }
    }
  }

  private async post(body: string): Promise<void> {
    const response = await this.fetch(this.url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': `objects-batcher/${VERSION}`,
      },
      body,
    });

    // Always consume the body so the connection can be reused
    const text = await response.text().catch(() => '');
    if (!response.ok) {
      throw new SendError(response.status, text);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
