import { PublishError } from '../../errors';
import { describeError, logger } from '../../logger';
import { FetchLike, fetchWithRetry } from '../http/fetchWithRetry';

export interface PublishRequest {
  /** Rendered PNG bytes, or a URL where the poster is already hosted. */
  image: Buffer | string;
  eventName: string;
  date: string;
  time: string;
  place: string;
  address: string;
}

export type PublishOutcome = { ok: true; message: string } | { ok: false; message: string };

interface WebhookPublisherOptions {
  url: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

export class WebhookPublisher {
  constructor(private readonly options: WebhookPublisherOptions) {}

  /** Never throws: every failure becomes a message the caller can show. */
  async publish(request: PublishRequest): Promise<PublishOutcome> {
    try {
      await this.post(request);
      logger.info(`[Webhook] Published poster for "${request.eventName}"`);
      return { ok: true, message: 'Poster sent' };
    } catch (error) {
      const message = `Publishing failed: ${describeError(error)}`;
      logger.warn(`[Webhook] ${message}`);
      return { ok: false, message };
    }
  }

  private async post(request: PublishRequest) {
    if (!this.options.url) {
      throw new PublishError('no webhook endpoint configured');
    }
    const body = {
      image_url_or_bytes: typeof request.image === 'string' ? request.image : request.image.toString('base64'),
      event_name: request.eventName,
      date: request.date,
      time: request.time,
      place: request.place,
      address: request.address,
    };
    await fetchWithRetry(
      this.options.fetchImpl ?? fetch,
      this.options.url,
      { method: 'POST', headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(body) },
      { timeoutMs: this.options.timeoutMs, retries: 0 },
      async (response) => {
        await response.body?.cancel();
        if (response.status !== 200) {
          throw new PublishError(`webhook answered HTTP ${response.status}`, response.status);
        }
      }
    );
  }
}
