import { z } from 'zod';

import { BackgroundFetchError } from '../../errors';
import { FetchLike, fetchWithRetry, ReadResponse, RequestPolicy } from '../http/fetchWithRetry';

export interface ImageSearchRequest {
  query: string;
  page: number;
  perPage: number;
}

/** Returns the original-resolution bytes of one search hit, or undefined when there is none. */
export interface ImageSearchClient {
  search(request: ImageSearchRequest, signal?: AbortSignal): Promise<Buffer | undefined>;
}

const searchResponseSchema = z.object({
  photos: z
    .array(
      z.object({
        id: z.number().optional(),
        src: z.object({ original: z.string().url() }),
      })
    )
    .default([]),
});

interface PexelsClientOptions extends RequestPolicy {
  endpoint: string;
  apiKey: string;
  fetchImpl?: FetchLike;
}

/** Page N of a query maps to hit `(N - 1) mod perPage` of that page. */
export const selectPhotoIndex = (page: number, perPage: number) => (page - 1) % perPage;

export class PexelsClient implements ImageSearchClient {
  constructor(private readonly options: PexelsClientOptions) {}

  async search(request: ImageSearchRequest, signal?: AbortSignal): Promise<Buffer | undefined> {
    if (!this.options.apiKey) {
      throw new BackgroundFetchError('Image search API key is not configured');
    }
    const url = new URL(this.options.endpoint);
    url.searchParams.set('query', request.query);
    url.searchParams.set('per_page', String(request.perPage));
    url.searchParams.set('page', String(request.page));
    url.searchParams.set('orientation', 'square');
    url.searchParams.set('sort', 'popular');

    const body = await this.get(
      url.toString(),
      { Authorization: this.options.apiKey },
      async (response) => {
        if (!response.ok) {
          throw new BackgroundFetchError(`Image search failed with HTTP ${response.status}`, response.status);
        }
        return searchResponseSchema.parse(await response.json());
      },
      signal
    );
    const photo = body.photos[selectPhotoIndex(request.page, request.perPage)];
    if (!photo) {
      return undefined;
    }

    return this.get(
      photo.src.original,
      {},
      async (image) => {
        if (!image.ok) {
          throw new BackgroundFetchError(`Image download failed with HTTP ${image.status}`, image.status);
        }
        return Buffer.from(await image.arrayBuffer());
      },
      signal
    );
  }

  private get<T>(url: string, headers: Record<string, string>, read: ReadResponse<T>, signal?: AbortSignal) {
    return fetchWithRetry(
      this.options.fetchImpl ?? fetch,
      url,
      { headers },
      { timeoutMs: this.options.timeoutMs, retries: this.options.retries },
      read,
      signal
    );
  }
}
