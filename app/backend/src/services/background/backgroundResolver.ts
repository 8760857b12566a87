import sharp from 'sharp';

import { describeError, logger } from '../../logger';
import type { ImageSearchClient } from './pexelsClient';

export type ResolvedBackground =
  | { kind: 'image'; data: Buffer }
  | { kind: 'fallback'; reason: string };

const fallback = (reason: string): ResolvedBackground => ({ kind: 'fallback', reason });

/**
 * Turns an optional search term into a photo. Every failure degrades to the
 * white-canvas fallback; nothing is thrown to the caller.
 */
export class BackgroundResolver {
  constructor(
    private readonly client: ImageSearchClient,
    private readonly perPage: number
  ) {}

  async resolve(query: string | undefined, page: number, signal?: AbortSignal): Promise<ResolvedBackground> {
    const term = query?.trim();
    if (!term) {
      return fallback('no search term');
    }
    try {
      const data = await this.client.search({ query: term, page, perPage: this.perPage }, signal);
      if (!data) {
        logger.warn(`[Background] No result for "${term}" on page ${page}`);
        return fallback(`no result for "${term}" on page ${page}`);
      }
      await sharp(data).metadata();
      return { kind: 'image', data };
    } catch (error) {
      logger.warn(`[Background] Falling back to white canvas for "${term}": ${describeError(error)}`);
      return fallback(describeError(error));
    }
  }
}
