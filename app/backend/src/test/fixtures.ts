import sharp from 'sharp';
import { expect } from 'vitest';

import { AssetLoadError } from '../errors';
import type { AssetCache } from '../services/assets/assetCache';
import type { ImageSearchClient, ImageSearchRequest } from '../services/background/pexelsClient';
import type { EventRecord } from '../services/event/eventRecord';
import type { FontProvider } from '../services/poster/fonts';

/** Whatever the machine resolves for a generic family; keeps tests independent of bundled fonts. */
export const systemFonts: FontProvider = {
  load: async () => ({ family: 'sans-serif' }),
};

export class MemoryAssetCache implements AssetCache {
  readonly requested: string[] = [];

  constructor(private readonly entries: Record<string, Buffer>) {}

  async getOrFetch(key: string): Promise<Buffer> {
    this.requested.push(key);
    const data = this.entries[key];
    if (!data) {
      throw new AssetLoadError(key, `Asset ${key} missing`);
    }
    return data;
  }
}

export class StubSearchClient implements ImageSearchClient {
  readonly requests: ImageSearchRequest[] = [];

  constructor(private readonly pages: Record<number, Buffer | undefined>) {}

  async search(request: ImageSearchRequest): Promise<Buffer | undefined> {
    this.requests.push(request);
    return this.pages[request.page];
  }
}

export const solidPng = (width: number, height: number, background: { r: number; g: number; b: number }) =>
  sharp({ create: { width, height, channels: 3, background } }).png().toBuffer();

export const pixelAt = async (png: Buffer, x: number, y: number): Promise<number[]> => {
  const { data, info } = await sharp(png).raw().toBuffer({ resolveWithObject: true });
  const offset = (y * info.width + x) * info.channels;
  return Array.from(data.subarray(offset, offset + info.channels));
};

export const expectPixel = (actual: number[], expected: number[], tolerance = 2) => {
  expect(actual).toHaveLength(expected.length);
  expected.forEach((value, index) => {
    expect(Math.abs((actual[index] ?? Number.NaN) - value)).toBeLessThanOrEqual(tolerance);
  });
};

export const makeEvent = (overrides: Partial<EventRecord> = {}): EventRecord => ({
  time: '19:00',
  date: '14.03.2025',
  title: ['REUNIÓN', 'EXATEC', 'BONN'],
  venue: 'Gasthaus zum Schaf',
  address: 'Garza Sada Allee 2501, Bonn',
  page: 1,
  ...overrides,
});
