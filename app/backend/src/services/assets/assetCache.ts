import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';

import type { AssetSource, Settings } from '../../config';
import { AssetLoadError } from '../../errors';
import { describeError, logger } from '../../logger';
import { FetchLike, fetchWithRetry } from '../http/fetchWithRetry';

/**
 * Read-only store of poster assets addressed by logical key (`logo`,
 * `font:<weight>`, `icon:<name>`). Concurrent callers asking for the same key
 * share one load; once loaded, bytes are reused for the life of the cache.
 */
export interface AssetCache {
  getOrFetch(key: string): Promise<Buffer>;
}

interface FileAssetCacheOptions {
  rootDir: string;
  sources: Record<string, AssetSource>;
  fetchImpl?: FetchLike;
  timeoutMs?: number;
}

export const assetSourcesFromSettings = (assets: Settings['assets']): Record<string, AssetSource> => {
  const sources: Record<string, AssetSource> = {
    logo: assets.logo,
    'font:regular': assets.fonts.regular,
    'font:semiBold': assets.fonts.semiBold,
    'font:bold': assets.fonts.bold,
  };
  for (const [name, source] of Object.entries(assets.icons)) {
    sources[`icon:${name}`] = source;
  }
  return sources;
};

export class FileAssetCache implements AssetCache {
  private readonly entries = new Map<string, Promise<Buffer>>();

  constructor(private readonly options: FileAssetCacheOptions) {}

  getOrFetch(key: string): Promise<Buffer> {
    const existing = this.entries.get(key);
    if (existing) {
      return existing;
    }
    const task = this.load(key).catch((error: unknown) => {
      this.entries.delete(key);
      throw error;
    });
    this.entries.set(key, task);
    return task;
  }

  private async load(key: string): Promise<Buffer> {
    const source = this.options.sources[key];
    if (!source) {
      throw new AssetLoadError(key, `Unknown asset ${key}`);
    }
    const filePath = path.resolve(this.options.rootDir, source.file);
    try {
      return await readFile(filePath);
    } catch {
      if (!('url' in source)) {
        throw new AssetLoadError(key, `Asset ${key} missing at ${filePath}`);
      }
      return this.download(key, source.url, filePath);
    }
  }

  private async download(key: string, url: string, filePath: string): Promise<Buffer> {
    logger.info(`[Assets] Fetching ${key} from ${url}`);
    let data: Buffer;
    try {
      data = await fetchWithRetry(
        this.options.fetchImpl ?? fetch,
        url,
        {},
        { timeoutMs: this.options.timeoutMs ?? 10_000, retries: 1 },
        async (response) => {
          if (!response.ok) {
            throw new AssetLoadError(key, `Download of ${key} failed with HTTP ${response.status}`);
          }
          return Buffer.from(await response.arrayBuffer());
        }
      );
    } catch (error) {
      if (error instanceof AssetLoadError) {
        throw error;
      }
      throw new AssetLoadError(key, `Download of ${key} failed: ${describeError(error)}`);
    }
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, data);
    return data;
  }
}
