import { describe, expect, it } from 'vitest';

import { FontLoadError } from '../../errors';
import { MemoryAssetCache } from '../../test/fixtures';
import { cssFont, FileFontProvider, FontWeight } from './fonts';

describe('cssFont', () => {
  it('builds a canvas font string for the family', () => {
    expect(cssFont({ family: 'PosterSans' }, { weight: FontWeight.SemiBold, size: 44 })).toBe(
      '600 44px "PosterSans"'
    );
  });
});

describe('FileFontProvider', () => {
  it('fails with the key of the first missing weight', async () => {
    const provider = new FileFontProvider(new MemoryAssetCache({}), 'PosterSans');

    await expect(provider.load()).rejects.toMatchObject({
      name: 'FontLoadError',
      key: 'font:regular',
      message: 'Font asset font:regular unavailable: Asset font:regular missing',
    });
  });

  it('rejects bytes that are not a font', async () => {
    const junk = Buffer.from('definitely not a font');
    const assets = new MemoryAssetCache({ 'font:regular': junk, 'font:semiBold': junk, 'font:bold': junk });

    await expect(new FileFontProvider(assets, 'PosterSans').load()).rejects.toBeInstanceOf(FontLoadError);
  });

  it('tries again after a failed load', async () => {
    const assets = new MemoryAssetCache({});
    const provider = new FileFontProvider(assets, 'PosterSans');

    await expect(provider.load()).rejects.toBeInstanceOf(FontLoadError);
    await expect(provider.load()).rejects.toBeInstanceOf(FontLoadError);
    expect(assets.requested).toEqual(['font:regular', 'font:regular']);
  });
});
