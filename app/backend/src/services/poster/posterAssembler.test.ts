import sharp from 'sharp';
import { beforeAll, describe, expect, it } from 'vitest';

import { FontLoadError } from '../../errors';
import { expectPixel, makeEvent, MemoryAssetCache, pixelAt, solidPng, StubSearchClient, systemFonts } from '../../test/fixtures';
import { BackgroundResolver } from '../background/backgroundResolver';
import { parseTitle } from '../event/eventRecord';
import { FileFontProvider, FontProvider } from './fonts';
import { PosterAssembler } from './posterAssembler';

const footer = {
  ctaText: 'Reserva tu lugar:',
  linkText: 'lu.ma/test-event',
  qrUrl: 'https://example.com/rsvp',
};

let logo: Buffer;
let photo: Buffer;

beforeAll(async () => {
  logo = await solidPng(200, 100, { r: 255, g: 0, b: 0 });
  photo = await solidPng(640, 427, { r: 30, g: 160, b: 90 });
});

const createAssembler = (
  search: StubSearchClient,
  assets: MemoryAssetCache,
  options: { fonts?: FontProvider; icons?: boolean } = {}
) =>
  new PosterAssembler({
    resolver: new BackgroundResolver(search, 15),
    fonts: options.fonts ?? systemFonts,
    assets,
    footer,
    iconKeys: options.icons ? { clock: 'icon:clock', calendar: 'icon:calendar' } : undefined,
  });

const footerBytes = (image: Buffer) =>
  sharp(image).extract({ left: 0, top: 925, width: 1080, height: 155 }).raw().toBuffer();

describe('PosterAssembler', () => {
  it('renders a three line title on the white fallback without a search term', async () => {
    const search = new StubSearchClient({});
    const poster = await createAssembler(search, new MemoryAssetCache({ logo })).render(
      makeEvent({ title: parseTitle('Reunión\nEXATEC\nBonn') })
    );

    expect(search.requests).toEqual([]);
    expect(poster.background).toBe('fallback');
    expect(poster.warnings).toEqual([]);
    expect(poster.fit).toEqual({
      chosenFontSize: 96,
      lineSpacing: 24,
      lines: ['REUNIÓN', 'EXATEC', 'BONN'],
      usedWrapFallback: false,
    });

    const meta = await sharp(poster.image).metadata();
    expect([meta.width, meta.height, meta.format, meta.hasAlpha]).toEqual([1080, 1080, 'png', false]);
    expect(await pixelAt(poster.image, 5, 5)).toEqual([255, 255, 255]);
    expectPixel(await pixelAt(poster.image, 140, 1002), [255, 0, 0]);
  });

  it('scales any photo to the fixed canvas size', async () => {
    const search = new StubSearchClient({ 2: photo });
    const poster = await createAssembler(search, new MemoryAssetCache({ logo })).render(
      makeEvent({ backgroundQuery: 'rooftop party', page: 2 })
    );

    expect(search.requests).toEqual([{ query: 'rooftop party', page: 2, perPage: 15 }]);
    expect(poster.background).toBe('image');
    const meta = await sharp(poster.image).metadata();
    expect([meta.width, meta.height]).toEqual([1080, 1080]);
  });

  it('produces byte-identical output for the same event and background', async () => {
    const assembler = createAssembler(new StubSearchClient({ 1: photo }), new MemoryAssetCache({ logo }));
    const event = makeEvent({ backgroundQuery: 'garden' });

    const first = await assembler.render(event);
    const second = await assembler.render(event);
    expect(first.image.equals(second.image)).toBe(true);
  });

  it('keeps the footer identical whatever the title', async () => {
    const assembler = createAssembler(new StubSearchClient({}), new MemoryAssetCache({ logo }));
    const short = await assembler.render(makeEvent({ title: ['BONN'] }));
    const long = await assembler.render(
      makeEvent({ title: ['ANNUAL GATHERING OF THE', 'ALUMNI ASSOCIATION', 'AND FRIENDS', 'SPRING EDITION'] })
    );

    const [shortFooter, longFooter] = await Promise.all([footerBytes(short.image), footerBytes(long.image)]);
    expect(shortFooter.equals(longFooter)).toBe(true);
  });

  it('falls back to white when the search has nothing on the requested page', async () => {
    const search = new StubSearchClient({ 1: photo });
    const poster = await createAssembler(search, new MemoryAssetCache({ logo })).render(
      makeEvent({ backgroundQuery: 'networking', page: 3 })
    );

    expect(poster.background).toBe('fallback');
    expect(poster.warnings).toEqual([
      'Background unavailable (no result for "networking" on page 3), used a white canvas',
    ]);
    expect(await pixelAt(poster.image, 5, 5)).toEqual([255, 255, 255]);
  });

  it('still returns a poster when the logo is missing', async () => {
    const poster = await createAssembler(new StubSearchClient({}), new MemoryAssetCache({})).render(makeEvent());

    expect(poster.warnings).toEqual(['Footer skipped, logo unavailable: Asset logo missing']);
    const meta = await sharp(poster.image).metadata();
    expect([meta.width, meta.height]).toEqual([1080, 1080]);
    // no footer band: the white fallback canvas shows through
    expect(await pixelAt(poster.image, 278, 1002)).toEqual([255, 255, 255]);
  });

  it('falls back to the plain datetime line when icons cannot be loaded', async () => {
    const assets = new MemoryAssetCache({ logo });
    const poster = await createAssembler(new StubSearchClient({}), assets, { icons: true }).render(makeEvent());

    expect(assets.requested).toContain('icon:clock');
    expect(poster.warnings).toEqual([
      expect.stringMatching(/^Datetime icons unavailable: Asset icon:(clock|calendar) missing$/),
    ]);
  });

  it('aborts the render when the fonts cannot be loaded', async () => {
    const assets = new MemoryAssetCache({ logo });
    const assembler = createAssembler(new StubSearchClient({}), assets, {
      fonts: new FileFontProvider(assets, 'PosterSans'),
    });

    await expect(assembler.render(makeEvent())).rejects.toBeInstanceOf(FontLoadError);
  });
});
