import sharp from 'sharp';

import { PosterRenderError } from '../../errors';
import { describeError, logger } from '../../logger';
import type { AssetCache } from '../assets/assetCache';
import type { BackgroundResolver } from '../background/backgroundResolver';
import type { EventRecord } from '../event/eventRecord';
import { createTextMeasurer, FontProvider, TextMeasurer } from './fonts';
import { FooterComposer, FooterContent, FooterError } from './footerComposer';
import { assertLayout, DEFAULT_LAYOUT, LayoutConfig, textRows } from './layoutConfig';
import { PanelCompositor } from './panelCompositor';
import { DatetimeIcons, TEXT_WEIGHTS, TextLayoutEngine } from './textLayoutEngine';
import { FitError, FitResult, fitText } from './typographyFitter';

export interface PosterRender {
  /** Opaque 1080x1080 PNG. */
  image: Buffer;
  fit: FitResult;
  background: 'image' | 'fallback';
  warnings: string[];
}

export interface PosterRenderer {
  render(event: EventRecord, signal?: AbortSignal): Promise<PosterRender>;
}

interface PosterAssemblerOptions {
  layout?: LayoutConfig;
  resolver: BackgroundResolver;
  fonts: FontProvider;
  assets: AssetCache;
  footer: FooterContent;
  /** Asset keys of the datetime icons; omitted means a plain `time | date` line. */
  iconKeys?: { clock: string; calendar: string };
}

export class PosterAssembler implements PosterRenderer {
  private readonly layout: LayoutConfig;
  private readonly compositor: PanelCompositor;

  constructor(private readonly options: PosterAssemblerOptions) {
    this.layout = options.layout ?? DEFAULT_LAYOUT;
    assertLayout(this.layout);
    this.compositor = new PanelCompositor(this.layout);
  }

  async render(event: EventRecord, signal?: AbortSignal): Promise<PosterRender> {
    const fonts = await this.options.fonts.load();
    const warnings: string[] = [];

    const background = await this.options.resolver.resolve(event.backgroundQuery, event.page, signal);
    if (background.kind === 'fallback' && event.backgroundQuery?.trim()) {
      warnings.push(`Background unavailable (${background.reason}), used a white canvas`);
    }
    let canvas = await this.compositor.apply(background);

    const fit = this.fitTitle(event.title, createTextMeasurer(fonts));
    const icons = await this.loadIcons(warnings);
    canvas = await new TextLayoutEngine(this.layout, fonts).layout(canvas, {
      fit,
      time: event.time,
      date: event.date,
      venue: event.venue,
      address: event.address,
      icons,
    });

    const footer = await new FooterComposer(this.layout, fonts, this.options.assets, this.options.footer).compose(
      canvas
    );
    if (footer instanceof FooterError) {
      logger.warn(`[Footer] ${footer.message}`);
      warnings.push(footer.message);
    } else {
      canvas = footer.canvas;
    }

    const image = await sharp(canvas).flatten({ background: '#ffffff' }).png().toBuffer();
    return { image, fit, background: background.kind, warnings };
  }

  private fitTitle(lines: string[], measurer: TextMeasurer): FitResult {
    const { title } = textRows(this.layout);
    const style = this.layout.text.title;
    const fit = fitText(
      {
        lines,
        boundingWidth: title.width,
        boundingHeight: title.height,
        startSize: style.startSize,
        minSize: style.minSize,
        sizeStep: style.sizeStep,
        lineSpacingRatio: style.lineSpacingRatio,
      },
      (text, size) => measurer.width(text, { weight: TEXT_WEIGHTS.title, size })
    );
    if (fit instanceof FitError) {
      throw new PosterRenderError(fit.message);
    }
    if (fit.usedWrapFallback) {
      logger.info(`[Layout] Title re-wrapped into ${fit.lines.length} line(s) at ${fit.chosenFontSize}px`);
    }
    return fit;
  }

  private async loadIcons(warnings: string[]): Promise<DatetimeIcons | undefined> {
    const keys = this.options.iconKeys;
    if (!keys) {
      return undefined;
    }
    try {
      const [clock, calendar] = await Promise.all([
        this.options.assets.getOrFetch(keys.clock),
        this.options.assets.getOrFetch(keys.calendar),
      ]);
      return { clock, calendar };
    } catch (error) {
      const message = `Datetime icons unavailable: ${describeError(error)}`;
      logger.warn(`[Layout] ${message}`);
      warnings.push(message);
      return undefined;
    }
  }
}
