import { createCanvas, Image, loadImage, SKRSContext2D } from '@napi-rs/canvas';
import sharp from 'sharp';

import { describeError, logger } from '../../logger';
import { cssFont, FontSet, FontSpec, FontWeight } from './fonts';
import { LayoutConfig, textRows } from './layoutConfig';
import { blockHeight, FitResult } from './typographyFitter';

export const TEXT_WEIGHTS = {
  datetime: FontWeight.SemiBold,
  title: FontWeight.Bold,
  venue: FontWeight.Bold,
  address: FontWeight.Regular,
} as const;

export interface DatetimeIcons {
  clock: Buffer;
  calendar: Buffer;
}

export interface TextLayoutInput {
  fit: FitResult;
  time: string;
  date: string;
  venue: string;
  address: string;
  icons?: DatetimeIcons;
}

export const shadowOffset = (fontSize: number) => Math.max(2, Math.ceil(fontSize / 30));

export class TextLayoutEngine {
  constructor(
    private readonly config: LayoutConfig,
    private readonly fonts: FontSet
  ) {}

  async layout(canvas: Buffer, input: TextLayoutInput): Promise<Buffer> {
    const layer = await this.drawText(input);
    return sharp(canvas).composite([{ input: layer, left: 0, top: 0 }]).png().toBuffer();
  }

  private async drawText(input: TextLayoutInput): Promise<Buffer> {
    const { width, height } = this.config.canvas;
    const surface = createCanvas(width, height);
    const ctx = surface.getContext('2d');
    const rows = textRows(this.config);
    const centerX = width / 2;
    const { text } = this.config;
    ctx.textBaseline = 'middle';

    await this.drawDatetime(ctx, input, centerX, rows.datetimeY);

    const { fit } = input;
    const titleSpec = { weight: TEXT_WEIGHTS.title, size: fit.chosenFontSize };
    const step = fit.chosenFontSize + fit.lineSpacing;
    const top =
      rows.title.top +
      (rows.title.height - blockHeight(fit.lines.length, fit.chosenFontSize, fit.lineSpacing)) / 2;
    fit.lines.forEach((line, index) => {
      this.drawShadowed(ctx, line, centerX, top + index * step + fit.chosenFontSize / 2, titleSpec);
    });

    this.drawShadowed(ctx, input.venue, centerX, rows.venueY, {
      weight: TEXT_WEIGHTS.venue,
      size: text.venue.size,
    });

    ctx.textAlign = 'center';
    ctx.font = cssFont(this.fonts, { weight: TEXT_WEIGHTS.address, size: text.address.size });
    ctx.fillStyle = text.color;
    ctx.fillText(input.address, centerX, rows.addressY);

    return surface.toBuffer('image/png');
  }

  private drawShadowed(ctx: SKRSContext2D, value: string, x: number, y: number, spec: FontSpec) {
    const offset = shadowOffset(spec.size);
    ctx.textAlign = 'center';
    ctx.font = cssFont(this.fonts, spec);
    ctx.fillStyle = this.config.text.shadowColor;
    ctx.fillText(value, x + offset, y + offset);
    ctx.fillStyle = this.config.text.color;
    ctx.fillText(value, x, y);
  }

  private async drawDatetime(ctx: SKRSContext2D, input: TextLayoutInput, centerX: number, y: number) {
    const style = this.config.text.datetime;
    ctx.font = cssFont(this.fonts, { weight: TEXT_WEIGHTS.datetime, size: style.size });
    ctx.fillStyle = this.config.text.color;

    const icons = input.icons ? await this.decodeIcons(input.icons) : undefined;
    if (!icons) {
      ctx.textAlign = 'center';
      ctx.fillText(`${input.time} | ${input.date}`, centerX, y);
      return;
    }

    const segments = [
      { icon: icons[0], label: input.time },
      { icon: icons[1], label: input.date },
    ].map((segment) => ({ ...segment, textWidth: ctx.measureText(segment.label).width }));
    const total =
      segments.reduce((sum, segment) => sum + style.iconSize + style.iconGap + segment.textWidth, 0) +
      style.segmentGap * (segments.length - 1);

    ctx.textAlign = 'left';
    let x = centerX - total / 2;
    for (const segment of segments) {
      ctx.drawImage(segment.icon, x, y - style.iconSize / 2, style.iconSize, style.iconSize);
      x += style.iconSize + style.iconGap;
      ctx.fillText(segment.label, x, y);
      x += segment.textWidth + style.segmentGap;
    }
  }

  private async decodeIcons(icons: DatetimeIcons): Promise<[Image, Image] | undefined> {
    try {
      return await Promise.all([loadImage(icons.clock), loadImage(icons.calendar)]);
    } catch (error) {
      logger.warn(`[Layout] Icons could not be decoded, drawing plain datetime: ${describeError(error)}`);
      return undefined;
    }
  }
}
