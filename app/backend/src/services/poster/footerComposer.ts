import { createCanvas } from '@napi-rs/canvas';
import QRCode from 'qrcode';
import sharp, { OverlayOptions } from 'sharp';

import { describeError } from '../../logger';
import type { AssetCache } from '../assets/assetCache';
import { cssFont, FontSet, FontWeight } from './fonts';
import { footerRect, LayoutConfig, toSharpColor } from './layoutConfig';

export interface FooterContent {
  ctaText: string;
  linkText: string;
  qrUrl: string;
}

export interface FooterResult {
  canvas: Buffer;
}

export class FooterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FooterError';
  }
}

interface ScaledLogo {
  data: Buffer;
  width: number;
  height: number;
}

/** Logos wider than this share of the band are scaled down to fit it. */
const MAX_LOGO_SHARE = 0.4;
const QR_INSET = 4;

/**
 * White band pinned to the bottom of the poster: logo, separator, call to
 * action over the link, and a bordered QR code. Every offset comes from the
 * layout constants and the measured logo/text, never from the event.
 */
export class FooterComposer {
  constructor(
    private readonly layout: LayoutConfig,
    private readonly fonts: FontSet,
    private readonly assets: AssetCache,
    private readonly content: FooterContent
  ) {}

  async compose(canvas: Buffer): Promise<FooterResult | FooterError> {
    let logo: ScaledLogo;
    try {
      logo = await this.loadLogo();
    } catch (error) {
      return new FooterError(`Footer skipped, logo unavailable: ${describeError(error)}`);
    }
    const band = await this.renderBand(logo);
    const rect = footerRect(this.layout);
    const composed = await sharp(canvas)
      .composite([{ input: band, left: rect.left, top: rect.top }])
      .png()
      .toBuffer();
    return { canvas: composed };
  }

  private async loadLogo(): Promise<ScaledLogo> {
    const source = await this.assets.getOrFetch('logo');
    const { data, info } = await sharp(source)
      .resize({
        height: this.layout.footer.logoHeight,
        width: Math.floor(this.layout.canvas.width * MAX_LOGO_SHARE),
        fit: 'inside',
      })
      .png()
      .toBuffer({ resolveWithObject: true });
    return { data, width: info.width, height: info.height };
  }

  private async renderBand(logo: ScaledLogo): Promise<Buffer> {
    const { footer } = this.layout;
    const rect = footerRect(this.layout);
    const qrLeft = rect.width - footer.qrPadding - footer.qrSize;
    const qrTop = Math.floor((rect.height - footer.qrSize) / 2);
    const separatorX = footer.logoMargin + logo.width + footer.separatorGap;

    const composites: OverlayOptions[] = [
      {
        input: logo.data,
        left: footer.logoMargin,
        top: Math.floor((rect.height - logo.height) / 2),
      },
      { input: this.drawTextLayer(rect.width, rect.height, separatorX, qrLeft), left: 0, top: 0 },
      { input: this.qrFrame(), left: qrLeft, top: qrTop },
    ];

    const inset = footer.qrBorderWidth + QR_INSET;
    composites.push({ input: await this.renderQr(footer.qrSize - inset * 2), left: qrLeft + inset, top: qrTop + inset });

    return sharp({
      create: {
        width: rect.width,
        height: rect.height,
        channels: 4,
        background: toSharpColor(footer.background),
      },
    })
      .composite(composites)
      .png()
      .toBuffer();
  }

  private drawTextLayer(width: number, height: number, separatorX: number, qrLeft: number): Buffer {
    const { footer } = this.layout;
    const surface = createCanvas(width, height);
    const ctx = surface.getContext('2d');

    ctx.fillStyle = footer.separatorColor;
    ctx.fillRect(separatorX, footer.separatorInset, footer.separatorWidth, height - footer.separatorInset * 2);

    const ctaFont = cssFont(this.fonts, { weight: FontWeight.SemiBold, size: footer.ctaSize });
    const linkFont = cssFont(this.fonts, { weight: FontWeight.Bold, size: footer.linkSize });
    ctx.font = ctaFont;
    const ctaWidth = ctx.measureText(this.content.ctaText).width;
    ctx.font = linkFont;
    const linkWidth = ctx.measureText(this.content.linkText).width;

    const areaLeft = separatorX + footer.separatorWidth + footer.separatorGap;
    const areaWidth = qrLeft - footer.separatorGap - areaLeft;
    const textX = areaLeft + Math.max(0, (areaWidth - Math.max(ctaWidth, linkWidth)) / 2);
    const centerY = height / 2;

    ctx.textAlign = 'left';
    ctx.textBaseline = 'middle';
    ctx.font = ctaFont;
    ctx.fillStyle = footer.brandColor;
    ctx.fillText(this.content.ctaText, textX, centerY - footer.ctaLineGap / 2 - footer.ctaSize / 2);
    ctx.font = linkFont;
    ctx.fillStyle = footer.accentColor;
    ctx.fillText(this.content.linkText, textX, centerY + footer.ctaLineGap / 2 + footer.linkSize / 2);

    return surface.toBuffer('image/png');
  }

  private qrFrame(): Buffer {
    const { qrSize: size, qrBorderWidth: stroke, qrBorderRadius: radius, accentColor } = this.layout.footer;
    const svg = `
      <svg width="${size}" height="${size}" xmlns="http://www.w3.org/2000/svg">
        <rect x="${stroke / 2}" y="${stroke / 2}" width="${size - stroke}" height="${size - stroke}"
          rx="${radius}" ry="${radius}" fill="#ffffff" stroke="${accentColor}" stroke-width="${stroke}" />
      </svg>
    `;
    return Buffer.from(svg);
  }

  private async renderQr(size: number): Promise<Buffer> {
    const qr = await QRCode.toBuffer(this.content.qrUrl, {
      errorCorrectionLevel: 'H',
      margin: 0,
      width: size,
      color: { dark: '#000000', light: '#ffffff' },
    });
    return sharp(qr).resize(size, size, { kernel: 'nearest', fit: 'fill' }).png().toBuffer();
  }
}
