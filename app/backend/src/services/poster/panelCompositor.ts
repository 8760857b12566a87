import sharp from 'sharp';

import type { ResolvedBackground } from '../background/backgroundResolver';
import { LayoutConfig, panelRect, Rect, Rgba, toSharpColor } from './layoutConfig';

const solid = (width: number, height: number, color: Rgba) => ({
  create: { width, height, channels: 4 as const, background: toSharpColor(color) },
});

export class PanelCompositor {
  constructor(private readonly layout: LayoutConfig) {}

  /**
   * Builds the base canvas (tinted photo, or white when there is none) and
   * stacks the panel, its border and the accent stripe on top, in that order.
   */
  async apply(background: ResolvedBackground): Promise<Buffer> {
    const base = await this.baseCanvas(background);
    const panel = panelRect(this.layout);
    const { fill, stripeColor, stripeHeight } = this.layout.panel;

    return sharp(base)
      .composite([
        { input: solid(panel.width, panel.height, fill), left: panel.left, top: panel.top },
        { input: this.border(panel), left: 0, top: 0 },
        { input: solid(panel.width, stripeHeight, stripeColor), left: panel.left, top: panel.top },
      ])
      .png()
      .toBuffer();
  }

  private async baseCanvas(background: ResolvedBackground): Promise<Buffer> {
    const { width, height } = this.layout.canvas;
    if (background.kind === 'fallback') {
      return sharp(solid(width, height, this.layout.background.fallback)).png().toBuffer();
    }

    const tinted = await sharp(background.data)
      .resize(width, height, { fit: 'cover', position: 'centre' })
      .ensureAlpha()
      .composite([{ input: solid(width, height, this.layout.background.tint), left: 0, top: 0 }])
      .png()
      .toBuffer();

    const { blurSigma } = this.layout.background;
    return blurSigma > 0 ? sharp(tinted).blur(blurSigma).png().toBuffer() : tinted;
  }

  private border(panel: Rect): Buffer {
    const { width, height } = this.layout.canvas;
    const { borderWidth, borderColor } = this.layout.panel;
    const [r, g, b, a] = borderColor;
    const svg = `
      <svg width="${width}" height="${height}" xmlns="http://www.w3.org/2000/svg">
        <rect x="${panel.left + borderWidth / 2}" y="${panel.top + borderWidth / 2}"
          width="${panel.width - borderWidth}" height="${panel.height - borderWidth}"
          fill="none" stroke="rgb(${r},${g},${b})" stroke-opacity="${(a / 255).toFixed(3)}"
          stroke-width="${borderWidth}" />
      </svg>
    `;
    return Buffer.from(svg);
  }
}
