import { createCanvas, GlobalFonts } from '@napi-rs/canvas';

import { FontLoadError } from '../../errors';
import { describeError, logger } from '../../logger';
import type { AssetCache } from '../assets/assetCache';

export enum FontWeight {
  Regular = 400,
  SemiBold = 600,
  Bold = 700,
}

export const FONT_ASSET_KEYS: Record<FontWeight, string> = {
  [FontWeight.Regular]: 'font:regular',
  [FontWeight.SemiBold]: 'font:semiBold',
  [FontWeight.Bold]: 'font:bold',
};

export interface FontSpec {
  weight: FontWeight;
  size: number;
}

/** A family registered with the canvas backend, addressable at any of the three weights. */
export interface FontSet {
  family: string;
}

export interface FontProvider {
  load(): Promise<FontSet>;
}

export const cssFont = (fonts: FontSet, spec: FontSpec) =>
  `${spec.weight} ${spec.size}px "${fonts.family}"`;

export interface TextMeasurer {
  width(text: string, spec: FontSpec): number;
}

export const createTextMeasurer = (fonts: FontSet): TextMeasurer => {
  const ctx = createCanvas(1, 1).getContext('2d');
  return {
    width(text, spec) {
      ctx.font = cssFont(fonts, spec);
      return ctx.measureText(text).width;
    },
  };
};

const registerFont = (data: Buffer, family: string) => {
  try {
    return Boolean(GlobalFonts.register(data, family));
  } catch (error) {
    logger.debug(`[Fonts] Registration rejected: ${describeError(error)}`);
    return false;
  }
};

/**
 * Registers the font file of every weight under one family name. Registration
 * happens once per provider; a failed attempt is retried by the next caller.
 */
export class FileFontProvider implements FontProvider {
  private loading?: Promise<FontSet>;

  constructor(
    private readonly assets: AssetCache,
    private readonly family: string
  ) {}

  load(): Promise<FontSet> {
    if (!this.loading) {
      this.loading = this.register().catch((error: unknown) => {
        this.loading = undefined;
        throw error;
      });
    }
    return this.loading;
  }

  private async register(): Promise<FontSet> {
    const weights = [FontWeight.Regular, FontWeight.SemiBold, FontWeight.Bold];
    for (const weight of weights) {
      const key = FONT_ASSET_KEYS[weight];
      let data: Buffer;
      try {
        data = await this.assets.getOrFetch(key);
      } catch (error) {
        throw new FontLoadError(key, `Font asset ${key} unavailable: ${describeError(error)}`);
      }
      if (!registerFont(data, this.family)) {
        throw new FontLoadError(key, `Font asset ${key} is not a readable font file`);
      }
    }
    logger.info(`[Fonts] Registered family ${this.family}`);
    return { family: this.family };
  }
}
