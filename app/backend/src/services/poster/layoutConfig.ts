export type Rgba = readonly [r: number, g: number, b: number, a: number];

export interface Rect {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface TextBlockStyle {
  size: number;
  /** Distance of the block's vertical centre from its anchor edge. */
  offset: number;
}

export interface LayoutConfig {
  readonly canvas: { readonly width: number; readonly height: number };
  readonly panel: {
    readonly widthFraction: number;
    readonly heightFraction: number;
    readonly topFraction: number;
    readonly fill: Rgba;
    readonly borderColor: Rgba;
    readonly borderWidth: number;
    readonly stripeColor: Rgba;
    readonly stripeHeight: number;
  };
  readonly background: {
    readonly fallback: Rgba;
    readonly tint: Rgba;
    readonly blurSigma: number;
  };
  readonly text: {
    readonly color: string;
    readonly shadowColor: string;
    readonly horizontalPadding: number;
    readonly blockGap: number;
    readonly datetime: TextBlockStyle & {
      readonly iconSize: number;
      readonly iconGap: number;
      readonly segmentGap: number;
    };
    readonly title: {
      readonly startSize: number;
      readonly minSize: number;
      readonly sizeStep: number;
      readonly lineSpacingRatio: number;
    };
    readonly venue: TextBlockStyle;
    readonly address: TextBlockStyle;
  };
  readonly footer: {
    readonly height: number;
    readonly background: Rgba;
    readonly logoHeight: number;
    readonly logoMargin: number;
    readonly separatorGap: number;
    readonly separatorWidth: number;
    readonly separatorInset: number;
    readonly separatorColor: string;
    readonly ctaSize: number;
    readonly linkSize: number;
    readonly ctaLineGap: number;
    readonly brandColor: string;
    readonly accentColor: string;
    readonly qrSize: number;
    readonly qrPadding: number;
    readonly qrBorderWidth: number;
    readonly qrBorderRadius: number;
  };
}

export const DEFAULT_LAYOUT: LayoutConfig = {
  canvas: { width: 1080, height: 1080 },
  panel: {
    widthFraction: 0.84,
    heightFraction: 0.6,
    topFraction: 0.16,
    fill: [0, 82, 204, 255],
    borderColor: [255, 255, 255, 120],
    borderWidth: 3,
    stripeColor: [255, 196, 0, 255],
    stripeHeight: 8,
  },
  background: {
    fallback: [255, 255, 255, 255],
    tint: [0, 51, 153, 150],
    blurSigma: 2,
  },
  text: {
    color: '#ffffff',
    shadowColor: 'rgba(0, 0, 0, 0.45)',
    horizontalPadding: 60,
    blockGap: 30,
    datetime: { size: 44, offset: 70, iconSize: 40, iconGap: 12, segmentGap: 36 },
    title: { startSize: 96, minSize: 40, sizeStep: 4, lineSpacingRatio: 0.25 },
    venue: { size: 46, offset: 130 },
    address: { size: 34, offset: 70 },
  },
  footer: {
    height: 155,
    background: [255, 255, 255, 255],
    logoHeight: 110,
    logoMargin: 30,
    separatorGap: 28,
    separatorWidth: 2,
    separatorInset: 30,
    separatorColor: '#d0d5dd',
    ctaSize: 28,
    linkSize: 26,
    ctaLineGap: 8,
    brandColor: '#0a2a66',
    accentColor: '#0052cc',
    qrSize: 120,
    qrPadding: 30,
    qrBorderWidth: 4,
    qrBorderRadius: 12,
  },
};

export const panelRect = (layout: LayoutConfig): Rect => {
  const { width, height } = layout.canvas;
  const panelWidth = Math.round(width * layout.panel.widthFraction);
  return {
    left: Math.floor((width - panelWidth) / 2),
    top: Math.round(height * layout.panel.topFraction),
    width: panelWidth,
    height: Math.round(height * layout.panel.heightFraction),
  };
};

export const footerRect = (layout: LayoutConfig): Rect => ({
  left: 0,
  top: layout.canvas.height - layout.footer.height,
  width: layout.canvas.width,
  height: layout.footer.height,
});

/** Vertical centres of the fixed text rows, plus the box the title must fit. */
export const textRows = (layout: LayoutConfig) => {
  const panel = panelRect(layout);
  const { text } = layout;
  const panelBottom = panel.top + panel.height;
  const datetimeY = panel.top + text.datetime.offset;
  const venueY = panelBottom - text.venue.offset;
  const addressY = panelBottom - text.address.offset;
  const titleTop = datetimeY + text.datetime.size / 2 + text.blockGap;
  const titleBottom = venueY - text.venue.size / 2 - text.blockGap;
  return {
    datetimeY,
    venueY,
    addressY,
    title: {
      left: panel.left + text.horizontalPadding,
      top: titleTop,
      width: panel.width - text.horizontalPadding * 2,
      height: titleBottom - titleTop,
    } satisfies Rect,
  };
};

/** Throws when the configured geometry would push the panel off the canvas or into the footer. */
export const assertLayout = (layout: LayoutConfig) => {
  const panel = panelRect(layout);
  const footer = footerRect(layout);
  const fits =
    panel.left >= 0 &&
    panel.top >= 0 &&
    panel.left + panel.width <= layout.canvas.width &&
    panel.top + panel.height <= footer.top;
  if (!fits) {
    throw new Error(
      `Panel ${panel.width}x${panel.height}@${panel.left},${panel.top} does not fit the ${layout.canvas.width}x${layout.canvas.height} canvas`
    );
  }
  const { title } = textRows(layout);
  if (title.width <= 0 || title.height <= 0) {
    throw new Error('Panel leaves no room for the title block');
  }
};

export const toSharpColor = ([r, g, b, a]: Rgba) => ({ r, g, b, alpha: a / 255 });
