/** Width in pixels of `text` rendered at `size`. */
export type MeasureLine = (text: string, size: number) => number;

export interface FitRequest {
  lines: readonly string[];
  boundingWidth: number;
  boundingHeight: number;
  startSize: number;
  minSize: number;
  sizeStep: number;
  /** Gap between lines as a fraction of the font size. */
  lineSpacingRatio: number;
}

export interface FitResult {
  chosenFontSize: number;
  lineSpacing: number;
  lines: string[];
  usedWrapFallback: boolean;
}

export class FitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FitError';
  }
}

export const blockHeight = (lineCount: number, size: number, lineSpacing: number) =>
  lineCount * (size + lineSpacing) - lineSpacing;

const validate = (request: FitRequest): FitError | undefined => {
  if (request.lines.length === 0) {
    return new FitError('Nothing to fit: title has no lines');
  }
  if (!Number.isInteger(request.sizeStep) || request.sizeStep <= 0) {
    return new FitError(`Size step must be a positive integer, got ${request.sizeStep}`);
  }
  if (request.minSize <= 0 || request.minSize > request.startSize) {
    return new FitError(`Invalid size range ${request.minSize}..${request.startSize}`);
  }
  if (request.boundingWidth <= 0 || request.boundingHeight <= 0) {
    return new FitError(`Invalid bounding box ${request.boundingWidth}x${request.boundingHeight}`);
  }
  return undefined;
};

/**
 * Greedy word packing at a fixed size. A word wider than the box on its own
 * is kept whole on its own line and overflows.
 */
export const wrapWords = (
  lines: readonly string[],
  boundingWidth: number,
  size: number,
  measure: MeasureLine
): string[] => {
  const words = lines.flatMap((line) => line.split(/\s+/)).filter((word) => word.length > 0);
  const wrapped: string[] = [];
  let current = '';

  for (const word of words) {
    if (!current) {
      current = word;
      continue;
    }
    const candidate = `${current} ${word}`;
    if (measure(candidate, size) > boundingWidth) {
      wrapped.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }
  if (current) {
    wrapped.push(current);
  }
  return wrapped;
};

/**
 * Picks the largest size in `startSize, startSize - step, ... >= minSize` at
 * which every line fits the box, falling back to re-wrapping the words at
 * `minSize` when none does.
 */
export function fitText(request: FitRequest, measure: MeasureLine): FitResult | FitError {
  const invalid = validate(request);
  if (invalid) {
    return invalid;
  }
  const { lines, boundingWidth, boundingHeight, startSize, minSize, sizeStep, lineSpacingRatio } = request;

  for (let size = startSize; size >= minSize; size -= sizeStep) {
    const lineSpacing = size * lineSpacingRatio;
    if (blockHeight(lines.length, size, lineSpacing) > boundingHeight) {
      continue;
    }
    if (lines.every((line) => measure(line, size) <= boundingWidth)) {
      return { chosenFontSize: size, lineSpacing, lines: [...lines], usedWrapFallback: false };
    }
  }

  const wrapped = wrapWords(lines, boundingWidth, minSize, measure);
  if (wrapped.length === 0) {
    return new FitError('Nothing to fit: title has no words');
  }
  return {
    chosenFontSize: minSize,
    lineSpacing: minSize * lineSpacingRatio,
    lines: wrapped,
    usedWrapFallback: true,
  };
}
