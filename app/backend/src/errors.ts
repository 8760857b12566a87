export class BackgroundFetchError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'BackgroundFetchError';
  }
}

export class AssetLoadError extends Error {
  constructor(readonly key: string, message: string) {
    super(message);
    this.name = 'AssetLoadError';
  }
}

/** The only failure that aborts a single poster render. */
export class FontLoadError extends AssetLoadError {
  constructor(key: string, message: string) {
    super(key, message);
    this.name = 'FontLoadError';
  }
}

export class PosterRenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PosterRenderError';
  }
}

export class PublishError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'PublishError';
  }
}

export class BatchCancelledError extends Error {
  constructor() {
    super('Poster batch was cancelled');
    this.name = 'BatchCancelledError';
  }
}
