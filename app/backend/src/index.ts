import { createServer } from 'http';

import { createApi } from './api';
import { SettingsService } from './config';
import { logger } from './logger';
import { assetSourcesFromSettings, FileAssetCache } from './services/assets/assetCache';
import { BackgroundResolver } from './services/background/backgroundResolver';
import { PexelsClient } from './services/background/pexelsClient';
import { VariantBatch } from './services/batch/variantBatch';
import { FileFontProvider } from './services/poster/fonts';
import { PosterAssembler } from './services/poster/posterAssembler';
import { WebhookPublisher } from './services/publish/webhookPublisher';

async function bootstrap() {
  const settings = await SettingsService.getInstance().load();

  const assets = new FileAssetCache({
    rootDir: settings.assets.cacheDir,
    sources: assetSourcesFromSettings(settings.assets),
    timeoutMs: settings.search.timeoutMs,
  });

  const search = new PexelsClient({
    endpoint: settings.search.endpoint,
    apiKey: settings.search.apiKey,
    timeoutMs: settings.search.timeoutMs,
    retries: settings.search.retries,
  });
  if (!settings.search.apiKey) {
    logger.warn('PEXELS_API_KEY is not set; posters will use the white background');
  }

  const hasIcons = 'clock' in settings.assets.icons && 'calendar' in settings.assets.icons;
  const renderer = new PosterAssembler({
    resolver: new BackgroundResolver(search, settings.search.perPage),
    fonts: new FileFontProvider(assets, settings.assets.fonts.family),
    assets,
    footer: settings.footer,
    iconKeys: hasIcons ? { clock: 'icon:clock', calendar: 'icon:calendar' } : undefined,
  });

  const publisher = new WebhookPublisher({
    url: settings.webhook.url,
    timeoutMs: settings.webhook.timeoutMs,
  });

  const app = createApi({
    renderer,
    publisher,
    batch: new VariantBatch(renderer, { maxParallel: settings.batch.maxParallel }),
    defaultVariants: settings.batch.variants,
    bodyLimit: settings.server.bodyLimit,
  });

  const server = createServer(app);
  const { port } = settings.server;
  server.listen(port, () => {
    logger.info(`Poster backend listening on http://localhost:${port}`);
  });

  const gracefulShutdown = () => {
    logger.info('Shutting down backend...');
    server.close(() => process.exit(0));
  };

  process.on('SIGINT', gracefulShutdown);
  process.on('SIGTERM', gracefulShutdown);
}

bootstrap().catch((error) => {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
