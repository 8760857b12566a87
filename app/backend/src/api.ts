import cors from 'cors';
import express from 'express';
import { z } from 'zod';

import { BatchCancelledError, FontLoadError } from './errors';
import { logger } from './logger';
import { VariantBatch } from './services/batch/variantBatch';
import { planVariants } from './services/batch/variantPlanner';
import { eventInputSchema, posterFileName, toEventRecord } from './services/event/eventRecord';
import type { PosterRenderer } from './services/poster/posterAssembler';
import type { WebhookPublisher } from './services/publish/webhookPublisher';

const batchSchema = eventInputSchema.extend({
  variants: z.number().int().min(1).max(5).optional(),
});

const publishSchema = z.object({
  image: z.string().min(1),
  eventName: z.string().min(1),
  date: z.string().min(1),
  time: z.string().min(1),
  place: z.string().min(1),
  address: z.string().min(1),
});

interface ApiDependencies {
  renderer: PosterRenderer;
  publisher: WebhookPublisher;
  batch: VariantBatch;
  defaultVariants: number;
  bodyLimit: string;
}

const toDataUrl = (image: Buffer) => `data:image/png;base64,${image.toString('base64')}`;

/** Strips a `data:` prefix so both data URLs and bare base64 are accepted. */
const decodeImagePayload = (value: string): Buffer | string => {
  if (/^https?:\/\//.test(value)) {
    return value;
  }
  const [, raw] = value.split(',');
  return Buffer.from(raw ?? value, 'base64');
};

/**
 * Aborts when the connection closes before the response is finished. The
 * request stream already closes once its body is read.
 */
const abortOnDisconnect = (res: express.Response) => {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
};

export function createApi(deps: ApiDependencies) {
  const app = express();
  app.use(
    cors({
      origin: true,
      credentials: true,
    })
  );
  app.use(express.json({ limit: deps.bodyLimit }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  const api = express.Router();

  api.post('/posters', async (req, res, next) => {
    try {
      const payload = batchSchema.parse(req.body ?? {});
      const event = toEventRecord(payload);
      const requested = payload.variants ?? deps.defaultVariants;
      const signal = abortOnDisconnect(res);
      const variants = await deps.batch.run(planVariants(event, requested), signal);
      const generated = variants.filter((variant) => variant.image).length;
      res.json({
        requested,
        generated,
        variants: variants.map((variant) => ({
          label: variant.label,
          fileName: variant.fileName,
          background: variant.background,
          previewData: variant.image ? toDataUrl(variant.image) : undefined,
          warnings: variant.warnings,
          error: variant.error,
        })),
      });
    } catch (error) {
      next(error);
    }
  });

  api.post('/posters/render', async (req, res, next) => {
    try {
      const event = toEventRecord(req.body ?? {});
      const poster = await deps.renderer.render(event, abortOnDisconnect(res));
      res.json({
        fileName: posterFileName(event.date, 1),
        background: poster.background,
        fontSize: poster.fit.chosenFontSize,
        lines: poster.fit.lines,
        wrapped: poster.fit.usedWrapFallback,
        previewData: toDataUrl(poster.image),
        warnings: poster.warnings,
      });
    } catch (error) {
      next(error);
    }
  });

  api.post('/publish', async (req, res, next) => {
    try {
      const payload = publishSchema.parse(req.body ?? {});
      const outcome = await deps.publisher.publish({ ...payload, image: decodeImagePayload(payload.image) });
      res.json(outcome);
    } catch (error) {
      next(error);
    }
  });

  app.use('/api', api);

  app.use(
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    (err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      if (err instanceof BatchCancelledError) {
        logger.info(`[API] ${err.message}`);
        return;
      }
      logger.error(`[API] ${err.message}`);
      if (err instanceof z.ZodError) {
        res.status(400).json({ message: 'Invalid request', issues: err.issues });
        return;
      }
      const status = err instanceof FontLoadError ? 500 : 400;
      res.status(status).json({ message: err.message });
    }
  );

  return app;
}
