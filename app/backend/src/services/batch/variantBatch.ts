import { BatchCancelledError } from '../../errors';
import { describeError, logger } from '../../logger';
import { posterFileName } from '../event/eventRecord';
import type { PosterRenderer } from '../poster/posterAssembler';
import type { VariantPlan } from './variantPlanner';

export interface PosterVariant {
  label: string;
  fileName: string;
  image?: Buffer;
  background?: 'image' | 'fallback';
  warnings: string[];
  error?: string;
}

interface VariantBatchOptions {
  maxParallel: number;
}

/**
 * Renders independent variants on a small worker pool. Each result lands in
 * the slot of its plan, so the output order is the request order no matter
 * which render finishes first.
 */
export class VariantBatch {
  constructor(
    private readonly renderer: PosterRenderer,
    private readonly options: VariantBatchOptions
  ) {}

  async run(plans: VariantPlan[], signal?: AbortSignal): Promise<PosterVariant[]> {
    const slots: (PosterVariant | undefined)[] = plans.map(() => undefined);
    let next = 0;

    const worker = async () => {
      while (!signal?.aborted) {
        const index = next;
        next += 1;
        const plan = plans[index];
        if (!plan) {
          return;
        }
        slots[index] = await this.renderVariant(plan, index, signal);
      }
    };

    const workers = Math.max(1, Math.min(plans.length, this.options.maxParallel));
    await Promise.all(Array.from({ length: workers }, worker));

    if (signal?.aborted) {
      logger.info('[Batch] Cancelled, discarding partial results');
      throw new BatchCancelledError();
    }
    const variants = slots.filter((slot): slot is PosterVariant => slot !== undefined);
    logger.info(
      `[Batch] Rendered ${variants.filter((variant) => variant.image).length}/${plans.length} variant(s)`
    );
    return variants;
  }

  private async renderVariant(plan: VariantPlan, index: number, signal?: AbortSignal): Promise<PosterVariant> {
    const fileName = posterFileName(plan.event.date, index + 1);
    try {
      const poster = await this.renderer.render(plan.event, signal);
      return {
        label: plan.label,
        fileName,
        image: poster.image,
        background: poster.background,
        warnings: poster.warnings,
      };
    } catch (error) {
      if (!signal?.aborted) {
        logger.error(`[Batch] ${plan.label} failed: ${describeError(error)}`);
      }
      return { label: plan.label, fileName, warnings: [], error: describeError(error) };
    }
  }
}
