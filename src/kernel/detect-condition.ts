import type { BitmapSupplier, ImageDetector } from './detector.js';
import type { ProcessingLogger } from './logger.js';
import { unsupportedDetectionTypeError } from './runtime-error.js';
import type { Bitmap, Condition, DetectionResult } from './types.js';

export interface ConditionDetectionContext {
  readonly detector: ImageDetector;
  readonly bitmapSupplier: BitmapSupplier;
  readonly logger: ProcessingLogger;
}

export function detect(condition: Condition, template: Bitmap, detector: ImageDetector): DetectionResult {
  const detectionType = condition.detectionType;
  switch (detectionType) {
    case 'exact':
      return detector.detectInArea(template, condition.area, condition.threshold);

    case 'wholeScreen':
      return detector.detectOnWholeScreen(template, condition.threshold);

    default: {
      const _exhaustive: never = detectionType;
      throw unsupportedDetectionTypeError(condition.id, _exhaustive);
    }
  }
}

/**
 * Detect a condition on the frame currently loaded in the detector.
 *
 * @returns the detection result, or `null` when the condition has no template or the template could
 * not be supplied.
 */
export async function checkCondition(
  condition: Condition,
  ctx: ConditionDetectionContext,
): Promise<DetectionResult | null> {
  if (condition.path === null) {
    ctx.logger.debug('Condition has no template, skipping detection', { conditionId: condition.id });
    return null;
  }

  const template = await ctx.bitmapSupplier(condition.path, condition.area.width, condition.area.height);
  if (template === null) {
    ctx.logger.debug('Condition template unavailable', { conditionId: condition.id, path: condition.path });
    return null;
  }

  return detect(condition, template, ctx.detector);
}
