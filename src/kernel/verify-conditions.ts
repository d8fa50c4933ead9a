import { checkCondition, type ConditionDetectionContext } from './detect-condition.js';
import type { ProgressListener } from './progress-listener.js';
import type { Condition, DetectionResult, EventEvaluationOutcome, ScenarioEvent } from './types.js';
import { yieldPoint } from './yield-point.js';

export interface VerifyConditionsContext extends ConditionDetectionContext {
  readonly progressListener: ProgressListener;
  readonly signal?: AbortSignal;
}

const NOT_MATCHED: EventEvaluationOutcome = { eventMatched: false };

const outcome = (
  eventMatched: boolean,
  event: ScenarioEvent,
  condition: Condition,
  detectionResult: DetectionResult,
): EventEvaluationOutcome => ({ eventMatched, event, condition, detectionResult });

export const isConditionFulfilled = (condition: Condition, result: DetectionResult): boolean =>
  result.isDetected === condition.shouldBeDetected;

/**
 * Verify the conditions of an event against the current frame, in declaration order.
 *
 * An `and` event stops on its first unfulfilled condition and an `or` event on its first fulfilled
 * one; no detection runs for the conditions after it. A condition that cannot be detected ends the
 * verification with a bare non-matching outcome.
 */
export async function verifyConditions(
  event: ScenarioEvent,
  ctx: VerifyConditionsContext,
): Promise<EventEvaluationOutcome> {
  const lastIndex = event.conditions.length - 1;

  for (const [index, condition] of event.conditions.entries()) {
    ctx.progressListener.onConditionProcessingStarted(condition);
    const result = await checkCondition(condition, ctx);
    if (result === null) {
      return NOT_MATCHED;
    }
    ctx.progressListener.onConditionProcessingCompleted(result);

    const fulfilled = isConditionFulfilled(condition, result);
    if (event.conditionOperator === 'and' && !fulfilled) {
      return outcome(false, event, condition, result);
    }
    if (event.conditionOperator === 'or' && fulfilled) {
      return outcome(true, event, condition, result);
    }

    // All conditions fulfilled for `and`, none for `or`.
    if (index === lastIndex) {
      return outcome(event.conditionOperator === 'and', event, condition, result);
    }

    await yieldPoint(ctx.signal, event.id);
  }

  return NOT_MATCHED;
}
