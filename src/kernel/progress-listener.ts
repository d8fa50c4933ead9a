import type { Condition, DetectionResult, EventEvaluationOutcome, ScenarioEvent } from './types.js';

/** Observes a frame pass. Hooks never influence the pass itself. */
export interface ProgressListener {
  onImageProcessingStarted(): void;
  onEventProcessingStarted(event: ScenarioEvent): void;
  onConditionProcessingStarted(condition: Condition): void;
  onConditionProcessingCompleted(result: DetectionResult): void;
  onEventProcessingCompleted(outcome: EventEvaluationOutcome): void;
  onImageProcessingCompleted(): void;
}

export const NOOP_PROGRESS_LISTENER: ProgressListener = {
  onImageProcessingStarted: () => undefined,
  onEventProcessingStarted: () => undefined,
  onConditionProcessingStarted: () => undefined,
  onConditionProcessingCompleted: () => undefined,
  onEventProcessingCompleted: () => undefined,
  onImageProcessingCompleted: () => undefined,
};
