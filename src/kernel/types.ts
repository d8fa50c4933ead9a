import type { ActionId, ConditionId, EndConditionId, EventId } from './branded.js';

// ── Geometry & Bitmaps ────────────────────────────────────

export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface Area {
  readonly left: number;
  readonly top: number;
  readonly width: number;
  readonly height: number;
}

/** Decoded image data, shared by screen frames and condition templates. */
export interface Bitmap {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;
}

// ── Conditions ────────────────────────────────────────────

export type ConditionOperator = 'and' | 'or';

/**
 * `exact` compares the template with the condition area only; `wholeScreen` searches the complete
 * frame for it.
 */
export type DetectionType = 'exact' | 'wholeScreen';

export interface Condition {
  readonly id: ConditionId;
  readonly name: string;
  /** Template identifier handed to the bitmap supplier. `null` when the template was never captured. */
  readonly path: string | null;
  readonly area: Area;
  readonly detectionType: DetectionType;
  readonly threshold: number;
  /** `false` turns the condition into an absence check. */
  readonly shouldBeDetected: boolean;
}

export interface DetectionResult {
  readonly isDetected: boolean;
  readonly position: Point;
  readonly confidenceRate: number;
}

// ── Actions ───────────────────────────────────────────────

export type ClickTarget =
  | { readonly kind: 'point'; readonly x: number; readonly y: number }
  | { readonly kind: 'detectedCondition' };

export interface ClickAction {
  readonly kind: 'click';
  readonly id: ActionId;
  readonly name: string;
  readonly pressDurationMs: number;
  readonly target: ClickTarget;
}

export interface SwipeAction {
  readonly kind: 'swipe';
  readonly id: ActionId;
  readonly name: string;
  readonly swipeDurationMs: number;
  readonly from: Point;
  readonly to: Point;
}

export interface PauseAction {
  readonly kind: 'pause';
  readonly id: ActionId;
  readonly name: string;
  readonly pauseDurationMs: number;
}

export type EventToggleType = 'enable' | 'disable' | 'toggle';

export interface EventToggle {
  readonly eventId: EventId;
  readonly toggleType: EventToggleType;
}

export interface ToggleEventAction {
  readonly kind: 'toggleEvent';
  readonly id: ActionId;
  readonly name: string;
  readonly toggles: readonly EventToggle[];
}

export type Action = ClickAction | SwipeAction | PauseAction | ToggleEventAction;

// ── Events & End Conditions ───────────────────────────────

export interface ScenarioEvent {
  readonly id: EventId;
  readonly name: string;
  readonly conditionOperator: ConditionOperator;
  readonly conditions: readonly Condition[];
  readonly actions: readonly Action[];
  readonly enabledOnStart: boolean;
}

export interface EndCondition {
  readonly id: EndConditionId;
  readonly eventId: EventId;
  /** Number of triggers of the referenced event after which this end condition is reached. */
  readonly executions: number;
}

export interface ScenarioDefinition {
  readonly id: string;
  readonly name: string;
  readonly detectionQuality: number;
  readonly randomize: boolean;
  readonly endConditionOperator: ConditionOperator;
  readonly events: readonly ScenarioEvent[];
  readonly endConditions: readonly EndCondition[];
}

// ── Processing Results ────────────────────────────────────

export interface EventEvaluationOutcome {
  readonly eventMatched: boolean;
  readonly event?: ScenarioEvent;
  readonly condition?: Condition;
  readonly detectionResult?: DetectionResult;
}

export type FrameProcessingResult =
  | { readonly kind: 'allEventsDisabled' }
  | { readonly kind: 'processed'; readonly outcome: EventEvaluationOutcome | null }
  | { readonly kind: 'endConditionReached'; readonly outcome: EventEvaluationOutcome }
  | { readonly kind: 'cancelled' };
