import { setTimeout as delay } from 'node:timers/promises';

import { IDENTITY_RANDOMIZER, type ActionRandomizer } from './action-randomizer.js';
import type { ProcessingLogger } from './logger.js';
import type { ScenarioState } from './scenario-state.js';
import type { Action, ClickAction, Point, SwipeAction, ToggleEventAction } from './types.js';

/** Injects gestures on the captured device. Calls resolve once the gesture has been dispatched. */
export interface InputInjector {
  click(position: Point, pressDurationMs: number): void | Promise<void>;
  swipe(from: Point, to: Point, swipeDurationMs: number): void | Promise<void>;
}

export type Sleep = (durationMs: number) => Promise<void>;

export interface ActionExecutorOptions {
  readonly randomizer?: ActionRandomizer;
  readonly sleep?: Sleep;
  readonly logger: ProcessingLogger;
}

const defaultSleep: Sleep = async (durationMs) => {
  await delay(durationMs);
};

/** Runs the actions of a triggered event, one after the other. */
export class ActionExecutor {
  private readonly randomizer: ActionRandomizer;
  private readonly sleep: Sleep;
  private readonly logger: ProcessingLogger;

  constructor(
    private readonly inputInjector: InputInjector,
    private readonly scenarioState: ScenarioState,
    options: ActionExecutorOptions,
  ) {
    this.randomizer = options.randomizer ?? IDENTITY_RANDOMIZER;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger;
  }

  /**
   * @param conditionPosition position of the detection that triggered the event, used by the clicks
   * targeting the detected condition.
   */
  async executeActions(actions: readonly Action[], conditionPosition: Point | undefined): Promise<void> {
    for (const action of actions) {
      switch (action.kind) {
        case 'click':
          await this.executeClick(action, conditionPosition);
          break;
        case 'swipe':
          await this.executeSwipe(action);
          break;
        case 'pause':
          await this.sleep(action.pauseDurationMs);
          break;
        case 'toggleEvent':
          this.executeToggleEvent(action);
          break;
        default: {
          const _exhaustive: never = action;
          return _exhaustive;
        }
      }
    }
  }

  private async executeClick(action: ClickAction, conditionPosition: Point | undefined): Promise<void> {
    const target = action.target.kind === 'point' ? { x: action.target.x, y: action.target.y } : conditionPosition;
    if (target === undefined) {
      this.logger.warn('Click on detected condition skipped, no detection position', { actionId: action.id });
      return;
    }

    await this.inputInjector.click(
      this.randomizer.position(target),
      this.randomizer.duration(action.pressDurationMs),
    );
  }

  private async executeSwipe(action: SwipeAction): Promise<void> {
    await this.inputInjector.swipe(
      this.randomizer.position(action.from),
      this.randomizer.position(action.to),
      this.randomizer.duration(action.swipeDurationMs),
    );
  }

  private executeToggleEvent(action: ToggleEventAction): void {
    for (const toggle of action.toggles) {
      if (!this.scenarioState.changeEventState(toggle.eventId, toggle.toggleType)) {
        this.logger.warn('Toggle targets an unknown event', { actionId: action.id, eventId: toggle.eventId });
      }
    }
  }
}
