import type { EndConditionId } from './branded.js';
import type { ConditionOperator, EndCondition, ScenarioEvent } from './types.js';

interface EndConditionCounter {
  readonly endCondition: EndCondition;
  count: number;
}

/**
 * Counts the executions of the events referenced by the scenario end conditions and requests the
 * scenario stop once the end conditions, combined with `operator`, are reached.
 *
 * Counters live as long as the verifier; a restarted scenario gets a new one.
 */
export class EndConditionVerifier {
  private readonly counters: readonly EndConditionCounter[];
  private stopRequested = false;

  constructor(
    endConditions: readonly EndCondition[],
    private readonly operator: ConditionOperator,
    private readonly onStopRequested: () => void,
  ) {
    this.counters = endConditions.map((endCondition) => ({ endCondition, count: 0 }));
  }

  /**
   * Record a trigger of `event`.
   *
   * @returns true if the end conditions are reached and the current pass must stop.
   */
  onEventTriggered(event: ScenarioEvent): boolean {
    if (this.stopRequested) {
      return true;
    }

    let counted = false;
    for (const counter of this.counters) {
      if (counter.endCondition.eventId === event.id) {
        counter.count += 1;
        counted = true;
      }
    }

    if (!counted || !this.isSatisfied()) {
      return false;
    }

    this.stopRequested = true;
    this.onStopRequested();
    return true;
  }

  isSatisfied(): boolean {
    if (this.counters.length === 0) {
      return false;
    }

    return this.operator === 'and'
      ? this.counters.every(isCounterReached)
      : this.counters.some(isCounterReached);
  }

  getExecutionCount(endConditionId: EndConditionId): number | undefined {
    return this.counters.find((counter) => counter.endCondition.id === endConditionId)?.count;
  }
}

const isCounterReached = (counter: EndConditionCounter): boolean =>
  counter.count >= counter.endCondition.executions;
