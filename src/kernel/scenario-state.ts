import type { EventId } from './branded.js';
import type { EventToggleType, ScenarioEvent } from './types.js';

/** Enabled/disabled status of the scenario events, in priority order. */
export class ScenarioState {
  private readonly enabledById = new Map<EventId, boolean>();

  constructor(private readonly events: readonly ScenarioEvent[]) {
    for (const event of events) {
      this.enabledById.set(event.id, event.enabledOnStart);
    }
  }

  /** Snapshot of the enabled events; later state changes do not affect a returned list. */
  getEnabledEvents(): readonly ScenarioEvent[] {
    return this.events.filter((event) => this.enabledById.get(event.id) === true);
  }

  areAllEventsDisabled(): boolean {
    for (const enabled of this.enabledById.values()) {
      if (enabled) {
        return false;
      }
    }
    return true;
  }

  isEventEnabled(eventId: EventId): boolean {
    return this.enabledById.get(eventId) === true;
  }

  /** @returns false if the scenario has no event with this id. */
  changeEventState(eventId: EventId, toggleType: EventToggleType): boolean {
    const current = this.enabledById.get(eventId);
    if (current === undefined) {
      return false;
    }

    switch (toggleType) {
      case 'enable':
        this.enabledById.set(eventId, true);
        return true;
      case 'disable':
        this.enabledById.set(eventId, false);
        return true;
      case 'toggle':
        this.enabledById.set(eventId, !current);
        return true;
      default: {
        const _exhaustive: never = toggleType;
        return _exhaustive;
      }
    }
  }
}
