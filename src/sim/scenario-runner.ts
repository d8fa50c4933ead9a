import type { EventId, FrameProcessingResult, ScenarioProcessor } from '../kernel/index.js';

export type ScenarioStopReason =
  | 'allEventsDisabled'
  | 'endConditionReached'
  | 'cancelled'
  | 'framesExhausted'
  | 'maxFrames';

export interface ScenarioRunTrace {
  readonly framesProcessed: number;
  /** Triggered event of every frame, in frame order. */
  readonly triggeredEvents: readonly EventId[];
  readonly stopReason: ScenarioStopReason;
}

export interface RunScenarioOptions {
  readonly maxFrames?: number;
  readonly signal?: AbortSignal;
}

export type FrameProcessor<TCapture> = Pick<ScenarioProcessor<TCapture>, 'processFrame'>;

const validateMaxFrames = (maxFrames: number): void => {
  if (!Number.isSafeInteger(maxFrames) || maxFrames < 0) {
    throw new RangeError(`maxFrames must be a non-negative safe integer, received ${String(maxFrames)}`);
  }
};

const triggeredEventId = (result: FrameProcessingResult): EventId | undefined => {
  switch (result.kind) {
    case 'processed':
      return result.outcome?.event?.id;
    case 'endConditionReached':
      return result.outcome.event?.id;
    case 'allEventsDisabled':
    case 'cancelled':
      return undefined;
    default: {
      const _exhaustive: never = result;
      return _exhaustive;
    }
  }
};

/** Feed `frames` to the processor, one pass at a time, until the scenario stops. */
export const runScenario = async <TCapture>(
  processor: FrameProcessor<TCapture>,
  frames: AsyncIterable<TCapture> | Iterable<TCapture>,
  options: RunScenarioOptions = {},
): Promise<ScenarioRunTrace> => {
  if (options.maxFrames !== undefined) {
    validateMaxFrames(options.maxFrames);
  }

  const triggeredEvents: EventId[] = [];
  let framesProcessed = 0;

  const trace = (stopReason: ScenarioStopReason): ScenarioRunTrace => ({
    framesProcessed,
    triggeredEvents,
    stopReason,
  });

  if (options.maxFrames === 0) {
    return trace('maxFrames');
  }

  for await (const frame of frames) {
    if (options.signal?.aborted === true) {
      return trace('cancelled');
    }

    const result = await processor.processFrame(frame, options.signal);
    framesProcessed += 1;

    const eventId = triggeredEventId(result);
    if (eventId !== undefined) {
      triggeredEvents.push(eventId);
    }

    if (result.kind !== 'processed') {
      return trace(result.kind);
    }
    if (options.maxFrames !== undefined && framesProcessed >= options.maxFrames) {
      return trace('maxFrames');
    }
  }

  return trace('framesExhausted');
};
