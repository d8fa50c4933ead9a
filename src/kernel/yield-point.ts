import { setImmediate as yieldToEventLoop } from 'node:timers/promises';

import type { EventId } from './branded.js';
import { PassCancelledError } from './runtime-error.js';

const throwIfCancelled = (signal: AbortSignal | undefined, eventId?: EventId): void => {
  if (signal?.aborted === true) {
    throw new PassCancelledError(eventId);
  }
};

/**
 * Safe point between two detections: hands control back to the event loop so a pending stop request
 * can run, then aborts the pass if that request cancelled it.
 */
export async function yieldPoint(signal: AbortSignal | undefined, eventId?: EventId): Promise<void> {
  throwIfCancelled(signal, eventId);
  await yieldToEventLoop();
  throwIfCancelled(signal, eventId);
}
