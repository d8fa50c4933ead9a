import type { ConditionId, EventId } from './branded.js';
import type { ProgressListener } from './progress-listener.js';

export interface EventDebugStats {
  readonly eventId: EventId;
  readonly processingCount: number;
  readonly matchCount: number;
}

export interface ConditionDebugStats {
  readonly conditionId: ConditionId;
  readonly processingCount: number;
  readonly detectedCount: number;
  readonly bestConfidenceRate: number | null;
}

export interface DebugReport {
  readonly frameCount: number;
  /** Frames whose pass ran to its completion notification. */
  readonly completedFrameCount: number;
  readonly totalProcessingTimeMs: number;
  readonly averageProcessingTimeMs: number | null;
  readonly events: readonly EventDebugStats[];
  readonly conditions: readonly ConditionDebugStats[];
}

export interface DebugReportListener extends ProgressListener {
  getReport(): DebugReport;
}

type Clock = () => number;

interface MutableEventStats {
  processingCount: number;
  matchCount: number;
}

interface MutableConditionStats {
  processingCount: number;
  detectedCount: number;
  bestConfidenceRate: number | null;
}

/** Progress listener collecting detection statistics, in first-seen order. */
export function createDebugReportListener(clock: Clock = () => performance.now()): DebugReportListener {
  const eventStats = new Map<EventId, MutableEventStats>();
  const conditionStats = new Map<ConditionId, MutableConditionStats>();
  let frameCount = 0;
  let completedFrameCount = 0;
  let totalProcessingTimeMs = 0;
  let frameStartedAt: number | null = null;
  let currentEventId: EventId | null = null;
  let currentConditionId: ConditionId | null = null;

  return {
    onImageProcessingStarted() {
      frameCount += 1;
      frameStartedAt = clock();
    },

    onEventProcessingStarted(event) {
      currentEventId = event.id;
      const stats: MutableEventStats = eventStats.get(event.id) ?? { processingCount: 0, matchCount: 0 };
      stats.processingCount += 1;
      eventStats.set(event.id, stats);
    },

    onConditionProcessingStarted(condition) {
      currentConditionId = condition.id;
      const stats: MutableConditionStats = conditionStats.get(condition.id) ?? {
        processingCount: 0,
        detectedCount: 0,
        bestConfidenceRate: null,
      };
      stats.processingCount += 1;
      conditionStats.set(condition.id, stats);
    },

    onConditionProcessingCompleted(result) {
      const stats = currentConditionId === null ? undefined : conditionStats.get(currentConditionId);
      currentConditionId = null;
      if (stats === undefined) {
        return;
      }
      if (result.isDetected) {
        stats.detectedCount += 1;
      }
      if (stats.bestConfidenceRate === null || result.confidenceRate > stats.bestConfidenceRate) {
        stats.bestConfidenceRate = result.confidenceRate;
      }
    },

    onEventProcessingCompleted(outcome) {
      const stats = currentEventId === null ? undefined : eventStats.get(currentEventId);
      currentEventId = null;
      if (stats !== undefined && outcome.eventMatched) {
        stats.matchCount += 1;
      }
    },

    onImageProcessingCompleted() {
      if (frameStartedAt === null) {
        return;
      }
      completedFrameCount += 1;
      totalProcessingTimeMs += clock() - frameStartedAt;
      frameStartedAt = null;
    },

    getReport() {
      return {
        frameCount,
        completedFrameCount,
        totalProcessingTimeMs,
        averageProcessingTimeMs: completedFrameCount === 0 ? null : totalProcessingTimeMs / completedFrameCount,
        events: [...eventStats.entries()].map(([eventId, stats]) => ({ eventId, ...stats })),
        conditions: [...conditionStats.entries()].map(([conditionId, stats]) => ({ conditionId, ...stats })),
      };
    },
  };
}
