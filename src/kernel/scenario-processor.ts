import { createActionRandomizer } from './action-randomizer.js';
import { ActionExecutor, type InputInjector, type Sleep } from './action-executor.js';
import type { EndConditionId, EventId } from './branded.js';
import type { BitmapSupplier, FrameConverter, ImageDetector } from './detector.js';
import { EndConditionVerifier } from './end-condition-verifier.js';
import { NOOP_PROCESSING_LOGGER, type ProcessingLogger } from './logger.js';
import { NOOP_PROGRESS_LISTENER, type ProgressListener } from './progress-listener.js';
import { isPassCancelledError, processingRuntimeError } from './runtime-error.js';
import { ScenarioState } from './scenario-state.js';
import { ScenarioProcessorConfigSchema } from './schemas.js';
import type {
  Bitmap,
  ConditionOperator,
  EndCondition,
  EventEvaluationOutcome,
  EventToggleType,
  FrameProcessingResult,
  ScenarioEvent,
} from './types.js';
import { verifyConditions, type VerifyConditionsContext } from './verify-conditions.js';
import { yieldPoint } from './yield-point.js';

export interface ScenarioProcessorOptions<TCapture> {
  readonly imageDetector: ImageDetector;
  /** Scale factor handed to the detector when computing screen metrics. */
  readonly detectionQuality: number;
  /** Slightly vary gesture positions and durations. */
  readonly randomize: boolean;
  readonly events: readonly ScenarioEvent[];
  readonly bitmapSupplier: BitmapSupplier;
  readonly frameConverter: FrameConverter<TCapture>;
  readonly inputInjector: InputInjector;
  readonly endConditionOperator: ConditionOperator;
  readonly endConditions: readonly EndCondition[];
  /** Called when the end conditions are reached or every event is disabled. May be called more than once. */
  readonly onStopRequested: () => void;
  readonly progressListener?: ProgressListener;
  readonly logger?: ProcessingLogger;
  /** Seed of the gesture randomization. */
  readonly randomSeed?: bigint;
  readonly sleep?: Sleep;
}

/**
 * Processes screen captures and executes the actions of the first enabled event whose conditions
 * are fulfilled on it.
 */
export class ScenarioProcessor<TCapture> {
  private readonly imageDetector: ImageDetector;
  private readonly detectionQuality: number;
  private readonly bitmapSupplier: BitmapSupplier;
  private readonly frameConverter: FrameConverter<TCapture>;
  private readonly onStopRequested: () => void;
  private readonly progressListener: ProgressListener;
  private readonly logger: ProcessingLogger;

  private readonly scenarioState: ScenarioState;
  private readonly actionExecutor: ActionExecutor;
  private readonly endConditionVerifier: EndConditionVerifier;

  private screenMetricsInvalidated = true;
  /** Kept between frames so the converter can reuse its buffer. */
  private processedScreenBitmap: Bitmap | null = null;
  private passRunning = false;

  constructor(options: ScenarioProcessorOptions<TCapture>) {
    validateProcessorConfig(options);

    this.imageDetector = options.imageDetector;
    this.detectionQuality = options.detectionQuality;
    this.bitmapSupplier = options.bitmapSupplier;
    this.frameConverter = options.frameConverter;
    this.onStopRequested = options.onStopRequested;
    this.progressListener = options.progressListener ?? NOOP_PROGRESS_LISTENER;
    this.logger = options.logger ?? NOOP_PROCESSING_LOGGER;

    this.scenarioState = new ScenarioState(options.events);
    this.actionExecutor = new ActionExecutor(options.inputInjector, this.scenarioState, {
      logger: this.logger,
      ...(options.randomize
        ? { randomizer: createActionRandomizer(options.randomSeed ?? BigInt(Date.now())) }
        : {}),
      ...(options.sleep === undefined ? {} : { sleep: options.sleep }),
    });
    this.endConditionVerifier = new EndConditionVerifier(
      options.endConditions,
      options.endConditionOperator,
      options.onStopRequested,
    );
  }

  /** Recompute the detector screen metrics on the next frame, e.g. after a resolution change. */
  invalidateScreenMetrics(): void {
    this.screenMetricsInvalidated = true;
  }

  /**
   * Change the enabled state of an event. The pass in progress, if any, keeps the event list it
   * started with.
   *
   * @returns false if the scenario has no such event.
   */
  changeEventState(eventId: EventId, toggleType: EventToggleType): boolean {
    return this.scenarioState.changeEventState(eventId, toggleType);
  }

  isEventEnabled(eventId: EventId): boolean {
    return this.scenarioState.isEventEnabled(eventId);
  }

  getEndConditionExecutionCount(endConditionId: EndConditionId): number | undefined {
    return this.endConditionVerifier.getExecutionCount(endConditionId);
  }

  /**
   * Run one pass over `capture`. Aborting `signal` ends the pass at its next safe point, between two
   * detections.
   */
  async processFrame(capture: TCapture, signal?: AbortSignal): Promise<FrameProcessingResult> {
    if (this.passRunning) {
      throw processingRuntimeError('PASS_ALREADY_RUNNING', 'processFrame called while a frame pass is running', {});
    }

    if (this.scenarioState.areAllEventsDisabled()) {
      this.logger.info('All events are disabled, requesting stop');
      this.onStopRequested();
      return { kind: 'allEventsDisabled' };
    }

    this.passRunning = true;
    try {
      return await this.runPass(capture, signal);
    } catch (error) {
      if (isPassCancelledError(error)) {
        this.logger.debug('Frame pass cancelled', error.eventId === undefined ? undefined : { eventId: error.eventId });
        return { kind: 'cancelled' };
      }
      throw error;
    } finally {
      this.passRunning = false;
    }
  }

  private async runPass(capture: TCapture, signal: AbortSignal | undefined): Promise<FrameProcessingResult> {
    this.progressListener.onImageProcessingStarted();
    this.prepareFrame(capture);

    const ctx: VerifyConditionsContext = {
      detector: this.imageDetector,
      bitmapSupplier: this.bitmapSupplier,
      logger: this.logger,
      progressListener: this.progressListener,
      ...(signal === undefined ? {} : { signal }),
    };

    let triggered: EventEvaluationOutcome | null = null;
    for (const event of this.scenarioState.getEnabledEvents()) {
      if (event.conditions.length === 0) {
        this.logger.warn('Event without conditions skipped', { eventId: event.id });
        continue;
      }

      this.progressListener.onEventProcessingStarted(event);
      const outcome = await verifyConditions(event, ctx);
      this.progressListener.onEventProcessingCompleted(outcome);

      if (outcome.eventMatched) {
        this.logger.info('Event triggered', { eventId: event.id, conditionId: outcome.condition?.id });
        await this.actionExecutor.executeActions(event.actions, outcome.detectionResult?.position);

        if (this.endConditionVerifier.onEventTriggered(event)) {
          this.logger.info('End conditions reached, requesting stop', { eventId: event.id });
          return { kind: 'endConditionReached', outcome };
        }

        triggered = outcome;
        break;
      }

      await yieldPoint(signal, event.id);
    }

    this.progressListener.onImageProcessingCompleted();
    return { kind: 'processed', outcome: triggered };
  }

  private prepareFrame(capture: TCapture): void {
    const screenBitmap = this.frameConverter(capture, this.processedScreenBitmap);
    if (this.screenMetricsInvalidated) {
      this.logger.debug('Computing screen metrics', { width: screenBitmap.width, height: screenBitmap.height });
      this.imageDetector.setScreenMetrics(screenBitmap, this.detectionQuality);
      this.screenMetricsInvalidated = false;
    }

    this.imageDetector.setupDetection(screenBitmap);
    this.processedScreenBitmap = screenBitmap;
  }
}

function validateProcessorConfig<TCapture>(options: ScenarioProcessorOptions<TCapture>): void {
  const parsed = ScenarioProcessorConfigSchema.safeParse({
    detectionQuality: options.detectionQuality,
    randomize: options.randomize,
    endConditionOperator: options.endConditionOperator,
    events: options.events,
    endConditions: options.endConditions,
  });
  if (parsed.success) {
    return;
  }

  throw processingRuntimeError('SCENARIO_CONFIG_INVALID', 'Invalid scenario processor configuration', {
    issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
  });
}
