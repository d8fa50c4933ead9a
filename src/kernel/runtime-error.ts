import type { ConditionId, EventId } from './branded.js';

export type ProcessingRuntimeErrorCode =
  | 'DETECTION_TYPE_UNSUPPORTED'
  | 'PASS_ALREADY_RUNNING'
  | 'SCENARIO_CONFIG_INVALID';

export interface ProcessingRuntimeErrorContextByCode {
  readonly DETECTION_TYPE_UNSUPPORTED: Readonly<{
    readonly conditionId: ConditionId;
    readonly detectionType: unknown;
  }>;
  readonly PASS_ALREADY_RUNNING: Readonly<Record<string, never>>;
  readonly SCENARIO_CONFIG_INVALID: Readonly<{
    readonly issues: readonly Readonly<{ readonly path: string; readonly message: string }>[];
  }>;
}

export type ProcessingRuntimeErrorContext<C extends ProcessingRuntimeErrorCode = ProcessingRuntimeErrorCode> =
  ProcessingRuntimeErrorContextByCode[C];

function formatMessage<C extends ProcessingRuntimeErrorCode>(
  message: string,
  context?: ProcessingRuntimeErrorContext<C>,
): string {
  if (context === undefined) {
    return message;
  }
  return `${message} context=${JSON.stringify(context)}`;
}

export class ProcessingRuntimeError<C extends ProcessingRuntimeErrorCode = ProcessingRuntimeErrorCode> extends Error {
  readonly code: C;
  readonly context?: ProcessingRuntimeErrorContext<C>;

  constructor(code: C, message: string, context?: ProcessingRuntimeErrorContext<C>, cause?: unknown) {
    super(formatMessage(message, context));
    this.name = 'ProcessingRuntimeError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    if (cause !== undefined) {
      (this as Error & { cause?: unknown }).cause = cause;
    }
  }
}

export const processingRuntimeError = <C extends ProcessingRuntimeErrorCode>(
  code: C,
  message: string,
  context?: ProcessingRuntimeErrorContext<C>,
  cause?: unknown,
): ProcessingRuntimeError<C> => new ProcessingRuntimeError(code, message, context, cause);

export const unsupportedDetectionTypeError = (
  conditionId: ConditionId,
  detectionType: unknown,
): ProcessingRuntimeError<'DETECTION_TYPE_UNSUPPORTED'> =>
  new ProcessingRuntimeError(
    'DETECTION_TYPE_UNSUPPORTED',
    `Unexpected detection type for conditionId=${String(conditionId)}`,
    { conditionId, detectionType },
  );

export function isProcessingRuntimeError(error: unknown): error is ProcessingRuntimeError {
  return error instanceof ProcessingRuntimeError;
}

export function isProcessingRuntimeErrorCode<C extends ProcessingRuntimeErrorCode>(
  error: unknown,
  code: C,
): error is ProcessingRuntimeError<C> {
  return isProcessingRuntimeError(error) && error.code === code;
}

/** Thrown from yield points once the pass signal is aborted; converted into a `cancelled` frame result. */
export class PassCancelledError extends Error {
  readonly eventId?: EventId;

  constructor(eventId?: EventId) {
    super(eventId === undefined ? 'Frame pass cancelled' : `Frame pass cancelled while evaluating eventId=${String(eventId)}`);
    this.name = 'PassCancelledError';
    if (eventId !== undefined) {
      this.eventId = eventId;
    }
  }
}

export const isPassCancelledError = (error: unknown): error is PassCancelledError =>
  error instanceof PassCancelledError;
