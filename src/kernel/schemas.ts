import { z } from 'zod';

import { asActionId, asConditionId, asEndConditionId, asEventId } from './branded.js';

export const IdentifierSchema = z.string().trim().min(1);
export const NonNegativeIntegerSchema = z.number().int().nonnegative();
export const PositiveIntegerSchema = z.number().int().positive();

export const EventIdSchema = IdentifierSchema.transform(asEventId);

export const PointSchema = z
  .object({
    x: NonNegativeIntegerSchema,
    y: NonNegativeIntegerSchema,
  })
  .strict();

export const AreaSchema = z
  .object({
    left: NonNegativeIntegerSchema,
    top: NonNegativeIntegerSchema,
    width: PositiveIntegerSchema,
    height: PositiveIntegerSchema,
  })
  .strict();

export const ConditionOperatorSchema = z.union([z.literal('and'), z.literal('or')]);

export const DetectionTypeSchema = z.union([z.literal('exact'), z.literal('wholeScreen')]);

export const ConditionSchema = z
  .object({
    id: IdentifierSchema.transform(asConditionId),
    name: z.string(),
    path: z.string().min(1).nullable(),
    area: AreaSchema,
    detectionType: DetectionTypeSchema,
    threshold: z.number().min(0).max(100),
    shouldBeDetected: z.boolean().default(true),
  })
  .strict();

const ActionIdSchema = IdentifierSchema.transform(asActionId);

export const ClickActionSchema = z
  .object({
    kind: z.literal('click'),
    id: ActionIdSchema,
    name: z.string(),
    pressDurationMs: PositiveIntegerSchema,
    target: z.discriminatedUnion('kind', [
      z.object({ kind: z.literal('point'), x: NonNegativeIntegerSchema, y: NonNegativeIntegerSchema }).strict(),
      z.object({ kind: z.literal('detectedCondition') }).strict(),
    ]),
  })
  .strict();

export const SwipeActionSchema = z
  .object({
    kind: z.literal('swipe'),
    id: ActionIdSchema,
    name: z.string(),
    swipeDurationMs: PositiveIntegerSchema,
    from: PointSchema,
    to: PointSchema,
  })
  .strict();

export const PauseActionSchema = z
  .object({
    kind: z.literal('pause'),
    id: ActionIdSchema,
    name: z.string(),
    pauseDurationMs: NonNegativeIntegerSchema,
  })
  .strict();

export const ToggleEventActionSchema = z
  .object({
    kind: z.literal('toggleEvent'),
    id: ActionIdSchema,
    name: z.string(),
    toggles: z
      .array(
        z
          .object({
            eventId: EventIdSchema,
            toggleType: z.union([z.literal('enable'), z.literal('disable'), z.literal('toggle')]),
          })
          .strict(),
      )
      .min(1),
  })
  .strict();

export const ActionSchema = z.discriminatedUnion('kind', [
  ClickActionSchema,
  SwipeActionSchema,
  PauseActionSchema,
  ToggleEventActionSchema,
]);

export const ScenarioEventSchema = z
  .object({
    id: EventIdSchema,
    name: z.string(),
    conditionOperator: ConditionOperatorSchema,
    conditions: z.array(ConditionSchema),
    actions: z.array(ActionSchema),
    enabledOnStart: z.boolean().default(true),
  })
  .strict();

export const EndConditionSchema = z
  .object({
    id: IdentifierSchema.transform(asEndConditionId),
    eventId: EventIdSchema,
    executions: PositiveIntegerSchema,
  })
  .strict();

export const ScenarioProcessorConfigSchema = z
  .object({
    detectionQuality: PositiveIntegerSchema,
    randomize: z.boolean().default(false),
    endConditionOperator: ConditionOperatorSchema.default('and'),
    events: z.array(ScenarioEventSchema),
    endConditions: z.array(EndConditionSchema).default([]),
  })
  .strict();

export const ScenarioDocumentSchema = ScenarioProcessorConfigSchema.extend({
  id: IdentifierSchema,
  name: z.string(),
}).strict();
