import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';

import { hasErrorDiagnostics, type Diagnostic } from './diagnostics.js';
import { ScenarioDocumentSchema } from './schemas.js';
import type { ScenarioDefinition } from './types.js';

export interface LoadScenarioResult {
  readonly scenario: ScenarioDefinition | null;
  readonly diagnostics: readonly Diagnostic[];
}

export interface ValidateScenarioOptions {
  readonly assetPath?: string;
}

const PATH_ROOT = 'scenario';

export function loadScenarioFromFile(assetPath: string): LoadScenarioResult {
  const fileResult = readScenarioFile(assetPath);
  if (fileResult.diagnostic !== undefined) {
    return { scenario: null, diagnostics: [fileResult.diagnostic] };
  }

  return validateScenarioDocument(fileResult.value, { assetPath });
}

export function validateScenarioDocument(value: unknown, options: ValidateScenarioOptions = {}): LoadScenarioResult {
  const assetPathField = options.assetPath === undefined ? {} : { assetPath: options.assetPath };
  const parsed = ScenarioDocumentSchema.safeParse(value);
  if (!parsed.success) {
    return {
      scenario: null,
      diagnostics: parsed.error.issues.map((issue) => ({
        code: 'SCENARIO_SCHEMA_INVALID',
        path: issue.path.length > 0 ? `${PATH_ROOT}.${issue.path.join('.')}` : PATH_ROOT,
        severity: 'error',
        message: issue.message,
        ...assetPathField,
      })),
    };
  }

  const scenario: ScenarioDefinition = parsed.data;
  const diagnostics = crossValidateScenario(scenario).map((diagnostic) => ({ ...diagnostic, ...assetPathField }));

  return {
    scenario: hasErrorDiagnostics(diagnostics) ? null : scenario,
    diagnostics,
  };
}

/** Checks the references between events, actions and end conditions. */
export function crossValidateScenario(scenario: ScenarioDefinition): readonly Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const eventIds = new Set<string>();

  for (const [index, event] of scenario.events.entries()) {
    if (eventIds.has(event.id)) {
      diagnostics.push({
        code: 'SCENARIO_EVENT_ID_DUPLICATE',
        path: `${PATH_ROOT}.events.${index}.id`,
        severity: 'error',
        message: `Duplicate event id "${event.id}".`,
        suggestion: 'Give every event a unique id.',
        entityId: event.id,
      });
    }
    eventIds.add(event.id);
  }

  const knownIds = [...eventIds].sort();

  for (const [eventIndex, event] of scenario.events.entries()) {
    if (event.conditions.length === 0) {
      diagnostics.push({
        code: 'SCENARIO_EVENT_NO_CONDITIONS',
        path: `${PATH_ROOT}.events.${eventIndex}.conditions`,
        severity: 'warning',
        message: `Event "${event.id}" has no conditions and will never be triggered.`,
        entityId: event.id,
      });
    }

    for (const [actionIndex, action] of event.actions.entries()) {
      if (action.kind !== 'toggleEvent') {
        continue;
      }
      for (const [toggleIndex, toggle] of action.toggles.entries()) {
        if (!eventIds.has(toggle.eventId)) {
          diagnostics.push({
            code: 'SCENARIO_TOGGLE_EVENT_UNKNOWN',
            path: `${PATH_ROOT}.events.${eventIndex}.actions.${actionIndex}.toggles.${toggleIndex}.eventId`,
            severity: 'error',
            message: `Toggle action "${action.id}" references unknown event "${toggle.eventId}".`,
            alternatives: knownIds,
            entityId: action.id,
          });
        }
      }
    }
  }

  for (const [index, endCondition] of scenario.endConditions.entries()) {
    if (!eventIds.has(endCondition.eventId)) {
      diagnostics.push({
        code: 'SCENARIO_END_CONDITION_EVENT_UNKNOWN',
        path: `${PATH_ROOT}.endConditions.${index}.eventId`,
        severity: 'error',
        message: `End condition "${endCondition.id}" references unknown event "${endCondition.eventId}".`,
        alternatives: knownIds,
        entityId: endCondition.id,
      });
    }
  }

  if (scenario.events.length > 0 && scenario.events.every((event) => !event.enabledOnStart)) {
    diagnostics.push({
      code: 'SCENARIO_NO_ENABLED_EVENT',
      path: `${PATH_ROOT}.events`,
      severity: 'warning',
      message: 'No event is enabled on start; the scenario stops on its first frame.',
      suggestion: 'Set enabledOnStart on at least one event.',
    });
  }

  return diagnostics;
}

function readScenarioFile(assetPath: string): { readonly value: unknown; readonly diagnostic?: Diagnostic } {
  const extension = extname(assetPath).toLowerCase();
  if (extension !== '.json' && extension !== '.yaml' && extension !== '.yml') {
    return {
      value: null,
      diagnostic: {
        code: 'SCENARIO_FORMAT_UNSUPPORTED',
        path: `${PATH_ROOT}.file`,
        severity: 'error',
        message: `Unsupported scenario format "${extension || '(none)'}".`,
        suggestion: 'Use .json, .yaml, or .yml scenario files.',
        assetPath,
      },
    };
  }

  try {
    const source = readFileSync(assetPath, 'utf8');
    return {
      value: extension === '.json' ? JSON.parse(source) : parseYaml(source),
    };
  } catch (error) {
    return {
      value: null,
      diagnostic: {
        code: 'SCENARIO_PARSE_ERROR',
        path: `${PATH_ROOT}.file`,
        severity: 'error',
        message: `Failed to read scenario file: ${formatError(error)}.`,
        suggestion: 'Fix file syntax and try loading again.',
        assetPath,
      },
    };
  }
}

function formatError(error: unknown): string {
  if (error instanceof Error && error.message.trim() !== '') {
    return error.message;
  }
  return String(error);
}
