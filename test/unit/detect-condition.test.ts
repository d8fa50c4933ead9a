import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  checkCondition,
  detect,
  isProcessingRuntimeErrorCode,
  NOOP_PROCESSING_LOGGER,
  type Condition,
} from '../../src/kernel/index.js';
import { createDetectionHarness, detectedAt, makeBitmap } from '../helpers/detection-harness.js';
import { makeCondition } from '../helpers/scenario-fixtures.js';

describe('checkCondition', () => {
  it('requests the template at the condition area size and detects it in that area', async () => {
    const harness = createDetectionHarness({ button: detectedAt(25, 40, 0.9) });
    const condition = makeCondition('button', { threshold: 7 });

    const result = await checkCondition(condition, { ...harness, logger: NOOP_PROCESSING_LOGGER });

    assert.deepEqual(result, { isDetected: true, position: { x: 25, y: 40 }, confidenceRate: 0.9 });
    assert.deepEqual(harness.suppliedTemplates, [{ path: 'button', width: 30, height: 40 }]);
    assert.deepEqual(harness.detections, [
      { kind: 'area', path: 'button', area: { left: 10, top: 20, width: 30, height: 40 }, threshold: 7 },
    ]);
  });

  it('searches the whole screen for whole screen conditions', async () => {
    const harness = createDetectionHarness({ banner: true });
    const condition = makeCondition('banner', { detectionType: 'wholeScreen', threshold: 12 });

    await checkCondition(condition, { ...harness, logger: NOOP_PROCESSING_LOGGER });

    assert.deepEqual(harness.detections, [{ kind: 'wholeScreen', path: 'banner', threshold: 12 }]);
  });

  it('returns null without detection when the condition has no template path', async () => {
    const harness = createDetectionHarness({ button: true });
    const condition = makeCondition('button', { path: null });

    const result = await checkCondition(condition, { ...harness, logger: NOOP_PROCESSING_LOGGER });

    assert.equal(result, null);
    assert.equal(harness.suppliedTemplates.length, 0);
    assert.equal(harness.detections.length, 0);
  });

  it('returns null without detection when the template cannot be supplied', async () => {
    const harness = createDetectionHarness({ button: true }, ['button']);

    const result = await checkCondition(makeCondition('button'), { ...harness, logger: NOOP_PROCESSING_LOGGER });

    assert.equal(result, null);
    assert.equal(harness.suppliedTemplates.length, 1);
    assert.equal(harness.detections.length, 0);
  });
});

describe('detect', () => {
  it('throws DETECTION_TYPE_UNSUPPORTED for an unknown detection type', () => {
    const harness = createDetectionHarness();
    const condition = { ...makeCondition('odd'), detectionType: 'fuzzy' } as unknown as Condition;

    assert.throws(
      () => detect(condition, makeBitmap(30, 40), harness.detector),
      (error: unknown) =>
        isProcessingRuntimeErrorCode(error, 'DETECTION_TYPE_UNSUPPORTED') &&
        error.context?.detectionType === 'fuzzy' &&
        String(error.context.conditionId) === 'odd',
    );
    assert.equal(harness.detections.length, 0);
  });
});
