import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  ScenarioProcessor,
  type DetectionResult,
  type InputInjector,
  type ScenarioEvent,
} from '../../src/kernel/index.js';
import { runScenario } from '../../src/sim/scenario-runner.js';
import {
  createDetectionHarness,
  createFrameConverter,
  createRecordingInjector,
  type DetectionHarness,
  type TestCapture,
} from '../helpers/detection-harness.js';
import { makeCondition, makeEvent, toggleEvents } from '../helpers/scenario-fixtures.js';

const FRAME: TestCapture = { width: 720, height: 1280 };

const createProcessor = (
  events: readonly ScenarioEvent[],
  harness: DetectionHarness,
  inputInjector: InputInjector = createRecordingInjector(),
): ScenarioProcessor<TestCapture> =>
  new ScenarioProcessor<TestCapture>({
    imageDetector: harness.detector,
    detectionQuality: 500,
    randomize: false,
    events,
    bitmapSupplier: harness.bitmapSupplier,
    frameConverter: createFrameConverter(),
    inputInjector,
    endConditionOperator: 'and',
    endConditions: [],
    onStopRequested: () => undefined,
  });

function* repeatFrames(count: number): Generator<TestCapture> {
  for (let index = 0; index < count; index += 1) {
    yield FRAME;
  }
}

function* endlessFrames(): Generator<TestCapture> {
  while (true) {
    yield FRAME;
  }
}

const results = (entries: Readonly<Record<string, DetectionResult | boolean>>): DetectionHarness =>
  createDetectionHarness(entries);

describe('runScenario', () => {
  it('stops when the frame source is exhausted', async () => {
    const processor = createProcessor([makeEvent('e1', 'and', [makeCondition('c1')])], results({ c1: false }));

    const trace = await runScenario(processor, repeatFrames(2));

    assert.deepEqual(trace, { framesProcessed: 2, triggeredEvents: [], stopReason: 'framesExhausted' });
  });

  it('stops at maxFrames on an endless source', async () => {
    const processor = createProcessor([makeEvent('e1', 'and', [makeCondition('c1')])], results({ c1: true }));

    const trace = await runScenario(processor, endlessFrames(), { maxFrames: 3 });

    assert.deepEqual(trace, { framesProcessed: 3, triggeredEvents: ['e1', 'e1', 'e1'], stopReason: 'maxFrames' });
  });

  it('processes nothing with maxFrames set to zero', async () => {
    const harness = results({ c1: true });
    const processor = createProcessor([makeEvent('e1', 'and', [makeCondition('c1')])], harness);

    const trace = await runScenario(processor, endlessFrames(), { maxFrames: 0 });

    assert.deepEqual(trace, { framesProcessed: 0, triggeredEvents: [], stopReason: 'maxFrames' });
    assert.equal(harness.setupCalls.length, 0);
  });

  it('rejects an invalid maxFrames', async () => {
    const processor = createProcessor([makeEvent('e1', 'and', [makeCondition('c1')])], results({}));

    await assert.rejects(runScenario(processor, endlessFrames(), { maxFrames: -1 }), RangeError);
  });

  it('stops once every event has been disabled', async () => {
    const event = makeEvent('e1', 'and', [makeCondition('c1')], {
      actions: [toggleEvents('off', [['e1', 'disable']])],
    });
    const processor = createProcessor([event], results({ c1: true }));

    const trace = await runScenario(processor, endlessFrames());

    assert.deepEqual(trace, { framesProcessed: 2, triggeredEvents: ['e1'], stopReason: 'allEventsDisabled' });
  });

  it('stops before the next frame once the signal is aborted', async () => {
    const controller = new AbortController();
    const injector: InputInjector = {
      click: () => {
        controller.abort();
      },
      swipe: () => undefined,
    };
    const processor = createProcessor([makeEvent('e1', 'and', [makeCondition('c1')])], results({ c1: true }), injector);

    const trace = await runScenario(processor, endlessFrames(), { signal: controller.signal });

    assert.deepEqual(trace, { framesProcessed: 1, triggeredEvents: ['e1'], stopReason: 'cancelled' });
  });

  it('follows screen changes between frames in event priority order', async () => {
    const harness = results({ popup: false, reward: true });
    const processor = createProcessor(
      [makeEvent('close-popup', 'or', [makeCondition('popup')]), makeEvent('claim', 'and', [makeCondition('reward')])],
      harness,
    );

    async function* changingScreen(): AsyncGenerator<TestCapture> {
      yield FRAME;
      harness.setResult('popup', true);
      yield FRAME;
      harness.setResult('popup', false);
      harness.setResult('reward', false);
      yield FRAME;
    }

    const trace = await runScenario(processor, changingScreen());

    assert.deepEqual(trace, {
      framesProcessed: 3,
      triggeredEvents: ['claim', 'close-popup'],
      stopReason: 'framesExhausted',
    });
    assert.deepEqual(
      harness.detections.map((call) => call.path),
      ['popup', 'reward', 'popup', 'popup', 'reward'],
    );
  });
});
