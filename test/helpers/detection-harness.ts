import type {
  Area,
  Bitmap,
  BitmapSupplier,
  DetectionResult,
  FrameConverter,
  ImageDetector,
  InputInjector,
  Point,
} from '../../src/kernel/index.js';

export type DetectionCall =
  | { readonly kind: 'area'; readonly path: string; readonly area: Area; readonly threshold: number }
  | { readonly kind: 'wholeScreen'; readonly path: string; readonly threshold: number };

export interface DetectionHarness {
  readonly detector: ImageDetector;
  readonly bitmapSupplier: BitmapSupplier;
  readonly detections: DetectionCall[];
  readonly suppliedTemplates: { readonly path: string; readonly width: number; readonly height: number }[];
  readonly screenMetricsCalls: { readonly bitmap: Bitmap; readonly quality: number }[];
  readonly setupCalls: Bitmap[];
  setResult(path: string, result: DetectionResult | boolean): void;
}

export const makeBitmap = (width: number, height: number): Bitmap => ({
  width,
  height,
  data: new Uint8ClampedArray(width * height * 4),
});

export const detectedAt = (x: number, y: number, confidenceRate = 0.95): DetectionResult => ({
  isDetected: true,
  position: { x, y },
  confidenceRate,
});

export const notDetected = (confidenceRate = 0.1): DetectionResult => ({
  isDetected: false,
  position: { x: 0, y: 0 },
  confidenceRate,
});

const toResult = (value: DetectionResult | boolean): DetectionResult => {
  if (typeof value !== 'boolean') {
    return value;
  }
  return value ? detectedAt(10, 20) : notDetected();
};

/**
 * In-process detector answering from a table keyed by template path. Templates whose path is listed
 * in `missingTemplates` are not supplied.
 */
export const createDetectionHarness = (
  results: Readonly<Record<string, DetectionResult | boolean>> = {},
  missingTemplates: readonly string[] = [],
): DetectionHarness => {
  const table = new Map<string, DetectionResult>(
    Object.entries(results).map(([path, value]) => [path, toResult(value)]),
  );
  const templatePaths = new Map<Bitmap, string>();
  const detections: DetectionCall[] = [];
  const suppliedTemplates: { path: string; width: number; height: number }[] = [];
  const screenMetricsCalls: { bitmap: Bitmap; quality: number }[] = [];
  const setupCalls: Bitmap[] = [];

  const lookup = (template: Bitmap): { readonly path: string; readonly result: DetectionResult } => {
    const path = templatePaths.get(template);
    if (path === undefined) {
      throw new Error('Template was not produced by the harness supplier');
    }
    return { path, result: table.get(path) ?? notDetected() };
  };

  const detector: ImageDetector = {
    setScreenMetrics: (bitmap, quality) => {
      screenMetricsCalls.push({ bitmap, quality });
    },
    setupDetection: (bitmap) => {
      setupCalls.push(bitmap);
    },
    detectInArea: (template, area, threshold) => {
      const { path, result } = lookup(template);
      detections.push({ kind: 'area', path, area, threshold });
      return result;
    },
    detectOnWholeScreen: (template, threshold) => {
      const { path, result } = lookup(template);
      detections.push({ kind: 'wholeScreen', path, threshold });
      return result;
    },
  };

  const bitmapSupplier: BitmapSupplier = async (path, width, height) => {
    suppliedTemplates.push({ path, width, height });
    if (missingTemplates.includes(path)) {
      return null;
    }
    const bitmap = makeBitmap(width, height);
    templatePaths.set(bitmap, path);
    return bitmap;
  };

  return {
    detector,
    bitmapSupplier,
    detections,
    suppliedTemplates,
    screenMetricsCalls,
    setupCalls,
    setResult: (path, result) => {
      table.set(path, toResult(result));
    },
  };
};

export interface TestCapture {
  readonly width: number;
  readonly height: number;
}

/** Reuses the previous bitmap whenever the capture size is unchanged. */
export const createFrameConverter = (): FrameConverter<TestCapture> & { readonly allocations: Bitmap[] } => {
  const allocations: Bitmap[] = [];
  const converter = (capture: TestCapture, reusable: Bitmap | null): Bitmap => {
    if (reusable !== null && reusable.width === capture.width && reusable.height === capture.height) {
      return reusable;
    }
    const bitmap = makeBitmap(capture.width, capture.height);
    allocations.push(bitmap);
    return bitmap;
  };
  return Object.assign(converter, { allocations });
};

export type GestureCall =
  | { readonly kind: 'click'; readonly position: Point; readonly durationMs: number }
  | { readonly kind: 'swipe'; readonly from: Point; readonly to: Point; readonly durationMs: number };

export const createRecordingInjector = (): InputInjector & { readonly gestures: GestureCall[] } => {
  const gestures: GestureCall[] = [];
  return {
    gestures,
    click: (position, durationMs) => {
      gestures.push({ kind: 'click', position, durationMs });
    },
    swipe: (from, to, durationMs) => {
      gestures.push({ kind: 'swipe', from, to, durationMs });
    },
  };
};
