import type { Area, Bitmap, DetectionResult } from './types.js';

/**
 * Visual matching capability. Implementations keep the frame passed to `setupDetection` as the
 * current frame until the next call.
 */
export interface ImageDetector {
  /** Recompute the scaling state for the screen size of `screenBitmap`. */
  setScreenMetrics(screenBitmap: Bitmap, detectionQuality: number): void;
  setupDetection(screenBitmap: Bitmap): void;
  detectInArea(template: Bitmap, area: Area, threshold: number): DetectionResult;
  detectOnWholeScreen(template: Bitmap, threshold: number): DetectionResult;
}

/** Resolves to `null` when the template cannot be provided. */
export type BitmapSupplier = (path: string, width: number, height: number) => Promise<Bitmap | null>;

/** Converts a raw capture, writing into `reusable` when its size still matches. */
export type FrameConverter<TCapture> = (capture: TCapture, reusable: Bitmap | null) => Bitmap;
