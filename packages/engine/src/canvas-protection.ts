import type { CanvasConfig, FontConfig } from '@veilprint/core';
import { NoiseStream, type BufferNoiseInjector, type ByteBuffer, type NoiseSeed } from '@veilprint/noise';

import type { TextMetricsLike } from './types.js';

/** Largest width adjustment, in CSS pixels. */
export const TEXT_WIDTH_JITTER = 0.05;
/** Largest bounding-box adjustment, in CSS pixels. */
export const TEXT_BOX_JITTER = 0.025;

/** Whether `buffer` is exactly a `width`×`height` RGBA image. */
export function isRgbaImage(buffer: ByteBuffer, width: number, height: number): boolean {
  return (
    Number.isInteger(width) &&
    Number.isInteger(height) &&
    width > 0 &&
    height > 0 &&
    buffer.length === width * height * 4
  );
}

/** Pixel noise for an image readback or export. Returns whether any byte changed. */
export function applyImageNoise(
  injector: BufferNoiseInjector,
  config: CanvasConfig,
  buffer: ByteBuffer,
  width: number,
  seed: NoiseSeed,
): boolean {
  if (!config.addNoise) return false;
  return injector.injectPixelNoise(buffer, buffer.length, config.noiseLevel, seed, width);
}

/**
 * Offset text metrics by a small amount derived from `seed`. The same
 * seed (context and text) always produces the same metrics. Bounding-box
 * edges move together so the box keeps its shape.
 */
export function offsetTextMetrics(
  metrics: TextMetricsLike,
  seed: NoiseSeed,
  font?: { name: string; config: FontConfig },
): TextMetricsLike {
  const stream = new NoiseStream(seed);
  const widthOffset = stream.nextSigned() * TEXT_WIDTH_JITTER;
  const boxOffset = stream.nextSigned() * TEXT_BOX_JITTER;

  let fontOffset = 0;
  if (font !== undefined && font.config.enabled && font.config.spoofMetrics) {
    fontOffset = font.config.metricsOffsets[font.name] ?? 0;
  }

  const shift = (value: number | undefined) => (value === undefined ? undefined : value + boxOffset);
  const result: TextMetricsLike = { width: metrics.width + widthOffset + fontOffset };
  const left = shift(metrics.actualBoundingBoxLeft);
  const right = shift(metrics.actualBoundingBoxRight);
  const ascent = shift(metrics.actualBoundingBoxAscent);
  const descent = shift(metrics.actualBoundingBoxDescent);
  if (left !== undefined) result.actualBoundingBoxLeft = left;
  if (right !== undefined) result.actualBoundingBoxRight = right;
  if (ascent !== undefined) result.actualBoundingBoxAscent = ascent;
  if (descent !== undefined) result.actualBoundingBoxDescent = descent;
  return result;
}
