// survey/blank.ts - Blank tile detection

import type { PixelBuffer } from "@skycut/contracts";

/** Population standard deviation over every sample of every channel */
export function pixelStd(image: PixelBuffer): number {
  const { data } = image;
  if (data.length === 0) return 0;
  let sum = 0;
  for (const v of data) sum += v;
  const mean = sum / data.length;
  let sq = 0;
  for (const v of data) sq += (v - mean) * (v - mean);
  return Math.sqrt(sq / data.length);
}

/**
 * A tile is blank when it is a single uniform value or its pixel spread is
 * under `threshold`. Surveys return flat tiles off their footprint edges.
 */
export function isBlank(image: PixelBuffer, threshold: number): boolean {
  return isBlankStd(pixelStd(image), threshold);
}

export function isBlankStd(std: number, threshold: number): boolean {
  return std === 0 || std < threshold;
}
