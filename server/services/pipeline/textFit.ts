import type { BoundingBox } from "./types";

export interface TextMeasurer {
  /** Rendered height of `text` wrapped at `width` in points. */
  heightOf(text: string, fontSize: number, width: number): number;
}

export interface FitOptions {
  preferredSize: number;
  minFontSize: number;
  maxFontSize: number;
  step?: number;
  /**
   * Share of the font size the renderer's last line may extend below the
   * extracted glyph box: its leading, which carries no ink.
   */
  leading?: number;
}

export interface FitResult {
  fontSize: number;
  /** Layout height for the renderer at `fontSize`. */
  maxHeight: number;
  shrunk: boolean;
  clipped: boolean;
}

export const DEFAULT_FIT_STEP = 0.5;
export const DEFAULT_LEADING = 0.2;

const roundStep = (value: number) => Math.round(value * 100) / 100;

/**
 * Picks the largest font size in [min, preferred] at which `text` fits the box
 * width and height, shrinking in fixed steps. When even the minimum size
 * overflows the result is flagged `clipped` at the minimum size.
 */
export function fitTextToBox(
  text: string,
  box: Pick<BoundingBox, "width" | "height">,
  measurer: TextMeasurer,
  options: FitOptions,
): FitResult {
  const step = options.step ?? DEFAULT_FIT_STEP;
  const leading = options.leading ?? DEFAULT_LEADING;
  const heightAt = (size: number) => roundStep(box.height + size * leading);
  const start = Math.min(
    Math.max(options.preferredSize, options.minFontSize),
    options.maxFontSize,
  );

  for (let size = start; size >= options.minFontSize; size = roundStep(size - step)) {
    const maxHeight = heightAt(size);
    if (measurer.heightOf(text, size, box.width) <= maxHeight) {
      return { fontSize: size, maxHeight, shrunk: size < start, clipped: false };
    }
  }
  return {
    fontSize: options.minFontSize,
    maxHeight: heightAt(options.minFontSize),
    shrunk: options.minFontSize < start,
    clipped: true,
  };
}
