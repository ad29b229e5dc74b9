/**
 * SettingsValidator - Validates and sanitizes region-tool settings
 *
 * PURPOSE
 * ───────
 * Ensures settings loaded from a user-supplied JSON file are valid and within
 * acceptable ranges. Corrupted values, unknown fit modes or missing properties
 * fall back to defaults instead of failing the run.
 *
 * KEY RESPONSIBILITIES
 * ────────────────────
 * - Validate numeric ranges (scales, viewport size, zoom, alpha, page cap)
 * - Validate color formats (hex colors)
 * - Validate the fit mode enum
 * - Apply default values for missing properties
 * - Clamp out-of-range values instead of rejecting them
 *
 * USAGE
 * ─────
 * ```typescript
 * const raw: unknown = JSON.parse(await readFile(configPath, 'utf8'));
 * const settings = validateSettings(isSettingsInput(raw) ? raw : null);
 * ```
 */

import { DEFAULT_SETTINGS, type RegionSettings } from '../types.js';
import type { FitMode } from '../pdf/types.js';

/** Settings as read from disk: known keys, values not yet trusted. */
export type SettingsInput = { readonly [K in keyof RegionSettings]?: unknown };

/**
 * Validation limits for numeric settings
 */
const LIMITS = {
  naturalScale: { min: 0.1, max: 10 },
  minScale: { min: 0.01, max: 5 },
  viewport: { min: 100, max: 20000 },
  debugZoom: { min: 0.25, max: 8 },
  alpha: { min: 0, max: 1 },
  maxPages: { min: 1, max: 5000 },
} as const;

const FIT_MODES: readonly FitMode[] = ['natural', 'fit_width', 'fit_height'];

export function isSettingsInput(value: unknown): value is SettingsInput {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Clamps a number between min and max values
 */
function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Validates a hex color string (#RRGGBB or #RGB)
 * Returns the color if valid, otherwise returns the default
 */
function validateColor(color: unknown, defaultColor: string): string {
  if (typeof color !== 'string') return defaultColor;
  const c = color.trim();
  if (/^#([0-9A-Fa-f]{3}|[0-9A-Fa-f]{6})$/.test(c)) {
    return c;
  }
  return defaultColor;
}

/**
 * Validates a number and clamps it to the specified range
 */
function validateNumber(
  value: unknown,
  defaultValue: number,
  min: number,
  max: number
): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return defaultValue;
  }
  return clamp(value, min, max);
}

function validateFitMode(value: unknown, defaultValue: FitMode): FitMode {
  return FIT_MODES.find((m) => m === value) ?? defaultValue;
}

/**
 * Validates and sanitizes settings
 *
 * @param partial - Settings object read from a config file
 * @returns Fully valid RegionSettings with defaults applied
 */
export function validateSettings(partial: SettingsInput | null | undefined): RegionSettings {
  if (!partial) {
    return { ...DEFAULT_SETTINGS };
  }

  return {
    fitMode: validateFitMode(partial.fitMode, DEFAULT_SETTINGS.fitMode),

    naturalScale: validateNumber(
      partial.naturalScale,
      DEFAULT_SETTINGS.naturalScale,
      LIMITS.naturalScale.min,
      LIMITS.naturalScale.max
    ),
    minScale: validateNumber(
      partial.minScale,
      DEFAULT_SETTINGS.minScale,
      LIMITS.minScale.min,
      LIMITS.minScale.max
    ),
    fallbackViewportWidth: validateNumber(
      partial.fallbackViewportWidth,
      DEFAULT_SETTINGS.fallbackViewportWidth,
      LIMITS.viewport.min,
      LIMITS.viewport.max
    ),
    fallbackViewportHeight: validateNumber(
      partial.fallbackViewportHeight,
      DEFAULT_SETTINGS.fallbackViewportHeight,
      LIMITS.viewport.min,
      LIMITS.viewport.max
    ),
    debugZoom: validateNumber(
      partial.debugZoom,
      DEFAULT_SETTINGS.debugZoom,
      LIMITS.debugZoom.min,
      LIMITS.debugZoom.max
    ),
    screenFillAlpha: validateNumber(
      partial.screenFillAlpha,
      DEFAULT_SETTINGS.screenFillAlpha,
      LIMITS.alpha.min,
      LIMITS.alpha.max
    ),
    maxPages: Math.round(validateNumber(
      partial.maxPages,
      DEFAULT_SETTINGS.maxPages,
      LIMITS.maxPages.min,
      LIMITS.maxPages.max
    )),

    // Color settings
    screenStrokeColor: validateColor(partial.screenStrokeColor, DEFAULT_SETTINGS.screenStrokeColor),
    screenFillColor: validateColor(partial.screenFillColor, DEFAULT_SETTINGS.screenFillColor),
    debugStrokeColor: validateColor(partial.debugStrokeColor, DEFAULT_SETTINGS.debugStrokeColor),
  };
}
