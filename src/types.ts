import type { FitMode } from './pdf/types.js';

export interface RegionSettings {
  /** Initial view scale policy for the interactive viewer */
  fitMode: FitMode;
  /** Scale used by the `natural` fit mode (1.5 ≈ 108 dpi) */
  naturalScale: number;
  /** Floor for any computed scale, so an unlaid-out viewport never yields a zero-area page */
  minScale: number;
  // Viewport assumed while the real one has no size yet
  fallbackViewportWidth: number;
  fallbackViewportHeight: number;
  /** Zoom for the debug overlay PNG */
  debugZoom: number;
  screenStrokeColor: string;
  screenFillColor: string;
  /** 0..1 */
  screenFillAlpha: number;
  debugStrokeColor: string;
  /** Pages read from a document; later pages are ignored */
  maxPages: number;
}

export const DEFAULT_SETTINGS: RegionSettings = {
  fitMode: 'fit_height',
  naturalScale: 1.5,
  minScale: 0.2,
  fallbackViewportWidth: 1224,
  fallbackViewportHeight: 1584,
  debugZoom: 2.0,
  screenStrokeColor: '#000000',
  screenFillColor: '#000000',
  screenFillAlpha: 40 / 255,
  debugStrokeColor: '#ff0000',
  maxPages: 200,
};
