// Errors
export {
  OverlayError,
  InvalidParameterError,
  MissingDurationError,
  isOverlayError,
} from './errors';
export type { ParameterIssue } from './errors';

// Validation
export { validateClipConfig, parseClipConfig, ColorSchema } from './validator';
export type { ParsedClipConfig, ParsedClipFields, RawEffect } from './validator';

// Construction
export { resolveOverlay, buildOverlay } from './builder';

// Effects
export {
  parseEffects,
  formatEffect,
  applyEffects,
  createEffectRegistry,
  EFFECT_REGISTRY,
} from './effects';
export type { EffectTransform, EffectRegistry } from './effects';

// Timing
export { mergeWordTimings } from './timing';

// Composition
export { composeVideo, overlayLayers } from './composer';
export type { ComposeVideoParams } from './composer';

export { createLogger } from './logger';
