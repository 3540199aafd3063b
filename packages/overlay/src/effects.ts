import { DEFAULT_FADE_SECONDS } from '@wordclip/config/presets';
import type { AppliedEffect, EffectDescriptor, EffectName, OverlayElement } from '@wordclip/types';
import { InvalidParameterError, MissingDurationError } from './errors';
import { createLogger } from './logger';
import type { RawEffect } from './validator';

const logger = createLogger('effects');

export type EffectTransform = (element: OverlayElement, value: number | null) => OverlayElement;

export type EffectRegistry = ReadonlyMap<string, EffectTransform>;

// ---------------------------------------------------------------------------
// Descriptor parsing
// ---------------------------------------------------------------------------

/**
 * Parses `"name"` / `"name,value"` strings (or `{ name, value }` objects) into
 * descriptors. Names are not checked here: unknown names are skipped later by
 * `applyEffects`.
 */
export function parseEffects(raw: readonly RawEffect[]): EffectDescriptor[] {
  return raw.map((entry, index) => {
    if (typeof entry !== 'string') {
      return { name: entry.name.trim(), value: entry.value ?? null };
    }

    const parts = entry.split(',');
    if (parts.length > 2) {
      throw new InvalidParameterError(
        `effects.${index}`,
        `Invalid effect '${entry}': expected "name" or "name,value"`,
      );
    }

    const [name = '', rawValue] = parts;
    if (rawValue === undefined || rawValue.trim() === '') {
      return { name: name.trim(), value: null };
    }

    const value = Number(rawValue.trim());
    if (!Number.isFinite(value)) {
      throw new InvalidParameterError(
        `effects.${index}`,
        `Invalid effect '${entry}': '${rawValue.trim()}' is not a number`,
      );
    }
    return { name: name.trim(), value };
  });
}

export function formatEffect(descriptor: EffectDescriptor): string {
  return descriptor.value === null ? descriptor.name : `${descriptor.name},${descriptor.value}`;
}

// ---------------------------------------------------------------------------
// Built-in transforms
// ---------------------------------------------------------------------------

function withEffect(element: OverlayElement, effect: AppliedEffect): OverlayElement {
  return { ...element, effects: [...element.effects, effect] };
}

function fadeLength(name: string, value: number | null): number {
  const seconds = value ?? DEFAULT_FADE_SECONDS;
  if (seconds < 0) {
    throw new InvalidParameterError('effects', `Invalid effect '${name}': length must not be negative`);
  }
  return seconds;
}

const fadeIn: EffectTransform = (element, value) => {
  const requested = fadeLength('fadein', value);
  const duration = element.duration === null ? requested : Math.min(requested, element.duration);
  return withEffect(element, { type: 'fadein', duration });
};

const fadeOut: EffectTransform = (element, value) => {
  if (element.duration === null) {
    throw new MissingDurationError('fadeout');
  }
  const requested = fadeLength('fadeout', value);
  return withEffect(element, { type: 'fadeout', duration: Math.min(requested, element.duration) });
};

const resize: EffectTransform = (element, value) => {
  if (value === null) {
    throw new InvalidParameterError('effects', "Invalid effect 'resize': a scale is required");
  }
  if (value <= 0) {
    throw new InvalidParameterError('effects', "Invalid effect 'resize': scale must be positive");
  }
  return { ...withEffect(element, { type: 'resize', scale: value }), scale: element.scale * value };
};

const BUILT_IN_EFFECTS: ReadonlyArray<[EffectName, EffectTransform]> = [
  ['fadein', fadeIn],
  ['fadeout', fadeOut],
  ['blackwhite', (element) => withEffect(element, { type: 'blackwhite' })],
  ['mirrorx', (element) => withEffect(element, { type: 'mirrorx' })],
  ['mirrory', (element) => withEffect(element, { type: 'mirrory' })],
  ['resize', resize],
];

export const EFFECT_REGISTRY: EffectRegistry = new Map<string, EffectTransform>(BUILT_IN_EFFECTS);

/** Built-in transforms plus `extra`; an entry in `extra` replaces a built-in of the same name. */
export function createEffectRegistry(extra: Record<string, EffectTransform> = {}): EffectRegistry {
  return new Map<string, EffectTransform>([...BUILT_IN_EFFECTS, ...Object.entries(extra)]);
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

/**
 * Applies descriptors in list order. Each step returns a new element; the
 * input element is never modified. Names missing from the registry are skipped.
 * A parameter error raised by a transform is reported as `effects.<index>`.
 */
export function applyEffects(
  element: OverlayElement,
  descriptors: readonly EffectDescriptor[],
  registry: EffectRegistry = EFFECT_REGISTRY,
): OverlayElement {
  return descriptors.reduce((current, descriptor, index) => {
    const transform = registry.get(descriptor.name);
    if (!transform) {
      logger.debug({ event: 'effect_unknown', effect: descriptor.name });
      return current;
    }
    try {
      return transform(current, descriptor.value);
    } catch (error) {
      if (error instanceof InvalidParameterError) {
        throw new InvalidParameterError(`effects.${index}`, error.message);
      }
      throw error;
    }
  }, element);
}
