import { z } from 'zod';
import { WORD_OVERLAY_PRESET } from '@wordclip/config/presets';
import type {
  BaseVisual,
  BuildPreset,
  ClipConfig,
  ColorLayer,
  CompositeElement,
  MediaLayer,
  OverlayElement,
  Size,
  WordTiming,
} from '@wordclip/types';
import { buildOverlay } from './builder';
import { EFFECT_REGISTRY, type EffectRegistry } from './effects';
import { InvalidParameterError } from './errors';
import { createLogger } from './logger';
import { mergeWordTimings } from './timing';
import {
  ColorSchema,
  SizeSchema,
  invalidParameter,
  parseClipConfig,
  toParameterIssues,
} from './validator';

const logger = createLogger('video-composer');

// Keys the word entry supplies; a text style cannot override them.
const ENTRY_KEYS = new Set(['text', 'word', 'start_time', 'end_time', 'duration']);

const ComposeInputSchema = z.object({
  canvasSize: SizeSchema,
  totalDuration: z
    .number({ invalid_type_error: 'must be a number' })
    .finite('must be a finite number')
    .positive('must be positive'),
  backgroundColor: ColorSchema.optional(),
});

export type ComposeVideoParams = {
  words: readonly WordTiming[];
  canvasSize: Size;
  totalDuration: number;
  baseVisual: BaseVisual;
  textStyle?: ClipConfig;
  /** Pre-merge back-to-back words into phrases. */
  mergeAdjacent?: boolean;
  backgroundColor?: string;
  registry?: EffectRegistry;
};

function toBaseLayer(baseVisual: BaseVisual, canvasSize: Size, totalDuration: number): MediaLayer {
  if (typeof baseVisual === 'string') {
    if (baseVisual.trim() === '') {
      throw new InvalidParameterError('baseVisual', "Invalid 'baseVisual': path must not be empty");
    }
    return {
      kind: 'media',
      mediaType: 'image',
      source: baseVisual,
      size: canvasSize,
      start: 0,
      duration: totalDuration,
    };
  }

  return {
    kind: 'media',
    mediaType: baseVisual.type,
    source: baseVisual.source,
    size: baseVisual.size ?? canvasSize,
    start: 0,
    duration: totalDuration,
  };
}

function withEntryPrefix<T>(index: number, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof InvalidParameterError) {
      throw error.withPrefix(`words[${index}]`);
    }
    throw error;
  }
}

// Merging hides the bounds of the entries it joins, so each one is checked first.
function checkEntries(words: readonly WordTiming[]): void {
  words.forEach((entry, index) =>
    withEntryPrefix(index, () =>
      parseClipConfig({ word: entry.word, start_time: entry.start, end_time: entry.end }, 'word'),
    ),
  );
}

function wordPreset(canvasSize: Size): BuildPreset {
  return {
    ...WORD_OVERLAY_PRESET,
    defaults: { ...WORD_OVERLAY_PRESET.defaults, size: canvasSize },
  };
}

/**
 * Builds one word overlay per timing entry and stacks them, in entry order,
 * above a blank background and the base visual.
 */
export function composeVideo(params: ComposeVideoParams): CompositeElement {
  const checked = ComposeInputSchema.safeParse({
    canvasSize: params.canvasSize,
    totalDuration: params.totalDuration,
    backgroundColor: params.backgroundColor,
  });
  if (!checked.success) {
    throw invalidParameter(toParameterIssues(checked.error));
  }

  const { canvasSize, totalDuration, backgroundColor } = checked.data;
  let words: readonly WordTiming[] = params.words;
  if (params.mergeAdjacent) {
    checkEntries(words);
    words = mergeWordTimings(words);
  }
  const preset = wordPreset(canvasSize);
  const registry = params.registry ?? EFFECT_REGISTRY;

  const style = Object.fromEntries(
    Object.entries(params.textStyle ?? {}).filter(([key]) => !ENTRY_KEYS.has(key)),
  );

  const overlays: OverlayElement[] = words.map((entry, index) =>
    withEntryPrefix(index, () =>
      buildOverlay(
        { ...style, word: entry.word, start_time: entry.start, end_time: entry.end },
        preset,
        registry,
      ),
    ),
  );

  const background: ColorLayer = {
    kind: 'color',
    color: backgroundColor ?? 'black',
    size: canvasSize,
    start: 0,
    duration: totalDuration,
  };

  const composite: CompositeElement = {
    size: canvasSize,
    duration: totalDuration,
    layers: [background, toBaseLayer(params.baseVisual, canvasSize, totalDuration), ...overlays],
  };

  logger.debug({
    event: 'composite_built',
    overlays: overlays.length,
    merged: params.mergeAdjacent === true,
    duration: totalDuration,
  });
  return composite;
}

export function overlayLayers(composite: CompositeElement): OverlayElement[] {
  return composite.layers.filter((layer): layer is OverlayElement => layer.kind === 'text');
}
