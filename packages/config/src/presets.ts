import type { BuildPreset, EffectDescriptor, TextStyle } from '@wordclip/types';

/** Fade length used when a fade descriptor carries no value. */
export const DEFAULT_FADE_SECONDS = 0.5;

const BASE_STYLE: TextStyle = {
  font: 'Arial',
  fontSize: 24,
  color: 'white',
  strokeWidth: 0,
  strokeColor: 'black',
  size: [640, 480],
  method: 'label',
  textAlign: 'center',
  horizontalAlign: 'center',
  verticalAlign: 'center',
  interline: 4,
  bgColor: null,
  margin: { left: 0, top: 0, right: 0, bottom: 0 },
};

const fadePair = (seconds: number): readonly EffectDescriptor[] => [
  { name: 'fadein', value: seconds },
  { name: 'fadeout', value: seconds },
];

/**
 * Standalone text clip. Keeps the legacy font sizing: caption-method clips
 * leave the font size to the renderer. No default duration, so a clip built
 * without `end_time` or `duration` cannot take the default fade-out.
 */
export const SINGLE_CLIP_PRESET: BuildPreset = {
  name: 'single-clip',
  textKey: 'text',
  captionFontSize: 'omit',
  defaultDuration: null,
  defaultEffects: fadePair(0.2),
  defaults: BASE_STYLE,
};

/**
 * One overlay per spoken word. Short fades suit sub-second words; the
 * composer replaces `size` with the canvas size.
 */
export const WORD_OVERLAY_PRESET: BuildPreset = {
  name: 'word-overlay',
  textKey: 'word',
  captionFontSize: 'resolve',
  defaultDuration: 5,
  defaultEffects: fadePair(0.06),
  defaults: {
    ...BASE_STYLE,
    fontSize: 50,
    strokeWidth: 3,
    method: 'caption',
  },
};

export const PRESETS = {
  'single-clip': SINGLE_CLIP_PRESET,
  'word-overlay': WORD_OVERLAY_PRESET,
} as const satisfies Record<string, BuildPreset>;

export type PresetName = keyof typeof PRESETS;
