import { SINGLE_CLIP_PRESET } from '@wordclip/config/presets';
import type { BuildPreset, ClipConfig, Margin, OverlayElement, TextStyle } from '@wordclip/types';
import { applyEffects, parseEffects, EFFECT_REGISTRY, type EffectRegistry } from './effects';
import { createLogger } from './logger';
import { parseClipConfig, type ParsedClipConfig, type ParsedClipFields } from './validator';

const logger = createLogger('clip-builder');

function resolveMargin(margin: ParsedClipFields['margin'], fallback: Margin): Margin {
  if (margin === undefined) return fallback;
  if (typeof margin === 'number') {
    return { left: margin, top: margin, right: margin, bottom: margin };
  }
  if (margin.length === 2) {
    const [horizontal, vertical] = margin;
    return { left: horizontal, top: vertical, right: horizontal, bottom: vertical };
  }
  const [left, top, right, bottom] = margin;
  return { left, top, right, bottom };
}

function resolveStyle(fields: ParsedClipFields, preset: BuildPreset): TextStyle {
  const defaults = preset.defaults;
  const method = fields.method ?? defaults.method;
  const fontSize =
    method === 'caption' && preset.captionFontSize === 'omit'
      ? null
      : fields.font_size ?? fields.fontsize ?? defaults.fontSize;

  return {
    font: fields.font ?? defaults.font,
    fontSize,
    color: fields.color ?? defaults.color,
    strokeWidth: fields.stroke_width ?? defaults.strokeWidth,
    strokeColor: fields.stroke_color ?? defaults.strokeColor,
    size: fields.size ?? defaults.size,
    method,
    textAlign: fields.text_align ?? fields.align ?? defaults.textAlign,
    horizontalAlign: fields.horizontal_align ?? defaults.horizontalAlign,
    verticalAlign: fields.vertical_align ?? defaults.verticalAlign,
    interline: fields.interline ?? defaults.interline,
    bgColor: fields.bg_color ?? defaults.bgColor,
    margin: resolveMargin(fields.margin, defaults.margin),
  };
}

function toElement({ text, fields }: ParsedClipConfig, preset: BuildPreset): OverlayElement {
  const start = fields.start_time ?? 0;
  const duration =
    fields.end_time !== undefined
      ? fields.end_time - start
      : fields.duration ?? preset.defaultDuration;

  return {
    kind: 'text',
    text,
    style: resolveStyle(fields, preset),
    start,
    duration,
    scale: 1,
    effects: [],
  };
}

/**
 * Validates `config` and resolves every optional field against the preset.
 * No effects are applied.
 */
export function resolveOverlay(
  config: ClipConfig,
  preset: BuildPreset = SINGLE_CLIP_PRESET,
): OverlayElement {
  return toElement(parseClipConfig(config, preset.textKey), preset);
}

/**
 * Full construction path: validate, resolve defaults, then run the effect
 * list. Without an `effects` key the preset's default fades apply.
 */
export function buildOverlay(
  config: ClipConfig,
  preset: BuildPreset = SINGLE_CLIP_PRESET,
  registry: EffectRegistry = EFFECT_REGISTRY,
): OverlayElement {
  const parsed = parseClipConfig(config, preset.textKey);
  const descriptors =
    parsed.fields.effects === undefined
      ? preset.defaultEffects
      : parseEffects(parsed.fields.effects);

  const built = applyEffects(toElement(parsed, preset), descriptors, registry);
  logger.debug({
    event: 'overlay_built',
    preset: preset.name,
    start: built.start,
    duration: built.duration,
    effects: built.effects.map((effect) => effect.type),
  });
  return built;
}
