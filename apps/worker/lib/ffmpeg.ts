import { spawn } from 'child_process';
import type {
  AppliedEffect,
  ColorLayer,
  CompositeElement,
  MediaLayer,
  OverlayElement,
  Size,
  TextStyle,
} from '@wordclip/types';
import { createLogger } from '@wordclip/overlay';

const logger = createLogger('ffmpeg');

// ---------------------------------------------------------------------------
// Types & Constants
// ---------------------------------------------------------------------------

export const DEFAULT_FPS = 30;

const STDERR_MAX = 65536;

export type FilterGraph = {
  /** Input arguments (`-i` and their per-input options) in input order. */
  inputArgs: string[];
  filterComplex: string;
  outputLabel: string;
};

export type RenderOptions = {
  ffmpegPath: string;
  timeoutMs: number;
  fps?: number;
};

// ---------------------------------------------------------------------------
// Text Escaping Helpers
// ---------------------------------------------------------------------------

/**
 * Escapes FFmpeg drawtext special characters.
 * Must escape: backslash, single quote, colon, percent.
 */
export function escapeDrawtext(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/:/g, '\\:')
    .replace(/%/g, '\\%');
}

/** Seconds rounded to milliseconds, without trailing zeros. */
export function formatSeconds(seconds: number): string {
  return String(Number(seconds.toFixed(3)));
}

// ---------------------------------------------------------------------------
// Text layout
// ---------------------------------------------------------------------------

// Average glyph width relative to font size; good enough for sans fonts.
const GLYPH_WIDTH_RATIO = 0.6;
const LINE_HEIGHT_RATIO = 1.2;

/** Breaks text at word boundaries so no line exceeds `maxChars` (unless a single word does). */
export function wrapText(text: string, maxChars: number): string {
  const words = text.split(' ');
  const lines: string[] = [];
  let currentLine = '';

  for (const word of words) {
    if (currentLine.length + word.length + 1 > maxChars && currentLine.length > 0) {
      lines.push(currentLine);
      currentLine = word;
    } else {
      currentLine = currentLine.length > 0 ? currentLine + ' ' + word : word;
    }
  }

  if (currentLine.length > 0) {
    lines.push(currentLine);
  }

  return lines.join('\n');
}

function innerSize(style: TextStyle): Size {
  const { left, top, right, bottom } = style.margin;
  const [width, height] = style.size;
  return [Math.max(1, width - left - right), Math.max(1, height - top - bottom)];
}

/** Largest font size at which every line fits inside the text box. */
export function fitFontSize(text: string, style: TextStyle): number {
  const [width, height] = innerSize(style);
  const lines = text.split('\n');
  const longest = Math.max(1, ...lines.map((line) => line.length));
  const byWidth = width / (longest * GLYPH_WIDTH_RATIO);
  const byHeight = height / (lines.length * LINE_HEIGHT_RATIO);
  return Math.max(1, Math.floor(Math.min(byWidth, byHeight)));
}

/** Text and font size as drawn: caption text wraps to the box width, a `null` size is fitted. */
export function layoutText(element: OverlayElement): { text: string; fontSize: number } {
  const { style } = element;
  if (style.fontSize === null) {
    return { text: element.text, fontSize: fitFontSize(element.text, style) };
  }

  if (style.method !== 'caption') {
    return { text: element.text, fontSize: style.fontSize };
  }

  const [width] = innerSize(style);
  const maxChars = Math.max(1, Math.floor(width / (style.fontSize * GLYPH_WIDTH_RATIO)));
  return { text: wrapText(element.text, maxChars), fontSize: style.fontSize };
}

function positionX(style: TextStyle): string {
  switch (style.horizontalAlign) {
    case 'left':
      return String(style.margin.left);
    case 'right':
      return `w-text_w-${style.margin.right}`;
    case 'center':
      return '(w-text_w)/2';
  }
}

function positionY(style: TextStyle): string {
  switch (style.verticalAlign) {
    case 'top':
      return String(style.margin.top);
    case 'bottom':
      return `h-text_h-${style.margin.bottom}`;
    case 'center':
      return '(h-text_h)/2';
  }
}

// ---------------------------------------------------------------------------
// Layer filters
// ---------------------------------------------------------------------------

/**
 * Builds a drawtext filter for the element's style.
 * Text is positioned inside its own box by the horizontal/vertical alignment.
 */
export function buildDrawtext(element: OverlayElement): string {
  const { style } = element;
  const { text, fontSize } = layoutText(element);

  const options = [
    `text='${escapeDrawtext(text)}'`,
    `font='${escapeDrawtext(style.font)}'`,
    `fontsize=${fontSize}`,
    `fontcolor=${style.color}`,
  ];
  if (style.strokeWidth > 0) {
    options.push(`borderw=${style.strokeWidth}`, `bordercolor=${style.strokeColor}`);
  }
  options.push(`line_spacing=${style.interline}`, `x=${positionX(style)}`, `y=${positionY(style)}`);

  return `drawtext=${options.join(':')}`;
}

/** Maps one applied effect onto an ffmpeg filter for a layer living in `[start, end]`. */
export function effectFilter(effect: AppliedEffect, start: number, end: number): string {
  switch (effect.type) {
    case 'fadein':
      return `fade=t=in:st=${formatSeconds(start)}:d=${formatSeconds(effect.duration)}:alpha=1`;
    case 'fadeout':
      return (
        `fade=t=out:st=${formatSeconds(end - effect.duration)}` +
        `:d=${formatSeconds(effect.duration)}:alpha=1`
      );
    case 'blackwhite':
      return 'hue=s=0';
    case 'mirrorx':
      return 'hflip';
    case 'mirrory':
      return 'vflip';
    case 'resize':
      return `scale=iw*${effect.scale}:ih*${effect.scale}`;
  }
}

function layerEnd(layer: OverlayElement, compositeDuration: number): number {
  return layer.duration === null ? compositeDuration : layer.start + layer.duration;
}

/**
 * Renders one text overlay on its own canvas: a transparent (or `bgColor`)
 * box the size of the text box, drawtext, then the effect filters in order.
 */
export function buildTextLayerFilter(
  layer: OverlayElement,
  compositeDuration: number,
  fps: number,
  label: string,
): string {
  const [width, height] = layer.style.size;
  const duration = formatSeconds(compositeDuration);
  const box =
    layer.style.bgColor === null
      ? `color=c=black:s=${width}x${height}:d=${duration}:r=${fps},format=rgba,colorchannelmixer=aa=0`
      : `color=c=${layer.style.bgColor}:s=${width}x${height}:d=${duration}:r=${fps},format=rgba`;

  const end = layerEnd(layer, compositeDuration);
  const filters = [
    box,
    buildDrawtext(layer),
    ...layer.effects.map((effect) => effectFilter(effect, layer.start, end)),
  ];
  return `${filters.join(',')}[${label}]`;
}

function buildColorLayerFilter(layer: ColorLayer, fps: number, label: string): string {
  const [width, height] = layer.size;
  return `color=c=${layer.color}:s=${width}x${height}:d=${formatSeconds(layer.duration)}:r=${fps}[${label}]`;
}

function mediaInputArgs(layer: MediaLayer): string[] {
  const duration = formatSeconds(layer.duration);
  return layer.mediaType === 'image'
    ? ['-loop', '1', '-t', duration, '-i', layer.source]
    : ['-stream_loop', '-1', '-t', duration, '-i', layer.source];
}

function buildMediaLayerFilter(layer: MediaLayer, inputIndex: number, label: string): string {
  const [width, height] = layer.size;
  return `[${inputIndex}:v]scale=${width}:${height},setsar=1[${label}]`;
}

// ---------------------------------------------------------------------------
// Composite graph
// ---------------------------------------------------------------------------

/**
 * Builds the ffmpeg inputs and filter_complex for a composite. Layers are
 * overlaid bottom-to-top, centered on the canvas; text layers are only
 * enabled within their own time range.
 */
export function buildCompositeFilterGraph(
  composite: CompositeElement,
  fps: number = DEFAULT_FPS,
): FilterGraph {
  const inputArgs: string[] = [];
  const filters: string[] = [];
  let inputCount = 0;
  let current: string | null = null;

  for (const [index, layer] of composite.layers.entries()) {
    const label = `l${index}`;

    if (layer.kind === 'color') {
      filters.push(buildColorLayerFilter(layer, fps, label));
    } else if (layer.kind === 'media') {
      inputArgs.push(...mediaInputArgs(layer));
      filters.push(buildMediaLayerFilter(layer, inputCount, label));
      inputCount++;
    } else {
      filters.push(buildTextLayerFilter(layer, composite.duration, fps, label));
    }

    if (current === null) {
      current = label;
      continue;
    }

    const enable =
      layer.kind === 'text'
      ? `:enable='between(t,${formatSeconds(layer.start)},${formatSeconds(layerEnd(layer, composite.duration))})'`
      : '';
    const output = `v${index}`;
    filters.push(`[${current}][${label}]overlay=x=(W-w)/2:y=(H-h)/2${enable}[${output}]`);
    current = output;
  }

  if (current === null) {
    throw new Error('Composite has no layers');
  }

  filters.push(`[${current}]format=yuv420p[out]`);
  return { inputArgs, filterComplex: filters.join(';'), outputLabel: 'out' };
}

export function buildRenderArgs(
  composite: CompositeElement,
  outputPath: string,
  fps: number = DEFAULT_FPS,
): string[] {
  const graph = buildCompositeFilterGraph(composite, fps);
  return [
    '-y',
    ...graph.inputArgs,
    '-filter_complex', graph.filterComplex,
    '-map', `[${graph.outputLabel}]`,
    '-t', formatSeconds(composite.duration),
    '-r', String(fps),
    '-c:v', 'libx264',
    '-preset', 'fast',
    '-crf', '23',
    '-pix_fmt', 'yuv420p',
    '-movflags', '+faststart',
    outputPath,
  ];
}

// ---------------------------------------------------------------------------
// Core FFmpeg Execution
// ---------------------------------------------------------------------------

/**
 * Renders a composite using spawn (not exec) for long-running operations.
 * Uses bounded stderr buffer and configurable timeout.
 */
export function renderComposite(
  composite: CompositeElement,
  outputPath: string,
  options: RenderOptions,
): Promise<void> {
  return new Promise((resolve, reject) => {
    const args = buildRenderArgs(composite, outputPath, options.fps);

    logger.info({
      event: 'ffmpeg_start',
      output: outputPath,
      layers: composite.layers.length,
      duration: composite.duration,
    });

    const proc = spawn(options.ffmpegPath, args, { stdio: 'pipe' });

    const timeout = setTimeout(() => {
      proc.kill('SIGKILL');
      reject(new Error('FFmpeg timeout exceeded'));
    }, options.timeoutMs);

    let stderr = '';
    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
      if (stderr.length > STDERR_MAX) {
        stderr = stderr.slice(-STDERR_MAX);
      }
    });

    proc.on('close', (code) => {
      clearTimeout(timeout);
      if (code === 0) {
        logger.info({ event: 'ffmpeg_complete', output: outputPath });
        resolve();
      } else {
        logger.error({ event: 'ffmpeg_error', code, stderr: stderr.slice(-500) });
        reject(new Error(`FFmpeg exited with code ${code}`));
      }
    });

    proc.on('error', (err) => {
      clearTimeout(timeout);
      reject(err);
    });
  });
}
