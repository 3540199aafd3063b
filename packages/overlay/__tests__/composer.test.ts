import { describe, it, expect } from 'vitest';
import type { WordTiming } from '@wordclip/types';
import {
  composeVideo,
  overlayLayers,
  InvalidParameterError,
  type ComposeVideoParams,
} from '../src';

const WORDS: WordTiming[] = [
  { word: 'Hello', start: 0, end: 0.5 },
  { word: 'there', start: 0.5, end: 1.25 },
  { word: 'friend', start: 2, end: 3 },
];

function params(overrides: Partial<ComposeVideoParams> = {}): ComposeVideoParams {
  return {
    words: WORDS,
    canvasSize: [1280, 720],
    totalDuration: 4,
    baseVisual: 'assets/background.png',
    textStyle: {},
    ...overrides,
  };
}

function captureError(fn: () => unknown): InvalidParameterError {
  try {
    fn();
  } catch (error) {
    if (error instanceof InvalidParameterError) return error;
    throw error;
  }
  throw new Error('expected InvalidParameterError');
}

// --- layering ---

describe('composeVideo layering', () => {
  it('stacks background, base and one overlay per word', () => {
    const composite = composeVideo(params());
    expect(composite.size).toEqual([1280, 720]);
    expect(composite.duration).toBe(4);
    expect(composite.layers.map((layer) => layer.kind)).toEqual([
      'color',
      'media',
      'text',
      'text',
      'text',
    ]);
  });

  it('fills the canvas with a black background for the whole duration', () => {
    const [background] = composeVideo(params()).layers;
    expect(background).toEqual({
      kind: 'color',
      color: 'black',
      size: [1280, 720],
      start: 0,
      duration: 4,
    });
  });

  it('honours a background color', () => {
    const [background] = composeVideo(params({ backgroundColor: 'white' })).layers;
    expect(background).toMatchObject({ kind: 'color', color: 'white' });
  });

  it('stretches a still image path over the canvas and duration', () => {
    const base = composeVideo(params()).layers[1];
    expect(base).toEqual({
      kind: 'media',
      mediaType: 'image',
      source: 'assets/background.png',
      size: [1280, 720],
      start: 0,
      duration: 4,
    });
  });

  it('accepts a pre-built visual', () => {
    const base = composeVideo(
      params({ baseVisual: { type: 'video', source: 'clips/loop.mp4', size: [640, 360] } }),
    ).layers[1];
    expect(base).toEqual({
      kind: 'media',
      mediaType: 'video',
      source: 'clips/loop.mp4',
      size: [640, 360],
      start: 0,
      duration: 4,
    });
  });

  it('sizes a pre-built visual without a size to the canvas', () => {
    const base = composeVideo(params({ baseVisual: { type: 'image', source: 'still.jpg' } }))
      .layers[1];
    expect(base).toMatchObject({ mediaType: 'image', size: [1280, 720] });
  });
});

// --- overlays ---

describe('composeVideo overlays', () => {
  it('keeps word order and timing', () => {
    const overlays = overlayLayers(composeVideo(params()));
    expect(overlays).toHaveLength(WORDS.length);
    expect(overlays.map((overlay) => overlay.text)).toEqual(['Hello', 'there', 'friend']);
    expect(overlays.map((overlay) => overlay.start)).toEqual([0, 0.5, 2]);
    expect(overlays.map((overlay) => overlay.duration)).toEqual([0.5, 0.75, 1]);
  });

  it('applies word-overlay styling and fast fades', () => {
    const [first] = overlayLayers(composeVideo(params()));
    expect(first.style).toMatchObject({
      fontSize: 50,
      strokeWidth: 3,
      color: 'white',
      strokeColor: 'black',
      size: [1280, 720],
      method: 'caption',
    });
    expect(first.effects).toEqual([
      { type: 'fadein', duration: 0.06 },
      { type: 'fadeout', duration: 0.06 },
    ]);
  });

  it('lets the text style override presentation but not timing', () => {
    const overlays = overlayLayers(
      composeVideo(
        params({
          textStyle: { color: 'yellow', font_size: 80, text: 'ignored', start_time: 9 },
        }),
      ),
    );
    expect(overlays[1].style.color).toBe('yellow');
    expect(overlays[1].style.fontSize).toBe(80);
    expect(overlays[1].text).toBe('there');
    expect(overlays[1].start).toBe(0.5);
  });

  it('passes text style effects through', () => {
    const [first] = overlayLayers(
      composeVideo(params({ textStyle: { effects: ['blackwhite', 'resize,0.5'] } })),
    );
    expect(first.effects).toEqual([{ type: 'blackwhite' }, { type: 'resize', scale: 0.5 }]);
    expect(first.scale).toBe(0.5);
  });

  it('merges back-to-back words when asked', () => {
    const overlays = overlayLayers(composeVideo(params({ mergeAdjacent: true })));
    expect(overlays.map((overlay) => [overlay.text, overlay.start, overlay.duration])).toEqual([
      ['Hello there', 0, 1.25],
      ['friend', 2, 1],
    ]);
  });

  it('builds an empty overlay layer for no words', () => {
    const composite = composeVideo(params({ words: [] }));
    expect(overlayLayers(composite)).toEqual([]);
    expect(composite.layers).toHaveLength(2);
  });
});

// --- validation ---

describe('composeVideo validation', () => {
  it('rejects a bad canvas size', () => {
    expect(captureError(() => composeVideo(params({ canvasSize: [0, 720] }))).field).toBe(
      'canvasSize.0',
    );
  });

  it('rejects a non-positive total duration', () => {
    const error = captureError(() => composeVideo(params({ totalDuration: 0 })));
    expect(error.field).toBe('totalDuration');
    expect(error.message).toBe("Invalid 'totalDuration': must be positive");
  });

  it('reports the failing word entry', () => {
    const error = captureError(() =>
      composeVideo(
        params({
          words: [
            { word: 'ok', start: 0, end: 1 },
            { word: 'bad', start: 2, end: 2 },
          ],
        }),
      ),
    );
    expect(error.field).toBe('words[1].end_time');
    expect(error.message).toBe(
      "words[1]: Invalid 'end_time': must be greater than start_time (2)",
    );
  });

  it('rejects a blank word', () => {
    expect(
      captureError(() => composeVideo(params({ words: [{ word: ' ', start: 0, end: 1 }] }))).field,
    ).toBe('words[0].word');
  });

  it('rejects a background colour that is not a colour', () => {
    const error = captureError(() => composeVideo(params({ backgroundColor: 'red;nullsrc' })));
    expect(error.field).toBe('backgroundColor');
    expect(error.message).toBe("Invalid 'backgroundColor': must be a color name or hex code");
  });

  it('rejects a text colour carrying filter syntax', () => {
    const error = captureError(() =>
      composeVideo(params({ textStyle: { color: 'white:x=0[a];movie=secret.txt[b]' } })),
    );
    expect(error.field).toBe('words[0].color');
  });

  it('checks every entry before merging adjacent words', () => {
    const error = captureError(() =>
      composeVideo(
        params({
          mergeAdjacent: true,
          words: [
            { word: 'a', start: 0, end: 1 },
            { word: 'b', start: 1, end: 0.5 },
          ],
        }),
      ),
    );
    expect(error.field).toBe('words[1].end_time');
    expect(error.message).toBe(
      "words[1]: Invalid 'end_time': must be greater than start_time (1)",
    );
  });

  it('rejects an empty base image path', () => {
    expect(captureError(() => composeVideo(params({ baseVisual: '' }))).field).toBe('baseVisual');
  });
});
