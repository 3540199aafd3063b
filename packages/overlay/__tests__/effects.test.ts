import { describe, it, expect } from 'vitest';
import type { OverlayElement } from '@wordclip/types';
import {
  applyEffects,
  createEffectRegistry,
  formatEffect,
  parseEffects,
  resolveOverlay,
  InvalidParameterError,
  MissingDurationError,
} from '../src';

const timed = (): OverlayElement => resolveOverlay({ text: 'a', start_time: 1, end_time: 2 });
const untimed = (): OverlayElement => resolveOverlay({ text: 'a' });

// --- parseEffects ---

describe('parseEffects', () => {
  it('parses names with and without values', () => {
    expect(parseEffects(['fadein', 'fadeout,0.3', { name: 'resize', value: 1.5 }])).toEqual([
      { name: 'fadein', value: null },
      { name: 'fadeout', value: 0.3 },
      { name: 'resize', value: 1.5 },
    ]);
  });

  it('trims whitespace and treats an empty value as absent', () => {
    expect(parseEffects([' mirrorx , '])).toEqual([{ name: 'mirrorx', value: null }]);
  });

  it('keeps unknown names', () => {
    expect(parseEffects(['sparkle,2'])).toEqual([{ name: 'sparkle', value: 2 }]);
  });

  it('rejects a non-numeric value', () => {
    try {
      parseEffects(['fadein', 'fadeout,fast']);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidParameterError);
      expect(error).toMatchObject({ field: 'effects.1' });
    }
  });

  it('rejects more than one value', () => {
    expect(() => parseEffects(['resize,1,2'])).toThrow(InvalidParameterError);
  });
});

describe('formatEffect', () => {
  it('writes the descriptor encoding', () => {
    expect(formatEffect({ name: 'fadein', value: 0.06 })).toBe('fadein,0.06');
    expect(formatEffect({ name: 'mirrory', value: null })).toBe('mirrory');
  });
});

// --- fades ---

describe('applyEffects: fades', () => {
  it('uses 0.5 when a fade has no value', () => {
    const element = applyEffects(untimed(), [{ name: 'fadein', value: null }]);
    expect(element.effects).toEqual([{ type: 'fadein', duration: 0.5 }]);
  });

  it('keeps the requested fade-in when duration is unknown', () => {
    const element = applyEffects(untimed(), [{ name: 'fadein', value: 3 }]);
    expect(element.effects).toEqual([{ type: 'fadein', duration: 3 }]);
  });

  it('caps the fade-in at the duration', () => {
    const element = applyEffects(timed(), [{ name: 'fadein', value: 3 }]);
    expect(element.effects).toEqual([{ type: 'fadein', duration: 1 }]);
  });

  it('fails a fade-out without a duration', () => {
    try {
      applyEffects(untimed(), [{ name: 'fadeout', value: 0.2 }]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MissingDurationError);
      expect(error).toMatchObject({ code: 'MISSING_DURATION', effect: 'fadeout' });
    }
  });

  it('applies a fade-out once the duration is resolved', () => {
    const element = applyEffects(timed(), [{ name: 'fadeout', value: 0.25 }]);
    expect(element.effects).toEqual([{ type: 'fadeout', duration: 0.25 }]);
  });

  it('caps the fade-out at the duration', () => {
    const element = applyEffects(timed(), [{ name: 'fadeout', value: 5 }]);
    expect(element.effects).toEqual([{ type: 'fadeout', duration: 1 }]);
  });

  it('rejects a negative fade', () => {
    expect(() => applyEffects(timed(), [{ name: 'fadein', value: -1 }])).toThrow(
      InvalidParameterError,
    );
  });

  it('reports a bad fade against its position in the list', () => {
    try {
      applyEffects(timed(), [
        { name: 'mirrorx', value: null },
        { name: 'fadeout', value: -0.5 },
      ]);
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({
        field: 'effects.1',
        message: "Invalid effect 'fadeout': length must not be negative",
      });
    }
  });
});

// --- transforms ---

describe('applyEffects: transforms', () => {
  it('applies parameterless transforms', () => {
    const element = applyEffects(untimed(), parseEffects(['blackwhite', 'mirrorx', 'mirrory']));
    expect(element.effects).toEqual([
      { type: 'blackwhite' },
      { type: 'mirrorx' },
      { type: 'mirrory' },
    ]);
  });

  it('multiplies the scale on each resize', () => {
    const element = applyEffects(untimed(), parseEffects(['resize,2', 'resize,0.25']));
    expect(element.scale).toBe(0.5);
    expect(element.effects).toEqual([
      { type: 'resize', scale: 2 },
      { type: 'resize', scale: 0.25 },
    ]);
  });

  it('requires a positive resize scale', () => {
    expect(() => applyEffects(untimed(), parseEffects(['resize']))).toThrow(InvalidParameterError);
    expect(() => applyEffects(untimed(), parseEffects(['resize,0']))).toThrow(
      InvalidParameterError,
    );
  });

  it('reports a bad resize against its position in the list', () => {
    try {
      applyEffects(untimed(), parseEffects(['blackwhite', 'mirrory', 'resize,0']));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidParameterError);
      expect(error).toMatchObject({
        field: 'effects.2',
        message: "Invalid effect 'resize': scale must be positive",
      });
    }
  });

  it('leaves start and duration alone', () => {
    const element = applyEffects(timed(), parseEffects(['resize,3', 'fadein,0.1', 'fadeout,0.1']));
    expect(element.start).toBe(1);
    expect(element.duration).toBe(1);
  });
});

// --- pipeline ---

describe('applyEffects: pipeline', () => {
  it('skips unknown effects without touching the element', () => {
    const base = timed();
    const withUnknown = applyEffects(base, parseEffects(['fadein,0.1', 'sparkle,4', 'mirrory']));
    const without = applyEffects(base, parseEffects(['fadein,0.1', 'mirrory']));
    expect(withUnknown).toEqual(without);
  });

  it('returns the same element for an all-unknown list', () => {
    const base = timed();
    expect(applyEffects(base, parseEffects(['glow', 'shake,2']))).toBe(base);
  });

  it('does not modify the input element', () => {
    const base = timed();
    const result = applyEffects(base, parseEffects(['fadein', 'resize,2']));
    expect(base.effects).toEqual([]);
    expect(base.scale).toBe(1);
    expect(result).not.toBe(base);
  });

  it('uses caller-registered effects', () => {
    const registry = createEffectRegistry({
      triple: (element) => ({ ...element, scale: element.scale * 3 }),
    });
    const element = applyEffects(untimed(), parseEffects(['triple', 'mirrorx']), registry);
    expect(element.scale).toBe(3);
    expect(element.effects).toEqual([{ type: 'mirrorx' }]);
  });

  it('lets a registry replace a built-in', () => {
    const registry = createEffectRegistry({ blackwhite: (element) => element });
    const element = applyEffects(untimed(), parseEffects(['blackwhite']), registry);
    expect(element.effects).toEqual([]);
  });
});
