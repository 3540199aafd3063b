export type Size = readonly [width: number, height: number];

export type TextMethod = 'label' | 'caption';

export type TextAlign = 'left' | 'center' | 'right';

export type HorizontalAlign = 'left' | 'center' | 'right';

export type VerticalAlign = 'top' | 'center' | 'bottom';

/** Loosely-typed input map, keys as accepted by the validator. */
export type ClipConfig = Record<string, unknown>;

/** Key carrying the overlay text for a given call site. */
export type TextKey = 'text' | 'word';

export type Margin = {
  left: number;
  top: number;
  right: number;
  bottom: number;
};

export type TextStyle = {
  font: string;
  /** `null` when the renderer should fit the text to `size`. */
  fontSize: number | null;
  color: string;
  strokeWidth: number;
  strokeColor: string;
  size: Size;
  method: TextMethod;
  textAlign: TextAlign;
  horizontalAlign: HorizontalAlign;
  verticalAlign: VerticalAlign;
  interline: number;
  bgColor: string | null;
  margin: Margin;
};

export type EffectName = 'fadein' | 'fadeout' | 'blackwhite' | 'mirrorx' | 'mirrory' | 'resize';

export type EffectDescriptor = {
  name: string;
  value: number | null;
};

export type AppliedEffect =
  | { type: 'fadein'; duration: number }
  | { type: 'fadeout'; duration: number }
  | { type: 'blackwhite' }
  | { type: 'mirrorx' }
  | { type: 'mirrory' }
  | { type: 'resize'; scale: number };

export type OverlayElement = {
  kind: 'text';
  text: string;
  style: TextStyle;
  start: number;
  duration: number | null;
  scale: number;
  effects: AppliedEffect[];
};

export type WordTiming = {
  word: string;
  start: number;
  end: number;
};

export type BuildPreset = {
  name: string;
  textKey: TextKey;
  /** Whether `fontSize` survives when `method` resolves to caption. */
  captionFontSize: 'omit' | 'resolve';
  defaultDuration: number | null;
  defaultEffects: readonly EffectDescriptor[];
  defaults: TextStyle;
};
