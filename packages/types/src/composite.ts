import type { OverlayElement, Size } from './overlay';

export type MediaType = 'image' | 'video';

/** A pre-built base visual handed to the composer. */
export type MediaSource = {
  type: MediaType;
  source: string;
  size?: Size;
};

export type BaseVisual = string | MediaSource;

export type ColorLayer = {
  kind: 'color';
  color: string;
  size: Size;
  start: number;
  duration: number;
};

export type MediaLayer = {
  kind: 'media';
  mediaType: MediaType;
  source: string;
  size: Size;
  start: number;
  duration: number;
};

export type CompositeLayer = ColorLayer | MediaLayer | OverlayElement;

export type CompositeElement = {
  size: Size;
  duration: number;
  /** Bottom-to-top. */
  layers: CompositeLayer[];
};
