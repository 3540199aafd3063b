export type {
  Size,
  TextMethod,
  TextAlign,
  HorizontalAlign,
  VerticalAlign,
  ClipConfig,
  TextKey,
  Margin,
  TextStyle,
  EffectName,
  EffectDescriptor,
  AppliedEffect,
  OverlayElement,
  WordTiming,
  BuildPreset,
} from './overlay';

export type {
  MediaType,
  MediaSource,
  BaseVisual,
  ColorLayer,
  MediaLayer,
  CompositeLayer,
  CompositeElement,
} from './composite';

export type { QueueName, CompositeRenderJobData } from './queue';
