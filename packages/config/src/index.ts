export { env } from './env';
export type { Env } from './env';
export {
  DEFAULT_FADE_SECONDS,
  SINGLE_CLIP_PRESET,
  WORD_OVERLAY_PRESET,
  PRESETS,
} from './presets';
export type { PresetName } from './presets';
