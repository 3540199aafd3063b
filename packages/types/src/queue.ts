import type { ClipConfig, WordTiming } from './overlay';
import type { MediaSource } from './composite';

export type QueueName = 'composite-render';

export type CompositeRenderJobData = {
  renderId: string;
  words: WordTiming[];
  canvasSize: [number, number];
  totalDuration: number;
  baseVisual: string | MediaSource;
  textStyle?: ClipConfig;
  mergeAdjacent?: boolean;
  backgroundColor?: string;
  outputFileName?: string;
};
