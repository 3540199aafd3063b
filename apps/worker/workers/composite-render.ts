import { Worker, UnrecoverableError, type Job } from 'bullmq';
import { mkdir } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { env } from '@wordclip/config';
import { ColorSchema, composeVideo, createLogger, isOverlayError } from '@wordclip/overlay';
import { QUEUE_NAMES, getRedisConnection } from '@wordclip/queue';
import type { CompositeElement, CompositeRenderJobData } from '@wordclip/types';
import { renderComposite } from '../lib/ffmpeg';

const logger = createLogger('worker-composite-render');

// ---------------------------------------------------------------------------
// Zod validation schemas
// ---------------------------------------------------------------------------

const positiveInt = z.number().int().positive();

const SizeSchema = z.tuple([positiveInt.max(7680), positiveInt.max(7680)]);

const WordTimingSchema = z.object({
  word: z.string().min(1).max(500),
  start: z.number().min(0),
  end: z.number().min(0),
}).refine(
  (w) => w.end > w.start,
  { message: 'Word end must be after start' },
);

const MediaSourceSchema = z.object({
  type: z.enum(['image', 'video']),
  source: z.string().min(1).max(1024),
  size: SizeSchema.optional(),
});

export const CompositeRenderJobSchema = z.object({
  renderId: z.string().min(1).max(128).regex(/^[A-Za-z0-9_-]+$/),
  words: z.array(WordTimingSchema).max(5000),
  canvasSize: SizeSchema,
  totalDuration: z.number().positive().max(3600),
  baseVisual: z.union([z.string().min(1).max(1024), MediaSourceSchema]),
  textStyle: z.record(z.unknown()).optional(),
  mergeAdjacent: z.boolean().optional(),
  backgroundColor: ColorSchema.max(64).optional(),
  outputFileName: z.string().regex(/^[\w.-]+\.mp4$/).optional(),
});

// ---------------------------------------------------------------------------
// Main handler
// ---------------------------------------------------------------------------

export type RenderJob = Pick<Job<CompositeRenderJobData>, 'id' | 'data' | 'updateProgress'>;

export type RenderResult = {
  outputPath: string;
  overlays: number;
};

export type RenderDeps = {
  render: (
    composite: CompositeElement,
    outputPath: string,
    options: { ffmpegPath: string; timeoutMs: number },
  ) => Promise<void>;
  outputDir: string;
  ffmpegPath: string;
  timeoutMs: number;
};

const defaultDeps = (): RenderDeps => ({
  render: renderComposite,
  outputDir: env.RENDER_OUTPUT_DIR,
  ffmpegPath: env.FFMPEG_PATH,
  timeoutMs: env.RENDER_TIMEOUT_MS,
});

export async function handleRenderJob(
  job: RenderJob,
  deps: RenderDeps = defaultDeps(),
): Promise<RenderResult> {
  logger.info({ event: 'render_start', jobId: job.id, renderId: job.data.renderId });

  // 1. Validate job data with Zod; bad data is never retried
  const parsed = CompositeRenderJobSchema.safeParse(job.data);
  if (!parsed.success) {
    logger.error({
      event: 'render_validation_failed',
      jobId: job.id,
      errors: parsed.error.issues,
    });
    throw new UnrecoverableError(`Invalid job data: ${parsed.error.message}`);
  }

  const data = parsed.data;

  // 2. Build the composite description
  let composite: CompositeElement;
  try {
    composite = composeVideo({
      words: data.words,
      canvasSize: data.canvasSize,
      totalDuration: data.totalDuration,
      baseVisual: data.baseVisual,
      textStyle: data.textStyle,
      mergeAdjacent: data.mergeAdjacent,
      backgroundColor: data.backgroundColor,
    });
  } catch (error) {
    if (isOverlayError(error)) {
      logger.error({
        event: 'render_compose_failed',
        renderId: data.renderId,
        code: error.code,
        error: error.message,
      });
      throw new UnrecoverableError(error.message);
    }
    throw error;
  }

  const overlays = composite.layers.filter((layer) => layer.kind === 'text').length;
  await job.updateProgress(20);

  // 3. Render via FFmpeg
  await mkdir(deps.outputDir, { recursive: true });
  const outputPath = path.join(deps.outputDir, data.outputFileName ?? `${data.renderId}.mp4`);
  await deps.render(composite, outputPath, {
    ffmpegPath: deps.ffmpegPath,
    timeoutMs: deps.timeoutMs,
  });

  await job.updateProgress(100);
  logger.info({ event: 'render_complete', renderId: data.renderId, outputPath, overlays });
  return { outputPath, overlays };
}

// ---------------------------------------------------------------------------
// Worker registration
// ---------------------------------------------------------------------------

export function startCompositeRenderWorker(): Worker<CompositeRenderJobData, RenderResult> {
  const worker = new Worker<CompositeRenderJobData, RenderResult>(
    QUEUE_NAMES.COMPOSITE_RENDER,
    (job) => handleRenderJob(job),
    {
      connection: getRedisConnection(),
      concurrency: env.RENDER_CONCURRENCY,
    },
  );

  worker.on('failed', (job, err) => {
    logger.error({
      event: 'render_job_failed',
      jobId: job?.id,
      renderId: job?.data.renderId,
      error: err.message,
      attemptsMade: job?.attemptsMade,
    });
  });

  worker.on('error', (err) => {
    logger.error({ event: 'worker_error', error: err.message });
  });

  return worker;
}
