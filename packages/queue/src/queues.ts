import { Queue } from 'bullmq';
import { env } from '@wordclip/config';
import type { CompositeRenderJobData, QueueName } from '@wordclip/types';
import { DEFAULT_JOB_OPTIONS, QUEUE_NAMES } from './constants';

const queues = new Map<QueueName, Queue>();

export function getRedisConnection(url: string = env.REDIS_URL) {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: parseInt(parsed.port || '6379', 10),
    password: parsed.password || undefined,
  };
}

export function createQueue(name: QueueName): Queue {
  const existing = queues.get(name);
  if (existing) return existing;

  const queue = new Queue(name, {
    connection: getRedisConnection(),
    defaultJobOptions: DEFAULT_JOB_OPTIONS,
  });

  queues.set(name, queue);
  return queue;
}

export function getQueue(name: QueueName): Queue {
  return queues.get(name) ?? createQueue(name);
}

/**
 * Queues a composite for rendering. The render id doubles as the job id, so
 * re-enqueueing the same render while it is pending is a no-op.
 */
export async function enqueueCompositeRender(data: CompositeRenderJobData): Promise<string> {
  const queue = getQueue(QUEUE_NAMES.COMPOSITE_RENDER);
  const job = await queue.add('render', data, { jobId: data.renderId });
  return job.id ?? data.renderId;
}

export async function closeQueues(): Promise<void> {
  await Promise.all([...queues.values()].map((queue) => queue.close()));
  queues.clear();
}
