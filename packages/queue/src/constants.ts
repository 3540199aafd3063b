import type { QueueName } from '@wordclip/types';

export const QUEUE_NAMES = {
  COMPOSITE_RENDER: 'composite-render',
} as const satisfies Record<string, QueueName>;

export const DEFAULT_JOB_OPTIONS = {
  attempts: 3,
  backoff: {
    type: 'exponential' as const,
    delay: 5000,
  },
  removeOnComplete: { count: 1000 },
  removeOnFail: { count: 5000 },
};
