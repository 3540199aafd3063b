export { createQueue, getQueue, getRedisConnection, enqueueCompositeRender, closeQueues } from './queues';
export { QUEUE_NAMES, DEFAULT_JOB_OPTIONS } from './constants';
export type { CompositeRenderJobData } from '@wordclip/types';
