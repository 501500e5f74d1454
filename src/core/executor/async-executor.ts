import { env } from '@config/index.js';

import { BoundedTaskExecutor } from './task-executor.js';

/**
 * Executor compartido para los comandos que se ejecutan en modo asíncrono.
 */
export const asyncExecutor = new BoundedTaskExecutor({
  name: 'asyncExecutor',
  corePoolSize: env.ASYNC_CORE_POOL_SIZE,
  maxPoolSize: env.ASYNC_MAX_POOL_SIZE,
  queueCapacity: env.ASYNC_QUEUE_CAPACITY
});
