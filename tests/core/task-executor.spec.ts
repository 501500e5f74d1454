import { describe, expect, it } from '@jest/globals';

import { BoundedTaskExecutor, TaskRejectedError } from '../../src/core/executor/task-executor.js';
import { MessageKeys } from '../../src/shared/constants/message-keys.js';

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

const deferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
};

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('BoundedTaskExecutor', () => {
  const createExecutor = (): BoundedTaskExecutor =>
    new BoundedTaskExecutor({ name: 'pruebas', corePoolSize: 1, maxPoolSize: 2, queueCapacity: 1 });

  it('rechaza configuraciones inválidas', () => {
    expect(() => new BoundedTaskExecutor({ corePoolSize: 0, maxPoolSize: 1, queueCapacity: 1 })).toThrow(RangeError);
    expect(() => new BoundedTaskExecutor({ corePoolSize: 3, maxPoolSize: 2, queueCapacity: 1 })).toThrow(RangeError);
    expect(() => new BoundedTaskExecutor({ corePoolSize: 1, maxPoolSize: 1, queueCapacity: -1 })).toThrow(RangeError);
  });

  it('resuelve el handle con el valor de la tarea', async () => {
    const executor = createExecutor();

    await expect(executor.submit(() => 42)).resolves.toBe(42);
    await expect(executor.submit(async () => 'ok')).resolves.toBe('ok');
  });

  it('rechaza el handle con el error de la tarea', async () => {
    const executor = createExecutor();
    const failure = new Error('fallo de la tarea');

    await expect(
      executor.submit(() => {
        throw failure;
      })
    ).rejects.toBe(failure);
    expect(executor.activeCount).toBe(0);
  });

  it('nunca ejecuta la tarea dentro de submit', async () => {
    const executor = createExecutor();
    let ran = false;

    const handle = executor.submit(() => {
      ran = true;
    });

    expect(ran).toBe(false);
    await handle;
    expect(ran).toBe(true);
  });

  it('encola tras el core y crece hasta el máximo con la cola llena', async () => {
    const executor = createExecutor();
    const first = deferred<string>();
    const second = deferred<string>();
    const third = deferred<string>();

    const handles = [
      executor.submit(() => first.promise),
      executor.submit(() => second.promise),
      executor.submit(() => third.promise)
    ];

    expect(executor.activeCount).toBe(2);
    expect(executor.queueSize).toBe(1);

    await expect(executor.submit(() => 'extra')).rejects.toBeInstanceOf(TaskRejectedError);

    first.resolve('a');
    third.resolve('c');
    await flush();
    expect(executor.queueSize).toBe(0);

    second.resolve('b');
    await expect(Promise.all(handles)).resolves.toEqual(['a', 'b', 'c']);
  });

  it('describe la saturación en el error de rechazo', async () => {
    const executor = new BoundedTaskExecutor({ name: 'lleno', corePoolSize: 1, maxPoolSize: 1, queueCapacity: 0 });
    const blocker = deferred<void>();
    const running = executor.submit(() => blocker.promise);

    const error = await executor.submit(() => undefined).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TaskRejectedError);
    expect(error).toHaveProperty('message', MessageKeys.ERROR_EXECUTOR_SATURATED);
    expect(error).toHaveProperty('params', ['lleno']);
    expect(error).toHaveProperty('code', 'TASK_REJECTED');
    expect(error).toHaveProperty('statusCode', 503);
    expect(error).toHaveProperty('metadata', { executor: 'lleno', reason: 'saturated', activeCount: 1, queueSize: 0 });

    blocker.resolve();
    await running;
  });

  it('ejecuta las tareas encoladas en orden FIFO', async () => {
    const executor = new BoundedTaskExecutor({ corePoolSize: 1, maxPoolSize: 1, queueCapacity: 5 });
    const order: number[] = [];

    await Promise.all(
      [1, 2, 3, 4].map((value) =>
        executor.submit(async () => {
          order.push(value);
        })
      )
    );

    expect(order).toEqual([1, 2, 3, 4]);
  });

  it('espera a que termine el trabajo pendiente al detenerse y rechaza nuevas tareas', async () => {
    const executor = createExecutor();
    const blocker = deferred<string>();
    const running = executor.submit(() => blocker.promise);

    const stopped = executor.shutdown();
    expect(executor.isShutdown).toBe(true);
    await expect(executor.submit(() => 'tarde')).rejects.toThrow(MessageKeys.ERROR_EXECUTOR_SHUTDOWN);

    blocker.resolve('fin');
    await stopped;

    await expect(running).resolves.toBe('fin');
    expect(executor.activeCount).toBe(0);
  });

  it('awaitIdle resuelve de inmediato sin trabajo pendiente', async () => {
    await expect(createExecutor().awaitIdle()).resolves.toBeUndefined();
  });
});
