import { InfrastructureError } from '@core/errors/infrastructure-error.js';
import { MessageKeys } from '@shared/constants/message-keys.js';

export type Task<T> = () => T | Promise<T>;

/**
 * Capacidad de ejecución diferida: recibe una unidad de trabajo sin argumentos y
 * devuelve un handle de finalización que resuelve con su resultado o rechaza con
 * el error que lanzó.
 */
export interface TaskExecutor {
  submit<T>(task: Task<T>): Promise<T>;
}

export interface BoundedTaskExecutorOptions {
  name?: string;
  corePoolSize: number;
  maxPoolSize: number;
  queueCapacity: number;
}

/**
 * Se lanza cuando el executor no admite más trabajo: cola llena con el máximo de
 * tareas en curso, o executor detenido.
 */
export class TaskRejectedError extends InfrastructureError {
  public readonly reason: 'saturated' | 'shutdown';

  constructor(executorName: string, reason: 'saturated' | 'shutdown', metadata: Record<string, unknown> = {}) {
    super(reason === 'saturated' ? MessageKeys.ERROR_EXECUTOR_SATURATED : MessageKeys.ERROR_EXECUTOR_SHUTDOWN, {
      statusCode: 503,
      code: 'TASK_REJECTED',
      params: [executorName],
      metadata: { executor: executorName, reason, ...metadata }
    });
    this.name = 'TaskRejectedError';
    this.reason = reason;
  }
}

type Job = () => void;

/**
 * Executor en proceso con la política de un pool de hilos acotado: hasta
 * `corePoolSize` tareas concurrentes, luego cola FIFO de `queueCapacity`, y con la
 * cola llena se admiten tareas extra hasta `maxPoolSize`. Más allá se rechaza.
 *
 * Las tareas nunca arrancan dentro de `submit`: se programan en un macrotask posterior.
 */
export class BoundedTaskExecutor implements TaskExecutor {
  public readonly name: string;

  private readonly corePoolSize: number;

  private readonly maxPoolSize: number;

  private readonly queueCapacity: number;

  private readonly queue: Job[] = [];

  private idleWaiters: Array<() => void> = [];

  private active = 0;

  private closed = false;

  public constructor(options: BoundedTaskExecutorOptions) {
    if (options.corePoolSize < 1 || options.maxPoolSize < options.corePoolSize || options.queueCapacity < 0) {
      throw new RangeError(
        `Configuración de executor inválida: core=${options.corePoolSize}, max=${options.maxPoolSize}, queue=${options.queueCapacity}`
      );
    }

    this.name = options.name ?? 'taskExecutor';
    this.corePoolSize = options.corePoolSize;
    this.maxPoolSize = options.maxPoolSize;
    this.queueCapacity = options.queueCapacity;
  }

  public get activeCount(): number {
    return this.active;
  }

  public get queueSize(): number {
    return this.queue.length;
  }

  public get isShutdown(): boolean {
    return this.closed;
  }

  public submit<T>(task: Task<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new TaskRejectedError(this.name, 'shutdown'));
    }

    return new Promise<T>((resolve, reject) => {
      const job: Job = () => {
        void this.run(task, resolve, reject);
      };

      if (this.active < this.corePoolSize) {
        this.start(job);
      } else if (this.queue.length < this.queueCapacity) {
        this.queue.push(job);
      } else if (this.active < this.maxPoolSize) {
        this.start(job);
      } else {
        reject(
          new TaskRejectedError(this.name, 'saturated', {
            activeCount: this.active,
            queueSize: this.queue.length
          })
        );
      }
    });
  }

  /**
   * Resuelve cuando no quedan tareas en curso ni en cola.
   */
  public awaitIdle(): Promise<void> {
    if (this.active === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Deja de aceptar tareas y espera a que termine el trabajo pendiente.
   */
  public shutdown(): Promise<void> {
    this.closed = true;
    return this.awaitIdle();
  }

  private start(job: Job): void {
    this.active += 1;
    setImmediate(job);
  }

  private async run<T>(
    task: Task<T>,
    resolve: (value: T) => void,
    reject: (reason: unknown) => void
  ): Promise<void> {
    try {
      resolve(await task());
    } catch (error) {
      reject(error);
    } finally {
      this.release();
    }
  }

  private release(): void {
    this.active -= 1;

    const next = this.queue.shift();
    if (next) {
      this.start(next);
      return;
    }

    if (this.active === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((notify) => notify());
    }
  }
}
