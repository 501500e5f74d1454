import { env } from '@config/index.js';
import { DomainError } from '@core/errors/index.js';
import { asyncExecutor } from '@core/executor/async-executor.js';
import type { TaskExecutor } from '@core/executor/task-executor.js';
import { logger } from '@infra/logger/logger.js';
import { MessageKeys } from '@shared/constants/message-keys.js';

/**
 * Fase en curso o última alcanzada por el comando. Las transiciones son lineales;
 * `valid` y `executed` se consultan con sus flags.
 */
export type CommandState =
  | 'idle'
  | 'validating'
  | 'invalid'
  | 'processing'
  | 'finalizing'
  | 'done'
  | 'failed';

/**
 * Plantilla base de los comandos (operaciones que modifican estado). Cada comando
 * concreto implementa tres fases que se ejecutan siempre en el mismo orden:
 *
 * 1. `preProcess`: valida el contexto y, si es correcto, llama a `setValid(true)`.
 * 2. `process`: ejecuta la lógica de negocio y llama a `setExecuted(true)`.
 * 3. `postProcess`: finaliza (auditoría, notificaciones) solo si hubo ejecución.
 *
 * Cualquier fallo de cualquier fase sale de `execute()` como un único `DomainError`
 * que conserva el error original en `cause`. En modo asíncrono la secuencia completa
 * se envía al executor y se espera su finalización, con el mismo resultado observable.
 *
 * Las instancias guardan estado mutable (contexto, resultado y flags): se debe crear
 * una instancia por invocación o sincronizar externamente.
 */
export abstract class CommandProcess<C, R> {
  private context: C | undefined;

  private result: R | undefined;

  private valid = false;

  private executed = false;

  private async = false;

  private state: CommandState = 'idle';

  private timeoutMs: number | undefined = env.ASYNC_TIMEOUT_MS;

  protected constructor(private executor: TaskExecutor = asyncExecutor) {}

  protected abstract preProcess(): Promise<void>;

  protected abstract process(): Promise<void>;

  protected abstract postProcess(): Promise<void>;

  public async execute(): Promise<R | undefined> {
    return this.async ? this.executeAsync() : this.executeSync();
  }

  public getContext(): C | undefined {
    return this.context;
  }

  public setContext(context: C): this {
    this.context = context;
    return this;
  }

  public getResult(): R | undefined {
    return this.result;
  }

  public isValid(): boolean {
    return this.valid;
  }

  public setValid(valid: boolean): this {
    this.valid = valid;
    return this;
  }

  public isExecuted(): boolean {
    return this.executed;
  }

  public setExecuted(executed: boolean): this {
    this.executed = executed;
    return this;
  }

  public isAsync(): boolean {
    return this.async;
  }

  public setAsync(async: boolean): this {
    this.async = async;
    return this;
  }

  public setExecutor(executor: TaskExecutor): this {
    this.executor = executor;
    return this;
  }

  /**
   * Tiempo máximo de espera del handle en modo asíncrono (por defecto
   * `ASYNC_TIMEOUT_MS`). Sin valor la espera no tiene límite.
   */
  public setAsyncTimeout(timeoutMs: number | undefined): this {
    this.timeoutMs = timeoutMs;
    return this;
  }

  public getState(): CommandState {
    return this.state;
  }

  protected setResult(result: R): void {
    this.result = result;
  }

  /**
   * Devuelve el contexto asignado o lanza `DomainError` si no hay ninguno.
   */
  protected requireContext(): C {
    const context = this.context;
    if (context === undefined || context === null) {
      throw new DomainError(MessageKeys.ERROR_DOMAIN_VALID_CONTEXTO_NULL);
    }
    return context;
  }

  private async executeSync(): Promise<R | undefined> {
    this.valid = false;
    this.executed = false;

    try {
      this.state = 'validating';
      await this.preProcess();

      if (!this.valid) {
        this.state = 'invalid';
        throw new DomainError(MessageKeys.ERROR_COMMAND_INVALID);
      }

      this.state = 'processing';
      await this.process();

      if (this.executed) {
        this.state = 'finalizing';
        await this.postProcess();
      }
      this.state = 'done';
    } catch (error) {
      // `executed` solo puede quedar activo si process terminó sin lanzar
      if (this.state === 'processing') {
        this.executed = false;
      }
      if (this.state !== 'invalid') {
        this.state = 'failed';
      }

      logger.error(
        { err: error, command: this.constructor.name },
        'Error en el procesamiento del comando'
      );
      throw DomainError.from(error);
    }

    return this.result;
  }

  private async executeAsync(): Promise<R | undefined> {
    try {
      return await this.awaitCompletion(this.executor.submit(() => this.executeSync()));
    } catch (error) {
      // Los DomainError ya se registraron en la ejecución síncrona
      if (error instanceof DomainError) {
        throw error;
      }

      if (this.state !== 'invalid') {
        this.state = 'failed';
      }
      logger.error(
        { err: error, command: this.constructor.name },
        'Error en el procesamiento asíncrono del comando'
      );
      throw DomainError.from(error);
    }
  }

  private awaitCompletion(handle: Promise<R | undefined>): Promise<R | undefined> {
    const timeoutMs = this.timeoutMs;
    if (timeoutMs === undefined) {
      return handle;
    }

    return new Promise<R | undefined>((resolve, reject) => {
      const timer = setTimeout(() => {
        logger.error(
          { command: this.constructor.name, timeoutMs },
          'Tiempo de espera agotado en el comando asíncrono'
        );
        reject(new DomainError(MessageKeys.ERROR_COMMAND_TIMEOUT, { params: [timeoutMs] }));
      }, timeoutMs);

      handle.then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }
}
