import { afterEach, describe, expect, it } from '@jest/globals';

import type { CommandProcess } from '../../src/core/commands/command-process.js';
import { DomainError } from '../../src/core/errors/index.js';
import { BoundedTaskExecutor } from '../../src/core/executor/task-executor.js';

export interface CommandScenario<C, R> {
  command: CommandProcess<C, R>;
  validContext: C;
  invalidContext: C;
}

export interface CommandHarnessOptions<C, R> {
  /** Crea un comando nuevo (y sus dependencias) para cada caso. */
  arrange: () => CommandScenario<C, R> | Promise<CommandScenario<C, R>>;
  /** Comprobaciones propias del comando sobre el resultado válido. */
  verifyResult?: (result: R | undefined, context: C) => void | Promise<void>;
}

/**
 * Batería común para cualquier `CommandProcess`: ejecución válida e inválida en modo
 * síncrono y asíncrono, contexto, resultado y flags por defecto.
 */
export const describeCommandProcess = <C, R>(name: string, options: CommandHarnessOptions<C, R>): void => {
  describe(`${name} (contrato de comando)`, () => {
    const executors: BoundedTaskExecutor[] = [];

    const newExecutor = (): BoundedTaskExecutor => {
      const executor = new BoundedTaskExecutor({ name: 'testExecutor', corePoolSize: 1, maxPoolSize: 2, queueCapacity: 5 });
      executors.push(executor);
      return executor;
    };

    afterEach(async () => {
      await Promise.all(executors.splice(0).map((executor) => executor.shutdown()));
    });

    it('ejecuta correctamente con un contexto válido', async () => {
      const { command, validContext } = await options.arrange();

      const result = await command.setContext(validContext).execute();

      expect(result).toBeDefined();
      expect(command.isValid()).toBe(true);
      expect(command.isExecuted()).toBe(true);
      expect(command.getState()).toBe('done');
      await options.verifyResult?.(result, validContext);
    });

    it('lanza DomainError con un contexto inválido y no ejecuta', async () => {
      const { command, invalidContext } = await options.arrange();

      await expect(command.setContext(invalidContext).execute()).rejects.toBeInstanceOf(DomainError);
      expect(command.isExecuted()).toBe(false);
      expect(command.getResult()).toBeUndefined();
    });

    it('lanza DomainError cuando no se asigna contexto', async () => {
      const { command } = await options.arrange();

      await expect(command.execute()).rejects.toBeInstanceOf(DomainError);
      expect(command.isExecuted()).toBe(false);
    });

    it('conserva el contexto asignado', async () => {
      const { command, validContext } = await options.arrange();

      expect(command.setContext(validContext)).toBe(command);
      expect(command.getContext()).toBe(validContext);
    });

    it('devuelve el mismo resultado en lecturas repetidas', async () => {
      const { command, validContext } = await options.arrange();

      const result = await command.setContext(validContext).execute();

      expect(command.getResult()).toBe(result);
      expect(command.getResult()).toBe(command.getResult());
    });

    it('ejecuta correctamente en modo asíncrono', async () => {
      const { command, validContext } = await options.arrange();
      command.setExecutor(newExecutor()).setAsync(true);

      const result = await command.setContext(validContext).execute();

      expect(result).toBeDefined();
      expect(command.isValid()).toBe(true);
      expect(command.isExecuted()).toBe(true);
      await options.verifyResult?.(result, validContext);
    });

    it('lanza DomainError en modo asíncrono con un contexto inválido', async () => {
      const { command, invalidContext } = await options.arrange();
      command.setExecutor(newExecutor()).setAsync(true);

      await expect(command.setContext(invalidContext).execute()).rejects.toBeInstanceOf(DomainError);
      expect(command.isExecuted()).toBe(false);
    });

    it('inicia con los flags desactivados', async () => {
      const { command } = await options.arrange();

      expect(command.isValid()).toBe(false);
      expect(command.isExecuted()).toBe(false);
      expect(command.isAsync()).toBe(false);
      expect(command.getContext()).toBeUndefined();
      expect(command.getResult()).toBeUndefined();
      expect(command.getState()).toBe('idle');
    });
  });
};
