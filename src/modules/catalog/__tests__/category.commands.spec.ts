import { describe, expect, it } from '@jest/globals';

import { DomainError } from '@core/errors/index.js';
import { MessageKeys } from '@shared/constants/message-keys.js';

import { createCategoryInput, createMockCategory } from '../../../../tests/fixtures/index.js';
import { describeCommandProcess } from '../../../../tests/support/command-process.harness.js';
import { InMemoryCategoryRepository } from '../../../../tests/support/in-memory-category.repository.js';
import { CreateCategoryCommand } from '../commands/create-category.command.js';
import { DeleteCategoryCommand, type DeleteCategoryContext } from '../commands/delete-category.command.js';
import { UpdateCategoryCommand, type UpdateCategoryContext } from '../commands/update-category.command.js';
import type { CreateCategoryInput } from '../dtos/category.dto.js';
import type { CategoryEntity } from '../repositories/category.repository.js';

describeCommandProcess<CreateCategoryInput, CategoryEntity>('CreateCategoryCommand', {
  arrange: () => ({
    command: new CreateCategoryCommand(new InMemoryCategoryRepository()),
    validContext: createCategoryInput({ code: 'hogar', name: 'Hogar' }),
    invalidContext: createCategoryInput({ code: 'con espacios' })
  }),
  verifyResult: (result) => {
    expect(result).toMatchObject({ code: 'HOGAR', name: 'Hogar', active: true });
  }
});

describeCommandProcess<UpdateCategoryContext, CategoryEntity>('UpdateCategoryCommand', {
  arrange: () => {
    const existing = createMockCategory({ code: 'HOGAR' });
    return {
      command: new UpdateCategoryCommand(new InMemoryCategoryRepository([existing])),
      validContext: { id: existing.id, changes: { name: 'Hogar y jardín' } },
      invalidContext: { id: existing.id, changes: {} }
    };
  },
  verifyResult: (result, context) => {
    expect(result).toMatchObject({ id: context.id, code: 'HOGAR', name: 'Hogar y jardín' });
  }
});

describeCommandProcess<DeleteCategoryContext, CategoryEntity>('DeleteCategoryCommand', {
  arrange: () => {
    const existing = createMockCategory();
    return {
      command: new DeleteCategoryCommand(new InMemoryCategoryRepository([existing])),
      validContext: { id: existing.id },
      invalidContext: { id: '' }
    };
  },
  verifyResult: (result, context) => {
    expect(result?.id).toBe(context.id);
  }
});

describe('CreateCategoryCommand', () => {
  it('guarda la fecha de vigencia interpretada', async () => {
    const categories = new InMemoryCategoryRepository();

    const created = await new CreateCategoryCommand(categories)
      .setContext(createCategoryInput({ validFrom: '15/06/2024' }))
      .execute();

    expect(created?.validFrom).toEqual(new Date(2024, 5, 15));
  });

  it('rechaza códigos ya registrados sin distinguir mayúsculas', async () => {
    const categories = new InMemoryCategoryRepository([createMockCategory({ code: 'HOGAR' })]);
    const command = new CreateCategoryCommand(categories).setContext(createCategoryInput({ code: 'hogar' }));

    const error = await command.execute().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DomainError);
    expect(error).toHaveProperty('message', MessageKeys.ERROR_DOMAIN_DUPLICATED_CODE);
    expect(error).toHaveProperty('params', ['HOGAR']);
    expect(categories.size).toBe(1);
  });

  it('trata una descripción vacía como ausente', async () => {
    const created = await new CreateCategoryCommand(new InMemoryCategoryRepository())
      .setContext(createCategoryInput({ description: '' }))
      .execute();

    expect(created?.description).toBeUndefined();
  });
});

describe('UpdateCategoryCommand', () => {
  it('rechaza cambiar a un código que usa otra categoría', async () => {
    const first = createMockCategory({ code: 'AAA' });
    const second = createMockCategory({ code: 'BBB' });
    const command = new UpdateCategoryCommand(new InMemoryCategoryRepository([first, second])).setContext({
      id: second.id,
      changes: { code: 'aaa' }
    });

    await expect(command.execute()).rejects.toThrow(MessageKeys.ERROR_DOMAIN_DUPLICATED_CODE);
  });

  it('permite conservar el propio código', async () => {
    const existing = createMockCategory({ code: 'AAA' });
    const command = new UpdateCategoryCommand(new InMemoryCategoryRepository([existing])).setContext({
      id: existing.id,
      changes: { code: 'aaa', active: false }
    });

    await expect(command.execute()).resolves.toMatchObject({ code: 'AAA', active: false });
  });

  it('informa el identificador inexistente', async () => {
    const command = new UpdateCategoryCommand(new InMemoryCategoryRepository()).setContext({
      id: 'no-existe',
      changes: { name: 'Nada' }
    });

    const error = await command.execute().catch((caught: unknown) => caught);

    expect(error).toHaveProperty('message', MessageKeys.ERROR_INFRASTRUCTURE_NO_REGISTRO_BY_ID);
    expect(error).toHaveProperty('params', ['no-existe']);
  });
});

describe('DeleteCategoryCommand', () => {
  it('no elimina nada si la categoría no existe', async () => {
    const categories = new InMemoryCategoryRepository([createMockCategory()]);

    await expect(
      new DeleteCategoryCommand(categories).setContext({ id: 'no-existe' }).execute()
    ).rejects.toBeInstanceOf(DomainError);
    expect(categories.size).toBe(1);
  });
});
