import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';

import { asyncExecutor } from '@core/executor/async-executor.js';
import type { TaskExecutor } from '@core/executor/task-executor.js';
import type { UseCaseFactory } from '@core/use-cases/use-case.js';
import { apiResponseBuilder, type ApiResponseBuilder } from '@shared/http/api-response.builder.js';

import { CreateCategoryCommand } from '../commands/create-category.command.js';
import { DeleteCategoryCommand } from '../commands/delete-category.command.js';
import { UpdateCategoryCommand } from '../commands/update-category.command.js';
import { categoryOptionsQuerySchema, listCategoriesQuerySchema } from '../dtos/category.dto.js';
import { CategoryOptionsQuery } from '../queries/category-options.query.js';
import { GetCategoryQuery } from '../queries/get-category.query.js';
import { ListCategoriesQuery } from '../queries/list-categories.query.js';
import { MongoCategoryRepository, type CategoryRepository } from '../repositories/category.repository.js';

export interface CategoryRouterDependencies {
  categories?: CategoryRepository;
  executor?: TaskExecutor;
  responses?: ApiResponseBuilder;
}

/**
 * Rutas CRUD de categorías. Cada petición crea su propio comando; las altas se
 * ejecutan en el executor asíncrono.
 */
export const createCategoryRouter = ({
  categories = new MongoCategoryRepository(),
  executor = asyncExecutor,
  responses = apiResponseBuilder
}: CategoryRouterDependencies = {}): Router => {
  const router = Router();

  const newCreateCommand: UseCaseFactory<CreateCategoryCommand> = () =>
    new CreateCategoryCommand(categories, executor).setAsync(true);
  const newUpdateCommand: UseCaseFactory<UpdateCategoryCommand> = () => new UpdateCategoryCommand(categories, executor);
  const newDeleteCommand: UseCaseFactory<DeleteCategoryCommand> = () => new DeleteCategoryCommand(categories, executor);

  const listQuery = new ListCategoriesQuery(categories);
  const getQuery = new GetCategoryQuery(categories);
  const optionsQuery = new CategoryOptionsQuery(categories);

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const params = listCategoriesQuerySchema.parse(req.query);
      const page = await listQuery.execute({
        data: { name: params.name, active: params.active },
        pageNumber: params.page,
        pageSize: params.size,
        sortBy: params.sortBy,
        sortDir: params.sortDir
      });

      res.status(200).json(responses.paginated(page));
    } catch (error) {
      next(error);
    }
  });

  router.get('/options', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const filter = categoryOptionsQuerySchema.parse(req.query);
      const options = await optionsQuery.execute(filter);

      res.status(200).json(responses.successList(options));
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const category = await getQuery.execute({ id: req.params.id });

      res.status(200).json(responses.success(category));
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const category = await newCreateCommand().setContext(req.body).execute();

      res.status(201).json(responses.created(category));
    } catch (error) {
      next(error);
    }
  });

  router.put('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const category = await newUpdateCommand()
        .setContext({ id: req.params.id, changes: req.body })
        .execute();

      res.status(200).json(responses.success(category));
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const category = await newDeleteCommand().setContext({ id: req.params.id }).execute();

      res.status(200).json(responses.success(category));
    } catch (error) {
      next(error);
    }
  });

  return router;
};
