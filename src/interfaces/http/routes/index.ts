import type { Express, Request, Response } from 'express';

import {
  createCategoryRouter,
  type CategoryRouterDependencies
} from '@modules/catalog/controllers/category.controller.js';

export type HttpDependencies = CategoryRouterDependencies;

/**
 * Registra las rutas HTTP principales. Cada módulo expone su router y se monta aquí
 * para mantener desacoplamiento.
 */
export const registerHttpRoutes = (app: Express, dependencies: HttpDependencies = {}): void => {
  // Catálogo
  app.use('/categories', createCategoryRouter(dependencies));

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      timestamp: new Date().toISOString()
    });
  });
};
