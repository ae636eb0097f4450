import { Router } from 'express';
import { validateQuery } from '../../shared/middleware/validate.middleware.js';
import { CatalogController } from './catalog.controller.js';
import type { CatalogLoaderApi } from './catalog.loader.js';
import type { CatalogService } from './catalog.service.js';
import { loadQuerySchema } from './catalog.validation.js';

// ============================================
// CATALOG ROUTES - /catalog
// ============================================

export const createCatalogRoutes = (loader: CatalogLoaderApi, catalog: CatalogService): Router => {
  const router = Router();
  const controller = new CatalogController(loader, catalog);

  // POST /catalog/batches/validate - Check a batch without writing it
  router.post('/batches/validate', (req, res, next) => controller.validateBatch(req, res, next));

  // POST /catalog/batches - Load a batch in one transaction
  router.post('/batches', validateQuery(loadQuerySchema), (req, res, next) =>
    controller.loadBatch(req, res, next)
  );

  // GET /catalog/restaurant-categories - Every classification by name
  router.get('/restaurant-categories', (req, res, next) => controller.getRestaurantCategories(req, res, next));

  // GET /catalog/restaurants/:id - Active restaurant
  router.get('/restaurants/:id', (req, res, next) => controller.getRestaurant(req, res, next));

  // GET /catalog/restaurants/:id/menu - Menu in display order
  router.get('/restaurants/:id/menu', (req, res, next) => controller.getMenu(req, res, next));

  // GET /catalog/restaurants/:id/menu-categories - Active menu categories
  router.get('/restaurants/:id/menu-categories', (req, res, next) => controller.getMenuCategories(req, res, next));

  return router;
};

export default createCatalogRoutes;
