import type { Request, Response, NextFunction } from 'express';
import { HttpStatus, LoadState, ErrorMessages } from '../../config/constants.js';
import { parseOrThrow } from '../../shared/utils/validation.util.js';
import { createdResponse, errorResponse, successResponse } from '../../shared/utils/response.util.js';
import { AppError } from '../../shared/middleware/error.middleware.js';
import { TimeoutError, ValidationError } from './catalog.errors.js';
import type { LoadError } from './catalog.errors.js';
import type { CatalogLoaderApi, LoadResult } from './catalog.loader.js';
import type { CatalogService } from './catalog.service.js';
import { loadQuerySchema, restaurantIdParamSchema } from './catalog.validation.js';

type FailedLoad = Extract<LoadResult, { ok: false }>;

/**
 * 504 when the transaction timed out, 422 when any record is invalid,
 * otherwise the status of the store error.
 */
export function statusForErrors(errors: LoadError[]): number {
  if (errors.some((error) => error instanceof TimeoutError)) {
    return HttpStatus.GATEWAY_TIMEOUT;
  }
  if (errors.some((error) => error instanceof ValidationError)) {
    return HttpStatus.UNPROCESSABLE_ENTITY;
  }
  return errors[0]?.statusCode ?? HttpStatus.INTERNAL_SERVER_ERROR;
}

const describeFailure = (result: FailedLoad): { code: string; message: string } => {
  if (result.state === LoadState.REJECTED) {
    return {
      code: 'BATCH_REJECTED',
      message: `${ErrorMessages.BATCH_REJECTED} with ${result.errors.length} error(s)`,
    };
  }
  const [cause] = result.errors;
  return {
    code: cause?.code ?? 'STORE_FAILURE',
    message: cause ? `${ErrorMessages.BATCH_ROLLED_BACK}: ${cause.message}` : ErrorMessages.BATCH_ROLLED_BACK,
  };
};

const restaurantIdFrom = (req: Request): number => {
  const paramResult = restaurantIdParamSchema.safeParse(req.params);
  if (!paramResult.success) {
    throw new AppError('Invalid restaurant ID format', HttpStatus.BAD_REQUEST, 'INVALID_ID');
  }
  return paramResult.data.id;
};

export class CatalogController {
  constructor(
    private readonly loader: CatalogLoaderApi,
    private readonly catalog: CatalogService
  ) {}

  /**
   * POST /catalog/batches - Validate and persist a batch
   */
  async loadBatch(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { timeoutMs } = parseOrThrow(loadQuerySchema, req.query, 'query');
      const result = await this.loader.load(req.body, { timeoutMs });

      if (result.ok) {
        res.status(HttpStatus.CREATED).json(
          createdResponse(
            {
              batchId: result.batchId,
              state: result.state,
              ids: result.ids,
              durationMs: result.durationMs,
            },
            'Catalog batch committed'
          )
        );
        return;
      }

      const { code, message } = describeFailure(result);
      res.status(statusForErrors(result.errors)).json(
        errorResponse(
          code,
          message,
          {
            batchId: result.batchId,
            state: result.state,
            errors: result.errors.map((error) => error.toJSON()),
          },
          req.requestId
        )
      );
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /catalog/batches/validate - Dry run, nothing is written
   */
  async validateBatch(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const report = await this.loader.validate(req.body);

      res.status(HttpStatus.OK).json(
        successResponse(
          {
            valid: report.valid,
            errors: report.errors.map((error) => error.toJSON()),
          },
          { count: report.errors.length }
        )
      );
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /catalog/restaurants/:id - Restaurant with its classification name
   */
  async getRestaurant(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const restaurant = await this.catalog.getRestaurant(restaurantIdFrom(req));
      res.status(HttpStatus.OK).json(successResponse(restaurant));
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /catalog/restaurants/:id/menu - Categories and items in display order
   */
  async getMenu(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const menu = await this.catalog.getMenu(restaurantIdFrom(req));
      res.status(HttpStatus.OK).json(
        successResponse(menu, {
          categories: menu.categories.length,
          items: menu.categories.reduce((count, category) => count + category.items.length, 0),
        })
      );
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /catalog/restaurants/:id/menu-categories
   */
  async getMenuCategories(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const categories = await this.catalog.listMenuCategories(restaurantIdFrom(req));
      res.status(HttpStatus.OK).json(successResponse(categories, { count: categories.length }));
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /catalog/restaurant-categories
   */
  async getRestaurantCategories(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const categories = await this.catalog.listRestaurantCategories();
      res.status(HttpStatus.OK).json(successResponse(categories, { count: categories.length }));
    } catch (error) {
      next(error);
    }
  }
}
