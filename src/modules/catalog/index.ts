export { CatalogLoader, SECTION_OF } from './catalog.loader.js';
export type { AssignedId, AssignedIds, CatalogSection, CatalogLoaderApi, LoadOptions, LoadResult, ValidationReport } from './catalog.loader.js';
export { CatalogValidator } from './catalog.validator.js';
export type { LoadPlan, PlannedEntity, ValidationOutcome } from './catalog.validator.js';
export { CatalogController, statusForErrors } from './catalog.controller.js';
export { createCatalogRoutes } from './catalog.routes.js';
export { CatalogService } from './catalog.service.js';
export type { MenuSection, RestaurantMenu } from './catalog.service.js';
export { MemoryCatalogStore } from './catalog.memory-store.js';
export type { MemoryCatalogDump } from './catalog.memory-store.js';
export { MongoCatalogStore, translateMongoError } from './catalog.mongo-store.js';
export type {
  CatalogStore,
  CatalogLookup,
  CatalogReader,
  CatalogTransaction,
  RestaurantDetail,
  StoredRestaurant,
  StoredRestaurantCategory,
  StoredMenuCategory,
  StoredMenuItem,
} from './catalog.store.js';
export { CatalogError, ValidationError, StoreError, TimeoutError, toLoadError } from './catalog.errors.js';
export type { CatalogViolation, LoadError, StoreErrorCode } from './catalog.errors.js';
export { PERSISTENCE_ORDER, persistenceOrder } from './persistence-order.js';
export * from './catalog.validation.js';
