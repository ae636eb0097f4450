import { randomUUID } from 'node:crypto';
import type winston from 'winston';
import { EntityKind, LoadState, LoadStateFlow, LoaderConfig } from '../../config/constants.js';
import type { EntityKindType, LoadStateType } from '../../config/constants.js';
import { batchLogger } from '../../config/logger.js';
import { StoreError, TimeoutError, toLoadError } from './catalog.errors.js';
import type { CatalogViolation, ErrorEntity, LoadError } from './catalog.errors.js';
import type { CatalogStore, CatalogTransaction } from './catalog.store.js';
import type { EntityReference } from './catalog.validation.js';
import { CatalogValidator } from './catalog.validator.js';
import type { LoadPlan, PlannedEntity } from './catalog.validator.js';
import { PERSISTENCE_ORDER } from './persistence-order.js';

// ============================================
// TYPES
// ============================================

export type CatalogSection = keyof LoadPlan;

export interface AssignedId {
  index: number;
  ref?: string;
  id: number;
}

export type AssignedIds = Record<CatalogSection, AssignedId[]>;

export interface LoadOptions {
  /** Transaction timeout; defaults to CATALOG_LOAD_TIMEOUT_MS */
  timeoutMs?: number;
}

export type LoadResult =
  | {
      ok: true;
      state: typeof LoadState.COMMITTED;
      batchId: string;
      ids: AssignedIds;
      durationMs: number;
    }
  | {
      ok: false;
      state: typeof LoadState.REJECTED | typeof LoadState.ROLLED_BACK;
      batchId: string;
      errors: LoadError[];
      durationMs: number;
    };

export interface ValidationReport {
  valid: boolean;
  errors: CatalogViolation[];
}

export const SECTION_OF: Record<EntityKindType, CatalogSection> = {
  [EntityKind.USER]: 'users',
  [EntityKind.RESTAURANT_CATEGORY]: 'restaurantCategories',
  [EntityKind.RESTAURANT]: 'restaurants',
  [EntityKind.MENU_CATEGORY]: 'menuCategories',
  [EntityKind.MENU_ITEM]: 'menuItems',
};

const emptyIds = (): AssignedIds => ({
  users: [],
  restaurantCategories: [],
  restaurants: [],
  menuCategories: [],
  menuItems: [],
});

const countRecords = (input: unknown): number => {
  if (typeof input !== 'object' || input === null) {
    return 0;
  }
  return Object.values(input).reduce<number>(
    (total, section) => total + (Array.isArray(section) ? section.length : 0),
    0
  );
};

// ============================================
// PERSISTENCE
// ============================================

/**
 * Ids assigned so far in the running transaction, by kind and batch ref.
 */
class AssignedRefs {
  private readonly byKind = new Map<EntityKindType, Map<string, number>>();

  record<T>(kind: EntityKindType, entities: PlannedEntity<T>[], ids: number[], into: AssignedId[]): void {
    const refs = this.byKind.get(kind) ?? new Map<string, number>();
    entities.forEach((entity, offset) => {
      const id = ids[offset];
      if (id === undefined) {
        throw StoreError.failure(`Store returned ${ids.length} ids for ${entities.length} ${kind} rows`);
      }
      if (entity.ref !== undefined) {
        refs.set(entity.ref, id);
      }
      into.push({ index: entity.index, ref: entity.ref, id });
    });
    this.byKind.set(kind, refs);
  }

  resolve(reference: EntityReference, target: EntityKindType, entity: ErrorEntity, field: string): number {
    if (typeof reference === 'number') {
      return reference;
    }
    const id = this.byKind.get(target)?.get(reference);
    if (id === undefined) {
      throw new StoreError(`${entity}.${field}: batch ref "${reference}" was not persisted`, 'FOREIGN_KEY', {
        entity,
        field,
      });
    }
    return id;
  }
}

type PersistStep = (tx: CatalogTransaction, plan: LoadPlan, refs: AssignedRefs, ids: AssignedIds) => Promise<void>;

const PERSIST_STEPS: Record<EntityKindType, PersistStep> = {
  [EntityKind.USER]: async (tx, plan, refs, ids) => {
    const inserted = await tx.insertUsers(plan.users.map((entity) => entity.record));
    refs.record(EntityKind.USER, plan.users, inserted, ids.users);
  },

  [EntityKind.RESTAURANT_CATEGORY]: async (tx, plan, refs, ids) => {
    const inserted = await tx.insertRestaurantCategories(plan.restaurantCategories.map((entity) => entity.record));
    refs.record(EntityKind.RESTAURANT_CATEGORY, plan.restaurantCategories, inserted, ids.restaurantCategories);
  },

  [EntityKind.RESTAURANT]: async (tx, plan, refs, ids) => {
    const rows = plan.restaurants.map(({ record }) => ({
      ...record,
      categoryId: refs.resolve(record.categoryId, EntityKind.RESTAURANT_CATEGORY, EntityKind.RESTAURANT, 'categoryId'),
      ownerId: refs.resolve(record.ownerId, EntityKind.USER, EntityKind.RESTAURANT, 'ownerId'),
    }));
    refs.record(EntityKind.RESTAURANT, plan.restaurants, await tx.insertRestaurants(rows), ids.restaurants);
  },

  [EntityKind.MENU_CATEGORY]: async (tx, plan, refs, ids) => {
    const rows = plan.menuCategories.map(({ record }) => ({
      ...record,
      restaurantId: refs.resolve(record.restaurantId, EntityKind.RESTAURANT, EntityKind.MENU_CATEGORY, 'restaurantId'),
    }));
    refs.record(EntityKind.MENU_CATEGORY, plan.menuCategories, await tx.insertMenuCategories(rows), ids.menuCategories);
  },

  [EntityKind.MENU_ITEM]: async (tx, plan, refs, ids) => {
    const rows = plan.menuItems.map(({ record }) => ({
      ...record,
      restaurantId: refs.resolve(record.restaurantId, EntityKind.RESTAURANT, EntityKind.MENU_ITEM, 'restaurantId'),
      menuCategoryId: refs.resolve(
        record.menuCategoryId,
        EntityKind.MENU_CATEGORY,
        EntityKind.MENU_ITEM,
        'menuCategoryId'
      ),
    }));
    refs.record(EntityKind.MENU_ITEM, plan.menuItems, await tx.insertMenuItems(rows), ids.menuItems);
  },
};

// ============================================
// LOAD RUN
// ============================================

/**
 * One pass through the batch state machine.
 */
class LoadRun {
  readonly batchId = randomUUID();
  readonly log: winston.Logger;
  private current: LoadStateType = LoadState.RECEIVED;
  private readonly startedAt = Date.now();

  constructor() {
    this.log = batchLogger(this.batchId);
  }

  get durationMs(): number {
    return Date.now() - this.startedAt;
  }

  transition(next: LoadStateType): void {
    if (!LoadStateFlow[this.current].includes(next)) {
      throw new Error(`Invalid load state transition: ${this.current} -> ${next}`);
    }
    this.log.debug('Load state changed', { from: this.current, to: next });
    this.current = next;
  }
}

// ============================================
// LOADER
// ============================================

/**
 * Validates a catalog batch and persists it in a single transaction, in
 * dependency order. Failures come back as structured results; nothing is
 * thrown for bad input or store errors.
 */
export class CatalogLoader {
  private readonly validator: CatalogValidator;

  constructor(private readonly store: CatalogStore) {
    this.validator = new CatalogValidator(store);
  }

  /**
   * Run validation only. Nothing is written.
   */
  async validate(batch: unknown): Promise<ValidationReport> {
    const outcome = await this.validator.validate(batch);
    return { valid: outcome.valid, errors: outcome.violations };
  }

  /**
   * @throws RangeError when `timeoutMs` is not a whole number between 1 and the configured maximum
   */
  async load(batch: unknown, options: LoadOptions = {}): Promise<LoadResult> {
    const timeoutMs = options.timeoutMs ?? LoaderConfig.DEFAULT_TIMEOUT_MS;
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0 || timeoutMs > LoaderConfig.MAX_TIMEOUT_MS) {
      throw new RangeError(`timeoutMs must be a whole number between 1 and ${LoaderConfig.MAX_TIMEOUT_MS}`);
    }

    const run = new LoadRun();
    run.log.info('Catalog batch received', { records: countRecords(batch), timeoutMs });

    let plan: LoadPlan;
    try {
      const outcome = await this.validator.validate(batch);
      if (!outcome.valid) {
        return this.reject(run, outcome.violations);
      }
      plan = outcome.plan;
    } catch (error) {
      // Lookups failed, so the batch could not be checked
      return this.reject(run, [toLoadError(error)]);
    }

    run.transition(LoadState.VALIDATED);
    run.transition(LoadState.PERSISTING);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);

    try {
      const ids = await this.store.transaction((tx) => this.persist(tx, plan, controller.signal), controller.signal);

      run.transition(LoadState.COMMITTED);
      run.log.info('Catalog batch committed', {
        durationMs: run.durationMs,
        inserted: Object.fromEntries(Object.entries(ids).map(([section, assigned]) => [section, assigned.length])),
      });

      return { ok: true, state: LoadState.COMMITTED, batchId: run.batchId, ids, durationMs: run.durationMs };
    } catch (error) {
      const loadError = toLoadError(error);
      run.transition(LoadState.ROLLED_BACK);
      run.log.warn('Catalog batch rolled back', {
        code: loadError.code,
        error: loadError.message,
        durationMs: run.durationMs,
      });

      return {
        ok: false,
        state: LoadState.ROLLED_BACK,
        batchId: run.batchId,
        errors: [loadError],
        durationMs: run.durationMs,
      };
    } finally {
      clearTimeout(timer);
    }
  }

  private async persist(tx: CatalogTransaction, plan: LoadPlan, signal: AbortSignal): Promise<AssignedIds> {
    const ids = emptyIds();
    const refs = new AssignedRefs();

    for (const kind of PERSISTENCE_ORDER) {
      if (plan[SECTION_OF[kind]].length === 0) {
        continue;
      }
      signal.throwIfAborted();
      await PERSIST_STEPS[kind](tx, plan, refs, ids);
    }

    return ids;
  }

  private reject(run: LoadRun, errors: LoadError[]): LoadResult {
    run.transition(LoadState.REJECTED);
    run.log.info('Catalog batch rejected', {
      errors: errors.length,
      codes: [...new Set(errors.map((error) => error.code))],
      durationMs: run.durationMs,
    });

    return { ok: false, state: LoadState.REJECTED, batchId: run.batchId, errors, durationMs: run.durationMs };
  }
}

/**
 * What the HTTP layer needs from a loader.
 */
export type CatalogLoaderApi = Pick<CatalogLoader, 'load' | 'validate'>;
