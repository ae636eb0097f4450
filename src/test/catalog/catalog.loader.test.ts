import { describe, it, expect, beforeEach } from 'vitest';
import { CatalogLoader } from '../../modules/catalog/catalog.loader.js';
import { MemoryCatalogStore } from '../../modules/catalog/catalog.memory-store.js';
import { StoreError, TimeoutError, ValidationError } from '../../modules/catalog/catalog.errors.js';
import { FailingLookupStore, SlowMemoryStore, StaleEmailStore, minimalBatch } from './fixtures.js';

const emptyDump = {
  users: [],
  restaurantCategories: [],
  restaurants: [],
  menuCategories: [],
  menuItems: [],
};

describe('CatalogLoader', () => {
  let store: MemoryCatalogStore;
  let loader: CatalogLoader;

  beforeEach(() => {
    store = new MemoryCatalogStore();
    loader = new CatalogLoader(store);
  });

  describe('load', () => {
    it('commits a valid batch and returns an id for every entity', async () => {
      const result = await loader.load(minimalBatch());

      expect(result.ok).toBe(true);
      if (!result.ok) return;

      expect(result.state).toBe('Committed');
      expect(result.batchId).toMatch(/^[0-9a-f-]{36}$/);
      expect(result.ids).toEqual({
        users: [{ index: 0, ref: 'owner', id: 1 }],
        restaurantCategories: [{ index: 0, ref: 'pizza', id: 1 }],
        restaurants: [{ index: 0, ref: 'slice', id: 1 }],
        menuCategories: [{ index: 0, ref: 'mains', id: 1 }],
        menuItems: [
          { index: 0, id: 1 },
          { index: 1, id: 2 },
        ],
      });
    });

    it('makes every entity visible in the store with resolved references', async () => {
      await loader.load(minimalBatch());
      const dump = store.dump();

      expect(dump.users).toHaveLength(1);
      expect(dump.users[0]).toMatchObject({ id: 1, email: 'owner@example.com', role: 'restaurant_admin', isActive: true });
      expect(dump.restaurants[0]).toMatchObject({ id: 1, name: 'Slice House', ownerId: 1, categoryId: 1 });
      expect(dump.menuCategories[0]).toMatchObject({ id: 1, restaurantId: 1, displayOrder: 0 });
      expect(dump.menuItems.map((item) => [item.name, item.menuCategoryId, item.displayOrder])).toEqual([
        ['Margherita', 1, 0],
        ['Marinara', 1, 1],
      ]);
      expect(dump.menuItems[1]?.price).toEqual({ small: 7, large: 11.25 });
    });

    it('rejects an unknown owner and writes nothing', async () => {
      const result = await loader.load({
        restaurantCategories: [{ ref: 'pizza', name: 'Pizza' }],
        restaurants: [{ name: 'Slice House', address: '1 Main Street', categoryId: 'pizza', ownerId: 999 }],
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;

      expect(result.state).toBe('Rejected');
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toBeInstanceOf(ValidationError);
      expect(result.errors[0]).toMatchObject({
        entity: 'Restaurant',
        field: 'ownerId',
        reason: 'not found',
        index: 0,
      });
      expect(store.dump()).toEqual(emptyDump);
    });

    it('reports both items that share a display order', async () => {
      const batch = minimalBatch();
      batch.menuItems = (batch.menuItems ?? []).map((item) => ({ ...item, displayOrder: 1 }));

      const result = await loader.load(batch);

      expect(result.ok).toBe(false);
      if (result.ok) return;

      expect(result.errors).toHaveLength(2);
      expect(result.errors.map((error) => [error.kind, error.message])).toEqual([
        ['ValidationError', 'MenuItem[0].displayOrder: display order 1 is used by more than one item in this category'],
        ['ValidationError', 'MenuItem[1].displayOrder: display order 1 is used by more than one item in this category'],
      ]);
      expect(store.dump()).toEqual(emptyDump);
    });

    it('returns store errors when the same batch is loaded twice', async () => {
      const first = await loader.load(minimalBatch());
      expect(first.ok).toBe(true);

      const second = await loader.load(minimalBatch());

      expect(second.ok).toBe(false);
      if (second.ok) return;

      expect(second.state).toBe('Rejected');
      expect(second.errors.every((error) => error instanceof StoreError)).toBe(true);
      expect(second.errors[0]).toMatchObject({ code: 'DUPLICATE_KEY', entity: 'User', field: 'email', index: 0 });
      expect(second.errors[1]).toMatchObject({ code: 'DUPLICATE_KEY', entity: 'RestaurantCategory', field: 'name' });
      expect(store.dump().users).toHaveLength(1);
      expect(store.dump().menuItems).toHaveLength(2);
    });

    it('resolves numeric references to stored entities and continues their display order', async () => {
      await loader.load(minimalBatch());

      const result = await loader.load({
        menuItems: [{ restaurantId: 1, menuCategoryId: 1, name: 'Quattro Formaggi', price: { regular: 12 } }],
      });

      expect(result.ok).toBe(true);
      if (!result.ok) return;

      expect(result.ids.menuItems).toEqual([{ index: 0, id: 3 }]);
      expect(store.dump().menuItems[2]).toMatchObject({ id: 3, restaurantId: 1, menuCategoryId: 1, displayOrder: 2 });
    });

    it('rejects an item whose menu category belongs to another restaurant', async () => {
      await loader.load(minimalBatch());

      const result = await loader.load({
        restaurants: [{ ref: 'second', name: 'Second Slice', address: '2 Main Street', categoryId: 1, ownerId: 1 }],
        menuItems: [{ restaurantId: 'second', menuCategoryId: 1, name: 'Calzone', price: { regular: 10 } }],
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;

      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatchObject({
        entity: 'MenuItem',
        field: 'menuCategoryId',
        reason: 'menu category belongs to a different restaurant',
      });
    });

    it('rejects an owner without a restaurant role', async () => {
      const batch = minimalBatch();
      batch.users = [{ ref: 'owner', email: 'owner@example.com', fullName: 'Olive Owner', role: 'customer' }];

      const result = await loader.load(batch);

      expect(result.ok).toBe(false);
      if (result.ok) return;

      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatchObject({
        entity: 'Restaurant',
        field: 'ownerId',
        reason: 'owner must be a restaurant_admin or super_admin, not customer',
      });
    });

    it('rolls back and keeps the store unchanged when the store rejects a write', async () => {
      const staleStore = new StaleEmailStore();
      const staleLoader = new CatalogLoader(staleStore);
      await staleLoader.load(minimalBatch());

      const result = await staleLoader.load({
        users: [{ email: 'owner@example.com', fullName: 'Second Owner', role: 'restaurant_admin' }],
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;

      expect(result.state).toBe('RolledBack');
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toBeInstanceOf(StoreError);
      expect(result.errors[0]).toMatchObject({ code: 'DUPLICATE_KEY', entity: 'User', field: 'email' });
      expect(staleStore.dump().users).toHaveLength(1);
    });

    it('does not reuse ids handed out by a rolled-back load', async () => {
      const staleStore = new StaleEmailStore();
      const staleLoader = new CatalogLoader(staleStore);
      await staleLoader.load(minimalBatch());
      await staleLoader.load({
        users: [{ email: 'owner@example.com', fullName: 'Second Owner', role: 'restaurant_admin' }],
      });

      const result = await staleLoader.load({
        users: [{ email: 'third@example.com', fullName: 'Third User' }],
      });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.ids.users).toEqual([{ index: 0, id: 3 }]);
    });

    it('times out a slow transaction and rolls it back', async () => {
      const slowStore = new SlowMemoryStore(200);
      const result = await new CatalogLoader(slowStore).load(minimalBatch(), { timeoutMs: 20 });

      expect(result.ok).toBe(false);
      if (result.ok) return;

      expect(result.state).toBe('RolledBack');
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toBeInstanceOf(TimeoutError);
      expect(result.errors[0]).toMatchObject({ code: 'TRANSACTION_TIMEOUT', timeoutMs: 20, retryable: true });
      expect(slowStore.dump()).toEqual(emptyDump);
    });

    it('rejects the batch when the store cannot be read', async () => {
      const result = await new CatalogLoader(new FailingLookupStore()).load(minimalBatch());

      expect(result.ok).toBe(false);
      if (result.ok) return;

      expect(result.state).toBe('Rejected');
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatchObject({ kind: 'StoreError', code: 'STORE_FAILURE', message: 'connection reset' });
    });

    it('throws a RangeError for a timeout outside the allowed range', async () => {
      await expect(loader.load(minimalBatch(), { timeoutMs: 0 })).rejects.toThrow(RangeError);
      await expect(loader.load(minimalBatch(), { timeoutMs: 1.5 })).rejects.toThrow(RangeError);
    });

    it('commits an empty batch with no ids', async () => {
      const result = await loader.load({});

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.ids).toEqual(emptyDump);
    });
  });

  describe('validate', () => {
    it('reports violations without writing', async () => {
      const batch = minimalBatch();
      batch.menuItems = [{ restaurantId: 'slice', menuCategoryId: 'missing', name: 'Ghost', price: { regular: 1 } }];

      const report = await loader.validate(batch);

      expect(report.valid).toBe(false);
      expect(report.errors.map((error) => error.message)).toEqual(['MenuItem[0].menuCategoryId: not found']);
      expect(store.dump()).toEqual(emptyDump);
    });

    it('accepts a valid batch without writing', async () => {
      const report = await loader.validate(minimalBatch());

      expect(report).toEqual({ valid: true, errors: [] });
      expect(store.dump()).toEqual(emptyDump);
    });
  });
});
