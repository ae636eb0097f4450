import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryCatalogStore } from '../../modules/catalog/catalog.memory-store.js';
import { StoreError } from '../../modules/catalog/catalog.errors.js';
import type { UserRow } from '../../modules/catalog/catalog.store.js';
import { neverAborted } from './fixtures.js';

const owner: UserRow = {
  email: 'owner@example.com',
  fullName: 'Olive Owner',
  role: 'restaurant_admin',
  isActive: true,
};

describe('MemoryCatalogStore', () => {
  let store: MemoryCatalogStore;

  beforeEach(() => {
    store = new MemoryCatalogStore();
  });

  it('commits the writes of a successful transaction', async () => {
    const ids = await store.transaction((tx) => tx.insertUsers([owner]), neverAborted());

    expect(ids).toEqual([1]);
    expect(store.dump().users).toEqual([{ ...owner, id: 1 }]);
    expect(await store.findUsers([1, 2])).toEqual([{ id: 1, role: 'restaurant_admin' }]);
  });

  it('discards every write when the work throws', async () => {
    await expect(
      store.transaction(async (tx) => {
        await tx.insertUsers([owner]);
        throw new Error('boom');
      }, neverAborted())
    ).rejects.toThrow('boom');

    expect(store.dump().users).toEqual([]);
  });

  it('enforces email uniqueness inside a transaction', async () => {
    await store.transaction((tx) => tx.insertUsers([owner]), neverAborted());

    const attempt = store.transaction(
      (tx) => tx.insertUsers([{ ...owner, email: 'OWNER@example.com' }]),
      neverAborted()
    );

    await expect(attempt).rejects.toBeInstanceOf(StoreError);
    await expect(attempt).rejects.toMatchObject({ code: 'DUPLICATE_KEY', field: 'email' });
  });

  it('enforces foreign keys', async () => {
    const attempt = store.transaction(
      (tx) =>
        tx.insertRestaurants([
          { name: 'Orphan', address: '1 Main Street', categoryId: 1, ownerId: 7, isActive: true },
        ]),
      neverAborted()
    );

    await expect(attempt).rejects.toMatchObject({
      code: 'FOREIGN_KEY',
      message: 'Restaurant.ownerId: referenced id 7 does not exist',
    });
  });

  it('does not hand out ids from a rolled-back transaction again', async () => {
    await expect(
      store.transaction(async (tx) => {
        await tx.insertUsers([owner]);
        throw new Error('boom');
      }, neverAborted())
    ).rejects.toThrow('boom');

    const ids = await store.transaction((tx) => tx.insertUsers([owner]), neverAborted());
    expect(ids).toEqual([2]);
  });

  it('runs transactions one at a time', async () => {
    const events: string[] = [];

    const first = store.transaction(async () => {
      events.push('first:start');
      await new Promise((resolve) => setTimeout(resolve, 20));
      events.push('first:end');
    }, neverAborted());
    const second = store.transaction(async () => {
      events.push('second:start');
    }, neverAborted());

    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('rejects with the abort reason when aborted before the work settles', async () => {
    const controller = new AbortController();
    const reason = new Error('stop');

    const attempt = store.transaction(async (tx) => {
      await new Promise((resolve) => setTimeout(resolve, 50));
      return tx.insertUsers([owner]);
    }, controller.signal);
    controller.abort(reason);

    await expect(attempt).rejects.toBe(reason);
    expect(store.dump().users).toEqual([]);
  });

  it('finds display order slots of stored siblings', async () => {
    await store.transaction(async (tx) => {
      await tx.insertUsers([owner]);
      await tx.insertRestaurantCategories([{ name: 'Pizza', isActive: true }]);
      await tx.insertRestaurants([
        { name: 'Slice House', address: '1 Main Street', categoryId: 1, ownerId: 1, isActive: true },
      ]);
      await tx.insertMenuCategories([{ restaurantId: 1, name: 'Mains', displayOrder: 4, isActive: true }]);
    }, neverAborted());

    expect(await store.findMenuCategorySlots([1, 2])).toEqual([{ restaurantId: 1, displayOrder: 4 }]);
    expect(await store.findTakenRestaurantCategoryNames(['pizza', 'pasta'])).toEqual(['Pizza']);
  });

  it('stores restaurants with no rating and no reviews yet', async () => {
    await store.transaction(async (tx) => {
      await tx.insertUsers([owner]);
      await tx.insertRestaurantCategories([{ name: 'Pizza', isActive: true }]);
      await tx.insertRestaurants([
        { name: 'Slice House', address: '1 Main Street', categoryId: 1, ownerId: 1, isActive: true },
      ]);
    }, neverAborted());

    expect(store.dump().restaurants).toEqual([
      {
        id: 1,
        name: 'Slice House',
        address: '1 Main Street',
        categoryId: 1,
        ownerId: 1,
        isActive: true,
        rating: 0,
        totalReviews: 0,
      },
    ]);
  });

  it('reads back only active restaurants, categories and available items', async () => {
    await store.transaction(async (tx) => {
      await tx.insertUsers([owner]);
      await tx.insertRestaurantCategories([
        { name: 'Pizza', isActive: true },
        { name: 'bakery', isActive: true },
      ]);
      await tx.insertRestaurants([
        { name: 'Slice House', address: '1 Main Street', categoryId: 1, ownerId: 1, isActive: true },
        { name: 'Closed Corner', address: '2 Main Street', categoryId: 2, ownerId: 1, isActive: false },
      ]);
      await tx.insertMenuCategories([
        { restaurantId: 1, name: 'Mains', displayOrder: 1, isActive: true },
        { restaurantId: 1, name: 'Drinks', displayOrder: 0, isActive: true },
        { restaurantId: 1, name: 'Seasonal', displayOrder: 2, isActive: false },
      ]);
      const item = {
        restaurantId: 1,
        menuCategoryId: 1,
        price: { regular: 9 },
        isVegetarian: false,
        isVegan: false,
        isGlutenFree: false,
        ingredients: [],
        allergens: [],
        isAvailable: true,
      };
      await tx.insertMenuItems([
        { ...item, name: 'Margherita', displayOrder: 1 },
        { ...item, name: 'Calzone', displayOrder: 0 },
        { ...item, name: 'Diavola', displayOrder: 2, isAvailable: false },
      ]);
    }, neverAborted());

    expect(await store.getRestaurant(1)).toMatchObject({ id: 1, categoryName: 'Pizza', rating: 0 });
    expect(await store.getRestaurant(2)).toBeNull();
    expect(await store.getRestaurant(3)).toBeNull();
    expect((await store.listRestaurantCategories()).map((category) => category.name)).toEqual(['bakery', 'Pizza']);
    expect((await store.listMenuCategories(1)).map((category) => category.name)).toEqual(['Drinks', 'Mains']);
    expect((await store.listMenuItems(1)).map((item) => item.name)).toEqual(['Calzone', 'Margherita']);
  });
});
