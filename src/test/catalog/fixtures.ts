import { MemoryCatalogStore } from '../../modules/catalog/catalog.memory-store.js';
import type { CatalogTransaction } from '../../modules/catalog/catalog.store.js';
import type { CatalogBatch } from '../../modules/catalog/catalog.validation.js';

/**
 * One owner, one classification, one restaurant, one menu category, two items.
 */
export const minimalBatch = (): CatalogBatch => ({
  users: [{ ref: 'owner', email: 'owner@example.com', fullName: 'Olive Owner', role: 'restaurant_admin' }],
  restaurantCategories: [{ ref: 'pizza', name: 'Pizza' }],
  restaurants: [
    { ref: 'slice', name: 'Slice House', address: '1 Main Street', categoryId: 'pizza', ownerId: 'owner' },
  ],
  menuCategories: [{ ref: 'mains', restaurantId: 'slice', name: 'Mains' }],
  menuItems: [
    { restaurantId: 'slice', menuCategoryId: 'mains', name: 'Margherita', price: { regular: 9.5 } },
    { restaurantId: 'slice', menuCategoryId: 'mains', name: 'Marinara', price: { small: 7, large: 11.25 } },
  ],
});

export const neverAborted = (): AbortSignal => new AbortController().signal;

/**
 * Holds every transaction open for `delayMs` before doing any work.
 */
export class SlowMemoryStore extends MemoryCatalogStore {
  constructor(private readonly delayMs: number) {
    super();
  }

  override async transaction<T>(work: (tx: CatalogTransaction) => Promise<T>, signal: AbortSignal): Promise<T> {
    return super.transaction(async (tx) => {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      return work(tx);
    }, signal);
  }
}

/**
 * Reads as if no email were taken, like a validator that lost a race with a
 * concurrent load.
 */
export class StaleEmailStore extends MemoryCatalogStore {
  override async findTakenEmails(): Promise<string[]> {
    return [];
  }
}

export class FailingLookupStore extends MemoryCatalogStore {
  override async findUsers(): Promise<never> {
    throw new Error('connection reset');
  }
}
