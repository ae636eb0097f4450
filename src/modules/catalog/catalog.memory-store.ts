import { EntityKind } from '../../config/constants.js';
import { raceAbort } from '../../shared/utils/abort.util.js';
import { StoreError } from './catalog.errors.js';
import type {
  CatalogStore,
  CatalogTransaction,
  UserRow,
  RestaurantCategoryRow,
  RestaurantRow,
  MenuCategoryRow,
  MenuItemRow,
  StoredUserRef,
  StoredMenuCategoryRef,
  MenuCategorySlot,
  MenuItemSlot,
  RestaurantDetail,
  StoredRestaurant,
  StoredRestaurantCategory,
  StoredMenuCategory,
  StoredMenuItem,
} from './catalog.store.js';

type WithId<T> = T & { id: number };

export interface MemoryCatalogTables {
  users: Map<number, WithId<UserRow>>;
  restaurantCategories: Map<number, StoredRestaurantCategory>;
  restaurants: Map<number, StoredRestaurant>;
  menuCategories: Map<number, StoredMenuCategory>;
  menuItems: Map<number, StoredMenuItem>;
}

export interface MemoryCatalogDump {
  users: WithId<UserRow>[];
  restaurantCategories: StoredRestaurantCategory[];
  restaurants: StoredRestaurant[];
  menuCategories: StoredMenuCategory[];
  menuItems: StoredMenuItem[];
}

type TableName = keyof MemoryCatalogTables;

const emptyTables = (): MemoryCatalogTables => ({
  users: new Map(),
  restaurantCategories: new Map(),
  restaurants: new Map(),
  menuCategories: new Map(),
  menuItems: new Map(),
});

const sortedRows = <T extends { id: number }>(table: Map<number, T>): T[] =>
  [...table.values()].sort((a, b) => a.id - b.id).map((row) => structuredClone(row));

const byName = (a: { name: string }, b: { name: string }): number => a.name.localeCompare(b.name, 'en');

const byDisplayOrder = (
  a: { displayOrder: number; name: string },
  b: { displayOrder: number; name: string }
): number => a.displayOrder - b.displayOrder || byName(a, b);

const withId = <R extends object>(row: R, id: number): WithId<R> => ({ ...structuredClone(row), id });

/**
 * Sequences behave like SERIAL columns: ids handed out by a rolled-back
 * transaction are not reused.
 */
class Sequences {
  private readonly current: Record<TableName, number> = {
    users: 0,
    restaurantCategories: 0,
    restaurants: 0,
    menuCategories: 0,
    menuItems: 0,
  };

  reserve(table: TableName, count: number): number[] {
    const first = this.current[table] + 1;
    this.current[table] += count;
    return Array.from({ length: count }, (_, offset) => first + offset);
  }
}

/**
 * Writes against a private copy of the tables; the copy replaces the committed
 * tables only when the whole transaction succeeds. Enforces the same unique
 * and foreign-key constraints as the MongoDB indexes.
 */
class MemoryCatalogTransaction implements CatalogTransaction {
  constructor(
    private readonly tables: MemoryCatalogTables,
    private readonly sequences: Sequences,
    private readonly signal: AbortSignal
  ) {}

  async insertUsers(rows: UserRow[]): Promise<number[]> {
    return this.insert('users', this.tables.users, rows, (row) => {
      const email = row.email.toLowerCase();
      for (const user of this.tables.users.values()) {
        if (user.email.toLowerCase() === email) {
          throw StoreError.duplicateKey(EntityKind.USER, 'email');
        }
      }
    }, withId);
  }

  async insertRestaurantCategories(rows: RestaurantCategoryRow[]): Promise<number[]> {
    return this.insert('restaurantCategories', this.tables.restaurantCategories, rows, (row) => {
      const name = row.name.toLowerCase();
      for (const category of this.tables.restaurantCategories.values()) {
        if (category.name.toLowerCase() === name) {
          throw StoreError.duplicateKey(EntityKind.RESTAURANT_CATEGORY, 'name');
        }
      }
    }, withId);
  }

  async insertRestaurants(rows: RestaurantRow[]): Promise<number[]> {
    return this.insert(
      'restaurants',
      this.tables.restaurants,
      rows,
      (row) => {
        if (!this.tables.users.has(row.ownerId)) {
          throw StoreError.foreignKey(EntityKind.RESTAURANT, 'ownerId', row.ownerId);
        }
        if (!this.tables.restaurantCategories.has(row.categoryId)) {
          throw StoreError.foreignKey(EntityKind.RESTAURANT, 'categoryId', row.categoryId);
        }
      },
      (row, id) => ({ ...withId(row, id), rating: 0, totalReviews: 0 })
    );
  }

  async insertMenuCategories(rows: MenuCategoryRow[]): Promise<number[]> {
    return this.insert('menuCategories', this.tables.menuCategories, rows, (row) => {
      if (!this.tables.restaurants.has(row.restaurantId)) {
        throw StoreError.foreignKey(EntityKind.MENU_CATEGORY, 'restaurantId', row.restaurantId);
      }
      for (const category of this.tables.menuCategories.values()) {
        if (category.restaurantId === row.restaurantId && category.displayOrder === row.displayOrder) {
          throw StoreError.duplicateKey(EntityKind.MENU_CATEGORY, 'displayOrder');
        }
      }
    }, withId);
  }

  async insertMenuItems(rows: MenuItemRow[]): Promise<number[]> {
    return this.insert('menuItems', this.tables.menuItems, rows, (row) => {
      if (!this.tables.restaurants.has(row.restaurantId)) {
        throw StoreError.foreignKey(EntityKind.MENU_ITEM, 'restaurantId', row.restaurantId);
      }
      if (!this.tables.menuCategories.has(row.menuCategoryId)) {
        throw StoreError.foreignKey(EntityKind.MENU_ITEM, 'menuCategoryId', row.menuCategoryId);
      }
      for (const item of this.tables.menuItems.values()) {
        if (
          item.restaurantId === row.restaurantId &&
          item.menuCategoryId === row.menuCategoryId &&
          item.displayOrder === row.displayOrder
        ) {
          throw StoreError.duplicateKey(EntityKind.MENU_ITEM, 'displayOrder');
        }
      }
    }, withId);
  }

  private async insert<R extends object, S>(
    table: TableName,
    target: Map<number, S>,
    rows: R[],
    checkConstraints: (row: R) => void,
    toStored: (row: R, id: number) => S
  ): Promise<number[]> {
    this.signal.throwIfAborted();

    const ids = this.sequences.reserve(table, rows.length);

    rows.forEach((row, offset) => {
      checkConstraints(row);
      const id = ids[offset] ?? 0;
      target.set(id, toStored(row, id));
    });

    return ids;
  }
}

/**
 * In-process catalog store. Transactions run one at a time.
 */
export class MemoryCatalogStore implements CatalogStore {
  private tables: MemoryCatalogTables = emptyTables();
  private readonly sequences = new Sequences();
  private queue: Promise<void> = Promise.resolve();

  // ============================================
  // LOOKUPS
  // ============================================

  async findUsers(ids: number[]): Promise<StoredUserRef[]> {
    return ids.flatMap((id) => {
      const user = this.tables.users.get(id);
      return user ? [{ id: user.id, role: user.role }] : [];
    });
  }

  async findRestaurantCategoryIds(ids: number[]): Promise<number[]> {
    return ids.filter((id) => this.tables.restaurantCategories.has(id));
  }

  async findRestaurantIds(ids: number[]): Promise<number[]> {
    return ids.filter((id) => this.tables.restaurants.has(id));
  }

  async findMenuCategories(ids: number[]): Promise<StoredMenuCategoryRef[]> {
    return ids.flatMap((id) => {
      const category = this.tables.menuCategories.get(id);
      return category ? [{ id: category.id, restaurantId: category.restaurantId }] : [];
    });
  }

  async findTakenEmails(emails: string[]): Promise<string[]> {
    const wanted = new Set(emails.map((email) => email.toLowerCase()));
    return [...this.tables.users.values()]
      .map((user) => user.email.toLowerCase())
      .filter((email) => wanted.has(email));
  }

  async findTakenRestaurantCategoryNames(names: string[]): Promise<string[]> {
    const wanted = new Set(names.map((name) => name.toLowerCase()));
    return [...this.tables.restaurantCategories.values()]
      .map((category) => category.name)
      .filter((name) => wanted.has(name.toLowerCase()));
  }

  async findMenuCategorySlots(restaurantIds: number[]): Promise<MenuCategorySlot[]> {
    const wanted = new Set(restaurantIds);
    return [...this.tables.menuCategories.values()]
      .filter((category) => wanted.has(category.restaurantId))
      .map(({ restaurantId, displayOrder }) => ({ restaurantId, displayOrder }));
  }

  async findMenuItemSlots(menuCategoryIds: number[]): Promise<MenuItemSlot[]> {
    const wanted = new Set(menuCategoryIds);
    return [...this.tables.menuItems.values()]
      .filter((item) => wanted.has(item.menuCategoryId))
      .map(({ restaurantId, menuCategoryId, displayOrder }) => ({ restaurantId, menuCategoryId, displayOrder }));
  }

  // ============================================
  // READS
  // ============================================

  async getRestaurant(id: number): Promise<RestaurantDetail | null> {
    const restaurant = this.tables.restaurants.get(id);
    if (!restaurant?.isActive) {
      return null;
    }
    const category = this.tables.restaurantCategories.get(restaurant.categoryId);
    return { ...structuredClone(restaurant), categoryName: category?.name ?? null };
  }

  async listRestaurantCategories(): Promise<StoredRestaurantCategory[]> {
    return sortedRows(this.tables.restaurantCategories).sort(byName);
  }

  async listMenuCategories(restaurantId: number): Promise<StoredMenuCategory[]> {
    return sortedRows(this.tables.menuCategories)
      .filter((category) => category.restaurantId === restaurantId && category.isActive)
      .sort(byDisplayOrder);
  }

  async listMenuItems(restaurantId: number): Promise<StoredMenuItem[]> {
    return sortedRows(this.tables.menuItems)
      .filter((item) => item.restaurantId === restaurantId && item.isAvailable)
      .sort(byDisplayOrder);
  }

  // ============================================
  // TRANSACTIONS
  // ============================================

  async transaction<T>(work: (tx: CatalogTransaction) => Promise<T>, signal: AbortSignal): Promise<T> {
    const release = await this.acquire();

    try {
      signal.throwIfAborted();

      const staging: MemoryCatalogTables = structuredClone(this.tables);
      const result = await raceAbort(work(new MemoryCatalogTransaction(staging, this.sequences, signal)), signal);

      this.tables = staging;
      return result;
    } finally {
      release();
    }
  }

  /**
   * Copy of every committed row, ordered by id.
   */
  dump(): MemoryCatalogDump {
    return {
      users: sortedRows(this.tables.users),
      restaurantCategories: sortedRows(this.tables.restaurantCategories),
      restaurants: sortedRows(this.tables.restaurants),
      menuCategories: sortedRows(this.tables.menuCategories),
      menuItems: sortedRows(this.tables.menuItems),
    };
  }

  private acquire(): Promise<() => void> {
    const previous = this.queue;
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.queue = previous.then(() => held);
    return previous.then(() => release);
  }
}
