import type { UserRoleType } from '../../config/constants.js';
import type {
  BatchUser,
  BatchRestaurantCategory,
  BatchRestaurant,
  BatchMenuCategory,
  BatchMenuItem,
} from './catalog.validation.js';

// ============================================
// ROWS (references resolved to stored ids)
// ============================================

export type UserRow = Omit<BatchUser, 'ref'>;

export type RestaurantCategoryRow = Omit<BatchRestaurantCategory, 'ref'>;

export type RestaurantRow = Omit<BatchRestaurant, 'ref' | 'categoryId' | 'ownerId'> & {
  categoryId: number;
  ownerId: number;
};

export type MenuCategoryRow = Omit<BatchMenuCategory, 'ref' | 'restaurantId' | 'displayOrder'> & {
  restaurantId: number;
  displayOrder: number;
};

export type MenuItemRow = Omit<BatchMenuItem, 'ref' | 'restaurantId' | 'menuCategoryId' | 'displayOrder'> & {
  restaurantId: number;
  menuCategoryId: number;
  displayOrder: number;
};

// ============================================
// STORED ENTITIES
// ============================================

export type StoredRestaurantCategory = RestaurantCategoryRow & { id: number };

export type StoredRestaurant = RestaurantRow & {
  id: number;
  rating: number;
  totalReviews: number;
};

export type StoredMenuCategory = MenuCategoryRow & { id: number };

export type StoredMenuItem = MenuItemRow & { id: number };

export type RestaurantDetail = StoredRestaurant & { categoryName: string | null };

// ============================================
// LOOKUP RESULTS
// ============================================

export interface StoredUserRef {
  id: number;
  role: UserRoleType;
}

export interface StoredMenuCategoryRef {
  id: number;
  restaurantId: number;
}

export interface MenuCategorySlot {
  restaurantId: number;
  displayOrder: number;
}

export interface MenuItemSlot {
  restaurantId: number;
  menuCategoryId: number;
  displayOrder: number;
}

/**
 * Read side used by the validator. Every method takes the full set of keys at
 * once and returns only the ones that exist.
 */
export interface CatalogLookup {
  findUsers(ids: number[]): Promise<StoredUserRef[]>;
  findRestaurantCategoryIds(ids: number[]): Promise<number[]>;
  findRestaurantIds(ids: number[]): Promise<number[]>;
  findMenuCategories(ids: number[]): Promise<StoredMenuCategoryRef[]>;
  /** Emails (lower-cased) already held by stored users */
  findTakenEmails(emails: string[]): Promise<string[]>;
  /** Classification names already stored, compared case-insensitively */
  findTakenRestaurantCategoryNames(names: string[]): Promise<string[]>;
  findMenuCategorySlots(restaurantIds: number[]): Promise<MenuCategorySlot[]>;
  findMenuItemSlots(menuCategoryIds: number[]): Promise<MenuItemSlot[]>;
}

/**
 * Read side behind the catalog endpoints.
 */
export interface CatalogReader {
  /** Active restaurant with the name of its classification, or null */
  getRestaurant(id: number): Promise<RestaurantDetail | null>;
  /** Every classification, by name */
  listRestaurantCategories(): Promise<StoredRestaurantCategory[]>;
  /** Active menu categories of a restaurant, by display order then name */
  listMenuCategories(restaurantId: number): Promise<StoredMenuCategory[]>;
  /** Available items of a restaurant, by display order then name */
  listMenuItems(restaurantId: number): Promise<StoredMenuItem[]>;
}

/**
 * Write side, only reachable inside `CatalogStore.transaction`. Each insert
 * returns the generated ids in row order.
 */
export interface CatalogTransaction {
  insertUsers(rows: UserRow[]): Promise<number[]>;
  insertRestaurantCategories(rows: RestaurantCategoryRow[]): Promise<number[]>;
  insertRestaurants(rows: RestaurantRow[]): Promise<number[]>;
  insertMenuCategories(rows: MenuCategoryRow[]): Promise<number[]>;
  insertMenuItems(rows: MenuItemRow[]): Promise<number[]>;
}

export interface CatalogStore extends CatalogLookup, CatalogReader {
  /**
   * Run `work` atomically. When `signal` aborts before commit starts, the
   * transaction is rolled back and the promise rejects with the abort reason.
   */
  transaction<T>(work: (tx: CatalogTransaction) => Promise<T>, signal: AbortSignal): Promise<T>;
}
