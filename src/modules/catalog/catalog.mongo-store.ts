import mongoose from 'mongoose';
import type { ClientSession, Connection } from 'mongoose';
import { EntityKind, WEEKDAYS } from '../../config/constants.js';
import type { EntityKindType, Weekday } from '../../config/constants.js';
import { logger } from '../../config/logger.js';
import { raceAbort, settle } from '../../shared/utils/abort.util.js';
import { Counter } from '../../shared/models/counter.model.js';
import { User } from '../users/index.js';
import { Restaurant, RestaurantCategory } from '../restaurants/index.js';
import { MenuCategory, MenuItem } from '../menu/index.js';
import { CatalogError, StoreError } from './catalog.errors.js';
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
  StoredRestaurantCategory,
  StoredMenuCategory,
  StoredMenuItem,
} from './catalog.store.js';

// Collection name -> entity, for reading duplicate-key messages
const COLLECTION_ENTITIES: Record<string, EntityKindType> = {
  [User.collection.collectionName]: EntityKind.USER,
  [RestaurantCategory.collection.collectionName]: EntityKind.RESTAURANT_CATEGORY,
  [Restaurant.collection.collectionName]: EntityKind.RESTAURANT,
  [MenuCategory.collection.collectionName]: EntityKind.MENU_CATEGORY,
  [MenuItem.collection.collectionName]: EntityKind.MENU_ITEM,
};

const isWeekday = (day: string): day is Weekday => WEEKDAYS.some((weekday) => weekday === day);

// Lean reads return stored maps as plain objects
const entriesOf = <V>(value: Map<string, V> | Record<string, V>): [string, V][] =>
  value instanceof Map ? [...value.entries()] : Object.entries(value);

const toOpeningHours = (
  hours: Map<string, string> | Record<string, string> | undefined
): Partial<Record<Weekday, string>> | undefined => {
  if (hours === undefined) {
    return undefined;
  }
  const result: Partial<Record<Weekday, string>> = {};
  for (const [day, value] of entriesOf(hours)) {
    if (isWeekday(day)) {
      result[day] = value;
    }
  }
  return result;
};

// ============================================
// ERROR TRANSLATION
// ============================================

/**
 * Map a driver or Mongoose failure onto the store error taxonomy.
 * Duplicate-key errors expose only the field, never the value.
 */
export function translateMongoError(error: unknown): CatalogError {
  if (error instanceof CatalogError) {
    return error;
  }

  if (error instanceof mongoose.mongo.MongoServerError) {
    if (error.code === 11000) {
      const keyValue: unknown = error['keyValue'];
      const keys = typeof keyValue === 'object' && keyValue !== null ? Object.keys(keyValue) : [];
      const field = keys[keys.length - 1] ?? 'key';
      const collection = /collection: [^.\s]+\.(\S+)/.exec(error.message)?.[1];
      const entity = collection !== undefined ? COLLECTION_ENTITIES[collection] : undefined;
      return StoreError.duplicateKey(entity ?? 'Batch', field);
    }

    if (error.hasErrorLabel('TransientTransactionError')) {
      return StoreError.writeConflict();
    }
  }

  if (error instanceof mongoose.Error.ValidationError) {
    const [first] = Object.values(error.errors);
    return new StoreError(first?.message ?? error.message, 'SCHEMA_REJECTED', { field: first?.path });
  }

  return StoreError.failure(error instanceof Error ? error.message : 'Unknown store failure');
}

// ============================================
// TRANSACTION
// ============================================

/**
 * Every write checks the signal first: once the load has timed out no further
 * command may reach the session.
 */
export class MongoCatalogTransaction implements CatalogTransaction {
  constructor(
    private readonly session: ClientSession,
    private readonly signal: AbortSignal
  ) {}

  async insertUsers(rows: UserRow[]): Promise<number[]> {
    this.signal.throwIfAborted();
    const ids = await Counter.reserve(User.collection.collectionName, rows.length);
    this.signal.throwIfAborted();
    await User.insertMany(
      rows.map((row, offset) => ({ _id: ids[offset], ...row })),
      { session: this.session, ordered: true }
    );
    return ids;
  }

  async insertRestaurantCategories(rows: RestaurantCategoryRow[]): Promise<number[]> {
    this.signal.throwIfAborted();
    const ids = await Counter.reserve(RestaurantCategory.collection.collectionName, rows.length);
    this.signal.throwIfAborted();
    await RestaurantCategory.insertMany(
      rows.map((row, offset) => ({ _id: ids[offset], ...row })),
      { session: this.session, ordered: true }
    );
    return ids;
  }

  async insertRestaurants(rows: RestaurantRow[]): Promise<number[]> {
    this.signal.throwIfAborted();
    const ids = await Counter.reserve(Restaurant.collection.collectionName, rows.length);
    this.signal.throwIfAborted();
    await Restaurant.insertMany(
      rows.map(({ categoryId, ownerId, ...row }, offset) => ({
        _id: ids[offset],
        ...row,
        category: categoryId,
        owner: ownerId,
      })),
      { session: this.session, ordered: true }
    );
    return ids;
  }

  async insertMenuCategories(rows: MenuCategoryRow[]): Promise<number[]> {
    this.signal.throwIfAborted();
    const ids = await Counter.reserve(MenuCategory.collection.collectionName, rows.length);
    this.signal.throwIfAborted();
    await MenuCategory.insertMany(
      rows.map(({ restaurantId, ...row }, offset) => ({
        _id: ids[offset],
        ...row,
        restaurant: restaurantId,
      })),
      { session: this.session, ordered: true }
    );
    return ids;
  }

  async insertMenuItems(rows: MenuItemRow[]): Promise<number[]> {
    this.signal.throwIfAborted();
    const ids = await Counter.reserve(MenuItem.collection.collectionName, rows.length);
    this.signal.throwIfAborted();
    await MenuItem.insertMany(
      rows.map(({ restaurantId, menuCategoryId, ...row }, offset) => ({
        _id: ids[offset],
        ...row,
        restaurant: restaurantId,
        menuCategory: menuCategoryId,
      })),
      { session: this.session, ordered: true }
    );
    return ids;
  }
}

// ============================================
// STORE
// ============================================

/**
 * Catalog store backed by MongoDB. Loads run as multi-document transactions
 * (snapshot reads, majority writes); the unique indexes on the models settle
 * races between concurrent loads.
 */
export class MongoCatalogStore implements CatalogStore {
  constructor(private readonly connection: Connection = mongoose.connection) {}

  /**
   * Create collections and indexes up front. Neither can be created lazily
   * inside a transaction.
   */
  async prepare(): Promise<void> {
    const models = [Counter, User, RestaurantCategory, Restaurant, MenuCategory, MenuItem];
    for (const model of models) {
      await model.createCollection();
      await model.init();
    }
    logger.info('Catalog collections and indexes ready', { collections: models.length });
  }

  async findUsers(ids: number[]): Promise<StoredUserRef[]> {
    if (ids.length === 0) {
      return [];
    }
    const users = await User.find({ _id: { $in: ids } }).select('role').lean();
    return users.map((user) => ({ id: user._id, role: user.role }));
  }

  async findRestaurantCategoryIds(ids: number[]): Promise<number[]> {
    if (ids.length === 0) {
      return [];
    }
    const categories = await RestaurantCategory.find({ _id: { $in: ids } }).select('_id').lean();
    return categories.map((category) => category._id);
  }

  async findRestaurantIds(ids: number[]): Promise<number[]> {
    if (ids.length === 0) {
      return [];
    }
    const restaurants = await Restaurant.find({ _id: { $in: ids } }).select('_id').lean();
    return restaurants.map((restaurant) => restaurant._id);
  }

  async findMenuCategories(ids: number[]): Promise<StoredMenuCategoryRef[]> {
    if (ids.length === 0) {
      return [];
    }
    const categories = await MenuCategory.find({ _id: { $in: ids } }).select('restaurant').lean();
    return categories.map((category) => ({ id: category._id, restaurantId: category.restaurant }));
  }

  async findTakenEmails(emails: string[]): Promise<string[]> {
    if (emails.length === 0) {
      return [];
    }
    const users = await User.find({ email: { $in: emails.map((email) => email.toLowerCase()) } })
      .select('email')
      .lean();
    return users.map((user) => user.email);
  }

  async findTakenRestaurantCategoryNames(names: string[]): Promise<string[]> {
    if (names.length === 0) {
      return [];
    }
    const categories = await RestaurantCategory.find({ name: { $in: names } })
      .collation({ locale: 'en', strength: 2 })
      .select('name')
      .lean();
    return categories.map((category) => category.name);
  }

  async findMenuCategorySlots(restaurantIds: number[]): Promise<MenuCategorySlot[]> {
    if (restaurantIds.length === 0) {
      return [];
    }
    const categories = await MenuCategory.find({ restaurant: { $in: restaurantIds } })
      .select('restaurant displayOrder')
      .lean();
    return categories.map((category) => ({
      restaurantId: category.restaurant,
      displayOrder: category.displayOrder,
    }));
  }

  async findMenuItemSlots(menuCategoryIds: number[]): Promise<MenuItemSlot[]> {
    if (menuCategoryIds.length === 0) {
      return [];
    }
    const items = await MenuItem.find({ menuCategory: { $in: menuCategoryIds } })
      .select('restaurant menuCategory displayOrder')
      .lean();
    return items.map((item) => ({
      restaurantId: item.restaurant,
      menuCategoryId: item.menuCategory,
      displayOrder: item.displayOrder,
    }));
  }

  async getRestaurant(id: number): Promise<RestaurantDetail | null> {
    const restaurant = await Restaurant.findOne({ _id: id, isActive: true }).lean();
    if (!restaurant) {
      return null;
    }
    const category = await RestaurantCategory.findById(restaurant.category).select('name').lean();

    return {
      id: restaurant._id,
      name: restaurant.name,
      description: restaurant.description,
      address: restaurant.address,
      latitude: restaurant.latitude,
      longitude: restaurant.longitude,
      phone: restaurant.phone,
      email: restaurant.email,
      categoryId: restaurant.category,
      ownerId: restaurant.owner,
      imageUrl: restaurant.imageUrl,
      openingHours: toOpeningHours(restaurant.openingHours),
      isActive: restaurant.isActive,
      rating: restaurant.rating,
      totalReviews: restaurant.totalReviews,
      categoryName: category?.name ?? null,
    };
  }

  async listRestaurantCategories(): Promise<StoredRestaurantCategory[]> {
    const categories = await RestaurantCategory.find().collation({ locale: 'en' }).sort({ name: 1 }).lean();
    return categories.map((category) => ({
      id: category._id,
      name: category.name,
      description: category.description,
      icon: category.icon,
      isActive: category.isActive,
    }));
  }

  async listMenuCategories(restaurantId: number): Promise<StoredMenuCategory[]> {
    const categories = await MenuCategory.find({ restaurant: restaurantId, isActive: true })
      .collation({ locale: 'en' })
      .sort({ displayOrder: 1, name: 1 })
      .lean();
    return categories.map((category) => ({
      id: category._id,
      restaurantId: category.restaurant,
      name: category.name,
      description: category.description,
      displayOrder: category.displayOrder,
      isActive: category.isActive,
    }));
  }

  async listMenuItems(restaurantId: number): Promise<StoredMenuItem[]> {
    const items = await MenuItem.find({ restaurant: restaurantId, isAvailable: true })
      .collation({ locale: 'en' })
      .sort({ displayOrder: 1, name: 1 })
      .lean();
    return items.map((item) => ({
      id: item._id,
      restaurantId: item.restaurant,
      menuCategoryId: item.menuCategory,
      name: item.name,
      description: item.description,
      price: Object.fromEntries(entriesOf(item.price)),
      imageUrl: item.imageUrl,
      isVegetarian: item.isVegetarian,
      isVegan: item.isVegan,
      isGlutenFree: item.isGlutenFree,
      ingredients: [...item.ingredients],
      allergens: [...item.allergens],
      isAvailable: item.isAvailable,
      displayOrder: item.displayOrder,
    }));
  }

  async transaction<T>(work: (tx: CatalogTransaction) => Promise<T>, signal: AbortSignal): Promise<T> {
    signal.throwIfAborted();

    const session = await this.connection.startSession();
    let pending: Promise<T> | undefined;

    try {
      session.startTransaction({
        readConcern: { level: 'snapshot' },
        writeConcern: { w: 'majority' },
      });

      pending = work(new MongoCatalogTransaction(session, signal));
      const result = await raceAbort(pending, signal);

      // Commit is not raced: once it starts it is allowed to finish
      await session.commitTransaction();
      return result;
    } catch (error) {
      // A write issued after abortTransaction would run outside the transaction
      if (pending !== undefined) {
        await settle(pending);
      }
      if (session.inTransaction()) {
        try {
          await session.abortTransaction();
        } catch (abortError) {
          logger.warn('Failed to abort catalog transaction', {
            error: abortError instanceof Error ? abortError.message : String(abortError),
          });
        }
      }
      throw translateMongoError(error);
    } finally {
      await session.endSession();
    }
  }
}
