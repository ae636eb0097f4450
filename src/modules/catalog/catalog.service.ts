import { ErrorMessages } from '../../config/constants.js';
import { logger } from '../../config/logger.js';
import { AppError } from '../../shared/middleware/error.middleware.js';
import type {
  CatalogReader,
  RestaurantDetail,
  StoredMenuCategory,
  StoredMenuItem,
  StoredRestaurantCategory,
} from './catalog.store.js';

export type MenuSection = StoredMenuCategory & { items: StoredMenuItem[] };

export interface RestaurantMenu {
  restaurantId: number;
  categories: MenuSection[];
}

/**
 * Read access to loaded catalogs. Only active restaurants are visible.
 */
export class CatalogService {
  constructor(private readonly reader: CatalogReader) {}

  async getRestaurant(id: number): Promise<RestaurantDetail> {
    const restaurant = await this.reader.getRestaurant(id);
    if (!restaurant) {
      throw AppError.notFound(ErrorMessages.RESTAURANT_NOT_FOUND, 'RESTAURANT_NOT_FOUND');
    }
    return restaurant;
  }

  /**
   * Active categories in display order, each with its available items in
   * display order. Items of an inactive category are left out.
   */
  async getMenu(restaurantId: number): Promise<RestaurantMenu> {
    await this.getRestaurant(restaurantId);

    const [categories, items] = await Promise.all([
      this.reader.listMenuCategories(restaurantId),
      this.reader.listMenuItems(restaurantId),
    ]);

    const sections = categories.map((category): MenuSection => ({
      ...category,
      items: items.filter((item) => item.menuCategoryId === category.id),
    }));

    logger.info(`Retrieved menu with ${sections.length} categories`, { restaurantId });
    return { restaurantId, categories: sections };
  }

  async listMenuCategories(restaurantId: number): Promise<StoredMenuCategory[]> {
    await this.getRestaurant(restaurantId);
    return this.reader.listMenuCategories(restaurantId);
  }

  async listRestaurantCategories(): Promise<StoredRestaurantCategory[]> {
    return this.reader.listRestaurantCategories();
  }
}
