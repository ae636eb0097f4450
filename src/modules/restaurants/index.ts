// Restaurants Module Exports

export { Restaurant } from './restaurant.model.js';
export type { IRestaurant, IRestaurantDocument, IRestaurantModel } from './restaurant.model.js';

export { RestaurantCategory } from './restaurant-category.model.js';
export type {
  IRestaurantCategory,
  IRestaurantCategoryDocument,
  IRestaurantCategoryModel,
} from './restaurant-category.model.js';
