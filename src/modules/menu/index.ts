// Menu Module Exports

export { MenuCategory } from './menu-category.model.js';
export type { IMenuCategory, IMenuCategoryDocument, IMenuCategoryModel } from './menu-category.model.js';

export { MenuItem } from './menu-item.model.js';
export type { IMenuItem, IMenuItemDocument, IMenuItemModel } from './menu-item.model.js';
