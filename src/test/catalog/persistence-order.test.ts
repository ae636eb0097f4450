import { describe, it, expect } from 'vitest';
import { PERSISTENCE_ORDER, persistenceOrder } from '../../modules/catalog/persistence-order.js';

describe('persistenceOrder', () => {
  it('places every entity after the entities it references', () => {
    expect(PERSISTENCE_ORDER).toEqual(['User', 'RestaurantCategory', 'Restaurant', 'MenuCategory', 'MenuItem']);
  });

  it('follows the graph rather than declaration order', () => {
    expect(
      persistenceOrder({
        MenuItem: ['MenuCategory'],
        MenuCategory: ['Restaurant'],
        Restaurant: ['User', 'RestaurantCategory'],
        RestaurantCategory: [],
        User: [],
      })
    ).toEqual(['RestaurantCategory', 'User', 'Restaurant', 'MenuCategory', 'MenuItem']);
  });

  it('throws on a cycle', () => {
    expect(() =>
      persistenceOrder({
        User: ['Restaurant'],
        RestaurantCategory: [],
        Restaurant: ['User'],
        MenuCategory: ['Restaurant'],
        MenuItem: ['MenuCategory'],
      })
    ).toThrow('Entity dependencies contain a cycle: User, Restaurant, MenuCategory, MenuItem');
  });
});
