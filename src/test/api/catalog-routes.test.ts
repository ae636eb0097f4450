import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { once } from 'node:events';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { createApp } from '../../app.js';
import { CatalogLoader } from '../../modules/catalog/catalog.loader.js';
import { MemoryCatalogStore } from '../../modules/catalog/catalog.memory-store.js';
import { minimalBatch } from '../catalog/fixtures.js';

// The app runs in this process on an ephemeral loopback port
describe('Catalog API', () => {
  let store: MemoryCatalogStore;
  let server: Server;
  let baseUrl: string;

  // JSON.parse keeps the body loosely typed for property assertions
  const readJson = async (response: Response) => JSON.parse(await response.text());

  const post = (path: string, body: unknown): Promise<Response> =>
    fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: typeof body === 'string' ? body : JSON.stringify(body),
    });

  beforeAll(async () => {
    store = new MemoryCatalogStore();
    const app = createApp({
      loader: {
        load: (batch, options) => new CatalogLoader(store).load(batch, options),
        validate: (batch) => new CatalogLoader(store).validate(batch),
      },
      reader: {
        getRestaurant: (id) => store.getRestaurant(id),
        listRestaurantCategories: () => store.listRestaurantCategories(),
        listMenuCategories: (restaurantId) => store.listMenuCategories(restaurantId),
        listMenuItems: (restaurantId) => store.listMenuItems(restaurantId),
      },
      databaseStatus: () => ({ isConnected: true, readyStateText: 'connected' }),
    });
    server = app.listen(0, '127.0.0.1');
    await once(server, 'listening');
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server has no TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.close();
    await once(server, 'close');
  });

  beforeEach(() => {
    store = new MemoryCatalogStore();
  });

  it('returns 201 with generated ids when a batch commits', async () => {
    const response = await post('/api/v1/catalog/batches', minimalBatch());
    const body = await readJson(response);

    expect(response.status).toBe(201);
    expect(body).toMatchObject({
      success: true,
      message: 'Catalog batch committed',
      data: {
        state: 'Committed',
        ids: { users: [{ index: 0, ref: 'owner', id: 1 }] },
      },
    });
  });

  it('returns 422 with every violation when a batch is rejected', async () => {
    const batch = minimalBatch();
    batch.menuItems = (batch.menuItems ?? []).map((item) => ({ ...item, displayOrder: 1 }));

    const response = await post('/api/v1/catalog/batches', batch);
    const body = await readJson(response);

    expect(response.status).toBe(422);
    expect(body.success).toBe(false);
    expect(body.error.code).toBe('BATCH_REJECTED');
    expect(body.error.message).toBe('Catalog batch rejected with 2 error(s)');
    expect(body.error.details.state).toBe('Rejected');
    expect(body.error.details.errors).toHaveLength(2);
    expect(body.error.details.errors[0]).toMatchObject({
      kind: 'ValidationError',
      entity: 'MenuItem',
      field: 'displayOrder',
      index: 0,
    });
  });

  it('returns 409 when the batch conflicts with stored records', async () => {
    await post('/api/v1/catalog/batches', minimalBatch());

    const response = await post('/api/v1/catalog/batches', minimalBatch());
    const body = await readJson(response);

    expect(response.status).toBe(409);
    expect(body.error.details.errors[0]).toMatchObject({ kind: 'StoreError', code: 'DUPLICATE_KEY', field: 'email' });
  });

  it('returns 422 for an invalid timeout before loading anything', async () => {
    const response = await post('/api/v1/catalog/batches?timeoutMs=abc', minimalBatch());
    const body = await readJson(response);

    expect(response.status).toBe(422);
    expect(body.error.code).toBe('VALIDATION_ERROR');
    expect(body.error.details[0].field).toBe('query.timeoutMs');
    expect(store.dump().users).toEqual([]);
  });

  it('validates without writing', async () => {
    const response = await post('/api/v1/catalog/batches/validate', minimalBatch());
    const body = await readJson(response);

    expect(response.status).toBe(200);
    expect(body.data).toEqual({ valid: true, errors: [] });
    expect(store.dump().users).toEqual([]);
  });

  it('answers malformed JSON with 400', async () => {
    const response = await post('/api/v1/catalog/batches', '{"users": [');
    const body = await readJson(response);

    expect(response.status).toBe(400);
    expect(body.error.code).toBe('INVALID_JSON');
  });

  it('answers unknown routes with 404 and echoes the request id', async () => {
    const response = await fetch(`${baseUrl}/api/v1/unknown`, { headers: { 'X-Request-Id': 'request-12345' } });
    const body = await readJson(response);

    expect(response.status).toBe(404);
    expect(response.headers.get('x-request-id')).toBe('request-12345');
    expect(body).toMatchObject({
      success: false,
      requestId: 'request-12345',
      error: { code: 'NOT_FOUND', message: 'Route GET /api/v1/unknown not found' },
    });
  });

  it('reports health with database status', async () => {
    const response = await fetch(`${baseUrl}/health`);
    const body = await readJson(response);

    expect(response.status).toBe(200);
    expect(body).toMatchObject({ status: 'healthy', database: { status: 'connected', connected: true } });
  });

  describe('catalog reads', () => {
    beforeEach(async () => {
      const batch = minimalBatch();
      batch.restaurantCategories = [{ ref: 'pizza', name: 'Pizza' }, { name: 'burgers' }, { name: 'Curry' }];
      batch.menuCategories = [
        { ref: 'mains', restaurantId: 'slice', name: 'Mains', displayOrder: 1 },
        { ref: 'starters', restaurantId: 'slice', name: 'Starters', displayOrder: 0 },
      ];
      batch.menuItems = [
        { restaurantId: 'slice', menuCategoryId: 'mains', name: 'Margherita', price: { regular: 9.5 }, displayOrder: 5 },
        { restaurantId: 'slice', menuCategoryId: 'mains', name: 'Marinara', price: { regular: 8 }, displayOrder: 2 },
        { restaurantId: 'slice', menuCategoryId: 'starters', name: 'Bruschetta', price: { regular: 5 } },
        {
          restaurantId: 'slice',
          menuCategoryId: 'mains',
          name: 'Calzone',
          price: { regular: 10 },
          displayOrder: 3,
          isAvailable: false,
        },
      ];

      const result = await new CatalogLoader(store).load(batch);
      expect(result.ok).toBe(true);
    });

    it('returns the menu grouped by category in display order', async () => {
      const response = await fetch(`${baseUrl}/api/v1/catalog/restaurants/1/menu`);
      const body = await readJson(response);

      expect(response.status).toBe(200);
      expect(body.data.restaurantId).toBe(1);
      expect(body.data.categories.map((category: { name: string }) => category.name)).toEqual(['Starters', 'Mains']);
      expect(body.data.categories[0].items.map((item: { name: string }) => item.name)).toEqual(['Bruschetta']);
      expect(body.data.categories[1].items.map((item: { name: string }) => item.name)).toEqual([
        'Marinara',
        'Margherita',
      ]);
      expect(body.meta).toEqual({ categories: 2, items: 3 });
    });

    it('returns a restaurant with its classification name', async () => {
      const response = await fetch(`${baseUrl}/api/v1/catalog/restaurants/1`);
      const body = await readJson(response);

      expect(response.status).toBe(200);
      expect(body.data).toMatchObject({
        id: 1,
        name: 'Slice House',
        categoryId: 1,
        categoryName: 'Pizza',
        rating: 0,
        totalReviews: 0,
      });
    });

    it('lists menu categories in display order', async () => {
      const response = await fetch(`${baseUrl}/api/v1/catalog/restaurants/1/menu-categories`);
      const body = await readJson(response);

      expect(response.status).toBe(200);
      expect(body.data.map((category: { name: string }) => category.name)).toEqual(['Starters', 'Mains']);
      expect(body.meta).toEqual({ count: 2 });
    });

    it('lists restaurant classifications by name', async () => {
      const response = await fetch(`${baseUrl}/api/v1/catalog/restaurant-categories`);
      const body = await readJson(response);

      expect(response.status).toBe(200);
      expect(body.data.map((category: { name: string }) => category.name)).toEqual(['burgers', 'Curry', 'Pizza']);
    });

    it('answers 404 for a restaurant that does not exist', async () => {
      const response = await fetch(`${baseUrl}/api/v1/catalog/restaurants/99/menu`);
      const body = await readJson(response);

      expect(response.status).toBe(404);
      expect(body.error).toMatchObject({ code: 'RESTAURANT_NOT_FOUND', message: 'Restaurant not found' });
    });

    it('answers 400 for a malformed restaurant id', async () => {
      const response = await fetch(`${baseUrl}/api/v1/catalog/restaurants/abc`);
      const body = await readJson(response);

      expect(response.status).toBe(400);
      expect(body.error).toMatchObject({ code: 'INVALID_ID', message: 'Invalid restaurant ID format' });
    });
  });
});
