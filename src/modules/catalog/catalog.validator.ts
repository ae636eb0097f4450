import type { ZodIssue, ZodType, ZodTypeDef } from 'zod';
import { EntityKind, RESTAURANT_OWNER_ROLES } from '../../config/constants.js';
import type { EntityKindType, UserRoleType } from '../../config/constants.js';
import { ValidationError, StoreError } from './catalog.errors.js';
import type { CatalogViolation, ErrorEntity, RecordLocation } from './catalog.errors.js';
import {
  catalogBatchEnvelopeSchema,
  batchUserSchema,
  batchRestaurantCategorySchema,
  batchRestaurantSchema,
  batchMenuCategorySchema,
  batchMenuItemSchema,
} from './catalog.validation.js';
import type {
  EntityReference,
  BatchUser,
  BatchRestaurantCategory,
  BatchRestaurant,
  BatchMenuCategory,
  BatchMenuItem,
} from './catalog.validation.js';
import type {
  CatalogLookup,
  StoredUserRef,
  StoredMenuCategoryRef,
  UserRow,
  RestaurantCategoryRow,
} from './catalog.store.js';

// ============================================
// TYPES
// ============================================

export interface PlannedEntity<T> {
  index: number;
  ref?: string;
  record: T;
}

export type PlannedRestaurant = Omit<BatchRestaurant, 'ref'>;

export type PlannedMenuCategory = Omit<BatchMenuCategory, 'ref' | 'displayOrder'> & {
  displayOrder: number;
};

export type PlannedMenuItem = Omit<BatchMenuItem, 'ref' | 'displayOrder'> & {
  displayOrder: number;
};

/**
 * A validated batch, ready to persist. References are still unresolved:
 * in-batch refs only receive ids once their targets are inserted.
 */
export interface LoadPlan {
  users: PlannedEntity<UserRow>[];
  restaurantCategories: PlannedEntity<RestaurantCategoryRow>[];
  restaurants: PlannedEntity<PlannedRestaurant>[];
  menuCategories: PlannedEntity<PlannedMenuCategory>[];
  menuItems: PlannedEntity<PlannedMenuItem>[];
}

export type ValidationOutcome =
  | { valid: true; plan: LoadPlan; violations: CatalogViolation[] }
  | { valid: false; violations: CatalogViolation[] };

interface SectionEntry<T> {
  index: number;
  ref?: string;
  // null when the record failed its shape check
  record: T | null;
}

interface ValidEntry<T> extends SectionEntry<T> {
  record: T;
}

interface BatchSection<T> {
  entity: EntityKindType;
  entries: SectionEntry<T>[];
  byRef: Map<string, SectionEntry<T>>;
}

// value is null when the target exists but is itself malformed
type Resolution<V> = { found: true; key: string; value: V | null } | { found: false };

interface StoreFacts {
  users: Map<number, StoredUserRef>;
  restaurantCategoryIds: Set<number>;
  restaurantIds: Set<number>;
  menuCategories: Map<number, StoredMenuCategoryRef>;
  takenEmails: Set<string>;
  takenNames: Set<string>;
  categorySlots: Map<string, Set<number>>;
  itemSlots: Map<string, Set<number>>;
}

interface Slotted<T> {
  entry: ValidEntry<T>;
  group: string;
  displayOrder?: number;
}

// ============================================
// HELPERS
// ============================================

const storeKey = (id: number): string => `#${id}`;
const batchKey = (ref: string): string => `@${ref}`;
const slotKey = (restaurantKey: string, menuCategoryKey: string): string => `${restaurantKey}|${menuCategoryKey}`;

const locationOf = (entry: { index: number; ref?: string }): RecordLocation => ({
  index: entry.index,
  ref: entry.ref,
});

const rawRef = (raw: unknown): string | undefined => {
  if (typeof raw === 'object' && raw !== null && 'ref' in raw && typeof raw.ref === 'string') {
    const ref = raw.ref.trim();
    return ref.length > 0 ? ref : undefined;
  }
  return undefined;
};

const issueToError = (entity: ErrorEntity, issue: ZodIssue, location: RecordLocation): ValidationError =>
  new ValidationError(entity, issue.path.length > 0 ? issue.path.join('.') : '(root)', issue.message, location);

const numericIds = (references: EntityReference[]): number[] => [
  ...new Set(references.filter((reference): reference is number => typeof reference === 'number')),
];

const isValid = <T>(entry: SectionEntry<T>): entry is ValidEntry<T> => entry.record !== null;

/**
 * Call `report` for every member of every group holding more than one element.
 */
function reportDuplicates<E>(elements: E[], keyOf: (element: E) => string | undefined, report: (element: E) => void): void {
  const groups = new Map<string, E[]>();
  for (const element of elements) {
    const key = keyOf(element);
    if (key === undefined) {
      continue;
    }
    const group = groups.get(key) ?? [];
    group.push(element);
    groups.set(key, group);
  }
  for (const group of groups.values()) {
    if (group.length > 1) {
      group.forEach(report);
    }
  }
}

/**
 * Give every slotted record without an explicit order the next free one in its
 * group, in batch order. A group with no orders at all starts at 0.
 */
function assignDisplayOrders<T>(slotted: Slotted<T>[], storeSlots: Map<string, Set<number>>): Map<number, number> {
  const used = new Map<string, number[]>();
  for (const slot of slotted) {
    if (slot.displayOrder !== undefined) {
      used.set(slot.group, [...(used.get(slot.group) ?? []), slot.displayOrder]);
    }
  }

  const next = new Map<string, number>();
  const assigned = new Map<number, number>();

  for (const slot of slotted) {
    if (slot.displayOrder !== undefined) {
      assigned.set(slot.entry.index, slot.displayOrder);
      continue;
    }
    let candidate = next.get(slot.group);
    if (candidate === undefined) {
      const taken = [...(storeSlots.get(slot.group) ?? []), ...(used.get(slot.group) ?? [])];
      candidate = taken.length > 0 ? Math.max(...taken) + 1 : 0;
    }
    assigned.set(slot.entry.index, candidate);
    next.set(slot.group, candidate + 1);
  }

  return assigned;
}

// ============================================
// VALIDATION RUN
// ============================================

/**
 * State of one validation pass over one batch.
 */
class ValidationRun {
  private readonly violations: CatalogViolation[] = [];
  private facts: StoreFacts | null = null;

  constructor(private readonly lookup: CatalogLookup) {}

  async execute(input: unknown): Promise<ValidationOutcome> {
    const envelope = catalogBatchEnvelopeSchema.safeParse(input);
    if (!envelope.success) {
      return {
        valid: false,
        violations: envelope.error.issues.map((issue) => issueToError('Batch', issue, {})),
      };
    }

    const batch = envelope.data;
    const users = this.parseSection(EntityKind.USER, batch.users, batchUserSchema);
    const classifications = this.parseSection(
      EntityKind.RESTAURANT_CATEGORY,
      batch.restaurantCategories,
      batchRestaurantCategorySchema
    );
    const restaurants = this.parseSection(EntityKind.RESTAURANT, batch.restaurants, batchRestaurantSchema);
    const menuCategories = this.parseSection(EntityKind.MENU_CATEGORY, batch.menuCategories, batchMenuCategorySchema);
    const menuItems = this.parseSection(EntityKind.MENU_ITEM, batch.menuItems, batchMenuItemSchema);

    const facts = await this.loadStoreFacts(users, classifications, restaurants, menuCategories, menuItems);
    this.facts = facts;

    this.checkUsers(users, facts);
    this.checkRestaurantCategories(classifications, facts);
    this.checkRestaurants(restaurants, users, classifications);
    const categoryOrders = this.checkMenuCategories(menuCategories, restaurants, facts);
    const itemOrders = this.checkMenuItems(menuItems, menuCategories, restaurants, facts);

    if (this.violations.length > 0) {
      return { valid: false, violations: this.violations };
    }

    return {
      valid: true,
      violations: [],
      plan: {
        users: users.entries.filter(isValid).map(({ index, ref, record }) => {
          const { ref: _ref, ...row } = record;
          return { index, ref, record: row };
        }),
        restaurantCategories: classifications.entries.filter(isValid).map(({ index, ref, record }) => {
          const { ref: _ref, ...row } = record;
          return { index, ref, record: row };
        }),
        restaurants: restaurants.entries.filter(isValid).map(({ index, ref, record }) => {
          const { ref: _ref, ...row } = record;
          return { index, ref, record: row };
        }),
        menuCategories: menuCategories.entries.filter(isValid).map(({ index, ref, record }) => {
          const { ref: _ref, ...row } = record;
          return { index, ref, record: { ...row, displayOrder: categoryOrders.get(index) ?? 0 } };
        }),
        menuItems: menuItems.entries.filter(isValid).map(({ index, ref, record }) => {
          const { ref: _ref, ...row } = record;
          return { index, ref, record: { ...row, displayOrder: itemOrders.get(index) ?? 0 } };
        }),
      },
    };
  }

  // ============================================
  // SHAPE
  // ============================================

  private parseSection<T extends { ref?: string }>(
    entity: EntityKindType,
    raws: unknown[],
    schema: ZodType<T, ZodTypeDef, unknown>
  ): BatchSection<T> {
    const entries: SectionEntry<T>[] = raws.map((raw, index) => {
      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        const ref = rawRef(raw);
        for (const issue of parsed.error.issues) {
          this.violations.push(issueToError(entity, issue, { index, ref }));
        }
        return { index, ref, record: null };
      }
      return { index, ref: parsed.data.ref, record: parsed.data };
    });

    reportDuplicates(
      entries,
      (entry) => entry.ref,
      (entry) => {
        this.violations.push(
          new ValidationError(entity, 'ref', `duplicate ref "${entry.ref}" in batch`, locationOf(entry))
        );
      }
    );

    const byRef = new Map<string, SectionEntry<T>>();
    for (const entry of entries) {
      if (entry.ref !== undefined && !byRef.has(entry.ref)) {
        byRef.set(entry.ref, entry);
      }
    }

    return { entity, entries, byRef };
  }

  // ============================================
  // STORE FACTS
  // ============================================

  private async loadStoreFacts(
    users: BatchSection<BatchUser>,
    classifications: BatchSection<BatchRestaurantCategory>,
    restaurants: BatchSection<BatchRestaurant>,
    menuCategories: BatchSection<BatchMenuCategory>,
    menuItems: BatchSection<BatchMenuItem>
  ): Promise<StoreFacts> {
    const validRestaurants = restaurants.entries.filter(isValid);
    const validMenuCategories = menuCategories.entries.filter(isValid);
    const validMenuItems = menuItems.entries.filter(isValid);

    const restaurantReferences = [
      ...validMenuCategories.map((entry) => entry.record.restaurantId),
      ...validMenuItems.map((entry) => entry.record.restaurantId),
    ];
    const menuCategoryIds = numericIds(validMenuItems.map((entry) => entry.record.menuCategoryId));

    const [
      storedUsers,
      restaurantCategoryIds,
      restaurantIds,
      storedMenuCategories,
      takenEmails,
      takenNames,
      categorySlots,
      itemSlots,
    ] = await Promise.all([
      this.lookup.findUsers(numericIds(validRestaurants.map((entry) => entry.record.ownerId))),
      this.lookup.findRestaurantCategoryIds(numericIds(validRestaurants.map((entry) => entry.record.categoryId))),
      this.lookup.findRestaurantIds(numericIds(restaurantReferences)),
      this.lookup.findMenuCategories(menuCategoryIds),
      this.lookup.findTakenEmails(users.entries.filter(isValid).map((entry) => entry.record.email)),
      this.lookup.findTakenRestaurantCategoryNames(
        classifications.entries.filter(isValid).map((entry) => entry.record.name)
      ),
      this.lookup.findMenuCategorySlots(numericIds(validMenuCategories.map((entry) => entry.record.restaurantId))),
      this.lookup.findMenuItemSlots(menuCategoryIds),
    ]);

    const categorySlotMap = new Map<string, Set<number>>();
    for (const slot of categorySlots) {
      const key = storeKey(slot.restaurantId);
      categorySlotMap.set(key, (categorySlotMap.get(key) ?? new Set<number>()).add(slot.displayOrder));
    }

    const itemSlotMap = new Map<string, Set<number>>();
    for (const slot of itemSlots) {
      const key = slotKey(storeKey(slot.restaurantId), storeKey(slot.menuCategoryId));
      itemSlotMap.set(key, (itemSlotMap.get(key) ?? new Set<number>()).add(slot.displayOrder));
    }

    return {
      users: new Map(storedUsers.map((user) => [user.id, user])),
      restaurantCategoryIds: new Set(restaurantCategoryIds),
      restaurantIds: new Set(restaurantIds),
      menuCategories: new Map(storedMenuCategories.map((category) => [category.id, category])),
      takenEmails: new Set(takenEmails.map((email) => email.toLowerCase())),
      takenNames: new Set(takenNames.map((name) => name.toLowerCase())),
      categorySlots: categorySlotMap,
      itemSlots: itemSlotMap,
    };
  }

  // ============================================
  // REFERENCE RESOLUTION
  // ============================================

  private resolve<B, V>(
    reference: EntityReference,
    fromStore: (id: number) => V | undefined,
    section: BatchSection<B>,
    fromBatch: (record: B) => V
  ): Resolution<V> {
    if (typeof reference === 'number') {
      const value = fromStore(reference);
      return value === undefined ? { found: false } : { found: true, key: storeKey(reference), value };
    }

    const entry = section.byRef.get(reference);
    if (!entry) {
      return { found: false };
    }
    return {
      found: true,
      key: batchKey(reference),
      value: entry.record === null ? null : fromBatch(entry.record),
    };
  }

  private resolveRestaurant(reference: EntityReference, restaurants: BatchSection<BatchRestaurant>): Resolution<true> {
    return this.resolve(
      reference,
      (id) => (this.facts?.restaurantIds.has(id) ? true : undefined),
      restaurants,
      () => true
    );
  }

  // ============================================
  // CHECKS
  // ============================================

  private checkUsers(users: BatchSection<BatchUser>, facts: StoreFacts): void {
    const valid = users.entries.filter(isValid);

    reportDuplicates(
      valid,
      (entry) => entry.record.email,
      (entry) => {
        this.violations.push(
          new ValidationError(EntityKind.USER, 'email', 'duplicate email in batch', locationOf(entry))
        );
      }
    );

    for (const entry of valid) {
      if (facts.takenEmails.has(entry.record.email)) {
        this.violations.push(StoreError.duplicateKey(EntityKind.USER, 'email', locationOf(entry)));
      }
    }
  }

  private checkRestaurantCategories(classifications: BatchSection<BatchRestaurantCategory>, facts: StoreFacts): void {
    const valid = classifications.entries.filter(isValid);

    reportDuplicates(
      valid,
      (entry) => entry.record.name.toLowerCase(),
      (entry) => {
        this.violations.push(
          new ValidationError(EntityKind.RESTAURANT_CATEGORY, 'name', 'duplicate name in batch', locationOf(entry))
        );
      }
    );

    for (const entry of valid) {
      if (facts.takenNames.has(entry.record.name.toLowerCase())) {
        this.violations.push(StoreError.duplicateKey(EntityKind.RESTAURANT_CATEGORY, 'name', locationOf(entry)));
      }
    }
  }

  private checkRestaurants(
    restaurants: BatchSection<BatchRestaurant>,
    users: BatchSection<BatchUser>,
    classifications: BatchSection<BatchRestaurantCategory>
  ): void {
    for (const entry of restaurants.entries.filter(isValid)) {
      const owner = this.resolve<BatchUser, UserRoleType>(
        entry.record.ownerId,
        (id) => this.facts?.users.get(id)?.role,
        users,
        (user) => user.role
      );

      if (!owner.found) {
        this.violations.push(new ValidationError(EntityKind.RESTAURANT, 'ownerId', 'not found', locationOf(entry)));
      } else if (owner.value !== null && !RESTAURANT_OWNER_ROLES.includes(owner.value)) {
        this.violations.push(
          new ValidationError(
            EntityKind.RESTAURANT,
            'ownerId',
            `owner must be a restaurant_admin or super_admin, not ${owner.value}`,
            locationOf(entry)
          )
        );
      }

      const classification = this.resolve(
        entry.record.categoryId,
        (id) => (this.facts?.restaurantCategoryIds.has(id) ? true : undefined),
        classifications,
        () => true
      );

      if (!classification.found) {
        this.violations.push(new ValidationError(EntityKind.RESTAURANT, 'categoryId', 'not found', locationOf(entry)));
      }
    }
  }

  private checkMenuCategories(
    menuCategories: BatchSection<BatchMenuCategory>,
    restaurants: BatchSection<BatchRestaurant>,
    facts: StoreFacts
  ): Map<number, number> {
    const slotted: Slotted<BatchMenuCategory>[] = [];

    for (const entry of menuCategories.entries.filter(isValid)) {
      const restaurant = this.resolveRestaurant(entry.record.restaurantId, restaurants);
      if (!restaurant.found) {
        this.violations.push(
          new ValidationError(EntityKind.MENU_CATEGORY, 'restaurantId', 'not found', locationOf(entry))
        );
        continue;
      }
      slotted.push({ entry, group: restaurant.key, displayOrder: entry.record.displayOrder });
    }

    this.checkSlots(EntityKind.MENU_CATEGORY, slotted, facts.categorySlots, 'category of this restaurant');
    return assignDisplayOrders(slotted, facts.categorySlots);
  }

  private checkMenuItems(
    menuItems: BatchSection<BatchMenuItem>,
    menuCategories: BatchSection<BatchMenuCategory>,
    restaurants: BatchSection<BatchRestaurant>,
    facts: StoreFacts
  ): Map<number, number> {
    const slotted: Slotted<BatchMenuItem>[] = [];

    for (const entry of menuItems.entries.filter(isValid)) {
      const restaurant = this.resolveRestaurant(entry.record.restaurantId, restaurants);
      const category = this.resolve<BatchMenuCategory, { restaurantKey: string | null }>(
        entry.record.menuCategoryId,
        (id) => {
          const stored = facts.menuCategories.get(id);
          return stored ? { restaurantKey: storeKey(stored.restaurantId) } : undefined;
        },
        menuCategories,
        (record) => {
          const owner = this.resolveRestaurant(record.restaurantId, restaurants);
          return { restaurantKey: owner.found ? owner.key : null };
        }
      );

      if (!restaurant.found) {
        this.violations.push(new ValidationError(EntityKind.MENU_ITEM, 'restaurantId', 'not found', locationOf(entry)));
      }
      if (!category.found) {
        this.violations.push(
          new ValidationError(EntityKind.MENU_ITEM, 'menuCategoryId', 'not found', locationOf(entry))
        );
      }
      if (!restaurant.found || !category.found) {
        continue;
      }

      const categoryRestaurant = category.value?.restaurantKey ?? null;
      if (categoryRestaurant !== null && categoryRestaurant !== restaurant.key) {
        this.violations.push(
          new ValidationError(
            EntityKind.MENU_ITEM,
            'menuCategoryId',
            'menu category belongs to a different restaurant',
            locationOf(entry)
          )
        );
        continue;
      }

      slotted.push({
        entry,
        group: slotKey(restaurant.key, category.key),
        displayOrder: entry.record.displayOrder,
      });
    }

    this.checkSlots(EntityKind.MENU_ITEM, slotted, facts.itemSlots, 'item in this category');
    return assignDisplayOrders(slotted, facts.itemSlots);
  }

  /**
   * Explicit display orders must be unique among batch siblings and free in the store.
   */
  private checkSlots<T>(
    entity: EntityKindType,
    slotted: Slotted<T>[],
    storeSlots: Map<string, Set<number>>,
    sibling: string
  ): void {
    reportDuplicates(
      slotted,
      (slot) => (slot.displayOrder === undefined ? undefined : `${slot.group}=${slot.displayOrder}`),
      (slot) => {
        this.violations.push(
          new ValidationError(
            entity,
            'displayOrder',
            `display order ${slot.displayOrder} is used by more than one ${sibling}`,
            locationOf(slot.entry)
          )
        );
      }
    );

    for (const slot of slotted) {
      if (slot.displayOrder !== undefined && storeSlots.get(slot.group)?.has(slot.displayOrder)) {
        this.violations.push(StoreError.duplicateKey(entity, 'displayOrder', locationOf(slot.entry)));
      }
    }
  }
}

// ============================================
// VALIDATOR
// ============================================

/**
 * Checks a whole batch against field constraints, references and uniqueness
 * before anything is written. Violations are collected, never fail-fast.
 */
export class CatalogValidator {
  constructor(private readonly lookup: CatalogLookup) {}

  async validate(input: unknown): Promise<ValidationOutcome> {
    return new ValidationRun(this.lookup).execute(input);
  }
}
