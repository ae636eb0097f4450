import { z } from 'zod';
import { USER_ROLES, WEEKDAYS, LoaderConfig } from '../../config/constants.js';

// ============================================
// SHARED FIELD SCHEMAS
// ============================================

/**
 * A stored id (positive integer) or the `ref` of a record in the same batch.
 */
export const entityReferenceSchema = z.union([
  z.number().int('Reference id must be an integer').positive('Reference id must be positive'),
  z.string().trim().min(1, 'Reference key cannot be empty'),
]);

const refSchema = z
  .string()
  .trim()
  .min(1, 'Ref cannot be empty')
  .max(100, 'Ref cannot exceed 100 characters')
  .optional();

const displayOrderSchema = z
  .number()
  .int('Display order must be an integer')
  .min(0, 'Display order cannot be negative');

const phoneSchema = z
  .string()
  .trim()
  .max(20, 'Phone cannot exceed 20 characters')
  .regex(/^\+?[0-9][0-9\s-]{6,19}$/, 'Invalid phone number format');

const emailSchema = z
  .string()
  .trim()
  .toLowerCase()
  .email('Invalid email format')
  .max(255, 'Email cannot exceed 255 characters');

const descriptionSchema = z
  .string()
  .trim()
  .max(1000, 'Description cannot exceed 1000 characters')
  .optional();

// "11:00-22:00" or "closed"
const openingHoursValueSchema = z
  .string()
  .trim()
  .regex(
    /^(closed|([01]\d|2[0-3]):[0-5]\d-([01]\d|2[0-4]):[0-5]\d)$/,
    'Opening hours must look like HH:MM-HH:MM or "closed"'
  );

const hasAtMostTwoDecimals = (amount: number): boolean =>
  Math.abs(Math.round(amount * 100) - amount * 100) < 1e-6;

// Labels become keys of a stored map, which cannot hold "." or a leading "$"
const sizeLabelSchema = z
  .string()
  .trim()
  .min(1, 'Size label cannot be empty')
  .refine((label) => !label.includes('.') && !label.startsWith('$'), 'Size label cannot contain "." or start with "$"');

const priceSchema = z
  .record(
    sizeLabelSchema,
    z
      .number()
      .finite('Price must be a finite number')
      .positive('Price must be positive')
      .refine(hasAtMostTwoDecimals, 'Price cannot have more than two decimal places')
  )
  .refine((price) => Object.keys(price).length > 0, 'At least one price entry is required');

const labelListSchema = z.array(z.string().trim().min(1, 'Entries cannot be empty')).default([]);

// ============================================
// RECORD SCHEMAS
// ============================================

export const batchUserSchema = z.object({
  ref: refSchema,
  email: emailSchema,
  fullName: z
    .string()
    .trim()
    .min(2, 'Full name must be at least 2 characters')
    .max(255, 'Full name cannot exceed 255 characters'),
  phone: phoneSchema.optional(),
  role: z.enum(USER_ROLES).default('customer'),
  isActive: z.boolean().default(true),
});

export const batchRestaurantCategorySchema = z.object({
  ref: refSchema,
  name: z
    .string()
    .trim()
    .min(2, 'Category name must be at least 2 characters')
    .max(100, 'Category name cannot exceed 100 characters'),
  description: descriptionSchema,
  icon: z.string().trim().max(255, 'Icon cannot exceed 255 characters').optional(),
  isActive: z.boolean().default(true),
});

export const batchRestaurantSchema = z
  .object({
    ref: refSchema,
    name: z
      .string()
      .trim()
      .min(2, 'Restaurant name must be at least 2 characters')
      .max(255, 'Restaurant name cannot exceed 255 characters'),
    description: descriptionSchema,
    address: z.string().trim().min(1, 'Address is required').max(500, 'Address cannot exceed 500 characters'),
    latitude: z.number().min(-90, 'Latitude must be between -90 and 90').max(90, 'Latitude must be between -90 and 90').optional(),
    longitude: z
      .number()
      .min(-180, 'Longitude must be between -180 and 180')
      .max(180, 'Longitude must be between -180 and 180')
      .optional(),
    phone: phoneSchema.optional(),
    email: emailSchema.optional(),
    categoryId: entityReferenceSchema,
    ownerId: entityReferenceSchema,
    imageUrl: z.string().url('Invalid image URL').optional(),
    openingHours: z.record(z.enum(WEEKDAYS), openingHoursValueSchema).optional(),
    isActive: z.boolean().default(true),
  })
  .superRefine((restaurant, ctx) => {
    if ((restaurant.latitude === undefined) !== (restaurant.longitude === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [restaurant.latitude === undefined ? 'latitude' : 'longitude'],
        message: 'Latitude and longitude must be provided together',
      });
    }
  });

export const batchMenuCategorySchema = z.object({
  ref: refSchema,
  restaurantId: entityReferenceSchema,
  name: z
    .string()
    .trim()
    .min(2, 'Category name must be at least 2 characters')
    .max(100, 'Category name cannot exceed 100 characters'),
  description: descriptionSchema,
  displayOrder: displayOrderSchema.optional(),
  isActive: z.boolean().default(true),
});

export const batchMenuItemSchema = z.object({
  ref: refSchema,
  restaurantId: entityReferenceSchema,
  menuCategoryId: entityReferenceSchema,
  name: z
    .string()
    .trim()
    .min(2, 'Menu item name must be at least 2 characters')
    .max(255, 'Menu item name cannot exceed 255 characters'),
  description: descriptionSchema,
  price: priceSchema,
  imageUrl: z.string().url('Invalid image URL').optional(),
  isVegetarian: z.boolean().default(false),
  isVegan: z.boolean().default(false),
  isGlutenFree: z.boolean().default(false),
  ingredients: labelListSchema,
  allergens: labelListSchema,
  isAvailable: z.boolean().default(true),
  displayOrder: displayOrderSchema.optional(),
});

// ============================================
// BATCH ENVELOPE
// ============================================

/**
 * Envelope only: records are checked one by one so that a bad record does not
 * hide the problems of the others.
 */
export const catalogBatchEnvelopeSchema = z
  .object({
    users: z.array(z.unknown()).default([]),
    restaurantCategories: z.array(z.unknown()).default([]),
    restaurants: z.array(z.unknown()).default([]),
    menuCategories: z.array(z.unknown()).default([]),
    menuItems: z.array(z.unknown()).default([]),
  })
  .strict()
  .refine(
    (batch) =>
      batch.users.length +
        batch.restaurantCategories.length +
        batch.restaurants.length +
        batch.menuCategories.length +
        batch.menuItems.length <=
      LoaderConfig.MAX_BATCH_SIZE,
    `A batch cannot hold more than ${LoaderConfig.MAX_BATCH_SIZE} records`
  );

// ============================================
// QUERY SCHEMAS
// ============================================

export const loadQuerySchema = z.object({
  timeoutMs: z
    .string()
    .regex(/^\d+$/, 'timeoutMs must be a whole number of milliseconds')
    .optional()
    .transform((val) => (val ? parseInt(val, 10) : undefined))
    .refine(
      (val) => val === undefined || (val > 0 && val <= LoaderConfig.MAX_TIMEOUT_MS),
      `timeoutMs must be between 1 and ${LoaderConfig.MAX_TIMEOUT_MS}`
    ),
});

export const restaurantIdParamSchema = z.object({
  id: z
    .string()
    .regex(/^[1-9]\d*$/, 'Invalid restaurant ID format')
    .transform((val) => parseInt(val, 10)),
});

// ============================================
// TYPE EXPORTS
// ============================================

export type EntityReference = z.infer<typeof entityReferenceSchema>;
export type BatchUser = z.infer<typeof batchUserSchema>;
export type BatchRestaurantCategory = z.infer<typeof batchRestaurantCategorySchema>;
export type BatchRestaurant = z.infer<typeof batchRestaurantSchema>;
export type BatchMenuCategory = z.infer<typeof batchMenuCategorySchema>;
export type BatchMenuItem = z.infer<typeof batchMenuItemSchema>;
export type LoadQuery = z.infer<typeof loadQuerySchema>;

/**
 * Batch as callers write it (defaults not yet applied).
 */
export interface CatalogBatch {
  users?: z.input<typeof batchUserSchema>[];
  restaurantCategories?: z.input<typeof batchRestaurantCategorySchema>[];
  restaurants?: z.input<typeof batchRestaurantSchema>[];
  menuCategories?: z.input<typeof batchMenuCategorySchema>[];
  menuItems?: z.input<typeof batchMenuItemSchema>[];
}
