/**
 * Application Constants
 * Central location for all app-wide constant values
 */

// User Roles
export const UserRole = {
  CUSTOMER: 'customer',
  RESTAURANT_ADMIN: 'restaurant_admin',
  SUPER_ADMIN: 'super_admin',
} as const;

export type UserRoleType = (typeof UserRole)[keyof typeof UserRole];

export const USER_ROLES = [UserRole.CUSTOMER, UserRole.RESTAURANT_ADMIN, UserRole.SUPER_ADMIN] as const;

// Roles allowed to own a restaurant
export const RESTAURANT_OWNER_ROLES: readonly UserRoleType[] = [
  UserRole.RESTAURANT_ADMIN,
  UserRole.SUPER_ADMIN,
];

// Opening hours are keyed by weekday
export const WEEKDAYS = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

// Catalog entity kinds
export const EntityKind = {
  USER: 'User',
  RESTAURANT_CATEGORY: 'RestaurantCategory',
  RESTAURANT: 'Restaurant',
  MENU_CATEGORY: 'MenuCategory',
  MENU_ITEM: 'MenuItem',
} as const;

export type EntityKindType = (typeof EntityKind)[keyof typeof EntityKind];

// Entity -> entities it references. Persistence order is derived from this graph.
export const EntityDependencies: Record<EntityKindType, EntityKindType[]> = {
  [EntityKind.USER]: [],
  [EntityKind.RESTAURANT_CATEGORY]: [],
  [EntityKind.RESTAURANT]: [EntityKind.USER, EntityKind.RESTAURANT_CATEGORY],
  [EntityKind.MENU_CATEGORY]: [EntityKind.RESTAURANT],
  [EntityKind.MENU_ITEM]: [EntityKind.RESTAURANT, EntityKind.MENU_CATEGORY],
};

// Load batch states
export const LoadState = {
  RECEIVED: 'Received',
  VALIDATED: 'Validated',
  PERSISTING: 'Persisting',
  COMMITTED: 'Committed',
  REJECTED: 'Rejected',
  ROLLED_BACK: 'RolledBack',
} as const;

export type LoadStateType = (typeof LoadState)[keyof typeof LoadState];

// Load state flow for validation
export const LoadStateFlow: Record<LoadStateType, LoadStateType[]> = {
  [LoadState.RECEIVED]: [LoadState.VALIDATED, LoadState.REJECTED],
  [LoadState.VALIDATED]: [LoadState.PERSISTING, LoadState.REJECTED],
  [LoadState.PERSISTING]: [LoadState.COMMITTED, LoadState.ROLLED_BACK],
  [LoadState.COMMITTED]: [],
  [LoadState.REJECTED]: [],
  [LoadState.ROLLED_BACK]: [],
};

/**
 * A positive whole number from the environment, or `fallback` when the
 * variable is unset or holds anything else.
 */
export const positiveIntFromEnv = (value: string | undefined, fallback: number): number => {
  if (value === undefined || !/^\s*\d+\s*$/.test(value)) {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return parsed > 0 ? parsed : fallback;
};

const MAX_TIMEOUT_MS = 5 * 60 * 1000; // 5 minutes

// Loader Configuration
export const LoaderConfig = {
  DEFAULT_TIMEOUT_MS: Math.min(positiveIntFromEnv(process.env['CATALOG_LOAD_TIMEOUT_MS'], 30000), MAX_TIMEOUT_MS),
  MAX_TIMEOUT_MS,
  MAX_BATCH_SIZE: positiveIntFromEnv(process.env['CATALOG_MAX_BATCH_SIZE'], 5000),
} as const;

// HTTP Status Codes
export const HttpStatus = {
  OK: 200,
  CREATED: 201,
  NO_CONTENT: 204,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  PAYLOAD_TOO_LARGE: 413,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
  GATEWAY_TIMEOUT: 504,
} as const;

// Error Messages
export const ErrorMessages = {
  NOT_FOUND: 'Resource not found',
  RESTAURANT_NOT_FOUND: 'Restaurant not found',
  INTERNAL_ERROR: 'Internal server error',
  BATCH_REJECTED: 'Catalog batch rejected',
  BATCH_ROLLED_BACK: 'Catalog batch rolled back',
} as const;

export default {
  UserRole,
  USER_ROLES,
  RESTAURANT_OWNER_ROLES,
  WEEKDAYS,
  EntityKind,
  EntityDependencies,
  LoadState,
  LoadStateFlow,
  LoaderConfig,
  HttpStatus,
  ErrorMessages,
};
