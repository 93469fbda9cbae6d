/**
 * Open Status Constants - trạng thái sử dụng của sản phẩm
 */
export const OPEN_STATUS = {
  UNOPENED: 'unopened', // default
  OPENED: 'opened',
  FINISHED: 'finished',
  DISCARDED: 'discarded',
} as const;

export type OpenStatus = typeof OPEN_STATUS[keyof typeof OPEN_STATUS];

export const OPEN_STATUS_VALUES = [
  OPEN_STATUS.UNOPENED,
  OPEN_STATUS.OPENED,
  OPEN_STATUS.FINISHED,
  OPEN_STATUS.DISCARDED,
] as const;

export const OPEN_STATUS_LABELS: Record<OpenStatus, string> = {
  unopened: 'Unopened',
  opened: 'Opened',
  finished: 'Finished',
  discarded: 'Discarded',
};

/**
 * Category Type Constants
 */
export const CATEGORY_TYPE = {
  SKINCARE: 'skincare',
  MAKEUP: 'makeup',
  FRAGRANCE: 'fragrance',
  HAIR: 'hair',
  BODY: 'body',
  OTHER: 'other',
} as const;

export type CategoryType = typeof CATEGORY_TYPE[keyof typeof CATEGORY_TYPE];

export const CATEGORY_TYPE_VALUES = [
  CATEGORY_TYPE.SKINCARE,
  CATEGORY_TYPE.MAKEUP,
  CATEGORY_TYPE.FRAGRANCE,
  CATEGORY_TYPE.HAIR,
  CATEGORY_TYPE.BODY,
  CATEGORY_TYPE.OTHER,
] as const;

export const CATEGORY_TYPE_LABELS: Record<CategoryType, string> = {
  skincare: 'Skincare',
  makeup: 'Makeup',
  fragrance: 'Fragrance',
  hair: 'Hair Care',
  body: 'Body Care',
  other: 'Other',
};

/**
 * Expiration Tier Constants
 * Thứ tự khai báo cũng là thứ tự ưu tiên khi sắp xếp (gấp nhất trước)
 */
export const EXPIRATION_TIER = {
  EXPIRED: 'expired',
  URGENT: 'urgent',
  SOON: 'soon',
  GOOD: 'good',
  UNKNOWN: 'unknown',
} as const;

export type ExpirationTier = typeof EXPIRATION_TIER[keyof typeof EXPIRATION_TIER];

export const EXPIRATION_TIER_VALUES = [
  EXPIRATION_TIER.EXPIRED,
  EXPIRATION_TIER.URGENT,
  EXPIRATION_TIER.SOON,
  EXPIRATION_TIER.GOOD,
  EXPIRATION_TIER.UNKNOWN,
] as const;

export const EXPIRATION_PRIORITY: Record<ExpirationTier, number> = {
  expired: 1,
  urgent: 2,
  soon: 3,
  good: 4,
  unknown: 5,
};

export const EXPIRATION_TIER_LABELS: Record<ExpirationTier, string> = {
  good: 'Good',
  soon: 'Expiring Soon',
  urgent: 'Urgent',
  expired: 'Expired',
  unknown: 'Unknown',
};

export const isExpirationTier = (value: unknown): value is ExpirationTier =>
  typeof value === 'string' && (EXPIRATION_TIER_VALUES as readonly string[]).includes(value);

/**
 * Expiration windows (days). Một tháng PAO được tính xấp xỉ 30 ngày.
 */
export const URGENT_WINDOW_DAYS = 7;
export const SOON_WINDOW_DAYS = 30;
export const DAYS_PER_PAO_MONTH = 30;
export const DEFAULT_PAO_MONTHS = 12;
// 20 năm, đủ cho mọi PAO in trên bao bì
export const MAX_PAO_MONTHS = 240;

/**
 * Pagination defaults cho danh sách sản phẩm
 */
export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

/**
 * Largest SERIAL / INTEGER id PostgreSQL stores (int4)
 */
export const MAX_DB_ID = 2147483647;

export const isStoredId = (value: number): boolean =>
  Number.isInteger(value) && value >= 1 && value <= MAX_DB_ID;
