import {
  DAYS_PER_PAO_MONTH,
  EXPIRATION_PRIORITY,
  EXPIRATION_TIER,
  EXPIRATION_TIER_LABELS,
  OPEN_STATUS,
  SOON_WINDOW_DAYS,
  URGENT_WINDOW_DAYS,
} from '../../constants/product.constants';
import type { ExpirationTier, OpenStatus } from '../../constants/product.constants';
import { addDays, diffInDays, minDate } from '../../utils/date';
import type { IsoDate } from '../../utils/date';

/**
 * Fields of a product the expiration rules read
 */
export interface ExpirationInput {
  expiration_date: IsoDate | null;
  status: OpenStatus;
  opened_date: IsoDate | null;
  pao_after_opening?: number | null;
}

export interface ExpirationResult {
  effectiveDate: IsoDate | null;
  daysUntil: number | null;
  status: ExpirationTier;
  priority: number;
}

export interface ExpirationBadge {
  tier: ExpirationTier;
  label: string;
  cssClass: string;
  text: string;
}

const paoMonths = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

/**
 * Printed expiration date, shortened by the PAO window once the product is opened.
 * Một tháng PAO = 30 ngày.
 */
export const getEffectiveExpirationDate = (product: ExpirationInput): IsoDate | null => {
  const months = paoMonths(product.pao_after_opening);

  if (
    product.status === OPEN_STATUS.OPENED &&
    product.opened_date &&
    months !== null &&
    product.expiration_date
  ) {
    const paoExpiry = addDays(product.opened_date, months * DAYS_PER_PAO_MONTH);
    return minDate(product.expiration_date, paoExpiry);
  }

  return product.expiration_date;
};

/**
 * Tier for a number of days left. Dùng chung cho calculator và bộ lọc danh sách.
 */
export const getTierForDays = (daysUntil: number | null): ExpirationTier => {
  if (daysUntil === null) return EXPIRATION_TIER.UNKNOWN;
  if (daysUntil < 0) return EXPIRATION_TIER.EXPIRED;
  if (daysUntil <= URGENT_WINDOW_DAYS) return EXPIRATION_TIER.URGENT;
  if (daysUntil <= SOON_WINDOW_DAYS) return EXPIRATION_TIER.SOON;
  return EXPIRATION_TIER.GOOD;
};

export const computeExpiration = (product: ExpirationInput, today: IsoDate): ExpirationResult => {
  const effectiveDate = getEffectiveExpirationDate(product);
  const daysUntil = effectiveDate === null ? null : diffInDays(today, effectiveDate);
  const status = getTierForDays(daysUntil);

  return {
    effectiveDate,
    daysUntil,
    status,
    priority: EXPIRATION_PRIORITY[status],
  };
};

export const isExpired = (product: ExpirationInput, today: IsoDate): boolean =>
  computeExpiration(product, today).status === EXPIRATION_TIER.EXPIRED;

const describeDays = (result: ExpirationResult): string => {
  const days = result.daysUntil;
  if (days === null) {
    return 'Expiration date not set';
  }

  switch (result.status) {
    case EXPIRATION_TIER.EXPIRED:
      return `Expired ${-days} days ago`;
    case EXPIRATION_TIER.URGENT:
      return `${days} days until expiration - URGENT`;
    case EXPIRATION_TIER.SOON:
      return `${days} days until expiration - SOON`;
    default:
      return `${days} days until expiration - GOOD`;
  }
};

/**
 * Status badge shown on product detail
 */
export const describeExpiration = (result: ExpirationResult): ExpirationBadge => ({
  tier: result.status,
  label: EXPIRATION_TIER_LABELS[result.status],
  cssClass: `status-${result.status}`,
  text: describeDays(result),
});
