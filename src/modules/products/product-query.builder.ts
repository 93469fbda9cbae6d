import {
  EXPIRATION_TIER,
  SOON_WINDOW_DAYS,
  URGENT_WINDOW_DAYS,
} from '../../constants/product.constants';
import type { ExpirationTier } from '../../constants/product.constants';
import { addDays } from '../../utils/date';
import type { IsoDate } from '../../utils/date';
import type { ProductCriteria, ProductDateCriterion } from './products.repository';

/**
 * Filter chosen on the product list. Giá trị không hợp lệ đã bị bỏ qua ở bước validate.
 */
export interface ProductFilterSpec {
  status_tier?: ExpirationTier;
  category_id?: number;
  search_text?: string;
}

export type FilterableTier = Exclude<ExpirationTier, 'unknown'>;

export const COUNTED_TIERS: readonly FilterableTier[] = [
  EXPIRATION_TIER.EXPIRED,
  EXPIRATION_TIER.URGENT,
  EXPIRATION_TIER.SOON,
  EXPIRATION_TIER.GOOD,
];

/**
 * Inclusive range of effective expiration dates belonging to a tier.
 * Khớp với getTierForDays: urgent 0..7 ngày, soon 8..30 ngày, good > 30 ngày.
 */
export const tierDateCriterion = (tier: ExpirationTier, today: IsoDate): ProductDateCriterion => {
  switch (tier) {
    case EXPIRATION_TIER.EXPIRED:
      return { kind: 'range', to: addDays(today, -1) };
    case EXPIRATION_TIER.URGENT:
      return { kind: 'range', from: today, to: addDays(today, URGENT_WINDOW_DAYS) };
    case EXPIRATION_TIER.SOON:
      return {
        kind: 'range',
        from: addDays(today, URGENT_WINDOW_DAYS + 1),
        to: addDays(today, SOON_WINDOW_DAYS),
      };
    case EXPIRATION_TIER.GOOD:
      return { kind: 'range', from: addDays(today, SOON_WINDOW_DAYS + 1) };
    case EXPIRATION_TIER.UNKNOWN:
      return { kind: 'missing' };
  }
};

export const buildProductCriteria = (
  userId: string,
  filter: ProductFilterSpec,
  today: IsoDate
): ProductCriteria => {
  const criteria: ProductCriteria = { userId };

  if (filter.status_tier) {
    criteria.date = tierDateCriterion(filter.status_tier, today);
  }

  if (filter.category_id !== undefined) {
    criteria.categoryId = filter.category_id;
  }

  const search = filter.search_text?.trim();
  if (search) {
    criteria.search = search;
  }

  return criteria;
};

/**
 * Criteria for the dashboard badges: whole collection of the user, one per tier
 */
export const buildTierCountCriteria = (
  userId: string,
  today: IsoDate
): Record<FilterableTier, ProductCriteria> => ({
  expired: { userId, date: tierDateCriterion(EXPIRATION_TIER.EXPIRED, today) },
  urgent: { userId, date: tierDateCriterion(EXPIRATION_TIER.URGENT, today) },
  soon: { userId, date: tierDateCriterion(EXPIRATION_TIER.SOON, today) },
  good: { userId, date: tierDateCriterion(EXPIRATION_TIER.GOOD, today) },
});
