import { DEFAULT_PAGE_SIZE, EXPIRATION_TIER } from '../../constants/product.constants';
import type {
  CosmeticProductWithRelations,
  CreateCosmeticProductInput,
  UpdateCosmeticProductInput,
} from '../../connections/db/models/cosmetic-product.model';
import { systemClock } from '../../utils/date';
import type { Clock, IsoDate } from '../../utils/date';
import { NotFoundError } from '../../utils/errors';
import { logger } from '../../utils/logging';
import type { PaginationParams } from '../../types/response.types';
import type { PaginationQuery } from '../../types/request.types';
import { computeExpiration, describeExpiration } from './expiration.calculator';
import type { ExpirationBadge, ExpirationResult } from './expiration.calculator';
import { buildProductCriteria, buildTierCountCriteria, tierDateCriterion } from './product-query.builder';
import type { FilterableTier, ProductFilterSpec } from './product-query.builder';
import { PgProductRepository } from './products.repository';
import type { ProductRepository } from './products.repository';

export interface ProductListItem extends CosmeticProductWithRelations {
  expiration: ExpirationResult;
}

export interface ProductDetail extends ProductListItem {
  badge: ExpirationBadge;
}

export type TierCounts = Record<FilterableTier | 'total', number>;

export interface ProductQueryResult {
  items: ProductListItem[];
  counts: TierCounts;
}

export interface ProductPageResult extends ProductQueryResult {
  pagination: PaginationParams;
}

export interface ExpiringOverview {
  expired: ProductListItem[];
  urgent: ProductListItem[];
  soon: ProductListItem[];
}

export class ProductService {
  constructor(
    private readonly repository: ProductRepository = new PgProductRepository(),
    private readonly clock: Clock = systemClock
  ) {}

  today(): IsoDate {
    return this.clock.today();
  }

  private withExpiration(product: CosmeticProductWithRelations, today: IsoDate): ProductListItem {
    return { ...product, expiration: computeExpiration(product, today) };
  }

  async countByTier(userId: string, today: IsoDate = this.today()): Promise<TierCounts> {
    const tierCriteria = buildTierCountCriteria(userId, today);
    const [expired, urgent, soon, good, total] = await Promise.all([
      this.repository.countProducts(tierCriteria.expired),
      this.repository.countProducts(tierCriteria.urgent),
      this.repository.countProducts(tierCriteria.soon),
      this.repository.countProducts(tierCriteria.good),
      this.repository.countProducts({ userId }),
    ]);

    return { expired, urgent, soon, good, total };
  }

  /**
   * Filtered product list of one user, ordered soonest-expiring first,
   * plus the per-tier counts of the whole collection.
   */
  async queryProducts(
    userId: string,
    filter: ProductFilterSpec,
    today: IsoDate = this.today()
  ): Promise<ProductQueryResult> {
    const criteria = buildProductCriteria(userId, filter, today);
    const [rows, counts] = await Promise.all([
      this.repository.findProducts(criteria),
      this.countByTier(userId, today),
    ]);

    return { items: rows.map(row => this.withExpiration(row, today)), counts };
  }

  /**
   * Same as queryProducts, one page at a time
   */
  async queryProductPage(
    userId: string,
    filter: ProductFilterSpec,
    paging: PaginationQuery,
    today: IsoDate = this.today()
  ): Promise<ProductPageResult> {
    const criteria = buildProductCriteria(userId, filter, today);
    const limit = paging.limit ?? DEFAULT_PAGE_SIZE;
    const [total, counts] = await Promise.all([
      this.repository.countProducts(criteria),
      this.countByTier(userId, today),
    ]);

    const totalPages = Math.max(1, Math.ceil(total / limit));
    // Trang không hợp lệ -> trang 1, vượt quá -> trang cuối
    const requested = paging.page !== undefined && Number.isInteger(paging.page) && paging.page >= 1 ? paging.page : 1;
    const page = Math.min(requested, totalPages);

    const rows = await this.repository.findProducts(criteria, { limit, offset: (page - 1) * limit });

    logger.debug('[Products] Query page', { userId, filter, page, total });

    return {
      items: rows.map(row => this.withExpiration(row, today)),
      counts,
      pagination: { page, limit, total, totalPages },
    };
  }

  async getExpiringOverview(userId: string, today: IsoDate = this.today()): Promise<ExpiringOverview> {
    const [expired, urgent, soon] = await Promise.all(
      [EXPIRATION_TIER.EXPIRED, EXPIRATION_TIER.URGENT, EXPIRATION_TIER.SOON].map(tier =>
        this.repository.findProducts({ userId, date: tierDateCriterion(tier, today) })
      )
    );

    return {
      expired: expired.map(row => this.withExpiration(row, today)),
      urgent: urgent.map(row => this.withExpiration(row, today)),
      soon: soon.map(row => this.withExpiration(row, today)),
    };
  }

  async getProduct(userId: string, id: number, today: IsoDate = this.today()): Promise<ProductDetail> {
    const product = await this.repository.findById(userId, id);
    if (!product) {
      throw new NotFoundError('Product not found');
    }

    const item = this.withExpiration(product, today);
    return { ...item, badge: describeExpiration(item.expiration) };
  }

  async createProduct(userId: string, input: CreateCosmeticProductInput): Promise<ProductListItem> {
    const product = await this.repository.create(userId, input);
    return this.withExpiration(product, this.today());
  }

  async updateProduct(userId: string, id: number, input: UpdateCosmeticProductInput): Promise<ProductListItem> {
    const product = await this.repository.update(userId, id, input);
    if (!product) {
      throw new NotFoundError('Product not found');
    }
    return this.withExpiration(product, this.today());
  }

  /**
   * @returns the deleted product, so the caller can clean up its stored image
   */
  async deleteProduct(userId: string, id: number): Promise<CosmeticProductWithRelations> {
    const product = await this.repository.findById(userId, id);
    if (!product || !(await this.repository.remove(userId, id))) {
      throw new NotFoundError('Product not found');
    }
    return product;
  }
}
