import { pool } from '../../connections';
import type { Queryable } from '../../connections';
import { DAYS_PER_PAO_MONTH, isStoredId } from '../../constants/product.constants';
import type {
  CosmeticProductWithRelations,
  CreateCosmeticProductInput,
  UpdateCosmeticProductInput,
} from '../../connections/db/models/cosmetic-product.model';
import type { IsoDate } from '../../utils/date';

export type ProductDateCriterion =
  | { kind: 'range'; from?: IsoDate; to?: IsoDate }
  | { kind: 'missing' };

/**
 * What the product list asks of storage. Luôn giới hạn theo user sở hữu.
 */
export interface ProductCriteria {
  userId: string;
  date?: ProductDateCriterion; // áp dụng lên effective expiration date
  categoryId?: number;
  search?: string; // name, brand, category, shade - không phân biệt hoa thường
}

export interface ProductPage {
  limit: number;
  offset: number;
}

export interface ProductRepository {
  /**
   * Matching products ordered by effective expiration date (sớm nhất trước, chưa có ngày xếp cuối),
   * then brand name, then product name.
   */
  findProducts(criteria: ProductCriteria, page?: ProductPage): Promise<CosmeticProductWithRelations[]>;
  countProducts(criteria: ProductCriteria): Promise<number>;
  findById(userId: string, id: number): Promise<CosmeticProductWithRelations | null>;
  create(userId: string, input: CreateCosmeticProductInput): Promise<CosmeticProductWithRelations>;
  update(userId: string, id: number, input: UpdateCosmeticProductInput): Promise<CosmeticProductWithRelations | null>;
  remove(userId: string, id: number): Promise<boolean>;
}

/**
 * Same rule as getEffectiveExpirationDate, evaluated by PostgreSQL (date + integer = date)
 */
export const EFFECTIVE_EXPIRATION_SQL =
  "(CASE WHEN p.status = 'opened' AND p.opened_date IS NOT NULL AND p.pao_after_opening IS NOT NULL " +
  `THEN LEAST(p.expiration_date, p.opened_date + p.pao_after_opening * ${DAYS_PER_PAO_MONTH}) ` +
  'ELSE p.expiration_date END)';

const SELECT_WITH_RELATIONS =
  'SELECT p.*, b.name AS brand_name, c.name AS category_name, c.category_type ' +
  'FROM cosmetic_products p ' +
  'JOIN brands b ON b.id = p.brand_id ' +
  'LEFT JOIN categories c ON c.id = p.category_id';

const COUNT_WITH_RELATIONS =
  'SELECT COUNT(*) AS count ' +
  'FROM cosmetic_products p ' +
  'JOIN brands b ON b.id = p.brand_id ' +
  'LEFT JOIN categories c ON c.id = p.category_id';

const ORDER_BY = `ORDER BY ${EFFECTIVE_EXPIRATION_SQL} ASC NULLS LAST, b.name ASC, p.name ASC, p.id ASC`;

const WRITABLE_FIELDS = [
  'brand_id',
  'category_id',
  'name',
  'shade',
  'capacity',
  'purchase_date',
  'price',
  'purchase_location',
  'production_date',
  'expiration_date',
  'status',
  'opened_date',
  'pao_after_opening',
  'rating',
  'description',
  'ingredients',
  'notes',
  'image_url',
] as const satisfies readonly (keyof CreateCosmeticProductInput)[];

/**
 * Escape LIKE wildcards so search text is matched literally
 */
export const escapeLikePattern = (value: string): string => value.replace(/[\\%_]/g, '\\$&');

export const buildWhereClause = (criteria: ProductCriteria): { clause: string; params: unknown[] } => {
  const params: unknown[] = [criteria.userId];
  const conditions: string[] = ['p.user_id = $1'];

  if (criteria.date?.kind === 'missing') {
    conditions.push(`${EFFECTIVE_EXPIRATION_SQL} IS NULL`);
  } else if (criteria.date) {
    if (criteria.date.from) {
      params.push(criteria.date.from);
      conditions.push(`${EFFECTIVE_EXPIRATION_SQL} >= $${params.length}`);
    }
    if (criteria.date.to) {
      params.push(criteria.date.to);
      conditions.push(`${EFFECTIVE_EXPIRATION_SQL} <= $${params.length}`);
    }
  }

  if (criteria.categoryId !== undefined) {
    if (isStoredId(criteria.categoryId)) {
      params.push(criteria.categoryId);
      conditions.push(`p.category_id = $${params.length}`);
    } else {
      // id ngoài khoảng int4 không thể tồn tại
      conditions.push('FALSE');
    }
  }

  if (criteria.search) {
    params.push(`%${escapeLikePattern(criteria.search)}%`);
    const n = params.length;
    conditions.push(
      `(p.name ILIKE $${n} OR b.name ILIKE $${n} OR c.name ILIKE $${n} OR p.shade ILIKE $${n})`
    );
  }

  return { clause: `WHERE ${conditions.join(' AND ')}`, params };
};

export class PgProductRepository implements ProductRepository {
  constructor(private readonly db: Queryable = pool) {}

  async findProducts(criteria: ProductCriteria, page?: ProductPage): Promise<CosmeticProductWithRelations[]> {
    const { clause, params } = buildWhereClause(criteria);
    let query = `${SELECT_WITH_RELATIONS} ${clause} ${ORDER_BY}`;

    if (page) {
      params.push(page.limit);
      query += ` LIMIT $${params.length}`;
      params.push(page.offset);
      query += ` OFFSET $${params.length}`;
    }

    const result = await this.db.query<CosmeticProductWithRelations>(query, params);
    return result.rows;
  }

  async countProducts(criteria: ProductCriteria): Promise<number> {
    const { clause, params } = buildWhereClause(criteria);
    const result = await this.db.query<{ count: string }>(`${COUNT_WITH_RELATIONS} ${clause}`, params);
    return parseInt(result.rows[0].count);
  }

  async findById(userId: string, id: number): Promise<CosmeticProductWithRelations | null> {
    const result = await this.db.query<CosmeticProductWithRelations>(
      `${SELECT_WITH_RELATIONS} WHERE p.id = $1 AND p.user_id = $2`,
      [id, userId]
    );
    return result.rows[0] ?? null;
  }

  async create(userId: string, input: CreateCosmeticProductInput): Promise<CosmeticProductWithRelations> {
    const columns: string[] = ['user_id'];
    const values: unknown[] = [userId];

    for (const field of WRITABLE_FIELDS) {
      if (input[field] !== undefined) {
        columns.push(field);
        values.push(input[field]);
      }
    }

    const placeholders = values.map((_, index) => `$${index + 1}`);
    const result = await this.db.query<{ id: number }>(
      `INSERT INTO cosmetic_products (${columns.join(', ')}) VALUES (${placeholders.join(', ')}) RETURNING id`,
      values
    );

    const created = await this.findById(userId, result.rows[0].id);
    if (!created) {
      throw new Error(`Product ${result.rows[0].id} disappeared after insert`);
    }
    return created;
  }

  async update(
    userId: string,
    id: number,
    input: UpdateCosmeticProductInput
  ): Promise<CosmeticProductWithRelations | null> {
    const updateFields: string[] = [];
    const values: unknown[] = [];

    for (const field of WRITABLE_FIELDS) {
      if (input[field] !== undefined) {
        values.push(input[field]);
        updateFields.push(`${field} = $${values.length}`);
      }
    }

    updateFields.push('updated_at = NOW()');
    values.push(id);
    const idParam = values.length;
    values.push(userId);
    const userParam = values.length;

    const result = await this.db.query<{ id: number }>(
      `UPDATE cosmetic_products SET ${updateFields.join(', ')} WHERE id = $${idParam} AND user_id = $${userParam} RETURNING id`,
      values
    );

    if (result.rows.length === 0) {
      return null;
    }

    return this.findById(userId, id);
  }

  async remove(userId: string, id: number): Promise<boolean> {
    const result = await this.db.query<{ id: number }>(
      'DELETE FROM cosmetic_products WHERE id = $1 AND user_id = $2 RETURNING id',
      [id, userId]
    );
    return result.rows.length > 0;
  }
}
