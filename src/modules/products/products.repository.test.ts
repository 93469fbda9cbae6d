import { describe, expect, it, vi } from 'vitest';
import type { Queryable } from '../../connections';
import { buildWhereClause, EFFECTIVE_EXPIRATION_SQL, escapeLikePattern, PgProductRepository } from './products.repository';

const fakeDb = (...results: { rows: unknown[] }[]) => {
  const query = vi.fn();
  for (const result of results) {
    query.mockResolvedValueOnce(result);
  }
  return { query, db: { query } as unknown as Queryable };
};

describe('escapeLikePattern', () => {
  it('escapes LIKE wildcards and backslashes', () => {
    expect(escapeLikePattern('50%_off')).toBe('50\\%\\_off');
    expect(escapeLikePattern('a\\b')).toBe('a\\\\b');
    expect(escapeLikePattern('rose')).toBe('rose');
  });
});

describe('buildWhereClause', () => {
  it('scopes by user only when there are no filters', () => {
    expect(buildWhereClause({ userId: 'user-1' })).toEqual({
      clause: 'WHERE p.user_id = $1',
      params: ['user-1'],
    });
  });

  it('numbers parameters in order for every filter', () => {
    const result = buildWhereClause({
      userId: 'user-1',
      date: { kind: 'range', from: '2026-10-26', to: '2026-11-17' },
      categoryId: 4,
      search: '50%',
    });

    expect(result.params).toEqual(['user-1', '2026-10-26', '2026-11-17', 4, '%50\\%%']);
    expect(result.clause).toBe(
      'WHERE p.user_id = $1' +
        ` AND ${EFFECTIVE_EXPIRATION_SQL} >= $2` +
        ` AND ${EFFECTIVE_EXPIRATION_SQL} <= $3` +
        ' AND p.category_id = $4' +
        ' AND (p.name ILIKE $5 OR b.name ILIKE $5 OR c.name ILIKE $5 OR p.shade ILIKE $5)'
    );
  });

  it('uses an open-ended range for expired products', () => {
    expect(buildWhereClause({ userId: 'user-1', date: { kind: 'range', to: '2026-10-17' } })).toEqual({
      clause: `WHERE p.user_id = $1 AND ${EFFECTIVE_EXPIRATION_SQL} <= $2`,
      params: ['user-1', '2026-10-17'],
    });
  });

  it('matches nothing for category ids that cannot be stored', () => {
    const expected = { clause: 'WHERE p.user_id = $1 AND FALSE', params: ['user-1'] };

    expect(buildWhereClause({ userId: 'user-1', categoryId: 0 })).toEqual(expected);
    expect(buildWhereClause({ userId: 'user-1', categoryId: -1 })).toEqual(expected);
    expect(buildWhereClause({ userId: 'user-1', categoryId: 99999999999 })).toEqual(expected);
  });

  it('matches a missing date without parameters', () => {
    expect(buildWhereClause({ userId: 'user-1', date: { kind: 'missing' } })).toEqual({
      clause: `WHERE p.user_id = $1 AND ${EFFECTIVE_EXPIRATION_SQL} IS NULL`,
      params: ['user-1'],
    });
  });
});

describe('PgProductRepository', () => {
  it('counts matching products', async () => {
    const { query, db } = fakeDb({ rows: [{ count: '7' }] });
    const repository = new PgProductRepository(db);

    await expect(repository.countProducts({ userId: 'user-1', categoryId: 2 })).resolves.toBe(7);
    expect(query).toHaveBeenCalledWith(
      'SELECT COUNT(*) AS count FROM cosmetic_products p ' +
        'JOIN brands b ON b.id = p.brand_id ' +
        'LEFT JOIN categories c ON c.id = p.category_id ' +
        'WHERE p.user_id = $1 AND p.category_id = $2',
      ['user-1', 2]
    );
  });

  it('orders by effective date and appends paging parameters', async () => {
    const { query, db } = fakeDb({ rows: [] });
    const repository = new PgProductRepository(db);

    await repository.findProducts({ userId: 'user-1' }, { limit: 10, offset: 20 });

    const [sql, params] = query.mock.calls[0];
    expect(sql).toContain(
      `WHERE p.user_id = $1 ORDER BY ${EFFECTIVE_EXPIRATION_SQL} ASC NULLS LAST, b.name ASC, p.name ASC, p.id ASC LIMIT $2 OFFSET $3`
    );
    expect(params).toEqual(['user-1', 10, 20]);
  });

  it('updates only the given fields of an owned product', async () => {
    const { query, db } = fakeDb({ rows: [] });
    const repository = new PgProductRepository(db);

    await expect(repository.update('user-1', 5, { name: 'Renamed', rating: 4 })).resolves.toBeNull();
    expect(query).toHaveBeenCalledTimes(1);
    expect(query).toHaveBeenCalledWith(
      'UPDATE cosmetic_products SET name = $1, rating = $2, updated_at = NOW() WHERE id = $3 AND user_id = $4 RETURNING id',
      ['Renamed', 4, 5, 'user-1']
    );
  });

  it('inserts the provided columns and reloads the row', async () => {
    const row = { id: 11, name: 'Serum', brand_name: 'Derma Basics' };
    const { query, db } = fakeDb({ rows: [{ id: 11 }] }, { rows: [row] });
    const repository = new PgProductRepository(db);

    await expect(
      repository.create('user-1', { brand_id: 2, name: 'Serum', expiration_date: '2027-01-01', pao_after_opening: null })
    ).resolves.toEqual(row);
    expect(query.mock.calls[0]).toEqual([
      'INSERT INTO cosmetic_products (user_id, brand_id, name, expiration_date, pao_after_opening) VALUES ($1, $2, $3, $4, $5) RETURNING id',
      ['user-1', 2, 'Serum', '2027-01-01', null],
    ]);
    expect(query.mock.calls[1][1]).toEqual([11, 'user-1']);
  });

  it('reports whether a delete removed a row', async () => {
    const { db } = fakeDb({ rows: [{ id: 5 }] }, { rows: [] });
    const repository = new PgProductRepository(db);

    await expect(repository.remove('user-1', 5)).resolves.toBe(true);
    await expect(repository.remove('user-1', 5)).resolves.toBe(false);
  });
});
