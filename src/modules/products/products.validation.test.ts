import { describe, expect, it } from 'vitest';
import { createProductSchema, productIdSchema, productListQuerySchema, updateProductSchema } from './products.validation';

const minimalProduct = { brand_id: 1, name: 'Vitamin C Serum', expiration_date: '2027-05-01' };

describe('createProductSchema', () => {
  it('defaults the period after opening to 12 months', () => {
    expect(createProductSchema.parse(minimalProduct).pao_after_opening).toBe(12);
  });

  it('keeps an explicit null as no PAO limit', () => {
    expect(createProductSchema.parse({ ...minimalProduct, pao_after_opening: null }).pao_after_opening).toBeNull();
  });

  it('rejects a negative period after opening', () => {
    const result = createProductSchema.safeParse({ ...minimalProduct, pao_after_opening: -1 });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0].message).toBe('Period after opening cannot be negative');
  });

  it('caps the period after opening at 240 months', () => {
    const opened = { ...minimalProduct, status: 'opened', opened_date: '2026-10-01' };

    expect(createProductSchema.parse({ ...opened, pao_after_opening: 240 }).pao_after_opening).toBe(240);

    const tooLong = createProductSchema.safeParse({ ...opened, pao_after_opening: 100000 });
    expect(tooLong.success).toBe(false);
    expect(tooLong.error?.issues[0].message).toBe('Period after opening cannot exceed 240 months');
  });

  it('does not let clients set the image URL', () => {
    const parsed = createProductSchema.parse({
      ...minimalProduct,
      image_url: 'http://localhost:3000/uploads/cosmetics/other-user.jpg',
    });

    expect(parsed).not.toHaveProperty('image_url');
  });

  it('rejects brand and category ids beyond the database range', () => {
    expect(createProductSchema.safeParse({ ...minimalProduct, brand_id: 2147483648 }).success).toBe(false);
    expect(createProductSchema.safeParse({ ...minimalProduct, category_id: 2147483647 }).success).toBe(true);
  });

  it('requires a real expiration date', () => {
    expect(createProductSchema.safeParse({ ...minimalProduct, expiration_date: '2027-02-30' }).success).toBe(false);
    expect(createProductSchema.safeParse({ brand_id: 1, name: 'No Date' }).success).toBe(false);
  });

  it('rejects unknown open statuses and out-of-range ratings', () => {
    expect(createProductSchema.safeParse({ ...minimalProduct, status: 'half-used' }).success).toBe(false);
    expect(createProductSchema.safeParse({ ...minimalProduct, rating: 6 }).success).toBe(false);
  });

  it('trims the product name', () => {
    expect(createProductSchema.parse({ ...minimalProduct, name: '  Lip Balm ' }).name).toBe('Lip Balm');
  });
});

describe('updateProductSchema', () => {
  it('accepts a partial update', () => {
    expect(updateProductSchema.parse({ status: 'opened', opened_date: '2026-10-01' })).toEqual({
      status: 'opened',
      opened_date: '2026-10-01',
    });
  });

  it('rejects an empty body', () => {
    expect(updateProductSchema.safeParse({}).success).toBe(false);
  });

  it('ignores an image URL sent in the body', () => {
    expect(updateProductSchema.safeParse({ image_url: 'http://localhost:3000/uploads/cosmetics/a.jpg' }).success).toBe(
      false
    );
    expect(updateProductSchema.parse({ name: 'Renamed', image_url: 'http://localhost:3000/uploads/x.jpg' })).toEqual({
      name: 'Renamed',
    });
  });
});

describe('productListQuerySchema', () => {
  it('parses valid filters from the query string', () => {
    expect(
      productListQuerySchema.parse({ status: 'soon', category: '4', search: ' rose ', page: '2', limit: '20' })
    ).toEqual({ status: 'soon', category: 4, search: 'rose', page: 2, limit: 20 });
  });

  it('treats invalid filters as no filter', () => {
    expect(
      productListQuerySchema.parse({ status: 'bogus', category: 'abc', search: '   ', page: '0', limit: '500' })
    ).toEqual({ status: undefined, category: undefined, search: undefined, page: undefined, limit: 10 });
  });

  it('keeps integer categories that cannot exist as a filter', () => {
    expect(productListQuerySchema.parse({ category: '0' }).category).toBe(0);
    expect(productListQuerySchema.parse({ category: '-1' }).category).toBe(-1);
    expect(productListQuerySchema.parse({ category: '99999999999' }).category).toBe(99999999999);
  });

  it('ignores categories that are not integers', () => {
    expect(productListQuerySchema.parse({ category: '1e20' }).category).toBeUndefined();
    expect(productListQuerySchema.parse({ category: '2.5' }).category).toBeUndefined();
    expect(productListQuerySchema.parse({ category: '' }).category).toBeUndefined();
  });

  it('accepts the unknown tier', () => {
    expect(productListQuerySchema.parse({ status: 'unknown' }).status).toBe('unknown');
  });
});

describe('productIdSchema', () => {
  it('accepts positive integer ids only', () => {
    expect(productIdSchema.parse('12')).toBe(12);
    expect(productIdSchema.safeParse('abc').success).toBe(false);
    expect(productIdSchema.safeParse('0').success).toBe(false);
    expect(productIdSchema.parse('2147483647')).toBe(2147483647);
    expect(productIdSchema.safeParse('99999999999').success).toBe(false);
  });
});
