import { describe, expect, it } from 'vitest';
import {
  computeExpiration,
  describeExpiration,
  getEffectiveExpirationDate,
  getTierForDays,
  isExpired,
} from './expiration.calculator';
import type { ExpirationInput } from './expiration.calculator';
import { addDays } from '../../utils/date';

const TODAY = '2026-10-18';

const unopened = (expiration_date: string | null): ExpirationInput => ({
  expiration_date,
  status: 'unopened',
  opened_date: null,
  pao_after_opening: 12,
});

describe('computeExpiration', () => {
  it('classifies tier boundaries by days left', () => {
    expect(computeExpiration(unopened('2026-10-17'), TODAY)).toEqual({
      effectiveDate: '2026-10-17',
      daysUntil: -1,
      status: 'expired',
      priority: 1,
    });
    expect(computeExpiration(unopened('2026-10-18'), TODAY)).toEqual({
      effectiveDate: '2026-10-18',
      daysUntil: 0,
      status: 'urgent',
      priority: 2,
    });
    expect(computeExpiration(unopened('2026-10-25'), TODAY).status).toBe('urgent');
    expect(computeExpiration(unopened('2026-10-26'), TODAY)).toEqual({
      effectiveDate: '2026-10-26',
      daysUntil: 8,
      status: 'soon',
      priority: 3,
    });
    expect(computeExpiration(unopened('2026-11-17'), TODAY).status).toBe('soon');
    expect(computeExpiration(unopened('2026-11-18'), TODAY)).toEqual({
      effectiveDate: '2026-11-18',
      daysUntil: 31,
      status: 'good',
      priority: 4,
    });
  });

  it('reports unknown when there is no expiration date', () => {
    expect(computeExpiration(unopened(null), TODAY)).toEqual({
      effectiveDate: null,
      daysUntil: null,
      status: 'unknown',
      priority: 5,
    });
  });

  it('shortens the date of an opened product to its PAO window', () => {
    const product: ExpirationInput = {
      expiration_date: '2027-12-31',
      status: 'opened',
      opened_date: '2026-06-01',
      pao_after_opening: 4,
    };

    expect(computeExpiration(product, TODAY)).toEqual({
      effectiveDate: '2026-09-29',
      daysUntil: -19,
      status: 'expired',
      priority: 1,
    });
  });

  it('keeps the printed date when it comes before the PAO window ends', () => {
    const product: ExpirationInput = {
      expiration_date: '2026-11-01',
      status: 'opened',
      opened_date: '2026-10-01',
      pao_after_opening: 12,
    };

    expect(computeExpiration(product, TODAY)).toEqual({
      effectiveDate: '2026-11-01',
      daysUntil: 14,
      status: 'soon',
      priority: 3,
    });
  });

  it('treats a zero-month PAO as expiring on the opening day', () => {
    const product: ExpirationInput = {
      expiration_date: '2027-01-01',
      status: 'opened',
      opened_date: '2026-10-10',
      pao_after_opening: 0,
    };

    expect(computeExpiration(product, TODAY).daysUntil).toBe(-8);
  });

  it('ignores PAO unless the product is opened with an opening date and a PAO value', () => {
    expect(getEffectiveExpirationDate({ ...unopened('2027-01-01'), opened_date: '2026-01-01' })).toBe('2027-01-01');
    expect(
      getEffectiveExpirationDate({ expiration_date: '2027-01-01', status: 'opened', opened_date: null, pao_after_opening: 1 })
    ).toBe('2027-01-01');
    expect(
      getEffectiveExpirationDate({ expiration_date: '2027-01-01', status: 'opened', opened_date: '2026-01-01', pao_after_opening: null })
    ).toBe('2027-01-01');
    expect(
      getEffectiveExpirationDate({ expiration_date: '2027-01-01', status: 'opened', opened_date: '2026-01-01' })
    ).toBe('2027-01-01');
    expect(
      getEffectiveExpirationDate({ expiration_date: '2027-01-01', status: 'finished', opened_date: '2026-01-01', pao_after_opening: 1 })
    ).toBe('2027-01-01');
  });

  it('stays unknown for an opened product without an expiration date', () => {
    const product: ExpirationInput = {
      expiration_date: null,
      status: 'opened',
      opened_date: '2026-10-01',
      pao_after_opening: 6,
    };

    expect(computeExpiration(product, TODAY).status).toBe('unknown');
  });

  it('expires an opened product once its PAO window has passed', () => {
    // Mở 100 ngày trước, PAO 3 tháng, hạn in trên bao bì còn 1 năm
    const product: ExpirationInput = {
      expiration_date: addDays(TODAY, 365),
      status: 'opened',
      opened_date: addDays(TODAY, -100),
      pao_after_opening: 3,
    };

    expect(computeExpiration(product, TODAY)).toEqual({
      effectiveDate: addDays(TODAY, -10),
      daysUntil: -10,
      status: 'expired',
      priority: 1,
    });
  });

  it('handles the longest accepted PAO', () => {
    const product: ExpirationInput = {
      expiration_date: '2060-01-01',
      status: 'opened',
      opened_date: '2026-10-01',
      pao_after_opening: 240,
    };

    const result = computeExpiration(product, TODAY);

    expect(result.effectiveDate).toBe(addDays('2026-10-01', 7200));
    expect(result.status).toBe('good');
  });

  it('returns the same result for the same input', () => {
    const product: ExpirationInput = {
      expiration_date: '2027-03-01',
      status: 'opened',
      opened_date: '2026-09-15',
      pao_after_opening: 6,
    };

    expect(computeExpiration(product, TODAY)).toEqual(computeExpiration(product, TODAY));
  });

  it('never raises priority as the date moves further away', () => {
    let previous = 0;
    for (let offset = -40; offset <= 60; offset++) {
      const { priority } = computeExpiration(unopened(addDays(TODAY, offset)), TODAY);
      expect(priority).toBeGreaterThanOrEqual(previous);
      previous = priority;
    }
  });
});

describe('getTierForDays', () => {
  it('maps day counts to tiers', () => {
    expect(getTierForDays(null)).toBe('unknown');
    expect(getTierForDays(-100)).toBe('expired');
    expect(getTierForDays(7)).toBe('urgent');
    expect(getTierForDays(8)).toBe('soon');
    expect(getTierForDays(30)).toBe('soon');
    expect(getTierForDays(365)).toBe('good');
  });
});

describe('isExpired', () => {
  it('is true only before today', () => {
    expect(isExpired(unopened('2026-10-17'), TODAY)).toBe(true);
    expect(isExpired(unopened('2026-10-18'), TODAY)).toBe(false);
    expect(isExpired(unopened(null), TODAY)).toBe(false);
  });
});

describe('describeExpiration', () => {
  it('describes an expired product', () => {
    expect(describeExpiration(computeExpiration(unopened('2026-10-15'), TODAY))).toEqual({
      tier: 'expired',
      label: 'Expired',
      cssClass: 'status-expired',
      text: 'Expired 3 days ago',
    });
  });

  it('describes products still in date', () => {
    expect(describeExpiration(computeExpiration(unopened('2026-10-23'), TODAY)).text).toBe(
      '5 days until expiration - URGENT'
    );
    expect(describeExpiration(computeExpiration(unopened('2026-11-10'), TODAY))).toEqual({
      tier: 'soon',
      label: 'Expiring Soon',
      cssClass: 'status-soon',
      text: '23 days until expiration - SOON',
    });
    expect(describeExpiration(computeExpiration(unopened('2027-10-18'), TODAY)).text).toBe(
      '365 days until expiration - GOOD'
    );
  });

  it('describes a product without a date', () => {
    expect(describeExpiration(computeExpiration(unopened(null), TODAY))).toEqual({
      tier: 'unknown',
      label: 'Unknown',
      cssClass: 'status-unknown',
      text: 'Expiration date not set',
    });
  });
});
