import { describe, expect, it } from 'vitest';
import { parseRetention, parseRotation } from './logging';

describe('parseRotation', () => {
  it('rotates by size', () => {
    expect(parseRotation('10MB')).toEqual({ maxSize: '10m', datePattern: 'YYYY-MM-DD' });
    expect(parseRotation('500 KB')).toEqual({ maxSize: '500k', datePattern: 'YYYY-MM-DD' });
  });

  it('rotates by period', () => {
    expect(parseRotation('daily')).toEqual({ datePattern: 'YYYY-MM-DD' });
    expect(parseRotation('hourly')).toEqual({ datePattern: 'YYYY-MM-DD-HH' });
  });

  it('falls back to 10 MB files', () => {
    expect(parseRotation('whenever')).toEqual({ maxSize: '10m', datePattern: 'YYYY-MM-DD' });
  });
});

describe('parseRetention', () => {
  it('converts days and hours', () => {
    expect(parseRetention('30 days')).toBe('30d');
    expect(parseRetention('12 hours')).toBe('12h');
    expect(parseRetention('7d')).toBe('7d');
  });

  it('keeps 30 days for unknown values', () => {
    expect(parseRetention('forever')).toBe('30d');
  });
});
