/**
 * Calendar-date helpers. Dates are ISO strings (YYYY-MM-DD) and all arithmetic
 * runs on UTC midnight so a day is always 24h.
 */

const MS_PER_DAY = 1000 * 60 * 60 * 24;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export type IsoDate = string;

/**
 * Clock provider - inject vào service thay vì gọi new Date() trực tiếp
 */
export interface Clock {
  today(): IsoDate;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local calendar date of `date` (không dùng toISOString vì lệch múi giờ)
 */
export const toLocalIsoDate = (date: Date): IsoDate =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;

export const systemClock: Clock = {
  today: () => toLocalIsoDate(new Date()),
};

export const fixedClock = (today: IsoDate): Clock => ({
  today: () => today,
});

export const isIsoDate = (value: unknown): value is IsoDate => {
  if (typeof value !== 'string') return false;
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  return (
    date.getUTCFullYear() === Number(year) &&
    date.getUTCMonth() === Number(month) - 1 &&
    date.getUTCDate() === Number(day)
  );
};

const toUtcMs = (value: IsoDate): number => {
  if (!isIsoDate(value)) {
    throw new RangeError(`Invalid ISO date: ${value}`);
  }
  const [year, month, day] = value.split('-').map(Number);
  return Date.UTC(year, month - 1, day);
};

export const addDays = (value: IsoDate, days: number): IsoDate =>
  new Date(toUtcMs(value) + days * MS_PER_DAY).toISOString().slice(0, 10);

/**
 * Whole days from `from` to `to` (âm nếu `to` nằm trước `from`)
 */
export const diffInDays = (from: IsoDate, to: IsoDate): number =>
  Math.round((toUtcMs(to) - toUtcMs(from)) / MS_PER_DAY);

export const minDate = (a: IsoDate, b: IsoDate): IsoDate => (a <= b ? a : b);
