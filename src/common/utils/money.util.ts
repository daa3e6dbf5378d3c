// Decimal columns travel as strings from pg; all arithmetic happens in integer cents.

export const toCents = (value: number | string | null | undefined): number => {
  if (value === null || value === undefined || value === '') return 0;
  const parsed = typeof value === 'number' ? value : parseFloat(value);
  if (!Number.isFinite(parsed)) return 0;
  return Math.round(parsed * 100);
};

export const fromCents = (cents: number): number => cents / 100;

export const sumCents = (values: Array<number | string | null | undefined>): number =>
  values.reduce<number>((total, value) => total + toCents(value), 0);

export const roundMoney = (value: number | string | null | undefined): number =>
  fromCents(toCents(value));

export const formatMoney = (value: number | string): string => roundMoney(value).toFixed(2);

/** Column transformer for decimal(12,2) columns so entities carry numbers. */
export const decimalTransformer = {
  to: (value?: number | null): number | null | undefined => value,
  from: (value?: string | number | null): number | null =>
    value === null || value === undefined ? null : roundMoney(value),
};
