// src/utils/guards.ts

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const isOneOf = <T extends string>(values: readonly T[], value: unknown): value is T =>
  values.some((candidate) => candidate === value);

/** Narrows a stored enum column, failing loudly on a value the code never writes. */
export const expectOneOf = <T extends string>(values: readonly T[], value: unknown, column: string): T => {
  if (!isOneOf(values, value)) {
    throw new Error(`Unexpected value for ${column}: ${String(value)}`);
  }
  return value;
};

export const parseJsonRecord = (raw: string | null): Record<string, unknown> | null => {
  if (raw === null) {
    return null;
  }
  const parsed: unknown = JSON.parse(raw);
  return isRecord(parsed) ? parsed : null;
};

export const parseJsonRecordArray = (raw: string | null): Record<string, unknown>[] | null => {
  if (raw === null) {
    return null;
  }
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter(isRecord) : null;
};

// Substring pattern for LIKE with a backslash escape; wildcards in user input match literally.
export const toLikePattern = (search: string): string => `%${search.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;

// Money is compared and summed in integer cents.
export const toCents = (amount: number): number => Math.round(amount * 100);

export const fromCents = (cents: number): number => (cents === 0 ? 0 : cents / 100);

export const isWholeCents = (amount: number): boolean => Math.abs(Math.round(amount * 100) - amount * 100) <= 1e-9;
