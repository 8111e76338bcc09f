export function isRecordLike(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parsePositiveSafeInteger(value: unknown): number | null {
  if (typeof value !== 'number') {
    return null;
  }

  if (!Number.isSafeInteger(value) || value < 1) {
    return null;
  }

  return value;
}

export function parseOneOf<TValue extends string>(
  value: unknown,
  allowedValues: readonly TValue[],
): TValue | null {
  if (typeof value !== 'string') {
    return null;
  }

  return allowedValues.find((allowedValue) => allowedValue === value) ?? null;
}
