/**
 * Type Guards
 */

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !Number.isNaN(value);
}

export function isDefined<T>(value: T | undefined | null): value is T {
  return value !== undefined && value !== null;
}

/**
 * Parse a non-negative integer from a probe field that may be a number or a numeric string
 */
export function toNonNegativeInt(value: unknown): number | undefined {
  if (isNumber(value) && Number.isInteger(value) && value >= 0) {
    return value;
  }
  if (isString(value) && /^\d+$/.test(value.trim())) {
    return parseInt(value.trim(), 10);
  }
  return undefined;
}
