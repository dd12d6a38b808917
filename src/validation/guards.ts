/**
 * Type guard utilities for strict boolean expressions
 */

export function hasContent(value: string | null | undefined): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

export function isNonEmptyArray<T>(value: readonly T[] | null | undefined): value is T[] {
  return Array.isArray(value) && value.length > 0;
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}
