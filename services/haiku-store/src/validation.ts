import { ValidationError } from './errors';

export function assertLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`limit must be a positive integer, got ${limit}`, ['limit']);
  }
}

export function assertOffset(offset: number): void {
  if (!Number.isInteger(offset) || offset < 0) {
    throw new ValidationError(`offset must be a non-negative integer, got ${offset}`, ['offset']);
  }
}

/** Trims `value`; throws when nothing is left. */
export function requireText(field: string, value: string): string {
  const trimmed = typeof value === 'string' ? value.trim() : '';
  if (!trimmed) {
    throw new ValidationError(`${field} must not be empty`, [field]);
  }
  return trimmed;
}
