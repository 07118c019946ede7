import type { Result } from 'neverthrow';
import { err } from 'neverthrow';

/**
 * Type guard for checking if a value is an object (not null, not array)
 */
export function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Type guard for checking if an object has a finite numeric property
 */
export function hasNumberProperty<T extends string>(obj: unknown, prop: T): obj is Record<T, number> {
  return isObject(obj) && typeof obj[prop] === 'number' && Number.isFinite(obj[prop]);
}

/**
 * Extract error message from unknown error value
 */
export function getErrorMessage(error: unknown, defaultMessage?: string): string {
  if (error instanceof Error && typeof error.message === 'string') {
    return error.message;
  }
  return defaultMessage ?? String(error);
}

/**
 * Wrap an unknown error with context message
 */
export function wrapError<T = never>(error: unknown, context: string): Result<T, Error> {
  return err(new Error(`${context}: ${getErrorMessage(error)}`));
}
