import { structuralEquals, type Equality } from '../utils/equality.js';

import { createDependentRule, createRule, type ContextReader, type Rule } from './rule.js';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

function isPresent(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  if (Array.isArray(value)) return value.length > 0;
  return true;
}

/** Fails for null, undefined, blank strings and empty arrays */
export function required<T>(message = 'A value is required.'): Rule<T> {
  return createRule<T>(message, isPresent);
}

export function minLength(min: number, message = `Must be at least ${min} characters.`): Rule<string> {
  return createRule(message, (value: string) => value.length >= min);
}

export function maxLength(max: number, message = `Must be at most ${max} characters.`): Rule<string> {
  return createRule(message, (value: string) => value.length <= max);
}

/**
 * The string must match `regex`. `lastIndex` is reset before every test so a
 * global or sticky regex gives the same answer on every pass.
 */
export function pattern(regex: RegExp, message = 'Invalid format.'): Rule<string> {
  return createRule(message, (value: string) => {
    regex.lastIndex = 0;
    return regex.test(value);
  });
}

export function email(message = 'A valid email address is required.'): Rule<string> {
  return pattern(EMAIL_PATTERN, message);
}

export function range(min: number, max: number, message = `Must be between ${min} and ${max}.`): Rule<number> {
  return createRule(message, (value: number) => Number.isFinite(value) && value >= min && value <= max);
}

/**
 * The value must equal another value, read when the rule runs.
 * Typical use: a confirmation field checked against the original.
 */
export function equalTo<T>(
  readOther: ContextReader<T>,
  message = 'Values do not match.',
  equals: Equality<T> = structuralEquals
): Rule<T> {
  return createDependentRule<T, T>(message, readOther, (value, other) => equals(value, other));
}
