/**
 * Input validation for profile identity fields.
 *
 * These are pure functions; re-prompting on failure is up to the caller.
 */

import { z } from 'zod';
import { GitSwitchError, InvalidEmailError, InvalidNameError } from '../errors';

export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export const EmailSchema = z.string().trim().regex(EMAIL_PATTERN);
export const NameSchema = z.string().trim().min(1);

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; error: GitSwitchError };

export function validateEmail(input: string): ValidationResult<string> {
  const parsed = EmailSchema.safeParse(input);
  if (!parsed.success) {
    return { ok: false, error: new InvalidEmailError(input.trim()) };
  }
  return { ok: true, value: parsed.data };
}

export function validateName(input: string): ValidationResult<string> {
  const parsed = NameSchema.safeParse(input);
  if (!parsed.success) {
    return { ok: false, error: new InvalidNameError() };
  }
  return { ok: true, value: parsed.data };
}

export function isValidEmail(input: string): boolean {
  return validateEmail(input).ok;
}
