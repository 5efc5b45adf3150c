/**
 * cpf.ts — Normalise, validate and mask Brazilian taxpayer IDs.
 */

import { InvalidIdentifierError } from './errors';
import type { Cpf } from './types';

/** Strip formatting punctuation ("123.456.789-09" → "12345678909"). */
export function normalizeCpf(raw: string): string {
  return raw.replace(/\D/g, '');
}

/**
 * Eleven digits, not a single repeated digit, and both mod-11 check digits
 * correct.
 */
export function isValidCpf(digits: string): digits is Cpf {
  if (!/^\d{11}$/.test(digits)) return false;
  if (/^(\d)\1{10}$/.test(digits)) return false;

  return (
    checkDigit(digits.slice(0, 9)) === Number(digits[9]) &&
    checkDigit(digits.slice(0, 10)) === Number(digits[10])
  );
}

/**
 * Validate raw input and return the branded identifier.
 *
 * @throws InvalidIdentifierError when the pattern or check digits fail.
 */
export function parseCpf(raw: string): Cpf {
  // Only digits and the usual separators are accepted around them.
  if (!/^[\d.\-\s/]*$/.test(raw.trim())) {
    throw new InvalidIdentifierError('CPF contains characters other than digits and separators');
  }

  const digits = normalizeCpf(raw);
  if (digits.length !== 11) {
    throw new InvalidIdentifierError(`CPF must have 11 digits, got ${digits.length}`);
  }
  if (!isValidCpf(digits)) {
    throw new InvalidIdentifierError('CPF check digits do not match');
  }
  return digits;
}

/** "12345678909" → "123.***.***-09" */
export function maskCpf(digits: string): string {
  return `${digits.slice(0, 3)}.***.***-${digits.slice(9, 11)}`;
}

/**
 * Mask every CPF-shaped run in free text, formatted or not.
 * Longer digit runs (e.g. 14-digit CNPJs) are left alone.
 */
export function maskCpfsInText(text: string): string {
  return text.replace(
    /(?<!\d)(\d{3})\.?(\d{3})\.?(\d{3})-?(\d{2})(?!\d)/g,
    (_match, first: string, _b: string, _c: string, last: string) =>
      `${first}.***.***-${last}`,
  );
}

// ── Internals ──────────────────────────────────────────────

function checkDigit(base: string): number {
  let sum = 0;
  for (let i = 0; i < base.length; i++) {
    sum += Number(base[i]) * (base.length + 1 - i);
  }
  const remainder = (sum * 10) % 11;
  return remainder === 10 ? 0 : remainder;
}
