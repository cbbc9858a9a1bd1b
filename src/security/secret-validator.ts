/**
 * Shared-secret validation.
 *
 * Both values are reduced to SHA-256 digests before a constant-time
 * comparison, so neither the position of the first differing byte nor the
 * length of either input changes how long the comparison takes.
 */

import { createHash, timingSafeEqual } from 'crypto';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/**
 * Compare a provided secret against the configured one.
 *
 * An unset or empty `expected` denies every request. Never throws.
 */
export function validateSecret(provided: string | undefined, expected: string | undefined): boolean {
  const providedValue = typeof provided === 'string' ? provided : '';
  const expectedValue = typeof expected === 'string' ? expected : '';

  // Hash and compare unconditionally so rejected inputs cost the same.
  const matches = timingSafeEqual(digest(providedValue), digest(expectedValue));

  return matches && providedValue.length > 0 && expectedValue.length > 0;
}
