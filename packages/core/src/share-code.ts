/**
 * @module share-code
 * Share code generation for trips.
 * Codes are six characters from A-Z and 0-9, drawn from `node:crypto`.
 */

import { randomInt } from 'node:crypto';
import { ValidationFailure } from './errors';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

/** Length of every generated share code. */
export const SHARE_CODE_LENGTH = 6;

/** Generates a random share code (e.g. "K7Q2ZD"). */
export function generateShareCode(): string {
  let code = '';
  for (let i = 0; i < SHARE_CODE_LENGTH; i++) {
    code += ALPHABET[randomInt(ALPHABET.length)];
  }
  return code;
}

/**
 * Generates a share code for which `isTaken` returns false.
 * Throws a {@link ValidationFailure} after `maxAttempts` collisions.
 */
export function generateFreeShareCode(
  isTaken: (code: string) => boolean,
  maxAttempts = 100,
): string {
  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const code = generateShareCode();
    if (!isTaken(code)) return code;
  }
  throw new ValidationFailure(`No free share code after ${maxAttempts} attempts`, { maxAttempts });
}
