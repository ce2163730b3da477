import validator from 'validator';
import { EmailInvalidReason } from '../types/validation.types.js';
import type { EmailValidationResult } from '../types/validation.types.js';

/**
 * Dot-separated atoms of [A-Z0-9_+-] in the local part, one or more
 * hyphenated labels in the domain, and an alphabetic final label of 2+.
 */
const EMAIL_PATTERN = /^[A-Z0-9_+-]+(?:\.[A-Z0-9_+-]+)*@(?:[A-Z0-9][A-Z0-9-]*\.)+[A-Z]{2,}$/i;

/**
 * Syntactic email validation. No DNS or MX lookups.
 *
 * An address is valid when it matches EMAIL_PATTERN and passes the
 * validator library's RFC-lite check (which adds length limits).
 */
class EmailValidationService {
  validateEmail(email: unknown): EmailValidationResult {
    if (typeof email !== 'string' || email.length === 0) {
      return {
        isValid: false,
        reason: EmailInvalidReason.EMPTY,
        details: 'Email is empty',
      };
    }

    if (!EMAIL_PATTERN.test(email)) {
      return {
        isValid: false,
        reason: EmailInvalidReason.SYNTAX,
        details: 'Invalid email syntax',
      };
    }

    if (!validator.isEmail(email, { require_tld: true, allow_utf8_local_part: false })) {
      return {
        isValid: false,
        reason: EmailInvalidReason.SYNTAX,
        details: 'Invalid email format',
      };
    }

    return { isValid: true };
  }

  isValidEmail(email: unknown): boolean {
    return this.validateEmail(email).isValid;
  }

  /**
   * Returns the first address that fails validation, if any
   */
  findInvalid(emails: readonly string[]): { email: string; result: EmailValidationResult } | undefined {
    for (const email of emails) {
      const result = this.validateEmail(email);
      if (!result.isValid) {
        return { email, result };
      }
    }
    return undefined;
  }

  /**
   * Key used by the recipient store
   */
  normalizeEmail(email: string): string {
    return email.trim().toLowerCase();
  }
}

// Export singleton instance
export const emailValidationService = new EmailValidationService();

export function isValidEmail(email: unknown): boolean {
  return emailValidationService.isValidEmail(email);
}
