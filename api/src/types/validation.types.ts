/**
 * Email validation types and enums
 */

/**
 * Reasons why an email is invalid
 */
export enum EmailInvalidReason {
  EMPTY = 'empty',
  SYNTAX = 'syntax',
}

/**
 * Result of email validation
 */
export interface EmailValidationResult {
  isValid: boolean;
  reason?: EmailInvalidReason;
  details?: string;
}
