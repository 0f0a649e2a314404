/**
 * ULID (Universally Unique Lexicographically Sortable Identifier) utilities.
 *
 * fleetdeck uses ULIDs for command ids and for device ids the registering
 * caller does not supply. ULIDs sort by creation time, so command history
 * read back in id order is also issuance order.
 *
 * Format: 26 characters, Crockford Base32 encoding.
 * First 10 chars = 48-bit timestamp (ms), last 16 chars = 80-bit random.
 */

import { monotonicFactory } from "ulidx";

/** Crockford Base32 pattern for ULID validation */
const ULID_REGEX = /^[0-9A-HJKMNP-TV-Z]{26}$/;

/** Monotonic within a millisecond, so ids issued back-to-back still sort */
const nextUlid = monotonicFactory();

/**
 * Generate a new ULID.
 * Uses the current timestamp and cryptographic randomness.
 */
export function generateId(): string {
  return nextUlid();
}

/**
 * Check if a string is a valid ULID format.
 * Validates the Crockford Base32 character set and length (26 chars).
 */
export function isValidUlid(id: string): boolean {
  return ULID_REGEX.test(id);
}
