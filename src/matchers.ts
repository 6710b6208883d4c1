/**
 * @module matchers
 * @description Whole-value classifiers for sensitive string shapes:
 * - Email addresses
 * - http(s) URLs
 * - IPv4 addresses
 * - US phone numbers
 *
 * Each matcher tests the entire string, never a substring, and never throws.
 * `classifyPattern` applies them in a fixed priority order.
 */

import type { PatternKind } from "./types";

/**
 * Email address pattern
 * Matches: local@domain.tld, exactly one "@"
 * Examples: john.doe@example.com, user+tag@sub.domain.co.uk
 */
const emailRx = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;

/** Scheme prefix only; the rest of the URL is not validated */
const urlRx = /^https?:\/\//;

/** Four dotted groups of 1-3 digits; range is checked separately */
const ipv4Rx = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

/**
 * US phone number pattern
 * Matches formats:
 * - Optional +1 country code
 * - Area code with optional parentheses
 * - 3-3-4 digit groups separated by "-", "." or a space
 * Examples: 555-123-4567, (555) 123-4567, +1 555.123.4567
 */
const phoneRx = /^(?:\+1[-.\s]?)?(?:\(\d{3}\)\s?|\d{3}[-.\s])\d{3}[-.\s]\d{4}$/;

export function isEmail(value: string): boolean {
  return emailRx.test(value);
}

export function isUrl(value: string): boolean {
  return urlRx.test(value);
}

export function isIPv4(value: string): boolean {
  const m = ipv4Rx.exec(value);
  if (!m) return false;
  return m.slice(1).every((group) => Number(group) <= 255);
}

export function isPhone(value: string): boolean {
  return phoneRx.test(value);
}

/** Priority order: first match wins */
export const MATCHERS: ReadonlyArray<
  readonly [PatternKind, (value: string) => boolean]
> = [
  ["email", isEmail],
  ["url", isUrl],
  ["ipv4", isIPv4],
  ["phone", isPhone],
];

/**
 * Returns the first pattern the value matches, or null for generic text.
 *
 * @example
 * ```typescript
 * classifyPattern("bob@example.com") // "email"
 * classifyPattern("10.0.0.1")        // "ipv4"
 * classifyPattern("hello")           // null
 * ```
 */
export function classifyPattern(value: string): PatternKind | null {
  for (const [kind, matches] of MATCHERS) {
    if (matches(value)) return kind;
  }
  return null;
}
