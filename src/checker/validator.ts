import type { ValidationResult } from "./types.js";

/**
 * One or more `label.` prefixes followed by an alphabetic TLD.
 * Labels are 1-63 alphanumeric/hyphen characters and never start or end with a hyphen.
 */
const DOMAIN_PATTERN =
  /^(?=.{1,253}$)(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,63}$/i;

export function validateDomain(line: string): ValidationResult {
  const domain = line.trim();
  if (!domain) return { valid: false, line, reason: "empty" };
  if (!DOMAIN_PATTERN.test(domain)) return { valid: false, line, reason: "syntax" };
  return { valid: true, domain };
}

export function isValidDomain(line: string): boolean {
  return validateDomain(line).valid;
}
