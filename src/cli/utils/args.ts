import { isDateKey } from "../../utils/time.js";

/**
 * Parse a non-negative integer option, rejecting partial numbers like "3d"
 */
export function parseCount(value: string, name: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new Error(`${name} must be a non-negative integer, got "${value}"`);
  }
  return Number.parseInt(value, 10);
}

export function requireDate(value: string, name: string): string {
  if (!isDateKey(value)) {
    throw new Error(`${name} must be a YYYY-MM-DD date, got "${value}"`);
  }
  return value;
}
