/**
 * Identifiers for collectors and other long-lived components.
 */

import { randomUUID } from "node:crypto";

/** `prefix-<uuid v4>`, or a bare UUID when no prefix is given. */
export function generateId(prefix?: string): string {
  const id = randomUUID();
  return prefix ? `${prefix}-${id}` : id;
}
