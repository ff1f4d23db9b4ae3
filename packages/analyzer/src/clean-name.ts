/**
 * Companion function naming.
 *
 * A `@custom` member named `name` delegates to the static methods
 * `Equals_<cleanName(name)>` and `GetHashCode_<cleanName(name)>`.
 */

import type { CompanionFunctionRef } from "@valuekit/core";

/**
 * Strip one leading `_` or `m_`, then upper-case the first remaining
 * character. When nothing usable remains (empty, or starting with a digit)
 * the original name is returned unchanged.
 *
 * @example
 * cleanName("lastName")  // "LastName"
 * cleanName("_amount")   // "Amount"
 * cleanName("m_items")   // "Items"
 * cleanName("_1st")      // "_1st"
 */
export function cleanName(name: string): string {
  let stripped = name;
  if (stripped.startsWith("m_")) {
    stripped = stripped.slice(2);
  } else if (stripped.startsWith("_")) {
    stripped = stripped.slice(1);
  }

  if (stripped.length === 0 || /^[0-9]/.test(stripped)) {
    return name;
  }
  return stripped.charAt(0).toUpperCase() + stripped.slice(1);
}

export function companionFor(memberName: string): CompanionFunctionRef {
  const suffix = cleanName(memberName);
  return {
    suffix,
    equalsName: `Equals_${suffix}`,
    hashName: `GetHashCode_${suffix}`,
  };
}
