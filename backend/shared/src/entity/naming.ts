// backend/shared/src/entity/naming.ts
/**
 * Purpose:
 * - Derive a collection name from a class name when the class does not name itself.
 *
 * Notes:
 * - No pluralization: Car → "car", never "cars".
 * - "snake":  CarOwner → car_owner, HTTPRequestLog → http_request_log
 * - "lower":  CarOwner → carowner
 * - A function strategy lets callers plug in their own rule.
 */

export type NamingStrategy = "snake" | "lower" | ((typeName: string) => string);

export function toSnakeCase(typeName: string): string {
  return typeName
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .toLowerCase();
}

export function deriveCollectionName(
  typeName: string,
  strategy: NamingStrategy = "snake"
): string {
  if (typeof strategy === "function") return strategy(typeName);
  return strategy === "lower" ? typeName.toLowerCase() : toSnakeCase(typeName);
}
