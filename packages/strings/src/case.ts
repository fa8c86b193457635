/**
 * Convert a snake_case name to PascalCase, optionally prefixed.
 *
 * @example
 * ```typescript
 * toUpperCaseFirst("soil_water_content");      // "SoilWaterContent"
 * toUpperCaseFirst("rain", "Forcing");         // "ForcingRain"
 * ```
 */
export function toUpperCaseFirst(s: string, prefix = ""): string {
  const parts = s.split("_").map((part) => part.charAt(0).toUpperCase() + part.slice(1));
  return prefix + parts.join("");
}
