import { config } from "./config.js";

/**
 * ANSI color codes for terminal output.
 * Set NO_COLOR or UTILKIT_NO_COLOR (or `color: false` in config) to disable.
 */
export const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
} as const;

export type ColorStyle = keyof typeof COLORS;

/**
 * Check if color output should be enabled.
 */
export function colorsEnabled(): boolean {
  if (typeof process === "undefined") return false;
  const env = process.env;
  if (env.NO_COLOR || env.UTILKIT_NO_COLOR || env.FORCE_COLOR === "0") return false;
  return config.getBoolean("color") !== false;
}

/**
 * Apply color if colors are enabled.
 */
export function color(text: string, ...styles: ColorStyle[]): string {
  if (!colorsEnabled() || styles.length === 0) return text;
  const prefix = styles.map((s) => COLORS[s]).join("");
  return `${prefix}${text}${COLORS.reset}`;
}
