/**
 * Coloured, indented rendering of nested records, one field per line.
 * Each runtime type gets its own colour, assigned in order of first
 * appearance.
 *
 * ```
 * a = 1,
 * b = (;
 *   c = "x",
 * ),
 * m = [
 *   1 2;
 *   3 4;
 * ],
 * ```
 */

import { color, isPlainObject, typeName, type ColorStyle } from "@utilkit/core";
import type { Fields } from "./records.js";

export interface TcFormatOptions {
  /** Colour each line by the type of its value (default: true) */
  color?: boolean;
  /** Append `::TypeName` to each value (default: false) */
  type?: boolean;
  /** Print values, not just field names (default: true) */
  value?: boolean;
}

const PALETTE: readonly ColorStyle[] = ["cyan", "green", "yellow", "blue", "magenta", "red"];

function collectTypes(data: Fields, out: string[]): string[] {
  for (const key of Object.keys(data).sort()) {
    const value = data[key];
    const name = typeName(value);
    if (!out.includes(name)) out.push(name);
    if (isPlainObject(value)) collectTypes(value, out);
  }
  return out;
}

function isMatrix(value: unknown): value is readonly (readonly unknown[])[] {
  return Array.isArray(value) && value.length > 0 && value.every((row) => Array.isArray(row));
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (Array.isArray(value)) return `[${value.map(formatValue).join(", ")}]`;
  if (typeof value === "bigint") return `${value}n`;
  return String(value);
}

class TcRenderer {
  private readonly lines: string[] = [];
  private readonly styles = new Map<string, ColorStyle>();

  constructor(
    data: Fields,
    private readonly options: Required<TcFormatOptions>
  ) {
    if (options.color) {
      collectTypes(data, []).forEach((name, i) => {
        this.styles.set(name, PALETTE[i % PALETTE.length]);
      });
    }
    this.render(data, "");
  }

  toString(): string {
    return this.lines.join("\n");
  }

  private emit(text: string, value: unknown): void {
    const style = this.styles.get(typeName(value));
    this.lines.push(style ? color(text, style) : text);
  }

  private render(data: Fields, indent: string): void {
    for (const key of Object.keys(data).sort()) {
      const value = data[key];
      const suffix = this.options.type ? `::${typeName(value)}` : "";

      if (isPlainObject(value)) {
        this.emit(`${indent}${key} = (;`, value);
        this.render(value, `${indent}  `);
        this.emit(`${indent})${suffix},`, value);
      } else if (isMatrix(value)) {
        this.emit(`${indent}${key} = [`, value);
        for (const row of value) {
          this.emit(`${indent}  ${row.map(formatValue).join(" ")};`, value);
        }
        this.emit(`${indent}]${suffix},`, value);
      } else if (this.options.value) {
        this.emit(`${indent}${key} = ${formatValue(value)}${suffix},`, value);
      } else {
        this.emit(`${indent}${key}${suffix},`, value);
      }
    }
  }
}

/**
 * Render a nested record, keys sorted at every level.
 *
 * @example
 * ```typescript
 * tcFormat({ b: { c: 2 }, a: 1 }, { color: false });
 * // "a = 1,\nb = (;\n  c = 2,\n),"
 * ```
 */
export function tcFormat(data: Fields, options: TcFormatOptions = {}): string {
  return new TcRenderer(data, {
    color: options.color ?? true,
    type: options.type ?? false,
    value: options.value ?? true,
  }).toString();
}

/** Write {@link tcFormat}'s rendering to the console. */
export function tcPrint(data: Fields, options: TcFormatOptions = {}): void {
  console.log(tcFormat(data, options));
}
