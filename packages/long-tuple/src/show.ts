/**
 * @utilkit/long-tuple — Display
 *
 * Renders one line per element with its running 1-based index, runtime type
 * name and field count:
 *
 * ```
 * LongTuple:
 *   1  ↓ Point: with 2 parameters
 *   2  ↓ number: with 0 parameters
 * ```
 */

import { color, typeName } from "@utilkit/core";
import type { LongTuple } from "./types.js";

function fieldCount(value: unknown): number {
  return typeof value === "object" && value !== null ? Object.keys(value).length : 0;
}

function showElement(elem: unknown, indent: string): string {
  const count = fieldCount(elem);
  return [
    color(indent, "gray"),
    typeName(elem),
    color(":", "blue"),
    color(` with ${count}`, "cyan"),
    color(count === 1 ? " parameter" : " parameters", "gray"),
  ].join("");
}

export function showLongTuple(lt: LongTuple): string {
  const lines = [`${color("LongTuple", "bold")}${color(":", "yellow")}`];
  let k = 1;
  for (const chunk of lt.chunks) {
    for (const elem of chunk) {
      lines.push(showElement(elem, k < 10 ? `  ${k}  ↓ ` : `  ${k} ↓ `));
      k++;
    }
  }
  return lines.join("\n");
}

export function printLongTuple(lt: LongTuple): void {
  console.log(showLongTuple(lt));
}
