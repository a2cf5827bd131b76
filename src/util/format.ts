import type { Fetchable, NamedResource } from "./fetchable.js";

/**
 * Right-pads `text` with spaces to exactly `length` characters,
 * truncating when it is longer.
 */
export function padded(text: string, length: number): string {
  return text.padEnd(length, " ").slice(0, length);
}

/** Header line followed by one CSV row per item, in the order given. */
export function toCsvTable<T extends NamedResource>(kind: Fetchable<T>, items: readonly T[]): string {
  return [kind.csvHeader, ...items.map((item) => kind.toCsv(item))].join("\n");
}
