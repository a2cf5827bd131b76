/**
 * Fetchable capability.
 *
 * Each resource kind is described once by a {@link Fetchable} descriptor:
 * where its collection lives, how a JSON array of it is decoded, and how an
 * item is projected to CSV and to a display line. The request/cache pipeline
 * in ProtectAPI is written against this descriptor only.
 */

import { z } from "zod";
import { DecodingError } from "./errors.js";

// ============ TYPES ============

/** Anything with a server-assigned identity and a display name. */
export interface NamedResource {
  id: string;
  name: string;
}

export interface CsvConvertible<T> {
  readonly csvHeader: string;
  toCsv(item: T): string;
}

export interface Fetchable<T extends NamedResource> extends CsvConvertible<T> {
  /** Plural label used in logs and errors, e.g. "cameras". */
  readonly resource: string;
  /** Collection endpoint relative to the integration base URL. */
  readonly urlSuffix: string;
  /** Decodes a JSON array. Throws DecodingError on any mismatch. */
  parse(data: Buffer | string): T[];
  describe(item: T): string;
}

export interface FetchableDefinition<T extends NamedResource> {
  resource: string;
  urlSuffix: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  csvHeader: string;
  toCsv(item: T): string;
  describe?(item: T): string;
}

// ============ ORDERING & EQUALITY ============

/** Code-unit order by name. IDs are not consulted. */
export function compareByName(a: NamedResource, b: NamedResource): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Two resources are equal when their names are equal, whatever their IDs.
 * Callers that need identity must compare `id` themselves.
 */
export function equalsByName(a: NamedResource, b: NamedResource): boolean {
  return a.name === b.name;
}

export function sortByName<T extends NamedResource>(items: readonly T[]): T[] {
  return [...items].sort(compareByName);
}

export function describeResource(item: NamedResource): string {
  return `${item.name} [${item.id}]`;
}

// ============ DECODING ============

// fatal: malformed UTF-8 throws instead of decoding to U+FFFD
const utf8 = new TextDecoder("utf-8", { fatal: true });

function formatIssuePath(path: ReadonlyArray<string | number>): string | undefined {
  if (path.length === 0) return undefined;
  return path
    .map((segment, index) =>
      typeof segment === "number" ? `[${segment}]` : index === 0 ? segment : `.${segment}`
    )
    .join("");
}

export function decodeCollection<T>(
  resource: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: Buffer | string
): T[] {
  let json: unknown;
  try {
    const text = typeof data === "string" ? data : utf8.decode(data);
    json = JSON.parse(text);
  } catch (err) {
    throw new DecodingError(resource, err instanceof Error ? err.message : String(err));
  }

  const result = z.array(schema).safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    if (!issue) throw new DecodingError(resource, result.error.message);
    throw new DecodingError(resource, issue.message, formatIssuePath(issue.path));
  }
  return result.data;
}

export function defineFetchable<T extends NamedResource>(
  definition: FetchableDefinition<T>
): Fetchable<T> {
  const { resource, urlSuffix, schema, csvHeader, toCsv } = definition;
  return {
    resource,
    urlSuffix,
    csvHeader,
    toCsv,
    describe: definition.describe ?? describeResource,
    parse: (data) => decodeCollection(resource, schema, data),
  };
}
