import { Row, RowValue, Table, detectDatatype } from "./db/schema";
import { ErrorLog, NoFieldsToInsert, NotNumeric } from "./errors";
import { nowSeconds, toEpochSeconds } from "./timestamps";

// ─── Escaping ───────────────────────────────────────────────────────

export type Replacement = readonly [char: string, escaped: string];

/** Tag keys, tag values and field keys */
export const NAME_ESCAPES: readonly Replacement[] = [
  ["=", "\\="],
  [" ", "\\ "],
  [",", "\\,"],
];

/** Inside double-quoted string field values */
export const STRING_ESCAPES: readonly Replacement[] = [['"', '\\"']];

function literal(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Matches `target` preceded by an even number of backslashes (possibly none),
// i.e. an occurrence that is not escaped yet.
function unescapedOccurrence(target: string): RegExp {
  return new RegExp(`((?<!\\\\)(?:\\\\\\\\)*)${literal(target)}`, "g");
}

/** Escapes each character unless it is already escaped; never doubles a backslash */
export function escapeChars(value: string, replacements: readonly Replacement[]): string {
  let escaped = value;
  for (const [char, replacement] of replacements) {
    escaped = escaped.replace(unescapedOccurrence(char), (_match, prefix: string) => prefix + replacement);
  }
  return escaped;
}

/** Inverse of `escapeChars` */
export function unescapeChars(value: string, replacements: readonly Replacement[]): string {
  let unescaped = value;
  for (const [char, replacement] of replacements) {
    unescaped = unescaped.replace(unescapedOccurrence(replacement), (_match, prefix: string) => prefix + char);
  }
  return unescaped;
}

// ─── Value rendering ────────────────────────────────────────────────

function isEmpty(value: RowValue): value is null | undefined | "" {
  return value === null || value === undefined || value === "";
}

function asText(value: RowValue): string {
  if (typeof value === "string") return value;
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
}

function quoted(value: RowValue): string {
  return `"${escapeChars(asText(value), STRING_ESCAPES)}"`;
}

function asNumber(key: string, value: RowValue): number {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && /^\s*-?\d+(\.\d+)?\s*$/.test(value)) return Number(value);
  throw new NotNumeric(`field ${key} is declared numeric but holds ${JSON.stringify(value)}`);
}

/**
 * Renders field values for the line protocol. Null and empty values are
 * dropped; undeclared columns get a detected datatype. The protocol needs at
 * least one field per point, so an empty result is autofilled through the
 * table's first STRING field.
 */
export function encodeFields(table: Table, fields: Row, errors?: ErrorLog): Record<string, string> {
  const encoded: Record<string, string> = {};

  for (const [key, value] of Object.entries(fields)) {
    if (isEmpty(value)) continue;

    let datatype = table.datatypeOf(key) ?? detectDatatype(value);
    if (datatype === undefined) {
      errors?.record(`no datatype detected for column ${key} of table ${table.name}, storing it as JSON`);
      datatype = "NONE";
    }

    const name = escapeChars(key, NAME_ESCAPES);
    switch (datatype) {
      case "STRING":
        encoded[name] = quoted(value);
        break;
      case "TIMESTAMP":
        encoded[name] = `${toEpochSeconds(value)}i`;
        break;
      case "INT":
        encoded[name] = `${Math.trunc(asNumber(key, value))}i`;
        break;
      case "FLOAT":
        encoded[name] = String(asNumber(key, value));
        break;
      case "BOOL":
        encoded[name] = String(value);
        break;
      case "NONE":
        encoded[name] = typeof value === "object" ? quoted(value) : String(value);
        break;
    }
  }

  if (Object.keys(encoded).length === 0) {
    const fallback = table.firstStringField();
    if (fallback === undefined) {
      throw new NoFieldsToInsert(`no fields left to insert into ${table.name}`);
    }
    encoded[escapeChars(fallback, NAME_ESCAPES)] = '"autofilled"';
  }

  return encoded;
}

/** Tag values are always strings; null values are dropped */
export function encodeTags(tags: Row): Record<string, string> {
  const encoded: Record<string, string> = {};
  for (const [key, value] of Object.entries(tags)) {
    if (value === null || value === undefined) continue;
    encoded[escapeChars(key, NAME_ESCAPES)] = escapeChars(asText(value), NAME_ESCAPES);
  }
  return encoded;
}

function joinPairs(pairs: Record<string, string>): string {
  return Object.entries(pairs)
    .map(([key, value]) => `${key}=${value}`)
    .join(",");
}

/** `measurement[,tag=value...] field=value[,field=value...] [timestamp]` */
export function renderInsert(
  table: Table,
  fields: Record<string, string>,
  tags: Record<string, string>,
  timestamp?: number,
): string {
  const tagPart = Object.keys(tags).length > 0 ? `,${joinPairs(tags)}` : "";
  const line = `${table.name}${tagPart} ${joinPairs(fields)}`;
  return timestamp === undefined ? line : `${line} ${timestamp}`;
}

// ─── InsertQuery ────────────────────────────────────────────────────

/** One point, formatted and validated at construction */
export class InsertQuery {
  readonly keyword = "INSERT";
  readonly table: Table;
  readonly fields: Record<string, string>;
  readonly tags: Record<string, string>;
  readonly timestamp: number;

  constructor(
    table: Table,
    fields: Row,
    tags: Row = {},
    timestamp: RowValue = null,
    errors?: ErrorLog,
  ) {
    this.table = table;
    this.timestamp = timestamp === null || timestamp === undefined ? nowSeconds() : toEpochSeconds(timestamp);
    this.fields = encodeFields(table, fields, errors);
    this.tags = encodeTags(tags);
  }

  render(): string {
    return renderInsert(this.table, this.fields, this.tags, this.timestamp);
  }

  toString(): string {
    return this.render();
  }
}
