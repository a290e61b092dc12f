import { Row, RowValue, Table } from "./db/schema";
import { EmptyInput, ErrorLog } from "./errors";
import { CAPTURE_TIME_KEY, TIME_KEY_NAMES, nowSeconds } from "./timestamps";

export interface Classification {
  tags: Row;
  fields: Row;
  /** Raw timestamp value; `null` when the row had none */
  timestamp: RowValue;
}

/** Field inserted by the fallback split when a row yields no field at all */
export const MISSING_FIELD = "MISSING_FIELD";
const MISSING_FIELD_VALUE = 42;

// Strings containing any of these are stored as fields, never as tags
const FIELD_LIKE_TEXT = /[\s[\]{}"]/;

function isEmpty(value: RowValue): boolean {
  return value === null || value === undefined || value === "";
}

function hasOwn(record: Row, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

/**
 * Splits a row into tags, fields and a timestamp. Declared tables follow
 * their schema; tables without declared fields use a type-based fallback.
 */
export function classifyRow(table: Table, row: Row, errors: ErrorLog): Classification {
  if (Object.keys(row).length === 0) {
    throw new EmptyInput(`need at least one column to classify a row of ${table.name}`);
  }
  switch (table.schema.kind) {
    case "declared":
      return classifyDeclared(table, table.schema.fields, table.schema.tags, row, errors);
    case "fallback":
      return classifyFallback(table, row, errors);
  }
}

function classifyDeclared(
  table: Table,
  declaredFields: Readonly<Record<string, unknown>>,
  declaredTags: readonly string[],
  row: Row,
  errors: ErrorLog,
): Classification {
  const fields: Row = {};
  for (const name of Object.keys(declaredFields)) fields[name] = null;
  const tags: Row = {};
  for (const name of declaredTags) tags[name] = null;

  let timestamp: RowValue = null;
  // set once the declared time key was seen; it outranks every other time column
  let locked = false;

  for (const [key, value] of Object.entries(row)) {
    if (isEmpty(value)) continue;

    const isTimeColumn = key === table.timeKey || TIME_KEY_NAMES.includes(key);
    if (key === table.timeKey) {
      timestamp = value;
      locked = true;
    } else if (key === CAPTURE_TIME_KEY) {
      if (timestamp === null) timestamp = value;
    } else if (isTimeColumn && !locked) {
      timestamp = value;
    }

    if (hasOwn(fields, key)) {
      fields[key] = value;
    } else if (hasOwn(tags, key)) {
      tags[key] = value;
    } else if (!isTimeColumn) {
      // Kept as a field: dropping it would make the collector resend it forever
      errors.record(`column ${key} is not declared for table ${table.name}, storing it as a field`);
      fields[key] = value;
    }
  }

  return { tags, fields, timestamp };
}

function classifyFallback(table: Table, row: Row, errors: ErrorLog): Classification {
  console.warn(`[classify] table ${table.name} is not declared, splitting by value types`);

  const fields: Row = {};
  const tags: Row = {};
  let timestamp: RowValue = null;

  for (const [key, value] of Object.entries(row)) {
    if (isEmpty(value)) continue;

    if (TIME_KEY_NAMES.includes(key)) {
      if (timestamp === null || key === "logTime") timestamp = value;
      continue;
    }

    if (typeof value === "number" || typeof value === "boolean") {
      fields[key] = value;
      continue;
    }

    const text = typeof value === "string" ? value : JSON.stringify(value);
    if (FIELD_LIKE_TEXT.test(text)) {
      fields[key] = text;
    } else {
      tags[key] = text;
    }
  }

  if (Object.keys(fields).length === 0) {
    errors.record(`no field found in row for table ${table.name}, inserting ${MISSING_FIELD}`);
    fields[MISSING_FIELD] = MISSING_FIELD_VALUE;
  }

  if (timestamp === null) {
    errors.record(`no timestamp found in row for table ${table.name}, using the current time`);
    timestamp = nowSeconds();
  }

  return { tags, fields, timestamp };
}
