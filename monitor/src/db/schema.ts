import { InvalidArgument, InvalidDuration } from "../errors";
import { CAPTURE_TIME_KEY, canonicalDuration } from "../timestamps";
import type { ContinuousQuery } from "./queries";

// ─── Row values ─────────────────────────────────────────────────────
// What the collectors hand over: JSON-decoded records.

export type RowValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | RowValue[]
  | { [key: string]: RowValue };

export type Row = Record<string, RowValue>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Narrows decoded JSON; anything JSON cannot hold becomes `null` */
export function toRowValue(value: unknown): RowValue {
  if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) return value.map(toRowValue);
  if (isRecord(value)) {
    const nested: { [key: string]: RowValue } = {};
    for (const [key, inner] of Object.entries(value)) nested[key] = toRowValue(inner);
    return nested;
  }
  return null;
}

// ─── Datatype ───────────────────────────────────────────────────────

/**
 * Field datatypes. TIMESTAMP is never detected, only declared: the value is
 * an epoch timestamp, stored in seconds as an integer.
 */
export type Datatype = "NONE" | "STRING" | "BOOL" | "INT" | "FLOAT" | "TIMESTAMP";

export const DATATYPES: readonly Datatype[] = ["NONE", "STRING", "BOOL", "INT", "FLOAT", "TIMESTAMP"];

// Order matters: booleans must be caught before any numeric check.
const AUTO_DETECTION: ReadonlyArray<[Datatype, (value: RowValue) => boolean]> = [
  ["NONE", (value) => value === null || value === undefined],
  ["STRING", (value) => typeof value === "string"],
  ["BOOL", (value) => typeof value === "boolean"],
  ["INT", (value) => typeof value === "number" && Number.isInteger(value)],
  ["FLOAT", (value) => typeof value === "number"],
];

/** Datatype of an undeclared value; `undefined` when nothing matches (objects, arrays) */
export function detectDatatype(value: RowValue): Datatype | undefined {
  for (const [datatype, matches] of AUTO_DETECTION) {
    if (matches(value)) return datatype;
  }
  return undefined;
}

export function isDatatype(value: string): value is Datatype {
  return DATATYPES.some((datatype) => datatype === value);
}

// ─── RetentionPolicy ────────────────────────────────────────────────

/** Policy as reported by `SHOW RETENTION POLICIES` */
export interface RetentionPolicyWire {
  name: string;
  duration: string;
  shardGroupDuration: string;
  replicaN: number;
  default: boolean;
}

export interface RetentionPolicyOptions {
  name: string;
  database: Database;
  duration: string;
  replication?: number;
  shardDuration?: string;
  isDefault?: boolean;
}

export class RetentionPolicy {
  readonly name: string;
  readonly database: Database;
  readonly duration: string;
  /** Single node: always 1 */
  readonly replication: number;
  /** `0s` lets the server pick the shard group size */
  readonly shardDuration: string;
  readonly isDefault: boolean;

  constructor(opts: RetentionPolicyOptions) {
    const { replication = 1, shardDuration = "0s", isDefault = false } = opts;
    if (!opts.name) throw new InvalidArgument("need retention policy name for creation");
    if (!opts.database) throw new InvalidArgument(`need database for retention policy ${opts.name}`);
    if (!opts.duration) throw new InvalidArgument(`need duration for retention policy ${opts.name}`);
    if (!replication) throw new InvalidArgument(`need replication factor for retention policy ${opts.name}`);
    if (!shardDuration) throw new InvalidArgument(`need shard duration for retention policy ${opts.name}`);
    if (typeof isDefault !== "boolean") {
      throw new InvalidArgument(`need default setting for retention policy ${opts.name}`);
    }

    this.name = opts.name;
    this.database = opts.database;
    this.replication = replication;
    this.isDefault = isDefault;
    this.duration = canonical(opts.duration, `duration for retention policy ${opts.name}`);
    this.shardDuration = canonical(shardDuration, `shard duration for retention policy ${opts.name}`);
  }

  toWire(): RetentionPolicyWire {
    return {
      name: this.name,
      duration: this.duration,
      shardGroupDuration: this.shardDuration,
      replicaN: this.replication,
      default: this.isDefault,
    };
  }

  /** Structural identity: two declarations of the same policy share a key */
  key(): string {
    return wireKey(this.toWire());
  }

  equals(other: RetentionPolicy): boolean {
    return this.key() === other.key();
  }

  toString(): string {
    return `${this.database.name}.${this.name}`;
  }
}

export function wireKey(wire: RetentionPolicyWire): string {
  return JSON.stringify([wire.default, wire.duration, wire.name, wire.replicaN, wire.shardGroupDuration]);
}

function canonical(literal: string, what: string): string {
  try {
    return canonicalDuration(literal);
  } catch (err) {
    if (err instanceof InvalidDuration) {
      throw new InvalidDuration(`${what} is not in the correct time format: ${err.message}`);
    }
    throw err;
  }
}

// ─── Table ──────────────────────────────────────────────────────────

export type TableSchema =
  | { kind: "declared"; fields: Readonly<Record<string, Datatype>>; tags: readonly string[] }
  | { kind: "fallback" };

export interface TableOptions {
  database: Database;
  name: string;
  fields?: Record<string, Datatype>;
  tags?: string[];
  /** Column holding the row's timestamp; defaults to the capture time */
  timeKey?: string;
  retentionPolicy?: RetentionPolicy;
}

const MEASUREMENT_SPECIAL_CHARS = [" ", ","];

/** Backslash-prefixes every space and comma of a measurement name */
export function escapeMeasurement(name: string): string {
  let escaped = name;
  for (const char of MEASUREMENT_SPECIAL_CHARS) {
    escaped = escaped.split(char).join(`\\${char}`);
  }
  return escaped;
}

export class Table {
  readonly database: Database;
  /** Name as declared, before escaping */
  readonly declaredName: string;
  /** Escaped measurement name, safe to put on the wire */
  readonly name: string;
  readonly timeKey: string;
  readonly retentionPolicy: RetentionPolicy;
  readonly schema: TableSchema;

  constructor(opts: TableOptions) {
    if (!opts.database) throw new InvalidArgument("need database to create table");
    if (!opts.name) throw new InvalidArgument("need name to create table");
    if (opts.timeKey !== undefined && !opts.timeKey) {
      throw new InvalidArgument(`time key of table ${opts.name} cannot be empty`);
    }

    const fields = { ...(opts.fields ?? {}) };
    const tags = [...(opts.tags ?? [])];
    const overlap = tags.filter((tag) => Object.prototype.hasOwnProperty.call(fields, tag));
    if (overlap.length > 0) {
      throw new InvalidArgument(`table ${opts.name} declares ${overlap.join(", ")} as both tag and field`);
    }

    this.database = opts.database;
    this.timeKey = opts.timeKey ?? CAPTURE_TIME_KEY;
    this.retentionPolicy = opts.retentionPolicy ?? opts.database.autogen;
    this.schema = Object.keys(fields).length > 0 ? { kind: "declared", fields, tags } : { kind: "fallback" };
    this.declaredName = opts.name;
    this.name = escapeMeasurement(opts.name);
  }

  get fields(): Readonly<Record<string, Datatype>> {
    return this.schema.kind === "declared" ? this.schema.fields : {};
  }

  get tags(): readonly string[] {
    return this.schema.kind === "declared" ? this.schema.tags : [];
  }

  datatypeOf(column: string): Datatype | undefined {
    return Object.prototype.hasOwnProperty.call(this.fields, column) ? this.fields[column] : undefined;
  }

  firstStringField(): string | undefined {
    return Object.keys(this.fields).find((column) => this.fields[column] === "STRING");
  }

  /** `database.policy.measurement` */
  toString(): string {
    return `${this.database.name}.${this.retentionPolicy.name}.${this.name}`;
  }
}

// ─── Database ───────────────────────────────────────────────────────

export class Database {
  readonly name: string;
  readonly tables = new Map<string, Table>();
  /** Infinite policy for tables declared without one */
  readonly autogen: RetentionPolicy;

  private policies = new Map<string, RetentionPolicy>();
  private queries = new Map<string, ContinuousQuery>();

  constructor(name: string) {
    if (!name) throw new InvalidArgument("need database name");
    this.name = name;
    this.autogen = new RetentionPolicy({ name: "autogen", database: this, duration: "INF" });
  }

  /** Declared table, or an empty fallback table for unknown names. Never throws. */
  table(name: string): Table {
    return this.tables.get(name) ?? new Table({ database: this, name });
  }

  addTable(table: Table): void {
    this.tables.set(table.declaredName, table);
  }

  addRetentionPolicy(policy: RetentionPolicy): void {
    this.policies.set(policy.key(), policy);
  }

  get retentionPolicies(): RetentionPolicy[] {
    return [...this.policies.values()];
  }

  addContinuousQuery(query: ContinuousQuery): void {
    this.queries.set(query.render(), query);
  }

  get continuousQueries(): ContinuousQuery[] {
    return [...this.queries.values()];
  }

  toString(): string {
    return this.name;
  }
}
