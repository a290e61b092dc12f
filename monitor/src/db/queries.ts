import { InvalidArgument, InvalidCombination, InvalidDuration } from "../errors";
import { isDurationLiteral } from "../timestamps";
import { Database, RetentionPolicy, Table } from "./schema";

// ─── Helpers ────────────────────────────────────────────────────────

export type Keyword = "SELECT" | "DELETE" | "INSERT";

export type OrderDirection = "ASC" | "DESC";

/** Double-quote an identifier for InfluxQL */
export function quoteIdent(name: string): string {
  return `"${name.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

// ─── SelectionQuery ─────────────────────────────────────────────────

export interface SelectionQueryOptions {
  keyword: "SELECT" | "DELETE";
  tables: Table[];
  into?: Table;
  /** Empty or missing selects `*` */
  fields?: string[];
  where?: string;
  /** Empty list groups by `*` */
  groupBy?: string[];
  /** Ordering is always by time */
  order?: OrderDirection;
  /** 0 omits the clause */
  limit?: number;
  slimit?: number;
}

export class SelectionQuery {
  readonly keyword: "SELECT" | "DELETE";
  readonly tables: readonly Table[];
  readonly into: Table | undefined;
  private readonly fields: readonly string[] | undefined;
  private readonly where: string | undefined;
  private readonly groupBy: readonly string[] | undefined;
  private readonly order: OrderDirection | undefined;
  private readonly limit: number;
  private readonly slimit: number;

  constructor(opts: SelectionQueryOptions) {
    if (opts.keyword !== "SELECT" && opts.keyword !== "DELETE") {
      throw new InvalidArgument(`unsupported keyword ${String(opts.keyword)} for a selection query`);
    }
    if (!opts.tables || opts.tables.length === 0) {
      throw new InvalidArgument("need a table to gather information from");
    }
    const limit = opts.limit ?? 0;
    const slimit = opts.slimit ?? 0;
    if (limit < 0 || slimit < 0) {
      throw new InvalidArgument("LIMIT and SLIMIT cannot be negative");
    }
    if (
      opts.keyword === "DELETE" &&
      (opts.into || opts.fields?.length || opts.groupBy?.length || opts.order || limit || slimit)
    ) {
      throw new InvalidCombination("DELETE does not support INTO, fields, GROUP BY, ORDER BY, LIMIT or SLIMIT");
    }

    this.keyword = opts.keyword;
    this.tables = [...opts.tables];
    this.into = opts.into;
    this.fields = opts.fields;
    this.where = opts.where;
    this.groupBy = opts.groupBy;
    this.order = opts.order;
    this.limit = limit;
    this.slimit = slimit;
  }

  /** Same query with a different INTO target and WHERE clause */
  retarget(into: Table | undefined, where: string | undefined, tables?: Table[]): SelectionQuery {
    return new SelectionQuery({
      keyword: this.keyword,
      tables: tables ?? [...this.tables],
      into,
      fields: this.fields ? [...this.fields] : undefined,
      where,
      groupBy: this.groupBy ? [...this.groupBy] : undefined,
      order: this.order,
      limit: this.limit,
      slimit: this.slimit,
    });
  }

  get whereClause(): string | undefined {
    return this.where;
  }

  render(): string {
    const parts: string[] = [this.keyword];

    if (this.keyword === "SELECT") {
      parts.push(this.fields && this.fields.length > 0 ? this.fields.join(",") : "*");
    }

    // INTO and FROM are fully qualified; DELETE only takes bare measurement names
    if (this.into) parts.push(`INTO ${this.into}`);
    if (this.keyword === "DELETE") {
      parts.push(`FROM ${this.tables.map((table) => table.name).join(",")}`);
    } else {
      parts.push(`FROM ${this.tables.map((table) => table.toString()).join(",")}`);
    }

    if (this.where) parts.push(`WHERE ${this.where}`);
    if (this.groupBy) {
      parts.push(`GROUP BY ${this.groupBy.length > 0 ? this.groupBy.join(",") : "*"}`);
    }
    if (this.order) parts.push(`ORDER BY "time" ${this.order}`);
    if (this.limit > 0) parts.push(`LIMIT ${this.limit}`);
    if (this.slimit > 0) parts.push(`SLIMIT ${this.slimit}`);

    return parts.join(" ");
  }

  toString(): string {
    return this.render();
  }
}

// ─── ContinuousQuery ────────────────────────────────────────────────

export interface ContinuousQueryOptions {
  name: string;
  database: Database;
  /** Structured SELECT ... INTO; exclusive with `query` */
  select?: SelectionQuery;
  /** Raw SELECT statement; exclusive with `select` */
  query?: string;
  every?: string;
  for?: string;
}

export class ContinuousQuery {
  readonly name: string;
  readonly database: Database;
  readonly select: SelectionQuery | undefined;
  private readonly rawQuery: string | undefined;
  private readonly every: string | undefined;
  private readonly forInterval: string | undefined;

  constructor(opts: ContinuousQueryOptions) {
    if (!opts.name) throw new InvalidArgument("need name to create a continuous query");
    if (!opts.database) throw new InvalidArgument(`need database for continuous query ${opts.name}`);
    if (opts.every !== undefined && !isDurationLiteral(opts.every)) {
      throw new InvalidDuration(`EVERY interval "${opts.every}" of ${opts.name} is not a duration literal`);
    }
    if (opts.for !== undefined && !isDurationLiteral(opts.for)) {
      throw new InvalidDuration(`FOR interval "${opts.for}" of ${opts.name} is not a duration literal`);
    }
    if (opts.select && opts.query) {
      throw new InvalidCombination(`continuous query ${opts.name} takes either a select query or a raw query`);
    }
    if (!opts.select && !opts.query) {
      throw new InvalidCombination(`continuous query ${opts.name} needs a select query or a raw query`);
    }
    if (opts.select && !opts.select.into) {
      throw new InvalidArgument(`select query of ${opts.name} needs an INTO clause`);
    }

    this.name = opts.name;
    this.database = opts.database;
    this.select = opts.select;
    this.rawQuery = opts.query;
    this.every = opts.every;
    this.forInterval = opts.for;
  }

  get selectStatement(): string {
    return this.select ? this.select.render() : (this.rawQuery ?? "");
  }

  get resample(): string | undefined {
    const parts: string[] = [];
    if (this.every) parts.push(`EVERY ${this.every}`);
    if (this.forInterval) parts.push(`FOR ${this.forInterval}`);
    return parts.length > 0 ? parts.join(" ") : undefined;
  }

  render(): string {
    const resample = this.resample ? `RESAMPLE ${this.resample}` : "";
    return `CREATE CONTINUOUS QUERY ${this.name} ON ${this.database.name} ${resample} BEGIN ${this.selectStatement} END`
      .replace(/\s+/g, " ");
  }

  equals(other: ContinuousQuery): boolean {
    return this.render() === other.render();
  }

  toString(): string {
    return this.render();
  }
}

// ─── Templates ──────────────────────────────────────────────────────

export interface ContinuousQueryTemplateOptions {
  /** Aggregations, e.g. `mean("duration") as "duration"` */
  fields: string[];
  retentionPolicy: RetentionPolicy;
  groupTime: string;
  /** Defaults to `*` */
  groupArgs?: string[];
  where?: string;
  forInterval?: string;
}

/**
 * Downsampling rule declared next to a table, before the table exists.
 * `resolve` turns it into the concrete query against that table.
 */
export class ContinuousQueryTemplate {
  readonly retentionPolicy: RetentionPolicy;
  private readonly opts: ContinuousQueryTemplateOptions;

  constructor(opts: ContinuousQueryTemplateOptions) {
    if (!isDurationLiteral(opts.groupTime)) {
      throw new InvalidDuration(`group time "${opts.groupTime}" is not a duration literal`);
    }
    this.retentionPolicy = opts.retentionPolicy;
    this.opts = opts;
  }

  resolve(table: Table, name: string): ContinuousQuery {
    const groupArgs = this.opts.groupArgs && this.opts.groupArgs.length > 0 ? this.opts.groupArgs : ["*"];
    return new ContinuousQuery({
      name,
      database: table.database,
      select: new SelectionQuery({
        keyword: "SELECT",
        tables: [table],
        into: new Table({
          database: table.database,
          name: table.declaredName,
          retentionPolicy: this.opts.retentionPolicy,
        }),
        fields: [...this.opts.fields],
        where: this.opts.where,
        groupBy: [`time(${this.opts.groupTime})`, ...groupArgs],
      }),
      for: this.opts.forInterval ?? "7d",
    });
  }
}

// ─── Schema statements ──────────────────────────────────────────────

function policyClauses(policy: RetentionPolicy): string {
  const clause = `DURATION ${policy.duration} REPLICATION ${policy.replication} SHARD DURATION ${policy.shardDuration}`;
  return policy.isDefault ? `${clause} DEFAULT` : clause;
}

export function createRetentionPolicy(policy: RetentionPolicy, databaseName: string): string {
  return `CREATE RETENTION POLICY ${quoteIdent(policy.name)} ON ${quoteIdent(databaseName)} ${policyClauses(policy)}`;
}

export function alterRetentionPolicy(policy: RetentionPolicy, databaseName: string): string {
  return `ALTER RETENTION POLICY ${quoteIdent(policy.name)} ON ${quoteIdent(databaseName)} ${policyClauses(policy)}`;
}

export function showRetentionPolicies(databaseName: string): string {
  return `SHOW RETENTION POLICIES ON ${quoteIdent(databaseName)}`;
}

export function showContinuousQueries(): string {
  return "SHOW CONTINUOUS QUERIES";
}

export function dropContinuousQuery(name: string, databaseName: string): string {
  return `DROP CONTINUOUS QUERY ${quoteIdent(name)} ON ${quoteIdent(databaseName)}`;
}

export function createDatabase(databaseName: string): string {
  return `CREATE DATABASE ${quoteIdent(databaseName)}`;
}
