import { classifyRow } from "./classifier";
import { MonitorConfig } from "./config";
import { InfluxConnection, InfluxDb, Series, seriesRows } from "./db/connection";
import { addTableDefinitions } from "./db/definitions";
import { SelectionQuery, createDatabase } from "./db/queries";
import { Database, RetentionPolicy, Row, Table } from "./db/schema";
import { ErrorLog, InfluxHttpError, InvalidArgument, MonitorError } from "./errors";
import { InsertQuery } from "./line-protocol";
import { SchemaReconciler } from "./reconciler";
import { CAPTURE_TIME_KEY, nowSeconds } from "./timestamps";
import { WriteBuffer } from "./write-buffer";

export const RUN_METRICS_TABLE = "sppmon_metrics";

const PARTIAL_DROP = /partial write: points beyond retention policy dropped=(\d+)/;
// The server stops reporting beyond this many dropped points
const DROP_LIMIT = 10_000;

export interface InfluxClientOptions {
  batchSize: number;
  copyTimeoutMs: number;
  verbose?: boolean;
}

export interface CopyResult {
  statements: number;
  linesWritten: number;
  /** Statements that lost points older than the target policy */
  partialDrops: number;
  failures: number;
}

/**
 * Everything the collectors call: row intake, flushing, selections and
 * schema setup, on top of one connection and one declared database.
 */
export class InfluxClient {
  readonly database: Database;
  readonly errors: ErrorLog;
  private conn: InfluxConnection;
  private buffer: WriteBuffer;
  private reconciler: SchemaReconciler;
  private copyTimeoutMs: number;

  constructor(conn: InfluxConnection, database: Database, errors: ErrorLog, opts: InfluxClientOptions) {
    this.conn = conn;
    this.database = database;
    this.errors = errors;
    this.copyTimeoutMs = opts.copyTimeoutMs;
    this.buffer = new WriteBuffer(conn, database, errors, { maxBatchSize: opts.batchSize, verbose: opts.verbose });
    this.reconciler = new SchemaReconciler(conn, database, errors);
  }

  /** Client for the configured server with every bundled table declared */
  static fromConfig(config: MonitorConfig, errors: ErrorLog = new ErrorLog()): InfluxClient {
    const database = new Database(config.influx.database);
    addTableDefinitions(database);
    return new InfluxClient(new InfluxDb(config.influx), database, errors, {
      batchSize: config.batchSize,
      copyTimeoutMs: config.influx.copyTimeoutMs,
      verbose: config.verbose,
    });
  }

  // ── Lifecycle ──────────────────────────────────────────────────

  async connect(): Promise<void> {
    await this.conn.init();
    await this.conn.command(createDatabase(this.database.name));
    await this.reconciler.reconcile();
  }

  /** Flushes twice so metric rows queued by the first flush get sent too */
  async disconnect(): Promise<void> {
    await this.buffer.flush();
    await this.buffer.flush();
    await this.conn.close();
    console.log(`[influx] disconnected from ${this.database.name}`);
  }

  // ── Writes ─────────────────────────────────────────────────────

  /** Rows that cannot be classified or encoded are recorded and dropped */
  async insertRows(tableName: string, rows: readonly Row[]): Promise<void> {
    if (rows.length === 0) return;
    const table = this.database.table(tableName);

    const inserts: InsertQuery[] = [];
    for (const row of rows) {
      try {
        const { fields, tags, timestamp } = classifyRow(table, row, this.errors);
        inserts.push(new InsertQuery(table, fields, tags, timestamp, this.errors));
      } catch (err) {
        this.errors.recordError(err, `dropped a row of table ${table.name}`);
      }
    }
    await this.buffer.buffer(table, inserts);
  }

  async flush(): Promise<void> {
    await this.buffer.flush();
  }

  pendingCount(table?: Table): number {
    return this.buffer.pendingCount(table);
  }

  /**
   * Writes one `sppmon_metrics` row describing this run and flushes.
   * `tags` carries whatever identifies the run and must be declared tags
   * of `sppmon_metrics`.
   */
  async storeRunMetrics(tags: Row, durationMs: number): Promise<void> {
    const row: Row = {
      ...tags,
      duration: Math.trunc(durationMs),
      errorCount: this.errors.count,
      errorMessages: JSON.stringify(this.errors.messages),
      [CAPTURE_TIME_KEY]: nowSeconds(),
    };
    const errorCount = this.errors.count;
    await this.insertRows(RUN_METRICS_TABLE, [row]);
    await this.buffer.flush();
    console.log("[influx] stored run metrics");

    const late = this.errors.count - errorCount;
    if (late > 0) {
      this.errors.record(`${late} error(s) occurred while storing run metrics and are only in the logs`);
    }
  }

  // ── Selections ─────────────────────────────────────────────────

  /** Server errors are recorded and yield no rows */
  async select(query: SelectionQuery): Promise<Row[]> {
    if (query.keyword !== "SELECT") {
      throw new InvalidArgument(`select needs a SELECT query, got ${query.keyword}`);
    }
    await this.flushIfBuffered(query.tables);

    const began = Date.now();
    let series: Series[] = [];
    try {
      const results = await this.conn.query(query.render());
      series = results.flatMap((result) => result.series);
    } catch (err) {
      this.errors.recordError(err, "error when sending select statement");
    }
    const rows = series.flatMap((entry) =>
      seriesRows(entry).map((row): Row => (entry.tags ? { ...entry.tags, ...row } : row)),
    );

    this.recordSelection(query, rows.length, Date.now() - began);
    return rows;
  }

  async delete(query: SelectionQuery): Promise<void> {
    if (query.keyword !== "DELETE") {
      throw new InvalidArgument(`delete needs a DELETE query, got ${query.keyword}`);
    }
    await this.flushIfBuffered(query.tables);

    const began = Date.now();
    try {
      await this.conn.command(query.render());
    } catch (err) {
      this.errors.recordError(err, "error when sending delete statement");
    }
    this.recordSelection(query, 0, Date.now() - began);
  }

  private async flushIfBuffered(tables: readonly Table[]): Promise<void> {
    if (tables.some((table) => this.buffer.pendingCount(table) > 0)) {
      await this.buffer.flush();
    }
  }

  private recordSelection(query: SelectionQuery, rowCount: number, durationMs: number): void {
    const perTable = Math.trunc(rowCount / query.tables.length);
    this.buffer.recordMetric(
      query.keyword,
      query.tables.map((table): [Table, number] => [table, perTable]),
      durationMs,
    );
  }

  // ── Database copy ──────────────────────────────────────────────

  /**
   * Copies every table into `newName`, sorting points from `autogen` into
   * each table's own policy, and replays every downsampling query so the
   * coarser policies get filled too. Continuous queries themselves are not
   * created on the target.
   */
  async copyDatabase(newName: string): Promise<CopyResult> {
    if (!newName) throw new InvalidArgument("copying a database needs the target database name");
    console.log(`[influx] copying ${this.database.name} into ${newName}`);

    await this.conn.command(createDatabase(newName));
    await this.reconciler.reconcileRetentionPolicies(newName);

    const statements = this.copyStatements(new Database(newName));
    const result: CopyResult = { statements: statements.length, linesWritten: 0, partialDrops: 0, failures: 0 };

    for (const [i, statement] of statements.entries()) {
      try {
        const results = await this.conn.query(statement, { timeoutMs: this.copyTimeoutMs });
        for (const { series } of results) {
          for (const row of series.flatMap(seriesRows)) {
            result.linesWritten += Number(row.written ?? 0);
          }
        }
      } catch (err) {
        const dropped = err instanceof InfluxHttpError ? PARTIAL_DROP.exec(err.message) : null;
        if (dropped && Number(dropped[1]) >= DROP_LIMIT) {
          throw new MonitorError(`copy lost more than ${DROP_LIMIT} points, retry with a shorter time range: ${statement}`);
        }
        if (dropped) {
          result.partialDrops++;
        } else {
          result.failures++;
          this.errors.recordError(err, `copy statement failed: ${statement}`);
        }
      }
      if ((i + 1) % 10 === 0) {
        console.log(`[influx] copy ${i + 1}/${statements.length}: ${result.linesWritten} lines so far`);
      }
    }

    console.log(
      `[influx] copy done: ${result.linesWritten} lines, ${result.partialDrops} partial drop(s), ${result.failures} failure(s)`,
    );
    return result;
  }

  private copyStatements(target: Database): string[] {
    const policies = new Map<string, RetentionPolicy>();
    const targetPolicy = (policy: RetentionPolicy): RetentionPolicy => {
      let copy = policies.get(policy.name);
      if (!copy) {
        copy = new RetentionPolicy({
          name: policy.name,
          database: target,
          duration: policy.duration,
          replication: policy.replication,
          shardDuration: policy.shardDuration,
          isDefault: policy.isDefault,
        });
        policies.set(policy.name, copy);
      }
      return copy;
    };
    const within = (policy: RetentionPolicy): string | undefined =>
      policy.duration === "0s" ? undefined : `time > now() - ${policy.duration}`;
    const moved = (table: Table, database: Database, retentionPolicy: RetentionPolicy): Table =>
      new Table({ database, name: table.declaredName, retentionPolicy });

    const statements: string[] = [];

    for (const table of this.database.tables.values()) {
      const into = moved(table, target, targetPolicy(table.retentionPolicy));
      const sources = [moved(table, this.database, this.database.autogen), table];
      for (const source of sources) {
        const copy = new SelectionQuery({
          keyword: "SELECT",
          tables: [source],
          into,
          where: within(table.retentionPolicy),
          groupBy: [],
        });
        statements.push(copy.render());
      }
    }

    for (const query of this.database.continuousQueries) {
      const select = query.select;
      if (!select?.into) {
        this.errors.record(`continuous query ${query.name} has no structured select, copy it manually`);
        continue;
      }
      const into = moved(select.into, target, targetPolicy(select.into.retentionPolicy));
      const bound = within(select.into.retentionPolicy);
      const existing = select.whereClause;
      const where = bound && existing ? `${existing} AND ${bound}` : (bound ?? existing);

      statements.push(select.retarget(into, where).render());
      const fromAutogen = select.tables.map((table) => moved(table, this.database, this.database.autogen));
      statements.push(select.retarget(into, where, fromAutogen).render());
    }

    return statements;
  }
}
