import { InfluxConnection } from "./db/connection";
import { Database, Table } from "./db/schema";
import { ErrorLog, errorMessage } from "./errors";
import { InsertQuery } from "./line-protocol";
import { nowSeconds } from "./timestamps";

/** Measurement receiving one row per write batch and per selection */
export const METRICS_TABLE = "influx_metrics";

// A table holding more than this many batches triggers a flush from `buffer`
const OVERFLOW_FACTOR = 5;

export type MetricKeyword = "INSERT" | "SELECT" | "DELETE";

export interface WriteBufferOptions {
  maxBatchSize: number;
  verbose?: boolean;
}

interface Pending {
  table: Table;
  lines: string[];
}

export interface FlushResult {
  linesWritten: number;
  failedBatches: number;
}

export class WriteBuffer {
  private pending = new Map<string, Pending>();
  private conn: InfluxConnection;
  private database: Database;
  private errors: ErrorLog;
  private maxBatchSize: number;
  private verbose: boolean;

  constructor(conn: InfluxConnection, database: Database, errors: ErrorLog, opts: WriteBufferOptions) {
    if (!Number.isInteger(opts.maxBatchSize) || opts.maxBatchSize <= 0) {
      throw new RangeError(`max batch size must be a positive integer, got ${opts.maxBatchSize}`);
    }
    this.conn = conn;
    this.database = database;
    this.errors = errors;
    this.maxBatchSize = opts.maxBatchSize;
    this.verbose = opts.verbose ?? false;
  }

  /** Queues rendered points; flushes everything once one table overflows */
  async buffer(table: Table, inserts: readonly InsertQuery[]): Promise<void> {
    if (inserts.length === 0) return;
    const entry = this.enqueue(table, inserts.map((insert) => insert.render()));
    if (entry.lines.length > OVERFLOW_FACTOR * this.maxBatchSize) {
      console.log(`[buffer] ${entry.lines.length} lines pending for ${table.name}, flushing early`);
      await this.flush();
    }
  }

  pendingCount(table?: Table): number {
    if (table) return this.pending.get(table.toString())?.lines.length ?? 0;
    let total = 0;
    for (const entry of this.pending.values()) total += entry.lines.length;
    return total;
  }

  /**
   * Sends every queued line. The queue is swapped out before the first
   * request, so metric rows queued while sending wait for the next flush.
   * Failed batches are recorded and dropped.
   */
  async flush(): Promise<FlushResult> {
    const snapshot = [...this.pending.values()];
    this.pending = new Map();

    const result: FlushResult = { linesWritten: 0, failedBatches: 0 };
    for (const { table, lines } of snapshot) {
      for (let start = 0; start < lines.length; start += this.maxBatchSize) {
        const batch = lines.slice(start, start + this.maxBatchSize);
        const began = Date.now();
        try {
          await this.conn.write(batch, { retentionPolicy: table.retentionPolicy.name });
        } catch (err) {
          result.failedBatches++;
          this.errors.recordError(err, `failed to write ${batch.length} line(s) into ${table}`);
          continue;
        }
        result.linesWritten += batch.length;
        if (table.declaredName !== METRICS_TABLE) {
          this.recordMetric("INSERT", [[table, batch.length]], Date.now() - began);
        }
      }
    }

    if (this.verbose && snapshot.length > 0) {
      console.log(`[buffer] flushed ${result.linesWritten} line(s) from ${snapshot.length} table(s)`);
    }
    return result;
  }

  /**
   * Queues one metric row per table. The duration is split across the
   * tables in proportion to their item counts.
   */
  recordMetric(keyword: MetricKeyword, counts: ReadonlyArray<[Table, number]>, durationMs: number): void {
    const metrics = this.database.table(METRICS_TABLE);
    const total = counts.reduce((sum, [, count]) => sum + count, 0);
    const time = nowSeconds();

    for (const [table, count] of counts) {
      const share = Math.max(count, 1) / Math.max(total, 1);
      try {
        const insert = new InsertQuery(
          metrics,
          { duration_ms: durationMs * share, item_count: count },
          { keyword, tableName: table.declaredName },
          time,
          this.errors,
        );
        this.enqueue(metrics, [insert.render()]);
      } catch (err) {
        this.errors.record(`could not record ${keyword} metric for ${table.name}: ${errorMessage(err)}`);
      }
    }
  }

  private enqueue(table: Table, lines: string[]): Pending {
    const key = table.toString();
    let entry = this.pending.get(key);
    if (!entry) {
      entry = { table, lines: [] };
      this.pending.set(key, entry);
    }
    for (const line of lines) entry.lines.push(line);
    return entry;
  }
}
