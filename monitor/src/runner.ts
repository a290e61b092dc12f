import { Row, isRecord, toRowValue } from "./db/schema";
import { ErrorLog, InvalidArgument, errorMessage } from "./errors";

/** One line of collector output: rows for a single measurement */
export interface IngestRecord {
  table: string;
  rows: Row[];
}

/** Anything `ingestLines` can hand records to */
export interface RowSink {
  insertRows(tableName: string, rows: readonly Row[]): Promise<void>;
  flush(): Promise<void>;
}

export interface IngestStats {
  records: number;
  rows: number;
  rejected: number;
}

export function parseRecord(line: string): IngestRecord {
  let decoded: unknown;
  try {
    decoded = JSON.parse(line);
  } catch (err) {
    throw new InvalidArgument(`record is not valid JSON: ${errorMessage(err)}`);
  }
  if (!isRecord(decoded)) throw new InvalidArgument("record must be a JSON object");
  const table = decoded.table;
  const rawRows = decoded.rows;
  if (typeof table !== "string" || !table) {
    throw new InvalidArgument('record needs a non-empty "table" string');
  }
  if (!Array.isArray(rawRows)) {
    throw new InvalidArgument(`record for ${table} needs a "rows" list`);
  }

  const rows: Row[] = [];
  for (const raw of rawRows) {
    if (!isRecord(raw)) throw new InvalidArgument(`every row for ${table} must be an object`);
    const row: Row = {};
    for (const [key, value] of Object.entries(raw)) row[key] = toRowValue(value);
    rows.push(row);
  }
  return { table, rows };
}

/**
 * Feeds newline-delimited records into `sink`, flushing after every
 * `flushEvery` records. Blank lines are skipped; malformed ones are
 * recorded and skipped.
 */
export async function ingestLines(
  sink: RowSink,
  lines: AsyncIterable<string>,
  flushEvery: number,
  errors: ErrorLog,
): Promise<IngestStats> {
  const stats: IngestStats = { records: 0, rows: 0, rejected: 0 };
  let sinceFlush = 0;

  for await (const line of lines) {
    if (!line.trim()) continue;

    let record: IngestRecord;
    try {
      record = parseRecord(line);
    } catch (err) {
      stats.rejected++;
      errors.recordError(err, `skipped input line ${stats.records + stats.rejected}`);
      continue;
    }

    await sink.insertRows(record.table, record.rows);
    stats.records++;
    stats.rows += record.rows.length;

    if (++sinceFlush >= flushEvery) {
      await sink.flush();
      sinceFlush = 0;
    }
  }

  return stats;
}
