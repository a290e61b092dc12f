import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { RowSink, ingestLines, parseRecord } from "../runner";
import { Row } from "../db/schema";
import { ErrorLog, InvalidArgument } from "../errors";

class RecordingSink implements RowSink {
  readonly events: string[] = [];

  async insertRows(tableName: string, rows: readonly Row[]): Promise<void> {
    this.events.push(`insert ${tableName} ${rows.length}`);
  }

  async flush(): Promise<void> {
    this.events.push("flush");
  }
}

async function* linesOf(...lines: string[]): AsyncIterable<string> {
  for (const line of lines) yield line;
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseRecord", () => {
  it("reads a table and its rows", () => {
    expect(parseRecord('{"table":"cpuram","rows":[{"cpuUtil":12.5,"hostName":"spp1","tags":["a"]}]}')).toEqual({
      table: "cpuram",
      rows: [{ cpuUtil: 12.5, hostName: "spp1", tags: ["a"] }],
    });
  });

  it.each([
    ["not json", "record is not valid JSON"],
    ["[1,2]", "record must be a JSON object"],
    ['{"rows":[]}', 'record needs a non-empty "table" string'],
    ['{"table":"vms"}', 'record for vms needs a "rows" list'],
    ['{"table":"vms","rows":[1]}', "every row for vms must be an object"],
  ])("rejects %s", (line, message) => {
    expect(() => parseRecord(line)).toThrow(InvalidArgument);
    expect(() => parseRecord(line)).toThrow(message);
  });
});

describe("ingestLines", () => {
  it("flushes after every batch of records", async () => {
    const sink = new RecordingSink();
    const stats = await ingestLines(
      sink,
      linesOf(
        '{"table":"vms","rows":[{"cpu":1},{"cpu":2}]}',
        "",
        '{"table":"sites","rows":[{"siteName":"main"}]}',
        '{"table":"vms","rows":[]}',
      ),
      2,
      new ErrorLog(),
    );

    expect(stats).toEqual({ records: 3, rows: 3, rejected: 0 });
    expect(sink.events).toEqual(["insert vms 2", "insert sites 1", "flush", "insert vms 0"]);
  });

  it("records and skips malformed lines", async () => {
    const sink = new RecordingSink();
    const errors = new ErrorLog();
    const stats = await ingestLines(sink, linesOf('{"table":"vms","rows":[]}', "{oops"), 10, errors);

    expect(stats).toEqual({ records: 1, rows: 0, rejected: 1 });
    expect(sink.events).toEqual(["insert vms 0"]);
    expect(errors.count).toBe(2);
    expect(errors.messages[1]).toBe("skipped input line 2");
  });
});
