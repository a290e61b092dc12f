import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { MISSING_FIELD, classifyRow } from "../classifier";
import { Database, Table } from "../db/schema";
import { EmptyInput, ErrorLog } from "../errors";
import { CAPTURE_TIME_KEY } from "../timestamps";

const db = new Database("spp");

const vmStats = new Table({
  database: db,
  name: "vmStats",
  fields: { cpu: "FLOAT", mem: "INT" },
  tags: ["host"],
  timeKey: "time",
});

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.useRealTimers();
});

describe("classifyRow: declared tables", () => {
  it("splits tags, fields and the timestamp", () => {
    const errors = new ErrorLog();
    const result = classifyRow(vmStats, { time: 1000, cpu: 50, host: "a b" }, errors);
    expect(result.tags).toEqual({ host: "a b" });
    expect(result.fields).toEqual({ cpu: 50, mem: null });
    expect(result.timestamp).toBe(1000);
    expect(errors.count).toBe(0);
  });

  it("keeps tags and fields disjoint", () => {
    const result = classifyRow(vmStats, { time: 1, cpu: 1, mem: 2, host: "h", extra: "x" }, new ErrorLog());
    const overlap = Object.keys(result.tags).filter((key) => key in result.fields);
    expect(overlap).toEqual([]);
  });

  it("stores undeclared columns as fields and records a warning", () => {
    const errors = new ErrorLog();
    const result = classifyRow(vmStats, { time: 1, cpu: 1, disk: 42 }, errors);
    expect(result.fields).toEqual({ cpu: 1, mem: null, disk: 42 });
    expect(errors.messages).toEqual(["column disk is not declared for table vmStats, storing it as a field"]);
  });

  it("skips null and empty values", () => {
    const result = classifyRow(vmStats, { time: 1, cpu: null, host: "" }, new ErrorLog());
    expect(result.fields).toEqual({ cpu: null, mem: null });
    expect(result.tags).toEqual({ host: null });
  });

  it("prefers the declared time key over other time columns", () => {
    const errors = new ErrorLog();
    const early = classifyRow(vmStats, { time: 10, logTime: 20, cpu: 1 }, errors);
    expect(early.timestamp).toBe(10);
    const late = classifyRow(vmStats, { logTime: 20, time: 10, cpu: 1 }, errors);
    expect(late.timestamp).toBe(10);
  });

  it("uses the capture time only when nothing else was seen", () => {
    const errors = new ErrorLog();
    expect(classifyRow(vmStats, { logTime: 20, [CAPTURE_TIME_KEY]: 30, cpu: 1 }, errors).timestamp).toBe(20);
    expect(classifyRow(vmStats, { [CAPTURE_TIME_KEY]: 30, logTime: 20, cpu: 1 }, errors).timestamp).toBe(20);
    expect(classifyRow(vmStats, { [CAPTURE_TIME_KEY]: 30, cpu: 1 }, errors).timestamp).toBe(30);
  });

  it("does not store undeclared time columns", () => {
    const result = classifyRow(vmStats, { time: 1, logTime: 2, cpu: 1 }, new ErrorLog());
    expect(result.fields).toEqual({ cpu: 1, mem: null });
  });

  it("stores a declared time column as a field too", () => {
    const jobs = new Table({ database: db, name: "jobs", fields: { start: "TIMESTAMP", id: "INT" }, timeKey: "start" });
    const result = classifyRow(jobs, { start: 1609459200000, id: 3 }, new ErrorLog());
    expect(result.timestamp).toBe(1609459200000);
    expect(result.fields).toEqual({ start: 1609459200000, id: 3 });
  });

  it("returns no timestamp when the row has none", () => {
    expect(classifyRow(vmStats, { cpu: 1 }, new ErrorLog()).timestamp).toBeNull();
  });

  it("rejects empty rows", () => {
    expect(() => classifyRow(vmStats, {}, new ErrorLog())).toThrow(EmptyInput);
  });
});

describe("classifyRow: fallback tables", () => {
  const adhoc = db.table("adhoc");

  it("splits by value type", () => {
    const errors = new ErrorLog();
    const result = classifyRow(
      adhoc,
      { time: 5, count: 3, ok: true, host: "web01", note: "two words", list: [1, 2], meta: { a: 1 } },
      errors,
    );
    expect(result.tags).toEqual({ host: "web01" });
    expect(result.fields).toEqual({ count: 3, ok: true, note: "two words", list: "[1,2]", meta: '{"a":1}' });
    expect(result.timestamp).toBe(5);
    expect(errors.count).toBe(0);
  });

  it("lets logTime override an earlier time column", () => {
    const errors = new ErrorLog();
    expect(classifyRow(adhoc, { time: 5, logTime: 7, n: 1 }, errors).timestamp).toBe(7);
    expect(classifyRow(adhoc, { logTime: 7, time: 5, n: 1 }, errors).timestamp).toBe(7);
    expect(classifyRow(adhoc, { [CAPTURE_TIME_KEY]: 9, time: 5, n: 1 }, errors).timestamp).toBe(9);
  });

  it("inserts a placeholder field when the row has only tags", () => {
    const errors = new ErrorLog();
    const result = classifyRow(adhoc, { time: 5, host: "web01" }, errors);
    expect(result.fields).toEqual({ [MISSING_FIELD]: 42 });
    expect(errors.messages).toEqual(["no field found in row for table adhoc, inserting MISSING_FIELD"]);
  });

  it("falls back to the current time", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(1_700_000_000_000));
    const errors = new ErrorLog();
    const result = classifyRow(adhoc, { n: 1 }, errors);
    expect(result.timestamp).toBe(1_700_000_000);
    expect(errors.messages).toEqual(["no timestamp found in row for table adhoc, using the current time"]);
  });

  it("skips null and empty values", () => {
    const result = classifyRow(adhoc, { time: 5, n: 1, a: null, b: "" }, new ErrorLog());
    expect(result.fields).toEqual({ n: 1 });
    expect(result.tags).toEqual({});
  });
});
