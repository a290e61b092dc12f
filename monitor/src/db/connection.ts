import { InfluxConfig } from "../config";
import { InfluxHttpError, errorMessage } from "../errors";
import { Row, RowValue, isRecord, toRowValue } from "./schema";

// ─── Wire types ─────────────────────────────────────────────────────

export interface Series {
  name: string;
  columns: string[];
  values: RowValue[][];
  tags?: Record<string, string>;
}

/** One entry of the `results` array, one per statement */
export interface StatementResult {
  series: Series[];
}

export interface QueryOptions {
  /** Defaults to the configured database */
  database?: string;
  timeoutMs?: number;
}

export interface WriteOptions {
  database?: string;
  retentionPolicy?: string;
}

/** What the buffer, the reconciler and the client need from a server */
export interface InfluxConnection {
  readonly database: string;
  init(): Promise<void>;
  close(): Promise<void>;
  query(statement: string, opts?: QueryOptions): Promise<StatementResult[]>;
  command(statement: string, opts?: QueryOptions): Promise<void>;
  write(lines: readonly string[], opts?: WriteOptions): Promise<void>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface InfluxDbOptions {
  fetch?: FetchLike;
  retries?: number;
  retryDelayMs?: number;
}

/** Zips a series into one record per value row */
export function seriesRows(series: Series): Row[] {
  return series.values.map((values) => {
    const row: Row = {};
    series.columns.forEach((column, i) => {
      row[column] = values[i] ?? null;
    });
    return row;
  });
}

// ─── InfluxDb ───────────────────────────────────────────────────────

export class InfluxDb implements InfluxConnection {
  private _ready = false;
  private config: InfluxConfig;
  private fetchImpl: FetchLike;
  private retries: number;
  private retryDelayMs: number;
  private stats = {
    requests: 0,
    failed: 0,
    lastError: null as string | null,
  };

  constructor(config: InfluxConfig, opts: InfluxDbOptions = {}) {
    this.config = config;
    this.fetchImpl = opts.fetch ?? ((url, init) => fetch(url, init));
    this.retries = opts.retries ?? 5;
    this.retryDelayMs = opts.retryDelayMs ?? 3000;
  }

  get database(): string {
    return this.config.database;
  }

  get ready(): boolean {
    return this._ready;
  }

  getStats() {
    return { ...this.stats };
  }

  // ── Lifecycle ──────────────────────────────────────────────────

  async init(): Promise<void> {
    for (let attempt = 1; attempt <= this.retries; attempt++) {
      try {
        const version = await this.ping();
        this._ready = true;
        console.log(`[influx] ready (${this.config.url}/${this.config.database}, version ${version})`);
        return;
      } catch (err) {
        const message = errorMessage(err);
        const isConnErr =
          message.includes("ECONNREFUSED") || message.includes("ETIMEDOUT") || message.includes("fetch failed");
        if (isConnErr && attempt < this.retries) {
          console.log(`[influx] not ready, retry ${attempt}/${this.retries} in ${this.retryDelayMs / 1000}s...`);
          await sleep(this.retryDelayMs);
        } else {
          console.error(`[influx] init error after ${attempt} attempts: ${message}`);
          throw err;
        }
      }
    }
  }

  async close(): Promise<void> {
    this._ready = false;
  }

  // ── Requests ───────────────────────────────────────────────────

  /** Returns the server version header */
  async ping(): Promise<string> {
    const resp = await this.request("/ping", { method: "GET" }, this.config.timeoutMs);
    if (resp.status !== 204 && !resp.ok) {
      throw new InfluxHttpError(`ping failed with HTTP ${resp.status}`, resp.status, await resp.text());
    }
    return resp.headers.get("X-Influxdb-Version") ?? "unknown";
  }

  async query(statement: string, opts: QueryOptions = {}): Promise<StatementResult[]> {
    const form = new URLSearchParams({ q: statement, db: opts.database ?? this.config.database, epoch: "s" });
    const resp = await this.request(
      "/query",
      {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: form.toString(),
      },
      opts.timeoutMs ?? this.config.timeoutMs,
    );
    const text = await resp.text();
    if (!resp.ok) {
      throw new InfluxHttpError(`${errorFromBody(text) ?? `HTTP ${resp.status}`} (${statement})`, resp.status, text);
    }
    return parseQueryResponse(text, resp.status, statement);
  }

  async command(statement: string, opts: QueryOptions = {}): Promise<void> {
    await this.query(statement, opts);
  }

  async write(lines: readonly string[], opts: WriteOptions = {}): Promise<void> {
    if (lines.length === 0) return;
    const params = new URLSearchParams({ db: opts.database ?? this.config.database, precision: "s" });
    if (opts.retentionPolicy) params.set("rp", opts.retentionPolicy);

    const resp = await this.request(
      `/write?${params.toString()}`,
      {
        method: "POST",
        headers: { "Content-Type": "text/plain; charset=utf-8" },
        body: lines.join("\n"),
      },
      this.config.timeoutMs,
    );
    if (resp.status !== 204 && !resp.ok) {
      const text = await resp.text();
      throw new InfluxHttpError(errorFromBody(text) ?? `write failed with HTTP ${resp.status}`, resp.status, text);
    }
  }

  private async request(path: string, init: RequestInit, timeoutMs: number): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const headers = new Headers(init.headers);
    if (this.config.username) {
      const credentials = Buffer.from(`${this.config.username}:${this.config.password}`).toString("base64");
      headers.set("Authorization", `Basic ${credentials}`);
    }

    this.stats.requests++;
    try {
      const resp = await this.fetchImpl(`${this.config.url}${path}`, {
        ...init,
        headers,
        signal: controller.signal,
      });
      if (!resp.ok) this.noteFailure(`HTTP ${resp.status}`);
      return resp;
    } catch (err) {
      if (err instanceof Error && err.name === "AbortError") {
        this.noteFailure(`timeout (${timeoutMs}ms)`);
        throw new InfluxHttpError(`request to ${path} timed out after ${timeoutMs}ms`, 0, "");
      }
      this.noteFailure(errorMessage(err));
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }

  private noteFailure(message: string): void {
    this.stats.failed++;
    this.stats.lastError = message;
  }
}

// ─── Response parsing ───────────────────────────────────────────────

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function errorFromBody(text: string): string | undefined {
  const body = parseJson(text);
  return isRecord(body) && typeof body.error === "string" ? body.error : undefined;
}

function parseSeries(raw: unknown): Series | undefined {
  if (!isRecord(raw) || !Array.isArray(raw.columns) || !Array.isArray(raw.values)) return undefined;
  const series: Series = {
    name: typeof raw.name === "string" ? raw.name : "",
    columns: raw.columns.map((column) => String(column)),
    values: raw.values.map((row) => (Array.isArray(row) ? row.map(toRowValue) : [])),
  };
  if (isRecord(raw.tags)) {
    const tags: Record<string, string> = {};
    for (const [key, value] of Object.entries(raw.tags)) tags[key] = String(value);
    series.tags = tags;
  }
  return series;
}

/** Statement-level `error` entries of a 200 response become `InfluxHttpError`s */
export function parseQueryResponse(text: string, status: number, statement: string): StatementResult[] {
  const body = parseJson(text);
  if (!isRecord(body)) {
    throw new InfluxHttpError(`unreadable query response (${statement})`, status, text);
  }
  if (typeof body.error === "string") {
    throw new InfluxHttpError(`${body.error} (${statement})`, status, text);
  }

  const results = Array.isArray(body.results) ? body.results : [];
  return results.map((result) => {
    if (!isRecord(result)) return { series: [] };
    if (typeof result.error === "string") {
      throw new InfluxHttpError(`${result.error} (${statement})`, status, text);
    }
    const series = Array.isArray(result.series) ? result.series : [];
    return {
      series: series.map(parseSeries).filter((entry): entry is Series => entry !== undefined),
    };
  });
}

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}
