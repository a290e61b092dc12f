import { InvalidArgument } from "./errors";

// ─── Config ─────────────────────────────────────────────────────────

export interface InfluxConfig {
  url: string; // e.g. "http://localhost:8086"
  database: string; // e.g. "spp"
  username: string;
  password: string;
  timeoutMs: number;
  /** Used by `copyDatabase`, whose statements can run for hours */
  copyTimeoutMs: number;
}

export interface MonitorConfig {
  influx: InfluxConfig;
  /** Max lines per write request; also the flush cadence of the stdin runner */
  batchSize: number;
  verbose: boolean;
}

export const DEFAULT_BATCH_SIZE = 10_000;

/** Stored with every run-metrics row */
export const MONITOR_VERSION = "0.1.0";

type Env = Record<string, string | undefined>;

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const value = parseInt(raw, 10);
  if (!/^\d+$/.test(raw.trim()) || value <= 0) {
    throw new InvalidArgument(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): MonitorConfig {
  return {
    influx: {
      url: (env.INFLUX_URL || "http://localhost:8086").replace(/\/+$/, ""),
      database: env.INFLUX_DATABASE || "spp",
      username: env.INFLUX_USERNAME || "",
      password: env.INFLUX_PASSWORD || "",
      timeoutMs: positiveInt(env, "INFLUX_TIMEOUT_MS", 20_000),
      copyTimeoutMs: positiveInt(env, "INFLUX_COPY_TIMEOUT_MS", 7_200_000),
    },
    batchSize: positiveInt(env, "INFLUX_BATCH_SIZE", DEFAULT_BATCH_SIZE),
    verbose: env.MONITOR_VERBOSE === "true" || env.MONITOR_VERBOSE === "1",
  };
}
