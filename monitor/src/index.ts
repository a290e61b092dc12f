#!/usr/bin/env node
import { createInterface } from "readline";
import { MONITOR_VERSION, loadConfig } from "./config";
import { ErrorLog } from "./errors";
import { InfluxClient } from "./influx-client";
import { ingestLines } from "./runner";

// ─── Entry point ───────────────────────────────────────────────────
//
// Reads `{"table": "...", "rows": [...]}` records from stdin, one per line,
// and writes them to the configured database. Exits 1 when any error was
// recorded during the run.
// ───────────────────────────────────────────────────────────────────

async function main() {
  const startedAt = Date.now();
  const config = loadConfig();
  const errors = new ErrorLog();
  const client = InfluxClient.fromConfig(config, errors);

  await client.connect();
  console.log(`[main] connected, ${client.database.tables.size} tables declared`);

  let finished = false;
  const finish = async (reason: string) => {
    if (finished) return;
    finished = true;
    console.log(`[main] ${reason}, storing run metrics`);

    await client.storeRunMetrics({ sppmon_version: MONITOR_VERSION, reason }, Date.now() - startedAt);
    await client.disconnect();

    console.log(`[main] ${errors.summary()}`);
    process.exit(errors.count > 0 ? 1 : 0);
  };

  const onSignal = (signal: string) => {
    finish(`${signal} received`).catch((err) => {
      console.error("[main] shutdown failed:", err);
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));

  const input = createInterface({ input: process.stdin, crlfDelay: Infinity });
  const stats = await ingestLines(client, input, config.batchSize, errors);
  console.log(`[main] read ${stats.records} record(s) with ${stats.rows} row(s), ${stats.rejected} rejected`);

  await finish("end of input");
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
